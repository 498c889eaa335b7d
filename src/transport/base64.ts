/**
 * Standard base64 transport text (RFC 4648 alphabet, `=` padding).
 *
 * Decoding is strict: Node's own base64 decoder skips characters it does not
 * know, so input is checked here before it reaches `Buffer`.
 */

import { TransportDecodeError } from '../errors';

const ALPHABET = /^[A-Za-z0-9+/]$/;

/**
 * Encode bytes as padded standard base64.
 */
export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64');
}

/**
 * Decode padded standard base64.
 *
 * Rejects, in this order: characters outside the alphabet, misplaced or
 * excess padding, a length that is not a multiple of four, and a final
 * symbol carrying non-zero unused bits.
 */
export function decodeBase64(s: string): Uint8Array {
  const padStart = s.indexOf('=');
  const dataEnd = padStart >= 0 ? padStart : s.length;

  for (let i = 0; i < dataEnd; i++) {
    if (!ALPHABET.test(s[i])) {
      throw new TransportDecodeError('base64', `Invalid symbol '${s[i]}' at offset ${i}`);
    }
  }

  if (padStart >= 0) {
    const padding = s.slice(padStart);
    if (padding.length > 2 || !/^=+$/.test(padding) || s.length % 4 !== 0) {
      throw new TransportDecodeError('base64', 'Invalid padding');
    }
  } else if (s.length % 4 !== 0) {
    throw new TransportDecodeError('base64', 'Invalid input length');
  }

  const bytes = new Uint8Array(Buffer.from(s, 'base64'));

  // A quartet like "QR==" decodes, but its last symbol has bits that no
  // encoder would set.
  if (encodeBase64(bytes) !== s) {
    const last = dataEnd - 1;
    throw new TransportDecodeError('base64', `Invalid last symbol '${s[last]}' at offset ${last}`);
  }

  return bytes;
}
