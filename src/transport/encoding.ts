/**
 * Transport encoding detection and dispatch.
 */

import { decodeBase64, encodeBase64 } from './base64';
import { decodeHex, encodeHex, isHex } from './hex';

/** Textual alphabet used to carry raw bytes */
export type TextEncoding = 'hex' | 'base64';

/** Requested input encoding; `auto` applies `decideEncoding` */
export type InputEncoding = TextEncoding | 'auto';

export interface DecodedText {
  encoding: TextEncoding;
  bytes: Uint8Array;
}

/**
 * Classify input text as hex or base64.
 *
 * Text made only of hex digits is hex; anything else is base64. This is a
 * heuristic over the character set, not a tag: base64 that happens to use
 * only `0-9a-fA-F` (for example "abcd") is read as hex.
 */
export function decideEncoding(text: string): TextEncoding {
  return isHex(text) ? 'hex' : 'base64';
}

/**
 * Decode transport text into bytes.
 * Throws TransportDecodeError tagged with the encoding that was tried.
 */
export function decodeText(text: string, encoding: InputEncoding = 'auto'): DecodedText {
  const resolved = encoding === 'auto' ? decideEncoding(text) : encoding;
  const bytes = resolved === 'hex' ? decodeHex(text) : decodeBase64(text);
  return { encoding: resolved, bytes };
}

/**
 * Encode bytes as transport text.
 */
export function encodeText(bytes: Uint8Array, encoding: TextEncoding): string {
  return encoding === 'hex' ? encodeHex(bytes) : encodeBase64(bytes);
}
