/**
 * Hexadecimal transport text.
 */

import { TransportDecodeError } from '../errors';

const HEX_DIGITS = '0123456789abcdef';

/**
 * Convert bytes to a lowercase hex string.
 */
export function encodeHex(bytes: Uint8Array): string {
  let result = '';
  for (let i = 0; i < bytes.length; i++) {
    result += HEX_DIGITS[bytes[i] >> 4];
    result += HEX_DIGITS[bytes[i] & 0x0f];
  }
  return result;
}

/**
 * True when every character is a hex digit, in either case.
 * The empty string counts as hex.
 */
export function isHex(s: string): boolean {
  for (let i = 0; i < s.length; i++) {
    if (hexDigit(s.charCodeAt(i)) < 0) {
      return false;
    }
  }
  return true;
}

/**
 * Parse a hex string into bytes.
 * Throws TransportDecodeError on a non-hex character or an odd digit count.
 */
export function decodeHex(s: string): Uint8Array {
  for (let i = 0; i < s.length; i++) {
    if (hexDigit(s.charCodeAt(i)) < 0) {
      throw new TransportDecodeError('hex', `Invalid character '${s[i]}' at position ${i}`);
    }
  }
  if (s.length % 2 !== 0) {
    throw new TransportDecodeError('hex', 'Odd number of digits');
  }

  const bytes = new Uint8Array(s.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = (hexDigit(s.charCodeAt(i * 2)) << 4) | hexDigit(s.charCodeAt(i * 2 + 1));
  }
  return bytes;
}

function hexDigit(c: number): number {
  if (c >= 48 && c <= 57) return c - 48;      // 0-9
  if (c >= 97 && c <= 102) return c - 97 + 10; // a-f
  if (c >= 65 && c <= 70) return c - 65 + 10;  // A-F
  return -1;
}
