/**
 * Textual transport for MessagePack bytes: hex and base64.
 */

// Detection and dispatch
export {
  TextEncoding,
  InputEncoding,
  DecodedText,
  decideEncoding,
  decodeText,
  encodeText,
} from './encoding';

// Hex
export {
  encodeHex,
  decodeHex,
  isHex,
} from './hex';

// Base64
export {
  encodeBase64,
  decodeBase64,
} from './base64';
