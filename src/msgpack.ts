/**
 * jsonpack MessagePack Codec
 *
 * Encodes a Value as MessagePack and decodes MessagePack back into a Value.
 *
 * Shapes MessagePack has and JSON lacks are handled explicitly on decode:
 * - bin and extension values (including timestamps) are rejected
 * - integer map keys become their decimal string
 * - non-finite floats become null
 * - map keys of any other type are rejected
 */

import { encode, decodeMulti, ExtData } from '@msgpack/msgpack';
import { Value, MapEntry, MAX_DEPTH, v } from './types';
import { MessagePackDecodeError, MessagePackEncodeError, describeError } from './errors';

// Keys are re-sorted by the encoder because integer-like keys of a plain
// object always enumerate first; sorting restores the Value's key order.
// A scalar inside the deepest container sits one level below it.
const ENCODE_OPTIONS = {
  sortKeys: true,
  useBigInt64: true,
  maxDepth: MAX_DEPTH + 1,
};

// The decoder builds maps as plain objects and refuses a "__proto__" key
// before any converter runs. Every key is therefore read with KEY_PREFIX in
// front and the prefix is dropped again in fromNative.
const KEY_PREFIX = '$';

const utf8 = new TextDecoder('utf-8', { ignoreBOM: true });

const keyDecoder = {
  canBeCached: (): boolean => true,
  decode: (bytes: Uint8Array, inputOffset: number, byteLength: number): string =>
    KEY_PREFIX + utf8.decode(bytes.subarray(inputOffset, inputOffset + byteLength)),
};

function mapKeyConverter(key: unknown): string {
  if (typeof key === 'string') {
    return key;
  }
  if (typeof key === 'bigint' || Number.isInteger(key)) {
    return KEY_PREFIX + String(key);
  }
  const type = key === null ? 'nil' : typeof key === 'number' ? 'float' : typeof key;
  throw new MessagePackDecodeError(`map key must be a string or an integer, got ${type}`);
}

const DECODE_OPTIONS = {
  useBigInt64: true,
  keyDecoder,
  mapKeyConverter,
};

const TIMESTAMP_EXT_TYPE = -1;

const UINT32_MAX = 0xffffffff;
const INT32_MIN = -0x80000000;

// ============================================================
// Encode
// ============================================================

/**
 * Encode a Value as MessagePack bytes.
 *
 * Integers take the smallest encoding that fits, non-integral floats take
 * float64, strings, arrays and maps take the smallest header for their size.
 * Throws MessagePackEncodeError.
 */
export function encodeMsgpack(value: Value): Uint8Array {
  try {
    return encode(toNative(value), ENCODE_OPTIONS);
  } catch (err) {
    throw new MessagePackEncodeError(describeError(err));
  }
}

function toNative(value: Value): unknown {
  switch (value.kind) {
    case 'null':
      return null;

    case 'int':
      return widenInt(value.value);

    case 'bool':
    case 'float':
    case 'str':
      return value.value;

    case 'list':
      return value.items.map(toNative);

    case 'map': {
      // No prototype, so a "__proto__" key stays an own property.
      const obj: Record<string, unknown> = Object.create(null);
      for (const e of value.entries) {
        obj[e.key] = toNative(e.value);
      }
      return obj;
    }
  }
}

// The encoder writes a number beyond 32 bits as a float once bigint
// support is on, so those integers go in as bigints.
function widenInt(n: number | bigint): number | bigint {
  if (typeof n === 'number' && (n > UINT32_MAX || n < INT32_MIN)) {
    return BigInt(n);
  }
  return n;
}

// ============================================================
// Decode
// ============================================================

/**
 * Decode the first MessagePack value in `bytes`. Bytes after it are ignored.
 * Throws MessagePackDecodeError.
 */
export function decodeMsgpack(bytes: Uint8Array): Value {
  let decoded: { value: unknown } | null = null;
  try {
    for (const value of decodeMulti(bytes, DECODE_OPTIONS)) {
      decoded = { value };
      break;
    }
  } catch (err) {
    if (err instanceof RangeError) {
      throw new MessagePackDecodeError('unexpected end of MessagePack data');
    }
    throw new MessagePackDecodeError(describeError(err));
  }

  if (decoded === null) {
    throw new MessagePackDecodeError('no MessagePack value found');
  }
  return fromNative(decoded.value);
}

function fromNative(x: unknown): Value {
  if (x === null || x === undefined) {
    return v.null();
  }

  switch (typeof x) {
    case 'boolean':
      return v.bool(x);

    case 'number':
      if (Number.isSafeInteger(x)) return v.int(x);
      if (Number.isFinite(x)) return v.float(x);
      return v.null();

    case 'bigint':
      return v.int(x);

    case 'string':
      return v.str(x);
  }

  if (Array.isArray(x)) {
    return v.list(...x.map(fromNative));
  }

  if (x instanceof Uint8Array) {
    throw new MessagePackDecodeError('binary data (bin format) cannot be represented as JSON');
  }

  if (x instanceof Date) {
    throw new MessagePackDecodeError(
      `extension type ${TIMESTAMP_EXT_TYPE} (timestamp) cannot be represented as JSON`
    );
  }

  if (x instanceof ExtData) {
    throw new MessagePackDecodeError(`extension type ${x.type} cannot be represented as JSON`);
  }

  if (typeof x === 'object') {
    const entries: MapEntry[] = [];
    for (const [key, val] of Object.entries(x)) {
      entries.push({ key: key.slice(KEY_PREFIX.length), value: fromNative(val) });
    }
    return v.map(...entries);
  }

  throw new MessagePackDecodeError(`unsupported decoded value: ${typeof x}`);
}
