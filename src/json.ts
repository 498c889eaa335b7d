/**
 * jsonpack JSON Codec
 *
 * Converts JSON text and plain JavaScript data to Value, and Value to
 * indented JSON text.
 */

import JSONbig from 'json-bigint';
import { BigNumber } from 'bignumber.js';
import { Value, MapEntry, INT_MIN, INT_MAX, MAX_DEPTH, v } from './types';
import { JsonParseError, JsonSerializeError, describeError } from './errors';

// Long numeric literals come back as BigNumber instead of a rounded double.
// `__proto__` and `constructor` are ordinary keys in JSON data.
const parser = JSONbig({
  protoAction: 'preserve',
  constructorAction: 'preserve',
});

// ============================================================
// JSON to Value Conversion
// ============================================================

/**
 * Convert plain JSON-shaped data to a Value.
 *
 * Accepts what a JSON parser produces: null, booleans, finite numbers,
 * bigints, BigNumber instances, strings, arrays and plain objects, nested at
 * most MAX_DEPTH containers deep. Strings must be well-formed UTF-16.
 */
export function fromJson(json: unknown): Value {
  return convert(json, 0);
}

function convert(json: unknown, depth: number): Value {
  // Null
  if (json === null) {
    return v.null();
  }

  // Boolean
  if (typeof json === 'boolean') {
    return v.bool(json);
  }

  // Number
  if (typeof json === 'number') {
    if (Number.isSafeInteger(json)) {
      return v.int(json);
    }
    if (Number.isFinite(json)) {
      return v.float(json);
    }
    throw new TypeError(`Non-finite number is not valid JSON: ${json}`);
  }

  if (typeof json === 'bigint') {
    return fromBigInt(json);
  }

  if (BigNumber.isBigNumber(json)) {
    if (json.isInteger()) {
      return fromBigInt(BigInt(json.toFixed()));
    }
    return v.float(json.toNumber());
  }

  // String
  if (typeof json === 'string') {
    return v.str(checkString(json));
  }

  if (typeof json === 'object' && depth >= MAX_DEPTH) {
    throw new RangeError(`nesting deeper than ${MAX_DEPTH} levels`);
  }

  // Array
  if (Array.isArray(json)) {
    return v.list(...json.map(item => convert(item, depth + 1)));
  }

  // Object
  if (typeof json === 'object') {
    const entries: MapEntry[] = [];
    for (const [key, val] of Object.entries(json)) {
      entries.push({ key: checkString(key), value: convert(val, depth + 1) });
    }
    return v.map(...entries);
  }

  throw new TypeError(`Unsupported JSON value type: ${typeof json}`);
}

/**
 * Integral literals beyond the 64-bit range fall back to a double, the way
 * most JSON libraries treat them.
 */
function fromBigInt(n: bigint): Value {
  if (n < INT_MIN || n > INT_MAX) {
    return v.float(Number(n));
  }
  return v.int(n);
}

// A "\ud800" escape parses to a lone surrogate, which has no UTF-8 form.
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

function checkString(s: string): string {
  const match = LONE_SURROGATE.exec(s);
  if (match) {
    const unit = match[0].charCodeAt(0).toString(16);
    throw new TypeError(`lone surrogate \\u${unit} in string`);
  }
  return s;
}

// ============================================================
// Text
// ============================================================

/**
 * Parse JSON text to a Value.
 *
 * Any JSON document is accepted, including a bare scalar. Duplicate keys
 * resolve to their last occurrence. Throws JsonParseError.
 */
export function parseJson(text: string): Value {
  let json: unknown;
  try {
    json = parser.parse(text);
    // json-bigint lets through leading zeros, "1." and raw control
    // characters; the built-in grammar does not.
    JSON.parse(text);
  } catch (err) {
    throw new JsonParseError(describeError(err), errorOffset(err));
  }

  try {
    return fromJson(json);
  } catch (err) {
    throw new JsonParseError(describeError(err));
  }
}

function errorOffset(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'at' in err && typeof err.at === 'number') {
    return err.at;
  }
  if (err instanceof SyntaxError) {
    const position = /at position (\d+)/.exec(err.message);
    if (position) {
      return Number(position[1]);
    }
  }
  return -1;
}

/**
 * Stringify a Value as indented JSON.
 *
 * Keys come out in the map's stored order. Empty containers print as `[]`
 * and `{}`. Throws JsonSerializeError.
 */
export function stringifyPretty(value: Value, indent: number = 2): string {
  const out: string[] = [];
  writeValue(value, ' '.repeat(indent), '', out);
  return out.join('');
}

function writeValue(value: Value, unit: string, current: string, out: string[]): void {
  switch (value.kind) {
    case 'null':
      out.push('null');
      return;

    case 'bool':
      out.push(value.value ? 'true' : 'false');
      return;

    case 'int':
      out.push(value.value.toString());
      return;

    case 'float':
      if (!Number.isFinite(value.value)) {
        throw new JsonSerializeError(`float is not finite: ${value.value}`);
      }
      out.push(String(value.value));
      return;

    case 'str':
      out.push(JSON.stringify(value.value));
      return;

    case 'list': {
      if (value.items.length === 0) {
        out.push('[]');
        return;
      }
      const inner = current + unit;
      out.push('[');
      value.items.forEach((item, i) => {
        out.push(i === 0 ? '\n' : ',\n', inner);
        writeValue(item, unit, inner, out);
      });
      out.push('\n', current, ']');
      return;
    }

    case 'map': {
      if (value.entries.length === 0) {
        out.push('{}');
        return;
      }
      const inner = current + unit;
      out.push('{');
      value.entries.forEach((e, i) => {
        out.push(i === 0 ? '\n' : ',\n', inner, JSON.stringify(e.key), ': ');
        writeValue(e.value, unit, inner, out);
      });
      out.push('\n', current, '}');
      return;
    }
  }
}
