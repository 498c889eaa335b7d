/**
 * JSON <-> MessagePack conversion.
 *
 * The two public operations never throw for bad input. Each runs its stages
 * in order, stops at the first one that fails, and returns either the output
 * text or a ConversionError naming that stage.
 */

import { parseJson, stringifyPretty } from './json';
import { encodeMsgpack, decodeMsgpack } from './msgpack';
import { decodeText, encodeText, TextEncoding, InputEncoding, DecodedText } from './transport/encoding';
import { ConversionError, ConversionStage, TransportDecodeError } from './errors';

export type Result<T, E = ConversionError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface JsonToMessagePackOptions {
  /** Alphabet of the returned text (default: base64) */
  outputEncoding?: TextEncoding;
}

export interface MessagePackToJsonOptions {
  /** How to read the input text (default: auto-detect) */
  inputEncoding?: InputEncoding;
  /** Spaces per indentation level (default: 2) */
  indent?: number;
}

/**
 * Convert JSON text to MessagePack, returned as base64 (or hex) text.
 *
 * @example
 * ```ts
 * const result = convertJsonToMessagePack('{"a":1}');
 * if (result.ok) console.log(result.value); // "gaFhAQ=="
 * ```
 */
export function convertJsonToMessagePack(
  json: string,
  options: JsonToMessagePackOptions = {}
): Result<string> {
  const { outputEncoding = 'base64' } = options;

  const parsed = runStage('parse-json', () => parseJson(json));
  if (!parsed.ok) return parsed;

  const packed = runStage('encode-msgpack', () => encodeMsgpack(parsed.value));
  if (!packed.ok) return packed;

  return ok(encodeText(packed.value, outputEncoding));
}

/**
 * Convert hex or base64 MessagePack text to indented JSON.
 *
 * With the default `inputEncoding: 'auto'`, text made only of hex digits is
 * read as hex and anything else as base64.
 */
export function convertMessagePackToJson(
  input: string,
  options: MessagePackToJsonOptions = {}
): Result<string> {
  const { inputEncoding = 'auto', indent = 2 } = options;

  const decoded = decodeTransport(input, inputEncoding);
  if (!decoded.ok) return decoded;

  const value = runStage('decode-msgpack', () => decodeMsgpack(decoded.value.bytes));
  if (!value.ok) return value;

  return runStage('serialize-json', () => stringifyPretty(value.value, indent));
}

function decodeTransport(input: string, encoding: InputEncoding): Result<DecodedText> {
  try {
    return ok(decodeText(input, encoding));
  } catch (err) {
    const stage: ConversionStage =
      err instanceof TransportDecodeError && err.encoding === 'hex' ? 'decode-hex' : 'decode-base64';
    return { ok: false, error: new ConversionError(stage, err) };
  }
}

function runStage<T>(stage: ConversionStage, fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (err) {
    return { ok: false, error: new ConversionError(stage, err) };
  }
}

function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}
