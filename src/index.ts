/**
 * jsonpack: JSON <-> MessagePack conversion
 *
 * MessagePack is carried as text, base64 on output and either hex or base64
 * on input (detected from the characters used).
 *
 * @example
 * ```typescript
 * import { convertJsonToMessagePack, convertMessagePackToJson } from 'jsonpack-bridge';
 *
 * const packed = convertJsonToMessagePack('{"name":"Alice","age":30}');
 * // => { ok: true, value: 'gqNhZ2UepG5hbWWlQWxpY2U=' }
 *
 * const json = convertMessagePackToJson('82a36167651ea46e616d65a5416c696365');
 * // => { ok: true, value: '{\n  "age": 30,\n  "name": "Alice"\n}' }
 *
 * const bad = convertMessagePackToJson('invalid_base64_string');
 * // => { ok: false, error: ConversionError("Failed to decode Base64: ...") }
 * ```
 */

// Core types
export {
  Value,
  ValueKind,
  MapEntry,
  NullValue,
  BoolValue,
  IntValue,
  FloatValue,
  StrValue,
  ListValue,
  MapValue,
  INT_MIN,
  INT_MAX,
  MAX_DEPTH,
  v,
  entry,
  compareKeys,
  getEntry,
  valueEqual,
} from './types';

// Errors
export {
  JsonParseError,
  JsonSerializeError,
  MessagePackEncodeError,
  MessagePackDecodeError,
  TransportDecodeError,
  ConversionError,
  ConversionStage,
  ConversionErrorKind,
  STAGE_LABELS,
  describeError,
} from './errors';

// JSON codec
export {
  fromJson,
  parseJson,
  stringifyPretty,
} from './json';

// MessagePack codec
export {
  encodeMsgpack,
  decodeMsgpack,
} from './msgpack';

// Conversion
export {
  convertJsonToMessagePack,
  convertMessagePackToJson,
  Result,
  JsonToMessagePackOptions,
  MessagePackToJsonOptions,
} from './convert';

// Configuration
export {
  loadConfig,
  Config,
  ConfigError,
  ConfigSchema,
  LogLevel,
  LOG_LEVELS,
} from './config';

// CLI
export { runCli, parseCommand, Command, CliIO } from './cli';

// Textual transport (hex / base64)
export * as transport from './transport/index';
export {
  TextEncoding,
  InputEncoding,
  decideEncoding,
  decodeText,
  encodeText,
  encodeBase64,
  encodeHex,
  isHex,
} from './transport/index';
