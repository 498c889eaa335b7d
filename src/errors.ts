/**
 * Error types for every conversion stage.
 *
 * The codecs throw these; the orchestrator in `convert.ts` catches them and
 * hands them back as a `ConversionError` inside a result value.
 */

import type { TextEncoding } from './transport/encoding';

/** JSON text could not be parsed */
export class JsonParseError extends Error {
  constructor(
    public reason: string,
    public offset: number = -1
  ) {
    super(offset >= 0 ? `${reason} at offset ${offset}` : reason);
    this.name = 'JsonParseError';
  }
}

/** A value could not be written as JSON text */
export class JsonSerializeError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'JsonSerializeError';
  }
}

/** A value could not be written as MessagePack */
export class MessagePackEncodeError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'MessagePackEncodeError';
  }
}

/** MessagePack bytes were truncated, malformed, or not representable as JSON */
export class MessagePackDecodeError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'MessagePackDecodeError';
  }
}

/** Hex or base64 text could not be turned into bytes */
export class TransportDecodeError extends Error {
  constructor(
    public encoding: TextEncoding,
    public reason: string
  ) {
    super(reason);
    this.name = 'TransportDecodeError';
  }
}

// ============================================================
// Stage-tagged conversion errors
// ============================================================

export type ConversionStage =
  | 'parse-json'
  | 'encode-msgpack'
  | 'decode-hex'
  | 'decode-base64'
  | 'decode-msgpack'
  | 'serialize-json';

export type ConversionErrorKind =
  | 'JsonParseError'
  | 'MessagePackEncodeError'
  | 'TransportDecodeError'
  | 'MessagePackDecodeError'
  | 'JsonSerializeError';

/** Message prefix shown for each stage */
export const STAGE_LABELS: Record<ConversionStage, string> = {
  'parse-json': 'Failed to parse JSON',
  'encode-msgpack': 'Failed to serialize to MessagePack',
  'decode-hex': 'Failed to decode Hex',
  'decode-base64': 'Failed to decode Base64',
  'decode-msgpack': 'Failed to deserialize MessagePack',
  'serialize-json': 'Failed to serialize to JSON',
};

const STAGE_KINDS: Record<ConversionStage, ConversionErrorKind> = {
  'parse-json': 'JsonParseError',
  'encode-msgpack': 'MessagePackEncodeError',
  'decode-hex': 'TransportDecodeError',
  'decode-base64': 'TransportDecodeError',
  'decode-msgpack': 'MessagePackDecodeError',
  'serialize-json': 'JsonSerializeError',
};

/**
 * Failure of one conversion call, named after the stage that failed.
 * `message` is `<stage label>: <cause text>`.
 */
export class ConversionError extends Error {
  readonly kind: ConversionErrorKind;

  constructor(
    public readonly stage: ConversionStage,
    cause: unknown
  ) {
    super(`${STAGE_LABELS[stage]}: ${describeError(cause)}`, { cause });
    this.name = 'ConversionError';
    this.kind = STAGE_KINDS[stage];
  }
}

/**
 * Text of anything thrown. Some parsers throw plain `{ message }` objects
 * rather than Error instances.
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
