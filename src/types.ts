/**
 * jsonpack Core Types
 *
 * Value is the pivot representation both conversion directions pass through:
 * JSON text and MessagePack bytes are each decoded into a Value and encoded
 * back out of one.
 */

export type ValueKind = 'null' | 'bool' | 'int' | 'float' | 'str' | 'list' | 'map';

export interface MapEntry {
  readonly key: string;
  readonly value: Value;
}

export interface NullValue {
  readonly kind: 'null';
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

/** Integer in [-2^63, 2^64 - 1]. A number when safe, a bigint otherwise. */
export interface IntValue {
  readonly kind: 'int';
  readonly value: number | bigint;
}

/** Finite floating-point number. */
export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface StrValue {
  readonly kind: 'str';
  readonly value: string;
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly Value[];
}

/** Entries are unique by key and sorted by `compareKeys`. */
export interface MapValue {
  readonly kind: 'map';
  readonly entries: readonly MapEntry[];
}

export type Value =
  | NullValue
  | BoolValue
  | IntValue
  | FloatValue
  | StrValue
  | ListValue
  | MapValue;

/** Smallest integer an IntValue holds (int64 minimum). */
export const INT_MIN = -(2n ** 63n);

/** Largest integer an IntValue holds (uint64 maximum). */
export const INT_MAX = 2n ** 64n - 1n;

/** Deepest nesting of lists and maps a Value built from JSON may have. */
export const MAX_DEPTH = 128;

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

const NULL: NullValue = { kind: 'null' };

// ============================================================
// Constructors
// ============================================================

function nullValue(): NullValue {
  return NULL;
}

function bool(value: boolean): BoolValue {
  return { kind: 'bool', value };
}

/**
 * Integer constructor. Bigints inside the safe range are narrowed to numbers
 * so that equal integers always share one representation.
 */
function int(value: number | bigint): IntValue {
  if (typeof value === 'bigint') {
    if (value < INT_MIN || value > INT_MAX) {
      throw new RangeError(`integer out of 64-bit range: ${value}`);
    }
    if (value >= MIN_SAFE && value <= MAX_SAFE) {
      return { kind: 'int', value: Number(value) };
    }
    return { kind: 'int', value };
  }
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`not a safe integer: ${value}`);
  }
  return { kind: 'int', value };
}

function float(value: number): FloatValue {
  if (!Number.isFinite(value)) {
    throw new RangeError(`float must be finite: ${value}`);
  }
  return { kind: 'float', value };
}

function str(value: string): StrValue {
  return { kind: 'str', value };
}

function list(...items: Value[]): ListValue {
  return { kind: 'list', items };
}

/**
 * Map constructor. Entries are sorted by key; when a key repeats, the last
 * entry for it wins.
 */
function map(...entries: MapEntry[]): MapValue {
  const byKey = new Map<string, Value>();
  for (const e of entries) {
    byKey.set(e.key, e.value);
  }
  const sorted = [...byKey.keys()].sort(compareKeys);
  return {
    kind: 'map',
    entries: sorted.map(key => {
      const value = byKey.get(key);
      return { key, value: value ?? NULL };
    }),
  };
}

/**
 * Create a map entry for map construction
 */
export function entry(key: string, value: Value): MapEntry {
  return { key, value };
}

/**
 * Shorthand constructors
 */
export const v = {
  null: nullValue,
  bool,
  int,
  float,
  str,
  list,
  map,
  entry,
};

// ============================================================
// Helpers
// ============================================================

/**
 * Key order of every MapValue: plain JavaScript string order (UTF-16 code
 * units), the same order the MessagePack encoder sorts keys in.
 */
export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Look up a key in a map value.
 */
export function getEntry(m: MapValue, key: string): Value | null {
  let lo = 0;
  let hi = m.entries.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const c = compareKeys(m.entries[mid].key, key);
    if (c === 0) return m.entries[mid].value;
    if (c < 0) lo = mid + 1;
    else hi = mid - 1;
  }
  return null;
}

/**
 * Structural equality. An int and a float holding the same number compare
 * equal, since neither codec can always keep the two apart.
 */
export function valueEqual(a: Value, b: Value): boolean {
  if (isNumeric(a) && isNumeric(b)) {
    return numericEqual(a.value, b.value);
  }

  switch (a.kind) {
    case 'null':
      return b.kind === 'null';

    case 'bool':
    case 'str':
      return b.kind === a.kind && b.value === a.value;

    case 'list': {
      if (b.kind !== 'list' || a.items.length !== b.items.length) return false;
      for (let i = 0; i < a.items.length; i++) {
        if (!valueEqual(a.items[i], b.items[i])) return false;
      }
      return true;
    }

    case 'map': {
      if (b.kind !== 'map' || a.entries.length !== b.entries.length) return false;
      for (let i = 0; i < a.entries.length; i++) {
        if (a.entries[i].key !== b.entries[i].key) return false;
        if (!valueEqual(a.entries[i].value, b.entries[i].value)) return false;
      }
      return true;
    }

    default:
      return false;
  }
}

function isNumeric(x: Value): x is IntValue | FloatValue {
  return x.kind === 'int' || x.kind === 'float';
}

function numericEqual(a: number | bigint, b: number | bigint): boolean {
  if (typeof a === 'number' && typeof b === 'number') return a === b;
  if (typeof a === 'bigint' && typeof b === 'bigint') return a === b;
  // Mixed: a bigint only equals a number that is an exact integer.
  const n = typeof a === 'number' ? a : b;
  const big = typeof a === 'bigint' ? a : b;
  if (typeof n !== 'number' || typeof big !== 'bigint') return false;
  return Number.isInteger(n) && BigInt(n) === big;
}
