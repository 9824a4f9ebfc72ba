/**
 * Tern Value Types and Utilities
 *
 * Core value types that flow through Tern programs.
 * Public API for host applications.
 */

import type { SourceLocation } from '../../types.js';
import { RuntimeError, TERN_ERROR_CODES } from '../../types.js';
import type { TernBuiltin, TernFunction } from './callable.js';

export interface IntegerValue {
  readonly kind: 'integer';
  /** Always within the signed 64-bit range */
  readonly value: bigint;
}

export interface FloatValue {
  readonly kind: 'float';
  readonly value: number;
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface ArrayValue {
  readonly kind: 'array';
  readonly items: TernValue[];
}

export interface TupleValue {
  readonly kind: 'tuple';
  readonly items: TernValue[];
}

/**
 * Ordered key/value pairs. Lookup is a linear scan; insertion order is
 * preserved and duplicate keys are kept as written.
 */
export interface HashMapValue {
  readonly kind: 'hashmap';
  readonly entries: [TernValue, TernValue][];
}

export interface NullValue {
  readonly kind: 'null';
}

/** Any value that can flow through Tern */
export type TernValue =
  | IntegerValue
  | FloatValue
  | BoolValue
  | StringValue
  | ArrayValue
  | TupleValue
  | HashMapValue
  | TernFunction
  | TernBuiltin
  | NullValue;

export type TernTypeName =
  | 'Integer'
  | 'Float'
  | 'Boolean'
  | 'String'
  | 'Array'
  | 'Tuple'
  | 'HashMap'
  | 'Function'
  | 'BuiltinFunction'
  | 'None';

// ============================================================
// CONSTRUCTORS
// ============================================================

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export const NULL: NullValue = { kind: 'null' };
export const TRUE: BoolValue = { kind: 'bool', value: true };
export const FALSE: BoolValue = { kind: 'bool', value: false };

/**
 * Create an integer, rejecting results outside the 64-bit range.
 * @throws RuntimeError(RUNTIME_INTEGER_OVERFLOW)
 */
export function integer(
  value: bigint | number,
  location?: SourceLocation
): IntegerValue {
  const big = typeof value === 'bigint' ? value : BigInt(Math.trunc(value));
  if (big < INT64_MIN || big > INT64_MAX) {
    throw new RuntimeError(
      TERN_ERROR_CODES.RUNTIME_INTEGER_OVERFLOW,
      `Integer overflow: ${big} is outside the 64-bit range`,
      location
    );
  }
  return { kind: 'integer', value: big };
}

export function float(value: number): FloatValue {
  return { kind: 'float', value };
}

export function bool(value: boolean): BoolValue {
  return value ? TRUE : FALSE;
}

export function string(value: string): StringValue {
  return { kind: 'string', value };
}

export function array(items: TernValue[]): ArrayValue {
  return { kind: 'array', items };
}

export function tuple(items: TernValue[]): TupleValue {
  return { kind: 'tuple', items };
}

export function hashmap(entries: [TernValue, TernValue][]): HashMapValue {
  return { kind: 'hashmap', entries };
}

/** Build a hashmap with string keys from a record */
export function hashmapFromRecord(
  record: Record<string, TernValue>
): HashMapValue {
  return hashmap(
    Object.entries(record).map(
      ([key, value]): [TernValue, TernValue] => [string(key), value]
    )
  );
}

// ============================================================
// INSPECTION
// ============================================================

/** Runtime type name, as reported by type() and in error messages */
export function inferType(value: TernValue): TernTypeName {
  switch (value.kind) {
    case 'integer':
      return 'Integer';
    case 'float':
      return 'Float';
    case 'bool':
      return 'Boolean';
    case 'string':
      return 'String';
    case 'array':
      return 'Array';
    case 'tuple':
      return 'Tuple';
    case 'hashmap':
      return 'HashMap';
    case 'function':
      return 'Function';
    case 'builtin':
      return 'BuiltinFunction';
    case 'null':
      return 'None';
  }
}

/** Whole floats print without a fractional part, like integers */
function formatFloat(value: number): string {
  if (Number.isInteger(value) && Math.abs(value) < 1e21) {
    return value.toFixed(0);
  }
  return String(value);
}

/** Display form used by print() and str() */
export function formatValue(value: TernValue): string {
  switch (value.kind) {
    case 'integer':
      return value.value.toString();
    case 'float':
      return formatFloat(value.value);
    case 'bool':
      return value.value ? 'True' : 'False';
    case 'string':
      return value.value;
    case 'array':
      return `[${value.items.map(formatValue).join(', ')}]`;
    case 'tuple': {
      const [only] = value.items;
      // Same form the parser reads back as a one-element tuple
      if (value.items.length === 1 && only !== undefined) {
        return `(${formatValue(only)},)`;
      }
      return `(${value.items.map(formatValue).join(', ')})`;
    }
    case 'hashmap':
      return `{${value.entries
        .map(([k, v]) => `${formatValue(k)}: ${formatValue(v)}`)
        .join(', ')}}`;
    case 'function':
      return `<function ${value.name}>`;
    case 'builtin':
      return '<builtin function>';
    case 'null':
      return 'None';
  }
}

/**
 * Structural equality. Functions compare by identity.
 * Integers and floats never compare equal here (hashmap keys keep their kind).
 */
export function valuesEqual(a: TernValue, b: TernValue): boolean {
  switch (a.kind) {
    case 'integer':
      return b.kind === 'integer' && b.value === a.value;
    case 'float':
      return b.kind === 'float' && b.value === a.value;
    case 'bool':
      return b.kind === 'bool' && b.value === a.value;
    case 'string':
      return b.kind === 'string' && b.value === a.value;
    case 'array':
      return b.kind === 'array' && itemsEqual(a.items, b.items);
    case 'tuple':
      return b.kind === 'tuple' && itemsEqual(a.items, b.items);
    case 'hashmap':
      return (
        b.kind === 'hashmap' &&
        b.entries.length === a.entries.length &&
        a.entries.every(([key, value], i) => {
          const other = b.entries[i];
          return (
            other !== undefined &&
            valuesEqual(key, other[0]) &&
            valuesEqual(value, other[1])
          );
        })
      );
    case 'function':
    case 'builtin':
      return a === b;
    case 'null':
      return b.kind === 'null';
  }
}

function itemsEqual(a: TernValue[], b: TernValue[]): boolean {
  return (
    a.length === b.length &&
    a.every((item, i) => {
      const other = b[i];
      return other !== undefined && valuesEqual(item, other);
    })
  );
}

/** First entry whose key equals the given key (linear scan) */
export function getHashMapEntry(
  map: HashMapValue,
  key: TernValue
): TernValue | undefined {
  for (const [k, v] of map.entries) {
    if (valuesEqual(k, key)) return v;
  }
  return undefined;
}

// ============================================================
// HOST CONVERSION
// ============================================================

/** Plain JavaScript form of a value */
export type NativeValue =
  | bigint
  | number
  | boolean
  | string
  | null
  | NativeValue[]
  | Map<NativeValue, NativeValue>
  | { readonly function: string };

/**
 * Convert a value to plain JavaScript for host code and tests.
 * Integers stay bigint. Tuples become arrays, hashmaps become Maps, and
 * callables become `{ function: name }` descriptors.
 */
export function toNative(value: TernValue): NativeValue {
  switch (value.kind) {
    case 'integer':
    case 'float':
    case 'bool':
    case 'string':
      return value.value;
    case 'array':
    case 'tuple':
      return value.items.map(toNative);
    case 'hashmap':
      return new Map(
        value.entries.map(([k, v]) => [toNative(k), toNative(v)] as const)
      );
    case 'function':
    case 'builtin':
      return { function: value.name };
    case 'null':
      return null;
  }
}
