/**
 * Callable Types
 *
 * Representation of callable values in Tern:
 * - TernFunction: functions declared with `fn` in source code
 * - TernBuiltin: host-provided functions (prelude, modules, host additions)
 *
 * Public API for host applications.
 */

import type { SourceLocation, StatementNode } from '../../types.js';
import { RuntimeError, TERN_ERROR_CODES } from '../../types.js';
import type { RuntimeContext } from './types.js';
import type { HashMapValue, TernValue } from './values.js';
import { hashmapFromRecord, inferType } from './values.js';

/**
 * Builtin function signature.
 * Arity and argument kinds are checked by the builtin itself; failures
 * are thrown as RuntimeError.
 */
export type BuiltinFn = (
  args: TernValue[],
  ctx: RuntimeContext,
  location?: SourceLocation
) => TernValue;

/** Function declared in source; closes over a live reference to its scope */
export interface TernFunction {
  readonly kind: 'function';
  readonly name: string;
  readonly params: string[];
  readonly body: StatementNode[];
  readonly closure: RuntimeContext;
}

/** Host-provided function */
export interface TernBuiltin {
  readonly kind: 'builtin';
  readonly name: string;
  readonly fn: BuiltinFn;
}

export function createBuiltin(name: string, fn: BuiltinFn): TernBuiltin {
  return { kind: 'builtin', name, fn };
}

/** Module record binding each function under its own name */
export function createModuleRecord(
  functions: Record<string, BuiltinFn>
): HashMapValue {
  const record: Record<string, TernValue> = {};
  for (const [name, fn] of Object.entries(functions)) {
    record[name] = createBuiltin(name, fn);
  }
  return hashmapFromRecord(record);
}

// ============================================================
// ARGUMENT VALIDATION FOR BUILTINS
// ============================================================

/** Shared arity error text for user functions and builtins */
export function arityMessage(
  name: string,
  expected: number | string,
  actual: number
): string {
  return `Function '${name}' expects ${expected} arguments, but got ${actual}`;
}

/**
 * Check argument count.
 * @throws RuntimeError(RUNTIME_ARITY_MISMATCH)
 */
export function expectArgCount(
  name: string,
  args: TernValue[],
  min: number,
  max: number = min
): void {
  if (args.length >= min && args.length <= max) return;
  const expected = min === max ? min : `${min} to ${max}`;
  throw new RuntimeError(
    TERN_ERROR_CODES.RUNTIME_ARITY_MISMATCH,
    arityMessage(name, expected, args.length),
    undefined,
    { functionName: name, expected, actual: args.length }
  );
}

/** Argument at index (callers check the count first) */
export function argAt(args: TernValue[], index: number): TernValue {
  const value = args[index];
  if (value === undefined) {
    throw new RangeError(`Missing argument ${index}`);
  }
  return value;
}

function argTypeError(
  name: string,
  index: number,
  expected: string,
  actual: TernValue
): RuntimeError {
  return new RuntimeError(
    TERN_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `${name}() argument ${index + 1} must be ${expected}, got ${inferType(actual)}`,
    undefined,
    { functionName: name, expectedType: expected, actualType: inferType(actual) }
  );
}

/**
 * String argument at index.
 * @throws RuntimeError(RUNTIME_TYPE_ERROR)
 */
export function stringArg(
  name: string,
  args: TernValue[],
  index: number
): string {
  const value = argAt(args, index);
  if (value.kind !== 'string') {
    throw argTypeError(name, index, 'String', value);
  }
  return value.value;
}

/**
 * Integer argument at index.
 * @throws RuntimeError(RUNTIME_TYPE_ERROR)
 */
export function integerArg(
  name: string,
  args: TernValue[],
  index: number
): bigint {
  const value = argAt(args, index);
  if (value.kind !== 'integer') {
    throw argTypeError(name, index, 'Integer', value);
  }
  return value.value;
}
