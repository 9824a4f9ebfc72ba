/**
 * Built-in Functions
 *
 * The prelude: functions every script can call without an import.
 * Host applications add their own via RuntimeOptions.functions.
 *
 * @internal - Not part of public API
 */

import { ExitError, RuntimeError, TERN_ERROR_CODES } from '../../types.js';
import type { BuiltinFn } from '../core/callable.js';
import {
  argAt,
  expectArgCount,
  integerArg,
  stringArg,
} from '../core/callable.js';
import type { TernValue } from '../core/values.js';
import {
  bool,
  float,
  formatValue,
  inferType,
  integer,
  NULL,
  string,
} from '../core/values.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const FLOAT_SPECIAL = new Map<string, number>([
  ['inf', Infinity],
  ['+inf', Infinity],
  ['-inf', -Infinity],
  ['infinity', Infinity],
  ['+infinity', Infinity],
  ['-infinity', -Infinity],
  ['nan', NaN],
  ['+nan', NaN],
  ['-nan', NaN],
]);

function unsupportedArgument(name: string, value: TernValue): RuntimeError {
  return new RuntimeError(
    TERN_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `${name}() does not support ${inferType(value)}`,
    undefined,
    { functionName: name, actualType: inferType(value) }
  );
}

function conversionError(target: string, text: string): RuntimeError {
  return new RuntimeError(
    TERN_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `Invalid string for ${target} conversion: ${text}`,
    undefined,
    { target, input: text }
  );
}

function parseIntegerText(text: string): TernValue {
  if (!INTEGER_PATTERN.test(text)) {
    throw conversionError('int', text);
  }
  try {
    return integer(BigInt(text));
  } catch {
    throw conversionError('int', text);
  }
}

function parseFloatText(text: string): TernValue {
  if (FLOAT_PATTERN.test(text)) {
    return float(Number(text));
  }
  const special = FLOAT_SPECIAL.get(text.toLowerCase());
  if (special === undefined) {
    throw conversionError('float', text);
  }
  return float(special);
}

// ============================================================
// BUILT-IN FUNCTIONS
// ============================================================

export const BUILTIN_FUNCTIONS: Record<string, BuiltinFn> = {
  /** Write display forms, space separated, as one line */
  print: (args, ctx) => {
    ctx.callbacks.onLog(args.map(formatValue).join(' '));
    return NULL;
  },

  /** Length of a string (in code points) or a collection */
  len: (args) => {
    expectArgCount('len', args, 1);
    const value = argAt(args, 0);
    switch (value.kind) {
      case 'string':
        return integer(Array.from(value.value).length);
      case 'array':
      case 'tuple':
        return integer(value.items.length);
      case 'hashmap':
        return integer(value.entries.length);
      default:
        throw unsupportedArgument('len', value);
    }
  },

  str: (args) => {
    expectArgCount('str', args, 1);
    return string(formatValue(argAt(args, 0)));
  },

  /** Parse a string, truncate a float, or convert a bool to 0/1 */
  int: (args) => {
    expectArgCount('int', args, 1);
    const value = argAt(args, 0);
    switch (value.kind) {
      case 'string':
        return parseIntegerText(value.value);
      case 'integer':
        return value;
      case 'float':
        if (!Number.isFinite(value.value)) {
          throw new RuntimeError(
            TERN_ERROR_CODES.RUNTIME_TYPE_ERROR,
            `Cannot convert ${formatValue(value)} to Integer`
          );
        }
        return integer(value.value);
      case 'bool':
        return integer(value.value ? 1n : 0n);
      default:
        throw unsupportedArgument('int', value);
    }
  },

  float: (args) => {
    expectArgCount('float', args, 1);
    const value = argAt(args, 0);
    switch (value.kind) {
      case 'string':
        return parseFloatText(value.value);
      case 'integer':
        return float(Number(value.value));
      case 'float':
        return value;
      default:
        throw unsupportedArgument('float', value);
    }
  },

  /** Truthiness: non-empty, non-zero; None is False */
  bool: (args) => {
    expectArgCount('bool', args, 1);
    const value = argAt(args, 0);
    switch (value.kind) {
      case 'string':
        return bool(value.value.length > 0);
      case 'integer':
        return bool(value.value !== 0n);
      case 'float':
        return bool(value.value !== 0);
      case 'bool':
        return value;
      case 'array':
      case 'tuple':
        return bool(value.items.length > 0);
      case 'hashmap':
        return bool(value.entries.length > 0);
      case 'null':
        return bool(false);
      default:
        throw unsupportedArgument('bool', value);
    }
  },

  type: (args) => {
    expectArgCount('type', args, 1);
    return string(inferType(argAt(args, 0)));
  },

  /** Read one line; end of input reads as an empty string */
  input: (args, ctx) => {
    expectArgCount('input', args, 0, 1);
    const prompt = args.length === 1 ? stringArg('input', args, 0) : '> ';
    const line = ctx.callbacks.onInput(prompt);
    return string((line ?? '').trim());
  },

  exit: (args) => {
    expectArgCount('exit', args, 0, 1);
    const code = args.length === 1 ? integerArg('exit', args, 0) : 0n;
    throw new ExitError(Number(code));
  },
};
