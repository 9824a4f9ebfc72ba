/**
 * Operator Semantics
 *
 * Binary and unary operator evaluation over already evaluated operands.
 * Errors carry the location passed in by the evaluator.
 */

import type { BinaryOp, SourceLocation, UnaryOp } from '../../types.js';
import { RuntimeError, TERN_ERROR_CODES } from '../../types.js';
import type { TernValue } from './values.js';
import {
  bool,
  FALSE,
  float,
  formatValue,
  inferType,
  integer,
  string,
  TRUE,
} from './values.js';

function unsupported(
  op: string,
  left: TernValue,
  right: TernValue,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError(
    TERN_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `Type error: unsupported operand types for ${op}: ${inferType(left)} and ${inferType(right)}`,
    location,
    { operator: op, left: inferType(left), right: inferType(right) }
  );
}

function divisionByZero(location?: SourceLocation): RuntimeError {
  return new RuntimeError(
    TERN_ERROR_CODES.RUNTIME_DIVISION_BY_ZERO,
    'Division by zero',
    location
  );
}

function compare(
  op: BinaryOp,
  a: bigint | number,
  b: bigint | number
): boolean | undefined {
  switch (op) {
    case '==':
      return a === b;
    case '!=':
      return a !== b;
    case '<':
      return a < b;
    case '<=':
      return a <= b;
    case '>':
      return a > b;
    case '>=':
      return a >= b;
    default:
      return undefined;
  }
}

function integerOp(
  op: BinaryOp,
  a: bigint,
  b: bigint,
  location?: SourceLocation
): TernValue | undefined {
  switch (op) {
    case '+':
      return integer(a + b, location);
    case '-':
      return integer(a - b, location);
    case '*':
      return integer(a * b, location);
    case '/':
      if (b === 0n) throw divisionByZero(location);
      // bigint division truncates toward zero
      return integer(a / b, location);
  }
  const result = compare(op, a, b);
  return result === undefined ? undefined : bool(result);
}

function floatOp(
  op: BinaryOp,
  a: number,
  b: number,
  location?: SourceLocation
): TernValue | undefined {
  switch (op) {
    case '+':
      return float(a + b);
    case '-':
      return float(a - b);
    case '*':
      return float(a * b);
    case '/':
      if (b === 0) throw divisionByZero(location);
      return float(a / b);
  }
  const result = compare(op, a, b);
  return result === undefined ? undefined : bool(result);
}

/** Operand value as a float (integers are promoted) */
function numeric(value: TernValue): number | undefined {
  if (value.kind === 'float') return value.value;
  if (value.kind === 'integer') return Number(value.value);
  return undefined;
}

function stringBoolOp(
  op: BinaryOp,
  left: TernValue,
  right: TernValue
): TernValue | undefined {
  switch (op) {
    case '+':
      return string(formatValue(left) + formatValue(right));
    case '==':
      return FALSE;
    case '!=':
      return TRUE;
    default:
      return undefined;
  }
}

/**
 * Apply a binary operator.
 * @throws RuntimeError for unsupported operand kinds, division by zero
 * and integer overflow
 */
export function applyBinary(
  op: BinaryOp,
  left: TernValue,
  right: TernValue,
  location?: SourceLocation
): TernValue {
  let result: TernValue | undefined;

  if (left.kind === 'integer' && right.kind === 'integer') {
    result = integerOp(op, left.value, right.value, location);
  } else if (
    (left.kind === 'float' || right.kind === 'float') &&
    (left.kind === 'integer' || left.kind === 'float') &&
    (right.kind === 'integer' || right.kind === 'float')
  ) {
    const a = numeric(left);
    const b = numeric(right);
    if (a !== undefined && b !== undefined) {
      result = floatOp(op, a, b, location);
    }
  } else if (left.kind === 'string' && right.kind === 'string') {
    if (op === '+') result = string(left.value + right.value);
    else if (op === '==') result = bool(left.value === right.value);
    else if (op === '!=') result = bool(left.value !== right.value);
  } else if (left.kind === 'bool' && right.kind === 'bool') {
    if (op === 'and') result = bool(left.value && right.value);
    else if (op === 'or') result = bool(left.value || right.value);
    else if (op === '==') result = bool(left.value === right.value);
    else if (op === '!=') result = bool(left.value !== right.value);
  } else if (
    (left.kind === 'string' && right.kind === 'bool') ||
    (left.kind === 'bool' && right.kind === 'string')
  ) {
    result = stringBoolOp(op, left, right);
  }

  if (result === undefined) {
    throw unsupported(op, left, right, location);
  }
  return result;
}

/**
 * Apply a unary operator: `-` on Integer, `not` on Bool.
 * @throws RuntimeError(RUNTIME_TYPE_ERROR)
 */
export function applyUnary(
  op: UnaryOp,
  operand: TernValue,
  location?: SourceLocation
): TernValue {
  if (op === '-' && operand.kind === 'integer') {
    return integer(-operand.value, location);
  }
  if (op === 'not' && operand.kind === 'bool') {
    return bool(!operand.value);
  }
  throw new RuntimeError(
    TERN_ERROR_CODES.RUNTIME_TYPE_ERROR,
    `Type error: unsupported operand type for ${op}: ${inferType(operand)}`,
    location,
    { operator: op, operand: inferType(operand) }
  );
}
