/**
 * Tern Runtime Tests: Operators
 * Arithmetic, comparison, logical and mixed-kind operator semantics
 */

import { describe, expect, it } from 'vitest';

import { runNative, runOutput } from '../helpers/runtime.js';
import { RuntimeError, TERN_ERROR_CODES } from '../../src/index.js';

function runtimeError(source: string): RuntimeError {
  try {
    runNative(source);
  } catch (err) {
    if (err instanceof RuntimeError) return err;
    throw err;
  }
  throw new Error('Expected a RuntimeError');
}

describe('Tern Runtime: Operators', () => {
  describe('integers', () => {
    it('respects precedence and grouping', () => {
      expect(runNative('1 + 2 * 3')).toBe(7n);
      expect(runNative('(1 + 2) * 3')).toBe(9n);
      expect(runNative('10 - 2 - 3')).toBe(5n);
      expect(runNative('2 * 3 - 4 * 5')).toBe(-14n);
    });

    it('truncates division toward zero', () => {
      expect(runNative('7 / 2')).toBe(3n);
      expect(runNative('-7 / 2')).toBe(-3n);
    });

    it('compares', () => {
      expect(runNative('3 >= 3')).toBe(true);
      expect(runNative('3 > 3')).toBe(false);
      expect(runNative('2 != 3')).toBe(true);
      expect(runNative('2 <= 1')).toBe(false);
    });

    it('stays within 64 bits', () => {
      expect(runNative('-9223372036854775807 - 1')).toBe(
        -9223372036854775808n
      );
      const err = runtimeError('9223372036854775807 + 1');
      expect(err.code).toBe(TERN_ERROR_CODES.RUNTIME_INTEGER_OVERFLOW);
      expect(err.message).toBe(
        'Integer overflow: 9223372036854775808 is outside the 64-bit range at 1:1'
      );
    });
  });

  describe('floats', () => {
    it('promotes integers in mixed arithmetic', () => {
      expect(runNative('1.5 + 1')).toBe(2.5);
      expect(runNative('1 / 2.0')).toBe(0.5);
      expect(runNative('3 * 1.5')).toBe(4.5);
      expect(runNative('1 < 2.5')).toBe(true);
      expect(runNative('2.0 == 2')).toBe(true);
    });
  });

  describe('division by zero', () => {
    it.each(['1 / 0', '1.0 / 0', '1 / 0.0', '1.0 / 0.0'])(
      '%s is an error',
      (source) => {
        const err = runtimeError(source);
        expect(err.code).toBe(TERN_ERROR_CODES.RUNTIME_DIVISION_BY_ZERO);
        expect(err.message).toBe('Division by zero at 1:1');
      }
    );
  });

  describe('strings and booleans', () => {
    it('concatenates and compares strings', () => {
      expect(runNative('"ab" + "cd"')).toBe('abcd');
      expect(runNative('"a" == "a"')).toBe(true);
      expect(runNative('"a" != "a"')).toBe(false);
    });

    it('combines booleans', () => {
      expect(runNative('True and False')).toBe(false);
      expect(runNative('True or False')).toBe(true);
      expect(runNative('True == True')).toBe(true);
      expect(runNative('not True')).toBe(false);
    });

    it('mixes strings with booleans', () => {
      expect(runNative('"x" + True')).toBe('xTrue');
      expect(runNative('False + "x"')).toBe('Falsex');
      expect(runNative('"True" == True')).toBe(false);
      expect(runNative('"a" != False')).toBe(true);
    });

    it('evaluates both sides of and / or', () => {
      const output = runOutput(
        'fn f() { print("called")\nreturn True }\nFalse and f()\nTrue or f()'
      );
      expect(output).toEqual(['called', 'called']);
    });
  });

  describe('type errors', () => {
    it('rejects unsupported operand pairs', () => {
      const err = runtimeError('1 + "a"');
      expect(err.code).toBe(TERN_ERROR_CODES.RUNTIME_TYPE_ERROR);
      expect(err.message).toBe(
        'Type error: unsupported operand types for +: Integer and String at 1:1'
      );
      expect(runtimeError('"a" - "b"').message).toBe(
        'Type error: unsupported operand types for -: String and String at 1:1'
      );
      expect(runtimeError('1 and True').message).toBe(
        'Type error: unsupported operand types for and: Integer and Boolean at 1:1'
      );
      expect(runtimeError('True < False').message).toBe(
        'Type error: unsupported operand types for <: Boolean and Boolean at 1:1'
      );
    });

    it('restricts unary operators', () => {
      expect(runtimeError('-1.5').message).toBe(
        'Type error: unsupported operand type for -: Float at 1:1'
      );
      expect(runtimeError('not 1').message).toBe(
        'Type error: unsupported operand type for not: Integer at 1:1'
      );
    });

    it('locates the error at the operator expression', () => {
      expect(runtimeError('let x = 1\n  x * "s"').message).toBe(
        'Type error: unsupported operand types for *: Integer and String at 2:3'
      );
    });
  });
});
