/**
 * Tern Runtime Tests: Variables
 * Declarations, assignment, constants, deletion and scoping
 */

import { describe, expect, it } from 'vitest';

import { runFull, runNative, runOutput } from '../helpers/runtime.js';
import {
  integer,
  RuntimeError,
  TERN_ERROR_CODES,
  toNative,
} from '../../src/index.js';

function runtimeError(source: string): RuntimeError {
  try {
    runNative(source);
  } catch (err) {
    if (err instanceof RuntimeError) return err;
    throw err;
  }
  throw new Error('Expected a RuntimeError');
}

describe('Tern Runtime: Variables', () => {
  describe('let and const', () => {
    it('let bindings can be reassigned', () => {
      expect(runNative('let x = 5\nx = 10\nx')).toBe(10n);
    });

    it('const bindings cannot be reassigned', () => {
      const err = runtimeError('const x = 5\nx = 10');
      expect(err.code).toBe(TERN_ERROR_CODES.RUNTIME_IMMUTABLE_ASSIGNMENT);
      expect(err.message).toBe("Cannot assign to constant 'x' at 2:1");
    });

    it('rejects redeclaration in the same scope', () => {
      const err = runtimeError('let x = 1\nlet x = 2');
      expect(err.code).toBe(TERN_ERROR_CODES.RUNTIME_REDECLARED_VARIABLE);
      expect(err.message).toBe(
        "Variable 'x' is already declared in this scope at 2:1"
      );
    });

    it('assignment yields the assigned value', () => {
      expect(runNative('let a = 0\nlet b = 0\na = b = 3\na + b')).toBe(6n);
    });

    it('a declaration yields None', () => {
      expect(runNative('let x = 1')).toBe(null);
    });
  });

  describe('undefined names', () => {
    it('lookup names the missing identifier', () => {
      const err = runtimeError('y');
      expect(err.code).toBe(TERN_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE);
      expect(err.message).toBe("Variable 'y' is not defined at 1:1");
      expect(err.context).toEqual({ variableName: 'y' });
    });

    it('assignment to an undeclared name fails', () => {
      expect(runtimeError('y = 1').message).toBe(
        "Variable 'y' is not defined at 1:1"
      );
    });
  });

  describe('del', () => {
    it('removes a binding', () => {
      expect(runtimeError('let x = 1\ndel x\nx').message).toBe(
        "Variable 'x' is not defined at 3:1"
      );
    });

    it('allows redeclaring after deletion', () => {
      expect(runNative('const x = 1\ndel x\nlet x = 2\nx')).toBe(2n);
    });

    it('names the missing identifier', () => {
      const err = runtimeError('del y');
      expect(err.code).toBe(TERN_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE);
      expect(err.message).toBe("Variable 'y' is not defined at 1:1");
    });

    it('cannot delete builtins', () => {
      expect(runtimeError('del print').message).toBe(
        "Cannot delete builtin 'print' at 1:1"
      );
    });

    it('removes the nearest binding only', () => {
      const output = runOutput(
        'let x = "outer"\nfn f() { let x = "inner"\ndel x\nprint(x) }\nf()'
      );
      expect(output).toEqual(['outer']);
    });
  });

  describe('scoping', () => {
    it('a local let shadows without touching the outer binding', () => {
      const output = runOutput(
        'let x = 5\nfn f() { let x = 10\nprint(x) }\nf()\nprint(x)'
      );
      expect(output).toEqual(['10', '5']);
    });

    it('if branches run in the enclosing scope', () => {
      expect(runNative('if True { let y = 2 }\ny')).toBe(2n);
      expect(runNative('let x = 1\nif x == 1 { x = 2 }\nx')).toBe(2n);
    });

    it('loop bodies get a fresh scope per iteration', () => {
      expect(
        runNative('let i = 0\nwhile i < 3 { let t = i\ni = i + 1 }\ni')
      ).toBe(3n);
      expect(
        runtimeError('let i = 0\nwhile i < 1 { let t = 5\ni = i + 1 }\nt')
          .message
      ).toBe("Variable 't' is not defined at 4:1");
    });

    it('user bindings may shadow builtins but not assign them', () => {
      expect(runNative('let print = 5\nprint')).toBe(5n);
      expect(runtimeError('print = 5').message).toBe(
        "Cannot assign to constant 'print' at 1:1"
      );
    });
  });

  describe('host variables and results', () => {
    it('binds initial variables mutably', () => {
      expect(
        runNative('x = x + 1\nx', { variables: { x: integer(41) } })
      ).toBe(42n);
    });

    it('reports user variables without builtins', () => {
      const result = runFull('let a = 1\nconst b = "s"\nfn f() { }');
      expect(Object.keys(result.variables)).toEqual(['a', 'b', 'f']);
      expect(toNative(result.variables['b'] ?? integer(0))).toBe('s');
    });
  });
});
