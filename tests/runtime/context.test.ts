/**
 * Tern Runtime Tests: Context and Bindings
 */

import { describe, expect, it } from 'vitest';

import {
  assignVariable,
  createChildContext,
  createRuntimeContext,
  defineVariable,
  deleteVariable,
  flattenVariables,
  getVariable,
  hashmap,
  hasVariable,
  integer,
  string,
  toNative,
} from '../../src/index.js';

describe('Tern Runtime: Context', () => {
  describe('createRuntimeContext', () => {
    it('places builtins in a prelude above the user scope', () => {
      const ctx = createRuntimeContext();
      expect(ctx.isPrelude).toBe(false);
      expect(ctx.parent?.isPrelude).toBe(true);
      expect(ctx.variables.size).toBe(0);
      expect(getVariable(ctx, 'print')?.kind).toBe('builtin');
      expect(ctx.parent?.variables.get('len')?.mutable).toBe(false);
    });

    it('adds host functions to the prelude', () => {
      const ctx = createRuntimeContext({
        functions: { answer: () => integer(42) },
      });
      expect(ctx.parent?.variables.has('answer')).toBe(true);
      expect(ctx.variables.has('answer')).toBe(false);
    });

    it('binds initial variables mutably in the user scope', () => {
      const ctx = createRuntimeContext({ variables: { x: integer(1) } });
      expect(ctx.variables.get('x')?.mutable).toBe(true);
    });

    it('registers extra modules beside os and regex', () => {
      const ctx = createRuntimeContext({
        modules: { empty: () => hashmap([]) },
      });
      expect([...ctx.moduleState.builtinModules.keys()]).toEqual([
        'os',
        'regex',
        'empty',
      ]);
    });

    it('uses the given base path', () => {
      const ctx = createRuntimeContext({ basePath: '/scripts' });
      expect(ctx.moduleState.basePath).toBe('/scripts');
    });
  });

  describe('bindings', () => {
    it('defineVariable rejects a name already in the same scope', () => {
      const ctx = createRuntimeContext();
      expect(defineVariable(ctx, 'a', integer(1), true)).toBe(true);
      expect(defineVariable(ctx, 'a', integer(2), true)).toBe(false);

      const child = createChildContext(ctx);
      expect(defineVariable(child, 'a', integer(3), true)).toBe(true);
      expect(toNative(getVariable(child, 'a') ?? string(''))).toBe(3n);
      expect(toNative(getVariable(ctx, 'a') ?? string(''))).toBe(1n);
    });

    it('assignVariable updates the nearest binding', () => {
      const ctx = createRuntimeContext();
      defineVariable(ctx, 'a', integer(1), true);
      defineVariable(ctx, 'c', integer(1), false);
      const child = createChildContext(ctx);

      expect(assignVariable(child, 'a', integer(5))).toBe('assigned');
      expect(ctx.variables.get('a')?.value).toEqual(integer(5));
      expect(assignVariable(child, 'c', integer(5))).toBe('immutable');
      expect(assignVariable(child, 'zzz', integer(5))).toBe('undefined');
    });

    it('deleteVariable protects the prelude', () => {
      const ctx = createRuntimeContext();
      defineVariable(ctx, 'a', integer(1), true);
      expect(deleteVariable(ctx, 'a')).toBe('deleted');
      expect(hasVariable(ctx, 'a')).toBe(false);
      expect(deleteVariable(ctx, 'a')).toBe('undefined');
      expect(deleteVariable(ctx, 'print')).toBe('builtin');
      expect(hasVariable(ctx, 'print')).toBe(true);
    });

    it('flattenVariables lists inner bindings first and skips the prelude', () => {
      const ctx = createRuntimeContext();
      defineVariable(ctx, 'outer', integer(1), true);
      defineVariable(ctx, 'shared', string('outer'), true);
      const child = createChildContext(ctx);
      defineVariable(child, 'shared', string('inner'), true);

      const flat = flattenVariables(child);
      expect([...flat.keys()]).toEqual(['shared', 'outer']);
      expect(flat.get('shared')).toEqual(string('inner'));
    });
  });

  it('child scopes share callbacks and module state', () => {
    const ctx = createRuntimeContext();
    const child = createChildContext(ctx);
    expect(child.parent).toBe(ctx);
    expect(child.callbacks).toBe(ctx.callbacks);
    expect(child.moduleState).toBe(ctx.moduleState);
  });
});
