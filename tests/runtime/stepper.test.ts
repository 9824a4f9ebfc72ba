/**
 * Tern Runtime Tests: Stepper
 * Step-by-step execution of top-level statements
 */

import { describe, expect, it } from 'vitest';

import { runStepped } from '../helpers/runtime.js';
import {
  createRuntimeContext,
  createStepper,
  execute,
  getVariable,
  parse,
  toNative,
} from '../../src/index.js';

describe('Tern Runtime: Stepper', () => {
  it('executes one statement per step', () => {
    const steps = runStepped('1\n2\n3');
    expect(
      steps.map((s) => [toNative(s.value), s.done, s.index, s.total])
    ).toEqual([
      [1n, false, 0, 3],
      [2n, false, 1, 3],
      [3n, true, 2, 3],
    ]);
  });

  it('is done immediately for an empty script', () => {
    const stepper = createStepper(parse(''), createRuntimeContext());
    expect(stepper.done).toBe(true);
    expect(stepper.total).toBe(0);
    expect(toNative(stepper.getResult().value)).toBe(null);
  });

  it('stops at a top-level return', () => {
    const steps = runStepped('1\nreturn 2\n3');
    expect(steps).toHaveLength(2);
    const last = steps[1];
    expect(last?.done).toBe(true);
    expect(last && toNative(last.value)).toBe(2n);
  });

  it('exposes state between steps', () => {
    const ctx = createRuntimeContext();
    const stepper = createStepper(parse('let x = 1\nx = x + 1'), ctx);

    stepper.step();
    expect(stepper.index).toBe(1);
    expect(stepper.context).toBe(ctx);
    const first = getVariable(ctx, 'x');
    expect(first && toNative(first)).toBe(1n);

    stepper.step();
    const second = getVariable(ctx, 'x');
    expect(second && toNative(second)).toBe(2n);
    expect(stepper.done).toBe(true);
  });

  it('keeps returning the last value once done', () => {
    const stepper = createStepper(parse('5'), createRuntimeContext());
    stepper.step();
    const again = stepper.step();
    expect(again.done).toBe(true);
    expect(toNative(again.value)).toBe(5n);
  });

  it('execute runs scripts against a shared context', () => {
    const ctx = createRuntimeContext();
    execute(parse('let total = 10'), ctx);
    const result = execute(parse('total = total * 2\ntotal'), ctx);
    expect(toNative(result.value)).toBe(20n);
    expect(result.signal.kind).toBe('value');
    expect(Object.keys(result.variables)).toEqual(['total']);
  });
});
