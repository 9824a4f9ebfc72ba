/**
 * Tern Runtime Tests: Observability
 * Step, host call, function return and error events
 */

import { describe, expect, it } from 'vitest';

import { createEventCollector, runFull } from '../helpers/runtime.js';
import { toNative } from '../../src/index.js';

describe('Tern Runtime: Observability', () => {
  it('emits step events for each top-level statement', () => {
    const { events, callbacks } = createEventCollector();
    runFull('let x = 1\nx + 1', { observability: callbacks });

    expect(events.stepStart).toEqual([
      { index: 0, total: 2 },
      { index: 1, total: 2 },
    ]);
    expect(events.stepEnd.map((e) => [e.index, toNative(e.value)])).toEqual([
      [0, null],
      [1, 2n],
    ]);
    for (const e of events.stepEnd) {
      expect(e.durationMs).toBeGreaterThanOrEqual(0);
    }
  });

  it('emits host call events before builtins run', () => {
    const { events, callbacks } = createEventCollector();
    runFull('print("a", 1)\nlen([])', {
      observability: callbacks,
      callbacks: { onLog: () => {} },
    });

    expect(
      events.hostCall.map((e) => [e.name, e.args.map(toNative)])
    ).toEqual([
      ['print', ['a', 1n]],
      ['len', [[]]],
    ]);
  });

  it('emits function return events for user functions', () => {
    const { events, callbacks } = createEventCollector();
    runFull('fn f(n) { return n * 2 }\nfn g() { }\nf(3)\ng()', {
      observability: callbacks,
    });

    expect(
      events.functionReturn.map((e) => [e.name, toNative(e.value)])
    ).toEqual([
      ['f', 6n],
      ['g', null],
    ]);
  });

  it('reports nested returns innermost first', () => {
    const { events, callbacks } = createEventCollector();
    runFull('fn inner() { return 1 }\nfn outer() { return inner() + 1 }\nouter()', {
      observability: callbacks,
    });
    expect(events.functionReturn.map((e) => e.name)).toEqual([
      'inner',
      'outer',
    ]);
  });

  it('emits an error event with the failing statement index', () => {
    const { events, callbacks } = createEventCollector();
    expect(() =>
      runFull('let x = 1\ny', { observability: callbacks })
    ).toThrow("Variable 'y' is not defined at 2:1");

    expect(events.error).toHaveLength(1);
    expect(events.error[0]?.index).toBe(1);
    expect(events.error[0]?.error.message).toBe(
      "Variable 'y' is not defined at 2:1"
    );
    expect(events.stepEnd).toHaveLength(1);
  });
});
