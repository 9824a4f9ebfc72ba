/**
 * Control Flow Signals
 *
 * Returned (never thrown) by every statement-executing method.
 * A statement list stops at the first signal that is not `value`
 * and hands it to the enclosing construct.
 */

import type { TernValue } from './values.js';
import { NULL } from './values.js';

/** Normal completion carrying the statement's value */
export interface ValueSignal {
  readonly kind: 'value';
  readonly value: TernValue;
}

/** `return`: unwinds to the nearest function call */
export interface ReturnSignal {
  readonly kind: 'return';
  readonly value: TernValue;
}

/** `break`: ends the nearest loop */
export interface BreakSignal {
  readonly kind: 'break';
}

/** `continue`: starts the next iteration of the nearest loop */
export interface ContinueSignal {
  readonly kind: 'continue';
}

export type ControlFlow =
  | ValueSignal
  | ReturnSignal
  | BreakSignal
  | ContinueSignal;

export const BREAK: BreakSignal = { kind: 'break' };
export const CONTINUE: ContinueSignal = { kind: 'continue' };
export const COMPLETED: ValueSignal = { kind: 'value', value: NULL };

export function completed(value: TernValue): ValueSignal {
  return { kind: 'value', value };
}

export function returned(value: TernValue): ReturnSignal {
  return { kind: 'return', value };
}

/** Value carried by a signal (None for break/continue) */
export function signalValue(signal: ControlFlow): TernValue {
  return signal.kind === 'value' || signal.kind === 'return'
    ? signal.value
    : NULL;
}
