/**
 * Script Execution
 *
 * Public API for executing Tern scripts.
 * Provides both full execution and step-by-step execution.
 */

import type { ScriptNode } from '../../types.js';
import { flattenVariables } from './context.js';
import { getEvaluator } from './eval/evaluator.js';
import type { ControlFlow } from './signals.js';
import { COMPLETED, signalValue } from './signals.js';
import type {
  ExecutionResult,
  ExecutionStepper,
  RuntimeContext,
  StepResult,
} from './types.js';
import type { TernValue } from './values.js';
import { NULL } from './values.js';

/**
 * Execute a parsed Tern script.
 *
 * @param script The parsed AST (from parse())
 * @param context The runtime context (from createRuntimeContext())
 * @returns The final value, the closing signal and all user variables
 */
export function execute(
  script: ScriptNode,
  context: RuntimeContext
): ExecutionResult {
  const stepper = createStepper(script, context);
  while (!stepper.done) {
    stepper.step();
  }
  return stepper.getResult();
}

/**
 * Create a stepper for controlled step-by-step execution.
 * Allows the caller to control the execution loop and inspect state between steps.
 *
 * A top-level `return`, `break` or `continue` ends the script; the signal
 * is reported in the result.
 */
export function createStepper(
  script: ScriptNode,
  context: RuntimeContext
): ExecutionStepper {
  const statements = script.statements;
  const total = statements.length;
  const evaluator = getEvaluator(context);
  let index = 0;
  let lastValue: TernValue = NULL;
  let lastSignal: ControlFlow = COMPLETED;
  let isDone = total === 0;

  return {
    get done() {
      return isDone;
    },
    get index() {
      return index;
    },
    get total() {
      return total;
    },
    get context() {
      return context;
    },

    step(): StepResult {
      const stmt = statements[index];
      if (isDone || !stmt) {
        isDone = true;
        return { value: lastValue, done: true, index, total };
      }

      const startTime = performance.now();
      context.observability.onStepStart?.({ index, total });

      let signal: ControlFlow;
      try {
        signal = evaluator.executeStatement(stmt);
      } catch (error) {
        context.observability.onError?.({
          error: error instanceof Error ? error : new Error(String(error)),
          index,
        });
        throw error;
      }

      lastSignal = signal;
      lastValue = signalValue(signal);

      context.observability.onStepEnd?.({
        index,
        total,
        value: lastValue,
        durationMs: performance.now() - startTime,
      });

      index++;
      isDone = index >= total || signal.kind !== 'value';

      return { value: lastValue, done: isDone, index: index - 1, total };
    },

    getResult(): ExecutionResult {
      return {
        value: lastValue,
        signal: lastSignal,
        variables: Object.fromEntries(flattenVariables(context)),
      };
    },
  };
}
