/**
 * ControlFlowMixin: Conditionals and Loops
 *
 * Handles control flow constructs:
 * - if / elif / else (branches run in the current scope)
 * - while and loop (each iteration runs in a fresh child scope)
 * - for over strings, arrays, tuples and hashmaps
 *
 * Signals from a loop body: `break` ends the loop, `continue` moves to the
 * next iteration and `return` propagates to the caller.
 *
 * Error Handling:
 * - Non-boolean conditions throw RuntimeError(RUNTIME_TYPE_ERROR)
 * - Non-iterable values or a wrong name count in `for` throw
 *   RuntimeError(RUNTIME_TYPE_ERROR)
 *
 * @internal
 */

import type {
  ForNode,
  IfNode,
  LoopNode,
  StatementNode,
  WhileNode,
} from '../../../../types.js';
import { RuntimeError, TERN_ERROR_CODES } from '../../../../types.js';
import { createChildContext } from '../../context.js';
import type { ControlFlow } from '../../signals.js';
import { COMPLETED } from '../../signals.js';
import type { TernValue } from '../../values.js';
import { inferType, NULL, string } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

/** Outcome of one loop iteration */
type IterationOutcome =
  | { readonly stop: false }
  | { readonly stop: true; readonly signal: ControlFlow };

const NEXT: IterationOutcome = { stop: false };

export function ControlFlowMixin(
  Base: EvaluatorConstructor
): EvaluatorConstructor {
  return class ControlFlowEvaluator extends Base {
    protected override executeIf(node: IfNode): ControlFlow {
      const condition = this.evaluateExpression(node.condition);
      if (this.expectCondition(condition, 'If', node.condition)) {
        return this.executeBlock(node.body);
      }

      for (const branch of node.elifs) {
        const value = this.evaluateExpression(branch.condition);
        if (this.expectCondition(value, 'Elif', branch.condition)) {
          return this.executeBlock(branch.body);
        }
      }

      if (node.elseBody) {
        return this.executeBlock(node.elseBody);
      }
      return COMPLETED;
    }

    protected override executeWhile(node: WhileNode): ControlFlow {
      for (;;) {
        const condition = this.evaluateExpression(node.condition);
        if (!this.expectCondition(condition, 'While', node.condition)) {
          return COMPLETED;
        }
        const outcome = this.runIteration(node.body);
        if (outcome.stop) return outcome.signal;
      }
    }

    protected override executeLoop(node: LoopNode): ControlFlow {
      for (;;) {
        const outcome = this.runIteration(node.body);
        if (outcome.stop) return outcome.signal;
      }
    }

    protected override executeFor(node: ForNode): ControlFlow {
      const iterable = this.evaluateExpression(node.iterable);
      const rows = this.iterationRows(node, iterable);

      // Loop names live in the enclosing scope and keep the last value
      for (const name of node.names) {
        this.bindLoopName(name, NULL, node);
      }

      for (const row of rows) {
        node.names.forEach((name, i) => {
          this.bindLoopName(name, row[i] ?? NULL, node);
        });
        const outcome = this.runIteration(node.body);
        if (outcome.stop) return outcome.signal;
      }
      return COMPLETED;
    }

    /** Run one iteration body in a fresh child scope */
    private runIteration(body: StatementNode[]): IterationOutcome {
      const signal = this.withContext(createChildContext(this.ctx), () =>
        this.executeBlock(body)
      );

      switch (signal.kind) {
        case 'break':
          return { stop: true, signal: COMPLETED };
        case 'return':
          return { stop: true, signal };
        case 'continue':
        case 'value':
          return NEXT;
      }
    }

    /**
     * Values bound per iteration: one per name.
     * @throws RuntimeError(RUNTIME_TYPE_ERROR)
     */
    private iterationRows(node: ForNode, iterable: TernValue): TernValue[][] {
      const nameCount = node.names.length;

      switch (iterable.kind) {
        case 'string':
          this.expectNameCount(node, nameCount, 1, 'String');
          return Array.from(iterable.value, (ch) => [string(ch)]);
        case 'array':
        case 'tuple':
          this.expectNameCount(node, nameCount, 1, inferType(iterable));
          return iterable.items.map((item) => [item]);
        case 'hashmap':
          this.expectNameCount(node, nameCount, 2, 'HashMap');
          return iterable.entries.map(([key, value]) => [key, value]);
        default:
          throw RuntimeError.fromNode(
            TERN_ERROR_CODES.RUNTIME_TYPE_ERROR,
            `Cannot iterate over ${inferType(iterable)}`,
            node.iterable,
            { actualType: inferType(iterable) }
          );
      }
    }

    private expectNameCount(
      node: ForNode,
      actual: number,
      expected: number,
      typeName: string
    ): void {
      if (actual === expected) return;
      const names = expected === 1 ? 'one name' : 'two names (key, value)';
      throw RuntimeError.fromNode(
        TERN_ERROR_CODES.RUNTIME_TYPE_ERROR,
        `Iterating over ${typeName} takes ${names}, got ${actual}`,
        node,
        { expected, actual }
      );
    }

    /**
     * Bind a loop name in the current scope, defining it if needed.
     * @throws RuntimeError(RUNTIME_IMMUTABLE_ASSIGNMENT) for a constant
     */
    private bindLoopName(name: string, value: TernValue, node: ForNode): void {
      const existing = this.ctx.variables.get(name);
      if (existing && !existing.mutable) {
        throw RuntimeError.fromNode(
          TERN_ERROR_CODES.RUNTIME_IMMUTABLE_ASSIGNMENT,
          `Cannot assign to constant '${name}'`,
          node,
          { variableName: name }
        );
      }
      this.ctx.variables.set(name, { value, mutable: true });
    }
  };
}

