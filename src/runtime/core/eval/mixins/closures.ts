/**
 * ClosuresMixin: Function Declaration and Invocation
 *
 * Handles `fn` declarations, calls to user functions and builtins, and
 * `.name` access on hashmaps (module records).
 *
 * A function value keeps a live reference to the scope it was declared in,
 * so names bound after the declaration (including the function itself and
 * later siblings) resolve at call time.
 *
 * Error Handling:
 * - Wrong argument count throws RuntimeError(RUNTIME_ARITY_MISMATCH)
 * - Calling a non-callable throws RuntimeError(RUNTIME_NOT_CALLABLE)
 * - break/continue escaping a body throw RuntimeError(RUNTIME_INVALID_CONTROL_FLOW)
 * - Non-Tern errors from builtins are wrapped as RuntimeError(RUNTIME_HOST_ERROR)
 *
 * @internal
 */

import type {
  CallNode,
  DotAccessNode,
  FunctionDeclNode,
  SourceLocation,
} from '../../../../types.js';
import {
  RuntimeError,
  TernError,
  TERN_ERROR_CODES,
} from '../../../../types.js';
import type { TernBuiltin, TernFunction } from '../../callable.js';
import { arityMessage } from '../../callable.js';
import { createChildContext, defineVariable } from '../../context.js';
import type { ControlFlow } from '../../signals.js';
import { COMPLETED } from '../../signals.js';
import type { TernValue } from '../../values.js';
import { getHashMapEntry, inferType, NULL, string } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';
import { redeclaredVariable } from './variables.js';

export function ClosuresMixin(Base: EvaluatorConstructor): EvaluatorConstructor {
  return class ClosuresEvaluator extends Base {
    protected override executeFunctionDecl(
      node: FunctionDeclNode
    ): ControlFlow {
      const fn: TernFunction = {
        kind: 'function',
        name: node.name,
        params: node.params,
        body: node.body,
        closure: this.ctx,
      };
      if (!defineVariable(this.ctx, node.name, fn, false)) {
        throw redeclaredVariable(node.name, node);
      }
      return COMPLETED;
    }

    /**
     * Evaluate callee, then arguments left to right, then invoke.
     */
    protected override evaluateCall(node: CallNode): TernValue {
      const callee = this.evaluateExpression(node.callee);
      const args = node.args.map((arg) => this.evaluateExpression(arg));

      switch (callee.kind) {
        case 'function':
          return this.invokeFunction(callee, args, node);
        case 'builtin':
          return this.invokeBuiltin(callee, args, node);
        default:
          throw RuntimeError.fromNode(
            TERN_ERROR_CODES.RUNTIME_NOT_CALLABLE,
            'Tried to call non-function',
            node,
            { calleeType: inferType(callee) }
          );
      }
    }

    protected override evaluateDotAccess(node: DotAccessNode): TernValue {
      const object = this.evaluateExpression(node.object);

      if (object.kind !== 'hashmap') {
        throw RuntimeError.fromNode(
          TERN_ERROR_CODES.RUNTIME_TYPE_ERROR,
          `Cannot access property '${node.property}' on ${inferType(object)}`,
          node,
          { property: node.property, actualType: inferType(object) }
        );
      }

      const value = getHashMapEntry(object, string(node.property));
      if (value === undefined) {
        throw RuntimeError.fromNode(
          TERN_ERROR_CODES.RUNTIME_PROPERTY_NOT_FOUND,
          `Property '${node.property}' not found`,
          node,
          { property: node.property }
        );
      }
      return value;
    }

    /**
     * Run a user function in a child of its captured scope.
     * Parameters are bound mutably.
     */
    private invokeFunction(
      fn: TernFunction,
      args: TernValue[],
      node: CallNode
    ): TernValue {
      if (args.length !== fn.params.length) {
        throw RuntimeError.fromNode(
          TERN_ERROR_CODES.RUNTIME_ARITY_MISMATCH,
          arityMessage(fn.name, fn.params.length, args.length),
          node,
          {
            functionName: fn.name,
            expected: fn.params.length,
            actual: args.length,
          }
        );
      }

      const callCtx = createChildContext(fn.closure);
      fn.params.forEach((param, i) => {
        callCtx.variables.set(param, { value: args[i] ?? NULL, mutable: true });
      });

      const startTime = performance.now();
      const signal = this.withContext(callCtx, () =>
        this.executeBlock(fn.body)
      );

      let value: TernValue;
      switch (signal.kind) {
        case 'return':
          value = signal.value;
          break;
        case 'value':
          value = NULL;
          break;
        case 'break':
        case 'continue':
          throw RuntimeError.fromNode(
            TERN_ERROR_CODES.RUNTIME_INVALID_CONTROL_FLOW,
            `'${signal.kind}' outside of a loop in function '${fn.name}'`,
            node,
            { functionName: fn.name }
          );
      }

      this.ctx.observability.onFunctionReturn?.({
        name: fn.name,
        value,
        durationMs: performance.now() - startTime,
      });
      return value;
    }

    private invokeBuiltin(
      builtin: TernBuiltin,
      args: TernValue[],
      node: CallNode
    ): TernValue {
      const location = this.getNodeLocation(node);
      this.ctx.observability.onHostCall?.({ name: builtin.name, args });

      try {
        return builtin.fn(args, this.ctx, location);
      } catch (err) {
        throw locateHostError(err, builtin.name, location);
      }
    }
  };
}

/**
 * Give a builtin's error the call site location.
 * Errors that are not Tern errors become RUNTIME_HOST_ERROR.
 */
function locateHostError(
  err: unknown,
  name: string,
  location: SourceLocation | undefined
): Error {
  if (err instanceof RuntimeError) {
    if (err.location || !location) return err;
    const data = err.toData();
    return new RuntimeError(data.code, data.message, location, data.context);
  }
  if (err instanceof TernError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new RuntimeError(
    TERN_ERROR_CODES.RUNTIME_HOST_ERROR,
    `Host function '${name}' failed: ${message}`,
    location,
    { functionName: name }
  );
}
