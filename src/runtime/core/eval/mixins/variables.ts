/**
 * VariablesMixin: Bindings
 *
 * Identifier lookup, assignment, `let`/`const` declarations and `del`.
 *
 * Error Handling:
 * - Unknown names throw RuntimeError(RUNTIME_UNDEFINED_VARIABLE)
 * - Writes to constants throw RuntimeError(RUNTIME_IMMUTABLE_ASSIGNMENT)
 * - Same-scope redeclaration throws RuntimeError(RUNTIME_REDECLARED_VARIABLE)
 *
 * @internal
 */

import type {
  AssignNode,
  DeleteNode,
  IdentifierNode,
  LetDeclNode,
  SourceSpan,
} from '../../../../types.js';
import { RuntimeError, TERN_ERROR_CODES } from '../../../../types.js';
import {
  assignVariable,
  defineVariable,
  deleteVariable,
  getVariable,
} from '../../context.js';
import type { ControlFlow } from '../../signals.js';
import { COMPLETED } from '../../signals.js';
import type { TernValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function undefinedVariable(
  name: string,
  node: { span: SourceSpan }
): RuntimeError {
  return RuntimeError.fromNode(
    TERN_ERROR_CODES.RUNTIME_UNDEFINED_VARIABLE,
    `Variable '${name}' is not defined`,
    node,
    { variableName: name }
  );
}

export function redeclaredVariable(
  name: string,
  node: { span: SourceSpan }
): RuntimeError {
  return RuntimeError.fromNode(
    TERN_ERROR_CODES.RUNTIME_REDECLARED_VARIABLE,
    `Variable '${name}' is already declared in this scope`,
    node,
    { variableName: name }
  );
}

export function VariablesMixin(
  Base: EvaluatorConstructor
): EvaluatorConstructor {
  return class VariablesEvaluator extends Base {
    protected override evaluateIdentifier(node: IdentifierNode): TernValue {
      const value = getVariable(this.ctx, node.name);
      if (value === undefined) {
        throw undefinedVariable(node.name, node);
      }
      return value;
    }

    protected override evaluateAssign(node: AssignNode): TernValue {
      const value = this.evaluateExpression(node.value);
      const result = assignVariable(this.ctx, node.name, value);

      if (result === 'undefined') {
        throw undefinedVariable(node.name, node);
      }
      if (result === 'immutable') {
        throw RuntimeError.fromNode(
          TERN_ERROR_CODES.RUNTIME_IMMUTABLE_ASSIGNMENT,
          `Cannot assign to constant '${node.name}'`,
          node,
          { variableName: node.name }
        );
      }
      return value;
    }

    protected override executeDeclaration(node: LetDeclNode): ControlFlow {
      const value = this.evaluateExpression(node.init);
      if (!defineVariable(this.ctx, node.name, value, !node.constant)) {
        throw redeclaredVariable(node.name, node);
      }
      return COMPLETED;
    }

    protected override executeDelete(node: DeleteNode): ControlFlow {
      const result = deleteVariable(this.ctx, node.name);

      if (result === 'undefined') {
        throw undefinedVariable(node.name, node);
      }
      if (result === 'builtin') {
        throw RuntimeError.fromNode(
          TERN_ERROR_CODES.RUNTIME_IMMUTABLE_ASSIGNMENT,
          `Cannot delete builtin '${node.name}'`,
          node,
          { variableName: node.name }
        );
      }
      return COMPLETED;
    }
  };
}
