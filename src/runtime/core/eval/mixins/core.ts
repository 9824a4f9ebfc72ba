/**
 * CoreMixin: Statement and Expression Dispatch
 *
 * Routes each AST node to the mixin that evaluates it, and runs
 * statement lists while threading the control-flow signal.
 *
 * Depends on the entry points every other mixin overrides.
 *
 * @internal
 */

import type {
  ExpressionNode,
  ReturnNode,
  StatementNode,
} from '../../../../types.js';
import type { ControlFlow } from '../../signals.js';
import {
  BREAK,
  COMPLETED,
  CONTINUE,
  completed,
  returned,
} from '../../signals.js';
import type { TernValue } from '../../values.js';
import { NULL } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function CoreMixin(Base: EvaluatorConstructor): EvaluatorConstructor {
  return class CoreEvaluator extends Base {
    override evaluateExpression(node: ExpressionNode): TernValue {
      switch (node.type) {
        case 'IntegerLiteral':
        case 'FloatLiteral':
        case 'BoolLiteral':
        case 'StringLiteral':
        case 'ArrayLiteral':
        case 'TupleLiteral':
        case 'HashMapLiteral':
          return this.evaluateLiteral(node);
        case 'Identifier':
          return this.evaluateIdentifier(node);
        case 'Assign':
          return this.evaluateAssign(node);
        case 'BinaryExpr':
          return this.evaluateBinaryExpr(node);
        case 'UnaryExpr':
          return this.evaluateUnaryExpr(node);
        case 'Call':
          return this.evaluateCall(node);
        case 'DotAccess':
          return this.evaluateDotAccess(node);
      }
    }

    override executeStatement(node: StatementNode): ControlFlow {
      switch (node.type) {
        case 'LetDecl':
          return this.executeDeclaration(node);
        case 'FunctionDecl':
          return this.executeFunctionDecl(node);
        case 'If':
          return this.executeIf(node);
        case 'While':
          return this.executeWhile(node);
        case 'For':
          return this.executeFor(node);
        case 'Loop':
          return this.executeLoop(node);
        case 'Return':
          return this.executeReturn(node);
        case 'Break':
          return BREAK;
        case 'Continue':
          return CONTINUE;
        case 'Delete':
          return this.executeDelete(node);
        case 'Import':
          return this.executeImport(node);
        case 'ExpressionStatement':
          return completed(this.evaluateExpression(node.expression));
      }
    }

    override executeBlock(statements: StatementNode[]): ControlFlow {
      let signal: ControlFlow = COMPLETED;
      for (const statement of statements) {
        signal = this.executeStatement(statement);
        if (signal.kind !== 'value') {
          return signal;
        }
      }
      return signal;
    }

    private executeReturn(node: ReturnNode): ControlFlow {
      const value = node.value ? this.evaluateExpression(node.value) : NULL;
      return returned(value);
    }
  };
}
