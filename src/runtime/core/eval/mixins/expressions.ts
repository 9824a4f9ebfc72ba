/**
 * ExpressionsMixin: Binary and Unary Expressions
 *
 * Both operands are always evaluated, left first, including for `and`
 * and `or`. Operator semantics live in operators.ts.
 *
 * @internal
 */

import type { BinaryExprNode, UnaryExprNode } from '../../../../types.js';
import { applyBinary, applyUnary } from '../../operators.js';
import type { TernValue } from '../../values.js';
import type { EvaluatorConstructor } from '../types.js';

export function ExpressionsMixin(
  Base: EvaluatorConstructor
): EvaluatorConstructor {
  return class ExpressionsEvaluator extends Base {
    protected override evaluateBinaryExpr(node: BinaryExprNode): TernValue {
      const left = this.evaluateExpression(node.left);
      const right = this.evaluateExpression(node.right);
      return applyBinary(node.op, left, right, this.getNodeLocation(node));
    }

    protected override evaluateUnaryExpr(node: UnaryExprNode): TernValue {
      const operand = this.evaluateExpression(node.operand);
      return applyUnary(node.op, operand, this.getNodeLocation(node));
    }
  };
}
