/**
 * Evaluator Base Class
 *
 * Foundation for the class-based evaluator architecture.
 * Provides shared utilities and context access for all mixins, and
 * declares the evaluation entry points each mixin fills in.
 *
 * @internal
 */

import type {
  ASTNode,
  AssignNode,
  BinaryExprNode,
  CallNode,
  DeleteNode,
  DotAccessNode,
  ExpressionNode,
  ForNode,
  FunctionDeclNode,
  IdentifierNode,
  IfNode,
  ImportNode,
  LetDeclNode,
  LiteralNode,
  LoopNode,
  SourceLocation,
  StatementNode,
  UnaryExprNode,
  WhileNode,
} from '../../../types.js';
import { RuntimeError, TERN_ERROR_CODES } from '../../../types.js';
import type { ControlFlow } from '../signals.js';
import type { RuntimeContext } from '../types.js';
import type { TernValue } from '../values.js';
import { inferType } from '../values.js';

function notComposed(method: string): Error {
  return new Error(`${method} requires full Evaluator composition`);
}

/**
 * Base class for the evaluator.
 * Contains shared utilities used by all mixins.
 * Entry points below are stubs until the owning mixin is applied.
 */
export class EvaluatorBase {
  constructor(protected ctx: RuntimeContext) {}

  /**
   * Get source location from an AST node.
   * Used for error reporting with precise location information.
   */
  protected getNodeLocation(node?: ASTNode): SourceLocation | undefined {
    return node?.span.start;
  }

  /**
   * Run a callback with `ctx` swapped to another scope.
   * The previous scope is restored even when the callback throws.
   */
  protected withContext<T>(ctx: RuntimeContext, fn: () => T): T {
    const savedCtx = this.ctx;
    this.ctx = ctx;
    try {
      return fn();
    } finally {
      this.ctx = savedCtx;
    }
  }

  /**
   * Require a Bool condition value.
   * @throws RuntimeError(RUNTIME_TYPE_ERROR)
   */
  protected expectCondition(
    value: TernValue,
    construct: string,
    node: ASTNode
  ): boolean {
    if (value.kind !== 'bool') {
      throw RuntimeError.fromNode(
        TERN_ERROR_CODES.RUNTIME_TYPE_ERROR,
        `${construct} condition must be Boolean, got ${inferType(value)}`,
        node
      );
    }
    return value.value;
  }

  // ============================================================
  // CORE (CoreMixin)
  // ============================================================

  evaluateExpression(_node: ExpressionNode): TernValue {
    throw notComposed('evaluateExpression');
  }

  executeStatement(_node: StatementNode): ControlFlow {
    throw notComposed('executeStatement');
  }

  /** Run statements in the current scope, stopping at the first signal */
  executeBlock(_statements: StatementNode[]): ControlFlow {
    throw notComposed('executeBlock');
  }

  // ============================================================
  // LITERALS (LiteralsMixin)
  // ============================================================

  protected evaluateLiteral(_node: LiteralNode): TernValue {
    throw notComposed('evaluateLiteral');
  }

  // ============================================================
  // VARIABLES (VariablesMixin)
  // ============================================================

  protected evaluateIdentifier(_node: IdentifierNode): TernValue {
    throw notComposed('evaluateIdentifier');
  }

  protected evaluateAssign(_node: AssignNode): TernValue {
    throw notComposed('evaluateAssign');
  }

  protected executeDeclaration(_node: LetDeclNode): ControlFlow {
    throw notComposed('executeDeclaration');
  }

  protected executeDelete(_node: DeleteNode): ControlFlow {
    throw notComposed('executeDelete');
  }

  // ============================================================
  // EXPRESSIONS (ExpressionsMixin)
  // ============================================================

  protected evaluateBinaryExpr(_node: BinaryExprNode): TernValue {
    throw notComposed('evaluateBinaryExpr');
  }

  protected evaluateUnaryExpr(_node: UnaryExprNode): TernValue {
    throw notComposed('evaluateUnaryExpr');
  }

  // ============================================================
  // CONTROL FLOW (ControlFlowMixin)
  // ============================================================

  protected executeIf(_node: IfNode): ControlFlow {
    throw notComposed('executeIf');
  }

  protected executeWhile(_node: WhileNode): ControlFlow {
    throw notComposed('executeWhile');
  }

  protected executeLoop(_node: LoopNode): ControlFlow {
    throw notComposed('executeLoop');
  }

  protected executeFor(_node: ForNode): ControlFlow {
    throw notComposed('executeFor');
  }

  // ============================================================
  // CLOSURES (ClosuresMixin)
  // ============================================================

  protected executeFunctionDecl(_node: FunctionDeclNode): ControlFlow {
    throw notComposed('executeFunctionDecl');
  }

  protected evaluateCall(_node: CallNode): TernValue {
    throw notComposed('evaluateCall');
  }

  protected evaluateDotAccess(_node: DotAccessNode): TernValue {
    throw notComposed('evaluateDotAccess');
  }

  // ============================================================
  // MODULES (ModulesMixin)
  // ============================================================

  protected executeImport(_node: ImportNode): ControlFlow {
    throw notComposed('executeImport');
  }
}
