/**
 * Parser Extension: Expression Parsing
 * Assignment and the binary operator precedence chain
 *
 * Precedence (lowest to highest):
 *   assignment → or → and → equality → comparison
 *   → additive → multiplicative → unary → postfix → primary
 */

import { Parser } from './parser.js';
import type {
  BinaryOp,
  ExpressionNode,
  TokenType,
  UnaryOp,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import { advance, current, makeSpan } from './state.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseExpression(): ExpressionNode;
    parseAssignment(): ExpressionNode;
    parseOr(): ExpressionNode;
    parseAnd(): ExpressionNode;
    parseEquality(): ExpressionNode;
    parseComparison(): ExpressionNode;
    parseAdditive(): ExpressionNode;
    parseMultiplicative(): ExpressionNode;
    parseUnary(): ExpressionNode;
    parseBinaryLevel(
      operators: Partial<Record<TokenType, BinaryOp>>,
      next: () => ExpressionNode
    ): ExpressionNode;
  }
}

// ============================================================
// OPERATOR TABLES
// ============================================================

const OR_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.OR]: 'or',
};

const AND_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.AND]: 'and',
};

const EQUALITY_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.EQ]: '==',
  [TOKEN_TYPES.NE]: '!=',
};

const COMPARISON_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.LT]: '<',
  [TOKEN_TYPES.LE]: '<=',
  [TOKEN_TYPES.GT]: '>',
  [TOKEN_TYPES.GE]: '>=',
};

const ADDITIVE_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.PLUS]: '+',
  [TOKEN_TYPES.MINUS]: '-',
};

const MULTIPLICATIVE_OPS: Partial<Record<TokenType, BinaryOp>> = {
  [TOKEN_TYPES.STAR]: '*',
  [TOKEN_TYPES.SLASH]: '/',
};

const UNARY_OPS: Partial<Record<TokenType, UnaryOp>> = {
  [TOKEN_TYPES.MINUS]: '-',
  [TOKEN_TYPES.NOT]: 'not',
};

// ============================================================
// EXPRESSIONS
// ============================================================

Parser.prototype.parseExpression = function (this: Parser): ExpressionNode {
  return this.parseAssignment();
};

/** name = value (right-associative) */
Parser.prototype.parseAssignment = function (this: Parser): ExpressionNode {
  const target = this.parseOr();

  if (current(this.state).type !== TOKEN_TYPES.ASSIGN) {
    return target;
  }

  const assignToken = advance(this.state);
  if (target.type !== 'Identifier') {
    throw new ParseError('Invalid assignment target', assignToken.span.start, {
      target: target.type,
    });
  }

  const value = this.parseAssignment();
  return {
    type: 'Assign',
    name: target.name,
    value,
    span: makeSpan(target.span.start, value.span.end),
  };
};

Parser.prototype.parseOr = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(OR_OPS, () => this.parseAnd());
};

Parser.prototype.parseAnd = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(AND_OPS, () => this.parseEquality());
};

Parser.prototype.parseEquality = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(EQUALITY_OPS, () => this.parseComparison());
};

Parser.prototype.parseComparison = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(COMPARISON_OPS, () => this.parseAdditive());
};

Parser.prototype.parseAdditive = function (this: Parser): ExpressionNode {
  return this.parseBinaryLevel(ADDITIVE_OPS, () =>
    this.parseMultiplicative()
  );
};

Parser.prototype.parseMultiplicative = function (
  this: Parser
): ExpressionNode {
  return this.parseBinaryLevel(MULTIPLICATIVE_OPS, () => this.parseUnary());
};

/** -expr / not expr */
Parser.prototype.parseUnary = function (this: Parser): ExpressionNode {
  const token = current(this.state);
  const op = UNARY_OPS[token.type];

  if (op === undefined) {
    return this.parsePostfix();
  }

  advance(this.state);
  const operand = this.parseUnary();
  return {
    type: 'UnaryExpr',
    op,
    operand,
    span: makeSpan(token.span.start, operand.span.end),
  };
};

/**
 * Left-associative binary level: next (op next)*
 */
Parser.prototype.parseBinaryLevel = function (
  this: Parser,
  operators: Partial<Record<TokenType, BinaryOp>>,
  next: () => ExpressionNode
): ExpressionNode {
  let left = next();

  for (;;) {
    const op = operators[current(this.state).type];
    if (op === undefined) return left;

    advance(this.state);
    const right = next();
    left = {
      type: 'BinaryExpr',
      op,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }
};
