/**
 * Parser Extension: Literal Parsing
 * Primary expressions: scalars, identifiers, groups, tuples, arrays, hashmaps
 */

import { Parser } from './parser.js';
import type {
  ArrayLiteralNode,
  ExpressionNode,
  HashMapEntryNode,
  HashMapLiteralNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { check, advance, expect, current, makeSpan } from './state.js';
import { parseDelimitedList, unexpectedToken } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parsePrimary(): ExpressionNode;
    parseGroupOrTuple(): ExpressionNode;
    parseArrayLiteral(): ArrayLiteralNode;
    parseHashMapLiteral(): HashMapLiteralNode;
    parseHashMapEntry(): HashMapEntryNode;
  }
}

// ============================================================
// PRIMARY EXPRESSIONS
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.INTEGER:
      advance(this.state);
      return {
        type: 'IntegerLiteral',
        value: BigInt(token.value),
        span: token.span,
      };

    case TOKEN_TYPES.FLOAT:
      advance(this.state);
      return {
        type: 'FloatLiteral',
        value: Number(token.value),
        span: token.span,
      };

    case TOKEN_TYPES.STRING:
      advance(this.state);
      return { type: 'StringLiteral', value: token.value, span: token.span };

    case TOKEN_TYPES.TRUE:
    case TOKEN_TYPES.FALSE:
      advance(this.state);
      return {
        type: 'BoolLiteral',
        value: token.type === TOKEN_TYPES.TRUE,
        span: token.span,
      };

    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      return { type: 'Identifier', name: token.value, span: token.span };

    case TOKEN_TYPES.LPAREN:
      return this.parseGroupOrTuple();

    case TOKEN_TYPES.LBRACKET:
      return this.parseArrayLiteral();

    case TOKEN_TYPES.LBRACE:
      return this.parseHashMapLiteral();

    default:
      throw unexpectedToken(this.state, 'an expression');
  }
};

/**
 * (expr)      grouping
 * ()          empty tuple
 * (expr,)     one-element tuple
 * (a, b, ...) tuple
 */
Parser.prototype.parseGroupOrTuple = function (this: Parser): ExpressionNode {
  const start = advance(this.state).span.start; // consume (

  if (check(this.state, TOKEN_TYPES.RPAREN)) {
    const end = advance(this.state);
    return {
      type: 'TupleLiteral',
      elements: [],
      span: makeSpan(start, end.span.end),
    };
  }

  const first = this.parseExpression();

  if (!check(this.state, TOKEN_TYPES.COMMA)) {
    expect(this.state, TOKEN_TYPES.RPAREN, "Expected ')'");
    return first;
  }

  advance(this.state); // consume ,
  const { items, end } = parseDelimitedList(
    this.state,
    TOKEN_TYPES.RPAREN,
    "Expected ')' after tuple elements",
    () => this.parseExpression()
  );

  return {
    type: 'TupleLiteral',
    elements: [first, ...items],
    span: makeSpan(start, end.span.end),
  };
};

/** [a, b, ...] */
Parser.prototype.parseArrayLiteral = function (
  this: Parser
): ArrayLiteralNode {
  const start = advance(this.state).span.start; // consume [
  const { items, end } = parseDelimitedList(
    this.state,
    TOKEN_TYPES.RBRACKET,
    "Expected ']' after array elements",
    () => this.parseExpression()
  );

  return {
    type: 'ArrayLiteral',
    elements: items,
    span: makeSpan(start, end.span.end),
  };
};

/** {key: value, ...} */
Parser.prototype.parseHashMapLiteral = function (
  this: Parser
): HashMapLiteralNode {
  const start = advance(this.state).span.start; // consume {
  const { items, end } = parseDelimitedList(
    this.state,
    TOKEN_TYPES.RBRACE,
    "Expected '}' after hashmap entries",
    () => this.parseHashMapEntry()
  );

  return {
    type: 'HashMapLiteral',
    entries: items,
    span: makeSpan(start, end.span.end),
  };
};

Parser.prototype.parseHashMapEntry = function (
  this: Parser
): HashMapEntryNode {
  const key = this.parseExpression();
  expect(this.state, TOKEN_TYPES.COLON, "Expected ':' after hashmap key");
  const value = this.parseExpression();

  return {
    type: 'HashMapEntry',
    key,
    value,
    span: makeSpan(key.span.start, value.span.end),
  };
};
