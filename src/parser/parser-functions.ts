/**
 * Parser Extension: Function Parsing
 * Function declarations, type annotations, calls and property access
 */

import { Parser } from './parser.js';
import type {
  ExpressionNode,
  FunctionDeclNode,
} from '../types.js';
import { ParseError, TERN_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import {
  check,
  advance,
  expect,
  current,
  describeToken,
  makeSpan,
  previousEnd,
} from './state.js';
import { expectIdentifier, parseDelimitedList } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseFunctionDecl(): FunctionDeclNode;
    parseParam(seen: Set<string>): string;
    parseTypeAnnotation(): void;
    parsePostfix(): ExpressionNode;
    parseArgumentList(): ExpressionNode[];
  }
}

// ============================================================
// FUNCTION DECLARATIONS
// ============================================================

/** fn name(param: Type, ...) -> Type { body } */
Parser.prototype.parseFunctionDecl = function (
  this: Parser
): FunctionDeclNode {
  const start = advance(this.state).span.start; // consume fn
  const nameToken = expectIdentifier(
    this.state,
    "Expected function name after 'fn'"
  );

  expect(this.state, TOKEN_TYPES.LPAREN, "Expected '(' after function name");
  const seen = new Set<string>();
  const { items: params } = parseDelimitedList(
    this.state,
    TOKEN_TYPES.RPAREN,
    "Expected ')' after parameters",
    () => this.parseParam(seen)
  );

  if (check(this.state, TOKEN_TYPES.ARROW)) {
    advance(this.state);
    this.parseTypeAnnotation();
  }

  const body = this.parseBlock();

  return {
    type: 'FunctionDecl',
    name: nameToken.value,
    params,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

Parser.prototype.parseParam = function (
  this: Parser,
  seen: Set<string>
): string {
  const token = expectIdentifier(this.state, 'Expected parameter name');
  if (seen.has(token.value)) {
    throw new ParseError(
      `Duplicate parameter '${token.value}'`,
      token.span.start
    );
  }
  seen.add(token.value);

  if (check(this.state, TOKEN_TYPES.COLON)) {
    advance(this.state);
    this.parseTypeAnnotation();
  }
  return token.value;
};

// ============================================================
// TYPE ANNOTATIONS
// ============================================================

/**
 * Validate and skip a type annotation.
 *
 * Accepted shapes:
 *   Int | Float | String | Bool | Array | Tuple | HashMap
 *   Name | Name[T, ...]
 *   [T]
 *   (T, ...)
 *
 * Annotations are not attached to the AST and never enforced.
 */
Parser.prototype.parseTypeAnnotation = function (this: Parser): void {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.TYPE_NAME:
      advance(this.state);
      return;

    case TOKEN_TYPES.IDENTIFIER:
      advance(this.state);
      if (check(this.state, TOKEN_TYPES.LBRACKET)) {
        advance(this.state);
        parseDelimitedList(
          this.state,
          TOKEN_TYPES.RBRACKET,
          "Expected ']' after type arguments",
          () => this.parseTypeAnnotation()
        );
      }
      return;

    case TOKEN_TYPES.LBRACKET:
      advance(this.state);
      this.parseTypeAnnotation();
      expect(this.state, TOKEN_TYPES.RBRACKET, "Expected ']' after element type");
      return;

    case TOKEN_TYPES.LPAREN:
      advance(this.state);
      parseDelimitedList(
        this.state,
        TOKEN_TYPES.RPAREN,
        "Expected ')' after tuple types",
        () => this.parseTypeAnnotation()
      );
      return;

    default:
      throw new ParseError(
        `Invalid type annotation ${describeToken(token)}`,
        token.span.start,
        undefined,
        TERN_ERROR_CODES.PARSE_INVALID_TYPE
      );
  }
};

// ============================================================
// CALLS AND PROPERTY ACCESS
// ============================================================

/** primary ( '(' args ')' | '.' name )* */
Parser.prototype.parsePostfix = function (this: Parser): ExpressionNode {
  let expr = this.parsePrimary();

  for (;;) {
    if (check(this.state, TOKEN_TYPES.LPAREN)) {
      advance(this.state);
      const args = this.parseArgumentList();
      expr = {
        type: 'Call',
        callee: expr,
        args,
        span: makeSpan(expr.span.start, previousEnd(this.state)),
      };
    } else if (check(this.state, TOKEN_TYPES.DOT)) {
      advance(this.state);
      const property = expectIdentifier(
        this.state,
        "Expected property name after '.'"
      );
      expr = {
        type: 'DotAccess',
        object: expr,
        property: property.value,
        span: makeSpan(expr.span.start, property.span.end),
      };
    } else {
      return expr;
    }
  }
};

/** Arguments after '(' up to and including ')' */
Parser.prototype.parseArgumentList = function (
  this: Parser
): ExpressionNode[] {
  return parseDelimitedList(
    this.state,
    TOKEN_TYPES.RPAREN,
    "Expected ')' after arguments",
    () => this.parseExpression()
  ).items;
};
