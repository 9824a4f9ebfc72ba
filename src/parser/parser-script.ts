/**
 * Parser Extension: Script Parsing
 * Script, statement dispatch and simple statements
 */

import { Parser } from './parser.js';
import type {
  BreakNode,
  ContinueNode,
  DeleteNode,
  ExpressionStatementNode,
  ImportNode,
  LetDeclNode,
  ReturnNode,
  ScriptNode,
  StatementNode,
} from '../types.js';
import { ParseError, TOKEN_TYPES } from '../types.js';
import {
  check,
  advance,
  expect,
  current,
  isAtEnd,
  makeSpan,
  previousEnd,
} from './state.js';
import {
  RESERVED_WORDS,
  expectIdentifier,
  isReturnTerminator,
} from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseScript(): ScriptNode;
    parseStatement(): StatementNode;
    parseVarDecl(): LetDeclNode;
    parseReturn(): ReturnNode;
    parseLoopJump(): BreakNode | ContinueNode;
    parseDelete(): DeleteNode;
    parseImport(): ImportNode;
    parseExpressionStatement(): ExpressionStatementNode;
  }
}

// ============================================================
// SCRIPT PARSING
// ============================================================

Parser.prototype.parseScript = function (this: Parser): ScriptNode {
  const start = current(this.state).span.start;
  const statements: StatementNode[] = [];

  while (!isAtEnd(this.state)) {
    if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
      continue;
    }
    statements.push(this.parseStatement());
  }

  return {
    type: 'Script',
    statements,
    span: makeSpan(start, current(this.state).span.end),
  };
};

// ============================================================
// STATEMENT DISPATCH
// ============================================================

Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const token = current(this.state);
  let statement: StatementNode;

  switch (token.type) {
    case TOKEN_TYPES.LET:
    case TOKEN_TYPES.CONST:
      statement = this.parseVarDecl();
      break;
    case TOKEN_TYPES.FN:
      statement = this.parseFunctionDecl();
      break;
    case TOKEN_TYPES.IF:
      statement = this.parseIf();
      break;
    case TOKEN_TYPES.WHILE:
      statement = this.parseWhile();
      break;
    case TOKEN_TYPES.FOR:
      statement = this.parseFor();
      break;
    case TOKEN_TYPES.LOOP:
      statement = this.parseLoop();
      break;
    case TOKEN_TYPES.RETURN:
      statement = this.parseReturn();
      break;
    case TOKEN_TYPES.BREAK:
    case TOKEN_TYPES.CONTINUE:
      statement = this.parseLoopJump();
      break;
    case TOKEN_TYPES.DEL:
      statement = this.parseDelete();
      break;
    case TOKEN_TYPES.IMPORT:
      statement = this.parseImport();
      break;
    default:
      if (RESERVED_WORDS.includes(token.type)) {
        throw new ParseError(
          `'${token.value}' is a reserved word and is not supported`,
          token.span.start
        );
      }
      statement = this.parseExpressionStatement();
  }

  // Optional statement separator
  if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
    advance(this.state);
  }

  return statement;
};

// ============================================================
// SIMPLE STATEMENTS
// ============================================================

/** let name = expr / const name = expr */
Parser.prototype.parseVarDecl = function (this: Parser): LetDeclNode {
  const keyword = advance(this.state); // consume let or const
  const nameToken = expectIdentifier(
    this.state,
    `Expected variable name after '${keyword.value}'`
  );
  expect(this.state, TOKEN_TYPES.ASSIGN, "Expected '=' after variable name");
  const init = this.parseExpression();

  return {
    type: 'LetDecl',
    name: nameToken.value,
    constant: keyword.type === TOKEN_TYPES.CONST,
    init,
    span: makeSpan(keyword.span.start, init.span.end),
  };
};

/** return / return expr */
Parser.prototype.parseReturn = function (this: Parser): ReturnNode {
  const keyword = advance(this.state); // consume return

  if (isReturnTerminator(this.state)) {
    return { type: 'Return', value: null, span: keyword.span };
  }

  const value = this.parseExpression();
  return {
    type: 'Return',
    value,
    span: makeSpan(keyword.span.start, value.span.end),
  };
};

Parser.prototype.parseLoopJump = function (
  this: Parser
): BreakNode | ContinueNode {
  const keyword = advance(this.state);
  if (keyword.type === TOKEN_TYPES.BREAK) {
    return { type: 'Break', span: keyword.span };
  }
  return { type: 'Continue', span: keyword.span };
};

/** del name */
Parser.prototype.parseDelete = function (this: Parser): DeleteNode {
  const keyword = advance(this.state); // consume del
  const nameToken = expectIdentifier(
    this.state,
    "Expected variable name after 'del'"
  );

  return {
    type: 'Delete',
    name: nameToken.value,
    span: makeSpan(keyword.span.start, nameToken.span.end),
  };
};

/** import "path" as alias */
Parser.prototype.parseImport = function (this: Parser): ImportNode {
  const keyword = advance(this.state); // consume import
  const pathToken = expect(
    this.state,
    TOKEN_TYPES.STRING,
    "Expected module path string after 'import'"
  );
  expect(this.state, TOKEN_TYPES.AS, "Expected 'as' after import path");
  const aliasToken = expectIdentifier(
    this.state,
    "Expected alias name after 'as'"
  );

  return {
    type: 'Import',
    path: pathToken.value,
    alias: aliasToken.value,
    span: makeSpan(keyword.span.start, previousEnd(this.state)),
  };
};

Parser.prototype.parseExpressionStatement = function (
  this: Parser
): ExpressionStatementNode {
  const expression = this.parseExpression();
  return {
    type: 'ExpressionStatement',
    expression,
    span: expression.span,
  };
};
