/**
 * Parser Extension: Control Flow Parsing
 * Blocks, conditionals and loops
 */

import { Parser } from './parser.js';
import type {
  ElifBranchNode,
  ForNode,
  IfNode,
  LoopNode,
  StatementNode,
  WhileNode,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import {
  check,
  advance,
  expect,
  current,
  makeSpan,
  previousEnd,
} from './state.js';
import { expectIdentifier } from './helpers.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseBlock(): StatementNode[];
    parseIf(): IfNode;
    parseWhile(): WhileNode;
    parseFor(): ForNode;
    parseLoop(): LoopNode;
  }
}

// ============================================================
// BLOCKS
// ============================================================

/** { statement* } */
Parser.prototype.parseBlock = function (this: Parser): StatementNode[] {
  expect(this.state, TOKEN_TYPES.LBRACE, "Expected '{'");

  const statements: StatementNode[] = [];
  while (!check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) {
    if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
      continue;
    }
    statements.push(this.parseStatement());
  }

  expect(this.state, TOKEN_TYPES.RBRACE, "Expected '}'");
  return statements;
};

// ============================================================
// CONDITIONALS
// ============================================================

/** if cond { } (elif cond { })* (else { })? */
Parser.prototype.parseIf = function (this: Parser): IfNode {
  const start = advance(this.state).span.start; // consume if
  const condition = this.parseExpression();
  const body = this.parseBlock();

  const elifs: ElifBranchNode[] = [];
  while (check(this.state, TOKEN_TYPES.ELIF)) {
    const elifStart = advance(this.state).span.start;
    const elifCondition = this.parseExpression();
    const elifBody = this.parseBlock();
    elifs.push({
      type: 'ElifBranch',
      condition: elifCondition,
      body: elifBody,
      span: makeSpan(elifStart, previousEnd(this.state)),
    });
  }

  let elseBody: StatementNode[] | null = null;
  if (check(this.state, TOKEN_TYPES.ELSE)) {
    advance(this.state);
    elseBody = this.parseBlock();
  }

  return {
    type: 'If',
    condition,
    body,
    elifs,
    elseBody,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

// ============================================================
// LOOPS
// ============================================================

/** while cond { } */
Parser.prototype.parseWhile = function (this: Parser): WhileNode {
  const start = advance(this.state).span.start; // consume while
  const condition = this.parseExpression();
  const body = this.parseBlock();

  return {
    type: 'While',
    condition,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** for name in expr { } / for key, value in expr { } */
Parser.prototype.parseFor = function (this: Parser): ForNode {
  const start = advance(this.state).span.start; // consume for
  const first = expectIdentifier(
    this.state,
    "Expected loop variable after 'for'"
  ).value;

  let names: ForNode['names'] = [first];
  if (check(this.state, TOKEN_TYPES.COMMA)) {
    advance(this.state);
    const second = expectIdentifier(
      this.state,
      "Expected second loop variable after ','"
    ).value;
    names = [first, second];
  }

  expect(this.state, TOKEN_TYPES.IN, "Expected 'in' after loop variables");
  const iterable = this.parseExpression();
  const body = this.parseBlock();

  return {
    type: 'For',
    names,
    iterable,
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};

/** loop { } */
Parser.prototype.parseLoop = function (this: Parser): LoopNode {
  const start = current(this.state).span.start;
  advance(this.state); // consume loop
  const body = this.parseBlock();

  return {
    type: 'Loop',
    body,
    span: makeSpan(start, previousEnd(this.state)),
  };
};
