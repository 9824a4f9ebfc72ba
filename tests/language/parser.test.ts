/**
 * Tern Parser Tests
 * AST shapes, precedence and statement forms
 */

import { describe, expect, it } from 'vitest';

import {
  parse,
  parseTokens,
  tokenize,
  type ExpressionNode,
  type StatementNode,
} from '../../src/index.js';

function firstStatement(source: string): StatementNode {
  const statement = parse(source).statements[0];
  if (!statement) throw new Error('No statement parsed');
  return statement;
}

function expression(source: string): ExpressionNode {
  const statement = firstStatement(source);
  if (statement.type !== 'ExpressionStatement') {
    throw new Error(`Expected expression statement, got ${statement.type}`);
  }
  return statement.expression;
}

describe('Tern Parser', () => {
  describe('precedence', () => {
    it('multiplication binds tighter than addition', () => {
      expect(expression('1 + 2 * 3')).toMatchObject({
        type: 'BinaryExpr',
        op: '+',
        left: { type: 'IntegerLiteral', value: 1n },
        right: {
          type: 'BinaryExpr',
          op: '*',
          left: { value: 2n },
          right: { value: 3n },
        },
      });
    });

    it('binary operators are left-associative', () => {
      expect(expression('10 - 2 - 3')).toMatchObject({
        op: '-',
        left: { op: '-', left: { value: 10n }, right: { value: 2n } },
        right: { value: 3n },
      });
    });

    it('orders logical, equality and comparison levels', () => {
      expect(expression('a or b and c == d < e')).toMatchObject({
        op: 'or',
        left: { type: 'Identifier', name: 'a' },
        right: {
          op: 'and',
          left: { name: 'b' },
          right: {
            op: '==',
            left: { name: 'c' },
            right: { op: '<', left: { name: 'd' }, right: { name: 'e' } },
          },
        },
      });
    });

    it('unary operators nest', () => {
      expect(expression('not not x')).toMatchObject({
        type: 'UnaryExpr',
        op: 'not',
        operand: { type: 'UnaryExpr', op: 'not', operand: { name: 'x' } },
      });
      expect(expression('-a * b')).toMatchObject({
        op: '*',
        left: { type: 'UnaryExpr', op: '-' },
      });
    });

    it('assignment is right-associative', () => {
      expect(expression('a = b = 1 + 1')).toMatchObject({
        type: 'Assign',
        name: 'a',
        value: {
          type: 'Assign',
          name: 'b',
          value: { type: 'BinaryExpr', op: '+' },
        },
      });
    });

    it('postfix calls and dot access chain left to right', () => {
      expect(expression('m.f(1)(2).g')).toMatchObject({
        type: 'DotAccess',
        property: 'g',
        object: {
          type: 'Call',
          args: [{ value: 2n }],
          callee: {
            type: 'Call',
            args: [{ value: 1n }],
            callee: {
              type: 'DotAccess',
              property: 'f',
              object: { name: 'm' },
            },
          },
        },
      });
    });
  });

  describe('literals', () => {
    it('distinguishes groups from tuples', () => {
      expect(expression('(1)')).toMatchObject({ type: 'IntegerLiteral' });
      expect(expression('()')).toMatchObject({
        type: 'TupleLiteral',
        elements: [],
      });
      expect(expression('(1,)')).toMatchObject({
        type: 'TupleLiteral',
        elements: [{ value: 1n }],
      });
      expect(expression('(1, "a")')).toMatchObject({
        type: 'TupleLiteral',
        elements: [{ value: 1n }, { value: 'a' }],
      });
    });

    it('accepts trailing commas', () => {
      expect(expression('[1, 2,]')).toMatchObject({
        type: 'ArrayLiteral',
        elements: [{ value: 1n }, { value: 2n }],
      });
      expect(expression('{"a": 1,}')).toMatchObject({
        type: 'HashMapLiteral',
        entries: [{ key: { value: 'a' }, value: { value: 1n } }],
      });
    });

    it('parses scalar literals', () => {
      expect(expression('2.5')).toMatchObject({
        type: 'FloatLiteral',
        value: 2.5,
      });
      expect(expression('False')).toMatchObject({
        type: 'BoolLiteral',
        value: false,
      });
      expect(expression('"s"')).toMatchObject({
        type: 'StringLiteral',
        value: 's',
      });
    });
  });

  describe('statements', () => {
    it('parses let and const', () => {
      expect(firstStatement('let x = 1')).toMatchObject({
        type: 'LetDecl',
        name: 'x',
        constant: false,
      });
      expect(firstStatement('const y = 2')).toMatchObject({
        type: 'LetDecl',
        name: 'y',
        constant: true,
      });
    });

    it('treats semicolons as optional separators', () => {
      expect(parse('let a = 1; let b = 2;; a').statements).toHaveLength(3);
      expect(parse('let a = 1\nlet b = 2').statements).toHaveLength(2);
    });

    it('parses if / elif / else', () => {
      expect(
        firstStatement('if a { 1 } elif b { 2 } elif c { 3 } else { 4 }')
      ).toMatchObject({
        type: 'If',
        condition: { name: 'a' },
        elifs: [{ condition: { name: 'b' } }, { condition: { name: 'c' } }],
        elseBody: [{ type: 'ExpressionStatement' }],
      });
      expect(firstStatement('if a { }')).toMatchObject({
        elifs: [],
        elseBody: null,
      });
    });

    it('parses loops', () => {
      expect(firstStatement('while x < 3 { x = x + 1 }')).toMatchObject({
        type: 'While',
        body: [{ type: 'ExpressionStatement' }],
      });
      expect(firstStatement('loop { break }')).toMatchObject({
        type: 'Loop',
        body: [{ type: 'Break' }],
      });
      expect(firstStatement('for x in xs { continue }')).toMatchObject({
        type: 'For',
        names: ['x'],
        iterable: { name: 'xs' },
        body: [{ type: 'Continue' }],
      });
      expect(firstStatement('for k, v in m { }')).toMatchObject({
        names: ['k', 'v'],
      });
    });

    it('parses return with and without a value', () => {
      expect(firstStatement('fn f() { return }')).toMatchObject({
        body: [{ type: 'Return', value: null }],
      });
      expect(firstStatement('fn f() { return 1; }')).toMatchObject({
        body: [{ type: 'Return', value: { value: 1n } }],
      });
    });

    it('parses del and import', () => {
      expect(firstStatement('del x')).toMatchObject({
        type: 'Delete',
        name: 'x',
      });
      expect(firstStatement('import "lib/util.tn" as util')).toMatchObject({
        type: 'Import',
        path: 'lib/util.tn',
        alias: 'util',
      });
    });

    it('parses functions and discards annotations', () => {
      const fn = firstStatement(
        'fn f(a: [Int], b: (Int, String), c: Result[Int, String], d: HashMap, e) -> Tuple { return a }'
      );
      expect(fn).toMatchObject({
        type: 'FunctionDecl',
        name: 'f',
        params: ['a', 'b', 'c', 'd', 'e'],
        body: [{ type: 'Return' }],
      });
    });

    it('records source spans', () => {
      expect(firstStatement('  let x = 10').span).toEqual({
        start: { line: 1, column: 3, offset: 2 },
        end: { line: 1, column: 13, offset: 12 },
      });
    });
  });

  it('parseTokens accepts a token list', () => {
    const script = parseTokens(tokenize('1; 2'));
    expect(script.type).toBe('Script');
    expect(script.statements).toHaveLength(2);
  });
});
