/**
 * Tern Lexer Tests
 * Token classification, positions and lexical errors
 */

import { describe, expect, it } from 'vitest';

import {
  LexerError,
  TERN_ERROR_CODES,
  tokenize,
  type Token,
} from '../../src/index.js';

function types(source: string): string[] {
  return tokenize(source).map((t) => t.type);
}

function lexError(source: string): LexerError {
  try {
    tokenize(source);
  } catch (err) {
    if (err instanceof LexerError) return err;
    throw err;
  }
  throw new Error('Expected a LexerError');
}

describe('Tern Lexer', () => {
  describe('tokens', () => {
    it('tokenizes a declaration with positions', () => {
      const tokens = tokenize('let x = 42');
      expect(
        tokens.map((t) => [t.type, t.value, t.span.start.column])
      ).toEqual([
        ['LET', 'let', 1],
        ['IDENTIFIER', 'x', 5],
        ['ASSIGN', '=', 7],
        ['INTEGER', '42', 9],
        ['EOF', '', 11],
      ]);
    });

    it('always ends with EOF', () => {
      expect(types('')).toEqual(['EOF']);
      expect(types('   \n\t ')).toEqual(['EOF']);
    });

    it('matches two-character operators before single ones', () => {
      expect(types('== != <= >= -> = < > - !=')).toEqual([
        'EQ',
        'NE',
        'LE',
        'GE',
        'ARROW',
        'ASSIGN',
        'LT',
        'GT',
        'MINUS',
        'NE',
        'EOF',
      ]);
    });

    it('classifies punctuation', () => {
      expect(types('( ) { } [ ] , : . ; + * /')).toEqual([
        'LPAREN',
        'RPAREN',
        'LBRACE',
        'RBRACE',
        'LBRACKET',
        'RBRACKET',
        'COMMA',
        'COLON',
        'DOT',
        'SEMICOLON',
        'PLUS',
        'STAR',
        'SLASH',
        'EOF',
      ]);
    });

    it('maps keywords, booleans and type names', () => {
      expect(types('fn return True False Int HashMap pub spawn wait')).toEqual(
        [
          'FN',
          'RETURN',
          'TRUE',
          'FALSE',
          'TYPE_NAME',
          'TYPE_NAME',
          'PUB',
          'SPAWN',
          'WAIT',
          'EOF',
        ]
      );
    });

    it('treats lowercase true as an identifier', () => {
      expect(types('true')).toEqual(['IDENTIFIER', 'EOF']);
    });

    it('reads unicode identifiers', () => {
      const [first, second] = tokenize('café _x1');
      expect(first?.value).toBe('café');
      expect(second?.value).toBe('_x1');
    });

    it('skips comments anywhere', () => {
      const tokens = tokenize('1 // one\n// full line\n2');
      expect(tokens.map((t) => t.value)).toEqual(['1', '2', '']);
      expect(tokens[1]?.span.start.line).toBe(3);
    });

    it('reads integers and floats', () => {
      expect(tokenize('7 3.25 10.').map((t) => [t.type, t.value])).toEqual([
        ['INTEGER', '7'],
        ['FLOAT', '3.25'],
        ['FLOAT', '10.'],
        ['EOF', ''],
      ]);
    });

    it('accepts the largest 64-bit integer', () => {
      expect(tokenize('9223372036854775807')[0]?.type).toBe('INTEGER');
    });

    it('keeps string contents raw and allows newlines', () => {
      const tokens = tokenize('"a\\nb\nc" x');
      expect(tokens[0]?.value).toBe('a\\nb\nc');
      expect(tokens[1]?.span.start).toEqual({ line: 2, column: 4, offset: 9 });
    });
  });

  describe('literal lexemes', () => {
    it('source spans reproduce each literal', () => {
      const source = '42 3.5 "hi there" True False';
      const literals = tokenize(source).filter(
        (t: Token) => t.type !== 'EOF'
      );
      expect(
        literals.map((t) =>
          source.slice(t.span.start.offset, t.span.end.offset)
        )
      ).toEqual(['42', '3.5', '"hi there"', 'True', 'False']);
      expect(literals.map((t) => t.value)).toEqual([
        '42',
        '3.5',
        'hi there',
        'True',
        'False',
      ]);
    });
  });

  describe('errors', () => {
    it('rejects unexpected characters', () => {
      const err = lexError('let x = @');
      expect(err.code).toBe(TERN_ERROR_CODES.LEX_UNEXPECTED_CHAR);
      expect(err.message).toBe('Unexpected character: @ at 1:9');
      expect(err.location).toEqual({ line: 1, column: 9, offset: 8 });
    });

    it('rejects a lone !', () => {
      expect(lexError('a ! b').message).toBe('Unexpected character: ! at 1:3');
    });

    it('reports unterminated strings at the opening quote', () => {
      const err = lexError('x = "abc');
      expect(err.code).toBe(TERN_ERROR_CODES.LEX_UNTERMINATED_STRING);
      expect(err.message).toBe('Unterminated string literal at 1:5');
    });

    it('rejects a second decimal point', () => {
      const err = lexError('1.2.3');
      expect(err.code).toBe(TERN_ERROR_CODES.LEX_INVALID_NUMBER);
      expect(err.message).toBe('Invalid number: 1.2. at 1:1');
    });

    it('rejects integer literals outside 64 bits', () => {
      expect(lexError('9223372036854775808').message).toBe(
        'Integer literal out of range: 9223372036854775808 at 1:1'
      );
    });

    it('tracks lines in error locations', () => {
      expect(lexError('1\n  #').message).toBe('Unexpected character: # at 2:3');
    });
  });
});
