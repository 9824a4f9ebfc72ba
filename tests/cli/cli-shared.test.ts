/**
 * Tern CLI Tests: shared formatting
 */

import { describe, expect, it } from 'vitest';

import {
  formatError,
  formatOutput,
  formatToken,
  readVersion,
} from '../../src/cli-shared.js';
import {
  LexerError,
  NULL,
  ParseError,
  RuntimeError,
  TERN_ERROR_CODES,
  tokenize,
} from '../../src/index.js';
import { run } from '../helpers/runtime.js';

describe('Tern CLI: shared formatting', () => {
  describe('formatOutput', () => {
    it('skips None', () => {
      expect(formatOutput(NULL)).toBeUndefined();
      const printed = run('print("x")', { callbacks: { onLog: () => {} } });
      expect(formatOutput(printed)).toBeUndefined();
    });

    it('quotes strings', () => {
      expect(formatOutput(run('"a b"'))).toBe('"a b"');
    });

    it('formats other values like print', () => {
      expect(formatOutput(run('[1, True]'))).toBe('[1, True]');
      expect(formatOutput(run('7'))).toBe('7');
    });
  });

  describe('formatError', () => {
    const location = { line: 4, column: 2, offset: 30 };

    it('formats lexer errors', () => {
      const err = new LexerError(
        TERN_ERROR_CODES.LEX_UNEXPECTED_CHAR,
        'Unexpected character: @',
        { line: 1, column: 3, offset: 2 }
      );
      expect(formatError(err)).toBe(
        'Lexer error at line 1: Unexpected character: @'
      );
    });

    it('formats parse errors', () => {
      expect(formatError(new ParseError('bad', location))).toBe(
        'Parse error at line 4: bad'
      );
    });

    it('formats runtime errors with and without a location', () => {
      expect(
        formatError(
          new RuntimeError(TERN_ERROR_CODES.RUNTIME_TYPE_ERROR, 'boom', location)
        )
      ).toBe('Runtime error at line 4: boom');
      expect(
        formatError(new RuntimeError(TERN_ERROR_CODES.RUNTIME_TYPE_ERROR, 'boom'))
      ).toBe('Runtime error: boom');
    });

    it('names the module file of errors raised inside an import', () => {
      const err = new RuntimeError(
        TERN_ERROR_CODES.RUNTIME_DIVISION_BY_ZERO,
        'Division by zero',
        { line: 2, column: 9, offset: 18 },
        { modulePath: '/work/m.tn' }
      );
      expect(formatError(err)).toBe(
        'Runtime error in /work/m.tn at line 2: Division by zero'
      );
    });

    it('passes other errors through', () => {
      expect(formatError(new Error('plain'))).toBe('plain');
    });
  });

  it('formatToken prints position, type and value', () => {
    const [first] = tokenize('\n  "hi"');
    expect(first && formatToken(first)).toBe('2:3 STRING "hi"');
  });

  it('readVersion reads package.json', () => {
    expect(readVersion()).toBe('0.1.0');
  });
});
