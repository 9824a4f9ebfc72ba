/**
 * Parser Helpers
 * Lookahead predicates and utility parsing functions
 * @internal This module contains internal parser utilities
 */

import type { Token, TokenType } from '../types.js';
import { ParseError, TERN_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import {
  type ParserState,
  advance,
  check,
  current,
  describeToken,
  expect,
} from './state.js';

/**
 * Reserved words with no statement form.
 * @internal
 */
export const RESERVED_WORDS: readonly TokenType[] = [
  TOKEN_TYPES.PUB,
  TOKEN_TYPES.SPAWN,
  TOKEN_TYPES.WAIT,
];

/**
 * A bare `return` ends at a closing brace, a semicolon or end of input.
 * @internal
 */
export function isReturnTerminator(state: ParserState): boolean {
  return check(
    state,
    TOKEN_TYPES.RBRACE,
    TOKEN_TYPES.SEMICOLON,
    TOKEN_TYPES.EOF
  );
}

/** @internal */
export function expectIdentifier(state: ParserState, message: string): Token {
  return expect(state, TOKEN_TYPES.IDENTIFIER, message);
}

/**
 * Parse `item (, item)* ,?` up to a closing token and consume it.
 * Trailing commas are accepted.
 * @internal
 */
export function parseDelimitedList<T>(
  state: ParserState,
  close: TokenType,
  closeMessage: string,
  parseItem: () => T
): { items: T[]; end: Token } {
  const items: T[] = [];
  while (!check(state, close)) {
    items.push(parseItem());
    if (!check(state, TOKEN_TYPES.COMMA)) break;
    advance(state); // consume ,
  }
  const end = expect(state, close, closeMessage);
  return { items, end };
}

/**
 * Error for a token that cannot start the expected construct.
 * @internal
 */
export function unexpectedToken(state: ParserState, what: string): ParseError {
  const token = current(state);
  return new ParseError(
    `Unexpected token ${describeToken(token)}, expected ${what}`,
    token.span.start,
    { actual: token.type },
    TERN_ERROR_CODES.PARSE_UNEXPECTED_TOKEN
  );
}
