/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TERN_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { isDigit, isIdentifierChar, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

const INT64_MAX = 2n ** 63n - 1n;

/** Strings are raw: no escape processing, newlines allowed */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening "

  let value = '';
  while (!isAtEnd(state) && peek(state) !== '"') {
    value += advance(state);
  }

  if (isAtEnd(state)) {
    throw new LexerError(
      TERN_ERROR_CODES.LEX_UNTERMINATED_STRING,
      'Unterminated string literal',
      start
    );
  }
  advance(state); // consume closing "

  return makeToken(TOKEN_TYPES.STRING, value, start, currentLocation(state));
}

export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';
  let dots = 0;

  while (!isAtEnd(state) && (isDigit(peek(state)) || peek(state) === '.')) {
    if (peek(state) === '.') {
      dots++;
      if (dots > 1) {
        throw new LexerError(
          TERN_ERROR_CODES.LEX_INVALID_NUMBER,
          `Invalid number: ${value}.`,
          start
        );
      }
    }
    value += advance(state);
  }

  if (dots === 1) {
    return makeToken(TOKEN_TYPES.FLOAT, value, start, currentLocation(state));
  }

  if (BigInt(value) > INT64_MAX) {
    throw new LexerError(
      TERN_ERROR_CODES.LEX_INVALID_NUMBER,
      `Integer literal out of range: ${value}`,
      start
    );
  }
  return makeToken(TOKEN_TYPES.INTEGER, value, start, currentLocation(state));
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  const type = Object.hasOwn(KEYWORDS, value)
    ? (KEYWORDS[value] ?? TOKEN_TYPES.IDENTIFIER)
    : TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, currentLocation(state));
}
