/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { SourceLocation, SourceSpan, Token, TokenType } from '../types.js';
import { ParseError, TERN_ERROR_CODES, TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
}

export function createParserState(tokens: Token[]): ParserState {
  return { tokens, pos: 0 };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  return peek(state, 0);
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const token = state.tokens[state.pos + offset];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/** @internal */
export function expect(
  state: ParserState,
  type: TokenType,
  message: string
): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const hint = generateHint(type, token);
  const found = `${message}, found ${describeToken(token)}`;
  throw new ParseError(
    hint ? `${found}. ${hint}` : found,
    token.span.start,
    { expected: type, actual: token.type },
    TERN_ERROR_CODES.PARSE_UNEXPECTED_TOKEN
  );
}

/**
 * Human-readable token description for error messages.
 * @internal
 */
export function describeToken(token: Token): string {
  if (token.type === TOKEN_TYPES.EOF) return 'end of input';
  if (token.type === TOKEN_TYPES.STRING) return `"${token.value}"`;
  return `'${token.value}'`;
}

// ============================================================
// ERROR HINTS
// ============================================================

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(expectedType: TokenType, actualToken: Token): string | null {
  const actual = actualToken.type;

  // Hint for unclosed brackets/braces/parens
  if (expectedType === TOKEN_TYPES.RPAREN && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed parenthesis';
  }
  if (expectedType === TOKEN_TYPES.RBRACE && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed brace';
  }
  if (expectedType === TOKEN_TYPES.RBRACKET && actual === TOKEN_TYPES.EOF) {
    return 'Hint: Check for unclosed bracket';
  }

  // Hint for lowercase boolean literals
  if (actual === TOKEN_TYPES.IDENTIFIER) {
    const typoHints: Record<string, string> = {
      true: 'True',
      false: 'False',
      elseif: 'elif',
      function: 'fn',
      var: 'let',
    };
    const suggestion = Object.hasOwn(typoHints, actualToken.value)
      ? typoHints[actualToken.value]
      : undefined;
    if (suggestion) {
      return `Hint: Did you mean '${suggestion}'?`;
    }
  }

  // Hint for using = where a block is expected
  if (expectedType === TOKEN_TYPES.LBRACE && actual === TOKEN_TYPES.ASSIGN) {
    return "Hint: Use '==' for comparison";
  }

  return null;
}

// ============================================================
// SPAN UTILITIES
// ============================================================

/** @internal */
export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/**
 * End location of the most recently consumed token.
 * @internal
 */
export function previousEnd(state: ParserState): SourceLocation {
  const prev = state.tokens[state.pos - 1];
  return prev ? prev.span.end : current(state).span.start;
}
