/**
 * Lexer State
 * Tracks position in source text during tokenization
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(source: string): LexerState {
  return {
    source,
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

/** Read the code point starting at a UTF-16 position */
function charAt(source: string, pos: number): string {
  const code = source.codePointAt(pos);
  return code === undefined ? '' : String.fromCodePoint(code);
}

/** Look ahead by whole characters (surrogate pairs count as one) */
export function peek(state: LexerState, offset = 0): string {
  let pos = state.pos;
  for (let i = 0; i < offset && pos < state.source.length; i++) {
    pos += charAt(state.source, pos).length;
  }
  return charAt(state.source, pos);
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

export function advance(state: LexerState): string {
  const ch = charAt(state.source, state.pos);
  state.pos += ch.length;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else if (ch !== '') {
    state.column++;
  }
  return ch;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
