/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '==': TOKEN_TYPES.EQ,
  '!=': TOKEN_TYPES.NE,
  '<=': TOKEN_TYPES.LE,
  '>=': TOKEN_TYPES.GE,
  '->': TOKEN_TYPES.ARROW,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '=': TOKEN_TYPES.ASSIGN,
  '<': TOKEN_TYPES.LT,
  '>': TOKEN_TYPES.GT,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
  ',': TOKEN_TYPES.COMMA,
  ':': TOKEN_TYPES.COLON,
  '.': TOKEN_TYPES.DOT,
  ';': TOKEN_TYPES.SEMICOLON,
};

/** Keyword lookup table */
export const KEYWORDS: Record<string, TokenType> = {
  let: TOKEN_TYPES.LET,
  const: TOKEN_TYPES.CONST,
  fn: TOKEN_TYPES.FN,
  import: TOKEN_TYPES.IMPORT,
  as: TOKEN_TYPES.AS,
  return: TOKEN_TYPES.RETURN,
  del: TOKEN_TYPES.DEL,
  pub: TOKEN_TYPES.PUB,
  if: TOKEN_TYPES.IF,
  elif: TOKEN_TYPES.ELIF,
  else: TOKEN_TYPES.ELSE,
  while: TOKEN_TYPES.WHILE,
  for: TOKEN_TYPES.FOR,
  in: TOKEN_TYPES.IN,
  loop: TOKEN_TYPES.LOOP,
  break: TOKEN_TYPES.BREAK,
  continue: TOKEN_TYPES.CONTINUE,
  spawn: TOKEN_TYPES.SPAWN,
  wait: TOKEN_TYPES.WAIT,
  and: TOKEN_TYPES.AND,
  or: TOKEN_TYPES.OR,
  not: TOKEN_TYPES.NOT,
  True: TOKEN_TYPES.TRUE,
  False: TOKEN_TYPES.FALSE,
  Int: TOKEN_TYPES.TYPE_NAME,
  Float: TOKEN_TYPES.TYPE_NAME,
  String: TOKEN_TYPES.TYPE_NAME,
  Bool: TOKEN_TYPES.TYPE_NAME,
  Array: TOKEN_TYPES.TYPE_NAME,
  Tuple: TOKEN_TYPES.TYPE_NAME,
  HashMap: TOKEN_TYPES.TYPE_NAME,
};
