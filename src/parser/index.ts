/**
 * Tern Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type { ScriptNode, Token } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-script.js';
import './parser-control.js';
import './parser-functions.js';
import './parser-expr.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINT
// ============================================================

/**
 * Parse Tern source code into an AST.
 *
 * Throws LexerError or ParseError on the first error.
 *
 * @example
 * ```typescript
 * const ast = parse('let x = 1 + 2');
 * ```
 */
export function parse(source: string): ScriptNode {
  return parseTokens(tokenize(source));
}

/**
 * Parse an already tokenized program. The token list must end with EOF.
 */
export function parseTokens(tokens: Token[]): ScriptNode {
  const parser = new Parser(tokens);
  return parser.parse();
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
