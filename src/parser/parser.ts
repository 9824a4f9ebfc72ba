/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type { ScriptNode, Token } from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into an AST.
 *
 * Methods are organized across multiple files:
 * - parser-script.ts: Script and simple statements
 * - parser-control.ts: Blocks, conditionals, loops
 * - parser-functions.ts: Function declarations, annotations, calls
 * - parser-expr.ts: Assignment and the binary precedence chain
 * - parser-literals.ts: Primary expressions and composite literals
 *
 * The first syntax error is thrown as a ParseError; there is no recovery.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokens);
 * const ast = parser.parse();
 * ```
 */
export class Parser {
  /** Parser state: tokens and cursor position */
  state: ParserState;

  constructor(tokens: Token[]) {
    this.state = createParserState(tokens);
  }

  /**
   * Parse tokens into a complete AST.
   */
  parse(): ScriptNode {
    return this.parseScript();
  }
}
