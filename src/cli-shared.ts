/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Token } from './types.js';
import { ParseError, RuntimeError } from './types.js';
import { LexerError } from './lexer/errors.js';
import { formatValue } from './runtime/index.js';
import type { TernValue } from './runtime/index.js';

/**
 * Convert a REPL result to its echoed form.
 * None is not echoed.
 */
export function formatOutput(value: TernValue): string | undefined {
  if (value.kind === 'null') return undefined;
  if (value.kind === 'string') return JSON.stringify(value.value);
  return formatValue(value);
}

/**
 * Format error for stderr output
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location.line}: ${err.toData().message}`;
  }

  if (err instanceof ParseError) {
    const { line } = err.location;
    return `Parse error at line ${line}: ${err.toData().message}`;
  }

  if (err instanceof RuntimeError) {
    const location = err.location;
    const baseMessage = err.toData().message;
    const modulePath = err.context?.['modulePath'];
    const where = typeof modulePath === 'string' ? ` in ${modulePath}` : '';
    if (location) {
      return `Runtime error${where} at line ${location.line}: ${baseMessage}`;
    }
    return `Runtime error${where}: ${baseMessage}`;
  }

  return err.message;
}

/** One token per line for --debug */
export function formatToken(token: Token): string {
  const { line, column } = token.span.start;
  return `${line}:${column} ${token.type} ${JSON.stringify(token.value)}`;
}

/**
 * Package version, read from package.json beside the source or dist folder.
 */
export function readVersion(): string {
  const packageJsonPath = fileURLToPath(
    new URL('../package.json', import.meta.url)
  );
  if (!existsSync(packageJsonPath)) {
    return '0.0.0';
  }
  const data: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string'
  ) {
    return data.version;
  }
  return '0.0.0';
}
