/**
 * Interactive REPL
 *
 * Each line is parsed and run against one long-lived runtime context, so
 * bindings persist between lines. Errors are reported and the session
 * continues. Code lines and `input()` come from the same line source.
 */

import { tokenize } from './lexer/index.js';
import { parseTokens } from './parser/index.js';
import {
  createRuntimeContext,
  execute,
  getStdinReader,
} from './runtime/index.js';
import type { RuntimeContext } from './runtime/index.js';
import { ExitError } from './types.js';
import { formatError, formatOutput, formatToken } from './cli-shared.js';

export const REPL_PROMPT = '>>> ';

/** Line source and output sinks for a session */
export interface ReplIO {
  /** Next input line after showing the prompt; null at end of input */
  readLine(prompt: string): string | null;
  write(text: string): void;
  writeError(text: string): void;
}

export interface ReplOptions {
  /** Dump each line's tokens to the error sink */
  debug?: boolean;
  /** Directory for resolving relative imports */
  basePath?: string;
}

export class ReplSession {
  private readonly ctx: RuntimeContext;

  constructor(
    private readonly io: ReplIO,
    private readonly options: ReplOptions = {}
  ) {
    this.ctx = createRuntimeContext({
      ...(options.basePath !== undefined && { basePath: options.basePath }),
      callbacks: {
        onLog: (line) => io.write(`${line}\n`),
        onInput: (prompt) => io.readLine(prompt),
      },
    });
  }

  /**
   * Run one line of input.
   * Returns false when the session should end. ExitError propagates.
   */
  evaluate(line: string): boolean {
    const input = line.trim();
    if (input === '') return true;
    if (input === 'exit') return false;

    try {
      const tokens = tokenize(input);
      if (this.options.debug) {
        for (const token of tokens) {
          this.io.writeError(`${formatToken(token)}\n`);
        }
      }
      const result = execute(parseTokens(tokens), this.ctx);
      const echo = formatOutput(result.value);
      if (echo !== undefined) {
        this.io.write(`${echo}\n`);
      }
    } catch (err) {
      if (err instanceof ExitError) throw err;
      const error = err instanceof Error ? err : new Error(String(err));
      this.io.writeError(`${formatError(error)}\n`);
    }
    return true;
  }
}

/**
 * Run a session until `exit` or end of input.
 * Returns the process exit code; exit() inside the session ends it with
 * that code.
 */
export function runReplSession(
  session: ReplSession,
  io: ReplIO
): number {
  try {
    for (;;) {
      const line = io.readLine(REPL_PROMPT);
      if (line === null || !session.evaluate(line)) break;
    }
  } catch (err) {
    if (err instanceof ExitError) return err.exitCode;
    throw err;
  }
  return 0;
}

/**
 * Run the REPL on stdin/stdout.
 * Returns the process exit code.
 */
export function startRepl(options: ReplOptions = {}): number {
  const reader = getStdinReader();
  const io: ReplIO = {
    readLine: (prompt) => reader.readLine(prompt),
    write: (text) => process.stdout.write(text),
    writeError: (text) => process.stderr.write(text),
  };

  console.log('Welcome to the Tern REPL!');
  console.log("To exit, type 'exit' or press Ctrl+D");
  const code = runReplSession(new ReplSession(io, options), io);
  process.stdout.write('\n');
  return code;
}
