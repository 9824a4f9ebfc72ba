#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), and executeScript() for the tern binary.
 * Handles file, project directory and inline execution, and starts the
 * REPL when no target is given.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { tokenize } from './lexer/index.js';
import { parseTokens } from './parser/index.js';
import { createRuntimeContext, execute } from './runtime/index.js';
import type { ExecutionResult, RuntimeCallbacks } from './runtime/index.js';
import { ExitError } from './types.js';
import { formatError, formatToken, readVersion } from './cli-shared.js';
import { hasManifest, loadManifest } from './cli-project.js';
import { startRepl } from './cli-repl.js';

/** Script file extension */
export const SCRIPT_EXTENSION = '.tn';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'exec'; target: string; debug: boolean }
  | { mode: 'eval'; code: string; debug: boolean }
  | { mode: 'repl'; debug: boolean }
  | { mode: 'help' | 'version' };

/** Options shared by every execution mode */
export interface ExecOptions {
  /** Dump tokens through onDebug before running */
  debug?: boolean;
  /** Receives --debug output (default: stderr) */
  onDebug?: (line: string) => void;
  /** I/O overrides (print output, input) */
  callbacks?: Partial<RuntimeCallbacks>;
}

export const HELP_TEXT = `Usage:
  tern                     Start the REPL
  tern <file.tn>           Run a script file
  tern <project-dir>       Run the main script named in tern.yaml
  tern -e <code>           Run code given on the command line
  tern --debug ...         Print the token stream to stderr before running
  tern --help              Show this help message
  tern --version           Show version information`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const debug = argv.includes('--debug');
  const rest = argv.filter((arg) => arg !== '--debug');

  const first = rest[0];
  if (first === undefined) {
    return { mode: 'repl', debug };
  }

  if (first === '-e') {
    const code = rest[1];
    if (code === undefined) {
      throw new Error('Missing code after -e');
    }
    if (rest.length > 2) {
      throw new Error(`Unexpected argument: ${rest[2]}`);
    }
    return { mode: 'eval', code, debug };
  }

  if (first.startsWith('-')) {
    throw new Error(`Unknown option: ${first}`);
  }
  if (rest.length > 1) {
    throw new Error(`Unexpected argument: ${rest[1]}`);
  }
  return { mode: 'exec', target: first, debug };
}

/**
 * Resolve an exec target to a script file.
 * A directory must carry tern.yaml; a file must be a non-empty .tn script.
 *
 * @throws Error if the target is not runnable
 */
export function resolveScriptPath(target: string): string {
  const stat = fs.statSync(target, { throwIfNoEntry: false });
  if (!stat) {
    throw new Error(`File not found: ${target}`);
  }

  if (stat.isDirectory()) {
    if (!hasManifest(target)) {
      throw new Error(`Directory ${target} has no tern.yaml`);
    }
    const manifest = loadManifest(target);
    return resolveScriptPath(path.join(target, manifest.main));
  }

  if (!target.endsWith(SCRIPT_EXTENSION)) {
    throw new Error(
      `File ${target} is not a valid script, it should end with ${SCRIPT_EXTENSION}`
    );
  }
  if (stat.size === 0) {
    throw new Error(`Script ${target} is empty`);
  }
  return target;
}

/**
 * Lex, parse and run source text.
 *
 * @param source - Script source
 * @param basePath - Directory for resolving relative imports
 */
export function executeSource(
  source: string,
  basePath: string,
  options: ExecOptions = {}
): ExecutionResult {
  const tokens = tokenize(source);
  if (options.debug) {
    const onDebug =
      options.onDebug ?? ((line: string) => process.stderr.write(`${line}\n`));
    for (const token of tokens) {
      onDebug(formatToken(token));
    }
  }

  const ctx = createRuntimeContext({
    basePath,
    ...(options.callbacks && { callbacks: options.callbacks }),
  });
  return execute(parseTokens(tokens), ctx);
}

/**
 * Execute a Tern script file or project directory
 *
 * @param target - Script path or project directory
 * @returns Execution result with value and variables
 * @throws Error if the target is not runnable or execution fails
 */
export function executeScript(
  target: string,
  options: ExecOptions = {}
): ExecutionResult {
  const scriptPath = path.resolve(resolveScriptPath(target));
  const source = fs.readFileSync(scriptPath, 'utf-8');
  return executeSource(source, path.dirname(scriptPath), options);
}

/**
 * Entry point for the tern binary
 *
 * Parses command-line arguments and runs the requested mode.
 * Script output goes to stdout and errors to stderr.
 * Resolves with the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(HELP_TEXT);
        return 0;

      case 'version':
        console.log(readVersion());
        return 0;

      case 'repl':
        return startRepl({ debug: parsed.debug });

      case 'eval':
        executeSource(parsed.code, process.cwd(), { debug: parsed.debug });
        return 0;

      case 'exec':
        executeScript(parsed.target, { debug: parsed.debug });
        return 0;
    }
  } catch (err) {
    if (err instanceof ExitError) {
      return err.exitCode;
    }
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(formatError(error));
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main(process.argv.slice(2)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    }
  );
}
