/**
 * Module Loader
 *
 * Resolves `import "path"` targets to canonical file paths and parses
 * their source. Every failure is reported as RUNTIME_IMPORT_ERROR naming
 * the import path as written.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { ScriptNode, SourceLocation } from '../../types.js';
import { RuntimeError, TernError, TERN_ERROR_CODES } from '../../types.js';
import { parse } from '../../parser/index.js';

function importError(
  importPath: string,
  reason: string,
  location?: SourceLocation
): RuntimeError {
  return new RuntimeError(
    TERN_ERROR_CODES.RUNTIME_IMPORT_ERROR,
    `Cannot import '${importPath}': ${reason}`,
    location,
    { importPath }
  );
}

/**
 * Resolve an import path against a base directory and canonicalize it
 * (symlinks resolved).
 * @throws RuntimeError(RUNTIME_IMPORT_ERROR) if the file does not exist
 */
export function resolveModulePath(
  basePath: string,
  importPath: string,
  location?: SourceLocation
): string {
  const absolutePath = path.resolve(basePath, importPath);
  try {
    return fs.realpathSync(absolutePath);
  } catch {
    throw importError(importPath, 'file not found', location);
  }
}

/**
 * Read and parse a module file.
 * @throws RuntimeError(RUNTIME_IMPORT_ERROR) on read, lex or parse failure
 */
export function loadModuleAst(
  canonicalPath: string,
  importPath: string,
  location?: SourceLocation
): ScriptNode {
  let source: string;
  try {
    source = fs.readFileSync(canonicalPath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw importError(importPath, reason, location);
  }

  try {
    return parse(source);
  } catch (err) {
    if (err instanceof TernError) {
      throw importError(importPath, err.message, location);
    }
    throw err;
  }
}

/**
 * Error for an import that is already executing further up the chain.
 */
export function circularImportError(
  chain: Set<string>,
  canonicalPath: string,
  importPath: string,
  location?: SourceLocation
): RuntimeError {
  const cycle = [...chain, canonicalPath].join(' -> ');
  return importError(
    importPath,
    `circular dependency detected: ${cycle}`,
    location
  );
}
