/**
 * Project Manifest Loader
 * Loads and validates tern.yaml for `tern <project-dir>`.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';

// ============================================================
// CONSTANTS
// ============================================================

/** Manifest file name */
export const MANIFEST_FILE_NAME = 'tern.yaml';

/** Entry file used when the manifest names none */
export const DEFAULT_MAIN = 'main.tn';

// ============================================================
// TYPES
// ============================================================

export interface ProjectManifest {
  readonly name: string;
  readonly version: string;
  readonly description?: string | undefined;
  /** Entry script, relative to the project directory */
  readonly main: string;
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(data: Record<string, unknown>, field: string): string {
  const value = data[field];
  if (typeof value !== 'string' || value === '') {
    throw new Error(
      `Invalid manifest: ${field} must be a non-empty string`
    );
  }
  return value;
}

function optionalString(
  data: Record<string, unknown>,
  field: string
): string | undefined {
  const value = data[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new Error(`Invalid manifest: ${field} must be a string`);
  }
  return value;
}

/**
 * Validate parsed manifest data.
 * Throws Error if a field is missing or has the wrong type.
 */
export function validateManifest(data: unknown): ProjectManifest {
  if (!isRecord(data)) {
    throw new Error('Invalid manifest: must be a mapping');
  }

  const main = optionalString(data, 'main') ?? DEFAULT_MAIN;
  if (!main.endsWith('.tn')) {
    throw new Error(`Invalid manifest: main must name a .tn file, got "${main}"`);
  }

  return {
    name: requireString(data, 'name'),
    version: requireString(data, 'version'),
    description: optionalString(data, 'description'),
    main,
  };
}

// ============================================================
// LOADING
// ============================================================

/**
 * Check whether a directory carries a manifest.
 */
export function hasManifest(projectDir: string): boolean {
  return existsSync(join(projectDir, MANIFEST_FILE_NAME));
}

/**
 * Load the manifest from a project directory.
 * Throws Error if the file is missing, is not valid YAML, or fails validation.
 */
export function loadManifest(projectDir: string): ProjectManifest {
  const manifestPath = join(projectDir, MANIFEST_FILE_NAME);

  if (!existsSync(manifestPath)) {
    throw new Error(`No ${MANIFEST_FILE_NAME} found in ${projectDir}`);
  }

  let data: unknown;
  try {
    data = yaml.parse(readFileSync(manifestPath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to parse ${MANIFEST_FILE_NAME}: ${message}`);
  }

  return validateManifest(data);
}
