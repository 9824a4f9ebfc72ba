/**
 * os Module
 *
 * Filesystem, working directory and environment access for
 * `import "os" as os`. Relative paths resolve against the process
 * working directory.
 */

import * as fs from 'node:fs';
import { RuntimeError, TERN_ERROR_CODES } from '../../types.js';
import type { BuiltinFn } from '../core/callable.js';
import {
  createModuleRecord,
  expectArgCount,
  stringArg,
} from '../core/callable.js';
import type { HashMapValue, TernValue } from '../core/values.js';
import { array, bool, NULL, string } from '../core/values.js';

/**
 * Run a filesystem operation, reporting failures as `os.<name> error:`.
 */
function osCall<T>(name: string, operation: () => T): T {
  try {
    return operation();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RuntimeError(
      TERN_ERROR_CODES.RUNTIME_HOST_ERROR,
      `os.${name} error: ${message}`,
      undefined,
      { functionName: `os.${name}` }
    );
  }
}

/** Single string path argument */
function pathArg(name: string, args: TernValue[]): string {
  expectArgCount(name, args, 1);
  return stringArg(name, args, 0);
}

/** Stat without throwing; undefined when the path does not exist */
function statOrUndefined(target: string): fs.Stats | undefined {
  return fs.statSync(target, { throwIfNoEntry: false });
}

const OS_FUNCTIONS: Record<string, BuiltinFn> = {
  get_cwd: (args) => {
    expectArgCount('get_cwd', args, 0);
    return string(osCall('get_cwd', () => process.cwd()));
  },

  set_cwd: (args) => {
    const target = pathArg('set_cwd', args);
    osCall('set_cwd', () => process.chdir(target));
    return NULL;
  },

  /** Entry names, sorted */
  list_dir: (args) => {
    const target = pathArg('list_dir', args);
    const names = osCall('list_dir', () => fs.readdirSync(target));
    return array(names.sort().map((name) => string(name)));
  },

  /** Creates parent directories as needed */
  make_dir: (args) => {
    const target = pathArg('make_dir', args);
    osCall('make_dir', () => fs.mkdirSync(target, { recursive: true }));
    return NULL;
  },

  /** Removes the directory and everything in it */
  remove_dir: (args) => {
    const target = pathArg('remove_dir', args);
    osCall('remove_dir', () => {
      if (!statOrUndefined(target)?.isDirectory()) {
        throw new Error(`not a directory: ${target}`);
      }
      fs.rmSync(target, { recursive: true });
    });
    return NULL;
  },

  remove_file: (args) => {
    const target = pathArg('remove_file', args);
    osCall('remove_file', () => fs.unlinkSync(target));
    return NULL;
  },

  rename: (args) => {
    expectArgCount('rename', args, 2);
    const from = stringArg('rename', args, 0);
    const to = stringArg('rename', args, 1);
    osCall('rename', () => fs.renameSync(from, to));
    return NULL;
  },

  exists: (args) => {
    const target = pathArg('exists', args);
    return bool(statOrUndefined(target) !== undefined);
  },

  is_file: (args) => {
    const target = pathArg('is_file', args);
    return bool(statOrUndefined(target)?.isFile() ?? false);
  },

  is_dir: (args) => {
    const target = pathArg('is_dir', args);
    return bool(statOrUndefined(target)?.isDirectory() ?? false);
  },

  read_file: (args) => {
    const target = pathArg('read_file', args);
    return string(osCall('read_file', () => fs.readFileSync(target, 'utf-8')));
  },

  write_file: (args) => {
    expectArgCount('write_file', args, 2);
    const target = stringArg('write_file', args, 0);
    const content = stringArg('write_file', args, 1);
    osCall('write_file', () => fs.writeFileSync(target, content, 'utf-8'));
    return NULL;
  },

  /** None when the variable is unset */
  env_get: (args) => {
    expectArgCount('env_get', args, 1);
    const value = process.env[stringArg('env_get', args, 0)];
    return value === undefined ? NULL : string(value);
  },

  env_set: (args) => {
    expectArgCount('env_set', args, 2);
    const key = stringArg('env_set', args, 0);
    const value = stringArg('env_set', args, 1);
    process.env[key] = value;
    return NULL;
  },
};

/** Build a fresh `os` module record */
export function createOsModule(): HashMapValue {
  return createModuleRecord(OS_FUNCTIONS);
}
