/**
 * Tern Runtime Tests: os Module
 * Filesystem and environment access, run against a temporary directory
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import * as fs from 'node:fs';
import * as nodeOs from 'node:os';
import * as path from 'node:path';

import { runNative } from '../helpers/runtime.js';
import {
  createOsModule,
  getHashMapEntry,
  RuntimeError,
  string,
  TERN_ERROR_CODES,
} from '../../src/index.js';

const ENV_KEY = 'TERN_OS_MODULE_TEST';

describe('Tern Runtime: os Module', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.realpathSync(
      fs.mkdtempSync(path.join(nodeOs.tmpdir(), 'tern-os-'))
    );
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    delete process.env[ENV_KEY];
  });

  /** Run with the os module imported on line 1 */
  function runOs(body: string) {
    return runNative(`import "os" as os\n${body}`);
  }

  function osError(body: string): RuntimeError {
    try {
      runOs(body);
    } catch (err) {
      if (err instanceof RuntimeError) return err;
      throw err;
    }
    throw new Error('Expected a RuntimeError');
  }

  function p(name: string): string {
    return path.join(tempDir, name);
  }

  it('builds a fresh record on each import', () => {
    const first = createOsModule();
    const second = createOsModule();
    expect(first).not.toBe(second);
    expect(getHashMapEntry(first, string('read_file'))?.kind).toBe('builtin');
  });

  describe('files', () => {
    it('writes and reads files', () => {
      expect(
        runOs(`os.write_file("${p('a.txt')}", "data")\nos.read_file("${p('a.txt')}")`)
      ).toBe('data');
      expect(fs.readFileSync(p('a.txt'), 'utf-8')).toBe('data');
    });

    it('checks existence and kind', () => {
      fs.writeFileSync(p('f.txt'), '');
      expect(runOs(`os.exists("${p('f.txt')}")`)).toBe(true);
      expect(runOs(`os.exists("${p('nope')}")`)).toBe(false);
      expect(runOs(`os.is_file("${p('f.txt')}")`)).toBe(true);
      expect(runOs(`os.is_dir("${p('f.txt')}")`)).toBe(false);
      expect(runOs(`os.is_dir("${tempDir}")`)).toBe(true);
      expect(runOs(`os.is_file("${p('nope')}")`)).toBe(false);
    });

    it('renames and removes files', () => {
      fs.writeFileSync(p('old.txt'), 'x');
      runOs(`os.rename("${p('old.txt')}", "${p('new.txt')}")`);
      expect(fs.existsSync(p('new.txt'))).toBe(true);
      expect(fs.existsSync(p('old.txt'))).toBe(false);

      runOs(`os.remove_file("${p('new.txt')}")`);
      expect(fs.existsSync(p('new.txt'))).toBe(false);
    });

    it('reports failures with the function name', () => {
      const err = osError(`os.read_file("${p('missing.txt')}")`);
      expect(err.code).toBe(TERN_ERROR_CODES.RUNTIME_HOST_ERROR);
      expect(err.message).toMatch(/^os\.read_file error: ENOENT/);
      expect(err.location?.line).toBe(2);
    });
  });

  describe('directories', () => {
    it('creates nested directories and lists entries sorted', () => {
      runOs(`os.make_dir("${p('d/e')}")`);
      fs.writeFileSync(p('d/b.txt'), '');
      fs.writeFileSync(p('d/a.txt'), '');
      expect(runOs(`os.list_dir("${p('d')}")`)).toEqual(['a.txt', 'b.txt', 'e']);
    });

    it('removes directories recursively', () => {
      fs.mkdirSync(p('tree/sub'), { recursive: true });
      fs.writeFileSync(p('tree/sub/leaf.txt'), '');
      runOs(`os.remove_dir("${p('tree')}")`);
      expect(fs.existsSync(p('tree'))).toBe(false);
    });

    it('remove_dir rejects a missing directory', () => {
      expect(osError(`os.remove_dir("${p('ghost')}")`).message).toBe(
        `os.remove_dir error: not a directory: ${p('ghost')} at 2:1`
      );
    });

    it('gets and sets the working directory', () => {
      const original = process.cwd();
      try {
        expect(runOs(`os.set_cwd("${tempDir}")\nos.get_cwd()`)).toBe(tempDir);
      } finally {
        process.chdir(original);
      }
      expect(runOs('os.get_cwd()')).toBe(original);
    });
  });

  describe('environment', () => {
    it('returns None for unset variables', () => {
      expect(runOs(`os.env_get("${ENV_KEY}")`)).toBe(null);
    });

    it('sets and reads variables', () => {
      expect(runOs(`os.env_set("${ENV_KEY}", "on")\nos.env_get("${ENV_KEY}")`)).toBe('on');
      expect(process.env[ENV_KEY]).toBe('on');
    });
  });

  it('checks argument kinds', () => {
    expect(osError('os.exists(1)').message).toBe(
      'exists() argument 1 must be String, got Integer at 2:1'
    );
  });
});
