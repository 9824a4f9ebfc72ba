/**
 * regex Module
 *
 * Pattern matching for `import "regex" as re`. Patterns compile in
 * Unicode mode. The `(?P<name>...)` group form and `${name}` replacement
 * references are accepted alongside `(?<name>...)` and `$<name>`.
 */

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
 * Compile a pattern.
 * @throws RuntimeError(RUNTIME_HOST_ERROR) prefixed `regex error:`
 */
export function compilePattern(pattern: string, global = false): RegExp {
  const source = pattern.replace(/\(\?P</g, '(?<');
  try {
    return new RegExp(source, global ? 'gu' : 'u');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new RuntimeError(
      TERN_ERROR_CODES.RUNTIME_HOST_ERROR,
      `regex error: ${message}`,
      undefined,
      { pattern }
    );
  }
}

/** `${1}` becomes `$1`, `${name}` becomes `$<name>` */
function translateReplacement(replacement: string): string {
  return replacement.replace(/\$\{(\w+)\}/g, (_match, ref: string) =>
    /^\d+$/.test(ref) ? `$${ref}` : `$<${ref}>`
  );
}

/** (pattern, text) argument pair */
function patternAndText(
  name: string,
  args: TernValue[]
): { pattern: string; text: string } {
  expectArgCount(name, args, 2);
  return {
    pattern: stringArg(name, args, 0),
    text: stringArg(name, args, 1),
  };
}

const REGEX_FUNCTIONS: Record<string, BuiltinFn> = {
  /** Whole match then each group (None if unmatched), or None */
  match: (args) => {
    const { pattern, text } = patternAndText('match', args);
    const result = compilePattern(pattern).exec(text);
    if (!result) return NULL;
    return array(
      Array.from(result, (group) =>
        group === undefined ? NULL : string(group)
      )
    );
  },

  is_match: (args) => {
    const { pattern, text } = patternAndText('is_match', args);
    return bool(compilePattern(pattern).test(text));
  },

  /** Every non-overlapping whole match, left to right */
  find_all: (args) => {
    const { pattern, text } = patternAndText('find_all', args);
    const matches = text.matchAll(compilePattern(pattern, true));
    return array(Array.from(matches, (m) => string(m[0])));
  },

  /** Replace every match; `$1` and `$<name>` refer to groups */
  replace: (args) => {
    expectArgCount('replace', args, 3);
    const pattern = stringArg('replace', args, 0);
    const replacement = stringArg('replace', args, 1);
    const text = stringArg('replace', args, 2);
    return string(
      text.replace(
        compilePattern(pattern, true),
        translateReplacement(replacement)
      )
    );
  },
};

/** Build a fresh `regex` module record */
export function createRegexModule(): HashMapValue {
  return createModuleRecord(REGEX_FUNCTIONS);
}
