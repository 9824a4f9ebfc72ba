/**
 * Built-in Module Table
 *
 * Modules importable by name. Each import gets a freshly built record.
 *
 * @internal - Not part of public API
 */

import type { ModuleFactory } from '../core/types.js';
import { createOsModule } from './os.js';
import { createRegexModule } from './regex.js';

export const BUILTIN_MODULES: Record<string, ModuleFactory> = {
  os: createOsModule,
  regex: createRegexModule,
};
