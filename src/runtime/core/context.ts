/**
 * Runtime Context Factory
 *
 * Creates scopes and manages bindings along the scope chain.
 * Public API for host applications.
 */

import { BUILTIN_FUNCTIONS } from '../ext/builtins.js';
import { BUILTIN_MODULES } from '../ext/modules.js';
import { createBuiltin } from './callable.js';
import { getStdinReader } from './line-reader.js';
import type {
  Binding,
  ModuleFactory,
  ModuleState,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';
import type { TernValue } from './values.js';

const defaultCallbacks: RuntimeCallbacks = {
  onLog: (line) => {
    console.log(line);
  },
  onInput: (prompt) => getStdinReader().readLine(prompt),
};

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the Tern runtime.
 *
 * Returns the user scope. Its parent is the prelude scope holding
 * the builtins (and any host functions) as immutable bindings.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  const callbacks: RuntimeCallbacks = {
    ...defaultCallbacks,
    ...options.callbacks,
  };
  const observability = options.observability ?? {};

  const builtinModules = new Map<string, ModuleFactory>(
    Object.entries(BUILTIN_MODULES)
  );
  for (const [name, factory] of Object.entries(options.modules ?? {})) {
    builtinModules.set(name, factory);
  }

  const moduleState: ModuleState = {
    basePath: options.basePath ?? process.cwd(),
    loaded: new Set(),
    chain: new Set(),
    builtinModules,
  };

  const preludeVariables = new Map<string, Binding>();
  for (const [name, fn] of Object.entries(BUILTIN_FUNCTIONS)) {
    preludeVariables.set(name, {
      value: createBuiltin(name, fn),
      mutable: false,
    });
  }
  // Host functions (can override built-ins)
  for (const [name, fn] of Object.entries(options.functions ?? {})) {
    preludeVariables.set(name, {
      value: createBuiltin(name, fn),
      mutable: false,
    });
  }

  const prelude: RuntimeContext = {
    parent: undefined,
    variables: preludeVariables,
    isPrelude: true,
    callbacks,
    observability,
    moduleState,
  };

  const ctx = createChildContext(prelude);
  for (const [name, value] of Object.entries(options.variables ?? {})) {
    ctx.variables.set(name, { value, mutable: true });
  }
  return ctx;
}

/**
 * Create a child scope for function calls and loop iterations.
 * The child shares callbacks and module state with its parent.
 */
export function createChildContext(parent: RuntimeContext): RuntimeContext {
  return {
    parent,
    variables: new Map<string, Binding>(),
    isPrelude: false,
    callbacks: parent.callbacks,
    observability: parent.observability,
    moduleState: parent.moduleState,
  };
}

/**
 * Create the top scope for a file module.
 * It sits on the same prelude as the importer but has its own base path
 * and an empty loaded-module set.
 */
export function createModuleContext(
  importer: RuntimeContext,
  basePath: string
): RuntimeContext {
  const prelude = findPrelude(importer);
  return {
    parent: prelude,
    variables: new Map<string, Binding>(),
    isPrelude: false,
    callbacks: importer.callbacks,
    observability: importer.observability,
    moduleState: {
      basePath,
      loaded: new Set(),
      chain: importer.moduleState.chain,
      builtinModules: importer.moduleState.builtinModules,
    },
  };
}

function findPrelude(ctx: RuntimeContext): RuntimeContext {
  let scope = ctx;
  while (!scope.isPrelude && scope.parent) {
    scope = scope.parent;
  }
  return scope;
}

// ============================================================
// BINDING OPERATIONS
// ============================================================

/**
 * Define a name in this scope only.
 * Returns false if the name already exists in this scope; outer scopes
 * may hold the same name (shadowing).
 */
export function defineVariable(
  ctx: RuntimeContext,
  name: string,
  value: TernValue,
  mutable: boolean
): boolean {
  if (ctx.variables.has(name)) {
    return false;
  }
  ctx.variables.set(name, { value, mutable });
  return true;
}

/** Find the nearest binding, walking the parent chain */
export function lookupBinding(
  ctx: RuntimeContext,
  name: string
): Binding | undefined {
  let scope: RuntimeContext | undefined = ctx;
  while (scope) {
    const binding = scope.variables.get(name);
    if (binding) return binding;
    scope = scope.parent;
  }
  return undefined;
}

/**
 * Get a variable value, walking the parent chain.
 * Returns undefined if not found in any scope.
 */
export function getVariable(
  ctx: RuntimeContext,
  name: string
): TernValue | undefined {
  return lookupBinding(ctx, name)?.value;
}

/**
 * Check if a variable exists in any scope.
 */
export function hasVariable(ctx: RuntimeContext, name: string): boolean {
  return lookupBinding(ctx, name) !== undefined;
}

export type AssignResult = 'assigned' | 'undefined' | 'immutable';

/** Update the nearest binding of a name */
export function assignVariable(
  ctx: RuntimeContext,
  name: string,
  value: TernValue
): AssignResult {
  const binding = lookupBinding(ctx, name);
  if (!binding) return 'undefined';
  if (!binding.mutable) return 'immutable';
  binding.value = value;
  return 'assigned';
}

export type DeleteResult = 'deleted' | 'undefined' | 'builtin';

/**
 * Remove the nearest binding of a name.
 * Prelude bindings are shared by every module of a run and stay put.
 */
export function deleteVariable(
  ctx: RuntimeContext,
  name: string
): DeleteResult {
  let scope: RuntimeContext | undefined = ctx;
  while (scope) {
    if (scope.variables.has(name)) {
      if (scope.isPrelude) return 'builtin';
      scope.variables.delete(name);
      return 'deleted';
    }
    scope = scope.parent;
  }
  return 'undefined';
}

/**
 * Collect every binding from this scope outward, innermost first.
 * An inner binding hides outer ones of the same name. The prelude is
 * not included.
 */
export function flattenVariables(ctx: RuntimeContext): Map<string, TernValue> {
  const result = new Map<string, TernValue>();
  let scope: RuntimeContext | undefined = ctx;
  while (scope && !scope.isPrelude) {
    for (const [name, binding] of scope.variables) {
      if (!result.has(name)) {
        result.set(name, binding.value);
      }
    }
    scope = scope.parent;
  }
  return result;
}
