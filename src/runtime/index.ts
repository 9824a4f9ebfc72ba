/**
 * Tern Runtime
 *
 * Public API for executing Tern scripts.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - types.ts: Public types (RuntimeContext, RuntimeOptions, etc.)
 *   - callable.ts: Callable types and argument helpers for builtins
 *   - values.ts: TernValue and value utilities
 *   - signals.ts: Control flow signals
 *   - operators.ts: Operator semantics
 *   - context.ts: Runtime context factory and bindings
 *   - module-loader.ts: File module resolution
 *   - line-reader.ts: Synchronous stdin lines for the REPL and input()
 *   - execute.ts: Script execution (execute, createStepper)
 *   - eval/: Mixin-composed evaluator (internal)
 * - ext/: Self-contained extensions
 *   - builtins.ts: Prelude functions
 *   - modules.ts: Registry of built-in modules
 *   - os.ts, regex.ts: Built-in modules
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  Binding,
  ErrorEvent,
  ExecutionResult,
  ExecutionStepper,
  FunctionReturnEvent,
  HostCallEvent,
  ModuleFactory,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
  StepEndEvent,
  StepResult,
  StepStartEvent,
} from './core/types.js';

// ============================================================
// CALLABLE TYPES AND HELPERS
// ============================================================

export type { BuiltinFn, TernBuiltin, TernFunction } from './core/callable.js';

export {
  argAt,
  createBuiltin,
  createModuleRecord,
  expectArgCount,
  integerArg,
  stringArg,
} from './core/callable.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type {
  ArrayValue,
  BoolValue,
  FloatValue,
  HashMapValue,
  IntegerValue,
  NativeValue,
  NullValue,
  StringValue,
  TernTypeName,
  TernValue,
  TupleValue,
} from './core/values.js';

export {
  array,
  bool,
  FALSE,
  float,
  formatValue,
  getHashMapEntry,
  hashmap,
  hashmapFromRecord,
  inferType,
  integer,
  NULL,
  string,
  toNative,
  TRUE,
  tuple,
  valuesEqual,
} from './core/values.js';

// ============================================================
// CONTROL FLOW SIGNALS
// ============================================================

export type { ControlFlow } from './core/signals.js';

// ============================================================
// CONTEXT FACTORY AND BINDINGS
// ============================================================

export type { AssignResult, DeleteResult } from './core/context.js';

export {
  assignVariable,
  createChildContext,
  createRuntimeContext,
  defineVariable,
  deleteVariable,
  flattenVariables,
  getVariable,
  hasVariable,
} from './core/context.js';

// ============================================================
// SCRIPT EXECUTION
// ============================================================

export { createStepper, execute } from './core/execute.js';
export { getStdinReader, LineReader } from './core/line-reader.js';

// ============================================================
// BUILT-IN MODULES
// ============================================================

export { createOsModule } from './ext/os.js';
export { createRegexModule } from './ext/regex.js';
