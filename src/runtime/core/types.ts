/**
 * Runtime Types
 *
 * Public types for runtime configuration and execution results.
 * These types are the primary interface for host applications.
 */

import type { BuiltinFn } from './callable.js';
import type { ControlFlow } from './signals.js';
import type { HashMapValue, TernValue } from './values.js';

/** A named slot in one scope */
export interface Binding {
  value: TernValue;
  readonly mutable: boolean;
}

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called with each line written by print() */
  onLog: (line: string) => void;
  /** Called by input(); returns the line read, or null at end of input */
  onInput: (prompt: string) => string | null;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before each top-level statement executes */
  onStepStart?: (event: StepStartEvent) => void;
  /** Called after each top-level statement executes */
  onStepEnd?: (event: StepEndEvent) => void;
  /** Called before a builtin function is invoked */
  onHostCall?: (event: HostCallEvent) => void;
  /** Called after a user function returns */
  onFunctionReturn?: (event: FunctionReturnEvent) => void;
  /** Called when a top-level statement fails */
  onError?: (event: ErrorEvent) => void;
}

/** Event emitted before a statement executes */
export interface StepStartEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Event emitted after a statement executes */
export interface StepEndEvent {
  /** Statement index (0-based) */
  index: number;
  /** Total statements */
  total: number;
  /** Value produced by the statement */
  value: TernValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted before a builtin call */
export interface HostCallEvent {
  /** Function name */
  name: string;
  /** Arguments passed to function */
  args: TernValue[];
}

/** Event emitted after a user function returns */
export interface FunctionReturnEvent {
  /** Function name */
  name: string;
  /** Return value */
  value: TernValue;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted on error */
export interface ErrorEvent {
  /** The error that occurred */
  error: Error;
  /** Statement index where error occurred (if available) */
  index?: number;
}

/** Builds a fresh record for a built-in module on each import */
export type ModuleFactory = () => HashMapValue;

/**
 * Import bookkeeping for one module execution.
 * Every scope created while running a module shares the same state;
 * a nested module load gets its own.
 */
export interface ModuleState {
  /** Directory that relative import paths resolve against */
  readonly basePath: string;
  /** Canonical paths already imported in this module */
  readonly loaded: Set<string>;
  /** Canonical paths of the modules currently executing, outermost first */
  readonly chain: Set<string>;
  /** Built-in modules available to `import "name" as alias` */
  readonly builtinModules: ReadonlyMap<string, ModuleFactory>;
}

/** One lexical scope plus the run-wide state it shares */
export interface RuntimeContext {
  /** Enclosing scope (undefined for the prelude) */
  readonly parent: RuntimeContext | undefined;
  /** Bindings local to this scope */
  readonly variables: Map<string, Binding>;
  /** True for the outermost scope holding the builtins */
  readonly isPrelude: boolean;
  /** I/O callbacks */
  readonly callbacks: RuntimeCallbacks;
  /** Observability callbacks */
  readonly observability: ObservabilityCallbacks;
  /** Import resolution state */
  readonly moduleState: ModuleState;
}

/** Options for creating a runtime context */
export interface RuntimeOptions {
  /** Initial variables, bound mutably in the user scope */
  variables?: Record<string, TernValue>;
  /** Extra host functions, bound immutably beside the builtins */
  functions?: Record<string, BuiltinFn>;
  /** Extra built-in modules, importable by name */
  modules?: Record<string, ModuleFactory>;
  /** Directory for resolving relative imports (default: process.cwd()) */
  basePath?: string;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks>;
  /** Observability callbacks */
  observability?: ObservabilityCallbacks;
}

/** Result of script execution */
export interface ExecutionResult {
  /** Value of the last executed top-level statement */
  value: TernValue;
  /** Signal the top-level statement list finished with */
  signal: ControlFlow;
  /** Final user variables (builtins excluded) */
  variables: Record<string, TernValue>;
}

/** Result of a single execution step */
export interface StepResult {
  /** Value of the statement just executed */
  value: TernValue;
  /** True when no statements remain or a signal ended the script */
  done: boolean;
  /** Index of the statement just executed (0-based) */
  index: number;
  /** Total statements */
  total: number;
}

/** Step-by-step execution over the top-level statements */
export interface ExecutionStepper {
  readonly done: boolean;
  readonly index: number;
  readonly total: number;
  readonly context: RuntimeContext;
  step(): StepResult;
  getResult(): ExecutionResult;
}
