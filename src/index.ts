/**
 * Tern Module
 * Exports lexer, parser, runtime, and AST types
 */

export { LexerError, tokenize } from './lexer/index.js';
export { parse, parseTokens } from './parser/index.js';
export {
  argAt,
  array,
  assignVariable,
  type AssignResult,
  type ArrayValue,
  type Binding,
  bool,
  type BoolValue,
  type BuiltinFn,
  type ControlFlow,
  createBuiltin,
  createChildContext,
  createModuleRecord,
  createOsModule,
  createRegexModule,
  createRuntimeContext,
  createStepper,
  defineVariable,
  deleteVariable,
  type DeleteResult,
  type ErrorEvent,
  execute,
  type ExecutionResult,
  type ExecutionStepper,
  expectArgCount,
  FALSE,
  flattenVariables,
  float,
  type FloatValue,
  formatValue,
  type FunctionReturnEvent,
  getHashMapEntry,
  getStdinReader,
  getVariable,
  hashmap,
  hashmapFromRecord,
  type HashMapValue,
  hasVariable,
  type HostCallEvent,
  inferType,
  integer,
  integerArg,
  type IntegerValue,
  LineReader,
  type ModuleFactory,
  type NativeValue,
  NULL,
  type NullValue,
  type ObservabilityCallbacks,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
  string,
  stringArg,
  type StringValue,
  type TernBuiltin,
  type TernFunction,
  type TernTypeName,
  type TernValue,
  toNative,
  TRUE,
  tuple,
  type TupleValue,
  valuesEqual,
} from './runtime/index.js';

export * from './types.js';
