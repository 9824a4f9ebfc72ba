/**
 * Tern AST Types
 * Source locations, error hierarchy, tokens and syntax tree nodes
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const TERN_ERROR_CODES = {
  // Lexer errors
  LEX_UNEXPECTED_CHAR: 'LEX_UNEXPECTED_CHAR',
  LEX_UNTERMINATED_STRING: 'LEX_UNTERMINATED_STRING',
  LEX_INVALID_NUMBER: 'LEX_INVALID_NUMBER',

  // Parse errors
  PARSE_UNEXPECTED_TOKEN: 'PARSE_UNEXPECTED_TOKEN',
  PARSE_INVALID_SYNTAX: 'PARSE_INVALID_SYNTAX',
  PARSE_INVALID_TYPE: 'PARSE_INVALID_TYPE',

  // Runtime errors
  RUNTIME_UNDEFINED_VARIABLE: 'RUNTIME_UNDEFINED_VARIABLE',
  RUNTIME_REDECLARED_VARIABLE: 'RUNTIME_REDECLARED_VARIABLE',
  RUNTIME_IMMUTABLE_ASSIGNMENT: 'RUNTIME_IMMUTABLE_ASSIGNMENT',
  RUNTIME_TYPE_ERROR: 'RUNTIME_TYPE_ERROR',
  RUNTIME_DIVISION_BY_ZERO: 'RUNTIME_DIVISION_BY_ZERO',
  RUNTIME_INTEGER_OVERFLOW: 'RUNTIME_INTEGER_OVERFLOW',
  RUNTIME_ARITY_MISMATCH: 'RUNTIME_ARITY_MISMATCH',
  RUNTIME_NOT_CALLABLE: 'RUNTIME_NOT_CALLABLE',
  RUNTIME_PROPERTY_NOT_FOUND: 'RUNTIME_PROPERTY_NOT_FOUND',
  RUNTIME_IMPORT_ERROR: 'RUNTIME_IMPORT_ERROR',
  RUNTIME_INVALID_CONTROL_FLOW: 'RUNTIME_INVALID_CONTROL_FLOW',
  RUNTIME_HOST_ERROR: 'RUNTIME_HOST_ERROR',
  RUNTIME_EXIT: 'RUNTIME_EXIT',
} as const;

export type TernErrorCode =
  (typeof TERN_ERROR_CODES)[keyof typeof TERN_ERROR_CODES];

/** Structured error data for host applications */
export interface TernErrorData {
  readonly code: TernErrorCode;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all Tern errors.
 * Provides structured data for host applications to format as needed.
 */
export class TernError extends Error {
  readonly code: TernErrorCode;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TernErrorData) {
    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'TernError';
    this.code = data.code;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TernErrorData {
    return {
      code: this.code,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TernErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/** Parse-time errors */
export class ParseError extends TernError {
  // Parse errors always point at a token
  override readonly location: SourceLocation;

  constructor(
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>,
    code: TernErrorCode = TERN_ERROR_CODES.PARSE_INVALID_SYNTAX
  ) {
    super({ code, message, location, context });
    this.name = 'ParseError';
    this.location = location;
  }
}

/** Runtime execution errors */
export class RuntimeError extends TernError {
  constructor(
    code: TernErrorCode,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'RuntimeError';
  }

  /** Create from an AST node */
  static fromNode(
    code: TernErrorCode,
    message: string,
    node?: { span: SourceSpan },
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(code, message, node?.span.start, context);
  }
}

/** Raised by exit(): unwinds the whole run with a process exit code */
export class ExitError extends TernError {
  readonly exitCode: number;

  constructor(exitCode: number) {
    super({
      code: TERN_ERROR_CODES.RUNTIME_EXIT,
      message: `Script exited with code ${exitCode}`,
    });
    this.name = 'ExitError';
    this.exitCode = exitCode;
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INTEGER: 'INTEGER',
  FLOAT: 'FLOAT',
  STRING: 'STRING',
  TRUE: 'TRUE',
  FALSE: 'FALSE',

  // Names
  IDENTIFIER: 'IDENTIFIER',
  TYPE_NAME: 'TYPE_NAME', // Int, Float, String, Bool, Array, Tuple, HashMap

  // Declaration keywords
  LET: 'LET',
  CONST: 'CONST',
  FN: 'FN',
  IMPORT: 'IMPORT',
  AS: 'AS',
  RETURN: 'RETURN',
  DEL: 'DEL',
  PUB: 'PUB',

  // Control keywords
  IF: 'IF',
  ELIF: 'ELIF',
  ELSE: 'ELSE',
  WHILE: 'WHILE',
  FOR: 'FOR',
  IN: 'IN',
  LOOP: 'LOOP',
  BREAK: 'BREAK',
  CONTINUE: 'CONTINUE',
  SPAWN: 'SPAWN',
  WAIT: 'WAIT',

  // Logical
  AND: 'AND',
  OR: 'OR',
  NOT: 'NOT',

  // Comparison
  EQ: 'EQ', // ==
  NE: 'NE', // !=
  LT: 'LT', // <
  LE: 'LE', // <=
  GT: 'GT', // >
  GE: 'GE', // >=

  // Arithmetic
  PLUS: 'PLUS',
  MINUS: 'MINUS',
  STAR: 'STAR',
  SLASH: 'SLASH',

  // Other operators
  ASSIGN: 'ASSIGN', // =
  ARROW: 'ARROW', // ->

  // Punctuation
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  LBRACE: 'LBRACE',
  RBRACE: 'RBRACE',
  LBRACKET: 'LBRACKET',
  RBRACKET: 'RBRACKET',
  COMMA: 'COMMA',
  COLON: 'COLON',
  DOT: 'DOT',
  SEMICOLON: 'SEMICOLON',

  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

// ============================================================
// AST NODE TYPES
// ============================================================

export type NodeType =
  | 'Script'
  | 'LetDecl'
  | 'FunctionDecl'
  | 'If'
  | 'ElifBranch'
  | 'While'
  | 'For'
  | 'Loop'
  | 'Return'
  | 'Break'
  | 'Continue'
  | 'Delete'
  | 'Import'
  | 'ExpressionStatement'
  | 'IntegerLiteral'
  | 'FloatLiteral'
  | 'BoolLiteral'
  | 'StringLiteral'
  | 'Identifier'
  | 'Assign'
  | 'BinaryExpr'
  | 'UnaryExpr'
  | 'Call'
  | 'DotAccess'
  | 'ArrayLiteral'
  | 'TupleLiteral'
  | 'HashMapLiteral'
  | 'HashMapEntry';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// SCRIPT STRUCTURE
// ============================================================

export interface ScriptNode extends BaseNode {
  readonly type: 'Script';
  readonly statements: StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

export type StatementNode =
  | LetDeclNode
  | FunctionDeclNode
  | IfNode
  | WhileNode
  | ForNode
  | LoopNode
  | ReturnNode
  | BreakNode
  | ContinueNode
  | DeleteNode
  | ImportNode
  | ExpressionStatementNode;

/** let x = expr / const x = expr */
export interface LetDeclNode extends BaseNode {
  readonly type: 'LetDecl';
  readonly name: string;
  readonly constant: boolean;
  readonly init: ExpressionNode;
}

/**
 * fn name(a: Int, b) -> Int { body }
 * Type annotations are validated by the parser and not kept.
 */
export interface FunctionDeclNode extends BaseNode {
  readonly type: 'FunctionDecl';
  readonly name: string;
  readonly params: string[];
  readonly body: StatementNode[];
}

export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly body: StatementNode[];
  readonly elifs: ElifBranchNode[];
  readonly elseBody: StatementNode[] | null;
}

export interface ElifBranchNode extends BaseNode {
  readonly type: 'ElifBranch';
  readonly condition: ExpressionNode;
  readonly body: StatementNode[];
}

export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly condition: ExpressionNode;
  readonly body: StatementNode[];
}

/**
 * for x in iterable { } / for k, v in map { }
 * The second name is only valid for hashmap iteration (checked at runtime).
 */
export interface ForNode extends BaseNode {
  readonly type: 'For';
  readonly names: readonly [string] | readonly [string, string];
  readonly iterable: ExpressionNode;
  readonly body: StatementNode[];
}

export interface LoopNode extends BaseNode {
  readonly type: 'Loop';
  readonly body: StatementNode[];
}

export interface ReturnNode extends BaseNode {
  readonly type: 'Return';
  readonly value: ExpressionNode | null;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface ContinueNode extends BaseNode {
  readonly type: 'Continue';
}

export interface DeleteNode extends BaseNode {
  readonly type: 'Delete';
  readonly name: string;
}

export interface ImportNode extends BaseNode {
  readonly type: 'Import';
  readonly path: string;
  readonly alias: string;
}

export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

// ============================================================
// EXPRESSIONS
// ============================================================

export type ExpressionNode =
  | LiteralNode
  | IdentifierNode
  | AssignNode
  | BinaryExprNode
  | UnaryExprNode
  | CallNode
  | DotAccessNode;

export type LiteralNode =
  | IntegerLiteralNode
  | FloatLiteralNode
  | BoolLiteralNode
  | StringLiteralNode
  | ArrayLiteralNode
  | TupleLiteralNode
  | HashMapLiteralNode;

export interface IntegerLiteralNode extends BaseNode {
  readonly type: 'IntegerLiteral';
  readonly value: bigint;
}

export interface FloatLiteralNode extends BaseNode {
  readonly type: 'FloatLiteral';
  readonly value: number;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface ArrayLiteralNode extends BaseNode {
  readonly type: 'ArrayLiteral';
  readonly elements: ExpressionNode[];
}

export interface TupleLiteralNode extends BaseNode {
  readonly type: 'TupleLiteral';
  readonly elements: ExpressionNode[];
}

/** Keys are evaluated at construction; duplicates are not rejected */
export interface HashMapLiteralNode extends BaseNode {
  readonly type: 'HashMapLiteral';
  readonly entries: HashMapEntryNode[];
}

export interface HashMapEntryNode extends BaseNode {
  readonly type: 'HashMapEntry';
  readonly key: ExpressionNode;
  readonly value: ExpressionNode;
}

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

/** name = value (right-associative, target must be a bare identifier) */
export interface AssignNode extends BaseNode {
  readonly type: 'Assign';
  readonly name: string;
  readonly value: ExpressionNode;
}

export type BinaryOp =
  | '+'
  | '-'
  | '*'
  | '/'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | 'and'
  | 'or';

export interface BinaryExprNode extends BaseNode {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export type UnaryOp = '-' | 'not';

export interface UnaryExprNode extends BaseNode {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode;
}

export interface CallNode extends BaseNode {
  readonly type: 'Call';
  readonly callee: ExpressionNode;
  readonly args: ExpressionNode[];
}

export interface DotAccessNode extends BaseNode {
  readonly type: 'DotAccess';
  readonly object: ExpressionNode;
  readonly property: string;
}

// ============================================================
// UNION TYPE FOR ALL NODES
// ============================================================

export type ASTNode =
  | ScriptNode
  | StatementNode
  | ElifBranchNode
  | ExpressionNode
  | HashMapEntryNode;
