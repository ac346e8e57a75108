/**
 * Tern AST Types
 *
 * Every node family is a closed union discriminated on `type`. Expression
 * nodes carry a `resolvedType` slot: `undefined` in parser output, a `Type`
 * once the analyzer has produced the typed tree. The slot is threaded
 * through statements and declarations so `Program<Type>` only holds typed
 * expressions.
 */

import type { SourceSpan } from './source-location.js';
import type { PrimitiveKind, Type } from './value-types.js';

/** `undefined` before analysis, `Type` after */
export type TypeSlot = Type | undefined;

interface BaseNode {
  readonly span: SourceSpan;
}

interface ExprBase<T extends TypeSlot> extends BaseNode {
  readonly resolvedType: T;
}

// ============================================================
// TYPE ANNOTATIONS
// ============================================================

export interface PrimitiveTypeRef extends BaseNode {
  readonly type: 'PrimitiveTypeRef';
  readonly name: PrimitiveKind;
}

/** [T] */
export interface ListTypeRef extends BaseNode {
  readonly type: 'ListTypeRef';
  readonly element: TypeRef;
}

/** Dict[K, V] */
export interface DictTypeRef extends BaseNode {
  readonly type: 'DictTypeRef';
  readonly key: TypeRef;
  readonly value: TypeRef;
}

/** Bare identifier naming a struct or enum, resolved during analysis */
export interface NamedTypeRef extends BaseNode {
  readonly type: 'NamedTypeRef';
  readonly name: string;
}

export type TypeRef = PrimitiveTypeRef | ListTypeRef | DictTypeRef | NamedTypeRef;

// ============================================================
// EXPRESSIONS
// ============================================================

export interface IntLiteralNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'IntLiteral';
  /** Exact value; int literals are not limited to 2^53 */
  readonly value: bigint;
}

export interface FloatLiteralNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'FloatLiteral';
  readonly value: number;
}

export interface StringLiteralNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BoolLiteralNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export interface IdentifierNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'Identifier';
  readonly name: string;
}

export interface ListLiteralNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'ListLiteral';
  readonly elements: ExpressionNode<T>[];
}

export interface DictEntryNode<T extends TypeSlot = undefined>
  extends BaseNode {
  readonly type: 'DictEntry';
  readonly key: ExpressionNode<T>;
  readonly value: ExpressionNode<T>;
}

/** { key: value, ... } with entries in source order */
export interface DictLiteralNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'DictLiteral';
  readonly entries: DictEntryNode<T>[];
}

export interface FieldInitNode<T extends TypeSlot = undefined>
  extends BaseNode {
  readonly type: 'FieldInit';
  readonly name: string;
  readonly value: ExpressionNode<T>;
}

/** Point { x: 1, y: 2 } */
export interface StructInitNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'StructInit';
  readonly name: string;
  readonly fields: FieldInitNode<T>[];
}

export type ArithmeticOp = '+' | '-' | '*' | '/' | '%';
export type EqualityOp = '==' | '!=';
export type RelationalOp = '<' | '>' | '<=' | '>=';
export type LogicalOp = '&&' | '||';
export type BinaryOp = ArithmeticOp | EqualityOp | RelationalOp | LogicalOp;
export type UnaryOp = '-' | '!';

export interface BinaryExprNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'BinaryExpr';
  readonly op: BinaryOp;
  readonly left: ExpressionNode<T>;
  readonly right: ExpressionNode<T>;
}

export interface UnaryExprNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'UnaryExpr';
  readonly op: UnaryOp;
  readonly operand: ExpressionNode<T>;
}

/** Call of a named function, builtin or cast: name(args) */
export interface CallExprNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'CallExpr';
  readonly callee: string;
  /** Span of the callee name */
  readonly calleeSpan: SourceSpan;
  readonly args: ExpressionNode<T>[];
}

/** target[index] */
export interface IndexExprNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'IndexExpr';
  readonly target: ExpressionNode<T>;
  readonly index: ExpressionNode<T>;
}

/** object.member */
export interface MemberAccessNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'MemberAccess';
  readonly object: ExpressionNode<T>;
  readonly member: string;
}

/** object.method(args) */
export interface MethodCallNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'MethodCall';
  readonly object: ExpressionNode<T>;
  readonly method: string;
  readonly args: ExpressionNode<T>[];
}

/** start..end (exclusive) or start..=end (inclusive) */
export interface RangeExprNode<T extends TypeSlot = undefined>
  extends ExprBase<T> {
  readonly type: 'RangeExpr';
  readonly start: ExpressionNode<T>;
  readonly end: ExpressionNode<T>;
  readonly inclusive: boolean;
}

export type ExpressionNode<T extends TypeSlot = undefined> =
  | IntLiteralNode<T>
  | FloatLiteralNode<T>
  | StringLiteralNode<T>
  | BoolLiteralNode<T>
  | IdentifierNode<T>
  | ListLiteralNode<T>
  | DictLiteralNode<T>
  | StructInitNode<T>
  | BinaryExprNode<T>
  | UnaryExprNode<T>
  | CallExprNode<T>
  | IndexExprNode<T>
  | MemberAccessNode<T>
  | MethodCallNode<T>
  | RangeExprNode<T>;

// ============================================================
// STATEMENTS
// ============================================================

export interface BlockNode<T extends TypeSlot = undefined> extends BaseNode {
  readonly type: 'Block';
  readonly declarations: DeclarationNode<T>[];
}

export interface ExpressionStmtNode<T extends TypeSlot = undefined>
  extends BaseNode {
  readonly type: 'ExpressionStmt';
  readonly expression: ExpressionNode<T>;
}

export interface IfStmtNode<T extends TypeSlot = undefined> extends BaseNode {
  readonly type: 'IfStmt';
  readonly condition: ExpressionNode<T>;
  readonly thenBlock: BlockNode<T>;
  readonly elseBlock: BlockNode<T> | null;
}

export interface WhileStmtNode<T extends TypeSlot = undefined>
  extends BaseNode {
  readonly type: 'WhileStmt';
  readonly condition: ExpressionNode<T>;
  readonly body: BlockNode<T>;
}

export interface ForStmtNode<T extends TypeSlot = undefined> extends BaseNode {
  readonly type: 'ForStmt';
  readonly variable: string;
  readonly variableSpan: SourceSpan;
  readonly iterable: ExpressionNode<T>;
  readonly body: BlockNode<T>;
}

export interface ReturnStmtNode<T extends TypeSlot = undefined>
  extends BaseNode {
  readonly type: 'ReturnStmt';
  /** null for a bare `return` */
  readonly value: ExpressionNode<T> | null;
}

export interface BreakStmtNode extends BaseNode {
  readonly type: 'BreakStmt';
}

export interface ContinueStmtNode extends BaseNode {
  readonly type: 'ContinueStmt';
}

/** name = value */
export interface AssignStmtNode<T extends TypeSlot = undefined>
  extends BaseNode {
  readonly type: 'AssignStmt';
  readonly target: string;
  readonly targetSpan: SourceSpan;
  readonly value: ExpressionNode<T>;
}

/** target[index] = value */
export interface IndexAssignStmtNode<T extends TypeSlot = undefined>
  extends BaseNode {
  readonly type: 'IndexAssignStmt';
  readonly target: IndexExprNode<T>;
  readonly value: ExpressionNode<T>;
}

/** object.member = value */
export interface MemberAssignStmtNode<T extends TypeSlot = undefined>
  extends BaseNode {
  readonly type: 'MemberAssignStmt';
  readonly target: MemberAccessNode<T>;
  readonly value: ExpressionNode<T>;
}

/** print(args..., sep = expr, end = expr) */
export interface PrintStmtNode<T extends TypeSlot = undefined>
  extends BaseNode {
  readonly type: 'PrintStmt';
  readonly args: ExpressionNode<T>[];
  readonly sep: ExpressionNode<T> | null;
  readonly end: ExpressionNode<T> | null;
}

export type StatementNode<T extends TypeSlot = undefined> =
  | BlockNode<T>
  | ExpressionStmtNode<T>
  | IfStmtNode<T>
  | WhileStmtNode<T>
  | ForStmtNode<T>
  | ReturnStmtNode<T>
  | BreakStmtNode
  | ContinueStmtNode
  | AssignStmtNode<T>
  | IndexAssignStmtNode<T>
  | MemberAssignStmtNode<T>
  | PrintStmtNode<T>;

// ============================================================
// DECLARATIONS
// ============================================================

/** let name: T = value */
export interface VarDeclNode<T extends TypeSlot = undefined> extends BaseNode {
  readonly type: 'VarDecl';
  readonly name: string;
  readonly annotation: TypeRef;
  readonly value: ExpressionNode<T>;
}

/** const NAME: T = value */
export interface ConstDeclNode<T extends TypeSlot = undefined>
  extends BaseNode {
  readonly type: 'ConstDecl';
  readonly name: string;
  readonly annotation: TypeRef;
  readonly value: ExpressionNode<T>;
}

export interface ParamNode extends BaseNode {
  readonly type: 'Param';
  readonly name: string;
  readonly annotation: TypeRef;
}

export interface FnDeclNode<T extends TypeSlot = undefined> extends BaseNode {
  readonly type: 'FnDecl';
  readonly name: string;
  readonly params: ParamNode[];
  readonly returnType: TypeRef;
  readonly body: BlockNode<T>;
}

export interface StructFieldNode extends BaseNode {
  readonly type: 'StructField';
  readonly name: string;
  readonly annotation: TypeRef;
}

export interface StructDeclNode extends BaseNode {
  readonly type: 'StructDecl';
  readonly name: string;
  readonly fields: StructFieldNode[];
}

export interface EnumVariantNode extends BaseNode {
  readonly type: 'EnumVariant';
  readonly name: string;
}

export interface EnumDeclNode extends BaseNode {
  readonly type: 'EnumDecl';
  readonly name: string;
  readonly variants: EnumVariantNode[];
}

/** import name | import "./path.tern" */
export interface ImportDeclNode extends BaseNode {
  readonly type: 'ImportDecl';
  readonly module: string;
  readonly isLocal: boolean;
}

export type DeclarationNode<T extends TypeSlot = undefined> =
  | VarDeclNode<T>
  | ConstDeclNode<T>
  | FnDeclNode<T>
  | StructDeclNode
  | EnumDeclNode
  | ImportDeclNode
  | StatementNode<T>;

// ============================================================
// PROGRAM
// ============================================================

export interface ProgramNode<T extends TypeSlot = undefined> extends BaseNode {
  readonly type: 'Program';
  readonly declarations: DeclarationNode<T>[];
}

/** Analyzer output: every expression carries its resolved type */
export type TypedProgram = ProgramNode<Type>;
export type TypedExpression = ExpressionNode<Type>;
export type TypedDeclaration = DeclarationNode<Type>;
export type TypedBlock = BlockNode<Type>;

export type NodeType =
  | ExpressionNode['type']
  | DeclarationNode['type']
  | TypeRef['type']
  | 'DictEntry'
  | 'FieldInit'
  | 'Param'
  | 'StructField'
  | 'EnumVariant'
  | 'Program';

/** Compile-time exhaustiveness guard for switches over closed unions */
export function assertNever(value: never, what: string): never {
  throw new Error(
    `Unhandled ${what}: ${JSON.stringify(value, (_key, v: unknown) =>
      typeof v === 'bigint' ? v.toString() : v
    )}`
  );
}
