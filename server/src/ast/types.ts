import type { Span } from '../core/tokens';

export type { Span };

// GLSL operator types
export type UnOp = '!' | '~' | '++' | '--' | '+' | '-';
export type AssignOp = '=' | '+=' | '-=' | '*=' | '/=' | '%=' | '<<=' | '>>=' | '&=' | '|=' | '^=';
export type BinOp =
	// logical
	| '&&' | '||' | '^^'
	// bitwise
	| '&' | '|' | '^' | '<<' | '>>'
	// equality and relational
	| '==' | '!=' | '<' | '<=' | '>' | '>='
	// arithmetic
	| '+' | '-' | '*' | '/' | '%';

export const ASSIGN_OPS: ReadonlySet<string> = new Set<AssignOp>(['=', '+=', '-=', '*=', '/=', '%=', '<<=', '>>=', '&=', '|=', '^=']);
export const RELATIONAL_OPS: ReadonlySet<string> = new Set<BinOp>(['<', '<=', '>', '>=', '!=']);

export function isAssignOp(op: string): op is AssignOp { return ASSIGN_OPS.has(op); }

export type Expr =
	| { span: Span; kind: 'NumberLiteral'; raw: string; value: number; isFloat: boolean; }
	| { span: Span; kind: 'BoolLiteral'; value: boolean; }
	| { span: Span; kind: 'Identifier'; name: string; }
	// constructors (vec3(...), float[](...), LightData(...)) are calls with isConstructor set
	| { span: Span; kind: 'Call'; callee: string; calleeSpan: Span; args: Expr[]; isConstructor: boolean; }
	| { span: Span; kind: 'MethodCall'; object: Expr; method: string; args: Expr[]; }
	| { span: Span; kind: 'Member'; object: Expr; property: string; }
	| { span: Span; kind: 'Index'; object: Expr; index: Expr; }
	| { span: Span; kind: 'Unary'; op: UnOp; argument: Expr; prefix: boolean; }
	| { span: Span; kind: 'Binary'; op: BinOp; left: Expr; right: Expr; }
	| { span: Span; kind: 'Assign'; op: AssignOp; target: Expr; value: Expr; }
	| { span: Span; kind: 'Conditional'; test: Expr; consequent: Expr; alternate: Expr; }
	| { span: Span; kind: 'Sequence'; expressions: Expr[]; }
	| { span: Span; kind: 'Paren'; expression: Expr; }
	| { span: Span; kind: 'ErrorExpr' };

export type TypeSpec = {
	span: Span;
	name: string;
	// `float[3] x` and `float x[3]` both land here; null marks an unsized `[]`
	arrayDims: (Expr | null)[];
	// inline `struct { ... }` types used directly in a declaration
	structFields?: Field[];
};

export type Declarator = {
	span: Span;
	name: string;
	nameSpan: Span;
	arrayDims: (Expr | null)[];
	initializer?: Expr;
};

export type Stmt =
	| { span: Span; kind: 'EmptyStmt' }
	| { span: Span; kind: 'ExprStmt'; expression: Expr; }
	| { span: Span; kind: 'VarDecl'; qualifiers: string[]; varType: TypeSpec; declarators: Declarator[]; }
	| { span: Span; kind: 'ReturnStmt'; expression?: Expr; }
	| { span: Span; kind: 'IfStmt'; condition: Expr; then: Stmt; else?: Stmt; }
	| { span: Span; kind: 'WhileStmt'; condition: Expr; body: Stmt; }
	| { span: Span; kind: 'DoWhileStmt'; body: Stmt; condition: Expr; }
	| { span: Span; kind: 'ForStmt'; init?: Stmt; condition?: Expr; update?: Expr; body: Stmt; }
	| { span: Span; kind: 'BlockStmt'; statements: Stmt[]; }
	| { span: Span; kind: 'JumpStmt'; keyword: 'break' | 'continue' | 'discard'; }
	// parsed past but not modelled (switch, unknown forms); rules skip it
	| { span: Span; kind: 'OpaqueStmt'; keyword: string; }
	| { span: Span; kind: 'ErrorStmt' };

export type LayoutEntry = { span: Span; key: string; value?: Expr; };
export type Layout = { span: Span; entries: LayoutEntry[]; };

export type Field = {
	span: Span;
	qualifiers: string[];
	type: TypeSpec;
	name: string;
	nameSpan: Span;
	arrayDims: (Expr | null)[];
};

export type ParamDirection = 'in' | 'out' | 'inout';
export type Parameter = {
	span: Span;
	qualifiers: string[];
	direction: ParamDirection;
	type: TypeSpec;
	name?: string;
	nameSpan?: Span;
};

type DeclBase = { span: Span; layout?: Layout; comment?: string; };

export type StageIO = DeclBase & { kind: 'StageIO'; direction: 'in' | 'out'; location?: number; qualifiers: string[]; type: TypeSpec; name: string; nameSpan: Span; };
export type InputAttachment = DeclBase & { kind: 'InputAttachment'; index?: number; set?: number; binding?: number; type: TypeSpec; name: string; nameSpan: Span; };
export type Sampler = DeclBase & { kind: 'Sampler'; set?: number; binding?: number; type: TypeSpec; name: string; nameSpan: Span; };
export type UniformBlock = DeclBase & {
	kind: 'UniformBlock';
	storage: 'uniform' | 'buffer' | 'in' | 'out';
	set?: number;
	binding?: number;
	isPushConstant: boolean;
	blockName: string;
	blockNameSpan: Span;
	instanceName?: string;
	instanceNameSpan?: Span;
	fields: Field[];
};
export type Struct = DeclBase & { kind: 'Struct'; name: string; nameSpan: Span; fields: Field[]; };
export type FunctionDecl = DeclBase & { kind: 'Function'; name: string; nameSpan: Span; returnType: TypeSpec; parameters: Parameter[]; body?: Stmt; };
export type GlobalVar = DeclBase & { kind: 'GlobalVar'; qualifiers: string[]; type: TypeSpec; declarators: Declarator[]; };
export type Precision = DeclBase & { kind: 'Precision'; precision: string; type: string; };
export type LayoutDefault = DeclBase & { kind: 'LayoutDefault'; storage: string; };

export type Declaration =
	| StageIO
	| InputAttachment
	| Sampler
	| UniformBlock
	| Struct
	| FunctionDecl
	| GlobalVar
	| Precision
	| LayoutDefault;

export type ParseDiagnostic = { span: Span; message: string; };

export type ShaderAst = { span: Span; kind: 'Shader'; declarations: Declaration[]; };

export function spanFrom(start: number, end: number): Span {
	return { start, end };
}
