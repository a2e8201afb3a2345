import type { Declaration, Expr, FunctionDecl, Stmt } from './types';
import { AssertNever } from '../utils';

export * from './types';
export { parse, type ParseResult } from './parser';

/** Drop redundant grouping: `((a))` -> `a`. */
export function stripParens(e: Expr): Expr {
	let cur = e;
	while (cur.kind === 'Paren') cur = cur.expression;
	return cur;
}

export function childExprs(e: Expr): Expr[] {
	switch (e.kind) {
		case 'NumberLiteral':
		case 'BoolLiteral':
		case 'Identifier':
		case 'ErrorExpr':
			return [];
		case 'Call': return e.args;
		case 'MethodCall': return [e.object, ...e.args];
		case 'Member': return [e.object];
		case 'Index': return [e.object, e.index];
		case 'Unary': return [e.argument];
		case 'Binary': return [e.left, e.right];
		case 'Assign': return [e.target, e.value];
		case 'Conditional': return [e.test, e.consequent, e.alternate];
		case 'Sequence': return e.expressions;
		case 'Paren': return [e.expression];
		default: return AssertNever(e, 'unhandled expression kind');
	}
}

/** Pre-order walk; returning false from `visit` skips the node's children. */
export function walkExpr(e: Expr, visit: (e: Expr) => boolean | void) {
	if (visit(e) === false) return;
	for (const c of childExprs(e)) walkExpr(c, visit);
}

/** Expressions owned directly by a statement (not by nested statements), in source order. */
export function stmtExprs(s: Stmt): Expr[] {
	switch (s.kind) {
		case 'ExprStmt': return [s.expression];
		case 'VarDecl': {
			const out: Expr[] = [];
			for (const d of s.declarators) {
				for (const dim of d.arrayDims) if (dim) out.push(dim);
				if (d.initializer) out.push(d.initializer);
			}
			return out;
		}
		case 'ReturnStmt': return s.expression ? [s.expression] : [];
		case 'IfStmt': return [s.condition];
		case 'WhileStmt': return [s.condition];
		case 'DoWhileStmt': return [s.condition];
		case 'ForStmt': {
			const out: Expr[] = [];
			if (s.condition) out.push(s.condition);
			if (s.update) out.push(s.update);
			return out;
		}
		case 'EmptyStmt':
		case 'BlockStmt':
		case 'JumpStmt':
		case 'OpaqueStmt':
		case 'ErrorStmt':
			return [];
		default: return AssertNever(s, 'unhandled statement kind');
	}
}

export function childStmts(s: Stmt): Stmt[] {
	switch (s.kind) {
		case 'BlockStmt': return s.statements;
		case 'IfStmt': return s.else ? [s.then, s.else] : [s.then];
		case 'WhileStmt': return [s.body];
		case 'DoWhileStmt': return [s.body];
		case 'ForStmt': return s.init ? [s.init, s.body] : [s.body];
		default: return [];
	}
}

export function walkStmt(s: Stmt, visit: (s: Stmt) => boolean | void) {
	if (visit(s) === false) return;
	for (const c of childStmts(s)) walkStmt(c, visit);
}

/** Every expression inside a function body, each top-level statement expression visited once. */
export function forEachBodyExpr(fn: FunctionDecl, visit: (e: Expr) => boolean | void) {
	if (!fn.body) return;
	walkStmt(fn.body, s => { for (const e of stmtExprs(s)) walkExpr(e, visit); });
}

/** Like walkExpr, with the enclosing expression passed along. */
export function walkExprWithParent(e: Expr, visit: (e: Expr, parent: Expr | undefined) => boolean | void, parent?: Expr) {
	if (visit(e, parent) === false) return;
	for (const c of childExprs(e)) walkExprWithParent(c, visit, e);
}

export type ExprRoot = { expr: Expr; fn?: FunctionDecl };

/** Top-level expressions of the shader: global initializers and array sizes, then statement expressions of every function body. */
export function expressionRoots(decls: readonly Declaration[]): ExprRoot[] {
	const out: ExprRoot[] = [];
	for (const d of decls) {
		if (d.kind === 'GlobalVar') {
			for (const decl of d.declarators) {
				for (const dim of decl.arrayDims) if (dim) out.push({ expr: dim });
				if (decl.initializer) out.push({ expr: decl.initializer });
			}
		} else if (d.kind === 'Function' && d.body) {
			const fn = d;
			walkStmt(d.body, s => { for (const expr of stmtExprs(s)) out.push({ expr, fn }); });
		}
	}
	return out;
}

export function functionsOf(decls: readonly Declaration[]): FunctionDecl[] {
	return decls.filter((d): d is FunctionDecl => d.kind === 'Function' && !!d.body);
}
