// Canonical expression forms for pattern matching: parens dropped, `+` and `*`
// flattened with operands sorted by structural key, `a - b` as `a + (-b)`.
import type { Expr } from './types';
import { walkExpr } from './index';
import { AssertNever } from '../utils';

export type Canon =
	| { k: 'num'; value: number; key: string; expr: Expr }
	| { k: 'leaf'; key: string; expr: Expr }
	| { k: 'neg'; arg: Canon; key: string; expr: Expr }
	| { k: 'add'; terms: Canon[]; key: string; expr: Expr }
	| { k: 'mul'; factors: Canon[]; key: string; expr: Expr };

/** Structural key: equal keys mean the same expression up to grouping parens. */
export function exprKey(e: Expr): string {
	switch (e.kind) {
		case 'Paren': return exprKey(e.expression);
		case 'NumberLiteral': return `n:${e.value}`;
		case 'BoolLiteral': return `b:${e.value}`;
		case 'Identifier': return `i:${e.name}`;
		case 'Call': return `c:${e.callee}(${e.args.map(exprKey).join(',')})`;
		case 'MethodCall': return `${exprKey(e.object)}.${e.method}(${e.args.map(exprKey).join(',')})`;
		case 'Member': return `${exprKey(e.object)}.${e.property}`;
		case 'Index': return `${exprKey(e.object)}[${exprKey(e.index)}]`;
		case 'Unary': return e.prefix ? `u${e.op}(${exprKey(e.argument)})` : `(${exprKey(e.argument)})p${e.op}`;
		case 'Binary': return `(${exprKey(e.left)}${e.op}${exprKey(e.right)})`;
		case 'Assign': return `(${exprKey(e.target)}${e.op}${exprKey(e.value)})`;
		case 'Conditional': return `(${exprKey(e.test)}?${exprKey(e.consequent)}:${exprKey(e.alternate)})`;
		case 'Sequence': return `(${e.expressions.map(exprKey).join(';')})`;
		case 'ErrorExpr': return '!error';
		default: return AssertNever(e, 'unhandled expression kind');
	}
}

export function containsError(e: Expr): boolean {
	let found = false;
	walkExpr(e, x => {
		if (x.kind === 'ErrorExpr') found = true;
		return !found;
	});
	return found;
}

/** No assignments, increments or calls anywhere inside. */
export function isSideEffectFree(e: Expr): boolean {
	let pure = true;
	walkExpr(e, x => {
		if (x.kind === 'Assign' || x.kind === 'MethodCall' || x.kind === 'ErrorExpr') pure = false;
		else if (x.kind === 'Call' && !x.isConstructor) pure = false;
		else if (x.kind === 'Unary' && (x.op === '++' || x.op === '--')) pure = false;
		return pure;
	});
	return pure;
}

function sortByKey(items: Canon[]): Canon[] {
	return [...items].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
}

function negate(c: Canon, expr: Expr): Canon {
	if (c.k === 'neg') return c.arg;
	if (c.k === 'num') return { k: 'num', value: -c.value, key: `n:${-c.value}`, expr };
	if (c.k === 'add') return makeAdd(c.terms.map(t => negate(t, t.expr)), expr);
	return { k: 'neg', arg: c, key: `-(${c.key})`, expr };
}

function makeAdd(parts: Canon[], expr: Expr): Canon {
	const terms: Canon[] = [];
	for (const p of parts) {
		if (p.k === 'add') terms.push(...p.terms);
		else terms.push(p);
	}
	const sorted = sortByKey(terms);
	return { k: 'add', terms: sorted, key: `+(${sorted.map(t => t.key).join(',')})`, expr };
}

function makeMul(parts: Canon[], expr: Expr): Canon {
	let negative = false;
	const factors: Canon[] = [];
	const pushFactor = (p: Canon) => {
		if (p.k === 'neg') { negative = !negative; pushFactor(p.arg); return; }
		if (p.k === 'mul') { factors.push(...p.factors); return; }
		factors.push(p);
	};
	for (const p of parts) pushFactor(p);
	const sorted = sortByKey(factors);
	const product: Canon = { k: 'mul', factors: sorted, key: `*(${sorted.map(f => f.key).join(',')})`, expr };
	return negative ? { k: 'neg', arg: product, key: `-(${product.key})`, expr } : product;
}

/**
 * Canonical form of an expression, or undefined when any part of it failed to
 * parse. Products are treated as commutative; callers matching vector/matrix
 * code accept that approximation.
 */
export function canonicalize(e: Expr): Canon | undefined {
	if (containsError(e)) return undefined;
	return canon(e);
}

function canon(e: Expr): Canon {
	switch (e.kind) {
		case 'Paren': return canon(e.expression);
		case 'NumberLiteral': return { k: 'num', value: e.value, key: `n:${e.value}`, expr: e };
		case 'Unary':
			if (e.prefix && e.op === '-') return negate(canon(e.argument), e);
			if (e.prefix && e.op === '+') return canon(e.argument);
			break;
		case 'Binary':
			if (e.op === '+') return makeAdd([canon(e.left), canon(e.right)], e);
			if (e.op === '-') return makeAdd([canon(e.left), negate(canon(e.right), e.right)], e);
			if (e.op === '*') return makeMul([canon(e.left), canon(e.right)], e);
			break;
		default:
			break;
	}
	return { k: 'leaf', key: exprKey(e), expr: e };
}

export function isNumber(c: Canon, value: number): boolean {
	return c.k === 'num' && c.value === value;
}

/** Short literal text for a computed value, keeping float spelling when asked. */
export function formatNumber(value: number, asFloat: boolean): string {
	const rounded = Number(value.toPrecision(12));
	const text = String(rounded);
	if (!asFloat) return text;
	return /[.eE]/.test(text) ? text : `${text}.0`;
}
