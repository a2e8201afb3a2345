/*
	Arithmetic pattern rules. Each one looks for a hand-written form of an
	operation the GPU has a cheaper or clearer spelling for, and offers the
	replacement text for the matched span.
*/
import { type Expr, expressionRoots, stripParens, walkExpr, walkExprWithParent } from '../ast';
import { type Canon, canonicalize, exprKey, formatNumber, isNumber, isSideEffectFree } from '../ast/canonical';
import { GLSL_DIAGCODES } from '../analysisTypes';
import type { AnnotatedShader, Rule, RuleFinding } from './types';

const COMPONENT_SETS = ['xyzw', 'rgba', 'stpq'] as const;
const MAX_RECIPROCAL_LENGTH = 8;
const VECTOR_TYPE = /^([ibud]?)vec([234])$/;
const MATRIX_TYPE = /^(d?)mat([234])(?:x([234]))?$/;
const SCALAR_OF: Readonly<Record<string, string>> = { '': 'float', i: 'int', u: 'uint', b: 'bool', d: 'double' };

function text(shader: AnnotatedShader, e: Expr): string {
	return shader.source.slice(e.span.start, e.span.end);
}

function eachExpr(shader: AnnotatedShader, visit: (e: Expr, parent: Expr | undefined, scope: string | undefined) => void) {
	for (const root of expressionRoots(shader.ast.declarations)) {
		walkExprWithParent(root.expr, (e, parent) => { visit(e, parent, root.fn?.name); });
	}
}

// ---------------------------------------------------------------- division-by-constant

function reciprocalText(lit: Extract<Expr, { kind: 'NumberLiteral' }>): string {
	const r = formatNumber(1 / lit.value, true);
	return r.length <= MAX_RECIPROCAL_LENGTH ? r : `(1.0 / ${lit.raw})`;
}

function floatLiteral(e: Expr): Extract<Expr, { kind: 'NumberLiteral' }> | undefined {
	const s = stripParens(e);
	if (s.kind !== 'NumberLiteral' || !s.isFloat) return undefined;
	if (s.value === 0 || !Number.isFinite(s.value)) return undefined;
	return s;
}

export const divisionByConstantRule: Rule = {
	id: 'division-by-constant',
	code: GLSL_DIAGCODES.DIVISION_BY_CONSTANT,
	severity: 'info',
	description: 'Division by a float literal is written as multiplication by its reciprocal.',
	fix: 'replace',
	check(shader) {
		const out: RuleFinding[] = [];
		eachExpr(shader, e => {
			if (e.kind === 'Binary' && e.op === '/') {
				const lit = floatLiteral(e.right);
				if (!lit) return;
				const recip = reciprocalText(lit);
				out.push({ span: e.span, message: `division by constant ${lit.raw}; multiply by ${recip} instead`, suggestedFix: `${text(shader, e.left)} * ${recip}` });
			} else if (e.kind === 'Assign' && e.op === '/=') {
				const lit = floatLiteral(e.value);
				if (!lit) return;
				const recip = reciprocalText(lit);
				out.push({ span: e.span, message: `division by constant ${lit.raw}; multiply by ${recip} instead`, suggestedFix: `${text(shader, e.target)} *= ${recip}` });
			}
		});
		return out;
	},
};

// ---------------------------------------------------------------- manual-lerp

type Lerp = { x: Expr; y: Expr; t: Expr };

function pairOf(c: Canon): [Canon, Canon] | undefined {
	if (c.k !== 'mul' || c.factors.length !== 2) return undefined;
	const [a, b] = c.factors;
	return a && b ? [a, b] : undefined;
}

// `1 - t` as a canonical sum; returns t
function oneMinus(c: Canon): Canon | undefined {
	if (c.k !== 'add' || c.terms.length !== 2) return undefined;
	const [a, b] = c.terms;
	if (!a || !b) return undefined;
	if (isNumber(a, 1) && b.k === 'neg') return b.arg;
	if (isNumber(b, 1) && a.k === 'neg') return a.arg;
	return undefined;
}

// x*(1-t) + y*t
function matchWeighted(first: Canon, second: Canon): Lerp | undefined {
	const p = pairOf(first);
	const q = pairOf(second);
	if (!p || !q) return undefined;
	for (const [weight, x] of [[p[0], p[1]], [p[1], p[0]]]) {
		if (!weight || !x) continue;
		const t = oneMinus(weight);
		if (!t) continue;
		for (const [tq, y] of [[q[0], q[1]], [q[1], q[0]]]) {
			if (tq && y && tq.key === t.key) return { x: x.expr, y: y.expr, t: t.expr };
		}
	}
	return undefined;
}

// x + (y - x)*t
function matchOffset(first: Canon, second: Canon): Lerp | undefined {
	const p = pairOf(second);
	if (!p) return undefined;
	for (const [diff, t] of [[p[0], p[1]], [p[1], p[0]]]) {
		if (!diff || !t || diff.k !== 'add' || diff.terms.length !== 2) continue;
		const [a, b] = diff.terms;
		if (!a || !b) continue;
		for (const [y, negX] of [[a, b], [b, a]]) {
			if (y && negX && negX.k === 'neg' && y.k !== 'neg' && negX.arg.key === first.key) return { x: first.expr, y: y.expr, t: t.expr };
		}
	}
	return undefined;
}

// Whether a sum flattens to more than `limit` terms; stops counting at the first term past it.
function hasMoreTermsThan(e: Expr, limit: number): boolean {
	const pending = [e];
	let count = 0;
	for (let cur = pending.pop(); cur; cur = pending.pop()) {
		if (cur.kind === 'Paren') pending.push(cur.expression);
		else if (cur.kind === 'Binary' && (cur.op === '+' || cur.op === '-')) pending.push(cur.left, cur.right);
		else if (cur.kind === 'Unary' && cur.prefix && (cur.op === '-' || cur.op === '+')) pending.push(cur.argument);
		else if (++count > limit) return true;
	}
	return false;
}

export function matchLerp(e: Expr): Lerp | undefined {
	// both lerp shapes are sums of exactly two terms
	if (hasMoreTermsThan(e, 2)) return undefined;
	const c = canonicalize(e);
	if (!c || c.k !== 'add' || c.terms.length !== 2) return undefined;
	const [a, b] = c.terms;
	if (!a || !b) return undefined;
	return matchWeighted(a, b) ?? matchWeighted(b, a) ?? matchOffset(a, b) ?? matchOffset(b, a);
}

export const manualLerpRule: Rule = {
	id: 'manual-lerp',
	code: GLSL_DIAGCODES.MANUAL_LERP,
	severity: 'info',
	description: 'Hand-written linear interpolation is replaced by mix().',
	fix: 'replace',
	check(shader) {
		const out: RuleFinding[] = [];
		eachExpr(shader, e => {
			if (e.kind !== 'Binary' || (e.op !== '+' && e.op !== '-')) return;
			const m = matchLerp(e);
			if (!m) return;
			const fix = `mix(${text(shader, m.x)}, ${text(shader, m.y)}, ${text(shader, m.t)})`;
			out.push({ span: e.span, message: `manual linear interpolation; use ${fix}`, suggestedFix: fix });
		});
		return out;
	},
};

// ---------------------------------------------------------------- sum-as-dot and swizzle-constructor

type ValueType = { name: string; arrayDims: number };

function swizzleLength(property: string): number {
	return COMPONENT_SETS.some(set => [...property].every(ch => set.includes(ch))) ? property.length : 0;
}

// Declared type of an lvalue-like expression; undefined when it cannot be told from declarations.
function valueType(shader: AnnotatedShader, e: Expr, scope: string | undefined): ValueType | undefined {
	switch (e.kind) {
		case 'Paren':
			return valueType(shader, e.expression, scope);
		case 'Identifier': {
			const sym = shader.symbols.lookup(e.name, scope);
			return sym ? { name: sym.typeName, arrayDims: sym.arrayDims.length } : undefined;
		}
		case 'Call':
			return e.isConstructor && !e.callee.endsWith('[]') ? { name: e.callee, arrayDims: 0 } : undefined;
		case 'Index': {
			const owner = valueType(shader, e.object, scope);
			if (!owner) return undefined;
			if (owner.arrayDims > 0) return { name: owner.name, arrayDims: owner.arrayDims - 1 };
			// a matrix column has as many components as the matrix has rows
			const mat = MATRIX_TYPE.exec(owner.name);
			if (mat) return { name: `${mat[1]}vec${mat[3] ?? mat[2]}`, arrayDims: 0 };
			const vec = VECTOR_TYPE.exec(owner.name);
			return vec ? { name: SCALAR_OF[vec[1]] ?? 'float', arrayDims: 0 } : undefined;
		}
		case 'Member': {
			const owner = valueType(shader, e.object, scope);
			if (!owner || owner.arrayDims > 0) return undefined;
			const vec = VECTOR_TYPE.exec(owner.name);
			if (vec) {
				const n = swizzleLength(e.property);
				if (n === 0 || n > 4) return undefined;
				return { name: n === 1 ? SCALAR_OF[vec[1]] ?? 'float' : `${vec[1]}vec${n}`, arrayDims: 0 };
			}
			const field = shader.symbols.byName.get(e.property)?.find(s => s.container === owner.name);
			return field ? { name: field.typeName, arrayDims: field.arrayDims.length } : undefined;
		}
		default:
			return undefined;
	}
}

/** Prefix and component count of `e` when it is a single (non-array) vector. */
function vectorShape(shader: AnnotatedShader, e: Expr, scope: string | undefined): { prefix: string; arity: number } | undefined {
	const t = valueType(shader, e, scope);
	const m = t && t.arrayDims === 0 ? VECTOR_TYPE.exec(t.name) : null;
	return m ? { prefix: m[1], arity: Number(m[2]) } : undefined;
}

type Component = { object: Expr; objectKey: string; set: string; index: number; letter: string };

function singleComponent(e: Expr): Component | undefined {
	const s = stripParens(e);
	if (s.kind !== 'Member' || s.property.length !== 1) return undefined;
	for (const set of COMPONENT_SETS) {
		const index = set.indexOf(s.property);
		if (index >= 0) return { object: s.object, objectKey: exprKey(s.object), set, index, letter: s.property };
	}
	return undefined;
}

// all components read from one object through one component set
function sameSource(parts: readonly Component[]): boolean {
	const first = parts[0];
	if (!first) return false;
	return parts.every(p => p.objectKey === first.objectKey && p.set === first.set);
}

function sumTerms(e: Expr, out: Expr[]) {
	const s = stripParens(e);
	if (s.kind === 'Binary' && s.op === '+') {
		sumTerms(s.left, out);
		sumTerms(s.right, out);
		return;
	}
	out.push(s);
}

function isSumNode(e: Expr | undefined): boolean {
	return e?.kind === 'Binary' && e.op === '+';
}

export const sumAsDotRule: Rule = {
	id: 'sum-as-dot',
	code: GLSL_DIAGCODES.SUM_AS_DOT,
	severity: 'info',
	description: 'Summing every component of a vector is written as a dot product with a vector of ones.',
	fix: 'replace',
	check(shader) {
		const out: RuleFinding[] = [];
		eachExpr(shader, (e, parent, scope) => {
			if (e.kind !== 'Binary' || e.op !== '+') return;
			// only the outermost sum of a chain
			if (isSumNode(parent)) return;
			const terms: Expr[] = [];
			sumTerms(e, terms);
			const parts: Component[] = [];
			for (const t of terms) {
				const c = singleComponent(t);
				if (!c) return;
				parts.push(c);
			}
			const first = parts[0];
			if (!first || !sameSource(parts) || first.object.kind !== 'Identifier') return;
			const shape = vectorShape(shader, first.object, scope);
			if (!shape || (shape.prefix !== '' && shape.prefix !== 'd')) return;
			const { arity } = shape;
			const indices = new Set(parts.map(p => p.index));
			if (parts.length !== arity || indices.size !== arity || [...indices].some(i => i >= arity)) return;
			const fix = `dot(${first.object.name}, ${shape.prefix}vec${arity}(1.0))`;
			out.push({ span: e.span, message: `sum of all components of '${first.object.name}'; use ${fix}`, suggestedFix: fix });
		});
		return out;
	},
};

export const swizzleConstructorRule: Rule = {
	id: 'swizzle-constructor',
	code: GLSL_DIAGCODES.SWIZZLE_CONSTRUCTOR,
	severity: 'info',
	description: 'A vector built from components of one vector is written as a swizzle.',
	fix: 'replace',
	check(shader) {
		const out: RuleFinding[] = [];
		eachExpr(shader, (e, _parent, scope) => {
			if (e.kind !== 'Call' || !e.isConstructor) return;
			const m = VECTOR_TYPE.exec(e.callee);
			if (!m || e.args.length !== Number(m[2])) return;
			const parts: Component[] = [];
			for (const a of e.args) {
				const c = singleComponent(a);
				if (!c) return;
				parts.push(c);
			}
			const first = parts[0];
			if (!first || !sameSource(parts) || !isSideEffectFree(first.object)) return;
			// struct fields named x/y/z are not swizzles
			const source = vectorShape(shader, first.object, scope);
			if (!source || source.prefix !== m[1] || parts.some(p => p.index >= source.arity)) return;
			const fix = `${text(shader, first.object)}.${parts.map(p => p.letter).join('')}`;
			out.push({ span: e.span, message: `constructor repeats components of one vector; use the swizzle ${fix}`, suggestedFix: fix });
		});
		return out;
	},
};

// ---------------------------------------------------------------- mad-operation

// tighter than `*`: safe as the left operand of a product without parentheses
function isTight(e: Expr): boolean {
	switch (e.kind) {
		case 'Binary': return e.op === '*' || e.op === '/' || e.op === '%';
		case 'Conditional':
		case 'Assign':
		case 'Sequence':
			return false;
		default:
			return true;
	}
}

function needsGrouping(e: Expr, parent: Expr | undefined): boolean {
	if (!parent) return false;
	switch (parent.kind) {
		case 'Binary':
			return parent.op === '*' || parent.op === '/' || parent.op === '%' || (parent.op === '-' && parent.right === e);
		case 'Unary':
		case 'Member':
		case 'Index':
		case 'MethodCall':
			return true;
		default:
			return false;
	}
}

function literalOf(e: Expr): Extract<Expr, { kind: 'NumberLiteral' }> | undefined {
	const s = stripParens(e);
	return s.kind === 'NumberLiteral' ? s : undefined;
}

function containsLiteralOnly(e: Expr): boolean {
	let onlyLiterals = true;
	walkExpr(e, x => {
		if (x.kind === 'Identifier' || x.kind === 'Call' || x.kind === 'MethodCall') onlyLiterals = false;
		return onlyLiterals;
	});
	return onlyLiterals;
}

export const madOperationRule: Rule = {
	id: 'mad-operation',
	code: GLSL_DIAGCODES.MAD_OPERATION,
	severity: 'info',
	description: 'An offset applied before a constant scale is rewritten as a single multiply-add.',
	fix: 'replace',
	check(shader) {
		const out: RuleFinding[] = [];
		eachExpr(shader, (e, parent) => {
			if (e.kind !== 'Binary' || e.op !== '*') return;
			for (const [group, scale] of [[e.left, e.right], [e.right, e.left]]) {
				if (!group || !scale || group.kind !== 'Paren') continue;
				const c2 = literalOf(scale);
				const inner = stripParens(group);
				if (!c2 || inner.kind !== 'Binary' || (inner.op !== '+' && inner.op !== '-')) continue;
				let x: Expr | undefined;
				let c1 = literalOf(inner.right);
				if (c1) x = inner.left;
				else if (inner.op === '+') {
					c1 = literalOf(inner.left);
					x = inner.right;
				}
				if (!x || !c1 || containsLiteralOnly(x)) continue;
				const offset = formatNumber(c1.value * c2.value, c1.isFloat || c2.isFloat);
				const xText = isTight(stripParens(x)) ? text(shader, x) : `(${text(shader, x)})`;
				const mad = `${xText} * ${c2.raw} ${inner.op} ${offset}`;
				const fix = needsGrouping(e, parent) ? `(${mad})` : mad;
				out.push({ span: e.span, message: `offset before a constant scale; rewrite as the multiply-add ${mad}`, suggestedFix: fix });
				return;
			}
		});
		return out;
	},
};
