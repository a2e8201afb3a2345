import { type Expr, type FunctionDecl, type Stmt, RELATIONAL_OPS, childExprs, functionsOf, stripParens, walkStmt } from '../ast';
import { GLSL_DIAGCODES } from '../analysisTypes';
import type { AnnotatedShader, Rule, RuleFinding } from './types';

export type Constness = 'const' | 'dynamic' | 'unknown';

const SIZED_TYPE = /^(?:[ibud]?vec[234]|d?mat[234](?:x[234])?)$/;

function combine(parts: readonly Constness[]): Constness {
	if (parts.includes('dynamic')) return 'dynamic';
	if (parts.includes('unknown')) return 'unknown';
	return 'const';
}

/**
 * Compile-time constness of an expression inside `fn`. Names declared in the
 * shader without `const` are dynamic; names the shader never declares are
 * unknown and never reported.
 */
export function constness(e: Expr, shader: AnnotatedShader, fn: FunctionDecl): Constness {
	switch (e.kind) {
		case 'NumberLiteral':
		case 'BoolLiteral':
			return 'const';
		case 'Identifier': {
			const { symbols, defs } = shader;
			if (defs.isBuiltinConstant(e.name)) return 'const';
			const sym = symbols.lookup(e.name, fn.name);
			if (sym) return sym.isConst ? 'const' : 'dynamic';
			if (symbols.constants.has(e.name)) return 'const';
			return 'unknown';
		}
		case 'ErrorExpr':
			return 'unknown';
		case 'Assign':
			return 'dynamic';
		case 'MethodCall':
			if (e.method === 'length' && e.args.length === 0) return lengthConstness(e.object, shader, fn);
			return combine(childExprs(e).map(c => constness(c, shader, fn)));
		default:
			return combine(childExprs(e).map(c => constness(c, shader, fn)));
	}
}

// `a.length()` is fixed at compile time for sized arrays, vectors and matrices
function lengthConstness(object: Expr, shader: AnnotatedShader, fn: FunctionDecl): Constness {
	const target = stripParens(object);
	if (target.kind !== 'Identifier') return constness(target, shader, fn);
	const sym = shader.symbols.lookup(target.name, fn.name);
	if (!sym) return 'unknown';
	if (sym.arrayDims.length === 0) return SIZED_TYPE.test(sym.typeName) ? 'const' : 'unknown';
	return combine(sym.arrayDims.map(d => (d ? constness(d, shader, fn) : 'dynamic')));
}

function inductionVariable(init: Stmt | undefined): string | undefined {
	if (!init) return undefined;
	if (init.kind === 'VarDecl') return init.declarators[0]?.name;
	if (init.kind === 'ExprStmt') {
		const e = stripParens(init.expression);
		if (e.kind === 'Assign') {
			const target = stripParens(e.target);
			if (target.kind === 'Identifier') return target.name;
		}
	}
	return undefined;
}

// the side of `i < bound` (or `bound > i`) opposite the induction variable
function loopBound(condition: Expr, variable: string): Expr | undefined {
	const c = stripParens(condition);
	if (c.kind !== 'Binary' || !RELATIONAL_OPS.has(c.op)) return undefined;
	const left = stripParens(c.left);
	const right = stripParens(c.right);
	if (left.kind === 'Identifier' && left.name === variable) return c.right;
	if (right.kind === 'Identifier' && right.name === variable) return c.left;
	return undefined;
}

export const dynamicLoopBoundRule: Rule = {
	id: 'dynamic-loop-bound',
	code: GLSL_DIAGCODES.DYNAMIC_LOOP_BOUND,
	severity: 'info',
	description: 'Loop bounds are compile-time constants so the compiler can unroll the loop.',
	check(shader) {
		const out: RuleFinding[] = [];
		for (const fn of functionsOf(shader.ast.declarations)) {
			if (!fn.body) continue;
			walkStmt(fn.body, s => {
				if (s.kind !== 'ForStmt' || !s.condition) return;
				const variable = inductionVariable(s.init);
				if (!variable) return;
				const bound = loopBound(s.condition, variable);
				if (!bound || constness(bound, shader, fn) !== 'dynamic') return;
				const boundText = shader.source.slice(bound.span.start, bound.span.end);
				out.push({ span: s.condition.span, message: `loop bound '${boundText}' is not a compile-time constant` });
			});
		}
		return out;
	},
};
