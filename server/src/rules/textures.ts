import { type Expr, type FunctionDecl, forEachBodyExpr, functionsOf, walkExpr } from '../ast';
import { GLSL_DIAGCODES } from '../analysisTypes';
import { rootIdentifier } from '../symbols';
import type { AnnotatedShader, Rule, RuleFinding } from './types';

type UvEvent =
	| { at: number; kind: 'write'; name: string }
	| { at: number; kind: 'sample'; call: Expr; coordinate: Expr };

// Writes count from the end of the assignment, so `uv = texture(s, uv).xy` samples the old value.
function collectEvents(fn: FunctionDecl, shader: AnnotatedShader): UvEvent[] {
	const { symbols, defs } = shader;
	const events: UvEvent[] = [];
	forEachBodyExpr(fn, e => {
		if (e.kind === 'Assign') {
			const name = rootIdentifier(e.target);
			if (name && symbols.textureCoords.has(name)) events.push({ at: e.span.end, kind: 'write', name });
		} else if (e.kind === 'Unary' && (e.op === '++' || e.op === '--')) {
			const name = rootIdentifier(e.argument);
			if (name && symbols.textureCoords.has(name)) events.push({ at: e.span.end, kind: 'write', name });
		} else if (e.kind === 'Call' && defs.sampleFunctions.has(e.callee)) {
			const coordinate = e.args[1];
			if (coordinate) events.push({ at: e.span.start, kind: 'sample', call: e, coordinate });
		}
	});
	return events.sort((a, b) => a.at - b.at);
}

function referencedNames(e: Expr): Set<string> {
	const names = new Set<string>();
	walkExpr(e, x => { if (x.kind === 'Identifier') names.add(x.name); });
	return names;
}

export const fragmentUvMutationRule: Rule = {
	id: 'fragment-uv-mutation',
	code: GLSL_DIAGCODES.FRAGMENT_UV_MUTATION,
	severity: 'warning',
	description: 'Fragment shaders sample textures with the interpolated coordinates instead of modifying them first.',
	check(shader) {
		if (shader.stage !== 'fragment') return [];
		const out: RuleFinding[] = [];
		for (const fn of functionsOf(shader.ast.declarations)) {
			if (!shader.symbols.reachableFromMain.has(fn.name)) continue;
			const written = new Set<string>();
			for (const ev of collectEvents(fn, shader)) {
				if (ev.kind === 'write') { written.add(ev.name); continue; }
				const hit = [...referencedNames(ev.coordinate)].find(n => written.has(n));
				if (hit) out.push({ span: ev.call.span, message: `texture sampled with coordinate '${hit}' after it was modified; this causes a dependent texture read` });
			}
		}
		return out;
	},
};
