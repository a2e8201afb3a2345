/* File identifier helpers and shader stage detection */
import { URI, Utils } from 'vscode-uri';
import { type ShaderAst, forEachBodyExpr, functionsOf, walkStmt } from './ast';
import type { Defs, ShaderStage } from './defs';
import { rootIdentifier } from './symbols';

// Compute a display filename (basename) from a VSCode-style URI or raw path
export function basenameFromUri(fileId: string): string {
	if (/^[a-zA-Z][\w+.-]*:\/\//.test(fileId)) {
		const base = Utils.basename(URI.parse(fileId));
		if (base) return base;
	}
	const parts = fileId.split(/[\\/]/);
	return parts[parts.length - 1] || fileId;
}

/** `light_pass.frag` -> { stem: 'light_pass', ext: 'frag' }; no dot means an empty extension. */
export function splitExtension(basename: string): { stem: string; ext: string } {
	const dot = basename.lastIndexOf('.');
	if (dot <= 0) return { stem: basename, ext: '' };
	return { stem: basename.slice(0, dot), ext: basename.slice(dot + 1) };
}

export function stageFromFileId(fileId: string, defs: Defs): ShaderStage | undefined {
	return defs.stageForExtension(splitExtension(basenameFromUri(fileId)).ext);
}

/**
 * Guess the stage from what the source does: a compute work-group layout,
 * a `gl_Position` write, or fragment-only built-ins, `discard` and input
 * attachments. Falls back to any other stage-specific built-in.
 */
export function inferStage(ast: ShaderAst, defs: Defs): ShaderStage | undefined {
	const decls = ast.declarations;
	if (decls.some(d => d.kind === 'LayoutDefault' && !!d.layout?.entries.some(e => e.key.startsWith('local_size')))) return 'compute';

	const fns = functionsOf(decls);
	const used = new Set<string>();
	let writesPosition = false;
	let discards = false;
	for (const fn of fns) {
		forEachBodyExpr(fn, e => {
			if (e.kind === 'Identifier') used.add(e.name);
			else if (e.kind === 'Call') used.add(e.callee);
			else if (e.kind === 'Assign' && rootIdentifier(e.target) === 'gl_Position') writesPosition = true;
		});
		if (fn.body) walkStmt(fn.body, s => { if (s.kind === 'JumpStmt' && s.keyword === 'discard') discards = true; });
	}
	if (writesPosition) return 'vertex';

	const usesAny = (stage: ShaderStage) => [...(defs.stageBuiltins.get(stage) ?? [])].some(n => used.has(n));
	if (discards || decls.some(d => d.kind === 'InputAttachment') || usesAny('fragment')) return 'fragment';
	if (usesAny('compute')) return 'compute';
	if (usesAny('vertex')) return 'vertex';
	return undefined;
}
