import {
	type Declaration, type Expr, type FunctionDecl, type ParamDirection, type ShaderAst, type Span, type TypeSpec,
	functionsOf, forEachBodyExpr, walkStmt,
} from './ast';
import type { Token } from './core/tokens';
import { AssertNever } from './utils';

export type SymbolRole =
	| 'stage-input'
	| 'stage-output'
	| 'input-attachment'
	| 'sampler'
	| 'uniform-block'
	| 'uniform'
	| 'block-field'
	| 'struct'
	| 'struct-field'
	| 'function'
	| 'parameter'
	| 'local'
	| 'global'
	| 'constant';

export type CaseStyle = 'lower-snake' | 'upper-snake' | 'upper-camel' | 'lower-camel' | 'other';

export interface ShaderSymbol {
	name: string;
	role: SymbolRole;
	caseStyle: CaseStyle;
	// the name token
	span: Span;
	typeName: string;
	// type and declarator array dimensions together; null marks an unsized `[]`
	arrayDims: readonly (Expr | null)[];
	isConst: boolean;
	direction?: ParamDirection;
	// enclosing function for parameters and locals
	scope?: string;
	// owning struct or instanced block for fields; such fields are not visible as bare names
	container?: string;
}

export interface SymbolTable {
	symbols: readonly ShaderSymbol[];
	byName: ReadonlyMap<string, readonly ShaderSymbol[]>;
	constants: ReadonlySet<string>;
	defines: ReadonlySet<string>;
	callGraph: ReadonlyMap<string, ReadonlySet<string>>;
	reachableFromMain: ReadonlySet<string>;
	textureCoords: ReadonlySet<string>;
	typeOf(name: string, scope?: string): string | undefined;
	lookup(name: string, scope?: string): ShaderSymbol | undefined;
}

const LOWER_SNAKE = /^[a-z][a-z0-9]*(_[a-z0-9]+)*$/;
const UPPER_SNAKE = /^[A-Z][A-Z0-9]*(_[A-Z0-9]+)*$/;
const UPPER_CAMEL = /^[A-Z][a-zA-Z0-9]*$/;
const LOWER_CAMEL = /^[a-z][a-zA-Z0-9]*$/;
const DEFINE = /^#\s*define\s+([A-Za-z_]\w*)/;
const TYPE_ROLES: ReadonlySet<SymbolRole> = new Set<SymbolRole>(['struct', 'uniform-block']);

export function caseStyleOf(name: string): CaseStyle {
	if (LOWER_SNAKE.test(name)) return 'lower-snake';
	if (UPPER_CAMEL.test(name) && /[a-z]/.test(name)) return 'upper-camel';
	if (UPPER_SNAKE.test(name)) return 'upper-snake';
	if (LOWER_CAMEL.test(name)) return 'lower-camel';
	return 'other';
}

export function matchesCase(name: string, style: 'lower-snake' | 'upper-snake' | 'upper-camel'): boolean {
	switch (style) {
		case 'lower-snake': return LOWER_SNAKE.test(name);
		case 'upper-snake': return UPPER_SNAKE.test(name);
		case 'upper-camel': return UPPER_CAMEL.test(name);
		default: return AssertNever(style);
	}
}

function words(name: string): string[] {
	return name
		.replace(/([a-z0-9])([A-Z])/g, '$1_$2')
		.replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
		.split(/_+/)
		.filter(w => w.length > 0);
}

export function toSnakeCase(name: string): string {
	const w = words(name);
	return w.length ? w.map(s => s.toLowerCase()).join('_') : name;
}

export function toUpperCamel(name: string): string {
	const w = words(name);
	return w.length ? w.map(s => s.charAt(0).toUpperCase() + s.slice(1).toLowerCase()).join('') : name;
}

/** Whether a name reads as a texture coordinate: `uv`, `in_uv0`, `vTexCoord`, `tex_coords`. */
export function looksLikeTextureCoord(name: string): boolean {
	const w = words(name).map(s => s.toLowerCase());
	for (let i = 0; i < w.length; i++) {
		const cur = w[i] ?? '';
		if (/^uvs?\d*$/.test(cur) || /^texcoords?\d*$/.test(cur)) return true;
		if (cur === 'tex' && /^coords?\d*$/.test(w[i + 1] ?? '')) return true;
	}
	return false;
}

class Collector {
	readonly symbols: ShaderSymbol[] = [];

	add(name: string, role: SymbolRole, span: Span, type: TypeSpec | string, extra?: Partial<ShaderSymbol>) {
		this.symbols.push({
			name, role, span,
			caseStyle: caseStyleOf(name),
			typeName: typeof type === 'string' ? type : type.name,
			arrayDims: typeof type === 'string' ? [] : type.arrayDims,
			isConst: role === 'constant',
			...extra,
		});
	}
}

function collectDeclaration(c: Collector, d: Declaration) {
	switch (d.kind) {
		case 'StageIO':
			c.add(d.name, d.direction === 'in' ? 'stage-input' : 'stage-output', d.nameSpan, d.type);
			return;
		case 'InputAttachment':
			c.add(d.name, 'input-attachment', d.nameSpan, d.type);
			return;
		case 'Sampler':
			c.add(d.name, 'sampler', d.nameSpan, d.type);
			return;
		case 'UniformBlock': {
			c.add(d.blockName, 'uniform-block', d.blockNameSpan, d.blockName);
			const instanceRole: SymbolRole = d.storage === 'in' ? 'stage-input' : d.storage === 'out' ? 'stage-output' : 'uniform';
			if (d.instanceName && d.instanceNameSpan) c.add(d.instanceName, instanceRole, d.instanceNameSpan, d.blockName);
			for (const f of d.fields) c.add(f.name, 'block-field', f.nameSpan, f.type, { arrayDims: [...f.type.arrayDims, ...f.arrayDims], container: d.instanceName ? d.blockName : undefined });
			return;
		}
		case 'Struct':
			c.add(d.name, 'struct', d.nameSpan, d.name);
			for (const f of d.fields) c.add(f.name, 'struct-field', f.nameSpan, f.type, { arrayDims: [...f.type.arrayDims, ...f.arrayDims], container: d.name });
			return;
		case 'Function':
			c.add(d.name, 'function', d.nameSpan, d.returnType);
			for (const p of d.parameters) {
				if (p.name && p.nameSpan) c.add(p.name, 'parameter', p.nameSpan, p.type, { direction: p.direction, scope: d.name, isConst: p.qualifiers.includes('const') });
			}
			if (d.body) {
				walkStmt(d.body, s => {
					if (s.kind !== 'VarDecl') return;
					const isConst = s.qualifiers.includes('const');
					for (const decl of s.declarators) c.add(decl.name, isConst ? 'constant' : 'local', decl.nameSpan, s.varType, { arrayDims: [...s.varType.arrayDims, ...decl.arrayDims], scope: d.name });
				});
			}
			return;
		case 'GlobalVar': {
			const role: SymbolRole = d.qualifiers.includes('const') ? 'constant' : d.qualifiers.includes('uniform') ? 'uniform' : 'global';
			for (const decl of d.declarators) c.add(decl.name, role, decl.nameSpan, d.type, { arrayDims: [...d.type.arrayDims, ...decl.arrayDims] });
			return;
		}
		case 'Precision':
		case 'LayoutDefault':
			return;
		default:
			AssertNever(d, 'unhandled declaration kind');
	}
}

function buildCallGraph(fns: readonly FunctionDecl[]): Map<string, Set<string>> {
	const graph = new Map<string, Set<string>>();
	for (const fn of fns) {
		const callees = graph.get(fn.name) ?? new Set<string>();
		graph.set(fn.name, callees);
		forEachBodyExpr(fn, e => {
			if (e.kind === 'Call' && !e.isConstructor) callees.add(e.callee);
		});
	}
	return graph;
}

function reachableFrom(root: string, graph: ReadonlyMap<string, ReadonlySet<string>>): Set<string> {
	const seen = new Set<string>();
	if (!graph.has(root)) return seen;
	const queue = [root];
	while (queue.length) {
		const cur = queue.shift();
		if (cur === undefined || seen.has(cur)) continue;
		seen.add(cur);
		for (const next of graph.get(cur) ?? []) if (graph.has(next) && !seen.has(next)) queue.push(next);
	}
	return seen;
}

function isVec2(typeName: string): boolean {
	return /^[iud]?vec2$/.test(typeName);
}

/**
 * Build the symbol table for a parsed shader. Reads the AST and the directive
 * tokens; never mutates either.
 */
export function classify(ast: ShaderAst, tokens: readonly Token[]): SymbolTable {
	const c = new Collector();
	for (const d of ast.declarations) collectDeclaration(c, d);
	const symbols = c.symbols;

	const byName = new Map<string, ShaderSymbol[]>();
	for (const s of symbols) {
		const list = byName.get(s.name) ?? [];
		list.push(s);
		byName.set(s.name, list);
	}

	const defines = new Set<string>();
	for (const t of tokens) {
		if (t.kind !== 'directive') continue;
		const m = DEFINE.exec(t.value);
		if (m?.[1]) defines.add(m[1]);
	}
	const constants = new Set<string>(defines);
	for (const s of symbols) if (s.isConst) constants.add(s.name);

	const callGraph = buildCallGraph(functionsOf(ast.declarations));
	const reachableFromMain = reachableFrom('main', callGraph);

	const textureCoords = new Set<string>();
	for (const s of symbols) {
		if (!looksLikeTextureCoord(s.name)) continue;
		if (s.role === 'stage-input' || ((s.role === 'local' || s.role === 'parameter') && isVec2(s.typeName))) textureCoords.add(s.name);
	}

	const lookup = (name: string, scope?: string): ShaderSymbol | undefined => {
		const list = byName.get(name);
		if (!list) return undefined;
		if (scope !== undefined) {
			const local = list.find(s => s.scope === scope);
			if (local) return local;
		}
		return list.find(s => s.scope === undefined && s.container === undefined && !TYPE_ROLES.has(s.role) && s.role !== 'function');
	};

	return {
		symbols,
		byName,
		constants,
		defines,
		callGraph,
		reachableFromMain,
		textureCoords,
		lookup,
		typeOf: (name, scope) => lookup(name, scope)?.typeName,
	};
}

/** Root variable of an lvalue: `a.xy`, `a[i]`, `(a)` all yield `a`. */
export function rootIdentifier(e: Expr): string | undefined {
	let cur = e;
	for (;;) {
		if (cur.kind === 'Identifier') return cur.name;
		if (cur.kind === 'Member' || cur.kind === 'Index') { cur = cur.object; continue; }
		if (cur.kind === 'Paren') { cur = cur.expression; continue; }
		return undefined;
	}
}
