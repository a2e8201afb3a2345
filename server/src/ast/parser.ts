/*
	Recursive-descent parser for GLSL shader sources. Builds the declaration
	list in source order and, inside function bodies, the statement and
	expression trees the pattern rules match on. Errors never escape: a bad
	declaration is reported and skipped to the next top-level boundary, a bad
	expression becomes an ErrorExpr.
*/
import { builtinDefs, type Defs } from '../defs';
import { TokenStream, type Token, type TokenKind } from '../core/tokens';
import type {
	AssignOp, BinOp, Declaration, Declarator, Expr, Field, FunctionDecl, Layout, LayoutEntry,
	ParamDirection, Parameter, ParseDiagnostic, ShaderAst, Span, Stmt, TypeSpec, UnOp,
} from './types';
import { isAssignOp, spanFrom } from './types';

const MAX_DEPTH = 256;
const MAX_CHAINED_OPERATORS = 4096;
const SAMPLER_TYPE = /^[iu]?(sampler|texture)/;
const SUBPASS_TYPE = /^[iu]?subpassInput/;
const PARAM_QUALIFIERS = new Set(['in', 'out', 'inout', 'const', 'highp', 'mediump', 'lowp', 'precise', 'readonly', 'writeonly', 'coherent', 'volatile', 'restrict']);
const UNARY_OPS = new Set(['!', '~', '++', '--', '+', '-']);
// tokens a failed primary must not swallow, so the enclosing construct can close
const CLOSERS = new Set([';', '}', ')', ']', ',']);

class ParseError extends Error {
	constructor(message: string, readonly span: Span) {
		super(message);
		this.name = 'ParseError';
	}
}

type ParseOptions = { defs?: Defs };

export type ParseResult = { ast: ShaderAst; diagnostics: ParseDiagnostic[] };

/**
 * Parse a token sequence (as produced by `tokenize`) into a ShaderAst.
 * Directive and error tokens are skipped here; token-level rules and the
 * pipeline handle them.
 */
export function parse(tokens: Iterable<Token>, opts?: ParseOptions): ParseResult {
	const code: Token[] = [];
	for (const t of tokens) {
		if (t.kind === 'directive' || t.kind === 'error') continue;
		code.push(t);
		if (t.kind === 'eof') break;
	}
	const P = new Parser(new TokenStream(code), opts?.defs ?? builtinDefs());
	return P.parseShader();
}

class Parser {
	private readonly ts: TokenStream;
	private readonly defs: Defs;
	private diagnostics: ParseDiagnostic[] = [];
	private depth = 0;
	// binary and postfix operators in the current top-level expression
	private chained = 0;
	private exprNesting = 0;
	// end offset of the last consumed token, for closing spans
	private lastEnd = 0;

	constructor(ts: TokenStream, defs: Defs) { this.ts = ts; this.defs = defs; }

	// ---------------------------------------------------------------- token helpers

	private peek(): Token { return this.ts.peek(); }
	private next(): Token {
		const t = this.ts.next();
		if (t.kind !== 'eof') this.lastEnd = t.span.end;
		return t;
	}

	private peekAt(k: number): Token {
		if (k === 0) return this.peek();
		const m = this.ts.mark();
		let t = this.ts.next();
		for (let i = 0; i < k && t.kind !== 'eof'; i++) t = this.ts.next();
		this.ts.reset(m);
		return t;
	}

	private is(kind: TokenKind, value?: string, t: Token = this.peek()): boolean {
		return t.kind === kind && (value === undefined || t.value === value);
	}

	private maybe(kind: TokenKind, value?: string): Token | null {
		if (this.is(kind, value)) return this.next();
		return null;
	}

	// insertion recovery: do not consume the unexpected token; fabricate the expected one
	private eat(kind: TokenKind, value?: string): Token {
		const t = this.peek();
		if (this.is(kind, value, t)) return this.next();
		this.report(t.span, `expected ${value ? `'${value}'` : kind}${t.kind === 'eof' ? ' before end of file' : ` but found '${t.value}'`}`);
		return { ...t, kind, value: value ?? '', span: { start: t.span.start, end: t.span.start }, leading: [] };
	}

	// strict variant used in declaration headers, where a wrong token means the whole declaration is unusable
	private expect(kind: TokenKind, value?: string, what?: string): Token {
		const t = this.peek();
		if (this.is(kind, value, t)) return this.next();
		throw new ParseError(`expected ${what ?? (value ? `'${value}'` : kind)}${t.kind === 'eof' ? ' before end of file' : ` but found '${t.value}'`}`, t.span);
	}

	private report(span: Span, message: string) {
		this.diagnostics.push({ span: { start: span.start, end: span.end }, message });
	}

	private enter(at: Token) {
		if (++this.depth > MAX_DEPTH) {
			this.depth--;
			throw new ParseError('nesting too deep', at.span);
		}
	}
	private leave() { this.depth--; }

	private isTypeToken(t: Token): boolean {
		return t.kind === 'id' || (t.kind === 'keyword' && this.defs.isType(t.value));
	}

	// ---------------------------------------------------------------- top level

	parseShader(): ParseResult {
		const start = this.peek().span.start;
		const declarations: Declaration[] = [];
		while (this.peek().kind !== 'eof') {
			if (this.maybe('punct', ';')) continue;
			const before = this.ts.mark();
			try {
				declarations.push(...this.parseTopLevel());
			} catch (e: unknown) {
				if (!(e instanceof ParseError)) throw e;
				this.report(e.span, e.message);
				this.syncTopLevel();
			}
			// always make progress, whatever the failure mode
			if (this.ts.mark() === before) this.next();
		}
		const end = this.peek().span.end;
		return { ast: { span: spanFrom(start, Math.max(start, end)), kind: 'Shader', declarations }, diagnostics: this.diagnostics };
	}

	// Skip to the next `;` or the closing brace of a group opened at depth 0.
	private syncTopLevel() {
		let depth = 0;
		for (;;) {
			const t = this.peek();
			if (t.kind === 'eof') return;
			if (t.kind === 'punct') {
				if (t.value === '{' || t.value === '(' || t.value === '[') depth++;
				else if (t.value === '}' || t.value === ')' || t.value === ']') {
					depth--;
					if (depth <= 0 && t.value === '}') { this.next(); this.maybe('punct', ';'); return; }
					if (depth < 0) { this.next(); return; }
				} else if (t.value === ';' && depth <= 0) { this.next(); return; }
			}
			this.next();
		}
	}

	private parseTopLevel(): Declaration[] {
		const first = this.peek();
		const start = first.span.start;
		const comment = commentText(first);

		if (this.is('qualifier', 'precision')) {
			this.next();
			const precision = this.expect('qualifier', undefined, 'precision qualifier').value;
			const type = this.parseTypeSpec();
			this.expect('punct', ';');
			return [{ span: spanFrom(start, this.lastEnd), kind: 'Precision', precision, type: type.name, comment }];
		}

		let layout: Layout | undefined;
		const qualifiers: string[] = [];
		while (this.peek().kind === 'qualifier') {
			if (this.is('qualifier', 'layout')) {
				const l = this.parseLayout();
				layout = layout ? { span: spanFrom(layout.span.start, l.span.end), entries: [...layout.entries, ...l.entries] } : l;
				continue;
			}
			qualifiers.push(this.next().value);
		}

		// layout(local_size_x = 8) in;
		if (this.is('punct', ';') && qualifiers.length > 0) {
			this.next();
			return [{ span: spanFrom(start, this.lastEnd), kind: 'LayoutDefault', layout, storage: qualifiers[qualifiers.length - 1] ?? '', comment }];
		}

		if (this.is('keyword', 'struct')) {
			return this.parseStruct(start, comment, layout, qualifiers);
		}

		const storage = blockStorage(qualifiers);
		if (storage && this.is('id') && this.is('punct', '{', this.peekAt(1))) {
			return [this.parseInterfaceBlock(start, comment, layout, storage)];
		}

		const type = this.parseTypeSpec();
		const nameTok = this.expect('id', undefined, 'identifier');
		if (this.is('punct', '(')) {
			return [this.parseFunction(start, comment, type, nameTok)];
		}
		const declarators = this.parseDeclarators(nameTok);
		this.expect('punct', ';');
		const span = spanFrom(start, this.lastEnd);
		return this.classifyVariable(span, comment, layout, qualifiers, type, declarators);
	}

	private classifyVariable(span: Span, comment: string | undefined, layout: Layout | undefined, qualifiers: string[], type: TypeSpec, declarators: Declarator[]): Declaration[] {
		const direction = qualifiers.includes('in') || qualifiers.includes('attribute') ? 'in' : qualifiers.includes('out') ? 'out' : undefined;
		const isUniform = qualifiers.includes('uniform');
		// a declaration with several declarators yields one node per name, sharing the span
		if (direction) {
			return declarators.map(d => ({
				span, layout, comment, kind: 'StageIO' as const, direction, qualifiers,
				location: layoutInt(layout, 'location'), type: withDims(type, d), name: d.name, nameSpan: d.nameSpan,
			}));
		}
		if (isUniform && SUBPASS_TYPE.test(type.name)) {
			return declarators.map(d => ({
				span, layout, comment, kind: 'InputAttachment' as const,
				index: layoutInt(layout, 'input_attachment_index'), set: layoutInt(layout, 'set'), binding: layoutInt(layout, 'binding'),
				type: withDims(type, d), name: d.name, nameSpan: d.nameSpan,
			}));
		}
		if (isUniform && SAMPLER_TYPE.test(type.name)) {
			return declarators.map(d => ({
				span, layout, comment, kind: 'Sampler' as const,
				set: layoutInt(layout, 'set'), binding: layoutInt(layout, 'binding'),
				type: withDims(type, d), name: d.name, nameSpan: d.nameSpan,
			}));
		}
		return [{ span, layout, comment, kind: 'GlobalVar', qualifiers, type, declarators }];
	}

	private parseLayout(): Layout {
		const kw = this.expect('qualifier', 'layout');
		this.expect('punct', '(');
		const entries: LayoutEntry[] = [];
		for (;;) {
			if (this.maybe('punct', ')')) break;
			const keyTok = this.peek();
			if (keyTok.kind === 'eof') throw new ParseError("missing ')' to close layout qualifier", keyTok.span);
			if (keyTok.kind !== 'id' && keyTok.kind !== 'qualifier' && keyTok.kind !== 'keyword') {
				this.report(keyTok.span, `unexpected '${keyTok.value}' in layout qualifier`);
				while (!this.is('punct', ',') && !this.is('punct', ')') && this.peek().kind !== 'eof') this.next();
				this.maybe('punct', ',');
				continue;
			}
			this.next();
			let value: Expr | undefined;
			if (this.is('op', '=')) {
				// fast path `key = <int>`; anything else rewinds and takes a full expression
				const m = this.ts.mark();
				this.next();
				const lit = this.peek();
				const after = this.peekAt(1);
				if (lit.kind === 'number' && (this.is('punct', ',', after) || this.is('punct', ')', after))) {
					this.next();
					value = numberLiteral(lit);
				} else {
					this.ts.reset(m);
					this.next();
					value = this.conditional();
				}
			}
			entries.push({ span: spanFrom(keyTok.span.start, value ? value.span.end : keyTok.span.end), key: keyTok.value, value });
			if (!this.maybe('punct', ',') && !this.is('punct', ')')) {
				throw new ParseError(`expected ',' or ')' in layout qualifier but found '${this.peek().value}'`, this.peek().span);
			}
		}
		return { span: spanFrom(kw.span.start, this.lastEnd), entries };
	}

	private parseTypeSpec(): TypeSpec {
		const t = this.peek();
		if (!this.isTypeToken(t)) {
			throw new ParseError(t.kind === 'eof' ? 'expected type before end of file' : `expected type but found '${t.value}'`, t.span);
		}
		this.next();
		const arrayDims = this.parseArrayDims();
		return { span: spanFrom(t.span.start, this.lastEnd), name: t.value, arrayDims };
	}

	private parseArrayDims(): (Expr | null)[] {
		const dims: (Expr | null)[] = [];
		while (this.maybe('punct', '[')) {
			if (this.maybe('punct', ']')) { dims.push(null); continue; }
			dims.push(this.conditional());
			this.eat('punct', ']');
		}
		return dims;
	}

	private parseDeclarators(firstName: Token): Declarator[] {
		const out: Declarator[] = [];
		let nameTok = firstName;
		for (;;) {
			const arrayDims = this.parseArrayDims();
			let initializer: Expr | undefined;
			if (this.maybe('op', '=')) initializer = this.is('punct', '{') ? this.skipInitializerList() : this.assignment();
			out.push({ span: spanFrom(nameTok.span.start, this.lastEnd), name: nameTok.value, nameSpan: nameTok.span, arrayDims, initializer });
			if (!this.maybe('punct', ',')) break;
			nameTok = this.expect('id', undefined, 'identifier');
		}
		return out;
	}

	// `= { ... }` aggregate initializers are kept opaque
	private skipInitializerList(): Expr {
		const open = this.next();
		let depth = 1;
		while (depth > 0 && this.peek().kind !== 'eof') {
			const t = this.next();
			if (t.kind === 'punct' && t.value === '{') depth++;
			else if (t.kind === 'punct' && t.value === '}') depth--;
		}
		if (depth > 0) this.report(open.span, "missing '}' to close initializer list");
		return { span: spanFrom(open.span.start, this.lastEnd), kind: 'ErrorExpr' };
	}

	private parseStruct(start: number, comment: string | undefined, layout: Layout | undefined, qualifiers: string[]): Declaration[] {
		this.expect('keyword', 'struct');
		const nameTok = this.expect('id', undefined, 'struct name');
		this.expect('punct', '{');
		const fields = this.parseFieldList();
		this.eat('punct', '}');
		const out: Declaration[] = [];
		const structSpanEnd = this.lastEnd;
		if (this.is('id')) {
			const declarators = this.parseDeclarators(this.next());
			this.expect('punct', ';');
			out.push({ span: spanFrom(start, structSpanEnd), kind: 'Struct', name: nameTok.value, nameSpan: nameTok.span, fields, comment, layout });
			const type: TypeSpec = { span: nameTok.span, name: nameTok.value, arrayDims: [] };
			out.push({ span: spanFrom(start, this.lastEnd), kind: 'GlobalVar', qualifiers, type, declarators, layout });
			return out;
		}
		this.expect('punct', ';');
		out.push({ span: spanFrom(start, this.lastEnd), kind: 'Struct', name: nameTok.value, nameSpan: nameTok.span, fields, comment, layout });
		return out;
	}

	private parseInterfaceBlock(start: number, comment: string | undefined, layout: Layout | undefined, storage: 'uniform' | 'buffer' | 'in' | 'out'): Declaration {
		const nameTok = this.expect('id', undefined, 'block name');
		this.expect('punct', '{');
		const fields = this.parseFieldList();
		this.eat('punct', '}');
		let instance: Token | undefined;
		if (this.is('id')) {
			instance = this.next();
			this.parseArrayDims();
		}
		this.expect('punct', ';');
		return {
			span: spanFrom(start, this.lastEnd), kind: 'UniformBlock', layout, comment, storage,
			set: layoutInt(layout, 'set'), binding: layoutInt(layout, 'binding'),
			isPushConstant: !!layout?.entries.some(e => e.key === 'push_constant'),
			blockName: nameTok.value, blockNameSpan: nameTok.span,
			instanceName: instance?.value, instanceNameSpan: instance?.span, fields,
		};
	}

	// after '{' ; stops before '}'
	private parseFieldList(): Field[] {
		const fields: Field[] = [];
		while (!this.is('punct', '}') && this.peek().kind !== 'eof') {
			const before = this.ts.mark();
			try {
				const start = this.peek().span.start;
				const qualifiers: string[] = [];
				while (this.peek().kind === 'qualifier') {
					if (this.is('qualifier', 'layout')) { this.parseLayout(); continue; }
					qualifiers.push(this.next().value);
				}
				const type = this.parseTypeSpec();
				for (;;) {
					const nameTok = this.expect('id', undefined, 'field name');
					const arrayDims = this.parseArrayDims();
					fields.push({ span: spanFrom(start, this.lastEnd), qualifiers, type, name: nameTok.value, nameSpan: nameTok.span, arrayDims });
					if (!this.maybe('punct', ',')) break;
				}
				this.expect('punct', ';');
			} catch (e: unknown) {
				if (!(e instanceof ParseError)) throw e;
				this.report(e.span, e.message);
				while (!this.is('punct', ';') && !this.is('punct', '}') && this.peek().kind !== 'eof') this.next();
				this.maybe('punct', ';');
			}
			if (this.ts.mark() === before) this.next();
		}
		if (this.peek().kind === 'eof') this.report(this.peek().span, "missing '}' to close field list");
		return fields;
	}

	private parseFunction(start: number, comment: string | undefined, returnType: TypeSpec, nameTok: Token): FunctionDecl {
		this.expect('punct', '(');
		const parameters = this.parseParams();
		let body: Stmt | undefined;
		if (!this.maybe('punct', ';')) body = this.parseBlock();
		return { span: spanFrom(start, this.lastEnd), kind: 'Function', name: nameTok.value, nameSpan: nameTok.span, returnType, parameters, body, comment };
	}

	// after '('
	private parseParams(): Parameter[] {
		const params: Parameter[] = [];
		if (this.maybe('punct', ')')) return params;
		if (this.is('keyword', 'void') && this.is('punct', ')', this.peekAt(1))) { this.next(); this.next(); return params; }
		for (;;) {
			const t = this.peek();
			if (t.kind === 'eof' || this.is('punct', '{')) { this.report(t.span, "missing ')' to close parameter list"); return params; }
			const start = t.span.start;
			const qualifiers: string[] = [];
			while (this.peek().kind === 'qualifier' && PARAM_QUALIFIERS.has(this.peek().value)) qualifiers.push(this.next().value);
			const type = this.parseTypeSpec();
			let name: Token | undefined;
			if (this.is('id')) {
				name = this.next();
				type.arrayDims.push(...this.parseArrayDims());
			}
			params.push({ span: spanFrom(start, this.lastEnd), qualifiers, direction: paramDirection(qualifiers), type, name: name?.value, nameSpan: name?.span });
			if (this.maybe('punct', ',')) continue;
			if (this.maybe('punct', ')')) return params;
			const bad = this.peek();
			if (this.is('punct', '{')) { this.report(bad.span, "missing ')' to close parameter list"); return params; }
			throw new ParseError(`expected ',' or ')' in parameter list but found '${bad.value}'`, bad.span);
		}
	}

	// ---------------------------------------------------------------- statements

	private parseBlock(): Stmt {
		const lbrace = this.eat('punct', '{');
		const statements: Stmt[] = [];
		for (;;) {
			if (this.maybe('punct', '}')) break;
			const t = this.peek();
			if (t.kind === 'eof') { this.report(t.span, "missing '}' to close block"); break; }
			const before = this.ts.mark();
			statements.push(this.parseStmt());
			if (this.ts.mark() === before) {
				this.report(t.span, `unexpected '${t.value}'`);
				this.next();
			}
		}
		return { span: spanFrom(lbrace.span.start, this.lastEnd), kind: 'BlockStmt', statements };
	}

	private parseStmt(): Stmt {
		const t = this.peek();
		try {
			this.enter(t);
		} catch (e: unknown) {
			if (!(e instanceof ParseError)) throw e;
			this.report(e.span, e.message);
			return this.skipStatement(t);
		}
		try {
			return this.parseStmtInner(t);
		} finally {
			this.leave();
		}
	}

	private parseStmtInner(t: Token): Stmt {
		if (this.is('punct', ';')) { const semi = this.next(); return { span: semi.span, kind: 'EmptyStmt' }; }
		if (this.is('punct', '{')) return this.parseBlock();
		if (t.kind === 'keyword') {
			switch (t.value) {
				case 'if': return this.parseIf();
				case 'while': return this.parseWhile();
				case 'do': return this.parseDoWhile();
				case 'for': return this.parseFor();
				case 'return': return this.parseReturn();
				case 'break':
				case 'continue':
				case 'discard': {
					this.next();
					this.eat('punct', ';');
					const keyword = t.value === 'break' ? 'break' : t.value === 'continue' ? 'continue' : 'discard';
					return { span: spanFrom(t.span.start, this.lastEnd), kind: 'JumpStmt', keyword };
				}
				case 'switch':
				case 'struct':
					return this.parseOpaque(t);
				case 'else':
				case 'case':
				case 'default': {
					this.next();
					this.report(t.span, `unexpected '${t.value}'`);
					return { span: t.span, kind: 'ErrorStmt' };
				}
			}
		}
		if (this.isDeclStart()) return this.parseVarDecl();
		const expr = this.expression();
		if (expr.kind === 'ErrorExpr') return this.skipStatement(t);
		const semi = this.maybe('punct', ';');
		if (!semi) this.report(this.peek().span, "missing ';' after statement");
		return { span: spanFrom(expr.span.start, semi ? semi.span.end : expr.span.end), kind: 'ExprStmt', expression: expr };
	}

	private skipStatement(t: Token): Stmt {
		while (!this.is('punct', ';') && !this.is('punct', '}') && this.peek().kind !== 'eof') this.next();
		this.maybe('punct', ';');
		return { span: spanFrom(t.span.start, Math.max(t.span.end, this.lastEnd)), kind: 'ErrorStmt' };
	}

	// switch bodies and local struct declarations are skipped as a balanced group
	private parseOpaque(kw: Token): Stmt {
		this.next();
		let depth = 0;
		for (;;) {
			const t = this.peek();
			if (t.kind === 'eof') { this.report(kw.span, `unterminated '${kw.value}' statement`); break; }
			this.next();
			if (t.kind !== 'punct') continue;
			if (t.value === '{' || t.value === '(') depth++;
			else if (t.value === '}' || t.value === ')') {
				depth--;
				if (depth === 0 && t.value === '}') { if (kw.value === 'struct') this.skipStatement(t); break; }
			} else if (t.value === ';' && depth === 0) break;
		}
		return { span: spanFrom(kw.span.start, this.lastEnd), kind: 'OpaqueStmt', keyword: kw.value };
	}

	private isDeclStart(): boolean {
		const t0 = this.peek();
		if (t0.kind === 'qualifier') return true;
		if (!this.isTypeToken(t0)) return false;
		// skip `[...]` after the type name: `float[3] a;` versus `float[3](...)`
		let k = 1;
		let t = this.peekAt(k);
		while (this.is('punct', '[', t)) {
			let depth = 0;
			for (;;) {
				if (t.kind === 'eof') return false;
				if (this.is('punct', '[', t)) depth++;
				else if (this.is('punct', ']', t)) { depth--; if (depth === 0) break; }
				t = this.peekAt(++k);
			}
			t = this.peekAt(++k);
		}
		return t.kind === 'id';
	}

	private parseVarDecl(): Stmt {
		const start = this.peek().span.start;
		const qualifiers: string[] = [];
		while (this.peek().kind === 'qualifier') qualifiers.push(this.next().value);
		try {
			const varType = this.parseTypeSpec();
			const nameTok = this.expect('id', undefined, 'variable name');
			const declarators = this.parseDeclarators(nameTok);
			this.eat('punct', ';');
			return { span: spanFrom(start, this.lastEnd), kind: 'VarDecl', qualifiers, varType, declarators };
		} catch (e: unknown) {
			if (!(e instanceof ParseError)) throw e;
			this.report(e.span, e.message);
			return this.skipStatement(this.peek());
		}
	}

	private parseIf(): Stmt {
		const kw = this.next();
		this.eat('punct', '(');
		const condition = this.expression();
		this.eat('punct', ')');
		const then = this.parseStmt();
		let elseS: Stmt | undefined;
		if (this.maybe('keyword', 'else')) elseS = this.parseStmt();
		return { span: spanFrom(kw.span.start, this.lastEnd), kind: 'IfStmt', condition, then, else: elseS };
	}

	private parseWhile(): Stmt {
		const kw = this.next();
		this.eat('punct', '(');
		const condition = this.expression();
		this.eat('punct', ')');
		const body = this.parseStmt();
		return { span: spanFrom(kw.span.start, this.lastEnd), kind: 'WhileStmt', condition, body };
	}

	private parseDoWhile(): Stmt {
		const kw = this.next();
		const body = this.parseStmt();
		this.eat('keyword', 'while');
		this.eat('punct', '(');
		const condition = this.expression();
		this.eat('punct', ')');
		this.eat('punct', ';');
		return { span: spanFrom(kw.span.start, this.lastEnd), kind: 'DoWhileStmt', body, condition };
	}

	private parseFor(): Stmt {
		const kw = this.next();
		this.eat('punct', '(');
		// init (optional); both forms consume their ';'
		let init: Stmt | undefined;
		if (!this.maybe('punct', ';')) {
			if (this.isDeclStart()) init = this.parseVarDecl();
			else {
				const e = this.expression();
				this.eat('punct', ';');
				init = { span: spanFrom(e.span.start, this.lastEnd), kind: 'ExprStmt', expression: e };
			}
		}
		let condition: Expr | undefined;
		if (!this.maybe('punct', ';')) {
			condition = this.expression();
			this.eat('punct', ';');
		}
		let update: Expr | undefined;
		if (!this.maybe('punct', ')')) {
			update = this.expression();
			this.eat('punct', ')');
		}
		const body = this.parseStmt();
		return { span: spanFrom(kw.span.start, this.lastEnd), kind: 'ForStmt', init, condition, update, body };
	}

	private parseReturn(): Stmt {
		const kw = this.next();
		if (this.maybe('punct', ';')) return { span: spanFrom(kw.span.start, this.lastEnd), kind: 'ReturnStmt' };
		const expression = this.expression();
		if (!this.maybe('punct', ';')) this.report(this.peek().span, "missing ';' after return");
		return { span: spanFrom(kw.span.start, this.lastEnd), kind: 'ReturnStmt', expression };
	}

	// ---------------------------------------------------------------- expressions

	// Entry points: failures inside become an ErrorExpr here.
	private expression(): Expr { return this.guarded(() => this.parseSequence()); }
	private assignment(): Expr { return this.guarded(() => this.parseAssign()); }
	private conditional(): Expr { return this.guarded(() => this.parseConditional()); }

	private guarded(fn: () => Expr): Expr {
		const at = this.peek();
		if (this.exprNesting === 0) this.chained = 0;
		this.exprNesting++;
		try { return fn(); }
		catch (e: unknown) {
			if (!(e instanceof ParseError)) throw e;
			this.report(e.span, e.message);
			return { span: spanFrom(at.span.start, Math.max(at.span.end, this.lastEnd)), kind: 'ErrorExpr' };
		} finally { this.exprNesting--; }
	}

	// every chained operator deepens the tree by one level
	private chain(at: Token) {
		if (++this.chained > MAX_CHAINED_OPERATORS) throw new ParseError('expression too long', at.span);
	}

	private parseSequence(): Expr {
		const first = this.parseAssign();
		if (!this.is('punct', ',')) return first;
		const expressions = [first];
		while (this.maybe('punct', ',')) expressions.push(this.parseAssign());
		return { span: spanFrom(first.span.start, this.lastEnd), kind: 'Sequence', expressions };
	}

	// every nested expression passes through here, so this is where nesting depth is bounded
	private parseAssign(): Expr {
		this.enter(this.peek());
		try {
			const target = this.parseConditional();
			const look = this.peek();
			if (look.kind === 'op' && isAssignOp(look.value)) {
				const op: AssignOp = look.value;
				this.next();
				const value = this.parseAssign();
				return { span: spanFrom(target.span.start, value.span.end), kind: 'Assign', op, target, value };
			}
			return target;
		} finally { this.leave(); }
	}

	private parseConditional(): Expr {
		const test = this.parseBinary(1);
		if (!this.maybe('op', '?')) return test;
		const consequent = this.parseSequence();
		this.eat('op', ':');
		const alternate = this.parseAssign();
		return { span: spanFrom(test.span.start, alternate.span.end), kind: 'Conditional', test, consequent, alternate };
	}

	private prec(op: string): number {
		switch (op) {
			case '||': return 1;
			case '^^': return 2;
			case '&&': return 3;
			case '|': return 4;
			case '^': return 5;
			case '&': return 6;
			case '==': case '!=': return 7;
			case '<': case '>': case '<=': case '>=': return 8;
			case '<<': case '>>': return 9;
			case '+': case '-': return 10;
			case '*': case '/': case '%': return 11;
			default: return 0;
		}
	}

	private parseBinary(minPrec: number): Expr {
		let left = this.parseUnary();
		for (;;) {
			const look = this.peek();
			if (look.kind !== 'op') break;
			const prec = this.prec(look.value);
			if (prec === 0 || prec < minPrec || !isBinOp(look.value)) break;
			const op: BinOp = look.value;
			this.chain(look);
			this.next();
			// left-associative for every binary operator
			const right = this.parseBinary(prec + 1);
			left = { span: spanFrom(left.span.start, right.span.end), kind: 'Binary', op, left, right };
		}
		return left;
	}

	private parseUnary(): Expr {
		const t = this.peek();
		if (t.kind === 'op' && isUnOp(t.value)) {
			const op: UnOp = t.value;
			this.next();
			this.enter(t);
			try {
				const argument = this.parseUnary();
				return { span: spanFrom(t.span.start, argument.span.end), kind: 'Unary', op, argument, prefix: true };
			} finally { this.leave(); }
		}
		return this.parsePostfix(this.parsePrimary());
	}

	private parsePrimary(): Expr {
		const t = this.peek();
		if (t.kind === 'eof') throw new ParseError('unexpected end of file in expression', t.span);
		if (t.kind === 'punct' && CLOSERS.has(t.value)) throw new ParseError(`expected expression but found '${t.value}'`, t.span);
		this.next();
		if (t.kind === 'number') return numberLiteral(t);
		if (t.kind === 'keyword' && (t.value === 'true' || t.value === 'false')) return { span: t.span, kind: 'BoolLiteral', value: t.value === 'true' };
		if (t.kind === 'id') {
			if (this.is('punct', '(')) return this.parseCall(t, t.value, false);
			return { span: t.span, kind: 'Identifier', name: t.value };
		}
		if (t.kind === 'keyword' && this.defs.isType(t.value)) {
			// constructor: vec3(...), float[](...), float[3](...)
			const dims = this.parseArrayDims();
			if (!this.is('punct', '(')) throw new ParseError(`expected '(' after type '${t.value}'`, this.peek().span);
			return this.parseCall(t, dims.length ? `${t.value}[]` : t.value, true);
		}
		if (t.kind === 'punct' && t.value === '(') {
			const expression = this.parseSequence();
			this.eat('punct', ')');
			return { span: spanFrom(t.span.start, this.lastEnd), kind: 'Paren', expression };
		}
		throw new ParseError(`unexpected ${t.kind} '${t.value}'`, t.span);
	}

	// at '('
	private parseCall(calleeTok: Token, callee: string, isConstructor: boolean): Expr {
		this.next();
		const args = this.parseArgs();
		return { span: spanFrom(calleeTok.span.start, this.lastEnd), kind: 'Call', callee, calleeSpan: calleeTok.span, args, isConstructor };
	}

	// after '('; consumes the closing ')'
	private parseArgs(): Expr[] {
		const args: Expr[] = [];
		if (this.maybe('punct', ')')) return args;
		if (this.is('keyword', 'void') && this.is('punct', ')', this.peekAt(1))) { this.next(); this.next(); return args; }
		for (;;) {
			const before = this.ts.mark();
			args.push(this.assignment());
			if (this.maybe('punct', ',')) continue;
			if (this.maybe('punct', ')')) return args;
			const t = this.peek();
			if (t.kind === 'eof' || this.is('punct', ';') || this.is('punct', '}')) {
				this.report(t.span, "missing ')' to close call");
				return args;
			}
			this.report(t.span, `expected ',' or ')' but found '${t.value}'`);
			if (this.ts.mark() === before || t.kind !== 'punct') this.next();
		}
	}

	// Apply postfix operations (index, member/swizzle, method call, ++/--)
	private parsePostfix(expr: Expr): Expr {
		for (;;) {
			const t = this.peek();
			if (this.is('punct', '[', t) || this.is('op', '.', t) || (t.kind === 'op' && (t.value === '++' || t.value === '--'))) this.chain(t);
			if (this.maybe('punct', '[')) {
				const index = this.parseSequence();
				this.eat('punct', ']');
				expr = { span: spanFrom(expr.span.start, this.lastEnd), kind: 'Index', object: expr, index };
				continue;
			}
			if (this.maybe('op', '.')) {
				const prop = this.peek();
				if (prop.kind !== 'id') throw new ParseError(`expected field or swizzle after '.' but found '${prop.value}'`, prop.span);
				this.next();
				if (this.maybe('punct', '(')) {
					const args = this.parseArgs();
					expr = { span: spanFrom(expr.span.start, this.lastEnd), kind: 'MethodCall', object: expr, method: prop.value, args };
					continue;
				}
				expr = { span: spanFrom(expr.span.start, prop.span.end), kind: 'Member', object: expr, property: prop.value };
				continue;
			}
			if (t.kind === 'op' && (t.value === '++' || t.value === '--')) {
				this.next();
				expr = { span: spanFrom(expr.span.start, t.span.end), kind: 'Unary', op: t.value, argument: expr, prefix: false };
				continue;
			}
			break;
		}
		return expr;
	}
}

// ---------------------------------------------------------------- helpers

function isBinOp(op: string): op is BinOp {
	switch (op) {
		case '&&': case '||': case '^^': case '&': case '|': case '^': case '<<': case '>>':
		case '==': case '!=': case '<': case '<=': case '>': case '>=':
		case '+': case '-': case '*': case '/': case '%':
			return true;
		default:
			return false;
	}
}

function isUnOp(op: string): op is UnOp { return UNARY_OPS.has(op); }

export function numberLiteral(t: Token): Expr {
	const raw = t.value;
	const isHex = /^0[xX]/.test(raw);
	const body = raw.replace(isHex ? /[uU]$/ : /(lf|LF|[fFuU])$/, '');
	const isFloat = !isHex && (/[.eE]/.test(body) || /(lf|LF|[fF])$/.test(raw));
	let value: number;
	if (isHex) value = parseInt(body.slice(2) || '0', 16);
	else if (!isFloat && /^0[0-7]+$/.test(body)) value = parseInt(body, 8);
	else value = Number(body);
	return { span: t.span, kind: 'NumberLiteral', raw, value: Number.isFinite(value) ? value : NaN, isFloat };
}

function paramDirection(qualifiers: readonly string[]): ParamDirection {
	if (qualifiers.includes('inout')) return 'inout';
	if (qualifiers.includes('out')) return 'out';
	return 'in';
}

function blockStorage(qualifiers: readonly string[]): 'uniform' | 'buffer' | 'in' | 'out' | undefined {
	for (let i = qualifiers.length - 1; i >= 0; i--) {
		const q = qualifiers[i];
		if (q === 'uniform' || q === 'buffer' || q === 'in' || q === 'out') return q;
	}
	return undefined;
}

function layoutInt(layout: Layout | undefined, key: string): number | undefined {
	const entry = layout?.entries.find(e => e.key === key);
	if (!entry?.value || entry.value.kind !== 'NumberLiteral' || entry.value.isFloat) return undefined;
	return entry.value.value;
}

function withDims(type: TypeSpec, d: Declarator): TypeSpec {
	if (!d.arrayDims.length) return type;
	return { ...type, arrayDims: [...type.arrayDims, ...d.arrayDims] };
}

function commentText(t: Token): string | undefined {
	if (!t.leading.length) return undefined;
	const text = t.leading
		.map(c => c.kind === 'comment-line'
			? c.value.replace(/^\/\/\/?[ \t]?/, '')
			: c.value.replace(/^\/\*+/, '').replace(/\*\/$/, '').split('\n').map(l => l.replace(/^[ \t]*\*?[ \t]?/, '')).join('\n'))
		.join('\n')
		.trim();
	return text.length ? text : undefined;
}
