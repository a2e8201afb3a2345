import path from 'node:path';
import fs from 'node:fs/promises';
import type { Diagnostic } from '../src/analysisTypes';
import { type Expr, type ShaderAst, type Stmt, parse } from '../src/ast';
import { type AnalyzeOptions, analyzeShader } from '../src/core/pipeline';
import type { Token } from '../src/core/tokens';
import { tokenize } from '../src/core/tokenizer';

export async function readFixture(rel: string) {
	const p = path.join(__dirname, 'fixtures', rel);
	return fs.readFile(p, 'utf8');
}

export function tokensOf(source: string): Token[] {
	return [...tokenize(source)];
}

export function parseText(source: string) {
	return parse(tokenize(source));
}

export function astOf(source: string): ShaderAst {
	return parseText(source).ast;
}

/** Statements of the named function's body; throws when it has none. */
export function bodyOf(source: string, name = 'main'): Stmt[] {
	const fn = astOf(source).declarations.find(d => d.kind === 'Function' && d.name === name);
	if (!fn || fn.kind !== 'Function' || !fn.body || fn.body.kind !== 'BlockStmt') throw new Error(`no body for ${name}`);
	return fn.body.statements;
}

/** Parse one expression statement inside `main`. */
export function exprOf(expression: string): Expr {
	const [first] = bodyOf(`void main() { ${expression}; }`);
	if (!first || first.kind !== 'ExprStmt') throw new Error(`not an expression statement: ${expression}`);
	return first.expression;
}

/** Fully parenthesized rendering, for asserting tree shape. */
export function show(e: Expr): string {
	switch (e.kind) {
		case 'NumberLiteral': return e.raw;
		case 'BoolLiteral': return String(e.value);
		case 'Identifier': return e.name;
		case 'Call': return `${e.callee}(${e.args.map(show).join(', ')})`;
		case 'MethodCall': return `${show(e.object)}.${e.method}(${e.args.map(show).join(', ')})`;
		case 'Member': return `${show(e.object)}.${e.property}`;
		case 'Index': return `${show(e.object)}[${show(e.index)}]`;
		case 'Unary': return e.prefix ? `(${e.op}${show(e.argument)})` : `(${show(e.argument)}${e.op})`;
		case 'Binary': return `(${show(e.left)} ${e.op} ${show(e.right)})`;
		case 'Assign': return `(${show(e.target)} ${e.op} ${show(e.value)})`;
		case 'Conditional': return `(${show(e.test)} ? ${show(e.consequent)} : ${show(e.alternate)})`;
		case 'Sequence': return `(${e.expressions.map(show).join(', ')})`;
		case 'Paren': return `[${show(e.expression)}]`;
		case 'ErrorExpr': return '<error>';
	}
}

export function lint(source: string, fileId = 'test_shader.frag', options?: AnalyzeOptions): Diagnostic[] {
	return analyzeShader(fileId, source, options).diagnostics;
}

export function byRule(diags: readonly Diagnostic[], ruleId: string): Diagnostic[] {
	return diags.filter(d => d.ruleId === ruleId);
}

/** Diagnostics of one rule for a source linted as `test_shader.frag` (or `fileId`). */
export function findings(ruleId: string, source: string, fileId?: string): Diagnostic[] {
	return byRule(lint(source, fileId), ruleId);
}
