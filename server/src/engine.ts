import { TextDocument } from 'vscode-languageserver-textdocument';
import { type Diagnostic, type Severity, GLSL_DIAGCODES } from './analysisTypes';
import type { ParseDiagnostic } from './ast';
import type { Token } from './core/tokens';
import type { AnnotatedShader, Rule } from './rules';
import { stableSort } from './utils';

// A diagnostic still in offsets; `order` is the registration index of the rule that raised it.
export type RawDiagnostic = {
	ruleId: string;
	code: string;
	severity: Severity;
	message: string;
	start: number;
	end: number;
	order: number;
	suggestedFix?: string;
};

function describeError(err: unknown): string {
	if (err instanceof Error) return err.message;
	return String(err);
}

/**
 * Run each rule in order. A rule that throws is reported once as an
 * internal-rule-error and the remaining rules still run.
 */
export function runRules(shader: AnnotatedShader, rules: readonly Rule[]): RawDiagnostic[] {
	const out: RawDiagnostic[] = [];
	rules.forEach((rule, order) => {
		try {
			for (const f of rule.check(shader)) {
				out.push({
					ruleId: rule.id, code: rule.code, severity: rule.severity, message: f.message,
					start: f.span.start, end: f.span.end, order, suggestedFix: f.suggestedFix,
				});
			}
		} catch (err: unknown) {
			out.push({
				ruleId: 'internal-rule-error', code: GLSL_DIAGCODES.INTERNAL_RULE_ERROR, severity: 'error',
				message: `rule '${rule.id}' failed: ${describeError(err)}`, start: 0, end: 0, order,
			});
		}
	});
	return out;
}

export function syntaxDiagnostics(tokens: readonly Token[], parseDiagnostics: readonly ParseDiagnostic[]): RawDiagnostic[] {
	const raw: RawDiagnostic[] = [];
	const push = (start: number, end: number, message: string) => {
		raw.push({ ruleId: 'syntax', code: GLSL_DIAGCODES.SYNTAX, severity: 'error', message, start, end, order: -1 });
	};
	for (const t of tokens) if (t.kind === 'error') push(t.span.start, t.span.end, t.error ?? `unexpected '${t.value}'`);
	for (const d of parseDiagnostics) push(d.span.start, d.span.end, d.message);
	return stableSort(raw, (a, b) => a.start - b.start);
}

/**
 * Final ordering: syntax diagnostics first, then rule diagnostics by start
 * offset with registration order breaking ties. Exact duplicates (rule, span
 * and message) are dropped.
 */
export function aggregate(fileId: string, source: string, syntax: readonly RawDiagnostic[], fromRules: readonly RawDiagnostic[]): Diagnostic[] {
	const doc = TextDocument.create(fileId, 'glsl', 0, source);
	const ordered = [...syntax, ...stableSort(fromRules, (a, b) => a.start - b.start || a.order - b.order)];
	const seen = new Set<string>();
	const out: Diagnostic[] = [];
	for (const d of ordered) {
		const key = `${d.ruleId}\u0000${d.start}\u0000${d.end}\u0000${d.message}`;
		if (seen.has(key)) continue;
		seen.add(key);
		const start = Math.max(0, Math.min(d.start, source.length));
		const end = Math.max(start, Math.min(d.end, source.length));
		const s = doc.positionAt(start);
		const e = doc.positionAt(end);
		const diag: Diagnostic = {
			ruleId: d.ruleId,
			code: d.code,
			severity: d.severity,
			message: d.message,
			span: { lineStart: s.line + 1, colStart: s.character + 1, lineEnd: e.line + 1, colEnd: e.character + 1 },
			offsets: { start, end },
		};
		if (d.suggestedFix !== undefined) diag.suggestedFix = d.suggestedFix;
		out.push(diag);
	}
	return out;
}
