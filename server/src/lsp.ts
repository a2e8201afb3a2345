import { type CodeAction, CodeActionKind, type Diagnostic as LspDiagnostic, DiagnosticSeverity, TextEdit } from 'vscode-languageserver/node';
import type { Diagnostic, Severity } from './analysisTypes';
import { parseDisabledRuleList, parseMinSeverity } from './diagSettings';
import type { Rule } from './rules';

export const DIAGNOSTIC_SOURCE = 'glsl-style';
export const SETTINGS_SECTION = 'glslStyle';

export type ServerSettings = {
	disabledRules: Set<string>;
	minSeverity?: Severity;
	debug: boolean;
};

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** Normalize the `glslStyle` settings object; anything missing or malformed falls back to defaults. */
export function settingsFrom(raw: unknown): ServerSettings {
	if (!isRecord(raw)) return { disabledRules: new Set(), debug: false };
	return {
		disabledRules: parseDisabledRuleList(raw.disabledRules),
		minSeverity: parseMinSeverity(raw.minSeverity),
		debug: raw.debug === true,
	};
}

/** Pull the `glslStyle` section out of a full settings payload. */
export function sectionOf(payload: unknown): unknown {
	return isRecord(payload) ? payload[SETTINGS_SECTION] : undefined;
}

function severityOf(s: Severity): DiagnosticSeverity {
	switch (s) {
		case 'error': return DiagnosticSeverity.Error;
		case 'warning': return DiagnosticSeverity.Warning;
		case 'info': return DiagnosticSeverity.Information;
	}
}

export function toLspDiagnostic(d: Diagnostic): LspDiagnostic {
	const out: LspDiagnostic = {
		range: {
			start: { line: d.span.lineStart - 1, character: d.span.colStart - 1 },
			end: { line: d.span.lineEnd - 1, character: d.span.colEnd - 1 },
		},
		severity: severityOf(d.severity),
		message: d.message,
		source: DIAGNOSTIC_SOURCE,
		code: d.ruleId,
	};
	if (d.suggestedFix !== undefined) out.data = { suggestedFix: d.suggestedFix };
	return out;
}

function fixOf(d: LspDiagnostic): string | undefined {
	const data: unknown = d.data;
	if (isRecord(data) && typeof data.suggestedFix === 'string') return data.suggestedFix;
	return undefined;
}

/**
 * Quick fixes for our own diagnostics whose rule offers an in-place
 * replacement. Rename-style advice is left to the message.
 */
export function codeActionsFor(uri: string, diagnostics: readonly LspDiagnostic[], rules: readonly Rule[]): CodeAction[] {
	const actions: CodeAction[] = [];
	for (const d of diagnostics) {
		if (d.source !== DIAGNOSTIC_SOURCE || typeof d.code !== 'string') continue;
		const id = d.code;
		const rule = rules.find(r => r.id === id);
		const fix = fixOf(d);
		if (!rule || rule.fix !== 'replace' || fix === undefined) continue;
		actions.push({
			title: `Replace with '${fix}'`,
			kind: CodeActionKind.QuickFix,
			diagnostics: [d],
			edit: { changes: { [uri]: [TextEdit.replace(d.range, fix)] } },
		});
	}
	return actions;
}
