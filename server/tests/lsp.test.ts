import { describe, it, expect } from 'vitest';
import { CodeActionKind, DiagnosticSeverity } from 'vscode-languageserver/node';
import { analyzeShader } from '../src/core/pipeline';
import { DIAGNOSTIC_SOURCE, codeActionsFor, sectionOf, settingsFrom, toLspDiagnostic } from '../src/lsp';
import { defaultRules } from '../src/rules';

const URI = 'file:///project/shaders/tone_map.frag';

describe('lsp diagnostics', () => {
	it('converts spans to zero-based ranges', () => {
		const [d] = analyzeShader(URI, 'void main() {\n\tfloat h = value / 2.0;\n}').diagnostics;
		if (!d) throw new Error('expected a diagnostic');
		const lsp = toLspDiagnostic(d);
		expect(lsp.range).toEqual({ start: { line: 1, character: 11 }, end: { line: 1, character: 22 } });
		expect(lsp.severity).toBe(DiagnosticSeverity.Information);
		expect(lsp.source).toBe(DIAGNOSTIC_SOURCE);
		expect(lsp.code).toBe('division-by-constant');
		expect(lsp.data).toEqual({ suggestedFix: 'value * 0.5' });
	});

	it('maps severities and omits missing fixes', () => {
		const diags = analyzeShader(URI, '#version 450\nstruct light { float r; };').diagnostics.map(toLspDiagnostic);
		expect(diags.map(d => [d.code, d.severity])).toEqual([
			['no-version-directive', DiagnosticSeverity.Error],
			['naming-case', DiagnosticSeverity.Warning],
		]);
		expect(diags[0]?.data).toBeUndefined();
	});
});

describe('code actions', () => {
	it('offers a quick fix for in-place replacements', () => {
		const diags = analyzeShader(URI, 'void main() {\n\tfloat h = value / 2.0;\n}').diagnostics.map(toLspDiagnostic);
		const actions = codeActionsFor(URI, diags, defaultRules);
		expect(actions).toHaveLength(1);
		expect(actions[0]?.title).toBe("Replace with 'value * 0.5'");
		expect(actions[0]?.kind).toBe(CodeActionKind.QuickFix);
		expect(actions[0]?.edit?.changes?.[URI]).toEqual([
			{ range: { start: { line: 1, character: 11 }, end: { line: 1, character: 22 } }, newText: 'value * 0.5' },
		]);
	});

	it('skips advice-only fixes and foreign diagnostics', () => {
		const naming = analyzeShader(URI, 'struct light { float r; };').diagnostics.map(toLspDiagnostic);
		expect(naming.map(d => d.data)).toEqual([{ suggestedFix: 'Light' }]);
		expect(codeActionsFor(URI, naming, defaultRules)).toEqual([]);

		const foreign = naming.map(d => ({ ...d, source: 'other-linter' }));
		expect(codeActionsFor(URI, foreign, defaultRules)).toEqual([]);
	});
});

describe('server settings', () => {
	it('normalizes the settings section', () => {
		const s = settingsFrom({ disabledRules: 'GLS020, naming_case', minSeverity: 'Warning', debug: true });
		expect(s.disabledRules).toEqual(new Set(['division-by-constant', 'naming-case']));
		expect(s.minSeverity).toBe('warning');
		expect(s.debug).toBe(true);
	});

	it('falls back to defaults', () => {
		expect(settingsFrom(null)).toEqual({ disabledRules: new Set(), debug: false });
		expect(settingsFrom({ debug: 'yes' }).debug).toBe(false);
	});

	it('pulls the section out of a configuration payload', () => {
		expect(sectionOf({ glslStyle: { debug: true } })).toEqual({ debug: true });
		expect(sectionOf({ other: 1 })).toBeUndefined();
		expect(sectionOf('glslStyle')).toBeUndefined();
	});
});
