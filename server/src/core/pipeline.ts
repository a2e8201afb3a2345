import { type AnalysisResult, AnalysisInputError, type Severity } from '../analysisTypes';
import { type ParseDiagnostic, parse } from '../ast';
import { inferStage, stageFromFileId } from '../builtins';
import { builtinDefs, type Defs } from '../defs';
import { parseDisabledRuleList } from '../diagSettings';
import { aggregate, runRules, syntaxDiagnostics } from '../engine';
import { type AnnotatedShader, type Rule, defaultRules, selectRules } from '../rules';
import { classify } from '../symbols';
import type { Token } from './tokens';
import { tokenize } from './tokenizer';

export type AnalyzeOptions = {
	// registry override; defaults to the built-in rules
	rules?: readonly Rule[];
	// rule ids, diagnostic codes or friendly names to skip
	disabled?: Iterable<string>;
	minSeverity?: Severity;
	defs?: Defs;
};

/** Lex, parse and classify a source without running any rule. */
export function annotate(fileId: string, source: string, defs: Defs = builtinDefs()): { shader: AnnotatedShader; parseDiagnostics: ParseDiagnostic[] } {
	const tokens: Token[] = [...tokenize(source, { filename: fileId, defs })];
	const { ast, diagnostics } = parse(tokens, { defs });
	const symbols = classify(ast, tokens);
	const stage = stageFromFileId(fileId, defs) ?? inferStage(ast, defs);
	return { shader: { fileId, source, tokens, ast, symbols, defs, stage }, parseDiagnostics: diagnostics };
}

/**
 * Analyze one shader source. Only a broken call contract throws; problems in
 * the source itself come back as diagnostics.
 */
export function analyzeShader(fileId: string, source: string, options: AnalyzeOptions = {}): AnalysisResult {
	if (typeof fileId !== 'string') throw new AnalysisInputError(`fileId must be a string, got ${typeof fileId}`);
	if (typeof source !== 'string') throw new AnalysisInputError(`source must be a string, got ${typeof source}`);

	const { shader, parseDiagnostics } = annotate(fileId, source, options.defs);
	const disabled = parseDisabledRuleList(options.disabled ? [...options.disabled] : []);
	const rules = selectRules(options.rules ?? defaultRules, { disabled, minSeverity: options.minSeverity });
	const syntax = disabled.has('syntax') ? [] : syntaxDiagnostics(shader.tokens, parseDiagnostics);
	const diagnostics = aggregate(fileId, source, syntax, runRules(shader, rules));
	return { fileId, diagnostics };
}
