import type { ShaderAst, Span } from '../ast';
import type { Severity } from '../analysisTypes';
import type { Token } from '../core/tokens';
import type { Defs, ShaderStage } from '../defs';
import type { SymbolTable } from '../symbols';

/**
 * Everything a rule may read. Rules treat all of it as read-only.
 */
export type AnnotatedShader = {
	fileId: string;
	source: string;
	tokens: readonly Token[];
	ast: ShaderAst;
	symbols: SymbolTable;
	defs: Defs;
	// from the file extension, else inferred from the source
	stage: ShaderStage | undefined;
};

export type RuleFinding = {
	span: Span;
	message: string;
	suggestedFix?: string;
};

/**
 * Lint rule implementation. `fix: 'replace'` means a finding's suggestedFix
 * is the exact text to put in place of its span; `'advice'` fixes need more
 * than one edit (renames) and are only shown.
 */
export type Rule = {
	id: string;
	code: string;
	severity: Severity;
	description: string;
	fix?: 'replace' | 'advice';
	check: (shader: AnnotatedShader) => RuleFinding[];
};
