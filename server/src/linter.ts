// Public entry point of the analysis core.
export { analyzeShader, annotate, type AnalyzeOptions } from './core/pipeline';
export {
	AnalysisInputError, GLSL_DIAGCODES, normalizeRuleId,
	type AnalysisResult, type Diagnostic, type DiagnosticSpan, type DiagCode, type Severity,
} from './analysisTypes';
export { defaultRules, selectRules, type AnnotatedShader, type Rule, type RuleFinding, type RuleSelection } from './rules';
export { tokenize, Tokenizer } from './core/tokenizer';
export type { Token, TokenKind } from './core/tokens';
export { parse } from './ast';
export { classify, type ShaderSymbol, type SymbolRole, type SymbolTable } from './symbols';
export { builtinDefs, validateAndCreate, type Defs, type ShaderStage } from './defs';
