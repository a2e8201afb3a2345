export const GLSL_DIAGCODES = {
	SYNTAX: 'GLS000',
	INTERNAL_RULE_ERROR: 'GLS001',
	NO_VERSION_DIRECTIVE: 'GLS002',
	NAMING_CASE: 'GLS010',
	OUT_PARAM_SUFFIX: 'GLS011',
	DECLARATION_ORDER: 'GLS012',
	FILE_NAME: 'GLS013',
	DIVISION_BY_CONSTANT: 'GLS020',
	MANUAL_LERP: 'GLS021',
	SUM_AS_DOT: 'GLS022',
	SWIZZLE_CONSTRUCTOR: 'GLS023',
	DYNAMIC_LOOP_BOUND: 'GLS024',
	FRAGMENT_UV_MUTATION: 'GLS025',
	MAD_OPERATION: 'GLS026',
} as const;
export type DiagCode = typeof GLSL_DIAGCODES[keyof typeof GLSL_DIAGCODES];

export type Severity = 'error' | 'warning' | 'info';

const SEVERITY_RANK: Record<Severity, number> = { error: 0, warning: 1, info: 2 };

/** True when `s` is at least as severe as `min`. */
export function atLeast(s: Severity, min: Severity): boolean {
	return SEVERITY_RANK[s] <= SEVERITY_RANK[min];
}

export function isSeverity(v: unknown): v is Severity {
	return v === 'error' || v === 'warning' || v === 'info';
}

// 1-based, end exclusive
export interface DiagnosticSpan {
	lineStart: number;
	colStart: number;
	lineEnd: number;
	colEnd: number;
}

export interface Diagnostic {
	ruleId: string;
	code: string;
	severity: Severity;
	message: string;
	span: DiagnosticSpan;
	offsets: { start: number; end: number };
	suggestedFix?: string;
}

export interface AnalysisResult {
	fileId: string;
	diagnostics: Diagnostic[];
}

// Thrown only for a broken call contract (non-string inputs); everything about the source itself is a diagnostic.
export class AnalysisInputError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'AnalysisInputError';
	}
}

// rule ids are the kebab-case spelling of the code names above
const CODE_TO_ID = new Map<string, string>();
for (const [enumName, code] of Object.entries(GLSL_DIAGCODES)) {
	CODE_TO_ID.set(code, enumName.toLowerCase().replace(/_/g, '-'));
}

/**
 * Resolve user input (a code such as `GLS021`, a rule id, or a loose spelling
 * like `MANUAL_LERP`) to a rule id. Ids of rules outside the built-in set
 * pass through in kebab form so custom rules can be disabled too.
 */
export function normalizeRuleId(raw: string | null | undefined): string | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const byCode = CODE_TO_ID.get(trimmed.toUpperCase());
	if (byCode) return byCode;
	return trimmed.toLowerCase().replace(/[_\s]+/g, '-');
}
