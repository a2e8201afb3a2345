import { type Severity, atLeast, normalizeRuleId } from '../analysisTypes';
import { divisionByConstantRule, madOperationRule, manualLerpRule, sumAsDotRule, swizzleConstructorRule } from './arithmetic';
import { noVersionDirectiveRule } from './directives';
import { fileNameRule } from './fileName';
import { dynamicLoopBoundRule } from './loops';
import { namingCaseRule, outParamSuffixRule } from './naming';
import { declarationOrderRule } from './ordering';
import { fragmentUvMutationRule } from './textures';
import type { Rule } from './types';

export type { AnnotatedShader, Rule, RuleFinding } from './types';

// Registration order is the tie-break for diagnostics at the same offset.
// Frozen down to each rule object: the registry is shared by every analysis in the process.
export const defaultRules: readonly Rule[] = Object.freeze([
	noVersionDirectiveRule,
	namingCaseRule,
	outParamSuffixRule,
	declarationOrderRule,
	fileNameRule,
	divisionByConstantRule,
	manualLerpRule,
	sumAsDotRule,
	swizzleConstructorRule,
	dynamicLoopBoundRule,
	fragmentUvMutationRule,
	madOperationRule,
].map(rule => Object.freeze(rule)));

export type RuleSelection = {
	// rule ids, diagnostic codes or friendly names
	disabled?: Iterable<string>;
	minSeverity?: Severity;
};

export function selectRules(rules: readonly Rule[], selection: RuleSelection = {}): Rule[] {
	const disabled = new Set<string>();
	for (const raw of selection.disabled ?? []) {
		const id = normalizeRuleId(raw);
		if (id) disabled.add(id);
	}
	const min = selection.minSeverity;
	return rules.filter(r => !disabled.has(normalizeRuleId(r.id) ?? r.id) && !disabled.has(normalizeRuleId(r.code) ?? r.code) && (!min || atLeast(r.severity, min)));
}
