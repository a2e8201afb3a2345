import { GLSL_DIAGCODES } from '../analysisTypes';
import { type ShaderSymbol, matchesCase, toSnakeCase, toUpperCamel } from '../symbols';
import type { Rule, RuleFinding } from './types';

function label(s: ShaderSymbol): string {
	switch (s.role) {
		case 'struct': return 'struct name';
		case 'uniform-block': return 'block name';
		case 'function': return 'function name';
		case 'parameter': return 'parameter name';
		case 'block-field':
		case 'struct-field': return 'field name';
		default: return 'variable name';
	}
}

export const namingCaseRule: Rule = {
	id: 'naming-case',
	code: GLSL_DIAGCODES.NAMING_CASE,
	severity: 'warning',
	description: 'Variables, functions and fields use lower_snake_case; struct and block types use UpperCamelCase.',
	fix: 'advice',
	check({ symbols }) {
		const out: RuleFinding[] = [];
		for (const s of symbols.symbols) {
			// built-in redeclarations (gl_PerVertex members and friends) keep their names
			if (s.name.startsWith('gl_')) continue;
			if (s.role === 'struct' || s.role === 'uniform-block') {
				if (matchesCase(s.name, 'upper-camel')) continue;
				out.push({ span: s.span, message: `${label(s)} '${s.name}' should be UpperCamelCase`, suggestedFix: toUpperCamel(s.name) });
				continue;
			}
			if (matchesCase(s.name, 'lower-snake')) continue;
			if (s.isConst && matchesCase(s.name, 'upper-snake')) continue;
			out.push({ span: s.span, message: `${label(s)} '${s.name}' should be lower_snake_case`, suggestedFix: toSnakeCase(s.name) });
		}
		return out;
	},
};

export const outParamSuffixRule: Rule = {
	id: 'out-param-suffix',
	code: GLSL_DIAGCODES.OUT_PARAM_SUFFIX,
	severity: 'warning',
	description: "Parameters declared out or inout end with '_out'.",
	fix: 'advice',
	check({ ast }) {
		const out: RuleFinding[] = [];
		for (const d of ast.declarations) {
			if (d.kind !== 'Function') continue;
			for (const p of d.parameters) {
				if (p.direction === 'in' || !p.name || !p.nameSpan) continue;
				if (p.name.endsWith('_out')) continue;
				out.push({ span: p.nameSpan, message: `${p.direction} parameter '${p.name}' should end with '_out'`, suggestedFix: `${p.name}_out` });
			}
		}
		return out;
	},
};
