import { GLSL_DIAGCODES } from '../analysisTypes';
import type { Rule, RuleFinding } from './types';

const VERSION = /^#\s*version\b/;

export const noVersionDirectiveRule: Rule = {
	id: 'no-version-directive',
	code: GLSL_DIAGCODES.NO_VERSION_DIRECTIVE,
	severity: 'error',
	description: 'Shader sources do not declare #version; the build system injects it.',
	check({ tokens }) {
		const out: RuleFinding[] = [];
		for (const t of tokens) {
			if (t.kind === 'directive' && VERSION.test(t.value)) {
				out.push({ span: t.span, message: '#version directive is not allowed in shader sources' });
			}
		}
		return out;
	},
};
