import type { Declaration } from '../ast';
import { GLSL_DIAGCODES } from '../analysisTypes';
import type { Rule, RuleFinding } from './types';

const CATEGORY_NAMES = ['stage inputs', 'stage outputs', 'input attachments', 'samplers', 'push constants', 'uniform blocks'] as const;

// Position in the canonical declaration order; undefined for declarations the order does not cover.
export function orderRank(d: Declaration): number | undefined {
	switch (d.kind) {
		case 'StageIO': return d.direction === 'in' ? 0 : 1;
		case 'InputAttachment': return 2;
		case 'Sampler': return 3;
		case 'UniformBlock':
			if (d.storage === 'in') return 0;
			if (d.storage === 'out') return 1;
			return d.isPushConstant ? 4 : 5;
		case 'GlobalVar': return d.qualifiers.includes('uniform') ? 5 : undefined;
		default: return undefined;
	}
}

function describe(d: Declaration): string {
	switch (d.kind) {
		case 'StageIO': return `stage ${d.direction === 'in' ? 'input' : 'output'} '${d.name}'`;
		case 'InputAttachment': return `input attachment '${d.name}'`;
		case 'Sampler': return `sampler '${d.name}'`;
		case 'UniformBlock': return `${d.isPushConstant ? 'push constant block' : `${d.storage} block`} '${d.blockName}'`;
		case 'GlobalVar': return `uniform '${d.declarators.map(x => x.name).join(', ')}'`;
		default: return d.kind;
	}
}

export const declarationOrderRule: Rule = {
	id: 'declaration-order',
	code: GLSL_DIAGCODES.DECLARATION_ORDER,
	severity: 'warning',
	description: `Global declarations follow the order: ${CATEGORY_NAMES.join(', ')}.`,
	check({ ast }) {
		const ranked: { decl: Declaration; rank: number }[] = [];
		for (const decl of ast.declarations) {
			const rank = orderRank(decl);
			if (rank !== undefined) ranked.push({ decl, rank });
		}
		const out: RuleFinding[] = [];
		for (let i = 0; i < ranked.length; i++) {
			const cur = ranked[i];
			if (!cur) continue;
			// the first later declaration that belongs before this one
			const later = ranked.slice(i + 1).find(r => r.rank < cur.rank);
			if (!later) continue;
			out.push({
				span: cur.decl.span,
				message: `${describe(cur.decl)} should come after ${describe(later.decl)}; expected order: ${CATEGORY_NAMES.join(', ')}`,
			});
		}
		return out;
	},
};
