import { describe, it, expect } from 'vitest';
import { analyzeShader } from '../src/core/pipeline';
import { readFixture } from './testUtils';
import * as lint from '../src/linter';
import type { Rule } from '../src/linter';

describe('e2e: fixtures', () => {
	it('reports every style and optimization finding in a composite pass', async () => {
		const src = await readFixture('bloom_composite.frag');
		const { fileId, diagnostics } = analyzeShader('file:///project/shaders/bloom_composite.frag', src);
		expect(fileId).toBe('file:///project/shaders/bloom_composite.frag');
		expect(diagnostics.map(d => [d.ruleId, d.span.lineStart])).toEqual([
			['declaration-order', 2],
			['naming-case', 9],
			['out-param-suffix', 12],
			['division-by-constant', 13],
			['dynamic-loop-bound', 20],
			['manual-lerp', 24],
		]);
		expect(diagnostics.map(d => d.suggestedFix)).toEqual([
			undefined,
			'tap_count',
			'exposure_out',
			'exposure * 0.5',
			undefined,
			'mix(scene, bloom, weight)',
		]);
	});

	it('finds nothing in a clean shader', async () => {
		const src = await readFixture('clean_blur.frag');
		expect(analyzeShader('shaders/clean_blur.frag', src).diagnostics).toEqual([]);
	});
});

describe('e2e: public entry point', () => {
	it('runs a caller-supplied rule after the built-in ones', () => {
		const noTodo: Rule = {
			id: 'no-todo',
			code: 'GLS900',
			severity: 'warning',
			description: 'Flags TODO comments.',
			check: ({ tokens }) => tokens
				.flatMap(t => t.leading)
				.filter(c => c.value.includes('TODO'))
				.map(c => ({ span: c.span, message: 'Unresolved TODO.' })),
		};
		const src = '// TODO tune\nvoid main() { float h = v / 2.0; }';
		const result = lint.analyzeShader('shaders/tone_map.frag', src, { rules: [...lint.defaultRules, noTodo] });
		expect(result.diagnostics.map(d => [d.ruleId, d.span.lineStart])).toEqual([
			['no-todo', 1],
			['division-by-constant', 2],
		]);
		expect(result.diagnostics[0]?.code).toBe('GLS900');
	});
});
