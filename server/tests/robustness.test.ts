import { describe, it, expect } from 'vitest';
import { analyzeShader } from '../src/core/pipeline';
import { byRule, lint, parseText } from './testUtils';

// mulberry32: small seeded generator so failures reproduce
function rng(seed: number) {
	let a = seed >>> 0;
	return () => {
		a = (a + 0x6d2b79f5) >>> 0;
		let t = a;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

const FRAGMENTS = [
	'void', 'main', '(', ')', '{', '}', ';', ',', 'float', 'vec3', 'uniform', 'layout', 'in', 'out', 'for', 'if', 'else',
	'=', '+', '-', '*', '/', '1.0', '2', 'x', 'uv', '.', 'xy', '[', ']', '#version 450\n', '#define A\n', '/*', '*/', '//', '\n',
	'"', '@', 'struct', 'return', 'discard', 'texture', '?', ':', '++', '\\\n', 'é', '😀',
];

describe('robustness', () => {
	it('never throws on token soup', () => {
		const next = rng(1234);
		for (let i = 0; i < 300; i++) {
			const len = Math.floor(next() * 60);
			const parts: string[] = [];
			for (let j = 0; j < len; j++) parts.push(FRAGMENTS[Math.floor(next() * FRAGMENTS.length)] ?? ' ');
			const src = parts.join(next() < 0.5 ? ' ' : '');
			expect(() => analyzeShader(`soup_${i}.frag`, src)).not.toThrow();
		}
	});

	it('never throws on arbitrary characters', () => {
		const next = rng(99);
		for (let i = 0; i < 200; i++) {
			const len = Math.floor(next() * 200);
			let src = '';
			for (let j = 0; j < len; j++) src += String.fromCharCode(Math.floor(next() * 256));
			const result = analyzeShader(`bytes_${i}.frag`, src);
			for (const d of result.diagnostics) {
				expect(d.offsets.start).toBeGreaterThanOrEqual(0);
				expect(d.offsets.end).toBeLessThanOrEqual(src.length);
				expect(d.offsets.start).toBeLessThanOrEqual(d.offsets.end);
			}
		}
	});

	it('reports at least one syntax error for malformed sources', () => {
		for (const src of ['void main() {', 'float = ;', 'uniform {', 'vec3(', '}}}', '"unterminated', '/* open']) {
			expect(byRule(lint(src), 'syntax').length, src).toBeGreaterThan(0);
		}
	});

	it('keeps the declarations around a bad one', () => {
		const { ast, diagnostics } = parseText('uniform float a;\nfloat = ;\nvoid main() {}');
		expect(ast.declarations.map(d => d.kind)).toEqual(['GlobalVar', 'Function']);
		expect(diagnostics).toHaveLength(1);
	});

	it('analyzes long sums in linear time', () => {
		const terms = Array.from({ length: 2000 }, (_, i) => `t${i}`).join(' + ');
		const started = performance.now();
		const diags = lint(`void main() {\n\tfloat total = ${terms};\n}`);
		expect(performance.now() - started).toBeLessThan(2000);
		expect(diags).toEqual([]);
	});

	it('still runs the rules on a partially broken file', () => {
		const diags = lint('void main() {\n\tfloat a = ;\n\tfloat b = c / 2.0;\n}');
		expect(diags.map(d => d.ruleId)).toEqual(['syntax', 'division-by-constant']);
	});
});
