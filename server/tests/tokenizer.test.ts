import { describe, it, expect } from 'vitest';
import { tokenize } from '../src/core/tokenizer';
import { tokensOf } from './testUtils';

describe('tokenizer', () => {
	it('classifies keywords, identifiers, operators and punctuation', () => {
		const toks = tokensOf('vec3 color = vec3(1.0);');
		expect(toks.map(t => [t.kind, t.value])).toEqual([
			['keyword', 'vec3'],
			['id', 'color'],
			['op', '='],
			['keyword', 'vec3'],
			['punct', '('],
			['number', '1.0'],
			['punct', ')'],
			['punct', ';'],
			['eof', ''],
		]);
	});

	it('marks storage qualifiers and layout', () => {
		const toks = tokensOf('layout(location = 0) in vec2 v_uv;');
		expect(toks.filter(t => t.kind === 'qualifier').map(t => t.value)).toEqual(['layout', 'in']);
		expect(toks.find(t => t.value === 'location')?.kind).toBe('id');
	});

	it('reports 1-based line and column', () => {
		const toks = tokensOf('float a;\n  int b;');
		const int = toks.find(t => t.value === 'int');
		const b = toks.find(t => t.value === 'b');
		expect([int?.line, int?.column]).toEqual([2, 3]);
		expect([b?.line, b?.column]).toEqual([2, 7]);
		expect(b?.span).toEqual({ start: 15, end: 16 });
	});

	it('scans numeric literal forms', () => {
		const toks = tokensOf('0x1F 1.5e-3 2.0f 3u 4.0lf .5');
		expect(toks.filter(t => t.kind === 'number').map(t => t.value)).toEqual(['0x1F', '1.5e-3', '2.0f', '3u', '4.0lf', '.5']);
	});

	it('takes the longest operator', () => {
		const toks = tokensOf('a <<= b ^^ c');
		expect(toks.filter(t => t.kind === 'op').map(t => t.value)).toEqual(['<<=', '^^']);
	});

	it('attaches comments to the next token as trivia', () => {
		const toks = tokensOf('// header\nvoid main() {}');
		expect(toks[0]?.value).toBe('void');
		expect(toks[0]?.leading.map(c => [c.kind, c.value])).toEqual([['comment-line', '// header']]);

		const tail = tokensOf('x; /* end */');
		const eof = tail[tail.length - 1];
		expect(eof?.kind).toBe('eof');
		expect(eof?.leading.map(c => c.value)).toEqual(['/* end */']);
	});

	it('emits whole preprocessor lines, joining continuations', () => {
		const toks = tokensOf('#version 450\n#define N \\\n  4\nfloat x;');
		expect(toks.filter(t => t.kind === 'directive').map(t => t.value)).toEqual(['#version 450', '#define N \\\n  4']);
		expect(toks.find(t => t.value === 'float')?.line).toBe(4);
	});

	it('does not treat # inside a line as a directive', () => {
		const toks = tokensOf('a # b');
		expect(toks.map(t => t.kind)).toEqual(['id', 'error', 'id', 'eof']);
		expect(toks[1]?.error).toBe("invalid character '#'");
	});

	it('turns invalid characters into error tokens and continues', () => {
		const toks = tokensOf('float a = 1.0 @ 2.0;');
		const err = toks.filter(t => t.kind === 'error');
		expect(err.map(t => [t.value, t.error])).toEqual([['@', "invalid character '@'"]]);
		expect(toks[toks.indexOf(err[0] ?? toks[0]) + 1]?.value).toBe('2.0');
	});

	it('swallows the rest of the file into an unterminated block comment', () => {
		const toks = tokensOf('float a; /* never closed');
		expect(toks.map(t => t.kind)).toEqual(['keyword', 'id', 'punct', 'error', 'eof']);
		expect(toks[3]?.value).toBe('/* never closed');
		expect(toks[3]?.error).toBe('unterminated block comment');
	});

	it('ends an unterminated string at the end of its line', () => {
		const toks = tokensOf('x = "abc\ny;');
		const err = toks.find(t => t.kind === 'error');
		expect(err?.value).toBe('"abc');
		expect(err?.error).toBe('unterminated string literal');
		const y = toks.find(t => t.value === 'y');
		expect([y?.kind, y?.line]).toEqual(['id', 2]);
	});

	it('yields tokens lazily', () => {
		const gen = tokenize('a b c');
		const first = gen.next();
		expect(first.done).toBe(false);
		if (!first.done) expect(first.value.value).toBe('a');
	});

	it('always ends with exactly one eof', () => {
		for (const src of ['', '   ', '/* x */', '#define A 1', '"open']) {
			const toks = tokensOf(src);
			expect(toks.filter(t => t.kind === 'eof')).toHaveLength(1);
			expect(toks[toks.length - 1]?.kind).toBe('eof');
		}
	});
});
