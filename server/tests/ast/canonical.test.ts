import { describe, it, expect } from 'vitest';
import { canonicalize, exprKey, formatNumber, isSideEffectFree } from '../../src/ast/canonical';
import { matchLerp } from '../../src/rules/arithmetic';
import { exprOf, show } from '../testUtils';

const keyOf = (src: string) => canonicalize(exprOf(src))?.key;

describe('canonical forms', () => {
	it('ignores grouping parentheses in structural keys', () => {
		expect(exprKey(exprOf('(a + b)'))).toBe(exprKey(exprOf('a + b')));
		expect(exprKey(exprOf('a + b'))).not.toBe(exprKey(exprOf('b + a')));
	});

	it('treats sums and products as commutative', () => {
		expect(keyOf('a + b')).toBe(keyOf('b + a'));
		expect(keyOf('(a * b) * c')).toBe(keyOf('c * (b * a)'));
		expect(keyOf('a - b')).toBe(keyOf('-b + a'));
		expect(keyOf('a - b')).toBe('+(-(i:b),i:a)');
	});

	it('pulls negation out of products', () => {
		expect(keyOf('-a * b')).toBe(keyOf('-(a * b)'));
		expect(keyOf('-a * -b')).toBe(keyOf('a * b'));
	});

	it('refuses expressions that failed to parse', () => {
		expect(canonicalize(exprOf('x = f(a, )'))).toBeUndefined();
	});

	it('spots side effects', () => {
		expect(isSideEffectFree(exprOf('a.x + b[i]'))).toBe(true);
		expect(isSideEffectFree(exprOf('vec2(a)'))).toBe(true);
		expect(isSideEffectFree(exprOf('a++'))).toBe(false);
		expect(isSideEffectFree(exprOf('f(a)'))).toBe(false);
		expect(isSideEffectFree(exprOf('(a = 1)'))).toBe(false);
	});

	it('formats computed literals', () => {
		expect(formatNumber(0.5, true)).toBe('0.5');
		expect(formatNumber(2, true)).toBe('2.0');
		expect(formatNumber(2, false)).toBe('2');
		expect(formatNumber(1 / 3, true)).toBe('0.333333333333');
		expect(formatNumber(0.1 * 3, true)).toBe('0.3');
	});
});

describe('lerp matching', () => {
	const lerp = (src: string) => {
		const m = matchLerp(exprOf(src));
		return m ? [show(m.x), show(m.y), show(m.t)] : undefined;
	};

	it('matches the weighted form in any operand order', () => {
		expect(lerp('(color_0 * (1.0 - alpha)) + (color_1 * alpha)')).toEqual(['color_0', 'color_1', 'alpha']);
		expect(lerp('alpha * color_1 + (1.0 - alpha) * color_0')).toEqual(['color_0', 'color_1', 'alpha']);
	});

	it('matches the offset form', () => {
		expect(lerp('a + (b - a) * t')).toEqual(['a', 'b', 't']);
		expect(lerp('(b - a) * t + a')).toEqual(['a', 'b', 't']);
	});

	it('rejects near misses', () => {
		expect(lerp('a * (1.0 - t) + b * s')).toBeUndefined();
		expect(lerp('a * (2.0 - t) + b * t')).toBeUndefined();
		expect(lerp('a + (b - c) * t')).toBeUndefined();
		expect(lerp('a + b')).toBeUndefined();
	});
});
