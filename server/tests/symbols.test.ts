import { describe, it, expect } from 'vitest';
import { caseStyleOf, classify, looksLikeTextureCoord, toSnakeCase, toUpperCamel } from '../src/symbols';
import { parse } from '../src/ast';
import { tokensOf } from './testUtils';

const BLUR = [
	'#define TAPS 4',
	'layout(location = 0) in vec2 v_uv;',
	'layout(location = 0) out vec4 out_color;',
	'layout(set = 0, binding = 0) uniform sampler2D blur_map;',
	'uniform Settings { float radius; int sampleCount; } settings;',
	'struct KernelTap { vec2 offset; float weight; };',
	'const float SCALE = 2.0;',
	'vec4 sample_tap(vec2 uv, out float weight_out) { weight_out = 1.0; return texture(blur_map, uv); }',
	'void main() {',
	'\tvec2 coord = v_uv;',
	'\tfloat total = 0.0;',
	'\tout_color = sample_tap(coord, total);',
	'}',
	'float unused_helper() { return 1.0; }',
].join('\n');

function tableOf(source: string) {
	const tokens = tokensOf(source);
	const { ast } = parse(tokens);
	return { ast, table: classify(ast, tokens) };
}

describe('symbol classification', () => {
	it('assigns a role to every declared name in source order', () => {
		const { table } = tableOf(BLUR);
		expect(table.symbols.map(s => [s.name, s.role])).toEqual([
			['v_uv', 'stage-input'],
			['out_color', 'stage-output'],
			['blur_map', 'sampler'],
			['Settings', 'uniform-block'],
			['settings', 'uniform'],
			['radius', 'block-field'],
			['sampleCount', 'block-field'],
			['KernelTap', 'struct'],
			['offset', 'struct-field'],
			['weight', 'struct-field'],
			['SCALE', 'constant'],
			['sample_tap', 'function'],
			['uv', 'parameter'],
			['weight_out', 'parameter'],
			['main', 'function'],
			['coord', 'local'],
			['total', 'local'],
			['unused_helper', 'function'],
		]);
	});

	it('records case style, direction and scope', () => {
		const { table } = tableOf(BLUR);
		expect(table.lookup('sampleCount')).toBeUndefined();
		const byName = (n: string) => table.byName.get(n)?.[0];
		expect(byName('sampleCount')?.caseStyle).toBe('lower-camel');
		expect(byName('KernelTap')?.caseStyle).toBe('upper-camel');
		expect(byName('SCALE')?.caseStyle).toBe('upper-snake');
		expect(byName('weight_out')?.direction).toBe('out');
		expect(byName('coord')?.scope).toBe('main');
		expect(byName('radius')?.container).toBe('Settings');
	});

	it('collects constants and #define names', () => {
		const { table } = tableOf(BLUR);
		expect([...table.defines]).toEqual(['TAPS']);
		expect([...table.constants].sort()).toEqual(['SCALE', 'TAPS']);
	});

	it('builds the call graph and what main reaches', () => {
		const { table } = tableOf(BLUR);
		expect([...(table.callGraph.get('main') ?? [])]).toEqual(['sample_tap']);
		expect([...(table.callGraph.get('sample_tap') ?? [])]).toEqual(['texture']);
		expect([...table.reachableFromMain].sort()).toEqual(['main', 'sample_tap']);
	});

	it('finds texture coordinates by role, type and name', () => {
		const { table } = tableOf(BLUR);
		expect([...table.textureCoords].sort()).toEqual(['uv', 'v_uv']);
	});

	it('resolves types through scope', () => {
		const { table } = tableOf(BLUR);
		expect(table.typeOf('coord', 'main')).toBe('vec2');
		expect(table.typeOf('uv', 'sample_tap')).toBe('vec2');
		expect(table.typeOf('uv', 'main')).toBeUndefined();
		expect(table.typeOf('settings')).toBe('Settings');
		expect(table.typeOf('out_color', 'main')).toBe('vec4');
	});

	it('leaves the tree untouched', () => {
		const tokens = tokensOf(BLUR);
		const { ast } = parse(tokens);
		const before = JSON.stringify(ast);
		classify(ast, tokens);
		expect(JSON.stringify(ast)).toBe(before);
	});

	it('treats const parameters and locals as constants', () => {
		const { table } = tableOf('void f(const int n) { const int k = 2; int m = n; }');
		expect(table.lookup('n', 'f')?.isConst).toBe(true);
		expect(table.lookup('k', 'f')?.role).toBe('constant');
		expect(table.lookup('m', 'f')?.isConst).toBe(false);
	});
});

describe('name helpers', () => {
	it('detects case styles', () => {
		expect(['light_data', 'LightData', 'MAX_LIGHTS', 'lightData', '_private', 'Light_Data'].map(caseStyleOf)).toEqual([
			'lower-snake', 'upper-camel', 'upper-snake', 'lower-camel', 'other', 'other',
		]);
	});

	it('converts between spellings', () => {
		expect(toSnakeCase('lightData')).toBe('light_data');
		expect(toSnakeCase('HDRColor')).toBe('hdr_color');
		expect(toUpperCamel('light_data')).toBe('LightData');
		expect(toUpperCamel('lightData')).toBe('LightData');
	});

	it('recognises texture coordinate names', () => {
		expect(['uv', 'vTexCoord', 'in_uv0', 'tex_coords', 'coverage', 'uvw'].map(looksLikeTextureCoord)).toEqual([
			true, true, true, true, false, false,
		]);
	});
});
