import { describe, it, expect } from 'vitest';
import { builtinDefs, validateAndCreate } from '../src/defs';
import { basenameFromUri, inferStage, splitExtension, stageFromFileId } from '../src/builtins';
import { astOf } from './testUtils';

const minimalTable = {
	version: 'test',
	keywords: ['if'],
	qualifiers: ['in'],
	types: ['float'],
	sampleFunctions: ['texture'],
	constantPrefixes: ['gl_Max'],
	fragmentBuiltins: ['gl_FragCoord'],
	vertexBuiltins: ['gl_Position'],
	computeBuiltins: ['barrier'],
	stageExtensions: { vs: 'vertex', fs: 'fragment' },
};

describe('definition table', () => {
	it('loads the bundled table', () => {
		const defs = builtinDefs();
		expect(defs.isType('vec3')).toBe(true);
		expect(defs.isType('color')).toBe(false);
		expect(defs.qualifiers.has('layout')).toBe(true);
		expect(defs.sampleFunctions.has('textureLod')).toBe(true);
		expect(defs.isBuiltinConstant('gl_MaxDrawBuffers')).toBe(true);
		expect(defs.isBuiltinConstant('gl_FragCoord')).toBe(false);
		expect(builtinDefs()).toBe(defs);
	});

	it('maps extensions and stages both ways', () => {
		const defs = builtinDefs();
		expect(defs.stageForExtension('frag')).toBe('fragment');
		expect(defs.stageForExtension('toString')).toBeUndefined();
		expect(defs.extensionForStage('compute')).toBe('comp');
		expect(defs.stageExtensionList()).toEqual(['vert', 'frag', 'comp']);
	});

	it('accepts a custom table that matches the schema', () => {
		const defs = validateAndCreate(minimalTable);
		expect(defs.stageForExtension('fs')).toBe('fragment');
		expect(defs.stageExtensionList()).toEqual(['vs', 'fs']);
	});

	it('rejects malformed tables', () => {
		expect(() => validateAndCreate({})).toThrow(/schema validation failed/);
		expect(() => validateAndCreate({ ...minimalTable, stageExtensions: { vs: 'geometry' } })).toThrow(/schema validation failed/);
		expect(() => validateAndCreate({ ...minimalTable, types: ['not a word'] })).toThrow(/schema validation failed/);
		expect(() => validateAndCreate({ ...minimalTable, extra: true })).toThrow(/schema validation failed/);
	});
});

describe('file identifiers', () => {
	it('takes the basename of URIs and paths', () => {
		expect(basenameFromUri('file:///home/user/my%20shaders/blur_pass.frag')).toBe('blur_pass.frag');
		expect(basenameFromUri('C:\\work\\tone_map.comp')).toBe('tone_map.comp');
		expect(basenameFromUri('relative/path/sky.vert')).toBe('sky.vert');
		expect(basenameFromUri('memory')).toBe('memory');
	});

	it('splits the extension at the last dot', () => {
		expect(splitExtension('light.pass.frag')).toEqual({ stem: 'light.pass', ext: 'frag' });
		expect(splitExtension('.hidden')).toEqual({ stem: '.hidden', ext: '' });
		expect(splitExtension('noext')).toEqual({ stem: 'noext', ext: '' });
	});

	it('reads the stage from the extension', () => {
		expect(stageFromFileId('file:///a/b/blur.comp', builtinDefs())).toBe('compute');
		expect(stageFromFileId('blur.glsl', builtinDefs())).toBeUndefined();
	});
});

describe('stage inference', () => {
	const stageOf = (src: string) => inferStage(astOf(src), builtinDefs());

	it('uses the strongest signal in the source', () => {
		expect(stageOf('layout(local_size_x = 64) in;\nvoid main() {}')).toBe('compute');
		expect(stageOf('void main() { gl_Position = vec4(0.0); }')).toBe('vertex');
		expect(stageOf('void main() { if (a) discard; }')).toBe('fragment');
		expect(stageOf('out vec4 c; void main() { c = gl_FragCoord; }')).toBe('fragment');
		expect(stageOf('layout(input_attachment_index = 0) uniform subpassInput g_in;\nvoid main() {}')).toBe('fragment');
		expect(stageOf('void main() { uint i = gl_GlobalInvocationID.x; }')).toBe('compute');
		expect(stageOf('void main() { int v = gl_VertexIndex; }')).toBe('vertex');
	});

	it('gives up without a signal', () => {
		expect(stageOf('void main() {}')).toBeUndefined();
		expect(stageOf('')).toBeUndefined();
	});
});
