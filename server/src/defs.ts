import Ajv2020 from 'ajv/dist/2020';
import schema from '../../common/glslDefSchema.json';
import table from '../../common/glslDefs.json';

export type ShaderStage = 'vertex' | 'fragment' | 'compute';

export interface DefFile {
	version: string;
	keywords: string[];
	qualifiers: string[];
	types: string[];
	sampleFunctions: string[];
	constantPrefixes: string[];
	fragmentBuiltins: string[];
	vertexBuiltins: string[];
	computeBuiltins: string[];
	stageExtensions: Record<string, ShaderStage>;
}

export class Defs {
	readonly file: DefFile;
	readonly keywords: ReadonlySet<string>;
	readonly qualifiers: ReadonlySet<string>;
	readonly types: ReadonlySet<string>;
	readonly sampleFunctions: ReadonlySet<string>;
	readonly stageBuiltins: ReadonlyMap<ShaderStage, ReadonlySet<string>>;

	constructor(file: DefFile) {
		this.file = file;
		this.keywords = new Set(file.keywords);
		this.qualifiers = new Set(file.qualifiers);
		this.types = new Set(file.types);
		this.sampleFunctions = new Set(file.sampleFunctions);
		this.stageBuiltins = new Map<ShaderStage, ReadonlySet<string>>([
			['vertex', new Set(file.vertexBuiltins)],
			['fragment', new Set(file.fragmentBuiltins)],
			['compute', new Set(file.computeBuiltins)],
		]);
	}

	isType(word: string): boolean { return this.types.has(word); }

	/** Built-in names whose value is fixed at compile time (gl_MaxDrawBuffers, ...). */
	isBuiltinConstant(name: string): boolean {
		return this.file.constantPrefixes.some(p => name.startsWith(p));
	}

	stageForExtension(ext: string): ShaderStage | undefined {
		return Object.prototype.hasOwnProperty.call(this.file.stageExtensions, ext) ? this.file.stageExtensions[ext] : undefined;
	}

	extensionForStage(stage: ShaderStage): string | undefined {
		return Object.entries(this.file.stageExtensions).find(([, s]) => s === stage)?.[0];
	}

	stageExtensionList(): string[] {
		return Object.keys(this.file.stageExtensions);
	}
}

export function validateAndCreate(raw: unknown): Defs {
	const ajv = new Ajv2020({ allErrors: true, strict: false });
	const validate = ajv.compile<DefFile>(schema);
	if (!validate(raw)) {
		const msg = (validate.errors || []).map(e => `${e.instancePath} ${e.message ?? ''}`).join('\n');
		throw new Error(`Definition table schema validation failed:\n${msg}`);
	}
	return new Defs(raw);
}

let builtin: Defs | null = null;

// The bundled table is validated once and then shared read-only.
export function builtinDefs(): Defs {
	if (!builtin) builtin = validateAndCreate(table);
	return builtin;
}
