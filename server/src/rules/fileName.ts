import { GLSL_DIAGCODES } from '../analysisTypes';
import { basenameFromUri, inferStage, splitExtension } from '../builtins';
import { matchesCase, toSnakeCase } from '../symbols';
import type { Rule, RuleFinding } from './types';

const FILE_START = { start: 0, end: 0 };

export const fileNameRule: Rule = {
	id: 'file-name',
	code: GLSL_DIAGCODES.FILE_NAME,
	severity: 'warning',
	description: 'File names are lower_snake_case with a .vert, .frag or .comp extension matching the stage.',
	fix: 'advice',
	check({ fileId, ast, defs }) {
		const base = basenameFromUri(fileId);
		const { stem, ext } = splitExtension(base);
		const declared = defs.stageForExtension(ext);
		const inferred = inferStage(ast, defs);
		const out: RuleFinding[] = [];

		if (!matchesCase(stem, 'lower-snake') || !declared) {
			const fixExt = declared ? ext : inferred ? defs.extensionForStage(inferred) : undefined;
			const allowed = defs.stageExtensionList().map(e => `.${e}`).join(', ');
			out.push({
				span: FILE_START,
				message: `file name '${base}' should be lower_snake_case with one of the extensions ${allowed}`,
				suggestedFix: fixExt ? `${toSnakeCase(stem)}.${fixExt}` : undefined,
			});
		}
		if (declared && inferred && declared !== inferred) {
			out.push({
				span: FILE_START,
				message: `file extension '.${ext}' does not match the ${inferred} stage detected in the source`,
				suggestedFix: `${toSnakeCase(stem)}.${defs.extensionForStage(inferred) ?? ext}`,
			});
		}
		return out;
	},
};
