import { type Severity, isSeverity, normalizeRuleId } from './analysisTypes';

// Parse user-provided disabled rules (ids, codes or friendly names) into canonical rule ids.
export function parseDisabledRuleList(input: unknown): Set<string> {
	const out = new Set<string>();
	const push = (raw: unknown) => {
		if (typeof raw !== 'string') return;
		const norm = normalizeRuleId(raw);
		if (norm) out.add(norm);
	};
	if (Array.isArray(input)) {
		for (const it of input) push(it);
		return out;
	}
	if (typeof input === 'string') {
		for (const token of input.split(/[,\s]+/)) {
			if (!token) continue;
			push(token);
		}
	}
	return out;
}

export function parseMinSeverity(input: unknown): Severity | undefined {
	if (typeof input !== 'string') return undefined;
	const v = input.trim().toLowerCase();
	if (v === 'information' || v === 'hint') return 'info';
	return isSeverity(v) ? v : undefined;
}
