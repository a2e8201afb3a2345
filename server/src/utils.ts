// Small shared utilities

/**
 * Compile-time exhaustiveness helper. Reaching it at runtime means a node kind
 * was added without updating a switch; the throw is caught at the rule boundary.
 */
export function AssertNever(x: never, message?: string): never {
	const v: unknown = x;
	const detail = typeof v === 'object' && v !== null && 'kind' in v ? String(v.kind) : String(v);
	throw new Error(message ? `${message}: ${detail}` : `Unexpected value in AssertNever: ${detail}`);
}

/** Sort with the original index as the final tie-break. */
export function stableSort<T>(items: readonly T[], cmp: (a: T, b: T) => number): T[] {
	return items
		.map((item, index) => ({ item, index }))
		.sort((a, b) => cmp(a.item, b.item) || a.index - b.index)
		.map(e => e.item);
}
