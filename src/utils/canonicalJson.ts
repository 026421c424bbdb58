/**
 * Deterministic JSON: object keys sorted, undefined members dropped.
 * Two equal records always serialize to the same bytes.
 */
export function canonicalize(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map((item) => canonicalize(item));
	}
	if (typeof value === "object" && value !== null) {
		const sorted: Record<string, unknown> = {};
		for (const key of Object.keys(value).sort()) {
			const member: unknown = Reflect.get(value, key);
			if (member !== undefined) {
				sorted[key] = canonicalize(member);
			}
		}
		return sorted;
	}
	return value;
}

export function canonicalStringify(value: unknown, indent?: number): string {
	return JSON.stringify(canonicalize(value), null, indent);
}
