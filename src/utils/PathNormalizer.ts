/**
 * Path normalization for receipt file paths
 *
 * Receipts store repository-relative POSIX paths so that records written on
 * Windows and Unix compare equal.
 *
 * @module PathNormalizer
 */

import * as path from "node:path";

/**
 * Normalize separators to forward slashes and drop trailing slashes
 *
 * @example
 * ```typescript
 * normalize('src\\auth\\') // => 'src/auth'
 * normalize('/') // => '/'
 * ```
 */
export function normalize(filePath: string): string {
	let normalized = filePath.replace(/\\/g, "/");
	normalized = normalized.replace(/\/+/g, "/");
	normalized = normalized.replace(/\/+$/, "");
	return normalized === "" && filePath.startsWith("/") ? "/" : normalized;
}

export function isWithin(childPath: string, parentPath: string): boolean {
	const normalizedChild = normalize(childPath);
	const normalizedParent = normalize(parentPath);

	return normalizedChild.startsWith(`${normalizedParent}/`) || normalizedChild === normalizedParent;
}

/**
 * Express a path relative to the repository root
 *
 * Relative inputs are taken as already repo-relative. Returns null for a path
 * outside the repository.
 *
 * @example
 * ```typescript
 * toRepoRelative('/work/repo/src/auth.rs', '/work/repo') // => 'src/auth.rs'
 * toRepoRelative('./src/auth.rs', '/work/repo') // => 'src/auth.rs'
 * toRepoRelative('/etc/hosts', '/work/repo') // => null
 * ```
 */
export function toRepoRelative(filePath: string, repoRoot: string): string | null {
	const unified = normalize(filePath);
	const isAbsolute = unified.startsWith("/") || /^[a-zA-Z]:\//.test(unified);

	if (!isAbsolute) {
		const relative = normalize(path.posix.normalize(unified));
		return relative.startsWith("../") || relative === ".." ? null : relative;
	}

	const root = normalize(repoRoot);
	if (!isWithin(unified, root) || unified === root) {
		return null;
	}
	return unified.slice(root.length + 1);
}
