/**
 * Error normalization helpers
 *
 * Catch clauses receive `unknown`; these turn whatever was thrown into
 * something that can be logged or re-thrown with a cause.
 *
 * @module errorHelpers
 */

/**
 * Convert any thrown value to an Error
 *
 * @example
 * ```typescript
 * try {
 *   await notes.write(record);
 * } catch (error) {
 *   log.warn({ err: toError(error) }, "note write failed");
 * }
 * ```
 */
export function toError(error: unknown): Error {
	if (error instanceof Error) {
		return error;
	}

	if (typeof error === "string") {
		return new Error(error);
	}

	if (typeof error === "object" && error !== null) {
		if ("message" in error && typeof error.message === "string") {
			return new Error(error.message);
		}

		try {
			return new Error(JSON.stringify(error));
		} catch (_stringifyError) {
			// circular structure
			return new Error(String(error));
		}
	}

	return new Error(String(error));
}

export function errorMessage(error: unknown): string {
	return toError(error).message;
}

/**
 * True for a Node system error carrying the given errno code (ENOENT, EEXIST, ...)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === code;
}
