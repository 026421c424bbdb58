export type SyncErrorCode = "PULL_FAILED" | "PUSH_FAILED";

/**
 * A pull or push that did not complete. Local notes are back where they were
 * before the attempt when `rolledBack` is true.
 */
export class SyncError extends Error {
	constructor(
		message: string,
		public code: SyncErrorCode,
		public rolledBack: boolean,
		public details?: unknown,
	) {
		super(message);
		this.name = "SyncError";
	}
}
