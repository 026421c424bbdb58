export type GitHostErrorCode =
	| "GIT_COMMAND_FAILED"
	| "PUSH_REJECTED"
	| "PUSH_FAILED"
	| "FETCH_FAILED"
	| "NOT_A_REPOSITORY";

export class GitHostError extends Error {
	constructor(
		message: string,
		public code: GitHostErrorCode,
		public details?: unknown,
	) {
		super(message);
		this.name = "GitHostError";
	}

	/** Worth another attempt: the remote moved or the transport hiccuped */
	get retryable(): boolean {
		return this.code === "PUSH_REJECTED" || this.code === "PUSH_FAILED" || this.code === "FETCH_FAILED";
	}
}
