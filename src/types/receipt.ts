/**
 * Provenance record types
 *
 * A receipt is one prompt's worth of AI-authored change. Line ranges on a
 * FileChange are only meaningful against the blob recorded beside them.
 */

/** Inclusive, 1-based line range */
export type LineRange = [start: number, end: number];

export interface TokenUsage {
	input: number;
	output: number;
	cacheRead: number;
	cacheWrite: number;
}

/**
 * How a FileChange arrived at its current coordinates
 */
export interface RemapTrace {
	fromCommit: string;
	fromBlob: string;
	fromPath: string;
	originalRange: LineRange;
	/** True when only part of the original range survived */
	clipped: boolean;
	survivingLines: number;
	totalLines: number;
}

export type OrphanReason = "content-removed" | "file-removed" | "blob-missing" | "unresolvable";

export interface FileChangeOrphan {
	reason: OrphanReason;
	lastRange: LineRange;
	lastBlob: string;
}

export interface FileChange {
	path: string;
	/** Git blob id the range refers to */
	blob: string;
	range: LineRange;
	added: number;
	removed: number;
	remap?: RemapTrace;
	orphaned?: FileChangeOrphan;
}

export interface ConversationTurn {
	role: "user" | "assistant" | "tool";
	content: string;
	toolName?: string;
}

export interface ReceiptOrphan {
	reason: OrphanReason;
	/** Commit the receipt was attached to before it lost its content */
	atCommit: string;
}

export interface Receipt {
	id: string;
	provider: string;
	model: string;
	author: string;
	sessionId: string;
	parentSessionId?: string;
	parentReceiptId?: string;
	startedAt: string;
	endedAt?: string;
	promptHash: string;
	promptSummary: string;
	responseSummary?: string;
	conversation?: ConversationTurn[];
	costUsd: number;
	tokens: TokenUsage;
	tools: string[];
	services: string[];
	subSessions: string[];
	fileChanges: FileChange[];
	/** When this version of the receipt was produced */
	capturedAt: string;
	/** 0 at capture, incremented by each remap */
	revision: number;
	orphaned?: ReceiptOrphan;
}

/**
 * A receipt waiting in the working copy for its commit
 */
export interface StagingEntry {
	receipt: Receipt;
	stagedAt: string;
}

export const COMMIT_RECORD_VERSION = 1;

export interface CommitRecord {
	version: number;
	commit: string;
	receipts: Receipt[];
	/** Commits that took over this record's receipts after a history rewrite */
	supersededBy?: string[];
}

/**
 * A work session as an interval. endedAt null means no termination was observed.
 */
export interface Session {
	id: string;
	parentId?: string;
	startedAt: number;
	endedAt: number | null;
	lastActivityAt?: number;
}

export const EMPTY_TOKEN_USAGE: TokenUsage = {
	input: 0,
	output: 0,
	cacheRead: 0,
	cacheWrite: 0,
};
