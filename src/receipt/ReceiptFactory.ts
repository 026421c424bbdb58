/**
 * Receipt construction and staged-receipt upsert
 *
 * Receipt ids are derived from content so capturing the same prompt twice
 * produces the same id.
 */

import { sha256Hex } from "../privacy/hasher.js";
import type { FileChange, Receipt, TokenUsage } from "../types/receipt.js";
import { EMPTY_TOKEN_USAGE } from "../types/receipt.js";

export const RECEIPT_ID_LENGTH = 32;

export function receiptId(sessionId: string, promptHash: string, promptTimestamp: string): string {
	return sha256Hex(`${sessionId}\n${promptHash}\n${promptTimestamp}`).slice(0, RECEIPT_ID_LENGTH);
}

export type ReceiptInit = Pick<Receipt, "sessionId" | "promptHash" | "startedAt"> & Partial<Receipt>;

/**
 * Build a receipt at revision 0 with every collection normalized
 */
export function createReceipt(init: ReceiptInit, capturedAt: string = new Date().toISOString()): Receipt {
	return normalizeReceipt({
		provider: "unknown",
		model: "unknown",
		author: "unknown",
		promptSummary: "",
		costUsd: 0,
		tools: [],
		services: [],
		subSessions: [],
		fileChanges: [],
		revision: 0,
		capturedAt,
		...init,
		tokens: { ...EMPTY_TOKEN_USAGE, ...init.tokens },
		id: init.id ?? receiptId(init.sessionId, init.promptHash, init.startedAt),
	});
}

function sortedSet(values: string[]): string[] {
	return [...new Set(values)].sort();
}

export function fileChangeKey(change: FileChange): string {
	return `${change.path}\u0000${change.blob}\u0000${change.range[0]}-${change.range[1]}`;
}

/**
 * Order file changes by path, then range, then blob
 */
export function compareFileChanges(a: FileChange, b: FileChange): number {
	if (a.path !== b.path) {
		return a.path < b.path ? -1 : 1;
	}
	if (a.range[0] !== b.range[0]) {
		return a.range[0] - b.range[0];
	}
	if (a.range[1] !== b.range[1]) {
		return a.range[1] - b.range[1];
	}
	return a.blob < b.blob ? -1 : a.blob > b.blob ? 1 : 0;
}

/**
 * Union of file changes keyed by (path, blob, range). A later duplicate replaces
 * the earlier one so refreshed added/removed counts win.
 */
export function mergeFileChanges(existing: FileChange[], incoming: FileChange[]): FileChange[] {
	const byKey = new Map<string, FileChange>();
	for (const change of [...existing, ...incoming]) {
		byKey.set(fileChangeKey(change), change);
	}
	return [...byKey.values()].sort(compareFileChanges);
}

export function normalizeReceipt(receipt: Receipt): Receipt {
	return {
		...receipt,
		tools: sortedSet(receipt.tools),
		services: sortedSet(receipt.services),
		subSessions: sortedSet(receipt.subSessions),
		fileChanges: [...receipt.fileChanges].sort(compareFileChanges),
	};
}

function mergeTokens(existing: TokenUsage, incoming: TokenUsage): TokenUsage {
	return {
		input: incoming.input || existing.input,
		output: incoming.output || existing.output,
		cacheRead: incoming.cacheRead || existing.cacheRead,
		cacheWrite: incoming.cacheWrite || existing.cacheWrite,
	};
}

/**
 * Combine two staged versions of the same receipt. Fields the incoming version
 * leaves blank keep their staged value; sets and file changes are unions.
 */
export function mergeStagedReceipt(existing: Receipt, incoming: Receipt): Receipt {
	return normalizeReceipt({
		...existing,
		...incoming,
		id: existing.id,
		parentReceiptId: existing.parentReceiptId ?? incoming.parentReceiptId,
		parentSessionId: existing.parentSessionId ?? incoming.parentSessionId,
		startedAt: existing.startedAt,
		endedAt: incoming.endedAt ?? existing.endedAt,
		promptSummary: incoming.promptSummary || existing.promptSummary,
		responseSummary: incoming.responseSummary ?? existing.responseSummary,
		conversation: incoming.conversation ?? existing.conversation,
		costUsd: incoming.costUsd || existing.costUsd,
		tokens: mergeTokens(existing.tokens, incoming.tokens),
		tools: [...existing.tools, ...incoming.tools],
		services: [...existing.services, ...incoming.services],
		subSessions: [...existing.subSessions, ...incoming.subSessions],
		fileChanges: mergeFileChanges(existing.fileChanges, incoming.fileChanges),
	});
}
