/**
 * Union merge of receipt sets and commit records
 *
 * Receipts are keyed by id. When both sides hold different content for an id
 * the winner is the later capturedAt, then the higher revision, then the
 * greater canonical serialization. That is a total order, so the merge is
 * commutative and associative and repeated merges converge.
 */

import type { CommitRecord, Receipt } from "../types/receipt.js";
import { COMMIT_RECORD_VERSION } from "../types/receipt.js";
import { canonicalStringify } from "../utils/canonicalJson.js";

export interface ReceiptSetMerge {
	receipts: Receipt[];
	/** Versions that lost to a different version of the same id */
	superseded: Receipt[];
}

export interface RecordMerge {
	record: CommitRecord;
	superseded: Receipt[];
}

/**
 * Positive when `a` should win over `b`
 */
export function compareReceiptVersions(a: Receipt, b: Receipt): number {
	const at = Date.parse(a.capturedAt);
	const bt = Date.parse(b.capturedAt);
	if (at !== bt) {
		return at - bt;
	}
	if (a.revision !== b.revision) {
		return a.revision - b.revision;
	}
	const as = canonicalStringify(a);
	const bs = canonicalStringify(b);
	return as < bs ? -1 : as > bs ? 1 : 0;
}

/**
 * Order receipts by start time, then id
 */
export function compareReceipts(a: Receipt, b: Receipt): number {
	if (a.startedAt !== b.startedAt) {
		return a.startedAt < b.startedAt ? -1 : 1;
	}
	return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function mergeReceiptSets(...sets: Receipt[][]): ReceiptSetMerge {
	const winners = new Map<string, Receipt>();
	const superseded: Receipt[] = [];

	for (const receipt of sets.flat()) {
		const current = winners.get(receipt.id);
		if (!current) {
			winners.set(receipt.id, receipt);
			continue;
		}
		const order = compareReceiptVersions(receipt, current);
		if (order === 0) {
			continue;
		}
		if (order > 0) {
			winners.set(receipt.id, receipt);
			superseded.push(current);
		} else {
			superseded.push(receipt);
		}
	}

	return { receipts: [...winners.values()].sort(compareReceipts), superseded };
}

export function emptyRecord(commit: string): CommitRecord {
	return { version: COMMIT_RECORD_VERSION, commit, receipts: [] };
}

/**
 * Merge records of the same commit
 */
export function mergeRecords(commit: string, ...records: CommitRecord[]): RecordMerge {
	const { receipts, superseded } = mergeReceiptSets(...records.map((record) => record.receipts));
	const supersededBy = [...new Set(records.flatMap((record) => record.supersededBy ?? []))].sort();

	const record: CommitRecord = {
		version: Math.max(COMMIT_RECORD_VERSION, ...records.map((r) => r.version)),
		commit,
		receipts,
	};
	if (supersededBy.length > 0) {
		record.supersededBy = supersededBy;
	}
	return { record, superseded };
}

export function recordsEqual(a: CommitRecord, b: CommitRecord): boolean {
	return canonicalStringify(a) === canonicalStringify(b);
}
