/**
 * ReportReader - Read-only views over commit records
 *
 * Filtering by time, author and file, an "as of revision" blame, and session
 * statistics. Never writes to the notes ref.
 */

import { minimatch } from "minimatch";
import { BlobCache } from "../cache/BlobCache.js";
import type { GitHost } from "../git/GitHost.js";
import type { NotesStore } from "../notes/NotesStore.js";
import { compareReceipts } from "../receipt/ReceiptMerge.js";
import { splitLines } from "../remap/LineAligner.js";
import { computeSessionStats, type SessionStats } from "../session/sessionStats.js";
import { CorruptedDataError } from "../storage/StorageErrors.js";
import type { Receipt } from "../types/receipt.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";

export interface RecordFilter {
	since?: Date | string;
	until?: Date | string;
	/** Case-insensitive substring of the receipt author */
	author?: string;
	/** Path or minimatch glob a file change must match */
	file?: string;
	/** Include records whose receipts moved to a rewritten commit */
	includeSuperseded?: boolean;
}

export interface ReportEntry {
	commit: string;
	receipt: Receipt;
}

export interface LineAttribution {
	receiptId: string;
	sessionId: string;
	model: string;
	/** Commit whose record holds the receipt */
	commit: string;
}

export interface BlameLine {
	line: number;
	attribution: LineAttribution | "human";
}

export interface BlameView {
	revision: string;
	path: string;
	blob: string;
	totalLines: number;
	aiLines: number;
	/** Rounded to two decimals */
	aiPercent: number;
	lines: BlameLine[];
}

export interface ReportReaderOptions {
	/** Commits walked back from the revision */
	blameDepth?: number;
	blobCache?: BlobCache;
	logger?: Logger;
}

function toTime(value: Date | string): number {
	return value instanceof Date ? value.getTime() : Date.parse(value);
}

function matchesFile(filePath: string, pattern: string): boolean {
	return filePath === pattern || minimatch(filePath, pattern, { dot: true });
}

export function percentage(part: number, total: number): number {
	if (total === 0) {
		return 0;
	}
	return Math.round((part / total) * 10_000) / 100;
}

export class ReportReader {
	private readonly blameDepth: number;
	private readonly blobs: BlobCache;
	private readonly log: Logger;

	constructor(
		private readonly host: GitHost,
		private readonly notes: NotesStore,
		options: ReportReaderOptions = {},
	) {
		this.blameDepth = options.blameDepth ?? 500;
		this.blobs = options.blobCache ?? new BlobCache(host);
		this.log = options.logger ?? defaultLogger;
	}

	async records(filter: RecordFilter = {}): Promise<ReportEntry[]> {
		const { records, corrupt } = await this.notes.readAll();
		if (corrupt.length > 0) {
			this.log.warn({ commits: corrupt }, "skipping notes that are not commit records");
		}

		const since = filter.since === undefined ? undefined : toTime(filter.since);
		const until = filter.until === undefined ? undefined : toTime(filter.until);
		const author = filter.author?.toLowerCase();

		const entries: ReportEntry[] = [];
		for (const record of records) {
			if (record.supersededBy && !filter.includeSuperseded) {
				continue;
			}
			for (const receipt of record.receipts) {
				const started = Date.parse(receipt.startedAt);
				if (since !== undefined && started < since) {
					continue;
				}
				if (until !== undefined && started > until) {
					continue;
				}
				if (author !== undefined && !receipt.author.toLowerCase().includes(author)) {
					continue;
				}
				const { file } = filter;
				if (file !== undefined && !receipt.fileChanges.some((change) => matchesFile(change.path, file))) {
					continue;
				}
				entries.push({ commit: record.commit, receipt });
			}
		}

		return entries.sort((a, b) => compareReceipts(a.receipt, b.receipt) || (a.commit < b.commit ? -1 : 1));
	}

	/**
	 * For each line of `path` at `revision`, the receipt that last produced it,
	 * or "human". Returns null when the file does not exist at that revision.
	 */
	async blame(revision: string, filePath: string): Promise<BlameView | null> {
		const blob = await this.host.blobAt(revision, filePath);
		if (blob === null) {
			return null;
		}
		const text = await this.blobs.read(blob);
		if (text === null) {
			return null;
		}

		const totalLines = splitLines(text).length;
		const assigned: Array<LineAttribution | null> = new Array(totalLines).fill(null);
		let remaining = totalLines;

		const history = [revision, ...(await this.host.ancestors(revision, this.blameDepth))];
		for (const commit of history) {
			if (remaining === 0) {
				break;
			}
			let receipts: Receipt[];
			try {
				receipts = (await this.notes.read(commit))?.receipts ?? [];
			} catch (error) {
				if (!(error instanceof CorruptedDataError)) {
					throw error;
				}
				this.log.warn({ commit }, "skipping note that is not a commit record");
				continue;
			}

			// newest receipt claims a line first
			for (const receipt of [...receipts].sort(compareReceipts).reverse()) {
				if (receipt.orphaned) {
					continue;
				}
				for (const change of receipt.fileChanges) {
					if (change.orphaned || change.path !== filePath) {
						continue;
					}
					const alignment = await this.blobs.align(change.blob, blob);
					if (!alignment) {
						continue;
					}
					const last = Math.min(change.range[1], alignment.oldLineCount);
					for (let line = change.range[0]; line <= last; line++) {
						const mapped = alignment.map.get(line);
						if (mapped === undefined || assigned[mapped - 1] !== null) {
							continue;
						}
						assigned[mapped - 1] = {
							receiptId: receipt.id,
							sessionId: receipt.sessionId,
							model: receipt.model,
							commit,
						};
						remaining--;
					}
				}
			}
		}

		const lines: BlameLine[] = assigned.map((attribution, index) => ({
			line: index + 1,
			attribution: attribution ?? "human",
		}));
		const aiLines = totalLines - remaining;

		return {
			revision,
			path: filePath,
			blob,
			totalLines,
			aiLines,
			aiPercent: percentage(aiLines, totalLines),
			lines,
		};
	}

	/**
	 * Session statistics over the receipts matching `filter`, each receipt once
	 */
	async sessionStats(filter: RecordFilter = {}): Promise<SessionStats> {
		const unique = new Map<string, Receipt>();
		for (const { receipt } of await this.records(filter)) {
			if (!unique.has(receipt.id)) {
				unique.set(receipt.id, receipt);
			}
		}
		return computeSessionStats([...unique.values()]);
	}
}
