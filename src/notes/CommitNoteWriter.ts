/**
 * CommitNoteWriter - Moves staged receipts onto the commit that landed them
 *
 * Runs from post-commit. Only the file changes that touch the commit's changed
 * paths are taken; the rest of a receipt stays staged for a later commit.
 * Each taken change is rebased from the blob seen at capture onto the blob the
 * commit recorded, then the receipts are unioned into the commit's record.
 * Faults are reported in the result and logged, never thrown: the commit has
 * already happened.
 */

import { BlobCache } from "../cache/BlobCache.js";
import type { GitHost } from "../git/GitHost.js";
import { orphanChange, remapRange } from "../remap/RangeRemapper.js";
import type { DrainDecision, StagingStore } from "../storage/StagingStore.js";
import type { FileChange, Receipt, StagingEntry } from "../types/receipt.js";
import { errorMessage, toError } from "../utils/errorHelpers.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import type { NotesStore } from "./NotesStore.js";

export const WORKTREE = "worktree";

export interface CommitNoteWriterOptions {
	logger?: Logger;
	blobCache?: BlobCache;
}

export interface CommitWriteResult {
	commit: string;
	/** Receipts merged into the commit's record */
	attached: number;
	/** Staged entries left for a later commit */
	skipped: number;
	receipts: Receipt[];
	errors: string[];
}

/**
 * Split a staged entry by the commit's changed paths
 */
export function selectForCommit(entry: StagingEntry, changedPaths: ReadonlySet<string>): DrainDecision {
	const { receipt } = entry;
	if (receipt.fileChanges.length === 0) {
		// a finished prompt that edited nothing rides along with the next commit
		return receipt.endedAt !== undefined;
	}

	const touching = receipt.fileChanges.filter((change) => changedPaths.has(change.path));
	if (touching.length === 0) {
		return false;
	}
	if (touching.length === receipt.fileChanges.length) {
		return true;
	}

	const rest = receipt.fileChanges.filter((change) => !changedPaths.has(change.path));
	return {
		take: { ...entry, receipt: { ...receipt, fileChanges: touching } },
		keep: { ...entry, receipt: { ...receipt, fileChanges: rest } },
	};
}

export class CommitNoteWriter {
	private readonly log: Logger;
	private readonly blobs: BlobCache;

	constructor(
		private readonly host: GitHost,
		private readonly staging: StagingStore,
		private readonly notes: NotesStore,
		options: CommitNoteWriterOptions = {},
	) {
		this.log = options.logger ?? defaultLogger;
		this.blobs = options.blobCache ?? new BlobCache(host);
	}

	async writeForCommit(commit: string): Promise<CommitWriteResult> {
		const result: CommitWriteResult = { commit, attached: 0, skipped: 0, receipts: [], errors: [] };

		let drained: StagingEntry[];
		try {
			const changedPaths = new Set(await this.host.changedFiles(commit));
			drained = await this.staging.drain((entry) => {
				const decision = selectForCommit(entry, changedPaths);
				if (decision === false || (typeof decision === "object" && decision.keep)) {
					result.skipped++;
				}
				return decision;
			});
		} catch (error) {
			this.log.error({ err: toError(error), commit }, "could not drain staged receipts");
			result.errors.push(errorMessage(error));
			return result;
		}

		if (drained.length === 0) {
			return result;
		}

		try {
			const receipts = await Promise.all(drained.map((entry) => this.rebaseReceipt(entry.receipt, commit)));
			await this.notes.merge(commit, receipts);
			result.receipts = receipts;
			result.attached = receipts.length;
			this.log.debug({ commit, attached: receipts.length }, "receipts attached");
		} catch (error) {
			this.log.error({ err: toError(error), commit }, "could not attach receipts; returning them to staging");
			result.errors.push(errorMessage(error));
			await this.restore(drained, result);
		}

		return result;
	}

	private async rebaseReceipt(receipt: Receipt, commit: string): Promise<Receipt> {
		const fileChanges = await Promise.all(receipt.fileChanges.map((change) => this.rebaseChange(change, commit)));
		return { ...receipt, fileChanges };
	}

	private async rebaseChange(change: FileChange, commit: string): Promise<FileChange> {
		const committedBlob = await this.host.blobAt(commit, change.path);
		if (committedBlob === null) {
			return orphanChange(change, "file-removed");
		}
		if (committedBlob === change.blob) {
			return change;
		}

		const alignment = await this.blobs.align(change.blob, committedBlob);
		if (!alignment) {
			// capture-time content is gone; trust the coordinates as they are
			return { ...change, blob: committedBlob };
		}
		return remapRange(change, alignment, { commit, blob: committedBlob, path: change.path }, WORKTREE);
	}

	private async restore(entries: StagingEntry[], result: CommitWriteResult): Promise<void> {
		for (const entry of entries) {
			try {
				await this.staging.append(entry);
			} catch (error) {
				this.log.error({ err: toError(error), receipt: entry.receipt.id }, "staged receipt lost");
				result.errors.push(`receipt ${entry.receipt.id} lost: ${errorMessage(error)}`);
			}
		}
	}
}
