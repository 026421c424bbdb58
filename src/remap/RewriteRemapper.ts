/**
 * RewriteRemapper - Carries commit records across amend, rebase, squash and
 * cherry-pick
 *
 * Design Principles:
 * - Pure in (old record, blobs): the old record is never rewritten except for
 *   its supersededBy marker, so applying a notification twice changes nothing
 * - Cost follows the rewritten commits and the files their receipts touch
 * - Receipts are never dropped; lost content becomes an orphan marker
 */

import { BlobCache } from "../cache/BlobCache.js";
import type { GitHost } from "../git/GitHost.js";
import type { NotesStore } from "../notes/NotesStore.js";
import type { CommitMapping, FileChange, Receipt, RewriteNotification } from "../types.js";
import { errorMessage, toError } from "../utils/errorHelpers.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { orphanChange, remapRange } from "./RangeRemapper.js";

export interface RewriteRemapperOptions {
	/** Old ancestors searched for a dropped commit's content */
	maxAncestorDepth?: number;
	blobCache?: BlobCache;
	logger?: Logger;
}

export interface RewriteResult {
	/** Mappings whose old commit carried a record */
	rewritten: number;
	/** Receipts written into a new commit's record */
	remapped: number;
	/** File changes that lost their content during this rewrite */
	orphanedChanges: number;
	/** Receipts of dropped commits handed to a successor for custody */
	unresolvable: number;
	errors: string[];
}

function countOrphans(receipts: Receipt[]): number {
	return receipts.reduce((sum, receipt) => sum + receipt.fileChanges.filter((change) => change.orphaned).length, 0);
}

export class RewriteRemapper {
	private readonly maxAncestorDepth: number;
	private readonly blobs: BlobCache;
	private readonly log: Logger;

	constructor(
		private readonly host: GitHost,
		private readonly notes: NotesStore,
		options: RewriteRemapperOptions = {},
	) {
		this.maxAncestorDepth = options.maxAncestorDepth ?? 50;
		this.blobs = options.blobCache ?? new BlobCache(host);
		this.log = options.logger ?? defaultLogger;
	}

	async apply(notification: RewriteNotification): Promise<RewriteResult> {
		const result: RewriteResult = { rewritten: 0, remapped: 0, orphanedChanges: 0, unresolvable: 0, errors: [] };
		const renames = new Map(notification.renames);

		for (const [index, mapping] of notification.mappings.entries()) {
			try {
				await this.applyMapping(mapping, index, notification, renames, result);
			} catch (error) {
				this.log.error({ err: toError(error), oldCommit: mapping.oldCommit }, "remap failed");
				result.errors.push(`${mapping.oldCommit}: ${errorMessage(error)}`);
			}
		}

		return result;
	}

	private async applyMapping(
		mapping: CommitMapping,
		index: number,
		notification: RewriteNotification,
		renames: Map<string, string>,
		result: RewriteResult,
	): Promise<void> {
		// a pick the rebase fast-forwarded leaves the commit where it was
		if (mapping.newCommit === mapping.oldCommit) {
			return;
		}
		const record = await this.notes.read(mapping.oldCommit);
		if (!record || record.receipts.length === 0) {
			return;
		}
		result.rewritten++;

		const before = countOrphans(record.receipts);
		const placements = new Map<string, Receipt[]>();
		const place = (commit: string, receipt: Receipt) => {
			placements.set(commit, [...(placements.get(commit) ?? []), receipt]);
		};

		const { newCommit } = mapping;
		if (newCommit !== null) {
			const receipts = await Promise.all(
				record.receipts.map((receipt) => this.remapReceipt(receipt, mapping.oldCommit, newCommit, renames)),
			);
			for (const receipt of receipts) {
				place(newCommit, receipt);
			}
		} else {
			for (const receipt of record.receipts) {
				const relocated = await this.relocate(receipt, mapping.oldCommit, index, notification, renames);
				if (!relocated) {
					result.errors.push(`${mapping.oldCommit}: no commit can take custody of receipt ${receipt.id}`);
					continue;
				}
				if (relocated.receipt.orphaned?.reason === "unresolvable") {
					result.unresolvable++;
				}
				place(relocated.commit, relocated.receipt);
			}
		}

		let after = 0;
		for (const [commit, receipts] of placements) {
			await this.notes.merge(commit, receipts);
			result.remapped += receipts.length;
			after += countOrphans(receipts);
		}
		result.orphanedChanges += Math.max(0, after - before);

		if (placements.size > 0) {
			await this.notes.markSuperseded(mapping.oldCommit, [...placements.keys()]);
		}
		this.log.debug({ oldCommit: mapping.oldCommit, targets: [...placements.keys()] }, "record remapped");
	}

	private async remapReceipt(
		receipt: Receipt,
		oldCommit: string,
		newCommit: string,
		renames: Map<string, string>,
	): Promise<Receipt> {
		const fileChanges = await Promise.all(
			receipt.fileChanges.map((change) => this.remapChange(change, oldCommit, newCommit, renames)),
		);
		return { ...receipt, fileChanges, revision: receipt.revision + 1 };
	}

	private async remapChange(
		change: FileChange,
		oldCommit: string,
		newCommit: string,
		renames: Map<string, string>,
	): Promise<FileChange> {
		if (change.orphaned) {
			return change;
		}

		const newPath = renames.get(change.path) ?? change.path;
		const newBlob = await this.host.blobAt(newCommit, newPath);
		if (newBlob === null) {
			return orphanChange(change, "file-removed");
		}
		if (newBlob === change.blob && newPath === change.path) {
			return change;
		}

		const alignment = await this.blobs.align(change.blob, newBlob);
		if (!alignment) {
			return orphanChange(change, "blob-missing");
		}
		return remapRange(change, alignment, { commit: newCommit, blob: newBlob, path: newPath }, oldCommit);
	}

	/**
	 * Find a home for a receipt whose commit was dropped: the nearest old
	 * ancestor whose surviving commit still holds some of its content, else the
	 * closest successor in the notification, flagged unresolvable
	 */
	private async relocate(
		receipt: Receipt,
		oldCommit: string,
		index: number,
		notification: RewriteNotification,
		renames: Map<string, string>,
	): Promise<{ commit: string; receipt: Receipt } | null> {
		const targets = new Map(notification.mappings.map((mapping) => [mapping.oldCommit, mapping.newCommit]));

		const ancestors = (await this.host.commitExists(oldCommit))
			? await this.host.ancestors(oldCommit, this.maxAncestorDepth)
			: [];

		for (const ancestor of ancestors) {
			const mapped = targets.get(ancestor);
			if (mapped === null) {
				continue;
			}
			const target = mapped ?? ancestor;
			const remapped = await this.remapReceipt(receipt, oldCommit, target, renames);
			const survives = remapped.fileChanges.some((change, i) => !change.orphaned && !receipt.fileChanges[i].orphaned);
			if (survives) {
				return { commit: target, receipt: remapped };
			}
		}

		const custodian = await this.custodian(index, notification);
		if (!custodian) {
			return null;
		}
		return {
			commit: custodian,
			receipt: {
				...receipt,
				revision: receipt.revision + 1,
				orphaned: { reason: "unresolvable", atCommit: oldCommit },
			},
		};
	}

	private async custodian(index: number, notification: RewriteNotification): Promise<string | null> {
		const { mappings } = notification;
		for (let i = index + 1; i < mappings.length; i++) {
			const successor = mappings[i].newCommit;
			if (successor !== null) {
				return successor;
			}
		}
		for (let i = index - 1; i >= 0; i--) {
			const predecessor = mappings[i].newCommit;
			if (predecessor !== null) {
				return predecessor;
			}
		}
		return this.host.head();
	}
}
