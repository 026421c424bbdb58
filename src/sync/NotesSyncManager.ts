/**
 * NotesSyncManager - Reconciles the notes ref with a remote
 *
 * Design Principles:
 * - Merge, never overwrite: records are unioned by receipt id on both pull and push
 * - All-or-nothing: the notes ref is journaled before the merge is applied and
 *   restored if any write fails
 * - Only the notes namespace is touched; the working tree never is
 * - Losing versions of a receipt go to the audit log, not away
 */

import pRetry, { AbortError } from "p-retry";
import type { GitHost } from "../git/GitHost.js";
import { GitHostError } from "../git/GitHostError.js";
import type { NotesStore } from "../notes/NotesStore.js";
import { emptyRecord, mergeRecords, recordsEqual } from "../receipt/ReceiptMerge.js";
import { CorruptedDataError } from "../storage/StorageErrors.js";
import type { CommitRecord, Receipt } from "../types/receipt.js";
import { errorMessage, toError } from "../utils/errorHelpers.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import type { AuditLog } from "./AuditLog.js";
import { SyncError } from "./SyncError.js";

export interface NotesSyncOptions {
	remote?: string;
	retries?: number;
	retryDelayMs?: number;
	logger?: Logger;
}

export interface PullResult {
	skipped?: "no-remote" | "no-remote-notes";
	/** Records present on the remote */
	fetched: number;
	/** Local records changed by the merge */
	updated: number;
	/** Receipt versions moved to the audit log */
	superseded: number;
	/** Remote notes that could not be parsed */
	corrupt: string[];
}

export interface PushResult {
	skipped?: "no-remote" | "nothing-to-push";
	attempts: number;
	pull?: PullResult;
}

export class NotesSyncManager {
	private readonly remote: string;
	private readonly retries: number;
	private readonly retryDelayMs: number;
	private readonly log: Logger;

	constructor(
		private readonly host: GitHost,
		private readonly notes: NotesStore,
		private readonly audit: AuditLog,
		options: NotesSyncOptions = {},
	) {
		this.remote = options.remote ?? "origin";
		this.retries = options.retries ?? 3;
		this.retryDelayMs = options.retryDelayMs ?? 500;
		this.log = options.logger ?? defaultLogger;
	}

	/**
	 * Scratch ref the remote notes are fetched into
	 */
	get scratchRef(): string {
		return `${this.notes.ref}-remote`;
	}

	async pull(): Promise<PullResult> {
		try {
			return await this.merge("pull");
		} catch (error) {
			if (error instanceof SyncError) {
				throw error;
			}
			throw new SyncError(`Pull from ${this.remote} failed: ${errorMessage(error)}`, "PULL_FAILED", false, {
				cause: error,
			});
		}
	}

	/**
	 * Merge the remote into local, then push without force. A rejection means
	 * the remote moved in between; the merge is redone and the push retried.
	 */
	async push(): Promise<PushResult> {
		if (!(await this.host.hasRemote(this.remote))) {
			return { skipped: "no-remote", attempts: 0 };
		}
		const before = await this.host.resolveRef(this.notes.ref);
		if (before === null) {
			return { skipped: "nothing-to-push", attempts: 0 };
		}

		let attempts = 0;
		let pull: PullResult | undefined;
		try {
			await pRetry(
				async () => {
					attempts++;
					try {
						pull = await this.merge("push");
						await this.host.pushNotes(this.remote, this.notes.ref);
					} catch (error) {
						if (error instanceof GitHostError && error.retryable) {
							throw error;
						}
						throw new AbortError(toError(error));
					}
				},
				{
					retries: this.retries,
					factor: 2,
					minTimeout: this.retryDelayMs,
					maxTimeout: this.retryDelayMs * 2 ** this.retries,
					randomize: true,
					onFailedAttempt: (error) => {
						this.log.warn(
							{ attempt: error.attemptNumber, retriesLeft: error.retriesLeft, err: error },
							"notes push attempt failed",
						);
					},
				},
			);
		} catch (error) {
			await this.restore(before);
			if (error instanceof SyncError) {
				throw error;
			}
			throw new SyncError(`Push to ${this.remote} failed: ${errorMessage(error)}`, "PUSH_FAILED", true, {
				cause: error,
			});
		}

		return { attempts, pull };
	}

	private async merge(operation: "pull" | "push"): Promise<PullResult> {
		const result: PullResult = { fetched: 0, updated: 0, superseded: 0, corrupt: [] };

		if (!(await this.host.hasRemote(this.remote))) {
			return { ...result, skipped: "no-remote" };
		}

		try {
			const found = await this.host.fetchNotes(this.remote, this.notes.ref, this.scratchRef);
			if (!found) {
				return { ...result, skipped: "no-remote-notes" };
			}

			const remote = await this.notes.withRef(this.scratchRef).readAll();
			result.fetched = remote.records.length;
			result.corrupt = remote.corrupt;
			for (const commit of remote.corrupt) {
				this.log.warn({ commit }, "remote note is not a commit record; skipped");
			}

			const writes: CommitRecord[] = [];
			const superseded: Array<{ commit: string; receipt: Receipt }> = [];
			for (const remoteRecord of remote.records) {
				const local = await this.readLocal(remoteRecord.commit);
				const merged = mergeRecords(remoteRecord.commit, local, remoteRecord);
				// a record the merge leaves alone was resolved by an earlier sync
				if (recordsEqual(local, merged.record)) {
					continue;
				}
				writes.push(merged.record);
				for (const receipt of merged.superseded) {
					superseded.push({ commit: remoteRecord.commit, receipt });
				}
			}

			const logged = await this.applyAll(writes, operation, superseded);
			result.updated = writes.length;
			result.superseded = logged;
			if (logged > 0) {
				this.log.info({ superseded: logged }, "conflicting receipt versions resolved");
			}
			return result;
		} finally {
			await this.host.updateRef(this.scratchRef, null);
		}
	}

	private async readLocal(commit: string): Promise<CommitRecord> {
		try {
			return (await this.notes.read(commit)) ?? emptyRecord(commit);
		} catch (error) {
			if (!(error instanceof CorruptedDataError)) {
				throw error;
			}
			this.log.warn({ commit }, "local note is not a commit record; taking the remote version");
			return emptyRecord(commit);
		}
	}

	/**
	 * Write every merged record, adopt the remote history and audit the losing
	 * versions, or none of it. Returns the number of audit entries written.
	 */
	private async applyAll(
		writes: CommitRecord[],
		operation: "pull" | "push",
		superseded: Array<{ commit: string; receipt: Receipt }>,
	): Promise<number> {
		const before = await this.host.resolveRef(this.notes.ref);
		try {
			for (const record of writes) {
				await this.notes.write(record);
			}
			await this.host.absorbNotesHistory(this.notes.ref, this.scratchRef);
			// audited only once the merge has landed
			const logged = await this.audit.append(operation, superseded);
			return logged.length;
		} catch (error) {
			await this.restore(before);
			throw new SyncError(`Applying merged notes failed: ${errorMessage(error)}`, "PULL_FAILED", true, {
				cause: error,
			});
		}
	}

	private async restore(value: string | null): Promise<void> {
		try {
			await this.host.updateRef(this.notes.ref, value);
		} catch (error) {
			this.log.error({ err: toError(error), ref: this.notes.ref }, "could not restore notes ref");
			throw error;
		}
	}
}
