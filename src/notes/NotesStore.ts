/**
 * NotesStore - Commit records as git notes
 *
 * One note per commit under a dedicated notes ref, holding the CommitRecord
 * as canonical JSON. Writes always merge with what is already there.
 */

import { emptyRecord, mergeRecords, type RecordMerge, recordsEqual } from "../receipt/ReceiptMerge.js";
import { isReceipt } from "../receipt/receiptShape.js";
import { CorruptedDataError } from "../storage/StorageErrors.js";
import type { CommitRecord, Receipt } from "../types/receipt.js";
import { COMMIT_RECORD_VERSION } from "../types/receipt.js";
import { canonicalStringify } from "../utils/canonicalJson.js";
import type { GitHost } from "../git/GitHost.js";

export function serializeRecord(record: CommitRecord): string {
	return `${canonicalStringify(record, 2)}\n`;
}

export function parseRecord(content: string, commit: string): CommitRecord {
	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		throw new CorruptedDataError(`Note for ${commit} is not JSON`, { cause: error });
	}
	if (typeof parsed !== "object" || parsed === null || !("receipts" in parsed) || !Array.isArray(parsed.receipts)) {
		throw new CorruptedDataError(`Note for ${commit} is not a commit record`);
	}
	const receipts: unknown[] = parsed.receipts;
	const malformed = receipts.findIndex((receipt) => !isReceipt(receipt));
	if (malformed !== -1) {
		throw new CorruptedDataError(`Note for ${commit} has a malformed receipt at index ${malformed}`);
	}

	const record: CommitRecord = {
		version: "version" in parsed && typeof parsed.version === "number" ? parsed.version : COMMIT_RECORD_VERSION,
		commit,
		receipts: receipts.filter(isReceipt),
	};
	if ("supersededBy" in parsed && Array.isArray(parsed.supersededBy) && parsed.supersededBy.length > 0) {
		record.supersededBy = parsed.supersededBy.filter((value: unknown) => typeof value === "string");
	}
	return record;
}

export class NotesStore {
	constructor(
		private readonly host: GitHost,
		readonly ref: string,
	) {}

	/**
	 * Same host, another notes ref (used for fetched remote notes)
	 */
	withRef(ref: string): NotesStore {
		return new NotesStore(this.host, ref);
	}

	/**
	 * @throws CorruptedDataError when the note is not a commit record
	 */
	async read(commit: string): Promise<CommitRecord | null> {
		const content = await this.host.readNote(this.ref, commit);
		if (content === null) {
			return null;
		}
		return parseRecord(content, commit);
	}

	async write(record: CommitRecord): Promise<void> {
		await this.host.writeNote(this.ref, record.commit, serializeRecord(record));
	}

	/**
	 * Union `receipts` into the commit's record. Writes only when the record changes.
	 */
	async merge(commit: string, receipts: Receipt[]): Promise<RecordMerge & { changed: boolean }> {
		const existing = (await this.read(commit)) ?? emptyRecord(commit);
		const incoming: CommitRecord = { ...emptyRecord(commit), receipts };
		const merged = mergeRecords(commit, existing, incoming);
		const changed = !recordsEqual(existing, merged.record);
		if (changed) {
			await this.write(merged.record);
		}
		return { ...merged, changed };
	}

	/**
	 * Note that `successors` took over this commit's receipts
	 */
	async markSuperseded(commit: string, successors: string[]): Promise<boolean> {
		const existing = await this.read(commit);
		if (!existing) {
			return false;
		}
		const others = successors.filter((successor) => successor !== commit);
		const supersededBy = [...new Set([...(existing.supersededBy ?? []), ...others])].sort();
		if (supersededBy.length === 0) {
			return false;
		}
		const updated: CommitRecord = { ...existing, supersededBy };
		if (recordsEqual(existing, updated)) {
			return false;
		}
		await this.write(updated);
		return true;
	}

	async list(): Promise<string[]> {
		return (await this.host.listNotes(this.ref)).map((entry) => entry.commit);
	}

	/**
	 * Every record under the ref. Corrupt notes are returned separately.
	 */
	async readAll(): Promise<{ records: CommitRecord[]; corrupt: string[] }> {
		const records: CommitRecord[] = [];
		const corrupt: string[] = [];
		for (const entry of await this.host.listNotes(this.ref)) {
			const content = await this.host.readBlob(entry.note);
			if (content === null) {
				corrupt.push(entry.commit);
				continue;
			}
			try {
				records.push(parseRecord(content, entry.commit));
			} catch (error) {
				if (!(error instanceof CorruptedDataError)) {
					throw error;
				}
				corrupt.push(entry.commit);
			}
		}
		return { records, corrupt };
	}

	/**
	 * Distinct receipt ids across all records
	 */
	async countReceipts(): Promise<number> {
		const ids = new Set<string>();
		for (const record of (await this.readAll()).records) {
			for (const receipt of record.receipts) {
				ids.add(receipt.id);
			}
		}
		return ids.size;
	}
}
