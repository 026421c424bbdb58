import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { createId } from "@paralleldrive/cuid2";
import type { Receipt } from "../types/receipt.js";
import { hasErrorCode } from "../utils/errorHelpers.js";

export const AUDIT_FILE_NAME = "sync-audit.jsonl";

export interface AuditEntry {
	id: string;
	at: string;
	operation: "pull" | "push";
	commit: string;
	receiptId: string;
	/** The version that lost the merge, kept verbatim */
	superseded: Receipt;
}

/**
 * Append-only JSON-lines log of receipt versions replaced during sync
 */
export class AuditLog {
	private readonly filePath: string;

	constructor(private readonly dir: string) {
		this.filePath = path.join(dir, AUDIT_FILE_NAME);
	}

	get path(): string {
		return this.filePath;
	}

	async append(
		operation: AuditEntry["operation"],
		superseded: Array<{ commit: string; receipt: Receipt }>,
		now: Date = new Date(),
	): Promise<AuditEntry[]> {
		if (superseded.length === 0) {
			return [];
		}
		const entries = superseded.map(
			({ commit, receipt }): AuditEntry => ({
				id: createId(),
				at: now.toISOString(),
				operation,
				commit,
				receiptId: receipt.id,
				superseded: receipt,
			}),
		);
		await mkdir(this.dir, { recursive: true });
		await appendFile(this.filePath, entries.map((entry) => `${JSON.stringify(entry)}\n`).join(""), "utf8");
		return entries;
	}

	/**
	 * Entries in the order they were written. Lines that do not parse are skipped.
	 */
	async read(): Promise<AuditEntry[]> {
		let raw: string;
		try {
			raw = await readFile(this.filePath, "utf8");
		} catch (error) {
			if (hasErrorCode(error, "ENOENT")) {
				return [];
			}
			throw error;
		}

		const entries: AuditEntry[] = [];
		for (const line of raw.split("\n")) {
			if (line.trim() === "") {
				continue;
			}
			try {
				const parsed: AuditEntry = JSON.parse(line);
				entries.push(parsed);
			} catch {
				// torn final line from an interrupted append
			}
		}
		return entries;
	}
}
