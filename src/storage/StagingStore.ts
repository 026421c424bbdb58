/**
 * StagingStore - Receipts waiting in the working copy for their commit
 *
 * Design Principles:
 * - One JSON file, replaced atomically (temp file, fsync, rename)
 * - Every read-modify-write holds the directory's FileLock
 * - Never versioned: the directory is listed in .git/info/exclude by the host
 */

import { mkdir, open, readFile, rename } from "node:fs/promises";
import path from "node:path";
import { mergeStagedReceipt } from "../receipt/ReceiptFactory.js";
import type { Receipt, StagingEntry } from "../types/receipt.js";
import { hasErrorCode } from "../utils/errorHelpers.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { FileLock, type FileLockOptions } from "./FileLock.js";
import { CorruptedDataError } from "./StorageErrors.js";

export const STAGING_FILE_NAME = "staging.json";
const STAGING_FORMAT_VERSION = 1;

interface StagingFile {
	version: number;
	entries: StagingEntry[];
}

/**
 * What drain does with one entry: take it, keep it, or split it
 */
export type DrainDecision = boolean | { take: StagingEntry; keep: StagingEntry | null };

export interface StagingStoreOptions {
	lock?: FileLockOptions;
	logger?: Logger;
}

function isStagingEntry(value: unknown): value is StagingEntry {
	if (typeof value !== "object" || value === null) {
		return false;
	}
	if (!("stagedAt" in value) || typeof value.stagedAt !== "string") {
		return false;
	}
	if (!("receipt" in value) || typeof value.receipt !== "object" || value.receipt === null) {
		return false;
	}
	const receipt = value.receipt;
	return (
		"id" in receipt &&
		typeof receipt.id === "string" &&
		"sessionId" in receipt &&
		typeof receipt.sessionId === "string" &&
		"fileChanges" in receipt &&
		Array.isArray(receipt.fileChanges)
	);
}

function parseStagingFile(raw: string, filePath: string): StagingFile {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new CorruptedDataError(`Staging file is not JSON: ${filePath}`, { cause: error });
	}
	if (
		typeof parsed !== "object" ||
		parsed === null ||
		!("entries" in parsed) ||
		!Array.isArray(parsed.entries) ||
		!parsed.entries.every(isStagingEntry)
	) {
		throw new CorruptedDataError(`Staging file has an unexpected shape: ${filePath}`);
	}
	const version = "version" in parsed && typeof parsed.version === "number" ? parsed.version : STAGING_FORMAT_VERSION;
	return { version, entries: parsed.entries };
}

export class StagingStore {
	private readonly filePath: string;
	private readonly lock: FileLock;
	private readonly log: Logger;

	constructor(
		private readonly dir: string,
		options: StagingStoreOptions = {},
	) {
		this.filePath = path.join(dir, STAGING_FILE_NAME);
		this.log = options.logger ?? defaultLogger;
		this.lock = new FileLock(path.join(dir, "staging.lock"), { logger: this.log, ...options.lock });
	}

	get path(): string {
		return this.filePath;
	}

	async list(): Promise<StagingEntry[]> {
		return (await this.read()).entries;
	}

	/**
	 * Insert a receipt, or fold it into the staged receipt with the same id
	 */
	async append(entry: StagingEntry): Promise<StagingEntry> {
		return this.mutate((file) => {
			const index = file.entries.findIndex((staged) => staged.receipt.id === entry.receipt.id);
			if (index === -1) {
				file.entries.push(entry);
				return entry;
			}
			const existing = file.entries[index];
			const merged: StagingEntry = {
				receipt: mergeStagedReceipt(existing.receipt, entry.receipt),
				stagedAt: existing.stagedAt,
			};
			file.entries[index] = merged;
			return merged;
		});
	}

	/**
	 * Apply `fn` to the most recently staged receipt of a session.
	 * Returns the updated receipt, or null when the session has none staged.
	 */
	async update(sessionId: string, fn: (receipt: Receipt) => Receipt): Promise<Receipt | null> {
		return this.mutate((file) => {
			for (let i = file.entries.length - 1; i >= 0; i--) {
				const entry = file.entries[i];
				if (entry.receipt.sessionId === sessionId) {
					const updated = fn(entry.receipt);
					file.entries[i] = { ...entry, receipt: updated };
					return updated;
				}
			}
			return null;
		});
	}

	/**
	 * Remove and return the entries `decide` takes. A split entry returns its
	 * taken part and leaves its kept part staged.
	 */
	async drain(decide: (entry: StagingEntry) => DrainDecision): Promise<StagingEntry[]> {
		return this.mutate((file) => {
			const taken: StagingEntry[] = [];
			const kept: StagingEntry[] = [];

			for (const entry of file.entries) {
				const decision = decide(entry);
				if (decision === true) {
					taken.push(entry);
				} else if (decision === false) {
					kept.push(entry);
				} else {
					taken.push(decision.take);
					if (decision.keep) {
						kept.push(decision.keep);
					}
				}
			}

			file.entries = kept;
			return taken;
		});
	}

	/**
	 * Move an unreadable staging file aside so the next capture starts clean.
	 * Returns the quarantine path, or null when there was nothing to move.
	 */
	async quarantine(now: Date = new Date()): Promise<string | null> {
		return this.lock.withLock(async () => {
			const target = `${this.filePath}.corrupt-${now.getTime()}`;
			try {
				await rename(this.filePath, target);
			} catch (error) {
				if (hasErrorCode(error, "ENOENT")) {
					return null;
				}
				throw error;
			}
			this.log.warn({ file: this.filePath, quarantined: target }, "staging file quarantined");
			return target;
		});
	}

	private async mutate<T>(fn: (file: StagingFile) => T): Promise<T> {
		await mkdir(this.dir, { recursive: true });
		return this.lock.withLock(async () => {
			const file = await this.read();
			const result = fn(file);
			await this.write(file);
			return result;
		});
	}

	private async read(): Promise<StagingFile> {
		let raw: string;
		try {
			raw = await readFile(this.filePath, "utf8");
		} catch (error) {
			if (hasErrorCode(error, "ENOENT")) {
				return { version: STAGING_FORMAT_VERSION, entries: [] };
			}
			throw error;
		}
		if (raw.trim() === "") {
			return { version: STAGING_FORMAT_VERSION, entries: [] };
		}
		return parseStagingFile(raw, this.filePath);
	}

	private async write(file: StagingFile): Promise<void> {
		const tmpPath = `${this.filePath}.tmp`;
		const handle = await open(tmpPath, "w");
		try {
			await handle.writeFile(`${JSON.stringify({ version: STAGING_FORMAT_VERSION, entries: file.entries }, null, 2)}\n`);
			await handle.sync();
		} finally {
			await handle.close();
		}
		await rename(tmpPath, this.filePath);
	}
}
