/**
 * FileLock - Cross-process exclusive lock on a working-copy directory
 *
 * The lock is a file created with O_EXCL holding the owner id, the time it
 * was taken and an expiry. A lock past its expiry belongs to a process that
 * died and is broken.
 * Release only removes the file when this owner still holds it.
 */

import { open, readFile, rm, stat } from "node:fs/promises";
import { createId } from "@paralleldrive/cuid2";
import pRetry, { AbortError } from "p-retry";
import { hasErrorCode, toError } from "../utils/errorHelpers.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { StorageLockError } from "./StorageErrors.js";

export interface FileLockOptions {
	/** Age after which a held lock is considered abandoned */
	ttlMs?: number;
	/** Attempts after the first before giving up */
	retries?: number;
	/** Delay before the first retry; doubles each attempt */
	minTimeoutMs?: number;
	logger?: Logger;
	now?: () => number;
}

interface LockContent {
	owner: string;
	acquiredAt: number;
	expiresAt: number;
}

function parseLockContent(raw: string): LockContent | null {
	try {
		const parsed: unknown = JSON.parse(raw);
		if (
			typeof parsed === "object" &&
			parsed !== null &&
			"owner" in parsed &&
			typeof parsed.owner === "string" &&
			"acquiredAt" in parsed &&
			typeof parsed.acquiredAt === "number" &&
			"expiresAt" in parsed &&
			typeof parsed.expiresAt === "number"
		) {
			return { owner: parsed.owner, acquiredAt: parsed.acquiredAt, expiresAt: parsed.expiresAt };
		}
	} catch {
		// half-written lock file
	}
	return null;
}

export class FileLock {
	private readonly ttlMs: number;
	private readonly retries: number;
	private readonly minTimeoutMs: number;
	private readonly log: Logger;
	private readonly now: () => number;

	constructor(
		private readonly lockPath: string,
		options: FileLockOptions = {},
	) {
		this.ttlMs = options.ttlMs ?? 30_000;
		this.retries = options.retries ?? 8;
		this.minTimeoutMs = options.minTimeoutMs ?? 25;
		this.log = options.logger ?? defaultLogger;
		this.now = options.now ?? Date.now;
	}

	/**
	 * Run `fn` while holding the lock. The lock is released on every exit path.
	 */
	async withLock<T>(fn: () => Promise<T>): Promise<T> {
		const owner = await this.acquire();
		try {
			return await fn();
		} finally {
			await this.release(owner);
		}
	}

	/**
	 * Acquire the lock and return the owner id needed to release it
	 */
	async acquire(): Promise<string> {
		const owner = createId();

		try {
			await pRetry(
				async () => {
					if (await this.tryCreate(owner)) {
						return;
					}
					await this.breakIfStale();
					if (await this.tryCreate(owner)) {
						return;
					}
					throw new StorageLockError(`Lock held: ${this.lockPath}`);
				},
				{
					retries: this.retries,
					factor: 2,
					minTimeout: this.minTimeoutMs,
					maxTimeout: this.minTimeoutMs * 2 ** this.retries,
					randomize: true,
				},
			);
		} catch (error) {
			if (error instanceof StorageLockError) {
				throw error;
			}
			throw new StorageLockError(`Failed to acquire lock: ${this.lockPath}`, { cause: toError(error) });
		}

		return owner;
	}

	async release(owner: string): Promise<void> {
		let raw: string;
		try {
			raw = await readFile(this.lockPath, "utf8");
		} catch (error) {
			if (hasErrorCode(error, "ENOENT")) {
				return;
			}
			throw error;
		}

		const content = parseLockContent(raw);
		if (content?.owner !== owner) {
			this.log.warn({ lockPath: this.lockPath }, "lock taken over before release");
			return;
		}
		await rm(this.lockPath, { force: true });
	}

	private async tryCreate(owner: string): Promise<boolean> {
		const acquiredAt = this.now();
		const content: LockContent = { owner, acquiredAt, expiresAt: acquiredAt + this.ttlMs };

		try {
			const handle = await open(this.lockPath, "wx");
			try {
				await handle.writeFile(JSON.stringify(content));
			} finally {
				await handle.close();
			}
			return true;
		} catch (error) {
			if (hasErrorCode(error, "EEXIST")) {
				return false;
			}
			throw new AbortError(toError(error));
		}
	}

	private async breakIfStale(): Promise<void> {
		let raw: string;
		try {
			raw = await readFile(this.lockPath, "utf8");
		} catch (error) {
			if (hasErrorCode(error, "ENOENT")) {
				return;
			}
			throw new AbortError(toError(error));
		}

		const content = parseLockContent(raw);
		// unparsable: the holder may still be writing it, so age it by mtime
		const expiresAt = content ? content.expiresAt : (await stat(this.lockPath)).mtimeMs + this.ttlMs;
		if (expiresAt > this.now()) {
			return;
		}

		this.log.warn({ lockPath: this.lockPath, owner: content?.owner }, "breaking stale lock");
		await rm(this.lockPath, { force: true });
	}
}
