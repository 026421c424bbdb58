import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { createId } from "@paralleldrive/cuid2";
import { BlobCache } from "./cache/BlobCache.js";
import { QueryCache } from "./cache/QueryCache.js";
import { CaptureQueue, type CaptureResult } from "./capture/CaptureQueue.js";
import { createConfig } from "./config.js";
import { ConfigLoader } from "./config/ConfigLoader.js";
import type { ConfigOverrides, PromptReceiptsConfig } from "./config/types.js";
import type { GitHost } from "./git/GitHost.js";
import { SimpleGitHost } from "./git/SimpleGitHost.js";
import { CommitNoteWriter, type CommitWriteResult } from "./notes/CommitNoteWriter.js";
import { NotesStore } from "./notes/NotesStore.js";
import { RedactionPipeline } from "./privacy/RedactionPipeline.js";
import { parsePostRewriteInput } from "./remap/postRewrite.js";
import { type RewriteResult, RewriteRemapper } from "./remap/RewriteRemapper.js";
import { type BlameView, type RecordFilter, type ReportEntry, ReportReader } from "./report/ReportReader.js";
import type { SessionStats } from "./session/sessionStats.js";
import { StagingStore } from "./storage/StagingStore.js";
import { AuditLog } from "./sync/AuditLog.js";
import { NotesSyncManager, type PullResult, type PushResult } from "./sync/NotesSyncManager.js";
import type { RewriteNotification } from "./types/events.js";
import { hasErrorCode } from "./utils/errorHelpers.js";
import { logger as defaultLogger, type Logger } from "./utils/logger.js";

export const DATA_DIR_NAME = ".prompt-receipts";
export const SALT_FILE_NAME = "salt";
export const CACHE_FILE_NAME = "cache.db";

export interface PromptReceiptsOptions {
	/**
	 * Git access for the working copy
	 * SimpleGitHost in a real repository, MemoryGitHost in tests
	 */
	host: GitHost;

	/**
	 * Resolved configuration
	 * Defaults to createConfig() with no overrides
	 */
	config?: PromptReceiptsConfig;

	/**
	 * Directory for staging, locks, the audit log and the query cache
	 * Defaults to `.prompt-receipts` in the working copy
	 */
	dataDir?: string;

	/**
	 * Query cache database: a file path or ":memory:"
	 * Defaults to `cache.db` in the data directory
	 */
	cachePath?: string;

	logger?: Logger;
}

export interface OpenOptions {
	overrides?: ConfigOverrides;
	/** Where the fallback configuration file is looked up */
	homeDir?: string;
	logger?: Logger;
}

/**
 * Salt used when the configuration leaves redaction.salt empty. Created once
 * per working copy so hashed secrets correlate within it and nowhere else.
 */
export async function resolveSalt(dataDir: string): Promise<string> {
	const saltPath = path.join(dataDir, SALT_FILE_NAME);
	try {
		const existing = (await readFile(saltPath, "utf8")).trim();
		if (existing) {
			return existing;
		}
	} catch (error) {
		if (!hasErrorCode(error, "ENOENT")) {
			throw error;
		}
	}
	const salt = createId();
	await mkdir(dataDir, { recursive: true });
	await writeFile(saltPath, `${salt}\n`, { encoding: "utf8", mode: 0o600 });
	return salt;
}

/**
 * Receipt attribution for one working copy
 * Wires capture, commit attachment, rewrite remapping, sync and reporting
 *
 * @example
 * ```typescript
 * const receipts = await PromptReceipts.open(process.cwd());
 *
 * // from the agent's hooks
 * await receipts.capture({ kind: 'prompt', sessionId: 'S1', timestamp, promptText, model });
 * await receipts.capture({ kind: 'tool', sessionId: 'S1', timestamp, toolName: 'Edit', filePath, lineRange: [4, 8] });
 *
 * // from git hooks
 * await receipts.postCommit();
 * await receipts.postRewrite(stdin);
 *
 * const view = await receipts.blame('HEAD', 'src/auth.rs');
 * ```
 */
export class PromptReceipts {
	readonly host: GitHost;
	readonly config: PromptReceiptsConfig;
	readonly dataDir: string;
	readonly staging: StagingStore;
	readonly notes: NotesStore;
	readonly redaction: RedactionPipeline;
	readonly audit: AuditLog;
	readonly sync: NotesSyncManager;
	readonly report: ReportReader;

	private readonly queue: CaptureQueue;
	private readonly writer: CommitNoteWriter;
	private readonly remapper: RewriteRemapper;
	private readonly cachePath: string;
	private queryCache: QueryCache | null = null;
	private readonly log: Logger;

	constructor(options: PromptReceiptsOptions) {
		this.host = options.host;
		this.config = options.config ?? createConfig();
		this.dataDir = options.dataDir ?? path.join(this.host.root, DATA_DIR_NAME);
		this.cachePath = options.cachePath ?? path.join(this.dataDir, CACHE_FILE_NAME);
		this.log = options.logger ?? defaultLogger;

		const logger = this.log;
		const blobCache = new BlobCache(this.host);

		this.staging = new StagingStore(this.dataDir, { logger });
		this.notes = new NotesStore(this.host, this.config.notesRef);
		this.redaction = new RedactionPipeline(this.config.redaction, { logger });
		this.audit = new AuditLog(this.dataDir);

		this.queue = new CaptureQueue(this.host, this.staging, this.redaction, this.config.capture, { logger });
		this.writer = new CommitNoteWriter(this.host, this.staging, this.notes, { logger, blobCache });
		this.remapper = new RewriteRemapper(this.host, this.notes, {
			maxAncestorDepth: this.config.remap.maxAncestorDepth,
			blobCache,
			logger,
		});
		this.sync = new NotesSyncManager(this.host, this.notes, this.audit, {
			remote: this.config.sync.remote,
			retries: this.config.sync.retries,
			retryDelayMs: this.config.sync.retryDelayMs,
			logger,
		});
		this.report = new ReportReader(this.host, this.notes, {
			blameDepth: this.config.report.blameDepth,
			blobCache,
			logger,
		});
	}

	/**
	 * Open the git working copy containing `cwd` with its configuration file.
	 * Keeps the data directory out of version control.
	 */
	static async open(cwd: string = process.cwd(), options: OpenOptions = {}): Promise<PromptReceipts> {
		const logger = options.logger ?? defaultLogger;
		const host = await SimpleGitHost.open(cwd);
		const loaded = await new ConfigLoader({ homeDir: options.homeDir, logger }).load(host.root, options.overrides);

		const dataDir = path.join(host.root, DATA_DIR_NAME);
		let config = loaded.config;
		if (!config.redaction.salt) {
			config = { ...config, redaction: { ...config.redaction, salt: await resolveSalt(dataDir) } };
		}
		await host.excludeFromTracking(`/${DATA_DIR_NAME}/`);

		return new PromptReceipts({ host, config, dataDir, logger });
	}

	/**
	 * Record a capture event. Never rejects; problems are in the result.
	 */
	capture(event: unknown): Promise<CaptureResult> {
		return this.queue.enqueue(event);
	}

	/**
	 * Attach staged receipts to a new commit (post-commit hook)
	 *
	 * @param commit - Defaults to HEAD
	 */
	async postCommit(commit?: string): Promise<CommitWriteResult | null> {
		await this.queue.idle();
		const target = commit ?? (await this.host.head());
		if (target === null) {
			return null;
		}
		return this.writer.writeForCommit(target);
	}

	/**
	 * Carry records across a history rewrite (post-rewrite hook)
	 *
	 * @param input - The hook's stdin, "old new" per line
	 */
	async postRewrite(input: string, renames: RewriteNotification["renames"] = []): Promise<RewriteResult> {
		return this.rewrite(parsePostRewriteInput(input, renames));
	}

	rewrite(notification: RewriteNotification): Promise<RewriteResult> {
		return this.remapper.apply(notification);
	}

	pull(): Promise<PullResult> {
		return this.sync.pull();
	}

	push(): Promise<PushResult> {
		return this.sync.push();
	}

	records(filter: RecordFilter = {}): Promise<ReportEntry[]> {
		return this.report.records(filter);
	}

	blame(revision: string, filePath: string): Promise<BlameView | null> {
		return this.report.blame(revision, filePath);
	}

	sessionStats(filter: RecordFilter = {}): Promise<SessionStats> {
		return this.report.sessionStats(filter);
	}

	/**
	 * Query cache, opened on first use
	 */
	get cache(): QueryCache {
		if (!this.queryCache) {
			this.queryCache = new QueryCache(this.cachePath);
		}
		return this.queryCache;
	}

	/**
	 * Re-index every record in the notes ref
	 *
	 * @returns Distinct receipts indexed
	 */
	async rebuildCache(): Promise<number> {
		const { records, corrupt } = await this.notes.readAll();
		if (corrupt.length > 0) {
			this.log.warn({ commits: corrupt }, "skipping notes that are not commit records");
		}
		if (this.cachePath !== ":memory:") {
			await mkdir(this.dataDir, { recursive: true });
		}
		await this.cache.rebuild(records);
		return this.cache.count();
	}

	async close(): Promise<void> {
		await this.queue.idle();
		if (this.queryCache) {
			await this.queryCache.close();
			this.queryCache = null;
		}
	}
}
