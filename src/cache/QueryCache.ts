/**
 * QueryCache - Local SQLite index over commit records
 *
 * Derived and disposable: every row can be rebuilt from the notes ref at any
 * time, and nothing reads the cache as a source of truth.
 */

import type Database from "better-sqlite3";
import { CorruptedDataError, StorageConnectionError, StorageError, StorageLockError } from "../storage/StorageErrors.js";
import type { CommitRecord, Receipt } from "../types/receipt.js";
import { hasErrorCode, toError } from "../utils/errorHelpers.js";

// Lazy-loaded better-sqlite3 constructor
let DatabaseConstructor: typeof Database | null = null;
let loadError: Error | null = null;

async function loadBetterSqlite3(): Promise<typeof Database> {
	if (DatabaseConstructor) {
		return DatabaseConstructor;
	}

	if (loadError) {
		throw loadError;
	}

	try {
		const module = await import("better-sqlite3");
		DatabaseConstructor = module.default;
		return DatabaseConstructor;
	} catch (error) {
		loadError = toError(error);
		throw new StorageConnectionError("Failed to load better-sqlite3", {
			cause: loadError,
		});
	}
}

interface ReceiptRow {
	commit_sha: string;
	body: string;
}

export interface CachedReceipt {
	commit: string;
	receipt: Receipt;
}

function mapSqliteError(error: unknown, operation: string): StorageError {
	if (error instanceof StorageError) {
		return error;
	}
	if (hasErrorCode(error, "SQLITE_BUSY")) {
		return new StorageLockError("Database locked", { retryable: true, cause: error });
	}
	if (hasErrorCode(error, "SQLITE_CANTOPEN")) {
		return new StorageConnectionError("Cannot open database", { cause: error });
	}
	return new StorageError(`${operation} failed`, "QUERY_CACHE_ERROR", { cause: error });
}

export class QueryCache {
	private db: Database.Database | null = null;

	/**
	 * @param dbPath - File path, or ":memory:"
	 */
	constructor(private readonly dbPath: string) {}

	private async ensureInitialized(): Promise<Database.Database> {
		if (this.db) {
			return this.db;
		}

		const DB = await loadBetterSqlite3();
		const db = new DB(this.dbPath);
		db.pragma("journal_mode = WAL");
		db.exec(`
      CREATE TABLE IF NOT EXISTS receipts (
        id TEXT NOT NULL,
        commit_sha TEXT NOT NULL,
        session_id TEXT NOT NULL,
        author TEXT NOT NULL,
        started_at TEXT NOT NULL,
        revision INTEGER NOT NULL,
        orphaned INTEGER NOT NULL DEFAULT 0,
        body TEXT NOT NULL,
        PRIMARY KEY (id, commit_sha)
      );

      CREATE TABLE IF NOT EXISTS file_changes (
        receipt_id TEXT NOT NULL,
        commit_sha TEXT NOT NULL,
        path TEXT NOT NULL,
        blob TEXT NOT NULL,
        start_line INTEGER NOT NULL,
        end_line INTEGER NOT NULL,
        orphaned INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_receipts_commit ON receipts(commit_sha);
      CREATE INDEX IF NOT EXISTS idx_receipts_session ON receipts(session_id);
      CREATE INDEX IF NOT EXISTS idx_file_changes_path ON file_changes(path);
      CREATE INDEX IF NOT EXISTS idx_file_changes_commit ON file_changes(commit_sha);
    `);
		this.db = db;
		return db;
	}

	/**
	 * Drop everything and index `records` from scratch
	 */
	async rebuild(records: CommitRecord[]): Promise<void> {
		const db = await this.ensureInitialized();
		try {
			db.transaction(() => {
				db.exec("DELETE FROM file_changes; DELETE FROM receipts;");
				for (const record of records) {
					this.insert(db, record);
				}
			})();
		} catch (error) {
			throw mapSqliteError(error, "Rebuild");
		}
	}

	/**
	 * Replace the rows of one commit
	 */
	async index(record: CommitRecord): Promise<void> {
		const db = await this.ensureInitialized();
		try {
			db.transaction(() => {
				db.prepare<[string]>("DELETE FROM file_changes WHERE commit_sha = ?").run(record.commit);
				db.prepare<[string]>("DELETE FROM receipts WHERE commit_sha = ?").run(record.commit);
				this.insert(db, record);
			})();
		} catch (error) {
			throw mapSqliteError(error, "Index");
		}
	}

	async byReceiptId(id: string): Promise<CachedReceipt[]> {
		return this.query("SELECT commit_sha, body FROM receipts WHERE id = ? ORDER BY commit_sha", [id]);
	}

	async byCommit(commit: string): Promise<Receipt[]> {
		const rows = await this.query(
			"SELECT commit_sha, body FROM receipts WHERE commit_sha = ? ORDER BY started_at, id",
			[commit],
		);
		return rows.map((row) => row.receipt);
	}

	async byPath(filePath: string): Promise<CachedReceipt[]> {
		return this.query(
			`SELECT DISTINCT r.commit_sha, r.body FROM receipts r
       JOIN file_changes f ON f.receipt_id = r.id AND f.commit_sha = r.commit_sha
       WHERE f.path = ?
       ORDER BY r.started_at, r.id, r.commit_sha`,
			[filePath],
		);
	}

	async count(): Promise<number> {
		const db = await this.ensureInitialized();
		try {
			const row = db.prepare<[], { total: number }>("SELECT COUNT(DISTINCT id) AS total FROM receipts").get();
			return row?.total ?? 0;
		} catch (error) {
			throw mapSqliteError(error, "Count");
		}
	}

	async close(): Promise<void> {
		if (!this.db) {
			return;
		}
		try {
			this.db.close();
			this.db = null;
		} catch (error) {
			throw mapSqliteError(error, "Close");
		}
	}

	private insert(db: Database.Database, record: CommitRecord): void {
		const insertReceipt = db.prepare<[string, string, string, string, string, number, number, string]>(`
      INSERT OR REPLACE INTO receipts (id, commit_sha, session_id, author, started_at, revision, orphaned, body)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);
		const insertChange = db.prepare<[string, string, string, string, number, number, number]>(`
      INSERT INTO file_changes (receipt_id, commit_sha, path, blob, start_line, end_line, orphaned)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

		for (const receipt of record.receipts) {
			insertReceipt.run(
				receipt.id,
				record.commit,
				receipt.sessionId,
				receipt.author,
				receipt.startedAt,
				receipt.revision,
				receipt.orphaned ? 1 : 0,
				JSON.stringify(receipt),
			);
			for (const change of receipt.fileChanges) {
				insertChange.run(
					receipt.id,
					record.commit,
					change.path,
					change.blob,
					change.range[0],
					change.range[1],
					change.orphaned ? 1 : 0,
				);
			}
		}
	}

	private async query(sql: string, params: string[]): Promise<CachedReceipt[]> {
		const db = await this.ensureInitialized();
		let rows: ReceiptRow[];
		try {
			rows = db.prepare<string[], ReceiptRow>(sql).all(...params);
		} catch (error) {
			throw mapSqliteError(error, "Query");
		}
		return rows.map((row) => this.deserialize(row));
	}

	private deserialize(row: ReceiptRow): CachedReceipt {
		try {
			const receipt: Receipt = JSON.parse(row.body);
			return { commit: row.commit_sha, receipt };
		} catch (error) {
			throw new CorruptedDataError(`Failed to deserialize cached receipt in ${row.commit_sha}`, {
				cause: error,
			});
		}
	}
}
