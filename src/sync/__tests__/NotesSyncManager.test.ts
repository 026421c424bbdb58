import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MemoryGitHost } from "../../git/MemoryGitHost.js";
import { NotesStore } from "../../notes/NotesStore.js";
import { createReceipt } from "../../receipt/ReceiptFactory.js";
import { emptyRecord } from "../../receipt/ReceiptMerge.js";
import type { Receipt } from "../../types/receipt.js";
import { createLogger } from "../../utils/logger.js";
import { AuditLog } from "../AuditLog.js";
import { NotesSyncManager } from "../NotesSyncManager.js";
import { SyncError } from "../SyncError.js";

const logger = createLogger({ level: "silent" });
const REF = "refs/notes/prompt-receipts";
const X = "1".repeat(40);
const Y = "2".repeat(40);

function receipt(sessionId: string, startedAt: string): Receipt {
	return createReceipt({ sessionId, startedAt, promptHash: `sha256:${sessionId}` }, "2024-05-01T12:00:00.000Z");
}

interface Clone {
	host: MemoryGitHost;
	notes: NotesStore;
	audit: AuditLog;
	sync: NotesSyncManager;
}

describe("NotesSyncManager", () => {
	let dir: string;
	let remote: MemoryGitHost;
	let a: Clone;
	let b: Clone;

	function clone(name: string): Clone {
		const host = new MemoryGitHost(`/${name}`);
		host.addRemote("origin", remote);
		const notes = new NotesStore(host, REF);
		const audit = new AuditLog(path.join(dir, name));
		const sync = new NotesSyncManager(host, notes, audit, { retries: 2, retryDelayMs: 1, logger });
		return { host, notes, audit, sync };
	}

	async function put(target: Clone, commit: string, ...receipts: Receipt[]): Promise<void> {
		await target.notes.write({ ...emptyRecord(commit), receipts });
	}

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), "receipts-sync-"));
		remote = new MemoryGitHost("/remote");
		a = clone("a");
		b = clone("b");
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	const r1 = receipt("S1", "2024-05-01T09:00:00.000Z");
	const r2 = receipt("S2", "2024-05-01T09:10:00.000Z");
	const r2Later: Receipt = { ...r2, capturedAt: "2024-05-01T13:00:00.000Z", promptSummary: "resumed" };
	const r3 = receipt("S3", "2024-05-01T09:20:00.000Z");

	it("skips without a remote", async () => {
		const lonely = new MemoryGitHost("/lonely");
		const sync = new NotesSyncManager(lonely, new NotesStore(lonely, REF), new AuditLog(path.join(dir, "lonely")), {
			logger,
		});

		expect(await sync.pull()).toEqual({ skipped: "no-remote", fetched: 0, updated: 0, superseded: 0, corrupt: [] });
		expect(await sync.push()).toEqual({ skipped: "no-remote", attempts: 0 });
	});

	it("skips a pull when the remote has no notes", async () => {
		expect(await b.sync.pull()).toEqual({
			skipped: "no-remote-notes",
			fetched: 0,
			updated: 0,
			superseded: 0,
			corrupt: [],
		});
	});

	it("skips a push when there are no local notes", async () => {
		expect(await a.sync.push()).toEqual({ skipped: "nothing-to-push", attempts: 0 });
	});

	it("unions records and audits the losing version", async () => {
		await put(a, X, r1, r2);
		await a.sync.push();
		await put(b, X, r2Later, r3);

		const pulled = await b.sync.pull();

		expect(pulled).toEqual({ fetched: 1, updated: 1, superseded: 1, corrupt: [] });
		const merged = await b.notes.read(X);
		expect(merged?.receipts.map((r) => r.sessionId)).toEqual(["S1", "S2", "S3"]);
		expect(merged?.receipts[1]).toEqual(r2Later);

		const audit = await b.audit.read();
		expect(audit).toHaveLength(1);
		expect(audit[0]).toMatchObject({ operation: "pull", commit: X, receiptId: r2.id, superseded: r2 });
		expect(await b.host.resolveRef(b.sync.scratchRef)).toBeNull();
	});

	it("converges both clones after a push and a pull", async () => {
		await put(a, X, r1, r2);
		await a.sync.push();
		await put(b, X, r2Later, r3);
		await put(b, Y, r1);

		const pushed = await b.sync.push();
		expect(pushed.attempts).toBe(1);
		expect(pushed.pull?.updated).toBe(1);

		await a.sync.pull();

		for (const commit of [X, Y]) {
			expect(await a.host.readNote(REF, commit)).toBe(await b.host.readNote(REF, commit));
		}
		expect(await remote.resolveRef(REF)).toBe(await b.host.resolveRef(REF));
		expect((await a.audit.read()).map((entry) => entry.receiptId)).toEqual([r2.id]);
	});

	it("does not audit a conflict an earlier sync already resolved", async () => {
		await put(a, X, r2);
		await a.sync.push();
		await put(b, X, r2Later);

		await b.sync.pull();
		const again = await b.sync.pull();

		expect(again).toEqual({ fetched: 1, updated: 0, superseded: 0, corrupt: [] });
		expect(await b.audit.read()).toHaveLength(1);
	});

	it("restores local notes when applying a pull fails", async () => {
		await put(a, X, r1);
		await put(a, Y, r2);
		await a.sync.push();
		await put(b, X, r3);
		const before = await b.host.resolveRef(REF);
		b.host.failNext("writeNote");

		const failure = b.sync.pull();

		await expect(failure).rejects.toBeInstanceOf(SyncError);
		await expect(failure).rejects.toMatchObject({ code: "PULL_FAILED", rolledBack: true });
		expect(await b.host.resolveRef(REF)).toBe(before);
		expect((await b.notes.read(X))?.receipts.map((r) => r.sessionId)).toEqual(["S3"]);
		expect(await b.notes.read(Y)).toBeNull();
		expect(await b.host.resolveRef(b.sync.scratchRef)).toBeNull();
	});

	it("audits nothing when applying a pull fails", async () => {
		await put(a, X, r1, r2);
		await a.sync.push();
		await put(b, X, r2Later, r3);
		b.host.failNext("writeNote");

		await expect(b.sync.pull()).rejects.toMatchObject({ code: "PULL_FAILED", rolledBack: true });
		expect(await b.audit.read()).toEqual([]);

		const retried = await b.sync.pull();

		expect(retried).toEqual({ fetched: 1, updated: 1, superseded: 1, corrupt: [] });
		expect((await b.audit.read()).map((entry) => entry.receiptId)).toEqual([r2.id]);
	});

	it("retries a push that fails in transit", async () => {
		await put(a, X, r1);
		a.host.failNext("pushNotes", 1);

		const pushed = await a.sync.push();

		expect(pushed.attempts).toBe(2);
		expect(await remote.resolveRef(REF)).toBe(await a.host.resolveRef(REF));
	});

	it("gives up after the retry budget and keeps local notes", async () => {
		await put(a, X, r1);
		const before = await a.host.resolveRef(REF);
		a.host.failNext("pushNotes", 5);

		await expect(a.sync.push()).rejects.toMatchObject({ name: "SyncError", code: "PUSH_FAILED", rolledBack: true });
		expect(await a.host.resolveRef(REF)).toBe(before);
		expect(await remote.resolveRef(REF)).toBeNull();
	});

	it("reports remote notes that are not records", async () => {
		await put(a, X, r1);
		await a.host.writeNote(REF, Y, "garbage");
		await a.sync.push();

		const pulled = await b.sync.pull();

		expect(pulled.fetched).toBe(1);
		expect(pulled.corrupt).toEqual([Y]);
		expect((await b.notes.read(X))?.receipts).toEqual([r1]);
	});

	it("reports remote receipts that are missing required fields", async () => {
		await put(a, X, r1);
		await a.host.writeNote(REF, Y, '{"receipts":[{"id":"abc"}]}');
		await a.sync.push();

		const pulled = await b.sync.pull();

		expect(pulled).toEqual({ fetched: 1, updated: 1, superseded: 0, corrupt: [Y] });
		const local = await b.notes.readAll();
		expect(local.records.map((record) => record.commit)).toEqual([X]);
		expect(local.corrupt).toEqual([Y]);
	});
});
