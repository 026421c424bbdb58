import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MemoryGitHost } from "../../git/MemoryGitHost.js";
import { createReceipt } from "../../receipt/ReceiptFactory.js";
import { StagingStore } from "../../storage/StagingStore.js";
import type { FileChange, StagingEntry } from "../../types/receipt.js";
import { createLogger } from "../../utils/logger.js";
import { CommitNoteWriter, selectForCommit, WORKTREE } from "../CommitNoteWriter.js";
import { NotesStore } from "../NotesStore.js";

const logger = createLogger({ level: "silent" });
const REF = "refs/notes/prompt-receipts";

function staged(fileChanges: FileChange[], endedAt?: string): StagingEntry {
	return {
		receipt: createReceipt(
			{ sessionId: "S1", startedAt: "2024-05-01T09:00:00.000Z", promptHash: "sha256:test", fileChanges, endedAt },
			"2024-05-01T09:00:00.000Z",
		),
		stagedAt: "2024-05-01T09:00:00.000Z",
	};
}

function change(filePath: string): FileChange {
	return { path: filePath, blob: "b".repeat(40), range: [1, 1], added: 1, removed: 0 };
}

describe("selectForCommit", () => {
	const changed = new Set(["src/a.ts"]);

	it("takes a receipt whose files all changed", () => {
		expect(selectForCommit(staged([change("src/a.ts")]), changed)).toBe(true);
	});

	it("keeps a receipt whose files did not change", () => {
		expect(selectForCommit(staged([change("src/b.ts")]), changed)).toBe(false);
	});

	it("splits a receipt across changed and unchanged files", () => {
		const decision = selectForCommit(staged([change("src/a.ts"), change("src/b.ts")]), changed);

		expect(typeof decision).toBe("object");
		if (typeof decision === "object") {
			expect(decision.take.receipt.fileChanges.map((c) => c.path)).toEqual(["src/a.ts"]);
			expect(decision.keep?.receipt.fileChanges.map((c) => c.path)).toEqual(["src/b.ts"]);
		}
	});

	it("takes a finished receipt without file changes", () => {
		expect(selectForCommit(staged([], "2024-05-01T09:05:00.000Z"), changed)).toBe(true);
		expect(selectForCommit(staged([]), changed)).toBe(false);
	});
});

describe("CommitNoteWriter", () => {
	let dir: string;
	let host: MemoryGitHost;
	let staging: StagingStore;
	let notes: NotesStore;
	let writer: CommitNoteWriter;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), "receipts-writer-"));
		host = new MemoryGitHost();
		host.commit({ files: { "README.md": "readme\n" } });
		staging = new StagingStore(dir, { logger });
		notes = new NotesStore(host, REF);
		writer = new CommitNoteWriter(host, staging, notes, { logger });
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	async function stageEdit(content: string, range: [number, number]): Promise<StagingEntry> {
		host.writeFile("src/a.ts", content);
		const blob = await host.hashFile("src/a.ts", true);
		if (blob === null) {
			throw new Error("src/a.ts missing");
		}
		const entry = staged([{ path: "src/a.ts", blob, range, added: range[1] - range[0] + 1, removed: 0 }]);
		await staging.append(entry);
		return entry;
	}

	it("rebases a range edited again before the commit", async () => {
		await stageEdit("a\nb\nc\n", [2, 3]);
		host.writeFile("src/a.ts", "header\na\nb\nc\n");
		const commit = host.commit();

		const result = await writer.writeForCommit(commit);

		expect(result.attached).toBe(1);
		const [rebased] = (await notes.read(commit))?.receipts[0].fileChanges ?? [];
		expect(rebased.range).toEqual([3, 4]);
		expect(rebased.blob).toBe(await host.blobAt(commit, "src/a.ts"));
		expect(rebased.remap?.fromCommit).toBe(WORKTREE);
	});

	it("keeps the range untouched when the committed file matches the capture", async () => {
		const entry = await stageEdit("a\nb\nc\n", [1, 2]);
		const commit = host.commit();

		await writer.writeForCommit(commit);

		expect((await notes.read(commit))?.receipts).toEqual([entry.receipt]);
	});

	it("returns drained receipts to staging when the note cannot be written", async () => {
		const entry = await stageEdit("a\n", [1, 1]);
		const commit = host.commit();
		host.failNext("writeNote");

		const result = await writer.writeForCommit(commit);

		expect(result.attached).toBe(0);
		expect(result.errors).toEqual(["Injected failure: writeNote"]);
		expect(await staging.list()).toEqual([entry]);
		expect(await notes.read(commit)).toBeNull();
	});

	it("merges with a record already on the commit", async () => {
		await stageEdit("a\n", [1, 1]);
		const commit = host.commit();
		await writer.writeForCommit(commit);

		const second = staged([]);
		const other: StagingEntry = {
			...second,
			receipt: { ...second.receipt, id: "f".repeat(32), endedAt: "2024-05-01T09:30:00.000Z" },
		};
		await staging.append(other);
		await writer.writeForCommit(commit);

		expect((await notes.read(commit))?.receipts).toHaveLength(2);
	});
});
