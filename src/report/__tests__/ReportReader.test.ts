import { describe, expect, it } from "vitest";
import { MemoryGitHost } from "../../git/MemoryGitHost.js";
import { NotesStore } from "../../notes/NotesStore.js";
import { createReceipt } from "../../receipt/ReceiptFactory.js";
import { emptyRecord } from "../../receipt/ReceiptMerge.js";
import type { FileChange, Receipt } from "../../types/receipt.js";
import { createLogger } from "../../utils/logger.js";
import { percentage, ReportReader } from "../ReportReader.js";

const logger = createLogger({ level: "silent" });
const REF = "refs/notes/prompt-receipts";
const X = "1".repeat(40);
const Y = "2".repeat(40);

function change(filePath: string, blob = "b".repeat(40), range: [number, number] = [1, 1]): FileChange {
	return { path: filePath, blob, range, added: range[1] - range[0] + 1, removed: 0 };
}

function receipt(sessionId: string, author: string, startedAt: string, ...fileChanges: FileChange[]): Receipt {
	return createReceipt({ sessionId, author, startedAt, promptHash: `sha256:${sessionId}`, fileChanges, model: "m1" });
}

describe("percentage", () => {
	it("rounds to two decimals", () => {
		expect(percentage(5, 12)).toBe(41.67);
		expect(percentage(1, 3)).toBe(33.33);
		expect(percentage(0, 0)).toBe(0);
	});
});

describe("ReportReader.records", () => {
	const alice = receipt("S1", "Alice <alice@example.com>", "2024-05-01T09:00:00.000Z", change("src/a.ts"));
	const bob = receipt("S2", "Bob <bob@example.com>", "2024-05-01T10:00:00.000Z", change("docs/readme.md"));
	const moved = receipt("S3", "Alice <alice@example.com>", "2024-05-01T08:00:00.000Z", change("src/b.ts"));

	async function reader(): Promise<ReportReader> {
		const host = new MemoryGitHost();
		const notes = new NotesStore(host, REF);
		await notes.write({ ...emptyRecord(X), receipts: [bob, alice] });
		await notes.write({ ...emptyRecord(Y), receipts: [moved], supersededBy: [X] });
		return new ReportReader(host, notes, { logger });
	}

	it("lists receipts in start order and leaves out superseded records", async () => {
		const entries = await (await reader()).records();

		expect(entries).toEqual([
			{ commit: X, receipt: alice },
			{ commit: X, receipt: bob },
		]);
	});

	it("includes superseded records on request", async () => {
		const entries = await (await reader()).records({ includeSuperseded: true });

		expect(entries.map((entry) => entry.receipt.sessionId)).toEqual(["S3", "S1", "S2"]);
	});

	it("filters by author without regard to case", async () => {
		const entries = await (await reader()).records({ author: "ALICE" });

		expect(entries.map((entry) => entry.receipt.sessionId)).toEqual(["S1"]);
	});

	it("filters by file path or glob", async () => {
		const read = await reader();

		expect((await read.records({ file: "src/**" })).map((e) => e.receipt.sessionId)).toEqual(["S1"]);
		expect((await read.records({ file: "docs/readme.md" })).map((e) => e.receipt.sessionId)).toEqual(["S2"]);
	});

	it("filters by start time", async () => {
		const read = await reader();

		expect((await read.records({ since: "2024-05-01T09:30:00.000Z" })).map((e) => e.receipt.sessionId)).toEqual([
			"S2",
		]);
		expect((await read.records({ until: new Date("2024-05-01T09:30:00.000Z") })).map((e) => e.receipt.sessionId)).toEqual(
			["S1"],
		);
	});
});

describe("ReportReader.blame", () => {
	async function setup(): Promise<{ host: MemoryGitHost; notes: NotesStore; first: string; read: ReportReader }> {
		const host = new MemoryGitHost();
		const notes = new NotesStore(host, REF);
		const first = host.commit({ files: { "src/a.ts": "a\nb\nc\nd\n" } });
		const blob = await host.blobAt(first, "src/a.ts");
		if (blob === null) {
			throw new Error("src/a.ts missing");
		}
		await notes.write({
			...emptyRecord(first),
			receipts: [receipt("S1", "Alice", "2024-05-01T09:00:00.000Z", change("src/a.ts", blob, [2, 3]))],
		});
		return { host, notes, first, read: new ReportReader(host, notes, { logger }) };
	}

	it("attributes the lines a receipt produced", async () => {
		const { first, read } = await setup();

		const view = await read.blame(first, "src/a.ts");

		expect(view).toMatchObject({ totalLines: 4, aiLines: 2, aiPercent: 50 });
		expect(view?.lines.map((line) => (line.attribution === "human" ? "human" : line.attribution.sessionId))).toEqual([
			"human",
			"S1",
			"S1",
			"human",
		]);
	});

	it("follows lines through a later commit without notes", async () => {
		const { host, first, read } = await setup();
		const second = host.commit({ files: { "src/a.ts": "x\na\nb\nc\nd\n" } });

		const view = await read.blame(second, "src/a.ts");

		expect(view).toMatchObject({ totalLines: 5, aiLines: 2, aiPercent: 40 });
		expect(view?.lines[2]).toEqual({
			line: 3,
			attribution: { receiptId: expect.any(String), sessionId: "S1", model: "m1", commit: first },
		});
	});

	it("ignores receipts in custody", async () => {
		const { host, notes, read } = await setup();
		const second = host.commit({ files: { "src/a.ts": "a\nb\nc\nd\ne\n" } });
		const blob = await host.blobAt(second, "src/a.ts");
		if (blob === null) {
			throw new Error("src/a.ts missing");
		}
		const custody: Receipt = {
			...receipt("S2", "Bob", "2024-05-01T10:00:00.000Z", change("src/a.ts", blob, [5, 5])),
			orphaned: { reason: "unresolvable", atCommit: "3".repeat(40) },
		};
		await notes.write({ ...emptyRecord(second), receipts: [custody] });

		const view = await read.blame(second, "src/a.ts");

		expect(view?.aiLines).toBe(2);
		expect(view?.lines[4]).toEqual({ line: 5, attribution: "human" });
	});

	it("returns null for a file missing at the revision", async () => {
		const { first, read } = await setup();

		expect(await read.blame(first, "src/missing.ts")).toBeNull();
	});
});
