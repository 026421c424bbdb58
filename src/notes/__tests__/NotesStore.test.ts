import { describe, expect, it } from "vitest";
import { MemoryGitHost } from "../../git/MemoryGitHost.js";
import { createReceipt } from "../../receipt/ReceiptFactory.js";
import { emptyRecord } from "../../receipt/ReceiptMerge.js";
import { CorruptedDataError } from "../../storage/StorageErrors.js";
import { NotesStore, parseRecord, serializeRecord } from "../NotesStore.js";

const COMMIT = "a".repeat(40);

const receipt = createReceipt(
	{
		sessionId: "S1",
		startedAt: "2024-05-01T09:00:00.000Z",
		promptHash: "sha256:test",
		fileChanges: [{ path: "src/a.ts", blob: "b".repeat(40), range: [1, 2], added: 2, removed: 0 }],
	},
	"2024-05-01T09:10:00.000Z",
);

describe("parseRecord", () => {
	it("reads back a serialized record", () => {
		const record = { ...emptyRecord(COMMIT), receipts: [receipt] };

		expect(parseRecord(serializeRecord(record), COMMIT)).toEqual(record);
	});

	it("rejects a receipt that only has an id", () => {
		expect(() => parseRecord('{"receipts":[{"id":"abc"}]}', COMMIT)).toThrow(
			new CorruptedDataError(`Note for ${COMMIT} has a malformed receipt at index 0`),
		);
	});

	it("rejects a file change with a backwards line range", () => {
		const bad = { ...receipt, fileChanges: [{ ...receipt.fileChanges[0], range: [0, 2] }] };

		expect(() => parseRecord(JSON.stringify({ receipts: [receipt, bad] }), COMMIT)).toThrow(
			`Note for ${COMMIT} has a malformed receipt at index 1`,
		);
	});

	it("rejects a receipt with an unreadable timestamp", () => {
		const bad = { ...receipt, capturedAt: "yesterday" };

		expect(() => parseRecord(JSON.stringify({ receipts: [bad] }), COMMIT)).toThrow(CorruptedDataError);
	});

	it("rejects a note without receipts", () => {
		expect(() => parseRecord('{"version":1}', COMMIT)).toThrow(`Note for ${COMMIT} is not a commit record`);
	});
});

describe("NotesStore", () => {
	it("skips a malformed note when reading everything", async () => {
		const host = new MemoryGitHost();
		const notes = new NotesStore(host, "refs/notes/prompt-receipts");
		const other = "c".repeat(40);
		await notes.write({ ...emptyRecord(COMMIT), receipts: [receipt] });
		await host.writeNote(notes.ref, other, '{"receipts":[{"id":"abc","costUsd":-1}]}');

		const all = await notes.readAll();

		expect(all.records.map((record) => record.commit)).toEqual([COMMIT]);
		expect(all.corrupt).toEqual([other]);
	});
});
