import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { defaultConfig } from "../../config.js";
import type { CaptureConfig } from "../../config/types.js";
import { MemoryGitHost } from "../../git/MemoryGitHost.js";
import { hashPrompt } from "../../privacy/hasher.js";
import { RedactionPipeline } from "../../privacy/RedactionPipeline.js";
import { StagingStore } from "../../storage/StagingStore.js";
import type { Receipt } from "../../types/receipt.js";
import { createLogger } from "../../utils/logger.js";
import { CaptureQueue, countDiffLines, validateEvent } from "../CaptureQueue.js";

const logger = createLogger({ level: "silent" });
const AT = "2024-05-01T09:00:00.000Z";

describe("validateEvent", () => {
	it("rejects a value that is not an object", () => {
		const warnings: string[] = [];

		expect(validateEvent("prompt", warnings)).toBeNull();
		expect(warnings).toEqual(["event must be an object"]);
	});

	it("rejects an event without a session", () => {
		const warnings: string[] = [];

		expect(validateEvent({ kind: "prompt", timestamp: AT, promptText: "hi" }, warnings)).toBeNull();
		expect(warnings).toEqual(["event needs sessionId and timestamp"]);
	});

	it("rejects an unknown kind", () => {
		const warnings: string[] = [];

		expect(validateEvent({ kind: "resume", sessionId: "S1", timestamp: AT }, warnings)).toBeNull();
		expect(warnings).toEqual(["unknown event kind: resume"]);
	});

	it("drops an invalid optional field and keeps the event", () => {
		const warnings: string[] = [];

		const event = validateEvent(
			{ kind: "prompt", sessionId: "S1", timestamp: AT, promptText: "hi", model: "m1", costUsd: -1 },
			warnings,
		);

		expect(event).toMatchObject({ kind: "prompt", sessionId: "S1", promptText: "hi", model: "m1" });
		expect(event).not.toHaveProperty("costUsd", -1);
		expect(warnings).toHaveLength(1);
		expect(warnings[0]).toContain("costUsd");
	});

	it("turns a bad line range into no file change", () => {
		const warnings: string[] = [];

		const event = validateEvent(
			{ kind: "tool", sessionId: "S1", timestamp: AT, toolName: "Edit", filePath: "src/a.ts", lineRange: [5, 2] },
			warnings,
		);

		expect(event).toMatchObject({ kind: "tool", lineRange: [0, 0] });
		expect(warnings).toEqual(["lineRange must be [start, end] with 1 <= start <= end; file change dropped"]);
	});
});

describe("countDiffLines", () => {
	it("counts changed lines and skips the file headers", () => {
		expect(countDiffLines("--- a/src/a.ts\n+++ b/src/a.ts\n@@ -1,2 +1,3 @@\n ctx\n-old\n+new\n+more")).toEqual({
			added: 2,
			removed: 1,
		});
	});
});

describe("CaptureQueue", () => {
	let dir: string;
	let host: MemoryGitHost;
	let staging: StagingStore;

	function queue(capture: Partial<CaptureConfig> = {}): CaptureQueue {
		return new CaptureQueue(
			host,
			staging,
			new RedactionPipeline(defaultConfig.redaction, { logger }),
			{ ...defaultConfig.capture, ...capture },
			{ logger },
		);
	}

	async function stagedReceipts(): Promise<Receipt[]> {
		return (await staging.list()).map((entry) => entry.receipt);
	}

	beforeEach(async () => {
		dir = await mkdtemp(path.join(os.tmpdir(), "receipts-capture-"));
		host = new MemoryGitHost("/repo");
		staging = new StagingStore(dir, { logger });
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("redacts the prompt summary but hashes the original text", async () => {
		const result = await queue().enqueue({
			kind: "prompt",
			sessionId: "S1",
			timestamp: AT,
			promptText: "password: hunter2",
			model: "m1",
		});

		expect(result).toMatchObject({ kind: "prompt", redactions: 1, warnings: [] });
		const [receipt] = await stagedReceipts();
		expect(receipt.id).toBe(result.receiptId);
		expect(receipt.promptSummary).toBe("password: [REDACTED_PASSWORD]");
		expect(receipt.promptHash).toBe(hashPrompt("password: hunter2"));
		expect(receipt.author).toBe("Test Author <author@example.com>");
	});

	it("truncates a long prompt with a warning", async () => {
		const result = await queue({ maxPromptLength: 20 }).enqueue({
			kind: "prompt",
			sessionId: "S1",
			timestamp: AT,
			promptText: "one two three four five six seven",
			model: "m1",
		});

		expect(result.warnings).toEqual(["promptText truncated to 20 characters"]);
		expect((await stagedReceipts())[0].promptSummary).toBe("one two three four f");
	});

	it("follows a session from prompt through edit to stop", async () => {
		const capture = queue();
		host.writeFile("src/a.ts", "a\nb\n");

		const prompt = await capture.enqueue({
			kind: "prompt",
			sessionId: "S1",
			timestamp: AT,
			promptText: "add b",
			model: "m1",
		});
		const tool = await capture.enqueue({
			kind: "tool",
			sessionId: "S1",
			timestamp: "2024-05-01T09:01:00.000Z",
			toolName: "Edit",
			filePath: "/repo/src/a.ts",
			lineRange: [2, 2],
			diff: "--- a/src/a.ts\n+++ b/src/a.ts\n+b",
		});
		const stop = await capture.enqueue({
			kind: "stop",
			sessionId: "S1",
			timestamp: "2024-05-01T09:05:00.000Z",
			responseText: "added b",
			tokenUsage: { input: 10, output: 5 },
			costUsd: 0.25,
		});

		expect(tool.receiptId).toBe(prompt.receiptId);
		expect(stop.receiptId).toBe(prompt.receiptId);
		const receipts = await stagedReceipts();
		expect(receipts).toHaveLength(1);
		expect(receipts[0]).toMatchObject({
			endedAt: "2024-05-01T09:05:00.000Z",
			responseSummary: "added b",
			tokens: { input: 10, output: 5, cacheRead: 0, cacheWrite: 0 },
			costUsd: 0.25,
			tools: ["Edit"],
			fileChanges: [{ path: "src/a.ts", blob: await host.hashFile("src/a.ts"), range: [2, 2], added: 1, removed: 0 }],
		});
	});

	it("processes events in the order they were queued", async () => {
		const capture = queue();
		host.writeFile("src/a.ts", "a\n");

		const [prompt, tool] = await Promise.all([
			capture.enqueue({ kind: "prompt", sessionId: "S1", timestamp: AT, promptText: "go", model: "m1" }),
			capture.enqueue({
				kind: "tool",
				sessionId: "S1",
				timestamp: AT,
				toolName: "Write",
				filePath: "src/a.ts",
				lineRange: [1, 1],
			}),
		]);

		expect(tool.receiptId).toBe(prompt.receiptId);
		expect(tool.warnings).toEqual([]);
	});

	it("stages an edit without a prompt on its own receipt", async () => {
		host.writeFile("src/a.ts", "a\nb\n");

		const result = await queue().enqueue({
			kind: "tool",
			sessionId: "S1",
			timestamp: AT,
			toolName: "Edit",
			filePath: "src/a.ts",
			lineRange: [1, 2],
		});

		expect(result.warnings).toEqual(["tool event without a prior prompt; receipt created without prompt text"]);
		const [receipt] = await stagedReceipts();
		expect(receipt.promptHash).toBe(hashPrompt(""));
		expect(receipt.fileChanges).toEqual([
			{ path: "src/a.ts", blob: await host.hashFile("src/a.ts"), range: [1, 2], added: 2, removed: 0 },
		]);
	});

	it("clamps a line range to the length of the file", async () => {
		host.writeFile("src/a.ts", "a\nb\nc\n");

		const result = await queue().enqueue({
			kind: "tool",
			sessionId: "S1",
			timestamp: AT,
			toolName: "Edit",
			filePath: "src/a.ts",
			lineRange: [1, 40_000_000],
		});

		expect(result.warnings).toEqual([
			"lineRange [1, 40000000] clamped to [1, 3] (src/a.ts has 3 lines)",
			"tool event without a prior prompt; receipt created without prompt text",
		]);
		expect((await stagedReceipts())[0].fileChanges).toEqual([
			{ path: "src/a.ts", blob: await host.hashFile("src/a.ts"), range: [1, 3], added: 3, removed: 0 },
		]);
	});

	it("drops a line range that starts past the end of the file", async () => {
		host.writeFile("src/a.ts", "a\nb\nc\n");

		const result = await queue().enqueue({
			kind: "tool",
			sessionId: "S1",
			timestamp: AT,
			toolName: "Edit",
			filePath: "src/a.ts",
			lineRange: [5, 6],
		});

		expect(result.warnings).toContain("lineRange [5, 6] starts past the end of src/a.ts (3 lines); file change dropped");
		expect((await stagedReceipts())[0].fileChanges).toEqual([]);
	});

	it("drops a file change outside the repository", async () => {
		const capture = queue();
		await capture.enqueue({ kind: "prompt", sessionId: "S1", timestamp: AT, promptText: "go", model: "m1" });

		const result = await capture.enqueue({
			kind: "tool",
			sessionId: "S1",
			timestamp: AT,
			toolName: "Edit",
			filePath: "/etc/hosts",
			lineRange: [1, 1],
		});

		expect(result.warnings).toEqual(["filePath outside the repository: /etc/hosts; file change dropped"]);
		expect((await stagedReceipts())[0]).toMatchObject({ tools: ["Edit"], fileChanges: [] });
	});

	it("warns on a stop with nothing staged", async () => {
		const result = await queue().enqueue({ kind: "stop", sessionId: "S9", timestamp: AT });

		expect(result).toEqual({ kind: "stop", receiptId: null, redactions: 0, warnings: ["no staged receipt for session S9"] });
	});

	it("links a sub-session to its parent", async () => {
		const capture = queue();
		const parent = await capture.enqueue({
			kind: "prompt",
			sessionId: "S1",
			timestamp: AT,
			promptText: "plan",
			model: "m1",
		});

		await capture.enqueue({
			kind: "prompt",
			sessionId: "S2",
			timestamp: "2024-05-01T09:02:00.000Z",
			promptText: "subtask",
			model: "m1",
			parentSessionId: "S1",
		});

		const [first, second] = await stagedReceipts();
		expect(first.subSessions).toEqual(["S2"]);
		expect(second.parentSessionId).toBe("S1");
		expect(second.parentReceiptId).toBe(parent.receiptId);
	});

	it("reports an invalid event without staging anything", async () => {
		const result = await queue().enqueue({ kind: "prompt" });

		expect(result).toEqual({
			kind: "invalid",
			receiptId: null,
			redactions: 0,
			warnings: ["event needs sessionId and timestamp"],
		});
		expect(await stagedReceipts()).toEqual([]);
	});

	it("quarantines a corrupt staging file and captures on a clean one", async () => {
		await writeFile(staging.path, "{ not json");

		const result = await queue().enqueue({
			kind: "prompt",
			sessionId: "S1",
			timestamp: AT,
			promptText: "go",
			model: "m1",
		});

		expect(result.error).toBeUndefined();
		expect(result.warnings).toHaveLength(1);
		expect(result.warnings[0]).toMatch(/^staging file was unreadable and moved to .*staging\.json\.corrupt-\d+; staged receipts lost$/);
		expect(await stagedReceipts()).toHaveLength(1);
	});
});
