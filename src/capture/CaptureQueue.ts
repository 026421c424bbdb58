/**
 * CaptureQueue - Single consumer of normalized capture events
 *
 * Design Principles:
 * - One event at a time per working copy; the staging store is the only
 *   shared state, and it is lock-guarded across processes
 * - Redaction happens here, before anything reaches staging
 * - Malformed fields are dropped with a warning; the rest of the event is kept
 * - A corrupt staging file is quarantined and the event retried once on a
 *   clean store
 */

import ow from "ow";
import type { CaptureConfig } from "../config/types.js";
import type { GitHost } from "../git/GitHost.js";
import { hashPrompt } from "../privacy/hasher.js";
import type { RedactionPipeline } from "../privacy/RedactionPipeline.js";
import { createReceipt, mergeFileChanges, normalizeReceipt } from "../receipt/ReceiptFactory.js";
import { splitLines } from "../remap/LineAligner.js";
import type { StagingStore } from "../storage/StagingStore.js";
import { CorruptedDataError } from "../storage/StorageErrors.js";
import type { CaptureEvent, PromptEvent, StopEvent, ToolEvent } from "../types/events.js";
import type { ConversationTurn, FileChange, LineRange, Receipt, TokenUsage } from "../types/receipt.js";
import { errorMessage, toError } from "../utils/errorHelpers.js";
import { logger as defaultLogger, type Logger } from "../utils/logger.js";
import { toRepoRelative } from "../utils/PathNormalizer.js";
import { field, isoTimestamp, isRecord } from "../utils/validation.js";

export interface CaptureResult {
	kind: CaptureEvent["kind"] | "invalid";
	/** Receipt created or updated, null when nothing was staged */
	receiptId: string | null;
	/** Secrets replaced while processing the event */
	redactions: number;
	warnings: string[];
	error?: string;
}

export interface CaptureQueueOptions {
	logger?: Logger;
}

const tokenUsageShape = ow.object.partialShape({
	input: ow.optional.number.integer.greaterThanOrEqual(0),
	output: ow.optional.number.integer.greaterThanOrEqual(0),
	cacheRead: ow.optional.number.integer.greaterThanOrEqual(0),
	cacheWrite: ow.optional.number.integer.greaterThanOrEqual(0),
});

const turnShape = ow.object.partialShape({
	role: ow.string.oneOf(["user", "assistant", "tool"]),
	content: ow.string,
	toolName: ow.optional.string,
});

function isLineRange(value: unknown): value is LineRange {
	return (
		Array.isArray(value) &&
		value.length === 2 &&
		Number.isInteger(value[0]) &&
		Number.isInteger(value[1]) &&
		value[0] >= 1 &&
		value[1] >= value[0]
	);
}

function isTurnRole(value: string): value is ConversationTurn["role"] {
	return value === "user" || value === "assistant" || value === "tool";
}

/**
 * Check an event from an untrusted producer. Returns null when a required
 * field is missing; optional fields that fail are dropped with a warning.
 */
export function validateEvent(raw: unknown, warnings: string[]): CaptureEvent | null {
	if (!isRecord(raw)) {
		warnings.push("event must be an object");
		return null;
	}

	const sessionId = field(raw.sessionId, "sessionId", ow.string.nonEmpty, warnings);
	const timestamp = field(raw.timestamp, "timestamp", isoTimestamp, warnings);
	if (sessionId === undefined || timestamp === undefined) {
		if (raw.sessionId === undefined || raw.timestamp === undefined) {
			warnings.push("event needs sessionId and timestamp");
		}
		return null;
	}

	const tokens = field(raw.tokenUsage, "tokenUsage", tokenUsageShape, warnings);
	const tokenUsage: Partial<TokenUsage> | undefined = tokens && {
		input: tokens.input,
		output: tokens.output,
		cacheRead: tokens.cacheRead,
		cacheWrite: tokens.cacheWrite,
	};
	const costUsd = field(raw.costUsd, "costUsd", ow.number.finite.greaterThanOrEqual(0), warnings);

	switch (raw.kind) {
		case "prompt": {
			const promptText = field(raw.promptText, "promptText", ow.string, warnings);
			if (promptText === undefined) {
				warnings.push("prompt event without promptText; stored empty");
			}
			const turns = field(raw.conversation, "conversation", ow.array.ofType(turnShape), warnings);
			const conversation = turns?.flatMap((turn): ConversationTurn[] =>
				isTurnRole(turn.role) ? [{ role: turn.role, content: turn.content, toolName: turn.toolName }] : [],
			);
			return {
				kind: "prompt",
				sessionId,
				timestamp,
				promptText: promptText ?? "",
				model: field(raw.model, "model", ow.string.nonEmpty, warnings) ?? "unknown",
				provider: field(raw.provider, "provider", ow.string.nonEmpty, warnings),
				tokenUsage,
				costUsd,
				parentSessionId: field(raw.parentSessionId, "parentSessionId", ow.string.nonEmpty, warnings),
				responseText: field(raw.responseText, "responseText", ow.string, warnings),
				services: field(raw.services, "services", ow.array.ofType(ow.string.nonEmpty), warnings),
				conversation,
			};
		}
		case "tool": {
			const lineRange = isLineRange(raw.lineRange) ? raw.lineRange : undefined;
			if (raw.lineRange !== undefined && !lineRange) {
				warnings.push("lineRange must be [start, end] with 1 <= start <= end; file change dropped");
			}
			return {
				kind: "tool",
				sessionId,
				timestamp,
				toolName: field(raw.toolName, "toolName", ow.string.nonEmpty, warnings) ?? "unknown",
				filePath: field(raw.filePath, "filePath", ow.string.nonEmpty, warnings) ?? "",
				lineRange: lineRange ?? [0, 0],
				diff: field(raw.diff, "diff", ow.string, warnings),
				added: field(raw.added, "added", ow.number.integer.greaterThanOrEqual(0), warnings),
				removed: field(raw.removed, "removed", ow.number.integer.greaterThanOrEqual(0), warnings),
			};
		}
		case "stop":
			return {
				kind: "stop",
				sessionId,
				timestamp,
				responseText: field(raw.responseText, "responseText", ow.string, warnings),
				tokenUsage,
				costUsd,
				subSessions: field(raw.subSessions, "subSessions", ow.array.ofType(ow.string.nonEmpty), warnings),
			};
		default:
			warnings.push(`unknown event kind: ${String(raw.kind)}`);
			return null;
	}
}

/**
 * Added and removed line counts of a unified diff
 */
export function countDiffLines(diff: string): { added: number; removed: number } {
	let added = 0;
	let removed = 0;
	for (const line of diff.split("\n")) {
		if (line.startsWith("+++") || line.startsWith("---")) {
			continue;
		}
		if (line.startsWith("+")) {
			added++;
		} else if (line.startsWith("-")) {
			removed++;
		}
	}
	return { added, removed };
}

function mergeTokenUsage(base: TokenUsage, update: Partial<TokenUsage> | undefined): TokenUsage {
	return {
		input: update?.input ?? base.input,
		output: update?.output ?? base.output,
		cacheRead: update?.cacheRead ?? base.cacheRead,
		cacheWrite: update?.cacheWrite ?? base.cacheWrite,
	};
}

export class CaptureQueue {
	private tail: Promise<unknown> = Promise.resolve();
	private readonly log: Logger;

	constructor(
		private readonly host: GitHost,
		private readonly staging: StagingStore,
		private readonly redaction: RedactionPipeline,
		private readonly config: CaptureConfig,
		options: CaptureQueueOptions = {},
	) {
		this.log = options.logger ?? defaultLogger;
	}

	/**
	 * Queue an event. Resolves once it and every event before it are processed;
	 * never rejects.
	 */
	enqueue(raw: unknown): Promise<CaptureResult> {
		const next = this.tail.then(() => this.process(raw));
		this.tail = next;
		return next;
	}

	/**
	 * Resolves when the queue is empty
	 */
	async idle(): Promise<void> {
		await this.tail;
	}

	private async process(raw: unknown): Promise<CaptureResult> {
		const warnings: string[] = [];
		const event = validateEvent(raw, warnings);
		if (!event) {
			this.log.warn({ warnings }, "capture event dropped");
			return { kind: "invalid", receiptId: null, redactions: 0, warnings };
		}

		const result: CaptureResult = { kind: event.kind, receiptId: null, redactions: 0, warnings };
		try {
			await this.dispatch(event, result);
		} catch (error) {
			if (!(error instanceof CorruptedDataError)) {
				return this.fail(result, error);
			}
			const quarantined = await this.staging.quarantine();
			result.warnings.push(`staging file was unreadable and moved to ${quarantined ?? "nowhere"}; staged receipts lost`);
			try {
				await this.dispatch(event, result);
			} catch (retryError) {
				return this.fail(result, retryError);
			}
		}

		if (warnings.length > 0) {
			this.log.warn({ sessionId: event.sessionId, kind: event.kind, warnings }, "capture event partially dropped");
		}
		return result;
	}

	private fail(result: CaptureResult, error: unknown): CaptureResult {
		this.log.error({ err: toError(error), kind: result.kind }, "capture failed");
		return { ...result, error: errorMessage(error) };
	}

	private async dispatch(event: CaptureEvent, result: CaptureResult): Promise<void> {
		switch (event.kind) {
			case "prompt":
				await this.onPrompt(event, result);
				break;
			case "tool":
				await this.onTool(event, result);
				break;
			case "stop":
				await this.onStop(event, result);
				break;
		}
	}

	/**
	 * Redact, then cut to the configured length
	 */
	private sanitize(text: string, label: string, result: CaptureResult): string {
		const redacted = this.redaction.redact(text);
		result.redactions += redacted.total;
		for (const warning of redacted.warnings) {
			if (!result.warnings.includes(warning)) {
				result.warnings.push(warning);
			}
		}
		if (redacted.text.length <= this.config.maxPromptLength) {
			return redacted.text;
		}
		result.warnings.push(`${label} truncated to ${this.config.maxPromptLength} characters`);
		return redacted.text.slice(0, this.config.maxPromptLength);
	}

	private async onPrompt(event: PromptEvent, result: CaptureResult): Promise<void> {
		const staged = await this.staging.list();
		const previous = [...staged].reverse().find((entry) => entry.receipt.sessionId === event.sessionId);
		const parent =
			previous ??
			(event.parentSessionId === undefined
				? undefined
				: [...staged].reverse().find((entry) => entry.receipt.sessionId === event.parentSessionId));

		let conversation: ConversationTurn[] | undefined;
		if (this.config.storeFullConversation && event.conversation) {
			const redacted = this.redaction.redactTurns(event.conversation);
			result.redactions += redacted.total;
			conversation = redacted.turns;
		}

		const receipt = createReceipt({
			sessionId: event.sessionId,
			parentSessionId: event.parentSessionId,
			parentReceiptId: parent?.receipt.id,
			provider: event.provider ?? "unknown",
			model: event.model,
			author: await this.host.author(),
			startedAt: event.timestamp,
			promptHash: hashPrompt(event.promptText),
			promptSummary: this.sanitize(event.promptText, "promptText", result),
			responseSummary:
				event.responseText === undefined ? undefined : this.sanitize(event.responseText, "responseText", result),
			conversation,
			costUsd: event.costUsd ?? 0,
			tokens: mergeTokenUsage({ input: 0, output: 0, cacheRead: 0, cacheWrite: 0 }, event.tokenUsage),
			services: event.services ?? [],
		});

		await this.staging.append({ receipt, stagedAt: new Date().toISOString() });
		result.receiptId = receipt.id;

		if (event.parentSessionId !== undefined && event.parentSessionId !== event.sessionId) {
			await this.staging.update(event.parentSessionId, (parentReceipt) =>
				normalizeReceipt({ ...parentReceipt, subSessions: [...parentReceipt.subSessions, event.sessionId] }),
			);
		}
	}

	private async onTool(event: ToolEvent, result: CaptureResult): Promise<void> {
		const change = await this.fileChange(event, result);

		const apply = (receipt: Receipt): Receipt =>
			normalizeReceipt({
				...receipt,
				tools: [...receipt.tools, event.toolName],
				fileChanges: change ? mergeFileChanges(receipt.fileChanges, [change]) : receipt.fileChanges,
			});

		const updated = await this.staging.update(event.sessionId, apply);
		if (updated) {
			result.receiptId = updated.id;
			return;
		}

		// no prompt seen for this session: stage a receipt for the edit alone
		result.warnings.push("tool event without a prior prompt; receipt created without prompt text");
		const receipt = apply(
			createReceipt({
				sessionId: event.sessionId,
				author: await this.host.author(),
				startedAt: event.timestamp,
				promptHash: hashPrompt(""),
			}),
		);
		await this.staging.append({ receipt, stagedAt: new Date().toISOString() });
		result.receiptId = receipt.id;
	}

	private async fileChange(event: ToolEvent, result: CaptureResult): Promise<FileChange | null> {
		if (!event.filePath || event.lineRange[0] === 0) {
			return null;
		}
		const relative = toRepoRelative(event.filePath, this.host.root);
		if (relative === null) {
			result.warnings.push(`filePath outside the repository: ${event.filePath}; file change dropped`);
			return null;
		}
		const blob = await this.host.hashFile(relative, true);
		if (blob === null) {
			result.warnings.push(`file not found in working copy: ${relative}; file change dropped`);
			return null;
		}

		const text = await this.host.readBlob(blob);
		if (text === null) {
			result.warnings.push(`stored copy of ${relative} is unreadable; file change dropped`);
			return null;
		}
		const lineCount = splitLines(text).length;
		const [start, end] = event.lineRange;
		if (start > lineCount) {
			result.warnings.push(
				`lineRange [${start}, ${end}] starts past the end of ${relative} (${lineCount} lines); file change dropped`,
			);
			return null;
		}
		const range: LineRange = [start, Math.min(end, lineCount)];
		if (range[1] < end) {
			result.warnings.push(
				`lineRange [${start}, ${end}] clamped to [${start}, ${range[1]}] (${relative} has ${lineCount} lines)`,
			);
		}

		const counted = event.diff === undefined ? undefined : countDiffLines(event.diff);
		const span = range[1] - range[0] + 1;
		return {
			path: relative,
			blob,
			range,
			added: event.added ?? counted?.added ?? span,
			removed: event.removed ?? counted?.removed ?? 0,
		};
	}

	private async onStop(event: StopEvent, result: CaptureResult): Promise<void> {
		const responseSummary =
			event.responseText === undefined ? undefined : this.sanitize(event.responseText, "responseText", result);

		const updated = await this.staging.update(event.sessionId, (receipt) =>
			normalizeReceipt({
				...receipt,
				endedAt: event.timestamp,
				responseSummary: responseSummary ?? receipt.responseSummary,
				tokens: mergeTokenUsage(receipt.tokens, event.tokenUsage),
				costUsd: event.costUsd ?? receipt.costUsd,
				subSessions: [...receipt.subSessions, ...(event.subSessions ?? [])],
			}),
		);

		if (!updated) {
			result.warnings.push(`no staged receipt for session ${event.sessionId}`);
			return;
		}
		result.receiptId = updated.id;
	}
}
