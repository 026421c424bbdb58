import ow from "ow";
import type { Receipt } from "../types/receipt.js";
import { isoTimestamp } from "../utils/validation.js";

const count = ow.number.integer.greaterThanOrEqual(0);
const lineRange = ow.array.length(2).ofType(ow.number.integer.positive);
const orphanReason = ow.string.oneOf(["content-removed", "file-removed", "blob-missing", "unresolvable"]);

const fileChangeShape = ow.object.partialShape({
	path: ow.string.nonEmpty,
	blob: ow.string.nonEmpty,
	range: lineRange,
	added: count,
	removed: count,
	remap: ow.optional.object.partialShape({
		fromCommit: ow.string.nonEmpty,
		fromBlob: ow.string.nonEmpty,
		fromPath: ow.string.nonEmpty,
		originalRange: lineRange,
		clipped: ow.boolean,
		survivingLines: count,
		totalLines: count,
	}),
	orphaned: ow.optional.object.partialShape({
		reason: orphanReason,
		lastRange: lineRange,
		lastBlob: ow.string.nonEmpty,
	}),
});

const receiptShape = ow.object.partialShape({
	id: ow.string.nonEmpty,
	provider: ow.string,
	model: ow.string,
	author: ow.string,
	sessionId: ow.string.nonEmpty,
	parentSessionId: ow.optional.string,
	parentReceiptId: ow.optional.string,
	startedAt: isoTimestamp,
	endedAt: ow.optional.string.validate((value) => ({
		validator: !Number.isNaN(Date.parse(value)),
		message: (label) => `Expected ${label} to be an ISO timestamp, got \`${value}\``,
	})),
	promptHash: ow.string.nonEmpty,
	promptSummary: ow.string,
	responseSummary: ow.optional.string,
	conversation: ow.optional.array.ofType(
		ow.object.partialShape({
			role: ow.string.oneOf(["user", "assistant", "tool"]),
			content: ow.string,
			toolName: ow.optional.string,
		}),
	),
	costUsd: ow.number.finite.greaterThanOrEqual(0),
	tokens: ow.object.partialShape({ input: count, output: count, cacheRead: count, cacheWrite: count }),
	tools: ow.array.ofType(ow.string),
	services: ow.array.ofType(ow.string),
	subSessions: ow.array.ofType(ow.string),
	fileChanges: ow.array.ofType(fileChangeShape),
	capturedAt: isoTimestamp,
	revision: count,
	orphaned: ow.optional.object.partialShape({
		reason: orphanReason,
		atCommit: ow.string.nonEmpty,
	}),
});

/**
 * Full structural check of a receipt read from outside this process
 */
export function isReceipt(value: unknown): value is Receipt {
	return ow.isValid(value, receiptShape);
}
