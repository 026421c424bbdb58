import ow, { type BasePredicate } from "ow";
import { errorMessage } from "./errorHelpers.js";

export const isoTimestamp = ow.string.validate((value) => ({
	validator: !Number.isNaN(Date.parse(value)),
	message: (label) => `Expected ${label} to be an ISO timestamp, got \`${value}\``,
}));

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate one optional field. Returns the value when it passes, undefined
 * when it is absent or invalid; an invalid value's reason goes to `problems`.
 */
export function field<T>(value: unknown, label: string, predicate: BasePredicate<T>, problems: string[]): T | undefined {
	if (value === undefined) {
		return undefined;
	}
	try {
		ow(value, label, predicate);
		return value;
	} catch (error) {
		problems.push(errorMessage(error));
		return undefined;
	}
}
