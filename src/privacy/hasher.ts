import crypto from "node:crypto";

export function sha256Hex(value: string): string {
	return crypto.createHash("sha256").update(value).digest("hex");
}

/**
 * Hash of the raw prompt text, stored so a prompt can be matched later
 * without keeping the text itself
 */
export function hashPrompt(promptText: string): string {
	return `sha256:${sha256Hex(promptText)}`;
}

/**
 * Salted digest of a secret. Equal secrets under the same salt give equal
 * digests, so repeated occurrences stay correlatable.
 */
export function saltedDigest(secret: string, salt: string, length = 12): string {
	return crypto.createHmac("sha256", salt).update(secret).digest("hex").slice(0, length);
}
