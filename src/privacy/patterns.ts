/**
 * Built-in secret shapes, applied in order before custom patterns
 */

export type SecretCategory =
	| "PRIVATE_KEY"
	| "API_KEY"
	| "AWS_KEY"
	| "JWT"
	| "BEARER_TOKEN"
	| "CONNECTION_STRING"
	| "PASSWORD"
	| "TOKEN"
	| "HIGH_ENTROPY"
	| "CUSTOM";

export interface BuiltinPattern {
	category: Exclude<SecretCategory, "HIGH_ENTROPY" | "CUSTOM">;
	pattern: RegExp;
	/**
	 * Index of the capture group holding the secret. 0 redacts the whole match;
	 * anything else keeps the surrounding text (e.g. the `password=` label).
	 */
	secretGroup: number;
}

export const BUILTIN_PATTERNS: readonly BuiltinPattern[] = [
	{
		category: "PRIVATE_KEY",
		pattern: /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
		secretGroup: 0,
	},
	{ category: "API_KEY", pattern: /\b(?:sk|key)-[A-Za-z0-9_-]{20,}/g, secretGroup: 0 },
	{ category: "API_KEY", pattern: /\bgh[pousr]_[A-Za-z0-9]{20,}\b/g, secretGroup: 0 },
	{ category: "API_KEY", pattern: /\bgithub_pat_[A-Za-z0-9_]{20,}\b/g, secretGroup: 0 },
	{ category: "API_KEY", pattern: /\bxox[baprs]-[A-Za-z0-9-]{10,}\b/g, secretGroup: 0 },
	{ category: "API_KEY", pattern: /\bAIza[0-9A-Za-z_-]{35}\b/g, secretGroup: 0 },
	{ category: "AWS_KEY", pattern: /\b(?:AKIA|ASIA)[0-9A-Z]{16}\b/g, secretGroup: 0 },
	{
		category: "JWT",
		pattern: /\beyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9._-]{10,}\.[A-Za-z0-9_-]{10,}\b/g,
		secretGroup: 0,
	},
	{ category: "BEARER_TOKEN", pattern: /\bBearer\s+([A-Za-z0-9_.~+/=-]{10,})/gi, secretGroup: 1 },
	{
		category: "CONNECTION_STRING",
		pattern: /\b(?:postgres|mysql|mongodb|redis|amqp)s?:\/\/[^:\s/@]+:([^\s/@[][^\s/@]*)@/gi,
		secretGroup: 1,
	},
	{
		category: "PASSWORD",
		// a quoted value may hold spaces; an earlier placeholder is left alone
		pattern:
			/\b(?:password|passwd|secret)\s*[=:]\s*(["']?)(?!\[(?:REDACTED_|SHA256:))((?<=["'])[^"'\r\n]+|[^\s"']+)\1/gi,
		secretGroup: 2,
	},
	{ category: "TOKEN", pattern: /\b(?:token|auth)\s*[=:]\s*([A-Za-z0-9_.~+/=-]{40,})/gi, secretGroup: 1 },
];

/** Tokens at least this long are candidates for the entropy check */
export const ENTROPY_MIN_LENGTH = 20;

/** Bits per character above which a candidate token is treated as a secret */
export const ENTROPY_THRESHOLD = 4.5;

export const ENTROPY_CANDIDATE = /[A-Za-z0-9+/=_-]{20,}/g;
