/**
 * RedactionPipeline - Strips secrets from text before it is persisted
 *
 * Order of passes:
 * 1. Built-in secret shapes (keys, tokens, passwords, PEM blocks)
 * 2. Custom patterns from configuration
 * 3. High-entropy tokens that no pattern recognised
 *
 * A custom pattern that does not compile is skipped with a warning; capture
 * carries on with the built-ins.
 */

import type { Logger } from "pino";
import type { RedactionConfig } from "../config/types.js";
import type { ConversationTurn } from "../types/receipt.js";
import { logger as defaultLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/errorHelpers.js";
import { saltedDigest } from "./hasher.js";
import {
	BUILTIN_PATTERNS,
	type BuiltinPattern,
	ENTROPY_CANDIDATE,
	ENTROPY_MIN_LENGTH,
	ENTROPY_THRESHOLD,
	type SecretCategory,
} from "./patterns.js";

export interface RedactionResult {
	text: string;
	counts: Partial<Record<SecretCategory, number>>;
	total: number;
	warnings: string[];
}

interface CompiledCustomPattern {
	pattern: RegExp;
	replacement: string;
}

export interface RedactionPipelineOptions {
	logger?: Logger;
}

/**
 * Shannon entropy of a string in bits per character
 */
export function shannonEntropy(value: string): number {
	if (value.length === 0) {
		return 0;
	}
	const frequencies = new Map<string, number>();
	for (const char of value) {
		frequencies.set(char, (frequencies.get(char) ?? 0) + 1);
	}
	let entropy = 0;
	for (const count of frequencies.values()) {
		const p = count / value.length;
		entropy -= p * Math.log2(p);
	}
	return entropy;
}

export class RedactionPipeline {
	private readonly builtins: BuiltinPattern[];
	private readonly custom: CompiledCustomPattern[] = [];
	private readonly entropyEnabled: boolean;
	/** Problems found while compiling the configuration */
	readonly warnings: string[] = [];

	constructor(
		private readonly config: RedactionConfig,
		options: RedactionPipelineOptions = {},
	) {
		const log = options.logger ?? defaultLogger;
		const disabled = new Set(config.disablePatterns);

		this.builtins = BUILTIN_PATTERNS.filter((builtin) => !disabled.has(builtin.category));
		this.entropyEnabled = !disabled.has("HIGH_ENTROPY");

		for (const [index, custom] of config.customPatterns.entries()) {
			try {
				this.custom.push({ pattern: new RegExp(custom.pattern, "g"), replacement: custom.replacement });
			} catch (error) {
				const warning = `redaction.customPatterns[${index}] skipped: ${errorMessage(error)}`;
				this.warnings.push(warning);
				log.warn({ pattern: custom.pattern }, warning);
			}
		}
	}

	redact(input: string): RedactionResult {
		const counts: Partial<Record<SecretCategory, number>> = {};
		const bump = (category: SecretCategory) => {
			counts[category] = (counts[category] ?? 0) + 1;
		};

		if (!input) {
			return { text: input, counts, total: 0, warnings: [...this.warnings] };
		}

		let text = input;

		for (const builtin of this.builtins) {
			// fresh RegExp per call: the shared literals are global and stateful
			const pattern = new RegExp(builtin.pattern.source, builtin.pattern.flags);
			text = text.replace(pattern, (match: string, ...groups: unknown[]) => {
				const secret = builtin.secretGroup === 0 ? match : groups[builtin.secretGroup - 1];
				if (typeof secret !== "string" || secret.length === 0) {
					return match;
				}
				bump(builtin.category);
				const replacement = this.placeholder(builtin.category, secret);
				if (builtin.secretGroup === 0) {
					return replacement;
				}
				const at = match.lastIndexOf(secret);
				return `${match.slice(0, at)}${replacement}${match.slice(at + secret.length)}`;
			});
		}

		for (const custom of this.custom) {
			const matches = text.match(custom.pattern);
			if (matches) {
				for (let i = 0; i < matches.length; i++) {
					bump("CUSTOM");
				}
				text = text.replace(custom.pattern, custom.replacement);
			}
		}

		if (this.entropyEnabled) {
			text = text.replace(new RegExp(ENTROPY_CANDIDATE.source, "g"), (token: string) => {
				if (token.length < ENTROPY_MIN_LENGTH || token.includes("REDACTED") || token.includes("SHA256")) {
					return token;
				}
				if (shannonEntropy(token) <= ENTROPY_THRESHOLD) {
					return token;
				}
				bump("HIGH_ENTROPY");
				return this.placeholder("HIGH_ENTROPY", token);
			});
		}

		const total = Object.values(counts).reduce((sum: number, count) => sum + (count ?? 0), 0);
		return { text, counts, total, warnings: [...this.warnings] };
	}

	/**
	 * Redact the text of every turn, keeping roles and tool names
	 */
	redactTurns(turns: ConversationTurn[]): { turns: ConversationTurn[]; total: number } {
		let total = 0;
		const redacted = turns.map((turn) => {
			const result = this.redact(turn.content);
			total += result.total;
			return { ...turn, content: result.text };
		});
		return { turns: redacted, total };
	}

	/**
	 * Redact every string inside a JSON-like value. Object keys are kept.
	 */
	redactDeep(value: unknown): { value: unknown; total: number } {
		if (typeof value === "string") {
			const result = this.redact(value);
			return { value: result.text, total: result.total };
		}
		if (Array.isArray(value)) {
			let total = 0;
			const items = value.map((item) => {
				const result = this.redactDeep(item);
				total += result.total;
				return result.value;
			});
			return { value: items, total };
		}
		if (typeof value === "object" && value !== null) {
			let total = 0;
			const out: Record<string, unknown> = {};
			for (const [key, item] of Object.entries(value)) {
				const result = this.redactDeep(item);
				total += result.total;
				out[key] = result.value;
			}
			return { value: out, total };
		}
		return { value, total: 0 };
	}

	private placeholder(category: SecretCategory, secret: string): string {
		if (this.config.mode === "hash") {
			return `[SHA256:${saltedDigest(secret, this.config.salt)}]`;
		}
		return `[REDACTED_${category}]`;
	}
}
