/**
 * ConfigLoader - Reads and validates .promptreceiptsrc
 *
 * The file is JSON. It is looked up in the repository root first and in the
 * home directory second. A field that fails validation is dropped and
 * reported; the rest of the file still applies. A file that is not JSON at
 * all yields the defaults plus a warning. Loading never throws: a broken
 * config must not stop a git hook.
 *
 * @module ConfigLoader
 */

import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import ow from "ow";
import { createConfig } from "../config.js";
import type { Logger } from "../utils/logger.js";
import { logger as defaultLogger } from "../utils/logger.js";
import { errorMessage, hasErrorCode } from "../utils/errorHelpers.js";
import { field, isRecord } from "../utils/validation.js";
import type { ConfigOverrides, PromptReceiptsConfig } from "./types.js";

export const CONFIG_FILE_NAME = ".promptreceiptsrc";

/**
 * Result of parsing a configuration
 */
export interface ParseResult {
	/** Overrides that passed validation */
	overrides: ConfigOverrides;

	/** Fields that failed validation, one message each */
	errors: string[];
}

export interface LoadResult {
	config: PromptReceiptsConfig;

	/** File the configuration came from, or null when defaults were used */
	source: string | null;

	errors: string[];
	warnings: string[];
}

export interface ConfigLoaderOptions {
	/** Defaults to the user's home directory */
	homeDir?: string;
	logger?: Logger;
}

function section(raw: Record<string, unknown>, key: string, errors: string[]): Record<string, unknown> {
	const value = raw[key];
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		errors.push(`${key} must be an object`);
		return {};
	}
	return value;
}

/**
 * Drop keys whose value is undefined so a spread does not clobber defaults
 */
function defined<T extends object>(value: T): Partial<T> {
	const out: Partial<T> = {};
	for (const key of Object.keys(value)) {
		if (Reflect.get(value, key) !== undefined) {
			Reflect.set(out, key, Reflect.get(value, key));
		}
	}
	return out;
}

export class ConfigLoader {
	private readonly homeDir: string;
	private readonly log: Logger;

	constructor(options: ConfigLoaderOptions = {}) {
		this.homeDir = options.homeDir ?? os.homedir();
		this.log = options.logger ?? defaultLogger;
	}

	/**
	 * Parse a configuration string
	 *
	 * @throws SyntaxError when the content is not JSON
	 */
	parse(content: string): ParseResult {
		const errors: string[] = [];
		const raw: unknown = JSON.parse(content);

		if (!isRecord(raw)) {
			return { overrides: {}, errors: ["configuration must be a JSON object"] };
		}

		const redaction = section(raw, "redaction", errors);
		const capture = section(raw, "capture", errors);
		const remap = section(raw, "remap", errors);
		const sync = section(raw, "sync", errors);
		const report = section(raw, "report", errors);

		const mode = field(redaction.mode, "redaction.mode", ow.string.oneOf(["replace", "hash"]), errors);

		const overrides: ConfigOverrides = {
			notesRef: field(raw.notesRef, "notesRef", ow.string.matches(/^refs\/notes\/[\w./-]+$/), errors),
			redaction: defined({
				mode: mode === "replace" || mode === "hash" ? mode : undefined,
				customPatterns: field(
					redaction.customPatterns,
					"redaction.customPatterns",
					ow.array.ofType(
						ow.object.exactShape({
							pattern: ow.string.nonEmpty,
							replacement: ow.string,
						}),
					),
					errors,
				),
				disablePatterns: field(
					redaction.disablePatterns,
					"redaction.disablePatterns",
					ow.array.ofType(ow.string),
					errors,
				),
				salt: field(redaction.salt, "redaction.salt", ow.string, errors),
			}),
			capture: defined({
				maxPromptLength: field(
					capture.maxPromptLength,
					"capture.maxPromptLength",
					ow.number.integer.positive,
					errors,
				),
				storeFullConversation: field(
					capture.storeFullConversation,
					"capture.storeFullConversation",
					ow.boolean,
					errors,
				),
			}),
			remap: defined({
				maxAncestorDepth: field(
					remap.maxAncestorDepth,
					"remap.maxAncestorDepth",
					ow.number.integer.greaterThanOrEqual(0),
					errors,
				),
			}),
			sync: defined({
				remote: field(sync.remote, "sync.remote", ow.string.nonEmpty, errors),
				retries: field(sync.retries, "sync.retries", ow.number.integer.greaterThanOrEqual(0), errors),
				retryDelayMs: field(sync.retryDelayMs, "sync.retryDelayMs", ow.number.greaterThanOrEqual(0), errors),
			}),
			report: defined({
				blameDepth: field(report.blameDepth, "report.blameDepth", ow.number.integer.positive, errors),
			}),
		};

		return { overrides, errors };
	}

	/**
	 * Load the configuration for a repository
	 */
	async load(repoRoot: string, overrides: ConfigOverrides = {}): Promise<LoadResult> {
		const warnings: string[] = [];
		const candidates = [path.join(repoRoot, CONFIG_FILE_NAME), path.join(this.homeDir, CONFIG_FILE_NAME)];

		for (const candidate of candidates) {
			let content: string;
			try {
				content = await readFile(candidate, "utf8");
			} catch (error) {
				if (!hasErrorCode(error, "ENOENT")) {
					warnings.push(`${candidate}: ${errorMessage(error)}`);
				}
				continue;
			}

			let parsed: ParseResult;
			try {
				parsed = this.parse(content);
			} catch (error) {
				const warning = `${candidate}: invalid JSON, using defaults (${errorMessage(error)})`;
				this.log.warn({ file: candidate }, warning);
				warnings.push(warning);
				return { config: createConfig(overrides), source: null, errors: [], warnings };
			}

			for (const message of parsed.errors) {
				this.log.warn({ file: candidate }, message);
			}

			return {
				config: createConfig(mergeOverrides(parsed.overrides, overrides)),
				source: candidate,
				errors: parsed.errors,
				warnings,
			};
		}

		return { config: createConfig(overrides), source: null, errors: [], warnings };
	}
}

/**
 * Deep merge of two override sets; the second wins field by field
 */
export function mergeOverrides(base: ConfigOverrides, override: ConfigOverrides): ConfigOverrides {
	return {
		notesRef: override.notesRef ?? base.notesRef,
		redaction: { ...base.redaction, ...override.redaction },
		capture: { ...base.capture, ...override.capture },
		remap: { ...base.remap, ...override.remap },
		sync: { ...base.sync, ...override.sync },
		report: { ...base.report, ...override.report },
	};
}
