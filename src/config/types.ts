/**
 * Configuration types for .promptreceiptsrc
 */

export type RedactionMode = "replace" | "hash";

export interface CustomPattern {
	pattern: string;
	replacement: string;
}

export interface RedactionConfig {
	mode: RedactionMode;
	customPatterns: CustomPattern[];
	/** Built-in categories to skip, e.g. "BEARER_TOKEN" */
	disablePatterns: string[];
	/** Salt for hash mode. Empty means a per-working-copy salt is generated. */
	salt: string;
}

export interface CaptureConfig {
	/** Prompt summaries longer than this are truncated */
	maxPromptLength: number;
	/** Keep redacted conversation turns on each receipt */
	storeFullConversation: boolean;
}

export interface RemapConfig {
	/** How far back a dropped commit's receipts look for a surviving ancestor */
	maxAncestorDepth: number;
}

export interface SyncConfig {
	remote: string;
	retries: number;
	/** Base delay between retries */
	retryDelayMs: number;
}

export interface ReportConfig {
	/** Commits walked back from the revision when building a blame view */
	blameDepth: number;
}

export interface PromptReceiptsConfig {
	notesRef: string;
	redaction: RedactionConfig;
	capture: CaptureConfig;
	remap: RemapConfig;
	sync: SyncConfig;
	report: ReportConfig;
}

/**
 * Recursive partial used for overrides and for the parsed file
 */
export type ConfigOverrides = {
	notesRef?: string;
	redaction?: Partial<RedactionConfig>;
	capture?: Partial<CaptureConfig>;
	remap?: Partial<RemapConfig>;
	sync?: Partial<SyncConfig>;
	report?: Partial<ReportConfig>;
};
