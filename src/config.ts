import type { ConfigOverrides, PromptReceiptsConfig } from "./config/types.js";

export const defaultConfig: PromptReceiptsConfig = {
	notesRef: "refs/notes/prompt-receipts",

	redaction: {
		mode: "replace",
		customPatterns: [],
		disablePatterns: [],
		salt: "",
	},

	capture: {
		maxPromptLength: 2000,
		storeFullConversation: false,
	},

	remap: {
		maxAncestorDepth: 50,
	},

	sync: {
		remote: "origin",
		retries: 3,
		retryDelayMs: 500,
	},

	report: {
		blameDepth: 500,
	},
};

export function createConfig(overrides: ConfigOverrides = {}): PromptReceiptsConfig {
	return {
		...defaultConfig,
		notesRef: overrides.notesRef ?? defaultConfig.notesRef,
		redaction: {
			...defaultConfig.redaction,
			...overrides.redaction,
		},
		capture: {
			...defaultConfig.capture,
			...overrides.capture,
		},
		remap: {
			...defaultConfig.remap,
			...overrides.remap,
		},
		sync: {
			...defaultConfig.sync,
			...overrides.sync,
		},
		report: {
			...defaultConfig.report,
			...overrides.report,
		},
	};
}
