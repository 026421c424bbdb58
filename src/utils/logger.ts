import pino, { type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
	name?: string;
	level?: string;
}

/**
 * Structured logger. Writes to stderr: hooks run inside git, whose stdout
 * belongs to the user.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	return pino(
		{
			name: options.name ?? "prompt-receipts",
			level: options.level ?? process.env.PROMPT_RECEIPTS_LOG_LEVEL ?? "warn",
		},
		pino.destination(2),
	);
}

export const logger = createLogger();
