import type { ConversationTurn, LineRange, TokenUsage } from "./receipt.js";

/**
 * Normalized capture events. Provider importers and lifecycle hooks emit these;
 * the engine does not care where they came from.
 */
export interface PromptEvent {
	kind: "prompt";
	sessionId: string;
	timestamp: string;
	promptText: string;
	model: string;
	provider?: string;
	tokenUsage?: Partial<TokenUsage>;
	costUsd?: number;
	parentSessionId?: string;
	responseText?: string;
	services?: string[];
	conversation?: ConversationTurn[];
}

export interface ToolEvent {
	kind: "tool";
	sessionId: string;
	timestamp: string;
	toolName: string;
	filePath: string;
	lineRange: LineRange;
	/** Unified diff of the edit, used only to count added/removed lines */
	diff?: string;
	added?: number;
	removed?: number;
}

export interface StopEvent {
	kind: "stop";
	sessionId: string;
	timestamp: string;
	responseText?: string;
	tokenUsage?: Partial<TokenUsage>;
	costUsd?: number;
	subSessions?: string[];
}

export type CaptureEvent = PromptEvent | ToolEvent | StopEvent;

export interface CommitMapping {
	oldCommit: string;
	/** null when the commit was dropped from history */
	newCommit: string | null;
}

export interface RewriteNotification {
	/** In the order the host rewrote them */
	mappings: CommitMapping[];
	renames: Array<[oldPath: string, newPath: string]>;
}
