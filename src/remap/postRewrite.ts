import type { RewriteNotification } from "../types/events.js";

const COMMIT_ID = /^[0-9a-f]{7,64}$/i;

/**
 * Parse the stdin git hands to the post-rewrite hook: one "<old> <new>" pair
 * per line, optionally followed by extra data. Malformed lines are skipped.
 */
export function parsePostRewriteInput(
	input: string,
	renames: RewriteNotification["renames"] = [],
): RewriteNotification {
	const mappings: RewriteNotification["mappings"] = [];

	for (const line of input.split("\n")) {
		const [oldCommit, newCommit] = line.trim().split(/\s+/);
		if (!oldCommit || !newCommit || !COMMIT_ID.test(oldCommit) || !COMMIT_ID.test(newCommit)) {
			continue;
		}
		mappings.push({ oldCommit, newCommit });
	}

	return { mappings, renames };
}
