/**
 * Translate one FileChange onto a new blob
 *
 * Surviving lines are grouped into runs that stay contiguous in the new file.
 * The run nearest the original start wins; anything else is clipped away and
 * recorded in the trace. When nothing survives the change is orphaned with its
 * last valid coordinates, never shifted onto unrelated lines.
 */

import type { FileChange, LineRange, OrphanReason } from "../types/receipt.js";
import type { LineAlignment } from "./LineAligner.js";

export interface RemapTarget {
	/** Commit the new blob belongs to, or "worktree" at commit time */
	commit: string;
	blob: string;
	path: string;
}

export function rangeLength(range: LineRange): number {
	return Math.max(0, range[1] - range[0] + 1);
}

/**
 * Runs of surviving lines that are consecutive in the new file, in old-line order
 */
export function survivingRuns(range: LineRange, alignment: LineAlignment): LineRange[] {
	const runs: LineRange[] = [];
	let current: LineRange | null = null;

	const last = Math.min(range[1], alignment.oldLineCount);
	for (let line = range[0]; line <= last; line++) {
		const mapped = alignment.map.get(line);
		// a deleted line does not split a run; only a gap in the new file does
		if (mapped === undefined) {
			continue;
		}
		if (current && mapped === current[1] + 1) {
			current = [current[0], mapped];
		} else {
			if (current) {
				runs.push(current);
			}
			current = [mapped, mapped];
		}
	}
	if (current) {
		runs.push(current);
	}
	return runs;
}

export function orphanChange(change: FileChange, reason: OrphanReason): FileChange {
	return {
		...change,
		orphaned: { reason, lastRange: change.range, lastBlob: change.blob },
	};
}

/**
 * Pure: the same change, alignment and target always give the same result
 */
export function remapRange(
	change: FileChange,
	alignment: LineAlignment,
	target: RemapTarget,
	fromCommit: string,
): FileChange {
	if (change.orphaned) {
		return change;
	}
	if (change.blob === target.blob && change.path === target.path) {
		return change;
	}

	const runs = survivingRuns(change.range, alignment);
	if (runs.length === 0) {
		return orphanChange(change, "content-removed");
	}

	const kept = runs[0];
	const originalRange = change.remap?.originalRange ?? change.range;
	const totalLines =
		change.remap?.totalLines ?? rangeLength([change.range[0], Math.min(change.range[1], alignment.oldLineCount)]);
	const survivingLines = rangeLength(kept);

	return {
		path: target.path,
		blob: target.blob,
		range: kept,
		added: change.added,
		removed: change.removed,
		remap: {
			fromCommit,
			fromBlob: change.blob,
			fromPath: change.path,
			originalRange,
			clipped: survivingLines < totalLines,
			survivingLines,
			totalLines,
		},
	};
}
