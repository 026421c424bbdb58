/**
 * Line alignment between two versions of a file
 *
 * Longest-common-subsequence alignment over whole lines. Lines on the common
 * subsequence map old → new; every other old line has no counterpart.
 */

import { diffArrays } from "diff";

export interface LineAlignment {
	/** 1-based old line → 1-based new line, for lines that survived */
	map: Map<number, number>;
	oldLineCount: number;
	newLineCount: number;
}

export function splitLines(text: string): string[] {
	if (text.length === 0) {
		return [];
	}
	const body = text.endsWith("\n") ? text.slice(0, -1) : text;
	return body.split("\n");
}

export function identityAlignment(lineCount: number): LineAlignment {
	const map = new Map<number, number>();
	for (let line = 1; line <= lineCount; line++) {
		map.set(line, line);
	}
	return { map, oldLineCount: lineCount, newLineCount: lineCount };
}

export function align(oldText: string, newText: string): LineAlignment {
	const oldLines = splitLines(oldText);
	const newLines = splitLines(newText);

	if (oldText === newText) {
		return identityAlignment(oldLines.length);
	}

	const map = new Map<number, number>();
	let oldLine = 1;
	let newLine = 1;

	for (const change of diffArrays(oldLines, newLines)) {
		const count = change.value.length;
		if (change.added) {
			newLine += count;
		} else if (change.removed) {
			oldLine += count;
		} else {
			for (let i = 0; i < count; i++) {
				map.set(oldLine + i, newLine + i);
			}
			oldLine += count;
			newLine += count;
		}
	}

	return { map, oldLineCount: oldLines.length, newLineCount: newLines.length };
}
