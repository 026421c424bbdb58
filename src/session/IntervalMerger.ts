/**
 * Wall-clock time across overlapping sessions
 *
 * Sort by start, sweep once, sum the merged spans. Nested and overlapping
 * intervals count once. An interval with no observed end is clipped to the
 * last activity seen and the result is flagged incomplete.
 */

export interface TimeInterval {
	start: number;
	/** null when no end was observed */
	end: number | null;
	/** Latest activity seen inside an open interval */
	lastActivityAt?: number;
}

export interface MergeOptions {
	/** Clip for open intervals that carry no lastActivityAt of their own */
	lastActivityAt?: number;
}

export interface MergedIntervals {
	totalMs: number;
	merged: Array<[start: number, end: number]>;
	/** True when at least one interval was open */
	incomplete: boolean;
	openIntervals: number;
}

function latestObserved(intervals: TimeInterval[]): number {
	let latest = Number.NEGATIVE_INFINITY;
	for (const interval of intervals) {
		latest = Math.max(latest, interval.start, interval.end ?? interval.start, interval.lastActivityAt ?? interval.start);
	}
	return latest;
}

export function mergeIntervals(intervals: TimeInterval[], options: MergeOptions = {}): MergedIntervals {
	if (intervals.length === 0) {
		return { totalMs: 0, merged: [], incomplete: false, openIntervals: 0 };
	}

	let openIntervals = 0;
	let fallbackEnd: number | undefined = options.lastActivityAt;

	const closed = intervals.map((interval): [number, number] => {
		if (interval.end !== null) {
			return [interval.start, Math.max(interval.start, interval.end)];
		}
		openIntervals++;
		if (fallbackEnd === undefined) {
			fallbackEnd = latestObserved(intervals);
		}
		const end = interval.lastActivityAt ?? fallbackEnd;
		return [interval.start, Math.max(interval.start, end)];
	});

	closed.sort((a, b) => a[0] - b[0] || a[1] - b[1]);

	const merged: Array<[number, number]> = [];
	let current: [number, number] = [closed[0][0], closed[0][1]];
	for (const [start, end] of closed.slice(1)) {
		if (start <= current[1]) {
			current[1] = Math.max(current[1], end);
		} else {
			merged.push(current);
			current = [start, end];
		}
	}
	merged.push(current);

	const totalMs = merged.reduce((sum, [start, end]) => sum + (end - start), 0);
	return { totalMs, merged, incomplete: openIntervals > 0, openIntervals };
}

/**
 * "Xh Ym" from an hour up, "Xm Ys" below
 */
export function formatDuration(ms: number): string {
	const secs = Math.max(0, Math.floor(ms / 1000));
	if (secs >= 3600) {
		return `${Math.floor(secs / 3600)}h ${Math.floor((secs % 3600) / 60)}m`;
	}
	return `${Math.floor(secs / 60)}m ${secs % 60}s`;
}
