import { describe, expect, it } from "vitest";
import { formatDuration, mergeIntervals } from "../IntervalMerger.js";

const SECOND = 1000;

describe("mergeIntervals", () => {
	it("counts nested and overlapping intervals once", () => {
		const result = mergeIntervals([
			{ start: 0, end: 600 * SECOND },
			{ start: 120 * SECOND, end: 360 * SECOND },
			{ start: 240 * SECOND, end: 480 * SECOND },
		]);

		expect(result).toEqual({ totalMs: 600 * SECOND, merged: [[0, 600 * SECOND]], incomplete: false, openIntervals: 0 });
	});

	it("does not depend on input order", () => {
		const forward = mergeIntervals([
			{ start: 0, end: 100 },
			{ start: 50, end: 150 },
			{ start: 400, end: 500 },
		]);
		const backward = mergeIntervals([
			{ start: 400, end: 500 },
			{ start: 50, end: 150 },
			{ start: 0, end: 100 },
		]);

		expect(backward).toEqual(forward);
		expect(forward.totalMs).toBe(250);
	});

	it("sums disjoint intervals", () => {
		const result = mergeIntervals([
			{ start: 0, end: 100 },
			{ start: 200, end: 300 },
		]);

		expect(result.totalMs).toBe(200);
		expect(result.merged).toEqual([
			[0, 100],
			[200, 300],
		]);
	});

	it("joins intervals that touch", () => {
		expect(
			mergeIntervals([
				{ start: 0, end: 100 },
				{ start: 100, end: 200 },
			]).merged,
		).toEqual([[0, 200]]);
	});

	it("clips an open interval to its own last activity", () => {
		const result = mergeIntervals([
			{ start: 0, end: null, lastActivityAt: 50 },
			{ start: 100, end: 200 },
		]);

		expect(result).toEqual({
			totalMs: 150,
			merged: [
				[0, 50],
				[100, 200],
			],
			incomplete: true,
			openIntervals: 1,
		});
	});

	it("clips an open interval to the given last activity", () => {
		expect(mergeIntervals([{ start: 0, end: null }], { lastActivityAt: 500 }).totalMs).toBe(500);
	});

	it("clips an open interval to the latest time observed", () => {
		const result = mergeIntervals([
			{ start: 0, end: null },
			{ start: 100, end: 300 },
		]);

		expect(result.totalMs).toBe(300);
		expect(result.incomplete).toBe(true);
	});

	it("treats an end before the start as empty", () => {
		expect(mergeIntervals([{ start: 100, end: 50 }]).totalMs).toBe(0);
	});

	it("returns zero for no intervals", () => {
		expect(mergeIntervals([])).toEqual({ totalMs: 0, merged: [], incomplete: false, openIntervals: 0 });
	});
});

describe("formatDuration", () => {
	it("uses minutes and seconds below an hour", () => {
		expect(formatDuration(600 * SECOND)).toBe("10m 0s");
		expect(formatDuration(59_999)).toBe("0m 59s");
	});

	it("uses hours and minutes from an hour up", () => {
		expect(formatDuration(3_725 * SECOND)).toBe("1h 2m");
	});

	it("never goes negative", () => {
		expect(formatDuration(-5)).toBe("0m 0s");
	});
});
