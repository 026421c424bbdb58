import type { Receipt, Session } from "../types/receipt.js";
import { mergeIntervals } from "./IntervalMerger.js";

export interface SessionStats {
	uniqueSessions: number;
	/** Sum of per-session durations; parallel sessions count twice */
	totalMs: number;
	/** Overlaps counted once */
	wallClockMs: number;
	averageMs: number;
	earliestStart: string | null;
	latestEnd: string | null;
	/** Some session had no end and was clipped to its last activity */
	incomplete: boolean;
}

/**
 * One session per session id: earliest start, latest end, and the latest
 * activity seen. A session is open while a receipt without an end starts at
 * or after every end observed for it.
 */
export function sessionsFromReceipts(receipts: Receipt[]): Session[] {
	const sessions = new Map<string, Session & { latestOpenStart?: number; latestEnd?: number }>();

	for (const receipt of receipts) {
		const start = Date.parse(receipt.startedAt);
		const end = receipt.endedAt === undefined ? undefined : Date.parse(receipt.endedAt);
		const activity = Math.max(start, end ?? start);

		const session = sessions.get(receipt.sessionId) ?? {
			id: receipt.sessionId,
			parentId: receipt.parentSessionId,
			startedAt: start,
			endedAt: null,
			lastActivityAt: activity,
		};
		session.startedAt = Math.min(session.startedAt, start);
		session.lastActivityAt = Math.max(session.lastActivityAt ?? activity, activity);
		if (end === undefined) {
			session.latestOpenStart = Math.max(session.latestOpenStart ?? start, start);
		} else {
			session.latestEnd = Math.max(session.latestEnd ?? end, end);
		}
		if (session.parentId === undefined) {
			session.parentId = receipt.parentSessionId;
		}
		sessions.set(receipt.sessionId, session);
	}

	return [...sessions.values()].map(({ latestOpenStart, latestEnd, ...session }) => {
		const open = latestOpenStart !== undefined && (latestEnd === undefined || latestOpenStart >= latestEnd);
		return { ...session, endedAt: open || latestEnd === undefined ? null : latestEnd };
	});
}

export function computeSessionStats(receipts: Receipt[]): SessionStats {
	const sessions = sessionsFromReceipts(receipts);
	if (sessions.length === 0) {
		return {
			uniqueSessions: 0,
			totalMs: 0,
			wallClockMs: 0,
			averageMs: 0,
			earliestStart: null,
			latestEnd: null,
			incomplete: false,
		};
	}

	const intervals = sessions.map((session) => ({
		start: session.startedAt,
		end: session.endedAt,
		lastActivityAt: session.lastActivityAt,
	}));

	let totalMs = 0;
	for (const interval of intervals) {
		totalMs += mergeIntervals([interval]).totalMs;
	}
	const wall = mergeIntervals(intervals);

	const starts = receipts.map((receipt) => receipt.startedAt).sort();
	const ends = receipts
		.map((receipt) => receipt.endedAt)
		.filter((end): end is string => end !== undefined)
		.sort();

	return {
		uniqueSessions: sessions.length,
		totalMs,
		wallClockMs: wall.totalMs,
		averageMs: Math.floor(totalMs / sessions.length),
		earliestStart: starts[0] ?? null,
		latestEnd: ends.length > 0 ? ends[ends.length - 1] : null,
		incomplete: wall.incomplete,
	};
}
