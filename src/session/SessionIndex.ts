import type { Session } from "../types/receipt.js";
import { type MergedIntervals, mergeIntervals } from "./IntervalMerger.js";

/**
 * Lookup over sessions linked by parent id. Children point at their parent;
 * the index holds the reverse edges so a child can be queried without its
 * parent and a parent without loading its children.
 */
export class SessionIndex {
	private sessions: Map<string, Session> = new Map();
	private childIds: Map<string, Set<string>> = new Map();

	constructor(sessions: Iterable<Session> = []) {
		for (const session of sessions) {
			this.add(session);
		}
	}

	/**
	 * Insert or replace a session
	 */
	add(session: Session): void {
		const previous = this.sessions.get(session.id);
		if (previous?.parentId !== undefined && previous.parentId !== session.parentId) {
			this.childIds.get(previous.parentId)?.delete(session.id);
		}
		this.sessions.set(session.id, session);
		if (session.parentId !== undefined) {
			const siblings = this.childIds.get(session.parentId) ?? new Set<string>();
			siblings.add(session.id);
			this.childIds.set(session.parentId, siblings);
		}
	}

	get(id: string): Session | undefined {
		return this.sessions.get(id);
	}

	parent(id: string): Session | undefined {
		const parentId = this.sessions.get(id)?.parentId;
		return parentId === undefined ? undefined : this.sessions.get(parentId);
	}

	children(id: string): Session[] {
		return [...(this.childIds.get(id) ?? [])]
			.sort()
			.map((childId) => this.sessions.get(childId))
			.filter((child): child is Session => child !== undefined);
	}

	/**
	 * The session and every descendant known to the index, parents first
	 */
	tree(id: string): Session[] {
		const root = this.sessions.get(id);
		if (!root) {
			return [];
		}
		const result: Session[] = [];
		const seen = new Set<string>();
		const queue: Session[] = [root];
		while (queue.length > 0) {
			const session = queue.shift();
			if (!session || seen.has(session.id)) {
				continue;
			}
			seen.add(session.id);
			result.push(session);
			queue.push(...this.children(session.id));
		}
		return result;
	}

	/**
	 * Top-level sessions: no parent, or a parent the index has never seen
	 */
	roots(): Session[] {
		return [...this.sessions.values()]
			.filter((session) => session.parentId === undefined || !this.sessions.has(session.parentId))
			.sort((a, b) => a.startedAt - b.startedAt);
	}

	/**
	 * Wall-clock time of a session together with all its descendants
	 */
	wallClock(id: string, lastActivityAt?: number): MergedIntervals {
		return mergeIntervals(
			this.tree(id).map((session) => ({
				start: session.startedAt,
				end: session.endedAt,
				lastActivityAt: session.lastActivityAt,
			})),
			{ lastActivityAt },
		);
	}

	get size(): number {
		return this.sessions.size;
	}
}
