import crypto from "node:crypto";
import type { GitHost, NoteEntry } from "./GitHost.js";
import { GitHostError } from "./GitHostError.js";

interface MemoryCommit {
	id: string;
	parents: string[];
	/** path → blob id */
	tree: Map<string, string>;
	message: string;
}

/**
 * One state of a notes ref. `ancestry` plays the part of the notes commit
 * history: a push is a fast-forward when the remote state is in it.
 */
interface NotesState {
	id: string;
	notes: Map<string, string>;
	ancestry: Set<string>;
}

export interface MemoryCommitOptions {
	message?: string;
	/** Defaults to the current HEAD */
	parents?: string[];
	/** Written to the working copy before committing; null deletes the file */
	files?: Record<string, string | null>;
}

type FailableOperation = "writeNote" | "removeNote" | "pushNotes" | "fetchNotes";

function gitBlobId(content: string): string {
	const body = Buffer.from(content, "utf8");
	return crypto
		.createHash("sha1")
		.update(`blob ${body.length}\0`)
		.update(body)
		.digest("hex");
}

/**
 * In-memory GitHost
 * Useful for testing: commits, blobs, notes refs and remotes without a git
 * binary. Another MemoryGitHost serves as a remote.
 */
export class MemoryGitHost implements GitHost {
	readonly root: string;
	authorIdentity = "Test Author <author@example.com>";

	private blobs: Map<string, string> = new Map();
	private commits: Map<string, MemoryCommit> = new Map();
	private headCommit: string | null = null;
	private workingCopy: Map<string, string> = new Map();
	private refs: Map<string, string> = new Map();
	private states: Map<string, NotesState> = new Map();
	private remotes: Map<string, MemoryGitHost> = new Map();
	private failures: Map<FailableOperation, number> = new Map();
	private readonly excluded: Set<string> = new Set();
	private sequence = 0;

	constructor(root = "/repo") {
		this.root = root;
	}

	// ---- test helpers ----

	writeFile(filePath: string, content: string): void {
		this.workingCopy.set(filePath, content);
	}

	deleteFile(filePath: string): void {
		this.workingCopy.delete(filePath);
	}

	/**
	 * Commit the whole working copy and move HEAD to the new commit
	 */
	commit(options: MemoryCommitOptions = {}): string {
		for (const [filePath, content] of Object.entries(options.files ?? {})) {
			if (content === null) {
				this.workingCopy.delete(filePath);
			} else {
				this.workingCopy.set(filePath, content);
			}
		}

		const tree = new Map<string, string>();
		for (const [filePath, content] of [...this.workingCopy.entries()].sort(([a], [b]) => (a < b ? -1 : 1))) {
			tree.set(filePath, this.storeBlob(content));
		}

		const parents = options.parents ?? (this.headCommit ? [this.headCommit] : []);
		const message = options.message ?? `commit ${this.sequence + 1}`;
		const id = crypto
			.createHash("sha1")
			.update(JSON.stringify({ parents, tree: [...tree.entries()], message, sequence: this.sequence++ }))
			.digest("hex");

		this.commits.set(id, { id, parents, tree, message });
		this.headCommit = id;
		return id;
	}

	/**
	 * Replace HEAD with a commit of the current working copy on HEAD's parents
	 */
	amend(options: Omit<MemoryCommitOptions, "parents"> = {}): { oldCommit: string; newCommit: string } {
		const oldCommit = this.requireHead();
		const parents = this.requireCommit(oldCommit).parents;
		const newCommit = this.commit({ ...options, parents });
		return { oldCommit, newCommit };
	}

	/**
	 * Move HEAD and reset the working copy to a commit's tree
	 */
	checkout(commit: string): void {
		const target = this.requireCommit(commit);
		this.workingCopy = new Map();
		for (const [filePath, blob] of target.tree) {
			this.workingCopy.set(filePath, this.blobs.get(blob) ?? "");
		}
		this.headCommit = commit;
	}

	addRemote(name: string, remote: MemoryGitHost): void {
		this.remotes.set(name, remote);
	}

	/**
	 * Make the next `times` calls of an operation throw
	 */
	failNext(operation: FailableOperation, times = 1): void {
		this.failures.set(operation, times);
	}

	get excludedPatterns(): string[] {
		return [...this.excluded];
	}

	// ---- GitHost ----

	async head(): Promise<string | null> {
		return this.headCommit;
	}

	async author(): Promise<string> {
		return this.authorIdentity;
	}

	async readNote(ref: string, commit: string): Promise<string | null> {
		const blob = this.state(ref)?.notes.get(commit);
		return blob === undefined ? null : (this.blobs.get(blob) ?? null);
	}

	async writeNote(ref: string, commit: string, content: string): Promise<void> {
		this.maybeFail("writeNote");
		const blob = this.storeBlob(content);
		this.advance(ref, (notes) => notes.set(commit, blob));
	}

	async removeNote(ref: string, commit: string): Promise<void> {
		this.maybeFail("removeNote");
		if (this.state(ref)?.notes.has(commit)) {
			this.advance(ref, (notes) => notes.delete(commit));
		}
	}

	async listNotes(ref: string): Promise<NoteEntry[]> {
		const state = this.state(ref);
		if (!state) {
			return [];
		}
		return [...state.notes.entries()]
			.map(([commit, note]) => ({ commit, note }))
			.sort((a, b) => (a.commit < b.commit ? -1 : a.commit > b.commit ? 1 : 0));
	}

	async readBlob(blob: string): Promise<string | null> {
		return this.blobs.get(blob) ?? null;
	}

	async blobAt(commit: string, filePath: string): Promise<string | null> {
		return this.commits.get(commit)?.tree.get(filePath) ?? null;
	}

	async hashFile(filePath: string, write = false): Promise<string | null> {
		const content = this.workingCopy.get(filePath);
		if (content === undefined) {
			return null;
		}
		return write ? this.storeBlob(content) : gitBlobId(content);
	}

	async changedFiles(commit: string): Promise<string[]> {
		const current = this.requireCommit(commit);
		const parentId = current.parents[0];
		const parentTree = parentId ? this.requireCommit(parentId).tree : new Map<string, string>();

		const changed = new Set<string>();
		for (const [filePath, blob] of current.tree) {
			if (parentTree.get(filePath) !== blob) {
				changed.add(filePath);
			}
		}
		for (const filePath of parentTree.keys()) {
			if (!current.tree.has(filePath)) {
				changed.add(filePath);
			}
		}
		return [...changed].sort();
	}

	async parents(commit: string): Promise<string[]> {
		return [...this.requireCommit(commit).parents];
	}

	async ancestors(commit: string, limit: number): Promise<string[]> {
		const result: string[] = [];
		let current = this.commits.get(commit)?.parents[0];
		while (current && result.length < limit) {
			result.push(current);
			current = this.commits.get(current)?.parents[0];
		}
		return result;
	}

	async commitExists(commit: string): Promise<boolean> {
		return this.commits.has(commit);
	}

	async resolveRef(ref: string): Promise<string | null> {
		return this.refs.get(ref) ?? null;
	}

	async updateRef(ref: string, value: string | null): Promise<void> {
		if (value === null) {
			this.refs.delete(ref);
			return;
		}
		if (!this.states.has(value)) {
			throw new GitHostError(`Unknown object ${value}`, "GIT_COMMAND_FAILED");
		}
		this.refs.set(ref, value);
	}

	async hasRemote(remote: string): Promise<boolean> {
		return this.remotes.has(remote);
	}

	async fetchNotes(remote: string, ref: string, scratchRef: string): Promise<boolean> {
		this.maybeFail("fetchNotes");
		const source = this.remotes.get(remote);
		if (!source) {
			throw new GitHostError(`No such remote: ${remote}`, "FETCH_FAILED");
		}
		const state = source.state(ref);
		if (!state) {
			return false;
		}
		this.receive(source, state);
		this.refs.set(scratchRef, state.id);
		return true;
	}

	async pushNotes(remote: string, ref: string): Promise<void> {
		this.maybeFail("pushNotes");
		const target = this.remotes.get(remote);
		if (!target) {
			throw new GitHostError(`No such remote: ${remote}`, "PUSH_FAILED");
		}
		const local = this.state(ref);
		if (!local) {
			return;
		}
		const remoteId = target.refs.get(ref);
		if (remoteId !== undefined && remoteId !== local.id && !local.ancestry.has(remoteId)) {
			throw new GitHostError(`Updates were rejected: ${ref} (non-fast-forward)`, "PUSH_REJECTED");
		}
		target.receive(this, local);
		target.refs.set(ref, local.id);
	}

	async absorbNotesHistory(ref: string, otherRef: string): Promise<void> {
		const other = this.state(otherRef);
		if (!other) {
			return;
		}
		const local = this.state(ref);
		if (!local) {
			this.refs.set(ref, other.id);
			return;
		}
		if (local.id === other.id || local.ancestry.has(other.id)) {
			return;
		}
		if (other.ancestry.has(local.id)) {
			this.refs.set(ref, other.id);
			return;
		}
		const ancestry = new Set([...local.ancestry, local.id, ...other.ancestry, other.id]);
		this.setState(ref, new Map(local.notes), ancestry);
	}

	async excludeFromTracking(pattern: string): Promise<void> {
		this.excluded.add(pattern);
	}

	// ---- internals ----

	private storeBlob(content: string): string {
		const id = gitBlobId(content);
		this.blobs.set(id, content);
		return id;
	}

	private state(ref: string): NotesState | undefined {
		const id = this.refs.get(ref);
		return id === undefined ? undefined : this.states.get(id);
	}

	private advance(ref: string, change: (notes: Map<string, string>) => void): void {
		const previous = this.state(ref);
		const notes = new Map(previous?.notes ?? []);
		change(notes);
		const ancestry = previous ? new Set([...previous.ancestry, previous.id]) : new Set<string>();
		this.setState(ref, notes, ancestry);
	}

	private setState(ref: string, notes: Map<string, string>, ancestry: Set<string>): void {
		const id = crypto
			.createHash("sha1")
			.update(`notes ${this.root} ${ref} ${this.sequence++}`)
			.digest("hex");
		this.states.set(id, { id, notes, ancestry });
		this.refs.set(ref, id);
	}

	/**
	 * Copy a notes state and the blobs it points at from another host
	 */
	private receive(source: MemoryGitHost, state: NotesState): void {
		for (const blob of state.notes.values()) {
			const content = source.blobs.get(blob);
			if (content !== undefined) {
				this.blobs.set(blob, content);
			}
		}
		this.states.set(state.id, { id: state.id, notes: new Map(state.notes), ancestry: new Set(state.ancestry) });
	}

	private maybeFail(operation: FailableOperation): void {
		const remaining = this.failures.get(operation) ?? 0;
		if (remaining <= 0) {
			return;
		}
		this.failures.set(operation, remaining - 1);
		const code = operation === "pushNotes" ? "PUSH_FAILED" : operation === "fetchNotes" ? "FETCH_FAILED" : "GIT_COMMAND_FAILED";
		throw new GitHostError(`Injected failure: ${operation}`, code);
	}

	private requireHead(): string {
		if (!this.headCommit) {
			throw new GitHostError("No commits yet", "GIT_COMMAND_FAILED");
		}
		return this.headCommit;
	}

	private requireCommit(commit: string): MemoryCommit {
		const found = this.commits.get(commit);
		if (!found) {
			throw new GitHostError(`Unknown commit ${commit}`, "GIT_COMMAND_FAILED");
		}
		return found;
	}
}
