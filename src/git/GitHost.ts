/**
 * Git host interface
 *
 * The only way the engine touches git. Everything works on commit ids, blob
 * ids and one notes ref; nothing here changes the tracked tree.
 */
export interface NoteEntry {
	commit: string;
	/** Blob id of the note object */
	note: string;
}

export interface GitHost {
	/** Absolute path of the working copy */
	readonly root: string;

	/** Current HEAD commit, or null in an empty repository */
	head(): Promise<string | null>;

	/** "Name <email>" of the configured author */
	author(): Promise<string>;

	/** Note attached to a commit, or null when there is none */
	readNote(ref: string, commit: string): Promise<string | null>;

	/** Attach or replace a note */
	writeNote(ref: string, commit: string, content: string): Promise<void>;

	/** Should not throw if the note doesn't exist */
	removeNote(ref: string, commit: string): Promise<void>;

	listNotes(ref: string): Promise<NoteEntry[]>;

	/** Blob content, or null when the object is unknown */
	readBlob(blob: string): Promise<string | null>;

	/** Blob id of `path` in `commit`, or null when the file is absent */
	blobAt(commit: string, path: string): Promise<string | null>;

	/**
	 * Blob id of a working-copy file. With `write` the content is stored in the
	 * object database so it can be read back after the file changes again.
	 */
	hashFile(path: string, write?: boolean): Promise<string | null>;

	/** Paths changed by a commit relative to its first parent (all paths for a root commit) */
	changedFiles(commit: string): Promise<string[]>;

	parents(commit: string): Promise<string[]>;

	/** First-parent ancestors, nearest first, excluding `commit` itself */
	ancestors(commit: string, limit: number): Promise<string[]>;

	commitExists(commit: string): Promise<boolean>;

	/** Current value of a ref, or null when it does not exist */
	resolveRef(ref: string): Promise<string | null>;

	/** Point a ref at a value captured by resolveRef; null deletes it */
	updateRef(ref: string, value: string | null): Promise<void>;

	hasRemote(remote: string): Promise<boolean>;

	/**
	 * Fetch a remote notes ref into `scratchRef`.
	 * Resolves false when the remote has no such ref.
	 */
	fetchNotes(remote: string, ref: string, scratchRef: string): Promise<boolean>;

	/**
	 * Non-forced push of a notes ref.
	 * A non-fast-forward rejection throws GitHostError with code PUSH_REJECTED.
	 */
	pushNotes(remote: string, ref: string): Promise<void>;

	/**
	 * Record `otherRef` as merged into `ref` without changing `ref`'s notes, so a
	 * later push of `ref` fast-forwards over `otherRef`
	 */
	absorbNotesHistory(ref: string, otherRef: string): Promise<void>;

	/** Keep a working-copy path out of version control without touching .gitignore */
	excludeFromTracking(pattern: string): Promise<void>;
}
