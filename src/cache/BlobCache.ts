import QuickLRU from "quick-lru";
import type { GitHost } from "../git/GitHost.js";
import { align, type LineAlignment } from "../remap/LineAligner.js";

export interface BlobCacheConfig {
	/** Blob contents kept */
	maxSize?: number;
	/** Alignments kept */
	maxAlignments?: number;
}

/**
 * Blob contents and line alignments keyed by blob id. Blob ids are content
 * hashes, so entries never go stale.
 */
export class BlobCache {
	private blobs: QuickLRU<string, Promise<string | null>>;
	private alignments: QuickLRU<string, Promise<LineAlignment | null>>;

	constructor(
		private readonly host: GitHost,
		config: BlobCacheConfig = {},
	) {
		this.blobs = new QuickLRU({ maxSize: config.maxSize ?? 256 });
		this.alignments = new QuickLRU({ maxSize: config.maxAlignments ?? 512 });
	}

	/**
	 * Blob content, or null when the object is unknown
	 */
	read(blob: string): Promise<string | null> {
		const cached = this.blobs.get(blob);
		if (cached) {
			return cached;
		}
		const pending = this.host.readBlob(blob);
		this.blobs.set(blob, pending);
		void pending.catch(() => this.blobs.delete(blob));
		return pending;
	}

	/**
	 * Alignment of two blobs, or null when either cannot be read
	 */
	align(oldBlob: string, newBlob: string): Promise<LineAlignment | null> {
		const key = `${oldBlob}:${newBlob}`;
		const cached = this.alignments.get(key);
		if (cached) {
			return cached;
		}
		const pending = Promise.all([this.read(oldBlob), this.read(newBlob)]).then(([oldText, newText]) =>
			oldText === null || newText === null ? null : align(oldText, newText),
		);
		this.alignments.set(key, pending);
		void pending.catch(() => this.alignments.delete(key));
		return pending;
	}

	clear(): void {
		this.blobs.clear();
		this.alignments.clear();
	}

	size(): number {
		return this.blobs.size;
	}
}
