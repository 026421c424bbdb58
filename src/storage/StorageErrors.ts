export class StorageError extends Error {
	constructor(
		message: string,
		public code?: string,
		public details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}

export class StorageConnectionError extends StorageError {
	constructor(message: string, details?: unknown) {
		super(message, "STORAGE_CONNECTION_ERROR", details);
		this.name = "StorageConnectionError";
	}
}

/** Another process holds the staging lock past the retry budget */
export class StorageLockError extends StorageError {
	constructor(message: string, details?: unknown) {
		super(message, "STORAGE_LOCK_ERROR", details);
		this.name = "StorageLockError";
	}
}

/** A staging file or note that does not parse as what it should be */
export class CorruptedDataError extends StorageError {
	constructor(message: string, details?: unknown) {
		super(message, "CORRUPTED_DATA_ERROR", details);
		this.name = "CorruptedDataError";
	}
}
