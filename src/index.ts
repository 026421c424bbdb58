// Facade
export {
	CACHE_FILE_NAME,
	DATA_DIR_NAME,
	type OpenOptions,
	PromptReceipts,
	type PromptReceiptsOptions,
	resolveSalt,
	SALT_FILE_NAME,
} from "./PromptReceipts.js";
// Cache exports
export { BlobCache, type BlobCacheConfig } from "./cache/BlobCache.js";
export { type CachedReceipt, QueryCache } from "./cache/QueryCache.js";
// Capture
export {
	CaptureQueue,
	type CaptureQueueOptions,
	type CaptureResult,
	countDiffLines,
	validateEvent,
} from "./capture/CaptureQueue.js";
// Configuration
export { createConfig, defaultConfig } from "./config.js";
export {
	CONFIG_FILE_NAME,
	ConfigLoader,
	type ConfigLoaderOptions,
	type LoadResult,
	mergeOverrides,
	type ParseResult,
} from "./config/ConfigLoader.js";
export type * from "./config/types.js";
// Git access
export type { GitHost, NoteEntry } from "./git/GitHost.js";
export { GitHostError, type GitHostErrorCode } from "./git/GitHostError.js";
export { MemoryGitHost, type MemoryCommitOptions } from "./git/MemoryGitHost.js";
export { SimpleGitHost } from "./git/SimpleGitHost.js";
// Notes
export {
	CommitNoteWriter,
	type CommitNoteWriterOptions,
	type CommitWriteResult,
	selectForCommit,
	WORKTREE,
} from "./notes/CommitNoteWriter.js";
export { NotesStore, parseRecord, serializeRecord } from "./notes/NotesStore.js";
// Privacy
export { hashPrompt, saltedDigest, sha256Hex } from "./privacy/hasher.js";
export { BUILTIN_PATTERNS, type BuiltinPattern, type SecretCategory } from "./privacy/patterns.js";
export {
	RedactionPipeline,
	type RedactionPipelineOptions,
	type RedactionResult,
	shannonEntropy,
} from "./privacy/RedactionPipeline.js";
// Receipts
export {
	createReceipt,
	mergeFileChanges,
	mergeStagedReceipt,
	normalizeReceipt,
	type ReceiptInit,
	receiptId,
} from "./receipt/ReceiptFactory.js";
export {
	compareReceipts,
	compareReceiptVersions,
	emptyRecord,
	mergeReceiptSets,
	mergeRecords,
	recordsEqual,
} from "./receipt/ReceiptMerge.js";
// Remapping
export { align, identityAlignment, type LineAlignment, splitLines } from "./remap/LineAligner.js";
export { parsePostRewriteInput } from "./remap/postRewrite.js";
export { orphanChange, type RemapTarget, remapRange } from "./remap/RangeRemapper.js";
export { type RewriteRemapperOptions, type RewriteResult, RewriteRemapper } from "./remap/RewriteRemapper.js";
// Reporting
export {
	type BlameLine,
	type BlameView,
	type LineAttribution,
	percentage,
	type RecordFilter,
	type ReportEntry,
	ReportReader,
	type ReportReaderOptions,
} from "./report/ReportReader.js";
// Sessions
export * from "./session/index.js";
// Storage
export { FileLock, type FileLockOptions } from "./storage/FileLock.js";
export { type DrainDecision, STAGING_FILE_NAME, StagingStore, type StagingStoreOptions } from "./storage/StagingStore.js";
export { CorruptedDataError, StorageConnectionError, StorageError, StorageLockError } from "./storage/StorageErrors.js";
// Sync
export { AUDIT_FILE_NAME, type AuditEntry, AuditLog } from "./sync/AuditLog.js";
export { NotesSyncManager, type NotesSyncOptions, type PullResult, type PushResult } from "./sync/NotesSyncManager.js";
export { SyncError, type SyncErrorCode } from "./sync/SyncError.js";
// Types
export * from "./types.js";
// Utilities
export { createLogger, type Logger, type LoggerOptions, logger } from "./utils/logger.js";
export { normalize, toRepoRelative } from "./utils/PathNormalizer.js";
export { errorMessage, toError } from "./utils/errorHelpers.js";
