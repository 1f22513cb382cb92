//-------------------------------------------------------
// [Files]
//-------------------------------------------------------
/**
 * A local file considered for sync. `fingerprint` is the MD5 hex digest of the
 * full content; it may be absent when hashing has not happened (or failed).
 */
export interface FileMeta {
	path: string;
	name: string;
	size: number;
	mtime: string;
	fingerprint?: string;
	forceSync?: boolean;
}

//-------------------------------------------------------
// [Ledger]
//-------------------------------------------------------
export type SessionStatus = "in_progress" | "completed" | "failed";

export type SyncStatus = "pending" | "success" | "failed" | "skipped";

export interface SessionCounters {
	totalFiles: number;
	syncedFiles: number;
	failedFiles: number;
	skippedFiles: number;
	totalBytes: number;
	syncedBytes: number;
}

export interface SyncSession extends SessionCounters {
	sessionId: string;
	sourcePath: string;
	startTime: Date;
	endTime?: Date;
	status: SessionStatus;
	errorMessage?: string;
}

/**
 * What the scheduler knows about a file when it records an attempt.
 */
export interface FileAttempt {
	path: string;
	name: string;
	size: number;
	fingerprint?: string;
	lastModified?: string;
	remoteId?: string;
	remoteFolderId?: string;
	retryCount?: number;
}

export interface FileSyncRecord {
	id: number;
	sessionId: string;
	path: string;
	name: string;
	size: number;
	fingerprint?: string;
	remoteId?: string;
	remoteFolderId?: string;
	status: SyncStatus;
	timestamp: Date;
	error?: string;
	retryCount: number;
}

export interface FileTrackingEntry {
	path: string;
	name: string;
	size: number;
	fingerprint: string;
	lastModified: Date;
	lastSynced: Date;
	remoteId?: string;
	syncCount: number;
}

export interface ExtensionTotals {
	extension: string;
	count: number;
	totalSize: number;
}

export interface SyncStats {
	totalSessions: number;
	totalFilesSynced: number;
	totalBytesSynced: number;
	uniqueFiles: number;
	filesToday: number;
	bytesToday: number;
	failedToday: number;
	recentErrors: number;
	byExtension: ExtensionTotals[];
	computedAt: Date;
}

export interface DuplicateGroup {
	fingerprint: string;
	duplicateCount: number;
	fileNames: string[];
	totalSize: number;
}

//-------------------------------------------------------
// [Remote Store]
//-------------------------------------------------------
export interface AccountIdentity {
	emailAddress?: string;
	displayName?: string;
}

export interface UploadProgress {
	bytesSent: number;
	totalBytes: number;
}

export interface RemoteUploadOptions {
	signal?: AbortSignal;
	onProgress?: (progress: UploadProgress) => void;
}

/**
 * The remote object store as the core sees it.
 */
export interface RemoteStore {
	findOrCreateFolder(name: string, parentId: string): Promise<string>;
	findExisting(name: string, parentId: string, contentFingerprint?: string): Promise<string | undefined>;
	upload(localPath: string, parentId: string, options?: RemoteUploadOptions): Promise<string>;
	getAbout(): Promise<AccountIdentity>;
}

//-------------------------------------------------------
// [Uploads]
//-------------------------------------------------------
export type SkipReason = "duplicate" | "remote_exists" | "capacity" | "cancelled";

export interface UploadOutcome {
	path: string;
	status: Exclude<SyncStatus, "pending">;
	size: number;
	fingerprint?: string;
	remoteId?: string;
	remoteFolderId?: string;
	reason?: SkipReason;
	error?: string;
	retryCount: number;
}

export interface UploadStats {
	totalFiles: number;
	uploadedFiles: number;
	failedFiles: number;
	skippedFiles: number;
	totalBytes: number;
	uploadedBytes: number;
}

export interface UploadReport {
	outcomes: UploadOutcome[];
	stats: UploadStats;
	/** Set when a run-level error aborted the batch. */
	fatalError?: Error;
	cancelled: boolean;
}

//-------------------------------------------------------
// [Audio]
//-------------------------------------------------------
/**
 * Decoded PCM audio. Each channel holds float samples in [-1, 1]; all channels
 * have the same length.
 */
export interface AudioTimeline {
	sampleRate: number;
	channels: Float32Array[];
}

/** Half-open interval `[startMs, endMs)`. */
export interface Span {
	startMs: number;
	endMs: number;
}

//-------------------------------------------------------
// [Staging]
//-------------------------------------------------------
export interface UsageReport {
	rawBytes: number;
	processedBytes: number;
	archiveBytes: number;
	totalBytes: number;
	maxStorageBytes: number;
	usagePercent: number;
	diskFreeBytes: number;
	diskTotalBytes: number;
}

export interface ReclaimResult {
	filesRemoved: number;
	bytesRemoved: number;
}

//-------------------------------------------------------
// [Sync decisions]
//-------------------------------------------------------
export enum SyncAction {
	UPLOAD_NEW = "UPLOAD_NEW",
	UPLOAD_UPDATE = "UPLOAD_UPDATE",
	UPLOAD_FORCED = "UPLOAD_FORCED",
	UPLOAD_UNHASHED = "UPLOAD_UNHASHED",
	SKIP_UNCHANGED = "SKIP_UNCHANGED",
}
