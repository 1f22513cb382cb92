import { DriveRemoteStore } from "../api/driveApi";
import { authorize } from "../api/googleAuth";
import { Config } from "../config";
import { ConfigError, StorageError, errorMessage } from "../errors";
import { FfmpegCodec } from "../services/audioCodec";
import { FingerprintLedger, PurgeResult } from "../services/ledger";
import logger from "../services/logger";
import { StageResult, StagingArea } from "../services/staging";
import {
	DuplicateGroup,
	FileMeta,
	ReclaimResult,
	RemoteStore,
	SyncSession,
	SyncStats,
	UploadProgress,
	UploadReport,
	UploadStats,
	UsageReport,
} from "../types";
import { dateStamp, withTimeout } from "../utils";
import { AudioProcessor, ProcessReport } from "./processor";
import { UploadScheduler } from "./scheduler";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PipelineDeps {
	config: Config;
	ledger: FingerprintLedger;
	staging: StagingArea;
	processor: AudioProcessor;
	/** Resolved on the first upload; authentication happens here. */
	connectRemote: () => Promise<RemoteStore>;
	onUploadProgress?: (stats: UploadStats, total: number) => void;
	onTransferProgress?: (filePath: string, progress: UploadProgress) => void;
	now?: () => Date;
}

export interface RunOptions {
	signal?: AbortSignal;
	/** Upload every processed file, even content the ledger has seen. */
	force?: boolean;
}

export interface RunReport {
	sessionId: string;
	staged?: StageResult;
	processed?: ProcessReport;
	upload: UploadReport;
}

export interface StatusReport {
	usage: UsageReport;
	unprocessedFiles: number;
	pendingUploads: number;
	stats: SyncStats;
	recentSessions: SyncSession[];
}

export interface CleanupReport {
	archive: ReclaimResult;
	ledger: PurgeResult;
}

function emptyUploadReport(): UploadReport {
	return {
		outcomes: [],
		stats: { totalFiles: 0, uploadedFiles: 0, failedFiles: 0, skippedFiles: 0, totalBytes: 0, uploadedBytes: 0 },
		cancelled: false,
	};
}

/**
 * Staging → processing → upload, with one ledger session per run.
 */
export class AudioSyncPipeline {
	private readonly config: Config;
	private readonly ledger: FingerprintLedger;
	private readonly staging: StagingArea;
	private readonly processor: AudioProcessor;
	private readonly now: () => Date;
	private remote?: Promise<RemoteStore>;

	constructor(private readonly deps: PipelineDeps) {
		this.config = deps.config;
		this.ledger = deps.ledger;
		this.staging = deps.staging;
		this.processor = deps.processor;
		this.now = deps.now ?? (() => new Date());
	}

	/**
	 * Full pipeline for one source (a mounted volume or folder).
	 */
	async run(sourcePath?: string, options: RunOptions = {}): Promise<RunReport> {
		const source = sourcePath ?? this.config.sourcePath;
		if (!source) {
			throw new ConfigError("No source path given and none configured (sourcePath)");
		}

		logger.info("=".repeat(50));
		logger.info(`Pipeline started: ${source}`);
		const sessionId = this.ledger.openSession(source);

		return this.withinSession(sessionId, async () => {
			const staged = await this.staging.stageFromSource(source);
			if (staged.staged.length === 0 && staged.failed.length === 0) {
				logger.info("No new audio files on the source");
			}

			if (this.config.autoCleanup) {
				await this.staging.reclaimExpired(this.config.retentionDays * DAY_MS);
			}

			let processed: ProcessReport | undefined;
			if (this.config.autoProcess) {
				processed = await this.processor.processBatch(await this.staging.listUnprocessed(), options);
			}

			const upload = await this.uploadPending(sessionId, options);
			return { sessionId, staged, processed, upload };
		});
	}

	async processOnly(options: RunOptions = {}): Promise<ProcessReport> {
		const unprocessed = await this.staging.listUnprocessed();
		logger.info(`${unprocessed.length} file(s) waiting for processing`);
		return this.processor.processBatch(unprocessed, options);
	}

	async uploadOnly(options: RunOptions = {}): Promise<RunReport> {
		const sessionId = this.ledger.openSession(this.staging.processedDir);
		return this.withinSession(sessionId, async () => ({
			sessionId,
			upload: await this.uploadPending(sessionId, options),
		}));
	}

	async status(): Promise<StatusReport> {
		const [usage, unprocessed, pending] = await Promise.all([
			this.staging.usageReport(),
			this.staging.listUnprocessed(),
			this.staging.listPendingUpload(this.config.useLedger ? this.ledger : undefined),
		]);
		return {
			usage,
			unprocessedFiles: unprocessed.length,
			pendingUploads: pending.length,
			stats: this.ledger.statistics(),
			recentSessions: this.ledger.sessionHistory(5),
		};
	}

	async cleanup(): Promise<CleanupReport> {
		const archive = await this.staging.reclaimExpired(this.config.retentionDays * DAY_MS);
		const ledger = this.ledger.purgeOlderThan(this.config.ledgerRetentionDays * DAY_MS);
		return { archive, ledger };
	}

	history(limit = 10): SyncSession[] {
		return this.ledger.sessionHistory(limit);
	}

	duplicates(): DuplicateGroup[] {
		return this.ledger.duplicateReport();
	}

	exportHistory(outputPath: string, sessionId?: string): Promise<number> {
		return this.ledger.exportHistory(outputPath, sessionId);
	}

	close(): void {
		this.ledger.close();
	}

	//-------------------------------------------------------
	// [Internals]
	//-------------------------------------------------------
	/**
	 * Closes the session as completed, or as failed with the error that ended it.
	 */
	private async withinSession<T extends { upload: UploadReport }>(sessionId: string, body: () => Promise<T>): Promise<T> {
		let result: T;
		try {
			result = await body();
		} catch (err) {
			this.failSession(sessionId, err);
			throw err;
		}

		const fatal = result.upload.fatalError;
		if (fatal) {
			this.failSession(sessionId, fatal);
			throw fatal;
		}

		this.ledger.closeSession(sessionId, true);
		const stats = result.upload.stats;
		logger.info(
			`Pipeline finished: ${stats.uploadedFiles} uploaded, ${stats.skippedFiles} skipped, ${stats.failedFiles} failed`
		);
		return result;
	}

	private failSession(sessionId: string, err: unknown): void {
		logger.error(`Pipeline failed: ${errorMessage(err)}`);
		if (err instanceof StorageError) {
			return;
		}
		this.ledger.closeSession(sessionId, false, errorMessage(err));
	}

	private connect(): Promise<RemoteStore> {
		if (!this.remote) {
			this.remote = this.deps.connectRemote().then(async (remote) => {
				const account = await withTimeout(() => remote.getAbout(), this.config.transferTimeoutMs, "connection check");
				logger.info(`Connected to remote store as ${account.emailAddress ?? account.displayName ?? "unknown user"}`);
				return remote;
			});
			this.remote.catch(() => {
				this.remote = undefined;
			});
		}
		return this.remote;
	}

	private async uploadPending(sessionId: string, options: RunOptions): Promise<UploadReport> {
		const pending: FileMeta[] = await this.staging.listPendingUpload(
			this.config.useLedger && !options.force ? this.ledger : undefined
		);
		if (pending.length === 0) {
			logger.info("Nothing to upload");
			return emptyUploadReport();
		}

		const remote = await this.connect();
		const destination = this.config.datedRemoteFolders
			? await this.datedFolder(remote, this.config.remoteFolderId)
			: this.config.remoteFolderId;

		const scheduler = new UploadScheduler(remote, this.ledger, {
			parallelUploads: this.config.parallelUploads,
			retryAttempts: this.config.retryAttempts,
			retryDelayMs: this.config.retryDelayMs,
			transferTimeoutMs: this.config.transferTimeoutMs,
			maxFileSizeBytes: this.config.maxFileSizeMb * 1024 * 1024,
			preserveFolderStructure: this.config.preserveFolderStructure,
			useLedger: this.config.useLedger,
		});

		return scheduler.submitBatch(pending, destination, {
			sessionId,
			baseDir: this.staging.processedDir,
			signal: options.signal,
			force: options.force,
			onOutcome: (_outcome, stats) => this.deps.onUploadProgress?.(stats, pending.length),
			onTransferProgress: this.deps.onTransferProgress,
		});
	}

	/**
	 * `YYYY/MM/sync_YYYYMMDD` under the root folder.
	 */
	private async datedFolder(remote: RemoteStore, rootId: string): Promise<string> {
		const now = this.now();
		const year = String(now.getFullYear());
		const month = String(now.getMonth() + 1).padStart(2, "0");

		let parentId = rootId;
		for (const name of [year, month, `sync_${dateStamp(now)}`]) {
			const parent = parentId;
			parentId = await withTimeout(
				() => remote.findOrCreateFolder(name, parent),
				this.config.transferTimeoutMs,
				`resolve folder ${name}`
			);
		}
		return parentId;
	}
}

/**
 * Wires the pipeline from configuration: SQLite ledger, staging folders,
 * ffmpeg codec and the Drive store.
 */
export function createPipeline(
	config: Config,
	progress: Pick<PipelineDeps, "onUploadProgress" | "onTransferProgress"> = {}
): AudioSyncPipeline {
	const ledger = FingerprintLedger.open(config.ledgerPath);
	const staging = new StagingArea({
		baseDir: config.stagingDir,
		audioExtensions: config.audioExtensions,
		excludeFolders: config.excludeFolders,
		verifyCopy: config.verifyCopy,
		maxStorageBytes: config.maxStorageGb * 1024 * 1024 * 1024,
	});
	const codec = new FfmpegCodec({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath });
	const processor = new AudioProcessor(staging, codec, config);

	return new AudioSyncPipeline({
		config,
		ledger,
		staging,
		processor,
		connectRemote: async () =>
			new DriveRemoteStore(await authorize(config.tokenPath), { requestTimeoutMs: config.transferTimeoutMs }),
		...progress,
	});
}
