import * as path from "path";

import { CapacityError, StorageError, errorMessage, isFatalError, isRetryableError } from "../errors";
import { FingerprintLedger } from "../services/ledger";
import { computeFingerprint, describeFile } from "../services/localScanner";
import logger from "../services/logger";
import { FileMeta, RemoteStore, UploadOutcome, UploadProgress, UploadReport, UploadStats } from "../types";
import { RetryExhaustedError, formatSize, isWithin, retryOperation, runWithConcurrencyLimit, withTimeout } from "../utils";

export interface SchedulerOptions {
	parallelUploads: number;
	/** Retries after the first attempt. */
	retryAttempts: number;
	retryDelayMs: number;
	maxRetryDelayMs: number;
	transferTimeoutMs: number;
	maxFileSizeBytes: number;
	preserveFolderStructure: boolean;
	useLedger: boolean;
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
	parallelUploads: 5,
	retryAttempts: 3,
	retryDelayMs: 1000,
	maxRetryDelayMs: 30000,
	transferTimeoutMs: 10 * 60 * 1000,
	maxFileSizeBytes: 500 * 1024 * 1024,
	preserveFolderStructure: true,
	useLedger: true,
};

/** The ledger operations the scheduler relies on. */
export type UploadLedger = Pick<FingerprintLedger, "openSession" | "closeSession" | "recordAttempt" | "isDuplicate">;

export type UploadInput = string | FileMeta;

export interface BatchOptions {
	/** Session that owns the records; one is opened (and closed) when absent. */
	sessionId?: string;
	/** Local root whose structure is mirrored remotely. */
	baseDir?: string;
	signal?: AbortSignal;
	/** Upload even when the content was delivered before. */
	force?: boolean;
	onOutcome?: (outcome: UploadOutcome, stats: UploadStats) => void;
	/** Bytes sent so far for the file being uploaded. */
	onTransferProgress?: (filePath: string, progress: UploadProgress) => void;
}

interface BatchContext {
	sessionId?: string;
	baseDir?: string;
	force: boolean;
	rootFolderId: string;
	folders: Map<string, Promise<string>>;
	/** Per fingerprint, the latest claim; resolves to the outcome that delivered the content, if any. */
	claims: Map<string, Promise<UploadOutcome | undefined>>;
	fatalError?: Error;
	stats: UploadStats;
	onTransferProgress?: BatchOptions["onTransferProgress"];
}

interface TaskResult {
	outcome: UploadOutcome;
	meta?: FileMeta;
}

function emptyStats(): UploadStats {
	return { totalFiles: 0, uploadedFiles: 0, failedFiles: 0, skippedFiles: 0, totalBytes: 0, uploadedBytes: 0 };
}

function inputPath(input: UploadInput): string {
	return typeof input === "string" ? input : input.path;
}

function shouldRetry(error: unknown): boolean {
	return !isFatalError(error) && isRetryableError(error);
}

/**
 * Dedup-aware upload dispatcher over a fixed-width worker pool.
 *
 * Every input ends with exactly one outcome, which is recorded in the ledger
 * before `submitBatch` returns it.
 */
export class UploadScheduler {
	private readonly options: SchedulerOptions;

	constructor(
		private readonly remote: RemoteStore,
		private readonly ledger: UploadLedger | undefined,
		options: Partial<SchedulerOptions> = {}
	) {
		this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...options };
	}

	private get ledgerEnabled(): boolean {
		return this.options.useLedger && this.ledger !== undefined;
	}

	async submitBatch(
		files: readonly UploadInput[],
		destinationFolderId: string,
		options: BatchOptions = {}
	): Promise<UploadReport> {
		const ownsSession = this.ledgerEnabled && !options.sessionId;
		const sessionId =
			this.ledger && this.ledgerEnabled
				? options.sessionId ?? this.ledger.openSession(`upload:${destinationFolderId}`)
				: options.sessionId;

		const ctx: BatchContext = {
			sessionId,
			baseDir: options.baseDir,
			force: options.force ?? false,
			rootFolderId: destinationFolderId,
			folders: new Map(),
			claims: new Map(),
			stats: emptyStats(),
			onTransferProgress: options.onTransferProgress,
		};

		const outcomes: UploadOutcome[] = new Array(files.length);
		const settle = (index: number, outcome: UploadOutcome): void => {
			outcomes[index] = outcome;
			this.account(ctx.stats, outcome);
			options.onOutcome?.(outcome, { ...ctx.stats });
		};

		logger.info(`Uploading ${files.length} file(s) with ${this.options.parallelUploads} parallel worker(s)`);

		const undispatched = await runWithConcurrencyLimit(
			files,
			this.options.parallelUploads,
			async (input, index) => {
				settle(index, await this.runTask(input, ctx));
			},
			() => ctx.fatalError !== undefined || (options.signal?.aborted ?? false)
		);

		for (const index of undispatched) {
			const filePath = inputPath(files[index]);
			const outcome: UploadOutcome = ctx.fatalError
				? { path: filePath, status: "failed", size: 0, error: ctx.fatalError.message, retryCount: 0 }
				: { path: filePath, status: "skipped", size: 0, reason: "cancelled", retryCount: 0 };
			this.recordBestEffort(ctx, { outcome });
			settle(index, outcome);
		}

		if (ownsSession && sessionId && this.ledger && !(ctx.fatalError instanceof StorageError)) {
			this.ledger.closeSession(sessionId, !ctx.fatalError, ctx.fatalError?.message);
		}

		const stats = ctx.stats;
		logger.info(
			`Upload finished: ${stats.uploadedFiles} uploaded, ${stats.skippedFiles} skipped, ${stats.failedFiles} failed (${formatSize(stats.uploadedBytes)})`
		);

		return {
			outcomes,
			stats: { ...stats },
			fatalError: ctx.fatalError,
			cancelled: undispatched.length > 0 && !ctx.fatalError,
		};
	}

	private account(stats: UploadStats, outcome: UploadOutcome): void {
		stats.totalFiles += 1;
		stats.totalBytes += outcome.size;
		if (outcome.status === "success") {
			stats.uploadedFiles += 1;
			stats.uploadedBytes += outcome.size;
		} else if (outcome.status === "failed") {
			stats.failedFiles += 1;
		} else {
			stats.skippedFiles += 1;
		}
	}

	//-------------------------------------------------------
	// [Task]
	//-------------------------------------------------------
	private async runTask(input: UploadInput, ctx: BatchContext): Promise<UploadOutcome> {
		const filePath = inputPath(input);
		try {
			const result = await this.transfer(input, ctx);
			this.record(ctx, result);
			return result.outcome;
		} catch (err) {
			if (isFatalError(err)) {
				if (!ctx.fatalError) {
					ctx.fatalError = err;
					logger.error(`Aborting upload batch: ${err.message}`);
				}
			} else {
				logger.error(`Unexpected error for ${filePath}: ${errorMessage(err)}`);
			}
			const outcome: UploadOutcome = { path: filePath, status: "failed", size: 0, error: errorMessage(err), retryCount: 0 };
			this.recordBestEffort(ctx, { outcome });
			return outcome;
		}
	}

	/**
	 * Runs one file to a terminal outcome. Only run-level errors escape.
	 */
	private async transfer(input: UploadInput, ctx: BatchContext): Promise<TaskResult> {
		const filePath = inputPath(input);
		const name = path.basename(filePath);

		let meta: FileMeta;
		try {
			meta = typeof input === "string" ? await describeFile(filePath, false) : { ...input };
		} catch (err) {
			logger.error(`Cannot read ${filePath}: ${errorMessage(err)}`);
			return { outcome: { path: filePath, status: "failed", size: 0, error: errorMessage(err), retryCount: 0 } };
		}

		if (meta.size > this.options.maxFileSizeBytes) {
			const error = new CapacityError(filePath, meta.size, this.options.maxFileSizeBytes);
			logger.warn(error.message);
			return {
				meta,
				outcome: { path: filePath, status: "skipped", size: meta.size, reason: "capacity", error: error.message, retryCount: 0 },
			};
		}

		let fingerprint: string;
		try {
			fingerprint = meta.fingerprint ?? (await computeFingerprint(filePath));
			meta.fingerprint = fingerprint;
		} catch (err) {
			logger.error(`Cannot fingerprint ${filePath}: ${errorMessage(err)}`);
			return {
				meta,
				outcome: { path: filePath, status: "failed", size: meta.size, error: errorMessage(err), retryCount: 0 },
			};
		}

		if (ctx.force) {
			return { meta, outcome: await this.deliver(meta, fingerprint, ctx) };
		}

		// Inputs sharing content take turns: each claim is installed before waiting
		// on the previous one, and once any of them delivers, the rest skip.
		const earlier = ctx.claims.get(fingerprint);
		let release: (delivered: UploadOutcome | undefined) => void = () => undefined;
		ctx.claims.set(
			fingerprint,
			new Promise<UploadOutcome | undefined>((resolve) => {
				release = resolve;
			})
		);

		let delivered: UploadOutcome | undefined;
		try {
			const prior = earlier ? await earlier : undefined;
			if (prior) {
				delivered = prior;
				logger.info(`Skipping ${name}: same content as ${path.basename(prior.path)}`);
				return { meta, outcome: this.duplicateOutcome(meta, fingerprint, prior.remoteId, prior.remoteFolderId) };
			}
			if (ctx.fatalError) {
				throw ctx.fatalError;
			}

			let outcome: UploadOutcome;
			const recorded = this.ledgerEnabled ? this.ledger?.isDuplicate(fingerprint) : undefined;
			if (recorded) {
				logger.info(`Skipping ${name}: already uploaded (${recorded.remoteId ?? "unknown id"})`);
				outcome = this.duplicateOutcome(meta, fingerprint, recorded.remoteId, recorded.remoteFolderId);
			} else {
				outcome = await this.deliver(meta, fingerprint, ctx);
			}
			if (outcome.status === "success" || outcome.reason === "duplicate") {
				delivered = outcome;
			}
			return { meta, outcome };
		} finally {
			release(delivered);
		}
	}

	private duplicateOutcome(meta: FileMeta, fingerprint: string, remoteId?: string, remoteFolderId?: string): UploadOutcome {
		return {
			path: meta.path,
			status: "skipped",
			size: meta.size,
			fingerprint,
			remoteId,
			remoteFolderId,
			reason: "duplicate",
			retryCount: 0,
		};
	}

	/**
	 * Folder chain, remote existence check and upload, retried as one unit.
	 */
	private async deliver(meta: FileMeta, fingerprint: string, ctx: BatchContext): Promise<UploadOutcome> {
		const name = path.basename(meta.path);
		let retries = 0;

		try {
			const { value } = await retryOperation(
				async () => {
					const folderId = await this.resolveFolderChain(this.remoteFolderParts(meta.path, ctx), ctx);

					if (!ctx.force) {
						const existingId = await this.bounded(
							() => this.remote.findExisting(name, folderId, fingerprint),
							`find ${name}`
						);
						if (existingId) {
							return { remoteId: existingId, folderId, existed: true };
						}
					}

					const remoteId = await this.bounded(
						(signal) =>
							this.remote.upload(meta.path, folderId, {
								signal,
								onProgress: (progress) => ctx.onTransferProgress?.(meta.path, progress),
							}),
						`upload ${name}`
					);
					return { remoteId, folderId, existed: false };
				},
				`upload ${name}`,
				{
					retries: this.options.retryAttempts,
					initialDelayMs: this.options.retryDelayMs,
					maxDelayMs: this.options.maxRetryDelayMs,
					retryIf: shouldRetry,
					onRetry: () => {
						retries += 1;
					},
				}
			);

			if (value.existed) {
				logger.info(`Skipping ${name}: already present remotely`);
				return {
					path: meta.path,
					status: "skipped",
					size: meta.size,
					fingerprint,
					remoteId: value.remoteId,
					remoteFolderId: value.folderId,
					reason: "remote_exists",
					retryCount: retries,
				};
			}

			logger.info(`Uploaded: ${name} (${formatSize(meta.size)})`);
			return {
				path: meta.path,
				status: "success",
				size: meta.size,
				fingerprint,
				remoteId: value.remoteId,
				remoteFolderId: value.folderId,
				retryCount: retries,
			};
		} catch (err) {
			if (isFatalError(err)) {
				throw err;
			}
			const cause = err instanceof RetryExhaustedError ? err.lastError : err;
			logger.error(`Upload failed: ${name} - ${errorMessage(cause)}`);
			return {
				path: meta.path,
				status: "failed",
				size: meta.size,
				fingerprint,
				error: errorMessage(cause),
				retryCount: retries,
			};
		}
	}

	/**
	 * Every remote call is bounded by the transfer timeout; a timeout surfaces as
	 * a TransientIoError and goes through the retry loop like any other.
	 */
	private bounded<T>(operation: (signal: AbortSignal) => Promise<T>, operationName: string): Promise<T> {
		return withTimeout(operation, this.options.transferTimeoutMs, operationName);
	}

	//-------------------------------------------------------
	// [Remote folders]
	//-------------------------------------------------------
	private remoteFolderParts(filePath: string, ctx: BatchContext): string[] {
		if (!this.options.preserveFolderStructure || !ctx.baseDir || !isWithin(ctx.baseDir, filePath)) {
			return [];
		}
		return path
			.relative(ctx.baseDir, path.dirname(filePath))
			.split(path.sep)
			.filter((part) => part !== "" && part !== ".");
	}

	/**
	 * Each folder is looked up or created once per batch. A failed lookup is
	 * forgotten so the next attempt resolves it again.
	 */
	private async resolveFolderChain(parts: readonly string[], ctx: BatchContext): Promise<string> {
		let parentId = ctx.rootFolderId;
		for (const name of parts) {
			const key = `${parentId}/${name}`;
			let pending = ctx.folders.get(key);
			if (!pending) {
				const parent = parentId;
				pending = this.bounded(() => this.remote.findOrCreateFolder(name, parent), `resolve folder ${name}`).catch(
					(err: unknown) => {
						ctx.folders.delete(key);
						throw err;
					}
				);
				ctx.folders.set(key, pending);
			}
			parentId = await pending;
		}
		return parentId;
	}

	//-------------------------------------------------------
	// [Ledger]
	//-------------------------------------------------------
	private record(ctx: BatchContext, result: TaskResult): void {
		if (!this.ledger || !this.ledgerEnabled || !ctx.sessionId) {
			return;
		}
		const { outcome, meta } = result;
		this.ledger.recordAttempt(
			ctx.sessionId,
			{
				path: outcome.path,
				name: path.basename(outcome.path),
				size: outcome.size,
				fingerprint: outcome.fingerprint,
				lastModified: meta?.mtime,
				remoteId: outcome.remoteId,
				remoteFolderId: outcome.remoteFolderId,
				retryCount: outcome.retryCount,
			},
			outcome.status,
			outcome.error ?? (outcome.reason ? `skipped: ${outcome.reason}` : undefined)
		);
	}

	/**
	 * Recording after the batch was aborted. With the ledger itself down there
	 * is nowhere to write, so the outcome is only logged.
	 */
	private recordBestEffort(ctx: BatchContext, result: TaskResult): void {
		if (ctx.fatalError instanceof StorageError) {
			logger.warn(`Ledger unavailable; outcome for ${result.outcome.path} not recorded`);
			return;
		}
		try {
			this.record(ctx, result);
		} catch (err) {
			logger.error(`Could not record outcome for ${result.outcome.path}: ${errorMessage(err)}`);
		}
	}
}
