import { promises as fsp } from "fs";
import * as path from "path";

import { errorMessage } from "../errors";
import { AudioCodec } from "../services/audioCodec";
import logger from "../services/logger";
import { StagingArea } from "../services/staging";
import { RetryExhaustedError, retryOperation, runWithConcurrencyLimit } from "../utils";
import { DEFAULT_TRIM_OPTIONS, TrimOptions, analyzeVoiceActivity, trimSilence } from "./trimmer";

export interface ProcessorOptions extends TrimOptions {
	targetBitrate: string;
	/** Files whose voice share (percent) is below this are not processed. */
	minVoiceRatio: number;
	parallelProcessing: boolean;
	maxParallelJobs: number;
	retryAttempts: number;
	retryDelayMs: number;
}

const DEFAULT_PROCESSOR_OPTIONS: ProcessorOptions = {
	...DEFAULT_TRIM_OPTIONS,
	targetBitrate: "64k",
	minVoiceRatio: 5,
	parallelProcessing: false,
	maxParallelJobs: 2,
	retryAttempts: 3,
	retryDelayMs: 1000,
};

export type ProcessSkipReason = "no_audio" | "low_voice" | "cancelled";

export interface ProcessOutcome {
	rawPath: string;
	status: "processed" | "skipped" | "failed";
	processedPath?: string;
	reason?: ProcessSkipReason;
	error?: string;
	voiceRatio?: number;
	originalDurationMs?: number;
	trimmedDurationMs?: number;
}

export interface ProcessReport {
	outcomes: ProcessOutcome[];
	processed: number;
	skipped: number;
	failed: number;
}

export interface ProcessBatchOptions {
	signal?: AbortSignal;
	onProgress?: (outcome: ProcessOutcome, done: number, total: number) => void;
}

/**
 * Decode → voice check → trim → encode → promote, for files in the raw tree.
 */
export class AudioProcessor {
	private readonly options: ProcessorOptions;

	constructor(
		private readonly staging: StagingArea,
		private readonly codec: AudioCodec,
		options: Partial<ProcessorOptions> = {}
	) {
		this.options = { ...DEFAULT_PROCESSOR_OPTIONS, ...options };
	}

	async processFile(rawPath: string): Promise<ProcessOutcome> {
		const name = path.basename(rawPath);
		logger.info(`Processing: ${name}`);

		const timeline = await this.codec.decode(rawPath);

		const activity = analyzeVoiceActivity(timeline, this.options);
		logger.info(`  Voice ratio: ${activity.voiceRatio.toFixed(1)}%`);
		if (activity.voiceRatio < this.options.minVoiceRatio) {
			logger.warn(`  Too little voice in ${name}; skipping`);
			await this.staging.archiveRejected(rawPath);
			return { rawPath, status: "skipped", reason: "low_voice", voiceRatio: activity.voiceRatio };
		}

		const trimmed = trimSilence(timeline, this.options);
		if (!trimmed) {
			logger.warn(`  No audio detected in ${name}; skipping`);
			await this.staging.archiveRejected(rawPath);
			return { rawPath, status: "skipped", reason: "no_audio", voiceRatio: activity.voiceRatio };
		}

		const scratch = this.staging.scratchPath();
		try {
			await this.codec.encode(trimmed.timeline, scratch, { bitrate: this.options.targetBitrate });
		} catch (err) {
			await fsp.rm(scratch, { force: true });
			throw err;
		}
		const processedPath = await this.staging.promoteToProcessed(rawPath, scratch);

		const kept = trimmed.originalDurationMs > 0 ? (trimmed.trimmedDurationMs / trimmed.originalDurationMs) * 100 : 0;
		logger.info(
			`  ${name}: ${(trimmed.originalDurationMs / 1000).toFixed(1)}s -> ${(trimmed.trimmedDurationMs / 1000).toFixed(1)}s (${kept.toFixed(1)}% kept)`
		);

		return {
			rawPath,
			status: "processed",
			processedPath,
			voiceRatio: activity.voiceRatio,
			originalDurationMs: trimmed.originalDurationMs,
			trimmedDurationMs: trimmed.trimmedDurationMs,
		};
	}

	/**
	 * Processes every file, sequentially or in a bounded pool. A failing file is
	 * retried per the retry policy and then reported; it never stops the batch.
	 */
	async processBatch(rawPaths: readonly string[], options: ProcessBatchOptions = {}): Promise<ProcessReport> {
		const outcomes: ProcessOutcome[] = new Array(rawPaths.length);
		const width = this.options.parallelProcessing ? this.options.maxParallelJobs : 1;
		let done = 0;

		logger.info(`Processing ${rawPaths.length} file(s) (${width} at a time)`);

		const undispatched = await runWithConcurrencyLimit(
			rawPaths,
			width,
			async (rawPath, index) => {
				let outcome: ProcessOutcome;
				try {
					const result = await retryOperation(() => this.processFile(rawPath), `process ${path.basename(rawPath)}`, {
						retries: this.options.retryAttempts,
						initialDelayMs: this.options.retryDelayMs,
					});
					outcome = result.value;
				} catch (err) {
					const cause = err instanceof RetryExhaustedError ? err.lastError : err;
					logger.error(`File processing error: ${rawPath} - ${errorMessage(cause)}`);
					outcome = { rawPath, status: "failed", error: errorMessage(cause) };
				}
				outcomes[index] = outcome;
				done += 1;
				options.onProgress?.(outcome, done, rawPaths.length);
			},
			() => options.signal?.aborted ?? false
		);

		for (const index of undispatched) {
			outcomes[index] = { rawPath: rawPaths[index], status: "skipped", reason: "cancelled" };
		}

		const report: ProcessReport = {
			outcomes,
			processed: outcomes.filter((o) => o.status === "processed").length,
			skipped: outcomes.filter((o) => o.status === "skipped").length,
			failed: outcomes.filter((o) => o.status === "failed").length,
		};
		logger.info(`Processing finished: ${report.processed} processed, ${report.skipped} skipped, ${report.failed} failed`);
		return report;
	}
}
