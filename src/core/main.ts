#!/usr/bin/env node
import { Command } from "commander";
import * as path from "path";

import { CONFIG_PATH, Config, loadConfig } from "../config";
import { AuthenticationError, ConfigError, StorageError, errorMessage } from "../errors";
import logger, { attachUiTransport, configureLogger } from "../services/logger";
import { ui } from "../ui/console";
import { formatSize } from "../utils";
import { AudioSyncPipeline, RunReport, createPipeline } from "./sync";
import { findMountedTarget, watchMounts } from "./watcher";

export type Pipeline = Pick<
	AudioSyncPipeline,
	"run" | "processOnly" | "uploadOnly" | "status" | "cleanup" | "history" | "duplicates" | "exportHistory" | "close"
>;

export interface Interrupt {
	/** Aborted when the user asks the command to stop. */
	signal: AbortSignal;
	dispose(): void;
}

export interface CliDeps {
	loadConfig: (configPath: string) => Promise<Config>;
	createPipeline: (config: Config, interactive: boolean) => Pipeline;
	print: (line: string) => void;
	/** One per command; stops new work on Ctrl+C while in-flight files finish and are recorded. */
	interrupt: () => Interrupt;
	interactive: boolean;
}

function processInterrupt(): Interrupt {
	const controller = new AbortController();
	const onSignal = (signal: NodeJS.Signals) => {
		logger.warn(`${signal} received; finishing in-flight files before exiting`);
		controller.abort();
	};
	process.once("SIGINT", onSignal);
	process.once("SIGTERM", onSignal);
	return {
		signal: controller.signal,
		dispose: () => {
			process.off("SIGINT", onSignal);
			process.off("SIGTERM", onSignal);
		},
	};
}

const defaultDeps: CliDeps = {
	loadConfig,
	createPipeline: (config, interactive) =>
		createPipeline(
			config,
			interactive
				? {
						onUploadProgress: (stats, total) => ui.updateProgress(stats, total),
						onTransferProgress: (filePath, progress) =>
							ui.updateStatus(
								`Uploading ${path.basename(filePath)}: ${formatSize(progress.bytesSent)} / ${formatSize(progress.totalBytes)}`
							),
					}
				: {}
		),
	print: (line) => console.log(line),
	interrupt: processInterrupt,
	interactive: Boolean(process.stdout.isTTY),
};

function untilAborted(signal: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal.aborted) {
			resolve();
			return;
		}
		signal.addEventListener("abort", () => resolve(), { once: true });
	});
}

function printRunReport(print: (line: string) => void, report: RunReport): void {
	const { stats } = report.upload;
	print(`Session: ${report.sessionId}`);
	if (report.staged) {
		print(`Staged: ${report.staged.copied} copied, ${report.staged.skipped} already present, ${report.staged.failed.length} failed`);
	}
	if (report.processed) {
		print(
			`Processed: ${report.processed.processed} processed, ${report.processed.skipped} skipped, ${report.processed.failed} failed`
		);
	}
	print(
		`Uploaded: ${stats.uploadedFiles}/${stats.totalFiles} (${formatSize(stats.uploadedBytes)}), ` +
			`${stats.skippedFiles} skipped, ${stats.failedFiles} failed`
	);
	if (report.upload.cancelled) {
		print("Interrupted: the remaining files are left for the next run");
	}
}

/**
 * The CLI. Each command loads the config, opens the pipeline and closes it
 * again when done.
 */
export function buildProgram(deps: CliDeps = defaultDeps): Command {
	const program = new Command();
	const { print } = deps;

	program
		.name("audio-drive-sync")
		.description("Stage, trim and upload audio recordings from removable media to Google Drive")
		.version("1.0.0")
		.option("-c, --config <path>", "path to the JSON settings file", CONFIG_PATH);

	async function withPipeline<T>(
		interactive: boolean,
		action: (pipeline: Pipeline, config: Config, signal: AbortSignal) => Promise<T>
	): Promise<T> {
		const config = await deps.loadConfig(program.opts<{ config: string }>().config);
		configureLogger({ logDir: config.logDir, level: config.logLevel });

		const useUi = interactive && deps.interactive;
		if (useUi) {
			attachUiTransport(ui);
			ui.start();
		}

		const pipeline = deps.createPipeline(config, useUi);
		const interrupt = deps.interrupt();
		try {
			return await action(pipeline, config, interrupt.signal);
		} finally {
			interrupt.dispose();
			pipeline.close();
			if (useUi) {
				ui.stop();
			}
		}
	}

	program
		.command("run")
		.description("stage, process and upload everything from a source folder")
		.option("-s, --source <path>", "source folder (defaults to sourcePath in the config)")
		.action(async (options: { source?: string }) => {
			await withPipeline(true, async (pipeline, _config, signal) => {
				printRunReport(print, await pipeline.run(options.source, { signal }));
			});
		});

	program
		.command("monitor")
		.description("wait for volumes to be mounted and sync each one")
		.action(async () => {
			await withPipeline(true, async (pipeline, config, signal) => {
				const mounted = await findMountedTarget(config.mountRoot, config.volumeLabel);
				if (mounted && !signal.aborted) {
					logger.info(`Target volume already mounted: ${mounted}`);
					printRunReport(print, await pipeline.run(mounted, { signal }));
				}
				if (signal.aborted) {
					return;
				}

				logger.info(`Watching ${config.mountRoot} for volumes (Ctrl+C to stop)`);
				ui.updateStatus(`Waiting for a volume under ${config.mountRoot}`);
				const watcher = watchMounts(
					config.mountRoot,
					async (volumePath) => {
						if (!signal.aborted) {
							printRunReport(print, await pipeline.run(volumePath, { signal }));
						}
					},
					{ identifier: config.volumeLabel, debounceMs: config.watchDebounceMs }
				);
				await untilAborted(signal);
				await watcher.close();
			});
		});

	program
		.command("process")
		.description("process staged files without uploading")
		.action(async () => {
			await withPipeline(true, async (pipeline, _config, signal) => {
				const report = await pipeline.processOnly({ signal });
				print(`Processed: ${report.processed} processed, ${report.skipped} skipped, ${report.failed} failed`);
			});
		});

	program
		.command("upload")
		.description("upload processed files only")
		.option("-f, --force", "upload even content that was uploaded before")
		.action(async (options: { force?: boolean }) => {
			await withPipeline(true, async (pipeline, _config, signal) => {
				printRunReport(print, await pipeline.uploadOnly({ force: options.force, signal }));
			});
		});

	program
		.command("status")
		.description("show staging usage and sync statistics")
		.action(async () => {
			await withPipeline(false, async (pipeline) => {
				const status = await pipeline.status();
				const { usage, stats } = status;
				print("Storage:");
				print(`  raw:       ${formatSize(usage.rawBytes)}`);
				print(`  processed: ${formatSize(usage.processedBytes)}`);
				print(`  archive:   ${formatSize(usage.archiveBytes)}`);
				print(`  total:     ${formatSize(usage.totalBytes)} (${usage.usagePercent.toFixed(1)}% of ${formatSize(usage.maxStorageBytes)})`);
				print(`  disk free: ${formatSize(usage.diskFreeBytes)} of ${formatSize(usage.diskTotalBytes)}`);
				print(`Waiting for processing: ${status.unprocessedFiles}`);
				print(`Waiting for upload: ${status.pendingUploads}`);
				print("Sync statistics:");
				print(`  files synced: ${stats.totalFilesSynced} (${formatSize(stats.totalBytesSynced)}), unique: ${stats.uniqueFiles}`);
				print(`  today: ${stats.filesToday} (${formatSize(stats.bytesToday)}), failed: ${stats.failedToday}`);
				print(`  errors in the last 7 days: ${stats.recentErrors}`);
				for (const ext of stats.byExtension) {
					print(`  ${ext.extension}: ${ext.count} (${formatSize(ext.totalSize)})`);
				}
			});
		});

	program
		.command("cleanup")
		.description("delete expired archive files and old ledger history")
		.action(async () => {
			await withPipeline(false, async (pipeline) => {
				const { archive, ledger } = await pipeline.cleanup();
				print(`Archive: ${archive.filesRemoved} file(s) removed (${formatSize(archive.bytesRemoved)})`);
				print(`Ledger: ${ledger.sessionsDeleted} session(s), ${ledger.recordsDeleted} record(s) deleted`);
			});
		});

	program
		.command("history")
		.description("list recent sync sessions")
		.option("-n, --limit <count>", "number of sessions", "10")
		.action(async (options: { limit: string }) => {
			const limit = Number.parseInt(options.limit, 10);
			if (!Number.isInteger(limit) || limit <= 0) {
				throw new ConfigError(`--limit must be a positive integer, got "${options.limit}"`);
			}
			await withPipeline(false, async (pipeline) => {
				for (const session of pipeline.history(limit)) {
					print(
						`${session.sessionId}  ${session.status.padEnd(11)}  ${session.startTime.toISOString()}  ` +
							`${session.syncedFiles}/${session.totalFiles} synced, ${session.failedFiles} failed  ${session.sourcePath}`
					);
				}
			});
		});

	program
		.command("duplicates")
		.description("list content that was uploaded more than once")
		.action(async () => {
			await withPipeline(false, async (pipeline) => {
				const groups = pipeline.duplicates();
				if (groups.length === 0) {
					print("No duplicates found");
				}
				for (const group of groups) {
					print(`${group.fingerprint}  x${group.duplicateCount}  ${formatSize(group.totalSize)}  ${group.fileNames.join(", ")}`);
				}
			});
		});

	program
		.command("export")
		.description("write the sync history as JSON")
		.argument("<file>", "output file")
		.option("--session <id>", "only this session")
		.action(async (file: string, options: { session?: string }) => {
			await withPipeline(false, async (pipeline) => {
				const count = await pipeline.exportHistory(file, options.session);
				print(`Exported ${count} record(s) to ${file}`);
			});
		});

	return program;
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function main(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
	const program = buildProgram(deps);
	try {
		await program.parseAsync(argv);
		return 0;
	} catch (err) {
		if (err instanceof ConfigError || err instanceof StorageError || err instanceof AuthenticationError) {
			logger.error(`${err.name}: ${err.message}`);
			console.error(`Error: ${err.message}`);
		} else {
			logger.error(`Unexpected error: ${errorMessage(err)}`);
			console.error(err);
		}
		return 1;
	}
}

if (require.main === module) {
	main(process.argv).then(
		(code) => {
			process.exitCode = code;
		},
		(err: unknown) => {
			console.error(err);
			process.exitCode = 1;
		}
	);
}
