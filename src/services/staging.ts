import { randomBytes } from "crypto";
import * as fs from "fs";
import { promises as fsp } from "fs";
import * as path from "path";
import { pipeline } from "stream/promises";

import { DEFAULT_AUDIO_EXTENSIONS, DEFAULT_EXCLUDE_FOLDERS } from "../config";
import { IntegrityError, errorMessage } from "../errors";
import { FileMeta, ReclaimResult, UsageReport } from "../types";
import { dateStamp, formatSize, isWithin } from "../utils";
import { computeFingerprint, describeFile, listFiles, patternsForExtensions, scanAudioFiles } from "./localScanner";
import logger from "./logger";

export const COPY_BUFFER_SIZE = 1024 * 1024;
export const PROCESSED_EXTENSION = ".mp3";

const TEMP_FOLDER = ".staging-tmp";

export interface StagingOptions {
	baseDir: string;
	audioExtensions?: readonly string[];
	excludeFolders?: readonly string[];
	verifyCopy?: boolean;
	bufferSize?: number;
	maxStorageBytes?: number;
	now?: () => Date;
}

export interface StageFailure {
	path: string;
	error: string;
}

export interface StageResult {
	/** Raw paths now present in the staging area, copied or already there. */
	staged: string[];
	copied: number;
	skipped: number;
	failed: StageFailure[];
}

/** Anything that can narrow a candidate list to files still needing upload. */
export interface SyncSelector {
	selectFilesNeedingSync<T extends FileMeta>(candidates: readonly T[]): T[];
}

function errnoCode(err: unknown): string | undefined {
	return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

async function statOrUndefined(filePath: string): Promise<fs.Stats | undefined> {
	try {
		return await fsp.stat(filePath);
	} catch (err) {
		if (errnoCode(err) === "ENOENT") {
			return undefined;
		}
		throw err;
	}
}

/**
 * Rename, falling back to copy-then-unlink when source and destination are on
 * different devices.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
	await fsp.mkdir(path.dirname(destination), { recursive: true });
	try {
		await fsp.rename(source, destination);
	} catch (err) {
		if (errnoCode(err) !== "EXDEV") {
			throw err;
		}
		await fsp.copyFile(source, destination);
		await fsp.unlink(source);
	}
}

/**
 * Local staging area with three trees:
 *
 *   raw/YYYYMMDD/<relative path>   copied from the source, untouched
 *   processed/YYYYMMDD/<relative>.mp3  trimmed and encoded
 *   archive/YYYYMMDD/<relative>    raw originals kept for the retention window
 *
 * A file is never absent from all three trees while it moves between them.
 */
export class StagingArea {
	public readonly baseDir: string;
	public readonly rawDir: string;
	public readonly processedDir: string;
	public readonly archiveDir: string;
	public readonly tempDir: string;

	private readonly audioExtensions: readonly string[];
	private readonly excludeFolders: readonly string[];
	private readonly verify: boolean;
	private readonly bufferSize: number;
	private readonly maxStorageBytes: number;
	private readonly now: () => Date;

	constructor(options: StagingOptions) {
		this.baseDir = options.baseDir;
		this.rawDir = path.join(this.baseDir, "raw");
		this.processedDir = path.join(this.baseDir, "processed");
		this.archiveDir = path.join(this.baseDir, "archive");
		this.tempDir = path.join(this.baseDir, TEMP_FOLDER);

		this.audioExtensions = options.audioExtensions ?? DEFAULT_AUDIO_EXTENSIONS;
		this.excludeFolders = options.excludeFolders ?? DEFAULT_EXCLUDE_FOLDERS;
		this.verify = options.verifyCopy ?? true;
		this.bufferSize = options.bufferSize ?? COPY_BUFFER_SIZE;
		this.maxStorageBytes = options.maxStorageBytes ?? 100 * 1024 * 1024 * 1024;
		this.now = options.now ?? (() => new Date());
	}

	async init(): Promise<void> {
		for (const dir of [this.rawDir, this.processedDir, this.archiveDir, this.tempDir]) {
			await fsp.mkdir(dir, { recursive: true });
		}
		logger.debug(`Staging area ready at ${this.baseDir}`);
	}

	//-------------------------------------------------------
	// [Path mapping]
	//-------------------------------------------------------
	private relativeToRaw(rawPath: string): string {
		if (!isWithin(this.rawDir, rawPath)) {
			throw new Error(`${rawPath} is not inside ${this.rawDir}`);
		}
		return path.relative(this.rawDir, rawPath);
	}

	/**
	 * The processed file keeps the raw name, extension included (`take.wav` ->
	 * `take.wav.mp3`), so recordings that differ only by format never share an output.
	 */
	processedPathFor(rawPath: string): string {
		return path.join(this.processedDir, `${this.relativeToRaw(rawPath)}${PROCESSED_EXTENSION}`);
	}

	archivePathFor(rawPath: string): string {
		return path.join(this.archiveDir, this.relativeToRaw(rawPath));
	}

	/** A fresh scratch path for encoder output; promoteToProcessed moves it into place. */
	scratchPath(extension = PROCESSED_EXTENSION): string {
		return path.join(this.tempDir, `${randomBytes(8).toString("hex")}${extension}`);
	}

	//-------------------------------------------------------
	// [Staging]
	//-------------------------------------------------------
	/**
	 * Copies every matching file under `sourceRoot` into today's raw folder,
	 * keeping its relative path. Failures are per file.
	 */
	async stageFromSource(sourceRoot: string, patterns?: readonly string[]): Promise<StageResult> {
		await this.init();

		const found = await scanAudioFiles(sourceRoot, patterns ?? patternsForExtensions(this.audioExtensions), {
			excludeFolders: this.excludeFolders,
			withFingerprint: false,
		});
		const dayFolder = dateStamp(this.now());
		const result: StageResult = { staged: [], copied: 0, skipped: 0, failed: [] };

		logger.info(`Staging ${found.length} file(s) from ${sourceRoot}`);

		for (const file of found) {
			const source = file.path;
			const relativePath = path.relative(sourceRoot, source);
			const destination = path.join(this.rawDir, dayFolder, relativePath);

			try {
				const existing = await statOrUndefined(destination);
				if (existing && existing.size === file.size) {
					logger.debug(`Already staged: ${relativePath}`);
					result.staged.push(destination);
					result.skipped += 1;
					continue;
				}

				const archived = await statOrUndefined(this.archivePathFor(destination));
				if (archived && archived.size === file.size) {
					logger.debug(`Already processed and archived: ${relativePath}`);
					result.skipped += 1;
					continue;
				}

				await this.copyFile(source, destination);
				if (this.verify && !(await this.verifyCopy(source, destination))) {
					throw new IntegrityError(source, destination);
				}

				result.staged.push(destination);
				result.copied += 1;
				logger.info(`Staged: ${relativePath} (${formatSize(file.size)})`);
			} catch (err) {
				logger.error(`Failed to stage ${source}: ${errorMessage(err)}`);
				result.failed.push({ path: source, error: errorMessage(err) });
			}
		}

		logger.info(
			`Staging finished: ${result.copied} copied, ${result.skipped} already present, ${result.failed.length} failed`
		);
		return result;
	}

	/**
	 * Streams through a bounded buffer into a `.partial` file, renamed into place
	 * once complete. No partial file survives a failure.
	 */
	private async copyFile(source: string, destination: string): Promise<void> {
		await fsp.mkdir(path.dirname(destination), { recursive: true });
		const partial = `${destination}.partial`;
		try {
			await pipeline(
				fs.createReadStream(source, { highWaterMark: this.bufferSize }),
				fs.createWriteStream(partial, { highWaterMark: this.bufferSize })
			);
			await fsp.rename(partial, destination);
		} catch (err) {
			await fsp.rm(partial, { force: true });
			throw err;
		}
	}

	/**
	 * True when both files have the same fingerprint. Otherwise the destination
	 * is deleted.
	 */
	async verifyCopy(source: string, destination: string): Promise<boolean> {
		try {
			const [sourceHash, destinationHash] = await Promise.all([
				computeFingerprint(source),
				computeFingerprint(destination),
			]);
			if (sourceHash === destinationHash) {
				return true;
			}
			logger.error(`Checksum mismatch: ${source} (${sourceHash}) != ${destination} (${destinationHash})`);
		} catch (err) {
			logger.error(`Verification failed for ${destination}: ${errorMessage(err)}`);
		}

		await fsp.rm(destination, { force: true });
		return false;
	}

	//-------------------------------------------------------
	// [Processing transitions]
	//-------------------------------------------------------
	/**
	 * Moves the encoder output into the processed tree and the raw original into
	 * the archive tree. The output is parked in the scratch folder first, so a
	 * failed archive move leaves the raw file where it was.
	 */
	async promoteToProcessed(rawPath: string, outputPath: string): Promise<string> {
		const processedPath = this.processedPathFor(rawPath);
		const archivePath = this.archivePathFor(rawPath);

		let parked = outputPath;
		if (path.dirname(outputPath) !== this.tempDir) {
			parked = this.scratchPath(path.extname(outputPath));
			await moveFile(outputPath, parked);
		}

		try {
			await moveFile(rawPath, archivePath);
		} catch (err) {
			await fsp.rm(parked, { force: true });
			throw err;
		}

		// Retention counts from the moment of archiving.
		const archivedAt = this.now();
		await fsp.utimes(archivePath, archivedAt, archivedAt);

		await moveFile(parked, processedPath);
		logger.debug(`Promoted ${rawPath} -> ${processedPath}`);
		return processedPath;
	}

	/**
	 * Archives a raw file that yielded no output (silent recordings), so it is
	 * not picked up for processing again.
	 */
	async archiveRejected(rawPath: string): Promise<string> {
		const archivePath = this.archivePathFor(rawPath);
		await moveFile(rawPath, archivePath);
		const archivedAt = this.now();
		await fsp.utimes(archivePath, archivedAt, archivedAt);
		logger.debug(`Archived without output: ${rawPath}`);
		return archivePath;
	}

	/**
	 * Raw files with no processed counterpart.
	 */
	async listUnprocessed(): Promise<string[]> {
		const rawFiles = await this.listTree(this.rawDir, patternsForExtensions(this.audioExtensions));
		const unprocessed: string[] = [];
		for (const rawPath of rawFiles) {
			if (!(await statOrUndefined(this.processedPathFor(rawPath)))) {
				unprocessed.push(rawPath);
			}
		}
		return unprocessed;
	}

	/**
	 * Processed files the ledger has not confirmed as delivered. Without a
	 * selector every processed file is returned.
	 */
	async listPendingUpload(selector?: SyncSelector): Promise<FileMeta[]> {
		const processedFiles = await this.listTree(this.processedDir, [`**/*${PROCESSED_EXTENSION}`]);
		const candidates: FileMeta[] = [];
		for (const filePath of processedFiles) {
			try {
				candidates.push(await describeFile(filePath));
			} catch (err) {
				logger.error(`Cannot read processed file ${filePath}: ${errorMessage(err)}`);
			}
		}
		return selector ? selector.selectFilesNeedingSync(candidates) : candidates;
	}

	//-------------------------------------------------------
	// [Retention and usage]
	//-------------------------------------------------------
	/**
	 * Deletes archived originals older than `retentionMs`. Only the archive
	 * tree is touched.
	 */
	async reclaimExpired(retentionMs: number): Promise<ReclaimResult> {
		const cutoff = this.now().getTime() - retentionMs;
		const result: ReclaimResult = { filesRemoved: 0, bytesRemoved: 0 };

		for (const filePath of await this.listTree(this.archiveDir, ["**/*"])) {
			try {
				const stat = await fsp.stat(filePath);
				if (stat.mtimeMs < cutoff) {
					await fsp.unlink(filePath);
					result.filesRemoved += 1;
					result.bytesRemoved += stat.size;
					logger.debug(`Removed expired archive file: ${filePath}`);
				}
			} catch (err) {
				logger.error(`Error removing ${filePath}: ${errorMessage(err)}`);
			}
		}

		await this.removeEmptyFolders(this.archiveDir);
		if (result.filesRemoved > 0) {
			logger.info(`Cleaned up ${result.filesRemoved} archived file(s) (${formatSize(result.bytesRemoved)})`);
		}
		return result;
	}

	async usageReport(): Promise<UsageReport> {
		const rawBytes = await this.folderBytes(this.rawDir);
		const processedBytes = await this.folderBytes(this.processedDir);
		const archiveBytes = await this.folderBytes(this.archiveDir);
		const totalBytes = rawBytes + processedBytes + archiveBytes;

		await fsp.mkdir(this.baseDir, { recursive: true });
		const disk = await fsp.statfs(this.baseDir);

		return {
			rawBytes,
			processedBytes,
			archiveBytes,
			totalBytes,
			maxStorageBytes: this.maxStorageBytes,
			usagePercent: this.maxStorageBytes > 0 ? (totalBytes / this.maxStorageBytes) * 100 : 0,
			diskFreeBytes: disk.bavail * disk.bsize,
			diskTotalBytes: disk.blocks * disk.bsize,
		};
	}

	//-------------------------------------------------------
	// [Helpers]
	//-------------------------------------------------------
	private async listTree(dir: string, patterns: readonly string[]): Promise<string[]> {
		if (!(await statOrUndefined(dir))) {
			return [];
		}
		const relativePaths = await listFiles(dir, patterns);
		return relativePaths.map((relativePath) => path.join(dir, relativePath));
	}

	private async folderBytes(dir: string): Promise<number> {
		let total = 0;
		for (const filePath of await this.listTree(dir, ["**/*"])) {
			const stat = await statOrUndefined(filePath);
			total += stat?.size ?? 0;
		}
		return total;
	}

	private async removeEmptyFolders(dir: string): Promise<void> {
		if (!(await statOrUndefined(dir))) {
			return;
		}
		const entries = await fsp.readdir(dir, { withFileTypes: true });
		for (const entry of entries) {
			if (!entry.isDirectory()) {
				continue;
			}
			const child = path.join(dir, entry.name);
			await this.removeEmptyFolders(child);
			if ((await fsp.readdir(child)).length === 0) {
				await fsp.rmdir(child);
			}
		}
	}
}
