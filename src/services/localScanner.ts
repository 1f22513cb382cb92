import { promises as fs } from "fs";
import * as path from "path";
import { createHash } from "crypto";
import { createReadStream } from "fs";
import fg from "fast-glob";

import { DEFAULT_AUDIO_EXTENSIONS } from "../config";
import { FileMeta } from "../types";
import logger from "./logger";

export const FINGERPRINT_ALGORITHM = "md5";

/**
 * Streams the file through the digest, so memory use does not depend on file size.
 */
export async function computeFingerprint(filePath: string): Promise<string> {
	return new Promise((resolve, reject) => {
		const hash = createHash(FINGERPRINT_ALGORITHM);
		const stream = createReadStream(filePath);
		stream.on("data", (data) => hash.update(data));
		stream.on("end", () => resolve(hash.digest("hex")));
		stream.on("error", (err) => reject(err));
	});
}

export async function describeFile(filePath: string, withFingerprint = true): Promise<FileMeta> {
	const stat = await fs.stat(filePath);
	return {
		path: filePath,
		name: path.basename(filePath),
		size: stat.size,
		mtime: stat.mtime.toISOString(),
		fingerprint: withFingerprint ? await computeFingerprint(filePath) : undefined,
	};
}

/**
 * Glob patterns for a list of extensions: `[".mp3"]` -> `["**\/*.mp3"]`.
 */
export function patternsForExtensions(extensions: readonly string[] = DEFAULT_AUDIO_EXTENSIONS): string[] {
	return extensions.map((ext) => `**/*${ext.startsWith(".") ? ext : `.${ext}`}`);
}

/**
 * Bare file patterns (`*.wav`) match at any depth, the way a recursive glob would.
 */
export function normalizePatterns(patterns: readonly string[]): string[] {
	return patterns.map((pattern) => (pattern.includes("/") ? pattern : `**/${pattern}`));
}

export interface ListFilesOptions {
	excludeFolders?: readonly string[];
}

/**
 * Relative paths (POSIX separators) of every file under `root` matching `patterns`.
 * Matching ignores case; excluded folder names are skipped at any depth.
 */
export async function listFiles(
	root: string,
	patterns: readonly string[] = patternsForExtensions(),
	options: ListFilesOptions = {}
): Promise<string[]> {
	const ignore = (options.excludeFolders ?? []).map((folder) => `**/${fg.escapePath(folder)}/**`);
	const entries = await fg(normalizePatterns(patterns), {
		cwd: root,
		onlyFiles: true,
		caseSensitiveMatch: false,
		followSymbolicLinks: false,
		unique: true,
		ignore,
	});
	entries.sort();
	logger.debug(`Found ${entries.length} file(s) under ${root}`);
	return entries;
}

export interface ScanOptions extends ListFilesOptions {
	maxFileSizeBytes?: number;
	withFingerprint?: boolean;
}

/**
 * Audio files under `root`, with size and (optionally) fingerprint. Empty and
 * oversize files are left out with a warning; unreadable files are logged and skipped.
 */
export async function scanAudioFiles(
	root: string,
	patterns: readonly string[] = patternsForExtensions(),
	options: ScanOptions = {}
): Promise<FileMeta[]> {
	try {
		await fs.access(root);
	} catch (err) {
		logger.error(`Path does not exist: ${root}`);
		return [];
	}

	logger.info(`Scanning for audio files in: ${root}`);
	const relativePaths = await listFiles(root, patterns, options);
	const files: FileMeta[] = [];

	for (const relativePath of relativePaths) {
		const fullPath = path.join(root, relativePath);
		try {
			const meta = await describeFile(fullPath, false);
			if (meta.size === 0) {
				logger.warn(`Empty file: ${fullPath}`);
				continue;
			}
			if (options.maxFileSizeBytes !== undefined && meta.size > options.maxFileSizeBytes) {
				logger.warn(`File too large (${(meta.size / 1024 / 1024).toFixed(2)}MB): ${fullPath}`);
				continue;
			}
			if (options.withFingerprint !== false) {
				meta.fingerprint = await computeFingerprint(fullPath);
			}
			files.push(meta);
		} catch (err) {
			logger.error(`Error reading ${fullPath}: ${err instanceof Error ? err.message : String(err)}`);
		}
	}

	logger.info(`Found ${files.length} audio file(s)`);
	return files;
}
