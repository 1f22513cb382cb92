import { promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";

import { ConfigError } from "./errors";
import logger from "./services/logger";
import { resolvePath } from "./utils";

export const CONFIG_PATH = path.join(process.cwd(), "config/settings.json");

export const DEFAULT_AUDIO_EXTENSIONS = [".mp3", ".wav", ".m4a", ".aac", ".flac", ".ogg"];

export const DEFAULT_EXCLUDE_FOLDERS = [".Spotlight-V100", ".Trashes", "System Volume Information", "$RECYCLE.BIN"];

function defaultMountRoot(): string {
	return process.platform === "darwin" ? "/Volumes" : "/media";
}

const extension = z
	.string()
	.min(1)
	.transform((value) => (value.startsWith(".") ? value : `.${value}`).toLowerCase());

const ConfigSchema = z.object({
	sourcePath: z.string().optional(),
	stagingDir: z.string().default("~/AudioBackup"),
	ledgerPath: z.string().default("config/sync_history.db"),
	tokenPath: z.string().default("config/credentials/token.json"),
	remoteFolderId: z.string().min(1).default("root"),
	datedRemoteFolders: z.boolean().default(false),

	audioExtensions: z.array(extension).min(1).default(DEFAULT_AUDIO_EXTENSIONS),
	excludeFolders: z.array(z.string()).default(DEFAULT_EXCLUDE_FOLDERS),
	maxFileSizeMb: z.number().positive().default(500),
	verifyCopy: z.boolean().default(true),

	silenceThresholdDb: z.number().max(0).default(-40),
	minSilenceMs: z.number().int().positive().default(2000),
	marginMs: z.number().int().nonnegative().default(100),
	seekStepMs: z.number().int().positive().default(10),
	targetSampleRate: z.number().int().positive().default(16000),
	targetBitrate: z
		.string()
		.regex(/^\d+k$/, "expected a bitrate such as 64k")
		.default("64k"),
	targetLoudnessDb: z.number().max(0).default(-20),
	minVoiceRatio: z.number().min(0).max(100).default(5),
	autoProcess: z.boolean().default(true),
	parallelProcessing: z.boolean().default(false),
	maxParallelJobs: z.number().int().positive().default(2),
	ffmpegPath: z.string().default("ffmpeg"),
	ffprobePath: z.string().default("ffprobe"),

	parallelUploads: z.number().int().positive().default(5),
	retryAttempts: z.number().int().nonnegative().default(3),
	retryDelayMs: z.number().int().nonnegative().default(1000),
	transferTimeoutMs: z.number().int().positive().default(10 * 60 * 1000),
	preserveFolderStructure: z.boolean().default(true),
	useLedger: z.boolean().default(true),

	retentionDays: z.number().nonnegative().default(30),
	ledgerRetentionDays: z.number().positive().default(90),
	maxStorageGb: z.number().positive().default(100),
	autoCleanup: z.boolean().default(true),

	mountRoot: z.string().default(defaultMountRoot()),
	volumeLabel: z.string().optional(),
	watchDebounceMs: z.number().int().nonnegative().default(2000),

	logDir: z.string().default("logs"),
	logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
});

export type Config = z.infer<typeof ConfigSchema>;

const PATH_KEYS = ["sourcePath", "stagingDir", "ledgerPath", "tokenPath", "mountRoot", "logDir"] as const;

/**
 * Validates a raw settings object, filling in defaults and expanding `~` in paths.
 */
export function parseConfig(raw: unknown): Config {
	const result = ConfigSchema.safeParse(raw ?? {});
	if (!result.success) {
		const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
		throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { issues });
	}

	const config = result.data;
	for (const key of PATH_KEYS) {
		const value = config[key];
		if (value !== undefined) {
			config[key] = resolvePath(value);
		}
	}

	if (typeof raw === "object" && raw !== null) {
		const unknownKeys = Object.keys(raw).filter((key) => !(key in ConfigSchema.shape));
		if (unknownKeys.length > 0) {
			logger.warn(`Ignoring unrecognized config keys: ${unknownKeys.join(", ")}`);
		}
	}

	return config;
}

export function defaultConfig(): Config {
	return parseConfig({});
}

export async function loadConfig(configPath: string = CONFIG_PATH): Promise<Config> {
	let content: string;
	try {
		content = await fs.readFile(configPath, "utf8");
	} catch (err) {
		logger.warn(`No config found at ${configPath} or error reading it. Using default settings.`);
		return defaultConfig();
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (err) {
		throw new ConfigError(`Config file ${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
	}
	return parseConfig(raw);
}
