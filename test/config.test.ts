import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_AUDIO_EXTENSIONS, loadConfig, parseConfig } from "../src/config";
import { ConfigError } from "../src/errors";
import { makeTempDir, removeDir, writeFile } from "./helpers";

describe("parseConfig", () => {
	it("fills in defaults", () => {
		const config = parseConfig({});

		expect(config.remoteFolderId).toBe("root");
		expect(config.audioExtensions).toEqual(DEFAULT_AUDIO_EXTENSIONS);
		expect(config.parallelUploads).toBe(5);
		expect(config.retryAttempts).toBe(3);
		expect(config.silenceThresholdDb).toBe(-40);
		expect(config.minSilenceMs).toBe(2000);
		expect(config.targetBitrate).toBe("64k");
		expect(config.retentionDays).toBe(30);
		expect(config.useLedger).toBe(true);
		expect(config.sourcePath).toBeUndefined();
		expect(config.stagingDir).toBe(path.join(os.homedir(), "AudioBackup"));
	});

	it("normalizes extensions and resolves paths", () => {
		const config = parseConfig({ audioExtensions: ["WAV", ".Mp3"], ledgerPath: "data/ledger.db" });

		expect(config.audioExtensions).toEqual([".wav", ".mp3"]);
		expect(config.ledgerPath).toBe(path.resolve("data/ledger.db"));
	});

	it("names every invalid field", () => {
		expect(() => parseConfig({ targetBitrate: "fast", parallelUploads: 0 })).toThrow(ConfigError);
		expect(() => parseConfig({ targetBitrate: "fast" })).toThrow(
			"Invalid configuration: targetBitrate: expected a bitrate such as 64k"
		);
	});
});

describe("loadConfig", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await makeTempDir();
	});

	afterEach(async () => {
		await removeDir(dir);
	});

	it("reads a settings file", async () => {
		const file = await writeFile(path.join(dir, "settings.json"), JSON.stringify({ parallelUploads: 2, volumeLabel: "REC" }));

		const config = await loadConfig(file);

		expect(config.parallelUploads).toBe(2);
		expect(config.volumeLabel).toBe("REC");
	});

	it("falls back to defaults when the file is missing", async () => {
		const config = await loadConfig(path.join(dir, "missing.json"));
		expect(config.parallelUploads).toBe(5);
	});

	it("rejects a file that is not JSON", async () => {
		const file = await writeFile(path.join(dir, "settings.json"), "{ parallelUploads: ");
		await expect(loadConfig(file)).rejects.toThrow(ConfigError);
	});
});
