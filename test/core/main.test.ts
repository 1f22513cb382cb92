import { promises as fs } from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { Config, parseConfig } from "../../src/config";
import { CliDeps, main } from "../../src/core/main";
import { AudioProcessor } from "../../src/core/processor";
import { AudioSyncPipeline } from "../../src/core/sync";
import { FingerprintLedger } from "../../src/services/ledger";
import { StagingArea } from "../../src/services/staging";
import { FakeCodec, FakeRemoteStore, makeTempDir, removeDir, writeFile } from "../helpers";

describe("main", () => {
	let dir: string;
	let lines: string[];
	let remote: FakeRemoteStore;
	let deps: CliDeps;
	let interrupt: AbortController;
	let stopAfterFirstUpload: boolean;

	function argv(...args: string[]): string[] {
		return ["node", "audio-drive-sync", ...args];
	}

	beforeEach(async () => {
		dir = await makeTempDir();
		lines = [];
		remote = new FakeRemoteStore();
		interrupt = new AbortController();
		stopAfterFirstUpload = false;
		vi.spyOn(console, "error").mockImplementation(() => undefined);

		deps = {
			loadConfig: async () =>
				parseConfig({
					stagingDir: path.join(dir, "staging"),
					ledgerPath: path.join(dir, "ledger.db"),
					remoteFolderId: "root-folder",
					retryDelayMs: 0,
					parallelUploads: 1,
					targetSampleRate: 1000,
					minSilenceMs: 500,
					mountRoot: path.join(dir, "volumes"),
					volumeLabel: "RECORDER",
				}),
			createPipeline: (config: Config) => {
				const staging = new StagingArea({ baseDir: config.stagingDir });
				return new AudioSyncPipeline({
					config,
					ledger: FingerprintLedger.open(config.ledgerPath),
					staging,
					processor: new AudioProcessor(staging, new FakeCodec(), config),
					connectRemote: async () => remote,
					onUploadProgress: () => {
						if (stopAfterFirstUpload) {
							interrupt.abort();
						}
					},
				});
			},
			print: (line) => lines.push(line),
			interrupt: () => ({ signal: interrupt.signal, dispose: () => undefined }),
			interactive: false,
		};
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await removeDir(dir);
	});

	it("uploads processed files and prints a summary", async () => {
		await writeFile(path.join(dir, "staging", "processed", "20260302", "a.mp3"), "one");
		await writeFile(path.join(dir, "staging", "processed", "20260302", "b.mp3"), "two");

		expect(await main(argv("upload"), deps)).toBe(0);

		expect(lines[0]).toMatch(/^Session: session_\d{8}_\d{6}_[0-9a-f]{8}$/);
		expect(lines[1]).toBe("Uploaded: 2/2 (6.00 B), 0 skipped, 0 failed");
		expect(remote.uploadCalls).toBe(2);
	});

	it("keeps history across invocations", async () => {
		await writeFile(path.join(dir, "staging", "processed", "20260302", "a.mp3"), "one");

		expect(await main(argv("upload"), deps)).toBe(0);
		lines = [];
		expect(await main(argv("history", "--limit", "5"), deps)).toBe(0);

		expect(lines).toHaveLength(1);
		expect(lines[0]).toContain("completed");
		expect(lines[0]).toContain("1/1 synced, 0 failed");
	});

	it("closes the session when interrupted mid-upload", async () => {
		await writeFile(path.join(dir, "staging", "processed", "20260302", "a.mp3"), "one");
		await writeFile(path.join(dir, "staging", "processed", "20260302", "b.mp3"), "two");
		await writeFile(path.join(dir, "staging", "processed", "20260302", "c.mp3"), "six");
		stopAfterFirstUpload = true;

		expect(await main(argv("upload"), deps)).toBe(0);

		expect(lines.slice(1)).toEqual([
			"Uploaded: 1/3 (3.00 B), 2 skipped, 0 failed",
			"Interrupted: the remaining files are left for the next run",
		]);
		expect(remote.uploadCalls).toBe(1);

		lines = [];
		expect(await main(argv("history"), deps)).toBe(0);
		expect(lines).toHaveLength(1);
		expect(lines[0]).toContain("completed");
		expect(lines[0]).toContain("1/3 synced, 0 failed");
	});

	it("stops monitoring once interrupted", async () => {
		await fs.mkdir(path.join(dir, "volumes", "RECORDER_01"), { recursive: true });
		interrupt.abort();

		expect(await main(argv("monitor"), deps)).toBe(0);
		expect(lines).toEqual([]);
	});

	it("prints status", async () => {
		expect(await main(argv("status"), deps)).toBe(0);

		expect(lines).toContain("Waiting for processing: 0");
		expect(lines).toContain("Waiting for upload: 0");
		expect(lines).toContain("  files synced: 0 (0.00 B), unique: 0");
	});

	it("reports when there are no duplicates", async () => {
		expect(await main(argv("duplicates"), deps)).toBe(0);
		expect(lines).toEqual(["No duplicates found"]);
	});

	it("exports history to a file", async () => {
		const out = path.join(dir, "export.json");

		expect(await main(argv("export", out), deps)).toBe(0);

		expect(lines).toEqual([`Exported 0 record(s) to ${out}`]);
		expect(JSON.parse(await fs.readFile(out, "utf-8"))).toEqual([]);
	});

	it("prints cleanup results", async () => {
		expect(await main(argv("cleanup"), deps)).toBe(0);
		expect(lines).toEqual(["Archive: 0 file(s) removed (0.00 B)", "Ledger: 0 session(s), 0 record(s) deleted"]);
	});

	it("exits with 1 when run has no source", async () => {
		expect(await main(argv("run"), deps)).toBe(1);
	});

	it("exits with 1 on an invalid history limit", async () => {
		expect(await main(argv("history", "-n", "zero"), deps)).toBe(1);
	});

	it("exits with 1 when the config cannot be loaded", async () => {
		deps.loadConfig = async () => {
			throw new Error("unreadable");
		};
		expect(await main(argv("status"), deps)).toBe(1);
	});
});
