import { promises as fs } from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { AudioProcessor } from "../../src/core/processor";
import { AudioCodec } from "../../src/services/audioCodec";
import { StagingArea } from "../../src/services/staging";
import { AudioTimeline } from "../../src/types";
import { FakeCodec, makeTempDir, removeDir, writeFile } from "../helpers";

const trimOptions = {
	targetSampleRate: 1000,
	minSilenceMs: 500,
	retryAttempts: 1,
	retryDelayMs: 0,
};

class SilentCodec implements AudioCodec {
	async decode(): Promise<AudioTimeline> {
		return { sampleRate: 1000, channels: [new Float32Array(3000)] };
	}

	async encode(): Promise<void> {
		throw new Error("nothing to encode");
	}
}

class BrokenCodec implements AudioCodec {
	decodeCalls = 0;

	constructor(private readonly failOn: "decode" | "encode") {}

	async decode(filePath: string): Promise<AudioTimeline> {
		this.decodeCalls += 1;
		if (this.failOn === "decode") {
			throw new Error("corrupt header");
		}
		return new FakeCodec().decode(filePath);
	}

	async encode(_timeline: AudioTimeline, outputPath: string): Promise<void> {
		await writeFile(outputPath, "half");
		throw new Error("encoder crashed");
	}
}

async function exists(filePath: string): Promise<boolean> {
	return fs.access(filePath).then(
		() => true,
		() => false
	);
}

describe("AudioProcessor", () => {
	let dir: string;
	let staging: StagingArea;
	let rawA: string;
	let rawB: string;

	beforeEach(async () => {
		dir = await makeTempDir();
		staging = new StagingArea({ baseDir: dir });
		await staging.init();
		rawA = await writeFile(path.join(staging.rawDir, "20260302", "a.wav"), "first recording");
		rawB = await writeFile(path.join(staging.rawDir, "20260302", "b.wav"), "second recording");
	});

	afterEach(async () => {
		await removeDir(dir);
	});

	it("encodes the trimmed audio into the processed tree", async () => {
		const codec = new FakeCodec();
		const processor = new AudioProcessor(staging, codec, { ...trimOptions, targetBitrate: "48k" });

		const outcome = await processor.processFile(rawA);

		const processedPath = path.join(staging.processedDir, "20260302", "a.wav.mp3");
		expect(outcome).toMatchObject({
			status: "processed",
			processedPath,
			voiceRatio: 100,
			originalDurationMs: 4000,
			trimmedDurationMs: 4000,
		});
		const header = (await fs.readFile(processedPath)).subarray(0, 14).toString("utf-8");
		expect(header).toBe("FAKE 1000 48k\n");
		expect(await exists(rawA)).toBe(false);
		expect(await exists(path.join(staging.archiveDir, "20260302", "a.wav"))).toBe(true);
	});

	it("archives recordings with too little voice", async () => {
		const processor = new AudioProcessor(staging, new SilentCodec(), trimOptions);

		const outcome = await processor.processFile(rawA);

		expect(outcome).toEqual({ rawPath: rawA, status: "skipped", reason: "low_voice", voiceRatio: 0 });
		expect(await exists(path.join(staging.archiveDir, "20260302", "a.wav"))).toBe(true);
		expect(await staging.listUnprocessed()).toEqual([rawB]);
	});

	it("archives recordings with no audio when no voice minimum is set", async () => {
		const processor = new AudioProcessor(staging, new SilentCodec(), { ...trimOptions, minVoiceRatio: 0 });

		const outcome = await processor.processFile(rawA);

		expect(outcome).toEqual({ rawPath: rawA, status: "skipped", reason: "no_audio", voiceRatio: 0 });
	});

	it("retries a failing file, reports it and carries on", async () => {
		const codec = new BrokenCodec("decode");
		const processor = new AudioProcessor(staging, codec, trimOptions);

		const report = await processor.processBatch([rawA]);

		expect(codec.decodeCalls).toBe(2);
		expect(report.failed).toBe(1);
		expect(report.outcomes).toEqual([{ rawPath: rawA, status: "failed", error: "corrupt header" }]);
		expect(await exists(rawA)).toBe(true);
	});

	it("removes partial encoder output and keeps the raw file", async () => {
		const processor = new AudioProcessor(staging, new BrokenCodec("encode"), { ...trimOptions, retryAttempts: 0 });

		const report = await processor.processBatch([rawA]);

		expect(report.outcomes[0]).toMatchObject({ status: "failed", error: "encoder crashed" });
		expect(await exists(rawA)).toBe(true);
		expect(await fs.readdir(staging.tempDir)).toEqual([]);
	});

	it("processes a batch in parallel and reports progress", async () => {
		const processor = new AudioProcessor(staging, new FakeCodec(), {
			...trimOptions,
			parallelProcessing: true,
			maxParallelJobs: 2,
		});
		const progress: number[] = [];

		const report = await processor.processBatch([rawA, rawB], { onProgress: (_outcome, done) => progress.push(done) });

		expect(report.processed).toBe(2);
		expect(progress).toEqual([1, 2]);
		expect(await staging.listUnprocessed()).toEqual([]);
	});

	it("gives same-named recordings of different formats their own output", async () => {
		const takeWav = await writeFile(path.join(staging.rawDir, "20260302", "take.wav"), "wav recording");
		const takeM4a = await writeFile(path.join(staging.rawDir, "20260302", "take.m4a"), "m4a recording");
		const processor = new AudioProcessor(staging, new FakeCodec(), trimOptions);

		const report = await processor.processBatch([takeWav, takeM4a]);

		expect(report.processed).toBe(2);
		expect(report.outcomes.map((outcome) => outcome.processedPath)).toEqual([
			path.join(staging.processedDir, "20260302", "take.wav.mp3"),
			path.join(staging.processedDir, "20260302", "take.m4a.mp3"),
		]);
		expect(await staging.listPendingUpload()).toHaveLength(2);
	});

	it("skips everything once cancelled", async () => {
		const controller = new AbortController();
		controller.abort();
		const processor = new AudioProcessor(staging, new FakeCodec(), trimOptions);

		const report = await processor.processBatch([rawA, rawB], { signal: controller.signal });

		expect(report.skipped).toBe(2);
		expect(report.outcomes.map((outcome) => outcome.reason)).toEqual(["cancelled", "cancelled"]);
		expect(await exists(rawA)).toBe(true);
	});
});
