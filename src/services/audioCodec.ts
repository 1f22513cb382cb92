import { spawn } from "child_process";
import { promises as fsp } from "fs";
import * as path from "path";
import { z } from "zod";

import { CommandExecutionError, InvalidInputError } from "../errors";
import { AudioTimeline } from "../types";
import logger from "./logger";

const BYTES_PER_SAMPLE = 4;

export interface CommandResult {
	exitCode: number | null;
	stdout: Buffer;
	stderr: string;
	timedOut: boolean;
}

export interface CommandOptions {
	input?: Buffer;
	timeoutMs?: number;
	signal?: AbortSignal;
}

/**
 * Spawns a process, feeds `input` to stdin and collects stdout as bytes.
 * Rejects only when the process cannot be started.
 */
export function runCommand(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
	const { input, timeoutMs = 60 * 60 * 1000, signal } = options;

	return new Promise((resolve, reject) => {
		const child = spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });
		const stdout: Buffer[] = [];
		let stderr = "";
		let timedOut = false;

		const timer = setTimeout(() => {
			timedOut = true;
			child.kill("SIGKILL");
		}, timeoutMs);
		const onAbort = (): void => {
			child.kill("SIGTERM");
		};
		signal?.addEventListener("abort", onAbort, { once: true });

		child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
		child.stderr.on("data", (chunk: Buffer) => {
			if (stderr.length < 64 * 1024) {
				stderr += chunk.toString();
			}
		});
		// The encoder may exit before draining stdin; the exit code reports that.
		child.stdin.on("error", (err) => logger.debug(`${command} stdin closed: ${err.message}`));

		child.on("error", (err) => {
			clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
			reject(err);
		});
		child.on("close", (code) => {
			clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
			resolve({ exitCode: code, stdout: Buffer.concat(stdout), stderr, timedOut });
		});

		child.stdin.end(input);
	});
}

async function runChecked(command: string, args: readonly string[], options: CommandOptions = {}): Promise<Buffer> {
	let result: CommandResult;
	try {
		result = await runCommand(command, args, options);
	} catch (err) {
		throw new CommandExecutionError(command, null, err instanceof Error ? err.message : String(err));
	}
	if (result.exitCode !== 0) {
		const stderr = result.timedOut ? `timed out\n${result.stderr}` : result.stderr;
		throw new CommandExecutionError(`${command} ${args.join(" ")}`, result.exitCode, stderr);
	}
	return result.stdout;
}

//-------------------------------------------------------
// [PCM]
//-------------------------------------------------------
/**
 * Splits interleaved little-endian float32 frames into channels. A trailing
 * partial frame is dropped.
 */
export function pcmToTimeline(pcm: Buffer, sampleRate: number, channelCount: number): AudioTimeline {
	if (channelCount < 1) {
		throw new InvalidInputError(`Invalid channel count: ${channelCount}`);
	}
	const frames = Math.floor(pcm.length / (BYTES_PER_SAMPLE * channelCount));
	const channels = Array.from({ length: channelCount }, () => new Float32Array(frames));
	for (let frame = 0; frame < frames; frame++) {
		for (let channel = 0; channel < channelCount; channel++) {
			channels[channel][frame] = pcm.readFloatLE((frame * channelCount + channel) * BYTES_PER_SAMPLE);
		}
	}
	return { sampleRate, channels };
}

export function samplesToPcm(samples: Float32Array): Buffer {
	const pcm = Buffer.alloc(samples.length * BYTES_PER_SAMPLE);
	samples.forEach((sample, i) => pcm.writeFloatLE(sample, i * BYTES_PER_SAMPLE));
	return pcm;
}

//-------------------------------------------------------
// [Codec]
//-------------------------------------------------------
export interface EncodeOptions {
	bitrate: string;
}

/**
 * Turns files into PCM timelines and back. The trimming algorithm never sees
 * encoded bytes.
 */
export interface AudioCodec {
	decode(filePath: string): Promise<AudioTimeline>;
	encode(timeline: AudioTimeline, outputPath: string, options: EncodeOptions): Promise<void>;
}

const ProbeSchema = z.object({
	streams: z
		.array(
			z.object({
				sample_rate: z.coerce.number().int().positive(),
				channels: z.number().int().positive(),
			})
		)
		.min(1),
});

export interface FfmpegCodecOptions {
	ffmpegPath?: string;
	ffprobePath?: string;
	timeoutMs?: number;
}

export class FfmpegCodec implements AudioCodec {
	private readonly ffmpegPath: string;
	private readonly ffprobePath: string;
	private readonly timeoutMs: number;

	constructor(options: FfmpegCodecOptions = {}) {
		this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
		this.ffprobePath = options.ffprobePath ?? "ffprobe";
		this.timeoutMs = options.timeoutMs ?? 60 * 60 * 1000;
	}

	async probe(filePath: string): Promise<{ sampleRate: number; channels: number }> {
		const output = await runChecked(
			this.ffprobePath,
			["-v", "error", "-select_streams", "a:0", "-show_entries", "stream=sample_rate,channels", "-of", "json", filePath],
			{ timeoutMs: this.timeoutMs }
		);

		let raw: unknown;
		try {
			raw = JSON.parse(output.toString("utf8"));
		} catch (err) {
			throw new InvalidInputError(`Unreadable probe output for ${filePath}`);
		}
		const parsed = ProbeSchema.safeParse(raw);
		if (!parsed.success) {
			throw new InvalidInputError(`No audio stream in ${filePath}`);
		}
		const stream = parsed.data.streams[0];
		return { sampleRate: stream.sample_rate, channels: stream.channels };
	}

	async decode(filePath: string): Promise<AudioTimeline> {
		const { sampleRate, channels } = await this.probe(filePath);
		const pcm = await runChecked(
			this.ffmpegPath,
			["-v", "error", "-i", filePath, "-f", "f32le", "-acodec", "pcm_f32le", "-ac", String(channels), "-"],
			{ timeoutMs: this.timeoutMs }
		);

		const timeline = pcmToTimeline(pcm, sampleRate, channels);
		logger.debug(
			`Decoded ${path.basename(filePath)}: ${channels}ch @ ${sampleRate}Hz, ${timeline.channels[0].length} frames`
		);
		return timeline;
	}

	/**
	 * Encodes the first channel as mono MP3.
	 */
	async encode(timeline: AudioTimeline, outputPath: string, options: EncodeOptions): Promise<void> {
		const [samples] = timeline.channels;
		if (!samples) {
			throw new InvalidInputError("Nothing to encode");
		}

		const pcm = samplesToPcm(samples);

		await fsp.mkdir(path.dirname(outputPath), { recursive: true });
		await runChecked(
			this.ffmpegPath,
			[
				"-v", "error", "-y",
				"-f", "f32le", "-ar", String(timeline.sampleRate), "-ac", "1", "-i", "pipe:0",
				"-codec:a", "libmp3lame", "-b:a", options.bitrate,
				outputPath,
			],
			{ input: pcm, timeoutMs: this.timeoutMs }
		);
	}
}
