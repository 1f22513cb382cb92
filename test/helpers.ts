import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";

import { AudioCodec, EncodeOptions } from "../src/services/audioCodec";
import { computeFingerprint } from "../src/services/localScanner";
import { AccountIdentity, AudioTimeline, RemoteStore, RemoteUploadOptions } from "../src/types";
import { sleep } from "../src/utils";

export async function makeTempDir(prefix = "audio-sync-test-"): Promise<string> {
	return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
	await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFile(filePath: string, content: string | Buffer): Promise<string> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.writeFile(filePath, content);
	return filePath;
}

export interface StoredFile {
	id: string;
	name: string;
	parentId: string;
	fingerprint: string;
}

/**
 * In-memory remote store. Tracks concurrent uploads and can be told to fail.
 */
export class FakeRemoteStore implements RemoteStore {
	readonly folders = new Map<string, string>();
	readonly files: StoredFile[] = [];
	folderCalls = 0;
	uploadCalls = 0;
	activeUploads = 0;
	maxActiveUploads = 0;
	uploadDelayMs = 0;
	/** Errors thrown by successive uploads of a file name. */
	readonly uploadFailures = new Map<string, Error[]>();
	/** Errors thrown by the next uploads, whatever the file. */
	readonly nextUploadFailures: Error[] = [];
	/** Errors thrown by successive folder lookups of a folder name. */
	readonly folderFailures = new Map<string, Error[]>();
	private nextId = 1;

	async findOrCreateFolder(name: string, parentId: string): Promise<string> {
		this.folderCalls += 1;
		await sleep(0);
		const failure = this.folderFailures.get(name)?.shift();
		if (failure) {
			throw failure;
		}
		const key = `${parentId}/${name}`;
		let id = this.folders.get(key);
		if (!id) {
			id = `folder-${this.nextId++}`;
			this.folders.set(key, id);
		}
		return id;
	}

	async findExisting(name: string, parentId: string, contentFingerprint?: string): Promise<string | undefined> {
		const match = this.files.find(
			(file) =>
				file.name === name &&
				file.parentId === parentId &&
				(contentFingerprint === undefined || file.fingerprint === contentFingerprint)
		);
		return match?.id;
	}

	async upload(localPath: string, parentId: string, options: RemoteUploadOptions = {}): Promise<string> {
		this.uploadCalls += 1;
		this.activeUploads += 1;
		this.maxActiveUploads = Math.max(this.maxActiveUploads, this.activeUploads);
		try {
			await sleep(this.uploadDelayMs);
			const name = path.basename(localPath);
			const failure = this.nextUploadFailures.shift() ?? this.uploadFailures.get(name)?.shift();
			if (failure) {
				throw failure;
			}
			const fingerprint = await computeFingerprint(localPath);
			const id = `file-${this.nextId++}`;
			this.files.push({ id, name, parentId, fingerprint });
			options.onProgress?.({ bytesSent: 1, totalBytes: 1 });
			return id;
		} finally {
			this.activeUploads -= 1;
		}
	}

	async getAbout(): Promise<AccountIdentity> {
		return { emailAddress: "tester@example.com", displayName: "Tester" };
	}
}

/**
 * Codec stand-in. "Decoding" maps the file's bytes to a loud mono signal at
 * 1 kHz (one sample per millisecond); "encoding" writes the samples as raw
 * floats, so different inputs give different outputs.
 */
export class FakeCodec implements AudioCodec {
	static readonly SAMPLE_RATE = 1000;
	decoded: string[] = [];

	constructor(private readonly lengthMs = 4000) {}

	async decode(filePath: string): Promise<AudioTimeline> {
		this.decoded.push(filePath);
		const bytes = await fs.readFile(filePath);
		const samples = new Float32Array(this.lengthMs);
		for (let i = 0; i < samples.length; i++) {
			const byte = bytes.length > 0 ? bytes[i % bytes.length] : 0;
			const magnitude = ((byte % 200) + 28) / 256;
			samples[i] = i % 2 === 0 ? magnitude : -magnitude;
		}
		return { sampleRate: FakeCodec.SAMPLE_RATE, channels: [samples] };
	}

	async encode(timeline: AudioTimeline, outputPath: string, options: EncodeOptions): Promise<void> {
		const [samples] = timeline.channels;
		const header = Buffer.from(`FAKE ${timeline.sampleRate} ${options.bitrate}\n`);
		await writeFile(outputPath, Buffer.concat([header, Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength)]));
	}
}

/** A timeline of tone and silence: `[durationMs, amplitude]` pieces at 1 kHz. */
export function pieceTimeline(pieces: Array<[number, number]>, sampleRate = 1000): AudioTimeline {
	const perMs = sampleRate / 1000;
	const total = pieces.reduce((sum, [ms]) => sum + ms * perMs, 0);
	const samples = new Float32Array(total);
	let offset = 0;
	for (const [ms, amplitude] of pieces) {
		for (let i = 0; i < ms * perMs; i++) {
			samples[offset + i] = i % 2 === 0 ? amplitude : -amplitude;
		}
		offset += ms * perMs;
	}
	return { sampleRate, channels: [samples] };
}
