import { drive_v3, google } from "googleapis";
import { OAuth2Client } from "google-auth-library";
import { createReadStream, promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";

import { AuthenticationError, RemoteRequestError, SyncError, TransientIoError, errorMessage, isNetworkError } from "../errors";
import logger from "../services/logger";
import { AccountIdentity, RemoteStore, RemoteUploadOptions } from "../types";

const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

const AUDIO_MIME_TYPES: Record<string, string> = {
	".mp3": "audio/mpeg",
	".wav": "audio/wav",
	".m4a": "audio/mp4",
	".aac": "audio/aac",
	".flac": "audio/flac",
	".ogg": "audio/ogg",
};

export function mimeTypeFor(filePath: string): string {
	return AUDIO_MIME_TYPES[path.extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

/** Drive query string literal. */
export function escapeQueryValue(value: string): string {
	return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

//-------------------------------------------------------
// [Error mapping]
//-------------------------------------------------------
const ApiErrorShape = z.object({
	code: z.union([z.string(), z.number()]).optional(),
	response: z.object({ status: z.number(), data: z.unknown() }).optional(),
});

const ApiErrorBody = z.object({
	error: z.union([
		z.string(),
		z.object({ errors: z.array(z.object({ reason: z.string().optional() })).optional() }),
	]),
});

const AUTH_REASONS = ["authError", "insufficientPermissions", "insufficientFilePermissions", "unauthorized"];

function statusOf(error: unknown): { status?: number; reason?: string } {
	const parsed = ApiErrorShape.safeParse(error);
	if (!parsed.success) {
		return {};
	}
	const { code, response } = parsed.data;
	const status = response?.status ?? (typeof code === "number" ? code : Number.parseInt(code ?? "", 10) || undefined);
	const body = ApiErrorBody.safeParse(response?.data);
	const detail = body.success ? body.data.error : undefined;
	const reason = typeof detail === "string" ? detail : detail?.errors?.[0]?.reason;
	return { status, reason };
}

/**
 * Translates a Drive client failure into the sync error taxonomy.
 */
export function mapDriveError(error: unknown, operation: string): Error {
	if (error instanceof SyncError) {
		return error;
	}

	const message = `${operation}: ${errorMessage(error)}`;
	const { status, reason } = statusOf(error);

	if (status === 401 || reason === "invalid_grant" || errorMessage(error).includes("invalid_grant")) {
		return new AuthenticationError(message, { cause: error });
	}
	if (status === 403) {
		return reason && AUTH_REASONS.includes(reason)
			? new AuthenticationError(message, { cause: error })
			: new TransientIoError(message, { cause: error });
	}
	if (status === 408 || status === 429 || (status !== undefined && status >= 500)) {
		return new TransientIoError(message, { cause: error });
	}
	if (status !== undefined && status >= 400) {
		return new RemoteRequestError(message, status, { cause: error });
	}
	if (isNetworkError(error)) {
		return new TransientIoError(message, { cause: error });
	}
	return error instanceof Error ? error : new Error(message);
}

//-------------------------------------------------------
// [Drive store]
//-------------------------------------------------------
const DEFAULT_REQUEST_TIMEOUT_MS = 10 * 60 * 1000;

export interface DriveStoreOptions {
	/** Upper bound for a single HTTP request, uploads included. */
	requestTimeoutMs?: number;
}

/**
 * `RemoteStore` over the Drive v3 API.
 */
export class DriveRemoteStore implements RemoteStore {
	private readonly drive: drive_v3.Drive;

	constructor(auth: OAuth2Client, options: DriveStoreOptions = {}) {
		this.drive = google.drive({ version: "v3", auth, timeout: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS });
	}

	private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		try {
			return await fn();
		} catch (err) {
			throw mapDriveError(err, operation);
		}
	}

	private async listChildren(query: string, operation: string): Promise<drive_v3.Schema$File[]> {
		const res = await this.call(operation, () =>
			this.drive.files.list({
				q: query,
				fields: "files(id, name, md5Checksum)",
				spaces: "drive",
				pageSize: 100,
			})
		);
		return res.data.files ?? [];
	}

	async findOrCreateFolder(name: string, parentId: string): Promise<string> {
		const query = [
			`name = '${escapeQueryValue(name)}'`,
			`'${escapeQueryValue(parentId)}' in parents`,
			`mimeType = '${FOLDER_MIME_TYPE}'`,
			"trashed = false",
		].join(" and ");

		const existing = (await this.listChildren(query, `Find folder ${name}`)).find((file) => file.id);
		if (existing?.id) {
			return existing.id;
		}

		const res = await this.call(`Create folder ${name}`, () =>
			this.drive.files.create({
				requestBody: { name, mimeType: FOLDER_MIME_TYPE, parents: [parentId] },
				fields: "id",
			})
		);
		if (!res.data.id) {
			throw new RemoteRequestError(`Create folder ${name}: no id returned`);
		}
		logger.info(`Created folder: ${name}`);
		return res.data.id;
	}

	async findExisting(name: string, parentId: string, contentFingerprint?: string): Promise<string | undefined> {
		const query = [
			`name = '${escapeQueryValue(name)}'`,
			`'${escapeQueryValue(parentId)}' in parents`,
			"trashed = false",
		].join(" and ");

		const matches = await this.listChildren(query, `Find ${name}`);
		const match = contentFingerprint ? matches.find((file) => file.md5Checksum === contentFingerprint) : matches[0];
		return match?.id ?? undefined;
	}

	async upload(localPath: string, parentId: string, options: RemoteUploadOptions = {}): Promise<string> {
		const name = path.basename(localPath);
		const { size } = await fs.stat(localPath);

		const res = await this.call(`Upload ${name}`, () =>
			this.drive.files.create(
				{
					requestBody: { name, parents: [parentId] },
					media: { mimeType: mimeTypeFor(localPath), body: createReadStream(localPath) },
					fields: "id, md5Checksum",
				},
				{
					signal: options.signal,
					onUploadProgress: (event: { bytesRead?: number }) => {
						options.onProgress?.({ bytesSent: event.bytesRead ?? 0, totalBytes: size });
					},
				}
			)
		);
		if (!res.data.id) {
			throw new RemoteRequestError(`Upload ${name}: no id returned`);
		}
		return res.data.id;
	}

	async getAbout(): Promise<AccountIdentity> {
		const res = await this.call("Connection check", () =>
			this.drive.about.get({ fields: "user(emailAddress, displayName)" })
		);
		return {
			emailAddress: res.data.user?.emailAddress ?? undefined,
			displayName: res.data.user?.displayName ?? undefined,
		};
	}
}
