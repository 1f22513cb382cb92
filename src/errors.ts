/**
 * Error taxonomy for the sync pipeline.
 *
 * Per-file errors (transient, integrity, capacity) are caught by the batch that
 * owns the file. Run-level errors (authentication, storage) abort the batch.
 */

export class SyncError extends Error {
	public readonly code: string;
	public readonly details?: Record<string, unknown>;

	constructor(message: string, code: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "SyncError";
		this.code = code;
		this.details = details;

		Error.captureStackTrace(this, this.constructor);
	}
}

/**
 * Network blips, lock timeouts, transfer timeouts. Safe to retry.
 */
export class TransientIoError extends SyncError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "TRANSIENT_IO", undefined, options);
		this.name = "TransientIoError";
	}
}

/**
 * Copy or verification mismatch. The destination is never trusted.
 */
export class IntegrityError extends SyncError {
	constructor(source: string, destination: string, message?: string) {
		super(message ?? `Copy verification failed: ${source} -> ${destination}`, "INTEGRITY", {
			source,
			destination,
		});
		this.name = "IntegrityError";
	}
}

export class CapacityError extends SyncError {
	constructor(filePath: string, size: number, limit: number) {
		super(`File exceeds size limit (${size} > ${limit} bytes): ${filePath}`, "CAPACITY", {
			filePath,
			size,
			limit,
		});
		this.name = "CapacityError";
	}
}

/**
 * Fatal for the whole run: nothing can be uploaded without credentials.
 */
export class AuthenticationError extends SyncError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "AUTHENTICATION", undefined, options);
		this.name = "AuthenticationError";
	}
}

/**
 * The ledger is unavailable. Fatal for the run, dedup and audit depend on it.
 */
export class StorageError extends SyncError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "STORAGE", undefined, options);
		this.name = "StorageError";
	}
}

export class InvalidInputError extends SyncError {
	constructor(message: string) {
		super(message, "INVALID_INPUT");
		this.name = "InvalidInputError";
	}
}

export class ConfigError extends SyncError {
	constructor(message: string, details?: Record<string, unknown>) {
		super(message, "CONFIG", details);
		this.name = "ConfigError";
	}
}

export class CommandExecutionError extends SyncError {
	constructor(command: string, exitCode: number | null, stderr: string) {
		super(`Command failed with exit code ${exitCode}: ${command}`, "COMMAND_EXECUTION", {
			command,
			exitCode,
			stderr: stderr.substring(0, 1000),
		});
		this.name = "CommandExecutionError";
	}
}

/**
 * Errors that end the whole run rather than a single file.
 */
export function isFatalError(error: unknown): error is AuthenticationError | StorageError {
	return error instanceof AuthenticationError || error instanceof StorageError;
}

const NETWORK_ERROR_CODES = ["EAI_AGAIN", "ECONNRESET", "ETIMEDOUT", "ESOCKETTIMEDOUT", "ENOTFOUND", "EPIPE", "ECONNREFUSED"];

/**
 * Whether a failed operation may be attempted again with the same parameters.
 * Unknown errors are treated as retryable; the retry budget bounds them.
 */
export function isRetryableError(error: unknown): boolean {
	if (error instanceof TransientIoError) {
		return true;
	}
	if (error instanceof SyncError) {
		return false;
	}
	return true;
}

export function isNetworkError(error: unknown): boolean {
	if (typeof error !== "object" || error === null) {
		return false;
	}
	const code = "code" in error ? error.code : undefined;
	const cause = "cause" in error ? error.cause : undefined;
	const causeCode = typeof cause === "object" && cause !== null && "code" in cause ? cause.code : undefined;
	return (
		(typeof code === "string" && NETWORK_ERROR_CODES.includes(code)) ||
		(typeof causeCode === "string" && NETWORK_ERROR_CODES.includes(causeCode))
	);
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * The remote store refused a request for a reason retrying will not fix.
 */
export class RemoteRequestError extends SyncError {
	constructor(message: string, status?: number, options?: { cause?: unknown }) {
		super(message, "REMOTE_REQUEST", status === undefined ? undefined : { status }, options);
		this.name = "RemoteRequestError";
	}
}
