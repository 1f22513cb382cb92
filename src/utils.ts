import * as os from "os";
import * as path from "path";

import { TransientIoError, errorMessage, isRetryableError } from "./errors";
import logger from "./services/logger";

//-------------------------------------------------------
// [Path Utilities]
//-------------------------------------------------------
export function resolvePath(filePath: string): string {
	if (filePath.startsWith("~")) {
		return path.join(os.homedir(), filePath.slice(1));
	}
	return path.resolve(filePath);
}

/**
 * Whether `child` lies inside `parent` (or is `parent` itself).
 */
export function isWithin(parent: string, child: string): boolean {
	const relative = path.relative(parent, child);
	return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

//-------------------------------------------------------
// [Timing Utilities]
//-------------------------------------------------------
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Rejects with a TransientIoError when `operation` does not settle within `timeoutMs`.
 * The underlying operation is aborted through the signal it receives.
 */
export async function withTimeout<T>(
	operation: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	operationName: string
): Promise<T> {
	const controller = new AbortController();
	let timer: NodeJS.Timeout | undefined;

	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(new TransientIoError(`Operation "${operationName}" timed out after ${timeoutMs}ms`));
			controller.abort();
		}, timeoutMs);
	});

	try {
		return await Promise.race([operation(controller.signal), timeout]);
	} finally {
		clearTimeout(timer);
	}
}

//-------------------------------------------------------
// [Retry Operation Utility]
//-------------------------------------------------------
export interface RetryOptions {
	/** Retries after the first attempt. */
	retries: number;
	initialDelayMs: number;
	maxDelayMs: number;
	backoffMultiplier: number;
	retryIf: (error: unknown) => boolean;
	onRetry?: (error: unknown, attempt: number) => void;
}

const defaultRetryOptions: RetryOptions = {
	retries: 3,
	initialDelayMs: 1000,
	maxDelayMs: 30000,
	backoffMultiplier: 2,
	retryIf: isRetryableError,
};

export interface RetryResult<T> {
	value: T;
	attempts: number;
}

export class RetryExhaustedError extends Error {
	public readonly attempts: number;
	public readonly lastError: unknown;

	constructor(operationName: string, attempts: number, lastError: unknown) {
		super(`Operation "${operationName}" failed after ${attempts} attempt(s): ${errorMessage(lastError)}`, {
			cause: lastError,
		});
		this.name = "RetryExhaustedError";
		this.attempts = attempts;
		this.lastError = lastError;
	}
}

/**
 * Runs `operation` until it succeeds, a non-retryable error occurs, or the retry
 * budget is spent. Non-retryable errors are rethrown as they are; an exhausted
 * budget throws RetryExhaustedError carrying the attempt count and last error.
 */
export async function retryOperation<T>(
	operation: (attempt: number) => Promise<T>,
	operationName: string,
	options: Partial<RetryOptions> = {}
): Promise<RetryResult<T>> {
	const opts = { ...defaultRetryOptions, ...options };
	const maxAttempts = Math.max(0, Math.floor(opts.retries)) + 1;
	let delay = opts.initialDelayMs;
	let lastError: unknown;

	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		try {
			return { value: await operation(attempt), attempts: attempt };
		} catch (error) {
			lastError = error;
			if (!opts.retryIf(error)) {
				throw error;
			}
			if (attempt === maxAttempts) {
				break;
			}

			logger.warn(
				`Operation "${operationName}" failed: ${errorMessage(error)}. Retrying in ${delay}ms... (Attempt ${attempt}/${maxAttempts})`
			);
			opts.onRetry?.(error, attempt);
			await sleep(delay);
			delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
		}
	}

	logger.error(`Operation "${operationName}" failed after ${maxAttempts} attempt(s).`);
	throw new RetryExhaustedError(operationName, maxAttempts, lastError);
}

//-------------------------------------------------------
// [Worker Pool]
//-------------------------------------------------------
/**
 * Fixed-width worker pool over `items`. Resolves once every dispatched handler
 * has settled. When `shouldStop` returns true no further items are dispatched;
 * the indices that were never started are returned.
 */
export async function runWithConcurrencyLimit<T>(
	items: readonly T[],
	limit: number,
	handler: (item: T, index: number) => Promise<void>,
	shouldStop: () => boolean = () => false
): Promise<number[]> {
	const concurrency = Math.max(1, Math.floor(limit));
	if (items.length === 0) {
		return [];
	}

	let nextIndex = 0;
	const workers = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
		for (;;) {
			if (shouldStop()) {
				return;
			}
			const currentIndex = nextIndex;
			nextIndex += 1;
			if (currentIndex >= items.length) {
				return;
			}
			await handler(items[currentIndex], currentIndex);
		}
	});

	await Promise.all(workers);

	const undispatched: number[] = [];
	for (let i = nextIndex; i < items.length; i++) {
		undispatched.push(i);
	}
	return undispatched;
}

//-------------------------------------------------------
// [Formatting]
//-------------------------------------------------------
export function formatSize(sizeBytes: number): string {
	const units = ["B", "KB", "MB", "GB"];
	let size = sizeBytes;
	for (const unit of units) {
		if (size < 1024) {
			return `${size.toFixed(2)} ${unit}`;
		}
		size /= 1024;
	}
	return `${size.toFixed(2)} TB`;
}

function pad(value: number, width = 2): string {
	return value.toString().padStart(width, "0");
}

/** `YYYYMMDD` in local time. */
export function dateStamp(date: Date): string {
	return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

/** `YYYYMMDD_HHmmss` in local time. */
export function timeStamp(date: Date): string {
	return `${dateStamp(date)}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}
