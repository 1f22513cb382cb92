import Database from "better-sqlite3";
import { randomBytes } from "crypto";
import * as fs from "fs";
import * as path from "path";

import { determineSyncAction, needsSync } from "../core/decision";
import { InvalidInputError, StorageError, SyncError, errorMessage } from "../errors";
import {
	DuplicateGroup,
	ExtensionTotals,
	FileAttempt,
	FileMeta,
	FileSyncRecord,
	FileTrackingEntry,
	SessionCounters,
	SyncSession,
	SyncStats,
	SyncStatus,
} from "../types";
import { timeStamp } from "../utils";
import { HistoryRow, SessionRow, TrackingRow, initLedgerSchema } from "./ledgerSchema";
import logger from "./logger";

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_STATS_TTL_MS = 5 * 60 * 1000;

export interface LedgerOptions {
	/** How long `statistics()` may serve a cached result. */
	statsCacheTtlMs?: number;
	/** Upper bound on waiting for a locked database file. */
	busyTimeoutMs?: number;
	now?: () => Date;
}

export interface PurgeResult {
	sessionsDeleted: number;
	recordsDeleted: number;
}

interface StatsCache {
	stats: SyncStats;
	computedAt: number;
}

//-------------------------------------------------------
// [Row mapping]
//-------------------------------------------------------
function toSession(row: SessionRow): SyncSession {
	return {
		sessionId: row.session_id,
		sourcePath: row.source_path,
		startTime: new Date(row.start_time),
		endTime: row.end_time === null ? undefined : new Date(row.end_time),
		status: row.status,
		totalFiles: row.total_files,
		syncedFiles: row.synced_files,
		failedFiles: row.failed_files,
		skippedFiles: row.skipped_files,
		totalBytes: row.total_size_bytes,
		syncedBytes: row.synced_size_bytes,
		errorMessage: row.error_message ?? undefined,
	};
}

function toRecord(row: HistoryRow): FileSyncRecord {
	return {
		id: row.id,
		sessionId: row.session_id,
		path: row.file_path,
		name: row.file_name,
		size: row.file_size,
		fingerprint: row.file_hash ?? undefined,
		remoteId: row.remote_file_id ?? undefined,
		remoteFolderId: row.remote_folder_id ?? undefined,
		status: row.sync_status,
		timestamp: new Date(row.sync_time),
		error: row.error_message ?? undefined,
		retryCount: row.retry_count,
	};
}

function toTrackingEntry(row: TrackingRow): FileTrackingEntry {
	return {
		path: row.file_path,
		name: row.file_name,
		size: row.file_size,
		fingerprint: row.file_hash,
		lastModified: new Date(row.last_modified),
		lastSynced: new Date(row.last_synced),
		remoteId: row.remote_file_id ?? undefined,
		syncCount: row.sync_count,
	};
}

function startOfDay(date: Date): number {
	return new Date(date.getFullYear(), date.getMonth(), date.getDate()).getTime();
}

/**
 * Durable record of sync sessions and per-file outcomes.
 *
 * `file_sync_history` is the append-only audit log; `file_tracking` is the
 * per-path projection used for differential-sync decisions. better-sqlite3 is
 * synchronous, so each method runs to completion without interleaving, and every
 * read-modify-write happens inside one transaction.
 */
export class FingerprintLedger {
	private readonly db: Database.Database;
	private readonly statsCacheTtlMs: number;
	private readonly now: () => Date;
	private statsCache?: StatsCache;

	private constructor(db: Database.Database, options: LedgerOptions) {
		this.db = db;
		this.statsCacheTtlMs = options.statsCacheTtlMs ?? DEFAULT_STATS_TTL_MS;
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Opens (creating if needed) the ledger file. Pass `":memory:"` for a
	 * throwaway ledger.
	 */
	static open(dbPath: string, options: LedgerOptions = {}): FingerprintLedger {
		try {
			if (dbPath !== ":memory:") {
				fs.mkdirSync(path.dirname(dbPath), { recursive: true });
			}
			const db = new Database(dbPath, { timeout: options.busyTimeoutMs ?? 30000 });
			db.pragma("journal_mode = WAL");
			initLedgerSchema(db);
			logger.info(`Ledger opened: ${dbPath}`);
			return new FingerprintLedger(db, options);
		} catch (err) {
			throw new StorageError(`Cannot open ledger at ${dbPath}: ${errorMessage(err)}`, { cause: err });
		}
	}

	close(): void {
		this.db.close();
	}

	private guard<T>(operation: string, fn: () => T): T {
		try {
			return fn();
		} catch (err) {
			if (err instanceof SyncError) {
				throw err;
			}
			throw new StorageError(`Ledger ${operation} failed: ${errorMessage(err)}`, { cause: err });
		}
	}

	//-------------------------------------------------------
	// [Sessions]
	//-------------------------------------------------------
	openSession(sourceLabel: string): string {
		const now = this.now();
		const sessionId = `session_${timeStamp(now)}_${randomBytes(4).toString("hex")}`;

		this.guard("openSession", () => {
			this.db
				.prepare<[string, string, number]>(
					"INSERT INTO sync_sessions (session_id, source_path, start_time, status) VALUES (?, ?, ?, 'in_progress')"
				)
				.run(sessionId, sourceLabel, now.getTime());
		});

		logger.info(`Created sync session: ${sessionId}`);
		return sessionId;
	}

	/**
	 * Moves an in-progress session to its terminal status. Returns false (and
	 * logs) when the session is unknown or already closed.
	 */
	closeSession(sessionId: string, success: boolean, error?: string): boolean {
		const status = success ? "completed" : "failed";
		const changes = this.guard("closeSession", () => {
			return this.db
				.prepare<[string, number, string | null, string]>(
					"UPDATE sync_sessions SET status = ?, end_time = ?, error_message = ? WHERE session_id = ? AND status = 'in_progress'"
				)
				.run(status, this.now().getTime(), error ?? null, sessionId).changes;
		});

		if (changes === 0) {
			logger.warn(`Session ${sessionId} is not in progress; close request ignored.`);
			return false;
		}
		logger.info(`Session ${sessionId} ${status}`);
		return true;
	}

	/**
	 * Overwrites the running counters of an in-progress session.
	 */
	updateSessionCounters(sessionId: string, counters: Partial<SessionCounters>): void {
		const columns: Array<[keyof SessionCounters, string]> = [
			["totalFiles", "total_files"],
			["syncedFiles", "synced_files"],
			["failedFiles", "failed_files"],
			["skippedFiles", "skipped_files"],
			["totalBytes", "total_size_bytes"],
			["syncedBytes", "synced_size_bytes"],
		];

		const updates: string[] = [];
		const values: number[] = [];
		for (const [key, column] of columns) {
			const value = counters[key];
			if (value !== undefined) {
				updates.push(`${column} = ?`);
				values.push(value);
			}
		}
		if (updates.length === 0) {
			return;
		}

		this.guard("updateSessionCounters", () => {
			this.db
				.prepare<Array<number | string>>(
					`UPDATE sync_sessions SET ${updates.join(", ")} WHERE session_id = ? AND status = 'in_progress'`
				)
				.run(...values, sessionId);
		});
	}

	getSession(sessionId: string): SyncSession | undefined {
		const row = this.guard("getSession", () =>
			this.db.prepare<[string], SessionRow>("SELECT * FROM sync_sessions WHERE session_id = ?").get(sessionId)
		);
		return row ? toSession(row) : undefined;
	}

	sessionHistory(limit = 10): SyncSession[] {
		const rows = this.guard("sessionHistory", () =>
			this.db
				.prepare<[number], SessionRow>("SELECT * FROM sync_sessions ORDER BY start_time DESC, id DESC LIMIT ?")
				.all(limit)
		);
		return rows.map(toSession);
	}

	//-------------------------------------------------------
	// [Attempts]
	//-------------------------------------------------------
	/**
	 * Appends a sync attempt and, for successes, upserts the tracking entry for
	 * the path. Recording the same success twice (same session, path and
	 * fingerprint) returns the existing record id and changes nothing.
	 */
	recordAttempt(sessionId: string, file: FileAttempt, status: SyncStatus, error?: string): number {
		if (status === "success" && !file.fingerprint) {
			throw new InvalidInputError(`A successful sync of ${file.path} must carry a fingerprint`);
		}

		const record = this.db.transaction((): number => {
			const session = this.db
				.prepare<[string], Pick<SessionRow, "status">>("SELECT status FROM sync_sessions WHERE session_id = ?")
				.get(sessionId);
			if (!session) {
				throw new InvalidInputError(`Unknown session: ${sessionId}`);
			}
			if (session.status !== "in_progress") {
				throw new InvalidInputError(`Session ${sessionId} is ${session.status}; it no longer accepts records`);
			}

			if (status === "success") {
				const existing = this.db
					.prepare<[string, string, string], Pick<HistoryRow, "id">>(
						"SELECT id FROM file_sync_history WHERE session_id = ? AND file_path = ? AND file_hash = ? AND sync_status = 'success'"
					)
					.get(sessionId, file.path, file.fingerprint ?? "");
				if (existing) {
					logger.debug(`Success for ${file.path} already recorded in ${sessionId}`);
					return existing.id;
				}
			}

			const now = this.now().getTime();
			const result = this.db
				.prepare<
					[string, string, string, number, string | null, string | null, string | null, string, number, string | null, number]
				>(
					`INSERT INTO file_sync_history
					(session_id, file_path, file_name, file_size, file_hash, remote_file_id, remote_folder_id,
					 sync_status, sync_time, error_message, retry_count)
					VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
				)
				.run(
					sessionId,
					file.path,
					file.name,
					file.size,
					file.fingerprint ?? null,
					file.remoteId ?? null,
					file.remoteFolderId ?? null,
					status,
					now,
					error ?? null,
					file.retryCount ?? 0
				);

			if (status === "success") {
				this.upsertTracking(file, now);
			}
			if (status !== "pending") {
				this.bumpSessionCounters(sessionId, status, file.size);
			}

			return Number(result.lastInsertRowid);
		});

		return this.guard("recordAttempt", record);
	}

	private upsertTracking(file: FileAttempt, now: number): void {
		const lastModified = file.lastModified ? Date.parse(file.lastModified) : NaN;
		this.db
			.prepare<[string, string, number, string, number, number, string | null, number]>(
				`INSERT INTO file_tracking
				(file_path, file_name, file_size, file_hash, last_modified, last_synced, remote_file_id, sync_count, updated_at)
				VALUES (?, ?, ?, ?, ?, ?, ?, 1, ?)
				ON CONFLICT(file_path) DO UPDATE SET
					file_name = excluded.file_name,
					file_size = excluded.file_size,
					file_hash = excluded.file_hash,
					last_modified = excluded.last_modified,
					last_synced = excluded.last_synced,
					remote_file_id = excluded.remote_file_id,
					sync_count = sync_count + 1,
					updated_at = excluded.updated_at`
			)
			.run(
				file.path,
				file.name,
				file.size,
				file.fingerprint ?? "",
				Number.isNaN(lastModified) ? now : lastModified,
				now,
				file.remoteId ?? null,
				now
			);
	}

	private bumpSessionCounters(sessionId: string, status: Exclude<SyncStatus, "pending">, size: number): void {
		this.db
			.prepare<[number, number, number, number, number, string]>(
				`UPDATE sync_sessions SET
					total_files = total_files + 1,
					synced_files = synced_files + ?,
					failed_files = failed_files + ?,
					skipped_files = skipped_files + ?,
					total_size_bytes = total_size_bytes + ?,
					synced_size_bytes = synced_size_bytes + ?
				WHERE session_id = ?`
			)
			.run(
				status === "success" ? 1 : 0,
				status === "failed" ? 1 : 0,
				status === "skipped" ? 1 : 0,
				size,
				status === "success" ? size : 0,
				sessionId
			);
	}

	recordsForSession(sessionId: string): FileSyncRecord[] {
		const rows = this.guard("recordsForSession", () =>
			this.db
				.prepare<[string], HistoryRow>("SELECT * FROM file_sync_history WHERE session_id = ? ORDER BY id")
				.all(sessionId)
		);
		return rows.map(toRecord);
	}

	//-------------------------------------------------------
	// [Dedup and differential sync]
	//-------------------------------------------------------
	/**
	 * Most recent successful delivery of this content, optionally within one
	 * remote folder.
	 */
	isDuplicate(fingerprint: string, remoteFolderId?: string): FileSyncRecord | undefined {
		const row = this.guard("isDuplicate", () => {
			if (remoteFolderId) {
				return this.db
					.prepare<[string, string], HistoryRow>(
						"SELECT * FROM file_sync_history WHERE file_hash = ? AND sync_status = 'success' AND remote_folder_id = ? ORDER BY sync_time DESC, id DESC LIMIT 1"
					)
					.get(fingerprint, remoteFolderId);
			}
			return this.db
				.prepare<[string], HistoryRow>(
					"SELECT * FROM file_sync_history WHERE file_hash = ? AND sync_status = 'success' ORDER BY sync_time DESC, id DESC LIMIT 1"
				)
				.get(fingerprint);
		});
		return row ? toRecord(row) : undefined;
	}

	trackingEntry(filePath: string): FileTrackingEntry | undefined {
		const row = this.guard("trackingEntry", () =>
			this.db.prepare<[string], TrackingRow>("SELECT * FROM file_tracking WHERE file_path = ?").get(filePath)
		);
		return row ? toTrackingEntry(row) : undefined;
	}

	trackingCount(): number {
		const row = this.guard("trackingCount", () =>
			this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM file_tracking").get()
		);
		return row?.count ?? 0;
	}

	/**
	 * The candidates whose content at that path has not been delivered yet.
	 * Candidates without a fingerprint are always kept.
	 */
	selectFilesNeedingSync<T extends FileMeta>(candidates: readonly T[]): T[] {
		const selected = candidates.filter((candidate) => {
			const tracked = candidate.fingerprint ? this.trackingEntry(candidate.path) : undefined;
			const action = determineSyncAction(candidate, tracked);
			logger.debug(`Sync decision for ${candidate.path}: ${action}`);
			return needsSync(action);
		});

		logger.info(`Found ${selected.length} files to sync out of ${candidates.length}`);
		return selected;
	}

	//-------------------------------------------------------
	// [Reporting]
	//-------------------------------------------------------
	statistics(options: { refresh?: boolean } = {}): SyncStats {
		const nowMs = this.now().getTime();
		if (!options.refresh && this.statsCache && nowMs - this.statsCache.computedAt < this.statsCacheTtlMs) {
			return this.statsCache.stats;
		}

		const stats = this.guard("statistics", () => this.computeStatistics(nowMs));
		this.statsCache = { stats, computedAt: nowMs };
		return stats;
	}

	private computeStatistics(nowMs: number): SyncStats {
		const overall = this.db
			.prepare<
				[],
				{ total_sessions: number; total_files: number; total_bytes: number; unique_files: number }
			>(
				`SELECT
					COUNT(DISTINCT session_id) AS total_sessions,
					COUNT(*) AS total_files,
					COALESCE(SUM(file_size), 0) AS total_bytes,
					COUNT(DISTINCT file_hash) AS unique_files
				FROM file_sync_history WHERE sync_status = 'success'`
			)
			.get();

		const todayStart = startOfDay(new Date(nowMs));
		const today = this.db
			.prepare<[number], { files: number; bytes: number; failed: number }>(
				`SELECT
					COALESCE(SUM(CASE WHEN sync_status = 'success' THEN 1 ELSE 0 END), 0) AS files,
					COALESCE(SUM(CASE WHEN sync_status = 'success' THEN file_size ELSE 0 END), 0) AS bytes,
					COALESCE(SUM(CASE WHEN sync_status = 'failed' THEN 1 ELSE 0 END), 0) AS failed
				FROM file_sync_history WHERE sync_time >= ?`
			)
			.get(todayStart);

		const errors = this.db
			.prepare<[number], { count: number }>(
				"SELECT COUNT(*) AS count FROM file_sync_history WHERE sync_status = 'failed' AND sync_time > ?"
			)
			.get(nowMs - 7 * DAY_MS);

		const successes = this.db
			.prepare<[], Pick<HistoryRow, "file_name" | "file_size">>(
				"SELECT file_name, file_size FROM file_sync_history WHERE sync_status = 'success'"
			)
			.all();

		const byExtension = new Map<string, ExtensionTotals>();
		for (const row of successes) {
			const extension = path.extname(row.file_name).toLowerCase() || "(none)";
			const totals = byExtension.get(extension) ?? { extension, count: 0, totalSize: 0 };
			totals.count += 1;
			totals.totalSize += row.file_size;
			byExtension.set(extension, totals);
		}

		return {
			totalSessions: overall?.total_sessions ?? 0,
			totalFilesSynced: overall?.total_files ?? 0,
			totalBytesSynced: overall?.total_bytes ?? 0,
			uniqueFiles: overall?.unique_files ?? 0,
			filesToday: today?.files ?? 0,
			bytesToday: today?.bytes ?? 0,
			failedToday: today?.failed ?? 0,
			recentErrors: errors?.count ?? 0,
			byExtension: [...byExtension.values()].sort(
				(a, b) => b.count - a.count || a.extension.localeCompare(b.extension)
			),
			computedAt: new Date(nowMs),
		};
	}

	/**
	 * Content that was delivered successfully more than once.
	 */
	duplicateReport(): DuplicateGroup[] {
		const rows = this.guard("duplicateReport", () =>
			this.db
				.prepare<[], { file_hash: string; duplicate_count: number; file_names: string; total_size: number }>(
					`SELECT
						file_hash,
						COUNT(*) AS duplicate_count,
						GROUP_CONCAT(file_name, char(31)) AS file_names,
						SUM(file_size) AS total_size
					FROM file_sync_history
					WHERE sync_status = 'success'
					GROUP BY file_hash
					HAVING COUNT(*) > 1
					ORDER BY duplicate_count DESC, file_hash`
				)
				.all()
		);
		return rows.map((row) => ({
			fingerprint: row.file_hash,
			duplicateCount: row.duplicate_count,
			fileNames: row.file_names.split("\u001f"),
			totalSize: row.total_size,
		}));
	}

	/**
	 * Writes the history as JSON: one session, or the latest 10 000 records.
	 * Returns the number of records written.
	 */
	async exportHistory(outputPath: string, sessionId?: string): Promise<number> {
		const rows = this.guard("exportHistory", () =>
			sessionId
				? this.db
						.prepare<[string], HistoryRow>("SELECT * FROM file_sync_history WHERE session_id = ? ORDER BY sync_time, id")
						.all(sessionId)
				: this.db
						.prepare<[], HistoryRow>("SELECT * FROM file_sync_history ORDER BY sync_time DESC, id DESC LIMIT 10000")
						.all()
		);

		const records = rows.map(toRecord).map((record) => ({ ...record, timestamp: record.timestamp.toISOString() }));
		await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
		await fs.promises.writeFile(outputPath, JSON.stringify(records, null, 2), "utf-8");

		logger.info(`Exported ${records.length} records to ${outputPath}`);
		return records.length;
	}

	//-------------------------------------------------------
	// [Maintenance]
	//-------------------------------------------------------
	/**
	 * Deletes closed sessions and history records older than `maxAgeMs`, then
	 * reclaims file space. Tracking entries are the live projection and stay.
	 */
	purgeOlderThan(maxAgeMs: number): PurgeResult {
		const cutoff = this.now().getTime() - maxAgeMs;

		const purge = this.db.transaction((): PurgeResult => {
			const sessionsDeleted = this.db
				.prepare<[number]>("DELETE FROM sync_sessions WHERE start_time < ? AND status != 'in_progress'")
				.run(cutoff).changes;
			const recordsDeleted = this.db
				.prepare<[number]>("DELETE FROM file_sync_history WHERE sync_time < ?")
				.run(cutoff).changes;
			return { sessionsDeleted, recordsDeleted };
		});

		const result = this.guard("purgeOlderThan", () => {
			const counts = purge();
			this.db.exec("VACUUM");
			return counts;
		});
		this.statsCache = undefined;

		logger.info(`Cleanup completed: ${result.sessionsDeleted} sessions, ${result.recordsDeleted} records deleted`);
		return result;
	}

	//-------------------------------------------------------
	// [Settings]
	//-------------------------------------------------------
	getSetting(key: string): string | undefined;
	getSetting(key: string, defaultValue: string): string;
	getSetting(key: string, defaultValue?: string): string | undefined {
		const row = this.guard("getSetting", () =>
			this.db.prepare<[string], { value: string }>("SELECT value FROM sync_settings WHERE key = ?").get(key)
		);
		return row?.value ?? defaultValue;
	}

	setSetting(key: string, value: string): void {
		this.guard("setSetting", () => {
			this.db
				.prepare<[string, string, number]>(
					`INSERT INTO sync_settings (key, value, updated_at) VALUES (?, ?, ?)
					ON CONFLICT(key) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at`
				)
				.run(key, value, this.now().getTime());
		});
	}
}
