import type Database from "better-sqlite3";

/**
 * Ledger DDL. Every statement is idempotent, so this runs on every open.
 * Timestamps are epoch milliseconds.
 */
export function initLedgerSchema(db: Database.Database): void {
	db.exec(`
		CREATE TABLE IF NOT EXISTS sync_sessions (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			session_id TEXT UNIQUE NOT NULL,
			source_path TEXT NOT NULL,
			start_time INTEGER NOT NULL,
			end_time INTEGER,
			status TEXT CHECK(status IN ('in_progress', 'completed', 'failed')) NOT NULL DEFAULT 'in_progress',
			total_files INTEGER NOT NULL DEFAULT 0,
			synced_files INTEGER NOT NULL DEFAULT 0,
			failed_files INTEGER NOT NULL DEFAULT 0,
			skipped_files INTEGER NOT NULL DEFAULT 0,
			total_size_bytes INTEGER NOT NULL DEFAULT 0,
			synced_size_bytes INTEGER NOT NULL DEFAULT 0,
			error_message TEXT
		);

		CREATE INDEX IF NOT EXISTS idx_sessions_start ON sync_sessions(start_time DESC);

		CREATE TABLE IF NOT EXISTS file_sync_history (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			session_id TEXT NOT NULL,
			file_path TEXT NOT NULL,
			file_name TEXT NOT NULL,
			file_size INTEGER NOT NULL DEFAULT 0,
			file_hash TEXT,
			remote_file_id TEXT,
			remote_folder_id TEXT,
			sync_status TEXT CHECK(sync_status IN ('pending', 'success', 'failed', 'skipped')) NOT NULL,
			sync_time INTEGER NOT NULL,
			error_message TEXT,
			retry_count INTEGER NOT NULL DEFAULT 0,
			CHECK(sync_status != 'success' OR file_hash IS NOT NULL),
			FOREIGN KEY(session_id) REFERENCES sync_sessions(session_id)
		);

		CREATE INDEX IF NOT EXISTS idx_history_hash ON file_sync_history(file_hash);
		CREATE INDEX IF NOT EXISTS idx_history_session ON file_sync_history(session_id);
		CREATE INDEX IF NOT EXISTS idx_history_time ON file_sync_history(sync_time);

		CREATE TABLE IF NOT EXISTS file_tracking (
			id INTEGER PRIMARY KEY AUTOINCREMENT,
			file_path TEXT UNIQUE NOT NULL,
			file_name TEXT NOT NULL,
			file_size INTEGER NOT NULL,
			file_hash TEXT NOT NULL,
			last_modified INTEGER NOT NULL,
			last_synced INTEGER NOT NULL,
			remote_file_id TEXT,
			sync_count INTEGER NOT NULL DEFAULT 1,
			updated_at INTEGER NOT NULL
		);

		CREATE TABLE IF NOT EXISTS sync_settings (
			key TEXT PRIMARY KEY,
			value TEXT NOT NULL,
			updated_at INTEGER NOT NULL
		);
	`);
}

//-------------------------------------------------------
// [Row shapes]
//-------------------------------------------------------
export interface SessionRow {
	session_id: string;
	source_path: string;
	start_time: number;
	end_time: number | null;
	status: "in_progress" | "completed" | "failed";
	total_files: number;
	synced_files: number;
	failed_files: number;
	skipped_files: number;
	total_size_bytes: number;
	synced_size_bytes: number;
	error_message: string | null;
}

export interface HistoryRow {
	id: number;
	session_id: string;
	file_path: string;
	file_name: string;
	file_size: number;
	file_hash: string | null;
	remote_file_id: string | null;
	remote_folder_id: string | null;
	sync_status: "pending" | "success" | "failed" | "skipped";
	sync_time: number;
	error_message: string | null;
	retry_count: number;
}

export interface TrackingRow {
	file_path: string;
	file_name: string;
	file_size: number;
	file_hash: string;
	last_modified: number;
	last_synced: number;
	remote_file_id: string | null;
	sync_count: number;
}
