import { promises as fs } from "fs";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { InvalidInputError, StorageError } from "../../src/errors";
import { FingerprintLedger } from "../../src/services/ledger";
import { FileAttempt, FileMeta } from "../../src/types";
import { makeTempDir, removeDir } from "../helpers";

const DAY_MS = 24 * 60 * 60 * 1000;

function attempt(name: string, fingerprint: string | undefined, size = 100, folder = "folder-1"): FileAttempt {
	return {
		path: `/staging/processed/20260302/${name}`,
		name,
		size,
		fingerprint,
		lastModified: "2026-03-01T08:00:00.000Z",
		remoteId: fingerprint ? `remote-${name}` : undefined,
		remoteFolderId: folder,
	};
}

describe("FingerprintLedger", () => {
	let clock: Date;
	let ledger: FingerprintLedger;

	beforeEach(() => {
		clock = new Date(2026, 2, 2, 10, 0, 0);
		ledger = FingerprintLedger.open(":memory:", { now: () => clock, statsCacheTtlMs: 1000 });
	});

	afterEach(() => {
		ledger.close();
	});

	describe("sessions", () => {
		it("opens sessions in progress with a timestamped id", () => {
			const id = ledger.openSession("/media/RECORDER");

			expect(id).toMatch(/^session_20260302_100000_[0-9a-f]{8}$/);
			const session = ledger.getSession(id);
			expect(session?.status).toBe("in_progress");
			expect(session?.sourcePath).toBe("/media/RECORDER");
			expect(session?.totalFiles).toBe(0);
			expect(session?.endTime).toBeUndefined();
		});

		it("closes a session once and ignores a second close", () => {
			const id = ledger.openSession("src");
			clock = new Date(2026, 2, 2, 10, 5, 0);

			expect(ledger.closeSession(id, false, "disk gone")).toBe(true);
			expect(ledger.closeSession(id, true)).toBe(false);

			const session = ledger.getSession(id);
			expect(session?.status).toBe("failed");
			expect(session?.errorMessage).toBe("disk gone");
			expect(session?.endTime?.getTime()).toBe(clock.getTime());
		});

		it("returns false when closing an unknown session", () => {
			expect(ledger.closeSession("session_missing", true)).toBe(false);
		});

		it("lists history newest first", () => {
			const first = ledger.openSession("a");
			clock = new Date(2026, 2, 2, 11, 0, 0);
			const second = ledger.openSession("b");

			expect(ledger.sessionHistory().map((session) => session.sessionId)).toEqual([second, first]);
			expect(ledger.sessionHistory(1).map((session) => session.sessionId)).toEqual([second]);
		});

		it("overwrites the counters given", () => {
			const id = ledger.openSession("src");
			ledger.updateSessionCounters(id, { totalFiles: 7, failedFiles: 2 });

			const session = ledger.getSession(id);
			expect(session?.totalFiles).toBe(7);
			expect(session?.failedFiles).toBe(2);
			expect(session?.syncedFiles).toBe(0);
		});
	});

	describe("recordAttempt", () => {
		it("records a success, bumps counters and creates the tracking entry", () => {
			const id = ledger.openSession("src");
			ledger.recordAttempt(id, attempt("memo.mp3", "fp-1", 250), "success");

			const session = ledger.getSession(id);
			expect(session?.totalFiles).toBe(1);
			expect(session?.syncedFiles).toBe(1);
			expect(session?.syncedBytes).toBe(250);
			expect(session?.totalBytes).toBe(250);

			const entry = ledger.trackingEntry("/staging/processed/20260302/memo.mp3");
			expect(entry?.fingerprint).toBe("fp-1");
			expect(entry?.syncCount).toBe(1);
			expect(entry?.remoteId).toBe("remote-memo.mp3");
			expect(entry?.lastModified.toISOString()).toBe("2026-03-01T08:00:00.000Z");
		});

		it("treats a repeated success in the same session as already recorded", () => {
			const id = ledger.openSession("src");
			const first = ledger.recordAttempt(id, attempt("memo.mp3", "fp-1"), "success");
			const second = ledger.recordAttempt(id, attempt("memo.mp3", "fp-1"), "success");

			expect(second).toBe(first);
			expect(ledger.recordsForSession(id)).toHaveLength(1);
			expect(ledger.getSession(id)?.totalFiles).toBe(1);
			expect(ledger.trackingEntry("/staging/processed/20260302/memo.mp3")?.syncCount).toBe(1);
		});

		it("increments sync_count when the same path is delivered again", () => {
			const first = ledger.openSession("src");
			ledger.recordAttempt(first, attempt("memo.mp3", "fp-1"), "success");
			ledger.closeSession(first, true);

			const second = ledger.openSession("src");
			ledger.recordAttempt(second, attempt("memo.mp3", "fp-2"), "success");

			const entry = ledger.trackingEntry("/staging/processed/20260302/memo.mp3");
			expect(entry?.syncCount).toBe(2);
			expect(entry?.fingerprint).toBe("fp-2");
			expect(ledger.trackingCount()).toBe(1);
		});

		it("counts failures and skips without touching tracking", () => {
			const id = ledger.openSession("src");
			ledger.recordAttempt(id, attempt("bad.mp3", "fp-1", 10), "failed", "boom");
			ledger.recordAttempt(id, attempt("dup.mp3", "fp-2", 20), "skipped", "skipped: duplicate");

			const session = ledger.getSession(id);
			expect(session?.totalFiles).toBe(2);
			expect(session?.failedFiles).toBe(1);
			expect(session?.skippedFiles).toBe(1);
			expect(session?.syncedBytes).toBe(0);
			expect(ledger.trackingCount()).toBe(0);

			const records = ledger.recordsForSession(id);
			expect(records.map((record) => [record.status, record.error])).toEqual([
				["failed", "boom"],
				["skipped", "skipped: duplicate"],
			]);
		});

		it("rejects a success without a fingerprint", () => {
			const id = ledger.openSession("src");
			expect(() => ledger.recordAttempt(id, attempt("memo.mp3", undefined), "success")).toThrow(InvalidInputError);
			expect(ledger.recordsForSession(id)).toHaveLength(0);
		});

		it("rejects records for closed or unknown sessions", () => {
			const id = ledger.openSession("src");
			ledger.closeSession(id, true);

			expect(() => ledger.recordAttempt(id, attempt("memo.mp3", "fp-1"), "success")).toThrow(InvalidInputError);
			expect(() => ledger.recordAttempt("session_missing", attempt("memo.mp3", "fp-1"), "failed")).toThrow(
				InvalidInputError
			);
		});
	});

	describe("dedup", () => {
		it("finds the latest success for a fingerprint, optionally per folder", () => {
			const id = ledger.openSession("src");
			ledger.recordAttempt(id, attempt("a.mp3", "fp-1", 100, "folder-1"), "success");
			ledger.recordAttempt(id, attempt("b.mp3", "fp-2", 100, "folder-1"), "failed", "boom");

			expect(ledger.isDuplicate("fp-1")?.name).toBe("a.mp3");
			expect(ledger.isDuplicate("fp-1", "folder-1")?.remoteId).toBe("remote-a.mp3");
			expect(ledger.isDuplicate("fp-1", "folder-2")).toBeUndefined();
			expect(ledger.isDuplicate("fp-2")).toBeUndefined();
		});

		it("selects only content not yet delivered at its path", () => {
			const id = ledger.openSession("src");
			ledger.recordAttempt(id, attempt("old.mp3", "fp-old"), "success");

			const meta = (name: string, fingerprint?: string): FileMeta => ({
				path: `/staging/processed/20260302/${name}`,
				name,
				size: 100,
				mtime: "2026-03-01T08:00:00.000Z",
				fingerprint,
			});
			const candidates = [meta("old.mp3", "fp-old"), meta("new.mp3", "fp-new"), meta("raw.mp3")];

			expect(ledger.selectFilesNeedingSync(candidates).map((file) => file.name)).toEqual(["new.mp3", "raw.mp3"]);

			ledger.recordAttempt(id, attempt("new.mp3", "fp-new"), "success");
			expect(ledger.selectFilesNeedingSync(candidates).map((file) => file.name)).toEqual(["raw.mp3"]);
		});
	});

	describe("statistics", () => {
		it("summarises deliveries and groups them by extension", () => {
			const id = ledger.openSession("src");
			ledger.recordAttempt(id, attempt("x.wav", "fp-x", 100), "success");
			ledger.recordAttempt(id, attempt("y.WAV", "fp-y", 50), "success");
			ledger.recordAttempt(id, attempt("z.mp3", "fp-z", 30), "success");
			ledger.recordAttempt(id, attempt("broken.mp3", "fp-b", 5), "failed", "boom");

			const stats = ledger.statistics();
			expect(stats.totalSessions).toBe(1);
			expect(stats.totalFilesSynced).toBe(3);
			expect(stats.totalBytesSynced).toBe(180);
			expect(stats.uniqueFiles).toBe(3);
			expect(stats.filesToday).toBe(3);
			expect(stats.bytesToday).toBe(180);
			expect(stats.failedToday).toBe(1);
			expect(stats.recentErrors).toBe(1);
			expect(stats.byExtension).toEqual([
				{ extension: ".wav", count: 2, totalSize: 150 },
				{ extension: ".mp3", count: 1, totalSize: 30 },
			]);
		});

		it("serves a cached result until it expires or a refresh is asked for", () => {
			const id = ledger.openSession("src");
			ledger.recordAttempt(id, attempt("a.mp3", "fp-a"), "success");
			const cached = ledger.statistics();

			ledger.recordAttempt(id, attempt("b.mp3", "fp-b"), "success");
			expect(ledger.statistics()).toBe(cached);
			expect(ledger.statistics({ refresh: true }).totalFilesSynced).toBe(2);

			ledger.recordAttempt(id, attempt("c.mp3", "fp-c"), "success");
			clock = new Date(clock.getTime() + 1000);
			expect(ledger.statistics().totalFilesSynced).toBe(3);
		});
	});

	describe("reports", () => {
		it("lists content delivered more than once", () => {
			const first = ledger.openSession("src");
			ledger.recordAttempt(first, attempt("take1.mp3", "fp-dup", 40), "success");
			ledger.recordAttempt(first, attempt("take2.mp3", "fp-dup", 40), "success");
			ledger.recordAttempt(first, attempt("solo.mp3", "fp-solo", 10), "success");

			const report = ledger.duplicateReport();
			expect(report).toHaveLength(1);
			expect(report[0].fingerprint).toBe("fp-dup");
			expect(report[0].duplicateCount).toBe(2);
			expect(report[0].totalSize).toBe(80);
			expect([...report[0].fileNames].sort()).toEqual(["take1.mp3", "take2.mp3"]);
		});

		it("exports history as JSON, whole or per session", async () => {
			const dir = await makeTempDir();
			try {
				const first = ledger.openSession("src");
				ledger.recordAttempt(first, attempt("a.mp3", "fp-a"), "success");
				const second = ledger.openSession("src");
				ledger.recordAttempt(second, attempt("b.mp3", "fp-b"), "failed", "boom");

				const allPath = path.join(dir, "out", "all.json");
				expect(await ledger.exportHistory(allPath)).toBe(2);

				const sessionPath = path.join(dir, "session.json");
				expect(await ledger.exportHistory(sessionPath, second)).toBe(1);
				const exported: unknown = JSON.parse(await fs.readFile(sessionPath, "utf-8"));
				expect(exported).toEqual([
					expect.objectContaining({
						sessionId: second,
						name: "b.mp3",
						status: "failed",
						error: "boom",
						timestamp: clock.toISOString(),
					}),
				]);
			} finally {
				await removeDir(dir);
			}
		});
	});

	describe("purgeOlderThan", () => {
		it("drops old closed sessions and records but keeps tracking", () => {
			const old = ledger.openSession("src");
			ledger.recordAttempt(old, attempt("a.mp3", "fp-a"), "success");
			ledger.closeSession(old, true);
			const stuck = ledger.openSession("src");

			clock = new Date(clock.getTime() + 100 * DAY_MS);
			const recent = ledger.openSession("src");
			ledger.recordAttempt(recent, attempt("b.mp3", "fp-b"), "success");
			expect(ledger.statistics().totalFilesSynced).toBe(2);

			expect(ledger.purgeOlderThan(90 * DAY_MS)).toEqual({ sessionsDeleted: 1, recordsDeleted: 1 });
			expect(ledger.getSession(old)).toBeUndefined();
			expect(ledger.getSession(stuck)?.status).toBe("in_progress");
			expect(ledger.getSession(recent)).toBeDefined();
			expect(ledger.trackingCount()).toBe(2);
			expect(ledger.statistics().totalFilesSynced).toBe(1);
		});
	});

	describe("settings", () => {
		it("stores and overwrites values", () => {
			expect(ledger.getSetting("last_volume")).toBeUndefined();
			expect(ledger.getSetting("last_volume", "none")).toBe("none");

			ledger.setSetting("last_volume", "REC-A");
			ledger.setSetting("last_volume", "REC-B");
			expect(ledger.getSetting("last_volume")).toBe("REC-B");
		});
	});

	it("raises StorageError when the ledger file cannot be created", async () => {
		const dir = await makeTempDir();
		try {
			const blocker = path.join(dir, "not-a-dir");
			await fs.writeFile(blocker, "x");
			expect(() => FingerprintLedger.open(path.join(blocker, "ledger.db"))).toThrow(StorageError);
		} finally {
			await removeDir(dir);
		}
	});
});
