import { describe, expect, it } from "vitest";

import { determineSyncAction, needsSync } from "../../src/core/decision";
import { FileMeta, FileTrackingEntry, SyncAction } from "../../src/types";

const baseTime = new Date("2026-03-02T10:00:00Z");

const candidate: FileMeta = {
	path: "/staging/processed/20260302/memo.mp3",
	name: "memo.mp3",
	size: 2048,
	mtime: baseTime.toISOString(),
	fingerprint: "aaaa1111",
};

const tracked: FileTrackingEntry = {
	path: candidate.path,
	name: candidate.name,
	size: candidate.size,
	fingerprint: "aaaa1111",
	lastModified: baseTime,
	lastSynced: baseTime,
	syncCount: 1,
};

describe("determineSyncAction", () => {
	it("uploads a file the ledger has never seen", () => {
		expect(determineSyncAction(candidate, undefined)).toBe(SyncAction.UPLOAD_NEW);
	});

	it("skips a file whose fingerprint matches the tracked one", () => {
		expect(determineSyncAction(candidate, tracked)).toBe(SyncAction.SKIP_UNCHANGED);
	});

	it("uploads a file whose content changed since the last sync", () => {
		expect(determineSyncAction({ ...candidate, fingerprint: "bbbb2222" }, tracked)).toBe(SyncAction.UPLOAD_UPDATE);
	});

	it("honors the force flag even when unchanged", () => {
		expect(determineSyncAction({ ...candidate, forceSync: true }, tracked)).toBe(SyncAction.UPLOAD_FORCED);
	});

	it("keeps files without a fingerprint", () => {
		expect(determineSyncAction({ ...candidate, fingerprint: undefined }, tracked)).toBe(SyncAction.UPLOAD_UNHASHED);
	});
});

describe("needsSync", () => {
	it("is false only for unchanged files", () => {
		expect(needsSync(SyncAction.SKIP_UNCHANGED)).toBe(false);
		expect(needsSync(SyncAction.UPLOAD_NEW)).toBe(true);
		expect(needsSync(SyncAction.UPLOAD_UNHASHED)).toBe(true);
	});
});
