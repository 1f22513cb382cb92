import { FileMeta, FileTrackingEntry, SyncAction } from "../types";

/**
 * Determines the required sync action for a single local file, given what the
 * ledger last recorded for its path.
 */
export function determineSyncAction(candidate: FileMeta, tracked: FileTrackingEntry | undefined): SyncAction {
	// Without a fingerprint there is nothing to compare against.
	if (!candidate.fingerprint) {
		return SyncAction.UPLOAD_UNHASHED;
	}

	if (candidate.forceSync) {
		return SyncAction.UPLOAD_FORCED;
	}

	if (!tracked) {
		return SyncAction.UPLOAD_NEW;
	}

	if (tracked.fingerprint !== candidate.fingerprint) {
		return SyncAction.UPLOAD_UPDATE;
	}

	return SyncAction.SKIP_UNCHANGED;
}

export function needsSync(action: SyncAction): boolean {
	return action !== SyncAction.SKIP_UNCHANGED;
}
