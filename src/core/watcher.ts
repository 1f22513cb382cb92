import * as chokidar from "chokidar";
import { promises as fs } from "fs";
import * as path from "path";

import { errorMessage } from "../errors";
import logger from "../services/logger";

export const VOLUME_ID_FILE = ".volumeID";

/**
 * Whether a mounted volume is one to sync: its name contains `identifier`, or
 * its `.volumeID` file holds exactly that identifier. Without an identifier
 * every volume qualifies.
 */
export async function isTargetVolume(volumePath: string, identifier?: string): Promise<boolean> {
	if (!identifier) {
		return true;
	}

	const volumeName = path.basename(volumePath);
	if (volumeName.includes(identifier)) {
		logger.info(`Target volume detected: ${volumeName}`);
		return true;
	}

	try {
		const volumeId = (await fs.readFile(path.join(volumePath, VOLUME_ID_FILE), "utf-8")).trim();
		if (volumeId === identifier) {
			logger.info(`Target volume detected by ID: ${volumeName}`);
			return true;
		}
	} catch (err) {
		logger.debug(`No volume ID on ${volumeName}: ${errorMessage(err)}`);
	}
	return false;
}

/**
 * First already-mounted volume under `mountRoot` that qualifies.
 */
export async function findMountedTarget(mountRoot: string, identifier?: string): Promise<string | undefined> {
	let entries: string[];
	try {
		entries = await fs.readdir(mountRoot);
	} catch (err) {
		logger.warn(`Cannot read mount root ${mountRoot}: ${errorMessage(err)}`);
		return undefined;
	}

	for (const entry of entries.sort()) {
		const volumePath = path.join(mountRoot, entry);
		const stat = await fs.stat(volumePath).catch(() => undefined);
		if (stat?.isDirectory() && (await isTargetVolume(volumePath, identifier))) {
			return volumePath;
		}
	}
	return undefined;
}

export interface WatchOptions {
	identifier?: string;
	/** Wait after the mount appears before reading it. */
	debounceMs?: number;
}

export interface MountWatcher {
	/** Resolves once the initial scan of `mountRoot` is done. */
	ready: Promise<void>;
	close(): Promise<void>;
}

/**
 * Calls `onMount` for each target volume that appears under `mountRoot`.
 * Calls run one at a time, in mount order.
 */
export function watchMounts(
	mountRoot: string,
	onMount: (volumePath: string) => Promise<void>,
	options: WatchOptions = {}
): MountWatcher {
	const debounceMs = options.debounceMs ?? 2000;
	const pending: { [key: string]: NodeJS.Timeout } = {};
	let queue: Promise<void> = Promise.resolve();

	const watcher = chokidar.watch(mountRoot, {
		depth: 0,
		persistent: true,
		ignoreInitial: true,
	});

	const ready = new Promise<void>((resolve) => {
		watcher.once("ready", () => resolve());
	});

	watcher.on("addDir", (volumePath) => {
		if (path.resolve(volumePath) === path.resolve(mountRoot)) {
			return;
		}
		logger.info(`Volume mounted: ${volumePath}`);

		if (pending[volumePath]) {
			clearTimeout(pending[volumePath]);
		}
		pending[volumePath] = setTimeout(() => {
			delete pending[volumePath];
			queue = queue
				.then(async () => {
					if (await isTargetVolume(volumePath, options.identifier)) {
						await onMount(volumePath);
					} else {
						logger.debug(`Ignoring volume: ${volumePath}`);
					}
				})
				.catch((err: unknown) => {
					logger.error(`Sync for ${volumePath} failed: ${errorMessage(err)}`);
				});
		}, debounceMs);
	});

	watcher.on("unlinkDir", (volumePath) => {
		logger.info(`Volume removed: ${volumePath}`);
		if (pending[volumePath]) {
			clearTimeout(pending[volumePath]);
			delete pending[volumePath];
		}
	});

	watcher.on("error", (err) => {
		logger.error(`Mount watcher error: ${errorMessage(err)}`);
	});

	return {
		ready,
		async close() {
			for (const timer of Object.values(pending)) {
				clearTimeout(timer);
			}
			await watcher.close();
			await queue;
		},
	};
}
