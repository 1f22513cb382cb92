import ora from "ora";

import { UploadStats } from "../types";
import { formatSize } from "../utils";

const COLORS: { [key: string]: string } = {
	INFO: "\x1b[32m",
	WARN: "\x1b[33m",
	ERROR: "\x1b[31m",
	SUCCESS: "\x1b[36m",
	DEBUG: "\x1b[90m",
};

const ICONS: { [key: string]: string } = {
	INFO: "ℹ",
	WARN: "⚠",
	ERROR: "✖",
	SUCCESS: "✔",
	DEBUG: "⚙",
};

// Log lines reach this class through the logger's UI transport, so it must not log itself.
export class InteractiveUI {
	private spinner: ora.Ora;

	constructor() {
		this.spinner = ora({
			text: "Initializing...",
			spinner: "dots",
			color: "cyan",
		});
	}

	start() {
		this.spinner.start();
	}

	stop() {
		if (this.spinner.isSpinning) {
			this.spinner.stop();
		}
	}

	logEvent(level: string, message: string) {
		const key = level.toUpperCase();
		const color = COLORS[key] || "\x1b[0m";
		const icon = ICONS[key] || " ";
		const wasSpinning = this.spinner.isSpinning;

		this.spinner.stopAndPersist({
			symbol: `${color}${icon}\x1b[0m`,
			text: message,
		});
		if (wasSpinning) {
			this.spinner.start();
		}
	}

	updateStatus(status: string) {
		this.spinner.text = status;
	}

	updateProgress(stats: UploadStats, total: number) {
		this.spinner.text =
			`Uploading ${stats.totalFiles}/${total}: ` +
			`${stats.uploadedFiles} uploaded, ${stats.skippedFiles} skipped, ${stats.failedFiles} failed ` +
			`(${formatSize(stats.uploadedBytes)})`;
	}
}

export const ui = new InteractiveUI();
