import * as winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import TransportStream from "winston-transport";
import * as fs from "fs";
import * as path from "path";

export const DEFAULT_LOG_DIR = "logs";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;

const lineFormat = winston.format.printf((info) => `${info.timestamp} [${info.level.toUpperCase()}]: ${info.message}`);

/**
 * Anything that can display a log line to the user, e.g. the spinner UI.
 */
export interface UiSink {
	logEvent(level: string, message: string): void;
}

interface UiTransportOptions extends TransportStream.TransportStreamOptions {
	sink: UiSink;
}

// Custom transport for winston that prints through the interactive UI
class UiTransport extends TransportStream {
	private readonly sink: UiSink;

	constructor(opts: UiTransportOptions) {
		super(opts);
		this.sink = opts.sink;
	}

	log(info: Record<string | symbol, unknown>, callback: () => void) {
		setImmediate(() => {
			this.emit("logged", info);
		});

		const level = String(info[Symbol.for("level")] ?? "info");
		this.sink.logEvent(level.toUpperCase(), String(info.message));

		callback();
	}
}

function rotatingFile(logDir: string, name: string, level: string): DailyRotateFile {
	return new DailyRotateFile({
		filename: path.join(logDir, `${name}-%DATE%.log`),
		datePattern: "YYYY-MM-DD",
		zippedArchive: true,
		maxSize: "10m",
		maxFiles: "14d",
		level,
	});
}

const logger = winston.createLogger({
	level: "info",
	silent: isTest,
	format: winston.format.combine(winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }), lineFormat),
	transports: [],
});

let consoleTransport: TransportStream | undefined;

/**
 * Attaches the rotating file transports. Called once at startup, after the
 * config has named the log directory.
 */
export function configureLogger(options: { logDir?: string; level?: string } = {}): void {
	if (isTest) {
		return;
	}

	const logDir = options.logDir ?? DEFAULT_LOG_DIR;
	fs.mkdirSync(logDir, { recursive: true });

	logger.clear();
	logger.level = options.level ?? "info";
	logger.add(rotatingFile(logDir, "sync", "info"));
	logger.add(rotatingFile(logDir, "sync-warn", "warn"));
	logger.add(rotatingFile(logDir, "sync-error", "error"));
	logger.exceptions.handle(new winston.transports.File({ filename: path.join(logDir, "exceptions.log") }));
	logger.rejections.handle(new winston.transports.File({ filename: path.join(logDir, "rejections.log") }));

	if (process.env.NODE_ENV !== "production") {
		consoleTransport = new winston.transports.Console({
			format: winston.format.combine(
				winston.format.colorize(),
				winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
				lineFormat
			),
			level: logger.level,
		});
		logger.add(consoleTransport);
	}
}

/**
 * Routes console output through the interactive UI instead of plain stdout.
 */
export function attachUiTransport(sink: UiSink): void {
	if (isTest) {
		return;
	}
	if (consoleTransport) {
		logger.remove(consoleTransport);
		consoleTransport = undefined;
	}
	logger.add(new UiTransport({ sink, level: logger.level }));
}

export default logger;
