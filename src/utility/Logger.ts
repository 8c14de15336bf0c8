/**
 * File Logger with per-run audit logs
 *
 * Every verification run writes its own append-only file:
 * - <logDir>/zfs-<phase>-YYYYMMDD-HHMMSS.log
 *
 * Features:
 * - Level filtering (DEBUG/INFO/WARN/ERROR) for diagnostic entries
 * - Timestamps on diagnostic entries; mirrored console text is written as-is
 * - ANSI colour codes stripped before they reach the file
 * - Nothing touches the disk until open() is called
 */

import * as fs from "node:fs";
import * as path from "node:path";

export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
}

export type LogLevelName = "debug" | "info" | "warn" | "error";

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
	debug: LogLevel.DEBUG,
	info: LogLevel.INFO,
	warn: LogLevel.WARN,
	error: LogLevel.ERROR,
};

function isLogLevelName(value: string): value is LogLevelName {
	return value in LEVEL_BY_NAME;
}

const LEVEL_PREFIX = ["[DEBUG]", "[INFO]", "[WARN]", "[ERROR]"];

// eslint-disable-next-line no-control-regex
const ANSI_REGEX = /\x1b\[[0-9;]*m/g;

export function stripAnsi(text: string): string {
	return text.replace(ANSI_REGEX, "");
}

function pad(value: number, width = 2): string {
	return value.toString().padStart(width, "0");
}

/**
 * YYYY-MM-DD HH:MM:SS in local time
 */
export function formatTimestamp(date: Date): string {
	return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Build the log file path for one run, e.g. /var/log/zfs-pre-20240301-142501.log
 */
export function runLogPath(logDir: string, prefix: string, startedAt: Date): string {
	const stamp = `${startedAt.getFullYear()}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}-${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`;
	return path.join(logDir, `${prefix}-${stamp}.log`);
}

export class Logger {
	private static instance: Logger;
	private logPath: string | null = null;
	private writeStream: fs.WriteStream | null = null;
	private minLevel: LogLevel = LogLevel.INFO;

	private constructor() {
		const envLogLevel = process.env.LOG_LEVEL?.toLowerCase();
		if (envLogLevel && isLogLevelName(envLogLevel)) {
			this.setLevel(envLogLevel);
		}
	}

	static getInstance(): Logger {
		if (!Logger.instance) {
			Logger.instance = new Logger();
		}
		return Logger.instance;
	}

	setLevel(level: LogLevelName): void {
		this.minLevel = LEVEL_BY_NAME[level];
	}

	/**
	 * Start appending to the given file, closing any previously opened one
	 */
	open(logPath: string, title: string): void {
		this.writeStream?.end();
		fs.mkdirSync(path.dirname(logPath), { recursive: true });

		const header = `\n=== ${title} ===\nStarted: ${formatTimestamp(new Date())}\n\n`;
		fs.appendFileSync(logPath, header, "utf8");

		this.logPath = logPath;
		this.writeStream = fs.createWriteStream(logPath, {
			flags: "a",
			encoding: "utf8",
		});

		this.writeStream.on("error", (error) => {
			// Use process.stderr.write directly to avoid recursion through interceptConsole
			process.stderr.write(`Log write stream error: ${error}\n`);
			this.writeStream = null;
		});
	}

	getLogPath(): string | null {
		return this.logPath;
	}

	private _log(level: LogLevel, message: string): void {
		if (level < this.minLevel) {
			return;
		}
		this.append(`[${formatTimestamp(new Date())}] ${LEVEL_PREFIX[level]} ${stripAnsi(message)}\n`);
	}

	private append(entry: string): void {
		if (this.writeStream) {
			this.writeStream.write(entry);
			return;
		}

		if (this.logPath) {
			try {
				fs.appendFileSync(this.logPath, entry, "utf8");
			} catch (error) {
				process.stderr.write(`Log append failed: ${error}\n`);
			}
		}
	}

	debug(message: string): void {
		this._log(LogLevel.DEBUG, message);
	}

	info(message: string): void {
		this._log(LogLevel.INFO, message);
	}

	warn(message: string): void {
		this._log(LogLevel.WARN, message);
	}

	error(message: string): void {
		this._log(LogLevel.ERROR, message);
	}

	/**
	 * Write a message as-is, without timestamp or level filtering
	 */
	logRaw(message: string): void {
		this.append(`${stripAnsi(message)}\n`);
	}

	/**
	 * Flush and close the write stream
	 */
	close(): Promise<void> {
		const stream = this.writeStream;
		this.writeStream = null;
		if (!stream) {
			return Promise.resolve();
		}
		return new Promise((resolve) => {
			stream.end(() => resolve());
		});
	}
}

/**
 * Mirror console output into the run log. Console text is what the operator
 * saw, so it is recorded whatever the log level.
 */
export function interceptConsole(): void {
	const logger = Logger.getInstance();

	const originalLog = console.log;
	const originalError = console.error;
	const originalWarn = console.warn;

	const mirror = (args: unknown[]) => logger.logRaw(args.map((arg) => String(arg)).join(" "));

	console.log = (...args: unknown[]) => {
		mirror(args);
		originalLog.apply(console, args);
	};

	console.error = (...args: unknown[]) => {
		mirror(args);
		originalError.apply(console, args);
	};

	console.warn = (...args: unknown[]) => {
		mirror(args);
		originalWarn.apply(console, args);
	};
}
