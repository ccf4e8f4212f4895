import type { Logger, LoggerFactory } from "../types/index.js";
import { LOG_LEVELS, type LogLevel, getCurrentLevel } from "./log-level.js";

export interface LoggerOptions {
	/** Threshold for this logger; the process-wide level applies when absent. */
	level?: LogLevel;
	/** Receives each formatted line. Defaults to `console.log`. */
	write?: (line: string) => void;
}

function formatTimestamp(): string {
	return new Date().toISOString();
}

export class LoggerImpl implements Logger {
	constructor(
		private readonly prefix: string,
		private readonly options: LoggerOptions = {},
	) {}

	private log(level: LogLevel, message: string): void {
		const threshold = this.options.level ?? getCurrentLevel();
		if (LOG_LEVELS[level] < LOG_LEVELS[threshold]) {
			return;
		}
		const levelStr = level.toUpperCase().padEnd(5);
		const line = `[${formatTimestamp()}] [${levelStr}] [${this.prefix}] ${message}`;
		if (this.options.write) {
			this.options.write(line);
		} else {
			console.log(line);
		}
	}

	debug(message: string): void {
		this.log("debug", message);
	}

	info(message: string): void {
		this.log("info", message);
	}

	warn(message: string): void {
		this.log("warn", message);
	}

	error(message: string): void {
		this.log("error", message);
	}
}

/**
 * Loggers from one factory share its level and sink, so a locator and its
 * discovery engine can be silenced together without touching other loggers.
 */
export function createLoggerFactory(options: LoggerOptions = {}): LoggerFactory {
	return (prefix: string) => new LoggerImpl(prefix, options);
}

export const createLogger: LoggerFactory = createLoggerFactory();
