/**
 * Logging Configuration
 * The TUI owns stdout, so logs go to a rotating file and console output is opt-in.
 */

import { homedir } from "node:os";
import { join } from "node:path";

// Kept here rather than in Logger to avoid a circular import with LogWriter
export enum LogLevel {
	DEBUG = 0,
	INFO = 1,
	WARN = 2,
	ERROR = 3,
	NONE = 4,
}

export interface LoggingConfig {
	/** Minimum log level to write */
	level: LogLevel;
	fileLogging: boolean;
	consoleLogging: boolean;
	/** Rotate once the active file grows past this many bytes */
	maxFileSize: number;
	/** Rotated files kept next to the active one */
	maxFiles: number;
	logDir: string;
	filename: string;
	/** Buffered lines are flushed on this interval */
	flushIntervalMs: number;
}

export function parseLogLevel(value: string | undefined): LogLevel {
	switch (value?.trim().toUpperCase()) {
		case "DEBUG":
			return LogLevel.DEBUG;
		case "WARN":
			return LogLevel.WARN;
		case "ERROR":
			return LogLevel.ERROR;
		case "NONE":
			return LogLevel.NONE;
		default:
			return LogLevel.INFO;
	}
}

/**
 * Build the logging configuration from the environment
 */
export function getLoggingConfig(
	env: NodeJS.ProcessEnv = process.env,
): LoggingConfig {
	return {
		level: parseLogLevel(env.TUBEPLAY_LOG_LEVEL),
		fileLogging: env.TUBEPLAY_LOG_FILE !== "false",
		consoleLogging: env.TUBEPLAY_LOG_CONSOLE === "true",
		maxFileSize: 5 * 1024 * 1024, // 5MB
		maxFiles: 5,
		logDir: env.TUBEPLAY_LOG_DIR || join(homedir(), ".tubeplay", "logs"),
		filename: "tubeplay.log",
		flushIntervalMs: 1000,
	};
}
