/**
 * Logger Service
 * Leveled, contextual logging with file persistence
 */

import { getLoggingConfig, LogLevel } from "../config/logging";
import { getLogWriter, type LogWriter } from "./LogWriter";

export { LogLevel } from "../config/logging";

export interface LoggerConfig {
	level: LogLevel;
	enableTimestamps: boolean;
	enableColors: boolean;
	enableFileLogging: boolean;
	enableConsoleLogging: boolean;
}

function defaultConfig(): LoggerConfig {
	const logging = getLoggingConfig();
	return {
		level: logging.level,
		enableTimestamps: true,
		enableColors: true,
		enableFileLogging: logging.fileLogging,
		enableConsoleLogging: logging.consoleLogging,
	};
}

const colors = {
	reset: "\x1b[0m",
	dim: "\x1b[2m",
	red: "\x1b[31m",
	yellow: "\x1b[33m",
	blue: "\x1b[34m",
	cyan: "\x1b[36m",
	gray: "\x1b[90m",
};

function describe(data: unknown, pretty: boolean): string {
	if (data instanceof Error) {
		return pretty
			? JSON.stringify({ name: data.name, message: data.message, stack: data.stack }, null, 2)
			: JSON.stringify({ name: data.name, message: data.message });
	}
	if (typeof data === "object" && data !== null) {
		return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
	}
	return String(data);
}

export class Logger {
	private config: LoggerConfig;
	private context: string;
	private logWriter: LogWriter | null = null;

	constructor(context: string = "App", config: Partial<LoggerConfig> = {}) {
		this.context = context;
		this.config = { ...defaultConfig(), ...config };

		if (this.config.enableFileLogging) {
			this.logWriter = getLogWriter();
		}
	}

	/**
	 * Create a logger sharing this configuration under another context
	 */
	child(context: string): Logger {
		return new Logger(context, this.config);
	}

	setLevel(level: LogLevel): void {
		this.config.level = level;
	}

	getLevel(): LogLevel {
		return this.config.level;
	}

	private paint(color: string, text: string): string {
		return this.config.enableColors ? `${color}${text}${colors.reset}` : text;
	}

	private format(
		level: string,
		message: string,
		color: string,
		data?: unknown,
	): string {
		const parts: string[] = [];

		if (this.config.enableTimestamps) {
			const timestamp = new Date().toISOString().slice(11, 23);
			parts.push(this.paint(colors.gray, `[${timestamp}]`));
		}
		parts.push(this.paint(color, level.padEnd(5)));
		parts.push(this.paint(colors.cyan, `[${this.context}]`));
		parts.push(message);

		if (data !== undefined) {
			parts.push(`\n${this.paint(colors.dim, describe(data, true))}`);
		}

		return parts.join(" ");
	}

	/**
	 * File lines carry the full ISO timestamp and no colors
	 */
	private formatPlain(level: string, message: string, data?: unknown): string {
		const parts = [
			new Date().toISOString(),
			`[${level}]`,
			`[${this.context}]`,
			message,
		];
		if (data !== undefined) {
			parts.push(describe(data, false));
		}
		return parts.join(" ");
	}

	private log(
		level: LogLevel,
		levelStr: string,
		color: string,
		message: string,
		data?: unknown,
	): void {
		if (this.config.level > level) return;

		if (this.config.enableConsoleLogging) {
			const line = this.format(levelStr, message, color, data);
			if (level === LogLevel.ERROR) {
				console.error(line);
			} else if (level === LogLevel.WARN) {
				console.warn(line);
			} else {
				console.log(line);
			}
		}

		if (this.config.enableFileLogging && this.logWriter) {
			this.logWriter.write(this.formatPlain(levelStr, message, data));
		}
	}

	debug(message: string, data?: unknown): void {
		this.log(LogLevel.DEBUG, "DEBUG", colors.gray, message, data);
	}

	info(message: string, data?: unknown): void {
		this.log(LogLevel.INFO, "INFO", colors.blue, message, data);
	}

	warn(message: string, data?: unknown): void {
		this.log(LogLevel.WARN, "WARN", colors.yellow, message, data);
	}

	error(message: string, error?: unknown): void {
		this.log(LogLevel.ERROR, "ERROR", colors.red, message, error);
	}

	/**
	 * Print regardless of level (startup banners, fatal hints)
	 */
	always(message: string, data?: unknown): void {
		console.log(this.format("LOG", message, colors.reset, data));

		if (this.config.enableFileLogging && this.logWriter) {
			this.logWriter.write(this.formatPlain("LOG", message, data));
		}
	}
}

let globalLogger: Logger | null = null;

/**
 * Get the global logger, or a child of it for the given context
 */
export function getLogger(context?: string): Logger {
	if (!globalLogger) {
		globalLogger = new Logger("App");
	}
	return context ? globalLogger.child(context) : globalLogger;
}
