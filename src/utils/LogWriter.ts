/**
 * LogWriter - buffered, size-rotated file logging
 *
 * Lines are collected in memory and appended on an interval (or once the
 * buffer grows past FLUSH_THRESHOLD lines). When the active file exceeds
 * maxFileSize it is shifted to `<name>.1`, `.1` to `.2` and so on, with the
 * oldest dropped.
 */

import { existsSync, mkdirSync, renameSync, statSync, unlinkSync } from "node:fs";
import { appendFile } from "node:fs/promises";
import { join } from "node:path";
import { getLoggingConfig, type LoggingConfig } from "../config/logging";

export type LogWriterConfig = Pick<
	LoggingConfig,
	"logDir" | "filename" | "maxFileSize" | "maxFiles" | "flushIntervalMs"
> & {
	enabled: boolean;
};

const FLUSH_THRESHOLD = 100;

function defaultConfig(): LogWriterConfig {
	const logging = getLoggingConfig();
	return {
		logDir: logging.logDir,
		filename: logging.filename,
		maxFileSize: logging.maxFileSize,
		maxFiles: logging.maxFiles,
		flushIntervalMs: logging.flushIntervalMs,
		enabled: logging.fileLogging,
	};
}

export class LogWriter {
	private config: LogWriterConfig;
	private buffer: string[] = [];
	private currentSize = 0;
	private flushTimer: NodeJS.Timeout | null = null;
	private flushing = false;
	private initialized = false;

	constructor(config: Partial<LogWriterConfig> = {}) {
		this.config = { ...defaultConfig(), ...config };
		this.initialize();
	}

	private initialize(): void {
		if (!this.config.enabled) {
			return;
		}

		try {
			if (!existsSync(this.config.logDir)) {
				mkdirSync(this.config.logDir, { recursive: true });
			}

			const logFile = this.getLogFilePath();
			if (existsSync(logFile)) {
				this.currentSize = statSync(logFile).size;
			}

			this.flushTimer = setInterval(() => {
				this.flush().catch((err: unknown) => {
					process.stderr.write(`Log flush error: ${String(err)}\n`);
				});
			}, this.config.flushIntervalMs);
			this.flushTimer.unref();

			this.initialized = true;
		} catch (error) {
			process.stderr.write(`Failed to initialize LogWriter: ${String(error)}\n`);
			this.config.enabled = false;
		}
	}

	getLogFilePath(): string {
		return join(this.config.logDir, this.config.filename);
	}

	private getRotatedLogFilePath(index: number): string {
		return join(this.config.logDir, `${this.config.filename}.${index}`);
	}

	/**
	 * Queue a line for writing
	 */
	write(message: string): void {
		if (!this.config.enabled || !this.initialized) {
			return;
		}

		this.buffer.push(message.endsWith("\n") ? message : `${message}\n`);

		if (this.buffer.length > FLUSH_THRESHOLD) {
			this.flush().catch((err: unknown) => {
				process.stderr.write(`Log flush error: ${String(err)}\n`);
			});
		}
	}

	async flush(): Promise<void> {
		if (!this.config.enabled || this.buffer.length === 0 || this.flushing) {
			return;
		}

		this.flushing = true;
		const content = this.buffer.join("");
		this.buffer = [];

		try {
			await appendFile(this.getLogFilePath(), content, "utf-8");
			this.currentSize += Buffer.byteLength(content, "utf-8");

			if (this.currentSize >= this.config.maxFileSize) {
				this.rotate();
			}
		} catch (error) {
			// Put the lines back so the next flush retries them
			this.buffer.unshift(content);
			throw error;
		} finally {
			this.flushing = false;
		}
	}

	private rotate(): void {
		const oldest = this.getRotatedLogFilePath(this.config.maxFiles);
		if (existsSync(oldest)) {
			unlinkSync(oldest);
		}

		for (let i = this.config.maxFiles - 1; i > 0; i--) {
			const current = this.getRotatedLogFilePath(i);
			if (existsSync(current)) {
				renameSync(current, this.getRotatedLogFilePath(i + 1));
			}
		}

		const logFile = this.getLogFilePath();
		if (existsSync(logFile)) {
			renameSync(logFile, this.getRotatedLogFilePath(1));
		}

		this.currentSize = 0;
	}

	/**
	 * Stop the flush timer and write out whatever is still buffered
	 */
	async shutdown(): Promise<void> {
		if (this.flushTimer) {
			clearInterval(this.flushTimer);
			this.flushTimer = null;
		}

		await this.flush();
	}

	getBufferSize(): number {
		return this.buffer.length;
	}
}

// ─────────────────────────────────────────────────────────────
// Singleton
// ─────────────────────────────────────────────────────────────

let instance: LogWriter | null = null;

export function getLogWriter(config?: Partial<LogWriterConfig>): LogWriter {
	if (!instance) {
		instance = new LogWriter(config);
	}
	return instance;
}
