/**
 * MpvManager Service
 * Spawns the idle mpv process on app start and kills it on app exit
 */

import type { ChildProcess } from "node:child_process";
import { spawn, spawnSync } from "node:child_process";
import { existsSync, unlinkSync } from "node:fs";
import {
	DEFAULT_MPV_BINARY,
	DEFAULT_MPV_SOCKET,
	MPV_STARTUP_TIMEOUT_MS,
} from "../config/constants";
import { FatalStartupError } from "../errors";
import { getLogger, sleep } from "../utils";

const logger = getLogger("MpvManager");

const SOCKET_POLL_INTERVAL_MS = 50;

export interface MpvManagerConfig {
	binaryPath: string;
	socketPath: string;
	/** Appended after the required flags */
	extraArgs: string[];
	/** Timeout in ms to wait for the IPC socket to appear */
	startupTimeout: number;
}

const DEFAULT_CONFIG: MpvManagerConfig = {
	binaryPath: DEFAULT_MPV_BINARY,
	socketPath: DEFAULT_MPV_SOCKET,
	extraArgs: [],
	startupTimeout: MPV_STARTUP_TIMEOUT_MS,
};

/**
 * Command line for an audio-only mpv that idles waiting for IPC commands
 */
export function buildMpvArgs(socketPath: string, extraArgs: readonly string[] = []): string[] {
	return [
		`--input-ipc-server=${socketPath}`,
		"--no-terminal",
		"--no-video",
		"--idle",
		...extraArgs,
	];
}

export class MpvManager {
	private config: MpvManagerConfig;
	private process: ChildProcess | null = null;
	private exitError: string | null = null;

	constructor(config: Partial<MpvManagerConfig> = {}) {
		this.config = { ...DEFAULT_CONFIG, ...config };
	}

	get socketPath(): string {
		return this.config.socketPath;
	}

	/**
	 * Check if the mpv binary can be found
	 */
	isInstalled(): boolean {
		if (this.config.binaryPath.startsWith("/")) {
			return existsSync(this.config.binaryPath);
		}

		const result = spawnSync("which", [this.config.binaryPath], {
			encoding: "utf-8",
			timeout: 5000,
		});
		return result.status === 0 && result.stdout.trim().length > 0;
	}

	isRunning(): boolean {
		return this.process !== null;
	}

	/**
	 * Spawn mpv and wait until its IPC socket exists.
	 * Throws FatalStartupError if mpv cannot be spawned, exits early or
	 * never creates the socket.
	 */
	async start(): Promise<void> {
		if (this.process) {
			return;
		}

		this.removeStaleSocket();
		this.exitError = null;

		const args = buildMpvArgs(this.config.socketPath, this.config.extraArgs);
		logger.info(`Starting ${this.config.binaryPath} ${args.join(" ")}`);

		const proc = spawn(this.config.binaryPath, args, {
			detached: false,
			stdio: ["ignore", "ignore", "pipe"],
		});
		this.process = proc;

		let stderrData = "";
		proc.stderr?.on("data", (data: Buffer) => {
			stderrData += data.toString();
		});

		proc.on("error", (err) => {
			this.exitError = `Failed to start mpv: ${err.message}`;
			this.process = null;
		});

		proc.on("exit", (code, signal) => {
			if (this.process === proc) {
				this.exitError = `mpv exited (${signal ?? `code ${code}`}) ${stderrData.trim()}`.trim();
				logger.error(this.exitError);
				this.process = null;
			}
		});

		await this.waitForSocket();
	}

	/**
	 * Stop mpv (only if we started it)
	 * @param force - SIGKILL immediately instead of SIGTERM with a delayed SIGKILL
	 */
	stop(force: boolean = false): void {
		const proc = this.process;
		this.process = null;

		if (proc?.pid !== undefined) {
			const pid = proc.pid;
			if (force) {
				this.signal(pid, "SIGKILL");
			} else {
				proc.kill("SIGTERM");
				const timeout = setTimeout(() => {
					if (this.signal(pid, 0)) {
						this.signal(pid, "SIGKILL");
					}
				}, 2000);
				timeout.unref();
			}
		}

		this.removeStaleSocket();
	}

	private async waitForSocket(): Promise<void> {
		const deadline = Date.now() + this.config.startupTimeout;

		while (Date.now() < deadline) {
			if (this.exitError) {
				throw new FatalStartupError(this.exitError);
			}
			if (existsSync(this.config.socketPath)) {
				logger.debug(`mpv socket ready at ${this.config.socketPath}`);
				return;
			}
			await sleep(SOCKET_POLL_INTERVAL_MS);
		}

		this.stop(true);
		throw new FatalStartupError(
			`mpv did not create ${this.config.socketPath} within ${this.config.startupTimeout}ms`,
		);
	}

	/**
	 * Send a signal; false when the process no longer exists
	 */
	private signal(pid: number, signal: NodeJS.Signals | 0): boolean {
		try {
			process.kill(pid, signal);
			return true;
		} catch (error) {
			logger.debug(`Signal ${signal} to ${pid} failed:`, error);
			return false;
		}
	}

	private removeStaleSocket(): void {
		if (!existsSync(this.config.socketPath)) return;
		try {
			unlinkSync(this.config.socketPath);
		} catch (error) {
			logger.warn(`Could not remove stale socket ${this.config.socketPath}:`, error);
		}
	}
}
