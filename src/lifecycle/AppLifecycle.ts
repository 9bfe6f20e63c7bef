import type { IAppLifecycle } from "../interfaces";
import type { MpvManager } from "../services/MpvManager";
import type { IPlaybackChannel } from "../types";
import { cleanupTerminal, getLogger } from "../utils";
import { getLogWriter } from "../utils/LogWriter";

const logger = getLogger("AppLifecycle");

export interface LifecycleHooks {
	/** Ask the presentation loop to stop */
	requestQuit: () => void;
	onResize: () => void;
	/** Closed on cleanup */
	player: IPlaybackChannel | null;
	/** Stopped on cleanup when tubeplay spawned it */
	mpv: Pick<MpvManager, "stop"> | null;
	/** Further resources to release, such as caches */
	disposables?: Array<{ dispose(): void }>;
}

type Listener = (...args: unknown[]) => void;

/**
 * The parts of `process` the lifecycle hooks into
 */
export interface ProcessLike {
	on(event: string, listener: Listener): unknown;
	once(event: string, listener: Listener): unknown;
	removeListener(event: string, listener: Listener): unknown;
	stdout: {
		on(event: "resize", listener: () => void): unknown;
		removeListener(event: "resize", listener: () => void): unknown;
	};
	exit(code?: number): void;
}

/**
 * Application Lifecycle Manager
 * Manages signal handlers, cleanup, and graceful shutdown
 */
export class AppLifecycle implements IAppLifecycle {
	private _exiting = false;
	private cleanedUp = false;
	private resizeHandler: (() => void) | null = null;
	private signalHandler: (() => void) | null = null;

	constructor(
		private readonly hooks: LifecycleHooks,
		private readonly proc: ProcessLike = process,
	) {}

	/**
	 * Setup process signal handlers for graceful shutdown
	 */
	setupSignalHandlers(): void {
		this.signalHandler = () => this.exit();

		this.proc.on("SIGINT", this.signalHandler);
		this.proc.on("SIGTERM", this.signalHandler);
		this.proc.on("SIGHUP", this.signalHandler);

		this.proc.once("uncaughtException", (err) => {
			logger.error("Uncaught exception:", err);
			this.crash();
		});

		this.proc.once("unhandledRejection", (reason) => {
			logger.error("Unhandled rejection:", reason);
			this.crash();
		});

		// Final synchronous restore on process exit
		this.proc.once("exit", () => {
			cleanupTerminal();
		});

		this.resizeHandler = () => this.handleResize();
		this.proc.stdout.on("resize", this.resizeHandler);
	}

	handleResize(): void {
		this.hooks.onResize();
	}

	/**
	 * Stop the presentation loop; cleanup follows once it has returned
	 */
	exit(): void {
		if (this._exiting) return;
		this._exiting = true;
		logger.info("Exit requested");
		this.hooks.requestQuit();
	}

	isExiting(): boolean {
		return this._exiting;
	}

	/**
	 * Release everything acquired at startup. Runs once.
	 */
	async cleanup(): Promise<void> {
		if (this.cleanedUp) return;
		this.cleanedUp = true;
		logger.debug("Cleaning up resources...");

		if (this.resizeHandler) {
			this.proc.stdout.removeListener("resize", this.resizeHandler);
			this.resizeHandler = null;
		}
		if (this.signalHandler) {
			this.proc.removeListener("SIGINT", this.signalHandler);
			this.proc.removeListener("SIGTERM", this.signalHandler);
			this.proc.removeListener("SIGHUP", this.signalHandler);
			this.signalHandler = null;
		}

		try {
			this.hooks.player?.close();
		} catch (e) {
			logger.warn("Closing the mpv connection failed:", e);
		}

		try {
			this.hooks.mpv?.stop();
		} catch (e) {
			logger.warn("Stopping mpv failed:", e);
		}

		for (const disposable of this.hooks.disposables ?? []) {
			try {
				disposable.dispose();
			} catch (e) {
				logger.warn("Dispose failed:", e);
			}
		}

		logger.debug("Cleanup complete");

		// Flush logs last so the lines above reach the file
		try {
			await getLogWriter().shutdown();
		} catch (e) {
			console.error("Failed to flush logs:", e);
		}
	}

	private crash(): void {
		cleanupTerminal();
		this.cleanup()
			.catch((e: unknown) => {
				console.error("Cleanup after crash failed:", e);
			})
			.finally(() => {
				this.proc.exit(1);
			});
	}
}
