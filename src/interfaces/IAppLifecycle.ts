/**
 * Application Lifecycle Interface
 * Manages signal handlers, cleanup, and graceful shutdown
 */

export interface IAppLifecycle {
	/**
	 * Setup process signal handlers for graceful shutdown
	 */
	setupSignalHandlers(): void;

	/**
	 * Handle terminal resize event
	 */
	handleResize(): void;

	/**
	 * Ask the application to stop
	 */
	exit(): void;

	/**
	 * Release the player, mpv and logs
	 */
	cleanup(): Promise<void>;
}
