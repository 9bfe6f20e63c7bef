import { toError } from "../errors";
import { getLogger } from "../utils";

const logger = getLogger("ErrorHandler");

/**
 * Error severity levels
 */
export enum ErrorSeverity {
	/** Info - expected failure with a harmless fallback */
	INFO = "info",
	/** Warning - degraded functionality but app continues */
	WARNING = "warning",
	/** Error - the requested operation failed; the user should know */
	ERROR = "error",
	/** Fatal - app must exit */
	FATAL = "fatal",
}

/**
 * Error categories for classification
 */
export enum ErrorCategory {
	/** YouTube Data API and other HTTP failures */
	NETWORK = "network",
	/** mpv process or IPC failures */
	PLAYER = "player",
	/** yt-dlp failures */
	RESOLVER = "resolver",
	/** Playlist file and log file failures */
	FS = "fs",
	/** Malformed data from mpv or the API */
	PROTOCOL = "protocol",
	CONFIG = "config",
	UNKNOWN = "unknown",
}

/**
 * Error context for additional information
 */
export interface ErrorContext {
	category: ErrorCategory;
	severity: ErrorSeverity;
	operation?: string; // What was being attempted
	metadata?: Record<string, unknown>;
	recoverable?: boolean;
	userMessage?: string;
}

/**
 * What the user gets told about a failure
 */
export interface ErrorNotice {
	operation: string;
	message: string;
}

export type ErrorNotifier = (notice: ErrorNotice) => Promise<void> | void;

type RecoveryStrategy = (
	error: Error,
	context: ErrorContext,
) => Promise<void> | void;

/**
 * Centralized error handler: logs by severity, runs recovery strategies per
 * category and forwards user-facing failures to the installed notifier.
 */
export class ErrorHandler {
	private recoveryStrategies: Map<ErrorCategory, RecoveryStrategy[]> =
		new Map();

	constructor(private notifier?: ErrorNotifier) {
		this.initializeDefaultStrategies();
	}

	private initializeDefaultStrategies(): void {
		this.registerRecoveryStrategy(ErrorCategory.PLAYER, (error, context) => {
			if (context.severity === ErrorSeverity.FATAL) {
				logger.error("mpv is unavailable, check that it is installed and on PATH");
			} else {
				logger.warn("Player error:", error.message);
			}
		});

		this.registerRecoveryStrategy(ErrorCategory.RESOLVER, (error) => {
			logger.warn("Resolver error (is yt-dlp up to date?):", error.message);
		});

		this.registerRecoveryStrategy(ErrorCategory.CONFIG, (error) => {
			logger.warn("Configuration problem:", error.message);
		});
	}

	/**
	 * Install the sink for user-facing failures
	 */
	setNotifier(notifier: ErrorNotifier | undefined): void {
		this.notifier = notifier;
	}

	registerRecoveryStrategy(
		category: ErrorCategory,
		strategy: RecoveryStrategy,
	): void {
		const strategies = this.recoveryStrategies.get(category) ?? [];
		strategies.push(strategy);
		this.recoveryStrategies.set(category, strategies);
	}

	/**
	 * Handle an error with context
	 */
	async handle(error: unknown, context: ErrorContext): Promise<Error> {
		const err = toError(error);

		this.logError(err, context);

		if (context.recoverable !== false) {
			await this.executeRecoveryStrategies(err, context);
		}

		if (
			context.severity === ErrorSeverity.ERROR ||
			context.severity === ErrorSeverity.FATAL
		) {
			await this.notify(err, context);
		}

		return err;
	}

	private logError(error: Error, context: ErrorContext): void {
		const logMessage = `[${context.category}] ${context.operation || "Unknown operation"}: ${error.message}`;

		switch (context.severity) {
			case ErrorSeverity.INFO:
				logger.info(logMessage, context.metadata);
				break;
			case ErrorSeverity.WARNING:
				logger.warn(logMessage, context.metadata);
				break;
			case ErrorSeverity.ERROR:
				logger.error(logMessage, context.metadata);
				break;
			case ErrorSeverity.FATAL:
				logger.error(`FATAL: ${logMessage}`, context.metadata);
				break;
		}
	}

	private async executeRecoveryStrategies(
		error: Error,
		context: ErrorContext,
	): Promise<void> {
		const strategies = this.recoveryStrategies.get(context.category);
		if (!strategies) return;

		for (const strategy of strategies) {
			try {
				await strategy(error, context);
			} catch (recoveryError) {
				logger.error("Recovery strategy failed:", recoveryError);
			}
		}
	}

	private async notify(error: Error, context: ErrorContext): Promise<void> {
		if (!this.notifier) return;

		try {
			await this.notifier({
				operation: context.operation ?? this.getDefaultTitle(context.category),
				message: context.userMessage ?? error.message,
			});
		} catch (notifyError) {
			logger.debug("Could not deliver error notice:", notifyError);
		}
	}

	private getDefaultTitle(category: ErrorCategory): string {
		switch (category) {
			case ErrorCategory.NETWORK:
				return "network";
			case ErrorCategory.PLAYER:
				return "player";
			case ErrorCategory.RESOLVER:
				return "resolve";
			case ErrorCategory.FS:
				return "file";
			case ErrorCategory.PROTOCOL:
				return "protocol";
			case ErrorCategory.CONFIG:
				return "config";
			default:
				return "error";
		}
	}

	/**
	 * Helper: Handle filesystem errors that only degrade behaviour
	 */
	handleFsError(error: unknown, operation: string): Promise<Error> {
		return this.handle(error, {
			category: ErrorCategory.FS,
			severity: ErrorSeverity.WARNING,
			operation,
		});
	}

	dispose(): void {
		this.recoveryStrategies.clear();
		this.notifier = undefined;
	}
}

let instance: ErrorHandler | null = null;

export function getErrorHandler(): ErrorHandler {
	if (!instance) {
		instance = new ErrorHandler();
	}
	return instance;
}

/**
 * Create a new ErrorHandler instance (for testing)
 */
export function createErrorHandler(notifier?: ErrorNotifier): ErrorHandler {
	return new ErrorHandler(notifier);
}
