/**
 * Error types shared across the application
 */

export class TubeplayError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * The playback backend could not be started or reached; the app cannot run
 */
export class FatalStartupError extends TubeplayError {}

/**
 * A video id could not be turned into a playable media URL
 */
export class ResolutionError extends TubeplayError {
	constructor(
		readonly videoId: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

/**
 * The search API answered with a failure status or an unexpected body
 */
export class ApiError extends TubeplayError {
	constructor(
		message: string,
		readonly status?: number,
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

export class ConfigError extends TubeplayError {}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
	if (error instanceof Error) {
		return error;
	}
	if (typeof error === "string") {
		return new Error(error);
	}
	return new Error(String(error));
}
