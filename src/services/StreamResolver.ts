/**
 * StreamResolver Service
 * Turns a video id into a directly playable audio URL via yt-dlp
 */

import {
	DEFAULT_RESOLVER_BINARY,
	RESOLVER_TIMEOUT_MS,
	WATCH_URL_BASE,
} from "../config/constants";
import { ResolutionError } from "../errors";
import { getLogger, runProcess, type ProcessResult, type ProcessRunner } from "../utils";

const logger = getLogger("StreamResolver");

/** Tried when the configured resolver is not installed */
const FALLBACK_RESOLVER_BINARY = "youtube-dl";

export interface StreamResolverConfig {
	binaryPath: string;
	timeoutMs: number;
	runner: ProcessRunner;
}

export interface IStreamResolver {
	resolve(videoId: string): Promise<string>;
}

export function watchUrl(videoId: string): string {
	return `${WATCH_URL_BASE}${encodeURIComponent(videoId)}`;
}

function isMissingBinary(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class StreamResolver implements IStreamResolver {
	private config: StreamResolverConfig;

	constructor(config: Partial<StreamResolverConfig> = {}) {
		this.config = {
			binaryPath: DEFAULT_RESOLVER_BINARY,
			timeoutMs: RESOLVER_TIMEOUT_MS,
			runner: runProcess,
			...config,
		};
	}

	async resolve(videoId: string): Promise<string> {
		const args = ["-x", "--get-url", watchUrl(videoId)];
		const candidates =
			this.config.binaryPath === FALLBACK_RESOLVER_BINARY
				? [this.config.binaryPath]
				: [this.config.binaryPath, FALLBACK_RESOLVER_BINARY];

		for (const binary of candidates) {
			let result: ProcessResult;
			try {
				result = await this.config.runner(binary, args, this.config.timeoutMs);
			} catch (error) {
				if (isMissingBinary(error) && binary !== candidates[candidates.length - 1]) {
					logger.debug(`${binary} not found, trying ${FALLBACK_RESOLVER_BINARY}`);
					continue;
				}
				const reason = error instanceof Error ? error.message : String(error);
				throw new ResolutionError(videoId, `Could not run ${binary}: ${reason}`, {
					cause: error,
				});
			}

			if (result.code !== 0) {
				const detail = result.stderr.trim().split("\n").pop() || `exit code ${result.code}`;
				throw new ResolutionError(videoId, `${binary} failed: ${detail}`);
			}

			const url = result.stdout
				.split("\n")
				.map((line) => line.trim())
				.find((line) => line.length > 0);
			if (!url) {
				throw new ResolutionError(videoId, `${binary} returned no URL`);
			}

			logger.debug(`Resolved ${videoId}`);
			return url;
		}

		throw new ResolutionError(videoId, "No resolver available");
	}
}
