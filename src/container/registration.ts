/**
 * Service Registration
 * Registers the backend's collaborators with the DI container
 */

import type { ServiceContainer } from "./ServiceContainer";
import { TOKENS } from "./tokens";
import type { AppConfig } from "../services/ConfigService";
import { getErrorHandler } from "../services/ErrorHandler";
import { MpvManager } from "../services/MpvManager";
import { PlaylistStore } from "../services/PlaylistStore";
import { StreamResolver } from "../services/StreamResolver";
import { YouTubeApiService } from "../services/YouTubeApiService";
import { getLogger } from "../utils";

const logger = getLogger("ServiceRegistration");

/**
 * Register all services with the DI container. Services read their settings
 * from the AppConfig value, so tests can register a different one.
 */
export function registerServices(container: ServiceContainer, config: AppConfig): void {
	logger.debug("Registering services with DI container...");

	container.value(TOKENS.AppConfig, config);
	container.singleton(TOKENS.ErrorHandler, () => getErrorHandler());

	container.singleton(
		TOKENS.SearchApi,
		(c) => new YouTubeApiService({ apiKey: c.resolve(TOKENS.AppConfig).youtubeApiKey }),
	);
	container.singleton(
		TOKENS.StreamResolver,
		(c) => new StreamResolver({ binaryPath: c.resolve(TOKENS.AppConfig).resolverPath }),
	);
	container.singleton(
		TOKENS.PlaylistStore,
		(c) => new PlaylistStore(c.resolve(TOKENS.AppConfig).playlistFile),
	);
	container.singleton(TOKENS.MpvManager, (c) => {
		const { mpvPath, mpvSocket } = c.resolve(TOKENS.AppConfig);
		return new MpvManager({ binaryPath: mpvPath, socketPath: mpvSocket });
	});

	logger.debug("Service registration complete");
}

/**
 * Check if all required services are registered
 */
export function validateServiceRegistration(container: ServiceContainer): boolean {
	const required = Object.entries(TOKENS);

	for (const [name, token] of required) {
		if (!container.has(token)) {
			logger.error(`Missing required service: ${name}`);
			return false;
		}
	}

	return true;
}
