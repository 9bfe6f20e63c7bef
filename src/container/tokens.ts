/**
 * Dependency Injection Tokens
 * Each token carries the type of the service it resolves to
 */

import type { AppConfig } from "../services/ConfigService";
import type { ErrorHandler } from "../services/ErrorHandler";
import type { MpvManager } from "../services/MpvManager";
import type { PlaylistStore } from "../services/PlaylistStore";
import type { IStreamResolver } from "../services/StreamResolver";
import type { YouTubeApiService } from "../services/YouTubeApiService";

export interface ServiceToken<T> {
	readonly key: symbol;
	/** Never set; ties the token to its service type */
	readonly __service?: T;
}

export function createToken<T>(name: string): ServiceToken<T> {
	return { key: Symbol(name) };
}

export const TOKENS = {
	// Configuration
	AppConfig: createToken<AppConfig>("AppConfig"),
	ErrorHandler: createToken<ErrorHandler>("ErrorHandler"),

	// Collaborators of the backend coordinator
	SearchApi: createToken<YouTubeApiService>("YouTubeApiService"),
	StreamResolver: createToken<IStreamResolver>("StreamResolver"),
	PlaylistStore: createToken<PlaylistStore>("PlaylistStore"),

	// Playback process
	MpvManager: createToken<MpvManager>("MpvManager"),
} as const;
