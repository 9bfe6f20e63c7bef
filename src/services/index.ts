/**
 * Services re-exports
 */

export { CacheKeys, CacheService, CacheTTL } from "./CacheService";
export { ConfigService, getConfigService, type AppConfig } from "./ConfigService";
export {
	createErrorHandler,
	ErrorCategory,
	ErrorHandler,
	ErrorSeverity,
	getErrorHandler,
	type ErrorNotice,
	type ErrorNotifier,
} from "./ErrorHandler";
export {
	connectUnixSocket,
	decodeEventLine,
	encodeCommand,
	MpvIpcClient,
	type MpvConnectOptions,
	type SocketConnector,
} from "./MpvIpcClient";
export { buildMpvArgs, MpvManager, type MpvManagerConfig } from "./MpvManager";
export {
	parsePlaylist,
	PlaylistStore,
	serializePlaylist,
	type IPlaylistStore,
} from "./PlaylistStore";
export { StreamResolver, watchUrl, type IStreamResolver } from "./StreamResolver";
export {
	parseIsoDuration,
	YouTubeApiService,
	type FetchLike,
	type ISearchService,
} from "./YouTubeApiService";
