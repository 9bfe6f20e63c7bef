/**
 * Application name and version
 */
export const APP_NAME = "tubeplay";
export const APP_VERSION = "0.1.0";

/**
 * Layout constants
 * Header line + rule on top, rule + footer line at the bottom, and one row
 * for the page indicator below the list.
 */
export const HEADER_ROWS = 2;
export const FOOTER_ROWS = 2;
export const PAGE_INDICATOR_ROWS = 1;
export const RESERVED_ROWS = HEADER_ROWS + FOOTER_ROWS + PAGE_INDICATOR_ROWS + 1;
export const MIN_TERM_WIDTH = 40;
export const MIN_TERM_HEIGHT = 8;
/** Columns kept free for the "NN. " prefix and the ellipsis */
export const TITLE_PADDING = 12;
export const HEADER_TITLE_MAX = 60;

/**
 * Presentation loop timing
 */
export const KEY_POLL_TIMEOUT_MS = 200;
/** How long shutdown waits for an in-flight backend operation */
export const SHUTDOWN_GRACE_MS = 1000;

/**
 * Channel capacities (Command: UI → backend, Message: backend → UI)
 */
export const COMMAND_CHANNEL_CAPACITY = 1;
export const MESSAGE_CHANNEL_CAPACITY = 1;

/**
 * mpv process and IPC
 */
export const DEFAULT_MPV_BINARY = "mpv";
export const DEFAULT_MPV_SOCKET = "/tmp/tubeplay-mpv.sock";
export const MPV_STARTUP_TIMEOUT_MS = 5000;
export const MPV_CONNECT_ATTEMPTS = 6;
export const MPV_CONNECT_BASE_DELAY_MS = 100;
export const MPV_CONNECT_MAX_DELAY_MS = 2000;

/**
 * Stream resolver
 */
export const DEFAULT_RESOLVER_BINARY = "yt-dlp";
export const RESOLVER_TIMEOUT_MS = 30_000;
export const WATCH_URL_BASE = "https://www.youtube.com/watch?v=";

/**
 * YouTube Data API
 */
export const YOUTUBE_API_BASE = "https://youtube.googleapis.com/youtube/v3";
export const API_LIMITS = {
	SEARCH_RESULTS: 50,
} as const;

/**
 * Cache configuration
 */
export const CACHE_CONFIG = {
	DEFAULT_TTL_MS: 5 * 60 * 1000,
	CLEANUP_INTERVAL_MS: 10 * 60 * 1000,
} as const;

export const CACHE_TTL = {
	SHORT: 2 * 60 * 1000, // search results
	LONG: 60 * 60 * 1000, // video durations never change
} as const;

/**
 * Playlist persistence
 */
export const DEFAULT_PLAYLIST_FILENAME = ".tubeplay-playlist";
export const PLAYLIST_SEPARATOR = " - ";

/**
 * Key bindings
 */
export const KEY_BINDINGS = {
	up: ["k", "up"],
	down: ["j", "down"],
	select: ["return", "enter"],
	nextPage: [">"],
	prevPage: ["<"],
	search: ["/"],
	browse: ["tab"],
	remove: ["x"],
	next: ["n"],
	previous: ["p"],
	shuffle: ["s"],
	pause: ["space"],
	back: ["escape"],
	quit: ["q"],
} as const;

/**
 * UI strings
 */
export const UI_STRINGS = {
	nowPlaying: "Now Playing",
	songSearch: "Song Search",
	emptyList: "Nothing to show. Hit search and add something here.",
	loading: "Loading...",
	searchPrompt: "Search: ",
	playingHelp:
		"[/] Search  [x] Remove  [Enter] Play  [n/p] Next/Prev  [space] Pause  [s] Shuffle {shuffle}  [Tab] Results  [q] Quit",
	browseHelp:
		"[j/k] Up/Down  [<] Previous page  [>] Next page  [Enter] Add  [/] Search  [Esc] Playlist",
} as const;
