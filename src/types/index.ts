/**
 * A playlist or search-result entry. Identity is the video id.
 */
export interface PlaylistEntry {
	readonly id: string;
	readonly title: string;
}

/**
 * Exclusive UI context; decides the active key bindings and which list is shown
 */
export type AppMode = "Playing" | "SearchInput" | "SearchBrowse";

/**
 * Keyboard event as delivered by the terminal
 */
export interface KeyEvent {
	name: string;
	ctrl: boolean;
	shift: boolean;
	meta: boolean;
	/** Raw characters for the key, when the terminal reports them */
	sequence?: string;
}

/**
 * Row layout of the single-column screen
 *
 * +---------------------------------------------+
 * | header: now playing / mode title            |  row 0
 * |─────────────────────────────────────────────|  row 1
 * | list rows                                   |  rows 2 .. 2+listHeight
 * | page indicator                              |
 * |─────────────────────────────────────────────|  rows-2
 * | footer: key help / search box / loading     |  rows-1
 * +---------------------------------------------+
 */
export interface LayoutDimensions {
	termWidth: number;
	termHeight: number;
	headerY: number;
	listY: number;
	/** Rows available for list items, also the page size */
	listHeight: number;
	footerRuleY: number;
	footerY: number;
}

/**
 * Color scheme as ANSI SGR sequences
 */
export interface ColorScheme {
	reset: string;
	selected: string;
	inPlaylist: string;
	nowPlaying: string;
	dim: string;
	notice: string;
}

/**
 * Application state, owned by the presentation loop and changed only by the
 * state machine's update step
 */
export interface AppState {
	mode: AppMode;
	playlist: readonly PlaylistEntry[];
	searchResults: readonly PlaylistEntry[];
	/** Page of the list shown in the current mode */
	currentPage: number;
	pageSize: number;
	/** Selection within the current page */
	selectedIndex: number;
	keyword: string;
	loading: boolean;
	/** Generation of the most recently issued search */
	searchGeneration: number;

	isPlaying: boolean;
	isPaused: boolean;
	/** Playlist position of the track last commanded to play */
	playingIndex: number | null;
	/** The entry last commanded to play; survives its removal from the playlist */
	nowPlaying: PlaylistEntry | null;
	songStartedAt: number | null;
	songDurationMs: number;

	playQueue: readonly number[];
	queueIndex: number;
	isShuffle: boolean;

	/** One-line status shown in the footer until the next key press */
	notice: string | null;
	dedupePlaylist: boolean;
	running: boolean;
}

export * from "./messages";
export * from "./mpv";
