/**
 * Application state machine
 *
 * `update` is pure: it returns the next state and the commands the backend
 * should run, and never touches the terminal, the network or the channels.
 */

import { RESERVED_ROWS } from "../config/constants";
import type { AppMessage, AppMode, AppState, Command, PlaylistEntry } from "../types";
import {
	absoluteIndex,
	getTotalPages,
	itemsOnPage,
	lastPage,
	pageSizeFor,
} from "./pagination";
import {
	advanceQueue,
	buildQueue,
	currentQueueItem,
	type QueuePosition,
	type RandomSource,
	retreatQueue,
} from "./queue";

export interface UpdateResult {
	state: AppState;
	commands: Command[];
}

export interface InitialStateOptions {
	playlist?: readonly PlaylistEntry[];
	rows?: number;
	dedupePlaylist?: boolean;
}

export function createInitialState(options: InitialStateOptions = {}): AppState {
	const playlist = options.playlist ?? [];
	return {
		mode: "Playing",
		playlist,
		searchResults: [],
		currentPage: 0,
		pageSize: pageSizeFor(options.rows ?? 24, RESERVED_ROWS),
		selectedIndex: 0,
		keyword: "",
		loading: false,
		searchGeneration: 0,
		isPlaying: false,
		isPaused: false,
		playingIndex: null,
		nowPlaying: null,
		songStartedAt: null,
		songDurationMs: 0,
		playQueue: buildQueue(playlist.length, false),
		queueIndex: 0,
		isShuffle: false,
		notice: null,
		dedupePlaylist: options.dedupePlaylist ?? false,
		running: true,
	};
}

/**
 * The list the current mode shows and navigates
 */
export function activeList(state: AppState): readonly PlaylistEntry[] {
	return state.mode === "Playing" ? state.playlist : state.searchResults;
}

export function totalPages(state: AppState): number {
	return getTotalPages(activeList(state).length, state.pageSize);
}

const unchanged = (state: AppState): UpdateResult => ({ state, commands: [] });

function switchMode(state: AppState, mode: AppMode): AppState {
	return { ...state, mode, selectedIndex: 0, currentPage: 0 };
}

/**
 * Pull the page and selection back inside the active list
 */
function clampCursor(state: AppState): AppState {
	const length = activeList(state).length;
	const currentPage = Math.min(state.currentPage, lastPage(length, state.pageSize));
	const onPage = itemsOnPage(length, currentPage, state.pageSize);
	const selectedIndex = onPage === 0 ? 0 : Math.min(state.selectedIndex, onPage - 1);
	return { ...state, currentPage, selectedIndex };
}

function selectedAbsoluteIndex(state: AppState): number {
	return absoluteIndex(state.currentPage, state.pageSize, state.selectedIndex);
}

function withFreshQueue(state: AppState, random: RandomSource): AppState {
	return {
		...state,
		playQueue: buildQueue(state.playlist.length, state.isShuffle, random),
		queueIndex: 0,
	};
}

/**
 * Command playback of the playlist entry at `index`
 */
function playAt(state: AppState, index: number): UpdateResult {
	const entry = state.playlist[index];
	if (!entry) {
		return unchanged(state);
	}
	return {
		state: { ...state, playingIndex: index, nowPlaying: entry, isPaused: false },
		commands: [{ type: "Play", id: entry.id }],
	};
}

function playQueuePosition(state: AppState, position: QueuePosition): UpdateResult {
	const moved = { ...state, playQueue: position.queue, queueIndex: position.index };
	const item = currentQueueItem(position);
	return item === null ? unchanged(moved) : playAt(moved, item);
}

function savePlaylist(state: AppState): Command {
	return { type: "SavePlaylist", playlist: [...state.playlist] };
}

/**
 * Apply one message to the state
 */
export function update(
	state: AppState,
	msg: AppMessage,
	random: RandomSource = Math.random,
): UpdateResult {
	switch (msg.type) {
		// ── Navigation ───────────────────────────────────────────
		case "GoToSearch":
			return unchanged({ ...switchMode(state, "SearchInput"), keyword: "", notice: null });

		case "GoToSearchBrowse":
			return unchanged({ ...switchMode(state, "SearchBrowse"), notice: null });

		case "GoToPlaylist":
			return unchanged({ ...switchMode(state, "Playing"), notice: null });

		case "NextItem": {
			const onPage = itemsOnPage(activeList(state).length, state.currentPage, state.pageSize);
			const selectedIndex =
				state.selectedIndex < onPage - 1 ? state.selectedIndex + 1 : state.selectedIndex;
			return unchanged({ ...state, selectedIndex, notice: null });
		}

		case "PrevItem":
			return unchanged({
				...state,
				selectedIndex: Math.max(0, state.selectedIndex - 1),
				notice: null,
			});

		case "NextPage": {
			const pages = totalPages(state);
			const currentPage = state.currentPage < pages - 1 ? state.currentPage + 1 : state.currentPage;
			return unchanged({ ...state, currentPage, selectedIndex: 0, notice: null });
		}

		case "PrevPage":
			return unchanged({
				...state,
				currentPage: Math.max(0, state.currentPage - 1),
				selectedIndex: 0,
				notice: null,
			});

		// ── Search ───────────────────────────────────────────────
		case "InputText":
			return unchanged({ ...state, keyword: state.keyword + msg.char, notice: null });

		case "DeleteText":
			return unchanged({
				...state,
				keyword: Array.from(state.keyword).slice(0, -1).join(""),
				notice: null,
			});

		case "SearchSong": {
			const keyword = state.keyword.trim();
			if (!keyword) {
				return unchanged({ ...state, notice: null });
			}
			const generation = state.searchGeneration + 1;
			return {
				state: { ...state, searchGeneration: generation, loading: true, notice: null },
				commands: [{ type: "Search", keyword, generation }],
			};
		}

		case "DisplaySearchResult": {
			if (msg.generation !== state.searchGeneration) {
				return unchanged(state);
			}
			return unchanged({
				...switchMode(state, "SearchBrowse"),
				searchResults: msg.results,
				loading: false,
			});
		}

		case "SearchFailed": {
			if (msg.generation !== state.searchGeneration) {
				return unchanged(state);
			}
			return unchanged({ ...state, loading: false, notice: `Search failed: ${msg.reason}` });
		}

		// ── Playlist editing ─────────────────────────────────────
		case "AddSelectedToPlaylist": {
			const cleared = { ...state, notice: null };
			const entry = state.searchResults[selectedAbsoluteIndex(state)];
			if (!entry) {
				return unchanged(cleared);
			}
			if (state.dedupePlaylist && state.playlist.some((item) => item.id === entry.id)) {
				return unchanged({ ...cleared, notice: "Already in the playlist" });
			}
			const next = withFreshQueue({ ...cleared, playlist: [...state.playlist, entry] }, random);
			return { state: next, commands: [savePlaylist(next)] };
		}

		case "RemoveSong": {
			const cleared = { ...state, notice: null };
			const index = selectedAbsoluteIndex(state);
			if (!state.playlist[index]) {
				return unchanged(cleared);
			}

			let playingIndex = state.playingIndex;
			if (playingIndex !== null) {
				if (index < playingIndex) playingIndex -= 1;
				else if (index === playingIndex) playingIndex = null;
			}

			const playlist = state.playlist.filter((_, i) => i !== index);
			const next = withFreshQueue(clampCursor({ ...cleared, playlist, playingIndex }), random);
			return { state: next, commands: [savePlaylist(next)] };
		}

		// ── Playback ─────────────────────────────────────────────
		case "PlaySelected": {
			const cleared = { ...state, notice: null };
			const index = selectedAbsoluteIndex(state);
			const queueIndex = state.playQueue.indexOf(index);
			return playAt(queueIndex === -1 ? cleared : { ...cleared, queueIndex }, index);
		}

		case "NextSong": {
			const cleared = { ...state, notice: null };
			if (state.playlist.length === 0) {
				return unchanged(cleared);
			}
			return playQueuePosition(
				cleared,
				advanceQueue(
					{ queue: state.playQueue, index: state.queueIndex },
					state.playlist.length,
					state.isShuffle,
					random,
				),
			);
		}

		case "PrevSong": {
			const cleared = { ...state, notice: null };
			if (state.playlist.length === 0) {
				return unchanged(cleared);
			}
			return playQueuePosition(
				cleared,
				retreatQueue({ queue: state.playQueue, index: state.queueIndex }),
			);
		}

		case "ToggleShuffle":
			return unchanged(
				withFreshQueue({ ...state, isShuffle: !state.isShuffle, notice: null }, random),
			);

		case "TogglePause": {
			const cleared = { ...state, notice: null };
			if (!state.isPlaying) {
				return unchanged(cleared);
			}
			const paused = !state.isPaused;
			return {
				state: { ...cleared, isPaused: paused },
				commands: [{ type: "SetPause", paused }],
			};
		}

		case "SongStarted":
			return unchanged({ ...state, isPlaying: true, isPaused: false, songStartedAt: msg.at });

		case "SongStopped": {
			const stopped = { ...state, isPlaying: false, isPaused: false };
			if (msg.reason !== "eof" || state.playlist.length === 0) {
				return unchanged(stopped);
			}
			return playQueuePosition(
				stopped,
				advanceQueue(
					{ queue: state.playQueue, index: state.queueIndex },
					state.playlist.length,
					state.isShuffle,
					random,
				),
			);
		}

		case "SongDuration":
			return unchanged({ ...state, songDurationMs: msg.durationMs });

		// ── Failures ─────────────────────────────────────────────
		case "OperationFailed":
			return unchanged({ ...state, notice: `${msg.operation} failed: ${msg.reason}` });

		case "BackendDown":
			return unchanged({
				...state,
				isPlaying: false,
				isPaused: false,
				notice: "Playback backend disconnected",
			});

		// ── Terminal ─────────────────────────────────────────────
		case "Resize":
			return unchanged(clampCursor({ ...state, pageSize: pageSizeFor(msg.rows, RESERVED_ROWS) }));

		case "Quit":
			return unchanged({ ...state, running: false });

		default: {
			const exhaustive: never = msg;
			return exhaustive;
		}
	}
}
