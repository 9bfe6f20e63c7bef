import type { PlaylistEntry } from "./index";

/**
 * UI → backend requests. Sent through a capacity-one mailbox; a command that
 * finds the mailbox occupied is dropped.
 */
export type Command =
	| { type: "Search"; keyword: string; generation: number }
	| { type: "Play"; id: string }
	| { type: "SavePlaylist"; playlist: PlaylistEntry[] }
	| { type: "SetPause"; paused: boolean };

/**
 * Backend → UI notifications
 */
export type Message =
	| { type: "DisplaySearchResult"; results: PlaylistEntry[]; generation: number }
	| { type: "SearchFailed"; reason: string; generation: number }
	| { type: "SongStarted"; at: number }
	| { type: "SongStopped"; reason: string }
	| { type: "SongDuration"; durationMs: number }
	| { type: "OperationFailed"; operation: string; reason: string }
	| { type: "BackendDown" };

/**
 * Intents produced from keyboard input (and terminal resize)
 */
export type UiAction =
	| { type: "GoToSearch" }
	| { type: "GoToSearchBrowse" }
	| { type: "GoToPlaylist" }
	| { type: "SearchSong" }
	| { type: "AddSelectedToPlaylist" }
	| { type: "RemoveSong" }
	| { type: "NextItem" }
	| { type: "PrevItem" }
	| { type: "NextPage" }
	| { type: "PrevPage" }
	| { type: "PlaySelected" }
	| { type: "NextSong" }
	| { type: "PrevSong" }
	| { type: "ToggleShuffle" }
	| { type: "TogglePause" }
	| { type: "InputText"; char: string }
	| { type: "DeleteText" }
	| { type: "Resize"; rows: number }
	| { type: "Quit" };

/**
 * Everything the state machine's update step accepts
 */
export type AppMessage = UiAction | Message;
