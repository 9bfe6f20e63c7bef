import { KEY_BINDINGS } from "../config";
import type { IInputHandler } from "../interfaces";
import type { StateManager } from "../state/StateManager";
import type { AppMode, KeyEvent, UiAction } from "../types";
import { getLogger } from "../utils";

const logger = getLogger("InputHandler");

function bound(binding: readonly string[], key: KeyEvent): boolean {
	return binding.includes(key.name);
}

/**
 * The single printable character a key produces, if any
 */
function printableChar(key: KeyEvent): string | null {
	const text = key.sequence ?? key.name;
	const chars = Array.from(text);
	if (chars.length !== 1) return null;
	const code = chars[0].codePointAt(0) ?? 0;
	return code >= 0x20 && code !== 0x7f ? chars[0] : null;
}

function mapPlayingKey(key: KeyEvent): UiAction | null {
	if (bound(KEY_BINDINGS.select, key)) return { type: "PlaySelected" };
	if (bound(KEY_BINDINGS.search, key)) return { type: "GoToSearch" };
	if (bound(KEY_BINDINGS.browse, key)) return { type: "GoToSearchBrowse" };
	if (bound(KEY_BINDINGS.down, key)) return { type: "NextItem" };
	if (bound(KEY_BINDINGS.up, key)) return { type: "PrevItem" };
	if (bound(KEY_BINDINGS.remove, key)) return { type: "RemoveSong" };
	if (bound(KEY_BINDINGS.nextPage, key)) return { type: "NextPage" };
	if (bound(KEY_BINDINGS.prevPage, key)) return { type: "PrevPage" };
	if (bound(KEY_BINDINGS.next, key)) return { type: "NextSong" };
	if (bound(KEY_BINDINGS.previous, key)) return { type: "PrevSong" };
	if (bound(KEY_BINDINGS.shuffle, key)) return { type: "ToggleShuffle" };
	if (bound(KEY_BINDINGS.pause, key)) return { type: "TogglePause" };
	if (bound(KEY_BINDINGS.quit, key)) return { type: "Quit" };
	return null;
}

function mapSearchInputKey(key: KeyEvent): UiAction | null {
	if (bound(KEY_BINDINGS.back, key)) return { type: "GoToPlaylist" };
	if (key.name === "backspace") return { type: "DeleteText" };
	if (bound(KEY_BINDINGS.select, key)) return { type: "SearchSong" };

	const char = printableChar(key);
	return char === null ? null : { type: "InputText", char };
}

function mapSearchBrowseKey(key: KeyEvent): UiAction | null {
	if (bound(KEY_BINDINGS.back, key) || bound(KEY_BINDINGS.quit, key)) {
		return { type: "GoToPlaylist" };
	}
	if (bound(KEY_BINDINGS.search, key)) return { type: "GoToSearch" };
	if (bound(KEY_BINDINGS.down, key)) return { type: "NextItem" };
	if (bound(KEY_BINDINGS.up, key)) return { type: "PrevItem" };
	if (bound(KEY_BINDINGS.nextPage, key)) return { type: "NextPage" };
	if (bound(KEY_BINDINGS.prevPage, key)) return { type: "PrevPage" };
	if (bound(KEY_BINDINGS.select, key)) return { type: "AddSelectedToPlaylist" };
	return null;
}

/**
 * Translate a key press into the action it means in `mode`
 */
export function mapKey(mode: AppMode, key: KeyEvent): UiAction | null {
	// Ctrl+C quits from anywhere
	if (key.ctrl && key.name === "c") {
		return { type: "Quit" };
	}
	if (key.ctrl || key.meta) {
		return null;
	}

	switch (mode) {
		case "Playing":
			return mapPlayingKey(key);
		case "SearchInput":
			return mapSearchInputKey(key);
		case "SearchBrowse":
			return mapSearchBrowseKey(key);
	}
}

/**
 * Input Handler
 * Routes keyboard input to the state machine for the current mode
 */
export class InputHandler implements IInputHandler {
	constructor(private stateManager: StateManager) {}

	handleKeyPress(key: KeyEvent): boolean {
		const action = mapKey(this.stateManager.getState().mode, key);
		if (!action) {
			return false;
		}
		logger.debug(`Key ${key.name} → ${action.type}`);
		this.stateManager.dispatch(action);
		return true;
	}
}
