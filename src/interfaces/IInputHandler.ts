import type { KeyEvent } from "../types";

/**
 * Input Handler Interface
 * Routes keyboard input to the state machine
 */

export interface IInputHandler {
	/**
	 * Map the key for the current mode and apply it.
	 * Returns false when the key means nothing in this mode.
	 */
	handleKeyPress(key: KeyEvent): boolean;
}
