import { emitKeypressEvents, type Key } from "node:readline";
import type { KeyEvent } from "../types";
import { getLogger } from "../utils/Logger";
import { cleanupTerminal, enterFullscreen, getTerminalSize } from "../utils/terminal";

const logger = getLogger("NodeTerminal");

/**
 * What the presentation loop needs from a terminal
 */
export interface ITerminal {
	/** Raw mode, alternate screen, hidden cursor */
	enter(): void;
	/** Undo `enter`; safe to call more than once */
	restore(): void;
	/** Next key press, or null when none arrives within `timeoutMs` */
	pollKey(timeoutMs: number): Promise<KeyEvent | null>;
	write(frame: string): void;
	size(): { width: number; height: number };
}

export type TerminalInput = NodeJS.ReadableStream & {
	isTTY?: boolean;
	setRawMode?(mode: boolean): unknown;
};

export type TerminalOutput = NodeJS.WritableStream & {
	columns?: number;
	rows?: number;
};

/**
 * Normalize a readline keypress. readline leaves `name` unset for
 * punctuation, so the typed character stands in for it ("/", "<", ">").
 */
export function toKeyEvent(str: string | undefined, key: Key | undefined): KeyEvent | null {
	const name = key?.name ?? str;
	if (!name) {
		return null;
	}
	return {
		name,
		ctrl: key?.ctrl ?? false,
		shift: key?.shift ?? false,
		meta: key?.meta ?? false,
		sequence: key?.sequence ?? str,
	};
}

/**
 * Terminal on top of node:readline keypress events and ANSI output
 */
export class NodeTerminal implements ITerminal {
	private pending: KeyEvent[] = [];
	private waiter: ((key: KeyEvent | null) => void) | null = null;
	private entered = false;

	private readonly onKeypress = (str: string | undefined, key: Key | undefined): void => {
		const event = toKeyEvent(str, key);
		if (!event) {
			return;
		}
		if (this.waiter) {
			const waiter = this.waiter;
			this.waiter = null;
			waiter(event);
		} else {
			this.pending.push(event);
		}
	};

	constructor(
		private readonly input: TerminalInput = process.stdin,
		private readonly output: TerminalOutput = process.stdout,
	) {}

	enter(): void {
		if (this.entered) {
			return;
		}
		this.entered = true;

		emitKeypressEvents(this.input);
		if (this.input.isTTY && this.input.setRawMode) {
			this.input.setRawMode(true);
		}
		this.input.on("keypress", this.onKeypress);
		this.input.resume();
		enterFullscreen(this.output);
		logger.debug("Terminal entered raw mode");
	}

	restore(): void {
		if (!this.entered) {
			return;
		}
		this.entered = false;

		this.input.removeListener("keypress", this.onKeypress);
		this.input.pause();
		if (this.waiter) {
			const waiter = this.waiter;
			this.waiter = null;
			waiter(null);
		}
		cleanupTerminal(this.output);
		logger.debug("Terminal restored");
	}

	pollKey(timeoutMs: number): Promise<KeyEvent | null> {
		const queued = this.pending.shift();
		if (queued) {
			return Promise.resolve(queued);
		}

		return new Promise((resolve) => {
			const timer = setTimeout(() => {
				if (this.waiter === deliver) {
					this.waiter = null;
				}
				resolve(null);
			}, timeoutMs);

			const deliver = (key: KeyEvent | null): void => {
				clearTimeout(timer);
				resolve(key);
			};
			this.waiter = deliver;
		});
	}

	write(frame: string): void {
		this.output.write(frame);
	}

	size(): { width: number; height: number } {
		return getTerminalSize(this.output);
	}
}
