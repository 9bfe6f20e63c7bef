import { spawnSync } from "node:child_process";
import { MIN_TERM_HEIGHT, MIN_TERM_WIDTH, RESERVED_ROWS } from "../config/constants";
import type { LayoutDimensions } from "../types";

/**
 * ANSI escape sequences for terminal control
 */
export const ESCAPE_SEQUENCES = {
	CURSOR_SHOW: "\x1b[?25h",
	CURSOR_HIDE: "\x1b[?25l",

	ALT_SCREEN_ON: "\x1b[?1049h",
	ALT_SCREEN_OFF: "\x1b[?1049l",

	CLEAR_SCREEN: "\x1b[2J\x1b[H",
	CLEAR_LINE: "\x1b[2K",
	RESET_ATTRS: "\x1b[0m",
} as const;

/**
 * Move the cursor to a 0-based row/column
 */
export function moveTo(row: number, col: number = 0): string {
	return `\x1b[${row + 1};${col + 1}H`;
}

/**
 * Switch to the alternate screen and hide the cursor
 */
export function enterFullscreen(out: NodeJS.WritableStream = process.stdout): void {
	out.write(ESCAPE_SEQUENCES.ALT_SCREEN_ON);
	out.write(ESCAPE_SEQUENCES.CURSOR_HIDE);
	out.write(ESCAPE_SEQUENCES.CLEAR_SCREEN);
}

/**
 * Use stty to reset terminal to sane state
 */
function resetTerminalState(): void {
	if (!process.stdin.isTTY) return;
	try {
		spawnSync("stty", ["sane"], { stdio: "inherit" });
	} catch {
		// stty missing (e.g. Windows); raw mode was already turned off
	}
}

/**
 * Restore the terminal to the state it had before startup.
 * Safe to call more than once.
 */
export function cleanupTerminal(out: NodeJS.WritableStream = process.stdout): void {
	if (process.stdin.isTTY && process.stdin.isRaw) {
		process.stdin.setRawMode(false);
	}
	out.write(ESCAPE_SEQUENCES.RESET_ATTRS);
	out.write(ESCAPE_SEQUENCES.CURSOR_SHOW);
	out.write(ESCAPE_SEQUENCES.ALT_SCREEN_OFF);
	resetTerminalState();
}

/**
 * Current terminal dimensions, never smaller than the supported minimum
 */
export function getTerminalSize(
	out: { columns?: number; rows?: number } = process.stdout,
): { width: number; height: number } {
	return {
		width: Math.max(out.columns || MIN_TERM_WIDTH, MIN_TERM_WIDTH),
		height: Math.max(out.rows || MIN_TERM_HEIGHT, MIN_TERM_HEIGHT),
	};
}

/**
 * Calculate row positions for a terminal of the given size
 */
export function calculateLayout(width: number, height: number): LayoutDimensions {
	const termHeight = Math.max(height, MIN_TERM_HEIGHT);
	return {
		termWidth: Math.max(width, MIN_TERM_WIDTH),
		termHeight,
		headerY: 0,
		listY: 2,
		listHeight: Math.max(1, termHeight - RESERVED_ROWS),
		footerRuleY: termHeight - 2,
		footerY: termHeight - 1,
	};
}
