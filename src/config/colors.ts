import type { ColorScheme } from "../types";

/**
 * ANSI attributes for list rendering
 * Entries already in the playlist show in blue while browsing search results.
 */
export const colors: ColorScheme = {
	reset: "\x1b[0m",
	selected: "\x1b[7m", // reverse video
	inPlaylist: "\x1b[34m", // blue
	nowPlaying: "\x1b[1;34m", // bold blue
	dim: "\x1b[2m",
	notice: "\x1b[33m", // amber
};

/**
 * Selection highlight only, for NO_COLOR terminals
 */
export const plainColors: ColorScheme = {
	reset: "\x1b[0m",
	selected: "\x1b[7m",
	inPlaylist: "",
	nowPlaying: "",
	dim: "",
	notice: "",
};

export function getColorScheme(env: NodeJS.ProcessEnv = process.env): ColorScheme {
	return env.NO_COLOR ? plainColors : colors;
}
