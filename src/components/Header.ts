import { HEADER_TITLE_MAX, UI_STRINGS } from "../config/constants";
import type { AppState, ColorScheme, LayoutDimensions } from "../types";
import type { Screen } from "../ui/Screen";
import { displayTime, truncate } from "../utils/format";

/**
 * Header text: the sounding track with its progress, or the mode title
 */
export function headerText(state: Readonly<AppState>, now: number): string {
	if (state.isPlaying && state.nowPlaying) {
		const icon = state.isPaused ? "⏸" : "▶";
		const shuffle = state.isShuffle ? "~" : "";
		let played = state.songStartedAt === null ? 0 : now - state.songStartedAt;
		if (state.songDurationMs > 0) {
			played = Math.min(played, state.songDurationMs);
		}
		const title = truncate(state.nowPlaying.title, HEADER_TITLE_MAX);
		return `${icon}${shuffle} ${title} - ${displayTime(played)} / ${displayTime(state.songDurationMs)}`;
	}
	return state.mode === "Playing" ? UI_STRINGS.nowPlaying : UI_STRINGS.songSearch;
}

/**
 * Top row plus the rule under it
 */
export class Header {
	constructor(
		private layout: LayoutDimensions,
		private colors: ColorScheme,
	) {}

	updateLayout(layout: LayoutDimensions): void {
		this.layout = layout;
	}

	render(screen: Screen, state: Readonly<AppState>, now: number): void {
		const style = state.isPlaying ? this.colors.nowPlaying : "";
		screen.put(this.layout.headerY, headerText(state, now), style);
		screen.rule(this.layout.headerY + 1, this.colors.dim);
	}
}
