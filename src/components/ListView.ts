import { TITLE_PADDING, UI_STRINGS } from "../config/constants";
import { absoluteIndex, paginate } from "../state/pagination";
import { activeList, totalPages } from "../state/reducer";
import type { AppState, ColorScheme, LayoutDimensions, PlaylistEntry } from "../types";
import type { Screen } from "../ui/Screen";
import { truncate } from "../utils/format";

/**
 * "N. title" with N counting from 1 across pages
 */
export function formatRow(index: number, entry: PlaylistEntry, width: number): string {
	return `${index + 1}. ${truncate(entry.title, Math.max(1, width - TITLE_PADDING))}`;
}

export function pageIndicator(state: Readonly<AppState>): string {
	return `Page: ${state.currentPage + 1}/${Math.max(1, totalPages(state))}`;
}

/**
 * The current page of the playlist or of the search results
 */
export class ListView {
	constructor(
		private layout: LayoutDimensions,
		private colors: ColorScheme,
	) {}

	updateLayout(layout: LayoutDimensions): void {
		this.layout = layout;
	}

	render(screen: Screen, state: Readonly<AppState>): void {
		const { listY, termWidth } = this.layout;
		const list = activeList(state);

		if (list.length === 0) {
			screen.put(listY, UI_STRINGS.emptyList, this.colors.dim);
			return;
		}

		const inPlaylist = new Set(state.playlist.map((entry) => entry.id));
		const page = paginate(list, state.currentPage, state.pageSize);

		page.forEach((entry, row) => {
			const index = absoluteIndex(state.currentPage, state.pageSize, row);
			screen.put(listY + row, formatRow(index, entry, termWidth), this.styleFor(state, entry, index, row, inPlaylist));
		});

		screen.put(listY + state.pageSize, pageIndicator(state), this.colors.dim);
	}

	private styleFor(
		state: Readonly<AppState>,
		entry: PlaylistEntry,
		index: number,
		row: number,
		inPlaylist: ReadonlySet<string>,
	): string {
		if (row === state.selectedIndex) {
			return this.colors.selected;
		}
		if (state.mode === "Playing") {
			return state.isPlaying && index === state.playingIndex ? this.colors.nowPlaying : "";
		}
		return inPlaylist.has(entry.id) ? this.colors.inPlaylist : "";
	}
}
