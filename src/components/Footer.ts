import { UI_STRINGS } from "../config/constants";
import type { AppState, ColorScheme, LayoutDimensions } from "../types";
import type { Screen } from "../ui/Screen";

/**
 * Bottom line, by priority: loading, the search box, a notice, key help
 */
export function footerText(state: Readonly<AppState>): string {
	if (state.loading) {
		return UI_STRINGS.loading;
	}
	if (state.mode === "SearchInput") {
		return `${UI_STRINGS.searchPrompt}${state.keyword}█`;
	}
	if (state.notice) {
		return state.notice;
	}
	if (state.mode === "Playing") {
		return UI_STRINGS.playingHelp.replace("{shuffle}", state.isShuffle ? "on" : "off");
	}
	return UI_STRINGS.browseHelp;
}

export class Footer {
	constructor(
		private layout: LayoutDimensions,
		private colors: ColorScheme,
	) {}

	updateLayout(layout: LayoutDimensions): void {
		this.layout = layout;
	}

	render(screen: Screen, state: Readonly<AppState>): void {
		const showsNotice = !state.loading && state.mode !== "SearchInput" && Boolean(state.notice);

		screen.rule(this.layout.footerRuleY, this.colors.dim);
		screen.put(this.layout.footerY, footerText(state), showsNotice ? this.colors.notice : "");
	}
}
