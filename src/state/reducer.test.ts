import { describe, expect, it } from "vitest";
import type { AppMessage, AppState, Command, PlaylistEntry } from "../types";
import { createInitialState, update } from "./reducer";

const songA: PlaylistEntry = { id: "a", title: "Song A" };
const songB: PlaylistEntry = { id: "b", title: "Song B" };

function entries(count: number, prefix = "v"): PlaylistEntry[] {
	return Array.from({ length: count }, (_, i) => ({ id: `${prefix}${i}`, title: `Title ${i}` }));
}

/**
 * Apply messages in order, collecting every command issued
 */
function run(state: AppState, ...messages: AppMessage[]): { state: AppState; commands: Command[] } {
	const commands: Command[] = [];
	let current = state;
	for (const msg of messages) {
		const result = update(current, msg, () => 0);
		current = result.state;
		commands.push(...result.commands);
	}
	return { state: current, commands };
}

// rows 10 leaves a page size of 4
const initial = (options: Parameters<typeof createInitialState>[0] = {}) =>
	createInitialState({ rows: 10, ...options });

describe("createInitialState", () => {
	it("starts in Playing with a sequential queue", () => {
		const state = initial({ playlist: [songA, songB] });

		expect(state.mode).toBe("Playing");
		expect(state.pageSize).toBe(4);
		expect(state.playQueue).toEqual([0, 1]);
		expect(state.queueIndex).toBe(0);
		expect(state.running).toBe(true);
	});
});

describe("playback through the queue", () => {
	it("plays A, B, A, B when skipping forward", () => {
		const { commands } = run(
			initial({ playlist: [songA, songB] }),
			{ type: "PlaySelected" },
			{ type: "NextSong" },
			{ type: "NextSong" },
			{ type: "NextSong" },
		);

		expect(commands).toEqual([
			{ type: "Play", id: "a" },
			{ type: "Play", id: "b" },
			{ type: "Play", id: "a" },
			{ type: "Play", id: "b" },
		]);
	});

	it("advances exactly once when the last entry ends", () => {
		const playing = run(
			initial({ playlist: [songA, songB] }),
			{ type: "NextItem" },
			{ type: "PlaySelected" },
			{ type: "SongStarted", at: 1_000 },
		).state;
		expect(playing.queueIndex).toBe(1);

		const { state, commands } = update(playing, { type: "SongStopped", reason: "eof" }, () => 0);

		expect(commands).toEqual([{ type: "Play", id: "a" }]);
		expect(state.queueIndex).toBe(0);
		expect(state.isPlaying).toBe(false);
		expect(state.playingIndex).toBe(0);
	});

	it("does not advance when playback stops for another reason", () => {
		const { commands, state } = run(
			initial({ playlist: [songA, songB] }),
			{ type: "SongStarted", at: 5 },
			{ type: "SongStopped", reason: "stop" },
		);

		expect(commands).toEqual([]);
		expect(state.isPlaying).toBe(false);
	});

	it("stays at the start of the queue on previous", () => {
		const { commands, state } = run(
			initial({ playlist: [songA, songB] }),
			{ type: "PrevSong" },
		);

		expect(commands).toEqual([{ type: "Play", id: "a" }]);
		expect(state.queueIndex).toBe(0);
	});

	it("treats next, previous and eof on an empty playlist as no-ops", () => {
		const { commands, state } = run(
			initial(),
			{ type: "NextSong" },
			{ type: "PrevSong" },
			{ type: "PlaySelected" },
			{ type: "SongStopped", reason: "eof" },
		);

		expect(commands).toEqual([]);
		expect(state.playingIndex).toBeNull();
	});

	it("plays the selected entry on a later page", () => {
		const { commands, state } = run(
			initial({ playlist: entries(6) }),
			{ type: "NextPage" },
			{ type: "NextItem" },
			{ type: "PlaySelected" },
		);

		expect(commands).toEqual([{ type: "Play", id: "v5" }]);
		expect(state.playingIndex).toBe(5);
		expect(state.queueIndex).toBe(5);
	});

	it("rebuilds the queue when shuffle toggles", () => {
		const { state } = run(initial({ playlist: entries(3) }), { type: "NextSong" }, {
			type: "ToggleShuffle",
		});

		expect(state.isShuffle).toBe(true);
		expect(state.queueIndex).toBe(0);
		// Fisher-Yates with a random source of 0
		expect(state.playQueue).toEqual([1, 2, 0]);
	});

	it("toggles pause only while something is playing", () => {
		const idle = run(initial({ playlist: [songA] }), { type: "TogglePause" });
		expect(idle.commands).toEqual([]);

		const { commands, state } = run(
			initial({ playlist: [songA] }),
			{ type: "SongStarted", at: 1 },
			{ type: "TogglePause" },
			{ type: "TogglePause" },
		);
		expect(commands).toEqual([
			{ type: "SetPause", paused: true },
			{ type: "SetPause", paused: false },
		]);
		expect(state.isPaused).toBe(false);
	});

	it("records start time and duration", () => {
		const { state } = run(
			initial(),
			{ type: "SongDuration", durationMs: 180_000 },
			{ type: "SongStarted", at: 42 },
		);

		expect(state.songDurationMs).toBe(180_000);
		expect(state.songStartedAt).toBe(42);
		expect(state.isPlaying).toBe(true);
	});
});

describe("search", () => {
	it("issues nothing for a whitespace-only keyword", () => {
		const { state, commands } = run(
			initial(),
			{ type: "GoToSearch" },
			{ type: "InputText", char: " " },
			{ type: "InputText", char: " " },
			{ type: "SearchSong" },
		);

		expect(commands).toEqual([]);
		expect(state.loading).toBe(false);
		expect(state.keyword).toBe("  ");
	});

	it("edits the keyword and issues a numbered search", () => {
		const { state, commands } = run(
			initial(),
			{ type: "GoToSearch" },
			{ type: "InputText", char: "l" },
			{ type: "InputText", char: "o" },
			{ type: "InputText", char: "x" },
			{ type: "DeleteText" },
			{ type: "SearchSong" },
		);

		expect(commands).toEqual([{ type: "Search", keyword: "lo", generation: 1 }]);
		expect(state.loading).toBe(true);
		expect(state.mode).toBe("SearchInput");
	});

	it("shows the results of the latest search in SearchBrowse", () => {
		const searching = run(
			initial(),
			{ type: "GoToSearch" },
			{ type: "InputText", char: "a" },
			{ type: "SearchSong" },
		).state;

		const { state } = update(searching, {
			type: "DisplaySearchResult",
			results: [songA],
			generation: 1,
		});

		expect(state.mode).toBe("SearchBrowse");
		expect(state.searchResults).toEqual([songA]);
		expect(state.loading).toBe(false);
		expect(state.selectedIndex).toBe(0);
	});

	it("ignores results and failures of a superseded search", () => {
		const searching = run(
			initial(),
			{ type: "GoToSearch" },
			{ type: "InputText", char: "a" },
			{ type: "SearchSong" },
			{ type: "SearchSong" },
		).state;
		expect(searching.searchGeneration).toBe(2);

		const stale = run(
			searching,
			{ type: "DisplaySearchResult", results: [songA], generation: 1 },
			{ type: "SearchFailed", reason: "timeout", generation: 1 },
		).state;
		expect(stale).toBe(searching);

		const failed = update(searching, { type: "SearchFailed", reason: "quota", generation: 2 }).state;
		expect(failed.loading).toBe(false);
		expect(failed.notice).toBe("Search failed: quota");
	});

	it("keeps the keyword when leaving search input", () => {
		const { state } = run(
			initial(),
			{ type: "GoToSearch" },
			{ type: "InputText", char: "z" },
			{ type: "GoToPlaylist" },
		);

		expect(state.mode).toBe("Playing");
		expect(state.keyword).toBe("z");
	});
});

describe("playlist editing", () => {
	const browsing = (options: Parameters<typeof initial>[0] = {}) =>
		update(initial(options), { type: "DisplaySearchResult", results: [songA, songB], generation: 0 })
			.state;

	it("appends the selected result, rebuilds the queue and saves", () => {
		const { state, commands } = run(
			browsing({ playlist: [songA] }),
			{ type: "NextItem" },
			{ type: "AddSelectedToPlaylist" },
		);

		expect(state.playlist).toEqual([songA, songB]);
		expect(state.playQueue).toEqual([0, 1]);
		expect(commands).toEqual([{ type: "SavePlaylist", playlist: [songA, songB] }]);
	});

	it("allows duplicates unless dedupe is on", () => {
		const permissive = run(browsing({ playlist: [songA] }), { type: "AddSelectedToPlaylist" });
		expect(permissive.state.playlist).toEqual([songA, songA]);

		const strict = run(browsing({ playlist: [songA], dedupePlaylist: true }), {
			type: "AddSelectedToPlaylist",
		});
		expect(strict.state.playlist).toEqual([songA]);
		expect(strict.commands).toEqual([]);
		expect(strict.state.notice).toBe("Already in the playlist");
	});

	it("removes the selected entry and keeps the playing index in range", () => {
		const playlist = entries(3);
		const playingLast = run(
			initial({ playlist }),
			{ type: "NextItem" },
			{ type: "NextItem" },
			{ type: "PlaySelected" },
			{ type: "PrevItem" },
		).state;

		const removedBefore = update(playingLast, { type: "RemoveSong" }, () => 0);
		expect(removedBefore.state.playlist.map((e) => e.id)).toEqual(["v0", "v2"]);
		expect(removedBefore.state.playingIndex).toBe(1);
		expect(removedBefore.state.nowPlaying).toEqual(playlist[2]);
		expect(removedBefore.commands).toEqual([
			{ type: "SavePlaylist", playlist: [playlist[0], playlist[2]] },
		]);

		const removedPlaying = run(removedBefore.state, { type: "NextItem" }, { type: "RemoveSong" });
		expect(removedPlaying.state.playingIndex).toBeNull();
		expect(removedPlaying.state.selectedIndex).toBe(0);
	});

	it("ignores remove on an empty playlist", () => {
		const { state, commands } = run(initial(), { type: "RemoveSong" });

		expect(commands).toEqual([]);
		expect(state.playlist).toEqual([]);
	});

	it("moves back a page when the last entry of the last page is removed", () => {
		const { state } = run(
			initial({ playlist: entries(5) }),
			{ type: "NextPage" },
			{ type: "RemoveSong" },
		);

		expect(state.playlist).toHaveLength(4);
		expect(state.currentPage).toBe(0);
		expect(state.selectedIndex).toBe(0);
	});
});

describe("navigation", () => {
	it("keeps the selection inside the items of the page", () => {
		const { state } = run(
			initial({ playlist: entries(6) }),
			{ type: "NextPage" },
			{ type: "NextItem" },
			{ type: "NextItem" },
			{ type: "NextItem" },
		);

		expect(state.currentPage).toBe(1);
		expect(state.selectedIndex).toBe(1);
	});

	it("clamps paging to the available pages", () => {
		const { state } = run(
			initial({ playlist: entries(6) }),
			{ type: "PrevPage" },
			{ type: "NextPage" },
			{ type: "NextPage" },
		);

		expect(state.currentPage).toBe(1);
	});

	it("resets page and selection on mode switch", () => {
		const { state } = run(
			initial({ playlist: entries(6) }),
			{ type: "NextPage" },
			{ type: "NextItem" },
			{ type: "GoToSearchBrowse" },
		);

		expect(state.mode).toBe("SearchBrowse");
		expect(state.currentPage).toBe(0);
		expect(state.selectedIndex).toBe(0);
	});

	it("recomputes the page size on resize", () => {
		const { state } = run(
			initial({ playlist: entries(10) }),
			{ type: "NextPage" },
			{ type: "NextPage" },
			{ type: "Resize", rows: 16 },
		);

		expect(state.pageSize).toBe(10);
		expect(state.currentPage).toBe(0);
	});
});

describe("backend messages", () => {
	it("shows operation failures until the next key press", () => {
		const failed = update(initial({ playlist: [songA] }), {
			type: "OperationFailed",
			operation: "play",
			reason: "video unavailable",
		}).state;
		expect(failed.notice).toBe("play failed: video unavailable");

		expect(update(failed, { type: "NextItem" }).state.notice).toBeNull();
	});

	it("marks playback stopped when the backend goes down", () => {
		const { state } = run(
			initial({ playlist: [songA] }),
			{ type: "SongStarted", at: 1 },
			{ type: "BackendDown" },
		);

		expect(state.isPlaying).toBe(false);
		expect(state.notice).toBe("Playback backend disconnected");
	});

	it("stops running on quit", () => {
		expect(update(initial(), { type: "Quit" }).state.running).toBe(false);
	});
});
