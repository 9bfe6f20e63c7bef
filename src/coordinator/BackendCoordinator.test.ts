import { describe, expect, it, vi } from "vitest";
import { Channel } from "../channels";
import { ResolutionError } from "../errors";
import { createErrorHandler } from "../services/ErrorHandler";
import type { IStreamResolver } from "../services/StreamResolver";
import type { ISearchService } from "../services/YouTubeApiService";
import type { Command, IPlaybackChannel, Message, MpvEvent, PlaylistEntry } from "../types";
import { BackendCoordinator } from "./BackendCoordinator";

/**
 * Scripted stand-in for the mpv IPC client
 */
class FakePlayer implements IPlaybackChannel {
	calls: string[] = [];
	recvCalls = 0;
	private events: MpvEvent[] = [];
	private waiter: ((event: MpvEvent) => void) | null = null;

	emit(event: MpvEvent): void {
		if (this.waiter) {
			const waiter = this.waiter;
			this.waiter = null;
			waiter(event);
		} else {
			this.events.push(event);
		}
	}

	recv(): Promise<MpvEvent> {
		this.recvCalls++;
		const event = this.events.shift();
		if (event) return Promise.resolve(event);
		return new Promise((resolve) => {
			this.waiter = resolve;
		});
	}

	async loadFile(url: string): Promise<void> {
		this.calls.push(`loadfile ${url}`);
	}

	async play(): Promise<void> {
		this.calls.push("play");
	}

	async pause(): Promise<void> {
		this.calls.push("pause");
	}

	async resume(): Promise<void> {
		this.calls.push("resume");
	}

	isConnected(): boolean {
		return true;
	}

	close(): void {}
}

const songs: PlaylistEntry[] = [{ id: "vid-1", title: "First" }];

function setup(overrides: { search?: Partial<ISearchService>; resolver?: IStreamResolver } = {}) {
	const commands = new Channel<Command>(4);
	const messages = new Channel<Message>(8);
	const player = new FakePlayer();
	const save = vi.fn(async (_playlist: readonly PlaylistEntry[]) => {});
	const search: ISearchService = {
		search: async () => songs,
		lookupDuration: async () => 210_000,
		...overrides.search,
	};
	const coordinator = new BackendCoordinator(commands, messages, {
		player,
		search,
		resolver: overrides.resolver ?? { resolve: async (id) => `https://media.test/${id}` },
		playlistStore: { save },
		errorHandler: createErrorHandler(),
		now: () => 1_234,
	});
	const done = coordinator.run();

	const finish = async () => {
		commands.close();
		await done;
	};

	return { commands, messages, player, save, coordinator, finish };
}

describe("BackendCoordinator", () => {
	it("answers a search with results for that generation", async () => {
		const { commands, messages, finish } = setup();

		commands.trySend({ type: "Search", keyword: "first", generation: 3 });

		await expect(messages.recv()).resolves.toEqual({
			type: "DisplaySearchResult",
			results: songs,
			generation: 3,
		});
		await finish();
	});

	it("reports a failed search so the UI can stop loading", async () => {
		const { commands, messages, finish } = setup({
			search: {
				search: async () => {
					throw new Error("quota exceeded");
				},
			},
		});

		commands.trySend({ type: "Search", keyword: "x", generation: 1 });

		await expect(messages.recv()).resolves.toEqual({
			type: "SearchFailed",
			reason: "quota exceeded",
			generation: 1,
		});
		await finish();
	});

	it("looks up the duration, then loads and plays the resolved URL", async () => {
		const { commands, messages, player, finish } = setup();

		commands.trySend({ type: "Play", id: "vid-1" });

		await expect(messages.recv()).resolves.toEqual({ type: "SongDuration", durationMs: 210_000 });
		await finish();
		expect(player.calls).toEqual(["loadfile https://media.test/vid-1", "play"]);
	});

	it("plays with a zero duration when the lookup fails", async () => {
		const { commands, messages, player, finish } = setup({
			search: {
				lookupDuration: async () => {
					throw new Error("offline");
				},
			},
		});

		commands.trySend({ type: "Play", id: "vid-1" });

		await expect(messages.recv()).resolves.toEqual({ type: "SongDuration", durationMs: 0 });
		await finish();
		expect(player.calls).toEqual(["loadfile https://media.test/vid-1", "play"]);
	});

	it("reports a resolve failure and loads nothing", async () => {
		const { commands, messages, player, finish } = setup({
			resolver: {
				resolve: async (id) => {
					throw new ResolutionError(id, "yt-dlp failed: Video unavailable");
				},
			},
		});

		commands.trySend({ type: "Play", id: "gone" });

		await expect(messages.recv()).resolves.toEqual({ type: "SongDuration", durationMs: 210_000 });
		await expect(messages.recv()).resolves.toEqual({
			type: "OperationFailed",
			operation: "play",
			reason: "yt-dlp failed: Video unavailable",
		});
		await finish();
		expect(player.calls).toEqual([]);
	});

	it("saves playlists and keeps going when a save fails", async () => {
		const { commands, messages, save, finish } = setup();
		save.mockRejectedValueOnce(new Error("disk full"));

		commands.trySend({ type: "SavePlaylist", playlist: songs });
		commands.trySend({ type: "Search", keyword: "after", generation: 1 });

		await expect(messages.recv()).resolves.toMatchObject({ type: "DisplaySearchResult" });
		await finish();
		expect(save).toHaveBeenCalledWith(songs);
	});

	it("pauses and resumes the player", async () => {
		const { commands, player, finish } = setup();

		commands.trySend({ type: "SetPause", paused: true });
		commands.trySend({ type: "SetPause", paused: false });
		await finish();

		expect(player.calls).toEqual(["pause", "resume"]);
	});

	it("turns player events into playback messages", async () => {
		const { messages, player, finish } = setup();

		player.emit({ type: "Unknown", raw: '{"event":"idle"}' });
		player.emit({ type: "StartFile" });
		player.emit({ type: "EndFile", reason: "eof" });

		await expect(messages.recv()).resolves.toEqual({ type: "SongStarted", at: 1_234 });
		await expect(messages.recv()).resolves.toEqual({ type: "SongStopped", reason: "eof" });
		await finish();
		expect(messages.tryRecv()).toBeUndefined();
	});

	it("reports a lost connection once and keeps serving commands", async () => {
		const { commands, messages, player, finish } = setup();

		player.emit({ type: "Disconnected", error: "broken pipe" });
		await expect(messages.recv()).resolves.toEqual({ type: "BackendDown" });
		const recvCalls = player.recvCalls;

		commands.trySend({ type: "Search", keyword: "still here", generation: 2 });
		await expect(messages.recv()).resolves.toMatchObject({ generation: 2 });
		await finish();
		expect(player.recvCalls).toBe(recvCalls);
	});

	it("alternates between commands and events when both are ready", async () => {
		const commands = new Channel<Command>(4);
		const messages = new Channel<Message>(8);
		const player = new FakePlayer();
		commands.trySend({ type: "Search", keyword: "one", generation: 1 });
		commands.trySend({ type: "Search", keyword: "two", generation: 2 });
		player.emit({ type: "StartFile" });
		player.emit({ type: "EndFile", reason: "stop" });

		const coordinator = new BackendCoordinator(commands, messages, {
			player,
			search: { search: async () => [], lookupDuration: async () => 0 },
			resolver: { resolve: async () => "https://media.test/x" },
			playlistStore: { save: async () => {} },
			errorHandler: createErrorHandler(),
			now: () => 7,
		});
		const done = coordinator.run();

		const received: Array<Message | undefined> = [];
		for (let i = 0; i < 4; i++) {
			received.push(await messages.recv());
		}
		commands.close();
		await done;

		expect(received.map((m) => m?.type)).toEqual([
			"DisplaySearchResult",
			"SongStarted",
			"DisplaySearchResult",
			"SongStopped",
		]);
	});

	it("stops when the command channel closes", async () => {
		const { coordinator, finish } = setup();
		expect(coordinator.isRunning()).toBe(true);

		await finish();

		expect(coordinator.isRunning()).toBe(false);
	});
});
