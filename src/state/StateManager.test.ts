import { describe, expect, it } from "vitest";
import { Channel } from "../channels";
import type { Command } from "../types";
import { createInitialState } from "./reducer";
import { StateManager } from "./StateManager";

const playlist = [
	{ id: "a", title: "Song A" },
	{ id: "b", title: "Song B" },
];

describe("StateManager", () => {
	it("forwards commands to the backend channel", () => {
		const commands = new Channel<Command>(1);
		const manager = new StateManager(createInitialState({ playlist }), commands);

		manager.dispatch({ type: "PlaySelected" });

		expect(commands.tryRecv()).toEqual({ type: "Play", id: "a" });
		expect(manager.getState().playingIndex).toBe(0);
	});

	it("drops a command when the mailbox is occupied", () => {
		const commands = new Channel<Command>(1);
		const manager = new StateManager(createInitialState({ playlist }), commands);

		manager.dispatch({ type: "PlaySelected" });
		manager.dispatch({ type: "NextSong" });

		expect(commands.tryRecv()).toEqual({ type: "Play", id: "a" });
		expect(commands.tryRecv()).toBeUndefined();
		expect(manager.getDroppedCommandCount()).toBe(1);
		// The state still moved on
		expect(manager.getState().playingIndex).toBe(1);
	});

	it("fails a search whose command is dropped", () => {
		const commands = new Channel<Command>(1);
		const manager = new StateManager(createInitialState({ playlist }), commands);

		manager.dispatch({ type: "PlaySelected" });
		manager.dispatch({ type: "GoToSearch" });
		manager.dispatch({ type: "InputText", char: "x" });
		manager.dispatch({ type: "SearchSong" });

		expect(manager.getState().loading).toBe(false);
		expect(manager.getState().notice).toBe("Search failed: backend busy");
		expect(manager.getDroppedCommandCount()).toBe(1);
		expect(commands.tryRecv()).toEqual({ type: "Play", id: "a" });
		expect(commands.tryRecv()).toBeUndefined();
	});

	it("keeps only the latest playlist save while the mailbox is occupied", () => {
		const commands = new Channel<Command>(1);
		const manager = new StateManager(createInitialState({ playlist }), commands);

		manager.dispatch({ type: "PlaySelected" });
		manager.dispatch({ type: "RemoveSong" });
		manager.dispatch({ type: "RemoveSong" });

		expect(manager.getDeferredCommandCount()).toBe(1);
		expect(manager.getDroppedCommandCount()).toBe(0);
		expect(commands.tryRecv()).toEqual({ type: "Play", id: "a" });

		manager.flushDeferred();

		expect(commands.tryRecv()).toEqual({ type: "SavePlaylist", playlist: [] });
		expect(manager.getDeferredCommandCount()).toBe(0);
	});

	it("sends the latest pause state once the mailbox frees up", () => {
		const commands = new Channel<Command>(1);
		const manager = new StateManager(createInitialState({ playlist }), commands);

		manager.dispatch({ type: "PlaySelected" });
		manager.dispatch({ type: "SongStarted", at: 0 });
		manager.dispatch({ type: "TogglePause" });
		manager.dispatch({ type: "TogglePause" });
		manager.dispatch({ type: "TogglePause" });

		expect(manager.getState().isPaused).toBe(true);
		expect(commands.tryRecv()).toEqual({ type: "Play", id: "a" });

		// The next dispatch offers the held command first
		manager.dispatch({ type: "SongDuration", durationMs: 1000 });

		expect(commands.tryRecv()).toEqual({ type: "SetPause", paused: true });
		expect(commands.tryRecv()).toBeUndefined();
	});

	it("hands held commands to the backend on shutdown", async () => {
		const commands = new Channel<Command>(1);
		const manager = new StateManager(createInitialState({ playlist }), commands);

		manager.dispatch({ type: "PlaySelected" });
		manager.dispatch({ type: "RemoveSong" });
		const settled = manager.settleDeferred();

		expect(await commands.recv()).toEqual({ type: "Play", id: "a" });
		await settled;

		expect(commands.tryRecv()).toEqual({ type: "SavePlaylist", playlist: [{ id: "b", title: "Song B" }] });
		expect(manager.getDeferredCommandCount()).toBe(0);
	});

	it("gives up on held commands once the mailbox closes", async () => {
		const commands = new Channel<Command>(1);
		const manager = new StateManager(createInitialState({ playlist }), commands);

		manager.dispatch({ type: "PlaySelected" });
		manager.dispatch({ type: "RemoveSong" });
		const settled = manager.settleDeferred();
		commands.close();

		await expect(settled).resolves.toBeUndefined();
		expect(manager.getDeferredCommandCount()).toBe(0);
	});
});
