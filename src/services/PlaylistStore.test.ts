import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { parsePlaylist, PlaylistStore, serializePlaylist } from "./PlaylistStore";

describe("parsePlaylist", () => {
	it("splits on the first separator and trims the title", () => {
		expect(parsePlaylist("abc - Song - Live Version  \r\nno separator here\nxyz - Other\n")).toEqual([
			{ id: "abc", title: "Song - Live Version" },
			{ id: "xyz", title: "Other" },
		]);
	});

	it("reads an empty file as an empty playlist", () => {
		expect(parsePlaylist("")).toEqual([]);
	});
});

describe("serializePlaylist", () => {
	it("writes one line per entry", () => {
		expect(serializePlaylist([{ id: "a", title: "One\nTwo" }])).toBe("a - One Two\n");
	});
});

describe("PlaylistStore", () => {
	let dir: string;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "tubeplay-playlist-"));
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("round-trips a playlist", async () => {
		const store = new PlaylistStore(join(dir, "list"));
		const playlist = [
			{ id: "x", title: "T1" },
			{ id: "y", title: "T2" },
		];

		await store.save(playlist);

		expect(readFileSync(join(dir, "list"), "utf-8")).toBe("x - T1\ny - T2\n");
		expect(store.load()).toEqual(playlist);
	});

	it("truncates previous contents on save", async () => {
		const path = join(dir, "list");
		writeFileSync(path, "old - Entry\nolder - Entry\n");
		const store = new PlaylistStore(path);

		await store.save([{ id: "new", title: "Only" }]);

		expect(store.load()).toEqual([{ id: "new", title: "Only" }]);
	});

	it("loads a missing or empty file as an empty playlist", () => {
		expect(new PlaylistStore(join(dir, "missing")).load()).toEqual([]);

		writeFileSync(join(dir, "empty"), "");
		expect(new PlaylistStore(join(dir, "empty")).load()).toEqual([]);
	});

	it("loads an unreadable path as an empty playlist", () => {
		expect(new PlaylistStore(dir).load()).toEqual([]);
	});

	it("creates the parent directory on save", async () => {
		const store = new PlaylistStore(join(dir, "nested", "list"));

		await store.save([]);

		expect(readFileSync(join(dir, "nested", "list"), "utf-8")).toBe("");
	});
});
