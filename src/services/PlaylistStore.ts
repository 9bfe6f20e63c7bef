/**
 * Playlist Store
 * Persists the playlist as one "<id> - <title>" line per entry
 */

import { existsSync, readFileSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { PLAYLIST_SEPARATOR } from "../config/constants";
import type { PlaylistEntry } from "../types";
import { getLogger } from "../utils";

const logger = getLogger("PlaylistStore");

export interface IPlaylistStore {
	load(): PlaylistEntry[];
	save(playlist: readonly PlaylistEntry[]): Promise<void>;
}

/**
 * Parse the file contents. Lines without the separator are skipped; the
 * title is everything after the first separator, trimmed.
 */
export function parsePlaylist(contents: string): PlaylistEntry[] {
	const entries: PlaylistEntry[] = [];
	for (const line of contents.split("\n")) {
		const at = line.indexOf(PLAYLIST_SEPARATOR);
		if (at === -1) continue;
		entries.push({
			id: line.slice(0, at),
			title: line.slice(at + PLAYLIST_SEPARATOR.length).trim(),
		});
	}
	return entries;
}

export function serializePlaylist(playlist: readonly PlaylistEntry[]): string {
	return playlist
		.map((entry) => `${entry.id}${PLAYLIST_SEPARATOR}${entry.title.replace(/[\r\n]+/g, " ")}\n`)
		.join("");
}

export class PlaylistStore implements IPlaylistStore {
	constructor(private readonly filePath: string) {}

	getFilePath(): string {
		return this.filePath;
	}

	/**
	 * Read the playlist. A missing or unreadable file is an empty playlist.
	 */
	load(): PlaylistEntry[] {
		if (!existsSync(this.filePath)) {
			logger.info(`No playlist at ${this.filePath}, starting empty`);
			return [];
		}

		let contents: string;
		try {
			contents = readFileSync(this.filePath, "utf-8");
		} catch (error) {
			logger.warn(`Could not read ${this.filePath}, starting empty:`, error);
			return [];
		}

		const entries = parsePlaylist(contents);
		logger.info(`Loaded ${entries.length} entries from ${this.filePath}`);
		return entries;
	}

	/**
	 * Replace the file with the given playlist
	 */
	async save(playlist: readonly PlaylistEntry[]): Promise<void> {
		await mkdir(dirname(this.filePath), { recursive: true });
		await writeFile(this.filePath, serializePlaylist(playlist), "utf-8");
		logger.debug(`Saved ${playlist.length} entries`);
	}
}
