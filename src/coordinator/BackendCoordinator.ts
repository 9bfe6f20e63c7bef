/**
 * Backend Coordinator
 *
 * The only place that awaits network, subprocess and player I/O. It services
 * two sources, UI commands and mpv events, one item at a time, and reports
 * outcomes back to the UI as messages.
 */

import { type Channel, ChannelClosedError } from "../channels";
import { ConfigError } from "../errors";
import {
	type ErrorHandler,
	ErrorCategory,
	ErrorSeverity,
} from "../services/ErrorHandler";
import type { IPlaylistStore } from "../services/PlaylistStore";
import type { IStreamResolver } from "../services/StreamResolver";
import type { ISearchService } from "../services/YouTubeApiService";
import type { Command, IPlaybackChannel, Message, MpvEvent, PlaylistEntry } from "../types";
import { getLogger } from "../utils";

const logger = getLogger("BackendCoordinator");

export interface BackendDependencies {
	player: IPlaybackChannel;
	search: ISearchService;
	resolver: IStreamResolver;
	playlistStore: Pick<IPlaylistStore, "save">;
	errorHandler: ErrorHandler;
	now?: () => number;
}

type Ready =
	| { source: "command"; command: Command | undefined }
	| { source: "event"; event: MpvEvent };

export class BackendCoordinator {
	private readonly player: IPlaybackChannel;
	private readonly searchService: ISearchService;
	private readonly resolver: IStreamResolver;
	private readonly playlistStore: Pick<IPlaylistStore, "save">;
	private readonly errorHandler: ErrorHandler;
	private readonly now: () => number;
	private running = false;

	constructor(
		private readonly commands: Channel<Command>,
		private readonly messages: Channel<Message>,
		deps: BackendDependencies,
	) {
		this.player = deps.player;
		this.searchService = deps.search;
		this.resolver = deps.resolver;
		this.playlistStore = deps.playlistStore;
		this.errorHandler = deps.errorHandler;
		this.now = deps.now ?? Date.now;
	}

	isRunning(): boolean {
		return this.running;
	}

	/**
	 * Service commands and player events until the command channel closes
	 * or the message channel is closed under us.
	 *
	 * A pending receive that loses a race is kept for the next round, so no
	 * command or event is ever lost. When both sources are ready the one not
	 * serviced last goes first.
	 */
	async run(): Promise<void> {
		if (this.running) {
			throw new Error("BackendCoordinator is already running");
		}
		this.running = true;
		this.errorHandler.setNotifier(async (notice) => {
			await this.messages.send({
				type: "OperationFailed",
				operation: notice.operation,
				reason: notice.message,
			});
		});

		let commandReady: Promise<Ready> | null = null;
		let eventReady: Promise<Ready> | null = null;
		let listening = true;
		let preferEvents = false;

		try {
			for (;;) {
				commandReady ??= this.commands
					.recv()
					.then((command): Ready => ({ source: "command", command }));
				if (listening) {
					eventReady ??= this.player.recv().then((event): Ready => ({ source: "event", event }));
				}

				const contenders: Array<Promise<Ready>> = !eventReady
					? [commandReady]
					: preferEvents
						? [eventReady, commandReady]
						: [commandReady, eventReady];
				const ready = await Promise.race(contenders);

				if (ready.source === "command") {
					commandReady = null;
					preferEvents = true;
					if (ready.command === undefined) {
						logger.info("Command channel closed, stopping");
						break;
					}
					if (!(await this.handleCommand(ready.command))) break;
				} else {
					eventReady = null;
					preferEvents = false;
					if (ready.event.type === "Disconnected") {
						listening = false;
						if (!(await this.emit({ type: "BackendDown" }))) break;
					} else if (!(await this.handleEvent(ready.event))) {
						break;
					}
				}
			}
		} finally {
			this.errorHandler.setNotifier(undefined);
			this.running = false;
		}
	}

	/**
	 * Run one command. Returns false once the UI is gone.
	 */
	private async handleCommand(command: Command): Promise<boolean> {
		logger.debug(`Command ${command.type}`);
		switch (command.type) {
			case "Search":
				return this.search(command.keyword, command.generation);
			case "Play":
				return this.play(command.id);
			case "SavePlaylist":
				await this.savePlaylist(command.playlist);
				return true;
			case "SetPause":
				await this.setPause(command.paused);
				return true;
		}
	}

	private async handleEvent(event: MpvEvent): Promise<boolean> {
		switch (event.type) {
			case "StartFile":
				return this.emit({ type: "SongStarted", at: this.now() });
			case "EndFile":
				return this.emit({ type: "SongStopped", reason: event.reason });
			case "Unknown":
				logger.debug("mpv:", event.raw);
				return true;
			case "Disconnected":
				return this.emit({ type: "BackendDown" });
		}
	}

	private async search(keyword: string, generation: number): Promise<boolean> {
		let results: PlaylistEntry[];
		try {
			results = await this.searchService.search(keyword);
		} catch (error) {
			const err = await this.errorHandler.handle(error, {
				category: error instanceof ConfigError ? ErrorCategory.CONFIG : ErrorCategory.NETWORK,
				severity: ErrorSeverity.WARNING,
				operation: "search",
				metadata: { keyword },
			});
			return this.emit({ type: "SearchFailed", reason: err.message, generation });
		}
		return this.emit({ type: "DisplaySearchResult", results, generation });
	}

	/**
	 * Duration lookup, resolve, load, play. A failed duration lookup only
	 * costs the progress display; a failed resolve skips loading.
	 */
	private async play(id: string): Promise<boolean> {
		let durationMs = 0;
		try {
			durationMs = await this.searchService.lookupDuration(id);
		} catch (error) {
			await this.errorHandler.handle(error, {
				category: ErrorCategory.NETWORK,
				severity: ErrorSeverity.INFO,
				operation: "duration lookup",
				metadata: { id },
			});
		}
		if (!(await this.emit({ type: "SongDuration", durationMs }))) {
			return false;
		}

		let url: string;
		try {
			url = await this.resolver.resolve(id);
		} catch (error) {
			await this.errorHandler.handle(error, {
				category: ErrorCategory.RESOLVER,
				severity: ErrorSeverity.ERROR,
				operation: "play",
				metadata: { id },
			});
			return !this.messages.isClosed();
		}

		try {
			await this.player.loadFile(url);
			await this.player.play();
		} catch (error) {
			await this.errorHandler.handle(error, {
				category: ErrorCategory.PLAYER,
				severity: ErrorSeverity.ERROR,
				operation: "play",
				metadata: { id },
			});
		}
		return !this.messages.isClosed();
	}

	private async savePlaylist(playlist: readonly PlaylistEntry[]): Promise<void> {
		try {
			await this.playlistStore.save(playlist);
		} catch (error) {
			await this.errorHandler.handleFsError(error, "save playlist");
		}
	}

	private async setPause(paused: boolean): Promise<void> {
		try {
			await (paused ? this.player.pause() : this.player.resume());
		} catch (error) {
			await this.errorHandler.handle(error, {
				category: ErrorCategory.PLAYER,
				severity: ErrorSeverity.ERROR,
				operation: paused ? "pause" : "resume",
			});
		}
	}

	/**
	 * Send a message, waiting while the UI has not drained the previous one.
	 * Returns false when the UI side has closed the channel.
	 */
	private async emit(message: Message): Promise<boolean> {
		try {
			await this.messages.send(message);
			return true;
		} catch (error) {
			if (error instanceof ChannelClosedError) {
				logger.debug(`Message channel closed, dropping ${message.type}`);
				return false;
			}
			throw error;
		}
	}
}
