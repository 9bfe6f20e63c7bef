#!/usr/bin/env node
import { App } from "./app";
import { Channel } from "./channels";
import {
	COMMAND_CHANNEL_CAPACITY,
	MESSAGE_CHANNEL_CAPACITY,
	SHUTDOWN_GRACE_MS,
} from "./config";
import {
	createServiceContainer,
	registerServices,
	TOKENS,
	validateServiceRegistration,
} from "./container";
import { InputHandler } from "./controllers";
import { BackendCoordinator } from "./coordinator/BackendCoordinator";
import { FatalStartupError, toError } from "./errors";
import { AppLifecycle } from "./lifecycle/AppLifecycle";
import { getConfigService, MpvIpcClient } from "./services";
import { createInitialState } from "./state/reducer";
import { StateManager } from "./state/StateManager";
import type { Command, Message } from "./types";
import { NodeTerminal } from "./ui/NodeTerminal";
import { getLogger, getLogWriter, sleep } from "./utils";

const logger = getLogger("Main");

/**
 * Start mpv, connect to it and run the UI until the user quits.
 * Resolves to the process exit status.
 */
async function main(): Promise<number> {
	const config = getConfigService().load();

	const container = createServiceContainer();
	registerServices(container, config);
	if (!validateServiceRegistration(container)) {
		logger.error("Service registration validation failed");
		return 1;
	}
	logger.debug("DI container initialized and validated");

	const store = container.resolve(TOKENS.PlaylistStore);
	const playlist = store.load();
	logger.info(`Loaded ${playlist.length} playlist entries`);

	const mpv = container.resolve(TOKENS.MpvManager);
	if (!mpv.isInstalled()) {
		throw new FatalStartupError(`mpv not found (looked for "${config.mpvPath}")`);
	}
	await mpv.start();

	let player: MpvIpcClient;
	try {
		player = await MpvIpcClient.connect(mpv.socketPath);
	} catch (error) {
		mpv.stop(true);
		throw error;
	}

	const commands = new Channel<Command>(COMMAND_CHANNEL_CAPACITY);
	const messages = new Channel<Message>(MESSAGE_CHANNEL_CAPACITY);
	const terminal = new NodeTerminal();

	const stateManager = new StateManager(
		createInitialState({
			playlist,
			rows: terminal.size().height,
			dedupePlaylist: config.dedupePlaylist,
		}),
		commands,
	);

	const coordinator = new BackendCoordinator(commands, messages, {
		player,
		search: container.resolve(TOKENS.SearchApi),
		resolver: container.resolve(TOKENS.StreamResolver),
		playlistStore: store,
		errorHandler: container.resolve(TOKENS.ErrorHandler),
	});

	const app = new App(stateManager, new InputHandler(stateManager), messages, terminal);

	const lifecycle = new AppLifecycle({
		requestQuit: () => stateManager.dispatch({ type: "Quit" }),
		onResize: () => app.handleResize(),
		player,
		mpv,
		disposables: [container],
	});
	lifecycle.setupSignalHandlers();

	const backend = coordinator.run();
	try {
		await app.run();
	} finally {
		await Promise.race([stateManager.settleDeferred(), sleep(SHUTDOWN_GRACE_MS)]);
		commands.close();
		messages.close();
		await Promise.race([backend, sleep(SHUTDOWN_GRACE_MS)]);
		await lifecycle.cleanup();
	}

	return 0;
}

main()
	.then((code) => process.exit(code))
	.catch(async (error: unknown) => {
		const err = toError(error);
		logger.error("Fatal error in main:", err);
		console.error(`tubeplay: ${err.message}`);
		try {
			await getLogWriter().shutdown();
		} finally {
			process.exit(1);
		}
	});
