/**
 * mpv JSON IPC client
 *
 * Commands go out as one `{"command": [...]}` JSON object per line. Lines
 * coming back are either replies to those commands or asynchronous events;
 * both are decoded into MpvEvent values and queued in arrival order.
 */

import { createConnection } from "node:net";
import type { Duplex } from "node:stream";
import {
	DEFAULT_MPV_SOCKET,
	MPV_CONNECT_ATTEMPTS,
	MPV_CONNECT_BASE_DELAY_MS,
	MPV_CONNECT_MAX_DELAY_MS,
} from "../config/constants";
import { FatalStartupError, TubeplayError } from "../errors";
import { MpvLineSchema, safeValidate } from "../schemas";
import type { IPlaybackChannel, MpvEvent } from "../types";
import { getBackoffDelay, getLogger, sleep } from "../utils";

const logger = getLogger("MpvIpcClient");

export type SocketConnector = (path: string) => Promise<Duplex>;

export interface MpvConnectOptions {
	attempts?: number;
	baseDelayMs?: number;
	maxDelayMs?: number;
	connector?: SocketConnector;
}

/**
 * Serialize a command as a single protocol line
 */
export function encodeCommand(tokens: readonly string[]): string {
	return `${JSON.stringify({ command: tokens })}\n`;
}

/**
 * Decode one line from mpv.
 * Returns null for blank lines and lines that are not JSON.
 */
export function decodeEventLine(line: string): MpvEvent | null {
	const trimmed = line.trim();
	if (!trimmed) {
		return null;
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(trimmed);
	} catch (error) {
		logger.debug("Dropping malformed mpv line:", { line: trimmed, error: String(error) });
		return null;
	}

	const message = safeValidate(MpvLineSchema, parsed, "mpv line");
	switch (message?.event) {
		case "start-file":
			return { type: "StartFile" };
		case "end-file":
			return { type: "EndFile", reason: message.reason ?? "" };
		default:
			return { type: "Unknown", raw: trimmed };
	}
}

/**
 * Open a unix socket, resolving once it is connected
 */
export const connectUnixSocket: SocketConnector = (path) =>
	new Promise((resolve, reject) => {
		const socket = createConnection(path);
		const onError = (error: Error) => {
			socket.destroy();
			reject(error);
		};
		socket.once("error", onError);
		socket.once("connect", () => {
			socket.off("error", onError);
			resolve(socket);
		});
	});

export class MpvIpcClient implements IPlaybackChannel {
	private buffer = "";
	private events: MpvEvent[] = [];
	private waiters: Array<(event: MpvEvent) => void> = [];
	private connected = true;
	private disconnectError: string | undefined;

	constructor(private socket: Duplex) {
		socket.setEncoding("utf8");
		socket.on("data", (chunk: string | Buffer) => this.handleData(chunk.toString()));
		socket.on("error", (error: Error) => this.handleDisconnect(error.message));
		socket.on("close", () => this.handleDisconnect());
	}

	/**
	 * Connect to mpv's IPC socket, retrying with exponential backoff while mpv
	 * is still starting up.
	 */
	static async connect(
		path: string = DEFAULT_MPV_SOCKET,
		options: MpvConnectOptions = {},
	): Promise<MpvIpcClient> {
		const attempts = options.attempts ?? MPV_CONNECT_ATTEMPTS;
		const baseDelay = options.baseDelayMs ?? MPV_CONNECT_BASE_DELAY_MS;
		const maxDelay = options.maxDelayMs ?? MPV_CONNECT_MAX_DELAY_MS;
		const connector = options.connector ?? connectUnixSocket;

		let lastError: unknown;
		for (let attempt = 0; attempt < attempts; attempt++) {
			try {
				const socket = await connector(path);
				logger.info(`Connected to mpv at ${path}`);
				return new MpvIpcClient(socket);
			} catch (error) {
				lastError = error;
				if (attempt < attempts - 1) {
					const delay = getBackoffDelay(attempt, baseDelay, maxDelay);
					logger.debug(`mpv socket not ready (attempt ${attempt + 1}/${attempts}), retrying in ${delay}ms`);
					await sleep(delay);
				}
			}
		}

		const reason = lastError instanceof Error ? lastError.message : String(lastError);
		throw new FatalStartupError(`Cannot connect to mpv at ${path}: ${reason}`, {
			cause: lastError,
		});
	}

	/**
	 * Load a URL, replacing whatever mpv currently holds
	 */
	loadFile(url: string): Promise<void> {
		return this.send(["loadfile", url, "replace"]);
	}

	play(): Promise<void> {
		return this.send(["playlist-play-index", "0"]);
	}

	pause(): Promise<void> {
		return this.send(["set", "pause", "yes"]);
	}

	resume(): Promise<void> {
		return this.send(["set", "pause", "no"]);
	}

	/**
	 * Ask for a property; the reply arrives on the event stream as Unknown
	 */
	getProperty(name: string): Promise<void> {
		return this.send(["get_property", name]);
	}

	send(tokens: readonly string[]): Promise<void> {
		if (!this.connected) {
			return Promise.reject(new TubeplayError("mpv connection is closed"));
		}

		const line = encodeCommand(tokens);
		logger.debug("→ mpv", tokens[0]);
		return new Promise((resolve, reject) => {
			this.socket.write(line, (error?: Error | null) => {
				if (error) {
					reject(error);
				} else {
					resolve();
				}
			});
		});
	}

	/**
	 * Next decoded event. Once the connection is gone and the queue is empty,
	 * every call yields a Disconnected event.
	 */
	recv(): Promise<MpvEvent> {
		const event = this.events.shift();
		if (event) {
			return Promise.resolve(event);
		}
		if (!this.connected) {
			return Promise.resolve({ type: "Disconnected", error: this.disconnectError });
		}
		return new Promise((resolve) => {
			this.waiters.push(resolve);
		});
	}

	isConnected(): boolean {
		return this.connected;
	}

	close(): void {
		this.socket.destroy();
	}

	private handleData(chunk: string): void {
		this.buffer += chunk;

		let newline = this.buffer.indexOf("\n");
		while (newline !== -1) {
			const line = this.buffer.slice(0, newline);
			this.buffer = this.buffer.slice(newline + 1);

			const event = decodeEventLine(line);
			if (event) {
				this.deliver(event);
			}
			newline = this.buffer.indexOf("\n");
		}
	}

	private handleDisconnect(error?: string): void {
		if (!this.connected) return;
		this.connected = false;
		this.disconnectError = error;

		if (error) {
			logger.warn("mpv connection lost:", error);
		} else {
			logger.info("mpv connection closed");
		}
		this.deliver({ type: "Disconnected", error });
		for (const waiter of this.waiters.splice(0)) {
			waiter({ type: "Disconnected", error });
		}
	}

	private deliver(event: MpvEvent): void {
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter(event);
		} else {
			this.events.push(event);
		}
	}
}
