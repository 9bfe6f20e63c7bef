import type { Channel } from "../channels";
import type { AppMessage, AppState, Command } from "../types";
import { getLogger } from "../utils";
import type { RandomSource } from "./queue";
import { update } from "./reducer";

const logger = getLogger("StateManager");

/**
 * Commands where only the latest one matters
 */
type DeferrableCommand = Extract<Command, { type: "SavePlaylist" | "SetPause" }>;

function isDeferrable(command: Command): command is DeferrableCommand {
	return command.type === "SavePlaylist" || command.type === "SetPause";
}

/**
 * Centralized State Manager
 * Single owner of the application state. Every change goes through
 * `dispatch`, which runs the state machine and forwards the resulting
 * commands to the backend.
 */
export class StateManager {
	private state: AppState;
	private droppedCommands = 0;
	private deferred = new Map<DeferrableCommand["type"], DeferrableCommand>();

	constructor(
		initialState: AppState,
		private readonly commands: Channel<Command>,
		private readonly random: RandomSource = Math.random,
	) {
		this.state = { ...initialState };
	}

	/**
	 * Get current state (immutable)
	 */
	getState(): Readonly<AppState> {
		return this.state;
	}

	/**
	 * Apply a key action or backend message
	 */
	dispatch(msg: AppMessage): void {
		this.flushDeferred();

		const result = update(this.state, msg, this.random);
		this.state = result.state;

		const rejected: AppMessage[] = [];
		for (const command of result.commands) {
			if (this.commands.trySend(command)) {
				continue;
			}
			if (isDeferrable(command)) {
				// Held until the mailbox frees up; a newer one of the same kind replaces it
				this.deferred.set(command.type, command);
				logger.debug(`Deferred ${command.type} command, backend busy`);
				continue;
			}

			this.droppedCommands++;
			logger.debug(`Dropped ${command.type} command, backend busy`);
			if (command.type === "Search") {
				rejected.push({
					type: "SearchFailed",
					reason: "backend busy",
					generation: command.generation,
				});
			}
		}

		for (const message of rejected) {
			this.dispatch(message);
		}
	}

	/**
	 * Offer held commands to the mailbox again, oldest first
	 */
	flushDeferred(): void {
		for (const [type, command] of this.deferred) {
			if (!this.commands.trySend(command)) {
				return;
			}
			this.deferred.delete(type);
		}
	}

	/**
	 * Wait until every held command is in the mailbox. Used on shutdown, while
	 * the backend still drains commands.
	 */
	async settleDeferred(): Promise<void> {
		const held = [...this.deferred.values()];
		this.deferred.clear();
		for (const command of held) {
			try {
				await this.commands.send(command);
			} catch (error) {
				logger.warn(`Discarded ${command.type} command on shutdown:`, error);
				return;
			}
		}
	}

	/**
	 * Number of commands dropped because the mailbox was full
	 */
	getDroppedCommandCount(): number {
		return this.droppedCommands;
	}

	/**
	 * Number of commands waiting for the mailbox
	 */
	getDeferredCommandCount(): number {
		return this.deferred.size;
	}
}
