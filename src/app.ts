import type { Channel } from "./channels";
import { Footer, Header, ListView } from "./components";
import { getColorScheme, KEY_POLL_TIMEOUT_MS } from "./config";
import type { IInputHandler } from "./interfaces";
import type { StateManager } from "./state/StateManager";
import type { ColorScheme, LayoutDimensions, Message } from "./types";
import type { ITerminal } from "./ui/NodeTerminal";
import { Screen } from "./ui/Screen";
import { calculateLayout, getLogger } from "./utils";

const logger = getLogger("App");

export interface AppOptions {
	pollTimeoutMs?: number;
	colors?: ColorScheme;
	now?: () => number;
}

/**
 * Presentation loop
 *
 * Layout:
 * +---------------------------------------------+
 * | ▶ title - 00:01:05 / 00:03:20               |
 * |─────────────────────────────────────────────|
 * | 1. first entry                              |
 * | 2. second entry                             |
 * | Page: 1/3                                   |
 * |─────────────────────────────────────────────|
 * | [/] Search  [x] Remove  [Enter] Play ...    |
 * +---------------------------------------------+
 *
 * Each turn renders the state, waits briefly for one key, applies every
 * message the backend has queued, then retries commands held back while the
 * backend was busy.
 */
export class App {
	private layout: LayoutDimensions;
	private header: Header;
	private list: ListView;
	private footer: Footer;
	private readonly pollTimeoutMs: number;
	private readonly now: () => number;

	constructor(
		private readonly stateManager: StateManager,
		private readonly inputHandler: IInputHandler,
		private readonly messages: Channel<Message>,
		private readonly terminal: ITerminal,
		options: AppOptions = {},
	) {
		this.pollTimeoutMs = options.pollTimeoutMs ?? KEY_POLL_TIMEOUT_MS;
		this.now = options.now ?? Date.now;

		const colors = options.colors ?? getColorScheme();
		const { width, height } = terminal.size();
		this.layout = calculateLayout(width, height);
		this.header = new Header(this.layout, colors);
		this.list = new ListView(this.layout, colors);
		this.footer = new Footer(this.layout, colors);
	}

	/**
	 * Run until the state machine stops. The terminal is restored however the
	 * loop ends.
	 */
	async run(): Promise<void> {
		this.terminal.enter();
		this.handleResize();
		try {
			while (this.stateManager.getState().running) {
				this.render();
				const key = await this.terminal.pollKey(this.pollTimeoutMs);
				if (key) {
					this.inputHandler.handleKeyPress(key);
				}
				this.drainMessages();
				this.stateManager.flushDeferred();
			}
		} finally {
			this.terminal.restore();
		}
		logger.info(
			`Presentation loop stopped (${this.stateManager.getDroppedCommandCount()} commands dropped, ` +
				`${this.stateManager.getDeferredCommandCount()} held)`,
		);
	}

	/**
	 * Re-read the terminal size and re-page the list to fit
	 */
	handleResize(): void {
		const { width, height } = this.terminal.size();
		this.layout = calculateLayout(width, height);
		this.header.updateLayout(this.layout);
		this.list.updateLayout(this.layout);
		this.footer.updateLayout(this.layout);
		this.stateManager.dispatch({ type: "Resize", rows: this.layout.termHeight });
	}

	render(): Screen {
		const state = this.stateManager.getState();
		const screen = new Screen(this.layout.termWidth, this.layout.termHeight);

		this.header.render(screen, state, this.now());
		this.list.render(screen, state);
		this.footer.render(screen, state);

		this.terminal.write(screen.toAnsi());
		return screen;
	}

	/**
	 * Apply every queued backend message, oldest first
	 */
	private drainMessages(): void {
		let message = this.messages.tryRecv();
		while (message !== undefined) {
			this.stateManager.dispatch(message);
			message = this.messages.tryRecv();
		}
	}
}
