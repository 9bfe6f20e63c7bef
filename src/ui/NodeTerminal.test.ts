import { PassThrough, Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { ESCAPE_SEQUENCES } from "../utils/terminal";
import { NodeTerminal, toKeyEvent } from "./NodeTerminal";

describe("toKeyEvent", () => {
	it("keeps named keys", () => {
		expect(toKeyEvent("\r", { name: "return", sequence: "\r", ctrl: false, meta: false, shift: false })).toEqual({
			name: "return",
			ctrl: false,
			shift: false,
			meta: false,
			sequence: "\r",
		});
	});

	it("names punctuation after the typed character", () => {
		expect(toKeyEvent("/", { sequence: "/" })).toMatchObject({ name: "/", sequence: "/" });
		expect(toKeyEvent(">", undefined)).toMatchObject({ name: ">", ctrl: false });
	});

	it("ignores events with nothing to name them by", () => {
		expect(toKeyEvent(undefined, { sequence: "" })).toBeNull();
	});
});

function setup() {
	const input = new PassThrough();
	let written = "";
	const output = new Writable({
		write(chunk: Buffer, _encoding, callback) {
			written += chunk.toString();
			callback();
		},
	});
	const terminal = new NodeTerminal(input, output);
	return { input, terminal, written: () => written };
}

describe("NodeTerminal", () => {
	it("switches to the alternate screen and back", () => {
		const { terminal, written } = setup();

		terminal.enter();
		expect(written()).toContain(ESCAPE_SEQUENCES.ALT_SCREEN_ON);

		terminal.restore();
		expect(written()).toContain(ESCAPE_SEQUENCES.ALT_SCREEN_OFF);
	});

	it("hands over keys pressed before the poll", async () => {
		const { input, terminal } = setup();
		terminal.enter();

		input.emit("keypress", "j", { name: "j", sequence: "j" });

		await expect(terminal.pollKey(50)).resolves.toMatchObject({ name: "j" });
		terminal.restore();
	});

	it("hands over a key pressed while polling", async () => {
		const { input, terminal } = setup();
		terminal.enter();

		const poll = terminal.pollKey(1_000);
		input.emit("keypress", "q", { name: "q", sequence: "q" });

		await expect(poll).resolves.toMatchObject({ name: "q" });
		terminal.restore();
	});

	it("returns null when no key arrives in time", async () => {
		const { terminal } = setup();
		terminal.enter();

		await expect(terminal.pollKey(5)).resolves.toBeNull();
		terminal.restore();
	});

	it("ends a pending poll on restore", async () => {
		const { terminal } = setup();
		terminal.enter();

		const poll = terminal.pollKey(1_000);
		terminal.restore();

		await expect(poll).resolves.toBeNull();
	});
});
