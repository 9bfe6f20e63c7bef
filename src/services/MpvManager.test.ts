import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { FatalStartupError } from "../errors";
import { buildMpvArgs, MpvManager } from "./MpvManager";

describe("buildMpvArgs", () => {
	it("starts an idle, audio-only mpv listening on the socket", () => {
		expect(buildMpvArgs("/tmp/test.sock")).toEqual([
			"--input-ipc-server=/tmp/test.sock",
			"--no-terminal",
			"--no-video",
			"--idle",
		]);
	});

	it("appends extra arguments last", () => {
		expect(buildMpvArgs("/tmp/test.sock", ["--volume=50"]).at(-1)).toBe("--volume=50");
	});
});

describe("MpvManager", () => {
	it("fails startup when the binary cannot be spawned", async () => {
		const manager = new MpvManager({
			binaryPath: "/nonexistent/tubeplay-test-mpv",
			socketPath: join(tmpdir(), `tubeplay-test-${process.pid}.sock`),
			startupTimeout: 2000,
		});

		expect(manager.isInstalled()).toBe(false);
		await expect(manager.start()).rejects.toBeInstanceOf(FatalStartupError);
		expect(manager.isRunning()).toBe(false);
	});
});
