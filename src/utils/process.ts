import { spawn } from "node:child_process";

export interface ProcessResult {
	code: number | null;
	stdout: string;
	stderr: string;
}

export type ProcessRunner = (
	command: string,
	args: string[],
	timeoutMs: number,
) => Promise<ProcessResult>;

/**
 * Run a command to completion and collect its output.
 * Rejects only when the process cannot be spawned or times out.
 */
export const runProcess: ProcessRunner = (command, args, timeoutMs) =>
	new Promise((resolve, reject) => {
		const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

		let stdout = "";
		let stderr = "";
		let settled = false;

		const timer = setTimeout(() => {
			if (settled) return;
			settled = true;
			proc.kill("SIGKILL");
			reject(new Error(`${command} timed out after ${timeoutMs}ms`));
		}, timeoutMs);
		timer.unref();

		proc.stdout.on("data", (data: Buffer) => {
			stdout += data.toString();
		});
		proc.stderr.on("data", (data: Buffer) => {
			stderr += data.toString();
		});

		proc.on("error", (err) => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			reject(err);
		});

		proc.on("close", (code) => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			resolve({ code, stdout, stderr });
		});
	});
