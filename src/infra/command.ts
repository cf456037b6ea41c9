/**
 * External command execution.
 *
 * Components that shell out to `bw` receive a CommandRunner at construction time
 * rather than importing child_process themselves, so tests swap in a fake runner
 * without touching call sites.
 */

import { spawn } from "node:child_process";

import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "command" });

export type CommandResult = {
	/** Exit code, or null when the process was terminated by a signal. */
	code: number | null;
	signal: NodeJS.Signals | null;
	/** stdout and stderr interleaved in arrival order. Empty when output is inherited. */
	output: string;
};

export type RunOptions = {
	/** Variables merged over the parent environment for this child only. */
	env?: Record<string, string>;
	/** Let the child write straight to our stdout/stderr instead of capturing. */
	inheritOutput?: boolean;
	/** Aborting terminates the child with SIGTERM and rejects with an AbortError. */
	signal?: AbortSignal;
};

export type CommandRunner = (
	command: string,
	args: readonly string[],
	options?: RunOptions,
) => Promise<CommandResult>;

/**
 * Run a command to completion.
 *
 * Resolves for every exit, zero or not; callers decide what a non-zero code means.
 * Rejects only when the process could not be started or was aborted.
 */
export const runCommand: CommandRunner = (command, args, options = {}) => {
	return new Promise((resolve, reject) => {
		let settled = false;
		let output = "";

		const proc = spawn(command, [...args], {
			env: options.env ? { ...process.env, ...options.env } : process.env,
			stdio: options.inheritOutput ? ["ignore", "inherit", "inherit"] : ["ignore", "pipe", "pipe"],
			signal: options.signal,
		});

		logger.debug({ command, args: args[0], pid: proc.pid }, "spawned command");

		// Decode per stream so a multi-byte character split across chunks stays intact.
		const collect = (data: string) => {
			output += data;
		};
		proc.stdout?.setEncoding("utf8");
		proc.stderr?.setEncoding("utf8");
		proc.stdout?.on("data", collect);
		proc.stderr?.on("data", collect);

		proc.on("error", (error) => {
			if (settled) return;
			settled = true;
			reject(error);
		});

		proc.on("close", (code, signal) => {
			if (settled) return;
			settled = true;
			resolve({ code, signal, output });
		});
	});
};
