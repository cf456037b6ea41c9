/**
 * Query bw serve's /status once. Exit code 0 only when the vault is unlocked,
 * which makes this usable as a container health check.
 *
 * Usage:
 *   bw-serve-sidecar status [--port <port>] [--json]
 */

import type { Command } from "commander";

import { loadConfig } from "../config/config.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { fetchTextWithTimeout, type TextResponse } from "../infra/timeout.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { isUnlocked, STATUS_TIMEOUT_MS } from "../vault/readiness.js";

export type VaultState = "unlocked" | "locked" | "unreachable";

export type StatusCommandOptions = {
	port?: string;
	json?: boolean;
};

export async function queryVaultState(port: number, host = "127.0.0.1"): Promise<VaultState> {
	let res: TextResponse;
	try {
		res = await fetchTextWithTimeout(
			`http://${host}:${port}/status`,
			undefined,
			STATUS_TIMEOUT_MS,
		);
	} catch {
		return "unreachable";
	}
	if (res.status !== 200) {
		return "locked";
	}
	try {
		const payload: unknown = JSON.parse(res.body);
		return isUnlocked(payload) ? "unlocked" : "locked";
	} catch {
		return "locked";
	}
}

export async function reportStatus(
	opts: StatusCommandOptions,
	runtime: RuntimeEnv = defaultRuntime,
): Promise<number> {
	let port: number;
	if (opts.port !== undefined) {
		port = Number(opts.port);
		if (!Number.isInteger(port) || port < 1 || port > 65535) {
			runtime.error(`Error: invalid port "${opts.port}"`);
			return 1;
		}
	} else {
		try {
			port = loadConfig().serve.port;
		} catch (err) {
			runtime.error(`Error: ${formatErrorSafe(err)}`);
			return 1;
		}
	}

	const state = await queryVaultState(port);
	runtime.log(opts.json ? JSON.stringify({ port, state }) : state);
	return state === "unlocked" ? 0 : 1;
}

export function registerStatusCommand(program: Command): void {
	program
		.command("status")
		.description("Check whether bw serve reports an unlocked vault")
		.option("--port <port>", "bw serve port (default: $BW_SERVE_PORT or 8088)")
		.option("--json", "Output as JSON")
		.action(async (opts: StatusCommandOptions) => {
			process.exitCode = await reportStatus(opts);
		});
}
