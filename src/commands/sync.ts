/**
 * Ask a running sidecar to sync now.
 *
 * Usage:
 *   bw-serve-sidecar sync [--url <url>] [--timeout <duration>]
 */

import type { Command } from "commander";

import { loadConfig } from "../config/config.js";
import { parseDuration } from "../config/duration.js";
import { formatErrorSafe } from "../infra/network-errors.js";
import { fetchTextWithTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import { SYNC_REQUEST_TIMEOUT_MS } from "../proxy/periodic-sync.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";

const logger = getChildLogger({ module: "cmd-sync" });

export type SyncCommandOptions = {
	url?: string;
	timeout?: string;
};

export function defaultSyncUrl(): string {
	const config = loadConfig();
	return `http://${config.proxy.host}:${config.proxy.port}/sync`;
}

/**
 * POST to /sync and report the result. Returns the process exit code.
 */
export async function triggerSync(
	opts: SyncCommandOptions,
	runtime: RuntimeEnv = defaultRuntime,
): Promise<number> {
	const url = opts.url ?? defaultSyncUrl();
	let timeoutMs = SYNC_REQUEST_TIMEOUT_MS;
	if (opts.timeout !== undefined) {
		try {
			timeoutMs = parseDuration(opts.timeout);
		} catch (err) {
			runtime.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
			return 1;
		}
	}

	try {
		const { status, body } = await fetchTextWithTimeout(url, { method: "POST" }, timeoutMs);
		logger.debug({ url, status }, "sync request completed");
		if (status === 200) {
			runtime.log(body);
			return 0;
		}
		runtime.error(`Sync failed with status code ${status}: ${body}`);
		return 1;
	} catch (err) {
		runtime.error(`Sync request failed: ${formatErrorSafe(err)}`);
		return 1;
	}
}

export function registerSyncCommand(program: Command): void {
	program
		.command("sync")
		.description("Trigger bw sync through a running sidecar's /sync endpoint")
		.option("--url <url>", "Sync endpoint (default: http://$BW_PROXY_HOST:$BW_PROXY_PORT/sync)")
		.option("--timeout <duration>", "Request timeout, e.g. 30s or 2m")
		.action(async (opts: SyncCommandOptions) => {
			process.exitCode = await triggerSync(opts);
		});
}
