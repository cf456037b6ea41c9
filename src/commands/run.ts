/**
 * Default command: bring up the sidecar and keep it running.
 *
 * Usage:
 *   bw-serve-sidecar [run]
 */

import type { Command } from "commander";

import { loadConfig } from "../config/config.js";
import { installUnhandledRejectionHandler } from "../infra/unhandled-rejections.js";
import { getChildLogger } from "../logging.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { formatFatal, type SidecarHandle, startSidecar } from "../sidecar.js";

const logger = getChildLogger({ module: "cmd-run" });

export async function runSidecar(
	runtime: RuntimeEnv = defaultRuntime,
): Promise<SidecarHandle | null> {
	let handle: SidecarHandle;
	try {
		const config = loadConfig();
		logger.info(
			{
				servePort: config.serve.port,
				proxyPort: config.proxy.port,
				customServer: Boolean(config.serverHost),
				periodicSync: config.sync.enabled,
			},
			"starting sidecar",
		);
		handle = await startSidecar(config, { runtime });
	} catch (err) {
		logger.fatal({ error: String(err) }, "sidecar failed to start");
		runtime.error(formatFatal(err));
		runtime.exit(1);
		return null;
	}

	const shutdown = async (signal: string) => {
		logger.info({ signal }, "received shutdown signal");
		try {
			await handle.stop();
			runtime.exit(0);
		} catch (err) {
			logger.error({ error: String(err) }, "shutdown failed");
			runtime.exit(1);
		}
	};
	process.once("SIGINT", () => void shutdown("SIGINT"));
	process.once("SIGTERM", () => void shutdown("SIGTERM"));

	return handle;
}

export function registerRunCommand(program: Command): void {
	program
		.command("run", { isDefault: true })
		.description("Log in, unlock, start bw serve and the proxy (default)")
		.action(async () => {
			installUnhandledRejectionHandler("sidecar");
			await runSidecar();
			// The HTTP server and the bw serve child keep the event loop alive from here on.
		});
}
