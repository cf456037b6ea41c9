/**
 * Startup sequence of the sidecar.
 *
 * login/unlock → bw serve → wait for "unlocked" → proxy server → periodic sync
 *
 * Each step starts only after the previous one succeeded; the proxy server does
 * not exist before readiness is confirmed, so no request can reach a locked vault.
 */

import type http from "node:http";

import type { SidecarConfig } from "./config/config.js";
import { type CommandRunner, runCommand } from "./infra/command.js";
import { getChildLogger } from "./logging.js";
import { type PeriodicSyncHandle, startPeriodicSync } from "./proxy/periodic-sync.js";
import { startProxyServer } from "./proxy/server.js";
import { defaultRuntime, type RuntimeEnv } from "./runtime.js";
import { loginAndGetSession } from "./vault/auth.js";
import { VaultCli } from "./vault/cli.js";
import { resolveRetryPolicy, waitForReady } from "./vault/readiness.js";
import { type BackingServiceHandle, describeExit, startBackingService } from "./vault/serve.js";
import { createSyncRunner } from "./vault/sync.js";

const logger = getChildLogger({ module: "sidecar" });

export type SidecarStage = "login" | "serve" | "readiness" | "proxy";

export class StartupError extends Error {
	constructor(
		public readonly stage: SidecarStage,
		cause: unknown,
	) {
		super(cause instanceof Error ? cause.message : String(cause), { cause });
		this.name = "StartupError";
	}
}

export type SidecarDeps = {
	runCommand?: CommandRunner;
	runtime?: RuntimeEnv;
};

export interface SidecarHandle {
	server: http.Server;
	backing: BackingServiceHandle;
	scheduler: PeriodicSyncHandle | null;
	stop: () => Promise<void>;
}

const STAGE_MESSAGES: Record<SidecarStage, string> = {
	login: "Bitwarden login failed",
	serve: "'bw serve' process failed",
	readiness: "Bitwarden serve API failed to initialize",
	proxy: "Proxy server failed",
};

/**
 * The line printed on stderr before a fatal exit.
 */
export function formatFatal(err: unknown): string {
	if (err instanceof StartupError) {
		return `FATAL: ${STAGE_MESSAGES[err.stage]}: ${err.message}`;
	}
	return `FATAL: ${err instanceof Error ? err.message : String(err)}`;
}

async function stage<T>(name: SidecarStage, fn: () => Promise<T>): Promise<T> {
	try {
		return await fn();
	} catch (err) {
		throw new StartupError(name, err);
	}
}

export async function startSidecar(
	config: SidecarConfig,
	deps: SidecarDeps = {},
): Promise<SidecarHandle> {
	const runtime = deps.runtime ?? defaultRuntime;
	const baseCli = new VaultCli({
		binary: config.cliPath,
		runCommand: deps.runCommand ?? runCommand,
	});

	const session = await stage("login", () => loginAndGetSession(config, baseCli));
	const cli = baseCli.withSession(session);

	const backing = startBackingService(cli, config.serve.port, session);
	let stopping = false;

	// Any exit we did not ask for ends the sidecar, during startup or later.
	void backing.exited.then((exit) => {
		if (exit.stopped || stopping) return;
		const message = formatFatal(new StartupError("serve", new Error(describeExit(exit))));
		logger.fatal({ reason: describeExit(exit) }, "bw serve exited unexpectedly");
		runtime.error(message);
		runtime.exit(1);
	});

	try {
		const policy = resolveRetryPolicy({
			retries: config.serve.waitRetries,
			interval: config.serve.waitInterval,
		});
		await stage("readiness", () => waitForReady(config.serve.port, policy));
		runtime.log("Bitwarden serve API is ready and unlocked. Authentication successful.");

		const server = await stage("proxy", () =>
			startProxyServer({
				port: config.proxy.port,
				targetPort: config.serve.port,
				syncRunner: createSyncRunner(cli),
			}),
		);

		let scheduler: PeriodicSyncHandle | null = null;
		if (config.sync.enabled) {
			scheduler = startPeriodicSync({
				host: config.proxy.host,
				port: config.proxy.port,
				interval: config.sync.interval,
			});
		} else {
			logger.info("automatic sync is disabled");
			runtime.log("Automatic sync is disabled.");
		}

		return {
			server,
			backing,
			scheduler,
			stop: async () => {
				stopping = true;
				scheduler?.stop();
				await new Promise<void>((resolve) => {
					server.close(() => resolve());
					server.closeAllConnections();
				});
				await backing.stop();
				logger.info("sidecar stopped");
			},
		};
	} catch (err) {
		stopping = true;
		await backing.stop();
		throw err;
	}
}
