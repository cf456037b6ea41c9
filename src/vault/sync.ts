import { getChildLogger } from "../logging.js";
import type { VaultCli } from "./cli.js";

const logger = getChildLogger({ module: "vault-sync" });

export type SyncOutcome =
	| { ok: true; output: string }
	| { ok: false; exitCode: number | null; output: string };

export interface SyncRunner {
	/**
	 * Run `bw sync`. A call made while a sync is already running joins it and
	 * receives that run's outcome instead of starting a second `bw sync`.
	 */
	run: () => Promise<SyncOutcome>;
	inFlight: () => boolean;
}

export function createSyncRunner(cli: VaultCli): SyncRunner {
	let current: Promise<SyncOutcome> | null = null;

	const execute = async (): Promise<SyncOutcome> => {
		logger.info("executing bw sync");
		try {
			const result = await cli.sync();
			if (result.code === 0) {
				logger.info("sync successful");
				return { ok: true, output: result.output };
			}
			logger.warn({ code: result.code, signal: result.signal, output: result.output }, "sync failed");
			return { ok: false, exitCode: result.code, output: result.output };
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			logger.error({ error: message }, "sync could not be started");
			return { ok: false, exitCode: null, output: message };
		}
	};

	return {
		run: () => {
			if (current) {
				logger.debug("sync already in progress; joining it");
				return current;
			}
			const run = execute().finally(() => {
				current = null;
			});
			current = run;
			return run;
		},
		inFlight: () => current !== null,
	};
}
