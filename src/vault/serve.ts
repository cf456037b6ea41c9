/**
 * Supervision of the long-running `bw serve` process.
 *
 * There is no restart policy: an exit the sidecar did not ask for is reported
 * through `exited` and the orchestrator treats it as fatal.
 */

import { isAbortError } from "../infra/network-errors.js";
import { getChildLogger } from "../logging.js";
import type { VaultCli } from "./cli.js";

const logger = getChildLogger({ module: "bw-serve" });

export type BackingServiceExit =
	| { stopped: true }
	| { stopped: false; code: number | null; signal: NodeJS.Signals | null }
	| { stopped: false; error: Error };

export interface BackingServiceHandle {
	port: number;
	/** Settles once the process is gone; never rejects. */
	exited: Promise<BackingServiceExit>;
	stop: () => Promise<void>;
}

export function describeExit(exit: BackingServiceExit): string {
	if (exit.stopped) return "stopped";
	if ("error" in exit) return exit.error.message;
	if (exit.signal) return `terminated by ${exit.signal}`;
	return `exit status ${exit.code}`;
}

export function startBackingService(
	cli: VaultCli,
	port: number,
	session: string,
): BackingServiceHandle {
	logger.info({ port }, "starting bw serve");

	const controller = new AbortController();

	const exited: Promise<BackingServiceExit> = cli.serve(port, session, controller.signal).then(
		(result): BackingServiceExit =>
			controller.signal.aborted
				? { stopped: true }
				: { stopped: false, code: result.code, signal: result.signal },
		(err: unknown): BackingServiceExit => {
			if (controller.signal.aborted && isAbortError(err)) {
				return { stopped: true };
			}
			return { stopped: false, error: err instanceof Error ? err : new Error(String(err)) };
		},
	);

	void exited.then((exit) => {
		if (exit.stopped) {
			logger.info({ port }, "bw serve stopped");
		} else {
			logger.error({ port, reason: describeExit(exit) }, "bw serve exited");
		}
	});

	return {
		port,
		exited,
		stop: async () => {
			controller.abort();
			await exited;
		},
	};
}
