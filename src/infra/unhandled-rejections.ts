/**
 * Process-level unhandled rejection handler.
 *
 * - Configuration / command errors → exit(1): a bad credential will not fix itself
 * - Transient network errors → warn + continue
 * - AbortError → suppress (expected while stopping `bw serve`)
 */

import { getChildLogger } from "../logging.js";
import { formatErrorSafe, isAbortError, isTransientNetworkError } from "./network-errors.js";

const logger = getChildLogger({ module: "unhandled-rejections" });

export type RejectionCategory = "config" | "transient" | "abort" | "unknown";

const CONFIG_ERROR_NAMES = new Set(["ConfigurationError", "CommandError", "StartupError"]);

export function categorize(err: unknown): RejectionCategory {
	if (isAbortError(err)) return "abort";
	if (err instanceof Error && CONFIG_ERROR_NAMES.has(err.name)) return "config";
	if (isTransientNetworkError(err)) return "transient";
	return "unknown";
}

/**
 * Install the unhandled rejection handler. Call once at process startup.
 */
export function installUnhandledRejectionHandler(processLabel: string): void {
	process.on("unhandledRejection", (reason: unknown) => {
		const category = categorize(reason);
		const formatted = formatErrorSafe(reason);

		switch (category) {
			case "abort":
				logger.debug({ process: processLabel }, `suppressed abort rejection: ${formatted}`);
				break;

			case "transient":
				logger.warn(
					{ process: processLabel, category },
					`transient unhandled rejection (continuing): ${formatted}`,
				);
				break;

			case "config":
				logger.fatal(
					{ process: processLabel, category },
					`unhandled rejection (exiting): ${formatted}`,
				);
				console.error(`FATAL: ${formatted}`);
				process.exit(1);
				break;

			default:
				logger.error({ process: processLabel, category }, `unhandled rejection: ${formatted}`);
				break;
		}
	});

	logger.debug({ process: processLabel }, "unhandled rejection handler installed");
}
