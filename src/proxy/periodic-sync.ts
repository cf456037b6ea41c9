import { formatDuration, parseDuration } from "../config/duration.js";
import { formatErrorSafe, isTransientNetworkError } from "../infra/network-errors.js";
import { fetchTextWithTimeout } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import { MAX_TIMER_DELAY_MS } from "../utils.js";

const logger = getChildLogger({ module: "periodic-sync" });

export const DEFAULT_SYNC_INTERVAL_MS = 2 * 60_000;
export const SYNC_REQUEST_TIMEOUT_MS = 2 * 60_000;

export type PeriodicSyncHandle = {
	intervalMs: number;
	syncUrl: string;
	stop: () => void;
};

/**
 * Resolve BW_SYNC_INTERVAL. Anything unparsable, not positive, or longer than a
 * timer can hold falls back to two minutes with a warning.
 */
export function resolveSyncIntervalMs(raw: string | undefined): number {
	if (raw === undefined) return DEFAULT_SYNC_INTERVAL_MS;
	try {
		const parsed = Math.round(parseDuration(raw));
		if (parsed <= 0) {
			throw new Error(`interval must be positive, got "${raw}"`);
		}
		if (parsed > MAX_TIMER_DELAY_MS) {
			throw new Error(`interval must not exceed ${MAX_TIMER_DELAY_MS}ms, got "${raw}"`);
		}
		return parsed;
	} catch (err) {
		logger.warn(
			{ value: raw, error: String(err) },
			`invalid format for BW_SYNC_INTERVAL '${raw}', using default of 2 minutes`,
		);
		return DEFAULT_SYNC_INTERVAL_MS;
	}
}

/**
 * Trigger a sync through the sidecar's own POST /sync on a fixed interval.
 *
 * Going through the HTTP endpoint (instead of calling `bw sync` directly) keeps
 * periodic and manual syncs on one code path. Failures are logged; the loop never
 * stops on its own.
 */
export function startPeriodicSync(options: {
	host: string;
	port: number;
	interval?: string;
}): PeriodicSyncHandle {
	const intervalMs = resolveSyncIntervalMs(options.interval);
	const syncUrl = `http://${options.host}:${options.port}/sync`;
	let running = false;

	const runSync = async () => {
		if (running) {
			logger.warn({ syncUrl }, "previous periodic sync still running; skipping");
			return;
		}
		running = true;
		logger.info("periodic sync triggered");
		try {
			const res = await fetchTextWithTimeout(
				syncUrl,
				{ method: "POST", headers: { "Content-Type": "application/json" } },
				SYNC_REQUEST_TIMEOUT_MS,
			);
			if (res.status !== 200) {
				logger.warn({ status: res.status, body: res.body }, "periodic sync failed");
			}
		} catch (err) {
			logger.warn(
				{ error: formatErrorSafe(err), transient: isTransientNetworkError(err) },
				"periodic sync request failed",
			);
		} finally {
			running = false;
		}
	};

	const timer = setInterval(() => void runSync(), intervalMs);

	logger.info({ interval: formatDuration(intervalMs), syncUrl }, "periodic sync scheduled");

	return {
		intervalMs,
		syncUrl,
		stop: () => {
			clearInterval(timer);
		},
	};
}
