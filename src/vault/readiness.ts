/**
 * Readiness polling for `bw serve`.
 *
 * `bw serve` accepts connections before the vault is usable, so "port open" is not
 * enough: the status payload has to say "unlocked". Different CLI versions put the
 * status in different places, and the payload is not ours to trust, so the check
 * accepts three known shapes and treats everything else as locked.
 */

import { z } from "zod";

import { parseDuration } from "../config/duration.js";
import { formatErrorSafe, isTransientNetworkError } from "../infra/network-errors.js";
import { fetchTextWithTimeout, type TextResponse, TimeoutError } from "../infra/timeout.js";
import { getChildLogger } from "../logging.js";
import { MAX_TIMER_DELAY_MS, sleep } from "../utils.js";

const logger = getChildLogger({ module: "readiness" });

export const STATUS_TIMEOUT_MS = 2000;
export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxAttempts: 30, intervalMs: 1000 };

export type RetryPolicy = {
	maxAttempts: number;
	intervalMs: number;
};

const Unlocked = z.literal("unlocked");

// z.object rejects arrays, primitives and null, so a wrong-typed node fails the
// match instead of throwing.
const UNLOCKED_SHAPES = [
	z.object({ data: z.object({ template: z.object({ status: Unlocked }) }) }),
	z.object({ data: z.object({ status: Unlocked }) }),
	z.object({ status: Unlocked }),
] as const;

/**
 * True when the payload reports an unlocked vault at `data.template.status`,
 * `data.status` or top-level `status`. Never throws.
 */
export function isUnlocked(payload: unknown): boolean {
	return UNLOCKED_SHAPES.some((shape) => shape.safeParse(payload).success);
}

class NotReadyError extends Error {
	constructor(reason: string, options?: { cause?: unknown }) {
		super(reason, options);
		this.name = "NotReadyError";
	}
}

async function checkStatus(statusUrl: string): Promise<void> {
	let res: TextResponse;
	try {
		res = await fetchTextWithTimeout(statusUrl, { method: "GET" }, STATUS_TIMEOUT_MS);
	} catch (err) {
		throw new NotReadyError("status request failed", { cause: err });
	}

	if (res.status !== 200) {
		throw new NotReadyError(`status returned ${res.status}`);
	}

	let payload: unknown;
	try {
		payload = JSON.parse(res.body);
	} catch {
		throw new NotReadyError("status body is not JSON");
	}

	if (!isUnlocked(payload)) {
		throw new NotReadyError("vault not unlocked yet");
	}
}

/**
 * Block until `bw serve` on `port` reports unlocked.
 *
 * Every failure (connection refused, timeout, non-200, bad JSON, locked) spends one
 * attempt; there is no separate error budget. Rejects with TimeoutError once
 * `policy.maxAttempts` attempts have failed.
 */
export async function waitForReady(
	port: number,
	policy: RetryPolicy = DEFAULT_RETRY_POLICY,
	host = "127.0.0.1",
): Promise<void> {
	const statusUrl = `http://${host}:${port}/status`;
	logger.info(
		{ statusUrl, maxAttempts: policy.maxAttempts, intervalMs: policy.intervalMs },
		"waiting for bw serve to become ready and unlocked",
	);

	for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
		try {
			await checkStatus(statusUrl);
			logger.info({ statusUrl, attempt }, "bw serve is ready and unlocked");
			return;
		} catch (err) {
			logger.debug(
				{
					attempt,
					maxAttempts: policy.maxAttempts,
					transient: isTransientNetworkError(err),
					reason: formatErrorSafe(err),
				},
				"bw serve not ready",
			);
		}
		if (attempt < policy.maxAttempts && policy.intervalMs > 0) {
			await sleep(policy.intervalMs);
		}
	}

	logger.error({ statusUrl, attempts: policy.maxAttempts }, "bw serve did not become ready");
	throw new TimeoutError(
		"timeout waiting for bw serve to become unlocked",
		policy.maxAttempts * policy.intervalMs,
	);
}

/**
 * Resolve the poll policy from raw BW_SERVE_WAIT_RETRIES / BW_SERVE_WAIT_INTERVAL.
 * Malformed values are logged and replaced by the defaults.
 */
export function resolveRetryPolicy(raw: { retries?: string; interval?: string }): RetryPolicy {
	let maxAttempts = DEFAULT_RETRY_POLICY.maxAttempts;
	if (raw.retries !== undefined) {
		const parsed = Number(raw.retries);
		if (Number.isInteger(parsed) && parsed > 0) {
			maxAttempts = parsed;
		} else {
			logger.warn(
				{ value: raw.retries, fallback: maxAttempts },
				"invalid BW_SERVE_WAIT_RETRIES, using default",
			);
		}
	}

	let intervalMs = DEFAULT_RETRY_POLICY.intervalMs;
	if (raw.interval !== undefined) {
		try {
			const parsed = parseDuration(raw.interval);
			if (parsed < 0) {
				throw new Error(`negative duration "${raw.interval}"`);
			}
			if (parsed > MAX_TIMER_DELAY_MS) {
				throw new Error(`duration "${raw.interval}" exceeds ${MAX_TIMER_DELAY_MS}ms`);
			}
			intervalMs = Math.round(parsed);
		} catch (err) {
			logger.warn(
				{ value: raw.interval, fallbackMs: intervalMs, error: String(err) },
				"invalid BW_SERVE_WAIT_INTERVAL, using default",
			);
		}
	}

	return { maxAttempts, intervalMs };
}
