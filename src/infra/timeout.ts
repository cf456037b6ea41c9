/**
 * Timeouts for outbound HTTP calls (status polling, periodic sync).
 */

import { MAX_TIMER_DELAY_MS } from "../utils.js";

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

export type TextResponse = {
	status: number;
	body: string;
};

/**
 * Run `fn` with a signal that aborts after `timeoutMs` or when `init.signal` aborts.
 * Whatever `fn` awaits before returning is covered by the timer.
 */
async function withAbortTimeout<T>(
	init: RequestInit | undefined,
	timeoutMs: number,
	fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
	const controller = new AbortController();

	let externalAbortCleanup: (() => void) | undefined;
	const externalSignal = init?.signal;
	if (externalSignal) {
		if (externalSignal.aborted) {
			controller.abort(externalSignal.reason);
		} else {
			const onAbort = () => controller.abort(externalSignal.reason);
			externalSignal.addEventListener("abort", onAbort, { once: true });
			externalAbortCleanup = () => externalSignal.removeEventListener("abort", onAbort);
		}
	}

	const timer = setTimeout(() => {
		controller.abort(new TimeoutError(`fetch timed out after ${timeoutMs}ms`, timeoutMs));
	}, Math.min(timeoutMs, MAX_TIMER_DELAY_MS));
	timer.unref();

	const aborted = new Promise<never>((_resolve, reject) => {
		const onAbort = () => reject(controller.signal.reason);
		if (controller.signal.aborted) {
			onAbort();
		} else {
			controller.signal.addEventListener("abort", onAbort, { once: true });
		}
	});

	try {
		return await Promise.race([fn(controller.signal), aborted]);
	} catch (err) {
		// A body read cut short by the abort may surface a generic error; report the reason.
		if (controller.signal.aborted) {
			throw controller.signal.reason;
		}
		throw err;
	} finally {
		clearTimeout(timer);
		externalAbortCleanup?.();
	}
}

/**
 * fetch() and read the body as text, all within one timeout.
 *
 * The request is aborted when the timeout fires, so a hung `bw serve` socket is
 * released instead of piling up across poll attempts. A server that sends headers
 * and then stalls the body rejects with TimeoutError like one that never answers.
 * A timeout that is not a positive finite number disables the bound.
 */
export async function fetchTextWithTimeout(
	url: string | URL,
	init: RequestInit | undefined,
	timeoutMs: number,
): Promise<TextResponse> {
	const read = async (signal?: AbortSignal): Promise<TextResponse> => {
		const res = await fetch(url, signal ? { ...init, signal } : init);
		return { status: res.status, body: await res.text() };
	};
	if (timeoutMs <= 0 || !Number.isFinite(timeoutMs)) {
		return read();
	}
	return withAbortTimeout(init, timeoutMs, read);
}
