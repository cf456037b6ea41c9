import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const logger = vi.hoisted(() => ({
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
	debug: vi.fn(),
	fatal: vi.fn(),
}));

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => logger,
}));

import {
	DEFAULT_SYNC_INTERVAL_MS,
	resolveSyncIntervalMs,
	startPeriodicSync,
} from "../../src/proxy/periodic-sync.js";

beforeEach(() => {
	vi.clearAllMocks();
});

describe("proxy/periodic-sync resolveSyncIntervalMs", () => {
	it("defaults to two minutes", () => {
		expect(resolveSyncIntervalMs(undefined)).toBe(120_000);
		expect(DEFAULT_SYNC_INTERVAL_MS).toBe(120_000);
	});

	it("parses durations", () => {
		expect(resolveSyncIntervalMs("30s")).toBe(30_000);
		expect(resolveSyncIntervalMs("1m30s")).toBe(90_000);
		expect(resolveSyncIntervalMs("1h")).toBe(3_600_000);
	});

	it("warns and falls back for a value that is not a duration", () => {
		expect(resolveSyncIntervalMs("5 minutes")).toBe(120_000);
		expect(logger.warn).toHaveBeenCalledWith(
			expect.objectContaining({ value: "5 minutes" }),
			"invalid format for BW_SYNC_INTERVAL '5 minutes', using default of 2 minutes",
		);
	});

	it.each(["720h", "600h", "596h31m24s"])("falls back for %j, which no timer can hold", (raw) => {
		expect(resolveSyncIntervalMs(raw)).toBe(120_000);
		expect(logger.warn).toHaveBeenCalledWith(
			expect.objectContaining({ value: raw }),
			`invalid format for BW_SYNC_INTERVAL '${raw}', using default of 2 minutes`,
		);
	});

	it("accepts the longest interval a timer can hold", () => {
		expect(resolveSyncIntervalMs("596h31m23s")).toBe(2_147_483_000);
		expect(logger.warn).not.toHaveBeenCalled();
	});

	it.each(["0", "0s", "-1m"])("falls back for the non-positive interval %j", (raw) => {
		expect(resolveSyncIntervalMs(raw)).toBe(120_000);
		expect(logger.warn).toHaveBeenCalledTimes(1);
	});
});

describe("proxy/periodic-sync startPeriodicSync", () => {
	beforeEach(() => {
		vi.useFakeTimers();
	});

	afterEach(() => {
		vi.useRealTimers();
		vi.unstubAllGlobals();
	});

	it("posts to the sidecar's own /sync once per interval, first after one interval", async () => {
		const fetchMock = vi.fn(async () => new Response("Sync successful", { status: 200 }));
		vi.stubGlobal("fetch", fetchMock);

		const handle = startPeriodicSync({ host: "localhost", port: 8087, interval: "30s" });
		expect(handle.intervalMs).toBe(30_000);
		expect(handle.syncUrl).toBe("http://localhost:8087/sync");

		await vi.advanceTimersByTimeAsync(29_999);
		expect(fetchMock).not.toHaveBeenCalled();

		await vi.advanceTimersByTimeAsync(1);
		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(fetchMock).toHaveBeenCalledWith(
			"http://localhost:8087/sync",
			expect.objectContaining({
				method: "POST",
				headers: { "Content-Type": "application/json" },
			}),
		);

		await vi.advanceTimersByTimeAsync(30_000);
		expect(fetchMock).toHaveBeenCalledTimes(2);

		handle.stop();
		await vi.advanceTimersByTimeAsync(90_000);
		expect(fetchMock).toHaveBeenCalledTimes(2);
	});

	it("does not fire back to back for an interval too long for a timer", async () => {
		const fetchMock = vi.fn(async () => new Response("Sync successful", { status: 200 }));
		vi.stubGlobal("fetch", fetchMock);

		const handle = startPeriodicSync({ host: "localhost", port: 8087, interval: "720h" });
		expect(handle.intervalMs).toBe(120_000);

		await vi.advanceTimersByTimeAsync(119_999);
		expect(fetchMock).not.toHaveBeenCalled();

		await vi.advanceTimersByTimeAsync(1);
		expect(fetchMock).toHaveBeenCalledTimes(1);

		handle.stop();
	});

	it("logs a failed sync and keeps going", async () => {
		const fetchMock = vi
			.fn()
			.mockResolvedValueOnce(new Response("Sync failed: Not logged in.", { status: 500 }))
			.mockRejectedValueOnce(new TypeError("fetch failed"))
			.mockResolvedValue(new Response("Sync successful", { status: 200 }));
		vi.stubGlobal("fetch", fetchMock);

		const handle = startPeriodicSync({ host: "localhost", port: 8087, interval: "10s" });

		await vi.advanceTimersByTimeAsync(10_000);
		await vi.waitFor(() =>
			expect(logger.warn).toHaveBeenCalledWith(
				{ status: 500, body: "Sync failed: Not logged in." },
				"periodic sync failed",
			),
		);

		await vi.advanceTimersByTimeAsync(10_000);
		await vi.waitFor(() =>
			expect(logger.warn).toHaveBeenCalledWith(
				expect.objectContaining({ transient: true }),
				"periodic sync request failed",
			),
		);

		await vi.advanceTimersByTimeAsync(10_000);
		expect(fetchMock).toHaveBeenCalledTimes(3);
		expect(logger.warn).toHaveBeenCalledTimes(2);

		handle.stop();
	});

	it("skips a tick while the previous sync is still running", async () => {
		const fetchMock = vi.fn(() => new Promise<Response>(() => {}));
		vi.stubGlobal("fetch", fetchMock);

		const handle = startPeriodicSync({ host: "localhost", port: 8087, interval: "10s" });

		await vi.advanceTimersByTimeAsync(20_000);

		expect(fetchMock).toHaveBeenCalledTimes(1);
		expect(logger.warn).toHaveBeenCalledWith(
			{ syncUrl: "http://localhost:8087/sync" },
			"previous periodic sync still running; skipping",
		);

		handle.stop();
	});
});
