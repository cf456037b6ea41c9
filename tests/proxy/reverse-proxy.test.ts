import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
	}),
}));

import { stripHopByHop } from "../../src/proxy/reverse-proxy.js";

describe("proxy/reverse-proxy stripHopByHop", () => {
	it("drops connection-scoped headers and keeps the rest", () => {
		expect(
			stripHopByHop({
				host: "vault.internal",
				connection: "keep-alive",
				"keep-alive": "timeout=5",
				"transfer-encoding": "chunked",
				upgrade: "websocket",
				"content-type": "application/json",
				"set-cookie": ["a=1", "b=2"],
			}),
		).toEqual({
			host: "vault.internal",
			"content-type": "application/json",
			"set-cookie": ["a=1", "b=2"],
		});
	});

	it("drops headers named in the Connection header", () => {
		expect(
			stripHopByHop({
				connection: "close, X-Trace-Hop",
				"x-trace-hop": "1",
				"x-request-id": "req-1",
			}),
		).toEqual({ "x-request-id": "req-1" });
	});
});
