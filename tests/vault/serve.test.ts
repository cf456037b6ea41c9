import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logging.js", () => ({
	getChildLogger: () => ({
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		debug: vi.fn(),
		fatal: vi.fn(),
	}),
}));

import type { CommandResult } from "../../src/infra/command.js";
import { VaultCli } from "../../src/vault/cli.js";
import { describeExit, startBackingService } from "../../src/vault/serve.js";
import { createFakeRunner, deferred, runUntilAborted } from "../helpers/fake-runner.js";

describe("vault/serve startBackingService", () => {
	it("launches bw serve with the session and reports a requested stop", async () => {
		const { runner, calls } = createFakeRunner((call) => runUntilAborted(call.options.signal));
		const cli = new VaultCli({ runCommand: runner }).withSession("test-session");

		const handle = startBackingService(cli, 8088, "test-session");
		expect(handle.port).toBe(8088);
		expect(calls[0].args).toEqual([
			"serve",
			"--hostname",
			"0.0.0.0",
			"--port",
			"8088",
			"--session",
			"test-session",
		]);

		await handle.stop();

		await expect(handle.exited).resolves.toEqual({ stopped: true });
		expect(calls[0].options.signal?.aborted).toBe(true);
	});

	it("counts an exit after stop as stopped even when the child reports a signal", async () => {
		const { runner } = createFakeRunner(
			(call) =>
				new Promise<CommandResult>((resolve) => {
					call.options.signal?.addEventListener("abort", () =>
						resolve({ code: null, signal: "SIGTERM", output: "" }),
					);
				}),
		);
		const cli = new VaultCli({ runCommand: runner });

		const handle = startBackingService(cli, 8088, "test-session");
		await handle.stop();

		await expect(handle.exited).resolves.toEqual({ stopped: true });
	});

	it("reports an exit nobody asked for", async () => {
		const exit = deferred<CommandResult>();
		const { runner } = createFakeRunner(() => exit.promise);
		const cli = new VaultCli({ runCommand: runner });

		const handle = startBackingService(cli, 8088, "test-session");
		exit.resolve({ code: 1, signal: null, output: "" });

		const result = await handle.exited;
		expect(result).toEqual({ stopped: false, code: 1, signal: null });
		expect(describeExit(result)).toBe("exit status 1");
	});

	it("reports a spawn failure through exited instead of rejecting", async () => {
		const { runner } = createFakeRunner(() => {
			throw new Error("spawn bw ENOENT");
		});
		const cli = new VaultCli({ runCommand: runner });

		const handle = startBackingService(cli, 8088, "test-session");
		const result = await handle.exited;

		expect(result.stopped).toBe(false);
		expect(describeExit(result)).toBe("spawn bw ENOENT");
	});
});

describe("vault/serve describeExit", () => {
	it("describes each kind of exit", () => {
		expect(describeExit({ stopped: true })).toBe("stopped");
		expect(describeExit({ stopped: false, code: null, signal: "SIGKILL" })).toBe(
			"terminated by SIGKILL",
		);
		expect(describeExit({ stopped: false, code: 0, signal: null })).toBe("exit status 0");
		expect(describeExit({ stopped: false, error: new Error("spawn EACCES") })).toBe("spawn EACCES");
	});
});
