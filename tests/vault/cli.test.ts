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

import { CommandError } from "../../src/errors.js";
import { VaultCli } from "../../src/vault/cli.js";
import { createFakeRunner, failed, ok } from "../helpers/fake-runner.js";

describe("vault/cli", () => {
	it("configures a custom server", async () => {
		const { runner, calls } = createFakeRunner(() => ok());
		const cli = new VaultCli({ runCommand: runner });

		await cli.configServer("https://vault.example.test");

		expect(calls).toEqual([
			{
				command: "bw",
				args: ["config", "server", "https://vault.example.test"],
				options: { env: {} },
			},
		]);
	});

	it("passes the API key to login through the child environment only", async () => {
		const { runner, calls } = createFakeRunner(() => ok("You are logged in!"));
		const cli = new VaultCli({ runCommand: runner });

		await cli.loginWithApiKey("test-client-id", "test-secret");

		expect(calls[0].args).toEqual(["login", "--apikey"]);
		expect(calls[0].options.env).toEqual({
			BW_CLIENTID: "test-client-id",
			BW_CLIENTSECRET: "test-secret",
		});
	});

	it("unlocks with --passwordenv and returns the raw output", async () => {
		const { runner, calls } = createFakeRunner(() => ok("test-session"));
		const cli = new VaultCli({ runCommand: runner });

		await expect(cli.unlock("test-password")).resolves.toBe("test-session");
		expect(calls[0].args).toEqual(["unlock", "--passwordenv", "BW_PASSWORD", "--raw"]);
		expect(calls[0].options.env).toEqual({ BW_PASSWORD: "test-password" });
	});

	it("uses the configured binary", async () => {
		const { runner, calls } = createFakeRunner(() => ok());
		const cli = new VaultCli({ binary: "/opt/bw/bw", runCommand: runner });

		await cli.configServer("https://vault.example.test");

		expect(calls[0].command).toBe("/opt/bw/bw");
	});

	it("sends BW_SESSION to every child once a session is attached", async () => {
		const { runner, calls } = createFakeRunner(() => ok());
		const cli = new VaultCli({ runCommand: runner });
		const unlocked = cli.withSession("test-session");

		await cli.sync();
		await unlocked.sync();

		expect(calls[0].options.env).toEqual({});
		expect(calls[1].options.env).toEqual({ BW_SESSION: "test-session" });
		expect(unlocked.binary).toBe("bw");
	});

	it("returns the sync result without judging the exit code", async () => {
		const { runner } = createFakeRunner(() => failed(1, "Not logged in."));
		const cli = new VaultCli({ runCommand: runner });

		await expect(cli.sync()).resolves.toEqual({ code: 1, signal: null, output: "Not logged in." });
	});

	it("starts serve on all interfaces with the session and inherited output", async () => {
		const { runner, calls } = createFakeRunner(() => ok());
		const cli = new VaultCli({ runCommand: runner });
		const controller = new AbortController();

		await cli.serve(8088, "test-session", controller.signal);

		expect(calls[0].args).toEqual([
			"serve",
			"--hostname",
			"0.0.0.0",
			"--port",
			"8088",
			"--session",
			"test-session",
		]);
		expect(calls[0].options.env).toEqual({ BW_SESSION: "test-session" });
		expect(calls[0].options.inheritOutput).toBe(true);
		expect(calls[0].options.signal).toBe(controller.signal);
	});

	it("raises CommandError with the output on a non-zero exit", async () => {
		const { runner } = createFakeRunner(() => failed(1, "Invalid API key\n"));
		const cli = new VaultCli({ runCommand: runner });

		const err = await cli.loginWithApiKey("test-client-id", "test-secret").catch((e: unknown) => e);

		expect(err).toBeInstanceOf(CommandError);
		expect(err).toMatchObject({
			command: "bw login",
			exitCode: 1,
			output: "Invalid API key\n",
			message: "bw login failed: Invalid API key - exit status 1",
		});
	});

	it("raises CommandError when the binary cannot be started", async () => {
		const { runner } = createFakeRunner(() => {
			throw new Error("spawn bw ENOENT");
		});
		const cli = new VaultCli({ runCommand: runner });

		await expect(cli.unlock("test-password")).rejects.toMatchObject({
			name: "CommandError",
			exitCode: null,
			message: "bw unlock failed: spawn bw ENOENT - did not exit normally",
		});
	});
});
