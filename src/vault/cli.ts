/**
 * Thin wrapper over the Bitwarden CLI's argument grammar.
 *
 * The session token is a value carried by the wrapper, not process state:
 * `withSession()` returns a wrapper whose children all receive BW_SESSION.
 */

import { CommandError } from "../errors.js";
import type { CommandResult, CommandRunner } from "../infra/command.js";
import { getChildLogger } from "../logging.js";

const logger = getChildLogger({ module: "vault-cli" });

export type VaultCliOptions = {
	/** Binary to invoke. Default: "bw". */
	binary?: string;
	runCommand: CommandRunner;
	session?: string;
};

export class VaultCli {
	readonly binary: string;
	private readonly run: CommandRunner;
	private readonly session: string | undefined;

	constructor(options: VaultCliOptions) {
		this.binary = options.binary ?? "bw";
		this.run = options.runCommand;
		this.session = options.session;
	}

	withSession(session: string): VaultCli {
		return new VaultCli({ binary: this.binary, runCommand: this.run, session });
	}

	/** `bw config server <host>` */
	async configServer(host: string): Promise<void> {
		await this.runChecked("config server", ["config", "server", host]);
	}

	/** `bw login --apikey`; the CLI reads the key from BW_CLIENTID / BW_CLIENTSECRET. */
	async loginWithApiKey(clientId: string, clientSecret: string): Promise<void> {
		await this.runChecked("login", ["login", "--apikey"], {
			BW_CLIENTID: clientId,
			BW_CLIENTSECRET: clientSecret,
		});
	}

	/** `bw unlock --passwordenv BW_PASSWORD --raw`; returns stdout (the session key). */
	async unlock(password: string): Promise<string> {
		const result = await this.runChecked(
			"unlock",
			["unlock", "--passwordenv", "BW_PASSWORD", "--raw"],
			{ BW_PASSWORD: password },
		);
		return result.output;
	}

	/** `bw sync`; the caller interprets the exit code. */
	sync(): Promise<CommandResult> {
		return this.run(this.binary, ["sync"], { env: this.childEnv() });
	}

	/**
	 * `bw serve --hostname 0.0.0.0 --port <port> --session <token>`.
	 * Resolves when the process exits; output goes straight to our stdout/stderr.
	 */
	serve(port: number, session: string, signal?: AbortSignal): Promise<CommandResult> {
		return this.run(
			this.binary,
			["serve", "--hostname", "0.0.0.0", "--port", String(port), "--session", session],
			{ env: { ...this.childEnv(), BW_SESSION: session }, inheritOutput: true, signal },
		);
	}

	private childEnv(extra: Record<string, string> = {}): Record<string, string> {
		return this.session === undefined ? extra : { ...extra, BW_SESSION: this.session };
	}

	private async runChecked(
		label: string,
		args: string[],
		extraEnv?: Record<string, string>,
	): Promise<CommandResult> {
		const command = `${this.binary} ${label}`;
		let result: CommandResult;
		try {
			result = await this.run(this.binary, args, { env: this.childEnv(extraEnv) });
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			throw new CommandError(command, null, message, { cause: err });
		}
		if (result.code !== 0) {
			logger.debug({ command, code: result.code, signal: result.signal }, "command exited non-zero");
			throw new CommandError(command, result.code, result.output);
		}
		return result;
	}
}
