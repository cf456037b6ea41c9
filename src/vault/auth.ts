import type { SidecarConfig } from "../config/config.js";
import { CommandError, ConfigurationError } from "../errors.js";
import { getChildLogger } from "../logging.js";
import type { VaultCli } from "./cli.js";

const logger = getChildLogger({ module: "vault-auth" });

/**
 * Log in with the API key, unlock the vault and return the session token.
 *
 * Runs `bw config server` first when a custom host is configured. There are no
 * retries: every failure here ends the process.
 */
export async function loginAndGetSession(
	config: Pick<SidecarConfig, "serverHost" | "credentials">,
	cli: VaultCli,
): Promise<string> {
	const { clientId, clientSecret, password } = config.credentials;
	if (!clientId || !clientSecret || !password) {
		throw new ConfigurationError(
			"missing one or more required environment variables (BW_CLIENTID, BW_CLIENTSECRET, BW_PASSWORD)",
		);
	}

	if (config.serverHost) {
		logger.info({ host: config.serverHost }, "configuring bw to use the supplied server");
		await cli.configServer(config.serverHost);
	}

	logger.info("logging in with API key");
	await cli.loginWithApiKey(clientId, clientSecret);
	logger.info("logged in");

	logger.info("unlocking vault");
	const session = (await cli.unlock(password)).trim();
	if (!session) {
		throw new CommandError(`${cli.binary} unlock`, 0, "unlock returned an empty session key");
	}
	logger.info("vault unlocked");

	return session;
}
