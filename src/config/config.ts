import { z } from "zod";

import { ConfigurationError } from "../errors.js";

// Empty strings count as unset, same as a missing variable.
const optionalString = z
	.string()
	.optional()
	.transform((value) => (value === undefined || value === "" ? undefined : value));

function portSchema(fallback: number) {
	return optionalString.pipe(
		z.coerce.number().int().min(1).max(65535).optional().default(fallback),
	);
}

const SidecarEnvSchema = z.object({
	BW_CLI_PATH: optionalString.transform((value) => value ?? "bw"),
	BW_HOST: optionalString,
	BW_CLIENTID: optionalString,
	BW_CLIENTSECRET: optionalString,
	BW_PASSWORD: optionalString,
	BW_SERVE_PORT: portSchema(8088),
	BW_PROXY_PORT: portSchema(8087),
	BW_PROXY_HOST: optionalString.transform((value) => value ?? "localhost"),
	BW_DISABLE_SYNC: optionalString,
	BW_SYNC_INTERVAL: optionalString,
	BW_SERVE_WAIT_RETRIES: optionalString,
	BW_SERVE_WAIT_INTERVAL: optionalString,
});

export type SidecarConfig = {
	/** Path or name of the Bitwarden CLI binary. */
	cliPath: string;
	/** Self-hosted server URL passed to `bw config server`. */
	serverHost?: string;
	credentials: {
		clientId?: string;
		clientSecret?: string;
		password?: string;
	};
	serve: {
		port: number;
		/** Raw BW_SERVE_WAIT_RETRIES / BW_SERVE_WAIT_INTERVAL; resolved by the readiness poller. */
		waitRetries?: string;
		waitInterval?: string;
	};
	proxy: {
		port: number;
		/** Host the periodic sync uses to reach this sidecar's own /sync. */
		host: string;
	};
	sync: {
		enabled: boolean;
		/** Raw BW_SYNC_INTERVAL; resolved (with fallback) by the periodic scheduler. */
		interval?: string;
	};
};

let cachedConfig: SidecarConfig | null = null;

/**
 * Build the sidecar configuration from environment variables.
 *
 * Only structural problems (a port that is not a port) fail here. Missing secrets
 * are reported by the login step, and malformed intervals fall back to defaults
 * where they are used.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SidecarConfig {
	if (env === process.env && cachedConfig) return cachedConfig;

	const result = SidecarEnvSchema.safeParse(env);
	if (!result.success) {
		const details = result.error.errors
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigurationError(`invalid configuration: ${details}`);
	}
	const parsed = result.data;

	const config: SidecarConfig = {
		cliPath: parsed.BW_CLI_PATH,
		serverHost: parsed.BW_HOST,
		credentials: {
			clientId: parsed.BW_CLIENTID,
			clientSecret: parsed.BW_CLIENTSECRET,
			password: parsed.BW_PASSWORD,
		},
		serve: {
			port: parsed.BW_SERVE_PORT,
			waitRetries: parsed.BW_SERVE_WAIT_RETRIES,
			waitInterval: parsed.BW_SERVE_WAIT_INTERVAL,
		},
		proxy: {
			port: parsed.BW_PROXY_PORT,
			host: parsed.BW_PROXY_HOST,
		},
		sync: {
			enabled: parsed.BW_DISABLE_SYNC !== "true",
			interval: parsed.BW_SYNC_INTERVAL,
		},
	};

	if (env === process.env) {
		cachedConfig = config;
	}
	return config;
}

/**
 * Reset cached configuration (for testing).
 */
export function resetConfigCache(): void {
	cachedConfig = null;
}
