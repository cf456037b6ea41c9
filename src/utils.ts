/** Longest delay setTimeout/setInterval honour; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function sleep(ms: number) {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Read an environment variable, treating empty strings as unset.
 */
export function readEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
	const value = env[key];
	return value === undefined || value === "" ? undefined : value;
}
