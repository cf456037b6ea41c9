/**
 * Startup failures. Both are fatal: the sidecar prints a FATAL line and exits 1.
 * Readiness timeouts use TimeoutError from infra/timeout.ts.
 */

export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigurationError";
	}
}

export class CommandError extends Error {
	constructor(
		/** Human label of the invocation, e.g. "bw login". */
		public readonly command: string,
		public readonly exitCode: number | null,
		/** Combined stdout + stderr of the failed invocation. */
		public readonly output: string,
		options?: { cause?: unknown },
	) {
		const status = exitCode === null ? "did not exit normally" : `exit status ${exitCode}`;
		super(`${command} failed: ${output.trim()} - ${status}`, options);
		this.name = "CommandError";
	}
}
