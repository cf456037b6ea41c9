import { createRequire } from "node:module";
import { Command } from "commander";

const require = createRequire(import.meta.url);

function getVersion(): string {
	try {
		// Resolve package.json relative to this module (works from src or dist)
		const pkg: { version?: string } = require("../../package.json");
		return pkg.version ?? "0.0.0";
	} catch {
		return "0.0.0";
	}
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("bw-serve-sidecar")
		.description("Unlock a Bitwarden vault, supervise bw serve and proxy its API")
		.version(getVersion())
		.addHelpText("after", "\nLogging is configured with LOG_LEVEL and LOG_FILE.");

	return program;
}
