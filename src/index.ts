#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerRunCommand } from "./commands/run.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = createProgram();

registerRunCommand(program);
registerSyncCommand(program);
registerStatusCommand(program);

async function main(): Promise<void> {
	await program.parseAsync();
}

main().catch((err) => {
	// Commander prints its own usage errors; keep this minimal.
	console.error(`Error: ${String(err)}`);
	process.exitCode = 1;
});
