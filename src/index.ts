#!/usr/bin/env node

import { createProgram } from "./cli/program.js";
import { registerRunCommand } from "./commands/run.js";
import { registerStatusCommand } from "./commands/status.js";
import { registerTickCommand } from "./commands/tick.js";
import { setConfigPath } from "./config/path.js";
import { setVerbose } from "./globals.js";
import { closeLogger, getLogger } from "./logging.js";

// Create CLI program
const program = createProgram();

// Register commands
registerTickCommand(program);
registerRunCommand(program);
registerStatusCommand(program);

// Global options must be applied before any config loading happens
program.hook("preAction", (thisCommand) => {
	const opts = thisCommand.opts();
	if (typeof opts.config === "string") {
		setConfigPath(opts.config);
	}
	if (opts.verbose === true) {
		setVerbose(true);
	}
	// Initialize logger after config path is set
	getLogger();
});

async function main(): Promise<void> {
	await program.parseAsync();
}

main()
	.catch((err) => {
		// Commander prints some errors itself; keep this minimal.
		console.error(`Error: ${String(err)}`);
		process.exitCode = 1;
	})
	.finally(() => {
		// The pino destination keeps a handle open.
		closeLogger();
	});
