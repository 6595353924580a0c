import { createRequire } from "node:module";
import { Command } from "commander";

const require = createRequire(import.meta.url);

function getVersion(): string {
	// src/cli from sources, dist/src/cli once built
	for (const candidate of ["../../package.json", "../../../package.json"]) {
		try {
			const pkg: unknown = require(candidate);
			if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
				return typeof pkg.version === "string" ? pkg.version : "0.0.0";
			}
		} catch {
			// try the next location
		}
	}
	return "0.0.0";
}

export function createProgram(): Command {
	const program = new Command();

	program
		.name("herald")
		.description("Governed social engagement agent with an audit ledger")
		.version(getVersion())
		.option("-v, --verbose", "Enable verbose output")
		.option("-c, --config <path>", "Path to config file");

	return program;
}
