#!/usr/bin/env node
/**
 * commit-inspect
 *
 * Command-line entry point for inspecting table commitment artifacts.
 */

import { runCli } from "./cli.js";

async function main() {
	process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error) => {
	console.error("Error:", error instanceof Error ? error.message : error);
	process.exit(1);
});
