/**
 * commit-inspect CLI
 *
 * Maps parsed arguments to the inspect command and its result to an exit
 * code. Messages go to stderr so stdout carries only the rendering.
 */

import { aliasesFor, SCHEMES } from "../core/commitment-schemes.js";
import { describeError } from "../core/errors.js";
import { parseArgs } from "./args.js";
import { type InspectIO, inspectCommand, processIO } from "./commands/inspect.js";

export const VERSION = "0.1.0";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const schemeLines = SCHEMES.map((scheme) => `  ${aliasesFor(scheme).join(", ").padEnd(34)}${scheme}`).join("\n");

export const HELP = `
commit-inspect v${VERSION}
Print a serialized table commitment in readable form

USAGE:
  commit-inspect --scheme <name> [--input <path>] [--output <path>]

OPTIONS:
  --scheme <name>       Commitment scheme (required)
  --input, -i <path>    Input file (defaults to stdin)
  --output, -o <path>   Output file (defaults to stdout)
  --verbose, -v         Log each stage to stderr
  --help, -h            Show this help message
  --version, -V         Show version

SCHEMES:
${schemeLines}

ENVIRONMENT:
  COMMIT_INSPECT_SCHEME     Scheme used when --scheme is not given
  COMMIT_INSPECT_VERBOSE    Set to 1 to enable --verbose

EXAMPLES:
  commit-inspect --scheme ipa --input ./table.commit
  cat ./table.commit | commit-inspect --scheme dynamic_dory -o ./table.txt
`;

export async function runCli(
	args: string[],
	env: NodeJS.ProcessEnv = process.env,
	io: InspectIO = processIO,
): Promise<number> {
	const parsed = parseArgs(args, env);

	switch (parsed.kind) {
		case "help":
			console.log(HELP);
			return EXIT_OK;
		case "version":
			console.log(`commit-inspect v${VERSION}`);
			return EXIT_OK;
		case "usage-error":
			console.error(`Error: ${parsed.message}`);
			console.error(HELP);
			return EXIT_USAGE;
		case "run": {
			const result = await inspectCommand(parsed.options, io);
			if (!result.ok) {
				console.error(`Error: ${describeError(result.error)}`);
				return EXIT_FAILURE;
			}
			return EXIT_OK;
		}
	}
}
