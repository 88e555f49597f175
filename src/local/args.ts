/**
 * Argument Parsing
 *
 * Flags win over environment:
 *   COMMIT_INSPECT_SCHEME   scheme to use when --scheme is absent
 *   COMMIT_INSPECT_VERBOSE  "1" or "true" turns on stage logging
 */

// ============================================================================
// TYPES
// ============================================================================

export interface InspectOptions {
	/** Input file (stdin when absent) */
	input?: string;
	/** Output file (stdout when absent) */
	output?: string;
	scheme: string;
	verbose: boolean;
}

export type ParsedArgs =
	| { kind: "help" }
	| { kind: "version" }
	| { kind: "run"; options: InspectOptions }
	| { kind: "usage-error"; message: string };

type ValueFlag = "input" | "output" | "scheme";

const VALUE_FLAGS = new Map<string, ValueFlag>([
	["--input", "input"],
	["-i", "input"],
	["--output", "output"],
	["-o", "output"],
	["--scheme", "scheme"],
]);

// ============================================================================
// PARSER
// ============================================================================

function envFlag(value: string | undefined): boolean {
	return value === "1" || value?.toLowerCase() === "true";
}

export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
	const values: Partial<Record<ValueFlag, string>> = {};
	let verbose = envFlag(env.COMMIT_INSPECT_VERBOSE);

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];

		if (arg === "--help" || arg === "-h") {
			return { kind: "help" };
		}
		if (arg === "--version" || arg === "-V") {
			return { kind: "version" };
		}
		if (arg === "--verbose" || arg === "-v") {
			verbose = true;
			continue;
		}

		// --flag=value
		const eq = arg.indexOf("=");
		if (arg.startsWith("--") && eq > 0) {
			const flag = VALUE_FLAGS.get(arg.slice(0, eq));
			if (flag === undefined) {
				return { kind: "usage-error", message: `Unknown option: ${arg.slice(0, eq)}` };
			}
			values[flag] = arg.slice(eq + 1);
			continue;
		}

		const flag = VALUE_FLAGS.get(arg);
		if (flag === undefined) {
			return { kind: "usage-error", message: `Unknown argument: ${arg}` };
		}
		const value = args[i + 1];
		if (value === undefined) {
			return { kind: "usage-error", message: `Missing value for ${arg}` };
		}
		values[flag] = value;
		i++;
	}

	const scheme = values.scheme ?? env.COMMIT_INSPECT_SCHEME;
	if (scheme === undefined) {
		return { kind: "usage-error", message: "Missing required option --scheme" };
	}

	return {
		kind: "run",
		options: {
			input: values.input,
			output: values.output,
			scheme,
			verbose,
		},
	};
}
