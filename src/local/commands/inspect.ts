/**
 * Inspect Command
 *
 * read input -> resolve scheme -> decode + render -> write output.
 * The first failing stage ends the run; nothing later executes.
 */

import { inspectCommitment, resolveScheme } from "../../core/commitment-schemes.js";
import { type CommitUtilityResult, ok } from "../../core/errors.js";
import type { InspectOptions } from "../args.js";
import { readInput, writeOutput } from "../io.js";

export interface InspectIO {
	stdin: NodeJS.ReadableStream;
	stdout: NodeJS.WritableStream;
	/** Diagnostic sink, used only in verbose mode */
	log: (message: string) => void;
}

/** Standard streams, looked up on first use */
export const processIO: InspectIO = {
	get stdin() {
		return process.stdin;
	},
	get stdout() {
		return process.stdout;
	},
	log: (message) => console.error(message),
};

export async function inspectCommand(
	options: InspectOptions,
	io: InspectIO = processIO,
): Promise<CommitUtilityResult<void>> {
	const log = options.verbose ? io.log : () => {};

	const input = await readInput(options.input, io.stdin);
	if (!input.ok) return input;
	log(`Read ${input.value.length} bytes from ${options.input ?? "stdin"}`);

	const scheme = resolveScheme(options.scheme);
	if (!scheme.ok) return scheme;
	log(`Scheme: ${scheme.value}`);

	const report = inspectCommitment(scheme.value, input.value);
	if (!report.ok) {
		if (report.error.kind === "DeserializationError" && report.error.detail) {
			log(`Decoder: ${report.error.detail}`);
		}
		return report;
	}
	log(`Decoded ${report.value.columnCount} column(s) covering ${report.value.rowCount} row(s)`);

	const written = await writeOutput(options.output, report.value.text, io.stdout);
	if (!written.ok) return written;
	log(`Wrote ${Buffer.byteLength(report.value.text, "utf-8")} bytes to ${options.output ?? "stdout"}`);

	return ok(undefined);
}
