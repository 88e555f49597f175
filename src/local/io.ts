/**
 * Input / Output
 * ===============
 *
 * Reads the commitment artifact in full and writes the rendering in a single
 * write. File handles are closed before returning on every path, and a failed
 * close counts as a failed read or write of that file.
 */

import { type FileHandle, open } from "node:fs/promises";
import { type CommitUtilityResult, fail, ok } from "../core/errors.js";

/** Resolves to false instead of rejecting when the handle fails to close. */
async function closeHandle(handle: FileHandle): Promise<boolean> {
	try {
		await handle.close();
		return true;
	} catch {
		return false;
	}
}

// ============================================================================
// INPUT
// ============================================================================

async function readStream(stream: NodeJS.ReadableStream): Promise<Uint8Array> {
	const chunks: Buffer[] = [];
	for await (const chunk of stream) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
	}
	return Buffer.concat(chunks);
}

/**
 * Read the whole artifact from `path`, or from `stdin` when no path is given.
 */
export async function readInput(
	path: string | undefined,
	stdin: NodeJS.ReadableStream = process.stdin,
): Promise<CommitUtilityResult<Uint8Array>> {
	if (path === undefined) {
		try {
			return ok(await readStream(stdin));
		} catch {
			return fail({ kind: "ReadStdin" });
		}
	}

	let handle: FileHandle;
	try {
		handle = await open(path, "r");
	} catch {
		return fail({ kind: "OpenInputFile", filename: path });
	}

	let bytes: Uint8Array | undefined;
	try {
		bytes = await handle.readFile();
	} catch {
		bytes = undefined;
	}
	const closed = await closeHandle(handle);

	if (bytes === undefined || !closed) {
		return fail({ kind: "ReadInputFile", filename: path });
	}
	return ok(bytes);
}

// ============================================================================
// OUTPUT
// ============================================================================

function writeStream(stream: NodeJS.WritableStream, text: string): Promise<void> {
	return new Promise((resolve, reject) => {
		// Stays attached after a failed write: the stream emits "error" after the callback.
		const onError = (error: Error) => reject(error);
		stream.once("error", onError);
		stream.write(text, (error) => {
			if (error) {
				reject(error);
			} else {
				stream.removeListener("error", onError);
				resolve();
			}
		});
	});
}

/**
 * Write `text` to `path` (created or truncated), or to `stdout` when no path
 * is given. A file created before a failed write stays on disk.
 */
export async function writeOutput(
	path: string | undefined,
	text: string,
	stdout: NodeJS.WritableStream = process.stdout,
): Promise<CommitUtilityResult<void>> {
	if (path === undefined) {
		try {
			await writeStream(stdout, text);
			return ok(undefined);
		} catch {
			return fail({ kind: "WriteStdout" });
		}
	}

	let handle: FileHandle;
	try {
		handle = await open(path, "w");
	} catch {
		return fail({ kind: "CreateOutputFile", filename: path });
	}

	let written: boolean;
	try {
		await handle.writeFile(text, "utf-8");
		written = true;
	} catch {
		written = false;
	}
	const closed = await closeHandle(handle);

	if (!written || !closed) {
		return fail({ kind: "WriteOutputFile", filename: path });
	}
	return ok(undefined);
}
