/**
 * Commit Utility Errors
 * ======================
 *
 * Every failure the inspector can report, as a closed tagged union.
 * Each variant maps to exactly one operator-facing message through
 * describeError().
 */

// ============================================================================
// TYPES
// ============================================================================

export type CommitUtilityError =
	| { kind: "OpenInputFile"; filename: string }
	| { kind: "ReadInputFile"; filename: string }
	| { kind: "ReadStdin" }
	| { kind: "CreateOutputFile"; filename: string }
	| { kind: "WriteOutputFile"; filename: string }
	| { kind: "WriteStdout" }
	| {
			kind: "DeserializationError";
			/** Decoder detail, shown only in verbose mode */
			detail?: string;
	  }
	| { kind: "UnknownScheme"; scheme: string };

export type CommitUtilityErrorKind = CommitUtilityError["kind"];

export type CommitUtilityResult<T> = { ok: true; value: T } | { ok: false; error: CommitUtilityError };

// ============================================================================
// CONSTRUCTORS
// ============================================================================

export function ok<T>(value: T): CommitUtilityResult<T> {
	return { ok: true, value };
}

export function fail<T>(error: CommitUtilityError): CommitUtilityResult<T> {
	return { ok: false, error };
}

// ============================================================================
// MESSAGES
// ============================================================================

/**
 * Render the operator-facing message for an error.
 */
export function describeError(error: CommitUtilityError): string {
	switch (error.kind) {
		case "OpenInputFile":
			return `Failed to open input file '${error.filename}'`;
		case "ReadInputFile":
			return `Failed to read from input file '${error.filename}'`;
		case "ReadStdin":
			return "Failed to read from stdin";
		case "CreateOutputFile":
			return `Failed to create output file '${error.filename}'`;
		case "WriteOutputFile":
			return `Failed to write to output file '${error.filename}'`;
		case "WriteStdout":
			return "Failed to write to stdout";
		case "DeserializationError":
			return "Failed to deserialize commitment";
		case "UnknownScheme":
			return `Unknown scheme: '${error.scheme}'`;
		default:
			return assertNever(error);
	}
}

function assertNever(value: never): never {
	throw new Error(`Unhandled error variant: ${JSON.stringify(value)}`);
}
