/**
 * Commitment Schemes
 * ===================
 *
 * The closed set of commitment schemes the inspector understands, the
 * operator-facing aliases that select them, and one decode/render pair per
 * scheme.
 *
 *   ipa | innerproductargument      -> InnerProductArgument (Ristretto255)
 *   dory                            -> Dory (BLS12-381 GT)
 *   dynamic_dory | dynamic-dory     -> DynamicDory (BLS12-381 G1)
 */

import {
	type ColumnCommitment,
	commitmentHex,
	type DoryCommitment,
	type DynamicDoryCommitment,
	type RistrettoCommitment,
	readDoryCommitment,
	readDynamicDoryCommitment,
	readRistrettoPoint,
} from "./commitments.js";
import { type DebugNode, formatDebug, str, tuple } from "./debug-format.js";
import { type CommitUtilityResult, fail, ok } from "./errors.js";
import { PostcardError, type PostcardReader } from "./postcard.js";
import {
	columnCount,
	decodeTableCommitment,
	describeTableCommitment,
	rowCount,
	type TableCommitment,
} from "./table-commitment.js";

// ============================================================================
// SCHEMES
// ============================================================================

export const SCHEMES = ["InnerProductArgument", "Dory", "DynamicDory"] as const;

export type Scheme = (typeof SCHEMES)[number];

/** Lower-case alias -> scheme */
export const SCHEME_ALIASES: Readonly<Record<string, Scheme>> = {
	dynamic_dory: "DynamicDory",
	"dynamic-dory": "DynamicDory",
	dory: "Dory",
	ipa: "InnerProductArgument",
	innerproductargument: "InnerProductArgument",
};

/**
 * Resolve an operator-supplied scheme name. Matching is case-insensitive and
 * exact; the error carries the name as it was given.
 */
export function resolveScheme(name: string): CommitUtilityResult<Scheme> {
	const lowered = name.toLowerCase();
	const scheme = Object.hasOwn(SCHEME_ALIASES, lowered) ? SCHEME_ALIASES[lowered] : undefined;
	if (scheme === undefined) {
		return fail({ kind: "UnknownScheme", scheme: name });
	}
	return ok(scheme);
}

export function aliasesFor(scheme: Scheme): string[] {
	return Object.entries(SCHEME_ALIASES)
		.filter(([, target]) => target === scheme)
		.map(([alias]) => alias);
}

// ============================================================================
// CODECS
// ============================================================================

export interface SchemeCodec<C> {
	decode(bytes: Uint8Array): CommitUtilityResult<TableCommitment<C>>;
	render(value: TableCommitment<C>): string;
}

function describeCommitment(commitment: ColumnCommitment): DebugNode {
	return tuple(commitment.kind, str(commitmentHex(commitment)));
}

/**
 * Build the decode/render pair for one commitment kind. Decoder failures
 * become DeserializationError; anything else is a bug and propagates.
 */
function defineCodec<C extends ColumnCommitment>(readCommitment: (reader: PostcardReader) => C): SchemeCodec<C> {
	return {
		decode(bytes) {
			try {
				return ok(decodeTableCommitment(bytes, readCommitment));
			} catch (error) {
				if (error instanceof PostcardError) {
					return fail({ kind: "DeserializationError", detail: error.message });
				}
				throw error;
			}
		},
		render(value) {
			return formatDebug(describeTableCommitment(value, describeCommitment));
		},
	};
}

export const SCHEME_CODECS: {
	readonly InnerProductArgument: SchemeCodec<RistrettoCommitment>;
	readonly Dory: SchemeCodec<DoryCommitment>;
	readonly DynamicDory: SchemeCodec<DynamicDoryCommitment>;
} = {
	InnerProductArgument: defineCodec(readRistrettoPoint),
	Dory: defineCodec(readDoryCommitment),
	DynamicDory: defineCodec(readDynamicDoryCommitment),
};

export interface InspectionReport {
	text: string;
	rowCount: bigint;
	columnCount: number;
}

function decodeAndRender<C>(codec: SchemeCodec<C>, bytes: Uint8Array): CommitUtilityResult<InspectionReport> {
	const decoded = codec.decode(bytes);
	if (!decoded.ok) {
		return decoded;
	}
	return ok({
		text: codec.render(decoded.value),
		rowCount: rowCount(decoded.value),
		columnCount: columnCount(decoded.value),
	});
}

/**
 * Decode `bytes` as a table commitment under `scheme` and render it.
 * Identical input always yields identical text.
 */
export function inspectCommitment(scheme: Scheme, bytes: Uint8Array): CommitUtilityResult<InspectionReport> {
	switch (scheme) {
		case "InnerProductArgument":
			return decodeAndRender(SCHEME_CODECS.InnerProductArgument, bytes);
		case "Dory":
			return decodeAndRender(SCHEME_CODECS.Dory, bytes);
		case "DynamicDory":
			return decodeAndRender(SCHEME_CODECS.DynamicDory, bytes);
	}
}
