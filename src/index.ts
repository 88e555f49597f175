/**
 * commit-inspect - Table Commitment Inspection Library
 *
 * Decodes serialized table commitments (Ristretto255 IPA, Dory, Dynamic Dory)
 * and renders them as deterministic text.
 */

// ============================================================================
// SCHEMES (alias resolution, per-scheme decode/render)
// ============================================================================
export {
	aliasesFor,
	type InspectionReport,
	inspectCommitment,
	resolveScheme,
	SCHEME_ALIASES,
	SCHEME_CODECS,
	SCHEMES,
	type Scheme,
	type SchemeCodec,
} from "./core/commitment-schemes.js";

// ============================================================================
// DECODED STRUCTURE
// ============================================================================
export {
	type Bounds,
	type ColumnBounds,
	type ColumnCommitmentMetadata,
	type ColumnType,
	type Ident,
	MAX_DECIMAL_PRECISION,
	type TimeUnit,
} from "./core/column-metadata.js";
export {
	type ColumnCommitment,
	type DoryCommitment,
	type DynamicDoryCommitment,
	type RistrettoCommitment,
} from "./core/commitments.js";
export {
	type ColumnCommitments,
	type ColumnMetadataMap,
	columnCount,
	decodeTableCommitment,
	type RowRange,
	rowCount,
	type TableCommitment,
} from "./core/table-commitment.js";

// ============================================================================
// ERRORS
// ============================================================================
export {
	type CommitUtilityError,
	type CommitUtilityErrorKind,
	type CommitUtilityResult,
	describeError,
} from "./core/errors.js";
export { PostcardError, type PostcardErrorCode, PostcardReader } from "./core/postcard.js";
