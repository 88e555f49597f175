/**
 * Table Commitment
 * =================
 *
 * Aggregate commitment to an entire table: one commitment per column, the
 * metadata of each column, and the row range the commitments cover.
 *
 * Generic over the commitment kind; the scheme supplies the decoder and
 * description for a single column commitment.
 */

import {
	type ColumnCommitmentMetadata,
	describeColumnCommitmentMetadata,
	describeIdent,
	type Ident,
	readColumnCommitmentMetadata,
	readIdent,
} from "./column-metadata.js";
import { atom, type DebugNode, list, map, struct } from "./debug-format.js";
import { PostcardReader } from "./postcard.js";

// ============================================================================
// TYPES
// ============================================================================

export interface RowRange {
	start: bigint;
	end: bigint;
}

/** Insertion-ordered map from column identifier to its metadata */
export type ColumnMetadataMap = Array<[Ident, ColumnCommitmentMetadata]>;

export interface ColumnCommitments<C> {
	commitments: C[];
	columnMetadata: ColumnMetadataMap;
}

export interface TableCommitment<C> {
	columnCommitments: ColumnCommitments<C>;
	range: RowRange;
}

// ============================================================================
// DECODING
// ============================================================================

function identsEqual(a: Ident, b: Ident): boolean {
	return a.value === b.value && a.quoteStyle === b.quoteStyle;
}

/**
 * A repeated identifier replaces the earlier entry's metadata in place.
 */
function readColumnMetadataMap(reader: PostcardReader): ColumnMetadataMap {
	const length = reader.readLength();
	const entries: ColumnMetadataMap = [];

	for (let i = 0; i < length; i++) {
		const ident = readIdent(reader);
		const metadata = readColumnCommitmentMetadata(reader);
		const existing = entries.find(([key]) => identsEqual(key, ident));
		if (existing) {
			existing[1] = metadata;
		} else {
			entries.push([ident, metadata]);
		}
	}
	return entries;
}

export function readTableCommitment<C>(
	reader: PostcardReader,
	readCommitment: (reader: PostcardReader) => C,
): TableCommitment<C> {
	const commitments = reader.readSeq(readCommitment);
	const columnMetadata = readColumnMetadataMap(reader);
	const start = reader.readUsize();
	const end = reader.readUsize();
	return {
		columnCommitments: { commitments, columnMetadata },
		range: { start, end },
	};
}

/**
 * Decode a complete table commitment from a byte buffer.
 * Trailing bytes after the value are ignored.
 */
export function decodeTableCommitment<C>(
	bytes: Uint8Array,
	readCommitment: (reader: PostcardReader) => C,
): TableCommitment<C> {
	return readTableCommitment(new PostcardReader(bytes), readCommitment);
}

// ============================================================================
// DERIVED VALUES
// ============================================================================

export function rowCount(commitment: TableCommitment<unknown>): bigint {
	const { start, end } = commitment.range;
	return end > start ? end - start : 0n;
}

export function columnCount(commitment: TableCommitment<unknown>): number {
	return commitment.columnCommitments.columnMetadata.length;
}

// ============================================================================
// DEBUG DESCRIPTION
// ============================================================================

export function describeTableCommitment<C>(
	commitment: TableCommitment<C>,
	describeCommitment: (commitment: C) => DebugNode,
): DebugNode {
	const { commitments, columnMetadata } = commitment.columnCommitments;
	return struct("TableCommitment", [
		[
			"column_commitments",
			struct("ColumnCommitments", [
				["commitments", list(commitments.map(describeCommitment))],
				[
					"column_metadata",
					map(
						columnMetadata.map(([ident, metadata]): [DebugNode, DebugNode] => [
							describeIdent(ident),
							describeColumnCommitmentMetadata(metadata),
						]),
					),
				],
			]),
		],
		["range", atom(`${commitment.range.start}..${commitment.range.end}`)],
	]);
}
