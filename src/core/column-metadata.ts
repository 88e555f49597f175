/**
 * Column Metadata
 * ================
 *
 * Per-column type and value-bound metadata carried alongside each column
 * commitment, with its wire decoders and debug descriptions.
 */

import { atom, char, type DebugNode, option, str, struct, tuple } from "./debug-format.js";
import type { PostcardReader } from "./postcard.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Largest decimal precision a Decimal75 column may declare */
export const MAX_DECIMAL_PRECISION = 75;

export const TIME_UNITS = ["Second", "Millisecond", "Microsecond", "Nanosecond"] as const;

// ============================================================================
// TYPES
// ============================================================================

export type TimeUnit = (typeof TIME_UNITS)[number];

export interface Ident {
	value: string;
	/** Quote character the identifier was written with, if any */
	quoteStyle: string | null;
}

export type ColumnType =
	| { kind: "Boolean" }
	| { kind: "Uint8" }
	| { kind: "TinyInt" }
	| { kind: "SmallInt" }
	| { kind: "Int" }
	| { kind: "BigInt" }
	| { kind: "Int128" }
	| { kind: "Decimal75"; precision: number; scale: number }
	| { kind: "VarChar" }
	| { kind: "TimestampTZ"; timeUnit: TimeUnit; timeZoneOffset: number }
	| { kind: "Scalar" }
	| { kind: "VarBinary" };

export type Bounds<T> = { kind: "Empty" } | { kind: "Bounded"; min: T; max: T } | { kind: "Sharp"; min: T; max: T };

export type ColumnBounds =
	| { kind: "NoOrder" }
	| { kind: "Uint8"; bounds: Bounds<number> }
	| { kind: "TinyInt"; bounds: Bounds<number> }
	| { kind: "SmallInt"; bounds: Bounds<number> }
	| { kind: "Int"; bounds: Bounds<number> }
	| { kind: "BigInt"; bounds: Bounds<bigint> }
	| { kind: "Int128"; bounds: Bounds<bigint> }
	| { kind: "TimestampTZ"; bounds: Bounds<bigint> };

export interface ColumnCommitmentMetadata {
	columnType: ColumnType;
	bounds: ColumnBounds;
}

type Reader<T> = (reader: PostcardReader) => T;

// ============================================================================
// DECODING
// ============================================================================

export function readIdent(reader: PostcardReader): Ident {
	const value = reader.readString();
	const quoteStyle = reader.readOption((r) => r.readChar());
	return { value, quoteStyle };
}

function readPrecision(reader: PostcardReader): number {
	const precision = reader.readU8();
	if (precision === 0 || precision > MAX_DECIMAL_PRECISION) {
		reader.fail("BadValue", `Decimal precision ${precision} outside 1..=${MAX_DECIMAL_PRECISION}`);
	}
	return precision;
}

const TIME_UNIT_VARIANTS: ReadonlyArray<Reader<TimeUnit>> = TIME_UNITS.map((unit) => () => unit);

const COLUMN_TYPE_VARIANTS: ReadonlyArray<Reader<ColumnType>> = [
	() => ({ kind: "Boolean" }),
	() => ({ kind: "Uint8" }),
	() => ({ kind: "TinyInt" }),
	() => ({ kind: "SmallInt" }),
	() => ({ kind: "Int" }),
	() => ({ kind: "BigInt" }),
	() => ({ kind: "Int128" }),
	(r) => {
		const precision = readPrecision(r);
		const scale = r.readI8();
		return { kind: "Decimal75", precision, scale };
	},
	() => ({ kind: "VarChar" }),
	(r) => {
		const timeUnit = r.readEnum("PoSQLTimeUnit", TIME_UNIT_VARIANTS);
		const timeZoneOffset = r.readI32();
		return { kind: "TimestampTZ", timeUnit, timeZoneOffset };
	},
	() => ({ kind: "Scalar" }),
	() => ({ kind: "VarBinary" }),
];

export function readColumnType(reader: PostcardReader): ColumnType {
	return reader.readEnum("ColumnType", COLUMN_TYPE_VARIANTS);
}

function boundsReader<T>(readValue: Reader<T>): Reader<Bounds<T>> {
	const readInner = (r: PostcardReader): { min: T; max: T } => {
		const min = readValue(r);
		const max = readValue(r);
		return { min, max };
	};
	return (reader) =>
		reader.readEnum<Bounds<T>>("Bounds", [
			() => ({ kind: "Empty" }),
			(r) => ({ kind: "Bounded", ...readInner(r) }),
			(r) => ({ kind: "Sharp", ...readInner(r) }),
		]);
}

const readU8Bounds = boundsReader((r) => r.readU8());
const readI8Bounds = boundsReader((r) => r.readI8());
const readI16Bounds = boundsReader((r) => r.readI16());
const readI32Bounds = boundsReader((r) => r.readI32());
const readI64Bounds = boundsReader((r) => r.readI64());
const readI128Bounds = boundsReader((r) => r.readI128());

const COLUMN_BOUNDS_VARIANTS: ReadonlyArray<Reader<ColumnBounds>> = [
	() => ({ kind: "NoOrder" }),
	(r) => ({ kind: "Uint8", bounds: readU8Bounds(r) }),
	(r) => ({ kind: "TinyInt", bounds: readI8Bounds(r) }),
	(r) => ({ kind: "SmallInt", bounds: readI16Bounds(r) }),
	(r) => ({ kind: "Int", bounds: readI32Bounds(r) }),
	(r) => ({ kind: "BigInt", bounds: readI64Bounds(r) }),
	(r) => ({ kind: "Int128", bounds: readI128Bounds(r) }),
	(r) => ({ kind: "TimestampTZ", bounds: readI64Bounds(r) }),
];

export function readColumnBounds(reader: PostcardReader): ColumnBounds {
	return reader.readEnum("ColumnBounds", COLUMN_BOUNDS_VARIANTS);
}

export function readColumnCommitmentMetadata(reader: PostcardReader): ColumnCommitmentMetadata {
	const columnType = readColumnType(reader);
	const bounds = readColumnBounds(reader);
	return { columnType, bounds };
}

// ============================================================================
// DEBUG DESCRIPTIONS
// ============================================================================

export function describeIdent(ident: Ident): DebugNode {
	return struct("Ident", [
		["value", str(ident.value)],
		["quote_style", option(ident.quoteStyle, char)],
	]);
}

export function describeColumnType(columnType: ColumnType): DebugNode {
	switch (columnType.kind) {
		case "Decimal75":
			return tuple("Decimal75", tuple("Precision", atom(columnType.precision)), atom(columnType.scale));
		case "TimestampTZ":
			return tuple(
				"TimestampTZ",
				atom(columnType.timeUnit),
				struct("PoSQLTimeZone", [["offset", atom(columnType.timeZoneOffset)]]),
			);
		default:
			return atom(columnType.kind);
	}
}

function describeBounds(bounds: Bounds<number | bigint>): DebugNode {
	if (bounds.kind === "Empty") {
		return atom("Empty");
	}
	return tuple(
		bounds.kind,
		struct("BoundsInner", [
			["min", atom(bounds.min)],
			["max", atom(bounds.max)],
		]),
	);
}

export function describeColumnBounds(bounds: ColumnBounds): DebugNode {
	if (bounds.kind === "NoOrder") {
		return atom("NoOrder");
	}
	return tuple(bounds.kind, describeBounds(bounds.bounds));
}

export function describeColumnCommitmentMetadata(metadata: ColumnCommitmentMetadata): DebugNode {
	return struct("ColumnCommitmentMetadata", [
		["column_type", describeColumnType(metadata.columnType)],
		["bounds", describeColumnBounds(metadata.bounds)],
	]);
}
