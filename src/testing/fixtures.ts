/**
 * Test Fixtures
 * ==============
 *
 * Postcard writer and table-commitment encoder used to build artifacts for
 * the decoder tests. Mirrors the wire rules in core/postcard.ts.
 */

import { bls12_381 } from "@noble/curves/bls12-381";
import { RistrettoPoint } from "@noble/curves/ed25519";
import type { Bounds, ColumnBounds, ColumnCommitmentMetadata, ColumnType, Ident } from "../core/column-metadata.js";
import { TIME_UNITS } from "../core/column-metadata.js";
import { FP_SIZE } from "../core/commitments.js";

// ============================================================================
// WRITER
// ============================================================================

export class PostcardWriter {
	private readonly out: number[] = [];

	bytes(): Uint8Array {
		return Uint8Array.from(this.out);
	}

	raw(bytes: ArrayLike<number>): this {
		for (let i = 0; i < bytes.length; i++) {
			this.out.push(bytes[i]);
		}
		return this;
	}

	u8(value: number): this {
		this.out.push(value & 0xff);
		return this;
	}

	i8(value: number): this {
		return this.u8(value < 0 ? value + 0x100 : value);
	}

	varint(value: number | bigint): this {
		let rest = BigInt(value);
		do {
			const low = Number(rest & 0x7fn);
			rest >>= 7n;
			this.out.push(rest === 0n ? low : low | 0x80);
		} while (rest !== 0n);
		return this;
	}

	zigzag(value: number | bigint): this {
		const v = BigInt(value);
		return this.varint(v < 0n ? -v * 2n - 1n : v * 2n);
	}

	string(value: string): this {
		const encoded = Buffer.from(value, "utf-8");
		return this.varint(encoded.length).raw(encoded);
	}

	byteVec(value: Uint8Array): this {
		return this.varint(value.length).raw(value);
	}
}

// ============================================================================
// TABLE COMMITMENT ENCODER
// ============================================================================

const COLUMN_TYPE_INDEX: Record<ColumnType["kind"], number> = {
	Boolean: 0,
	Uint8: 1,
	TinyInt: 2,
	SmallInt: 3,
	Int: 4,
	BigInt: 5,
	Int128: 6,
	Decimal75: 7,
	VarChar: 8,
	TimestampTZ: 9,
	Scalar: 10,
	VarBinary: 11,
};

const COLUMN_BOUNDS_INDEX: Record<ColumnBounds["kind"], number> = {
	NoOrder: 0,
	Uint8: 1,
	TinyInt: 2,
	SmallInt: 3,
	Int: 4,
	BigInt: 5,
	Int128: 6,
	TimestampTZ: 7,
};

const BOUNDS_INDEX: Record<Bounds<number>["kind"], number> = { Empty: 0, Bounded: 1, Sharp: 2 };

export function writeIdent(w: PostcardWriter, ident: Ident): void {
	w.string(ident.value);
	if (ident.quoteStyle === null) {
		w.u8(0);
	} else {
		w.u8(1).string(ident.quoteStyle);
	}
}

export function writeColumnType(w: PostcardWriter, columnType: ColumnType): void {
	w.varint(COLUMN_TYPE_INDEX[columnType.kind]);
	if (columnType.kind === "Decimal75") {
		w.u8(columnType.precision).i8(columnType.scale);
	} else if (columnType.kind === "TimestampTZ") {
		w.varint(TIME_UNITS.indexOf(columnType.timeUnit)).zigzag(columnType.timeZoneOffset);
	}
}

function writeBounds<T extends number | bigint>(w: PostcardWriter, bounds: Bounds<T>, writeValue: (v: T) => void) {
	w.varint(BOUNDS_INDEX[bounds.kind]);
	if (bounds.kind !== "Empty") {
		writeValue(bounds.min);
		writeValue(bounds.max);
	}
}

export function writeColumnBounds(w: PostcardWriter, bounds: ColumnBounds): void {
	w.varint(COLUMN_BOUNDS_INDEX[bounds.kind]);
	switch (bounds.kind) {
		case "NoOrder":
			return;
		case "Uint8":
			return writeBounds(w, bounds.bounds, (v) => w.u8(v));
		case "TinyInt":
			return writeBounds(w, bounds.bounds, (v) => w.i8(v));
		case "SmallInt":
		case "Int":
		case "BigInt":
		case "Int128":
		case "TimestampTZ":
			return writeBounds<number | bigint>(w, bounds.bounds, (v) => w.zigzag(v));
	}
}

export interface TableCommitmentFixture {
	/** Writes one commitment in its scheme's encoding */
	commitments: Array<(w: PostcardWriter) => void>;
	columns: Array<[Ident, ColumnCommitmentMetadata]>;
	range: [number | bigint, number | bigint];
}

export function encodeTableCommitment(fixture: TableCommitmentFixture): Uint8Array {
	const w = new PostcardWriter();
	w.varint(fixture.commitments.length);
	for (const writeCommitment of fixture.commitments) {
		writeCommitment(w);
	}
	w.varint(fixture.columns.length);
	for (const [ident, metadata] of fixture.columns) {
		writeIdent(w, ident);
		writeColumnType(w, metadata.columnType);
		writeColumnBounds(w, metadata.bounds);
	}
	w.varint(fixture.range[0]).varint(fixture.range[1]);
	return w.bytes();
}

// ============================================================================
// COMMITMENT VALUES
// ============================================================================

/** Compressed encoding of k * G on Ristretto255 (k = 0 gives the identity) */
export function ristrettoBytes(k: bigint): Uint8Array {
	const point = k === 0n ? RistrettoPoint.ZERO : RistrettoPoint.BASE.multiply(k);
	return point.toRawBytes();
}

/** Compressed encoding of k * G on BLS12-381 G1 */
export function g1Bytes(k: bigint): Uint8Array {
	return bls12_381.G1.ProjectivePoint.BASE.multiply(k).toRawBytes(true);
}

type Fp12Value = ReturnType<typeof bls12_381.pairing>;

/** 576-byte little-endian encoding of an Fp12 value */
export function fp12Bytes(value: Fp12Value): Uint8Array {
	const coefficients = [value.c0, value.c1].flatMap((fp6) =>
		[fp6.c0, fp6.c1, fp6.c2].flatMap((fp2) => [fp2.c0, fp2.c1]),
	);
	return fpCoefficientBytes(coefficients);
}

/** Encode 12 raw coefficients without reducing them */
export function fpCoefficientBytes(coefficients: bigint[]): Uint8Array {
	const out = new Uint8Array(12 * FP_SIZE);
	coefficients.forEach((coefficient, index) => {
		let rest = coefficient;
		for (let i = 0; i < FP_SIZE; i++) {
			out[index * FP_SIZE + i] = Number(rest & 0xffn);
			rest >>= 8n;
		}
	});
	return out;
}

/** e(G1, G2): a generator of the target group */
export function gtGeneratorBytes(): Uint8Array {
	return fp12Bytes(bls12_381.pairing(bls12_381.G1.ProjectivePoint.BASE, bls12_381.G2.ProjectivePoint.BASE));
}

export const FP12_ONE_BYTES = fpCoefficientBytes([1n, 0n, 0n, 0n, 0n, 0n, 0n, 0n, 0n, 0n, 0n, 0n]);

export const writeRistretto = (bytes: Uint8Array) => (w: PostcardWriter) => {
	w.raw(bytes);
};

export const writeWrapped = (bytes: Uint8Array) => (w: PostcardWriter) => {
	w.byteVec(bytes);
};

export function hex(bytes: Uint8Array): string {
	return Buffer.from(bytes).toString("hex");
}
