/**
 * Column Commitment Encodings
 * ============================
 *
 * Wire decoders for the three commitment kinds a table commitment can hold.
 * Each decoder reads its encoding from the stream and rejects bytes that do
 * not describe a valid group element.
 *
 * ENCODINGS:
 * ----------
 * - RistrettoPoint:        32-byte compressed Ristretto255 point, no prefix
 * - DoryCommitment:        length-prefixed bytes, 576-byte BLS12-381 GT element
 *                          (12 x 48-byte little-endian Fp, c0 before c1)
 * - DynamicDoryCommitment: length-prefixed bytes, 48-byte compressed BLS12-381
 *                          G1 point (big-endian, flags in the top bits)
 */

import { bls12_381 } from "@noble/curves/bls12-381";
import { RistrettoPoint } from "@noble/curves/ed25519";
import type { PostcardReader } from "./postcard.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const RISTRETTO_POINT_SIZE = 32;

/** Compressed size of one BLS12-381 base field element */
export const FP_SIZE = 48;

/** Fp12 = 12 base field coefficients */
export const GT_SIZE = 12 * FP_SIZE;

export const G1_COMPRESSED_SIZE = 48;

// ============================================================================
// TYPES
// ============================================================================

export interface RistrettoCommitment {
	kind: "RistrettoPoint";
	/** Canonical compressed encoding */
	bytes: Uint8Array;
}

export interface DoryCommitment {
	kind: "DoryCommitment";
	bytes: Uint8Array;
}

export interface DynamicDoryCommitment {
	kind: "DynamicDoryCommitment";
	bytes: Uint8Array;
}

export type ColumnCommitment = RistrettoCommitment | DoryCommitment | DynamicDoryCommitment;

// ============================================================================
// DECODERS
// ============================================================================

export function readRistrettoPoint(reader: PostcardReader): RistrettoCommitment {
	const encoded = reader.readBytes(RISTRETTO_POINT_SIZE);
	try {
		const point = RistrettoPoint.fromHex(encoded);
		return { kind: "RistrettoPoint", bytes: point.toRawBytes() };
	} catch {
		return reader.fail("BadValue", "Bytes are not a valid Ristretto point");
	}
}

/**
 * Commitments in the pairing schemes are stored as a byte vector wrapping the
 * group element's own encoding. Bytes past the element are left unread.
 */
function readWrappedElement(reader: PostcardReader, size: number, name: string): Uint8Array {
	const wrapped = reader.readByteVec();
	if (wrapped.length < size) {
		reader.fail("UnexpectedEnd", `${name} needs ${size} bytes, got ${wrapped.length}`);
	}
	return wrapped.subarray(0, size);
}

export function readDoryCommitment(reader: PostcardReader): DoryCommitment {
	const encoded = readWrappedElement(reader, GT_SIZE, "DoryCommitment");
	if (!isTargetGroupElement(encoded)) {
		reader.fail("BadValue", "Bytes are not a BLS12-381 target group element");
	}
	return { kind: "DoryCommitment", bytes: Uint8Array.from(encoded) };
}

export function readDynamicDoryCommitment(reader: PostcardReader): DynamicDoryCommitment {
	const encoded = readWrappedElement(reader, G1_COMPRESSED_SIZE, "DynamicDoryCommitment");
	try {
		const point = bls12_381.G1.ProjectivePoint.fromHex(encoded);
		return { kind: "DynamicDoryCommitment", bytes: point.toRawBytes(true) };
	} catch {
		return reader.fail("BadValue", "Bytes are not a valid BLS12-381 G1 point");
	}
}

// ============================================================================
// GT VALIDATION
// ============================================================================

function readLittleEndian(bytes: Uint8Array): bigint {
	let value = 0n;
	for (let i = bytes.length - 1; i >= 0; i--) {
		value = (value << 8n) | BigInt(bytes[i]);
	}
	return value;
}

/**
 * Every coefficient must be a reduced field element, and the element must
 * lie in the order-r subgroup (x^r == 1).
 */
export function isTargetGroupElement(encoded: Uint8Array): boolean {
	const { Fp, Fp12, Fr } = bls12_381.fields;
	const coefficients: bigint[] = [];

	for (let i = 0; i < 12; i++) {
		const coefficient = readLittleEndian(encoded.subarray(i * FP_SIZE, (i + 1) * FP_SIZE));
		if (coefficient >= Fp.ORDER) {
			return false;
		}
		coefficients.push(coefficient);
	}

	const fp2 = (i: number) => ({ c0: coefficients[i], c1: coefficients[i + 1] });
	const fp6 = (i: number) => ({ c0: fp2(i), c1: fp2(i + 2), c2: fp2(i + 4) });
	const element = { c0: fp6(0), c1: fp6(6) };
	return Fp12.eql(Fp12.pow(element, Fr.ORDER), Fp12.ONE);
}

// ============================================================================
// RENDERING
// ============================================================================

export function commitmentHex(commitment: ColumnCommitment): string {
	return Buffer.from(commitment.bytes).toString("hex");
}
