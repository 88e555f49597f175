/**
 * Postcard Reader
 * ================
 *
 * Cursor over the compact, versionless binary encoding that commitment
 * artifacts are persisted in.
 *
 * WIRE RULES:
 * -----------
 * - u8 / i8: one raw byte
 * - u16 / u32 / u64 / u128 / usize: LEB128 varint
 * - i16 / i32 / i64 / i128: zigzag, then varint
 * - bool / Option tag: a single 0 or 1 byte
 * - String / bytes / seq / map: varint length prefix
 * - enum: varint variant index, then payload
 * - struct / tuple: fields back to back, no framing
 *
 * Every read either succeeds completely or throws PostcardError.
 */

// ============================================================================
// ERRORS
// ============================================================================

export type PostcardErrorCode =
	| "UnexpectedEnd"
	| "BadVarint"
	| "BadBool"
	| "BadOption"
	| "BadUtf8"
	| "BadChar"
	| "BadEnum"
	| "BadValue";

export class PostcardError extends Error {
	readonly code: PostcardErrorCode;
	readonly offset: number;

	constructor(code: PostcardErrorCode, offset: number, message: string) {
		super(`${message} (at byte ${offset})`);
		this.name = "PostcardError";
		this.code = code;
		this.offset = offset;
	}
}

// ============================================================================
// CONSTANTS
// ============================================================================

/** Widest length prefix postcard writes (usize on 64-bit targets) */
const USIZE_BITS = 64;

/** Longest UTF-8 encoding of a single char */
const MAX_CHAR_BYTES = 4;

const utf8 = new TextDecoder("utf-8", { fatal: true });

// ============================================================================
// READER
// ============================================================================

export class PostcardReader {
	private readonly bytes: Uint8Array;
	private cursor = 0;

	constructor(bytes: Uint8Array) {
		this.bytes = bytes;
	}

	get offset(): number {
		return this.cursor;
	}

	get remaining(): number {
		return this.bytes.length - this.cursor;
	}

	fail(code: PostcardErrorCode, message: string): never {
		throw new PostcardError(code, this.cursor, message);
	}

	// ------------------------------------------------------------------------
	// Raw bytes
	// ------------------------------------------------------------------------

	readByte(): number {
		if (this.cursor >= this.bytes.length) {
			this.fail("UnexpectedEnd", "Unexpected end of input");
		}
		const value = this.bytes[this.cursor];
		this.cursor += 1;
		return value;
	}

	/**
	 * Take exactly `count` bytes. The returned view shares the input buffer.
	 */
	readBytes(count: number): Uint8Array {
		if (count > this.remaining) {
			this.fail("UnexpectedEnd", `Needed ${count} bytes, ${this.remaining} left`);
		}
		const slice = this.bytes.subarray(this.cursor, this.cursor + count);
		this.cursor += count;
		return slice;
	}

	// ------------------------------------------------------------------------
	// Integers
	// ------------------------------------------------------------------------

	/**
	 * Read an unsigned LEB128 varint holding at most `bits` bits.
	 *
	 * Non-minimal encodings are accepted; encodings longer than the type
	 * allows, or whose final byte overflows it, are not.
	 */
	readVarint(bits: number): bigint {
		const maxBytes = Math.ceil(bits / 7);
		const lastByteMax = (1 << (bits - 7 * (maxBytes - 1))) - 1;
		let value = 0n;

		for (let i = 0; i < maxBytes; i++) {
			const byte = this.readByte();
			value |= BigInt(byte & 0x7f) << BigInt(7 * i);
			if ((byte & 0x80) === 0) {
				if (i === maxBytes - 1 && byte > lastByteMax) {
					this.fail("BadVarint", `Varint overflows u${bits}`);
				}
				return value;
			}
		}
		return this.fail("BadVarint", `Varint longer than ${maxBytes} bytes`);
	}

	readU8(): number {
		return this.readByte();
	}

	readI8(): number {
		const byte = this.readByte();
		return byte >= 0x80 ? byte - 0x100 : byte;
	}

	readU16(): number {
		return Number(this.readVarint(16));
	}

	readU32(): number {
		return Number(this.readVarint(32));
	}

	readU64(): bigint {
		return this.readVarint(64);
	}

	readU128(): bigint {
		return this.readVarint(128);
	}

	readUsize(): bigint {
		return this.readVarint(USIZE_BITS);
	}

	readI16(): number {
		return Number(unzigzag(this.readVarint(16)));
	}

	readI32(): number {
		return Number(unzigzag(this.readVarint(32)));
	}

	readI64(): bigint {
		return unzigzag(this.readVarint(64));
	}

	readI128(): bigint {
		return unzigzag(this.readVarint(128));
	}

	// ------------------------------------------------------------------------
	// Scalars
	// ------------------------------------------------------------------------

	readBool(): boolean {
		const byte = this.readByte();
		if (byte === 0) return false;
		if (byte === 1) return true;
		return this.fail("BadBool", `Invalid bool byte 0x${byte.toString(16)}`);
	}

	readString(): string {
		const bytes = this.readBytes(this.readLength());
		try {
			return utf8.decode(bytes);
		} catch {
			return this.fail("BadUtf8", "String is not valid UTF-8");
		}
	}

	/**
	 * A char travels as a short string; the first scalar in it is the value.
	 */
	readChar(): string {
		const length = this.readLength();
		if (length > MAX_CHAR_BYTES) {
			this.fail("BadChar", `Char encoding of ${length} bytes`);
		}
		let text: string;
		try {
			text = utf8.decode(this.readBytes(length));
		} catch {
			return this.fail("BadUtf8", "Char is not valid UTF-8");
		}
		const codePoint = text.codePointAt(0);
		if (codePoint === undefined) {
			return this.fail("BadChar", "Empty char encoding");
		}
		return String.fromCodePoint(codePoint);
	}

	// ------------------------------------------------------------------------
	// Containers
	// ------------------------------------------------------------------------

	/**
	 * Length prefix for strings, byte vectors, sequences and maps.
	 * A length that cannot possibly fit in the remaining input is rejected
	 * here so callers never size an allocation from it.
	 */
	readLength(): number {
		const length = this.readUsize();
		if (length > BigInt(this.remaining)) {
			this.fail("UnexpectedEnd", `Length ${length} exceeds remaining ${this.remaining} bytes`);
		}
		return Number(length);
	}

	readByteVec(): Uint8Array {
		return this.readBytes(this.readLength());
	}

	readOption<T>(readValue: (reader: PostcardReader) => T): T | null {
		const tag = this.readByte();
		if (tag === 0) return null;
		if (tag === 1) return readValue(this);
		return this.fail("BadOption", `Invalid Option tag 0x${tag.toString(16)}`);
	}

	readSeq<T>(readItem: (reader: PostcardReader) => T): T[] {
		const length = this.readLength();
		const items: T[] = [];
		for (let i = 0; i < length; i++) {
			items.push(readItem(this));
		}
		return items;
	}

	readVariantIndex(): number {
		return this.readU32();
	}

	/**
	 * Read an enum tag and dispatch to the decoder registered for it.
	 */
	readEnum<T>(enumName: string, variants: ReadonlyArray<(reader: PostcardReader) => T>): T {
		const index = this.readVariantIndex();
		const readVariant = variants[index];
		if (readVariant === undefined) {
			return this.fail("BadEnum", `Unknown ${enumName} variant ${index}`);
		}
		return readVariant(this);
	}
}

// ============================================================================
// HELPERS
// ============================================================================

export function unzigzag(value: bigint): bigint {
	return (value & 1n) === 0n ? value >> 1n : -((value >> 1n) + 1n);
}
