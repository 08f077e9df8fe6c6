/**
 * Byte order for multi-byte fields
 * - "le" = little-endian (least significant byte first)
 * - "be" = big-endian (most significant byte first)
 */
export type Endianness = "le" | "be";

/**
 * Integer field types used by frame and diagnostic payloads
 */
export type ScalarType = "u8" | "i8" | "u16" | "i16" | "u32" | "i32";

/**
 * Physical scaling of a raw field: physical = raw * scale + offset
 */
export interface ScalarOptions {
	/** Byte order for multi-byte fields @default "le" */
	endian?: Endianness;
	/** Physical units per raw count @default 1 */
	scale?: number;
	/** Physical value of raw zero @default 0 */
	offset?: number;
}

const RANGES: Record<ScalarType, readonly [min: number, max: number]> = {
	u8: [0, 0xff],
	i8: [-0x80, 0x7f],
	u16: [0, 0xffff],
	i16: [-0x8000, 0x7fff],
	u32: [0, 0xffffffff],
	i32: [-0x80000000, 0x7fffffff],
};

/**
 * Byte size of a scalar type
 *
 * @example
 * sizeOf("u16"); // 2
 */
export function sizeOf(type: ScalarType): number {
	switch (type) {
		case "u8":
		case "i8":
			return 1;
		case "u16":
		case "i16":
			return 2;
		case "u32":
		case "i32":
			return 4;
	}
}

function viewOf(buffer: Uint8Array): DataView {
	return new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

function assertInBounds(
	buffer: Uint8Array,
	byteOffset: number,
	type: ScalarType,
): void {
	if (byteOffset < 0 || byteOffset + sizeOf(type) > buffer.length) {
		throw new Error(
			`${type} at offset ${byteOffset} out of bounds for buffer of length ${buffer.length}`,
		);
	}
}

/**
 * Read a scaled scalar from a buffer
 *
 * @param buffer - Source bytes
 * @param byteOffset - Offset of the first byte of the field
 * @param type - Raw field type
 * @param options - Byte order and physical scaling
 * @returns raw * scale + offset
 * @throws Error if the field does not fit inside the buffer
 *
 * @example
 * // Pack voltage, 0.1 V per count, little-endian
 * readScalar(new Uint8Array([0xa0, 0x0f]), 0, "u16", { scale: 0.1 }); // 400
 */
export function readScalar(
	buffer: Uint8Array,
	byteOffset: number,
	type: ScalarType,
	options: ScalarOptions = {},
): number {
	const { endian = "le", scale = 1, offset = 0 } = options;
	assertInBounds(buffer, byteOffset, type);

	const view = viewOf(buffer);
	const littleEndian = endian === "le";
	let raw: number;

	switch (type) {
		case "u8":
			raw = view.getUint8(byteOffset);
			break;
		case "i8":
			raw = view.getInt8(byteOffset);
			break;
		case "u16":
			raw = view.getUint16(byteOffset, littleEndian);
			break;
		case "i16":
			raw = view.getInt16(byteOffset, littleEndian);
			break;
		case "u32":
			raw = view.getUint32(byteOffset, littleEndian);
			break;
		case "i32":
			raw = view.getInt32(byteOffset, littleEndian);
			break;
		default: {
			const _exhaustive: never = type;
			throw new Error(`Unknown scalar type: ${_exhaustive}`);
		}
	}

	return raw * scale + offset;
}

/**
 * Write a physical value into a buffer as a scaled scalar.
 *
 * The raw value is rounded to the nearest count and clamped to the range of
 * the field type, so out-of-range physical values saturate instead of wrapping.
 *
 * @param buffer - Destination bytes (modified in place)
 * @param byteOffset - Offset of the first byte of the field
 * @param type - Raw field type
 * @param value - Physical value
 * @param options - Byte order and physical scaling
 * @returns The raw value that was written
 * @throws Error if the field does not fit inside the buffer or scale is 0
 *
 * @example
 * const buf = new Uint8Array(2);
 * writeScalar(buf, 0, "i16", -12.5, { scale: 0.1 }); // buf = [0x83, 0xff]
 */
export function writeScalar(
	buffer: Uint8Array,
	byteOffset: number,
	type: ScalarType,
	value: number,
	options: ScalarOptions = {},
): number {
	const { endian = "le", scale = 1, offset = 0 } = options;
	assertInBounds(buffer, byteOffset, type);
	if (scale === 0) {
		throw new Error("Scale cannot be zero");
	}

	const [min, max] = RANGES[type];
	const raw = Math.max(min, Math.min(max, Math.round((value - offset) / scale)));
	const view = viewOf(buffer);
	const littleEndian = endian === "le";

	switch (type) {
		case "u8":
			view.setUint8(byteOffset, raw);
			break;
		case "i8":
			view.setInt8(byteOffset, raw);
			break;
		case "u16":
			view.setUint16(byteOffset, raw, littleEndian);
			break;
		case "i16":
			view.setInt16(byteOffset, raw, littleEndian);
			break;
		case "u32":
			view.setUint32(byteOffset, raw, littleEndian);
			break;
		case "i32":
			view.setInt32(byteOffset, raw, littleEndian);
			break;
	}

	return raw;
}

/**
 * Split a 16-bit identifier into big-endian bytes
 *
 * @example
 * splitU16BE(0xf19e); // [0xf1, 0x9e]
 */
export function splitU16BE(value: number): [number, number] {
	return [(value >> 8) & 0xff, value & 0xff];
}
