/**
 * Hex formatting helpers shared by logs, traces and error messages
 */

/**
 * Format a number as an uppercase hex literal.
 *
 * @param value - Value to format
 * @param width - Minimum number of hex digits @default 2
 *
 * @example
 * formatHex(0x7f); // "0x7F"
 * formatHex(0xf19e, 4); // "0xF19E"
 */
export function formatHex(value: number, width = 2): string {
	return `0x${value.toString(16).toUpperCase().padStart(width, "0")}`;
}

/**
 * Format bytes as space-separated uppercase hex pairs.
 *
 * @example
 * formatBytes(new Uint8Array([0x50, 0x03])); // "50 03"
 */
export function formatBytes(bytes: Uint8Array, separator = " "): string {
	return Array.from(bytes, (b) =>
		b.toString(16).toUpperCase().padStart(2, "0"),
	).join(separator);
}

/**
 * Parse a hex string into bytes.
 *
 * Whitespace, colons, dashes and an optional leading "0x" are ignored,
 * so "01020304", "01 02 03 04", "01-02-03-04" and "0x01:02:03:04" are
 * equivalent.
 *
 * @throws Error if the string has an odd number of digits or non-hex characters
 */
export function parseHex(text: string): Uint8Array {
	const digits = text.replace(/^0x/i, "").replace(/[\s:-]/g, "");
	if (digits.length % 2 !== 0) {
		throw new Error(`Hex string has an odd number of digits: "${text}"`);
	}
	if (!/^[0-9a-fA-F]*$/.test(digits)) {
		throw new Error(`Hex string contains non-hex characters: "${text}"`);
	}

	const bytes = new Uint8Array(digits.length / 2);
	for (let i = 0; i < bytes.length; i++) {
		bytes[i] = Number.parseInt(digits.slice(i * 2, i * 2 + 2), 16);
	}
	return bytes;
}
