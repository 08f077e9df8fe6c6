/**
 * Diagnostic trouble code encoding.
 *
 * A code such as "P0171" is carried in three bytes: the domain letter as a
 * value in the first byte, then the four trailing characters as nibbles.
 */

import { formatHex } from "@virtual-hil/core";
import type { DtcRecord } from "@virtual-hil/device";
import {
	POSITIVE_RESPONSE_OFFSET,
	UDS_DTC_REPORT_TYPES,
	UDS_SERVICES,
} from "./services.js";

export type DtcDomain = "P" | "B" | "C" | "U";

const DOMAIN_BYTES: Record<DtcDomain, number> = {
	P: 0x02, // powertrain
	B: 0x08, // body
	C: 0x01, // chassis
	U: 0x00, // network
};

const DTC_CODE_PATTERN = /^[PBCU][0-9A-F]{4}$/i;

/** Size of one record in a report-by-status-mask response */
const DTC_RECORD_LENGTH = 4;

function isDomain(letter: string): letter is DtcDomain {
	return Object.hasOwn(DOMAIN_BYTES, letter);
}

function domainOf(byte: number): DtcDomain | undefined {
	for (const [domain, value] of Object.entries(DOMAIN_BYTES)) {
		if (value === byte && isDomain(domain)) return domain;
	}
	return undefined;
}

/**
 * Check that a code is a domain letter followed by four hex digits
 *
 * @example
 * isValidDtcCode("P0171"); // true
 * isValidDtcCode("X0171"); // false
 */
export function isValidDtcCode(code: string): boolean {
	return DTC_CODE_PATTERN.test(code);
}

/**
 * Encode a trouble code into its three-byte form.
 *
 * A code shorter than five characters encodes as three zero bytes.
 *
 * @example
 * encodeDtc("P0171"); // Uint8Array [0x02, 0x01, 0x71]
 */
export function encodeDtc(code: string): Uint8Array {
	const bytes = new Uint8Array(3);
	if (code.length < 5) return bytes;

	const letter = code.charAt(0).toUpperCase();
	const nibble = (index: number): number =>
		Number.parseInt(code.charAt(index), 16) & 0x0f;

	bytes[0] = isDomain(letter) ? DOMAIN_BYTES[letter] : 0x00;
	bytes[1] = (nibble(1) << 4) | nibble(2);
	bytes[2] = (nibble(3) << 4) | nibble(4);
	return bytes;
}

/**
 * Decode three bytes back into a trouble code.
 *
 * @param bytes - Buffer holding the encoded code
 * @param offset - Index of the first of the three bytes
 * @returns The code, or undefined for a short buffer or an unknown domain byte
 */
export function decodeDtc(bytes: Uint8Array, offset = 0): string | undefined {
	const [domainByte, high, low] = bytes.subarray(offset, offset + 3);
	if (domainByte === undefined || high === undefined || low === undefined) {
		return undefined;
	}

	const domain = domainOf(domainByte);
	if (domain === undefined) return undefined;

	const digits = ((high << 8) | low).toString(16).toUpperCase().padStart(4, "0");
	return `${domain}${digits}`;
}

/**
 * Split a ReadDTCInformation report-by-status-mask response into records.
 *
 * Layout: [0x59, 0x02, availabilityMask, (code0, code1, code2, status)*].
 * A trailing partial record is ignored.
 *
 * @throws Error if the response is not a report-by-status-mask response, or
 * a record carries an unknown domain byte
 */
export function parseDtcReport(response: Uint8Array): DtcRecord[] {
	const expectedSid = UDS_SERVICES.READ_DTC_INFORMATION + POSITIVE_RESPONSE_OFFSET;
	if (
		response[0] !== expectedSid ||
		response[1] !== UDS_DTC_REPORT_TYPES.BY_STATUS_MASK
	) {
		throw new Error(
			`Not a DTC-by-status report: ${Array.from(response.subarray(0, 2), (b) => formatHex(b)).join(" ")}`,
		);
	}

	const records: DtcRecord[] = [];
	for (
		let offset = 3;
		offset + DTC_RECORD_LENGTH <= response.length;
		offset += DTC_RECORD_LENGTH
	) {
		const code = decodeDtc(response, offset);
		if (code === undefined) {
			throw new Error(
				`Unknown DTC domain byte ${formatHex(response[offset] ?? 0)} at offset ${offset}`,
			);
		}
		records.push({ code, status: response[offset + 3] ?? 0 });
	}
	return records;
}
