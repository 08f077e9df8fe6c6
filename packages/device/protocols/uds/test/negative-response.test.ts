import { describe, expect, it } from "vitest";
import {
	parseNegativeResponse,
	UDS_NEGATIVE_RESPONSE,
	UDS_NRC,
	UDS_SERVICES,
	UDS_SESSION_TYPES,
	UdsNegativeResponseError,
} from "../src/index.js";

// ── parseNegativeResponse ────────────────────────────────────────────────────

describe("parseNegativeResponse", () => {
	it("formats the service and NRC of a negative response", () => {
		const response = new Uint8Array([
			UDS_NEGATIVE_RESPONSE,
			UDS_SERVICES.CLEAR_DIAGNOSTIC_INFORMATION,
			UDS_NRC.CONDITIONS_NOT_CORRECT,
		]);
		expect(parseNegativeResponse(response)).toBe(
			"UDS negative response for service 0x14: Conditions not correct (NRC 0x22)",
		);
	});

	it("returns message for SUB_FUNCTION_NOT_SUPPORTED (0x12)", () => {
		const msg = parseNegativeResponse(
			new Uint8Array([UDS_NEGATIVE_RESPONSE, 0x10, UDS_NRC.SUB_FUNCTION_NOT_SUPPORTED]),
		);
		expect(msg).toContain("Sub-function not supported");
		expect(msg).toContain("0x12");
	});

	it("returns message for REQUEST_SEQUENCE_ERROR (0x24)", () => {
		const msg = parseNegativeResponse(
			new Uint8Array([UDS_NEGATIVE_RESPONSE, 0x31, UDS_NRC.REQUEST_SEQUENCE_ERROR]),
		);
		expect(msg).toContain("Request sequence error");
		expect(msg).toContain("0x24");
	});

	it("returns message for INVALID_KEY (0x35)", () => {
		const msg = parseNegativeResponse(
			new Uint8Array([UDS_NEGATIVE_RESPONSE, 0x27, UDS_NRC.INVALID_KEY]),
		);
		expect(msg).toContain("Invalid key");
		expect(msg).toContain("0x35");
	});

	it("returns unknown NRC message for unrecognized NRC code", () => {
		const msg = parseNegativeResponse(
			new Uint8Array([UDS_NEGATIVE_RESPONSE, 0x10, 0x99]),
		);
		expect(msg).toBe(
			"UDS negative response for service 0x10: Unknown NRC (0x99) (NRC 0x99)",
		);
	});

	it("returns error message for non-negative response", () => {
		expect(parseNegativeResponse(new Uint8Array([0x50, 0x03]))).toBe(
			"Invalid negative response: 50 03",
		);
	});

	it("returns error message for empty response", () => {
		expect(parseNegativeResponse(new Uint8Array([]))).toBe(
			"Invalid negative response: ",
		);
	});

	it("returns error message for too-short negative response (only 2 bytes)", () => {
		const msg = parseNegativeResponse(
			new Uint8Array([UDS_NEGATIVE_RESPONSE, 0x10]),
		);
		expect(msg).toContain("Invalid negative response");
	});

	it("knows every NRC in UDS_NRC", () => {
		for (const nrc of Object.values(UDS_NRC)) {
			const msg = parseNegativeResponse(
				new Uint8Array([UDS_NEGATIVE_RESPONSE, 0x10, nrc]),
			);
			expect(msg).not.toContain("Unknown NRC");
		}
	});
});

// ── UdsNegativeResponseError ─────────────────────────────────────────────────

describe("UdsNegativeResponseError", () => {
	it("carries the request SID and NRC", () => {
		const error = new UdsNegativeResponseError(
			new Uint8Array([UDS_NEGATIVE_RESPONSE, 0x31, UDS_NRC.REQUEST_SEQUENCE_ERROR]),
		);
		expect(error).toBeInstanceOf(Error);
		expect(error.name).toBe("UdsNegativeResponseError");
		expect(error.requestSid).toBe(0x31);
		expect(error.nrc).toBe(0x24);
		expect(error.message).toBe(
			"UDS negative response for service 0x31: Request sequence error (NRC 0x24)",
		);
	});
});

// ── Constants ────────────────────────────────────────────────────────────────

describe("UDS constants", () => {
	it("has correct service IDs", () => {
		expect(UDS_SERVICES.DIAGNOSTIC_SESSION_CONTROL).toBe(0x10);
		expect(UDS_SERVICES.CLEAR_DIAGNOSTIC_INFORMATION).toBe(0x14);
		expect(UDS_SERVICES.READ_DTC_INFORMATION).toBe(0x19);
		expect(UDS_SERVICES.READ_DATA_BY_IDENTIFIER).toBe(0x22);
		expect(UDS_SERVICES.SECURITY_ACCESS).toBe(0x27);
		expect(UDS_SERVICES.WRITE_DATA_BY_IDENTIFIER).toBe(0x2e);
		expect(UDS_SERVICES.ROUTINE_CONTROL).toBe(0x31);
		expect(UDS_SERVICES.TESTER_PRESENT).toBe(0x3e);
		expect(UDS_SERVICES.CONTROL_DTC_SETTING).toBe(0x85);
	});

	it("has correct session type values", () => {
		expect(UDS_SESSION_TYPES.DEFAULT).toBe(0x01);
		expect(UDS_SESSION_TYPES.PROGRAMMING).toBe(0x02);
		expect(UDS_SESSION_TYPES.EXTENDED_DIAGNOSTIC).toBe(0x03);
		expect(UDS_SESSION_TYPES.SAFETY_SYSTEM).toBe(0x04);
	});

	it("uses 0x7F as the negative response marker", () => {
		expect(UDS_NEGATIVE_RESPONSE).toBe(0x7f);
	});
});
