import { formatBytes, formatHex } from "@virtual-hil/core";
import { UDS_NEGATIVE_RESPONSE, UDS_NRC } from "./services.js";

const NRC_MESSAGES: Record<number, string> = {
	[UDS_NRC.GENERAL_REJECT]: "General reject",
	[UDS_NRC.SERVICE_NOT_SUPPORTED]: "Service not supported",
	[UDS_NRC.SUB_FUNCTION_NOT_SUPPORTED]: "Sub-function not supported",
	[UDS_NRC.INCORRECT_MESSAGE_LENGTH]:
		"Incorrect message length or invalid format",
	[UDS_NRC.CONDITIONS_NOT_CORRECT]: "Conditions not correct",
	[UDS_NRC.REQUEST_SEQUENCE_ERROR]: "Request sequence error",
	[UDS_NRC.REQUEST_OUT_OF_RANGE]: "Request out of range",
	[UDS_NRC.SECURITY_ACCESS_DENIED]: "Security access denied",
	[UDS_NRC.INVALID_KEY]: "Invalid key",
	[UDS_NRC.EXCEEDED_NUMBER_OF_ATTEMPTS]: "Exceeded number of attempts",
	[UDS_NRC.REQUIRED_TIME_DELAY_NOT_EXPIRED]: "Required time delay not expired",
	[UDS_NRC.UPLOAD_DOWNLOAD_NOT_ACCEPTED]: "Upload/download not accepted",
	[UDS_NRC.TRANSFER_DATA_SUSPENDED]: "Transfer data suspended",
	[UDS_NRC.GENERAL_PROGRAMMING_FAILURE]: "General programming failure",
	[UDS_NRC.WRONG_BLOCK_SEQUENCE_COUNTER]: "Wrong block sequence counter",
	[UDS_NRC.RESPONSE_PENDING]: "Response pending",
	[UDS_NRC.SUB_FUNCTION_NOT_SUPPORTED_IN_ACTIVE_SESSION]:
		"Sub-function not supported in active session",
	[UDS_NRC.SERVICE_NOT_SUPPORTED_IN_ACTIVE_SESSION]:
		"Service not supported in active session",
};

/**
 * Parses a UDS negative response and returns a human-readable error message.
 *
 * A UDS negative response has the format:
 *   [0x7F, <requestSID>, <NRC>]
 *
 * Ref: ISO 14229-1 §11.3, NegativeResponse
 *
 * @param response - Raw response bytes from the ECU
 * @returns Human-readable error message describing the NRC
 */
export function parseNegativeResponse(response: Uint8Array): string {
	const [marker, requestSid, nrc] = response;
	if (
		marker !== UDS_NEGATIVE_RESPONSE ||
		requestSid === undefined ||
		nrc === undefined
	) {
		return `Invalid negative response: ${formatBytes(response)}`;
	}

	const nrcMessage = NRC_MESSAGES[nrc] ?? `Unknown NRC (${formatHex(nrc)})`;
	return `UDS negative response for service ${formatHex(requestSid)}: ${nrcMessage} (NRC ${formatHex(nrc)})`;
}

/**
 * Thrown by UdsClient when the server answers with a negative response
 */
export class UdsNegativeResponseError extends Error {
	readonly requestSid: number;
	readonly nrc: number;

	constructor(response: Uint8Array) {
		super(parseNegativeResponse(response));
		this.name = "UdsNegativeResponseError";
		this.requestSid = response[1] ?? 0;
		this.nrc = response[2] ?? 0;
	}
}
