/**
 * UDS (ISO 14229) constants
 *
 * Ref: ISO 14229-1 §7 (services), Annex A.1 (negative response codes)
 */

/** Service identifiers */
export const UDS_SERVICES = {
	DIAGNOSTIC_SESSION_CONTROL: 0x10,
	ECU_RESET: 0x11,
	CLEAR_DIAGNOSTIC_INFORMATION: 0x14,
	READ_DTC_INFORMATION: 0x19,
	READ_DATA_BY_IDENTIFIER: 0x22,
	READ_MEMORY_BY_ADDRESS: 0x23,
	SECURITY_ACCESS: 0x27,
	COMMUNICATION_CONTROL: 0x28,
	WRITE_DATA_BY_IDENTIFIER: 0x2e,
	INPUT_OUTPUT_CONTROL_BY_IDENTIFIER: 0x2f,
	ROUTINE_CONTROL: 0x31,
	REQUEST_DOWNLOAD: 0x34,
	REQUEST_UPLOAD: 0x35,
	TRANSFER_DATA: 0x36,
	REQUEST_TRANSFER_EXIT: 0x37,
	WRITE_MEMORY_BY_ADDRESS: 0x3d,
	TESTER_PRESENT: 0x3e,
	CONTROL_DTC_SETTING: 0x85,
} as const;

export type UdsServiceId = (typeof UDS_SERVICES)[keyof typeof UDS_SERVICES];

/** Negative response codes */
export const UDS_NRC = {
	GENERAL_REJECT: 0x10,
	SERVICE_NOT_SUPPORTED: 0x11,
	SUB_FUNCTION_NOT_SUPPORTED: 0x12,
	INCORRECT_MESSAGE_LENGTH: 0x13,
	CONDITIONS_NOT_CORRECT: 0x22,
	REQUEST_SEQUENCE_ERROR: 0x24,
	REQUEST_OUT_OF_RANGE: 0x31,
	SECURITY_ACCESS_DENIED: 0x33,
	INVALID_KEY: 0x35,
	EXCEEDED_NUMBER_OF_ATTEMPTS: 0x36,
	REQUIRED_TIME_DELAY_NOT_EXPIRED: 0x37,
	UPLOAD_DOWNLOAD_NOT_ACCEPTED: 0x70,
	TRANSFER_DATA_SUSPENDED: 0x71,
	GENERAL_PROGRAMMING_FAILURE: 0x72,
	WRONG_BLOCK_SEQUENCE_COUNTER: 0x73,
	RESPONSE_PENDING: 0x78,
	SUB_FUNCTION_NOT_SUPPORTED_IN_ACTIVE_SESSION: 0x7e,
	SERVICE_NOT_SUPPORTED_IN_ACTIVE_SESSION: 0x7f,
} as const;

export type UdsNrc = (typeof UDS_NRC)[keyof typeof UDS_NRC];

/** DiagnosticSessionControl sub-functions */
export const UDS_SESSION_TYPES = {
	DEFAULT: 0x01,
	PROGRAMMING: 0x02,
	EXTENDED_DIAGNOSTIC: 0x03,
	SAFETY_SYSTEM: 0x04,
} as const;

export type UdsSessionType =
	(typeof UDS_SESSION_TYPES)[keyof typeof UDS_SESSION_TYPES];

/** ReadDTCInformation sub-functions handled by the server */
export const UDS_DTC_REPORT_TYPES = {
	BY_STATUS_MASK: 0x02,
	SUPPORTED_DTCS: 0x0a,
} as const;

/** First byte of every negative response */
export const UDS_NEGATIVE_RESPONSE = 0x7f;

/** Added to the request SID to form the positive response SID */
export const POSITIVE_RESPONSE_OFFSET = 0x40;

/** TesterPresent sub-function bit that asks the server not to answer */
export const SUPPRESS_POSITIVE_RESPONSE = 0x80;

/** Data identifiers seeded into every server */
export const STANDARD_DIDS = {
	ECU_SERIAL_NUMBER: 0xf10c,
	SESSION_STATUS: 0xf10b,
	HARDWARE_NUMBER: 0xf187,
	SUPPLIER: 0xf198,
	SOFTWARE_VERSION: 0xf19e,
} as const;
