export { UdsClient, type UdsClientOptions, xorSeedKey } from "./client.js";
export {
	DEFAULT_ROUTINE_TIMEOUT_MS,
	DiagnosticServer,
	type DiagnosticResponse,
	type DiagnosticServerOptions,
	encodeResponse,
	type RoutineHandler,
} from "./diagnostic-server.js";
export {
	type DtcDomain,
	decodeDtc,
	encodeDtc,
	isValidDtcCode,
	parseDtcReport,
} from "./dtc.js";
export { createLoopbackConnection } from "./loopback.js";
export {
	parseNegativeResponse,
	UdsNegativeResponseError,
} from "./negative-response.js";
export * from "./services.js";
