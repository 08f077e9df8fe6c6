import {
	createLogger,
	describeError,
	formatBytes,
	formatHex,
	type Logger,
	readScalar,
	splitU16BE,
} from "@virtual-hil/core";
import type { DtcRecord } from "@virtual-hil/device";
import { Mutex } from "async-mutex";
import { encodeDtc, isValidDtcCode } from "./dtc.js";
import {
	POSITIVE_RESPONSE_OFFSET,
	STANDARD_DIDS,
	SUPPRESS_POSITIVE_RESPONSE,
	UDS_DTC_REPORT_TYPES,
	UDS_NEGATIVE_RESPONSE,
	UDS_NRC,
	UDS_SERVICES,
	UDS_SESSION_TYPES,
	type UdsNrc,
	type UdsSessionType,
} from "./services.js";

/**
 * Outcome of one diagnostic request.
 *
 * A suppressed response is the TesterPresent case where the client asked
 * for no answer at all; it encodes to zero bytes.
 */
export type DiagnosticResponse =
	| { kind: "positive"; sid: number; data: Uint8Array }
	| { kind: "negative"; requestSid: number; nrc: UdsNrc }
	| { kind: "suppressed" };

/**
 * Handler for a RoutineControl routine id.
 * Throwing or rejecting answers the request with CONDITIONS_NOT_CORRECT.
 */
export type RoutineHandler = (
	controlType: number,
	params: Uint8Array,
) => Uint8Array | Promise<Uint8Array>;

export interface DiagnosticServerOptions {
	/** Name used in log output @default "VirtualECU" */
	ecuName?: string;
	logger?: Logger;
	/** Clock in ms used for the last-activity timestamp */
	now?: () => number;
	/**
	 * Longest wait for a routine handler, in ms. A routine still running
	 * after this answers CONDITIONS_NOT_CORRECT.
	 * @default 5000
	 */
	routineTimeoutMs?: number;
}

export const DEFAULT_ROUTINE_TIMEOUT_MS = 5_000;

/** Services the server answers; anything else is SERVICE_NOT_SUPPORTED */
const SUPPORTED_SERVICES = [
	UDS_SERVICES.DIAGNOSTIC_SESSION_CONTROL,
	UDS_SERVICES.READ_DATA_BY_IDENTIFIER,
	UDS_SERVICES.WRITE_DATA_BY_IDENTIFIER,
	UDS_SERVICES.READ_DTC_INFORMATION,
	UDS_SERVICES.CLEAR_DIAGNOSTIC_INFORMATION,
	UDS_SERVICES.SECURITY_ACCESS,
	UDS_SERVICES.ROUTINE_CONTROL,
	UDS_SERVICES.TESTER_PRESENT,
	UDS_SERVICES.CONTROL_DTC_SETTING,
] as const;

type SupportedServiceId = (typeof SUPPORTED_SERVICES)[number];

/**
 * A routine call left to finish after the request lock is released, so a
 * handler may call back into the server.
 */
interface DeferredResponse {
	kind: "deferred";
	complete: () => Promise<DiagnosticResponse>;
}

type ServiceHandler = (request: Uint8Array) => DiagnosticResponse | DeferredResponse;

const SUPPORTED_SERVICE_SET = new Set<number>(SUPPORTED_SERVICES);

function isSupportedService(sid: number): sid is SupportedServiceId {
	return SUPPORTED_SERVICE_SET.has(sid);
}

function sessionNameOf(value: number): string | undefined {
	for (const [name, type] of Object.entries(UDS_SESSION_TYPES)) {
		if (type === value) return name;
	}
	return undefined;
}

function isSessionType(value: number): value is UdsSessionType {
	return sessionNameOf(value) !== undefined;
}

const ascii = (text: string): Uint8Array => new TextEncoder().encode(text);

function positive(requestSid: number, data: ArrayLike<number>): DiagnosticResponse {
	return {
		kind: "positive",
		sid: requestSid + POSITIVE_RESPONSE_OFFSET,
		data: Uint8Array.from(data),
	};
}

function negative(requestSid: number, nrc: UdsNrc): DiagnosticResponse {
	return { kind: "negative", requestSid, nrc };
}

/**
 * Byte form of a response: `[sid, ...data]`, `[0x7F, requestSid, nrc]`,
 * or nothing for a suppressed response.
 */
export function encodeResponse(response: DiagnosticResponse): Uint8Array {
	switch (response.kind) {
		case "positive":
			return Uint8Array.of(response.sid, ...response.data);
		case "negative":
			return Uint8Array.of(
				UDS_NEGATIVE_RESPONSE,
				response.requestSid,
				response.nrc,
			);
		case "suppressed":
			return new Uint8Array(0);
	}
}

/**
 * Simulated UDS (ISO 14229) server.
 *
 * Owns the diagnostic session, data-identifier store, trouble-code store,
 * security level and routine registry of one virtual ECU. Requests are plain
 * byte buffers and never throw: every failure becomes a negative response.
 *
 * Requests are serialized: each one reads and changes server state under a
 * lock. Routine handlers are user code, so they run after the lock is
 * released and are bounded by `routineTimeoutMs`.
 *
 * @example
 * const server = new DiagnosticServer();
 * const response = await server.processRequest(new Uint8Array([0x10, 0x03]));
 * encodeResponse(response); // [0x50, 0x03, 0x00, 0x00]
 */
export class DiagnosticServer {
	readonly ecuName: string;

	private readonly logger: Logger;
	private readonly now: () => number;
	private readonly routineTimeoutMs: number;
	private readonly mutex = new Mutex();

	private readonly dataIdentifiers = new Map<number, Uint8Array>();
	private readonly dtcs = new Map<string, DtcRecord>();
	private readonly routines = new Map<number, RoutineHandler>();

	private currentSession: UdsSessionType = UDS_SESSION_TYPES.DEFAULT;
	private currentSecurityLevel = 0;
	private dtcSettingOn = true;
	private lastActivity = 0;
	private isRunning = false;

	/**
	 * Fixed dispatch table. Adding a service to SUPPORTED_SERVICES without a
	 * handler here is a compile error.
	 */
	private readonly handlers: Record<SupportedServiceId, ServiceHandler> = {
		[UDS_SERVICES.DIAGNOSTIC_SESSION_CONTROL]: (r) => this.sessionControl(r),
		[UDS_SERVICES.READ_DATA_BY_IDENTIFIER]: (r) => this.readDataById(r),
		[UDS_SERVICES.WRITE_DATA_BY_IDENTIFIER]: (r) => this.writeDataById(r),
		[UDS_SERVICES.READ_DTC_INFORMATION]: (r) => this.readDtcInformation(r),
		[UDS_SERVICES.CLEAR_DIAGNOSTIC_INFORMATION]: () => this.clearAllDtcs(),
		[UDS_SERVICES.SECURITY_ACCESS]: (r) => this.securityAccess(r),
		[UDS_SERVICES.ROUTINE_CONTROL]: (r) => this.routineControl(r),
		[UDS_SERVICES.TESTER_PRESENT]: (r) => this.testerPresent(r),
		[UDS_SERVICES.CONTROL_DTC_SETTING]: (r) => this.controlDtcSetting(r),
	};

	constructor(options: DiagnosticServerOptions = {}) {
		this.ecuName = options.ecuName ?? "VirtualECU";
		this.logger = options.logger ?? createLogger("DiagnosticServer");
		this.now = options.now ?? Date.now;
		this.routineTimeoutMs = options.routineTimeoutMs ?? DEFAULT_ROUTINE_TIMEOUT_MS;

		this.dataIdentifiers.set(
			STANDARD_DIDS.ECU_SERIAL_NUMBER,
			ascii("Virtual ECU v1.0"),
		);
		this.dataIdentifiers.set(STANDARD_DIDS.HARDWARE_NUMBER, ascii("VIRTECU"));
		this.dataIdentifiers.set(STANDARD_DIDS.SOFTWARE_VERSION, ascii("1.0.0"));
		this.dataIdentifiers.set(
			STANDARD_DIDS.SUPPLIER,
			ascii("Virtual HIL Framework"),
		);
		this.dataIdentifiers.set(STANDARD_DIDS.SESSION_STATUS, Uint8Array.of(0x01));
	}

	// ── State ────────────────────────────────────────────────────────────────

	get session(): UdsSessionType {
		return this.currentSession;
	}

	get securityLevel(): number {
		return this.currentSecurityLevel;
	}

	get dtcSettingEnabled(): boolean {
		return this.dtcSettingOn;
	}

	/**
	 * Time of the last request other than TesterPresent, or of the last
	 * TesterPresent. Observational only: no session timeout is enforced.
	 */
	get lastActivityAt(): number {
		return this.lastActivity;
	}

	get running(): boolean {
		return this.isRunning;
	}

	start(): void {
		this.isRunning = true;
		this.lastActivity = this.now();
		this.logger.info(`Diagnostic server started for ${this.ecuName}`);
	}

	stop(): void {
		this.isRunning = false;
		this.logger.info(`Diagnostic server stopped for ${this.ecuName}`);
	}

	// ── Request processing ───────────────────────────────────────────────────

	/**
	 * Process one raw request.
	 *
	 * @param request - `[sid, ...service bytes]`
	 * @returns The typed response; pass it to encodeResponse() for bytes
	 */
	async processRequest(request: Uint8Array): Promise<DiagnosticResponse> {
		const outcome = await this.mutex.runExclusive(() => this.dispatch(request));
		return outcome.kind === "deferred" ? outcome.complete() : outcome;
	}

	private dispatch(request: Uint8Array): DiagnosticResponse | DeferredResponse {
		const sid = request[0];
		if (sid === undefined) {
			return negative(0x00, UDS_NRC.GENERAL_REJECT);
		}

		if (sid !== UDS_SERVICES.TESTER_PRESENT) {
			this.lastActivity = this.now();
		}

		if (!isSupportedService(sid)) {
			return negative(sid, UDS_NRC.SERVICE_NOT_SUPPORTED);
		}

		try {
			return this.handlers[sid](request);
		} catch (error) {
			this.logger.error(
				`Error processing request ${formatHex(sid)}: ${describeError(error)}`,
			);
			return negative(sid, UDS_NRC.GENERAL_REJECT);
		}
	}

	// ── Services ─────────────────────────────────────────────────────────────

	// 0x10 DiagnosticSessionControl: [0x10, session] → [0x50, session, P2, P2*]
	private sessionControl(request: Uint8Array): DiagnosticResponse {
		const sid = UDS_SERVICES.DIAGNOSTIC_SESSION_CONTROL;
		const sessionType = request[1];
		if (sessionType === undefined) {
			return negative(sid, UDS_NRC.INVALID_KEY);
		}
		if (!isSessionType(sessionType)) {
			return negative(sid, UDS_NRC.SUB_FUNCTION_NOT_SUPPORTED);
		}

		this.currentSession = sessionType;
		this.logger.info(`Session changed to ${sessionNameOf(sessionType)}`);
		// Timing parameters are fixed at zero
		return positive(sid, [sessionType, 0x00, 0x00]);
	}

	// 0x22 ReadDataByIdentifier: [0x22, (hi, lo)+] → [0x62, (hi, lo, ...value)+]
	private readDataById(request: Uint8Array): DiagnosticResponse {
		const sid = UDS_SERVICES.READ_DATA_BY_IDENTIFIER;
		if (request.length < 3) {
			return negative(sid, UDS_NRC.INVALID_KEY);
		}

		const data: number[] = [];
		// A trailing odd byte is not an identifier
		for (let offset = 1; offset + 1 < request.length; offset += 2) {
			const did = readScalar(request, offset, "u16", { endian: "be" });
			const value = this.dataIdentifiers.get(did);
			if (value === undefined) {
				// First miss ends the read: positive, identifier only, no value
				return positive(sid, splitU16BE(did));
			}
			data.push(...splitU16BE(did), ...value);
		}
		return positive(sid, data);
	}

	// 0x2E WriteDataByIdentifier: [0x2E, hi, lo, ...value] → [0x6E, hi, lo]
	private writeDataById(request: Uint8Array): DiagnosticResponse {
		const sid = UDS_SERVICES.WRITE_DATA_BY_IDENTIFIER;
		if (request.length < 3) {
			return negative(sid, UDS_NRC.INVALID_KEY);
		}

		const did = readScalar(request, 1, "u16", { endian: "be" });
		const value = request.slice(3);
		this.dataIdentifiers.set(did, value);
		this.logger.info(`Wrote DID ${formatHex(did, 4)}: ${formatBytes(value)}`);

		return positive(sid, splitU16BE(did));
	}

	// 0x19 ReadDTCInformation
	private readDtcInformation(request: Uint8Array): DiagnosticResponse {
		const sid = UDS_SERVICES.READ_DTC_INFORMATION;
		const reportType = request[1];
		if (reportType === undefined) {
			return negative(sid, UDS_NRC.INVALID_KEY);
		}

		switch (reportType) {
			case UDS_DTC_REPORT_TYPES.BY_STATUS_MASK: {
				// [0x59, 0x02, 0x00, (dtc0, dtc1, dtc2, status)*]; the mask is not echoed
				const data: number[] = [reportType, 0x00];
				for (const dtc of this.dtcs.values()) {
					data.push(...encodeDtc(dtc.code), dtc.status);
				}
				return positive(sid, data);
			}
			case UDS_DTC_REPORT_TYPES.SUPPORTED_DTCS:
				// Every status bit is supported
				return positive(sid, [reportType, 0x00, 0x00, 0xff]);
			default:
				return negative(sid, UDS_NRC.SUB_FUNCTION_NOT_SUPPORTED);
		}
	}

	// 0x14 ClearDiagnosticInformation: always clears every group
	private clearAllDtcs(): DiagnosticResponse {
		const sid = UDS_SERVICES.CLEAR_DIAGNOSTIC_INFORMATION;
		if (!this.dtcSettingOn) {
			return negative(sid, UDS_NRC.CONDITIONS_NOT_CORRECT);
		}

		this.dtcs.clear();
		this.logger.info("All DTCs cleared");
		return positive(sid, [0x00, 0x00]);
	}

	// 0x27 SecurityAccess: odd sub-function requests a seed, even sends a key
	private securityAccess(request: Uint8Array): DiagnosticResponse {
		const sid = UDS_SERVICES.SECURITY_ACCESS;
		const subFunction = request[1];
		if (subFunction === undefined) {
			return negative(sid, UDS_NRC.INVALID_KEY);
		}

		if (subFunction % 2 === 1) {
			// Fixed seed so test runs are reproducible
			return positive(sid, [subFunction, 0x01, 0x02, 0x03, 0x04]);
		}

		// The key is accepted without checking it against the seed
		this.currentSecurityLevel = subFunction / 2;
		this.logger.debug(`Security level ${this.currentSecurityLevel} unlocked`);
		return positive(sid, [subFunction]);
	}

	// 0x31 RoutineControl: [0x31, control, hi, lo, ...params] → [0x71, control, hi, lo, ...result]
	private routineControl(request: Uint8Array): DiagnosticResponse | DeferredResponse {
		const sid = UDS_SERVICES.ROUTINE_CONTROL;
		const controlType = request[1];
		if (controlType === undefined || request.length < 4) {
			return negative(sid, UDS_NRC.INVALID_KEY);
		}

		const routineId = readScalar(request, 2, "u16", { endian: "be" });
		const handler = this.routines.get(routineId);
		if (!handler) {
			return negative(sid, UDS_NRC.REQUEST_SEQUENCE_ERROR);
		}

		const params = request.slice(4);
		return {
			kind: "deferred",
			complete: async () => {
				try {
					const result = await this.runRoutine(handler, controlType, params);
					return positive(sid, [controlType, ...splitU16BE(routineId), ...result]);
				} catch (error) {
					this.logger.error(
						`Routine ${formatHex(routineId, 4)} failed: ${describeError(error)}`,
					);
					return negative(sid, UDS_NRC.CONDITIONS_NOT_CORRECT);
				}
			},
		};
	}

	private async runRoutine(
		handler: RoutineHandler,
		controlType: number,
		params: Uint8Array,
	): Promise<Uint8Array> {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(
				() => reject(new Error(`timed out after ${this.routineTimeoutMs} ms`)),
				this.routineTimeoutMs,
			);
		});

		try {
			// A synchronous throw is caught here too
			return await Promise.race([
				Promise.resolve().then(() => handler(controlType, params)),
				timeout,
			]);
		} finally {
			clearTimeout(timer);
		}
	}

	// 0x3E TesterPresent: [0x3E, 0x80] asks for no response at all
	private testerPresent(request: Uint8Array): DiagnosticResponse {
		this.lastActivity = this.now();
		if (request[1] === SUPPRESS_POSITIVE_RESPONSE) {
			return { kind: "suppressed" };
		}
		return positive(UDS_SERVICES.TESTER_PRESENT, [0x00]);
	}

	// 0x85 ControlDTCSetting: zero turns the gate off, anything else on
	private controlDtcSetting(request: Uint8Array): DiagnosticResponse {
		const sid = UDS_SERVICES.CONTROL_DTC_SETTING;
		const setting = request[1];
		if (setting === undefined) {
			return negative(sid, UDS_NRC.INVALID_KEY);
		}

		this.dtcSettingOn = setting !== 0;
		this.logger.info(`DTC setting: ${this.dtcSettingOn ? "ON" : "OFF"}`);
		return positive(sid, [setting]);
	}

	// ── Fixture surface ──────────────────────────────────────────────────────

	/**
	 * Store a trouble code, replacing any record with the same code.
	 *
	 * @param code - Domain letter and four hex digits, e.g. "P0171"
	 * @param status - DTC status byte @default 0x01
	 * @param snapshot - Free-form freeze-frame data kept with the record
	 * @throws Error if the code is not well formed
	 */
	storeDtc(
		code: string,
		status = 0x01,
		snapshot?: Record<string, unknown>,
	): void {
		if (!isValidDtcCode(code)) {
			throw new Error(
				`Invalid DTC code "${code}": expected a P, B, C or U followed by four hex digits`,
			);
		}

		const normalized = code.toUpperCase();
		this.dtcs.set(normalized, {
			code: normalized,
			status: status & 0xff,
			...(snapshot === undefined ? {} : { snapshot: { ...snapshot } }),
		});
		this.logger.warn(`DTC stored: ${normalized}`);
	}

	/** Remove one trouble code; unknown codes are ignored */
	clearDtc(code: string): void {
		const normalized = code.toUpperCase();
		if (this.dtcs.delete(normalized)) {
			this.logger.info(`DTC cleared: ${normalized}`);
		}
	}

	hasDtc(code: string): boolean {
		return this.dtcs.has(code.toUpperCase());
	}

	/** Stored trouble codes in the order they were first stored */
	listDtcs(): DtcRecord[] {
		return Array.from(this.dtcs.values(), (dtc) => ({ ...dtc }));
	}

	registerRoutine(routineId: number, handler: RoutineHandler): void {
		this.routines.set(routineId, handler);
	}

	unregisterRoutine(routineId: number): void {
		this.routines.delete(routineId);
	}

	setDataIdentifier(did: number, value: Uint8Array): void {
		this.dataIdentifiers.set(did, Uint8Array.from(value));
	}

	getDataIdentifier(did: number): Uint8Array | undefined {
		const value = this.dataIdentifiers.get(did);
		return value && Uint8Array.from(value);
	}
}
