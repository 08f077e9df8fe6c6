import { formatBytes, formatHex } from "@virtual-hil/core";
import type {
	DiagnosticConnection,
	DtcRecord,
	EcuEvent,
} from "@virtual-hil/device";
import { parseDtcReport } from "./dtc.js";
import { UdsNegativeResponseError } from "./negative-response.js";
import {
	POSITIVE_RESPONSE_OFFSET,
	SUPPRESS_POSITIVE_RESPONSE,
	UDS_DTC_REPORT_TYPES,
	UDS_NEGATIVE_RESPONSE,
	UDS_SERVICES,
	type UdsSessionType,
} from "./services.js";

/** Every DTC group, as sent by ClearDiagnosticInformation */
const ALL_DTC_GROUPS = [0xff, 0xff, 0xff] as const;

export interface UdsClientOptions {
	/** Called at session changes, DTC clears and each security access step */
	onEvent?: (event: EcuEvent) => void;
	/**
	 * Security key derivation applied to the seed in unlock()
	 * @default xorSeedKey
	 */
	computeKey?: (seed: Uint8Array) => Uint8Array;
	/** Per-request timeout passed to the connection */
	timeoutMs?: number;
}

/**
 * Default key derivation: XOR each seed byte with 0xFF.
 * A stand-in for the ECU-specific algorithm.
 */
export function xorSeedKey(seed: Uint8Array): Uint8Array {
	return seed.map((b) => (b ^ 0xff) & 0xff);
}

/**
 * Tester-side UDS (ISO 14229) client.
 *
 * Builds requests, sends them over a DiagnosticConnection and unpacks the
 * positive responses. A negative response rejects with
 * UdsNegativeResponseError.
 *
 * @example
 * const client = new UdsClient(createLoopbackConnection(server));
 * await client.changeSession(UDS_SESSION_TYPES.EXTENDED_DIAGNOSTIC);
 * await client.unlock();
 * const dtcs = await client.readDtcs();
 */
export class UdsClient {
	private readonly onEvent: ((event: EcuEvent) => void) | undefined;
	private readonly computeKey: (seed: Uint8Array) => Uint8Array;
	private readonly timeoutMs: number | undefined;

	constructor(
		private readonly connection: DiagnosticConnection,
		options: UdsClientOptions = {},
	) {
		this.onEvent = options.onEvent;
		this.computeKey = options.computeKey ?? xorSeedKey;
		this.timeoutMs = options.timeoutMs;
	}

	/**
	 * DiagnosticSessionControl (0x10)
	 * Ref: ISO 14229-1 §9.2
	 */
	async changeSession(sessionType: UdsSessionType): Promise<void> {
		await this.request([UDS_SERVICES.DIAGNOSTIC_SESSION_CONTROL, sessionType]);
		this.emit("SESSION_CHANGED", { sessionType });
	}

	/**
	 * ReadDataByIdentifier (0x22) for a single identifier
	 *
	 * @returns The stored value; empty when the server has no value for it
	 */
	async readDataIdentifier(did: number): Promise<Uint8Array> {
		const response = await this.request([
			UDS_SERVICES.READ_DATA_BY_IDENTIFIER,
			(did >> 8) & 0xff,
			did & 0xff,
		]);
		return response.slice(3);
	}

	/**
	 * WriteDataByIdentifier (0x2E)
	 */
	async writeDataIdentifier(did: number, data: Uint8Array): Promise<void> {
		await this.request([
			UDS_SERVICES.WRITE_DATA_BY_IDENTIFIER,
			(did >> 8) & 0xff,
			did & 0xff,
			...data,
		]);
	}

	/**
	 * ReadDTCInformation (0x19), report DTCs by status mask
	 */
	async readDtcs(statusMask = 0xff): Promise<DtcRecord[]> {
		const response = await this.request([
			UDS_SERVICES.READ_DTC_INFORMATION,
			UDS_DTC_REPORT_TYPES.BY_STATUS_MASK,
			statusMask,
		]);
		return parseDtcReport(response);
	}

	/**
	 * ClearDiagnosticInformation (0x14) for every group
	 */
	async clearDtcs(): Promise<void> {
		await this.request([
			UDS_SERVICES.CLEAR_DIAGNOSTIC_INFORMATION,
			...ALL_DTC_GROUPS,
		]);
		this.emit("DTCS_CLEARED");
	}

	/**
	 * ControlDTCSetting (0x85). While off, the server refuses to clear DTCs.
	 */
	async controlDtcSetting(enabled: boolean): Promise<void> {
		await this.request([UDS_SERVICES.CONTROL_DTC_SETTING, enabled ? 0x01 : 0x00]);
	}

	/**
	 * SecurityAccess (0x27) requestSeed
	 *
	 * @param level - Odd requestSeed sub-function @default 0x01
	 * @returns Seed bytes
	 */
	async requestSeed(level = 0x01): Promise<Uint8Array> {
		assertSeedLevel(level);
		const response = await this.request([UDS_SERVICES.SECURITY_ACCESS, level]);
		// Response format: [0x67, level, seed...]
		return response.slice(2);
	}

	/**
	 * SecurityAccess (0x27) sendKey, using sub-function level + 1
	 */
	async sendKey(level: number, key: Uint8Array): Promise<void> {
		assertSeedLevel(level);
		await this.request([UDS_SERVICES.SECURITY_ACCESS, level + 1, ...key]);
	}

	/**
	 * Full seed/key handshake.
	 *
	 * Emits SECURITY_ACCESS_REQUESTED, then SECURITY_ACCESS_GRANTED or
	 * SECURITY_ACCESS_DENIED. A denied handshake rethrows the error.
	 *
	 * Ref: ISO 14229-1 §9.4, SecurityAccess seed/key mechanism
	 */
	async unlock(level = 0x01): Promise<void> {
		this.emit("SECURITY_ACCESS_REQUESTED", { level });

		try {
			const seed = await this.requestSeed(level);
			await this.sendKey(level, this.computeKey(seed));
		} catch (err) {
			this.emit("SECURITY_ACCESS_DENIED", {
				error: err instanceof Error ? err.message : String(err),
			});
			throw err;
		}

		this.emit("SECURITY_ACCESS_GRANTED", { level });
	}

	/**
	 * RoutineControl (0x31)
	 *
	 * @param routineId - 16-bit routine identifier
	 * @param controlType - 0x01 start, 0x02 stop, 0x03 request results @default 0x01
	 * @param params - Routine option bytes
	 * @returns Routine status bytes following the echoed header
	 */
	async routineControl(
		routineId: number,
		controlType = 0x01,
		params: Uint8Array = new Uint8Array(0),
	): Promise<Uint8Array> {
		const response = await this.request([
			UDS_SERVICES.ROUTINE_CONTROL,
			controlType,
			(routineId >> 8) & 0xff,
			routineId & 0xff,
			...params,
		]);
		// Response format: [0x71, controlType, idHi, idLo, result...]
		return response.slice(4);
	}

	/**
	 * TesterPresent (0x3E). With suppress set the server sends nothing back.
	 */
	async testerPresent(suppress = false): Promise<void> {
		const data = Uint8Array.of(
			UDS_SERVICES.TESTER_PRESENT,
			suppress ? SUPPRESS_POSITIVE_RESPONSE : 0x00,
		);
		if (suppress) {
			await this.connection.sendFrame(data, this.timeoutMs);
			return;
		}
		await this.request(data);
	}

	private async request(bytes: ArrayLike<number>): Promise<Uint8Array> {
		const data = Uint8Array.from(bytes);
		const sid = data[0] ?? 0;
		const response = await this.connection.sendFrame(data, this.timeoutMs);

		if (response[0] === UDS_NEGATIVE_RESPONSE) {
			throw new UdsNegativeResponseError(response);
		}
		if (response[0] !== sid + POSITIVE_RESPONSE_OFFSET) {
			throw new Error(
				`Unexpected response to service ${formatHex(sid)}: [${formatBytes(response)}]`,
			);
		}
		return response;
	}

	private emit(type: EcuEvent["type"], data?: unknown): void {
		this.onEvent?.({ type, timestamp: Date.now(), data });
	}
}

function assertSeedLevel(level: number): void {
	if (!Number.isInteger(level) || level < 1 || level > 0x7f || level % 2 === 0) {
		throw new Error(
			`Security access level must be an odd requestSeed sub-function (got ${level})`,
		);
	}
}
