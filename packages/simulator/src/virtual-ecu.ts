import { createLogger } from "@virtual-hil/core";
import type {
	BatteryStatusInput,
	BusStatistics,
	CanFrame,
	DiagnosticConnection,
	DoorStatusInput,
	DtcRecord,
} from "@virtual-hil/device";
import {
	createLoopbackConnection,
	DiagnosticServer,
	type RoutineHandler,
	UdsClient,
	type UdsClientOptions,
} from "@virtual-hil/device-protocol-uds";
import {
	formatCandump,
	formatTraceCsv,
	VirtualCanBus,
} from "@virtual-hil/device-transport-virtual-can";
import { parseConfig, type SimulatorConfig } from "./config.js";

export type TraceFormat = "candump" | "csv";

export interface VirtualEcuOptions {
	/** Clock in ms shared by the bus and the diagnostic server */
	now?: () => number;
}

/**
 * One simulated control unit: a virtual CAN bus and a UDS diagnostic server
 * built from a SimulatorConfig, plus the fixture surface tests use to drive
 * them into failure states.
 *
 * @example
 * const ecu = new VirtualEcu(loadConfig());
 * ecu.start();
 * ecu.storeDtc("P0171", 0x08);
 * const dtcs = await ecu.client().readDtcs();
 */
export class VirtualEcu {
	readonly config: SimulatorConfig;
	readonly bus: VirtualCanBus;
	readonly diagnostics: DiagnosticServer;

	private loopback: DiagnosticConnection | undefined;

	constructor(
		config: SimulatorConfig = parseConfig({}),
		options: VirtualEcuOptions = {},
	) {
		this.config = config;

		const { ecuName, logLevel, bus } = config;
		this.bus = new VirtualCanBus({
			channel: bus.channel,
			bitrate: bus.bitrate,
			traceCapacity: bus.traceCapacity,
			logger: createLogger(`${ecuName}:VirtualCanBus`, logLevel),
			now: options.now,
		});
		this.diagnostics = new DiagnosticServer({
			ecuName,
			logger: createLogger(`${ecuName}:DiagnosticServer`, logLevel),
			now: options.now,
		});

		for (const { did, value } of config.diagnostics.dataIdentifiers) {
			this.diagnostics.setDataIdentifier(did, value);
		}
		for (const { code, status } of config.diagnostics.dtcs) {
			this.diagnostics.storeDtc(code, status);
		}
	}

	get name(): string {
		return this.config.ecuName;
	}

	get running(): boolean {
		return this.bus.isRunning && this.diagnostics.running;
	}

	start(): void {
		this.bus.start();
		this.diagnostics.start();
	}

	/** Stop both components and close the loopback connection, if any */
	async stop(): Promise<void> {
		this.bus.stop();
		this.diagnostics.stop();
		if (this.loopback) {
			await this.loopback.close();
			this.loopback = undefined;
		}
	}

	// ── Diagnostics fixture ──────────────────────────────────────────────────

	storeDtc(code: string, status = 0x01, snapshot?: Record<string, unknown>): void {
		this.diagnostics.storeDtc(code, status, snapshot);
	}

	clearDtc(code: string): void {
		this.diagnostics.clearDtc(code);
	}

	listDtcs(): DtcRecord[] {
		return this.diagnostics.listDtcs();
	}

	registerRoutine(routineId: number, handler: RoutineHandler): void {
		this.diagnostics.registerRoutine(routineId, handler);
	}

	setDataIdentifier(did: number, value: Uint8Array): void {
		this.diagnostics.setDataIdentifier(did, value);
	}

	getDataIdentifier(did: number): Uint8Array | undefined {
		return this.diagnostics.getDataIdentifier(did);
	}

	/**
	 * Loopback connection to this ECU's diagnostic server.
	 * The same connection is returned until stop() closes it.
	 */
	connection(): DiagnosticConnection {
		this.loopback ??= createLoopbackConnection(this.diagnostics);
		return this.loopback;
	}

	/** UDS client talking to this ECU over connection() */
	client(options: UdsClientOptions = {}): UdsClient {
		return new UdsClient(this.connection(), options);
	}

	// ── Bus fixture ──────────────────────────────────────────────────────────

	sendBatteryStatus(status: BatteryStatusInput): boolean {
		return this.bus.sendBatteryStatus(status);
	}

	sendDoorStatus(doors: DoorStatusInput): boolean {
		return this.bus.sendDoorStatus(doors);
	}

	busStatistics(): BusStatistics {
		return this.bus.statistics();
	}

	traceLog(id?: number): CanFrame[] {
		return this.bus.traceLog(id);
	}

	clearTrace(): void {
		this.bus.clearLog();
	}

	/** Render the trace log, optionally filtered by identifier */
	exportTrace(format: TraceFormat, id?: number): string {
		const frames = this.bus.traceLog(id);
		switch (format) {
			case "candump":
				return formatCandump(frames, this.bus.channel);
			case "csv":
				return formatTraceCsv(frames, this.bus.channel);
		}
	}
}
