/**
 * Status frame codec for the simulated battery and body controllers.
 *
 * Battery status (8 bytes):
 *   [0]    SOC, 0.5 % per count
 *   [1]    SOH, 1 % per count
 *   [2..3] pack voltage, u16 LE, 0.1 V per count
 *   [4..5] pack current, i16 LE, 0.1 A per count (positive = charging)
 *   [6]    temperature, 1 °C per count, offset -40
 *   [7]    status flags
 *
 * Door status (4 bytes):
 *   [0]    bits 0-3: open flags (FL, FR, RL, RR)
 *   [1]    bits 0-3: locked flags (FL, FR, RL, RR)
 *   [2..3] reserved, 0
 */

import { readScalar, writeScalar } from "@virtual-hil/core";

/** Standard frame identifiers on the simulated powertrain/body bus */
export const CAN_IDS = {
	BMS_STATUS: 0x100,
	BMS_CELL_DATA: 0x101,
	BMS_FAULT: 0x102,
	BDC_STATUS: 0x200,
	BDC_DOOR_POSITION: 0x201,
	BDC_LOCK_STATUS: 0x202,
} as const;

export const BATTERY_STATUS_LENGTH = 8;
export const DOOR_STATUS_LENGTH = 4;

export interface BatteryStatus {
	/** State of charge, % */
	soc: number;
	/** State of health, % */
	soh: number;
	/** Pack voltage, V */
	voltage: number;
	/** Pack current, A */
	current: number;
	/** Pack temperature, °C */
	temperature: number;
	flags: number;
}

export type BatteryStatusInput = Omit<BatteryStatus, "soh" | "flags"> &
	Partial<Pick<BatteryStatus, "soh" | "flags">>;

export const DOOR_POSITIONS = [
	"frontLeft",
	"frontRight",
	"rearLeft",
	"rearRight",
] as const;

export type DoorPosition = (typeof DOOR_POSITIONS)[number];

export interface DoorState {
	open: boolean;
	locked: boolean;
}

export type DoorStatus = Record<DoorPosition, DoorState>;

export type DoorStatusInput = Partial<Record<DoorPosition, Partial<DoorState>>>;

/**
 * Encode a battery status frame. Values outside a field's range saturate.
 */
export function encodeBatteryStatus(status: BatteryStatusInput): Uint8Array {
	const data = new Uint8Array(BATTERY_STATUS_LENGTH);
	writeScalar(data, 0, "u8", status.soc, { scale: 0.5 });
	writeScalar(data, 1, "u8", status.soh ?? 100);
	writeScalar(data, 2, "u16", status.voltage, { scale: 0.1 });
	writeScalar(data, 4, "i16", status.current, { scale: 0.1 });
	writeScalar(data, 6, "u8", status.temperature, { offset: -40 });
	writeScalar(data, 7, "u8", status.flags ?? 0);
	return data;
}

/**
 * Decode a battery status frame.
 *
 * @returns The decoded status, or undefined when fewer than 8 bytes are given
 */
export function decodeBatteryStatus(
	data: Uint8Array,
): BatteryStatus | undefined {
	if (data.length < BATTERY_STATUS_LENGTH) {
		return undefined;
	}

	return {
		soc: readScalar(data, 0, "u8", { scale: 0.5 }),
		soh: readScalar(data, 1, "u8"),
		voltage: readScalar(data, 2, "u16", { scale: 0.1 }),
		current: readScalar(data, 4, "i16", { scale: 0.1 }),
		temperature: readScalar(data, 6, "u8", { offset: -40 }),
		flags: readScalar(data, 7, "u8"),
	};
}

export function encodeDoorStatus(doors: DoorStatusInput): Uint8Array {
	const data = new Uint8Array(DOOR_STATUS_LENGTH);

	DOOR_POSITIONS.forEach((position, bit) => {
		const door = doors[position];
		if (door?.open) data[0] = (data[0] ?? 0) | (1 << bit);
		if (door?.locked) data[1] = (data[1] ?? 0) | (1 << bit);
	});

	return data;
}

/**
 * Decode a door status frame.
 *
 * @returns Per-door flags, or undefined when fewer than 4 bytes are given
 */
export function decodeDoorStatus(data: Uint8Array): DoorStatus | undefined {
	if (data.length < DOOR_STATUS_LENGTH) {
		return undefined;
	}

	const openBits = data[0] ?? 0;
	const lockBits = data[1] ?? 0;
	const stateAt = (bit: number): DoorState => ({
		open: (openBits & (1 << bit)) !== 0,
		locked: (lockBits & (1 << bit)) !== 0,
	});

	return {
		frontLeft: stateAt(0),
		frontRight: stateAt(1),
		rearLeft: stateAt(2),
		rearRight: stateAt(3),
	};
}
