export interface DeviceInfo {
	id: string;
	name: string; // e.g. "VirtualECU (loopback)"
	transportName: string; // e.g. "loopback"
	connected: boolean;
}

/**
 * A single addressed message on a frame bus.
 *
 * Frames are immutable once built; every consumer gets its own payload copy.
 */
export interface CanFrame {
	/** 11-bit standard or 29-bit extended identifier */
	readonly id: number;
	/** Payload bytes (0-8) */
	readonly data: Uint8Array;
	/** Data length code, always equal to data.length */
	readonly length: number;
	/** Capture time in ms since the epoch */
	readonly timestamp: number;
	readonly extended: boolean;
}

export type DeliveryResult = { ok: true } | { ok: false; reason: string };

/**
 * Called synchronously for every delivered frame. A listener reports failure
 * either by returning `{ ok: false }` or by throwing; both are recorded and
 * neither stops delivery to the remaining listeners.
 */
export type FrameListener = (frame: CanFrame) => DeliveryResult | void;

export interface DeliveryFailure {
	/** Identifier of the frame being delivered */
	id: number;
	/** Identifier the failing listener was registered under */
	subscribedId: number;
	/** Position of the listener within its registration list */
	listenerIndex: number;
	reason: string;
	timestamp: number;
}

export interface BusStatistics {
	txCount: number;
	/** Always 0 on a loopback bus; send and deliver are one path */
	rxCount: number;
	/** Percent of bit-rate used by frames seen in the trailing second */
	busLoad: number;
	channel: string;
	bitrate: number;
}

export type EcuEventType =
	| "SESSION_CHANGED"
	| "SECURITY_ACCESS_REQUESTED"
	| "SECURITY_ACCESS_GRANTED"
	| "SECURITY_ACCESS_DENIED"
	| "DTCS_CLEARED";

export interface EcuEvent {
	type: EcuEventType;
	timestamp: number;
	data?: unknown;
}

export interface DtcRecord {
	code: string; // e.g. "P0171"
	status: number;
	snapshot?: Record<string, unknown>;
}
