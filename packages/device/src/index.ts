import type {
	BusStatistics,
	CanFrame,
	DeviceInfo,
	FrameListener,
} from "./types.js";

/**
 * A frame bus that producers transmit on and consumers subscribe to.
 *
 * Implementations:
 * - VirtualCanBus: in-process loopback with trace log and load estimate
 */
export interface FrameBus {
	readonly channel: string;
	readonly bitrate: number;

	/**
	 * Transmit a frame. Returns false, with no state change, when the
	 * payload cannot be carried.
	 */
	transmit(id: number, data: Uint8Array, extended?: boolean): boolean;

	/**
	 * Register a listener for one identifier or for the wildcard.
	 * Returns a function that removes the registration.
	 */
	subscribe(id: number, listener: FrameListener): () => void;
	unsubscribe(id: number, listener: FrameListener): void;

	statistics(): BusStatistics;
}

/**
 * An open request/response channel to a diagnostic server.
 * Used by protocol clients; the byte layout is protocol-specific.
 */
export interface DiagnosticConnection {
	readonly deviceInfo: DeviceInfo;

	/**
	 * Send a request and wait for the response bytes.
	 * A suppressed response resolves to an empty array.
	 */
	sendFrame(data: Uint8Array, timeoutMs?: number): Promise<Uint8Array>;

	close(): Promise<void>;
}

export * from "./status-codec.js";
export * from "./types.js";
