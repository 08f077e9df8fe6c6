/**
 * In-process loopback CAN bus for hardware-in-the-loop tests
 *
 * Transmitting a frame records it in a bounded trace log and hands a copy to
 * every listener registered for its identifier, then to every wildcard
 * listener, synchronously and in registration order.
 */

import {
	createLogger,
	describeError,
	formatBytes,
	formatHex,
	type Logger,
} from "@virtual-hil/core";
import {
	type BatteryStatusInput,
	type BusStatistics,
	CAN_IDS,
	type CanFrame,
	type DeliveryFailure,
	type DoorStatusInput,
	encodeBatteryStatus,
	encodeDoorStatus,
	type FrameBus,
	type FrameListener,
} from "@virtual-hil/device";
import { cloneFrame, createFrame, frameBits } from "./frame.js";
import { RingBuffer } from "./ring-buffer.js";
import {
	BUS_LOAD_WINDOW_MS,
	DEFAULT_FAILURE_CAPACITY,
	DEFAULT_TRACE_CAPACITY,
	MAX_PAYLOAD_LENGTH,
	type VirtualBusOptions,
	WILDCARD_ID,
} from "./types.js";

export class VirtualCanBus implements FrameBus {
	readonly channel: string;
	readonly bitrate: number;

	private readonly logger: Logger;
	private readonly now: () => number;
	private readonly listeners = new Map<number, FrameListener[]>();
	private readonly trace: RingBuffer<CanFrame>;
	private readonly failures: RingBuffer<DeliveryFailure>;
	private readonly pendingWaits = new Set<AbortController>();

	private txCount = 0;
	private readonly rxCount = 0;
	private running = false;

	constructor(options: VirtualBusOptions = {}) {
		const bitrate = options.bitrate ?? 500_000;
		if (!Number.isFinite(bitrate) || bitrate <= 0) {
			throw new Error(`Bitrate must be a positive number (got ${bitrate})`);
		}

		this.channel = options.channel ?? "virtual0";
		this.bitrate = bitrate;
		this.logger = options.logger ?? createLogger("VirtualCanBus");
		this.now = options.now ?? Date.now;
		this.trace = new RingBuffer<CanFrame>(
			options.traceCapacity ?? DEFAULT_TRACE_CAPACITY,
		);
		this.failures = new RingBuffer<DeliveryFailure>(
			options.failureCapacity ?? DEFAULT_FAILURE_CAPACITY,
		);
	}

	get isRunning(): boolean {
		return this.running;
	}

	start(): void {
		this.running = true;
		this.logger.info(
			`CAN interface started on ${this.channel} at ${this.bitrate} bps`,
		);
	}

	/**
	 * Stop the bus. Outstanding awaitFrame() calls resolve to null immediately.
	 */
	stop(): void {
		this.running = false;
		for (const controller of this.pendingWaits) {
			controller.abort();
		}
		this.pendingWaits.clear();
		this.logger.info(`CAN interface stopped on ${this.channel}`);
	}

	/**
	 * Transmit a frame and deliver it to listeners.
	 *
	 * @param id - Frame identifier
	 * @param data - Payload (0-8 bytes)
	 * @param extended - Whether the identifier is a 29-bit extended id
	 * @returns false when the payload is too long; nothing is recorded then
	 */
	transmit(id: number, data: Uint8Array, extended = false): boolean {
		if (data.length > MAX_PAYLOAD_LENGTH) {
			this.logger.error(
				`Payload too long for ${formatHex(id, 3)}: ${data.length} bytes`,
			);
			return false;
		}

		const frame = createFrame({ id, data, timestamp: this.now(), extended });

		this.txCount++;
		this.trace.push(frame);
		this.logger.debug(
			`TX ${formatHex(id, 3)} [${frame.length}] ${formatBytes(frame.data)}`,
		);

		this.deliver(frame, id);
		if (id !== WILDCARD_ID) {
			this.deliver(frame, WILDCARD_ID);
		}

		return true;
	}

	/** Transmit an encoded battery status frame on CAN_IDS.BMS_STATUS */
	sendBatteryStatus(status: BatteryStatusInput): boolean {
		return this.transmit(CAN_IDS.BMS_STATUS, encodeBatteryStatus(status));
	}

	/** Transmit an encoded door status frame on CAN_IDS.BDC_STATUS */
	sendDoorStatus(doors: DoorStatusInput): boolean {
		return this.transmit(CAN_IDS.BDC_STATUS, encodeDoorStatus(doors));
	}

	/**
	 * Register a listener for an identifier, or for WILDCARD_ID to see all frames.
	 *
	 * @returns A function that removes this registration
	 */
	subscribe(id: number, listener: FrameListener): () => void {
		const registered = this.listeners.get(id);
		if (registered) {
			registered.push(listener);
		} else {
			this.listeners.set(id, [listener]);
		}
		return () => this.unsubscribe(id, listener);
	}

	unsubscribe(id: number, listener: FrameListener): void {
		const registered = this.listeners.get(id);
		if (!registered) return;

		const index = registered.indexOf(listener);
		if (index === -1) return;

		registered.splice(index, 1);
		if (registered.length === 0) {
			this.listeners.delete(id);
		}
	}

	/**
	 * Pull-style receive.
	 *
	 * The bus is push-only: frames reach consumers through subscribe() at
	 * transmit time. This wait is not fed by delivery; it resolves to null
	 * after the timeout, or as soon as the bus is stopped.
	 */
	awaitFrame(timeoutMs = 1000): Promise<CanFrame | null> {
		return new Promise((resolve) => {
			const controller = new AbortController();
			this.pendingWaits.add(controller);

			const finish = (): void => {
				clearTimeout(timer);
				this.pendingWaits.delete(controller);
				resolve(null);
			};

			const timer = setTimeout(finish, timeoutMs);
			controller.signal.addEventListener("abort", finish, { once: true });
		});
	}

	/**
	 * Counters, channel configuration and a bus-load estimate recomputed
	 * from the frames of the trailing second.
	 */
	statistics(): BusStatistics {
		return {
			txCount: this.txCount,
			rxCount: this.rxCount,
			busLoad: this.computeBusLoad(),
			channel: this.channel,
			bitrate: this.bitrate,
		};
	}

	/**
	 * Frames in arrival order, oldest first.
	 *
	 * @param id - Only return frames with this identifier
	 */
	traceLog(id?: number): CanFrame[] {
		const frames: CanFrame[] = [];
		for (const frame of this.trace) {
			if (id === undefined || frame.id === id) {
				frames.push(cloneFrame(frame));
			}
		}
		return frames;
	}

	/** Empty the trace log. Counters are left as they are. */
	clearLog(): void {
		this.trace.clear();
	}

	/** Listener failures recorded during delivery, oldest first */
	deliveryFailures(): DeliveryFailure[] {
		return this.failures.toArray();
	}

	private deliver(frame: CanFrame, subscribedId: number): void {
		const registered = this.listeners.get(subscribedId);
		if (!registered) return;

		// Snapshot so listeners may (un)subscribe during delivery
		for (const [listenerIndex, listener] of [...registered].entries()) {
			let reason: string | undefined;
			try {
				const result = listener(cloneFrame(frame));
				if (typeof result === "object" && !result.ok) {
					reason = result.reason;
				}
			} catch (error) {
				reason = describeError(error);
			}

			if (reason !== undefined) {
				this.recordFailure(frame, subscribedId, listenerIndex, reason);
			}
		}
	}

	private recordFailure(
		frame: CanFrame,
		subscribedId: number,
		listenerIndex: number,
		reason: string,
	): void {
		this.failures.push({
			id: frame.id,
			subscribedId,
			listenerIndex,
			reason,
			timestamp: this.now(),
		});

		const scope =
			subscribedId === WILDCARD_ID ? "Wildcard listener" : "Listener";
		this.logger.error(`${scope} failed for ${formatHex(frame.id, 3)}: ${reason}`);
	}

	private computeBusLoad(): number {
		const now = this.now();
		let bits = 0;
		for (const frame of this.trace.newestWhile(
			(f) => now - f.timestamp < BUS_LOAD_WINDOW_MS,
		)) {
			bits += frameBits(frame);
		}
		return (bits / this.bitrate) * 100;
	}
}
