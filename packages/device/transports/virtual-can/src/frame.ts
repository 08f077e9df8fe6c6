import type { CanFrame } from "@virtual-hil/device";
import { FRAME_OVERHEAD_BITS, MAX_PAYLOAD_LENGTH } from "./types.js";

export interface FrameInit {
	id: number;
	data: Uint8Array;
	/** Declared length; corrected to data.length when it disagrees */
	length?: number;
	timestamp: number;
	extended?: boolean;
}

/**
 * Build an immutable frame that owns a private copy of its payload.
 *
 * @throws Error if the payload is longer than 8 bytes
 */
export function createFrame(init: FrameInit): CanFrame {
	if (init.data.length > MAX_PAYLOAD_LENGTH) {
		throw new Error(
			`CAN payload exceeds maximum length of ${MAX_PAYLOAD_LENGTH} bytes (got ${init.data.length})`,
		);
	}

	return Object.freeze({
		id: init.id,
		data: Uint8Array.from(init.data),
		length: init.data.length,
		timestamp: init.timestamp,
		extended: init.extended ?? false,
	});
}

/**
 * Copy a frame so the receiver cannot alter bytes seen by anyone else
 */
export function cloneFrame(frame: CanFrame): CanFrame {
	return createFrame(frame);
}

/**
 * Bits a frame occupies on the wire: payload plus standard-frame overhead
 */
export function frameBits(frame: CanFrame): number {
	return frame.length * 8 + FRAME_OVERHEAD_BITS;
}
