/**
 * Virtual CAN bus types and constants
 */

import type { Logger } from "@virtual-hil/core";

/** Registering under this identifier receives every frame */
export const WILDCARD_ID = 0xffffffff;

/** Classic CAN single-frame payload limit */
export const MAX_PAYLOAD_LENGTH = 8;

/** Standard-frame protocol overhead added to the payload bits */
export const FRAME_OVERHEAD_BITS = 47;

/** Trailing window used for the bus-load estimate */
export const BUS_LOAD_WINDOW_MS = 1000;

export const DEFAULT_TRACE_CAPACITY = 10_000;

/** Bounded size of the delivery-failure side channel */
export const DEFAULT_FAILURE_CAPACITY = 1_000;

/** Virtual bus configuration */
export interface VirtualBusOptions {
	/** Channel name reported in statistics and traces @default "virtual0" */
	channel?: string;
	/** Bus speed in bits per second @default 500000 */
	bitrate?: number;
	/** Maximum frames kept in the trace log @default 10000 */
	traceCapacity?: number;
	/** Maximum delivery failures kept @default 1000 */
	failureCapacity?: number;
	logger?: Logger;
	/** Clock in ms; frames are stamped with it and bus load is measured against it */
	now?: () => number;
}
