/**
 * Trace exporters for offline analysis of a bus capture
 */

import { formatBytes } from "@virtual-hil/core";
import type { CanFrame } from "@virtual-hil/device";

function formatId(frame: CanFrame): string {
	return frame.id
		.toString(16)
		.toUpperCase()
		.padStart(frame.extended ? 8 : 3, "0");
}

function formatSeconds(timestampMs: number): string {
	return (timestampMs / 1000).toFixed(6);
}

/**
 * Render frames in the candump log format, one line per frame.
 *
 * @example
 * formatCandump(bus.traceLog(), "virtual0");
 * // "(1700000000.000000) virtual0 100#AB64A00F83FF4100"
 */
export function formatCandump(frames: Iterable<CanFrame>, channel: string): string {
	const lines: string[] = [];
	for (const frame of frames) {
		lines.push(
			`(${formatSeconds(frame.timestamp)}) ${channel} ${formatId(frame)}#${formatBytes(frame.data, "")}`,
		);
	}
	return lines.join("\n");
}

/**
 * Render frames as CSV with a header row.
 * Timestamps are in seconds; ids and payloads are uppercase hex.
 */
export function formatTraceCsv(frames: Iterable<CanFrame>, channel: string): string {
	const rows = ["timestamp,channel,id,dlc,data,extended"];
	for (const frame of frames) {
		rows.push(
			[
				formatSeconds(frame.timestamp),
				channel,
				formatId(frame),
				frame.length,
				formatBytes(frame.data, ""),
				frame.extended,
			].join(","),
		);
	}
	return rows.join("\n");
}
