import { createLogger, type Logger } from "@virtual-hil/core";
import {
	CAN_IDS,
	type CanFrame,
	decodeBatteryStatus,
} from "@virtual-hil/device";
import { afterEach, describe, expect, it, vi } from "vitest";
import { VirtualCanBus, WILDCARD_ID } from "../src/index.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

function makeMockLogger(): Logger {
	return {
		scope: "test",
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}

function makeBus(now: () => number = () => 1_000): VirtualCanBus {
	return new VirtualCanBus({ logger: createLogger("test", "silent"), now });
}

// ── Tests ────────────────────────────────────────────────────────────────────

describe("VirtualCanBus", () => {
	describe("constructor", () => {
		it("defaults to virtual0 at 500 kbps", () => {
			const stats = makeBus().statistics();
			expect(stats.channel).toBe("virtual0");
			expect(stats.bitrate).toBe(500_000);
		});

		it("rejects a non-positive bitrate", () => {
			expect(() => new VirtualCanBus({ bitrate: 0 })).toThrow(
				"Bitrate must be a positive number (got 0)",
			);
		});

		it("rejects a zero trace capacity", () => {
			expect(() => new VirtualCanBus({ traceCapacity: 0 })).toThrow(
				"Ring buffer capacity must be a positive integer (got 0)",
			);
		});
	});

	// ── transmit ─────────────────────────────────────────────────────────────

	describe("transmit()", () => {
		it("fails a 9-byte payload and leaves the counters and trace untouched", () => {
			const bus = makeBus();
			const listener = vi.fn();
			bus.subscribe(0x123, listener);

			expect(bus.transmit(0x123, new Uint8Array(9))).toBe(false);
			expect(bus.statistics().txCount).toBe(0);
			expect(bus.traceLog()).toEqual([]);
			expect(listener).not.toHaveBeenCalled();
		});

		it("accepts an empty payload", () => {
			const bus = makeBus();
			expect(bus.transmit(0x7df, new Uint8Array(0))).toBe(true);
			expect(bus.traceLog()[0]?.length).toBe(0);
		});

		it("stamps frames with the injected clock", () => {
			const bus = makeBus(() => 42);
			bus.transmit(0x100, new Uint8Array([1]), true);

			const [frame] = bus.traceLog();
			expect(frame).toMatchObject({
				id: 0x100,
				length: 1,
				timestamp: 42,
				extended: true,
			});
		});

		it("counts every successful transmit", () => {
			const bus = makeBus();
			bus.transmit(0x100, new Uint8Array([1]));
			bus.transmit(0x200, new Uint8Array([2]));
			bus.transmit(0x300, new Uint8Array(12));

			const stats = bus.statistics();
			expect(stats.txCount).toBe(2);
			expect(stats.rxCount).toBe(0);
		});
	});

	// ── Delivery ─────────────────────────────────────────────────────────────

	describe("delivery", () => {
		it("calls exact-id listeners in registration order, then wildcard listeners", () => {
			const bus = makeBus();
			const calls: string[] = [];
			bus.subscribe(WILDCARD_ID, () => {
				calls.push("wildcard");
			});
			bus.subscribe(0x100, () => {
				calls.push("first");
			});
			bus.subscribe(0x100, () => {
				calls.push("second");
			});
			bus.subscribe(0x200, () => {
				calls.push("other");
			});

			bus.transmit(0x100, new Uint8Array([0xaa]));

			expect(calls).toEqual(["first", "second", "wildcard"]);
		});

		it("delivers before transmit returns", () => {
			const bus = makeBus();
			const received: CanFrame[] = [];
			bus.subscribe(0x100, (frame) => {
				received.push(frame);
			});

			bus.transmit(0x100, new Uint8Array([1, 2, 3]));

			expect(received).toHaveLength(1);
			expect(Array.from(received[0]?.data ?? [])).toEqual([1, 2, 3]);
		});

		it("gives each listener its own payload copy", () => {
			const bus = makeBus();
			const payload = new Uint8Array([1, 2, 3]);
			let second: CanFrame | undefined;
			bus.subscribe(0x100, (frame) => {
				frame.data[0] = 0xff;
			});
			bus.subscribe(0x100, (frame) => {
				second = frame;
			});

			bus.transmit(0x100, payload);
			payload[1] = 0xee;

			expect(Array.from(second?.data ?? [])).toEqual([1, 2, 3]);
			expect(Array.from(bus.traceLog()[0]?.data ?? [])).toEqual([1, 2, 3]);
		});

		it("keeps delivering after a listener throws or reports failure", () => {
			const logger = makeMockLogger();
			const bus = new VirtualCanBus({ logger, now: () => 5 });
			const last = vi.fn();
			bus.subscribe(0x100, () => {
				throw new Error("boom");
			});
			bus.subscribe(0x100, () => ({ ok: false, reason: "queue full" }));
			bus.subscribe(0x100, last);

			expect(bus.transmit(0x100, new Uint8Array([1]))).toBe(true);

			expect(last).toHaveBeenCalledTimes(1);
			expect(bus.deliveryFailures()).toEqual([
				{
					id: 0x100,
					subscribedId: 0x100,
					listenerIndex: 0,
					reason: "boom",
					timestamp: 5,
				},
				{
					id: 0x100,
					subscribedId: 0x100,
					listenerIndex: 1,
					reason: "queue full",
					timestamp: 5,
				},
			]);
			expect(logger.error).toHaveBeenCalledWith(
				"Listener failed for 0x100: boom",
			);
		});

		it("labels wildcard listener failures", () => {
			const logger = makeMockLogger();
			const bus = new VirtualCanBus({ logger });
			bus.subscribe(WILDCARD_ID, () => {
				throw new Error("bad");
			});

			bus.transmit(0x2a, new Uint8Array([1]));

			expect(logger.error).toHaveBeenCalledWith(
				"Wildcard listener failed for 0x02A: bad",
			);
			expect(bus.deliveryFailures()[0]?.subscribedId).toBe(WILDCARD_ID);
		});

		it("bounds the failure log", () => {
			const bus = new VirtualCanBus({
				logger: createLogger("test", "silent"),
				failureCapacity: 2,
			});
			bus.subscribe(0x100, () => ({ ok: false, reason: "nope" }));

			for (let i = 0; i < 5; i++) {
				bus.transmit(0x100, new Uint8Array([i]));
			}

			expect(bus.deliveryFailures()).toHaveLength(2);
		});

		it("does not deliver a wildcard-id frame twice to wildcard listeners", () => {
			const bus = makeBus();
			const listener = vi.fn();
			bus.subscribe(WILDCARD_ID, listener);

			bus.transmit(WILDCARD_ID, new Uint8Array([1]), true);

			expect(listener).toHaveBeenCalledTimes(1);
		});
	});

	// ── Subscriptions ────────────────────────────────────────────────────────

	describe("subscribe() / unsubscribe()", () => {
		it("stops delivery through the returned function", () => {
			const bus = makeBus();
			const listener = vi.fn();
			const unsubscribe = bus.subscribe(0x100, listener);

			unsubscribe();
			bus.transmit(0x100, new Uint8Array([1]));

			expect(listener).not.toHaveBeenCalled();
		});

		it("treats removing an unknown listener as a no-op", () => {
			const bus = makeBus();
			const registered = vi.fn();
			bus.subscribe(0x100, registered);

			expect(() => bus.unsubscribe(0x100, vi.fn())).not.toThrow();
			expect(() => bus.unsubscribe(0x999, registered)).not.toThrow();

			bus.transmit(0x100, new Uint8Array([1]));
			expect(registered).toHaveBeenCalledTimes(1);
		});

		it("lets a listener unsubscribe itself during delivery", () => {
			const bus = makeBus();
			const after = vi.fn();
			let onceCalls = 0;
			function once(): void {
				onceCalls++;
				bus.unsubscribe(0x100, once);
			}
			bus.subscribe(0x100, once);
			bus.subscribe(0x100, after);

			bus.transmit(0x100, new Uint8Array([1]));
			bus.transmit(0x100, new Uint8Array([2]));

			expect(onceCalls).toBe(1);
			expect(after).toHaveBeenCalledTimes(2);
		});
	});

	// ── Statistics ───────────────────────────────────────────────────────────

	describe("statistics()", () => {
		it("computes bus load from 10 full frames at 500 kbps", () => {
			const bus = makeBus(() => 10_000);
			for (let i = 0; i < 10; i++) {
				bus.transmit(0x100 + i, new Uint8Array(8));
			}

			expect(bus.statistics().busLoad).toBeCloseTo(
				((10 * (8 * 8 + 47)) / 500_000) * 100,
				10,
			);
		});

		it("only counts frames from the trailing second", () => {
			let now = 0;
			const bus = makeBus(() => now);
			bus.transmit(0x100, new Uint8Array(8));
			now = 1_000;
			bus.transmit(0x100, new Uint8Array(0));

			// The first frame is exactly one second old and falls outside the window
			expect(bus.statistics().busLoad).toBeCloseTo((47 / 500_000) * 100, 10);

			now = 2_500;
			expect(bus.statistics().busLoad).toBe(0);
		});

		it("scales with the configured bitrate", () => {
			const bus = new VirtualCanBus({
				bitrate: 125_000,
				logger: createLogger("test", "silent"),
				now: () => 0,
			});
			bus.transmit(0x100, new Uint8Array(8));

			expect(bus.statistics().busLoad).toBeCloseTo((111 / 125_000) * 100, 10);
		});
	});

	// ── Trace log ────────────────────────────────────────────────────────────

	describe("traceLog()", () => {
		it("never exceeds its capacity and evicts the oldest frames first", () => {
			const bus = makeBus();
			for (let i = 0; i < 10_005; i++) {
				bus.transmit(0x100, new Uint8Array([i & 0xff, (i >> 8) & 0xff]));
			}

			const trace = bus.traceLog();
			expect(trace).toHaveLength(10_000);
			// Frames 0-4 were evicted; 10004 = 0x2714
			expect(Array.from(trace[0]?.data ?? [])).toEqual([5, 0]);
			expect(Array.from(trace[9_999]?.data ?? [])).toEqual([0x14, 0x27]);
			expect(bus.statistics().txCount).toBe(10_005);
		});

		it("filters by identifier in arrival order", () => {
			const bus = makeBus();
			bus.transmit(0x100, new Uint8Array([1]));
			bus.transmit(0x200, new Uint8Array([2]));
			bus.transmit(0x100, new Uint8Array([3]));

			const trace = bus.traceLog(0x100);
			expect(trace.map((f) => f.data[0])).toEqual([1, 3]);
		});

		it("clearLog() empties the trace but keeps the counters", () => {
			const bus = makeBus();
			bus.transmit(0x100, new Uint8Array([1]));
			bus.transmit(0x100, new Uint8Array([2]));

			bus.clearLog();

			expect(bus.traceLog()).toEqual([]);
			expect(bus.statistics().txCount).toBe(2);
			expect(bus.statistics().busLoad).toBe(0);
		});
	});

	// ── Convenience builders ─────────────────────────────────────────────────

	describe("status builders", () => {
		it("sends battery status on the BMS status id", () => {
			const bus = makeBus();
			bus.sendBatteryStatus({
				soc: 50,
				voltage: 350,
				current: 2,
				temperature: 30,
			});

			const [frame] = bus.traceLog(CAN_IDS.BMS_STATUS);
			expect(frame?.length).toBe(8);
			expect(
				decodeBatteryStatus(frame?.data ?? new Uint8Array(0))?.soc,
			).toBe(50);
		});

		it("sends door status on the body status id", () => {
			const bus = makeBus();
			bus.sendDoorStatus({ rearRight: { open: true } });

			const [frame] = bus.traceLog(CAN_IDS.BDC_STATUS);
			expect(Array.from(frame?.data ?? [])).toEqual([0x08, 0, 0, 0]);
		});
	});

	// ── awaitFrame ───────────────────────────────────────────────────────────

	describe("awaitFrame()", () => {
		afterEach(() => {
			vi.useRealTimers();
		});

		it("resolves null after the timeout even when frames were sent", async () => {
			vi.useFakeTimers();
			const bus = makeBus();
			bus.start();

			const pending = bus.awaitFrame(500);
			bus.transmit(0x100, new Uint8Array([1]));
			await vi.advanceTimersByTimeAsync(500);

			await expect(pending).resolves.toBeNull();
		});

		it("resolves null as soon as the bus stops", async () => {
			vi.useFakeTimers();
			const bus = makeBus();
			bus.start();
			expect(bus.isRunning).toBe(true);

			const pending = bus.awaitFrame(60_000);
			bus.stop();

			await expect(pending).resolves.toBeNull();
			expect(bus.isRunning).toBe(false);
			expect(vi.getTimerCount()).toBe(0);
		});
	});
});
