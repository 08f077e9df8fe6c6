import { formatHex } from "@virtual-hil/core";
import type { DeviceInfo, DiagnosticConnection } from "@virtual-hil/device";
import { type DiagnosticServer, encodeResponse } from "./diagnostic-server.js";

/**
 * Connect a client directly to an in-process DiagnosticServer.
 *
 * Each sendFrame() is one processRequest() call; a suppressed response
 * resolves to an empty array. With a timeout, a request still running when
 * it expires rejects (the server finishes it regardless).
 *
 * @param server - Server answering the requests
 * @param info - Overrides for the reported device info
 */
export function createLoopbackConnection(
	server: DiagnosticServer,
	info: Partial<DeviceInfo> = {},
): DiagnosticConnection {
	const deviceInfo: DeviceInfo = {
		id: `loopback:${server.ecuName}`,
		name: `${server.ecuName} (loopback)`,
		transportName: "loopback",
		connected: true,
		...info,
	};

	const request = async (data: Uint8Array): Promise<Uint8Array> =>
		encodeResponse(await server.processRequest(data));

	return {
		deviceInfo,

		async sendFrame(data: Uint8Array, timeoutMs?: number): Promise<Uint8Array> {
			if (!deviceInfo.connected) {
				throw new Error(`Connection ${deviceInfo.id} is closed`);
			}
			if (timeoutMs === undefined) {
				return request(data);
			}

			let timer: ReturnType<typeof setTimeout> | undefined;
			const timeout = new Promise<never>((_, reject) => {
				timer = setTimeout(() => {
					reject(
						new Error(
							`Request ${formatHex(data[0] ?? 0)} timed out after ${timeoutMs} ms`,
						),
					);
				}, timeoutMs);
			});

			try {
				return await Promise.race([request(data), timeout]);
			} finally {
				clearTimeout(timer);
			}
		},

		async close(): Promise<void> {
			deviceInfo.connected = false;
		},
	};
}
