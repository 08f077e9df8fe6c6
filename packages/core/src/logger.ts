/**
 * Scoped console logging.
 *
 * Output goes to the console with a bracketed scope prefix, e.g.
 * `[VirtualCanBus] Listener failed for 0x100: boom`.
 */

/** Levels in increasing severity; "silent" drops everything */
export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
	readonly scope: string;
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}

type ConsoleMethod = "debug" | "info" | "warn" | "error";

/**
 * Create a logger that writes to the console at or above `level`.
 *
 * @param scope - Prefix shown in brackets before each message
 * @param level - Minimum level written @default "info"
 */
export function createLogger(scope: string, level: LogLevel = "info"): Logger {
	const threshold = LOG_LEVELS.indexOf(level);

	const write =
		(method: ConsoleMethod) =>
		(message: string, ...details: unknown[]): void => {
			if (LOG_LEVELS.indexOf(method) < threshold) return;
			console[method](`[${scope}] ${message}`, ...details);
		};

	return {
		scope,
		debug: write("debug"),
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
	};
}

/**
 * Render an unknown thrown value as a message string
 */
export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
