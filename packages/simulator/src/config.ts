/**
 * Configuration for a virtual ECU.
 *
 * Reads configuration from:
 * 1. CLI arguments (--config, --channel, --bitrate, --log-level, --ecu-name)
 * 2. Environment variables (VHIL_CONFIG, VHIL_CHANNEL, VHIL_BITRATE,
 *    VHIL_LOG_LEVEL, VHIL_ECU_NAME)
 * 3. Settings file (virtual-hil.yaml in the working directory, or the
 *    path given by --config / VHIL_CONFIG)
 * 4. Defaults
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { describeError, LOG_LEVELS, parseHex } from "@virtual-hil/core";
import { isValidDtcCode } from "@virtual-hil/device-protocol-uds";
import yaml from "js-yaml";
import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "virtual-hil.yaml";

const logLevelSchema = z.enum(LOG_LEVELS);

const hexBytesSchema = z.string().transform((text, ctx) => {
	try {
		return parseHex(text);
	} catch (error) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: describeError(error) });
		return z.NEVER;
	}
});

/** "0xF190" or a decimal id; YAML turns an unquoted 0xF190 key into 61840 */
const didKeySchema = z
	.string()
	.regex(/^(0x[0-9a-f]{1,4}|\d+)$/i, "Expected a data identifier such as 0xF190")
	.transform(Number)
	.refine((did) => did <= 0xffff, "Data identifier must fit in 16 bits");

const dtcSchema = z.object({
	code: z
		.string()
		.refine(isValidDtcCode, "Expected a DTC code such as P0171"),
	status: z.number().int().min(0).max(0xff).default(0x01),
});

export const SimulatorConfigSchema = z.object({
	ecuName: z.string().min(1).default("VirtualECU"),
	logLevel: logLevelSchema.default("info"),
	bus: z
		.object({
			channel: z.string().min(1).default("virtual0"),
			bitrate: z.coerce.number().int().positive().default(500_000),
			traceCapacity: z.coerce.number().int().positive().default(10_000),
		})
		.default({}),
	diagnostics: z
		.object({
			/** Seeded on top of the standard identifier catalog */
			dataIdentifiers: z
				.record(didKeySchema, hexBytesSchema)
				.default({})
				.transform((entries) =>
					Object.entries(entries).map(([did, value]) => ({
						did: Number(did),
						value,
					})),
				),
			/** Stored when the ECU is created */
			dtcs: z.array(dtcSchema).default([]),
		})
		.default({}),
});

export type SimulatorConfig = z.output<typeof SimulatorConfigSchema>;
export type SimulatorConfigInput = z.input<typeof SimulatorConfigSchema>;

export interface LoadConfigOptions {
	/** Process arguments, program and script included @default process.argv */
	argv?: readonly string[];
	/** @default process.env */
	env?: Readonly<Record<string, string | undefined>>;
	/** Directory searched for the settings file @default process.cwd() */
	cwd?: string;
}

const CLI_FLAGS = {
	"--config": "config",
	"--channel": "channel",
	"--bitrate": "bitrate",
	"--log-level": "logLevel",
	"--ecu-name": "ecuName",
} as const;

type CliOption = (typeof CLI_FLAGS)[keyof typeof CLI_FLAGS];

/**
 * Parse CLI arguments. Both `--flag value` and `--flag=value` are accepted;
 * unknown arguments are ignored.
 */
function parseCliArgs(argv: readonly string[]): Partial<Record<CliOption, string>> {
	const options: Partial<Record<CliOption, string>> = {};

	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i];
		if (!arg) continue;

		for (const [flag, option] of Object.entries(CLI_FLAGS)) {
			const next = argv[i + 1];
			if (arg === flag && next !== undefined) {
				options[option] = next;
				i++;
				break;
			}
			if (arg.startsWith(`${flag}=`)) {
				options[option] = arg.slice(flag.length + 1);
				break;
			}
		}
	}

	return options;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read the YAML settings file.
 *
 * A missing default file yields no settings; a missing file that was named
 * explicitly is an error.
 */
function readSettingsFile(
	filePath: string,
	explicit: boolean,
): Record<string, unknown> {
	if (!fs.existsSync(filePath)) {
		if (explicit) {
			throw new Error(`Config file not found: ${filePath}`);
		}
		return {};
	}

	let parsed: unknown;
	try {
		parsed = yaml.load(fs.readFileSync(filePath, "utf8"));
	} catch (error) {
		throw new Error(`Failed to parse ${filePath}: ${describeError(error)}`);
	}

	if (parsed === undefined || parsed === null) return {};
	if (!isRecord(parsed)) {
		throw new Error(`Config file ${filePath} must contain a mapping`);
	}
	return parsed;
}

/**
 * Validate a raw configuration object and fill in defaults.
 *
 * @throws Error listing every invalid path
 */
export function parseConfig(input: unknown): SimulatorConfig {
	const result = SimulatorConfigSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`,
		);
		throw new Error(`Invalid configuration:\n${issues.join("\n")}`);
	}
	return result.data;
}

/**
 * Load virtual ECU configuration from all sources.
 *
 * Priority: CLI args > env vars > settings file > defaults
 *
 * @returns Resolved configuration
 * @throws Error if a named config file is missing or the result is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): SimulatorConfig {
	const cli = parseCliArgs(options.argv ?? process.argv);
	const env = options.env ?? process.env;
	const cwd = options.cwd ?? process.cwd();

	const explicitPath = cli.config ?? env["VHIL_CONFIG"];
	const settingsPath = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);
	const settings = readSettingsFile(settingsPath, explicitPath !== undefined);
	const settingsBus = isRecord(settings["bus"]) ? settings["bus"] : {};

	return parseConfig({
		...settings,
		ecuName: cli.ecuName ?? env["VHIL_ECU_NAME"] ?? settings["ecuName"],
		logLevel: cli.logLevel ?? env["VHIL_LOG_LEVEL"] ?? settings["logLevel"],
		bus: {
			...settingsBus,
			channel: cli.channel ?? env["VHIL_CHANNEL"] ?? settingsBus["channel"],
			bitrate: cli.bitrate ?? env["VHIL_BITRATE"] ?? settingsBus["bitrate"],
		},
	});
}
