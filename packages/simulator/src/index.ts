export {
	DEFAULT_CONFIG_FILE,
	type LoadConfigOptions,
	loadConfig,
	parseConfig,
	type SimulatorConfig,
	type SimulatorConfigInput,
	SimulatorConfigSchema,
} from "./config.js";
export { type TraceFormat, VirtualEcu, type VirtualEcuOptions } from "./virtual-ecu.js";
