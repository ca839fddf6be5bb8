export * from "./constants";
export {
	AdapterConfigSchema,
	ConfigError,
	DEFAULT_ADAPTER_CONFIG,
	busNameFor,
	getConfigPath,
	loadAdapterConfig,
	type AdapterConfig,
	type LoadConfigOptions,
} from "./adapter";
export {
	LogLevel,
	getLoggingConfig,
	parseLogLevel,
	type LoggingConfig,
} from "./logging";
