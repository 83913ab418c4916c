export {
	type ConfigStoreOptions,
	getConfigPath,
	getDataDir,
	isDisabledByEnv,
	isTelemetryEnabled,
	loadConfigFile,
	readConfigFile,
	type MetricsConfigFile,
	resetServerUuid,
	resolveMetricsConfig,
	setTelemetryEnabled,
	writeConfigFile,
} from "./store.js";
