// =============================================================================
// BEACON METRICS — Opt-in anonymous usage telemetry
// =============================================================================

export {
	type BeaconLogger,
	BeaconError,
	createConsoleLogger,
	createJsonLogger,
	type HostEnvironment,
	JsonArray,
	JsonObject,
	JsonPrimitive,
	type JsonValue,
	jsonOf,
	type MetricsConfig,
} from "@beacon-metrics/core";
export * from "./charts/index.js";
export * from "./config/index.js";
export * from "./delivery/index.js";
export * from "./scheduler/index.js";
export * from "./service/index.js";
