export {
	compressPayload,
	DEFAULT_TIMEOUT_MS,
	type DeliveryOutcome,
	METRICS_VERSION,
	MetricsClient,
	type MetricsClientOptions,
	USER_AGENT,
} from "./client.js";
