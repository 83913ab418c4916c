export {
	createMetricsService,
	createMetricsServiceFromStore,
	MetricsService,
	type MetricsServiceOptions,
} from "./metrics-service.js";
