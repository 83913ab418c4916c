export type { BeaconLogger, HostEnvironment, MetricsConfig } from "./config.js";
