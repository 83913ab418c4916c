export { computeInitialDelay, parseInterval } from "./interval.js";
export {
	DEFAULT_INITIAL_DELAY,
	DEFAULT_INTERVAL,
	MetricsScheduler,
	type ScheduledTask,
	type SchedulerOptions,
} from "./scheduler.js";
