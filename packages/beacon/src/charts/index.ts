export {
	detectRuntime,
	PLATFORM_CHART_ID,
	platformChart,
	SERVICE_VERSION_CHART_ID,
	serviceVersionChart,
} from "./builtin.js";
export {
	type Awaitable,
	type Chart,
	customChart,
	type SimpleChartValue,
	simpleChart,
} from "./chart.js";
export { ChartRegistry, collectChart } from "./registry.js";
