import { BeaconError } from "@beacon-metrics/core";

const INTERVAL_UNITS = {
	s: 1_000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000,
} as const;

type IntervalUnit = keyof typeof INTERVAL_UNITS;

function isIntervalUnit(unit: string | undefined): unit is IntervalUnit {
	return unit !== undefined && unit in INTERVAL_UNITS;
}

/**
 * Parse a human-friendly interval string into milliseconds.
 *
 * Supported formats: "5s", "3m", "30m", "1h", "1d", "0.5h"
 */
export function parseInterval(interval: string): number {
	const match = interval.match(/^(\d+(?:\.\d+)?)\s*(s|m|h|d)$/);
	const unit = match?.[2];
	if (!match || !isIntervalUnit(unit)) {
		throw BeaconError.invalidArgument(
			`Invalid interval "${interval}". Expected format: <number><s|m|h|d> (e.g. "5s", "3m", "1h")`,
		);
	}

	const value = Number(match[1]);
	if (value <= 0) {
		throw BeaconError.invalidArgument(`Interval value must be positive, got ${value}`);
	}

	return value * INTERVAL_UNITS[unit];
}

/**
 * Pick a whole number of ms uniformly in `[minMs, maxMs)`. Spreads the first
 * submission of many hosts started together across the window.
 */
export function computeInitialDelay(
	minMs: number,
	maxMs: number,
	random: () => number = Math.random,
): number {
	if (maxMs <= minMs) return minMs;
	return minMs + Math.floor(random() * (maxMs - minMs));
}
