// =============================================================================
// METRICS SCHEDULER — Jittered start, then fixed-rate ticks
// =============================================================================
// One timer pair per service: a one-shot timer for the randomized first cycle,
// then an interval armed at that first fire. Ticks are fixed-rate: the next
// one is due a full interval after the previous was due, however long the
// task took. Both timers are unref'd and never keep the host process alive.

import { type BeaconLogger, BeaconError, errorDetails } from "@beacon-metrics/core";
import { computeInitialDelay, parseInterval } from "./interval.js";

export const DEFAULT_INITIAL_DELAY = { min: "3m", max: "6m" } as const;
export const DEFAULT_INTERVAL = "30m";

export type ScheduledTask = () => void | Promise<void>;

export interface SchedulerOptions {
	/** Checked before every tick; a `false` makes that tick a no-op. */
	isEnabled: () => boolean;
	logger: BeaconLogger;
	/** Window for the randomized first run. Default: 3m–6m */
	initialDelay?: { min: string; max: string };
	/** Period between runs. Default: `"30m"` */
	interval?: string;
	/** Source of randomness for the initial delay. Default: `Math.random` */
	random?: () => number;
}

export class MetricsScheduler {
	private readonly isEnabled: () => boolean;
	private readonly logger: BeaconLogger;
	private readonly random: () => number;
	readonly minInitialDelayMs: number;
	readonly maxInitialDelayMs: number;
	readonly intervalMs: number;

	private initialTimer: ReturnType<typeof setTimeout> | null = null;
	private repeatTimer: ReturnType<typeof setInterval> | null = null;
	private delayMs: number | null = null;
	private scheduled = false;
	private stopped = false;

	constructor(options: SchedulerOptions) {
		const initialDelay = options.initialDelay ?? DEFAULT_INITIAL_DELAY;
		this.isEnabled = options.isEnabled;
		this.logger = options.logger;
		this.random = options.random ?? Math.random;
		this.minInitialDelayMs = parseInterval(initialDelay.min);
		this.maxInitialDelayMs = parseInterval(initialDelay.max);
		this.intervalMs = parseInterval(options.interval ?? DEFAULT_INTERVAL);

		if (this.minInitialDelayMs > this.maxInitialDelayMs) {
			throw BeaconError.invalidArgument(
				`Initial delay window is inverted: min "${initialDelay.min}" > max "${initialDelay.max}"`,
			);
		}
	}

	/** Delay picked for the first run, or `null` before `schedule()`. */
	get initialDelayMs(): number | null {
		return this.delayMs;
	}

	get isScheduled(): boolean {
		return this.scheduled && !this.stopped;
	}

	get isShutdown(): boolean {
		return this.stopped;
	}

	// ---------------------------------------------------------------------------
	// SCHEDULE
	// ---------------------------------------------------------------------------

	schedule(task: ScheduledTask): void {
		if (this.stopped) {
			throw BeaconError.schedulerState("MetricsScheduler has been shut down");
		}
		if (this.scheduled) {
			throw BeaconError.schedulerState("MetricsScheduler is already scheduled");
		}
		this.scheduled = true;

		const delay = computeInitialDelay(this.minInitialDelayMs, this.maxInitialDelayMs, this.random);
		this.delayMs = delay;

		this.logger.debug("Scheduling metrics cycle", {
			initialDelayMs: delay,
			intervalMs: this.intervalMs,
		});

		this.initialTimer = setTimeout(() => {
			this.initialTimer = null;
			if (this.stopped) return;

			this.repeatTimer = setInterval(() => {
				void this.tick(task);
			}, this.intervalMs);
			this.repeatTimer.unref();

			void this.tick(task);
		}, delay);
		this.initialTimer.unref();
	}

	// ---------------------------------------------------------------------------
	// SHUTDOWN
	// ---------------------------------------------------------------------------

	/** Cancel future ticks. Idempotent; an in-flight tick is not awaited. */
	shutdown(): void {
		if (this.stopped) return;
		this.stopped = true;

		if (this.initialTimer !== null) {
			clearTimeout(this.initialTimer);
			this.initialTimer = null;
		}
		if (this.repeatTimer !== null) {
			clearInterval(this.repeatTimer);
			this.repeatTimer = null;
		}

		this.logger.debug("Metrics scheduler stopped");
	}

	// ---------------------------------------------------------------------------
	// EXECUTION
	// ---------------------------------------------------------------------------

	private async tick(task: ScheduledTask): Promise<void> {
		if (this.stopped) return;

		try {
			if (!this.isEnabled()) {
				this.logger.debug("Metrics disabled, skipping cycle");
				return;
			}
			await task();
		} catch (error) {
			this.logger.error("Metrics cycle failed", errorDetails(error));
		}
	}
}
