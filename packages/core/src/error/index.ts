import { BASE_ERROR_CODES, type BaseErrorCode } from "./codes.js";

export { BASE_ERROR_CODES, type BaseErrorCode, type RawErrorCode } from "./codes.js";

export type BeaconErrorCode = BaseErrorCode;

export class BeaconError extends Error {
	readonly code: BeaconErrorCode;
	readonly details?: Record<string, unknown>;
	/** Whether the condition may clear by itself before the next cycle. */
	readonly transient: boolean;

	constructor(
		code: BeaconErrorCode,
		message: string,
		options?: {
			cause?: unknown;
			transient?: boolean;
			details?: Record<string, unknown>;
		},
	) {
		super(message, { cause: options?.cause });
		this.code = code;
		this.transient = options?.transient ?? BASE_ERROR_CODES[code].transient;
		this.details = options?.details;
		this.name = "BeaconError";
	}

	// --- Transient ---

	static deliveryFailed(message = "Metrics submission failed", cause?: unknown) {
		return new BeaconError("DELIVERY_FAILED", message, { cause, transient: true });
	}

	static configWriteFailed(message = "Failed to persist metrics config", cause?: unknown) {
		return new BeaconError("CONFIG_WRITE_FAILED", message, { cause, transient: true });
	}

	static chartCollectionFailed(chartId: string, cause?: unknown) {
		return new BeaconError("CHART_COLLECTION_FAILED", `Failed to collect chart: ${chartId}`, {
			cause,
			transient: true,
			details: { chartId },
		});
	}

	// --- Deterministic ---

	static invalidArgument(message = "Invalid argument", cause?: unknown) {
		return new BeaconError("INVALID_ARGUMENT", message, { cause, transient: false });
	}

	static configInvalid(message = "Invalid metrics config", cause?: unknown) {
		return new BeaconError("CONFIG_INVALID", message, { cause, transient: false });
	}

	static schedulerState(message = "Invalid scheduler state") {
		return new BeaconError("SCHEDULER_STATE", message, { transient: false });
	}
}
