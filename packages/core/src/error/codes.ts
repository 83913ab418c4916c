// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Every fault the telemetry engine can log or raise maps to one of these codes.

export type RawErrorCode = {
	message: string;
	/**
	 * Whether the condition may clear on its own (network down, file locked).
	 * The engine never retries; the flag only feeds log data.
	 */
	transient?: boolean;
};

export const BASE_ERROR_CODES = {
	// Transient: the next cycle may succeed.
	DELIVERY_FAILED: { message: "Metrics submission failed", transient: true },
	CONFIG_WRITE_FAILED: { message: "Failed to persist metrics config", transient: true },
	CHART_COLLECTION_FAILED: { message: "Chart collection failed", transient: true },

	// Deterministic: caller or file content must change.
	INVALID_ARGUMENT: { message: "Invalid argument", transient: false },
	CONFIG_INVALID: { message: "Invalid metrics config", transient: false },
	SCHEDULER_STATE: { message: "Invalid scheduler state", transient: false },
} as const satisfies Record<string, RawErrorCode>;

export type BaseErrorCode = keyof typeof BASE_ERROR_CODES;
