/** Flatten an unknown thrown value into loggable fields. */
export function errorDetails(error: unknown): Record<string, unknown> {
	if (!(error instanceof Error)) {
		return { error: String(error) };
	}
	const details: Record<string, unknown> = { error: error.message };
	if ("code" in error && typeof error.code === "string") {
		details.code = error.code;
	}
	if (error.cause !== undefined) {
		details.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
	}
	return details;
}
