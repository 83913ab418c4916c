// =============================================================================
// LOG REDACTION — Keeps the installation's identity out of host logs
// =============================================================================
// The server UUID is the one stable identifier the reporter handles. It is
// masked as a field of its own and inside payload text logged with
// `logSentData`, so enabling verbose logging never publishes it.

export const REDACTED = "[REDACTED]";

const DEFAULT_REDACT_KEYS = [
	"serverUuid",
	"authorization",
	"cookie",
	"password",
	"secret",
	"token",
];

// `"serverUUID":"…"` as it appears in a serialized payload
const PAYLOAD_SERVER_UUID = /("serverUUID"\s*:\s*)"[^"]*"/g;

/**
 * Redaction set: the defaults plus `extraKeys`. Matching ignores case, so
 * `serverUuid` also covers the payload's `serverUUID`.
 */
export function buildRedactKeys(extraKeys: string[] = []): Set<string> {
	return new Set([...DEFAULT_REDACT_KEYS, ...extraKeys].map((key) => key.toLowerCase()));
}

/**
 * Shallow-redact log data. Returns `data` itself when nothing changes.
 */
export function redactData(
	data: Record<string, unknown> | undefined,
	keys: Set<string>,
): Record<string, unknown> | undefined {
	if (!data) return data;

	let redacted: Record<string, unknown> | undefined;
	for (const [key, value] of Object.entries(data)) {
		let safe = value;
		if (keys.has(key.toLowerCase())) {
			safe = REDACTED;
		} else if (typeof value === "string") {
			safe = value.replace(PAYLOAD_SERVER_UUID, `$1"${REDACTED}"`);
		}
		if (safe !== value) {
			if (!redacted) redacted = { ...data };
			redacted[key] = safe;
		}
	}
	return redacted ?? data;
}
