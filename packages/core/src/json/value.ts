// =============================================================================
// JSON VALUE MODEL — Write-only tree used to build metrics payloads
// =============================================================================
// Payloads are assembled bottom-up from host data and emitted once; there is
// no parser. Output is compact (no whitespace) and deterministic: object keys
// come out in first-insertion order.

import { escapeJsonString } from "./escape.js";

export type JsonScalar = string | number | boolean | bigint | null;

export type JsonValue = JsonObject | JsonArray | JsonPrimitive;

export class JsonPrimitive {
	readonly kind = "primitive";

	constructor(readonly value: JsonScalar) {}

	toJson(): string {
		const { value } = this;
		if (value === null) return "null";
		if (typeof value === "string") return `"${escapeJsonString(value)}"`;
		// NaN and ±Infinity have no JSON spelling
		if (typeof value === "number" && !Number.isFinite(value)) return "null";
		return String(value);
	}
}

export class JsonArray {
	readonly kind = "array";
	private readonly items: JsonValue[] = [];

	static from(values: Iterable<unknown>): JsonArray {
		const array = new JsonArray();
		for (const value of values) {
			array.add(value);
		}
		return array;
	}

	add(value: unknown): this {
		this.items.push(jsonOf(value));
		return this;
	}

	toJson(): string {
		return `[${this.items.map((item) => item.toJson()).join(",")}]`;
	}
}

export class JsonObject {
	readonly kind = "object";
	private readonly fields = new Map<string, JsonValue>();

	/**
	 * Set `key` to `jsonOf(value)`. Re-adding a key replaces its value in
	 * place: the key keeps the position of its first insertion.
	 */
	add(key: string, value: unknown): this {
		this.fields.set(key, jsonOf(value));
		return this;
	}

	toJson(): string {
		const parts: string[] = [];
		for (const [key, value] of this.fields) {
			parts.push(`"${escapeJsonString(key)}":${value.toJson()}`);
		}
		return `{${parts.join(",")}}`;
	}
}

export function isJsonValue(value: unknown): value is JsonValue {
	return value instanceof JsonObject || value instanceof JsonArray || value instanceof JsonPrimitive;
}

function isPlainObject(value: object): value is Record<string, unknown> {
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * Convert arbitrary host data into a JSON value.
 *
 * - `null` / `undefined` → `null`
 * - JSON values pass through unchanged
 * - `Map`s and plain objects → objects (keys stringified)
 * - arrays and `Set`s → arrays
 * - booleans, numbers, bigints → bare primitives
 * - anything else → its `String()` form
 */
export function jsonOf(value: unknown): JsonValue {
	if (value === null || value === undefined) return new JsonPrimitive(null);
	if (isJsonValue(value)) return value;

	if (
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean" ||
		typeof value === "bigint"
	) {
		return new JsonPrimitive(value);
	}
	if (typeof value !== "object") return new JsonPrimitive(String(value));

	if (value instanceof Map) {
		const obj = new JsonObject();
		for (const [key, entry] of value) {
			obj.add(String(key), entry);
		}
		return obj;
	}
	if (Array.isArray(value) || value instanceof Set) {
		return JsonArray.from(value);
	}
	if (isPlainObject(value)) {
		const obj = new JsonObject();
		for (const [key, entry] of Object.entries(value)) {
			obj.add(key, entry);
		}
		return obj;
	}
	return new JsonPrimitive(String(value));
}
