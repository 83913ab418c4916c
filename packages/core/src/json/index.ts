export { escapeJsonString } from "./escape.js";
export {
	isJsonValue,
	JsonArray,
	JsonObject,
	JsonPrimitive,
	type JsonScalar,
	type JsonValue,
	jsonOf,
} from "./value.js";
