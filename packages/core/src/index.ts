// Errors
export type { BaseErrorCode, BeaconErrorCode, RawErrorCode } from "./error/index.js";
export { BASE_ERROR_CODES, BeaconError } from "./error/index.js";

// JSON value model
export * from "./json/index.js";

// Logging
export * from "./logger/index.js";

// Type definitions
export * from "./types/index.js";
