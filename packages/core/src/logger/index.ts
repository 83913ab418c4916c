export { type ConsoleLoggerOptions, createConsoleLogger, formatField } from "./console-logger.js";
export { errorDetails } from "./error-details.js";
export { createJsonLogger, type JsonLoggerOptions, silentLogger } from "./json-logger.js";
export { LEVEL_PRIORITY, type LogLevel } from "./levels.js";
export { buildRedactKeys, REDACTED, redactData } from "./redact.js";
