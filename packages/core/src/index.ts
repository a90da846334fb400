/**
 * @pinwise/core - Core library for microcontroller board configuration validation.
 *
 * This library provides functionality for:
 * - Board configuration parsing (board YAML files)
 * - MCU resolution against part-number patterns
 * - Schema-driven peripheral field validation
 * - Pin usage collection and conflict analysis
 * - Validation reports
 */

// Type exports
export * from "./types/index.js";

// Error exports
export {
	type PinwiseErrorOptions,
	PinwiseError,
	SchemaLoadError,
	BoardConfigError,
	McuResolutionError,
	UnknownMCUError,
	AmbiguousMCUError,
	isPinwiseError,
	isMcuResolutionError,
	getErrorMessage,
	wrapError,
} from "./errors.js";

// Logging exports
export {
	LOG_LEVELS,
	type LogLevel,
	type LogSink,
	type Logger,
	type LoggerOptions,
	isLogLevel,
	resolveLogLevel,
	createLogger,
	silentLogger,
} from "./logging.js";

// Filesystem exports
export * from "./filesystem/index.js";

// Validation exports
export * from "./validation/index.js";
