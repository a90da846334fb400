/**
 * @title Logging
 * @description Level-filtered logging for the loaders and the validation engine.
 *
 * @module logging
 *
 * @envvar PINWISE_LOG_LEVEL - One of "error", "warn", "info" or "debug" (default "info").
 */

/** Log levels, most severe first. */
export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Receives every message that passes the level filter.
 */
export type LogSink = (level: LogLevel, message: string) => void;

export interface Logger {
	readonly level: LogLevel;
	error(message: string): void;
	warn(message: string): void;
	info(message: string): void;
	debug(message: string): void;
}

export interface LoggerOptions {
	/** Most verbose level that is emitted. Defaults to the environment level. */
	level?: LogLevel;
	/** Destination for messages. Defaults to the console. */
	sink?: LogSink;
}

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

/**
 * Read the log level from the environment.
 *
 * @param env - Environment variables (defaults to process.env)
 * @returns Configured level, or "info" when unset or unrecognised
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
	const value = env["PINWISE_LOG_LEVEL"]?.trim().toLowerCase();
	return isLogLevel(value) ? value : "info";
}

const consoleSink: LogSink = (level, message) => {
	switch (level) {
		case "error":
			console.error(message);
			break;
		case "warn":
			console.warn(message);
			break;
		case "info":
			console.info(message);
			break;
		case "debug":
			console.debug(message);
			break;
	}
};

/**
 * Create a logger that emits messages at or below the configured level.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug("Collected 12 pin claims");
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
	const level = options.level ?? resolveLogLevel();
	const sink = options.sink ?? consoleSink;
	const threshold = LOG_LEVELS.indexOf(level);

	const emit = (type: LogLevel, message: string): void => {
		if (LOG_LEVELS.indexOf(type) <= threshold) {
			sink(type, `[pinwise] ${message}`);
		}
	};

	return {
		level,
		error: (message) => emit("error", message),
		warn: (message) => emit("warn", message),
		info: (message) => emit("info", message),
		debug: (message) => emit("debug", message),
	};
}

/** Logger that discards every message. */
export const silentLogger: Logger = createLogger({ level: "error", sink: () => undefined });
