import { describe, it, expect } from "vitest";
import type { LogLevel } from "../src/logging.js";
import { createLogger, isLogLevel, resolveLogLevel, silentLogger } from "../src/logging.js";

function capture(level: LogLevel) {
	const lines: string[] = [];
	const logger = createLogger({ level, sink: (type, message) => lines.push(`${type} ${message}`) });
	return { logger, lines };
}

describe("createLogger", () => {
	it("emits messages at or below the configured level", () => {
		const { logger, lines } = capture("warn");

		logger.error("e");
		logger.warn("w");
		logger.info("i");
		logger.debug("d");

		expect(lines).toEqual(["error [pinwise] e", "warn [pinwise] w"]);
	});

	it("emits everything at debug", () => {
		const { logger, lines } = capture("debug");

		logger.debug("Collected 3 pin claim(s)");

		expect(lines).toEqual(["debug [pinwise] Collected 3 pin claim(s)"]);
		expect(logger.level).toBe("debug");
	});

	it("silentLogger discards messages", () => {
		expect(() => silentLogger.error("ignored")).not.toThrow();
		expect(silentLogger.level).toBe("error");
	});
});

describe("resolveLogLevel", () => {
	it("reads PINWISE_LOG_LEVEL", () => {
		expect(resolveLogLevel({ PINWISE_LOG_LEVEL: "debug" })).toBe("debug");
		expect(resolveLogLevel({ PINWISE_LOG_LEVEL: " WARN " })).toBe("warn");
	});

	it("falls back to info", () => {
		expect(resolveLogLevel({})).toBe("info");
		expect(resolveLogLevel({ PINWISE_LOG_LEVEL: "verbose" })).toBe("info");
	});
});

describe("isLogLevel", () => {
	it("accepts only known levels", () => {
		expect(isLogLevel("info")).toBe(true);
		expect(isLogLevel("trace")).toBe(false);
		expect(isLogLevel(1)).toBe(false);
	});
});
