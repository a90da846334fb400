import { describe, it, expect } from "vitest";
import {
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
} from "../src/errors.js";

describe("PinwiseError", () => {
	it("creates error with message and code", () => {
		const error = new PinwiseError("Test message", "TEST_CODE");

		expect(error.message).toBe("Test message");
		expect(error.code).toBe("TEST_CODE");
		expect(error.name).toBe("PinwiseError");
		expect(error.suggestion).toBeUndefined();
	});

	it("creates error with suggestion and cause", () => {
		const cause = new Error("root");
		const error = new PinwiseError("Test", "CODE", { suggestion: "Try this instead", cause });

		expect(error.suggestion).toBe("Try this instead");
		expect(error.cause).toBe(cause);
	});

	it("formats error without suggestion", () => {
		const error = new PinwiseError("Test message", "CODE");

		expect(error.format()).toBe("PinwiseError: Test message");
	});

	it("formats error with suggestion", () => {
		const error = new PinwiseError("Test message", "CODE", { suggestion: "Do this" });

		expect(error.format()).toBe("PinwiseError: Test message\n  Suggestion: Do this");
	});
});

describe("SchemaLoadError", () => {
	it("points at the schema file", () => {
		const error = new SchemaLoadError("Invalid MCU descriptor", { schemaPath: "/schemas/mcu/a.json" });

		expect(error.name).toBe("SchemaLoadError");
		expect(error.code).toBe("SCHEMA_LOAD_ERROR");
		expect(error.schemaPath).toBe("/schemas/mcu/a.json");
		expect(error.suggestion).toBe("Check the schema file at: /schemas/mcu/a.json");
	});

	it("has no suggestion without a path", () => {
		const error = new SchemaLoadError("Missing peripheral schemas for: spi");

		expect(error.schemaPath).toBeUndefined();
		expect(error.suggestion).toBeUndefined();
	});
});

describe("BoardConfigError", () => {
	it("points at the board file", () => {
		const error = new BoardConfigError("Bad board", { configPath: "board.yml" });

		expect(error.name).toBe("BoardConfigError");
		expect(error.code).toBe("BOARD_CONFIG_ERROR");
		expect(error.configPath).toBe("board.yml");
		expect(error.suggestion).toBe("Check the board configuration at: board.yml");
	});
});

describe("MCU resolution errors", () => {
	it("describes an unknown part number", () => {
		const error = new UnknownMCUError("STM32F401CCU6");

		expect(error).toBeInstanceOf(McuResolutionError);
		expect(error.name).toBe("UnknownMCUError");
		expect(error.code).toBe("UNKNOWN_MCU");
		expect(error.partNumber).toBe("STM32F401CCU6");
		expect(error.message).toBe('No MCU descriptor matches part number "STM32F401CCU6"');
	});

	it("describes a missing part number", () => {
		const error = new UnknownMCUError("");

		expect(error.message).toBe("Board does not declare an MCU part number");
	});

	it("lists the tied descriptors of an ambiguous part number", () => {
		const error = new AmbiguousMCUError("STM32F407VGT6", ["a", "b"]);

		expect(error).toBeInstanceOf(McuResolutionError);
		expect(error.code).toBe("AMBIGUOUS_MCU");
		expect(error.candidates).toEqual(["a", "b"]);
		expect(error.message).toBe('Part number "STM32F407VGT6" matches several MCU descriptors equally: a, b');
	});
});

describe("isPinwiseError", () => {
	it("returns true for PinwiseError and subclasses", () => {
		expect(isPinwiseError(new PinwiseError("test", "CODE"))).toBe(true);
		expect(isPinwiseError(new SchemaLoadError("test"))).toBe(true);
		expect(isPinwiseError(new UnknownMCUError("X"))).toBe(true);
	});

	it("returns false for other values", () => {
		expect(isPinwiseError(new Error("test"))).toBe(false);
		expect(isPinwiseError("error")).toBe(false);
		expect(isPinwiseError(null)).toBe(false);
	});
});

describe("isMcuResolutionError", () => {
	it("matches only resolution failures", () => {
		expect(isMcuResolutionError(new AmbiguousMCUError("X", []))).toBe(true);
		expect(isMcuResolutionError(new BoardConfigError("test"))).toBe(false);
	});
});

describe("getErrorMessage", () => {
	it("reads Error messages and stringifies other values", () => {
		expect(getErrorMessage(new Error("boom"))).toBe("boom");
		expect(getErrorMessage(42)).toBe("42");
	});
});

describe("wrapError", () => {
	it("returns PinwiseError unchanged", () => {
		const original = new SchemaLoadError("test");

		expect(wrapError(original)).toBe(original);
	});

	it("wraps regular Error with context", () => {
		const original = new Error("original message");
		const wrapped = wrapError(original, "Context");

		expect(wrapped.message).toBe("Context: original message");
		expect(wrapped.code).toBe("UNKNOWN_ERROR");
		expect(wrapped.cause).toBe(original);
	});

	it("wraps non-Error values", () => {
		expect(wrapError("string error").message).toBe("string error");
	});
});
