/**
 * @title Errors
 * @description Error types for @pinwise/core.
 *
 * Fatal conditions raise one of these classes. Everything a validation run can
 * recover from is reported as a finding instead.
 *
 * @module errors
 */

/**
 * Options for constructing a PinwiseError.
 */
export interface PinwiseErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all pinwise errors.
 */
export class PinwiseError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: PinwiseErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "PinwiseError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * Error when a schema document is missing, unreadable or malformed.
 */
export class SchemaLoadError extends PinwiseError {
	/** Path to the schema file. */
	readonly schemaPath?: string;

	constructor(message: string, options?: { schemaPath?: string; cause?: unknown }) {
		super(message, "SCHEMA_LOAD_ERROR", {
			suggestion: options?.schemaPath ? `Check the schema file at: ${options.schemaPath}` : undefined,
			cause: options?.cause,
		});
		this.name = "SchemaLoadError";
		this.schemaPath = options?.schemaPath;
	}
}

/**
 * Error when a board configuration document cannot be read or parsed.
 */
export class BoardConfigError extends PinwiseError {
	/** Path to the board configuration file. */
	readonly configPath?: string;

	constructor(message: string, options?: { configPath?: string; cause?: unknown }) {
		super(message, "BOARD_CONFIG_ERROR", {
			suggestion: options?.configPath ? `Check the board configuration at: ${options.configPath}` : undefined,
			cause: options?.cause,
		});
		this.name = "BoardConfigError";
		this.configPath = options?.configPath;
	}
}

/**
 * Common base for failures to pick an MCU descriptor for a part number.
 */
export class McuResolutionError extends PinwiseError {
	/** Part number that failed to resolve. */
	readonly partNumber: string;

	constructor(message: string, code: string, partNumber: string, options?: PinwiseErrorOptions) {
		super(message, code, options);
		this.name = "McuResolutionError";
		this.partNumber = partNumber;
	}
}

/**
 * Error when no MCU descriptor pattern matches a part number.
 */
export class UnknownMCUError extends McuResolutionError {
	constructor(partNumber: string) {
		super(
			partNumber ? `No MCU descriptor matches part number "${partNumber}"` : "Board does not declare an MCU part number",
			"UNKNOWN_MCU",
			partNumber,
			{ suggestion: "Add an MCU schema whose mcu_patterns cover this part number" },
		);
		this.name = "UnknownMCUError";
	}
}

/**
 * Error when several descriptors match a part number equally well.
 */
export class AmbiguousMCUError extends McuResolutionError {
	/** Names of the descriptors that tied. */
	readonly candidates: string[];

	constructor(partNumber: string, candidates: string[]) {
		super(
			`Part number "${partNumber}" matches several MCU descriptors equally: ${candidates.join(", ")}`,
			"AMBIGUOUS_MCU",
			partNumber,
			{ suggestion: "Make one of the mcu_patterns more specific" },
		);
		this.name = "AmbiguousMCUError";
		this.candidates = candidates;
	}
}

/**
 * Check if an error is a PinwiseError.
 */
export function isPinwiseError(error: unknown): error is PinwiseError {
	return error instanceof PinwiseError;
}

/**
 * Check if an error is an MCU resolution failure.
 */
export function isMcuResolutionError(error: unknown): error is McuResolutionError {
	return error instanceof McuResolutionError;
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a PinwiseError.
 */
export function wrapError(error: unknown, context?: string): PinwiseError {
	if (isPinwiseError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new PinwiseError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}
