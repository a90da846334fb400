/**
 * @title Validation Pipeline
 * @description Runs a board configuration through MCU resolution, field
 * validation, pin collection and conflict analysis.
 *
 * The run is synchronous and performs no I/O; the registry is only read, so
 * one registry can serve any number of runs.
 *
 * @module validation
 */

import type { BoardConfig } from "../types/board.js";
import { getBoardMcu } from "../types/board.js";
import type { Finding } from "../types/finding.js";
import { createFinding } from "../types/finding.js";
import type { SchemaRegistry } from "../types/registry.js";
import type { Logger } from "../logging.js";
import { createLogger } from "../logging.js";
import type { McuResolutionError } from "../errors.js";
import { AmbiguousMCUError, isMcuResolutionError } from "../errors.js";
import { analyzeConflicts } from "./conflict-analyzer.js";
import { validateConfigFields } from "./field-validator.js";
import type { McuResolution } from "./mcu-resolver.js";
import { resolveMcu } from "./mcu-resolver.js";
import type { PinUsage } from "./pin-collector.js";
import { collectPinClaims } from "./pin-collector.js";
import type { SeverityOverrides, ValidationReport } from "./report.js";
import { ReportBuilder } from "./report.js";

/**
 * Options for a validation run.
 */
export interface ValidationOptions {
	/** Severity per finding code, e.g. `{ "missing-pin": "error" }`. */
	severityOverrides?: SeverityOverrides;
	/** Logger for progress output (default: a logger at the environment level). */
	logger?: Logger;
}

/**
 * Everything a completed run produced.
 */
export interface ValidationOutcome {
	report: ValidationReport;
	resolution: McuResolution;
	usage: PinUsage;
}

/**
 * Turn an MCU resolution failure into the finding that stands for it.
 */
export function mcuFailureFinding(error: McuResolutionError): Finding {
	return createFinding({
		severity: "error",
		code: error instanceof AmbiguousMCUError ? "ambiguous-mcu" : "unknown-mcu",
		message: error.message,
		location: "board.mcu",
		peripheral: { kind: "board", instance: "" },
		suggestion: error.suggestion,
	});
}

/**
 * Validate a board configuration, throwing when the MCU cannot be resolved.
 *
 * @param config - Board configuration
 * @param registry - Loaded schemas
 * @param options - Validation options
 * @returns The report, the MCU resolution and the pin usage
 * @throws UnknownMCUError if no descriptor matches the board's MCU
 * @throws AmbiguousMCUError if several descriptors match equally
 */
export function validateBoardStrict(
	config: BoardConfig,
	registry: SchemaRegistry,
	options: ValidationOptions = {},
): ValidationOutcome {
	const logger = options.logger ?? createLogger();

	const resolution = resolveMcu(getBoardMcu(config), registry.mcus);
	logger.debug(
		`Resolved MCU "${resolution.partNumber}" to ${resolution.descriptor.name} (pattern ${resolution.pattern})`,
	);

	const fields = validateConfigFields(config, registry);
	const usage = collectPinClaims(fields.peripherals, registry.schemas);
	logger.debug(`Collected ${usage.claims.length} pin claim(s) on ${usage.byPin.size} pin(s)`);

	const report = new ReportBuilder(options.severityOverrides)
		.addAll(fields.findings)
		.addAll(
			analyzeConflicts({
				descriptor: resolution.descriptor,
				board: fields.board,
				peripherals: fields.peripherals,
				usage,
				schemas: registry.schemas,
			}),
		)
		.build();

	const { errors, warnings, info } = report.summary;
	logger.debug(`Validation finished: ${errors} error(s), ${warnings} warning(s), ${info} info`);

	return { report, resolution, usage };
}

/**
 * Validate a board configuration.
 *
 * An MCU resolution failure ends the run early; the report then holds that
 * failure as its only finding. Other errors propagate.
 *
 * @param config - Board configuration
 * @param registry - Loaded schemas
 * @param options - Validation options
 * @returns Ordered validation report
 */
export function validateBoard(
	config: BoardConfig,
	registry: SchemaRegistry,
	options: ValidationOptions = {},
): ValidationReport {
	try {
		return validateBoardStrict(config, registry, options).report;
	} catch (error) {
		if (!isMcuResolutionError(error)) {
			throw error;
		}
		options.logger?.debug(`MCU resolution failed: ${error.message}`);
		return new ReportBuilder(options.severityOverrides).add(mcuFailureFinding(error)).build();
	}
}
