/**
 * Validation module exports.
 */

export {
	type McuResolution,
	toGlobPattern,
	literalPrefix,
	matchesPartNumber,
	resolveMcu,
} from "./mcu-resolver.js";

export {
	type ValidatedInstance,
	type InstanceValidationResult,
	type ConfigValidationResult,
	validateInstanceFields,
	validateConfigFields,
} from "./field-validator.js";

export {
	type PinClaim,
	type PinUsage,
	type PinId,
	normalisePinId,
	parsePinId,
	comparePinIds,
	isPinRoleUnset,
	collectPinClaims,
	listUsedPins,
} from "./pin-collector.js";

export {
	type ConflictAnalysisInput,
	detectPackage,
	checkElectricalRanges,
	checkInstanceLimits,
	outOfPackageReason,
	checkPackagePins,
	checkPinConflicts,
	checkRequiredPins,
	formatAddress,
	checkAddressConflicts,
	analyzeConflicts,
} from "./conflict-analyzer.js";

export {
	type SeverityOverrides,
	type ReportSummary,
	type ValidationReportData,
	ValidationReport,
	ReportBuilder,
	getExitCode,
} from "./report.js";

export {
	type ValidationOptions,
	type ValidationOutcome,
	mcuFailureFinding,
	validateBoardStrict,
	validateBoard,
} from "./pipeline.js";
