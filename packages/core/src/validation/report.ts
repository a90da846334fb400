/**
 * Validation report assembly and formatting.
 */

import type { Finding, FindingCode, FindingSeverity } from "../types/finding.js";
import { createFinding } from "../types/finding.js";

/**
 * Per-code severity overrides, applied when a finding is added to a report.
 * MCU resolution failures keep their error severity.
 */
export type SeverityOverrides = Partial<Record<FindingCode, FindingSeverity>>;

const FIXED_SEVERITY_CODES: ReadonlySet<FindingCode> = new Set<FindingCode>(["unknown-mcu", "ambiguous-mcu"]);

/**
 * Summary counts by severity.
 */
export interface ReportSummary {
	errors: number;
	warnings: number;
	info: number;
}

/**
 * Plain-data form of a report.
 */
export interface ValidationReportData {
	/** Whether the board is valid (no errors; warnings and info allowed). */
	valid: boolean;
	summary: ReportSummary;
	findings: Finding[];
}

/**
 * Ordered, immutable result of one validation run.
 */
export class ValidationReport {
	readonly findings: readonly Finding[];

	constructor(findings: readonly Finding[]) {
		this.findings = Object.freeze([...findings]);
	}

	get errors(): Finding[] {
		return this.bySeverity("error");
	}

	get warnings(): Finding[] {
		return this.bySeverity("warning");
	}

	get info(): Finding[] {
		return this.bySeverity("info");
	}

	/** No error-severity finding was reported. */
	get valid(): boolean {
		return !this.findings.some((finding) => finding.severity === "error");
	}

	get summary(): ReportSummary {
		return {
			errors: this.errors.length,
			warnings: this.warnings.length,
			info: this.info.length,
		};
	}

	toJSON(): ValidationReportData {
		return {
			valid: this.valid,
			summary: this.summary,
			findings: this.findings.map((finding) => ({ ...finding })),
		};
	}

	private bySeverity(severity: FindingSeverity): Finding[] {
		return this.findings.filter((finding) => finding.severity === severity);
	}
}

/**
 * Collects findings in order, re-grading them by code.
 */
export class ReportBuilder {
	private readonly findings: Finding[] = [];

	constructor(private readonly overrides: SeverityOverrides = {}) {}

	add(finding: Finding): this {
		const severity = FIXED_SEVERITY_CODES.has(finding.code) ? undefined : this.overrides[finding.code];
		this.findings.push(
			severity === undefined || severity === finding.severity ? finding : createFinding({ ...finding, severity }),
		);
		return this;
	}

	addAll(findings: Iterable<Finding>): this {
		for (const finding of findings) {
			this.add(finding);
		}
		return this;
	}

	build(): ValidationReport {
		return new ValidationReport(this.findings);
	}
}

/**
 * Process exit code for a report: 1 when any error was found, 0 otherwise.
 */
export function getExitCode(report: ValidationReport): 0 | 1 {
	return report.valid ? 0 : 1;
}
