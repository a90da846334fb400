/**
 * @title Finding Types Module
 * @description Severity-tagged validation outcomes.
 *
 * @module types
 */

import type { SchemaKind } from "./board.js";

export type FindingSeverity = "error" | "warning" | "info";

/** Machine-readable codes, one per kind of check. */
export const FINDING_CODES = [
	"missing-field",
	"type-mismatch",
	"enum-violation",
	"range-violation",
	"unknown-field",
	"package-detected",
	"clock-out-of-range",
	"voltage-out-of-range",
	"instance-limit",
	"pin-out-of-package",
	"pin-conflict",
	"missing-pin",
	"address-conflict",
	"unknown-mcu",
	"ambiguous-mcu",
] as const;

export type FindingCode = (typeof FINDING_CODES)[number];

/**
 * Reference to a section or peripheral instance.
 */
export interface PeripheralRef {
	readonly kind: SchemaKind;
	/** Instance name; empty for the board section. */
	readonly instance: string;
}

/**
 * One reported validation outcome. Frozen at creation.
 */
export interface Finding {
	readonly severity: FindingSeverity;
	readonly code: FindingCode;
	/** Human-readable description of the issue. */
	readonly message: string;
	/** Dotted key path into the board document, e.g. "uart.uart1.tx_pin". */
	readonly location?: string;
	/** Pin the finding is about. */
	readonly pin?: string;
	/** Section or instance the finding is about. */
	readonly peripheral?: PeripheralRef;
	/** Every claimant involved, in traversal order (pin conflicts). */
	readonly related?: readonly PeripheralRef[];
	/** Suggestion for fixing the issue. */
	readonly suggestion?: string;
}

/**
 * Create a frozen finding, dropping unset optional properties.
 */
export function createFinding(init: Finding): Finding {
	const finding: { -readonly [K in keyof Finding]: Finding[K] } = {
		severity: init.severity,
		code: init.code,
		message: init.message,
	};
	if (init.location !== undefined) {
		finding.location = init.location;
	}
	if (init.pin !== undefined) {
		finding.pin = init.pin;
	}
	if (init.peripheral !== undefined) {
		finding.peripheral = Object.freeze({ ...init.peripheral });
	}
	if (init.related !== undefined) {
		finding.related = Object.freeze(init.related.map((ref) => Object.freeze({ ...ref })));
	}
	if (init.suggestion !== undefined) {
		finding.suggestion = init.suggestion;
	}
	return Object.freeze(finding);
}
