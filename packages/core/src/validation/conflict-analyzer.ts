/**
 * @title Conflict Analyzer
 * @description Cross-peripheral checks against the resolved MCU descriptor:
 * package detection, electrical ranges, instance limits, out-of-package pins,
 * pin conflicts, missing pins and device-address conflicts.
 *
 * @module validation
 */

import type { SchemaKind } from "../types/board.js";
import { describeInstance, isPeripheralKind, KIND_LABELS, PERIPHERAL_KINDS, SECTION_KEYS } from "../types/board.js";
import type { Finding, FindingCode, PeripheralRef } from "../types/finding.js";
import { createFinding } from "../types/finding.js";
import type { McuDescriptor, NumericRange } from "../types/mcu.js";
import { getPeripheralLimit } from "../types/mcu.js";
import type { PeripheralSchema, PinRoleDescriptor } from "../types/schema.js";
import { conditionHolds } from "../types/schema.js";
import { isRecord } from "../types/values.js";
import type { ValidatedInstance } from "./field-validator.js";
import type { PinClaim, PinUsage } from "./pin-collector.js";
import { comparePinIds, isPinRoleUnset, parsePinId } from "./pin-collector.js";

/**
 * Everything the analyzer needs from the earlier stages.
 */
export interface ConflictAnalysisInput {
	descriptor: McuDescriptor;
	board: ValidatedInstance;
	/** Peripheral instances in traversal order. */
	peripherals: readonly ValidatedInstance[];
	usage: PinUsage;
	schemas: Readonly<Record<SchemaKind, PeripheralSchema>>;
}

function claimRef(claim: PinClaim): PeripheralRef {
	return { kind: claim.kind, instance: claim.instance };
}

function describeClaim(claim: PinClaim): string {
	return `${KIND_LABELS[claim.kind]} ${claim.instance} ${claim.role}`;
}

function isActive(instance: ValidatedInstance): boolean {
	return instance.valid && instance.enabled && isPeripheralKind(instance.kind);
}

/**
 * Report the package of the resolved MCU.
 */
export function detectPackage(descriptor: McuDescriptor): Finding {
	return createFinding({
		severity: "info",
		code: "package-detected",
		message: `Detected MCU package: ${descriptor.packageType} (${descriptor.pinCount} pins)`,
		location: "board.mcu",
		peripheral: { kind: "board", instance: "" },
	});
}

function checkRange(
	value: unknown,
	range: NumericRange | undefined,
	options: { code: FindingCode; field: string; subject: string; unit: string; mcu: string },
): Finding[] {
	if (typeof value !== "number" || !range) {
		return [];
	}

	const { code, field, subject, unit, mcu } = options;
	let message: string | undefined;
	if (range.max !== undefined && value > range.max) {
		message = `${subject} ${value} ${unit} exceeds maximum ${range.max} ${unit} for ${mcu}`;
	} else if (range.min !== undefined && value < range.min) {
		message = `${subject} ${value} ${unit} is below minimum ${range.min} ${unit} for ${mcu}`;
	}

	if (!message) {
		return [];
	}
	return [
		createFinding({
			severity: "error",
			code,
			message,
			location: `board.${field}`,
			peripheral: { kind: "board", instance: "" },
		}),
	];
}

/**
 * Check the board clock frequency and supply voltage against the descriptor.
 */
export function checkElectricalRanges(board: ValidatedInstance, descriptor: McuDescriptor): Finding[] {
	return [
		...checkRange(board.fields["clock_frequency"], descriptor.clockFrequency, {
			code: "clock-out-of-range",
			field: "clock_frequency",
			subject: "Clock frequency",
			unit: "Hz",
			mcu: descriptor.name,
		}),
		...checkRange(board.fields["voltage"], descriptor.voltage, {
			code: "voltage-out-of-range",
			field: "voltage",
			subject: "Supply voltage",
			unit: "V",
			mcu: descriptor.name,
		}),
	];
}

/**
 * Check each kind's enabled-instance count against the descriptor limits.
 * Instances with field errors still count.
 */
export function checkInstanceLimits(peripherals: readonly ValidatedInstance[], descriptor: McuDescriptor): Finding[] {
	const findings: Finding[] = [];

	for (const kind of PERIPHERAL_KINDS) {
		const limit = getPeripheralLimit(descriptor, kind);
		if (limit === undefined) {
			continue;
		}
		const count = peripherals.filter((instance) => instance.kind === kind && instance.enabled).length;
		if (count > limit) {
			findings.push(
				createFinding({
					severity: "error",
					code: "instance-limit",
					message: `Too many ${KIND_LABELS[kind]} instances enabled: ${count} exceeds limit of ${limit}`,
					location: SECTION_KEYS[kind],
					suggestion: `Disable or remove ${count - limit} ${KIND_LABELS[kind]} instance(s)`,
				}),
			);
		}
	}

	return findings;
}

/**
 * Explain why a pin is not part of the package, or return null when it is.
 */
export function outOfPackageReason(pin: string, descriptor: McuDescriptor): string | null {
	const parsed = parsePinId(pin);
	if (!parsed) {
		return "not a valid pin identifier";
	}
	const max = descriptor.gpioPorts[parsed.port];
	if (max === undefined) {
		return `port ${parsed.port} is not available`;
	}
	if (parsed.index > max) {
		return `index ${parsed.index} exceeds port ${parsed.port} maximum ${max}`;
	}
	return null;
}

/**
 * Report every claim on a pin the package does not provide, one finding per claim.
 */
export function checkPackagePins(usage: PinUsage, descriptor: McuDescriptor): Finding[] {
	const findings: Finding[] = [];

	for (const claim of usage.claims) {
		const reason = outOfPackageReason(claim.pin, descriptor);
		if (reason === null) {
			continue;
		}
		findings.push(
			createFinding({
				severity: "error",
				code: "pin-out-of-package",
				message: `${describeClaim(claim)}: pin ${claim.pin} is not available on ${descriptor.packageType} (${reason})`,
				location: `${claim.path}.${claim.field}`,
				pin: claim.pin,
				peripheral: claimRef(claim),
			}),
		);
	}

	return findings;
}

/**
 * Report every pin with more than one claim, sorted by pin identifier.
 */
export function checkPinConflicts(usage: PinUsage): Finding[] {
	const pins = [...usage.byPin.keys()].sort(comparePinIds);
	const findings: Finding[] = [];

	for (const pin of pins) {
		const claims = usage.byPin.get(pin) ?? [];
		if (claims.length < 2) {
			continue;
		}
		const [first] = claims;
		findings.push(
			createFinding({
				severity: "error",
				code: "pin-conflict",
				message: `Pin ${pin} is claimed by ${claims.length} functions: ${claims.map(describeClaim).join(", ")}`,
				location: `${first.path}.${first.field}`,
				pin,
				peripheral: claimRef(first),
				related: claims.map(claimRef),
				suggestion: "Assign a different pin to all but one of these functions",
			}),
		);
	}

	return findings;
}

function isListRole(role: PinRoleDescriptor, schema: PeripheralSchema): boolean {
	return schema.fields[role.field]?.type === "pin-list";
}

/**
 * Report required pin roles (and role groups) that have no pin assigned.
 */
export function checkRequiredPins(
	peripherals: readonly ValidatedInstance[],
	schemas: Readonly<Record<SchemaKind, PeripheralSchema>>,
): Finding[] {
	const findings: Finding[] = [];

	for (const instance of peripherals) {
		if (!isActive(instance)) {
			continue;
		}
		const schema = schemas[instance.kind];
		const label = describeInstance(instance.kind, instance.name);
		const peripheral: PeripheralRef = { kind: instance.kind, instance: instance.name };
		const groups = new Map<string, PinRoleDescriptor[]>();

		for (const role of schema.pins) {
			if (!conditionHolds(role.when, instance.fields)) {
				continue;
			}
			if (role.group) {
				const members = groups.get(role.group) ?? [];
				members.push(role);
				groups.set(role.group, members);
			}
			if (!role.required || !isPinRoleUnset(instance.fields[role.field])) {
				continue;
			}
			findings.push(
				createFinding({
					severity: "warning",
					code: "missing-pin",
					message: isListRole(role, schema)
						? `${label}: No ${role.role} pins configured`
						: `${label}: ${role.role} pin is not configured`,
					location: `${instance.path}.${role.field}`,
					peripheral,
				}),
			);
		}

		for (const members of groups.values()) {
			if (!members.every((role) => isPinRoleUnset(instance.fields[role.field]))) {
				continue;
			}
			findings.push(
				createFinding({
					severity: "warning",
					code: "missing-pin",
					message: `${label}: No ${members.map((role) => role.role).join(" or ")} pins configured`,
					location: instance.path,
					peripheral,
				}),
			);
		}
	}

	return findings;
}

/**
 * Format a device address the way datasheets write it, e.g. 0x48.
 */
export function formatAddress(address: number): string {
	return `0x${address.toString(16).toUpperCase().padStart(2, "0")}`;
}

/**
 * Report device addresses used more than once within one instance's device list.
 */
export function checkAddressConflicts(
	peripherals: readonly ValidatedInstance[],
	schemas: Readonly<Record<SchemaKind, PeripheralSchema>>,
): Finding[] {
	const findings: Finding[] = [];

	for (const instance of peripherals) {
		const space = schemas[instance.kind].addresses;
		// Field errors elsewhere on the bus do not hide duplicate addresses.
		if (!space || !instance.enabled || !isPeripheralKind(instance.kind)) {
			continue;
		}
		const devices = instance.fields[space.list];
		if (!Array.isArray(devices)) {
			continue;
		}

		const byAddress = new Map<number, string[]>();
		devices.forEach((device: unknown, index) => {
			if (!isRecord(device)) {
				return;
			}
			const address = device[space.field];
			if (typeof address !== "number") {
				return;
			}
			const name = space.nameField ? device[space.nameField] : undefined;
			const users = byAddress.get(address) ?? [];
			users.push(typeof name === "string" && name !== "" ? name : `${space.list}[${index}]`);
			byAddress.set(address, users);
		});

		for (const [address, users] of byAddress) {
			if (users.length < 2) {
				continue;
			}
			findings.push(
				createFinding({
					severity: "error",
					code: "address-conflict",
					message: `${KIND_LABELS[instance.kind]} address conflict on ${instance.name}: ${formatAddress(address)} used by ${users.join(", ")}`,
					location: `${instance.path}.${space.list}`,
					peripheral: { kind: instance.kind, instance: instance.name },
					suggestion: "Give each device on the bus a unique address",
				}),
			);
		}
	}

	return findings;
}

/**
 * Run every cross-peripheral check, in report order.
 *
 * @returns Findings: package, electrical, limits, package pins, conflicts, missing pins, addresses
 */
export function analyzeConflicts(input: ConflictAnalysisInput): Finding[] {
	const { descriptor, board, peripherals, usage, schemas } = input;

	return [
		detectPackage(descriptor),
		...checkElectricalRanges(board, descriptor),
		...checkInstanceLimits(peripherals, descriptor),
		...checkPackagePins(usage, descriptor),
		...checkPinConflicts(usage),
		...checkRequiredPins(peripherals, schemas),
		...checkAddressConflicts(peripherals, schemas),
	];
}
