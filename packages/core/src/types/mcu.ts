/**
 * @title MCU Types Module
 * @description MCU family descriptors: part-number patterns, package layout,
 * peripheral instance limits and electrical ranges.
 *
 * @module types
 */

import type { PeripheralKind } from "./board.js";
import { isRecord } from "./values.js";

/**
 * Inclusive numeric range; either bound may be open.
 */
export interface NumericRange {
	readonly min?: number;
	readonly max?: number;
}

/**
 * Read-only constraint record for an MCU family.
 */
export interface McuDescriptor {
	/** Descriptor name (schema file stem, e.g. "stm32f407vx"). */
	readonly name: string;
	/** Part-number patterns, e.g. "STM32F407V.*". */
	readonly patterns: readonly string[];
	/** Package name, e.g. "LQFP100". */
	readonly packageType: string;
	/** Physical pin count of the package. */
	readonly pinCount: number;
	/** Highest pin index available per GPIO port letter. */
	readonly gpioPorts: Readonly<Record<string, number>>;
	/** Instance limits keyed "<kind>_count". */
	readonly peripheralLimits: Readonly<Record<string, number>>;
	/** Valid core clock frequency in Hz. */
	readonly clockFrequency?: NumericRange;
	/** Valid supply voltage in V. */
	readonly voltage?: NumericRange;
}

function normaliseRange(raw: unknown): NumericRange | undefined {
	if (!isRecord(raw)) {
		return undefined;
	}
	const min = raw["min"];
	const max = raw["max"];
	return {
		min: typeof min === "number" ? min : undefined,
		max: typeof max === "number" ? max : undefined,
	};
}

function normaliseNumberMap(raw: unknown, pick: (value: unknown) => number | undefined): Record<string, number> {
	const result: Record<string, number> = {};
	if (!isRecord(raw)) {
		return result;
	}
	for (const [key, value] of Object.entries(raw)) {
		const picked = pick(value);
		if (picked !== undefined) {
			result[key] = picked;
		}
	}
	return result;
}

/**
 * Normalise a raw MCU schema document.
 *
 * @param name - Descriptor name
 * @param raw - Parsed MCU schema document (already linted)
 * @returns Normalised McuDescriptor
 */
export function normaliseMcuDescriptor(name: string, raw: Record<string, unknown>): McuDescriptor {
	const patterns = raw["mcu_patterns"];
	const constraints = isRecord(raw["package_constraints"]) ? raw["package_constraints"] : {};
	const packageInfo = isRecord(raw["package_info"]) ? raw["package_info"] : {};
	const packageType = packageInfo["package_type"];
	const pinCount = packageInfo["pin_count"];

	return {
		name,
		patterns: Array.isArray(patterns) ? patterns.filter((p): p is string => typeof p === "string") : [],
		packageType: typeof packageType === "string" ? packageType : "Unknown",
		pinCount: typeof pinCount === "number" ? pinCount : 0,
		gpioPorts: normaliseNumberMap(constraints["gpio_ports"], (port) => {
			const max = isRecord(port) ? port["max"] : undefined;
			return typeof max === "number" ? max : undefined;
		}),
		peripheralLimits: normaliseNumberMap(constraints["peripheral_limits"], (limit) =>
			typeof limit === "number" ? limit : undefined,
		),
		clockFrequency: normaliseRange(raw["clock_frequency"]),
		voltage: normaliseRange(raw["voltage"]),
	};
}

/**
 * Get the instance limit a descriptor sets for a peripheral kind, if any.
 */
export function getPeripheralLimit(descriptor: McuDescriptor, kind: PeripheralKind): number | undefined {
	return descriptor.peripheralLimits[`${kind}_count`];
}
