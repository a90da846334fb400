/**
 * @title Pin Usage Collector
 * @description Walks the validated instances and records every pin claim.
 *
 * Instances are visited in traversal order (GPIO, UART, I2C, SPI, timers,
 * each in declaration order) and roles in the order their schema declares
 * them, so the sequence number of a claim fixes which claimant is "first".
 *
 * @module validation
 */

import type { PeripheralKind, SchemaKind } from "../types/board.js";
import { isPeripheralKind } from "../types/board.js";
import type { PeripheralSchema, PinRoleDescriptor } from "../types/schema.js";
import { conditionHolds } from "../types/schema.js";
import type { ValidatedInstance } from "./field-validator.js";

/**
 * Ownership of one physical pin by one peripheral function.
 */
export interface PinClaim {
	/** Normalised pin identifier, e.g. "PA9". */
	readonly pin: string;
	readonly kind: PeripheralKind;
	readonly instance: string;
	/** Location of the owning instance, e.g. "uart.uart1". */
	readonly path: string;
	/** Function role, e.g. "TX", "output" or "CS0". */
	readonly role: string;
	/** Field the pin was declared in. */
	readonly field: string;
	/** Position in traversal order, starting at 0. */
	readonly sequence: number;
}

/**
 * Every claim of a run, in traversal order and grouped by pin.
 */
export interface PinUsage {
	readonly claims: readonly PinClaim[];
	/** Pin → claims on it, in traversal order. */
	readonly byPin: ReadonlyMap<string, readonly PinClaim[]>;
}

/**
 * Parsed form of a `P<port><index>` identifier.
 */
export interface PinId {
	port: string;
	index: number;
}

/**
 * Normalise a declared pin identifier: trimmed, upper case, and for
 * `P<port><index>` identifiers the index without leading zeros ("pa09" → "PA9").
 */
export function normalisePinId(pin: string): string {
	const text = pin.trim().toUpperCase();
	const parsed = parsePinId(text);
	return parsed ? `P${parsed.port}${parsed.index}` : text;
}

/**
 * Parse a normalised pin identifier.
 *
 * @example
 * ```ts
 * parsePinId("PA9");  // { port: "A", index: 9 }
 * parsePinId("VDD");  // null
 * ```
 */
export function parsePinId(pin: string): PinId | null {
	const match = /^P([A-Z])(\d{1,3})$/.exec(pin);
	if (!match) {
		return null;
	}
	return { port: match[1], index: parseInt(match[2], 10) };
}

/**
 * Order pins by port letter, then numeric index. Unparseable identifiers sort last.
 */
export function comparePinIds(a: string, b: string): number {
	const left = parsePinId(a);
	const right = parsePinId(b);
	if (left && right) {
		if (left.port !== right.port) {
			return left.port < right.port ? -1 : 1;
		}
		return left.index - right.index;
	}
	if (left) {
		return -1;
	}
	if (right) {
		return 1;
	}
	return a < b ? -1 : a > b ? 1 : 0;
}

function isPinSet(value: unknown): value is string {
	return typeof value === "string" && value.trim() !== "";
}

/**
 * Check whether a pin role has no pin assigned (absent, blank or an empty list).
 */
export function isPinRoleUnset(value: unknown): boolean {
	if (Array.isArray(value)) {
		return !value.some(isPinSet);
	}
	return !isPinSet(value);
}

function roleName(role: PinRoleDescriptor, instance: ValidatedInstance): string {
	if (role.roleField) {
		const value = instance.fields[role.roleField];
		if (isPinSet(value)) {
			return value;
		}
	}
	return role.role;
}

/**
 * Collect the pin claims of every valid, enabled peripheral instance.
 *
 * @param instances - Validated peripheral instances in traversal order
 * @param schemas - Schema per kind
 * @returns Claims in traversal order, grouped by pin
 */
export function collectPinClaims(
	instances: readonly ValidatedInstance[],
	schemas: Readonly<Record<SchemaKind, PeripheralSchema>>,
): PinUsage {
	const claims: PinClaim[] = [];
	const byPin = new Map<string, PinClaim[]>();

	const claim = (instance: ValidatedInstance & { kind: PeripheralKind }, pin: string, role: string, field: string) => {
		const entry: PinClaim = Object.freeze({
			pin: normalisePinId(pin),
			kind: instance.kind,
			instance: instance.name,
			path: instance.path,
			role,
			field,
			sequence: claims.length,
		});
		claims.push(entry);
		const onPin = byPin.get(entry.pin) ?? [];
		onPin.push(entry);
		byPin.set(entry.pin, onPin);
	};

	for (const instance of instances) {
		if (!instance.valid || !instance.enabled || !isPeripheralOwned(instance)) {
			continue;
		}

		for (const role of schemas[instance.kind].pins) {
			if (!conditionHolds(role.when, instance.fields)) {
				continue;
			}
			const value = instance.fields[role.field];
			const name = roleName(role, instance);

			if (Array.isArray(value)) {
				value.forEach((pin, index) => {
					if (isPinSet(pin)) {
						claim(instance, pin, `${name}${index}`, role.field);
					}
				});
			} else if (isPinSet(value)) {
				claim(instance, value, name, role.field);
			}
		}
	}

	return { claims, byPin };
}

function isPeripheralOwned(instance: ValidatedInstance): instance is ValidatedInstance & { kind: PeripheralKind } {
	return isPeripheralKind(instance.kind);
}

/**
 * Sorted list of every claimed pin.
 */
export function listUsedPins(usage: PinUsage): string[] {
	return [...usage.byPin.keys()].sort(comparePinIds);
}
