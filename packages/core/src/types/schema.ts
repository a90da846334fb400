/**
 * @title Schema Types Module
 * @description Peripheral schema types: field descriptors, pin roles and
 * address spaces, plus normalisation from the raw JSON documents.
 *
 * Schema documents use snake_case keys; the normalised types use camelCase.
 *
 * @module types
 */

import type { FieldValues, SchemaKind } from "./board.js";
import { isSchemaKind } from "./board.js";
import { isRecord } from "./values.js";

/** Field types understood by the field validator. */
export const FIELD_TYPES = ["string", "integer", "number", "boolean", "pin", "pin-list", "array", "object"] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

/**
 * Condition on a sibling field, e.g. `{ field: "mode", equals: "pwm" }`.
 */
export interface FieldCondition {
	readonly field: string;
	readonly equals: unknown;
}

/**
 * Constraints for a single field.
 */
export interface FieldDescriptor {
	readonly type: FieldType;
	/** Field must be present. */
	readonly required?: boolean;
	/** Field must be present when the condition holds. */
	readonly requiredWhen?: FieldCondition;
	/** Value applied when the field is absent. */
	readonly default?: unknown;
	/** Allowed values. */
	readonly enum?: readonly unknown[];
	/** Inclusive numeric lower bound. */
	readonly min?: number;
	/** Inclusive numeric upper bound. */
	readonly max?: number;
	readonly description?: string;
	/** Descriptor for each element when type is "array". */
	readonly items?: FieldDescriptor;
	/** Descriptors of nested properties when type is "object". */
	readonly properties?: Readonly<Record<string, FieldDescriptor>>;
}

/**
 * A pin-carrying field of a peripheral and the function it serves.
 * Declaration order is claim order.
 */
export interface PinRoleDescriptor {
	/** Field holding a pin ("pin" type) or list of pins ("pin-list" type). */
	readonly field: string;
	/** Function role, e.g. "TX" or "SCL". List fields suffix the list index. */
	readonly role: string;
	/** Leaving the role unset yields a missing-pin finding. */
	readonly required?: boolean;
	/** At least one role of the group must be set. */
	readonly group?: string;
	/** Role only applies when the condition holds. */
	readonly when?: FieldCondition;
	/** Take the role name from this field's value instead (GPIO direction). */
	readonly roleField?: string;
}

/**
 * Per-bus address space, checked for duplicate device addresses.
 */
export interface AddressSpaceDescriptor {
	/** Array field listing the devices. */
	readonly list: string;
	/** Device property holding the address. */
	readonly field: string;
	/** Device property holding a display name. */
	readonly nameField?: string;
}

/**
 * Declarative constraints for one kind. Independent of any board.
 */
export interface PeripheralSchema {
	readonly kind: SchemaKind;
	readonly description?: string;
	readonly fields: Readonly<Record<string, FieldDescriptor>>;
	readonly pins: readonly PinRoleDescriptor[];
	readonly addresses?: AddressSpaceDescriptor;
}

/**
 * Check whether a string names a field type.
 */
export function isFieldType(value: unknown): value is FieldType {
	return typeof value === "string" && FIELD_TYPES.some((type) => type === value);
}

/**
 * Evaluate a field condition against a set of values. A missing condition holds.
 */
export function conditionHolds(condition: FieldCondition | undefined, values: FieldValues): boolean {
	return condition === undefined || values[condition.field] === condition.equals;
}

function optionalString(value: unknown): string | undefined {
	return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
	return typeof value === "number" ? value : undefined;
}

function normaliseCondition(raw: unknown): FieldCondition | undefined {
	if (!isRecord(raw) || typeof raw["field"] !== "string") {
		return undefined;
	}
	return { field: raw["field"], equals: raw["equals"] };
}

/**
 * Normalise a raw field descriptor from a schema document.
 *
 * @param raw - Raw descriptor object
 * @returns Normalised FieldDescriptor
 */
export function normaliseFieldDescriptor(raw: Record<string, unknown>): FieldDescriptor {
	const items = raw["items"];
	const properties = raw["properties"];
	const enumValues = raw["enum"];

	return {
		type: isFieldType(raw["type"]) ? raw["type"] : "string",
		required: raw["required"] === true ? true : undefined,
		requiredWhen: normaliseCondition(raw["required_when"]),
		default: raw["default"],
		enum: Array.isArray(enumValues) ? [...enumValues] : undefined,
		min: optionalNumber(raw["min"]),
		max: optionalNumber(raw["max"]),
		description: optionalString(raw["description"]),
		items: isRecord(items) ? normaliseFieldDescriptor(items) : undefined,
		properties: isRecord(properties) ? normaliseFieldDescriptorMap(properties) : undefined,
	};
}

/**
 * Normalise a map of field descriptors, skipping entries that are not objects.
 */
export function normaliseFieldDescriptorMap(raw: Record<string, unknown>): Record<string, FieldDescriptor> {
	const result: Record<string, FieldDescriptor> = {};

	for (const [key, value] of Object.entries(raw)) {
		if (isRecord(value)) {
			result[key] = normaliseFieldDescriptor(value);
		}
	}

	return result;
}

/**
 * Normalise a raw pin role entry.
 */
export function normalisePinRole(raw: Record<string, unknown>): PinRoleDescriptor {
	return {
		field: String(raw["field"] ?? ""),
		role: String(raw["role"] ?? ""),
		required: raw["required"] === true ? true : undefined,
		group: optionalString(raw["group"]),
		when: normaliseCondition(raw["when"]),
		roleField: optionalString(raw["role_field"]),
	};
}

/**
 * Normalise a raw peripheral schema document.
 *
 * @param raw - Parsed schema document (already linted)
 * @returns Normalised PeripheralSchema
 */
export function normalisePeripheralSchema(raw: Record<string, unknown>): PeripheralSchema {
	const kind = raw["kind"];
	if (!isSchemaKind(kind)) {
		throw new TypeError(`Unknown schema kind: ${String(kind)}`);
	}

	const fields = raw["fields"];
	const pins = raw["pins"];
	const addresses = raw["addresses"];

	return {
		kind,
		description: optionalString(raw["description"]),
		fields: isRecord(fields) ? normaliseFieldDescriptorMap(fields) : {},
		pins: Array.isArray(pins) ? pins.filter(isRecord).map(normalisePinRole) : [],
		addresses:
			isRecord(addresses) && typeof addresses["list"] === "string" && typeof addresses["field"] === "string"
				? {
						list: addresses["list"],
						field: addresses["field"],
						nameField: optionalString(addresses["name_field"]),
					}
				: undefined,
	};
}
