/**
 * @title Field Validator
 * @description Generic interpreter that checks a section's field values
 * against the field descriptors of its schema.
 *
 * Defaults are applied first, for absent fields only, so later stages never
 * see the difference between an explicit and a defaulted value. The checks
 * are local to one section: pin fields are only type-checked here.
 *
 * @module validation
 */

import type { BoardConfig, FieldValues, SchemaKind } from "../types/board.js";
import { describeInstance, listInstances } from "../types/board.js";
import type { Finding } from "../types/finding.js";
import { createFinding } from "../types/finding.js";
import type { FieldDescriptor, FieldType, PeripheralSchema } from "../types/schema.js";
import { conditionHolds } from "../types/schema.js";
import type { SchemaRegistry } from "../types/registry.js";
import { cloneValue, describeValueType, formatValue, isAbsent, isRecord } from "../types/values.js";

/**
 * A section or instance after field validation.
 */
export interface ValidatedInstance {
	readonly kind: SchemaKind;
	/** Instance name; empty for the board section. */
	readonly name: string;
	readonly path: string;
	/** Field values with schema defaults applied. */
	readonly fields: FieldValues;
	/** No error was raised for this instance; its pins can be trusted. */
	readonly valid: boolean;
	/** The instance is not explicitly disabled. */
	readonly enabled: boolean;
}

/**
 * Result of validating one section or instance.
 */
export interface InstanceValidationResult {
	instance: ValidatedInstance;
	findings: Finding[];
}

/**
 * Result of validating every section of a board configuration.
 */
export interface ConfigValidationResult {
	board: ValidatedInstance;
	/** Peripheral instances in traversal order. */
	peripherals: ValidatedInstance[];
	findings: Finding[];
}

const TYPE_DESCRIPTIONS: Readonly<Record<FieldType, string>> = {
	string: "a string",
	integer: "an integer",
	number: "a number",
	boolean: "a boolean",
	pin: "a pin identifier string",
	"pin-list": "a list of pin identifier strings",
	array: "a list",
	object: "a mapping",
};

function matchesType(value: unknown, type: FieldType): boolean {
	switch (type) {
		case "string":
		case "pin":
			return typeof value === "string";
		case "integer":
			return typeof value === "number" && Number.isInteger(value);
		case "number":
			return typeof value === "number" && Number.isFinite(value);
		case "boolean":
			return typeof value === "boolean";
		case "pin-list":
			return Array.isArray(value) && value.every((item) => typeof item === "string");
		case "array":
			return Array.isArray(value);
		case "object":
			return isRecord(value);
	}
}

interface FieldContext {
	kind: SchemaKind;
	name: string;
	path: string;
	label: string;
	findings: Finding[];
}

function report(context: FieldContext, init: Omit<Finding, "peripheral" | "location"> & { field: string }): void {
	const { field, ...rest } = init;
	context.findings.push(
		createFinding({
			...rest,
			location: `${context.path}.${field}`,
			peripheral: { kind: context.kind, instance: context.name },
		}),
	);
}

/**
 * Apply defaults and check a set of field values against their descriptors.
 *
 * @returns Values with defaults applied
 */
function checkFields(
	values: Readonly<Record<string, unknown>>,
	descriptors: Readonly<Record<string, FieldDescriptor>>,
	prefix: string,
	context: FieldContext,
): Record<string, unknown> {
	const resolved: Record<string, unknown> = { ...values };

	for (const [field, descriptor] of Object.entries(descriptors)) {
		if (isAbsent(resolved[field]) && descriptor.default !== undefined) {
			resolved[field] = cloneValue(descriptor.default);
		}
	}

	for (const field of Object.keys(values)) {
		if (!Object.hasOwn(descriptors, field)) {
			report(context, {
				severity: "warning",
				code: "unknown-field",
				message: `${context.label}: unknown field "${prefix}${field}" is ignored`,
				field: `${prefix}${field}`,
			});
		}
	}

	for (const [field, descriptor] of Object.entries(descriptors)) {
		const fieldPath = `${prefix}${field}`;
		const value = resolved[field];

		if (isAbsent(value)) {
			if (descriptor.required) {
				report(context, {
					severity: "error",
					code: "missing-field",
					message: `${context.label}: required field "${fieldPath}" is missing`,
					field: fieldPath,
				});
			} else if (descriptor.requiredWhen && conditionHolds(descriptor.requiredWhen, resolved)) {
				const { field: other, equals } = descriptor.requiredWhen;
				report(context, {
					severity: "error",
					code: "missing-field",
					message: `${context.label}: field "${fieldPath}" is required when "${prefix}${other}" is ${formatValue(equals)}`,
					field: fieldPath,
				});
			}
			continue;
		}

		resolved[field] = checkValue(value, descriptor, fieldPath, context);
	}

	return resolved;
}

/**
 * Check one present value: type, then enum, then range, then nested values.
 *
 * @returns The value with nested defaults applied
 */
function checkValue(value: unknown, descriptor: FieldDescriptor, fieldPath: string, context: FieldContext): unknown {
	if (!matchesType(value, descriptor.type)) {
		report(context, {
			severity: "error",
			code: "type-mismatch",
			message: `${context.label}: field "${fieldPath}" must be ${TYPE_DESCRIPTIONS[descriptor.type]}, got ${describeValueType(value)}`,
			field: fieldPath,
		});
		return value;
	}

	if (descriptor.enum && !descriptor.enum.some((allowed) => allowed === value)) {
		report(context, {
			severity: "error",
			code: "enum-violation",
			message: `${context.label}: field "${fieldPath}" has invalid value ${formatValue(value)} (allowed: ${descriptor.enum.map(formatValue).join(", ")})`,
			field: fieldPath,
		});
	}

	if (typeof value === "number") {
		if (descriptor.min !== undefined && value < descriptor.min) {
			report(context, {
				severity: "error",
				code: "range-violation",
				message: `${context.label}: field "${fieldPath}" value ${value} is below minimum ${descriptor.min}`,
				field: fieldPath,
			});
		} else if (descriptor.max !== undefined && value > descriptor.max) {
			report(context, {
				severity: "error",
				code: "range-violation",
				message: `${context.label}: field "${fieldPath}" value ${value} is above maximum ${descriptor.max}`,
				field: fieldPath,
			});
		}
	}

	if (Array.isArray(value) && descriptor.items) {
		const items = descriptor.items;
		return value.map((item, index) => checkValue(item, items, `${fieldPath}[${index}]`, context));
	}

	if (isRecord(value) && descriptor.properties) {
		return checkFields(value, descriptor.properties, `${fieldPath}.`, context);
	}

	return value;
}

/**
 * Validate one section or instance against its schema.
 *
 * @param kind - Kind of the section
 * @param name - Instance name (empty for the board section)
 * @param path - Dotted location of the section in the board document
 * @param values - Declared field values
 * @param schema - Schema for the kind
 */
export function validateInstanceFields(
	kind: SchemaKind,
	name: string,
	path: string,
	values: FieldValues,
	schema: PeripheralSchema,
): InstanceValidationResult {
	const context: FieldContext = {
		kind,
		name,
		path,
		label: describeInstance(kind, name),
		findings: [],
	};

	const fields = checkFields(values, schema.fields, "", context);

	return {
		instance: {
			kind,
			name,
			path,
			fields,
			valid: !context.findings.some((finding) => finding.severity === "error"),
			enabled: fields["enabled"] !== false,
		},
		findings: context.findings,
	};
}

/**
 * Validate the board section and every peripheral instance of a configuration.
 *
 * @param config - Board configuration
 * @param registry - Loaded schemas
 * @returns Validated sections and the findings, in traversal order
 */
export function validateConfigFields(config: BoardConfig, registry: SchemaRegistry): ConfigValidationResult {
	const findings: Finding[] = [];

	const board = validateInstanceFields("board", "", "board", config.board, registry.schemas.board);
	findings.push(...board.findings);

	const peripherals: ValidatedInstance[] = [];
	for (const instance of listInstances(config)) {
		const result = validateInstanceFields(
			instance.kind,
			instance.name,
			instance.path,
			instance.fields,
			registry.schemas[instance.kind],
		);
		findings.push(...result.findings);
		peripherals.push(result.instance);
	}

	return { board: board.instance, peripherals, findings };
}
