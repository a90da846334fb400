/**
 * @title Schema Definition Validation
 * @description Pure validation logic for peripheral schema and MCU descriptor
 * documents.
 *
 * Validates syntax, structure, and semantic correctness of schema documents.
 * Returns an array of findings with severity levels; the loader refuses any
 * document with an error finding.
 *
 * @module validation
 */

import * as yaml from "js-yaml";
import { isRecord } from "@pinwise/core";
import {
	ALLOWED_TOP_LEVEL_KEYS,
	ALLOWED_KINDS,
	ALLOWED_FIELD_PROPERTIES,
	ALLOWED_TYPES,
	ALLOWED_PIN_ROLE_KEYS,
	ALLOWED_ADDRESS_SPACE_KEYS,
	ALLOWED_MCU_KEYS,
	ALLOWED_PERIPHERAL_LIMIT_KEYS,
} from "./schema-derived.js";

/**
 * Severity level for a schema definition finding.
 */
export type SchemaDefinitionSeverity = "error" | "warning";

/**
 * A single validation finding from schema definition analysis.
 */
export interface SchemaDefinitionFinding {
	/** Human-readable description of the issue. */
	message: string;
	/** Severity level. */
	severity: SchemaDefinitionSeverity;
	/** Machine-readable code identifying the check. */
	code: string;
	/** Zero-based line number (when available from syntax errors). */
	line?: number;
	/** Zero-based column number (when available from syntax errors). */
	column?: number;
	/** Dot-separated key path to the problematic location. */
	keyPath?: string;
}

/** Supported schema document formats. */
export type SchemaDocumentFormat = "yaml" | "json";

/** The two kinds of schema document. */
export type SchemaDocumentType = "peripheral" | "mcu";

/** Field types a pin role can point at. */
const PIN_FIELD_TYPES = new Set(["pin", "pin-list"]);

/**
 * Validate a schema document and return all findings.
 *
 * @param content - Raw file content (YAML or JSON string).
 * @param format - File format: "yaml" or "json".
 * @param documentType - Whether the document is a peripheral schema or an MCU descriptor.
 * @returns Array of validation findings.
 */
export function validateSchemaDefinition(
	content: string,
	format: SchemaDocumentFormat,
	documentType: SchemaDocumentType,
): SchemaDefinitionFinding[] {
	const syntaxResult = validateSchemaDefinitionSyntax(content, format);
	if (syntaxResult.error) {
		return syntaxResult.error;
	}
	return documentType === "mcu"
		? validateMcuDescriptorStructure(syntaxResult.parsed)
		: validatePeripheralSchemaStructure(syntaxResult.parsed);
}

/**
 * Validate syntax of a schema document.
 *
 * @param content - Raw file content.
 * @param format - File format.
 * @returns Either an error array or the parsed object.
 */
export function validateSchemaDefinitionSyntax(
	content: string,
	format: SchemaDocumentFormat,
): { error: SchemaDefinitionFinding[] } | { error: null; parsed: unknown } {
	if (content.trim() === "") {
		return {
			error: [{ message: "Schema document is empty.", severity: "error", code: "empty-document" }],
		};
	}

	try {
		const parsed: unknown = format === "json" ? JSON.parse(content) : yaml.load(content);
		return { error: null, parsed };
	} catch (err: unknown) {
		const finding: SchemaDefinitionFinding = {
			message: "",
			severity: "error",
			code: "syntax-error",
		};

		if (format === "yaml" && err instanceof yaml.YAMLException) {
			finding.message = err.reason ?? String(err);
			if (err.mark) {
				finding.line = err.mark.line;
				finding.column = err.mark.column;
			}
		} else if (err instanceof SyntaxError) {
			finding.message = err.message;
		} else {
			finding.message = String(err);
		}

		return { error: [finding] };
	}
}

function checkUnknownKeys(
	raw: Record<string, unknown>,
	allowed: ReadonlySet<string>,
	parentPath: string,
	what: string,
	code: string,
	findings: SchemaDefinitionFinding[],
): void {
	for (const key of Object.keys(raw)) {
		if (!allowed.has(key)) {
			findings.push({
				message: `Unknown ${what} "${key}".`,
				severity: "warning",
				code,
				keyPath: parentPath ? `${parentPath}.${key}` : key,
			});
		}
	}
}

function rootObject(parsed: unknown, findings: SchemaDefinitionFinding[]): Record<string, unknown> | null {
	if (!isRecord(parsed)) {
		findings.push({
			message: "Schema document must be an object.",
			severity: "error",
			code: "invalid-root-type",
		});
		return null;
	}
	return parsed;
}

// ---------------------------------------------------------------------------
// Peripheral schema documents.
// ---------------------------------------------------------------------------

/**
 * Validate the structure and semantics of a parsed peripheral schema.
 *
 * @param parsed - The parsed YAML/JSON object.
 * @returns Array of validation findings.
 */
export function validatePeripheralSchemaStructure(parsed: unknown): SchemaDefinitionFinding[] {
	const findings: SchemaDefinitionFinding[] = [];
	const root = rootObject(parsed, findings);
	if (!root) {
		return findings;
	}

	checkUnknownKeys(root, ALLOWED_TOP_LEVEL_KEYS, "", "top-level key", "unknown-top-level-key", findings);

	const kind = root["kind"];
	if (typeof kind !== "string" || !ALLOWED_KINDS.has(kind)) {
		findings.push({
			message: `"kind" must be one of: ${[...ALLOWED_KINDS].join(", ")}.`,
			severity: "error",
			code: "invalid-kind",
			keyPath: "kind",
		});
	}

	const fields = root["fields"];
	if (!isRecord(fields)) {
		findings.push({
			message: '"fields" must be an object.',
			severity: "error",
			code: "invalid-section-type",
			keyPath: "fields",
		});
		return findings;
	}
	validateFieldDescriptorMap(fields, "fields", findings);

	if (root["pins"] !== undefined) {
		validatePinRoles(root["pins"], fields, findings);
	}

	if (root["addresses"] !== undefined) {
		validateAddressSpace(root["addresses"], fields, findings);
	}

	return findings;
}

/**
 * Validate a map of field descriptors (the "fields" section or nested "properties").
 */
function validateFieldDescriptorMap(
	fields: Record<string, unknown>,
	parentPath: string,
	findings: SchemaDefinitionFinding[],
): void {
	for (const [key, value] of Object.entries(fields)) {
		const keyPath = `${parentPath}.${key}`;
		if (isRecord(value)) {
			validateFieldDescriptor(value, keyPath, fields, findings);
		} else {
			findings.push({
				message: `Field descriptor "${key}" must be an object.`,
				severity: "error",
				code: "invalid-field-descriptor",
				keyPath,
			});
		}
	}
}

/**
 * Validate a single field descriptor for allowed properties, valid types,
 * and semantic consistency.
 */
function validateFieldDescriptor(
	raw: Record<string, unknown>,
	keyPath: string,
	siblings: Record<string, unknown>,
	findings: SchemaDefinitionFinding[],
): void {
	checkUnknownKeys(raw, ALLOWED_FIELD_PROPERTIES, keyPath, "field property", "unknown-field-property", findings);

	const type = raw["type"];
	if (type === undefined) {
		findings.push({
			message: 'Field descriptor is missing "type".',
			severity: "error",
			code: "missing-type",
			keyPath,
		});
	} else if (typeof type !== "string" || !ALLOWED_TYPES.has(type)) {
		findings.push({
			message: `Invalid type "${String(type)}". Allowed types: ${[...ALLOWED_TYPES].join(", ")}.`,
			severity: "error",
			code: "invalid-type",
			keyPath: `${keyPath}.type`,
		});
	}

	if (raw["required_when"] !== undefined) {
		validateCondition(raw["required_when"], `${keyPath}.required_when`, siblings, findings);
	}

	validateFieldSemantics(raw, keyPath, findings);

	const items = raw["items"];
	if (isRecord(items)) {
		validateFieldDescriptor(items, `${keyPath}.items`, {}, findings);
	}

	const properties = raw["properties"];
	if (isRecord(properties)) {
		validateFieldDescriptorMap(properties, `${keyPath}.properties`, findings);
	}
}

/**
 * Validate a `{ field, equals }` condition against the fields it may refer to.
 */
function validateCondition(
	raw: unknown,
	keyPath: string,
	fields: Record<string, unknown>,
	findings: SchemaDefinitionFinding[],
): void {
	if (!isRecord(raw) || typeof raw["field"] !== "string" || !("equals" in raw)) {
		findings.push({
			message: 'Condition must be an object with a string "field" and an "equals" value.',
			severity: "error",
			code: "invalid-condition",
			keyPath,
		});
		return;
	}
	if (!Object.hasOwn(fields, raw["field"])) {
		findings.push({
			message: `Condition refers to undeclared field "${raw["field"]}".`,
			severity: "error",
			code: "unknown-condition-field",
			keyPath: `${keyPath}.field`,
		});
	}
}

/**
 * Run semantic consistency checks on a field descriptor.
 */
function validateFieldSemantics(
	raw: Record<string, unknown>,
	keyPath: string,
	findings: SchemaDefinitionFinding[],
): void {
	const type = raw["type"];
	const min = typeof raw["min"] === "number" ? raw["min"] : undefined;
	const max = typeof raw["max"] === "number" ? raw["max"] : undefined;

	if (raw["min"] !== undefined && min === undefined) {
		findings.push({ message: '"min" must be a number.', severity: "error", code: "invalid-bound", keyPath: `${keyPath}.min` });
	}
	if (raw["max"] !== undefined && max === undefined) {
		findings.push({ message: '"max" must be a number.', severity: "error", code: "invalid-bound", keyPath: `${keyPath}.max` });
	}

	// min > max.
	if (min !== undefined && max !== undefined && min > max) {
		findings.push({
			message: `"min" (${min}) is greater than "max" (${max}).`,
			severity: "error",
			code: "min-greater-than-max",
			keyPath,
		});
	}

	// "items" without type: array.
	if (raw["items"] !== undefined && type !== "array") {
		findings.push({
			message: '"items" is defined but "type" is not "array".',
			severity: "warning",
			code: "items-without-array-type",
			keyPath,
		});
	}

	// "properties" without type: object.
	if (raw["properties"] !== undefined && type !== "object") {
		findings.push({
			message: '"properties" is defined but "type" is not "object".',
			severity: "warning",
			code: "properties-without-object-type",
			keyPath,
		});
	}

	const enumValues = raw["enum"];
	if (enumValues !== undefined && !Array.isArray(enumValues)) {
		findings.push({
			message: '"enum" must be an array.',
			severity: "error",
			code: "invalid-enum",
			keyPath: `${keyPath}.enum`,
		});
	}

	// Empty "enum".
	if (Array.isArray(enumValues) && enumValues.length === 0) {
		findings.push({
			message: '"enum" is empty; no value would be valid.',
			severity: "warning",
			code: "empty-enum",
			keyPath,
		});
	}

	const defaultValue = raw["default"];
	if (defaultValue === undefined) {
		return;
	}

	if (Array.isArray(enumValues) && enumValues.length > 0 && !enumValues.includes(defaultValue)) {
		findings.push({
			message: `Default ${JSON.stringify(defaultValue)} is not one of the "enum" values.`,
			severity: "error",
			code: "default-not-in-enum",
			keyPath: `${keyPath}.default`,
		});
	}

	if (
		typeof defaultValue === "number" &&
		((min !== undefined && defaultValue < min) || (max !== undefined && defaultValue > max))
	) {
		findings.push({
			message: `Default ${defaultValue} is outside the range [${min ?? "-∞"}, ${max ?? "∞"}].`,
			severity: "error",
			code: "default-out-of-range",
			keyPath: `${keyPath}.default`,
		});
	}
}

/**
 * Validate the "pins" section against the declared fields.
 */
function validatePinRoles(pins: unknown, fields: Record<string, unknown>, findings: SchemaDefinitionFinding[]): void {
	if (!Array.isArray(pins)) {
		findings.push({
			message: '"pins" must be an array of pin role entries.',
			severity: "error",
			code: "invalid-section-type",
			keyPath: "pins",
		});
		return;
	}

	pins.forEach((entry: unknown, index) => {
		const keyPath = `pins[${index}]`;
		if (!isRecord(entry)) {
			findings.push({
				message: `Pin role at index ${index} must be an object.`,
				severity: "error",
				code: "invalid-pin-role",
				keyPath,
			});
			return;
		}

		checkUnknownKeys(entry, ALLOWED_PIN_ROLE_KEYS, keyPath, "pin role property", "unknown-pin-role-property", findings);

		const role = entry["role"];
		if (typeof role !== "string" || role.trim() === "") {
			findings.push({
				message: `Pin role at index ${index} is missing a "role" name.`,
				severity: "error",
				code: "missing-pin-role",
				keyPath: `${keyPath}.role`,
			});
		}

		const field = entry["field"];
		const descriptor = typeof field === "string" ? fields[field] : undefined;
		if (typeof field !== "string" || descriptor === undefined) {
			findings.push({
				message: `Pin role refers to undeclared field "${String(field)}".`,
				severity: "error",
				code: "unknown-pin-field",
				keyPath: `${keyPath}.field`,
			});
		} else if (!isRecord(descriptor) || typeof descriptor["type"] !== "string" || !PIN_FIELD_TYPES.has(descriptor["type"])) {
			findings.push({
				message: `Pin role field "${field}" must have type "pin" or "pin-list".`,
				severity: "error",
				code: "invalid-pin-field-type",
				keyPath: `${keyPath}.field`,
			});
		}

		if (entry["when"] !== undefined) {
			validateCondition(entry["when"], `${keyPath}.when`, fields, findings);
		}

		const roleField = entry["role_field"];
		if (roleField !== undefined && (typeof roleField !== "string" || !Object.hasOwn(fields, roleField))) {
			findings.push({
				message: `"role_field" refers to undeclared field "${String(roleField)}".`,
				severity: "error",
				code: "unknown-role-field",
				keyPath: `${keyPath}.role_field`,
			});
		}
	});
}

/**
 * Validate the "addresses" section against the declared fields.
 */
function validateAddressSpace(
	addresses: unknown,
	fields: Record<string, unknown>,
	findings: SchemaDefinitionFinding[],
): void {
	if (!isRecord(addresses)) {
		findings.push({
			message: '"addresses" must be an object.',
			severity: "error",
			code: "invalid-section-type",
			keyPath: "addresses",
		});
		return;
	}

	checkUnknownKeys(
		addresses,
		ALLOWED_ADDRESS_SPACE_KEYS,
		"addresses",
		"address space property",
		"unknown-address-space-property",
		findings,
	);

	const list = addresses["list"];
	const listDescriptor = typeof list === "string" ? fields[list] : undefined;
	if (!isRecord(listDescriptor) || listDescriptor["type"] !== "array") {
		findings.push({
			message: `"addresses.list" must name a declared field of type "array".`,
			severity: "error",
			code: "invalid-address-space",
			keyPath: "addresses.list",
		});
	}

	if (typeof addresses["field"] !== "string") {
		findings.push({
			message: '"addresses.field" must be a string.',
			severity: "error",
			code: "invalid-address-space",
			keyPath: "addresses.field",
		});
	}
}

// ---------------------------------------------------------------------------
// MCU descriptor documents.
// ---------------------------------------------------------------------------

function isNonNegativeInteger(value: unknown): value is number {
	return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Validate the structure and semantics of a parsed MCU descriptor.
 *
 * @param parsed - The parsed YAML/JSON object.
 * @returns Array of validation findings.
 */
export function validateMcuDescriptorStructure(parsed: unknown): SchemaDefinitionFinding[] {
	const findings: SchemaDefinitionFinding[] = [];
	const root = rootObject(parsed, findings);
	if (!root) {
		return findings;
	}

	checkUnknownKeys(root, ALLOWED_MCU_KEYS, "", "top-level key", "unknown-top-level-key", findings);

	const patterns = root["mcu_patterns"];
	if (
		!Array.isArray(patterns) ||
		patterns.length === 0 ||
		!patterns.every((pattern) => typeof pattern === "string" && pattern.trim() !== "")
	) {
		findings.push({
			message: '"mcu_patterns" must be a non-empty array of non-empty strings.',
			severity: "error",
			code: "invalid-mcu-patterns",
			keyPath: "mcu_patterns",
		});
	}

	validatePackageConstraints(root["package_constraints"], findings);

	const packageInfo = root["package_info"];
	if (packageInfo !== undefined) {
		if (
			!isRecord(packageInfo) ||
			(packageInfo["package_type"] !== undefined && typeof packageInfo["package_type"] !== "string") ||
			(packageInfo["pin_count"] !== undefined && !isNonNegativeInteger(packageInfo["pin_count"]))
		) {
			findings.push({
				message: '"package_info" must be an object with a string "package_type" and an integer "pin_count".',
				severity: "error",
				code: "invalid-package-info",
				keyPath: "package_info",
			});
		}
	}

	for (const key of ["clock_frequency", "voltage"]) {
		if (root[key] !== undefined) {
			validateRange(root[key], key, findings);
		}
	}

	return findings;
}

function validatePackageConstraints(constraints: unknown, findings: SchemaDefinitionFinding[]): void {
	if (!isRecord(constraints)) {
		findings.push({
			message: '"package_constraints" must be an object.',
			severity: "error",
			code: "invalid-package-constraints",
			keyPath: "package_constraints",
		});
		return;
	}

	const ports = constraints["gpio_ports"];
	if (!isRecord(ports)) {
		findings.push({
			message: '"package_constraints.gpio_ports" must be an object.',
			severity: "error",
			code: "invalid-package-constraints",
			keyPath: "package_constraints.gpio_ports",
		});
	} else {
		for (const [port, info] of Object.entries(ports)) {
			const keyPath = `package_constraints.gpio_ports.${port}`;
			if (!/^[A-Z]$/.test(port)) {
				findings.push({
					message: `GPIO port "${port}" must be a single upper-case letter.`,
					severity: "error",
					code: "invalid-gpio-port",
					keyPath,
				});
			}
			if (!isRecord(info) || !isNonNegativeInteger(info["max"])) {
				findings.push({
					message: `GPIO port "${port}" must declare a non-negative integer "max".`,
					severity: "error",
					code: "invalid-gpio-port",
					keyPath,
				});
			}
		}
	}

	const limits = constraints["peripheral_limits"];
	if (limits === undefined) {
		return;
	}
	if (!isRecord(limits)) {
		findings.push({
			message: '"package_constraints.peripheral_limits" must be an object.',
			severity: "error",
			code: "invalid-package-constraints",
			keyPath: "package_constraints.peripheral_limits",
		});
		return;
	}
	for (const [key, value] of Object.entries(limits)) {
		const keyPath = `package_constraints.peripheral_limits.${key}`;
		if (!ALLOWED_PERIPHERAL_LIMIT_KEYS.has(key)) {
			findings.push({
				message: `Unknown peripheral limit "${key}".`,
				severity: "warning",
				code: "unknown-peripheral-limit",
				keyPath,
			});
		}
		if (!isNonNegativeInteger(value)) {
			findings.push({
				message: `Peripheral limit "${key}" must be a non-negative integer.`,
				severity: "error",
				code: "invalid-peripheral-limit",
				keyPath,
			});
		}
	}
}

function validateRange(range: unknown, keyPath: string, findings: SchemaDefinitionFinding[]): void {
	if (
		!isRecord(range) ||
		(range["min"] !== undefined && typeof range["min"] !== "number") ||
		(range["max"] !== undefined && typeof range["max"] !== "number")
	) {
		findings.push({
			message: `"${keyPath}" must be an object with numeric "min" and "max".`,
			severity: "error",
			code: "invalid-range",
			keyPath,
		});
		return;
	}

	const { min, max } = range;
	if (typeof min === "number" && typeof max === "number" && min > max) {
		findings.push({
			message: `"min" (${min}) is greater than "max" (${max}).`,
			severity: "error",
			code: "min-greater-than-max",
			keyPath,
		});
	}
}
