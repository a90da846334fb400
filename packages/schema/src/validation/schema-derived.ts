/**
 * @title Schema-Derived Constants
 * @description Derives validation constants from the JSON Schema documents
 * describing peripheral schemas (peripheral-schema.json) and MCU descriptors
 * (mcu-schema.json).
 *
 * All derivation runs once at module load time.
 *
 * @module validation
 */

import * as fs from "node:fs";
import { isRecord } from "@pinwise/core";

function readMetaSchema(filename: string): Record<string, unknown> {
	const url = new URL(`../../schemas/meta/${filename}`, import.meta.url);
	const parsed: unknown = JSON.parse(fs.readFileSync(url, "utf-8"));
	if (!isRecord(parsed)) {
		throw new TypeError(`Meta-schema ${filename} is not an object`);
	}
	return parsed;
}

function child(node: Record<string, unknown>, ...keys: string[]): Record<string, unknown> {
	let current = node;
	for (const key of keys) {
		const next = current[key];
		if (!isRecord(next)) {
			throw new TypeError(`Meta-schema is missing "${keys.join(".")}"`);
		}
		current = next;
	}
	return current;
}

function stringEnum(node: Record<string, unknown>): string[] {
	const values = node["enum"];
	return Array.isArray(values) ? values.filter((value): value is string => typeof value === "string") : [];
}

/** Meta-schema for peripheral schema documents. */
export const PERIPHERAL_META_SCHEMA = readMetaSchema("peripheral-schema.json");

/** Meta-schema for MCU descriptor documents. */
export const MCU_META_SCHEMA = readMetaSchema("mcu-schema.json");

// ---------------------------------------------------------------------------
// Peripheral schema documents.
// ---------------------------------------------------------------------------

/** Allowed top-level keys in a peripheral schema document. */
export const ALLOWED_TOP_LEVEL_KEYS = new Set<string>(Object.keys(child(PERIPHERAL_META_SCHEMA, "properties")));

/** Allowed values of "kind". */
export const ALLOWED_KINDS = new Set<string>(stringEnum(child(PERIPHERAL_META_SCHEMA, "properties", "kind")));

/** Allowed properties on a field descriptor. */
export const ALLOWED_FIELD_PROPERTIES = new Set<string>(
	Object.keys(child(PERIPHERAL_META_SCHEMA, "$defs", "fieldDescriptor", "properties")),
);

/** Allowed type values for a field descriptor. */
export const ALLOWED_TYPES = new Set<string>(
	stringEnum(child(PERIPHERAL_META_SCHEMA, "$defs", "fieldDescriptor", "properties", "type")),
);

/** Allowed properties on a pin role entry. */
export const ALLOWED_PIN_ROLE_KEYS = new Set<string>(
	Object.keys(child(PERIPHERAL_META_SCHEMA, "$defs", "pinRole", "properties")),
);

/** Allowed properties on an address space entry. */
export const ALLOWED_ADDRESS_SPACE_KEYS = new Set<string>(
	Object.keys(child(PERIPHERAL_META_SCHEMA, "$defs", "addressSpace", "properties")),
);

// ---------------------------------------------------------------------------
// MCU descriptor documents.
// ---------------------------------------------------------------------------

/** Allowed top-level keys in an MCU descriptor document. */
export const ALLOWED_MCU_KEYS = new Set<string>(Object.keys(child(MCU_META_SCHEMA, "properties")));

/** Allowed keys of package_constraints.peripheral_limits. */
export const ALLOWED_PERIPHERAL_LIMIT_KEYS = new Set<string>(
	Object.keys(child(MCU_META_SCHEMA, "properties", "package_constraints", "properties", "peripheral_limits", "properties")),
);
