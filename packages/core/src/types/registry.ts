/**
 * @title Schema Registry Types Module
 * @description The read-only set of MCU descriptors and peripheral schemas a
 * validation run is checked against.
 *
 * @module types
 */

import type { SchemaKind } from "./board.js";
import { SCHEMA_KINDS } from "./board.js";
import type { McuDescriptor } from "./mcu.js";
import type { PeripheralSchema } from "./schema.js";
import { deepFreeze } from "./values.js";
import { SchemaLoadError } from "../errors.js";

/**
 * Loaded, frozen registries. Safe to share between validation runs.
 */
export interface SchemaRegistry {
	readonly mcus: readonly McuDescriptor[];
	readonly schemas: Readonly<Record<SchemaKind, PeripheralSchema>>;
}

/**
 * Assemble a registry, requiring exactly one schema per kind.
 *
 * @param mcus - MCU descriptors
 * @param schemas - Peripheral schemas (one per kind, including "board")
 * @returns Frozen registry
 * @throws SchemaLoadError if a kind is missing or declared twice
 */
export function createSchemaRegistry(mcus: readonly McuDescriptor[], schemas: Iterable<PeripheralSchema>): SchemaRegistry {
	const byKind = new Map<SchemaKind, PeripheralSchema>();

	for (const schema of schemas) {
		if (byKind.has(schema.kind)) {
			throw new SchemaLoadError(`Duplicate peripheral schema for kind "${schema.kind}"`);
		}
		byKind.set(schema.kind, schema);
	}

	const missing = SCHEMA_KINDS.filter((kind) => !byKind.has(kind));
	if (missing.length > 0) {
		throw new SchemaLoadError(`Missing peripheral schemas for: ${missing.join(", ")}`);
	}

	const pick = (kind: SchemaKind): PeripheralSchema => {
		const schema = byKind.get(kind);
		if (!schema) {
			throw new SchemaLoadError(`Missing peripheral schema for kind "${kind}"`);
		}
		return schema;
	};

	return deepFreeze({
		mcus: [...mcus],
		schemas: {
			board: pick("board"),
			gpio: pick("gpio"),
			uart: pick("uart"),
			i2c: pick("i2c"),
			spi: pick("spi"),
			timer: pick("timer"),
		},
	});
}
