/**
 * @title Validation Module
 * @description Barrel export for schema definition validation.
 *
 * @module validation
 */

export {
	validateSchemaDefinition,
	validateSchemaDefinitionSyntax,
	validatePeripheralSchemaStructure,
	validateMcuDescriptorStructure,
} from "./schema-definition.js";

export type {
	SchemaDefinitionSeverity,
	SchemaDefinitionFinding,
	SchemaDocumentFormat,
	SchemaDocumentType,
} from "./schema-definition.js";

export {
	ALLOWED_TOP_LEVEL_KEYS,
	ALLOWED_KINDS,
	ALLOWED_FIELD_PROPERTIES,
	ALLOWED_TYPES,
	ALLOWED_PIN_ROLE_KEYS,
	ALLOWED_ADDRESS_SPACE_KEYS,
	ALLOWED_MCU_KEYS,
	ALLOWED_PERIPHERAL_LIMIT_KEYS,
	PERIPHERAL_META_SCHEMA,
	MCU_META_SCHEMA,
} from "./schema-derived.js";
