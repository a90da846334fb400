/**
 * Public type exports for @pinwise/core.
 */

export {
	PERIPHERAL_KINDS,
	type PeripheralKind,
	SCHEMA_KINDS,
	type SchemaKind,
	KIND_LABELS,
	SECTION_KEYS,
	type FieldValues,
	type PeripheralInstance,
	type BoardConfig,
	type RawBoardConfig,
	normaliseBoardConfig,
	getBoardMcu,
	listInstances,
	describeInstance,
	isPeripheralKind,
	isSchemaKind,
	isInstanceMap,
} from "./board.js";

export {
	FIELD_TYPES,
	type FieldType,
	type FieldCondition,
	type FieldDescriptor,
	type PinRoleDescriptor,
	type AddressSpaceDescriptor,
	type PeripheralSchema,
	isFieldType,
	conditionHolds,
	normaliseFieldDescriptor,
	normaliseFieldDescriptorMap,
	normalisePinRole,
	normalisePeripheralSchema,
} from "./schema.js";

export { type NumericRange, type McuDescriptor, normaliseMcuDescriptor, getPeripheralLimit } from "./mcu.js";

export {
	type FindingSeverity,
	FINDING_CODES,
	type FindingCode,
	type PeripheralRef,
	type Finding,
	createFinding,
} from "./finding.js";

export { type SchemaRegistry, createSchemaRegistry } from "./registry.js";

export { isRecord, isAbsent, describeValueType, formatValue, deepFreeze, cloneValue } from "./values.js";
