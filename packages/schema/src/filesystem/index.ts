/**
 * Filesystem module exports.
 */

export {
	BUNDLED_SCHEMA_DIR,
	MCU_SCHEMA_SUBDIR,
	PERIPHERAL_SCHEMA_SUBDIR,
	resolveSchemaDirectory,
} from "./paths.js";

export {
	type SchemaParseOptions,
	type SchemaLoadOptions,
	detectFormat,
	describeSchemaFinding,
	parsePeripheralSchemaContent,
	parseMcuDescriptorContent,
	descriptorName,
	parsePeripheralSchemaFile,
	parseMcuDescriptorFile,
	findSchemaFiles,
	loadSchemaRegistry,
	loadBundledSchemaRegistry,
} from "./schema-loader.js";

export { SchemaRegistryCache } from "./registry-cache.js";
