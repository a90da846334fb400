/**
 * @title Schema Loading Module
 * @description Reads MCU descriptors and peripheral schemas from a schema
 * directory and assembles them into a registry.
 *
 * A schema directory holds `mcu/*.json` and `peripherals/*.json` (YAML
 * documents with a `.yml` or `.yaml` extension are accepted too). Every
 * document is linted before it is normalised; a document with lint errors
 * is refused.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { globSync } from "glob";
import type { Logger, McuDescriptor, PeripheralSchema, SchemaRegistry } from "@pinwise/core";
import {
	createLogger,
	createSchemaRegistry,
	getErrorMessage,
	isRecord,
	normaliseMcuDescriptor,
	normalisePeripheralSchema,
	SchemaLoadError,
} from "@pinwise/core";
import type {
	SchemaDefinitionFinding,
	SchemaDocumentFormat,
	SchemaDocumentType,
} from "../validation/schema-definition.js";
import {
	validateMcuDescriptorStructure,
	validatePeripheralSchemaStructure,
	validateSchemaDefinitionSyntax,
} from "../validation/schema-definition.js";
import { BUNDLED_SCHEMA_DIR, MCU_SCHEMA_SUBDIR, PERIPHERAL_SCHEMA_SUBDIR } from "./paths.js";

/**
 * Options for parsing a schema document.
 */
export interface SchemaParseOptions {
	/** Source path for error messages (optional). */
	sourcePath?: string;
	/** Content format (default: detected from sourcePath, else "json"). */
	format?: SchemaDocumentFormat;
	/** Logger for lint warnings. */
	logger?: Logger;
}

/**
 * Options for loading a schema directory.
 */
export interface SchemaLoadOptions {
	/** Logger for progress output and lint warnings. */
	logger?: Logger;
}

const STRUCTURE_VALIDATORS: Readonly<Record<SchemaDocumentType, (parsed: unknown) => SchemaDefinitionFinding[]>> = {
	peripheral: validatePeripheralSchemaStructure,
	mcu: validateMcuDescriptorStructure,
};

const DOCUMENT_LABELS: Readonly<Record<SchemaDocumentType, string>> = {
	peripheral: "peripheral schema",
	mcu: "MCU descriptor",
};

/**
 * Detect the schema format from a file path based on its extension.
 */
export function detectFormat(filePath: string): SchemaDocumentFormat {
	return /\.ya?ml$/i.test(filePath) ? "yaml" : "json";
}

/**
 * Render a lint finding as a single line.
 */
export function describeSchemaFinding(finding: SchemaDefinitionFinding): string {
	if (finding.line !== undefined) {
		return `line ${finding.line + 1}, column ${(finding.column ?? 0) + 1}: ${finding.message}`;
	}
	return finding.keyPath ? `${finding.keyPath}: ${finding.message}` : finding.message;
}

/**
 * Lint and parse a schema document.
 *
 * @returns The parsed document
 * @throws SchemaLoadError if the document has lint errors
 */
function parseDocument(
	content: string,
	documentType: SchemaDocumentType,
	options: SchemaParseOptions,
): Record<string, unknown> {
	const { sourcePath } = options;
	const format = options.format ?? (sourcePath ? detectFormat(sourcePath) : "json");
	const logger = options.logger ?? createLogger();
	const label = DOCUMENT_LABELS[documentType];

	const syntax = validateSchemaDefinitionSyntax(content, format);
	const parsed = syntax.error ? undefined : syntax.parsed;
	const findings = syntax.error ?? STRUCTURE_VALIDATORS[documentType](parsed);
	const errors = findings.filter((finding) => finding.severity === "error");

	for (const warning of findings.filter((finding) => finding.severity === "warning")) {
		logger.warn(`${sourcePath ?? label}: ${describeSchemaFinding(warning)}`);
	}

	if (errors.length > 0 || !isRecord(parsed)) {
		throw new SchemaLoadError(`Invalid ${label}: ${errors.map(describeSchemaFinding).join("; ")}`, {
			schemaPath: sourcePath,
		});
	}

	return parsed;
}

/**
 * Parse peripheral schema content.
 *
 * @param content - Schema content (JSON or YAML)
 * @param options - Parse options
 * @returns Normalised peripheral schema
 * @throws SchemaLoadError if the document is invalid
 */
export function parsePeripheralSchemaContent(content: string, options: SchemaParseOptions = {}): PeripheralSchema {
	return normalisePeripheralSchema(parseDocument(content, "peripheral", options));
}

/**
 * Parse MCU descriptor content.
 *
 * @param name - Descriptor name
 * @param content - Descriptor content (JSON or YAML)
 * @param options - Parse options
 * @returns Normalised MCU descriptor
 * @throws SchemaLoadError if the document is invalid
 */
export function parseMcuDescriptorContent(name: string, content: string, options: SchemaParseOptions = {}): McuDescriptor {
	return normaliseMcuDescriptor(name, parseDocument(content, "mcu", options));
}

function readDocument(schemaPath: string): string {
	try {
		return fs.readFileSync(schemaPath, "utf-8");
	} catch (error) {
		throw new SchemaLoadError(`Failed to read schema file: ${getErrorMessage(error)}`, {
			schemaPath,
			cause: error,
		});
	}
}

/**
 * Name of the descriptor stored at a path (the file stem).
 */
export function descriptorName(schemaPath: string): string {
	return path.basename(schemaPath, path.extname(schemaPath));
}

/**
 * Parse a peripheral schema file from a path.
 *
 * @param schemaPath - Full path to the schema file
 * @param options - Load options
 * @returns Normalised peripheral schema
 * @throws SchemaLoadError if reading or parsing fails
 */
export function parsePeripheralSchemaFile(schemaPath: string, options: SchemaLoadOptions = {}): PeripheralSchema {
	return parsePeripheralSchemaContent(readDocument(schemaPath), { ...options, sourcePath: schemaPath });
}

/**
 * Parse an MCU descriptor file from a path. The descriptor is named after the file stem.
 *
 * @param schemaPath - Full path to the descriptor file
 * @param options - Load options
 * @returns Normalised MCU descriptor
 * @throws SchemaLoadError if reading or parsing fails
 */
export function parseMcuDescriptorFile(schemaPath: string, options: SchemaLoadOptions = {}): McuDescriptor {
	return parseMcuDescriptorContent(descriptorName(schemaPath), readDocument(schemaPath), {
		...options,
		sourcePath: schemaPath,
	});
}

/**
 * List the schema documents of a subdirectory, sorted by path.
 *
 * @param directory - Schema directory
 * @param subdirectory - "mcu" or "peripherals"
 * @returns Absolute paths of the documents
 */
export function findSchemaFiles(directory: string, subdirectory: string): string[] {
	return globSync(`${subdirectory}/*.{json,yml,yaml}`, {
		cwd: directory,
		nodir: true,
		absolute: true,
	}).sort();
}

/**
 * Load every MCU descriptor and peripheral schema of a schema directory.
 *
 * @param directory - Directory holding `mcu/` and `peripherals/`
 * @param options - Load options
 * @returns Frozen registry
 * @throws SchemaLoadError if the directory is missing, a document is invalid, or a kind is missing
 */
export function loadSchemaRegistry(directory: string, options: SchemaLoadOptions = {}): SchemaRegistry {
	const logger = options.logger ?? createLogger();

	if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
		throw new SchemaLoadError(`Schema directory not found: ${directory}`, { schemaPath: directory });
	}

	const mcus = findSchemaFiles(directory, MCU_SCHEMA_SUBDIR).map((file) => {
		const descriptor = parseMcuDescriptorFile(file, { logger });
		logger.info(
			`Loaded MCU descriptor ${descriptor.name}: ${descriptor.patterns.length} pattern(s), ${descriptor.packageType}`,
		);
		return descriptor;
	});

	const schemas = findSchemaFiles(directory, PERIPHERAL_SCHEMA_SUBDIR).map((file) => {
		const schema = parsePeripheralSchemaFile(file, { logger });
		logger.debug(`Loaded ${schema.kind} schema from ${file}`);
		return schema;
	});

	if (mcus.length === 0) {
		logger.warn(`No MCU descriptors found in ${path.join(directory, MCU_SCHEMA_SUBDIR)}`);
	}

	try {
		return createSchemaRegistry(mcus, schemas);
	} catch (error) {
		throw new SchemaLoadError(`${getErrorMessage(error)} in ${directory}`, { schemaPath: directory, cause: error });
	}
}

/**
 * Load the schemas shipped with this package.
 */
export function loadBundledSchemaRegistry(options: SchemaLoadOptions = {}): SchemaRegistry {
	return loadSchemaRegistry(BUNDLED_SCHEMA_DIR, options);
}
