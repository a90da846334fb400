/**
 * @description Board configuration parsing for board YAML files.
 *
 * Reads a board document, checks the shape of its sections and builds the
 * immutable BoardConfig the validation pipeline consumes.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import * as yaml from "js-yaml";
import type { BoardConfig, RawBoardConfig } from "../types/board.js";
import { isInstanceMap, normaliseBoardConfig } from "../types/board.js";
import { isRecord } from "../types/values.js";
import { BoardConfigError } from "../errors.js";
import type { Logger } from "../logging.js";
import { createLogger } from "../logging.js";

/** Sections holding named peripheral instances. */
const INSTANCE_SECTIONS = ["uart", "i2c", "spi", "timers"] as const;

/** Every top-level key of a board document. */
const KNOWN_SECTIONS: readonly string[] = ["board", "gpio", ...INSTANCE_SECTIONS];

/**
 * Options for parsing a board document.
 */
export interface BoardParseOptions {
	/** Source path for error messages (optional). */
	sourcePath?: string;
	/** Logger for warnings about ignored content. */
	logger?: Logger;
}

function describeYamlError(error: yaml.YAMLException): string {
	const { mark } = error;
	if (mark) {
		return `YAML syntax error at line ${mark.line + 1}, column ${mark.column + 1}: ${error.reason}`;
	}
	return `YAML syntax error: ${error.reason}`;
}

function isNullish(value: unknown): value is null | undefined {
	return value === undefined || value === null;
}

/**
 * Check the shape of a parsed board document.
 *
 * @param raw - Parsed YAML document
 * @param options - Parse options
 * @returns Shape-checked board document
 * @throws BoardConfigError if a section has the wrong shape
 */
export function checkBoardDocument(raw: unknown, options: BoardParseOptions = {}): RawBoardConfig {
	const { sourcePath } = options;
	const logger = options.logger ?? createLogger();

	if (!isRecord(raw)) {
		throw new BoardConfigError("Board configuration is empty or not a mapping", { configPath: sourcePath });
	}

	const board = raw["board"];
	if (!isRecord(board)) {
		throw new BoardConfigError('Board configuration is missing the "board" section', { configPath: sourcePath });
	}

	const result: RawBoardConfig = { board };

	const gpio = raw["gpio"];
	if (!isNullish(gpio)) {
		if (!Array.isArray(gpio) || !gpio.every(isRecord)) {
			throw new BoardConfigError('Section "gpio" must be a list of mappings', { configPath: sourcePath });
		}
		result.gpio = gpio;
	}

	for (const section of INSTANCE_SECTIONS) {
		const value = raw[section];
		if (isNullish(value)) {
			continue;
		}
		if (!isInstanceMap(value)) {
			throw new BoardConfigError(`Section "${section}" must be a mapping of instance names to mappings`, {
				configPath: sourcePath,
			});
		}
		result[section] = value;
	}

	for (const key of Object.keys(raw)) {
		if (!KNOWN_SECTIONS.includes(key)) {
			logger.warn(`Ignoring unknown section "${key}"${sourcePath ? ` in ${sourcePath}` : ""}`);
		}
	}

	return result;
}

/**
 * Parse board configuration content from a YAML string.
 *
 * @param content - YAML content
 * @param options - Parse options
 * @returns Immutable board configuration
 * @throws BoardConfigError if parsing fails
 */
export function parseBoardContent(content: string, options: BoardParseOptions = {}): BoardConfig {
	let raw: unknown;
	try {
		raw = yaml.load(content, { filename: options.sourcePath });
	} catch (error) {
		if (error instanceof yaml.YAMLException) {
			throw new BoardConfigError(describeYamlError(error), { configPath: options.sourcePath, cause: error });
		}
		throw new BoardConfigError(
			`Failed to parse board configuration: ${error instanceof Error ? error.message : String(error)}`,
			{ configPath: options.sourcePath, cause: error },
		);
	}

	return normaliseBoardConfig(checkBoardDocument(raw, options));
}

/**
 * Parse a board configuration file from a path.
 *
 * @param configPath - Full path to the board YAML file
 * @param options - Parse options (the source path defaults to configPath)
 * @returns Immutable board configuration
 * @throws BoardConfigError if reading or parsing fails
 */
export function parseBoardFile(configPath: string, options: Omit<BoardParseOptions, "sourcePath"> = {}): BoardConfig {
	let content: string;
	try {
		content = fs.readFileSync(configPath, "utf-8");
	} catch (error) {
		throw new BoardConfigError(
			`Failed to read board configuration: ${error instanceof Error ? error.message : String(error)}`,
			{ configPath, cause: error },
		);
	}

	return parseBoardContent(content, { ...options, sourcePath: configPath });
}
