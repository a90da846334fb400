/**
 * @title Schema Directory Paths
 * @description Locates the schema directory a registry is loaded from.
 *
 * @module filesystem
 *
 * @envvar PINWISE_SCHEMA_DIR - Directory holding `mcu/` and `peripherals/` schema documents.
 */

import { fileURLToPath } from "node:url";

/** Directory of the schemas shipped with this package. */
export const BUNDLED_SCHEMA_DIR = fileURLToPath(new URL("../../schemas", import.meta.url));

/** Subdirectory holding MCU descriptors. */
export const MCU_SCHEMA_SUBDIR = "mcu";

/** Subdirectory holding peripheral schemas. */
export const PERIPHERAL_SCHEMA_SUBDIR = "peripherals";

/**
 * Resolve the schema directory from the environment.
 *
 * @param env - Environment variables (defaults to process.env)
 * @returns PINWISE_SCHEMA_DIR when set, otherwise the bundled schema directory
 */
export function resolveSchemaDirectory(env: NodeJS.ProcessEnv = process.env): string {
	const configured = env["PINWISE_SCHEMA_DIR"]?.trim();
	return configured ? configured : BUNDLED_SCHEMA_DIR;
}
