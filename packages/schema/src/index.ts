/**
 * @pinwise/schema - Schema document linting, loading, and caching for
 * MCU descriptors and peripheral schemas.
 *
 * This library provides functionality for:
 * - The bundled schema directory (STM32F407Vx, STM32F103C8, peripheral schemas)
 * - Schema document parsing (mcu/*.json, peripherals/*.json)
 * - Schema document validation (structure and semantic checks)
 * - Registry caching (in-memory lazy-loading cache)
 */

// Filesystem exports
export * from "./filesystem/index.js";

// Validation exports
export * from "./validation/index.js";
