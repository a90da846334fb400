/**
 * @title Board Types Module
 * @description Configuration model for a board: its metadata section and
 * the peripheral instances declared in each section.
 *
 * @module types
 */

import { cloneValue, deepFreeze, isRecord } from "./values.js";

/**
 * Peripheral kinds, in the order the pin collector walks them.
 */
export const PERIPHERAL_KINDS = ["gpio", "uart", "i2c", "spi", "timer"] as const;

export type PeripheralKind = (typeof PERIPHERAL_KINDS)[number];

/**
 * Every kind that has a schema document: the peripheral kinds plus the board section.
 */
export const SCHEMA_KINDS = ["board", ...PERIPHERAL_KINDS] as const;

export type SchemaKind = (typeof SCHEMA_KINDS)[number];

/** Display label for each kind. */
export const KIND_LABELS: Readonly<Record<SchemaKind, string>> = {
	board: "Board",
	gpio: "GPIO",
	uart: "UART",
	i2c: "I2C",
	spi: "SPI",
	timer: "Timer",
};

/** Section key used for each peripheral kind in a board document. */
export const SECTION_KEYS: Readonly<Record<PeripheralKind, string>> = {
	gpio: "gpio",
	uart: "uart",
	i2c: "i2c",
	spi: "spi",
	timer: "timers",
};

/**
 * Raw field values of one section or instance, exactly as declared.
 */
export type FieldValues = Readonly<Record<string, unknown>>;

/**
 * One configured occurrence of a peripheral kind (e.g. `uart1`).
 */
export interface PeripheralInstance {
	readonly kind: PeripheralKind;
	/** Instance name (mapping key, or `gpio[<index>]` for GPIO entries). */
	readonly name: string;
	/** Dotted location of the instance in the board document. */
	readonly path: string;
	readonly fields: FieldValues;
}

/**
 * Complete board configuration. Frozen once built.
 */
export interface BoardConfig {
	/** Board metadata: name, mcu, clock_frequency, voltage, description. */
	readonly board: FieldValues;
	/** Instances per kind, in declaration order. */
	readonly peripherals: Readonly<Record<PeripheralKind, readonly PeripheralInstance[]>>;
}

/**
 * Board document as parsed from YAML, after its sections have been shape-checked.
 */
export interface RawBoardConfig {
	board: Record<string, unknown>;
	gpio?: Record<string, unknown>[];
	uart?: Record<string, Record<string, unknown>>;
	i2c?: Record<string, Record<string, unknown>>;
	spi?: Record<string, Record<string, unknown>>;
	timers?: Record<string, Record<string, unknown>>;
}

function mapInstances(
	kind: Exclude<PeripheralKind, "gpio">,
	section: Record<string, Record<string, unknown>> | undefined,
): PeripheralInstance[] {
	if (!section) {
		return [];
	}
	return Object.entries(section).map(([name, fields]) => ({
		kind,
		name,
		path: `${SECTION_KEYS[kind]}.${name}`,
		fields: cloneValue(fields),
	}));
}

/**
 * Build a frozen BoardConfig from a raw board document.
 *
 * @param raw - Shape-checked board document
 * @returns Immutable board configuration
 */
export function normaliseBoardConfig(raw: RawBoardConfig): BoardConfig {
	const gpio: PeripheralInstance[] = (raw.gpio ?? []).map((fields, index) => ({
		kind: "gpio",
		name: `gpio[${index}]`,
		path: `gpio[${index}]`,
		fields: cloneValue(fields),
	}));

	return deepFreeze({
		board: cloneValue(raw.board),
		peripherals: {
			gpio,
			uart: mapInstances("uart", raw.uart),
			i2c: mapInstances("i2c", raw.i2c),
			spi: mapInstances("spi", raw.spi),
			timer: mapInstances("timer", raw.timers),
		},
	});
}

/**
 * Get the declared MCU part number, or an empty string when there is none.
 */
export function getBoardMcu(config: BoardConfig): string {
	const mcu = config.board["mcu"];
	return typeof mcu === "string" ? mcu.trim() : "";
}

/**
 * All instances in collector traversal order (GPIO, UART, I2C, SPI, timers).
 */
export function listInstances(config: BoardConfig): PeripheralInstance[] {
	return PERIPHERAL_KINDS.flatMap((kind) => config.peripherals[kind]);
}

/**
 * Human-readable name of a section or instance, e.g. "UART uart1" or "Board".
 */
export function describeInstance(kind: SchemaKind, name?: string): string {
	return name ? `${KIND_LABELS[kind]} ${name}` : KIND_LABELS[kind];
}

/**
 * Check whether a value is a peripheral kind.
 */
export function isPeripheralKind(value: unknown): value is PeripheralKind {
	return typeof value === "string" && PERIPHERAL_KINDS.some((kind) => kind === value);
}

/**
 * Check whether a value is a schema kind.
 */
export function isSchemaKind(value: unknown): value is SchemaKind {
	return typeof value === "string" && SCHEMA_KINDS.some((kind) => kind === value);
}

/**
 * Check whether every value of a mapping section is an object.
 */
export function isInstanceMap(value: unknown): value is Record<string, Record<string, unknown>> {
	return isRecord(value) && Object.values(value).every(isRecord);
}
