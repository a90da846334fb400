/**
 * Helpers for inspecting untyped values coming out of YAML and JSON documents.
 */

/**
 * Check whether a value is a plain object (not null, not an array).
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * A field counts as absent when it is missing or explicitly null
 * (an empty YAML key parses as null).
 */
export function isAbsent(value: unknown): value is undefined | null {
	return value === undefined || value === null;
}

/**
 * Describe the runtime type of a value for messages.
 */
export function describeValueType(value: unknown): string {
	if (value === null) {
		return "null";
	}
	if (Array.isArray(value)) {
		return "array";
	}
	if (typeof value === "number" && Number.isInteger(value)) {
		return "integer";
	}
	return typeof value;
}

/**
 * Render a value for a message: strings are quoted, everything else is JSON.
 */
export function formatValue(value: unknown): string {
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	return JSON.stringify(value) ?? String(value);
}

/**
 * Recursively freeze an object graph, including the children of objects
 * that were already frozen.
 */
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): T {
	if (value !== null && typeof value === "object" && !seen.has(value)) {
		seen.add(value);
		Object.freeze(value);
		for (const child of Object.values(value)) {
			deepFreeze(child, seen);
		}
	}
	return value;
}

/**
 * Deep-copy a JSON-like value so schema defaults are never shared between configs.
 */
export function cloneValue<T>(value: T): T {
	return structuredClone(value);
}
