/**
 * @title Schema Registry Cache Module
 * @description In-memory cache for loaded schema registries.
 *
 * Registries are loaded lazily on first access, one per schema directory,
 * without file watchers.
 *
 * @module filesystem
 */

import * as path from "node:path";
import type { Logger, SchemaRegistry } from "@pinwise/core";
import { getErrorMessage } from "@pinwise/core";
import { loadSchemaRegistry } from "./schema-loader.js";

/**
 * Cache for loaded schema registries, keyed by resolved directory.
 */
export class SchemaRegistryCache {
	private cache = new Map<string, SchemaRegistry>();
	private errors = new Map<string, string>();

	constructor(private readonly logger?: Logger) {}

	/**
	 * Get the registry for a schema directory.
	 * Loads and caches the registry on first access.
	 *
	 * @param schemaDir - Path to the schema directory
	 * @returns Loaded registry or null if loading failed (see getError)
	 */
	get(schemaDir: string): SchemaRegistry | null {
		const key = path.resolve(schemaDir);
		const cached = this.cache.get(key);
		if (cached) {
			return cached;
		}

		try {
			const registry = loadSchemaRegistry(key, { logger: this.logger });
			this.errors.delete(key);
			this.cache.set(key, registry);
			return registry;
		} catch (error) {
			this.errors.set(key, getErrorMessage(error));
			return null;
		}
	}

	/**
	 * Get the load error for the given directory, if any.
	 *
	 * @param schemaDir - Path to the schema directory
	 * @returns Error message or null if no error occurred
	 */
	getError(schemaDir: string): string | null {
		return this.errors.get(path.resolve(schemaDir)) ?? null;
	}

	/**
	 * Check whether a registry is cached for the given directory.
	 */
	has(schemaDir: string): boolean {
		return this.cache.has(path.resolve(schemaDir));
	}

	/**
	 * Invalidate the cached registry for a specific directory.
	 */
	invalidate(schemaDir: string): void {
		const key = path.resolve(schemaDir);
		this.cache.delete(key);
		this.errors.delete(key);
	}

	/**
	 * Invalidate all cached registries.
	 */
	invalidateAll(): void {
		this.cache.clear();
		this.errors.clear();
	}
}
