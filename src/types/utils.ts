/**
 * Core type utilities for gsq.
 * JSON-safe value types shared by the engine, the cache and DataFrame.
 */

/**
 * Primitive JSON values.
 */
export type JsonPrimitive = string | number | boolean | null;

/**
 * Recursive JSON value type.
 */
export type JsonValue = JsonPrimitive | JsonObject | JsonArray;

/**
 * JSON object type - strictly typed alternative to Record<string, any>
 */
export interface JsonObject {
	[key: string]: JsonValue;
}

/**
 * JSON array type
 */
export interface JsonArray extends Array<JsonValue> {}

/**
 * Placeholder name to substituted value.
 */
export type Bindings = Record<string, string>;

/**
 * Sort direction for DataFrame.sortBy().
 */
export type SortDirection = 'asc' | 'desc';

