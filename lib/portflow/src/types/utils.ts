/**
 * Utility types shared across portflow
 */

/**
 * JSON-compatible value (non-circular, serializable)
 */
export type SerializableValue = string | number | boolean | null | undefined;

/**
 * Serializable type (no functions, symbols, etc.)
 */
export type Serializable =
  | SerializableValue
  | readonly Serializable[]
  | { readonly [key: string]: Serializable };

/**
 * Node configuration object. Each node type reads its own fields.
 */
export interface NodeConfig {
  [key: string]: unknown;
}

/**
 * Function type for hook unregistration
 */
export type UnsubscribeFn = () => void;

/**
 * Type guard for checking if value is defined
 */
export function isDefined<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

/**
 * Type guard for checking if value is an object
 */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
