/**
 * Type guard utilities for runtime type checking
 * Provides safe type validation for data read from YAML and JSON files
 */

/**
 * Type guard for plain mappings
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard for string arrays
 */
export function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Type guard for non-negative integers
 */
export function isNonNegativeInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}
