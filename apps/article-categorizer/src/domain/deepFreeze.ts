/**
 * @fileoverview Deep freeze
 *
 * @module domain/deepFreeze
 */

/**
 * Recursively freeze plain objects and arrays.
 */
export function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
        Object.freeze(value);
    }
    if (value !== null && typeof value === "object") {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
