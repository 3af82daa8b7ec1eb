/**
 * @fileoverview Logger Contract
 *
 * Structured logger injected into every component. Messages are short,
 * human-readable strings; context goes into `data`.
 *
 * @module @rubricator/engine/contracts/Logger
 */

/**
 * Severity levels in increasing order.
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Logger that discards everything. Default for library code and tests.
 */
export const kSilentLogger: Logger = Object.freeze({
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
});

/**
 * Normalize an unknown thrown value into a loggable message.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
