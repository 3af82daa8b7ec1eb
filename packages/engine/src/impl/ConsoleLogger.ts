/**
 * @fileoverview Console Logger
 *
 * Levelled logger that prints `[LEVEL] message` followed by the data
 * object through the matching `console` method.
 *
 * @module @rubricator/engine/impl/ConsoleLogger
 */

import type { Logger, LogLevel } from "../contracts/Logger.js";

const kLevelRank: Record<LogLevel, number> = {
    debug : 10,
    info  : 20,
    warn  : 30,
    error : 40,
    silent: 100,
};

/**
 * Narrow a free-form string (e.g. an env variable) to a LogLevel.
 */
export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(kLevelRank, value);
}

/**
 * Create a console logger that drops messages below `level`.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger("info");
 * logger.info("Taxonomy loaded", { categories: 10 });
 * // [INFO] Taxonomy loaded { categories: 10 }
 * ```
 */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
    const threshold = kLevelRank[level];
    const enabled = (candidate: LogLevel): boolean => kLevelRank[candidate] >= threshold;

    return Object.freeze({
        debug: (msg: string, data?: Record<string, unknown>) => {
            if (enabled("debug")) console.debug(`[DEBUG] ${msg}`, data ?? "");
        },
        info: (msg: string, data?: Record<string, unknown>) => {
            if (enabled("info")) console.info(`[INFO] ${msg}`, data ?? "");
        },
        warn: (msg: string, data?: Record<string, unknown>) => {
            if (enabled("warn")) console.warn(`[WARN] ${msg}`, data ?? "");
        },
        error: (msg: string, data?: Record<string, unknown>) => {
            if (enabled("error")) console.error(`[ERROR] ${msg}`, data ?? "");
        },
    });
}

/**
 * Derive a logger that adds fixed fields to every entry.
 */
export function withContext(logger: Logger, fields: Record<string, unknown>): Logger {
    return Object.freeze({
        debug: (msg: string, data?: Record<string, unknown>) => logger.debug(msg, { ...fields, ...data }),
        info : (msg: string, data?: Record<string, unknown>) => logger.info(msg, { ...fields, ...data }),
        warn : (msg: string, data?: Record<string, unknown>) => logger.warn(msg, { ...fields, ...data }),
        error: (msg: string, data?: Record<string, unknown>) => logger.error(msg, { ...fields, ...data }),
    });
}
