/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @rubricator/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { createConsoleLogger, isLogLevel, withContext } from "./ConsoleLogger.js";
