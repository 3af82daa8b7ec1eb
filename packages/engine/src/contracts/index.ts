/**
 * @fileoverview Contract barrel exports
 *
 * Domain-agnostic interfaces shared by the engine and the applications
 * built on it.
 *
 * @module @rubricator/engine/contracts
 */

// Category votes
export type { CategoryKey, CategoryVote } from "./CategoryVote.js";
export {
    createCategoryVote,
    getEffectiveConfidence,
} from "./CategoryVote.js";

// Strategy contract
export type {
    ClassificationStrategy,
    StrategyContext,
} from "./Strategy.js";

// Tagged parse outcomes
export type { Outcome, OkOutcome, FallbackOutcome } from "./Outcome.js";
export { ok, fallback, isFallback } from "./Outcome.js";

// Logging
export type { Logger, LogLevel } from "./Logger.js";
export { kSilentLogger, describeError } from "./Logger.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    CategorizationEventType,
    StrategyEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
