/**
 * @fileoverview Rubricator Engine
 *
 * Domain-agnostic plumbing for multi-strategy classification.
 *
 * The engine provides:
 * - Isolated, deadline-bounded strategy execution
 * - Confidence-weighted ensemble voting
 * - Tagged outcomes for untrusted model replies
 * - An in-memory event bus and a levelled console logger
 *
 * @module @rubricator/engine
 * @example
 * ```typescript
 * import {
 *     StrategyRunner,
 *     combineVotes,
 *     createCategoryVote,
 * } from "@rubricator/engine";
 *
 * const runner = new StrategyRunner({ timeoutMs: 10_000 });
 * const outcome = await runner.run(myStrategy, input);
 * const decision = combineVotes([createCategoryVote("rules", ["AI"], 0.4)]);
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export type {
    CategoryKey,
    CategoryVote,
    ClassificationStrategy,
    StrategyContext,
    Outcome,
    OkOutcome,
    FallbackOutcome,
    Logger,
    LogLevel,
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    CategorizationEventType,
    StrategyEventType,
    Subscription,
} from "./contracts/index.js";
export {
    createCategoryVote,
    getEffectiveConfidence,
    ok,
    fallback,
    isFallback,
    kSilentLogger,
    describeError,
    createEvent,
} from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    InMemoryEventBus,
    createConsoleLogger,
    isLogLevel,
    withContext,
} from "./impl/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    StrategyRunner,
    StrategyTimeoutError,
    generateTraceId,
    outcomeValueOr,
    kDefaultStrategyTimeoutMs,
    combineVotes,
    kDefaultCombineOptions,
    type StrategyOutcome,
    type StrategySucceeded,
    type StrategyFailed,
    type StrategySkipped,
    type StrategyRunnerConfig,
    type CombineOptions,
    type CategoryTally,
    type EnsembleDecision,
} from "./engine/index.js";
