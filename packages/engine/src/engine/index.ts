/**
 * @fileoverview Engine barrel exports
 *
 * @module @rubricator/engine/engine
 */

export {
    StrategyRunner,
    StrategyTimeoutError,
    generateTraceId,
    outcomeValueOr,
    kDefaultStrategyTimeoutMs,
    type StrategyOutcome,
    type StrategySucceeded,
    type StrategyFailed,
    type StrategySkipped,
    type StrategyRunnerConfig,
} from "./StrategyRunner.js";
export {
    combineVotes,
    kDefaultCombineOptions,
    type CombineOptions,
    type CategoryTally,
    type EnsembleDecision,
} from "./EnsembleCombiner.js";
