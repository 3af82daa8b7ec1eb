/**
 * @fileoverview Classification Strategy Contract
 *
 * A strategy is one independent way of looking at an input: an embedding
 * comparison, a keyword table, a call to an external model. The runner
 * executes each strategy inside its own failure boundary, so a strategy
 * may throw or hang without affecting its siblings.
 *
 * Design principles:
 * - Independent: no strategy reads another strategy's output
 * - Capability-checked: unavailable strategies are skipped, not failed
 * - Cancellable: long calls should honour `context.signal`
 *
 * @module @rubricator/engine/contracts/Strategy
 */

import type { Logger } from "./Logger.js";

/**
 * Context provided to a strategy for one run.
 */
export interface StrategyContext {
    /** Read-only configuration passed by the caller */
    readonly config: Readonly<Record<string, unknown>>;

    /** Logger scoped to this strategy and trace */
    readonly logger: Logger;

    /** Trace ID of the request that triggered this run */
    readonly traceId: string;

    /** Aborted when the runner gives up on the strategy (timeout) */
    readonly signal: AbortSignal;
}

/**
 * Classification strategy.
 *
 * @typeParam TInput - What the strategy evaluates
 * @typeParam TOutput - What it produces
 *
 * @example
 * ```typescript
 * const keywordStrategy: ClassificationStrategy<string, CategoryVote> = {
 *     id: "keywords",
 *     run(text) {
 *         return createCategoryVote("keywords", text.includes("tax") ? ["Business"] : [], 0.4);
 *     },
 * };
 * ```
 */
export interface ClassificationStrategy<TInput, TOutput> {
    /** Unique identifier, used in logs, events and provenance */
    readonly id: string;

    /** Optional human-readable name */
    readonly name?: string;

    /**
     * Capability check. When it returns false the runner reports the
     * strategy as skipped without calling `run`.
     */
    isAvailable?(): boolean;

    /**
     * Evaluate the input.
     *
     * @param input - The value to evaluate (read-only)
     * @param context - Logger, trace ID and abort signal for this run
     */
    run(input: TInput, context: StrategyContext): Promise<TOutput> | TOutput;
}
