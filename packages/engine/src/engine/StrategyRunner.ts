/**
 * @fileoverview StrategyRunner
 *
 * Executes a single classification strategy inside its own failure
 * boundary. The returned promise always resolves: a thrown error, a
 * rejected promise or an expired deadline all become a tagged outcome,
 * so callers can fan strategies out with `Promise.all` and never lose the
 * results of healthy siblings.
 *
 * Every call emits one `strategy:*` event on the bus.
 *
 * @module @rubricator/engine/engine/StrategyRunner
 */

import type { ClassificationStrategy, StrategyContext } from "../contracts/Strategy.js";
import type { EventBus } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { Logger } from "../contracts/Logger.js";
import { describeError, kSilentLogger } from "../contracts/Logger.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { withContext } from "../impl/ConsoleLogger.js";

/**
 * Default per-call deadline in milliseconds.
 */
export const kDefaultStrategyTimeoutMs = 30_000;

/**
 * Raised (and reported, never thrown to the caller) when a strategy
 * does not settle within its deadline.
 */
export class StrategyTimeoutError extends Error {
    constructor(
        public readonly strategyId: string,
        public readonly timeoutMs: number
    ) {
        super(`Strategy "${strategyId}" timed out after ${timeoutMs}ms`);
        this.name = "StrategyTimeoutError";
    }
}

export interface StrategySucceeded<T> {
    readonly status: "ok";
    readonly strategyId: string;
    readonly value: T;
    readonly durationMs: number;
}

export interface StrategyFailed {
    readonly status: "failed" | "timeout";
    readonly strategyId: string;
    readonly error: Error;
    readonly durationMs: number;
}

export interface StrategySkipped {
    readonly status: "skipped";
    readonly strategyId: string;
    readonly durationMs: 0;
}

/**
 * Result of running one strategy.
 */
export type StrategyOutcome<T> = StrategySucceeded<T> | StrategyFailed | StrategySkipped;

/**
 * Runner configuration.
 */
export interface StrategyRunnerConfig {
    /** Per-call deadline (default: 30000) */
    readonly timeoutMs?: number;

    /** Bus receiving strategy events (default: a private InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for failures (default: silent) */
    readonly logger?: Logger;

    /** Read-only configuration handed to every strategy */
    readonly config?: Readonly<Record<string, unknown>>;
}

/**
 * Generate a unique trace ID for a categorization request.
 */
export function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * Unwrap a successful outcome or substitute a value.
 */
export function outcomeValueOr<T, F>(outcome: StrategyOutcome<T>, otherwise: F): T | F {
    return outcome.status === "ok" ? outcome.value : otherwise;
}

/**
 * StrategyRunner - isolated, deadline-bounded strategy execution.
 *
 * @example
 * ```typescript
 * const runner = new StrategyRunner({ timeoutMs: 5000, eventBus, logger });
 * const [embedding, labels] = await Promise.all([
 *     runner.run(embeddingStrategy, document, traceId),
 *     runner.run(labelStrategy, document, traceId),
 * ]);
 * if (labels.status === "ok") {
 *     console.log(labels.value.primaryLabel);
 * }
 * ```
 */
export class StrategyRunner {
    private readonly timeoutMs: number;
    private readonly logger: Logger;
    private readonly config: Readonly<Record<string, unknown>>;

    public readonly eventBus: EventBus;

    constructor(config: StrategyRunnerConfig = {}) {
        this.timeoutMs = config.timeoutMs ?? kDefaultStrategyTimeoutMs;
        this.logger = config.logger ?? kSilentLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus(this.logger);
        this.config = config.config ?? {};
    }

    /**
     * Run one strategy. Never rejects.
     *
     * @param strategy - Strategy to execute
     * @param input - Value handed to `strategy.run`
     * @param traceId - Correlation ID for logs and events
     */
    async run<TInput, TOutput>(
        strategy: ClassificationStrategy<TInput, TOutput>,
        input: TInput,
        traceId: string = generateTraceId()
    ): Promise<StrategyOutcome<TOutput>> {
        if (strategy.isAvailable && !strategy.isAvailable()) {
            this.eventBus.emit(createEvent("strategy:skipped", { strategyId: strategy.id }, traceId));
            return { status: "skipped", strategyId: strategy.id, durationMs: 0 };
        }

        const startTime = Date.now();
        const controller = new AbortController();
        const context: StrategyContext = {
            config : this.config,
            logger : withContext(this.logger, { strategyId: strategy.id, traceId }),
            traceId,
            signal : controller.signal,
        };

        let timer: NodeJS.Timeout | undefined;
        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                const timeout = new StrategyTimeoutError(strategy.id, this.timeoutMs);
                controller.abort(timeout);
                reject(timeout);
            }, this.timeoutMs);
        });

        try {
            const execution = Promise.resolve().then(() => strategy.run(input, context));
            const value = await Promise.race([execution, deadline]);
            const durationMs = Date.now() - startTime;

            this.eventBus.emit(createEvent("strategy:completed", {
                strategyId: strategy.id,
                durationMs,
            }, traceId));

            return { status: "ok", strategyId: strategy.id, value, durationMs };
        }
        catch (error) {
            const durationMs = Date.now() - startTime;
            const failure = error instanceof Error ? error : new Error(describeError(error));
            const status = failure instanceof StrategyTimeoutError ? "timeout" : "failed";

            this.logger.warn("Strategy failed", {
                strategyId: strategy.id,
                traceId,
                status,
                error     : failure.message,
            });
            this.eventBus.emit(createEvent("strategy:failed", {
                strategyId: strategy.id,
                status,
                error     : failure.message,
                durationMs,
            }, traceId));

            return { status, strategyId: strategy.id, error: failure, durationMs };
        }
        finally {
            clearTimeout(timer);
        }
    }
}
