/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow for categorization runs. Events make every strategy
 * outcome observable without coupling the orchestrator to its consumers
 * (CLI logging, tests, metrics).
 *
 * Design decisions:
 * - Synchronous dispatch, in memory
 * - Ordering is preserved within a single event type
 * - A failing handler never affects the run that emitted the event
 *
 * @module @rubricator/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 * All events must have a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Trace ID for correlation */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Events emitted around a whole categorization request.
 */
export type CategorizationEventType =
    | "categorization:started"
    | "categorization:completed"
    | "categorization:rejected";

/**
 * Events emitted by the strategy runner for each strategy call.
 */
export type StrategyEventType =
    | "strategy:completed"
    | "strategy:failed"
    | "strategy:skipped";

/**
 * All known event types. Custom types are accepted as plain strings.
 */
export type EventType = CategorizationEventType | StrategyEventType | (string & {});

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void | Promise<void>;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("strategy:failed", (event) => {
 *     console.warn("Strategy failed:", event.data);
 * });
 *
 * bus.emit(createEvent("strategy:failed", { strategyId: "zero-shot" }, "tr_abc"));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    emit(event: EventPayload): void;

    /**
     * Register a handler for one event type, or for every type with `"*"`.
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Like subscribe(), but the handler is removed after its first call.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Drop the handlers of one type; `"*"` or no argument drops all.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Build a frozen payload stamped with the current time. `traceId` and
 * `data` are left off when not given.
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return Object.freeze({
        type,
        timestamp: new Date().toISOString(),
        ...(traceId !== undefined && { traceId }),
        ...(data !== undefined && { data }),
    });
}
