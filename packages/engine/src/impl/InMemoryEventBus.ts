/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process event bus used by the categorizer to publish
 * strategy outcomes.
 *
 * @module @rubricator/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { Logger } from "../contracts/Logger.js";
import { describeError } from "../contracts/Logger.js";

/**
 * Logger used when none is injected: handler failures still reach stderr.
 */
const kFallbackLogger: Pick<Logger, "error"> = {
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous dispatch; handlers run in subscription order
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - Handler errors (sync throws and rejected promises) are logged, never rethrown
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus(logger);
 *
 * bus.subscribe("strategy:completed", (event) => {
 *     logger.debug("Strategy completed", event.data);
 * });
 *
 * bus.emit(createEvent("strategy:completed", { strategyId: "embedding" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: Pick<Logger, "error">;

    constructor(logger?: Pick<Logger, "error">) {
        this.logger = logger ?? kFallbackLogger;
    }

    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            return handler(event);
        });
        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers registered for an event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        // Copy so that once() handlers can unsubscribe mid-dispatch
        for (const handler of [...handlers]) {
            try {
                const result = handler(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => this.report(event, error));
                }
            }
            catch (error) {
                this.report(event, error);
            }
        }
    }

    private report(event: EventPayload, error: unknown): void {
        this.logger.error("EventBus handler error", {
            eventType: event.type,
            error    : describeError(error),
        });
    }
}
