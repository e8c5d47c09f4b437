/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A simple, synchronous, in-memory event bus for single-process runs.
 *
 * @module @mltriage/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - A throwing handler is reported and skipped; the rest still run
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("thread:classified", (event) => {
 *     console.log("Classified:", event.data);
 * });
 *
 * bus.emit(createEvent("thread:classified", { groupId: "<abc@example.com>" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();

    /**
     * Create a new bus.
     *
     * @param onHandlerError - Called when a handler throws (default: console.error)
     */
    constructor(
        private readonly onHandlerError: (eventType: string, error: unknown) => void = (eventType, error) => {
            console.error(`EventBus handler error for ${eventType}:`, error);
        }
    ) {}

    /**
     * Emit an event to all subscribers.
     *
     * Events are dispatched synchronously to all matching handlers.
     * Handlers for "*" receive all events.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
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

    /**
     * Subscribe to events of a specific type, auto-unsubscribe after first event.
     *
     * @param eventType - The event type to subscribe to
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for manual unsubscription if needed
     */
    once(eventType: EventType, handler: EventHandler): Subscription {
        const wrappedHandler: EventHandler = (event) => {
            subscription.unsubscribe();
            return handler(event);
        };

        const subscription = this.subscribe(eventType, wrappedHandler);
        return subscription;
    }

    /**
     * Remove all subscriptions for a specific event type.
     *
     * @param eventType - The event type to clear (or "*" for all, undefined clears everything)
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Get the number of handlers for a specific event type.
     * Useful for testing.
     *
     * @param eventType - The event type to check
     * @returns Number of handlers
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        // Copy so once() handlers can unsubscribe mid-dispatch
        for (const handler of [...handlers]) {
            try {
                const result = handler(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => this.onHandlerError(event.type, error));
                }
            }
            catch (error) {
                this.onHandlerError(event.type, error);
            }
        }
    }
}
