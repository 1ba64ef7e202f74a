/**
 * EventBus: publish/subscribe for provider events.
 *
 * Handlers can be sync or async. A throwing or rejecting handler is logged
 * and does not stop delivery to the others.
 */

import type { EventBus as IEventBus, EventHandler, ProviderEvent } from "@relaykit/sdk";
import { createLogger, type Logger } from "@relaykit/shared";

export function createEventBus(logger: Logger = createLogger("EventBus")): IEventBus {
  const handlers = new Map<string, Set<EventHandler>>();
  const wildcardHandlers = new Set<EventHandler>();

  function getOrCreate(type: string): Set<EventHandler> {
    let set = handlers.get(type);
    if (!set) {
      set = new Set();
      handlers.set(type, set);
    }
    return set;
  }

  function safeCall(handler: EventHandler, event: ProviderEvent): void {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          logger.error("Async handler error", { type: event.type, error: String(err) });
        });
      }
    } catch (err) {
      logger.error("Sync handler error", { type: event.type, error: String(err) });
    }
  }

  const bus: IEventBus = {
    on(type: string, handler: EventHandler): () => void {
      const set = getOrCreate(type);
      set.add(handler);
      return () => {
        set.delete(handler);
      };
    },

    once(type: string, handler: EventHandler): () => void {
      const wrapper: EventHandler = (event) => {
        unsub();
        return handler(event);
      };
      const unsub = bus.on(type, wrapper);
      return unsub;
    },

    onAny(handler: EventHandler): () => void {
      wildcardHandlers.add(handler);
      return () => {
        wildcardHandlers.delete(handler);
      };
    },

    emit(event: ProviderEvent): void {
      // Copy so handlers may unsubscribe while being called
      const set = handlers.get(event.type);
      if (set) {
        for (const handler of [...set]) {
          safeCall(handler, event);
        }
      }

      for (const handler of [...wildcardHandlers]) {
        safeCall(handler, event);
      }
    },
  };

  return bus;
}

/** Build a timestamped event. */
export function providerEvent(type: string, payload?: unknown): ProviderEvent {
  return { type, timestamp: Date.now(), payload };
}
