/**
 * EventBus — publish/subscribe for metrics events.
 *
 * Handlers can be sync or async. Errors in handlers are caught
 * and logged so one failing reporter cannot stop collection.
 * Executor-scoped handlers see only events whose payload carries
 * their executorId.
 */

import type { EventBus, EventHandler, MetricsEvent, MetricsEventTypeValue } from "@execmon/sdk";
import { createLogger } from "@execmon/shared";

const logger = createLogger("EventBus");

/** executorId from an event payload, if it names one. */
export function executorOf(event: MetricsEvent): string | undefined {
  const { payload } = event;
  if (typeof payload !== "object" || payload === null || !("executorId" in payload)) {
    return undefined;
  }
  return typeof payload.executorId === "string" ? payload.executorId : undefined;
}

export function createEventBus(): EventBus {
  const handlers = new Map<MetricsEventTypeValue, Set<EventHandler>>();
  const wildcardHandlers = new Set<EventHandler>();
  const executorHandlers = new Map<string, Set<EventHandler>>();

  function getOrCreate(type: MetricsEventTypeValue): Set<EventHandler> {
    let set = handlers.get(type);
    if (!set) {
      set = new Set();
      handlers.set(type, set);
    }
    return set;
  }

  function safeCall(handler: EventHandler, event: MetricsEvent): void {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          logger.error("Async handler error", {
            type: event.type,
            error: String(err),
          });
        });
      }
    } catch (err) {
      logger.error("Sync handler error", {
        type: event.type,
        error: String(err),
      });
    }
  }

  const bus: EventBus = {
    on(type: MetricsEventTypeValue, handler: EventHandler): () => void {
      const set = getOrCreate(type);
      set.add(handler);
      return () => {
        set.delete(handler);
      };
    },

    once(type: MetricsEventTypeValue, handler: EventHandler): () => void {
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

    onExecutor(executorId: string, handler: EventHandler): () => void {
      let set = executorHandlers.get(executorId);
      if (!set) {
        set = new Set();
        executorHandlers.set(executorId, set);
      }
      const scoped = set;
      scoped.add(handler);
      return () => {
        scoped.delete(handler);
        if (scoped.size === 0 && executorHandlers.get(executorId) === scoped) {
          executorHandlers.delete(executorId);
        }
      };
    },

    emit(event: MetricsEvent): void {
      const set = handlers.get(event.type);
      if (set) {
        for (const handler of set) {
          safeCall(handler, event);
        }
      }

      for (const handler of wildcardHandlers) {
        safeCall(handler, event);
      }

      const executorId = executorOf(event);
      const scoped = executorId === undefined ? undefined : executorHandlers.get(executorId);
      if (scoped) {
        for (const handler of scoped) {
          safeCall(handler, event);
        }
      }
    },
  };

  return bus;
}
