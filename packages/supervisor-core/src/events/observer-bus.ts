/**
 * Observer bus for runtime events. One bus per invocation; no singleton.
 */

import type {
  ILogger,
  SupervisorEvent,
  SupervisorEventMap,
  SupervisorEventOf,
  SupervisorEventType,
  SupervisorObserver,
  Unsubscribe,
} from '@switchboard/supervisor-contracts';

export interface ObserverBus {
  emit(event: SupervisorEvent): void;
  on(observer: SupervisorObserver): Unsubscribe;
  onType<T extends SupervisorEventType>(
    type: T,
    callback: (event: Extract<SupervisorEvent, { type: T }>) => void,
  ): Unsubscribe;
}

/**
 * Create a new observer bus.
 *
 * A throwing observer is reported to the logger and skipped; the remaining
 * observers and the run continue.
 */
export function createObserverBus(logger: ILogger, observers: readonly SupervisorObserver[] = []): ObserverBus {
  const listeners: Set<SupervisorObserver> = new Set(observers);
  const typeListeners: Map<SupervisorEventType, Set<SupervisorObserver>> = new Map();

  const notify = (callback: SupervisorObserver, event: SupervisorEvent): void => {
    try {
      callback(event);
    } catch (error) {
      logger.warn('Observer failed', {
        event: event.type,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  };

  return {
    emit(event: SupervisorEvent): void {
      for (const callback of listeners) {
        notify(callback, event);
      }

      const typeCallbacks = typeListeners.get(event.type);
      if (typeCallbacks) {
        for (const callback of typeCallbacks) {
          notify(callback, event);
        }
      }
    },

    on(observer: SupervisorObserver): Unsubscribe {
      listeners.add(observer);
      return () => {
        listeners.delete(observer);
      };
    },

    onType<T extends SupervisorEventType>(
      type: T,
      callback: (event: Extract<SupervisorEvent, { type: T }>) => void,
    ): Unsubscribe {
      const wrapped: SupervisorObserver = (event) => {
        if (isEventOfType(event, type)) {
          callback(event);
        }
      };

      let callbacks = typeListeners.get(type);
      if (!callbacks) {
        callbacks = new Set();
        typeListeners.set(type, callbacks);
      }
      callbacks.add(wrapped);

      return () => {
        typeListeners.get(type)?.delete(wrapped);
      };
    },
  };
}

/**
 * Build an event envelope with the current timestamp.
 */
export function createEvent<T extends SupervisorEventType>(
  type: T,
  runId: string,
  data: SupervisorEventMap[T],
): SupervisorEventOf<T> {
  return {
    type,
    timestamp: new Date().toISOString(),
    runId,
    data,
  };
}

function isEventOfType<T extends SupervisorEventType>(
  event: SupervisorEvent,
  type: T,
): event is Extract<SupervisorEvent, { type: T }> {
  return event.type === type;
}
