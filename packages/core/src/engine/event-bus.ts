/**
 * Typed event bus for subsystem notifications.
 *
 * The event map fixes the payload type per event name, so listeners and
 * emitters agree at compile time.
 */

export type EventListener<T> = (data: T) => void;

type ListenerTable<E extends object> = {
  [K in keyof E]?: Set<EventListener<E[K]>>;
};

export class EventBus<E extends object> {
  private listeners: ListenerTable<E> = {};

  on<K extends keyof E>(event: K, callback: EventListener<E[K]>): () => void {
    let listenerSet = this.listeners[event];
    if (!listenerSet) {
      listenerSet = new Set();
      this.listeners[event] = listenerSet;
    }
    listenerSet.add(callback);

    return () => {
      listenerSet?.delete(callback);
      if (listenerSet && listenerSet.size === 0 && this.listeners[event] === listenerSet) {
        delete this.listeners[event];
      }
    };
  }

  once<K extends keyof E>(event: K, callback: EventListener<E[K]>): () => void {
    const unsubscribe = this.on(event, (data) => {
      unsubscribe();
      callback(data);
    });
    return unsubscribe;
  }

  emit<K extends keyof E>(event: K, data: E[K]): void {
    const listenerSet = this.listeners[event];
    if (!listenerSet) {
      return;
    }

    // Snapshot so listeners may unsubscribe while being notified.
    for (const callback of [...listenerSet]) {
      callback(data);
    }
  }

  listenerCount<K extends keyof E>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }

  removeAllListeners<K extends keyof E>(event?: K): void {
    if (event !== undefined) {
      delete this.listeners[event];
      return;
    }
    this.listeners = {};
  }
}
