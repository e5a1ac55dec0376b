type EventCallback<T = unknown> = (payload: T) => void;

type ListenerMap<Events> = {
  [K in keyof Events]?: Set<EventCallback<Events[K]>>;
};

/**
 * Typed publish/subscribe keyed by an event map. One bus per owner, no
 * shared singleton.
 */
export class EventBus<Events extends object> {
  private listeners: ListenerMap<Events> = {};

  on<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    const callbacks = this.listeners[event] ?? new Set<EventCallback<Events[K]>>();
    this.listeners[event] = callbacks;
    callbacks.add(callback);

    return () => this.off(event, callback);
  }

  off<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): void {
    const callbacks = this.listeners[event];
    if (callbacks) {
      callbacks.delete(callback);
    }
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const callbacks = this.listeners[event];
    if (callbacks) {
      callbacks.forEach((callback) => callback(payload));
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }

  clear(): void {
    this.listeners = {};
  }
}
