// Typed multi-subscriber notifications.

/** Listener for an event whose arguments are the tuple `Args`. */
export type Listener<Args extends unknown[]> = (...args: Args) => void;

/** Map from event name to argument tuple. */
export type EventMap<Events> = { [K in keyof Events]: unknown[] };

type ListenerSets<Events extends EventMap<Events>> = {
  [K in keyof Events]?: Set<Listener<Events[K]>>;
};

/**
 * Registry of listeners per event.
 *
 * Emitting iterates over a snapshot, so a listener may subscribe or
 * unsubscribe while an event is being delivered. A listener that throws is
 * handed to `onListenerError` and the remaining listeners still run.
 */
export class EventHub<Events extends EventMap<Events>> {
  private listeners: ListenerSets<Events> = {};

  constructor(private readonly onListenerError: (error: unknown, event: keyof Events) => void) {}

  /** Subscribe; returns a function that unsubscribes. */
  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    let set = this.listeners[event];
    if (!set) {
      set = new Set();
      this.listeners[event] = set;
    }
    set.add(listener);
    return () => this.off(event, listener);
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    this.listeners[event]?.delete(listener);
  }

  emit<K extends keyof Events>(event: K, ...args: Events[K]): void {
    const set = this.listeners[event];
    if (!set) return;

    for (const listener of [...set]) {
      try {
        listener(...args);
      } catch (error) {
        this.onListenerError(error, event);
      }
    }
  }

  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }
}
