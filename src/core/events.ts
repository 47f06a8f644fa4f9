/**
 * Event system for the content index.
 * Typed event names and payloads, with a minimal emitter implementation.
 */

/**
 * Handler for one event's payload.
 */
export type EventHandler<T> = (payload: T) => void;

type ListenerMap<Events> = { [K in keyof Events]?: Set<EventHandler<Events[K]>> };

/**
 * Simple event emitter implementation
 *
 * `Events` maps each event name to its payload type. Listener errors are
 * logged and never reach the emitting code.
 */
export class SimpleEventEmitter<Events extends object> {
  private listeners: ListenerMap<Events> = {};

  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    const eventListeners = this.listeners[event] ?? new Set<EventHandler<Events[K]>>();
    eventListeners.add(handler);
    this.listeners[event] = eventListeners;

    return () => this.off(event, handler);
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const eventListeners = this.listeners[event];
    if (eventListeners) {
      eventListeners.forEach((handler) => {
        try {
          handler(payload);
        } catch (error) {
          console.error(`Error in event listener for ${String(event)}:`, error);
        }
      });
    }
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    const eventListeners = this.listeners[event];
    if (eventListeners) {
      eventListeners.delete(handler);
      if (eventListeners.size === 0) {
        delete this.listeners[event];
      }
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }
}
