/**
 * Typed event emitter for game lifecycle events.
 *
 * Zero-dependency and synchronous: listeners run in registration
 * order inside `emit`, before the emitting call returns. The event
 * names and payload types come from an event map supplied by the
 * game (see `GameEvents.ts` in the rule engine), so subscribing to an
 * unknown event or passing the wrong payload is a compile-time error.
 *
 * Usage:
 * ```ts
 * const emitter = new GameEventEmitter<GameEventMap>();
 * emitter.on('turn-completed', (payload) => {
 *   console.log(`Seat ${payload.playerIndex} played ${payload.label}`);
 * });
 * ```
 */

/** A callback for a specific event type. */
export type EventListener<M, K extends keyof M> = (payload: M[K]) => void;

type ListenerTable<M> = {
  [K in keyof M]?: Array<EventListener<M, K>>;
};

export class GameEventEmitter<M extends object> {
  private listeners: ListenerTable<M> = {};

  /**
   * Subscribe to an event. Returns an unsubscribe function.
   */
  on<K extends keyof M>(event: K, listener: EventListener<M, K>): () => void {
    const list = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;

    return () => this.off(event, listener);
  }

  /**
   * Subscribe for a single emission only. The returned function
   * cancels the subscription before it fires.
   */
  once<K extends keyof M>(event: K, listener: EventListener<M, K>): () => void {
    const wrapper: EventListener<M, K> = (payload) => {
      this.off(event, wrapper);
      listener(payload);
    };

    return this.on(event, wrapper);
  }

  /**
   * Remove a specific listener for an event.
   */
  off<K extends keyof M>(event: K, listener: EventListener<M, K>): void {
    const list = this.listeners[event];
    if (!list) return;

    const index = list.indexOf(listener);
    if (index !== -1) {
      list.splice(index, 1);
    }
  }

  /**
   * Emit an event. Listeners are called synchronously in registration order.
   */
  emit<K extends keyof M>(event: K, payload: M[K]): void {
    const list = this.listeners[event];
    if (!list || list.length === 0) return;

    // Copy so listeners can unsubscribe during emission
    for (const fn of [...list]) {
      fn(payload);
    }
  }

  /**
   * Remove all listeners, optionally for a specific event only.
   */
  removeAllListeners(event?: keyof M): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  listenerCount(event: keyof M): number {
    return this.listeners[event]?.length ?? 0;
  }
}
