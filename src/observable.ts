import { logger } from './logger'

export type Listener = (...args: never[]) => void

/// Handles named events.
export class Observable<EventMap extends { [K in keyof EventMap]: Listener }> {
  /// @internal
  _observers = new Map<keyof EventMap, Set<Listener>>()

  /// Listen to an event. Returns a function that removes the listener.
  on<E extends keyof EventMap>(event: E, fn: EventMap[E]): () => void {
    let set = this._observers.get(event)
    if (set === undefined) {
      this._observers.set(event, set = new Set<Listener>())
    }
    set.add(fn)
    return () => this.off(event, fn)
  }

  /// Stop listening to an event.
  off<E extends keyof EventMap>(event: E, fn: EventMap[E]): void {
    let set = this._observers.get(event)
    if (set !== undefined) {
      set.delete(fn)
      if (set.size == 0) this._observers.delete(event)
    }
  }

  /// Emit an event. A throwing listener does not stop the others.
  emit<E extends keyof EventMap>(event: E, ...args: Parameters<EventMap[E]>): void {
    let set = this._observers.get(event)
    if (set) for (let f of Array.from(set)) {
      try {
        Reflect.apply(f, undefined, args)
      } catch (error) {
        logger.error(`Listener of '${String(event)}' failed:`, error)
      }
    }
  }

  /// Number of listeners of an event.
  listenerCount(event: keyof EventMap): number {
    return this._observers.get(event)?.size ?? 0
  }

  /// Remove all subscribers.
  dispose(): void {
    this._observers.clear()
  }
}
