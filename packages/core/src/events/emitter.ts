/**
 * Generic, strictly-typed event emitter.
 *
 * Handlers run synchronously in registration order. A handler that throws
 * never propagates into the emitting code path: the error goes to the
 * `onListenerError` callback and the remaining handlers still run.
 *
 * @typeParam EventMap - A type alias mapping event names to handler signatures.
 *
 * @example
 * ```typescript
 * type ProtectionEvents = {
 *   detected: (contextId: string) => void;
 * };
 *
 * class Protector extends TypedEventEmitter<ProtectionEvents> {
 *   flag(contextId: string) {
 *     this.emit("detected", contextId);
 *   }
 * }
 *
 * const protector = new Protector();
 * protector.on("detected", (id) => console.log(id)); // fully typed
 * ```
 */

// Internal handler type: handlers are stored untyped and the public API
// generics carry compile-time safety.
type AnyHandler = (...args: unknown[]) => void;

export type ListenerErrorHandler = (event: string, error: unknown) => void;

export interface TypedEventEmitterOptions {
  /** Receives errors thrown by handlers. Default: `console.error`. */
  onListenerError?: ListenerErrorHandler;
}

const reportToConsole: ListenerErrorHandler = (event, error) => {
  console.error(`TypedEventEmitter: listener for "${event}" threw:`, error);
};

export class TypedEventEmitter<
  EventMap extends Record<string, (...args: never[]) => void>,
> {
  private readonly listeners = new Map<keyof EventMap, Set<AnyHandler>>();
  private readonly onListenerError: ListenerErrorHandler;

  constructor(options: TypedEventEmitterOptions = {}) {
    this.onListenerError = options.onListenerError ?? reportToConsole;
  }

  /**
   * Register a handler for an event. The handler will be called each time
   * the event is emitted.
   */
  on<E extends keyof EventMap & string>(event: E, handler: EventMap[E]): void {
    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(handler as unknown as AnyHandler);
  }

  /** Remove a previously registered handler. Unknown handlers are ignored. */
  off<E extends keyof EventMap & string>(event: E, handler: EventMap[E]): void {
    this.listeners.get(event)?.delete(handler as unknown as AnyHandler);
  }

  /** Register a handler that is removed after its first invocation. */
  once<E extends keyof EventMap & string>(
    event: E,
    handler: EventMap[E],
  ): void {
    const wrapper: AnyHandler = (...args: unknown[]) => {
      this.off(event, wrapper as unknown as EventMap[E]);
      (handler as unknown as AnyHandler)(...args);
    };

    this.on(event, wrapper as unknown as EventMap[E]);
  }

  listenerCount<E extends keyof EventMap & string>(event: E): number {
    return this.listeners.get(event)?.size ?? 0;
  }

  /** Remove all listeners, optionally for a specific event only. */
  removeAllListeners<E extends keyof EventMap & string>(event?: E): void {
    if (event !== undefined) {
      this.listeners.delete(event);
    } else {
      this.listeners.clear();
    }
  }

  /**
   * Call every handler registered for `event`.
   *
   * @returns `true` if any handlers were called.
   */
  protected emit<E extends keyof EventMap & string>(
    event: E,
    ...args: Parameters<EventMap[E]>
  ): boolean {
    const set = this.listeners.get(event);
    if (!set || set.size === 0) return false;

    // Snapshot so `once` wrappers removing themselves don't disturb iteration.
    for (const handler of [...set]) {
      try {
        handler(...(args as unknown[]));
      } catch (err) {
        this.onListenerError(event, err);
      }
    }

    return true;
  }
}
