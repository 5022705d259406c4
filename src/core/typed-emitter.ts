import { EventEmitter } from "node:events";

/**
 * Type-safe event emitter built on node:events.
 *
 * Listener exceptions never reach the emitting code: the supervisor emits
 * from timer ticks and transport callbacks, and an observer bug must not stop
 * the watchdog. Failures go to {@link TypedEventEmitter.onListenerError}.
 *
 * Usage:
 * ```ts
 * interface MonitorEvents {
 *   stats: WatchdogStats;
 *   anomaly: Anomaly;
 * }
 * class Monitor extends TypedEventEmitter<MonitorEvents> {}
 * ```
 */
// biome-ignore lint/suspicious/noExplicitAny: generic constraint must accept any event payload shape
export class TypedEventEmitter<TEvents extends Record<string, any>> {
  private emitter = new EventEmitter();

  constructor(maxListeners = 50) {
    this.emitter.setMaxListeners(maxListeners);
  }

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, this.guard(event, listener));
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.once(event, this.guard(event, listener));
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    const byListener = this.wrappers.get(event);
    const wrapped = byListener?.get(listener);
    if (byListener && wrapped) {
      this.emitter.off(event, wrapped);
      byListener.delete(listener);
    }
    return this;
  }

  /** Subscribe and get back the matching unsubscribe function. */
  subscribe<K extends keyof TEvents & string>(
    event: K,
    listener: (payload: TEvents[K]) => void,
  ): () => void {
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }

  removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
      this.wrappers.delete(event);
    } else {
      this.emitter.removeAllListeners();
      this.wrappers.clear();
    }
    return this;
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    return this.emitter.emit(event, payload);
  }

  /** Called when a listener throws. Subclasses log; the default drops it. */
  protected onListenerError(_event: string, _error: unknown): void {}

  // Event, then listener identity, so off() can find the guarded wrapper
  private readonly wrappers = new Map<string, WeakMap<object, (...args: unknown[]) => void>>();

  private guard<K extends keyof TEvents & string>(
    event: K,
    listener: (payload: TEvents[K]) => void,
  ): (...args: unknown[]) => void {
    const wrapped = (...args: unknown[]) => {
      try {
        listener(args[0] as TEvents[K]);
      } catch (err) {
        this.onListenerError(event, err);
      }
    };
    let byListener = this.wrappers.get(event);
    if (!byListener) {
      byListener = new WeakMap();
      this.wrappers.set(event, byListener);
    }
    byListener.set(listener, wrapped);
    return wrapped;
  }
}
