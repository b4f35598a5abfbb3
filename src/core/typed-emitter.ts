import { EventEmitter } from "node:events";

/** Receives an exception thrown by a listener, with the event it was handling. */
export type ListenerErrorHandler = (event: string, error: unknown) => void;

/**
 * Type-safe event emitter built on node:events. Each event carries a single payload.
 *
 * With an `onListenerError` handler, a throwing listener is reported there and
 * the remaining listeners still run; without one, the exception propagates to
 * the emitter as with node:events.
 *
 * ```ts
 * interface SupervisorEvents {
 *   "state:changed": { from: SupervisorState; to: SupervisorState };
 * }
 * class StartupSupervisor extends TypedEventEmitter<SupervisorEvents> {}
 * ```
 */
export class TypedEventEmitter<TEvents extends object> {
  private readonly emitter = new EventEmitter();
  private readonly onListenerError: ListenerErrorHandler | undefined;

  constructor(onListenerError?: ListenerErrorHandler) {
    this.onListenerError = onListenerError;
  }

  on<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  once<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.once(event, listener);
    return this;
  }

  off<K extends keyof TEvents & string>(event: K, listener: (payload: TEvents[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    const report = this.onListenerError;
    if (!report) return this.emitter.emit(event, payload);

    // rawListeners keeps once() wrappers, so calling them also unregisters them
    const listeners = this.emitter.rawListeners(event);
    for (const listener of listeners) {
      try {
        listener.call(this.emitter, payload);
      } catch (err) {
        report(event, err);
      }
    }
    return listeners.length > 0;
  }

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }
}
