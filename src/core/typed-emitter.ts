import { EventEmitter } from "node:events";

export type ListenerErrorHandler = (event: string, error: unknown) => void;

/**
 * Type-safe event emitter built on node:events.
 *
 * A listener that throws does not stop the remaining listeners. With an
 * `onListenerError` handler the error is reported there and emit() returns
 * normally; without one the first error is rethrown once every listener ran.
 *
 * ```ts
 * interface ServerEvents {
 *   event: HookEvent;
 *   permissionDeliveryFailed: { sessionId: string; toolUseId: string };
 * }
 * class Server extends TypedEventEmitter<ServerEvents> {}
 * ```
 */
export class TypedEventEmitter<TEvents extends object> {
  private emitter = new EventEmitter();
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

  listenerCount<K extends keyof TEvents & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  protected emit<K extends keyof TEvents & string>(event: K, payload: TEvents[K]): boolean {
    // rawListeners keeps once() wrappers, so calling them also unregisters them.
    const listeners = this.emitter.rawListeners(event);
    const errors: unknown[] = [];
    for (const listener of listeners) {
      try {
        listener.call(this, payload);
      } catch (error) {
        if (this.onListenerError) {
          this.onListenerError(event, error);
        } else {
          errors.push(error);
        }
      }
    }
    if (errors.length > 0) throw errors[0];
    return listeners.length > 0;
  }
}
