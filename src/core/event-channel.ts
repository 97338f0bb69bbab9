/**
 * EventChannel<T>: single-producer, single-consumer async iterable queue.
 *
 * Bridges the server's synchronous event callbacks to a consumer that
 * processes events one at a time with `for await`, in emission order:
 *
 *   const channel = openHookEventChannel(server);
 *   for await (const event of channel) { ... }
 *   channel.close();   // from elsewhere: ends the loop, unsubscribes
 */

import type { HookEvent } from "../types/hook-event.js";
import type { TypedEventEmitter } from "./typed-emitter.js";

export class EventChannel<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private resolve: ((value: IteratorResult<T, undefined>) => void) | null = null;
  private done = false;
  private readonly onClose: (() => void) | undefined;

  constructor(onClose?: () => void) {
    this.onClose = onClose;
  }

  /** Push an item, waking a waiting consumer if there is one. Ignored once closed. */
  push(item: T): void {
    if (this.done) return;
    if (this.resolve) {
      const r = this.resolve;
      this.resolve = null;
      r({ value: item, done: false });
    } else {
      this.queue.push(item);
    }
  }

  /** End the stream. Items already queued are still delivered. */
  close(): void {
    if (this.done) return;
    this.done = true;
    this.onClose?.();

    if (this.resolve) {
      const r = this.resolve;
      this.resolve = null;
      r({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.done;
  }

  /** Items pushed but not yet consumed. */
  get backlog(): number {
    return this.queue.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: (): Promise<IteratorResult<T, undefined>> => {
        if (this.queue.length > 0) {
          const [item] = this.queue.splice(0, 1);
          return Promise.resolve({ value: item, done: false });
        }
        if (this.done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.resolve = resolve;
        });
      },
      return: (): Promise<IteratorResult<T, undefined>> => {
        // `break` out of for-await lands here.
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

interface HookEventSource {
  event: HookEvent;
}

/** Subscribe a channel to a server's `event` stream; closing it unsubscribes. */
export function openHookEventChannel<E extends HookEventSource>(
  source: TypedEventEmitter<E>,
): EventChannel<HookEvent> {
  const listener = (event: HookEvent) => channel.push(event);
  const channel: EventChannel<HookEvent> = new EventChannel(() => source.off("event", listener));
  source.on("event", listener);
  return channel;
}
