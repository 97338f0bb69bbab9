import type { Socket } from "node:net";
import { noopLogger } from "../adapters/noop-logger.js";
import { TransportError } from "../errors.js";
import type { SlotLease } from "../interfaces/concurrency-limiter.js";
import type { Logger } from "../interfaces/logger.js";
import { type ReadOutcome, type ReadPayloadOptions, readPayload } from "./payload-reader.js";

/**
 * One accepted client connection and the concurrency slot it holds.
 *
 * close() is the only way the slot is released; it is idempotent, so every
 * terminal path (reply sent, cancelled, shutdown, read failure) can call it.
 */
export class HookConnection {
  private closed = false;

  constructor(
    private readonly socket: Socket,
    private readonly lease: SlotLease,
    private readonly logger: Logger = noopLogger,
  ) {
    // Peers often disconnect early (EPIPE, ECONNRESET); a socket without an
    // error listener would take the process down.
    socket.on("error", (err) => {
      this.logger.debug?.("Hook connection error", { error: err });
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  read(options: ReadPayloadOptions): Promise<ReadOutcome> {
    return readPayload(this.socket, options);
  }

  /** Resolves once the payload is handed to the kernel. Rejects with TransportError. */
  write(payload: string): Promise<void> {
    if (this.closed || this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(new TransportError("Connection is no longer writable"));
    }
    return new Promise((resolve, reject) => {
      this.socket.write(payload, (err) => {
        if (err) {
          reject(new TransportError(`Write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.lease.release();

    if (this.socket.writable && !this.socket.destroyed) {
      this.socket.end(() => this.socket.destroy());
    } else {
      this.socket.destroy();
    }
  }
}
