import type { Readable } from "node:stream";

export interface ReadPayloadOptions {
  /** Hard deadline for the whole read. */
  timeoutMs: number;
  /** Silence after the last chunk that ends the read. */
  quietMs: number;
  maxBytes: number;
}

export type ReadEnd = "eof" | "quiet" | "timeout" | "error";

export type ReadOutcome =
  | { ok: true; data: Buffer; endedBy: ReadEnd }
  | { ok: false; reason: "eof" | "timeout" | "error" | "too_large"; error?: Error };

/**
 * Collect one client payload from a stream.
 *
 * Hook scripts do not always half-close after writing, so a read ends on the
 * first of: peer EOF, `quietMs` without new bytes once something arrived, the
 * `timeoutMs` deadline, or a stream error. Whatever was received by then is
 * the payload; receiving nothing is a failure. Listeners are removed and the
 * stream paused before the promise settles, so the caller can keep the
 * stream open for a reply.
 */
export function readPayload(stream: Readable, options: ReadPayloadOptions): Promise<ReadOutcome> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let settled = false;
    let quietTimer: ReturnType<typeof setTimeout> | undefined;

    const finish = (outcome: ReadOutcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(deadline);
      clearTimeout(quietTimer);
      stream.off("data", onData);
      stream.off("end", onEnd);
      stream.off("close", onEnd);
      stream.off("error", onError);
      stream.pause();
      resolve(outcome);
    };

    const complete = (endedBy: ReadEnd, error?: Error) => {
      if (received > 0) {
        finish({ ok: true, data: Buffer.concat(chunks, received), endedBy });
      } else if (endedBy === "quiet") {
        // The quiet timer is only armed once data arrived.
        finish({ ok: false, reason: "eof" });
      } else {
        finish({ ok: false, reason: endedBy, error });
      }
    };

    const onData = (chunk: Buffer | string) => {
      const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
      received += buf.length;
      if (received > options.maxBytes) {
        finish({ ok: false, reason: "too_large" });
        return;
      }
      chunks.push(buf);
      clearTimeout(quietTimer);
      quietTimer = setTimeout(() => complete("quiet"), options.quietMs);
    };
    const onEnd = () => complete("eof");
    const onError = (err: Error) => complete("error", err);

    const deadline = setTimeout(() => complete("timeout"), options.timeoutMs);

    stream.on("data", onData);
    stream.on("end", onEnd);
    stream.on("close", onEnd);
    stream.on("error", onError);
  });
}
