import { EventEmitter } from "node:events";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { registerSignalHandlers } from "./signal-handler.js";

describe("registerSignalHandlers", () => {
  let source: EventEmitter;
  let exit: Mock<(code: number) => void>;

  beforeEach(() => {
    vi.useFakeTimers();
    source = new EventEmitter();
    exit = vi.fn<(code: number) => void>();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("registers SIGTERM and SIGINT by default", () => {
    registerSignalHandlers(vi.fn().mockResolvedValue(undefined), { source, exit });

    expect(source.listenerCount("SIGTERM")).toBe(1);
    expect(source.listenerCount("SIGINT")).toBe(1);
  });

  it("runs cleanup and exits 0", async () => {
    const cleanup = vi.fn().mockResolvedValue(undefined);
    registerSignalHandlers(cleanup, { source, exit });

    source.emit("SIGTERM");
    await vi.advanceTimersByTimeAsync(0);

    expect(cleanup).toHaveBeenCalledOnce();
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("exits 0 and logs when cleanup rejects", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const failure = new Error("cleanup failed");
    registerSignalHandlers(vi.fn().mockRejectedValue(failure), { source, exit, logger });

    source.emit("SIGINT");
    await vi.advanceTimersByTimeAsync(0);

    expect(logger.error).toHaveBeenCalledWith("Shutdown cleanup failed", { error: failure });
    expect(exit).toHaveBeenCalledWith(0);
  });

  it("forces exit 1 when cleanup stalls", async () => {
    registerSignalHandlers(() => new Promise<void>(() => {}), {
      source,
      exit,
      timeoutMs: 5_000,
    });

    source.emit("SIGTERM");
    await vi.advanceTimersByTimeAsync(4_999);
    expect(exit).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(exit).toHaveBeenCalledWith(1);
  });

  it("ignores repeated signals", async () => {
    const cleanup = vi.fn(() => new Promise<void>(() => {}));
    registerSignalHandlers(cleanup, { source, exit });

    source.emit("SIGTERM");
    source.emit("SIGINT");
    await vi.advanceTimersByTimeAsync(0);

    expect(cleanup).toHaveBeenCalledOnce();
  });

  it("listens only to the requested signals and unregisters", () => {
    const unregister = registerSignalHandlers(vi.fn().mockResolvedValue(undefined), {
      source,
      exit,
      signals: ["SIGHUP"],
    });
    expect(source.listenerCount("SIGHUP")).toBe(1);
    expect(source.listenerCount("SIGTERM")).toBe(0);

    unregister();

    expect(source.listenerCount("SIGHUP")).toBe(0);
  });
});
