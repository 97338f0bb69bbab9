import { describe, expect, it } from "vitest";
import {
  ConfigError,
  errnoCode,
  errorMessage,
  HookRelayError,
  PayloadError,
  TransportError,
  toHookRelayError,
} from "./errors.js";

describe("HookRelayError hierarchy", () => {
  it("HookRelayError is an Error with code", () => {
    const err = new HookRelayError("test", "TEST_ERROR");
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("HookRelayError");
    expect(err.code).toBe("TEST_ERROR");
    expect(err.message).toBe("test");
  });

  it("domain errors have correct codes and extend HookRelayError", () => {
    const transport = new TransportError("bind failed");
    expect(transport).toBeInstanceOf(HookRelayError);
    expect(transport.code).toBe("TRANSPORT");
    expect(transport.name).toBe("TransportError");

    const payload = new PayloadError("not json");
    expect(payload).toBeInstanceOf(HookRelayError);
    expect(payload.code).toBe("PAYLOAD");
    expect(payload.name).toBe("PayloadError");

    const config = new ConfigError("bad ttl");
    expect(config).toBeInstanceOf(HookRelayError);
    expect(config.code).toBe("CONFIG");
    expect(config.name).toBe("ConfigError");
  });

  it("preserves cause chain", () => {
    const cause = new Error("EADDRINUSE");
    const err = new TransportError("listen failed", { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("toHookRelayError", () => {
  it("passes through HookRelayError unchanged", () => {
    const err = new PayloadError("x");
    expect(toHookRelayError(err)).toBe(err);
  });

  it("wraps plain Error with cause chain", () => {
    const plain = new Error("plain");
    const wrapped = toHookRelayError(plain);
    expect(wrapped).toBeInstanceOf(HookRelayError);
    expect(wrapped.code).toBe("UNKNOWN");
    expect(wrapped.message).toBe("plain");
    expect(wrapped.cause).toBe(plain);
  });

  it("wraps non-Error values", () => {
    expect(toHookRelayError("string error").message).toBe("string error");
    expect(toHookRelayError(42).message).toBe("42");
    expect(toHookRelayError(null).message).toBe("Unknown error");
    expect(toHookRelayError(undefined).message).toBe("Unknown error");
  });
});

describe("errorMessage", () => {
  it("extracts message from Error instances", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(new TransportError("typed"))).toBe("typed");
  });

  it("stringifies non-Error values", () => {
    expect(errorMessage("string error")).toBe("string error");
    expect(errorMessage(null)).toBe("Unknown error");
  });
});

describe("errnoCode", () => {
  it("reads the code of a system error", () => {
    const err = Object.assign(new Error("no such file"), { code: "ENOENT" });
    expect(errnoCode(err)).toBe("ENOENT");
  });

  it("returns undefined for errors without a string code", () => {
    expect(errnoCode(new Error("plain"))).toBeUndefined();
    expect(errnoCode("ENOENT")).toBeUndefined();
  });
});
