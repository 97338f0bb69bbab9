export class HookRelayError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "HookRelayError";
    this.code = code;
  }
}

// ── Domain errors ──

/** Socket creation, bind, listen or chmod failed. */
export class TransportError extends HookRelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "TRANSPORT", options);
    this.name = "TransportError";
  }
}

/** A client payload could not be decoded into a hook event. */
export class PayloadError extends HookRelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PAYLOAD", options);
    this.name = "PayloadError";
  }
}

export class ConfigError extends HookRelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to HookRelayError (preserves cause chain). */
export function toHookRelayError(value: unknown): HookRelayError {
  if (value instanceof HookRelayError) return value;
  if (value instanceof Error) return new HookRelayError(value.message, "UNKNOWN", { cause: value });
  return new HookRelayError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}

/** Errno code of a Node system error, if it carries one. */
export function errnoCode(value: unknown): string | undefined {
  if (value instanceof Error && "code" in value && typeof value.code === "string") {
    return value.code;
  }
  return undefined;
}
