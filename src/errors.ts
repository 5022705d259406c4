export class StreamKeeperError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StreamKeeperError";
    this.code = code;
  }
}

// ── Domain errors ──

export class ConfigError extends StreamKeeperError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

export class EngineError extends StreamKeeperError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "ENGINE", options);
    this.name = "EngineError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to StreamKeeperError (preserves cause chain). */
export function toStreamKeeperError(value: unknown): StreamKeeperError {
  if (value instanceof StreamKeeperError) return value;
  if (value instanceof Error) return new StreamKeeperError(value.message, "UNKNOWN", { cause: value });
  return new StreamKeeperError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
