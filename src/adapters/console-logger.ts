/**
 * Console-based Logger implementation for interactive use.
 * Prefixes all output with a tag; debug lines only appear when verbose.
 */

import type { Logger } from "../interfaces/logger.js";
import { redactStreamUrl } from "../utils/redact-url.js";

export interface ConsoleLoggerOptions {
  prefix?: string;
  verbose?: boolean;
}

export class ConsoleLogger implements Logger {
  private prefix: string;
  private verbose: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.prefix = options.prefix ?? "streamkeeper";
    this.verbose = options.verbose ?? false;
  }

  private log(
    method: "debug" | "log" | "warn" | "error",
    msg: string,
    ctx?: Record<string, unknown>,
  ): void {
    const formatted = `[${this.prefix}] ${msg}`;
    if (ctx) {
      console[method](formatted, redactContext(ctx));
    } else {
      console[method](formatted);
    }
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    if (this.verbose) this.log("debug", msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log("log", msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log("warn", msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log("error", msg, ctx);
  }
}

function redactContext(ctx: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(ctx)) {
    out[key] = key === "url" && typeof value === "string" ? redactStreamUrl(value) : value;
  }
  return out;
}
