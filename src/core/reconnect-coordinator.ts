/**
 * ReconnectCoordinator — tears a failed session down and builds a fresh one.
 *
 * Teardown is posted to the control executor right away; the rebuild is
 * posted once the backoff delay has elapsed. The delay itself waits outside
 * the executor so watchdog ticks keep running meanwhile. At most one rebuild
 * is ever pending: scheduling again, or cancelling, retires the previous
 * token so a queued rebuild from an older plan does nothing.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { errorMessage } from "../errors.js";
import { type Clock, systemClock } from "../interfaces/clock.js";
import type { Logger } from "../interfaces/logger.js";
import { DEFAULT_RECONNECT_CONFIG, type ReconnectConfig } from "../types/config.js";
import {
  advanceBackoff,
  type BackoffState,
  computeDelay,
  INITIAL_BACKOFF,
  isRetryWindowExhausted,
} from "./backoff.js";
import type { RunStateGate } from "./run-state-gate.js";
import type { SerialExecutor } from "./serial-executor.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export interface ReconnectPlan {
  readonly attempt: number;
  readonly delayMs: number;
}

export interface ReconnectEventMap {
  "reconnect:scheduled": { attempt: number; delayMs: number; reason: string };
  "reconnect:attempt": { attempt: number };
  "reconnect:succeeded": { attempt: number };
  "reconnect:failed": { attempt: number; error: string };
  "reconnect:exhausted": { attempts: number; windowMs: number };
}

export interface ReconnectCoordinatorDeps {
  gate: RunStateGate;
  executor: SerialExecutor;
  /** Release whatever the current session holds. Must not throw for an absent session. */
  teardown: () => Promise<void>;
  /** Build and start a fresh session against the target. Rejects on failure. */
  rebuild: (target: string) => Promise<void>;
  /** Last target the session was started with. */
  target: () => string | null;
  config?: ReconnectConfig;
  logger?: Logger;
  clock?: Clock;
  random?: () => number;
}

export class ReconnectCoordinator extends TypedEventEmitter<ReconnectEventMap> {
  private config: ReconnectConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly random: () => number;

  private backoff: BackoffState = INITIAL_BACKOFF;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private token = 0;
  private pending = false;

  constructor(private deps: ReconnectCoordinatorDeps) {
    super();
    this.config = deps.config ?? DEFAULT_RECONNECT_CONFIG;
    this.logger = deps.logger ?? noopLogger;
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
  }

  scheduleReconnect(reason: string): ReconnectPlan | null {
    this.cancelReconnect();

    if (this.deps.gate.isStopped()) {
      this.logger.debug?.("Gate stopped, not scheduling reconnect", { reason });
      return null;
    }

    const target = this.deps.target();
    if (!target) {
      this.logger.error("Cannot reconnect without a target");
      return null;
    }

    const now = this.clock.now();
    if (isRetryWindowExhausted(this.backoff, this.config, now)) {
      this.logger.error(
        `Reconnect window exhausted after ${this.backoff.attempts} attempts, giving up`,
      );
      this.emit("reconnect:exhausted", {
        attempts: this.backoff.attempts,
        windowMs: this.config.maxRetryWindowMs,
      });
      return null;
    }

    const delayMs = computeDelay(this.config, this.backoff.attempts, this.random);
    this.backoff = advanceBackoff(this.backoff, now, delayMs);
    const attempt = this.backoff.attempts;
    const token = ++this.token;
    this.pending = true;

    this.logger.info(`Reconnect #${attempt} in ${delayMs}ms`, { reason });
    this.emit("reconnect:scheduled", { attempt, delayMs, reason });

    this.deps.executor.post("reconnect teardown", async () => {
      if (token !== this.token) return;
      await this.deps.teardown();
    });

    this.timer = setTimeout(() => {
      this.timer = null;
      this.deps.executor.post("reconnect rebuild", () => this.rebuild(token, attempt, target));
    }, delayMs);

    return { attempt, delayMs };
  }

  /** Retire the pending plan, if any. Safe to call at any time. */
  cancelReconnect(): void {
    this.token++;
    this.pending = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  resetBackoff(): void {
    if (this.backoff.attempts > 0) {
      this.logger.debug?.("Backoff reset", { attempts: this.backoff.attempts });
    }
    this.backoff = INITIAL_BACKOFF;
  }

  getBackoffState(): BackoffState {
    return this.backoff;
  }

  isPending(): boolean {
    return this.pending;
  }

  updateConfig(config: ReconnectConfig): void {
    this.config = config;
  }

  getConfig(): ReconnectConfig {
    return this.config;
  }

  protected override onListenerError(event: string, error: unknown): void {
    this.logger.warn(`Reconnect "${event}" listener failed`, { error });
  }

  private async rebuild(token: number, attempt: number, target: string): Promise<void> {
    if (token !== this.token) return;
    this.pending = false;

    if (this.deps.gate.isStopped()) {
      this.logger.debug?.("Gate stopped during reconnect delay, aborting");
      return;
    }

    this.emit("reconnect:attempt", { attempt });
    try {
      await this.deps.rebuild(target);
      this.emit("reconnect:succeeded", { attempt });
    } catch (err) {
      // Left to the next watchdog tick; rescheduling here would bypass the gate checks
      this.logger.warn(`Reconnect #${attempt} failed, waiting for watchdog`, { error: err });
      this.emit("reconnect:failed", { attempt, error: errorMessage(err) });
    }
  }
}
