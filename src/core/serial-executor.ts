/**
 * SerialExecutor — the single logical execution context for control-plane work.
 *
 * Watchdog ticks, anomaly delivery, transport callbacks and session
 * start/stop/rebuild are all posted here and run strictly one after another,
 * even when a task awaits an async engine call. That gives linearizable
 * ordering between tick-driven and event-driven mutations without locks in
 * the task bodies.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";

export class SerialExecutor {
  private chain: Promise<void> = Promise.resolve();
  private queued = 0;

  constructor(private readonly logger: Logger = noopLogger) {}

  /** Queue a task; the returned promise settles with the task's own result. */
  run<T>(task: () => T | Promise<T>): Promise<T> {
    this.queued++;
    const result = this.chain.then(task);
    this.chain = result.then(
      () => {
        this.queued--;
      },
      () => {
        // The rejection reaches the caller through `result`; the chain moves on.
        this.queued--;
      },
    );
    return result;
  }

  /** Fire-and-forget variant of run(); failures are logged. */
  post(label: string, task: () => void | Promise<void>): void {
    this.run(task).catch((err: unknown) => {
      this.logger.error(`Control task "${label}" failed`, { error: err });
    });
  }

  /** Resolves once every task queued so far has settled. */
  async drain(): Promise<void> {
    while (this.queued > 0) {
      await this.chain;
    }
  }

  /** Number of tasks queued or running. */
  get pending(): number {
    return this.queued;
  }
}
