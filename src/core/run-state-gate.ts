/**
 * RunStateGate — the coarse "should anyone be monitoring or reconnecting"
 * switch.
 *
 * Decoupled from SessionState on purpose: the session can be in `error` while
 * the gate is still `running` (a transport failure waiting for the watchdog to
 * trigger recovery). Only explicit stop, authentication failure and reconnect
 * window exhaustion close the gate.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import type { Logger } from "../interfaces/logger.js";

export type RunState = "stopped" | "running";

export class RunStateGate {
  private state: RunState = "stopped";

  constructor(private readonly logger: Logger = noopLogger) {}

  set(next: RunState): void {
    if (next === this.state) return;
    this.state = next;
    this.logger.debug?.(`Run state -> ${next}`);
  }

  setRunning(): void {
    this.set("running");
  }

  setStopped(): void {
    this.set("stopped");
  }

  get(): RunState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === "running";
  }

  isStopped(): boolean {
    return this.state === "stopped";
  }
}
