/**
 * StatusBroadcaster — fans the orchestrator's observer surface out to
 * status-channel sockets.
 *
 * A newly attached socket gets a `snapshot` first, then every `state`,
 * `stats`, `controls` and `anomaly` event as it happens.
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { WebSocketLike } from "../interfaces/transport.js";
import type { StatusMessage } from "../types/status-messages.js";
import { describeAnomaly } from "./anomaly.js";
import type { SessionOrchestrator } from "./session-orchestrator.js";
import { describeSessionState } from "./session-state.js";

// ─── Constants ───────────────────────────────────────────────────────────────

export const BACKPRESSURE_THRESHOLD = 1_048_576; // 1 MB

// ─── Types ───────────────────────────────────────────────────────────────────

export type StatusSource = Pick<
  SessionOrchestrator,
  "getState" | "getStatusText" | "getStats" | "getControls" | "subscribe"
>;

// ─── StatusBroadcaster ───────────────────────────────────────────────────────

export class StatusBroadcaster {
  private readonly sockets = new Set<WebSocketLike>();
  private readonly logger: Logger;
  private cleanups: Array<() => void> = [];

  constructor(
    private readonly source: StatusSource,
    logger?: Logger,
  ) {
    this.logger = logger ?? noopLogger;
  }

  /** Subscribe to the source. Idempotent. */
  start(): void {
    if (this.cleanups.length > 0) return;
    this.cleanups.push(
      this.source.subscribe("state", (state) => {
        this.broadcast({ type: "state", state, statusText: describeSessionState(state) });
      }),
      this.source.subscribe("stats", (stats) => {
        this.broadcast({ type: "stats", stats });
      }),
      this.source.subscribe("controls", (controls) => {
        this.broadcast({ type: "controls", controls });
      }),
      this.source.subscribe("anomaly", (anomaly) => {
        this.broadcast({ type: "anomaly", anomaly, description: describeAnomaly(anomaly) });
      }),
    );
  }

  /** Unsubscribe and close every attached socket. */
  stop(): void {
    for (const cleanup of this.cleanups) cleanup();
    this.cleanups = [];
    for (const ws of this.sockets) {
      try {
        ws.close(1001, "Status channel closing");
      } catch (err) {
        this.logger.warn("Failed to close status socket", { error: errorMessage(err) });
      }
    }
    this.sockets.clear();
  }

  /** Register a socket and send it the current snapshot. */
  attach(ws: WebSocketLike): void {
    this.sockets.add(ws);
    const delivered = this.sendTo(ws, {
      type: "snapshot",
      state: this.source.getState(),
      statusText: this.source.getStatusText(),
      stats: this.source.getStats(),
      controls: this.source.getControls(),
    });
    if (!delivered) this.sockets.delete(ws);
  }

  detach(ws: WebSocketLike): void {
    this.sockets.delete(ws);
  }

  get size(): number {
    return this.sockets.size;
  }

  /** Send to every attached socket; slow sockets are skipped, failing ones dropped. */
  broadcast(msg: StatusMessage): void {
    const json = JSON.stringify(msg);
    const failed: WebSocketLike[] = [];
    for (const ws of this.sockets) {
      if (ws.bufferedAmount !== undefined && ws.bufferedAmount > BACKPRESSURE_THRESHOLD) {
        this.logger.warn(
          `Dropping ${msg.type} message to status observer: backpressure (buffered=${ws.bufferedAmount})`,
        );
        continue;
      }
      try {
        ws.send(json);
      } catch (err) {
        this.logger.warn(`Failed to send ${msg.type} message to status observer: ${errorMessage(err)}`);
        failed.push(ws);
      }
    }
    for (const ws of failed) {
      this.sockets.delete(ws);
    }
  }

  private sendTo(ws: WebSocketLike, msg: StatusMessage): boolean {
    try {
      ws.send(JSON.stringify(msg));
      return true;
    } catch (err) {
      this.logger.warn("Failed to send message to status observer", {
        error: errorMessage(err),
      });
      return false;
    }
  }
}
