/**
 * Messages pushed to status-channel observers. One JSON object per frame.
 */

import type { Anomaly } from "../core/anomaly.js";
import type { WatchdogStats } from "../core/health-monitor.js";
import type { ControlState } from "../core/session-orchestrator.js";
import type { SessionState } from "../core/session-state.js";

export type StatusMessage =
  | {
      type: "snapshot";
      state: SessionState;
      statusText: string;
      stats: WatchdogStats;
      controls: ControlState;
    }
  | { type: "state"; state: SessionState; statusText: string }
  | { type: "stats"; stats: WatchdogStats }
  | { type: "controls"; controls: ControlState }
  | { type: "anomaly"; anomaly: Anomaly; description: string };

export type StatusMessageType = StatusMessage["type"];
