/**
 * Anomaly — structured, classified health-check failures.
 *
 * Severity and debounce behaviour are fixed per kind; descriptions are derived
 * from the payload fields only, so the same anomaly always reads the same.
 *
 * @module Watchdog
 */

export type AnomalySeverity = "warning" | "error" | "critical";

export type Anomaly =
  | { kind: "zero_bitrate"; severity: "error"; durationMs: number }
  | { kind: "low_bitrate"; severity: "warning"; currentBps: number; thresholdBps: number }
  | { kind: "bitrate_fluctuation"; severity: "warning"; variance: number }
  | { kind: "connection_stuck"; severity: "critical"; durationMs: number }
  | { kind: "streaming_timeout"; severity: "error"; durationMs: number }
  | { kind: "encoder_error"; severity: "error"; message: string }
  | { kind: "camera_disconnected"; severity: "critical" };

export type AnomalyKind = Anomaly["kind"];

export const ANOMALY_KINDS: readonly AnomalyKind[] = [
  "zero_bitrate",
  "low_bitrate",
  "bitrate_fluctuation",
  "connection_stuck",
  "streaming_timeout",
  "encoder_error",
  "camera_disconnected",
];

/**
 * Kinds that go through the debounce map. The rest signal terminal-style
 * failures and are reported on every tick they are observed.
 */
const DEBOUNCED_KINDS: ReadonlySet<AnomalyKind> = new Set(["low_bitrate", "bitrate_fluctuation"]);

export function isDebounced(kind: AnomalyKind): boolean {
  return DEBOUNCED_KINDS.has(kind);
}

/** True for severities that trigger a session rebuild. */
export function requiresReconnect(anomaly: Anomaly): boolean {
  return anomaly.severity !== "warning";
}

// ── Constructors ───────────────────────────────────────────────────────────

export const Anomalies = {
  zeroBitrate: (durationMs: number): Anomaly => ({
    kind: "zero_bitrate",
    severity: "error",
    durationMs,
  }),
  lowBitrate: (currentBps: number, thresholdBps: number): Anomaly => ({
    kind: "low_bitrate",
    severity: "warning",
    currentBps,
    thresholdBps,
  }),
  bitrateFluctuation: (variance: number): Anomaly => ({
    kind: "bitrate_fluctuation",
    severity: "warning",
    variance,
  }),
  connectionStuck: (durationMs: number): Anomaly => ({
    kind: "connection_stuck",
    severity: "critical",
    durationMs,
  }),
  streamingTimeout: (durationMs: number): Anomaly => ({
    kind: "streaming_timeout",
    severity: "error",
    durationMs,
  }),
  encoderError: (message: string): Anomaly => ({
    kind: "encoder_error",
    severity: "error",
    message,
  }),
  cameraDisconnected: (): Anomaly => ({ kind: "camera_disconnected", severity: "critical" }),
} as const;

// ── Description ────────────────────────────────────────────────────────────

function seconds(ms: number): number {
  return Math.floor(ms / 1000);
}

export function describeAnomaly(anomaly: Anomaly): string {
  switch (anomaly.kind) {
    case "zero_bitrate":
      return `bitrate at zero for ${seconds(anomaly.durationMs)}s`;
    case "low_bitrate":
      return `bitrate too low: ${anomaly.currentBps}bps < ${anomaly.thresholdBps}bps`;
    case "bitrate_fluctuation":
      return `bitrate fluctuation: variance=${anomaly.variance.toFixed(2)}`;
    case "connection_stuck":
      return `connection stuck for ${seconds(anomaly.durationMs)}s`;
    case "streaming_timeout":
      return `streaming timeout after ${seconds(anomaly.durationMs)}s`;
    case "encoder_error":
      return `encoder error: ${anomaly.message}`;
    case "camera_disconnected":
      return "camera disconnected";
  }
}
