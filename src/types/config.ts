import type { z } from "zod";
import {
  reconnectConfigSchema,
  streamSettingsSchema,
  watchdogConfigSchema,
} from "../config/config-schema.js";
import { ConfigError } from "../errors.js";
import type { CameraFacing } from "../interfaces/session-handle.js";

// ── Watchdog ───────────────────────────────────────────────────────────────

/** Thresholds and switches for the health monitor. Replaced wholesale on update. */
export interface WatchdogConfig {
  readonly checkIntervalMs: number;
  /** Bitrate checks stay quiet this long after a session starts (negotiation). */
  readonly startupGraceMs: number;
  /** No sample at all this long after session start counts as zero bitrate. */
  readonly firstBitrateTimeoutMs: number;
  /** Newest sample older than this counts as zero bitrate. */
  readonly bitrateTimeoutMs: number;

  readonly zeroBitrateThresholdBps: number;
  readonly zeroBitrateDurationMs: number;
  readonly minBitrateThresholdBps: number;
  readonly lowBitrateDurationMs: number;

  /** Coefficient of variation (stddev / mean) above which samples count as fluctuating. */
  readonly fluctuationCvThreshold: number;
  readonly fluctuationMinSamples: number;
  readonly fluctuationMinNonZeroSamples: number;

  /** Stuck-connection detection stays quiet this long after a session starts. */
  readonly connectionGraceMs: number;
  readonly connectionStuckMs: number;
  /** Samples stopping for longer than this while the transport claims to stream. */
  readonly connectionTimeoutMs: number;

  readonly debounceWindowMs: number;

  readonly enableBitrateMonitoring: boolean;
  readonly enableFluctuationMonitoring: boolean;
  readonly enableConnectionMonitoring: boolean;
  readonly enableEncoderMonitoring: boolean;
}

export const DEFAULT_WATCHDOG_CONFIG: WatchdogConfig = Object.freeze({
  checkIntervalMs: 5000,
  startupGraceMs: 10_000,
  firstBitrateTimeoutMs: 10_000,
  bitrateTimeoutMs: 30_000,
  zeroBitrateThresholdBps: 10_000, // 10 kbps
  zeroBitrateDurationMs: 30_000,
  minBitrateThresholdBps: 100_000, // 100 kbps
  lowBitrateDurationMs: 15_000,
  fluctuationCvThreshold: 0.5,
  fluctuationMinSamples: 10,
  fluctuationMinNonZeroSamples: 5,
  connectionGraceMs: 5000,
  connectionStuckMs: 10_000,
  connectionTimeoutMs: 60_000,
  debounceWindowMs: 30_000,
  enableBitrateMonitoring: true,
  enableFluctuationMonitoring: true,
  enableConnectionMonitoring: true,
  enableEncoderMonitoring: true,
});

// ── Reconnect ──────────────────────────────────────────────────────────────

export type ReconnectPolicyKind = "fixed" | "exponential";

export interface ReconnectConfig {
  readonly policy: ReconnectPolicyKind;
  /** Delay used by the fixed policy. */
  readonly fixedDelayMs: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  /** Upper bound of the random extra delay, as a fraction of the raw delay. */
  readonly jitterRatio: number;
  /** Consecutive failures spanning longer than this give up for good. */
  readonly maxRetryWindowMs: number;
}

export const DEFAULT_RECONNECT_CONFIG: ReconnectConfig = Object.freeze({
  policy: "exponential",
  fixedDelayMs: 3000,
  baseDelayMs: 3000,
  maxDelayMs: 60 * 60 * 1000, // 1 hour
  jitterRatio: 0.25,
  maxRetryWindowMs: 30 * 24 * 60 * 60 * 1000, // 30 days
});

// ── Stream settings ────────────────────────────────────────────────────────

export type VideoRotation = "auto" | 0 | 90 | 180 | 270;

export interface StreamSettings {
  readonly url: string;
  readonly videoWidth: number;
  readonly videoHeight: number;
  readonly videoFps: number;
  readonly videoBitrateKbps: number;
  readonly keyframeIntervalSec: number;
  readonly videoRotation: VideoRotation;
  readonly audioBitrateKbps: number;
  readonly audioSampleRate: number;
  readonly audioStereo: boolean;
  readonly audioEchoCancel: boolean;
  readonly audioNoiseSuppress: boolean;
  readonly cameraFacing: CameraFacing;
  readonly autoFocus: boolean;
}

export const DEFAULT_STREAM_SETTINGS: StreamSettings = Object.freeze({
  url: "",
  videoWidth: 1920,
  videoHeight: 1080,
  videoFps: 30,
  videoBitrateKbps: 4000,
  keyframeIntervalSec: 2,
  videoRotation: "auto",
  audioBitrateKbps: 128,
  audioSampleRate: 44_100,
  audioStereo: true,
  audioEchoCancel: false,
  audioNoiseSuppress: false,
  cameraFacing: "back",
  autoFocus: true,
});

// ── Resolution ─────────────────────────────────────────────────────────────

/** Drop keys explicitly set to undefined so they cannot erase a default. */
function definedOnly<T extends object>(overrides: Partial<T>): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(overrides) as Array<keyof T>) {
    if (overrides[key] !== undefined) result[key] = overrides[key];
  }
  return result;
}

function validate(name: string, schema: z.ZodTypeAny, value: unknown): void {
  const validation = schema.safeParse(value);
  if (!validation.success) {
    throw new ConfigError(`Invalid ${name}: ${validation.error.message}`, {
      cause: validation.error,
    });
  }
}

export function resolveWatchdogConfig(
  overrides: Partial<WatchdogConfig> = {},
  base: WatchdogConfig = DEFAULT_WATCHDOG_CONFIG,
): WatchdogConfig {
  validate("watchdog configuration", watchdogConfigSchema, overrides);
  const resolved = { ...base, ...definedOnly(overrides) };
  if (resolved.minBitrateThresholdBps < resolved.zeroBitrateThresholdBps) {
    throw new ConfigError(
      "Invalid watchdog configuration: minBitrateThresholdBps must not be below zeroBitrateThresholdBps",
    );
  }
  return Object.freeze(resolved);
}

export function resolveReconnectConfig(
  overrides: Partial<ReconnectConfig> = {},
  base: ReconnectConfig = DEFAULT_RECONNECT_CONFIG,
): ReconnectConfig {
  validate("reconnect configuration", reconnectConfigSchema, overrides);
  const resolved = { ...base, ...definedOnly(overrides) };
  if (resolved.maxDelayMs < resolved.baseDelayMs) {
    throw new ConfigError("Invalid reconnect configuration: maxDelayMs must not be below baseDelayMs");
  }
  return Object.freeze(resolved);
}

export function resolveStreamSettings(
  overrides: Partial<StreamSettings> = {},
  base: StreamSettings = DEFAULT_STREAM_SETTINGS,
): StreamSettings {
  validate("stream settings", streamSettingsSchema, overrides);
  return Object.freeze({ ...base, ...definedOnly(overrides) });
}
