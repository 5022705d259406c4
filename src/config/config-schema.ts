import { z } from "zod";

const positiveMs = z.number().int().positive();
const nonNegativeMs = z.number().int().min(0);
const bps = z.number().int().min(0);

export const watchdogConfigSchema = z
  .object({
    checkIntervalMs: positiveMs,
    startupGraceMs: nonNegativeMs,
    firstBitrateTimeoutMs: positiveMs,
    bitrateTimeoutMs: positiveMs,

    // Bitrate thresholds
    zeroBitrateThresholdBps: bps,
    zeroBitrateDurationMs: positiveMs,
    minBitrateThresholdBps: bps,
    lowBitrateDurationMs: positiveMs,

    // Fluctuation
    fluctuationCvThreshold: z.number().positive(),
    fluctuationMinSamples: z.number().int().min(2).max(20),
    fluctuationMinNonZeroSamples: z.number().int().min(2).max(20),

    // Connection
    connectionGraceMs: nonNegativeMs,
    connectionStuckMs: positiveMs,
    connectionTimeoutMs: positiveMs,

    debounceWindowMs: nonNegativeMs,

    enableBitrateMonitoring: z.boolean(),
    enableFluctuationMonitoring: z.boolean(),
    enableConnectionMonitoring: z.boolean(),
    enableEncoderMonitoring: z.boolean(),
  })
  .partial()
  .strict();

export const reconnectConfigSchema = z
  .object({
    policy: z.enum(["fixed", "exponential"]),
    fixedDelayMs: nonNegativeMs,
    baseDelayMs: positiveMs,
    maxDelayMs: positiveMs,
    jitterRatio: z.number().min(0).max(1),
    maxRetryWindowMs: positiveMs,
  })
  .partial()
  .strict();

const kbps = z.number().int().positive();

export const streamSettingsSchema = z
  .object({
    url: z.string(),

    // Video
    videoWidth: z.number().int().positive(),
    videoHeight: z.number().int().positive(),
    videoFps: z.number().int().min(1).max(240),
    videoBitrateKbps: kbps,
    keyframeIntervalSec: z.number().int().min(1),
    videoRotation: z.union([
      z.literal("auto"),
      z.literal(0),
      z.literal(90),
      z.literal(180),
      z.literal(270),
    ]),

    // Audio
    audioBitrateKbps: kbps,
    audioSampleRate: z.number().int().positive(),
    audioStereo: z.boolean(),
    audioEchoCancel: z.boolean(),
    audioNoiseSuppress: z.boolean(),

    // Camera
    cameraFacing: z.enum(["front", "back"]),
    autoFocus: z.boolean(),
  })
  .partial()
  .strict();
