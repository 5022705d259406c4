/**
 * HealthMonitor — the watchdog for one publishing pipeline.
 *
 * Runs on a fixed cadence for the lifetime of the host process. Every tick is
 * counted; only ticks taken while the gate is `running` are effective and
 * may raise anomalies. Anomalies are delivered through the control executor
 * so the callback (usually "schedule a reconnect") is serialized with every
 * other session-control operation.
 *
 * Bitrate samples arrive from the transport callback path between ticks and
 * drive the zero/low-bitrate run timers; the tick only compares those timers
 * against the current thresholds.
 *
 * @module Watchdog
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { errorMessage } from "../errors.js";
import { type Clock, systemClock } from "../interfaces/clock.js";
import type { Logger } from "../interfaces/logger.js";
import type { SessionHandle } from "../interfaces/session-handle.js";
import { DEFAULT_WATCHDOG_CONFIG, type WatchdogConfig } from "../types/config.js";
import { RingBuffer } from "../utils/ring-buffer.js";
import {
  Anomalies,
  type Anomaly,
  type AnomalyKind,
  describeAnomaly,
  isDebounced,
} from "./anomaly.js";
import type { RunStateGate } from "./run-state-gate.js";
import { SerialExecutor } from "./serial-executor.js";
import { TypedEventEmitter } from "./typed-emitter.js";

export const BITRATE_HISTORY_CAPACITY = 20;

/** Read-only snapshot published after every tick. */
export interface WatchdogStats {
  readonly running: boolean;
  readonly startTime: number;
  readonly totalChecks: number;
  readonly effectiveChecks: number;
  readonly skippedChecks: number;
  readonly anomaliesDetected: number;
  readonly lastCheckTime: number;
  readonly currentBitrate: number;
  /** Mean of the non-zero samples in the history window, floored. */
  readonly averageBitrate: number;
  /** Oldest first, at most {@link BITRATE_HISTORY_CAPACITY} entries. */
  readonly bitrateHistory: readonly number[];
  readonly lastAnomalyTime: number;
  readonly lastAnomalyKind: AnomalyKind | null;
}

export interface HealthMonitorEventMap {
  stats: WatchdogStats;
}

export interface HealthMonitorOptions {
  gate: RunStateGate;
  onAnomaly: (anomaly: Anomaly) => void;
  /** Control context for ticks and anomaly delivery. Defaults to a private one. */
  executor?: SerialExecutor;
  logger?: Logger;
  /** Saturation point of the cumulative counters. */
  counterLimit?: number;
}

export class HealthMonitor extends TypedEventEmitter<HealthMonitorEventMap> {
  private readonly gate: RunStateGate;
  private readonly onAnomaly: (anomaly: Anomaly) => void;
  private readonly executor: SerialExecutor;
  private readonly logger: Logger;
  private readonly counterLimit: number;

  private config: WatchdogConfig = DEFAULT_WATCHDOG_CONFIG;
  private clock: Clock = systemClock;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  // Bumped on start/stop; a queued tick from an older run does nothing
  private generation = 0;
  // Bumped on every handle change; a queued anomaly from an older session is dropped
  private sessionEpoch = 0;
  private handle: SessionHandle | null = null;

  // Cumulative counters (survive session restarts)
  private startTime = 0;
  private totalChecks = 0;
  private effectiveChecks = 0;
  private skippedChecks = 0;
  private anomaliesDetected = 0;
  private lastCheckTime = 0;

  // Per-session monitoring data
  private sessionStartedAt = 0;
  private currentBitrate = 0;
  private lastSampleAt: number | null = null;
  private readonly history = new RingBuffer<number>(BITRATE_HISTORY_CAPACITY);
  private zeroSince: number | null = null;
  private lowSince: number | null = null;
  private stuckSince: number | null = null;
  private lastAnomalyTime = 0;
  private lastAnomalyKind: AnomalyKind | null = null;
  private readonly debounce = new Map<AnomalyKind, number>();

  private snapshot: WatchdogStats;

  constructor(options: HealthMonitorOptions) {
    super();
    this.gate = options.gate;
    this.onAnomaly = options.onAnomaly;
    this.logger = options.logger ?? noopLogger;
    this.executor = options.executor ?? new SerialExecutor(this.logger);
    this.counterLimit = options.counterLimit ?? Number.MAX_SAFE_INTEGER;
    this.snapshot = this.buildSnapshot();
  }

  // ── Lifecycle ──

  start(config: WatchdogConfig, clock: Clock = systemClock): void {
    if (this.running) {
      this.logger.debug?.("Watchdog already running, ignoring start request");
      return;
    }
    this.config = config;
    this.clock = clock;
    this.running = true;
    this.generation++;
    this.startTime = clock.now();
    this.resetMonitoringData();
    this.logger.info("Watchdog started", { checkIntervalMs: config.checkIntervalMs });
    this.scheduleNextTick();
    this.publishStats();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const wasRunning = this.running;
    this.running = false;
    this.generation++;
    this.handle = null;
    this.sessionEpoch++;
    this.resetMonitoringData();
    this.publishStats();
    if (wasRunning) this.logger.info("Watchdog stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  // ── Inputs ──

  /** Replace the thresholds. Timers already running keep their start points. */
  updateConfig(config: WatchdogConfig): void {
    this.config = config;
    this.logger.debug?.("Watchdog config updated", { ...config });
  }

  getConfig(): WatchdogConfig {
    return this.config;
  }

  setSessionHandle(handle: SessionHandle | null): void {
    this.handle = handle;
    this.sessionEpoch++;
    if (handle) {
      this.sessionStartedAt = this.clock.now();
      this.resetMonitoringData();
      this.logger.debug?.("Session handle set, monitoring data reset");
    } else {
      this.logger.debug?.("Session handle cleared");
    }
  }

  onBitrateSample(bps: number): void {
    if (!Number.isFinite(bps) || bps < 0) {
      this.logger.warn("Ignoring invalid bitrate sample", { bps });
      return;
    }
    const now = this.clock.now();
    this.currentBitrate = bps;
    this.lastSampleAt = now;
    this.history.push(bps);

    const { zeroBitrateThresholdBps, minBitrateThresholdBps } = this.config;
    if (bps < zeroBitrateThresholdBps) {
      if (this.zeroSince === null) this.zeroSince = now;
      this.lowSince = null;
    } else if (bps < minBitrateThresholdBps) {
      this.zeroSince = null;
      if (this.lowSince === null) this.lowSince = now;
    } else {
      this.zeroSince = null;
      this.lowSince = null;
    }
  }

  stats(): WatchdogStats {
    return this.snapshot;
  }

  protected override onListenerError(event: string, error: unknown): void {
    this.logger.warn(`Watchdog "${event}" listener failed`, { error });
  }

  // ── Tick ──

  private scheduleNextTick(): void {
    const generation = this.generation;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.executor.post("watchdog tick", () => this.tick(generation));
    }, this.config.checkIntervalMs);
  }

  private tick(generation: number): void {
    if (generation !== this.generation || !this.running) return;
    try {
      this.performCheck();
    } finally {
      this.publishStats();
      if (generation === this.generation && this.running) this.scheduleNextTick();
    }
  }

  private performCheck(): void {
    const now = this.clock.now();
    const config = this.config;

    if (this.totalChecks >= this.counterLimit) {
      this.resetCounters(now);
    } else {
      this.totalChecks++;
    }
    this.lastCheckTime = now;

    if (this.gate.isStopped()) {
      if (this.skippedChecks < this.counterLimit) this.skippedChecks++;
      return;
    }

    if (this.effectiveChecks < this.counterLimit) this.effectiveChecks++;
    this.logger.debug?.(`Health check #${this.effectiveChecks} (total: ${this.totalChecks})`);

    const handle = this.handle;
    if (!handle) {
      this.logger.warn("No session handle while running");
      this.report(Anomalies.cameraDisconnected(), now);
      return;
    }

    if (config.enableBitrateMonitoring) {
      this.guardCheck("bitrate", now, () => this.checkBitrate(now, config));
    }
    if (config.enableConnectionMonitoring) {
      this.guardCheck("connection", now, () => this.checkConnection(handle, now, config));
    }
    if (config.enableEncoderMonitoring) {
      this.guardCheck("encoder", now, () => this.checkEncoder(handle, now, config));
    }
  }

  private guardCheck(name: string, now: number, check: () => void): void {
    try {
      check();
    } catch (err) {
      this.logger.error(`Health check "${name}" threw`, { error: err });
      this.report(Anomalies.encoderError(`health check failed: ${name}: ${errorMessage(err)}`), now);
    }
  }

  private checkBitrate(now: number, config: WatchdogConfig): void {
    const elapsed = now - this.sessionStartedAt;
    if (elapsed < config.startupGraceMs) return;

    if (this.lastSampleAt === null) {
      if (elapsed > config.firstBitrateTimeoutMs) {
        this.report(Anomalies.zeroBitrate(elapsed), now);
      }
      return;
    }

    const age = now - this.lastSampleAt;
    if (age > config.bitrateTimeoutMs) {
      this.report(Anomalies.zeroBitrate(age), now);
      return;
    }

    if (this.zeroSince !== null && now - this.zeroSince > config.zeroBitrateDurationMs) {
      this.report(Anomalies.zeroBitrate(now - this.zeroSince), now);
      return;
    }

    if (this.lowSince !== null && now - this.lowSince > config.lowBitrateDurationMs) {
      this.reportDebounced(
        Anomalies.lowBitrate(this.currentBitrate, config.minBitrateThresholdBps),
        now,
        config,
      );
    }

    if (config.enableFluctuationMonitoring) this.checkFluctuation(now, config);
  }

  private checkFluctuation(now: number, config: WatchdogConfig): void {
    if (this.history.size < config.fluctuationMinSamples) return;
    const nonZero = this.history.toArray().filter((v) => v > 0);
    if (nonZero.length < config.fluctuationMinNonZeroSamples) return;

    const { mean, variance } = meanAndVariance(nonZero);
    const cv = mean > 0 ? Math.sqrt(variance) / mean : 0;
    if (cv > config.fluctuationCvThreshold) {
      this.reportDebounced(Anomalies.bitrateFluctuation(variance), now, config);
    }
  }

  private checkConnection(handle: SessionHandle, now: number, config: WatchdogConfig): void {
    const elapsed = now - this.sessionStartedAt;

    if (!handle.isStreaming()) {
      if (elapsed <= config.connectionGraceMs) return;
      if (this.stuckSince === null) {
        this.stuckSince = now;
        this.logger.debug?.("Connection stuck detection started");
        return;
      }
      const stuckFor = now - this.stuckSince;
      if (stuckFor > config.connectionStuckMs) {
        this.report(Anomalies.connectionStuck(stuckFor), now);
      }
      return;
    }

    this.stuckSince = null;
    if (this.lastSampleAt !== null) {
      const age = now - this.lastSampleAt;
      if (age > config.connectionTimeoutMs) {
        this.report(Anomalies.streamingTimeout(age), now);
      }
    }
  }

  private checkEncoder(handle: SessionHandle, now: number, config: WatchdogConfig): void {
    if (!handle.isCapturing()) {
      this.report(Anomalies.cameraDisconnected(), now);
      return;
    }
    // A handshake in flight is not an encoder failure until the grace window closes
    if (!handle.isStreaming() && now - this.sessionStartedAt > config.connectionGraceMs) {
      this.report(Anomalies.encoderError("encoder not running"), now);
    }
  }

  // ── Reporting ──

  private reportDebounced(anomaly: Anomaly, now: number, config: WatchdogConfig): void {
    if (isDebounced(anomaly.kind)) {
      const last = this.debounce.get(anomaly.kind);
      if (last !== undefined && now - last < config.debounceWindowMs) {
        this.logger.debug?.(`Anomaly debounced: ${describeAnomaly(anomaly)}`);
        return;
      }
      this.debounce.set(anomaly.kind, now);
    }
    this.report(anomaly, now);
  }

  private report(anomaly: Anomaly, now: number): void {
    if (this.gate.isStopped()) {
      this.logger.debug?.(`Gate closed, ignoring anomaly: ${describeAnomaly(anomaly)}`);
      return;
    }

    if (this.anomaliesDetected < this.counterLimit) this.anomaliesDetected++;
    this.lastAnomalyTime = now;
    this.lastAnomalyKind = anomaly.kind;
    this.logger.warn(`Anomaly detected: ${describeAnomaly(anomaly)}`, {
      kind: anomaly.kind,
      severity: anomaly.severity,
    });

    const epoch = this.sessionEpoch;
    this.executor.post("anomaly delivery", () => {
      if (epoch !== this.sessionEpoch || this.gate.isStopped()) {
        this.logger.debug?.(`Session changed before delivery, dropping: ${anomaly.kind}`);
        return;
      }
      this.onAnomaly(anomaly);
    });
  }

  // ── Stats ──

  private publishStats(): void {
    this.snapshot = this.buildSnapshot();
    this.emit("stats", this.snapshot);
  }

  private buildSnapshot(): WatchdogStats {
    const bitrateHistory = Object.freeze(this.history.toArray());
    const nonZero = bitrateHistory.filter((v) => v > 0);
    const averageBitrate =
      nonZero.length > 0 ? Math.floor(nonZero.reduce((a, b) => a + b, 0) / nonZero.length) : 0;

    return Object.freeze({
      running: this.running,
      startTime: this.startTime,
      totalChecks: this.totalChecks,
      effectiveChecks: this.effectiveChecks,
      skippedChecks: this.skippedChecks,
      anomaliesDetected: this.anomaliesDetected,
      lastCheckTime: this.lastCheckTime,
      currentBitrate: this.currentBitrate,
      averageBitrate,
      bitrateHistory,
      lastAnomalyTime: this.lastAnomalyTime,
      lastAnomalyKind: this.lastAnomalyKind,
    });
  }

  private resetMonitoringData(): void {
    this.currentBitrate = 0;
    this.lastSampleAt = null;
    this.history.clear();
    this.zeroSince = null;
    this.lowSince = null;
    this.stuckSince = null;
    this.lastAnomalyTime = 0;
    this.lastAnomalyKind = null;
    this.debounce.clear();
  }

  private resetCounters(now: number): void {
    this.totalChecks = 0;
    this.effectiveChecks = 0;
    this.skippedChecks = 0;
    this.anomaliesDetected = 0;
    this.startTime = now;
    this.logger.warn("Watchdog counters saturated, all counters reset");
  }
}

/** Population mean and variance. */
export function meanAndVariance(values: readonly number[]): { mean: number; variance: number } {
  if (values.length === 0) return { mean: 0, variance: 0 };
  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((acc, v) => acc + (v - mean) * (v - mean), 0) / values.length;
  return { mean, variance };
}
