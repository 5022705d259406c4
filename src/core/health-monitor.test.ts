import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { TransportCallbacks } from "../interfaces/session-handle.js";
import { FakeSessionHandle } from "../testing/fake-session-handle.js";
import { DEFAULT_WATCHDOG_CONFIG, type WatchdogConfig } from "../types/config.js";
import { Anomalies, type Anomaly } from "./anomaly.js";
import { BITRATE_HISTORY_CAPACITY, HealthMonitor, meanAndVariance } from "./health-monitor.js";
import { RunStateGate } from "./run-state-gate.js";
import { SerialExecutor } from "./serial-executor.js";

const INTERVAL = 1000;
const T0 = 1_700_000_000_000;

const noopCallbacks: TransportCallbacks = {
  connectionStarted: () => {},
  connectionSucceeded: () => {},
  connectionFailed: () => {},
  bitrateSample: () => {},
  disconnected: () => {},
  authError: () => {},
  authSucceeded: () => {},
};

function setup(overrides: Partial<WatchdogConfig> = {}, counterLimit?: number) {
  const gate = new RunStateGate();
  gate.setRunning();
  const executor = new SerialExecutor();
  const anomalies: Anomaly[] = [];
  const monitor = new HealthMonitor({
    gate,
    executor,
    counterLimit,
    onAnomaly: (anomaly) => anomalies.push(anomaly),
  });
  const config: WatchdogConfig = {
    ...DEFAULT_WATCHDOG_CONFIG,
    checkIntervalMs: INTERVAL,
    ...overrides,
  };
  const handle = new FakeSessionHandle(noopCallbacks);
  handle.capturing = true;
  handle.streaming = true;

  const tick = async (count = 1, beforeEach?: () => void) => {
    for (let i = 0; i < count; i++) {
      beforeEach?.();
      await vi.advanceTimersByTimeAsync(INTERVAL);
      await executor.drain();
    }
  };

  return { gate, executor, anomalies, monitor, config, handle, tick };
}

describe("HealthMonitor", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // ── Lifecycle ──

  describe("lifecycle", () => {
    it("counts skipped checks while the gate is stopped and reports nothing", async () => {
      const { gate, monitor, config, anomalies, tick } = setup();
      gate.setStopped();
      monitor.start(config);

      await tick(3);

      const stats = monitor.stats();
      expect(stats.totalChecks).toBe(3);
      expect(stats.skippedChecks).toBe(3);
      expect(stats.effectiveChecks).toBe(0);
      expect(stats.anomaliesDetected).toBe(0);
      expect(anomalies).toEqual([]);
    });

    it("ignores a second start", async () => {
      const { gate, monitor, config, tick } = setup();
      gate.setStopped();
      monitor.start(config);
      monitor.start(config);

      await tick(2);

      expect(monitor.stats().totalChecks).toBe(2);
    });

    it("stop cancels the timer and clears per-session data", async () => {
      const { monitor, config, handle, tick } = setup();
      monitor.start(config);
      monitor.setSessionHandle(handle);
      monitor.onBitrateSample(500_000);
      await tick(2);

      monitor.stop();

      const stats = monitor.stats();
      expect(monitor.isRunning()).toBe(false);
      expect(stats.running).toBe(false);
      expect(stats.bitrateHistory).toEqual([]);
      expect(stats.currentBitrate).toBe(0);
      expect(vi.getTimerCount()).toBe(0);

      await tick(3);
      expect(monitor.stats().totalChecks).toBe(2);
    });

    it("reports camera_disconnected when running without a session handle", async () => {
      const { monitor, config, anomalies, tick } = setup();
      monitor.start(config);

      await tick(2);

      expect(anomalies).toEqual([
        { kind: "camera_disconnected", severity: "critical" },
        { kind: "camera_disconnected", severity: "critical" },
      ]);
      expect(monitor.stats().effectiveChecks).toBe(2);
    });

    it("resets every counter once the saturation point is reached", async () => {
      const { gate, monitor, config, tick } = setup({}, 3);
      gate.setStopped();
      monitor.start(config);

      await tick(3);
      expect(monitor.stats().totalChecks).toBe(3);

      await tick(1);
      const stats = monitor.stats();
      expect(stats.totalChecks).toBe(0);
      expect(stats.skippedChecks).toBe(1);
      expect(stats.startTime).toBe(T0 + 4 * INTERVAL);

      await tick(1);
      expect(monitor.stats().totalChecks).toBe(1);
      expect(monitor.stats().skippedChecks).toBe(2);
    });
  });

  // ── Bitrate ──

  describe("bitrate checks", () => {
    it("reports zero bitrate when no sample arrives after the first-sample timeout", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        startupGraceMs: 2000,
        firstBitrateTimeoutMs: 3000,
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);

      await tick(3);
      expect(anomalies).toEqual([]);

      await tick(1);
      expect(anomalies).toEqual([{ kind: "zero_bitrate", severity: "error", durationMs: 4000 }]);
    });

    it("reports a zero-bitrate run that outlasts its duration", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        startupGraceMs: 0,
        zeroBitrateDurationMs: 3000,
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);
      monitor.onBitrateSample(0);

      await tick(3, () => monitor.onBitrateSample(0));
      expect(anomalies).toEqual([]);

      await tick(1, () => monitor.onBitrateSample(0));
      expect(anomalies).toEqual([{ kind: "zero_bitrate", severity: "error", durationMs: 4000 }]);
    });

    it("counts samples below the zero threshold as part of the zero-bitrate run", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        startupGraceMs: 0,
        zeroBitrateDurationMs: 3000,
        enableFluctuationMonitoring: false,
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);
      monitor.onBitrateSample(0);

      let next = 5000;
      const alternate = () => {
        monitor.onBitrateSample(next);
        next = next === 0 ? 5000 : 0;
      };

      await tick(3, alternate);
      expect(anomalies).toEqual([]);

      await tick(1, alternate);
      expect(anomalies).toEqual([{ kind: "zero_bitrate", severity: "error", durationMs: 4000 }]);
    });

    it("a sample exactly at the zero threshold ends the zero-bitrate run", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        startupGraceMs: 0,
        zeroBitrateDurationMs: 3000,
        enableFluctuationMonitoring: false,
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);
      monitor.onBitrateSample(0);

      await tick(3, () => monitor.onBitrateSample(0));
      await tick(3, () => monitor.onBitrateSample(config.zeroBitrateThresholdBps));

      expect(anomalies).toEqual([]);
      expect(monitor.stats().currentBitrate).toBe(10_000);
    });

    it("a healthy sample ends the zero-bitrate run", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        startupGraceMs: 0,
        zeroBitrateDurationMs: 3000,
        enableFluctuationMonitoring: false,
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);
      monitor.onBitrateSample(0);

      await tick(3, () => monitor.onBitrateSample(0));
      await tick(3, () => monitor.onBitrateSample(500_000));

      expect(anomalies).toEqual([]);
    });

    it("reports zero bitrate when the newest sample goes stale", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        startupGraceMs: 0,
        bitrateTimeoutMs: 5000,
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);
      monitor.onBitrateSample(500_000);

      await tick(5);
      expect(anomalies).toEqual([]);

      await tick(1);
      expect(anomalies).toEqual([{ kind: "zero_bitrate", severity: "error", durationMs: 6000 }]);
    });

    it("debounces low-bitrate warnings", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        startupGraceMs: 0,
        lowBitrateDurationMs: 2000,
        debounceWindowMs: 5000,
        enableFluctuationMonitoring: false,
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);
      monitor.onBitrateSample(50_000);

      await tick(3, () => monitor.onBitrateSample(50_000));
      expect(anomalies).toEqual([
        { kind: "low_bitrate", severity: "warning", currentBps: 50_000, thresholdBps: 100_000 },
      ]);

      await tick(4, () => monitor.onBitrateSample(50_000));
      expect(anomalies).toHaveLength(1);

      await tick(1, () => monitor.onBitrateSample(50_000));
      expect(anomalies).toHaveLength(2);
      expect(monitor.stats().lastAnomalyKind).toBe("low_bitrate");
    });

    it("reports fluctuation when the coefficient of variation exceeds the threshold", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        startupGraceMs: 0,
        fluctuationMinSamples: 4,
        fluctuationMinNonZeroSamples: 4,
        fluctuationCvThreshold: 0.5,
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);
      for (const bps of [100_000, 1_000_000, 100_000, 1_000_000]) monitor.onBitrateSample(bps);

      await tick(1);

      expect(anomalies).toEqual([
        { kind: "bitrate_fluctuation", severity: "warning", variance: 202_500_000_000 },
      ]);
    });

    it("applies updated thresholds to runs already in progress", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        startupGraceMs: 0,
        zeroBitrateDurationMs: 10_000,
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);
      monitor.onBitrateSample(0);

      await tick(1, () => monitor.onBitrateSample(0));
      expect(anomalies).toEqual([]);

      monitor.updateConfig({ ...config, zeroBitrateDurationMs: 1500 });
      await tick(1, () => monitor.onBitrateSample(0));

      expect(anomalies).toEqual([{ kind: "zero_bitrate", severity: "error", durationMs: 2000 }]);
      expect(monitor.getConfig().zeroBitrateDurationMs).toBe(1500);
    });

    it("ignores invalid samples", async () => {
      const { gate, monitor, config, tick } = setup();
      gate.setStopped();
      monitor.start(config);

      monitor.onBitrateSample(Number.NaN);
      monitor.onBitrateSample(-1);
      monitor.onBitrateSample(Number.POSITIVE_INFINITY);
      monitor.onBitrateSample(750_000);
      await tick(1);

      expect(monitor.stats().bitrateHistory).toEqual([750_000]);
    });
  });

  // ── Connection and encoder ──

  describe("connection and encoder checks", () => {
    it("reports a connection stuck past the grace period", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        connectionGraceMs: 1000,
        connectionStuckMs: 2000,
        enableBitrateMonitoring: false,
        enableEncoderMonitoring: false,
      });
      handle.streaming = false;
      monitor.start(config);
      monitor.setSessionHandle(handle);

      await tick(4);
      expect(anomalies).toEqual([]);

      await tick(1);
      expect(anomalies).toEqual([
        { kind: "connection_stuck", severity: "critical", durationMs: 3000 },
      ]);
    });

    it("reports a streaming timeout when samples stop while streaming", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        connectionTimeoutMs: 3000,
        enableBitrateMonitoring: false,
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);
      monitor.onBitrateSample(500_000);

      await tick(3);
      expect(anomalies).toEqual([]);

      await tick(1);
      expect(anomalies).toEqual([
        { kind: "streaming_timeout", severity: "error", durationMs: 4000 },
      ]);
    });

    it("reports camera_disconnected when capture stops", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        enableBitrateMonitoring: false,
        enableConnectionMonitoring: false,
      });
      handle.capturing = false;
      monitor.start(config);
      monitor.setSessionHandle(handle);

      await tick(1);

      expect(anomalies).toEqual([{ kind: "camera_disconnected", severity: "critical" }]);
    });

    it("reports an encoder error when capturing but not streaming past the grace period", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        connectionGraceMs: 1000,
        enableBitrateMonitoring: false,
        enableConnectionMonitoring: false,
      });
      handle.streaming = false;
      monitor.start(config);
      monitor.setSessionHandle(handle);

      await tick(1);
      expect(anomalies).toEqual([]);

      await tick(1);
      expect(anomalies).toEqual([
        { kind: "encoder_error", severity: "error", message: "encoder not running" },
      ]);
    });

    it("leaves a session that is still connecting alone during the grace period", async () => {
      const { monitor, config, handle, anomalies, tick } = setup();
      handle.streaming = false;
      monitor.start(config);
      monitor.setSessionHandle(handle);

      await tick(5);

      expect(anomalies).toEqual([]);
      expect(monitor.stats().effectiveChecks).toBe(5);
    });

    it("turns a throwing check into an encoder error and keeps ticking", async () => {
      const { monitor, config, handle, anomalies, tick } = setup({
        enableBitrateMonitoring: false,
        enableEncoderMonitoring: false,
      });
      vi.spyOn(handle, "isStreaming").mockImplementation(() => {
        throw new Error("engine gone");
      });
      monitor.start(config);
      monitor.setSessionHandle(handle);

      await tick(2);

      expect(anomalies).toEqual([
        Anomalies.encoderError("health check failed: connection: engine gone"),
        Anomalies.encoderError("health check failed: connection: engine gone"),
      ]);
    });
  });

  // ── Delivery ──

  describe("anomaly delivery", () => {
    it("drops an anomaly whose session was replaced before delivery", async () => {
      const { monitor, config, anomalies, tick } = setup();
      const replacement = new FakeSessionHandle(noopCallbacks);
      monitor.start(config);
      monitor.subscribe("stats", (stats) => {
        if (stats.anomaliesDetected === 1) monitor.setSessionHandle(replacement);
      });

      await tick(1);

      expect(monitor.stats().anomaliesDetected).toBe(1);
      expect(anomalies).toEqual([]);
    });

    it("drops an anomaly when the gate closes before delivery", async () => {
      const { gate, monitor, config, anomalies, tick } = setup();
      monitor.start(config);
      monitor.subscribe("stats", (stats) => {
        if (stats.anomaliesDetected === 1) gate.setStopped();
      });

      await tick(1);

      expect(anomalies).toEqual([]);
    });
  });

  // ── Stats ──

  describe("stats", () => {
    it("keeps a bounded history and averages non-zero samples", async () => {
      const { gate, monitor, config, tick } = setup();
      gate.setStopped();
      monitor.start(config);
      for (let i = 1; i <= BITRATE_HISTORY_CAPACITY + 5; i++) monitor.onBitrateSample(i * 1000);

      await tick(1);

      const stats = monitor.stats();
      expect(stats.bitrateHistory).toHaveLength(BITRATE_HISTORY_CAPACITY);
      expect(stats.bitrateHistory[0]).toBe(6000);
      expect(stats.currentBitrate).toBe(25_000);
      expect(Object.isFrozen(stats)).toBe(true);
    });

    it("floors the average and skips zero samples", async () => {
      const { gate, monitor, config, tick } = setup();
      gate.setStopped();
      monitor.start(config);
      for (const bps of [0, 1000, 2001]) monitor.onBitrateSample(bps);

      await tick(1);

      expect(monitor.stats().averageBitrate).toBe(1500);
    });

    it("publishes a stats event after every tick", async () => {
      const { gate, monitor, config, tick } = setup();
      const totals: number[] = [];
      gate.setStopped();
      monitor.subscribe("stats", (stats) => totals.push(stats.totalChecks));
      monitor.start(config);

      await tick(2);

      expect(totals).toEqual([0, 1, 2]);
    });
  });
});

describe("meanAndVariance", () => {
  it("returns zeros for an empty list", () => {
    expect(meanAndVariance([])).toEqual({ mean: 0, variance: 0 });
  });

  it("computes the population variance", () => {
    expect(meanAndVariance([2, 4, 4, 4, 5, 5, 7, 9])).toEqual({ mean: 5, variance: 4 });
  });
});
