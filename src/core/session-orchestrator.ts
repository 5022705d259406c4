/**
 * SessionOrchestrator — public facade over one publishing session.
 *
 * Owns the run/stop gate, the watchdog and the reconnect coordinator, and
 * turns engine callbacks into {@link SessionState} transitions. Every
 * mutation runs on a single {@link SerialExecutor}, so a transport callback
 * can never interleave with a tick, a stop or a rebuild.
 *
 * Recovery is watchdog-driven: a failed transport releases its resources and
 * parks in `error` with the gate still running; the next tick notices the
 * missing session and its anomaly schedules the rebuild.
 *
 * @module SessionControl
 */

import { noopLogger } from "../adapters/noop-logger.js";
import { ConfigError, EngineError, errorMessage } from "../errors.js";
import { type Clock, systemClock } from "../interfaces/clock.js";
import type { Logger } from "../interfaces/logger.js";
import { type NotificationSink, noopNotificationSink } from "../interfaces/notification.js";
import type {
  CameraFacing,
  SessionFactory,
  SessionHandle,
  TransportCallbacks,
} from "../interfaces/session-handle.js";
import {
  type ReconnectConfig,
  resolveReconnectConfig,
  resolveStreamSettings,
  resolveWatchdogConfig,
  type StreamSettings,
  type VideoRotation,
  type WatchdogConfig,
} from "../types/config.js";
import { type Anomaly, describeAnomaly, requiresReconnect } from "./anomaly.js";
import type { BackoffState } from "./backoff.js";
import { HealthMonitor, type WatchdogStats } from "./health-monitor.js";
import { ReconnectCoordinator } from "./reconnect-coordinator.js";
import { RunStateGate } from "./run-state-gate.js";
import { SerialExecutor } from "./serial-executor.js";
import {
  canStart,
  describeSessionState,
  type SessionState,
  SessionStates,
} from "./session-state.js";
import { TypedEventEmitter } from "./typed-emitter.js";

/** User-facing toggles, restored on every transition into `streaming`. */
export interface ControlState {
  readonly muted: boolean;
  readonly torchOn: boolean;
  readonly facing: CameraFacing;
  readonly bitrateKbps: number;
}

export interface SessionOrchestratorEventMap {
  state: SessionState;
  stats: WatchdogStats;
  controls: ControlState;
  anomaly: Anomaly;
}

export interface SessionOrchestratorOptions {
  factory: SessionFactory;
  settings?: Partial<StreamSettings>;
  watchdog?: Partial<WatchdogConfig>;
  reconnect?: Partial<ReconnectConfig>;
  notifications?: NotificationSink;
  logger?: Logger;
  clock?: Clock;
  /** Jitter source for the exponential policy, in [0, 1). */
  random?: () => number;
  /** Saturation point of the watchdog counters. */
  counterLimit?: number;
}

export class SessionOrchestrator extends TypedEventEmitter<SessionOrchestratorEventMap> {
  private readonly factory: SessionFactory;
  private readonly notifications: NotificationSink;
  private readonly logger: Logger;
  private readonly clock: Clock;

  private readonly gate: RunStateGate;
  private readonly executor: SerialExecutor;
  private readonly monitor: HealthMonitor;
  private readonly coordinator: ReconnectCoordinator;

  private settings: StreamSettings;
  private watchdogConfig: WatchdogConfig;
  private state: SessionState = SessionStates.idle();
  private controls: ControlState;
  private target: string | null = null;
  private handle: SessionHandle | null = null;
  // Bumped whenever a session is created or torn down; stale callbacks compare against it
  private generation = 0;
  private terminatedGeneration = -1;

  constructor(options: SessionOrchestratorOptions) {
    super();
    this.factory = options.factory;
    this.notifications = options.notifications ?? noopNotificationSink;
    this.logger = options.logger ?? noopLogger;
    this.clock = options.clock ?? systemClock;

    this.settings = resolveStreamSettings(options.settings);
    this.watchdogConfig = resolveWatchdogConfig(options.watchdog);
    this.controls = Object.freeze({
      muted: false,
      torchOn: false,
      facing: this.settings.cameraFacing,
      bitrateKbps: this.settings.videoBitrateKbps,
    });

    this.gate = new RunStateGate(this.logger);
    this.executor = new SerialExecutor(this.logger);
    this.monitor = new HealthMonitor({
      gate: this.gate,
      executor: this.executor,
      logger: this.logger,
      counterLimit: options.counterLimit,
      onAnomaly: (anomaly) => this.handleAnomaly(anomaly),
    });
    this.coordinator = new ReconnectCoordinator({
      gate: this.gate,
      executor: this.executor,
      config: resolveReconnectConfig(options.reconnect),
      logger: this.logger,
      clock: this.clock,
      random: options.random,
      target: () => this.target,
      teardown: () => this.releaseSession(),
      rebuild: (target) => this.rebuildSession(target),
    });

    this.monitor.on("stats", (stats) => this.emit("stats", stats));
    this.coordinator.on("reconnect:exhausted", ({ attempts }) => {
      this.gate.setStopped();
      this.setState(SessionStates.error(`reconnect window exhausted after ${attempts} attempts`));
    });
  }

  // ── Lifecycle ──

  /**
   * Start publishing to `url` (or the configured target). Resolves false when
   * the engine could not be initialised; the session is then in `error` with
   * the gate stopped.
   */
  start(url?: string): Promise<boolean> {
    return this.executor.run(async () => {
      if (!canStart(this.state)) {
        this.logger.warn(`Ignoring start while ${this.state.kind}`);
        return false;
      }
      const target = url ?? this.settings.url;
      if (!target) throw new ConfigError("No target URL configured");

      this.target = target;
      this.coordinator.cancelReconnect();
      this.coordinator.resetBackoff();
      this.gate.setRunning();
      this.monitor.start(this.watchdogConfig, this.clock);

      try {
        await this.openSession(target, true);
        return true;
      } catch (err) {
        this.logger.error("Failed to start session", { error: err, url: target });
        return false;
      }
    });
  }

  /** Stop publishing. The watchdog keeps ticking (as skipped checks). */
  stop(): Promise<void> {
    return this.executor.run(async () => {
      this.gate.setStopped();
      this.coordinator.cancelReconnect();
      this.coordinator.resetBackoff();
      await this.releaseSession();
      this.setState(SessionStates.idle());
    });
  }

  /** Stop publishing and the watchdog. The orchestrator is unusable afterwards. */
  async shutdown(): Promise<void> {
    await this.stop();
    this.monitor.stop();
    await this.executor.drain();
    this.monitor.removeAllListeners();
    this.coordinator.removeAllListeners();
    this.logger.info("Session orchestrator shut down");
  }

  // ── Settings & controls ──

  /** Merge settings. A bitrate change applies to the live session immediately. */
  updateSettings(overrides: Partial<StreamSettings>): Promise<StreamSettings> {
    return this.executor.run(async () => {
      const next = resolveStreamSettings(overrides, this.settings);
      const bitrateChanged = next.videoBitrateKbps !== this.settings.videoBitrateKbps;
      this.settings = next;
      if (bitrateChanged) this.applyBitrate(next.videoBitrateKbps);
      if (next.cameraFacing !== this.controls.facing && !this.handle) {
        this.setControls({ facing: next.cameraFacing });
      }
      return next;
    });
  }

  updateWatchdogConfig(overrides: Partial<WatchdogConfig>): WatchdogConfig {
    this.watchdogConfig = resolveWatchdogConfig(overrides, this.watchdogConfig);
    this.monitor.updateConfig(this.watchdogConfig);
    return this.watchdogConfig;
  }

  updateReconnectConfig(overrides: Partial<ReconnectConfig>): ReconnectConfig {
    const next = resolveReconnectConfig(overrides, this.coordinator.getConfig());
    this.coordinator.updateConfig(next);
    return next;
  }

  async setBitrate(kbps: number): Promise<void> {
    await this.updateSettings({ videoBitrateKbps: kbps });
  }

  /** Resolves to the new mute state. */
  toggleMute(): Promise<boolean> {
    return this.executor.run(async () => {
      const muted = !this.controls.muted;
      this.handle?.setAudioMuted(muted);
      this.setControls({ muted });
      return muted;
    });
  }

  /** Back camera with torch support only. Resolves to the new torch state. */
  toggleTorch(): Promise<boolean> {
    return this.executor.run(async () => {
      const handle = this.handle;
      if (this.controls.facing !== "back" || !handle?.isTorchSupported()) {
        this.logger.warn("Torch not available", { facing: this.controls.facing });
        return this.controls.torchOn;
      }
      const torchOn = !this.controls.torchOn;
      handle.setTorch(torchOn);
      this.setControls({ torchOn });
      return torchOn;
    });
  }

  /** Flip between front and back camera; the torch is turned off first. */
  switchFacing(): Promise<CameraFacing> {
    return this.executor.run(async () => {
      const facing: CameraFacing = this.controls.facing === "back" ? "front" : "back";
      const handle = this.handle;
      if (handle) {
        if (this.controls.torchOn) handle.setTorch(false);
        await handle.switchFacing();
      }
      this.settings = resolveStreamSettings({ cameraFacing: facing }, this.settings);
      this.setControls({ facing, torchOn: false });
      return facing;
    });
  }

  // ── Observer surface ──

  getState(): SessionState {
    return this.state;
  }

  getStatusText(): string {
    return describeSessionState(this.state);
  }

  getStats(): WatchdogStats {
    return this.monitor.stats();
  }

  getControls(): ControlState {
    return this.controls;
  }

  getSettings(): StreamSettings {
    return this.settings;
  }

  getTarget(): string | null {
    return this.target;
  }

  getBackoffState(): BackoffState {
    return this.coordinator.getBackoffState();
  }

  isRunning(): boolean {
    return this.gate.isRunning();
  }

  /** Resolves once every queued control task has settled. */
  idle(): Promise<void> {
    return this.executor.drain();
  }

  protected override onListenerError(event: string, error: unknown): void {
    this.logger.warn(`Orchestrator "${event}" listener failed`, { error });
  }

  // ── Session construction ──

  /**
   * Create, prepare and start a session. Rejects on failure with resources
   * released and the state in `error`; `closeGateOnFailure` also stops the gate
   * before that state is published.
   */
  private async openSession(target: string, closeGateOnFailure = false): Promise<void> {
    await this.releaseSession();
    this.setState(SessionStates.preparing());

    const generation = ++this.generation;
    const handle = this.factory.createSession(this.bindCallbacks(generation));
    this.handle = handle;
    // Monitored from creation on, so a session that never connects is still caught
    this.monitor.setSessionHandle(handle);

    try {
      const s = this.settings;
      const width = Math.max(s.videoWidth, s.videoHeight);
      const height = Math.min(s.videoWidth, s.videoHeight);
      const videoOk = await handle.prepareVideo(
        width,
        height,
        s.videoFps,
        this.controls.bitrateKbps * 1000,
        s.keyframeIntervalSec,
        rotationDegrees(s.videoRotation),
      );
      if (!videoOk) throw new EngineError("video encoder preparation failed");

      const audioOk = await handle.prepareAudio(
        s.audioBitrateKbps * 1000,
        s.audioSampleRate,
        s.audioStereo,
        s.audioEchoCancel,
        s.audioNoiseSuppress,
      );
      if (!audioOk) this.logger.warn("Audio encoder unavailable, continuing without audio");

      if (this.controls.facing !== s.cameraFacing) {
        this.setControls({ facing: s.cameraFacing, torchOn: false });
      }
      await handle.startCapture(s.cameraFacing);
      this.setState(SessionStates.connecting());
      this.logger.info("Starting transport", { url: target });
      await handle.startTransport(target);
    } catch (err) {
      await this.releaseSession();
      if (closeGateOnFailure) this.gate.setStopped();
      this.setState(SessionStates.error(errorMessage(err)));
      throw err;
    }
  }

  private async rebuildSession(target: string): Promise<void> {
    this.logger.info("Rebuilding session", { url: target });
    await this.openSession(target);
  }

  /** Tear the current session down step by step; a failing step does not stop the rest. */
  private async releaseSession(): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    this.generation++;
    this.monitor.setSessionHandle(null);

    const steps: Array<[string, () => Promise<void>]> = [
      ["stop transport", () => handle.stopTransport()],
      ["stop capture", () => handle.stopCapture()],
      ["release", () => handle.release()],
    ];
    for (const [label, step] of steps) {
      try {
        await step();
      } catch (err) {
        this.logger.warn(`Failed to ${label}`, { error: err });
      }
    }
    this.logger.debug?.("Session resources released");
  }

  // ── Engine callbacks ──

  private bindCallbacks(generation: number): TransportCallbacks {
    const post = (label: string, task: () => void | Promise<void>) => {
      this.executor.post(label, () => {
        if (generation !== this.generation) {
          this.logger.debug?.(`Ignoring ${label} from a retired session`);
          return;
        }
        return task();
      });
    };

    return {
      connectionStarted: (url) => {
        post("connection started", () => {
          this.logger.info("Connection started", { url });
        });
      },
      connectionSucceeded: () => {
        post("connection succeeded", () => this.onConnected());
      },
      connectionFailed: (reason) => {
        post("connection failed", () => this.onTransportLost(generation, reason));
      },
      disconnected: () => {
        post("disconnected", () => this.onTransportLost(generation, "disconnected"));
      },
      bitrateSample: (bps) => {
        post("bitrate sample", () => {
          this.monitor.onBitrateSample(bps);
          if (this.state.kind === "streaming") this.setState(SessionStates.streaming(bps));
        });
      },
      authError: () => {
        post("auth error", () => this.onAuthError());
      },
      authSucceeded: () => {
        post("auth succeeded", () => {
          this.logger.info("Authentication succeeded");
        });
      },
    };
  }

  private onConnected(): void {
    if (this.state.kind !== "connecting" && this.state.kind !== "reconnecting") {
      this.logger.debug?.(`Connected while ${this.state.kind}, ignoring`);
      return;
    }
    this.logger.info("Connection established");
    this.setState(SessionStates.streaming(0));
  }

  private async onTransportLost(generation: number, reason: string): Promise<void> {
    if (this.terminatedGeneration === generation) return;
    this.terminatedGeneration = generation;
    if (this.state.kind !== "connecting" && this.state.kind !== "streaming") {
      this.logger.debug?.(`Transport lost while ${this.state.kind}, ignoring`, { reason });
      return;
    }
    this.logger.warn(`Transport lost: ${reason}`);
    await this.releaseSession();
    this.setState(SessionStates.error(reason));
  }

  private async onAuthError(): Promise<void> {
    this.logger.error("Authentication failed, stopping");
    this.gate.setStopped();
    this.coordinator.cancelReconnect();
    await this.releaseSession();
    this.setState(SessionStates.error("authentication failed"));
  }

  // ── Watchdog ──

  private handleAnomaly(anomaly: Anomaly): void {
    this.emit("anomaly", anomaly);
    const description = describeAnomaly(anomaly);

    if (!requiresReconnect(anomaly)) {
      this.notifications.update(`Stream warning: ${description}`);
      return;
    }
    if (this.coordinator.isPending()) {
      this.logger.debug?.(`Reconnect already pending, ignoring: ${description}`);
      return;
    }
    if (this.coordinator.scheduleReconnect(description)) {
      this.setState(SessionStates.reconnecting());
    }
  }

  // ── State ──

  private setState(next: SessionState): void {
    const previous = this.state;
    this.state = next;
    if (previous.kind !== next.kind) {
      this.logger.info(`Session state: ${previous.kind} -> ${next.kind}`);
      this.notifications.update(describeSessionState(next));
      if (next.kind === "streaming") this.onStreamingEntered();
    }
    this.emit("state", next);
  }

  private onStreamingEntered(): void {
    this.coordinator.resetBackoff();
    const handle = this.handle;
    if (!handle) return;
    if (this.controls.muted) handle.setAudioMuted(true);
    if (this.controls.torchOn && this.controls.facing === "back" && handle.isTorchSupported()) {
      handle.setTorch(true);
    }
  }

  private applyBitrate(kbps: number): void {
    this.handle?.setBitrate(kbps * 1000);
    this.setControls({ bitrateKbps: kbps });
  }

  private setControls(patch: Partial<ControlState>): void {
    this.controls = Object.freeze({ ...this.controls, ...patch });
    this.emit("controls", this.controls);
  }
}

function rotationDegrees(rotation: VideoRotation): number {
  // No orientation sensor to consult; "auto" means upright
  return rotation === "auto" ? 0 : rotation;
}
