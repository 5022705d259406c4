// Core
export {
  Anomalies,
  type Anomaly,
  type AnomalyKind,
  type AnomalySeverity,
  ANOMALY_KINDS,
  describeAnomaly,
  isDebounced,
  requiresReconnect,
} from "./core/anomaly.js";
export {
  type BackoffState,
  computeDelay,
  INITIAL_BACKOFF,
  isRetryWindowExhausted,
} from "./core/backoff.js";
export {
  BITRATE_HISTORY_CAPACITY,
  HealthMonitor,
  type HealthMonitorOptions,
  type WatchdogStats,
} from "./core/health-monitor.js";
export {
  ReconnectCoordinator,
  type ReconnectCoordinatorDeps,
  type ReconnectEventMap,
  type ReconnectPlan,
} from "./core/reconnect-coordinator.js";
export { type RunState, RunStateGate } from "./core/run-state-gate.js";
export { SerialExecutor } from "./core/serial-executor.js";
export {
  type ControlState,
  SessionOrchestrator,
  type SessionOrchestratorEventMap,
  type SessionOrchestratorOptions,
} from "./core/session-orchestrator.js";
export {
  canStart,
  describeSessionState,
  type SessionState,
  SessionStates,
} from "./core/session-state.js";
export { StatusBroadcaster, type StatusSource } from "./core/status-broadcaster.js";
export { TypedEventEmitter } from "./core/typed-emitter.js";

// Adapters
export { ConsoleLogger } from "./adapters/console-logger.js";
export {
  buildFfmpegArgs,
  type FfmpegEngineOptions,
  FfmpegSessionFactory,
  FfmpegSessionHandle,
} from "./adapters/ffmpeg-session-handle.js";
export { NodeProcessManager } from "./adapters/node-process-manager.js";
export { NodeStatusServer, STATUS_PATH } from "./adapters/node-status-server.js";
export { noopLogger } from "./adapters/noop-logger.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";

// Config & errors
export {
  reconnectConfigSchema,
  streamSettingsSchema,
  watchdogConfigSchema,
} from "./config/config-schema.js";
export {
  ConfigError,
  EngineError,
  errorMessage,
  StreamKeeperError,
  toStreamKeeperError,
} from "./errors.js";
export {
  DEFAULT_RECONNECT_CONFIG,
  DEFAULT_STREAM_SETTINGS,
  DEFAULT_WATCHDOG_CONFIG,
  type ReconnectConfig,
  type ReconnectPolicyKind,
  resolveReconnectConfig,
  resolveStreamSettings,
  resolveWatchdogConfig,
  type StreamSettings,
  type VideoRotation,
  type WatchdogConfig,
} from "./types/config.js";
export type { StatusMessage } from "./types/status-messages.js";

// Interfaces
export type { Clock } from "./interfaces/clock.js";
export type { Logger } from "./interfaces/logger.js";
export type { NotificationSink } from "./interfaces/notification.js";
export type { ProcessHandle, ProcessManager, SpawnOptions } from "./interfaces/process-manager.js";
export type {
  CameraFacing,
  SessionFactory,
  SessionHandle,
  TransportCallbacks,
} from "./interfaces/session-handle.js";
export { redactStreamUrl } from "./utils/redact-url.js";
