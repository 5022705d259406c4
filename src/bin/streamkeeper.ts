#!/usr/bin/env node
import { ConsoleLogger } from "../adapters/console-logger.js";
import { FfmpegSessionFactory } from "../adapters/ffmpeg-session-handle.js";
import { NodeProcessManager } from "../adapters/node-process-manager.js";
import { NodeStatusServer } from "../adapters/node-status-server.js";
import { LogLevel, StructuredLogger } from "../adapters/structured-logger.js";
import { type CliConfig, HELP_TEXT, parseCliArgs } from "../config/cli-args.js";
import { SessionOrchestrator } from "../core/session-orchestrator.js";
import { StatusBroadcaster } from "../core/status-broadcaster.js";
import { ConfigError, errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { registerSignalHandlers } from "../utils/signal-handler.js";
import { redactStreamUrl } from "../utils/redact-url.js";

function createLogger(config: CliConfig): Logger {
  if (config.pretty) return new ConsoleLogger({ verbose: config.verbose });
  return new StructuredLogger({
    component: "streamkeeper",
    level: config.verbose ? LogLevel.DEBUG : LogLevel.INFO,
  });
}

// ── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}\nRun with --help for usage.`);
      process.exit(1);
    }
    throw err;
  }
  if (parsed.kind === "help") {
    console.log(HELP_TEXT);
    return;
  }

  const config = parsed.config;
  const logger = createLogger(config);

  // 1. Engine and orchestrator
  const factory = new FfmpegSessionFactory({
    processManager: new NodeProcessManager(logger),
    inputFormat: config.inputFormat,
    devices: { back: config.deviceBack, front: config.deviceFront },
    audioInputFormat: config.audioFormat,
    audioDevice: config.audioDevice,
    ffmpegPath: config.ffmpegPath,
    logger,
  });
  const orchestrator = new SessionOrchestrator({
    factory,
    logger,
    settings: {
      url: config.url,
      videoWidth: config.width,
      videoHeight: config.height,
      videoFps: config.fps,
      videoBitrateKbps: config.bitrateKbps,
    },
    reconnect: { policy: config.policy },
    notifications: { update: (status) => logger.info(`Status: ${status}`) },
  });

  // 2. Optional status channel
  let statusServer: NodeStatusServer | null = null;
  let broadcaster: StatusBroadcaster | null = null;
  if (config.statusPort !== undefined) {
    broadcaster = new StatusBroadcaster(orchestrator, logger);
    broadcaster.start();
    statusServer = new NodeStatusServer({ port: config.statusPort, logger });
    const channel = broadcaster;
    await statusServer.listen((socket) => {
      channel.attach(socket);
      socket.on("close", () => channel.detach(socket));
      socket.on("error", () => channel.detach(socket));
    });
  }

  // 3. Graceful shutdown
  const cleanup = async () => {
    await orchestrator.shutdown();
    broadcaster?.stop();
    await statusServer?.close();
  };
  const unregister = registerSignalHandlers(cleanup, { logger });

  // A fatal error closes the gate; nothing will restart the session after that
  const exitOnFatal = async (reason: string) => {
    unregister();
    logger.error(`Giving up: ${reason}`);
    await cleanup();
    process.exit(1);
  };
  orchestrator.on("state", (state) => {
    if (state.kind === "error" && !orchestrator.isRunning()) {
      exitOnFatal(state.message).catch((err: unknown) => {
        logger.error("Shutdown failed", { error: err });
        process.exit(1);
      });
    }
  });

  // 4. Go
  console.log(`
  streamkeeper v0.1.0

  Target:  ${redactStreamUrl(config.url)}${config.statusPort !== undefined ? `\n  Status:  ws://127.0.0.1:${config.statusPort}/ws/status` : ""}

  Press Ctrl+C to stop
`);
  await orchestrator.start();
}

main().catch((err: unknown) => {
  console.error(`Fatal error: ${errorMessage(err)}`);
  process.exit(1);
});
