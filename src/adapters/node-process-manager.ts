import { type ChildProcess, spawn as nodeSpawn } from "node:child_process";
import { Readable } from "node:stream";
import { EngineError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { ProcessHandle, ProcessManager, SpawnOptions } from "../interfaces/process-manager.js";
import { noopLogger } from "./noop-logger.js";

type Signal = "SIGTERM" | "SIGKILL" | "SIGINT";

function toWebStream(stream: Readable | null): ReadableStream<Uint8Array> | null {
  return stream ? (Readable.toWeb(stream) as ReadableStream<Uint8Array>) : null;
}

/**
 * Spawns encoder processes with child_process.spawn.
 *
 * stdin is closed: ffmpeg reads `q` from a terminal stdin and would otherwise
 * stall when the host has none. Pipes are handed out as web ReadableStreams.
 */
export class NodeProcessManager implements ProcessManager {
  constructor(private readonly logger: Logger = noopLogger) {}

  spawn(options: SpawnOptions): ProcessHandle {
    let child: ChildProcess;
    try {
      child = nodeSpawn(options.command, options.args, {
        cwd: options.cwd,
        env: options.env,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });
    } catch (err) {
      throw new EngineError(`Failed to spawn ${options.command}`, { cause: err });
    }

    // ENOENT and friends surface as an "error" event with no pid assigned
    const exited = new Promise<number | null>((resolve) => {
      child.once("exit", (code, signal) => {
        this.logger.debug?.("Process exited", { pid: child.pid, code, signal });
        resolve(signal ? null : code);
      });
      child.once("error", (err) => {
        this.logger.warn("Process error", { command: options.command, error: err });
        resolve(null);
      });
    });

    const pid = child.pid;
    if (typeof pid !== "number") {
      throw new EngineError(`Failed to spawn ${options.command}: is it installed and on PATH?`);
    }

    return {
      pid,
      exited,
      kill: (signal: Signal = "SIGTERM") => {
        if (child.exitCode !== null || child.signalCode !== null) return;
        child.kill(signal);
      },
      stdout: toWebStream(child.stdout),
      stderr: toWebStream(child.stderr),
    };
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch {
      return false;
    }
  }
}
