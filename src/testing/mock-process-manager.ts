import type { ProcessHandle, ProcessManager, SpawnOptions } from "../interfaces/process-manager.js";

export interface MockProcessHandle extends ProcessHandle {
  /** Resolve the exited promise with an exit code; closes both pipes. */
  resolveExit: (code: number | null) => void;
  /** Push text into the process's stdout pipe. */
  writeStdout: (text: string) => void;
  /** Push text into the process's stderr pipe. */
  writeStderr: (text: string) => void;
  /** The kill calls made */
  killCalls: string[];
}

function controlledStream(): {
  stream: ReadableStream<Uint8Array>;
  write: (text: string) => void;
  close: () => void;
} {
  const encoder = new TextEncoder();
  let enqueue: (chunk: Uint8Array) => void = () => {};
  let end: () => void = () => {};
  let closed = false;
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      enqueue = (chunk) => controller.enqueue(chunk);
      end = () => controller.close();
    },
  });
  return {
    stream,
    write: (text) => {
      if (!closed) enqueue(encoder.encode(text));
    },
    close: () => {
      if (closed) return;
      closed = true;
      end();
    },
  };
}

/**
 * Mock ProcessManager for testing.
 * Tracks spawned processes and lets a test drive their pipes and exit.
 */
export class MockProcessManager implements ProcessManager {
  readonly spawnCalls: SpawnOptions[] = [];
  readonly spawnedProcesses: MockProcessHandle[] = [];
  private alivePids = new Set<number>();
  private nextPid = 10000;
  private shouldFailSpawn = false;
  /** When set, SIGTERM/SIGKILL resolve the exit with this code, like a well-behaved child. */
  exitOnKill: number | null = null;

  spawn(options: SpawnOptions): ProcessHandle {
    this.spawnCalls.push(options);

    if (this.shouldFailSpawn) {
      this.shouldFailSpawn = false;
      throw new Error("Mock spawn failure");
    }

    const pid = this.nextPid++;
    this.alivePids.add(pid);

    let resolveExit: (code: number | null) => void = () => {};
    const exited = new Promise<number | null>((resolve) => {
      resolveExit = resolve;
    });
    const stdout = controlledStream();
    const stderr = controlledStream();
    const killCalls: string[] = [];

    const finish = (code: number | null) => {
      this.alivePids.delete(pid);
      stdout.close();
      stderr.close();
      resolveExit(code);
    };

    const handle: MockProcessHandle = {
      pid,
      exited,
      kill: (signal: "SIGTERM" | "SIGKILL" | "SIGINT" = "SIGTERM") => {
        killCalls.push(signal);
        if (this.exitOnKill !== null) finish(this.exitOnKill);
      },
      stdout: stdout.stream,
      stderr: stderr.stream,
      resolveExit: finish,
      writeStdout: stdout.write,
      writeStderr: stderr.write,
      killCalls,
    };

    this.spawnedProcesses.push(handle);
    return handle;
  }

  isAlive(pid: number): boolean {
    return this.alivePids.has(pid);
  }

  /** Make the next spawn() call throw */
  failNextSpawn(): void {
    this.shouldFailSpawn = true;
  }

  /** Get the last spawned process */
  get lastProcess(): MockProcessHandle | undefined {
    return this.spawnedProcesses[this.spawnedProcesses.length - 1];
  }
}
