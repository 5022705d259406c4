import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";
import { registerSignalHandlers } from "./signal-handler.js";

describe("registerSignalHandlers", () => {
  let registeredHandlers: Map<string, (signal: string) => void>;
  let exitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.useFakeTimers();
    registeredHandlers = new Map();

    vi.spyOn(process, "on").mockImplementation((event: string | symbol, handler: any) => {
      registeredHandlers.set(String(event), handler);
      return process;
    });
    vi.spyOn(process, "off").mockImplementation((event: string | symbol) => {
      registeredHandlers.delete(String(event));
      return process;
    });

    exitSpy = vi.spyOn(process, "exit").mockImplementation((() => {}) as any);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("registers SIGTERM and SIGINT handlers", () => {
    registerSignalHandlers(vi.fn().mockResolvedValue(undefined));

    expect(registeredHandlers.has("SIGTERM")).toBe(true);
    expect(registeredHandlers.has("SIGINT")).toBe(true);
  });

  it("exits 0 after cleanup resolves", async () => {
    const cleanup = vi.fn().mockResolvedValue(undefined);
    registerSignalHandlers(cleanup);

    registeredHandlers.get("SIGTERM")?.("SIGTERM");
    await vi.advanceTimersByTimeAsync(0);

    expect(cleanup).toHaveBeenCalledOnce();
    expect(exitSpy).toHaveBeenCalledWith(0);
  });

  it("exits 1 when cleanup rejects", async () => {
    registerSignalHandlers(vi.fn().mockRejectedValue(new Error("cleanup failed")));

    registeredHandlers.get("SIGINT")?.("SIGINT");
    await vi.advanceTimersByTimeAsync(0);

    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("force-exits with 1 when cleanup stalls", async () => {
    registerSignalHandlers(vi.fn().mockReturnValue(new Promise(() => {})), { timeoutMs: 5000 });

    registeredHandlers.get("SIGTERM")?.("SIGTERM");
    await vi.advanceTimersByTimeAsync(5000);

    expect(exitSpy).toHaveBeenCalledWith(1);
  });

  it("ignores a second signal", async () => {
    const cleanup = vi.fn().mockReturnValue(new Promise(() => {}));
    registerSignalHandlers(cleanup);

    registeredHandlers.get("SIGTERM")?.("SIGTERM");
    registeredHandlers.get("SIGINT")?.("SIGINT");
    await vi.advanceTimersByTimeAsync(0);

    expect(cleanup).toHaveBeenCalledOnce();
  });

  it("unregisters both handlers", () => {
    const unregister = registerSignalHandlers(vi.fn().mockResolvedValue(undefined));
    unregister();
    expect(registeredHandlers.size).toBe(0);
  });
});
