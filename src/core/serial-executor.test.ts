import { describe, expect, it, vi } from "vitest";
import { SerialExecutor } from "./serial-executor.js";

function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe("SerialExecutor", () => {
  it("runs tasks strictly in order even across awaits", async () => {
    const executor = new SerialExecutor();
    const order: string[] = [];
    const gate = deferred();

    const first = executor.run(async () => {
      order.push("first:start");
      await gate.promise;
      order.push("first:end");
    });
    const second = executor.run(() => {
      order.push("second");
    });

    await Promise.resolve();
    expect(order).toEqual(["first:start"]);

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(["first:start", "first:end", "second"]);
  });

  it("returns the task result", async () => {
    const executor = new SerialExecutor();
    await expect(executor.run(() => 42)).resolves.toBe(42);
  });

  it("keeps going after a task rejects", async () => {
    const executor = new SerialExecutor();
    const failed = executor.run(() => {
      throw new Error("boom");
    });
    const next = executor.run(() => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("post logs failures instead of rejecting", async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const executor = new SerialExecutor(logger);

    executor.post("explode", () => {
      throw new Error("boom");
    });
    await executor.drain();

    expect(logger.error).toHaveBeenCalledWith(
      'Control task "explode" failed',
      expect.objectContaining({ error: expect.any(Error) }),
    );
  });

  it("drain waits for tasks queued while draining", async () => {
    const executor = new SerialExecutor();
    const seen: number[] = [];

    executor.post("outer", () => {
      seen.push(1);
      executor.post("inner", () => {
        seen.push(2);
      });
    });
    await executor.drain();

    expect(seen).toEqual([1, 2]);
    expect(executor.pending).toBe(0);
  });
});
