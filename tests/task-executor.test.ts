import { describe, expect, it, vi } from "vitest";
import { ConcurrentTaskExecutor } from "../src/application/task-executor.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("ConcurrentTaskExecutor", () => {
  it("caps the number of tasks running at once", async () => {
    const executor = new ConcurrentTaskExecutor({ concurrency: 2 });
    const gates = Array.from({ length: 5 }, () => deferred());
    let running = 0;
    let peak = 0;

    for (const gate of gates) {
      executor.submit(async () => {
        running += 1;
        peak = Math.max(peak, running);
        await gate.promise;
        running -= 1;
      });
    }

    await vi.waitFor(() => {
      expect(running).toBe(2);
    });
    for (const gate of gates) {
      gate.resolve();
    }
    await executor.onIdle();

    expect(peak).toBe(2);
    expect(executor.pendingCount).toBe(0);
  });

  it("runs every task at once when unbounded", async () => {
    const executor = new ConcurrentTaskExecutor({ concurrency: 0 });
    const gate = deferred();
    let running = 0;

    for (let index = 0; index < 20; index += 1) {
      executor.submit(async () => {
        running += 1;
        await gate.promise;
      });
    }

    await vi.waitFor(() => {
      expect(running).toBe(20);
    });
    gate.resolve();
    await executor.onIdle();
  });

  it("reports task failures without rejecting onIdle", async () => {
    const onTaskError = vi.fn();
    const executor = new ConcurrentTaskExecutor({ concurrency: 1, onTaskError });
    const failure = new Error("task blew up");

    executor.submit(async () => {
      throw failure;
    });
    executor.submit(async () => undefined);
    await executor.onIdle();

    expect(onTaskError).toHaveBeenCalledTimes(1);
    expect(onTaskError).toHaveBeenCalledWith(failure);
  });

  it("reports whether tasks settled within a bounded drain", async () => {
    const executor = new ConcurrentTaskExecutor({ concurrency: 0 });
    const gate = deferred();
    executor.submit(() => gate.promise);

    expect(await executor.drain(20)).toBe(false);
    expect(executor.pendingCount).toBe(1);

    gate.resolve();
    expect(await executor.drain(1000)).toBe(true);
    expect(executor.pendingCount).toBe(0);
  });
});
