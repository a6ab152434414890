import { describe, it, expect, vi } from "vitest";
import { stripAnsi } from "../../utils/ansi.ts";
import { cooperativeBackend, resolveConcurrencyBackend } from "./concurrency.ts";

describe("cooperativeBackend", () => {
  it("starts the requested number of workers with distinct ids", async () => {
    const started: number[] = [];

    await cooperativeBackend
      .spawn(5, async (workerId) => {
        started.push(workerId);
      })
      .join();

    expect(started.sort()).toEqual([0, 1, 2, 3, 4]);
  });

  it("runs workers concurrently", async () => {
    let running = 0;
    let maxRunning = 0;

    await cooperativeBackend
      .spawn(3, async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await new Promise((resolve) => setTimeout(resolve, 5));
        running--;
      })
      .join();

    expect(maxRunning).toBe(3);
  });

  it("waits for every worker before rejecting with the first worker error", async () => {
    const finished: number[] = [];

    const handle = cooperativeBackend.spawn(3, async (workerId) => {
      if (workerId === 0) {
        throw new Error("worker 0 crashed");
      }
      await new Promise((resolve) => setTimeout(resolve, 5));
      finished.push(workerId);
    });

    await expect(handle.join()).rejects.toThrow("worker 0 crashed");
    expect(finished.sort()).toEqual([1, 2]);
  });
});

describe("resolveConcurrencyBackend", () => {
  it("returns the cooperative backend by default", () => {
    expect(resolveConcurrencyBackend().name).toBe("cooperative");
    expect(resolveConcurrencyBackend({ useMultiprocessing: false })).toBe(cooperativeBackend);
  });

  it("warns and falls back to cooperative workers for OS-process workers", () => {
    const warnings: string[] = [];
    vi.spyOn(console, "warn").mockImplementation((message: unknown) => {
      warnings.push(stripAnsi(String(message)));
    });

    expect(resolveConcurrencyBackend({ useMultiprocessing: true })).toBe(cooperativeBackend);
    expect(warnings).toEqual(["Warning: --use-multiprocessing is not supported; using cooperative workers."]);
    vi.restoreAllMocks();
  });
});
