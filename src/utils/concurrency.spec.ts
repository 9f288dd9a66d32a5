import { describe, it, expect } from "vitest";
import { pooledMap } from "./concurrency.js";

describe("pooledMap", () => {
  it("returns results in input order", async () => {
    const delays = [30, 5, 15, 0];
    const results = await pooledMap(
      delays,
      async (ms, i) => {
        await new Promise((r) => setTimeout(r, ms));
        return i * 10;
      },
      { concurrency: 2 }
    );
    expect(results).toEqual([0, 10, 20, 30]);
  });

  it("never runs more than `concurrency` tasks at once", async () => {
    let active = 0;
    let peak = 0;
    await pooledMap(
      [1, 2, 3, 4, 5, 6],
      async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((r) => setTimeout(r, 5));
        active--;
      },
      { concurrency: 3 }
    );
    expect(peak).toBe(3);
  });

  it("reports progress for every completed task", async () => {
    const progress: string[] = [];
    await pooledMap(["a", "b"], async (x) => x, {
      concurrency: 1,
      onProgress: (done, total) => progress.push(`${done}/${total}`),
    });
    expect(progress).toEqual(["1/2", "2/2"]);
  });

  it("handles an empty input", async () => {
    expect(await pooledMap([], async () => 1, { concurrency: 4 })).toEqual([]);
  });

  it("stops scheduling new tasks once the signal aborts", async () => {
    const controller = new AbortController();
    const started: number[] = [];

    await expect(
      pooledMap(
        [1, 2, 3],
        async (n) => {
          started.push(n);
          if (n === 1) controller.abort(new Error("interrupted"));
          return n;
        },
        { concurrency: 1, signal: controller.signal }
      )
    ).rejects.toThrow("interrupted");
    expect(started).toEqual([1]);
  });

  it("stops after a task fails and rethrows its error", async () => {
    const started: number[] = [];

    await expect(
      pooledMap(
        [1, 2, 3],
        async (n) => {
          started.push(n);
          if (n === 2) throw new Error("store gone");
          return n;
        },
        { concurrency: 1 }
      )
    ).rejects.toThrow("store gone");
    expect(started).toEqual([1, 2]);
  });
});
