import { describe, it, expect } from "vitest";
import { runPool } from "../src/utils/worker-pool.ts";

describe("runPool", () => {
  it("returns results keyed by item index", async () => {
    const results = await runPool([3, 1, 2], 2, async (n) => n * 10);
    expect([...results.entries()].sort((a, b) => a[0] - b[0])).toEqual([
      [0, 30],
      [1, 10],
      [2, 20],
    ]);
  });

  it("never runs more than the concurrency limit at once", async () => {
    let active = 0;
    let peak = 0;
    await runPool([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      active--;
    });
    expect(peak).toBe(2);
  });

  it("starts no new items once asked to stop", async () => {
    const started: number[] = [];
    const results = await runPool(
      [0, 1, 2, 3],
      1,
      async (n) => {
        started.push(n);
        return n;
      },
      () => started.length >= 2
    );
    expect(started).toEqual([0, 1]);
    expect(results.size).toBe(2);
  });
});
