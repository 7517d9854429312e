import { describe, expect, it } from "vitest";

import { runPool, workerCount } from "../src/price/pool.js";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("workerCount", () => {
  it("never exceeds the job count and never drops below one", () => {
    expect(workerCount(0, 4)).toBe(0);
    expect(workerCount(2, 4)).toBe(2);
    expect(workerCount(10, 4)).toBe(4);
    expect(workerCount(3, 0)).toBe(1);
  });
});

describe("runPool", () => {
  it("caps the number of handlers in flight", async () => {
    let active = 0;
    let peak = 0;
    const items = Array.from({ length: 10 }, (_, i) => i);

    await runPool(items, 3, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await sleep(5);
      active -= 1;
    });

    expect(peak).toBe(3);
    expect(active).toBe(0);
  });

  it("keeps results in input order", async () => {
    const results = await runPool([30, 10, 20], 3, async (ms) => {
      await sleep(ms);
      return ms * 2;
    });
    expect(results).toEqual([60, 20, 40]);
  });

  it("returns an empty list for no items", async () => {
    await expect(runPool([], 4, async () => 1)).resolves.toEqual([]);
  });
});
