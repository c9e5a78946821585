import { describe, expect, it } from "vitest";

import { delay } from "../pipeline/__tests__/fakes.js";

import { WorkerPool } from "./worker-pool.js";

describe("WorkerPool", () => {
  it("never runs more than maxWorkers jobs at once", async () => {
    const pool = new WorkerPool(2);
    let active = 0;
    let peak = 0;

    const job = (ms: number) => async () => {
      active += 1;
      peak = Math.max(peak, active);
      await delay(ms);
      active -= 1;
      return ms;
    };

    const results = await Promise.all([5, 1, 3, 2, 4].map((ms) => pool.submit(job(ms))));

    expect(results).toEqual([5, 1, 3, 2, 4]);
    expect(peak).toBe(2);
    expect(pool.running).toBe(0);
    expect(pool.pending).toBe(0);
  });

  it("starts queued jobs in submission order", async () => {
    const pool = new WorkerPool(1);
    const started: string[] = [];

    await Promise.all(
      ["a", "b", "c"].map((name) =>
        pool.submit(async () => {
          started.push(name);
          await delay(1);
        }),
      ),
    );

    expect(started).toEqual(["a", "b", "c"]);
  });

  it("keeps draining after a job rejects", async () => {
    const pool = new WorkerPool(1);

    const failing = pool.submit(async () => {
      throw new Error("broken");
    });
    const next = pool.submit(async () => "ok");

    await expect(failing).rejects.toThrow("broken");
    await expect(next).resolves.toBe("ok");
  });

  it("rejects a non-positive worker count", () => {
    expect(() => new WorkerPool(0)).toThrow(RangeError);
    expect(() => new WorkerPool(1.5)).toThrow("maxWorkers must be a positive integer (received 1.5).");
  });
});
