import { describe, expect, it } from "vitest";
import { ConcurrencyLimiter, processWithConcurrency } from "../concurrency";
import { sleep } from "../retry";

describe("ConcurrencyLimiter", () => {
  it("never runs more tasks than its limit", async () => {
    const limiter = new ConcurrencyLimiter(2);
    let active = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, (_, index) =>
        limiter.run(async () => {
          active += 1;
          peak = Math.max(peak, active);
          await sleep(5 + index);
          active -= 1;
        }),
      ),
    );

    expect(peak).toBe(2);
    expect(limiter.activeCount).toBe(0);
    expect(limiter.pendingCount).toBe(0);
  });

  it("releases its slot when a task throws", async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(limiter.run(async () => "next")).resolves.toBe("next");
  });

  it("runs tasks in order with a limit of one", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: number[] = [];
    await Promise.all(
      [30, 10, 0].map((delay, index) =>
        limiter.run(async () => {
          await sleep(delay);
          order.push(index);
        }),
      ),
    );
    expect(order).toEqual([0, 1, 2]);
  });
});

describe("processWithConcurrency", () => {
  it("visits every item", async () => {
    const seen: number[] = [];
    await processWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      seen.push(item);
    });
    expect(seen.sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it("stops taking items once the signal aborts", async () => {
    const controller = new AbortController();
    const seen: number[] = [];
    await processWithConcurrency(
      [1, 2, 3, 4],
      1,
      async (item) => {
        seen.push(item);
        if (item === 2) {
          controller.abort();
        }
      },
      controller.signal,
    );
    expect(seen).toEqual([1, 2]);
  });
});
