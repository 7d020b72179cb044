import { describe, expect, it } from "vitest";
import { runWithConcurrency } from "../../src/utils/concurrency.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("runWithConcurrency", () => {
  it("returns results in input order", async () => {
    const results = await runWithConcurrency(
      [30, 5, 15].map((ms, index) => async () => {
        await delay(ms);
        return index;
      }),
      3,
    );

    expect(results).toEqual([0, 1, 2]);
  });

  it("never runs more tasks than the limit", async () => {
    let running = 0;
    let peak = 0;
    const tasks = Array.from({ length: 6 }, () => async () => {
      running += 1;
      peak = Math.max(peak, running);
      await delay(5);
      running -= 1;
      return true;
    });

    await runWithConcurrency(tasks, 2);

    expect(peak).toBe(2);
  });

  it("captures failures as errors", async () => {
    const results = await runWithConcurrency<string>(
      [
        async () => "ok",
        async () => {
          throw new Error("boom");
        },
        async () => Promise.reject("plain"),
      ],
      1,
    );

    expect(results[0]).toBe("ok");
    expect(results[1]).toBeInstanceOf(Error);
    expect(results[1]).toHaveProperty("message", "boom");
    expect(results[2]).toHaveProperty("message", "plain");
  });

  it("handles an empty task list", async () => {
    await expect(runWithConcurrency([], 4)).resolves.toEqual([]);
  });
});
