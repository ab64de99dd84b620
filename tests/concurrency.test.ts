import { describe, expect, it } from "vitest";
import { chunkArray, mapWithConcurrency } from "../src/utils/concurrency.js";

describe("mapWithConcurrency", () => {
  it("keeps input order and never exceeds the limit", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await mapWithConcurrency([30, 10, 20, 5, 15], 2, async (delay, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight -= 1;
      return `${index}:${delay}`;
    });

    expect(results).toEqual(["0:30", "1:10", "2:20", "3:5", "4:15"]);
    expect(peak).toBe(2);
  });

  it("returns an empty array without calling the worker", async () => {
    let calls = 0;
    const results = await mapWithConcurrency([], 4, async () => {
      calls += 1;
    });
    expect(results).toEqual([]);
    expect(calls).toBe(0);
  });

  it("rejects when a worker rejects", async () => {
    await expect(
      mapWithConcurrency([1, 2, 3], 3, async (value) => {
        if (value === 2) {
          throw new Error("boom");
        }
        return value;
      }),
    ).rejects.toThrow("boom");
  });
});

describe("chunkArray", () => {
  it("splits into batches of the given size", () => {
    expect(chunkArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(chunkArray([], 3)).toEqual([]);
    expect(chunkArray([1, 2], 0)).toEqual([[1], [2]]);
  });
});
