import { describe, expect, it } from "vitest";
import { runWithConcurrency } from "./concurrency.js";

describe("runWithConcurrency", () => {
  it("never exceeds the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;

    const { settled, notStarted } = await runWithConcurrency(
      [1, 2, 3, 4, 5],
      async (value) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return value * 2;
      },
      { concurrency: 2 },
    );

    expect(peak).toBe(2);
    expect(notStarted).toEqual([]);
    const values = settled.map(({ result }) => (result.status === "fulfilled" ? result.value : 0));
    expect(values.sort((left, right) => left - right)).toEqual([2, 4, 6, 8, 10]);
  });

  it("records rejections without stopping other items", async () => {
    const { settled } = await runWithConcurrency(
      ["ok", "bad"],
      async (value) => {
        if (value === "bad") {
          throw new Error("boom");
        }
        return value;
      },
      { concurrency: 1 },
    );

    expect(settled).toEqual([
      { item: "ok", result: { status: "fulfilled", value: "ok" } },
      { item: "bad", result: { status: "rejected", reason: new Error("boom") } },
    ]);
  });

  it("stops starting items once the signal fires and returns the rest", async () => {
    const controller = new AbortController();

    const { settled, notStarted } = await runWithConcurrency(
      ["a", "b", "c"],
      async (value) => {
        controller.abort();
        return value;
      },
      { concurrency: 1, stopSignal: controller.signal },
    );

    expect(settled.map(({ item }) => item)).toEqual(["a"]);
    expect(notStarted).toEqual(["b", "c"]);
  });
});
