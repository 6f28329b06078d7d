import { describe, it, expect } from "vitest";
import { MetricsCollector, p95 } from "./metrics.js";

describe("metrics", () => {
  it("p95 should use the nearest rank", () => {
    expect(p95([])).toBe(0);
    expect(p95([7])).toBe(7);
    expect(p95(Array.from({ length: 20 }, (_, i) => 20 - i))).toBe(19);
  });

  it("should count replay outcomes", () => {
    const metrics = new MetricsCollector();

    metrics.recordReplay(3, 1);
    metrics.recordReplay(2, 0);

    expect(metrics.snapshot()).toMatchObject({ crumbsReplayed: 5, crumbsDiscarded: 1 });
  });

  it("should keep only the latest 100 save timings", () => {
    const metrics = new MetricsCollector();

    for (let ms = 1; ms <= 105; ms++) {
      metrics.recordSave(ms);
    }

    const { saves, saveTimeMs } = metrics.snapshot();
    expect(saves).toBe(105);
    expect(saveTimeMs).toHaveLength(100);
    expect(saveTimeMs[0]).toBe(6);
  });

  it("snapshot should be a copy", () => {
    const metrics = new MetricsCollector();
    metrics.recordLoad(4);

    metrics.snapshot().loadTimeMs.push(99);

    expect(metrics.snapshot().loadTimeMs).toEqual([4]);
  });
});
