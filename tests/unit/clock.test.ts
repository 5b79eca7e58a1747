import { afterEach, describe, it, expect, vi } from "vitest";
import { fixedClock, logicalClock, systemClock } from "../../src/clock.js";

describe("clocks", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("systemClock returns whole seconds since the epoch", () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-01-01T00:00:00.750Z"));
    expect(systemClock()).toBe(1704067200n);
  });

  it("fixedClock always returns the same timestamp", () => {
    const clock = fixedClock(42n);
    expect([clock(), clock()]).toEqual([42n, 42n]);
  });

  it("logicalClock ticks from zero", () => {
    const clock = logicalClock();
    expect([clock(), clock(), clock()]).toEqual([0n, 1n, 2n]);
  });

  it("logicalClock ticks from a start value", () => {
    const clock = logicalClock(100n);
    expect([clock(), clock()]).toEqual([100n, 101n]);
  });
});
