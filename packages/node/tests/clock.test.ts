/**
 * Tests for IntervalClock.
 */

import { describe, it, expect } from "vitest";
import { IntervalClock } from "../src/clock.js";

function clockAt(times: number[]): IntervalClock {
  let i = 0;
  return new IntervalClock({
    genesis: 1_000,
    blockTimeMs: 100,
    now: () => times[Math.min(i++, times.length - 1)] ?? 0,
  });
}

describe("IntervalClock", () => {
  it("counts whole blocks since genesis", () => {
    const clock = clockAt([1_000, 1_099, 1_100, 1_350]);

    expect(clock.blockNumber()).toBe(0);
    expect(clock.blockNumber()).toBe(0);
    expect(clock.blockNumber()).toBe(1);
    expect(clock.blockNumber()).toBe(3);
  });

  it("reads block 0 before genesis", () => {
    expect(clockAt([0]).blockNumber()).toBe(0);
  });

  it("never reports a lower height when wall time steps back", () => {
    const clock = clockAt([1_500, 1_200]);

    expect(clock.blockNumber()).toBe(5);
    expect(clock.blockNumber()).toBe(5);
  });

  it("rejects a non-positive block time", () => {
    expect(() => new IntervalClock({ genesis: 0, blockTimeMs: 0 })).toThrow(
      "blockTimeMs must be a positive integer, got 0",
    );
  });
});
