import { describe, expect, it } from "vitest";
import { CallRateLimiter } from "../rateLimiter";

describe("CallRateLimiter", () => {
  it("spaces calls to the same number and counts them in its stats", async () => {
    const waits: number[] = [];
    const limiter = new CallRateLimiter(
      { enabled: true, maxCallsPerSecond: 10, sameNumberIntervalMs: 60_000 },
      async (ms) => {
        waits.push(ms);
      }
    );

    await limiter.waitForSlot("+15551230001");
    await limiter.waitForSlot("+15551230002");
    expect(waits).toEqual([]);

    await limiter.waitForSlot("+15551230001");
    expect(waits).toHaveLength(1);
    expect(waits[0]).toBeGreaterThan(59_000);

    expect(limiter.getStats()).toEqual({
      enabled: true,
      currentCallsPerSecond: 3,
      maxCallsPerSecond: 10,
      uniqueNumbersCalled: 2,
    });
  });

  it("does nothing when disabled", async () => {
    const limiter = new CallRateLimiter({ enabled: false });

    await limiter.waitForSlot("+15551230001");

    expect(limiter.getWaitTime("+15551230001")).toBe(0);
    expect(limiter.getStats()).toMatchObject({ enabled: false, uniqueNumbersCalled: 0 });
  });
});
