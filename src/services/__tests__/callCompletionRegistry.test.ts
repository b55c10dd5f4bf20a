import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CallCompletionRegistryClass } from "../callCompletionRegistry";
import type { CallCompletionEvent } from "../../types/gateway";

const event = (correlationId: string | undefined): CallCompletionEvent => ({
  callId: "call-1",
  correlationId,
  transcript: "Yes, I'll be there.",
  durationSeconds: 30,
  status: "completed",
  completed: true,
});

describe("CallCompletionRegistry", () => {
  let registry: CallCompletionRegistryClass;

  beforeEach(() => {
    vi.useFakeTimers();
    registry = new CallCompletionRegistryClass(60_000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("hands the webhook to the attempt waiting on its correlation id", async () => {
    const waiting = registry.waitFor("corr-1", 10_000);

    expect(registry.resolve(event("corr-1"))).toBe(true);
    await expect(waiting).resolves.toMatchObject({ callId: "call-1", correlationId: "corr-1" });
    expect(registry.getStats()).toEqual({ waiting: 0, buffered: 0 });
  });

  it("resolves null when no webhook arrives in time", async () => {
    const waiting = registry.waitFor("corr-1", 10_000);

    await vi.advanceTimersByTimeAsync(10_000);

    await expect(waiting).resolves.toBeNull();
    expect(registry.resolve(event("corr-1"))).toBe(false);
  });

  it("keeps a webhook that arrives before anyone waits", async () => {
    expect(registry.resolve(event("corr-2"))).toBe(false);
    expect(registry.getStats().buffered).toBe(1);

    await expect(registry.waitFor("corr-2", 10_000)).resolves.toMatchObject({
      correlationId: "corr-2",
    });
    expect(registry.getStats().buffered).toBe(0);
  });

  it("ignores webhooks without a correlation id", () => {
    expect(registry.resolve(event(undefined))).toBe(false);
    expect(registry.getStats()).toEqual({ waiting: 0, buffered: 0 });
  });

  it("stops waiting when the campaign is stopped", async () => {
    const controller = new AbortController();
    const waiting = registry.waitFor("corr-3", 10_000, controller.signal);

    controller.abort();

    await expect(waiting).resolves.toBeNull();
    expect(registry.getStats().waiting).toBe(0);
  });

  it("drops buffered webhooks older than the retention window", () => {
    registry.resolve(event("old"));
    vi.advanceTimersByTime(60_001);
    registry.resolve(event("new"));

    expect(registry.getStats().buffered).toBe(1);
  });
});
