import { describe, expect, it } from "vitest";
import { Semaphore } from "../semaphore";

describe("Semaphore", () => {
  it("rejects a non-positive permit count", () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it("hands out permits until none are left", async () => {
    const semaphore = new Semaphore(2);
    await semaphore.acquire();
    await semaphore.acquire();
    expect(semaphore.availablePermits).toBe(0);

    let third = false;
    const waiting = semaphore.acquire().then(() => {
      third = true;
    });
    await Promise.resolve();
    expect(third).toBe(false);
    expect(semaphore.pendingCount).toBe(1);

    semaphore.release();
    await waiting;
    expect(third).toBe(true);
    expect(semaphore.availablePermits).toBe(0);
  });

  it("serves waiters in arrival order", async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const order: string[] = [];
    const a = semaphore.acquire().then(() => order.push("a"));
    const b = semaphore.acquire().then(() => order.push("b"));

    semaphore.release();
    await a;
    semaphore.release();
    await b;

    expect(order).toEqual(["a", "b"]);
  });

  it("drops an aborted waiter without consuming a permit", async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const controller = new AbortController();
    const aborted = semaphore.acquire(controller.signal);

    controller.abort();
    await expect(aborted).rejects.toMatchObject({ name: "AbortError" });
    expect(semaphore.pendingCount).toBe(0);

    semaphore.release();
    expect(semaphore.availablePermits).toBe(1);
  });

  it("releases the permit when the guarded task throws", async () => {
    const semaphore = new Semaphore(1);
    await expect(
      semaphore.withPermit(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(semaphore.availablePermits).toBe(1);
  });

  it("refuses to release more than it handed out", () => {
    expect(() => new Semaphore(1).release()).toThrow(
      "Semaphore released more times than acquired"
    );
  });
});
