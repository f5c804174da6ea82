import { describe, it, expect } from "vitest";
import { sleep } from "@service-catalog/testkit";
import { Mutex } from "./lock.js";

describe("Mutex", () => {
  it("should run critical sections one at a time", async () => {
    const mutex = new Mutex();
    let active = 0;
    let maxActive = 0;

    await Promise.all(
      Array.from({ length: 10 }, () =>
        mutex.withLock(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await sleep(1);
          active--;
        })
      )
    );

    expect(maxActive).toBe(1);
    expect(mutex.isLocked()).toBe(false);
  });

  it("should grant the lock in FIFO order", async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3, 4].map((n) =>
        mutex.withLock(async () => {
          order.push(n);
        })
      )
    );

    expect(order).toEqual([1, 2, 3, 4]);
  });

  it("should report waiting callers", async () => {
    const mutex = new Mutex();
    await mutex.acquire();

    const waiter = mutex.acquire();
    expect(mutex.pending).toBe(1);

    mutex.release();
    await waiter;
    expect(mutex.pending).toBe(0);
    expect(mutex.isLocked()).toBe(true);

    mutex.release();
    expect(mutex.isLocked()).toBe(false);
  });

  it("should release the lock when the section throws", async () => {
    const mutex = new Mutex();

    await expect(
      mutex.withLock(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.withLock(async () => "next")).resolves.toBe("next");
  });
});
