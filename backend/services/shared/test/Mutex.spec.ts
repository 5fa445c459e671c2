// backend/services/shared/test/Mutex.spec.ts
import { describe, it, expect } from "vitest";
import { Mutex } from "@shared/utils/Mutex";

const tick = () => new Promise<void>((r) => setTimeout(r, 0));

describe("Mutex", () => {
  it("serves waiters in arrival order", async () => {
    const m = new Mutex();
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map((n) =>
        m.runExclusive(async () => {
          order.push(n);
          await tick();
          order.push(n * 10);
        })
      )
    );

    expect(order).toEqual([1, 10, 2, 20, 3, 30]);
  });

  it("releases the lock when the section throws", async () => {
    const m = new Mutex();
    await expect(
      m.runExclusive(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(m.runExclusive(async () => "next")).resolves.toBe("next");
  });

  it("ignores a second release", async () => {
    const m = new Mutex();
    const releaseFirst = await m.acquire();
    const second = m.acquire();
    const third = m.acquire();
    let thirdAcquired = false;
    void third.then(() => {
      thirdAcquired = true;
    });

    releaseFirst();
    releaseFirst();
    await second;
    await tick();

    expect(thirdAcquired).toBe(false);
  });
});
