import { describe, expect, it } from "vitest";

import { Mutex } from "../mutex.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("Mutex", () => {
  it("serializes tasks in call order", async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    const first = mutex.runExclusive(async () => {
      await delay(30);
      order.push(1);
      return 1;
    });
    // Faster, but queued later
    const second = mutex.runExclusive(async () => {
      await delay(5);
      order.push(2);
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual([1, 2]);
  });

  it("continues after a task fails", async () => {
    const mutex = new Mutex();
    const order: number[] = [];

    const failing = mutex.runExclusive(async () => {
      throw new Error("fail");
    });
    const next = mutex.runExclusive(async () => {
      order.push(2);
      return 2;
    });

    await expect(failing).rejects.toThrow("fail");
    expect(await next).toBe(2);
    expect(order).toEqual([2]);
  });

  it("never runs two tasks at once", async () => {
    const mutex = new Mutex();
    let running = 0;
    let peak = 0;

    await Promise.all(
      [3, 1, 2].map((ms) =>
        mutex.runExclusive(async () => {
          running++;
          peak = Math.max(peak, running);
          await delay(ms);
          running--;
        }),
      ),
    );

    expect(peak).toBe(1);
  });
});
