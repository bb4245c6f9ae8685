import { describe, test, expect } from "vitest";
import { Semaphore } from "../src/crawler/semaphore";

describe("Semaphore", () => {
  test("rejects capacities that are not positive integers", () => {
    expect(() => new Semaphore(0)).toThrow("Semaphore capacity must be a positive integer, got 0");
    expect(() => new Semaphore(1.5)).toThrow();
  });

  test("queues acquirers beyond capacity", async () => {
    const gate = new Semaphore(2);
    await gate.acquire();
    await gate.acquire();

    let third = false;
    const waiting = gate.acquire().then(() => {
      third = true;
    });

    await Promise.resolve();
    expect(gate.active).toBe(2);
    expect(gate.pending).toBe(1);
    expect(third).toBe(false);

    gate.release();
    await waiting;

    expect(third).toBe(true);
    expect(gate.active).toBe(2);
    expect(gate.pending).toBe(0);
  });

  test("releases the slot when a task throws", async () => {
    const gate = new Semaphore(1);

    await expect(gate.run(async () => {
      throw new Error("boom");
    })).rejects.toThrow("boom");

    expect(gate.active).toBe(0);
    expect(await gate.run(async () => "next")).toBe("next");
  });

  test("serves waiters in arrival order", async () => {
    const gate = new Semaphore(1);
    const order: number[] = [];

    await Promise.all(
      [1, 2, 3].map(n =>
        gate.run(async () => {
          order.push(n);
          await new Promise(resolve => setTimeout(resolve, 5));
        })
      )
    );

    expect(order).toEqual([1, 2, 3]);
    expect(gate.active).toBe(0);
  });
});
