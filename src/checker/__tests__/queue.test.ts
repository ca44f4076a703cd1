import { describe, it, expect } from "vitest";
import { QueueClosedError } from "../errors.js";
import { AsyncQueue } from "../queue.js";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("AsyncQueue", () => {
  it("yields items in FIFO order until closed", async () => {
    const queue = new AsyncQueue<number>();
    await queue.enqueue(1);
    await queue.enqueue(2);
    await queue.enqueue(3);
    queue.close();

    const seen: number[] = [];
    for await (const n of queue) seen.push(n);
    expect(seen).toEqual([1, 2, 3]);
  });

  it("parks a consumer until an item arrives", async () => {
    const queue = new AsyncQueue<string>();
    const pending = queue.dequeue();
    await queue.enqueue("a");

    await expect(pending).resolves.toEqual({ done: false, value: "a" });
    expect(queue.size).toBe(0);
  });

  it("releases waiting consumers when closed", async () => {
    const queue = new AsyncQueue<string>();
    const first = queue.dequeue();
    const second = queue.dequeue();
    queue.close();

    await expect(first).resolves.toEqual({ done: true });
    await expect(second).resolves.toEqual({ done: true });
    expect(queue.isClosed).toBe(true);
  });

  it("drains buffered items before reporting done", async () => {
    const queue = new AsyncQueue<string>();
    await queue.enqueue("x");
    queue.close();

    await expect(queue.dequeue()).resolves.toEqual({ done: false, value: "x" });
    await expect(queue.dequeue()).resolves.toEqual({ done: true });
  });

  it("rejects enqueue after close", async () => {
    const queue = new AsyncQueue<string>();
    queue.close();
    await expect(queue.enqueue("late")).rejects.toBeInstanceOf(QueueClosedError);
  });

  it("blocks producers while a bounded queue is full", async () => {
    const queue = new AsyncQueue<number>(1);
    await queue.enqueue(1);

    let secondAccepted = false;
    const second = queue.enqueue(2).then(() => {
      secondAccepted = true;
    });
    await tick();
    expect(secondAccepted).toBe(false);
    expect(queue.size).toBe(1);

    await expect(queue.dequeue()).resolves.toEqual({ done: false, value: 1 });
    await second;
    expect(secondAccepted).toBe(true);
    await expect(queue.dequeue()).resolves.toEqual({ done: false, value: 2 });
  });

  it("hands items straight to a consumer that arrived while a producer waited", async () => {
    const queue = new AsyncQueue<number>(1);
    await queue.enqueue(1);
    const blocked = queue.enqueue(2);

    expect(await queue.dequeue()).toEqual({ done: false, value: 1 });
    await blocked;
    expect(await queue.dequeue()).toEqual({ done: false, value: 2 });

    const waiting = queue.dequeue();
    await queue.enqueue(3);
    await expect(waiting).resolves.toEqual({ done: false, value: 3 });
  });

  it("carries undefined as a regular value", async () => {
    const queue = new AsyncQueue<string | undefined>();
    await queue.enqueue(undefined);
    await expect(queue.dequeue()).resolves.toEqual({ done: false, value: undefined });
  });

  it("rejects a capacity below 1", () => {
    expect(() => new AsyncQueue(0)).toThrow(RangeError);
  });
});
