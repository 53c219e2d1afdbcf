import { describe, expect, it } from "vitest";

import { ConnectionError, TimeoutError } from "./errors.ts";
import { WaitQueue } from "./wait_queue.ts";

describe("WaitQueue", () => {
  it("hands out buffered items in push order", async () => {
    const queue = new WaitQueue<number>("event");
    queue.push(1);
    queue.push(2);
    expect(queue.size).toBe(2);
    expect(await queue.shift()).toBe(1);
    expect(await queue.shift()).toBe(2);
  });

  it("delivers to the oldest waiter first", async () => {
    const queue = new WaitQueue<string>("receive");
    const first = queue.shift();
    const second = queue.shift();
    expect(queue.pending).toBe(2);

    queue.push("a");
    queue.push("b");
    expect(await first).toBe("a");
    expect(await second).toBe("b");
  });

  it("rejects an expired wait and keeps later items for the next one", async () => {
    const queue = new WaitQueue<string>("receive");
    const expired = queue.shift(10);
    await expect(expired).rejects.toBeInstanceOf(TimeoutError);
    await expect(expired).rejects.toMatchObject({ operation: "receive", timeoutMs: 10 });
    expect(queue.pending).toBe(0);

    queue.push("late");
    expect(await queue.shift(10)).toBe("late");
  });

  it("fails waiters on close and still drains buffered items", async () => {
    const queue = new WaitQueue<string>("event");
    const waiting = expect(queue.shift()).rejects.toBeInstanceOf(ConnectionError);
    queue.close(ConnectionError.closed());
    await waiting;

    const drained = new WaitQueue<string>("event");
    drained.push("kept");
    drained.close(ConnectionError.closed());
    expect(drained.push("dropped")).toBe(false);
    expect(await drained.shift()).toBe("kept");
    await expect(drained.shift()).rejects.toMatchObject({ kind: "closed" });
  });

  it("ignores a second close", async () => {
    const queue = new WaitQueue<string>("event");
    queue.close(ConnectionError.closed("first"));
    queue.close(ConnectionError.closed("second"));
    await expect(queue.shift()).rejects.toThrow("first");
  });
});
