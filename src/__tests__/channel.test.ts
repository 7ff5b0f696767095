import { describe, it, expect } from "vitest";
import { StatusChannel, TaskQueue } from "../channel.js";

describe("TaskQueue", () => {
  it("hands items out in push order", async () => {
    const queue = new TaskQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.push(3);

    expect(await queue.pull(10)).toBe(1);
    expect(await queue.pull(10)).toBe(2);
    expect(await queue.pull(10)).toBe(3);
    expect(queue.size).toBe(0);
  });

  it("delivers an item pushed while a pull is waiting", async () => {
    const queue = new TaskQueue<string>();
    const pending = queue.pull(1000);
    queue.push("late");

    expect(await pending).toBe("late");
    expect(queue.size).toBe(0);
  });

  it("resolves undefined when the wait runs out", async () => {
    const queue = new TaskQueue<string>();
    expect(await queue.pull(10)).toBeUndefined();

    // the expired pull must not swallow the next item
    queue.push("next");
    expect(queue.size).toBe(1);
    expect(await queue.pull(10)).toBe("next");
  });

  it("clear drops queued items and reports how many", () => {
    const queue = new TaskQueue<number>();
    queue.push(1);
    queue.push(2);

    expect(queue.clear()).toBe(2);
    expect(queue.size).toBe(0);
  });

  it("release wakes waiting pulls", async () => {
    const queue = new TaskQueue<number>();
    const pending = queue.pull(60_000);
    queue.release();

    expect(await pending).toBeUndefined();
  });
});

describe("StatusChannel", () => {
  it("drains everything pending in order", () => {
    const channel = new StatusChannel<string>();
    channel.push("a");
    channel.push("b");

    expect(channel.pending).toBe(2);
    expect(channel.drain()).toEqual(["a", "b"]);
    expect(channel.pending).toBe(0);
    expect(channel.drain()).toEqual([]);
  });
});
