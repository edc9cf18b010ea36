import { describe, expect, it } from "vitest";
import { EventChannel } from "./channel.js";

async function drain<T>(channel: EventChannel<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of channel) out.push(item);
  return out;
}

describe("EventChannel", () => {
  it("drops items offered while full", () => {
    const channel = new EventChannel<number>(2);

    expect(channel.offer(1)).toBe(true);
    expect(channel.offer(2)).toBe(true);
    expect(channel.offer(3)).toBe(false);
    expect(channel.size).toBe(2);
    expect(channel.dropped).toBe(1);
  });

  it("hands an item straight to a waiting reader", async () => {
    const channel = new EventChannel<string>(1);
    const pending = channel.next();

    expect(channel.offer("a")).toBe(true);
    await expect(pending).resolves.toEqual({ value: "a", done: false });
    expect(channel.size).toBe(0);
  });

  it("lets queued items drain after close, then ends", async () => {
    const channel = new EventChannel<number>(4);
    channel.offer(1);
    channel.offer(2);
    channel.close();

    expect(channel.offer(3)).toBe(false);
    expect(channel.dropped).toBe(1);
    await expect(drain(channel)).resolves.toEqual([1, 2]);
  });

  it("ends a pending reader on close", async () => {
    const channel = new EventChannel<number>(1);
    const pending = channel.next();
    channel.close();

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
  });

  it("close is idempotent", () => {
    const channel = new EventChannel<number>(1);
    channel.close();
    channel.close();

    expect(channel.isClosed).toBe(true);
  });

  it("rejects a second concurrent reader", async () => {
    const channel = new EventChannel<number>(1);
    const first = channel.next();

    await expect(channel.next()).rejects.toThrow("channel already has a pending reader");

    channel.offer(7);
    await expect(first).resolves.toEqual({ value: 7, done: false });
  });

  it("closes when the consumer breaks out of iteration", async () => {
    const channel = new EventChannel<number>(4);
    channel.offer(1);
    channel.offer(2);

    for await (const item of channel) {
      expect(item).toBe(1);
      break;
    }

    expect(channel.isClosed).toBe(true);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new EventChannel(0)).toThrow(RangeError);
  });
});
