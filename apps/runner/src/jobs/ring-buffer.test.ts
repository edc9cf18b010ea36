import { describe, expect, it } from "vitest";
import { RingBuffer } from "./ring-buffer.js";

describe("RingBuffer", () => {
  it("returns items oldest first while below capacity", () => {
    const buffer = new RingBuffer<number>(4);
    buffer.push(1);
    buffer.push(2);

    expect(buffer.snapshot()).toEqual([1, 2]);
    expect(buffer.length).toBe(2);
  });

  it("keeps the last `capacity` items once it wraps", () => {
    const buffer = new RingBuffer<number>(3);
    for (let i = 1; i <= 5; i++) buffer.push(i);

    expect(buffer.snapshot()).toEqual([3, 4, 5]);
    expect(buffer.length).toBe(3);
  });

  it("wraps cleanly at exact multiples of capacity", () => {
    const buffer = new RingBuffer<string>(2);
    for (const item of ["a", "b", "c", "d"]) buffer.push(item);

    expect(buffer.snapshot()).toEqual(["c", "d"]);
  });

  it("returns a copy that later pushes do not change", () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    const copy = buffer.snapshot();
    buffer.push(2);

    expect(copy).toEqual([1]);
  });

  it("clear empties the buffer", () => {
    const buffer = new RingBuffer<number>(2);
    buffer.push(1);
    buffer.push(2);
    buffer.push(3);
    buffer.clear();

    expect(buffer.snapshot()).toEqual([]);
    expect(buffer.length).toBe(0);

    buffer.push(4);
    expect(buffer.snapshot()).toEqual([4]);
  });

  it.each([0, -1, 1.5])("rejects capacity %s", (capacity) => {
    expect(() => new RingBuffer(capacity)).toThrow(RangeError);
  });
});
