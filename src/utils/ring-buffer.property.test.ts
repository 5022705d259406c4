import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { RingBuffer } from "./ring-buffer.js";

describe("RingBuffer property tests", () => {
  it("always holds the newest min(n, capacity) items in order", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 25 }), fc.array(fc.integer()), (capacity, items) => {
        const buf = new RingBuffer<number>(capacity);
        for (const item of items) buf.push(item);
        expect(buf.toArray()).toEqual(items.slice(Math.max(0, items.length - capacity)));
        expect(buf.size).toBe(Math.min(items.length, capacity));
      }),
    );
  });

  it("evicts exactly the items that fall out of the window", () => {
    fc.assert(
      fc.property(fc.integer({ min: 1, max: 10 }), fc.array(fc.integer()), (capacity, items) => {
        const buf = new RingBuffer<number>(capacity);
        const evicted: number[] = [];
        for (const item of items) {
          const out = buf.push(item);
          if (out !== undefined) evicted.push(out);
        }
        expect(evicted).toEqual(items.slice(0, Math.max(0, items.length - capacity)));
      }),
    );
  });
});
