import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { RingBuffer } from "../../src/buffer/RingBuffer";
import { ChannelBuffers } from "../../src/buffer/ChannelBuffers";
import { makeBatch } from "../_harness/signals";

describe("RingBuffer", () => {
  it("grows until full, then keeps the newest samples", () => {
    const buffer = new RingBuffer(4);

    buffer.push([1, 2]);
    expect(Array.from(buffer.toArray())).toEqual([1, 2]);
    expect(buffer.full).toBe(false);

    buffer.push([3, 4, 5]);
    expect(Array.from(buffer.toArray())).toEqual([2, 3, 4, 5]);
    expect(buffer.length).toBe(4);
    expect(buffer.full).toBe(true);
  });

  it("keeps only the tail of a batch longer than the capacity", () => {
    const buffer = new RingBuffer(3);
    buffer.push([1]);
    buffer.push([10, 11, 12, 13, 14]);
    expect(Array.from(buffer.toArray())).toEqual([12, 13, 14]);
  });

  it("returns the newest n samples from tail()", () => {
    const buffer = new RingBuffer(5);
    buffer.push([1, 2, 3, 4, 5, 6, 7]);
    expect(Array.from(buffer.tail(2))).toEqual([6, 7]);
    expect(Array.from(buffer.tail(10))).toEqual([3, 4, 5, 6, 7]);
    expect(buffer.tail(0).length).toBe(0);
  });

  it("ignores empty batches", () => {
    const buffer = new RingBuffer(3);
    buffer.push([1, 2]);
    buffer.push([]);
    expect(Array.from(buffer.toArray())).toEqual([1, 2]);
  });

  it("clears to empty", () => {
    const buffer = new RingBuffer(3);
    buffer.push([1, 2, 3]);
    buffer.clear();
    expect(buffer.length).toBe(0);
    buffer.push([9]);
    expect(Array.from(buffer.toArray())).toEqual([9]);
  });

  it("rejects a non-positive capacity", () => {
    expect(() => new RingBuffer(0)).toThrow(/positive integer/);
    expect(() => new RingBuffer(2.5)).toThrow(/positive integer/);
  });

  it("always equals the tail of everything fed, in order", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 32 }),
        fc.array(fc.array(fc.integer({ min: -1000, max: 1000 }), { maxLength: 40 }), {
          maxLength: 20,
        }),
        (capacity, batches) => {
          const buffer = new RingBuffer(capacity);
          const fed: number[] = [];
          for (const batch of batches) {
            buffer.push(batch);
            fed.push(...batch);
            expect(Array.from(buffer.toArray())).toEqual(fed.slice(-capacity));
          }
        }
      )
    );
  });
});

describe("ChannelBuffers", () => {
  it("buffers only the selected channels", () => {
    const buffers = new ChannelBuffers(["Fp1", "Fp2"], 3);
    const appended = buffers.append(
      makeBatch({ Fp1: [1, 2], Fp2: [3, 4], O1: [5, 6] })
    );

    expect(appended).toBe(2);
    expect(buffers.windows().map((w) => Array.from(w))).toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(buffers.get("O1")).toBeUndefined();
  });

  it("leaves a channel untouched when a batch omits it", () => {
    const buffers = new ChannelBuffers(["Fp1", "Fp2"], 4);
    buffers.append(makeBatch({ Fp1: [1], Fp2: [2] }));
    buffers.append(makeBatch({ Fp2: [3] }));

    expect(Array.from(buffers.get("Fp1")?.toArray() ?? [])).toEqual([1]);
    expect(Array.from(buffers.get("Fp2")?.toArray() ?? [])).toEqual([2, 3]);
  });
});
