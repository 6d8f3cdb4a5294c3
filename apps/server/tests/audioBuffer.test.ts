import { describe, expect, it } from "vitest";
import { AudioBuffer } from "../src/session/audioBuffer.js";

describe("AudioBuffer", () => {
  it("appends in order and snapshots a copy", () => {
    const buf = new AudioBuffer();
    buf.append(Uint8Array.from([1, 2]));
    buf.append(new Uint8Array(0));
    buf.append(Uint8Array.from([3]));

    const snap = buf.snapshot();
    buf.append(Uint8Array.from([4]));

    expect(Array.from(snap)).toEqual([1, 2, 3]);
    expect(buf.length).toBe(4);
  });

  it("drains a prefix and keeps what arrived after it", () => {
    const buf = new AudioBuffer();
    buf.append(Uint8Array.from([1, 2, 3, 4, 5]));
    buf.drain(3);

    expect(buf.length).toBe(2);
    expect(Array.from(buf.snapshot())).toEqual([4, 5]);

    buf.drain(10);
    expect(buf.length).toBe(0);
  });

  it("drainAll returns everything and empties the buffer", () => {
    const buf = new AudioBuffer();
    buf.append(Uint8Array.from([9, 8]));

    expect(Array.from(buf.drainAll())).toEqual([9, 8]);
    expect(buf.length).toBe(0);
    expect(buf.snapshot().length).toBe(0);
  });

  it("grows past its initial capacity without losing bytes", () => {
    const buf = new AudioBuffer();
    const big = new Uint8Array(100_000).map((_, i) => i % 251);
    buf.append(big.subarray(0, 70_000));
    buf.append(big.subarray(70_000));

    const snap = buf.snapshot();
    expect(snap.length).toBe(100_000);
    expect(snap[69_999]).toBe(69_999 % 251);
    expect(snap[99_999]).toBe(99_999 % 251);
  });
});
