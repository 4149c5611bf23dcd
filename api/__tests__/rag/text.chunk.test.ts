import { describe, expect, it } from "vitest";

import { chunk, chunkText, reassemble } from "../../../src/server/rag/text/chunk.ts";

describe("chunkText", () => {
  it("slides a fixed window with the configured overlap", () => {
    expect(chunk("ABCDEFGHIJ", 4, 1)).toEqual(["ABCD", "DEFG", "GHIJ"]);
  });

  it("records character offsets and sequential indexes", () => {
    const spans = chunkText("ABCDEFGHIJ", { size: 4, overlap: 1 });
    expect(spans.map((s) => [s.chunkIndex, s.charStart, s.charEnd])).toEqual([
      [0, 0, 4],
      [1, 3, 7],
      [2, 6, 10],
    ]);
  });

  it("keeps a short final window that reaches the end", () => {
    expect(chunk("ABCDEFGHIJK", 4, 0)).toEqual(["ABCD", "EFGH", "IJK"]);
  });

  it("returns a single chunk when text fits in one window", () => {
    expect(chunk("abc", 10, 2)).toEqual(["abc"]);
  });

  it("returns nothing for empty text", () => {
    expect(chunkText("", { size: 10, overlap: 0 })).toEqual([]);
  });

  it("rejects overlap >= size and non-positive sizes", () => {
    expect(() => chunk("abc", 4, 4)).toThrow(RangeError);
    expect(() => chunk("abc", 0, 0)).toThrow(RangeError);
    expect(() => chunk("abc", 4, -1)).toThrow(RangeError);
  });

  it("reassembles the original text from overlapping spans", () => {
    const input = "0123456789".repeat(7);
    const spans = chunk(input, 12, 5);
    expect(spans.length).toBeGreaterThan(1);
    expect(reassemble(spans, 5)).toBe(input);
  });

  it("never emits an empty chunk", () => {
    const spans = chunkText("x".repeat(101), { size: 10, overlap: 3 });
    for (const s of spans) {
      expect(s.text.length).toBeGreaterThan(0);
      expect(s.text.length).toBeLessThanOrEqual(10);
    }
    expect(spans.at(-1)?.charEnd).toBe(101);
  });
});
