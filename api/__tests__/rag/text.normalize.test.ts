import { describe, expect, it } from "vitest";

import { normalizeText } from "../../../src/server/rag/text/normalize.ts";
import { joinPages, pageAt } from "../../../src/server/rag/text/pages.ts";

describe("normalizeText", () => {
  it("removes nulls", () => {
    expect(normalizeText("a\u0000b")).toBe("ab");
  });

  it("converts \\r\\n to \\n and limits blank lines", () => {
    expect(normalizeText("Hello   world\r\n\r\n\r\nBye")).toBe("Hello world\n\nBye");
  });

  it("fixes line-break hyphenation in safe cases", () => {
    expect(normalizeText("exam-\nple")).toBe("example");
  });

  it("does not change real hyphenated words", () => {
    expect(normalizeText("state-of-the-art")).toBe("state-of-the-art");
  });

  it("keeps indentation when whitespace collapsing is off", () => {
    expect(normalizeText("def f():\r\n    return 1\n", { collapseWhitespace: false })).toBe("def f():\n    return 1");
  });
});

describe("joinPages", () => {
  it("joins non-empty pages and maps offsets back to page numbers", () => {
    const { text, spans } = joinPages([
      { pageNumber: 1, text: "First  page" },
      { pageNumber: 2, text: "   " },
      { pageNumber: 3, text: "Third" },
    ]);

    expect(text).toBe("First page\n\nThird");
    expect(spans).toEqual([
      { pageNumber: 1, start: 0, end: 10 },
      { pageNumber: 3, start: 12, end: 17 },
    ]);
    expect(pageAt(spans, 0)).toBe(1);
    expect(pageAt(spans, 11)).toBe(1);
    expect(pageAt(spans, 12)).toBe(3);
  });
});
