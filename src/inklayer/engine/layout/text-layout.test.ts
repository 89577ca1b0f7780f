import { describe, expect, it } from "vitest";
import { resolveTextFieldStyle } from "../../core/config";
import {
  getCursorRect,
  getOffsetForPosition,
  getRowIndexForOffset,
  getSelectionRects,
  getWordBoundary,
  layoutText,
} from "./text-layout";
import { createFixedWidthMeasurer } from "./text-measurer";

const style = resolveTextFieldStyle({ maxWidth: 100, lineHeight: 20 });
const measurer = createFixedWidthMeasurer(10);

function rowRanges(text: string) {
  return layoutText(text, style, measurer).rows.map((row) => [
    row.startOffset,
    row.endOffset,
    row.hardBreak,
  ]);
}

describe("layoutText", () => {
  it("lays out empty text as one empty row", () => {
    const layout = layoutText("", style, measurer);
    expect(rowRanges("")).toEqual([[0, 0, true]]);
    expect(layout.width).toBe(0);
    expect(layout.height).toBe(20);
  });

  it("splits hard lines at newlines", () => {
    expect(rowRanges("ab\n\ncd")).toEqual([
      [0, 2, true],
      [3, 3, true],
      [4, 6, true],
    ]);
  });

  it("wraps at word boundaries once a row exceeds the max width", () => {
    const layout = layoutText("hello world foo", style, measurer);
    expect(rowRanges("hello world foo")).toEqual([
      [0, 6, false],
      [6, 15, true],
    ]);
    expect(layout.rows[1].rect).toEqual({ top: 20, left: 0, width: 90, height: 20 });
    expect(layout.width).toBe(90);
    expect(layout.height).toBe(40);
  });

  it("breaks a word wider than the row between characters", () => {
    expect(rowRanges("abcdefghijklmno")).toEqual([
      [0, 10, false],
      [10, 15, true],
    ]);
  });
});

describe("cursor geometry", () => {
  const layout = layoutText("hello world foo", style, measurer);

  it("places an offset on a soft wrap at the start of the next row", () => {
    expect(getRowIndexForOffset(layout, 6)).toBe(1);
    expect(getCursorRect(layout, 6, 2)).toEqual({ top: 20, left: 0, width: 2, height: 20 });
  });

  it("measures the cursor x from the row start", () => {
    expect(getCursorRect(layout, 5, 2)).toEqual({ top: 0, left: 50, width: 2, height: 20 });
    expect(getCursorRect(layout, 15, 2)).toEqual({ top: 20, left: 90, width: 2, height: 20 });
  });

  it("clamps out-of-range offsets", () => {
    expect(getCursorRect(layout, 99, 2).left).toBe(90);
    expect(getCursorRect(layout, -4, 2).left).toBe(0);
  });

  it("resolves a point to the nearest offset", () => {
    expect(getOffsetForPosition(layout, { x: 34, y: 5 })).toBe(3);
    expect(getOffsetForPosition(layout, { x: 36, y: 5 })).toBe(4);
  });

  it("keeps a point past a soft-wrapped row on that row", () => {
    expect(getOffsetForPosition(layout, { x: 200, y: 5 })).toBe(5);
  });

  it("clamps points outside the text block", () => {
    expect(getOffsetForPosition(layout, { x: 200, y: 25 })).toBe(15);
    expect(getOffsetForPosition(layout, { x: -5, y: 100 })).toBe(6);
  });
});

describe("getSelectionRects", () => {
  it("returns nothing for a collapsed selection", () => {
    const layout = layoutText("abc", style, measurer);
    expect(getSelectionRects(layout, { start: 1, end: 1 })).toEqual([]);
  });

  it("covers each row and marks selected newlines", () => {
    const layout = layoutText("ab\n\ncd", style, measurer);
    expect(getSelectionRects(layout, { start: 5, end: 1 })).toEqual([
      { top: 0, left: 10, width: 15, height: 20 },
      { top: 20, left: 0, width: 5, height: 20 },
      { top: 40, left: 0, width: 10, height: 20 },
    ]);
  });
});

describe("getWordBoundary", () => {
  it("finds the word under an offset", () => {
    const layout = layoutText("say hello", style, measurer);
    expect(getWordBoundary(layout, 6)).toEqual({ start: 4, end: 9 });
  });
});
