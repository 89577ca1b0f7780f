import type { TextFieldStyle } from "../../core/config";
import type { LayoutRect, Point, TextRange } from "../../core/types";
import {
  graphemeClusterLengthAfter,
  graphemeClusterLengthBefore,
} from "../../shared/segmenter";
import { getWordBoundaries } from "../../shared/word-break";
import type { TextMeasurer } from "./text-measurer";

export type LayoutRow = {
  startOffset: number;
  endOffset: number;
  /** False when the row was soft-wrapped and the text continues below. */
  hardBreak: boolean;
  rect: LayoutRect;
};

export type TextLayout = {
  text: string;
  rows: LayoutRow[];
  width: number;
  height: number;
  lineHeight: number;
  measure: (text: string) => number;
};

const WRAP_TOKEN_PATTERN = /\S+\s*|\s+/g;

function wrapLine(
  text: string,
  lineStartOffset: number,
  lineEndOffset: number,
  maxWidth: number,
  measure: (text: string) => number,
): TextRange[] {
  const rows: TextRange[] = [];
  const fits = (start: number, end: number) =>
    measure(text.slice(start, end).trimEnd()) <= maxWidth;

  let rowStart = lineStartOffset;
  let rowEnd = lineStartOffset;
  const lineText = text.slice(lineStartOffset, lineEndOffset);

  for (const match of lineText.matchAll(WRAP_TOKEN_PATTERN)) {
    const tokenStart = lineStartOffset + (match.index ?? 0);
    const tokenEnd = tokenStart + match[0].length;

    if (rowEnd > rowStart && !fits(rowStart, tokenEnd)) {
      rows.push({ start: rowStart, end: rowEnd });
      rowStart = tokenStart;
    }

    if (rowStart === tokenStart && !fits(tokenStart, tokenEnd)) {
      // A single token wider than the row breaks between graphemes.
      let cursor = tokenStart;
      while (cursor < tokenEnd) {
        let end = cursor + graphemeClusterLengthAfter(text, cursor);
        while (end < tokenEnd) {
          const next = end + graphemeClusterLengthAfter(text, end);
          if (!fits(cursor, next)) {
            break;
          }
          end = next;
        }
        if (end >= tokenEnd) {
          break;
        }
        rows.push({ start: cursor, end });
        cursor = end;
      }
      rowStart = cursor;
    }
    rowEnd = tokenEnd;
  }

  rows.push({ start: rowStart, end: Math.max(rowEnd, rowStart) });
  return rows;
}

/**
 * Lays text out in field-local coordinates: hard lines at `"\n"`, soft wraps
 * at word boundaries once a row would exceed `style.maxWidth`.
 */
export function layoutText(
  text: string,
  style: TextFieldStyle,
  measurer: TextMeasurer,
): TextLayout {
  const measure = (value: string) => measurer.measureText(value, style);
  const lineHeight = style.lineHeight;
  const rows: LayoutRow[] = [];
  let width = 0;
  let lineStartOffset = 0;

  while (lineStartOffset <= text.length) {
    const newline = text.indexOf("\n", lineStartOffset);
    const lineEndOffset = newline === -1 ? text.length : newline;
    const ranges = wrapLine(
      text,
      lineStartOffset,
      lineEndOffset,
      style.maxWidth,
      measure,
    );
    ranges.forEach((range, index) => {
      const rowWidth = measure(text.slice(range.start, range.end).trimEnd());
      width = Math.max(width, rowWidth);
      rows.push({
        startOffset: range.start,
        endOffset: range.end,
        hardBreak: index === ranges.length - 1,
        rect: {
          top: rows.length * lineHeight,
          left: 0,
          width: rowWidth,
          height: lineHeight,
        },
      });
    });
    lineStartOffset = lineEndOffset + 1;
  }

  return {
    text,
    rows,
    width,
    height: rows.length * lineHeight,
    lineHeight,
    measure,
  };
}

function clampToText(layout: TextLayout, offset: number): number {
  if (!Number.isFinite(offset)) {
    return 0;
  }
  return Math.max(0, Math.min(Math.trunc(offset), layout.text.length));
}

/**
 * Row holding the cursor at `offset`. An offset on a soft wrap belongs to
 * the row below it.
 */
export function getRowIndexForOffset(
  layout: TextLayout,
  offset: number,
): number {
  const clamped = clampToText(layout, offset);
  for (let index = 0; index < layout.rows.length; index += 1) {
    const row = layout.rows[index];
    if (clamped < row.endOffset) {
      return clamped >= row.startOffset ? index : Math.max(0, index - 1);
    }
    if (clamped === row.endOffset && row.hardBreak) {
      return index;
    }
  }
  return Math.max(0, layout.rows.length - 1);
}

function offsetToX(layout: TextLayout, row: LayoutRow, offset: number): number {
  const clamped = Math.max(row.startOffset, Math.min(offset, row.endOffset));
  return (
    row.rect.left + layout.measure(layout.text.slice(row.startOffset, clamped))
  );
}

export function getCursorRect(
  layout: TextLayout,
  offset: number,
  cursorWidth: number,
): LayoutRect {
  const clamped = clampToText(layout, offset);
  const row = layout.rows[getRowIndexForOffset(layout, clamped)];
  if (!row) {
    return { top: 0, left: 0, width: cursorWidth, height: layout.lineHeight };
  }
  return {
    top: row.rect.top,
    left: offsetToX(layout, row, clamped),
    width: cursorWidth,
    height: row.rect.height,
  };
}

/** Nearest cursor offset to a field-local point. */
export function getOffsetForPosition(layout: TextLayout, point: Point): number {
  if (layout.rows.length === 0) {
    return 0;
  }
  const rowIndex = Math.max(
    0,
    Math.min(
      Math.floor(point.y / layout.lineHeight),
      layout.rows.length - 1,
    ),
  );
  const row = layout.rows[rowIndex];
  const maxOffset =
    row.hardBreak || row.endOffset === row.startOffset
      ? row.endOffset
      : row.endOffset - graphemeClusterLengthBefore(layout.text, row.endOffset);

  let previous = row.startOffset;
  let previousX = row.rect.left;
  if (point.x <= previousX) {
    return previous;
  }
  while (previous < maxOffset) {
    const next = previous + graphemeClusterLengthAfter(layout.text, previous);
    const nextX = offsetToX(layout, row, next);
    if (point.x < (previousX + nextX) / 2) {
      return previous;
    }
    previous = next;
    previousX = nextX;
  }
  return Math.min(previous, maxOffset);
}

export function getSelectionRects(
  layout: TextLayout,
  selection: TextRange,
): LayoutRect[] {
  const start = clampToText(layout, Math.min(selection.start, selection.end));
  const end = clampToText(layout, Math.max(selection.start, selection.end));
  if (start === end) {
    return [];
  }
  const newlineWidth = layout.lineHeight / 4;
  const rects: LayoutRect[] = [];

  layout.rows.forEach((row) => {
    const rowStart = Math.max(start, row.startOffset);
    const rowEnd = Math.min(end, row.endOffset);
    const includesNewline =
      row.hardBreak &&
      row.endOffset < layout.text.length &&
      start <= row.endOffset &&
      end > row.endOffset;
    if (rowStart > rowEnd || (rowStart === rowEnd && !includesNewline)) {
      return;
    }
    const left = offsetToX(layout, row, rowStart);
    const right =
      offsetToX(layout, row, rowEnd) + (includesNewline ? newlineWidth : 0);
    rects.push({
      top: row.rect.top,
      left,
      width: right - left,
      height: row.rect.height,
    });
  });

  return rects;
}

export function getWordBoundary(layout: TextLayout, offset: number): TextRange {
  return getWordBoundaries(layout.text, clampToText(layout, offset));
}
