import type { TextRange, TextValue } from "./types";

export function clampOffset(offset: number, length: number): number {
  if (!Number.isFinite(offset)) {
    return 0;
  }
  return Math.max(0, Math.min(Math.trunc(offset), length));
}

export function collapsedRange(offset: number): TextRange {
  return { start: offset, end: offset };
}

export function clampRange(range: TextRange, length: number): TextRange {
  return {
    start: clampOffset(range.start, length),
    end: clampOffset(range.end, length),
  };
}

export function createTextValue(
  text = "",
  selection?: TextRange,
  composition?: TextRange | null,
): TextValue {
  return {
    text,
    selection: clampRange(selection ?? collapsedRange(text.length), text.length),
    composition: composition ? clampRange(composition, text.length) : null,
  };
}

export function selectionMin(value: TextValue): number {
  return Math.min(value.selection.start, value.selection.end);
}

export function selectionMax(value: TextValue): number {
  return Math.max(value.selection.start, value.selection.end);
}

export function isCollapsed(value: TextValue): boolean {
  return value.selection.start === value.selection.end;
}

export function selectedText(value: TextValue): string {
  if (isCollapsed(value)) {
    return "";
  }
  return value.text.slice(selectionMin(value), selectionMax(value));
}

export function withSelection(value: TextValue, selection: TextRange): TextValue {
  return {
    text: value.text,
    selection: clampRange(selection, value.text.length),
    composition: value.composition,
  };
}

export function textValuesEqual(a: TextValue, b: TextValue): boolean {
  return (
    a.text === b.text &&
    a.selection.start === b.selection.start &&
    a.selection.end === b.selection.end &&
    a.composition?.start === b.composition?.start &&
    a.composition?.end === b.composition?.end
  );
}
