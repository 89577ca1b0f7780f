import type { TextRange, TextValue } from "../../core/types";
import {
  clampRange,
  collapsedRange,
  isCollapsed,
  selectionMax,
  selectionMin,
} from "../../core/text-value";
import {
  graphemeClusterLengthAfter,
  graphemeClusterLengthBefore,
} from "../../shared/segmenter";
import {
  getWordBoundaries,
  lineStart,
  nextWordBreak,
  prevWordBreak,
} from "../../shared/word-break";

export type WordDirection = "backward" | "forward";

// Every operation clamps first so offsets computed against a stale layout
// can never escape [0, text.length].
function normalize(value: TextValue): TextValue {
  const length = value.text.length;
  return {
    text: value.text,
    selection: clampRange(value.selection, length),
    composition: value.composition ? clampRange(value.composition, length) : null,
  };
}

function select(value: TextValue, selection: TextRange): TextValue {
  return {
    text: value.text,
    selection: clampRange(selection, value.text.length),
    composition: value.composition,
  };
}

function replaceRange(
  value: TextValue,
  from: number,
  to: number,
  replacement: string,
): TextValue {
  const text = value.text.slice(0, from) + replacement + value.text.slice(to);
  return {
    text,
    selection: collapsedRange(from + replacement.length),
    composition: null,
  };
}

export function placeCursor(value: TextValue, offset: number): TextValue {
  const current = normalize(value);
  return select(current, collapsedRange(offset));
}

export function moveLeft(value: TextValue, extend = false): TextValue {
  const current = normalize(value);
  const { start, end } = current.selection;

  if (extend) {
    const next = end - graphemeClusterLengthBefore(current.text, end);
    return select(current, { start, end: next });
  }
  if (!isCollapsed(current)) {
    return select(current, collapsedRange(selectionMin(current)));
  }
  return select(
    current,
    collapsedRange(end - graphemeClusterLengthBefore(current.text, end)),
  );
}

export function moveRight(value: TextValue, extend = false): TextValue {
  const current = normalize(value);
  const { start, end } = current.selection;

  if (extend) {
    const next = end + graphemeClusterLengthAfter(current.text, end);
    return select(current, { start, end: next });
  }
  if (!isCollapsed(current)) {
    return select(current, collapsedRange(selectionMax(current)));
  }
  return select(
    current,
    collapsedRange(end + graphemeClusterLengthAfter(current.text, end)),
  );
}

export function moveByWord(
  value: TextValue,
  direction: WordDirection,
  extend = false,
): TextValue {
  const current = normalize(value);
  const step = direction === "backward" ? prevWordBreak : nextWordBreak;

  if (extend) {
    return select(current, {
      start: current.selection.start,
      end: step(current.text, current.selection.end),
    });
  }

  const from =
    direction === "backward" ? selectionMin(current) : selectionMax(current);
  return select(current, collapsedRange(step(current.text, from)));
}

export function moveToStart(value: TextValue, extend = false): TextValue {
  const current = normalize(value);
  if (extend) {
    return select(current, { start: current.selection.start, end: 0 });
  }
  return select(current, collapsedRange(0));
}

export function moveToEnd(value: TextValue, extend = false): TextValue {
  const current = normalize(value);
  const length = current.text.length;
  if (extend) {
    return select(current, { start: current.selection.start, end: length });
  }
  return select(current, collapsedRange(length));
}

export function selectAll(value: TextValue): TextValue {
  const current = normalize(value);
  return select(current, { start: 0, end: current.text.length });
}

export function clearSelection(value: TextValue): TextValue {
  const current = normalize(value);
  if (isCollapsed(current)) {
    return current;
  }
  return select(current, collapsedRange(selectionMax(current)));
}

export function selectWordAt(value: TextValue, offset: number): TextValue {
  const current = normalize(value);
  return select(current, getWordBoundaries(current.text, offset));
}

export function insertText(value: TextValue, text: string): TextValue {
  const current = normalize(value);
  return replaceRange(
    current,
    selectionMin(current),
    selectionMax(current),
    text,
  );
}

export function deleteSelection(value: TextValue): TextValue | null {
  const current = normalize(value);
  if (isCollapsed(current)) {
    return null;
  }
  return replaceRange(current, selectionMin(current), selectionMax(current), "");
}

export function deleteBackward(value: TextValue): TextValue | null {
  const current = normalize(value);
  if (!isCollapsed(current)) {
    return deleteSelection(current);
  }
  const cursor = current.selection.start;
  if (cursor === 0) {
    return null;
  }
  const length = graphemeClusterLengthBefore(current.text, cursor);
  return replaceRange(current, cursor - length, cursor, "");
}

export function deleteForward(value: TextValue): TextValue | null {
  const current = normalize(value);
  if (!isCollapsed(current)) {
    return deleteSelection(current);
  }
  const cursor = current.selection.start;
  if (cursor >= current.text.length) {
    return null;
  }
  const length = graphemeClusterLengthAfter(current.text, cursor);
  return replaceRange(current, cursor, cursor + length, "");
}

export function deleteWordBackward(value: TextValue): TextValue | null {
  const current = normalize(value);
  if (!isCollapsed(current)) {
    return deleteSelection(current);
  }
  const cursor = current.selection.start;
  if (cursor === 0) {
    return null;
  }
  return replaceRange(current, prevWordBreak(current.text, cursor), cursor, "");
}

export function deleteToLineStart(value: TextValue): TextValue | null {
  const current = normalize(value);
  if (!isCollapsed(current)) {
    return deleteSelection(current);
  }
  const cursor = current.selection.start;
  const start = lineStart(current.text, cursor);
  if (start === cursor) {
    return null;
  }
  return replaceRange(current, start, cursor, "");
}

/**
 * Replaces the active composition (or the selection when nothing is being
 * composed) with `text` and marks the inserted span as composing.
 */
export function setComposingText(value: TextValue, text: string): TextValue {
  const current = normalize(value);
  const from = current.composition
    ? Math.min(current.composition.start, current.composition.end)
    : selectionMin(current);
  const to = current.composition
    ? Math.max(current.composition.start, current.composition.end)
    : selectionMax(current);
  const next = replaceRange(current, from, to, text);
  return {
    ...next,
    composition: text.length > 0 ? { start: from, end: from + text.length } : null,
  };
}

export function setComposingRegion(
  value: TextValue,
  start: number,
  end: number,
): TextValue {
  const current = normalize(value);
  const region = clampRange(
    { start: Math.min(start, end), end: Math.max(start, end) },
    current.text.length,
  );
  return {
    text: current.text,
    selection: current.selection,
    composition: region.start === region.end ? null : region,
  };
}

export function finishComposing(value: TextValue): TextValue {
  const current = normalize(value);
  if (!current.composition) {
    return current;
  }
  return { ...current, composition: null };
}
