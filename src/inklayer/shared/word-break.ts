import type { TextRange } from "../core/types";

const WORD_CHAR = /[\p{L}\p{N}\p{M}]/u;

export function isWordChar(char: string | undefined): boolean {
  return char !== undefined && char !== "" && WORD_CHAR.test(char);
}

/**
 * Offset of the previous word start. Skips the non-word run directly before
 * `offset`, then the word run before that.
 */
export function prevWordBreak(text: string, offset: number): number {
  if (offset <= 0 || text.length === 0) {
    return 0;
  }

  let position = Math.min(offset, text.length) - 1;

  while (position > 0 && !isWordChar(text[position])) {
    position -= 1;
  }

  while (position > 0 && isWordChar(text[position - 1])) {
    position -= 1;
  }

  return position;
}

/**
 * Offset just past the next word. Skips the word run at `offset`, then the
 * non-word run that follows it, so repeated calls land on word starts.
 */
export function nextWordBreak(text: string, offset: number): number {
  if (offset >= text.length) {
    return text.length;
  }

  let position = Math.max(0, offset);

  while (position < text.length && isWordChar(text[position])) {
    position += 1;
  }

  while (position < text.length && !isWordChar(text[position])) {
    position += 1;
  }

  return position;
}

/**
 * Word (or non-word run) under `offset`, used for double-tap and long-press
 * selection. A tap at the very end of a line resolves to the run before it.
 */
export function getWordBoundaries(text: string, offset: number): TextRange {
  const length = text.length;
  if (length === 0) {
    return { start: 0, end: 0 };
  }

  let adjusted = Math.max(0, Math.min(offset, length));
  if (adjusted >= length) {
    adjusted = length - 1;
  }
  if (text[adjusted] === "\n" && adjusted > 0) {
    adjusted -= 1;
  }
  if (text[adjusted] === "\n") {
    return { start: adjusted, end: adjusted };
  }

  const wordLike = isWordChar(text[adjusted]);
  const sameClass = (index: number) => {
    const char = text[index];
    if (char === undefined || char === "\n") {
      return false;
    }
    return isWordChar(char) === wordLike;
  };

  let start = adjusted;
  let end = adjusted + 1;
  while (start > 0 && sameClass(start - 1)) {
    start -= 1;
  }
  while (end < length && sameClass(end)) {
    end += 1;
  }

  return { start, end };
}

/**
 * Start of the line containing `offset` (just after the nearest preceding
 * newline, or 0).
 */
export function lineStart(text: string, offset: number): number {
  const clamped = Math.max(0, Math.min(offset, text.length));
  if (clamped === 0) {
    return 0;
  }
  const newline = text.lastIndexOf("\n", clamped - 1);
  return newline === -1 ? 0 : newline + 1;
}

export function lineEnd(text: string, offset: number): number {
  const clamped = Math.max(0, Math.min(offset, text.length));
  const newline = text.indexOf("\n", clamped);
  return newline === -1 ? text.length : newline;
}
