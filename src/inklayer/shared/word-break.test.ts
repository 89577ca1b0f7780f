import { describe, expect, it } from "vitest";
import {
  getWordBoundaries,
  lineEnd,
  lineStart,
  nextWordBreak,
  prevWordBreak,
} from "./word-break";

describe("word-break navigation", () => {
  it("moves backward to the start of the current word", () => {
    expect(prevWordBreak("Hello", 5)).toBe(0);
    expect(prevWordBreak("hello world", 8)).toBe(6);
  });

  it("skips trailing punctuation and spaces before moving backward", () => {
    expect(prevWordBreak("hello, world!  ", 15)).toBe(7);
    expect(prevWordBreak("one two", 4)).toBe(0);
  });

  it("moves forward past the word and the gap after it", () => {
    expect(nextWordBreak("hello world", 0)).toBe(6);
    expect(nextWordBreak("hello world", 6)).toBe(11);
    expect(nextWordBreak("a, b", 1)).toBe(3);
  });

  it("clamps at both ends", () => {
    expect(prevWordBreak("abc", 0)).toBe(0);
    expect(nextWordBreak("abc", 3)).toBe(3);
    expect(prevWordBreak("", 4)).toBe(0);
  });

  it("produces strictly increasing offsets when walking forward", () => {
    const text = "The quick, brown fox -- jumps\nover 42 lazy dogs.";
    const offsets: number[] = [];
    let offset = 0;
    while (offset < text.length) {
      const next = nextWordBreak(text, offset);
      expect(next).toBeGreaterThan(offset);
      expect(next).toBeLessThanOrEqual(text.length);
      offsets.push(next);
      offset = next;
    }
    expect(offsets[offsets.length - 1]).toBe(text.length);
  });

  it("produces strictly decreasing offsets when walking backward", () => {
    const text = "  mixed: words, 123 and\tτέλος ";
    let offset = text.length;
    while (offset > 0) {
      const prev = prevWordBreak(text, offset);
      expect(prev).toBeLessThan(offset);
      expect(prev).toBeGreaterThanOrEqual(0);
      offset = prev;
    }
    expect(offset).toBe(0);
  });
});

describe("word-break word boundaries", () => {
  it("selects the word containing the offset", () => {
    expect(getWordBoundaries("hello world", 2)).toEqual({ start: 0, end: 5 });
    expect(getWordBoundaries("hello world", 6)).toEqual({ start: 6, end: 11 });
  });

  it("selects the last word when the offset is at the end", () => {
    expect(getWordBoundaries("hello world", 11)).toEqual({
      start: 6,
      end: 11,
    });
  });

  it("selects the run of spaces when tapping between words", () => {
    expect(getWordBoundaries("a   b", 2)).toEqual({ start: 1, end: 4 });
  });

  it("does not cross a newline", () => {
    expect(getWordBoundaries("one\ntwo", 3)).toEqual({ start: 0, end: 3 });
    expect(getWordBoundaries("one\ntwo", 4)).toEqual({ start: 4, end: 7 });
  });

  it("returns an empty range for empty text", () => {
    expect(getWordBoundaries("", 0)).toEqual({ start: 0, end: 0 });
  });
});

describe("word-break lines", () => {
  it("finds the start of the line containing the offset", () => {
    expect(lineStart("first\nsecond", 9)).toBe(6);
    expect(lineStart("first\nsecond", 6)).toBe(6);
    expect(lineStart("first\nsecond", 5)).toBe(0);
    expect(lineStart("no newline", 4)).toBe(0);
  });

  it("finds the end of the line containing the offset", () => {
    expect(lineEnd("first\nsecond", 2)).toBe(5);
    expect(lineEnd("first\nsecond", 7)).toBe(12);
  });
});
