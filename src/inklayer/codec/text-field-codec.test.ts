import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { decodeTextFields, encodeTextFields } from "./text-field-codec";

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("text field codec", () => {
  it("round-trips records in order", () => {
    const records = [
      { text: "first", positionX: 10, positionY: 20, zIndex: 3, lastModified: 1700 },
      { text: "line\nbreak", positionX: 0.5, positionY: -4, zIndex: 1, lastModified: 1800 },
    ];
    expect(decodeTextFields(encodeTextFields(records))).toEqual(records);
  });

  it("decodes blank input to an empty collection without warning", () => {
    expect(decodeTextFields("")).toEqual([]);
    expect(decodeTextFields("   ")).toEqual([]);
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("decodes malformed input to an empty collection", () => {
    expect(decodeTextFields("{not valid}")).toEqual([]);
    expect(decodeTextFields('{"text":"x"}')).toEqual([]);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it("drops the whole collection when one record has the wrong shape", () => {
    const json = JSON.stringify([
      { text: "ok", positionX: 1, positionY: 2 },
      { text: 42, positionX: 1, positionY: 2 },
    ]);
    expect(decodeTextFields(json)).toEqual([]);
  });

  it("defaults the z-index and last-modified time of older records", () => {
    const json = JSON.stringify([{ text: "old", positionX: 5, positionY: 6 }]);
    expect(decodeTextFields(json, { now: () => 4242 })).toEqual([
      { text: "old", positionX: 5, positionY: 6, zIndex: 0, lastModified: 4242 },
    ]);
  });

  it("rejects a fractional z-index", () => {
    const json = JSON.stringify([{ text: "x", positionX: 0, positionY: 0, zIndex: 1.5 }]);
    expect(decodeTextFields(json)).toEqual([]);
  });
});
