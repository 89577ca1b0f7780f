import { describe, expect, it } from "vitest";
import { TextFieldState } from "../fields/text-field-state";
import { DEFAULT_BRUSH } from "../strokes/brush";
import type { Stroke } from "../strokes/types";
import type { CanvasElement } from "./element-compositor";
import { composeElements, visitElement } from "./element-compositor";

function stroke(id: string, zIndex: number, lastModified: number): Stroke {
  return {
    id,
    inputs: { toolType: "stylus", strokeUnitLengthCm: 0, inputs: [] },
    brush: DEFAULT_BRUSH,
    zIndex,
    lastModified,
  };
}

function field(id: string, zIndex: number, lastModified: number) {
  return new TextFieldState({ id, zIndex, lastModified });
}

function label(element: CanvasElement): string {
  return visitElement(element, {
    stroke: (value) => value.id,
    textField: (value) => value.id,
  });
}

describe("composeElements", () => {
  it("orders strokes and fields together by z-index", () => {
    const elements = composeElements(
      [stroke("s2", 2, 0), stroke("s0", 0, 0)],
      [field("f1", 1, 0), field("f3", 3, 0)],
    );
    expect(elements.map(label)).toEqual(["s0", "f1", "s2", "f3"]);
  });

  it("paints the most recently modified element of a tie last", () => {
    const elements = composeElements(
      [stroke("newer-stroke", 4, 200)],
      [field("older-field", 4, 100)],
    );
    expect(elements.map(label)).toEqual(["older-field", "newer-stroke"]);
  });

  it("keeps input order for identical keys", () => {
    const elements = composeElements(
      [stroke("a", 0, 0), stroke("b", 0, 0)],
      [field("c", 0, 0)],
    );
    expect(elements.map(label)).toEqual(["a", "b", "c"]);
  });

  it("tags each element with its kind and ordering keys", () => {
    const textField = field("f", 5, 50);
    const [element] = composeElements([], [textField]);
    expect(element).toEqual({
      type: "text-field",
      field: textField,
      zIndex: 5,
      lastModified: 50,
    });
  });

  it("returns nothing for an empty surface", () => {
    expect(composeElements([], [])).toEqual([]);
  });
});
