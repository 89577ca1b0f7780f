import type { TextFieldState } from "../fields/text-field-state";
import type { Stroke } from "../strokes/types";

export type CanvasElement =
  | { type: "stroke"; stroke: Stroke; zIndex: number; lastModified: number }
  | {
      type: "text-field";
      field: TextFieldState;
      zIndex: number;
      lastModified: number;
    };

export type CanvasElementVisitor<T> = {
  stroke: (stroke: Stroke) => T;
  textField: (field: TextFieldState) => T;
};

function compareElements(a: CanvasElement, b: CanvasElement): number {
  if (a.zIndex !== b.zIndex) {
    return a.zIndex - b.zIndex;
  }
  return a.lastModified - b.lastModified;
}

/**
 * Merges strokes and text fields into one draw order: ascending z-index,
 * then ascending last-modified, so the most recently touched element of a
 * tie paints last. Equal keys keep input order (strokes before fields).
 */
export function composeElements(
  strokes: readonly Stroke[],
  fields: readonly TextFieldState[],
): CanvasElement[] {
  const elements: CanvasElement[] = [
    ...strokes.map(
      (stroke): CanvasElement => ({
        type: "stroke",
        stroke,
        zIndex: stroke.zIndex,
        lastModified: stroke.lastModified,
      }),
    ),
    ...fields.map(
      (field): CanvasElement => ({
        type: "text-field",
        field,
        zIndex: field.zIndex,
        lastModified: field.lastModified,
      }),
    ),
  ];
  // Array.prototype.sort is stable.
  return elements.sort(compareElements);
}

function assertNever(value: never): never {
  throw new Error(`Unknown canvas element: ${JSON.stringify(value)}`);
}

export function visitElement<T>(
  element: CanvasElement,
  visitor: CanvasElementVisitor<T>,
): T {
  switch (element.type) {
    case "stroke":
      return visitor.stroke(element.stroke);
    case "text-field":
      return visitor.textField(element.field);
    default:
      return assertNever(element);
  }
}
