export type Point = {
  x: number;
  y: number;
};

export type LayoutRect = {
  top: number;
  left: number;
  width: number;
  height: number;
};

export type TextRange = {
  start: number;
  end: number;
};

/**
 * Immutable snapshot of a field's content.
 *
 * `selection.start > selection.end` is a valid reversed selection (produced
 * while dragging handles). `composition` is the span currently owned by the
 * host input method, or null when nothing is being composed.
 */
export type TextValue = {
  readonly text: string;
  readonly selection: TextRange;
  readonly composition: TextRange | null;
};

export type HandleState = "none" | "selection" | "cursor";

export type DraggingHandle = "start" | "end" | "cursor";

export type EditorMode = "draw" | "text" | null;
