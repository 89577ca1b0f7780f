import type { HandleConfig } from "../core/config";
import { selectionMax, selectionMin } from "../core/text-value";
import type { DraggingHandle, LayoutRect, Point } from "../core/types";
import type { TextFieldState } from "./text-field-state";

export type HandleShape = {
  handle: DraggingHandle;
  /** Caret position the handle hangs from, field-local. */
  anchor: Point;
  circleCenter: Point;
  /** Visual extent, from the bottom of the caret to the bottom of the circle. */
  rect: LayoutRect;
};

function selectionHandle(
  field: TextFieldState,
  handle: "start" | "end",
  offset: number,
  config: HandleConfig,
): HandleShape {
  const caret = field.getCursorRect(offset, config.cursorWidth);
  const bottom = caret.top + caret.height;
  // Start handles lean left of the caret, end handles lean right.
  const centerX =
    handle === "start"
      ? caret.left - config.radius / 2
      : caret.left + config.radius / 2;
  const centerY = bottom + config.stemHeight + config.radius;
  return {
    handle,
    anchor: { x: caret.left, y: bottom },
    circleCenter: { x: centerX, y: centerY },
    rect: {
      top: bottom,
      left: centerX - config.radius,
      width: config.radius * 2,
      height: config.stemHeight + config.radius * 2,
    },
  };
}

function cursorHandle(field: TextFieldState, config: HandleConfig): HandleShape {
  const caret = field.getCursorRect(field.selection.start, config.cursorWidth);
  const bottom = caret.top + caret.height;
  const centerX = caret.left + config.cursorWidth / 2;
  const centerY = bottom + config.stemHeight + config.radius;
  return {
    handle: "cursor",
    anchor: { x: centerX, y: bottom },
    circleCenter: { x: centerX, y: centerY },
    rect: {
      top: centerY - config.radius,
      left: centerX - config.radius,
      width: config.radius * 2,
      height: config.radius * 2,
    },
  };
}

/** Handles currently shown for `field`, in field-local coordinates. */
export function getHandleShapes(
  field: TextFieldState,
  config: HandleConfig,
): HandleShape[] {
  switch (field.handleState) {
    case "none":
      return [];
    case "cursor":
      return [cursorHandle(field, config)];
    case "selection":
      return [
        selectionHandle(field, "start", selectionMin(field.value), config),
        selectionHandle(field, "end", selectionMax(field.value), config),
      ];
  }
}

export function inflateRect(rect: LayoutRect, margin: number): LayoutRect {
  return {
    top: rect.top - margin,
    left: rect.left - margin,
    width: rect.width + margin * 2,
    height: rect.height + margin * 2,
  };
}

export function rectContains(rect: LayoutRect, point: Point): boolean {
  return (
    point.x >= rect.left &&
    point.x <= rect.left + rect.width &&
    point.y >= rect.top &&
    point.y <= rect.top + rect.height
  );
}
