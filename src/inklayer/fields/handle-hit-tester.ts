import type { HandleConfig } from "../core/config";
import type { DraggingHandle, Point } from "../core/types";
import { getHandleShapes, inflateRect, rectContains } from "./handle-geometry";
import type { TextFieldState } from "./text-field-state";

export type HandleHitResult = {
  field: TextFieldState;
  handle: DraggingHandle;
};

/** Highest z-index first; the most recently modified wins a tie. */
export function sortTopmostFirst(
  fields: readonly TextFieldState[],
): TextFieldState[] {
  return fields
    .map((field, index) => ({ field, index }))
    .sort(
      (a, b) =>
        b.field.zIndex - a.field.zIndex ||
        b.field.lastModified - a.field.lastModified ||
        b.index - a.index,
    )
    .map((entry) => entry.field);
}

function distanceSquared(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

/**
 * Finds the handle under `point` (surface coordinates). Only focused fields
 * that are showing handles take part. When both selection handles are in
 * reach the nearer one wins.
 */
export function hitTestHandles(
  fields: readonly TextFieldState[],
  point: Point,
  config: HandleConfig,
): HandleHitResult | null {
  const eligible = fields.filter(
    (field) => field.hasFocus && field.handleState !== "none",
  );
  for (const field of sortTopmostFirst(eligible)) {
    const local = field.canvasToLocal(point);
    let best: { handle: DraggingHandle; distance: number } | null = null;
    for (const shape of getHandleShapes(field, config)) {
      if (!rectContains(inflateRect(shape.rect, config.touchTolerance), local)) {
        continue;
      }
      const distance = distanceSquared(shape.circleCenter, local);
      if (!best || distance < best.distance) {
        best = { handle: shape.handle, distance };
      }
    }
    if (best) {
      return { field, handle: best.handle };
    }
  }
  return null;
}
