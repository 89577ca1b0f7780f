import type { Rgba } from "../shared/color";
import { parseColor, withAlpha } from "../shared/color";
import type { Brush, BrushFamily, ToolType } from "./types";

export const BRUSH_FAMILIES: readonly BrushFamily[] = [
  "pen",
  "marker",
  "highlighter",
];

export const DEFAULT_BRUSH: Brush = {
  family: "pen",
  size: 5,
  color: "#000000",
  epsilon: 0.1,
};

const HIGHLIGHTER_ALPHA = 0.4;

export function isBrushFamily(value: unknown): value is BrushFamily {
  return value === "pen" || value === "marker" || value === "highlighter";
}

export function createBrush(brush: Partial<Brush> = {}): Brush {
  const size = brush.size ?? DEFAULT_BRUSH.size;
  return {
    family: brush.family ?? DEFAULT_BRUSH.family,
    size: Number.isFinite(size) && size > 0 ? size : DEFAULT_BRUSH.size,
    color: brush.color ?? DEFAULT_BRUSH.color,
    epsilon: brush.epsilon ?? DEFAULT_BRUSH.epsilon,
  };
}

/** Paint color for a brush; highlighters are translucent. */
export function resolveBrushColor(brush: Brush): Rgba {
  const color = parseColor(brush.color);
  return brush.family === "highlighter"
    ? withAlpha(color, HIGHLIGHTER_ALPHA)
    : color;
}

export function toolTypeFromPointer(pointerType: string): ToolType {
  switch (pointerType) {
    case "pen":
      return "stylus";
    case "touch":
      return "touch";
    case "mouse":
      return "mouse";
    default:
      return "unknown";
  }
}
