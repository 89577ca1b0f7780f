export type ToolType = "stylus" | "touch" | "mouse" | "unknown";

export type BrushFamily = "pen" | "marker" | "highlighter";

export type Brush = {
  family: BrushFamily;
  size: number;
  /** Any color `parseColor` reads; unreadable values draw black. */
  color: string;
  /** Minimum distance between kept samples, in surface units. */
  epsilon: number;
};

export type StrokeInput = {
  x: number;
  y: number;
  /** Milliseconds since the stroke began. */
  timeMillis: number;
  pressure: number;
  tiltRadians: number;
  orientationRadians: number;
};

export type StrokeInputBatch = {
  toolType: ToolType;
  strokeUnitLengthCm: number;
  inputs: StrokeInput[];
};

export type Stroke = {
  id: string;
  inputs: StrokeInputBatch;
  brush: Brush;
  zIndex: number;
  lastModified: number;
};
