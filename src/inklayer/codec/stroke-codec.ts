import { isBrushFamily } from "../strokes/brush";
import type {
  Brush,
  BrushFamily,
  Stroke,
  StrokeInput,
  StrokeInputBatch,
  ToolType,
} from "../strokes/types";
import {
  isFiniteNumber,
  isRecord,
  MalformedRecordError,
  parseArray,
  readNumber,
  readOptionalNumber,
} from "./guards";

export type StrokeRecord = {
  inputs: StrokeInputBatch;
  brush: Brush;
  zIndex: number;
  lastModified: number;
};

const TOOL_TYPES: readonly ToolType[] = ["stylus", "touch", "mouse", "unknown"];

// Brush identifiers written by the first stroke format.
const LEGACY_STOCK_BRUSHES: Record<string, BrushFamily> = {
  PRESSURE_PEN_V1: "pen",
  MARKER_V1: "marker",
  HIGHLIGHTER_V1: "highlighter",
};

const DEFAULT_PRESSURE = 0.5;
const DEFAULT_EPSILON = 0.1;

let nextStrokeId = 1;

export function createStrokeId(): string {
  const id = `stroke-${nextStrokeId}`;
  nextStrokeId += 1;
  return id;
}

export function encodeStrokes(strokes: readonly StrokeRecord[]): string {
  return JSON.stringify(
    strokes.map((stroke) => ({
      inputs: {
        toolType: stroke.inputs.toolType,
        strokeUnitLengthCm: stroke.inputs.strokeUnitLengthCm,
        inputs: stroke.inputs.inputs.map((input) => ({
          x: input.x,
          y: input.y,
          timeMillis: input.timeMillis,
          pressure: input.pressure,
          tiltRadians: input.tiltRadians,
          orientationRadians: input.orientationRadians,
        })),
      },
      brush: {
        family: stroke.brush.family,
        size: stroke.brush.size,
        color: stroke.brush.color,
        epsilon: stroke.brush.epsilon,
      },
      zIndex: stroke.zIndex,
      lastModified: stroke.lastModified,
    })),
  );
}

function isToolType(value: unknown): value is ToolType {
  return TOOL_TYPES.some((toolType) => toolType === value);
}

/** ARGB integer, as the first stroke format stored colors. */
function argbToCss(argb: number): string {
  const value = argb >>> 0;
  const hex = (channel: number) => channel.toString(16).padStart(2, "0");
  const a = (value >>> 24) & 0xff;
  const r = (value >>> 16) & 0xff;
  const g = (value >>> 8) & 0xff;
  const b = value & 0xff;
  return `#${hex(r)}${hex(g)}${hex(b)}${hex(a)}`;
}

function decodeInput(value: unknown, context: string): StrokeInput {
  if (!isRecord(value)) {
    throw new MalformedRecordError(`${context}: input is not an object`);
  }
  return {
    x: readNumber(value, "x", context),
    y: readNumber(value, "y", context),
    timeMillis: readOptionalNumber(value, "timeMillis", 0, context),
    pressure: readOptionalNumber(value, "pressure", DEFAULT_PRESSURE, context),
    tiltRadians: readOptionalNumber(value, "tiltRadians", 0, context),
    orientationRadians: readOptionalNumber(
      value,
      "orientationRadians",
      0,
      context,
    ),
  };
}

function decodeInputBatch(value: unknown, context: string): StrokeInputBatch {
  if (!isRecord(value) || !Array.isArray(value.inputs)) {
    throw new MalformedRecordError(`${context}: missing inputs`);
  }
  const toolType =
    typeof value.toolType === "string" ? value.toolType.toLowerCase() : "unknown";
  if (!isToolType(toolType)) {
    throw new MalformedRecordError(`${context}: unknown tool type`);
  }
  return {
    toolType,
    strokeUnitLengthCm: readOptionalNumber(
      value,
      "strokeUnitLengthCm",
      0,
      context,
    ),
    inputs: value.inputs.map((input) => decodeInput(input, context)),
  };
}

function decodeBrush(value: unknown, context: string): Brush {
  if (!isRecord(value)) {
    throw new MalformedRecordError(`${context}: missing brush`);
  }
  const legacyFamily =
    typeof value.stockBrush === "string"
      ? LEGACY_STOCK_BRUSHES[value.stockBrush]
      : undefined;
  const family = value.family ?? legacyFamily;
  if (!isBrushFamily(family)) {
    throw new MalformedRecordError(`${context}: unknown brush family`);
  }
  const size = readNumber(value, "size", context);
  if (size <= 0) {
    throw new MalformedRecordError(`${context}: brush size must be positive`);
  }
  let color: string;
  if (typeof value.color === "string") {
    color = value.color;
  } else if (isFiniteNumber(value.color)) {
    color = argbToCss(value.color);
  } else {
    throw new MalformedRecordError(`${context}: brush color is missing`);
  }
  return {
    family,
    size,
    color,
    epsilon: readOptionalNumber(value, "epsilon", DEFAULT_EPSILON, context),
  };
}

function decodeStroke(value: unknown, index: number): Stroke {
  const context = `stroke ${index}`;
  if (!isRecord(value)) {
    throw new MalformedRecordError(`${context}: not an object`);
  }
  return {
    id: createStrokeId(),
    inputs: decodeInputBatch(value.inputs, context),
    brush: decodeBrush(value.brush, context),
    zIndex: readOptionalNumber(value, "zIndex", 0, context),
    lastModified: readOptionalNumber(value, "lastModified", 0, context),
  };
}

/**
 * Decodes persisted strokes. Blank input, invalid JSON, or any record of the
 * wrong shape yields an empty collection.
 */
export function decodeStrokes(json: string): Stroke[] {
  try {
    const items = parseArray(json);
    if (!items) {
      return [];
    }
    return items.map((item, index) => decodeStroke(item, index));
  } catch (error) {
    console.warn("[inklayer] Ignoring malformed strokes:", error);
    return [];
  }
}
