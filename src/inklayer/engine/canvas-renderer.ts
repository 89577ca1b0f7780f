import { getStroke } from "perfect-freehand";
import type { HandleConfig } from "../core/config";
import { DEFAULT_HANDLE_CONFIG, toCssFont } from "../core/config";
import { getHandleShapes } from "../fields/handle-geometry";
import type { TextFieldState } from "../fields/text-field-state";
import { parseColor, toCssColor } from "../shared/color";
import { resolveBrushColor } from "../strokes/brush";
import type { Stroke } from "../strokes/types";
import type { CanvasElement } from "./element-compositor";
import { visitElement } from "./element-compositor";
import { getSelectionRects } from "./layout/text-layout";

/** The slice of the 2D context the renderer draws with. */
export type DrawingContext = Pick<
  CanvasRenderingContext2D,
  | "save"
  | "restore"
  | "clearRect"
  | "fillRect"
  | "beginPath"
  | "closePath"
  | "moveTo"
  | "lineTo"
  | "arc"
  | "fill"
  | "stroke"
  | "fillText"
  | "translate"
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "font"
  | "textBaseline"
>;

export type RenderOptions = {
  width: number;
  height: number;
  handleConfig?: HandleConfig;
  /** Stroke being authored; drawn above every committed element. */
  activeStroke?: Stroke | null;
};

const COMPOSITION_UNDERLINE_WIDTH = 1;

/** Outline polygon for a stroke, in surface coordinates. */
export function getStrokeOutline(stroke: Stroke): number[][] {
  const { brush, inputs } = stroke;
  const points = inputs.inputs.map((input) => [
    input.x,
    input.y,
    input.pressure,
  ]);
  if (points.length === 0) {
    return [];
  }
  // Markers and highlighters keep a constant width; pens follow pressure.
  const thinning = brush.family === "pen" ? 0.6 : 0;
  return getStroke(points, {
    size: brush.size,
    thinning,
    smoothing: 0.5,
    streamline: 0.5,
    simulatePressure: inputs.toolType !== "stylus",
    last: true,
  });
}

export function drawStroke(ctx: DrawingContext, stroke: Stroke) {
  const outline = getStrokeOutline(stroke);
  if (outline.length < 2) {
    return;
  }
  ctx.beginPath();
  ctx.moveTo(outline[0][0], outline[0][1]);
  for (let i = 1; i < outline.length; i++) {
    ctx.lineTo(outline[i][0], outline[i][1]);
  }
  ctx.closePath();
  ctx.fillStyle = toCssColor(resolveBrushColor(stroke.brush));
  ctx.fill();
}

export function drawTextField(
  ctx: DrawingContext,
  field: TextFieldState,
  handleConfig: HandleConfig = DEFAULT_HANDLE_CONFIG,
) {
  const { style, layout, position } = field;
  ctx.save();
  ctx.translate(position.x, position.y);

  if (field.hasFocus && field.hasSelection) {
    ctx.fillStyle = toCssColor(parseColor(style.selectionColor));
    getSelectionRects(layout, field.selection).forEach((rect) => {
      ctx.fillRect(rect.left, rect.top, rect.width, rect.height);
    });
  }

  ctx.font = toCssFont(style);
  ctx.textBaseline = "top";
  ctx.fillStyle = toCssColor(parseColor(style.color));
  // Center glyphs vertically within the row.
  const inset = (style.lineHeight - style.fontSize) / 2;
  layout.rows.forEach((row) => {
    const text = layout.text.slice(row.startOffset, row.endOffset);
    if (text.length > 0) {
      ctx.fillText(text, row.rect.left, row.rect.top + inset);
    }
  });

  const composition = field.composition;
  if (composition) {
    ctx.fillStyle = toCssColor(parseColor(style.color));
    getSelectionRects(layout, composition).forEach((rect) => {
      ctx.fillRect(
        rect.left,
        rect.top + rect.height - COMPOSITION_UNDERLINE_WIDTH,
        rect.width,
        COMPOSITION_UNDERLINE_WIDTH,
      );
    });
  }

  if (field.hasFocus && !field.hasSelection && field.cursorVisible) {
    const caret = field.getCursorRect(
      field.selection.start,
      handleConfig.cursorWidth,
    );
    ctx.fillStyle = toCssColor(parseColor(style.cursorColor));
    ctx.fillRect(caret.left, caret.top, caret.width, caret.height);
  }

  if (field.hasFocus) {
    const handleColor = toCssColor(parseColor(style.handleColor));
    getHandleShapes(field, handleConfig).forEach((shape) => {
      ctx.strokeStyle = handleColor;
      ctx.lineWidth = handleConfig.cursorWidth;
      ctx.beginPath();
      ctx.moveTo(shape.anchor.x, shape.anchor.y);
      ctx.lineTo(shape.circleCenter.x, shape.circleCenter.y);
      ctx.stroke();
      ctx.fillStyle = handleColor;
      ctx.beginPath();
      ctx.arc(
        shape.circleCenter.x,
        shape.circleCenter.y,
        handleConfig.radius,
        0,
        Math.PI * 2,
      );
      ctx.fill();
    });
  }

  ctx.restore();
}

/** Clears the surface and paints `elements` in the order given. */
export function renderSurface(
  ctx: DrawingContext,
  elements: readonly CanvasElement[],
  options: RenderOptions,
) {
  const handleConfig = options.handleConfig ?? DEFAULT_HANDLE_CONFIG;
  ctx.clearRect(0, 0, options.width, options.height);
  elements.forEach((element) => {
    visitElement(element, {
      stroke: (stroke) => drawStroke(ctx, stroke),
      textField: (field) => drawTextField(ctx, field, handleConfig),
    });
  });
  if (options.activeStroke) {
    drawStroke(ctx, options.activeStroke);
  }
}
