export { InkSurface, TextFieldContextMenu } from "./react";
export type {
  InkSurfaceProps,
  InkSurfaceRef,
  TextFieldContextMenuProps,
} from "./react";

export { InkSurfaceEngine } from "./engine/ink-surface-engine";
export type {
  InkSurfaceEngineOptions,
  SurfacePointer,
} from "./engine/ink-surface-engine";
export { SurfaceView } from "./dom/surface-view";

export { FieldManager } from "./fields/field-manager";
export type {
  ContextMenuAction,
  ContextMenuState,
  FieldManagerOptions,
  LoadTextFieldsOptions,
} from "./fields/field-manager";
export { TextFieldState } from "./fields/text-field-state";
export type { TextFieldStateOptions } from "./fields/text-field-state";
export { hitTestHandles } from "./fields/handle-hit-tester";
export type { HandleHitResult } from "./fields/handle-hit-tester";
export { GestureClassifier } from "./gestures/gesture-classifier";
export type {
  GestureClassifierOptions,
  GestureTarget,
  Scheduler,
} from "./gestures/gesture-classifier";

export { composeElements, visitElement } from "./engine/element-compositor";
export type {
  CanvasElement,
  CanvasElementVisitor,
} from "./engine/element-compositor";
export { renderSurface } from "./engine/canvas-renderer";
export type { DrawingContext, RenderOptions } from "./engine/canvas-renderer";
export {
  createCanvasTextMeasurer,
  createFixedWidthMeasurer,
} from "./engine/layout/text-measurer";
export type { TextMeasurer } from "./engine/layout/text-measurer";

export { decodeStrokes, encodeStrokes } from "./codec/stroke-codec";
export type { StrokeRecord } from "./codec/stroke-codec";
export { decodeTextFields, encodeTextFields } from "./codec/text-field-codec";
export type { TextFieldRecord } from "./codec/text-field-codec";
export { MalformedRecordError } from "./codec/guards";

export { UndoManager } from "./core/undo-manager";
export { ZIndexCounter } from "./core/z-index-counter";
export {
  DEFAULT_GESTURE_CONFIG,
  DEFAULT_HANDLE_CONFIG,
  DEFAULT_TEXT_FIELD_STYLE,
} from "./core/config";
export type { GestureConfig, HandleConfig, TextFieldStyle } from "./core/config";
export type {
  DraggingHandle,
  EditorMode,
  HandleState,
  LayoutRect,
  Point,
  TextRange,
  TextValue,
} from "./core/types";

export { BRUSH_FAMILIES, DEFAULT_BRUSH, createBrush } from "./strokes/brush";
export type {
  Brush,
  BrushFamily,
  Stroke,
  StrokeInput,
  StrokeInputBatch,
  ToolType,
} from "./strokes/types";
export { createBrowserClipboard, createMemoryClipboard } from "./clipboard";
export type { ClipboardAdapter } from "./clipboard";
