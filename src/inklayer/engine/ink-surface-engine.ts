import type { GestureConfig, HandleConfig, TextFieldStyle } from "../core/config";
import { CURSOR_BLINK_INTERVAL_MS } from "../core/config";
import type { EditorMode, Point } from "../core/types";
import { ZIndexCounter } from "../core/z-index-counter";
import type { ClipboardAdapter } from "../clipboard";
import { createStrokeId, decodeStrokes, encodeStrokes } from "../codec/stroke-codec";
import type {
  ContextMenuAction,
  ContextMenuState,
  LoadTextFieldsOptions,
} from "../fields/field-manager";
import { FieldManager } from "../fields/field-manager";
import type { ClipboardCommand, KeyBindingOptions, KeyInput } from "../fields/key-bindings";
import { isClipboardCommand } from "../fields/key-bindings";
import type { TextFieldState } from "../fields/text-field-state";
import type { GestureTarget, Scheduler } from "../gestures/gesture-classifier";
import { GestureClassifier } from "../gestures/gesture-classifier";
import type { Unsubscribe } from "../shared/change-emitter";
import { ChangeEmitter } from "../shared/change-emitter";
import { createBrush, toolTypeFromPointer } from "../strokes/brush";
import type { Brush, Stroke, StrokeInput } from "../strokes/types";
import type { CanvasElement } from "./element-compositor";
import { composeElements } from "./element-compositor";
import type { TextMeasurer } from "./layout/text-measurer";

/** A pointer event reduced to what the surface needs, in surface coordinates. */
export type SurfacePointer = {
  pointerId: number;
  pointerType: string;
  x: number;
  y: number;
  /** 0..1; devices without pressure report 0.5 while pressed. */
  pressure: number;
  timeStamp: number;
  /** Degrees, as `PointerEvent.tiltX` / `tiltY` report them. */
  tiltX?: number;
  tiltY?: number;
};

export type InkSurfaceEngineOptions = {
  mode?: EditorMode;
  brush?: Partial<Brush>;
  /** Serialized strokes to start with. */
  strokes?: string;
  /** Serialized text fields to start with. */
  textFields?: string;
  gestureConfig?: Partial<GestureConfig>;
  handleConfig?: Partial<HandleConfig>;
  textFieldStyle?: Partial<TextFieldStyle>;
  measurer?: TextMeasurer;
  clipboard?: ClipboardAdapter;
  keyBindings?: KeyBindingOptions;
  now?: () => number;
  scheduler?: Scheduler;
  /** Trace gesture classification to the console. */
  debug?: boolean;
  onStrokesChange?: (serializedStrokes: string) => void;
  onTextFieldsChange?: (serializedTextFields: string) => void;
};

type ActiveStroke = {
  pointerId: number;
  startTime: number;
  stroke: Stroke;
};

// CSS pixels are 1/96 inch.
const CSS_PIXEL_CM = 2.54 / 96;
const DEFAULT_PRESSURE = 0.5;

function degreesToRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

function toStrokeInput(pointer: SurfacePointer, startTime: number): StrokeInput {
  const tiltX = degreesToRadians(pointer.tiltX ?? 0);
  const tiltY = degreesToRadians(pointer.tiltY ?? 0);
  return {
    x: pointer.x,
    y: pointer.y,
    timeMillis: Math.max(0, pointer.timeStamp - startTime),
    pressure: pointer.pressure > 0 ? Math.min(1, pointer.pressure) : DEFAULT_PRESSURE,
    tiltRadians: Math.min(Math.PI / 2, Math.hypot(tiltX, tiltY)),
    orientationRadians: Math.atan2(tiltY, tiltX),
  };
}

/**
 * Headless core of an annotation surface: routes pointer input to stroke
 * authoring or text-field gestures depending on the mode, keeps strokes and
 * fields on one z-index counter, and exposes the host commands.
 */
export class InkSurfaceEngine {
  readonly fieldManager: FieldManager;
  readonly zIndexCounter = new ZIndexCounter();

  private currentMode: EditorMode;
  private currentBrush: Brush;
  private strokeList: Stroke[] = [];
  private activeStroke: ActiveStroke | null = null;
  private blinkTimer: ReturnType<typeof setInterval> | null = null;
  private readonly gestures: GestureClassifier;
  private readonly emitter = new ChangeEmitter();
  private readonly unsubscribeFields: Unsubscribe;
  private readonly now: () => number;
  private readonly debug: boolean;
  private readonly onStrokesChange?: InkSurfaceEngineOptions["onStrokesChange"];
  private readonly onTextFieldsChange?: InkSurfaceEngineOptions["onTextFieldsChange"];

  constructor(options: InkSurfaceEngineOptions = {}) {
    this.currentMode = options.mode ?? null;
    this.currentBrush = createBrush(options.brush);
    this.now = options.now ?? Date.now;
    this.debug = options.debug ?? false;
    this.onStrokesChange = options.onStrokesChange;
    this.onTextFieldsChange = options.onTextFieldsChange;

    this.fieldManager = new FieldManager({
      zIndexCounter: this.zIndexCounter,
      measurer: options.measurer,
      style: options.textFieldStyle,
      handleConfig: options.handleConfig,
      clipboard: options.clipboard,
      keyBindings: options.keyBindings,
      now: this.now,
      onFieldsChange: () => {
        this.onTextFieldsChange?.(this.getSerializedTextFields());
      },
    });
    this.gestures = new GestureClassifier(this.createGestureTarget(), {
      config: options.gestureConfig,
      scheduler: options.scheduler,
      log: this.debug ? (message) => console.log(message) : undefined,
    });
    this.unsubscribeFields = this.fieldManager.subscribe(() => {
      this.syncCursorBlink();
      this.emitter.emit();
    });

    if (options.strokes) {
      this.loadStrokes(options.strokes);
    }
    if (options.textFields) {
      this.loadTextFields(options.textFields, { resetZIndexCounter: true });
    }
  }

  destroy() {
    this.gestures.cancel();
    this.stopCursorBlink();
    this.unsubscribeFields();
  }

  // ============ Observation ============

  get version(): number {
    return this.emitter.version;
  }

  subscribe(listener: () => void): Unsubscribe {
    return this.emitter.subscribe(listener);
  }

  // ============ State ============

  get mode(): EditorMode {
    return this.currentMode;
  }

  /** Switching modes abandons any gesture or stroke in progress and clears focus. */
  setMode(mode: EditorMode) {
    if (mode === this.currentMode) {
      return;
    }
    this.currentMode = mode;
    this.gestures.cancel();
    this.activeStroke = null;
    this.fieldManager.hideContextMenu();
    this.fieldManager.clearFocus();
    this.emitter.emit();
  }

  get brush(): Brush {
    return this.currentBrush;
  }

  setBrush(brush: Partial<Brush>) {
    this.currentBrush = createBrush({ ...this.currentBrush, ...brush });
    this.emitter.emit();
  }

  get strokes(): readonly Stroke[] {
    return this.strokeList;
  }

  get textFields(): readonly TextFieldState[] {
    return this.fieldManager.fields;
  }

  get focusedField(): TextFieldState | null {
    return this.fieldManager.focusedField;
  }

  get contextMenu(): ContextMenuState | null {
    return this.fieldManager.contextMenu;
  }

  get strokeInProgress(): Stroke | null {
    return this.activeStroke?.stroke ?? null;
  }

  /** Committed strokes and fields in paint order. */
  getElements(): CanvasElement[] {
    return composeElements(this.strokeList, this.fieldManager.fields);
  }

  setMeasurer(measurer: TextMeasurer) {
    this.fieldManager.setMeasurer(measurer);
    this.emitter.emit();
  }

  // ============ Pointer input ============

  pointerDown(pointer: SurfacePointer) {
    switch (this.currentMode) {
      case "draw":
        this.beginStroke(pointer);
        return;
      case "text":
        this.gestures.pointerDown(pointer.pointerId, this.pointOf(pointer));
        return;
      case null:
        return;
    }
  }

  pointerMove(pointer: SurfacePointer) {
    switch (this.currentMode) {
      case "draw":
        this.extendStroke(pointer);
        return;
      case "text":
        this.gestures.pointerMove(pointer.pointerId, this.pointOf(pointer));
        return;
      case null:
        return;
    }
  }

  pointerUp(pointer: SurfacePointer) {
    switch (this.currentMode) {
      case "draw":
        this.extendStroke(pointer);
        this.finishStroke(pointer.pointerId);
        return;
      case "text":
        this.gestures.pointerUp(pointer.pointerId, this.pointOf(pointer));
        return;
      case null:
        return;
    }
  }

  pointerCancel(pointerId: number) {
    if (this.activeStroke?.pointerId === pointerId) {
      this.activeStroke = null;
      this.emitter.emit();
    }
    this.gestures.pointerCancel(pointerId);
  }

  private pointOf(pointer: SurfacePointer): Point {
    return { x: pointer.x, y: pointer.y };
  }

  private beginStroke(pointer: SurfacePointer) {
    if (this.activeStroke) {
      return;
    }
    this.activeStroke = {
      pointerId: pointer.pointerId,
      startTime: pointer.timeStamp,
      stroke: {
        id: createStrokeId(),
        inputs: {
          toolType: toolTypeFromPointer(pointer.pointerType),
          strokeUnitLengthCm: CSS_PIXEL_CM,
          inputs: [toStrokeInput(pointer, pointer.timeStamp)],
        },
        brush: this.currentBrush,
        zIndex: this.zIndexCounter.current(),
        lastModified: this.now(),
      },
    };
    this.emitter.emit();
  }

  private extendStroke(pointer: SurfacePointer) {
    const active = this.activeStroke;
    if (!active || active.pointerId !== pointer.pointerId) {
      return;
    }
    const inputs = active.stroke.inputs.inputs;
    const last = inputs[inputs.length - 1];
    const distance = Math.hypot(pointer.x - last.x, pointer.y - last.y);
    if (distance < active.stroke.brush.epsilon) {
      return;
    }
    inputs.push(toStrokeInput(pointer, active.startTime));
    this.emitter.emit();
  }

  private finishStroke(pointerId: number) {
    const active = this.activeStroke;
    if (!active || active.pointerId !== pointerId) {
      return;
    }
    this.activeStroke = null;
    this.strokeList = [
      ...this.strokeList,
      {
        ...active.stroke,
        zIndex: this.zIndexCounter.next(),
        lastModified: this.now(),
      },
    ];
    this.emitter.emit();
    this.notifyStrokesChanged();
  }

  private createGestureTarget(): GestureTarget {
    const fields = this.fieldManager;
    return {
      hitTestHandle: (point) => fields.hitTestHandle(point),
      startHandleDrag: (hit) => fields.startHandleDrag(hit),
      updateHandleDrag: (point) => fields.updateHandleDrag(point),
      stopHandleDrag: () => fields.stopHandleDrag(),
      handleTap: (point) => {
        fields.handleTap(point, { createField: this.currentMode === "text" });
      },
      handleDoubleTap: (point) => {
        if (fields.handleDoubleTap(point)) {
          this.refreshClipboardState();
        }
      },
      handleLongPress: (point) => {
        if (fields.handleLongPress(point)) {
          this.refreshClipboardState();
        }
      },
    };
  }

  // ============ Text input ============

  /** Returns true when the key was consumed by the focused field. */
  handleKeyDown(event: KeyInput): boolean {
    const command = this.fieldManager.handleKeyDown(event);
    if (!command) {
      return false;
    }
    if (isClipboardCommand(command.type)) {
      this.runClipboardCommand(command.type);
    }
    return true;
  }

  insertText(text: string): boolean {
    const field = this.fieldManager.focusedField;
    if (!field || text.length === 0) {
      return false;
    }
    this.fieldManager.hideContextMenu();
    field.insertText(text);
    return true;
  }

  setComposingText(text: string) {
    const field = this.fieldManager.focusedField;
    if (!field) {
      return;
    }
    this.fieldManager.hideContextMenu();
    field.setComposingText(text);
  }

  commitComposition() {
    this.fieldManager.focusedField?.commitComposition();
  }

  undo(): boolean {
    return this.fieldManager.focusedField?.undo() ?? false;
  }

  redo(): boolean {
    return this.fieldManager.focusedField?.redo() ?? false;
  }

  performContextMenuAction(action: ContextMenuAction): Promise<boolean> {
    return this.fieldManager.performContextMenuAction(action);
  }

  private runClipboardCommand(command: ClipboardCommand) {
    this.fieldManager
      .runClipboardCommand(command)
      .then(() => this.refreshClipboardState())
      .catch((error: unknown) => {
        console.warn(`[inklayer] Clipboard ${command} failed:`, error);
      });
  }

  private refreshClipboardState() {
    this.fieldManager.refreshClipboardState().catch((error: unknown) => {
      console.warn("[inklayer] Could not read the clipboard:", error);
    });
  }

  // ============ Cursor blink ============

  private syncCursorBlink() {
    const focused = this.fieldManager.focusedField;
    if (!focused) {
      this.stopCursorBlink();
      return;
    }
    if (this.blinkTimer !== null) {
      return;
    }
    this.blinkTimer = setInterval(() => {
      const field = this.fieldManager.focusedField;
      if (field && !field.hasSelection) {
        field.toggleCursorVisible();
      }
    }, CURSOR_BLINK_INTERVAL_MS);
  }

  private stopCursorBlink() {
    if (this.blinkTimer !== null) {
      clearInterval(this.blinkTimer);
      this.blinkTimer = null;
    }
  }

  // ============ Host commands ============

  /** Removes every stroke and text field and reports both as changed. */
  clear() {
    this.gestures.cancel();
    this.activeStroke = null;
    this.strokeList = [];
    this.fieldManager.clearTextFields();
    this.emitter.emit();
    this.notifyStrokesChanged();
  }

  /** Replaces all strokes. Does not report the strokes as changed. */
  loadStrokes(json: string) {
    this.strokeList = decodeStrokes(json);
    this.strokeList.forEach((stroke) => this.zIndexCounter.ensureAbove(stroke.zIndex));
    this.emitter.emit();
  }

  loadTextFields(json: string, options: LoadTextFieldsOptions = {}) {
    this.fieldManager.loadTextFields(json, options);
    // A counter reset must not fall below strokes already on the surface.
    this.strokeList.forEach((stroke) => this.zIndexCounter.ensureAbove(stroke.zIndex));
  }

  getSerializedStrokes(): string {
    return encodeStrokes(this.strokeList);
  }

  getSerializedTextFields(): string {
    return this.fieldManager.serialize();
  }

  private notifyStrokesChanged() {
    this.onStrokesChange?.(this.getSerializedStrokes());
  }
}
