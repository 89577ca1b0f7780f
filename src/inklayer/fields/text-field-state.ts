import type { TextFieldStyle } from "../core/config";
import { resolveTextFieldStyle } from "../core/config";
import {
  collapsedRange,
  createTextValue,
  isCollapsed,
  selectionMax,
  textValuesEqual,
} from "../core/text-value";
import type {
  DraggingHandle,
  HandleState,
  LayoutRect,
  Point,
  TextRange,
  TextValue,
} from "../core/types";
import type { UndoManagerOptions } from "../core/undo-manager";
import { UndoManager } from "../core/undo-manager";
import * as selectionEngine from "../engine/selection/selection-engine";
import type { TextLayout } from "../engine/layout/text-layout";
import {
  getCursorRect,
  getOffsetForPosition,
  layoutText,
} from "../engine/layout/text-layout";
import type { TextMeasurer } from "../engine/layout/text-measurer";
import { createFixedWidthMeasurer } from "../engine/layout/text-measurer";
import type { Unsubscribe } from "../shared/change-emitter";
import { ChangeEmitter } from "../shared/change-emitter";

export type TextFieldStateOptions = {
  id?: string;
  text?: string;
  position?: Point;
  zIndex?: number;
  lastModified?: number;
  style?: Partial<TextFieldStyle>;
  measurer?: TextMeasurer;
  now?: () => number;
  undo?: UndoManagerOptions;
};

export type FieldSize = {
  width: number;
  height: number;
};

let nextFieldId = 1;

function createFieldId(): string {
  const id = `field-${nextFieldId}`;
  nextFieldId += 1;
  return id;
}

/**
 * Editable state of one text field on the surface. Content changes go
 * through the methods below so that undo recording, layout invalidation and
 * change notification stay in step.
 */
export class TextFieldState {
  readonly id: string;
  readonly undoManager: UndoManager;

  private currentValue: TextValue;
  private currentPosition: Point;
  private currentZIndex: number;
  private modifiedAt: number;
  private currentStyle: TextFieldStyle;
  private measurer: TextMeasurer;
  private layoutCache: TextLayout | null = null;
  // Value before the active composition began; committed as one undo step.
  private compositionBase: TextValue | null = null;
  private readonly now: () => number;
  private readonly emitter = new ChangeEmitter();

  private focused = false;
  private currentHandleState: HandleState = "none";
  private currentDraggingHandle: DraggingHandle | null = null;
  private caretVisible = true;

  focusRequested = false;

  constructor(options: TextFieldStateOptions = {}) {
    this.id = options.id ?? createFieldId();
    this.now = options.now ?? Date.now;
    this.currentValue = createTextValue(options.text ?? "");
    this.currentPosition = options.position ?? { x: 0, y: 0 };
    this.currentZIndex = options.zIndex ?? 0;
    this.modifiedAt = options.lastModified ?? this.now();
    this.currentStyle = resolveTextFieldStyle(options.style);
    this.measurer = options.measurer ?? createFixedWidthMeasurer();
    this.undoManager = new UndoManager({ now: this.now, ...options.undo });
  }

  // ============ Observation ============

  get version(): number {
    return this.emitter.version;
  }

  subscribe(listener: () => void): Unsubscribe {
    return this.emitter.subscribe(listener);
  }

  // ============ Accessors ============

  get value(): TextValue {
    return this.currentValue;
  }

  get text(): string {
    return this.currentValue.text;
  }

  get selection(): TextRange {
    return this.currentValue.selection;
  }

  get hasSelection(): boolean {
    return !isCollapsed(this.currentValue);
  }

  get composition(): TextRange | null {
    return this.currentValue.composition;
  }

  get position(): Point {
    return this.currentPosition;
  }

  get zIndex(): number {
    return this.currentZIndex;
  }

  get lastModified(): number {
    return this.modifiedAt;
  }

  get style(): TextFieldStyle {
    return this.currentStyle;
  }

  get hasFocus(): boolean {
    return this.focused;
  }

  get handleState(): HandleState {
    return this.currentHandleState;
  }

  get draggingHandle(): DraggingHandle | null {
    return this.currentDraggingHandle;
  }

  get cursorVisible(): boolean {
    return this.caretVisible;
  }

  // ============ Placement & style ============

  moveTo(position: Point) {
    if (
      position.x === this.currentPosition.x &&
      position.y === this.currentPosition.y
    ) {
      return;
    }
    this.currentPosition = { x: position.x, y: position.y };
    this.modifiedAt = this.now();
    this.emitter.emit();
  }

  setZIndex(zIndex: number) {
    this.currentZIndex = zIndex;
    this.modifiedAt = this.now();
    this.emitter.emit();
  }

  setStyle(style: Partial<TextFieldStyle>) {
    this.currentStyle = { ...this.currentStyle, ...style };
    this.layoutCache = null;
    this.emitter.emit();
  }

  setMeasurer(measurer: TextMeasurer) {
    if (measurer === this.measurer) {
      return;
    }
    this.measurer = measurer;
    this.layoutCache = null;
    this.emitter.emit();
  }

  // ============ Layout ============

  get layout(): TextLayout {
    if (!this.layoutCache) {
      this.layoutCache = layoutText(
        this.currentValue.text,
        this.currentStyle,
        this.measurer,
      );
    }
    return this.layoutCache;
  }

  get size(): FieldSize {
    const layout = this.layout;
    return {
      width: Math.max(layout.width, this.currentStyle.minWidth),
      height: Math.max(layout.height, this.currentStyle.minHeight),
    };
  }

  /** Field bounds in surface coordinates. */
  get bounds(): LayoutRect {
    const size = this.size;
    return {
      top: this.currentPosition.y,
      left: this.currentPosition.x,
      width: size.width,
      height: size.height,
    };
  }

  containsPoint(point: Point): boolean {
    const bounds = this.bounds;
    return (
      point.x >= bounds.left &&
      point.x <= bounds.left + bounds.width &&
      point.y >= bounds.top &&
      point.y <= bounds.top + bounds.height
    );
  }

  canvasToLocal(point: Point): Point {
    return {
      x: point.x - this.currentPosition.x,
      y: point.y - this.currentPosition.y,
    };
  }

  localToCanvas(point: Point): Point {
    return {
      x: point.x + this.currentPosition.x,
      y: point.y + this.currentPosition.y,
    };
  }

  getOffsetForPosition(localPoint: Point): number {
    return getOffsetForPosition(this.layout, localPoint);
  }

  /** Cursor rectangle in field-local coordinates. */
  getCursorRect(offset: number, cursorWidth = 2): LayoutRect {
    return getCursorRect(this.layout, offset, cursorWidth);
  }

  // ============ Focus & handles ============

  setFocused(focused: boolean) {
    if (this.focused === focused) {
      return;
    }
    this.focused = focused;
    this.caretVisible = true;
    if (!focused) {
      this.focusRequested = false;
      this.currentHandleState = "none";
      this.currentDraggingHandle = null;
      const committed = this.commitPendingComposition();
      this.currentValue = {
        ...committed,
        selection: collapsedRange(selectionMax(committed)),
      };
      this.undoManager.clear();
    }
    this.emitter.emit();
  }

  setHandleState(state: HandleState) {
    if (this.currentHandleState === state) {
      return;
    }
    this.currentHandleState = state;
    this.emitter.emit();
  }

  startDraggingHandle(handle: DraggingHandle) {
    this.currentDraggingHandle = handle;
    this.emitter.emit();
  }

  stopDraggingHandle() {
    if (this.currentDraggingHandle === null) {
      return;
    }
    this.currentDraggingHandle = null;
    this.emitter.emit();
  }

  toggleCursorVisible() {
    this.caretVisible = !this.caretVisible;
    this.emitter.emit();
  }

  showCursor() {
    if (this.caretVisible) {
      return;
    }
    this.caretVisible = true;
    this.emitter.emit();
  }

  // ============ Selection ============

  updateValue(value: TextValue) {
    this.commit(value, null);
  }

  updateSelection(selection: TextRange) {
    this.commit(
      createTextValue(this.currentValue.text, selection, this.composition),
      null,
    );
  }

  placeCursor(offset: number) {
    this.commit(selectionEngine.placeCursor(this.currentValue, offset), null);
  }

  /**
   * Moves the start handle. Crossing the end swaps which handle is being
   * dragged; meeting it collapses the selection to a cursor.
   */
  updateSelectionStart(offset: number) {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    const anchor = selectionMax(this.currentValue);
    if (clamped > anchor) {
      this.currentDraggingHandle = "end";
      this.updateSelection({ start: anchor, end: clamped });
    } else if (clamped === anchor) {
      this.currentHandleState = "cursor";
      this.currentDraggingHandle = "cursor";
      this.updateSelection(collapsedRange(clamped));
    } else {
      this.updateSelection({ start: clamped, end: anchor });
    }
  }

  updateSelectionEnd(offset: number) {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    const anchor = Math.min(this.selection.start, this.selection.end);
    if (clamped < anchor) {
      this.currentDraggingHandle = "start";
      this.updateSelection({ start: clamped, end: anchor });
    } else if (clamped === anchor) {
      this.currentHandleState = "cursor";
      this.currentDraggingHandle = "cursor";
      this.updateSelection(collapsedRange(clamped));
    } else {
      this.updateSelection({ start: anchor, end: clamped });
    }
  }

  selectAll() {
    this.commit(selectionEngine.selectAll(this.currentValue), null);
  }

  clearSelection() {
    if (!this.hasSelection) {
      return;
    }
    this.commit(selectionEngine.clearSelection(this.currentValue), null);
  }

  selectWordAt(offset: number) {
    this.commit(selectionEngine.selectWordAt(this.currentValue, offset), null);
  }

  moveCursorLeft(extendSelection = false) {
    this.commit(selectionEngine.moveLeft(this.currentValue, extendSelection), null);
  }

  moveCursorRight(extendSelection = false) {
    this.commit(
      selectionEngine.moveRight(this.currentValue, extendSelection),
      null,
    );
  }

  moveCursorLeftByWord(extendSelection = false) {
    this.commit(
      selectionEngine.moveByWord(this.currentValue, "backward", extendSelection),
      null,
    );
  }

  moveCursorRightByWord(extendSelection = false) {
    this.commit(
      selectionEngine.moveByWord(this.currentValue, "forward", extendSelection),
      null,
    );
  }

  moveCursorToStart(extendSelection = false) {
    this.commit(
      selectionEngine.moveToStart(this.currentValue, extendSelection),
      null,
    );
  }

  moveCursorToEnd(extendSelection = false) {
    this.commit(
      selectionEngine.moveToEnd(this.currentValue, extendSelection),
      null,
    );
  }

  // ============ Editing ============

  /**
   * Replaces the selection with `text`. Pass `allowMerge = false` for pastes
   * so they undo as their own step.
   */
  insertText(text: string, allowMerge = true) {
    const base = this.commitPendingComposition();
    this.commit(selectionEngine.insertText(base, text), { allowMerge });
  }

  deleteBackward(): boolean {
    return this.applyEdit(selectionEngine.deleteBackward, true);
  }

  deleteForward(): boolean {
    return this.applyEdit(selectionEngine.deleteForward, true);
  }

  deleteWordBackward(): boolean {
    return this.applyEdit(selectionEngine.deleteWordBackward, false);
  }

  deleteToLineStart(): boolean {
    return this.applyEdit(selectionEngine.deleteToLineStart, false);
  }

  deleteSelection(allowMerge = true): boolean {
    return this.applyEdit(selectionEngine.deleteSelection, allowMerge);
  }

  /** Replaces the whole text as one undo step and puts the cursor at the end. */
  setText(text: string) {
    this.commit(createTextValue(text), { allowMerge: false });
  }

  undo(): boolean {
    const restored = this.undoManager.undo(this.currentValue, (value) =>
      this.commit(value, { allowMerge: false }),
    );
    return restored !== null;
  }

  redo(): boolean {
    const restored = this.undoManager.redo(this.currentValue, (value) =>
      this.commit(value, { allowMerge: false }),
    );
    return restored !== null;
  }

  // ============ Composition ============

  setComposingText(text: string) {
    if (this.compositionBase === null) {
      this.compositionBase = this.currentValue;
    }
    this.commit(selectionEngine.setComposingText(this.currentValue, text), null);
  }

  setComposingRegion(start: number, end: number) {
    if (this.compositionBase === null) {
      this.compositionBase = this.currentValue;
    }
    this.commit(
      selectionEngine.setComposingRegion(this.currentValue, start, end),
      null,
    );
  }

  /** Ends the composition, recording everything it typed as one undo step. */
  commitComposition() {
    const base = this.compositionBase;
    this.compositionBase = null;
    const committed = selectionEngine.finishComposing(this.currentValue);
    this.commit(committed, null);
    if (base !== null) {
      this.undoManager.recordChange(base, committed, false);
    }
  }

  private commitPendingComposition(): TextValue {
    if (this.currentValue.composition === null && this.compositionBase === null) {
      return this.currentValue;
    }
    this.commitComposition();
    return this.currentValue;
  }

  private applyEdit(
    operation: (value: TextValue) => TextValue | null,
    allowMerge: boolean,
  ): boolean {
    const base = this.commitPendingComposition();
    const next = operation(base);
    if (next === null) {
      return false;
    }
    this.commit(next, { allowMerge });
    return true;
  }

  private commit(next: TextValue, record: { allowMerge: boolean } | null) {
    const previous = this.currentValue;
    if (textValuesEqual(previous, next)) {
      return;
    }
    this.currentValue = next;
    if (previous.text !== next.text) {
      this.layoutCache = null;
      this.modifiedAt = this.now();
      if (record) {
        this.undoManager.recordChange(previous, next, record.allowMerge);
      }
    }
    this.syncHandleState();
    this.caretVisible = true;
    this.emitter.emit();
  }

  private syncHandleState() {
    if (this.currentHandleState === "selection" && !this.hasSelection) {
      this.currentHandleState = this.text.length > 0 ? "cursor" : "none";
    } else if (this.currentHandleState === "cursor" && this.text.length === 0) {
      this.currentHandleState = "none";
    }
  }
}
