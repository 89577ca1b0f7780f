import type { HandleConfig, TextFieldStyle } from "../core/config";
import { CONTEXT_MENU_OFFSET, DEFAULT_HANDLE_CONFIG } from "../core/config";
import { selectedText, selectionMax, selectionMin } from "../core/text-value";
import type { DraggingHandle, Point } from "../core/types";
import { ZIndexCounter } from "../core/z-index-counter";
import type { ClipboardAdapter } from "../clipboard";
import { createMemoryClipboard } from "../clipboard";
import type { TextFieldRecord } from "../codec/text-field-codec";
import { decodeTextFields, encodeTextFields } from "../codec/text-field-codec";
import type { TextMeasurer } from "../engine/layout/text-measurer";
import { getWordBoundary } from "../engine/layout/text-layout";
import type { Unsubscribe } from "../shared/change-emitter";
import { ChangeEmitter } from "../shared/change-emitter";
import type { HandleHitResult } from "./handle-hit-tester";
import { hitTestHandles, sortTopmostFirst } from "./handle-hit-tester";
import type { ClipboardCommand, KeyBindingOptions, KeyCommand, KeyInput } from "./key-bindings";
import {
  applyEditCommand,
  isClipboardCommand,
  resolveKeyCommand,
} from "./key-bindings";
import { TextFieldState } from "./text-field-state";

export type ContextMenuAction = "cut" | "copy" | "paste" | "select-all";

export type ContextMenuState = {
  field: TextFieldState;
  /** Anchor in surface coordinates: the menu sits centered above it. */
  position: Point;
  actions: ContextMenuAction[];
};

export type FieldManagerOptions = {
  zIndexCounter?: ZIndexCounter;
  measurer?: TextMeasurer;
  style?: Partial<TextFieldStyle>;
  handleConfig?: Partial<HandleConfig>;
  clipboard?: ClipboardAdapter;
  keyBindings?: KeyBindingOptions;
  now?: () => number;
  /** Fields were added, removed, cleared, or an editing session ended. */
  onFieldsChange?: () => void;
};

export type LoadTextFieldsOptions = {
  resetZIndexCounter?: boolean;
};

export type TapOptions = {
  /** Create a focused field when the tap lands on empty surface. */
  createField?: boolean;
};

type ActiveDrag = {
  field: TextFieldState;
};

/**
 * Owns the text fields on a surface: creation order, single focus, hit
 * testing, gesture outcomes, the context menu and persistence.
 */
export class FieldManager {
  readonly zIndexCounter: ZIndexCounter;
  readonly handleConfig: HandleConfig;

  private textFields: TextFieldState[] = [];
  private focused: TextFieldState | null = null;
  private menu: ContextMenuState | null = null;
  private activeDrag: ActiveDrag | null = null;
  private clipboardHasText = false;
  private measurer: TextMeasurer | undefined;
  private readonly style: Partial<TextFieldStyle>;
  private readonly clipboard: ClipboardAdapter;
  private readonly keyBindings: KeyBindingOptions;
  private readonly now: () => number;
  private readonly emitter = new ChangeEmitter();
  private readonly fieldSubscriptions = new Map<TextFieldState, Unsubscribe>();
  private readonly onFieldsChange?: FieldManagerOptions["onFieldsChange"];

  constructor(options: FieldManagerOptions = {}) {
    this.zIndexCounter = options.zIndexCounter ?? new ZIndexCounter();
    this.handleConfig = { ...DEFAULT_HANDLE_CONFIG, ...options.handleConfig };
    this.measurer = options.measurer;
    this.style = options.style ?? {};
    this.clipboard = options.clipboard ?? createMemoryClipboard();
    this.keyBindings = options.keyBindings ?? {};
    this.now = options.now ?? Date.now;
    this.onFieldsChange = options.onFieldsChange;
  }

  get version(): number {
    return this.emitter.version;
  }

  subscribe(listener: () => void): Unsubscribe {
    return this.emitter.subscribe(listener);
  }

  get fields(): readonly TextFieldState[] {
    return this.textFields;
  }

  get focusedField(): TextFieldState | null {
    return this.focused;
  }

  get contextMenu(): ContextMenuState | null {
    return this.menu;
  }

  get isDraggingHandle(): boolean {
    return this.activeDrag !== null;
  }

  setMeasurer(measurer: TextMeasurer) {
    this.measurer = measurer;
    this.textFields.forEach((field) => field.setMeasurer(measurer));
  }

  // ============ Collection ============

  addTextField(position: Point, initialText = ""): TextFieldState {
    const field = this.createField({
      text: initialText,
      position,
      zIndex: this.zIndexCounter.next(),
      lastModified: this.now(),
    });
    this.attach(field);
    this.emitter.emit();
    this.notifyFieldsChanged();
    return field;
  }

  removeTextField(field: TextFieldState): boolean {
    const index = this.textFields.indexOf(field);
    if (index === -1) {
      return false;
    }
    if (this.focused === field) {
      this.dropFocus();
    }
    this.detach(field);
    this.textFields.splice(index, 1);
    this.emitter.emit();
    this.notifyFieldsChanged();
    return true;
  }

  clearTextFields() {
    this.clearAll();
    this.emitter.emit();
    this.notifyFieldsChanged();
  }

  /** Highest z-index first. */
  hitTest(point: Point): TextFieldState | null {
    return (
      sortTopmostFirst(this.textFields).find((field) =>
        field.containsPoint(point),
      ) ?? null
    );
  }

  hitTestHandle(point: Point): HandleHitResult | null {
    return hitTestHandles(this.textFields, point, this.handleConfig);
  }

  /** Raises the field above every other element on the surface. */
  bringToFront(field: TextFieldState) {
    if (!this.textFields.includes(field)) {
      return;
    }
    field.setZIndex(this.zIndexCounter.next());
  }

  // ============ Focus ============

  /**
   * Moves focus to `field` (or nowhere). Leaving a previously focused field
   * ends its editing session and reports the fields as changed.
   */
  requestFocus(field: TextFieldState | null) {
    if (field && !this.textFields.includes(field)) {
      return;
    }
    const previous = this.focused;
    if (previous) {
      previous.focusRequested = false;
    }
    this.focused = field;
    if (field) {
      field.focusRequested = true;
    }
    if (previous && previous !== field) {
      if (this.menu?.field === previous) {
        this.menu = null;
      }
      this.stopDragOf(previous);
      previous.setFocused(false);
    }
    field?.setFocused(true);
    this.emitter.emit();
    if (previous && previous !== field) {
      this.notifyFieldsChanged();
    }
  }

  clearFocus() {
    this.requestFocus(null);
  }

  // ============ Gesture outcomes ============

  /**
   * Single tap: focus the field under `point` and place the cursor there.
   * Returns false when no field was hit.
   */
  handleTap(point: Point, options: TapOptions = {}): boolean {
    this.hideContextMenu();
    const field = this.hitTest(point);
    if (!field) {
      this.clearFocus();
      if (options.createField) {
        const created = this.addTextField(point, "");
        this.requestFocus(created);
      }
      return false;
    }
    this.requestFocus(field);
    field.placeCursor(field.getOffsetForPosition(field.canvasToLocal(point)));
    field.setHandleState(field.text.length > 0 ? "cursor" : "none");
    return true;
  }

  handleDoubleTap(point: Point): boolean {
    return this.selectWordAtPoint(point);
  }

  handleLongPress(point: Point): boolean {
    return this.selectWordAtPoint(point);
  }

  private selectWordAtPoint(point: Point): boolean {
    const field = this.hitTest(point);
    if (!field) {
      return false;
    }
    this.requestFocus(field);
    const offset = field.getOffsetForPosition(field.canvasToLocal(point));
    const word = getWordBoundary(field.layout, offset);
    field.updateSelection(word);
    field.setHandleState(word.start === word.end ? "cursor" : "selection");
    this.showContextMenu(field);
    return true;
  }

  startHandleDrag(hit: HandleHitResult) {
    this.hideContextMenu();
    this.activeDrag = { field: hit.field };
    hit.field.startDraggingHandle(hit.handle);
  }

  updateHandleDrag(point: Point) {
    const field = this.activeDrag?.field;
    const handle: DraggingHandle | null | undefined = field?.draggingHandle;
    if (!field || !handle) {
      return;
    }
    const offset = field.getOffsetForPosition(field.canvasToLocal(point));
    switch (handle) {
      case "start":
        field.updateSelectionStart(offset);
        break;
      case "end":
        field.updateSelectionEnd(offset);
        break;
      case "cursor":
        field.placeCursor(offset);
        break;
    }
  }

  stopHandleDrag() {
    const drag = this.activeDrag;
    if (!drag) {
      return;
    }
    this.activeDrag = null;
    drag.field.stopDraggingHandle();
    if (drag.field.hasSelection && drag.field.hasFocus) {
      this.showContextMenu(drag.field);
    }
  }

  private stopDragOf(field: TextFieldState) {
    if (this.activeDrag?.field === field) {
      this.activeDrag = null;
      field.stopDraggingHandle();
    }
  }

  // ============ Context menu ============

  /**
   * Anchors the menu above the selection start (centered between the
   * selection ends) or above the cursor.
   */
  showContextMenu(field: TextFieldState) {
    if (!this.textFields.includes(field)) {
      return;
    }
    const cursorWidth = this.handleConfig.cursorWidth;
    let local: Point;
    if (field.hasSelection) {
      const startRect = field.getCursorRect(selectionMin(field.value), cursorWidth);
      const endRect = field.getCursorRect(selectionMax(field.value), cursorWidth);
      local = {
        x: (startRect.left + endRect.left) / 2,
        y: startRect.top - CONTEXT_MENU_OFFSET,
      };
    } else {
      const cursorRect = field.getCursorRect(field.selection.start, cursorWidth);
      local = { x: cursorRect.left, y: cursorRect.top - CONTEXT_MENU_OFFSET };
    }
    this.menu = {
      field,
      position: field.localToCanvas(local),
      actions: this.contextMenuActions(field),
    };
    this.emitter.emit();
  }

  hideContextMenu() {
    if (!this.menu) {
      return;
    }
    this.menu = null;
    this.emitter.emit();
  }

  private contextMenuActions(field: TextFieldState): ContextMenuAction[] {
    const actions: ContextMenuAction[] = [];
    if (field.hasSelection) {
      actions.push("cut", "copy");
    }
    if (this.clipboardHasText) {
      actions.push("paste");
    }
    actions.push("select-all");
    return actions;
  }

  /** Re-reads the clipboard so the menu can offer Paste. */
  async refreshClipboardState(): Promise<void> {
    const text = await this.clipboard.readText();
    const hasText = text.length > 0;
    if (hasText === this.clipboardHasText) {
      return;
    }
    this.clipboardHasText = hasText;
    if (this.menu) {
      this.menu = {
        ...this.menu,
        actions: this.contextMenuActions(this.menu.field),
      };
      this.emitter.emit();
    }
  }

  async performContextMenuAction(action: ContextMenuAction): Promise<boolean> {
    const field = this.menu?.field ?? this.focused;
    if (!field) {
      return false;
    }
    if (action === "select-all") {
      field.selectAll();
      field.setHandleState(field.hasSelection ? "selection" : "none");
      this.showContextMenu(field);
      return field.hasSelection;
    }
    this.hideContextMenu();
    return this.runClipboardCommand(action, field);
  }

  // ============ Keyboard & clipboard ============

  /**
   * Resolves and applies a key press against the focused field. Clipboard
   * commands are returned unapplied for the caller to run asynchronously.
   */
  handleKeyDown(event: KeyInput): KeyCommand | null {
    const field = this.focused;
    if (!field) {
      return null;
    }
    const command = resolveKeyCommand(event, this.keyBindings);
    if (!command) {
      return null;
    }
    const { type } = command;
    if (isClipboardCommand(type)) {
      return command;
    }
    this.hideContextMenu();
    applyEditCommand(field, { type, extend: command.extend });
    if (type === "select-all" && field.hasSelection) {
      field.setHandleState("selection");
    }
    return command;
  }

  async runClipboardCommand(
    command: ClipboardCommand,
    field: TextFieldState | null = this.focused,
  ): Promise<boolean> {
    if (!field) {
      return false;
    }
    switch (command) {
      case "copy": {
        const text = selectedText(field.value);
        if (!text) {
          return false;
        }
        await this.clipboard.writeText(text);
        this.clipboardHasText = true;
        return true;
      }
      case "cut": {
        const text = selectedText(field.value);
        if (!text) {
          return false;
        }
        await this.clipboard.writeText(text);
        this.clipboardHasText = true;
        return field.deleteSelection(false);
      }
      case "paste": {
        const text = await this.clipboard.readText();
        this.clipboardHasText = text.length > 0;
        if (!text) {
          return false;
        }
        field.insertText(text, false);
        return true;
      }
    }
  }

  // ============ Persistence ============

  toRecords(): TextFieldRecord[] {
    return this.textFields.map((field) => ({
      text: field.text,
      positionX: field.position.x,
      positionY: field.position.y,
      zIndex: field.zIndex,
      lastModified: field.lastModified,
    }));
  }

  serialize(): string {
    return encodeTextFields(this.toRecords());
  }

  /**
   * Replaces every field with the decoded ones. Blank input leaves the
   * collection untouched; malformed input empties it. Does not report the
   * fields as changed.
   */
  loadTextFields(json: string, options: LoadTextFieldsOptions = {}) {
    if (json.trim() === "") {
      return;
    }
    const records = decodeTextFields(json, { now: this.now });
    this.clearAll();
    records.forEach((record) => {
      this.attach(
        this.createField({
          text: record.text,
          position: { x: record.positionX, y: record.positionY },
          zIndex: record.zIndex,
          lastModified: record.lastModified,
        }),
      );
    });
    if (options.resetZIndexCounter) {
      const maxZ = records.reduce(
        (max, record) => Math.max(max, record.zIndex),
        -1,
      );
      this.zIndexCounter.reset(maxZ + 1);
    }
    this.emitter.emit();
  }

  // ============ Internals ============

  private createField(options: {
    text: string;
    position: Point;
    zIndex: number;
    lastModified: number;
  }): TextFieldState {
    return new TextFieldState({
      ...options,
      style: this.style,
      measurer: this.measurer,
      now: this.now,
    });
  }

  private attach(field: TextFieldState) {
    this.textFields.push(field);
    this.fieldSubscriptions.set(
      field,
      field.subscribe(() => this.emitter.emit()),
    );
  }

  private detach(field: TextFieldState) {
    this.fieldSubscriptions.get(field)?.();
    this.fieldSubscriptions.delete(field);
  }

  private dropFocus() {
    const previous = this.focused;
    this.focused = null;
    this.menu = null;
    if (previous) {
      this.stopDragOf(previous);
      previous.focusRequested = false;
      previous.setFocused(false);
    }
  }

  private clearAll() {
    this.dropFocus();
    this.textFields.forEach((field) => this.detach(field));
    this.textFields = [];
  }

  private notifyFieldsChanged() {
    this.onFieldsChange?.();
  }
}
