import { describe, expect, it, vi } from "vitest";
import { TextFieldState } from "./text-field-state";

function createField(text = "", now: () => number = () => 1000) {
  return new TextFieldState({ text, position: { x: 50, y: 80 }, now });
}

describe("TextFieldState: editing and history", () => {
  it("undoes and redoes a non-merged insert after a word move", () => {
    const field = createField();

    field.insertText("Hello");
    expect(field.text).toBe("Hello");
    expect(field.selection).toEqual({ start: 5, end: 5 });

    field.moveCursorLeftByWord();
    expect(field.selection).toEqual({ start: 0, end: 0 });

    field.insertText("Say ", false);
    expect(field.text).toBe("Say Hello");
    expect(field.selection).toEqual({ start: 4, end: 4 });

    expect(field.undo()).toBe(true);
    expect(field.text).toBe("Hello");
    expect(field.selection).toEqual({ start: 0, end: 0 });

    expect(field.redo()).toBe(true);
    expect(field.text).toBe("Say Hello");
    expect(field.selection).toEqual({ start: 4, end: 4 });
  });

  it("merges keystrokes typed in one run into a single undo step", () => {
    const field = createField();
    field.insertText("a");
    field.insertText("b");
    field.insertText("c");

    expect(field.undo()).toBe(true);
    expect(field.text).toBe("");
    expect(field.undo()).toBe(false);
  });

  it("reports no-op deletions", () => {
    const field = createField("ab");
    field.placeCursor(0);
    expect(field.deleteBackward()).toBe(false);
    field.placeCursor(2);
    expect(field.deleteForward()).toBe(false);
    expect(field.deleteBackward()).toBe(true);
    expect(field.text).toBe("a");
  });

  it("records word and line deletions as their own steps", () => {
    const field = createField();
    field.insertText("one two");
    field.deleteWordBackward();
    expect(field.text).toBe("one ");
    field.undo();
    expect(field.text).toBe("one two");
  });

  it("updates lastModified only when the text changes", () => {
    let time = 1000;
    const field = createField("", () => time);
    time = 2000;
    field.placeCursor(0);
    expect(field.lastModified).toBe(1000);
    field.insertText("x");
    expect(field.lastModified).toBe(2000);
  });

  it("notifies subscribers and bumps the version on change", () => {
    const field = createField();
    const listener = vi.fn();
    field.subscribe(listener);
    const version = field.version;
    field.insertText("x");
    expect(listener).toHaveBeenCalledTimes(1);
    expect(field.version).toBe(version + 1);
  });
});

describe("TextFieldState: handle dragging", () => {
  it("swaps to the end handle when the start handle crosses it", () => {
    const field = createField("hello world");
    field.updateSelection({ start: 2, end: 5 });
    field.setHandleState("selection");
    field.startDraggingHandle("start");

    field.updateSelectionStart(8);

    expect(field.selection).toEqual({ start: 5, end: 8 });
    expect(field.draggingHandle).toBe("end");
    expect(field.handleState).toBe("selection");
  });

  it("swaps to the start handle when the end handle crosses it", () => {
    const field = createField("hello world");
    field.updateSelection({ start: 4, end: 7 });
    field.setHandleState("selection");
    field.startDraggingHandle("end");

    field.updateSelectionEnd(1);

    expect(field.selection).toEqual({ start: 1, end: 4 });
    expect(field.draggingHandle).toBe("start");
  });

  it("collapses to a cursor handle when both ends meet", () => {
    const field = createField("hello world");
    field.updateSelection({ start: 2, end: 5 });
    field.setHandleState("selection");
    field.startDraggingHandle("start");

    field.updateSelectionStart(5);

    expect(field.selection).toEqual({ start: 5, end: 5 });
    expect(field.handleState).toBe("cursor");
    expect(field.draggingHandle).toBe("cursor");
  });

  it("clamps handle offsets into the text", () => {
    const field = createField("abc");
    field.updateSelection({ start: 0, end: 1 });
    field.updateSelectionEnd(40);
    expect(field.selection).toEqual({ start: 0, end: 3 });
  });
});

describe("TextFieldState: focus", () => {
  it("hides handles, collapses the selection and forgets history on blur", () => {
    const field = createField();
    field.setFocused(true);
    field.insertText("hello");
    field.updateSelection({ start: 1, end: 3 });
    field.setHandleState("selection");

    field.setFocused(false);

    expect(field.handleState).toBe("none");
    expect(field.selection).toEqual({ start: 3, end: 3 });
    expect(field.undoManager.canUndo).toBe(false);
  });
});

describe("TextFieldState: composition", () => {
  it("commits composing text as one undo step", () => {
    const field = createField("a");
    field.setComposingText("k");
    field.setComposingText("ka");
    expect(field.text).toBe("aka");
    expect(field.composition).toEqual({ start: 1, end: 3 });

    field.commitComposition();
    expect(field.composition).toBeNull();

    field.undo();
    expect(field.text).toBe("a");
  });

  it("commits a pending composition before inserting", () => {
    const field = createField();
    field.setComposingText("ni");
    field.insertText("!");
    expect(field.text).toBe("ni!");
    expect(field.composition).toBeNull();
  });
});

describe("TextFieldState: geometry", () => {
  it("keeps bounds at least the minimum field size", () => {
    const field = createField("hi");
    expect(field.bounds).toEqual({ top: 80, left: 50, width: 100, height: 24 });
  });

  it("grows with its text and caches the layout until the text changes", () => {
    const field = createField("a".repeat(12));
    const layout = field.layout;
    expect(field.size).toEqual({ width: 120, height: 24 });
    expect(field.layout).toBe(layout);
    field.insertText("b");
    expect(field.layout).not.toBe(layout);
  });

  it("converts between surface and field coordinates", () => {
    const field = createField("hello");
    expect(field.canvasToLocal({ x: 60, y: 90 })).toEqual({ x: 10, y: 10 });
    expect(field.localToCanvas({ x: 1, y: 2 })).toEqual({ x: 51, y: 82 });
    expect(field.containsPoint({ x: 149, y: 103 })).toBe(true);
    expect(field.containsPoint({ x: 151, y: 90 })).toBe(false);
  });

  it("resolves a local point to an offset", () => {
    const field = createField("hello");
    expect(field.getOffsetForPosition({ x: 21, y: 5 })).toBe(2);
  });
});
