import { createRef } from "react";
import { act, cleanup, render, screen } from "@testing-library/react";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createMemoryClipboard } from "../clipboard";
import { InkSurface } from "./InkSurface";
import type { InkSurfaceProps, InkSurfaceRef } from "./InkSurface";

const TEXT_FIELDS = JSON.stringify([
  { text: "note", positionX: 10, positionY: 20, zIndex: 0, lastModified: 100 },
]);

const STROKES = JSON.stringify([
  {
    inputs: {
      toolType: "stylus",
      strokeUnitLengthCm: 0.02,
      inputs: [
        { x: 1, y: 1, timeMillis: 0, pressure: 0.5, tiltRadians: 0, orientationRadians: 0 },
      ],
    },
    brush: { family: "pen", size: 5, color: "#000000", epsilon: 0.1 },
    zIndex: 1,
    lastModified: 200,
  },
]);

function renderSurface(props: Partial<InkSurfaceProps> = {}) {
  const ref = createRef<InkSurfaceRef>();
  const onStrokesChange = vi.fn();
  const onTextFieldsChange = vi.fn();
  const result = render(
    <InkSurface
      ref={ref}
      mode="text"
      clipboard={createMemoryClipboard()}
      onStrokesChange={onStrokesChange}
      onTextFieldsChange={onTextFieldsChange}
      {...props}
    />,
  );
  return { ref, onStrokesChange, onTextFieldsChange, ...result };
}

beforeEach(() => {
  // jsdom has no 2D canvas; the surface falls back to headless measuring.
  vi.spyOn(HTMLCanvasElement.prototype, "getContext").mockReturnValue(null);
});

afterEach(() => {
  cleanup();
  vi.restoreAllMocks();
});

describe("InkSurface", () => {
  it("mounts a canvas and an input bridge", () => {
    const { container } = renderSurface();
    expect(container.querySelector("canvas.inklayer-canvas")).not.toBeNull();
    expect(screen.getByLabelText("Text field input").tagName).toBe("TEXTAREA");
  });

  it("starts from the initial serialized data", () => {
    const { ref } = renderSurface({
      initialStrokes: STROKES,
      initialTextFields: TEXT_FIELDS,
    });
    expect(JSON.parse(ref.current?.getSerializedTextFields() ?? "")).toEqual(
      JSON.parse(TEXT_FIELDS),
    );
    expect(JSON.parse(ref.current?.getSerializedStrokes() ?? "")).toEqual(
      JSON.parse(STROKES),
    );
  });

  it("clears both collections and reports both", () => {
    const { ref, onStrokesChange, onTextFieldsChange } = renderSurface({
      initialStrokes: STROKES,
      initialTextFields: TEXT_FIELDS,
    });

    act(() => {
      ref.current?.clear();
    });

    expect(onStrokesChange).toHaveBeenCalledWith("[]");
    expect(onTextFieldsChange).toHaveBeenCalledWith("[]");
    expect(ref.current?.getSerializedStrokes()).toBe("[]");
  });

  it("loads data through the ref without reporting it", () => {
    const { ref, onStrokesChange, onTextFieldsChange } = renderSurface();

    act(() => {
      ref.current?.loadStrokes(STROKES);
      ref.current?.loadTextFields(TEXT_FIELDS);
    });

    expect(JSON.parse(ref.current?.getSerializedStrokes() ?? "")).toHaveLength(1);
    expect(JSON.parse(ref.current?.getSerializedTextFields() ?? "")).toHaveLength(1);
    expect(onStrokesChange).not.toHaveBeenCalled();
    expect(onTextFieldsChange).not.toHaveBeenCalled();
  });

  it("has nothing to undo without a focused field", () => {
    const { ref } = renderSurface({ initialTextFields: TEXT_FIELDS });
    expect(ref.current?.undo()).toBe(false);
    expect(ref.current?.redo()).toBe(false);
  });

  it("removes its DOM on unmount", () => {
    const { container, unmount } = renderSurface();
    unmount();
    expect(container.querySelector("canvas")).toBeNull();
  });
});
