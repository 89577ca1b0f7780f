import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { HandleHitResult } from "../fields/handle-hit-tester";
import { TextFieldState } from "../fields/text-field-state";
import type { GestureTarget } from "./gesture-classifier";
import { GestureClassifier } from "./gesture-classifier";

function createTarget(hit: HandleHitResult | null = null) {
  return {
    hitTestHandle: vi.fn((): HandleHitResult | null => hit),
    startHandleDrag: vi.fn(),
    updateHandleDrag: vi.fn(),
    stopHandleDrag: vi.fn(),
    handleTap: vi.fn(),
    handleDoubleTap: vi.fn(),
    handleLongPress: vi.fn(),
  } satisfies GestureTarget;
}

const P = { x: 10, y: 20 };
const Q = { x: 14, y: 22 };

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe("GestureClassifier", () => {
  it("classifies a short press with no follow-up as a single tap", () => {
    const target = createTarget();
    const gestures = new GestureClassifier(target);

    gestures.pointerDown(1, P);
    vi.advanceTimersByTime(50);
    gestures.pointerUp(1, P);
    vi.advanceTimersByTime(299);
    expect(target.handleTap).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(target.handleTap).toHaveBeenCalledWith(P);
    expect(target.handleDoubleTap).not.toHaveBeenCalled();
    expect(target.handleLongPress).not.toHaveBeenCalled();
    expect(gestures.stateKind).toBe("idle");
  });

  it("classifies two quick taps as a double tap at the second position", () => {
    const target = createTarget();
    const gestures = new GestureClassifier(target);

    gestures.pointerDown(1, P);
    vi.advanceTimersByTime(50);
    gestures.pointerUp(1, P);
    vi.advanceTimersByTime(100);
    gestures.pointerDown(2, Q);
    vi.advanceTimersByTime(50);
    gestures.pointerUp(2, Q);
    vi.advanceTimersByTime(1000);

    expect(target.handleDoubleTap).toHaveBeenCalledTimes(1);
    expect(target.handleDoubleTap).toHaveBeenCalledWith(Q);
    expect(target.handleTap).not.toHaveBeenCalled();
  });

  it("classifies a held press as a long press and swallows its release", () => {
    const target = createTarget();
    const gestures = new GestureClassifier(target);

    gestures.pointerDown(1, P);
    vi.advanceTimersByTime(500);
    expect(target.handleLongPress).toHaveBeenCalledWith(P);
    expect(gestures.stateKind).toBe("swallowing");

    vi.advanceTimersByTime(200);
    gestures.pointerUp(1, P);
    vi.advanceTimersByTime(1000);
    expect(target.handleTap).not.toHaveBeenCalled();
    expect(gestures.stateKind).toBe("idle");
  });

  it("resolves the first tap when the second press outlives the window", () => {
    const target = createTarget();
    const gestures = new GestureClassifier(target);

    gestures.pointerDown(1, P);
    gestures.pointerUp(1, P);
    vi.advanceTimersByTime(100);
    gestures.pointerDown(2, Q);
    vi.advanceTimersByTime(300);

    expect(target.handleTap).toHaveBeenCalledWith(P);
    gestures.pointerUp(2, Q);
    expect(target.handleDoubleTap).not.toHaveBeenCalled();
    expect(target.handleTap).toHaveBeenCalledTimes(1);
  });

  it("gives handle hits priority over tap detection", () => {
    const field = new TextFieldState({ text: "hello" });
    const hit: HandleHitResult = { field, handle: "end" };
    const target = createTarget(hit);
    const gestures = new GestureClassifier(target);

    gestures.pointerDown(1, P);
    gestures.pointerMove(1, { x: 30, y: 20 });
    vi.advanceTimersByTime(1000);
    gestures.pointerUp(1, { x: 40, y: 20 });

    expect(target.startHandleDrag).toHaveBeenCalledWith(hit);
    expect(target.updateHandleDrag).toHaveBeenNthCalledWith(1, { x: 30, y: 20 });
    expect(target.updateHandleDrag).toHaveBeenNthCalledWith(2, { x: 40, y: 20 });
    expect(target.stopHandleDrag).toHaveBeenCalledTimes(1);
    expect(target.handleLongPress).not.toHaveBeenCalled();
    expect(target.handleTap).not.toHaveBeenCalled();
  });

  it("always stops a handle drag when the pointer is lost", () => {
    const target = createTarget({ field: new TextFieldState(), handle: "cursor" });
    const gestures = new GestureClassifier(target);

    gestures.pointerDown(1, P);
    gestures.pointerCancel(1);

    expect(target.stopHandleDrag).toHaveBeenCalledTimes(1);
    expect(gestures.stateKind).toBe("idle");
  });

  it("cancels a pending gesture when a second pointer goes down", () => {
    const target = createTarget();
    const gestures = new GestureClassifier(target);

    gestures.pointerDown(1, P);
    gestures.pointerDown(2, Q);
    vi.advanceTimersByTime(1000);
    gestures.pointerUp(1, P);
    gestures.pointerUp(2, Q);
    vi.advanceTimersByTime(1000);

    expect(target.handleLongPress).not.toHaveBeenCalled();
    expect(target.handleTap).not.toHaveBeenCalled();
  });

  it("drops a press that moves past the touch slop", () => {
    const target = createTarget();
    const gestures = new GestureClassifier(target);

    gestures.pointerDown(1, P);
    gestures.pointerMove(1, { x: 30, y: 20 });
    vi.advanceTimersByTime(1000);
    gestures.pointerUp(1, { x: 30, y: 20 });
    vi.advanceTimersByTime(1000);

    expect(target.handleLongPress).not.toHaveBeenCalled();
    expect(target.handleTap).not.toHaveBeenCalled();
  });

  it("tolerates jitter within the touch slop", () => {
    const target = createTarget();
    const gestures = new GestureClassifier(target);

    gestures.pointerDown(1, P);
    gestures.pointerMove(1, { x: 13, y: 24 });
    gestures.pointerUp(1, { x: 13, y: 24 });
    vi.advanceTimersByTime(300);

    expect(target.handleTap).toHaveBeenCalledWith(P);
  });

  it("aborts pending timers on cancel without side effects", () => {
    const target = createTarget();
    const gestures = new GestureClassifier(target);

    gestures.pointerDown(1, P);
    gestures.pointerUp(1, P);
    gestures.cancel();
    vi.advanceTimersByTime(1000);

    expect(target.handleTap).not.toHaveBeenCalled();
    expect(gestures.stateKind).toBe("idle");
  });

  it("honours configured timeouts", () => {
    const target = createTarget();
    const gestures = new GestureClassifier(target, {
      config: { longPressTimeoutMs: 200 },
    });

    gestures.pointerDown(1, P);
    vi.advanceTimersByTime(200);
    expect(target.handleLongPress).toHaveBeenCalledWith(P);
  });

  it("traces classifications through the log hook", () => {
    const log = vi.fn();
    const gestures = new GestureClassifier(createTarget(), { log });

    gestures.pointerDown(1, P);
    gestures.pointerUp(1, P);
    vi.advanceTimersByTime(300);

    expect(log).toHaveBeenCalledWith("[GESTURE] tap at (10, 20)");
  });
});
