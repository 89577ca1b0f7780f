import type { GestureConfig } from "../core/config";
import { DEFAULT_GESTURE_CONFIG } from "../core/config";
import type { Point } from "../core/types";
import type { HandleHitResult } from "../fields/handle-hit-tester";

/** Receives classified gestures. `FieldManager` satisfies it. */
export type GestureTarget = {
  hitTestHandle: (point: Point) => HandleHitResult | null;
  startHandleDrag: (hit: HandleHitResult) => void;
  updateHandleDrag: (point: Point) => void;
  stopHandleDrag: () => void;
  handleTap: (point: Point) => void;
  handleDoubleTap: (point: Point) => void;
  handleLongPress: (point: Point) => void;
};

/** Schedules `callback` and returns a function that cancels it. */
export type Scheduler = (callback: () => void, delayMs: number) => () => void;

export const timeoutScheduler: Scheduler = (callback, delayMs) => {
  const handle = setTimeout(callback, delayMs);
  return () => clearTimeout(handle);
};

export type GestureClassifierOptions = {
  config?: Partial<GestureConfig>;
  scheduler?: Scheduler;
  log?: (message: string) => void;
};

type GestureState =
  | { kind: "idle" }
  | { kind: "handleDrag"; pointerId: number }
  | {
      kind: "awaitingTapUp";
      pointerId: number;
      downPoint: Point;
      cancelTimer: () => void;
    }
  | { kind: "awaitingSecondDown"; firstPoint: Point; cancelTimer: () => void }
  | {
      kind: "awaitingSecondUp";
      pointerId: number;
      firstPoint: Point;
      downPoint: Point;
      cancelTimer: () => void;
    }
  | { kind: "swallowing"; pointerId: number };

export type GestureStateKind = GestureState["kind"];

function distance(a: Point, b: Point): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

function formatPoint(point: Point): string {
  return `(${Math.round(point.x)}, ${Math.round(point.y)})`;
}

/**
 * Turns pointer events into handle drags, taps, double taps and long
 * presses. Timers race the next pointer event; whichever arrives first
 * decides the transition and cancels the other.
 */
export class GestureClassifier {
  private state: GestureState = { kind: "idle" };
  private readonly target: GestureTarget;
  private readonly config: GestureConfig;
  private readonly schedule: Scheduler;
  private readonly log?: (message: string) => void;

  constructor(target: GestureTarget, options: GestureClassifierOptions = {}) {
    this.target = target;
    this.config = { ...DEFAULT_GESTURE_CONFIG, ...options.config };
    this.schedule = options.scheduler ?? timeoutScheduler;
    this.log = options.log;
  }

  get stateKind(): GestureStateKind {
    return this.state.kind;
  }

  pointerDown(pointerId: number, point: Point) {
    const state = this.state;
    switch (state.kind) {
      case "idle": {
        const hit = this.target.hitTestHandle(point);
        if (hit) {
          this.log?.(`[GESTURE] handle drag (${hit.handle}) at ${formatPoint(point)}`);
          this.state = { kind: "handleDrag", pointerId };
          this.target.startHandleDrag(hit);
          return;
        }
        this.state = {
          kind: "awaitingTapUp",
          pointerId,
          downPoint: point,
          cancelTimer: this.schedule(
            () => this.onLongPressTimeout(),
            this.config.longPressTimeoutMs,
          ),
        };
        return;
      }
      case "awaitingSecondDown": {
        state.cancelTimer();
        this.state = {
          kind: "awaitingSecondUp",
          pointerId,
          firstPoint: state.firstPoint,
          downPoint: point,
          cancelTimer: this.schedule(
            () => this.onSecondPressTimeout(),
            this.config.doubleTapTimeoutMs,
          ),
        };
        return;
      }
      case "handleDrag":
      case "awaitingTapUp":
      case "awaitingSecondUp":
      case "swallowing":
        if (state.pointerId !== pointerId) {
          this.log?.("[GESTURE] second pointer, cancelling");
          this.cancel();
        }
        return;
    }
  }

  pointerMove(pointerId: number, point: Point) {
    const state = this.state;
    switch (state.kind) {
      case "handleDrag":
        if (state.pointerId === pointerId) {
          this.target.updateHandleDrag(point);
        }
        return;
      case "awaitingTapUp":
        if (
          state.pointerId === pointerId &&
          distance(state.downPoint, point) > this.config.touchSlop
        ) {
          this.log?.("[GESTURE] moved past touch slop, not a tap");
          state.cancelTimer();
          this.state = { kind: "swallowing", pointerId };
        }
        return;
      case "awaitingSecondUp":
        if (
          state.pointerId === pointerId &&
          distance(state.downPoint, point) > this.config.touchSlop
        ) {
          state.cancelTimer();
          this.resolveFirstTapAndSwallow(state.firstPoint, pointerId);
        }
        return;
      case "idle":
      case "awaitingSecondDown":
      case "swallowing":
        return;
    }
  }

  pointerUp(pointerId: number, point: Point) {
    const state = this.state;
    switch (state.kind) {
      case "handleDrag":
        if (state.pointerId === pointerId) {
          this.state = { kind: "idle" };
          this.target.updateHandleDrag(point);
          this.target.stopHandleDrag();
        }
        return;
      case "awaitingTapUp":
        if (state.pointerId !== pointerId) {
          return;
        }
        state.cancelTimer();
        this.state = {
          kind: "awaitingSecondDown",
          firstPoint: state.downPoint,
          cancelTimer: this.schedule(
            () => this.onDoubleTapTimeout(),
            this.config.doubleTapTimeoutMs,
          ),
        };
        return;
      case "awaitingSecondUp":
        if (state.pointerId !== pointerId) {
          return;
        }
        state.cancelTimer();
        this.state = { kind: "idle" };
        this.log?.(`[GESTURE] double tap at ${formatPoint(state.downPoint)}`);
        this.target.handleDoubleTap(state.downPoint);
        return;
      case "swallowing":
        if (state.pointerId === pointerId) {
          this.state = { kind: "idle" };
        }
        return;
      case "idle":
      case "awaitingSecondDown":
        return;
    }
  }

  pointerCancel(pointerId: number) {
    const state = this.state;
    if (state.kind === "idle" || state.kind === "awaitingSecondDown") {
      this.cancel();
      return;
    }
    if (state.pointerId === pointerId) {
      this.cancel();
    }
  }

  /**
   * Aborts the gesture in progress without classifying it. A handle drag
   * still gets its `stopHandleDrag`.
   */
  cancel() {
    const state = this.state;
    this.state = { kind: "idle" };
    switch (state.kind) {
      case "awaitingTapUp":
      case "awaitingSecondDown":
      case "awaitingSecondUp":
        state.cancelTimer();
        return;
      case "handleDrag":
        this.target.stopHandleDrag();
        return;
      case "idle":
      case "swallowing":
        return;
    }
  }

  private onLongPressTimeout() {
    const state = this.state;
    if (state.kind !== "awaitingTapUp") {
      return;
    }
    this.state = { kind: "swallowing", pointerId: state.pointerId };
    this.log?.(`[GESTURE] long press at ${formatPoint(state.downPoint)}`);
    this.target.handleLongPress(state.downPoint);
  }

  private onDoubleTapTimeout() {
    const state = this.state;
    if (state.kind !== "awaitingSecondDown") {
      return;
    }
    this.state = { kind: "idle" };
    this.log?.(`[GESTURE] tap at ${formatPoint(state.firstPoint)}`);
    this.target.handleTap(state.firstPoint);
  }

  private onSecondPressTimeout() {
    const state = this.state;
    if (state.kind !== "awaitingSecondUp") {
      return;
    }
    this.resolveFirstTapAndSwallow(state.firstPoint, state.pointerId);
  }

  private resolveFirstTapAndSwallow(firstPoint: Point, pointerId: number) {
    this.state = { kind: "swallowing", pointerId };
    this.log?.(`[GESTURE] tap at ${formatPoint(firstPoint)}`);
    this.target.handleTap(firstPoint);
  }
}
