import type { Unsubscribe } from "../shared/change-emitter";
import { renderSurface } from "../engine/canvas-renderer";
import type { InkSurfaceEngine, SurfacePointer } from "../engine/ink-surface-engine";
import { createCanvasTextMeasurer } from "../engine/layout/text-measurer";

type SurfaceViewOptions = {
  container: HTMLElement;
  engine: InkSurfaceEngine;
};

/**
 * Binds an engine to the DOM: a canvas it paints and takes pointer input
 * from, and an offscreen textarea that receives keys and IME composition
 * while a text field has focus.
 */
export class SurfaceView {
  readonly canvas: HTMLCanvasElement;
  readonly input: HTMLTextAreaElement;

  private container: HTMLElement;
  private engine: InkSurfaceEngine;
  private context: CanvasRenderingContext2D | null;
  private frameId: number | null = null;
  private isComposing = false;
  private resizeObserver: ResizeObserver | null = null;
  private unsubscribe: Unsubscribe;

  private handlePointerDownBound = this.handlePointerDown.bind(this);
  private handlePointerMoveBound = this.handlePointerMove.bind(this);
  private handlePointerUpBound = this.handlePointerUp.bind(this);
  private handlePointerCancelBound = this.handlePointerCancel.bind(this);
  private handleKeyDownBound = this.handleKeyDown.bind(this);
  private handleInputBound = this.handleInput.bind(this);
  private handleCompositionStartBound = this.handleCompositionStart.bind(this);
  private handleCompositionUpdateBound = this.handleCompositionUpdate.bind(this);
  private handleCompositionEndBound = this.handleCompositionEnd.bind(this);
  private scheduleRenderBound = this.scheduleRender.bind(this);

  constructor(options: SurfaceViewOptions) {
    this.container = options.container;
    this.engine = options.engine;

    this.canvas = document.createElement("canvas");
    this.canvas.className = "inklayer-canvas";
    this.canvas.style.display = "block";
    this.canvas.style.width = "100%";
    this.canvas.style.height = "100%";
    this.canvas.style.touchAction = "none";

    this.input = document.createElement("textarea");
    this.input.className = "inklayer-input";
    this.input.setAttribute("aria-label", "Text field input");
    this.input.setAttribute("autocapitalize", "off");
    this.input.setAttribute("autocomplete", "off");
    this.input.spellcheck = false;
    Object.assign(this.input.style, {
      position: "absolute",
      top: "0px",
      left: "0px",
      width: "1px",
      height: "1px",
      opacity: "0",
      padding: "0",
      border: "0",
      resize: "none",
      pointerEvents: "none",
    });

    this.container.append(this.canvas, this.input);

    this.context = this.canvas.getContext("2d");
    if (this.context) {
      this.engine.setMeasurer(createCanvasTextMeasurer(this.context));
    }

    this.unsubscribe = this.engine.subscribe(() => {
      this.syncInput();
      this.scheduleRender();
    });
    this.attachListeners();
    this.resize();
  }

  destroy() {
    this.detachListeners();
    this.unsubscribe();
    this.resizeObserver?.disconnect();
    this.resizeObserver = null;
    if (this.frameId !== null) {
      window.cancelAnimationFrame(this.frameId);
      this.frameId = null;
    }
    this.canvas.remove();
    this.input.remove();
  }

  private attachListeners() {
    this.canvas.addEventListener("pointerdown", this.handlePointerDownBound);
    this.canvas.addEventListener("pointermove", this.handlePointerMoveBound);
    this.canvas.addEventListener("pointerup", this.handlePointerUpBound);
    this.canvas.addEventListener("pointercancel", this.handlePointerCancelBound);
    this.input.addEventListener("keydown", this.handleKeyDownBound);
    this.input.addEventListener("input", this.handleInputBound);
    this.input.addEventListener(
      "compositionstart",
      this.handleCompositionStartBound,
    );
    this.input.addEventListener(
      "compositionupdate",
      this.handleCompositionUpdateBound,
    );
    this.input.addEventListener("compositionend", this.handleCompositionEndBound);
    window.addEventListener("resize", this.scheduleRenderBound);
    if (typeof ResizeObserver !== "undefined") {
      this.resizeObserver = new ResizeObserver(() => this.resize());
      this.resizeObserver.observe(this.container);
    }
  }

  private detachListeners() {
    this.canvas.removeEventListener("pointerdown", this.handlePointerDownBound);
    this.canvas.removeEventListener("pointermove", this.handlePointerMoveBound);
    this.canvas.removeEventListener("pointerup", this.handlePointerUpBound);
    this.canvas.removeEventListener(
      "pointercancel",
      this.handlePointerCancelBound,
    );
    this.input.removeEventListener("keydown", this.handleKeyDownBound);
    this.input.removeEventListener("input", this.handleInputBound);
    this.input.removeEventListener(
      "compositionstart",
      this.handleCompositionStartBound,
    );
    this.input.removeEventListener(
      "compositionupdate",
      this.handleCompositionUpdateBound,
    );
    this.input.removeEventListener(
      "compositionend",
      this.handleCompositionEndBound,
    );
    window.removeEventListener("resize", this.scheduleRenderBound);
  }

  // ============ Pointer input ============

  private toSurfacePointer(event: PointerEvent): SurfacePointer {
    const rect = this.canvas.getBoundingClientRect();
    return {
      pointerId: event.pointerId,
      pointerType: event.pointerType,
      x: event.clientX - rect.left,
      y: event.clientY - rect.top,
      pressure: event.pressure,
      timeStamp: event.timeStamp,
      tiltX: event.tiltX,
      tiltY: event.tiltY,
    };
  }

  private handlePointerDown(event: PointerEvent) {
    if (this.engine.mode === null) {
      return;
    }
    // Keeps focus on the input bridge instead of the canvas.
    event.preventDefault();
    if (event.isTrusted) {
      this.canvas.setPointerCapture(event.pointerId);
    }
    this.engine.pointerDown(this.toSurfacePointer(event));
  }

  private handlePointerMove(event: PointerEvent) {
    this.engine.pointerMove(this.toSurfacePointer(event));
  }

  private handlePointerUp(event: PointerEvent) {
    this.engine.pointerUp(this.toSurfacePointer(event));
  }

  private handlePointerCancel(event: PointerEvent) {
    this.engine.pointerCancel(event.pointerId);
  }

  // ============ Text input ============

  private handleKeyDown(event: KeyboardEvent) {
    if (this.isComposing || event.isComposing) {
      return;
    }
    if (this.engine.handleKeyDown(event)) {
      event.preventDefault();
    }
  }

  private handleInput(event: Event) {
    if (this.isComposing) {
      return;
    }
    if (event instanceof InputEvent && event.isComposing) {
      return;
    }
    const text = this.input.value;
    this.input.value = "";
    if (text) {
      this.engine.insertText(text);
    }
  }

  private handleCompositionStart() {
    this.isComposing = true;
  }

  private handleCompositionUpdate(event: CompositionEvent) {
    this.engine.setComposingText(event.data);
  }

  private handleCompositionEnd(event: CompositionEvent) {
    this.isComposing = false;
    this.engine.setComposingText(event.data);
    this.engine.commitComposition();
    this.input.value = "";
  }

  /** Focuses the input bridge for the focused field and parks it at the caret. */
  private syncInput() {
    const field = this.engine.focusedField;
    if (!field) {
      if (document.activeElement === this.input) {
        this.input.blur();
      }
      return;
    }
    const caret = field.getCursorRect(field.selection.end);
    const origin = field.localToCanvas({ x: caret.left, y: caret.top });
    this.input.style.left = `${origin.x}px`;
    this.input.style.top = `${origin.y}px`;
    if (document.activeElement !== this.input) {
      this.input.focus({ preventScroll: true });
    }
  }

  // ============ Rendering ============

  private resize() {
    const ratio = window.devicePixelRatio || 1;
    const width = this.container.clientWidth;
    const height = this.container.clientHeight;
    this.canvas.width = Math.round(width * ratio);
    this.canvas.height = Math.round(height * ratio);
    this.scheduleRender();
  }

  private scheduleRender() {
    if (this.frameId !== null || !this.context) {
      return;
    }
    this.frameId = window.requestAnimationFrame(() => {
      this.frameId = null;
      this.render();
    });
  }

  private render() {
    const ctx = this.context;
    if (!ctx) {
      return;
    }
    const ratio = window.devicePixelRatio || 1;
    ctx.setTransform(ratio, 0, 0, ratio, 0, 0);
    renderSurface(ctx, this.engine.getElements(), {
      width: this.canvas.width / ratio,
      height: this.canvas.height / ratio,
      handleConfig: this.engine.fieldManager.handleConfig,
      activeStroke: this.engine.strokeInProgress,
    });
  }
}
