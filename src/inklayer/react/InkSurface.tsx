import {
  forwardRef,
  useEffect,
  useImperativeHandle,
  useRef,
  useState,
} from "react";
import type { TextFieldStyle } from "../core/config";
import type { EditorMode } from "../core/types";
import type { ClipboardAdapter } from "../clipboard";
import { createBrowserClipboard } from "../clipboard";
import { SurfaceView } from "../dom/surface-view";
import { InkSurfaceEngine } from "../engine/ink-surface-engine";
import type {
  ContextMenuAction,
  ContextMenuState,
  LoadTextFieldsOptions,
} from "../fields/field-manager";
import type { BrushFamily } from "../strokes/types";
import { TextFieldContextMenu } from "./TextFieldContextMenu";

export interface InkSurfaceProps {
  /** `"draw"` authors strokes, `"text"` edits text fields, `null` only displays. */
  mode: EditorMode;
  brushColor?: string;
  brushSize?: number;
  brushFamily?: BrushFamily;
  initialStrokes?: string;
  initialTextFields?: string;
  onStrokesChange?: (serializedStrokes: string) => void;
  onTextFieldsChange?: (serializedTextFields: string) => void;
  textFieldStyle?: Partial<TextFieldStyle>;
  clipboard?: ClipboardAdapter;
  debug?: boolean;
  className?: string;
  style?: React.CSSProperties;
}

export interface InkSurfaceRef {
  element: HTMLElement | null;
  clear: () => void;
  loadStrokes: (data: string) => void;
  loadTextFields: (data: string, options?: LoadTextFieldsOptions) => void;
  getSerializedStrokes: () => string;
  getSerializedTextFields: () => string;
  undo: () => boolean;
  redo: () => boolean;
}

export const InkSurface = forwardRef<InkSurfaceRef | null, InkSurfaceProps>(
  function InkSurface(props: InkSurfaceProps, outerRef) {
    const containerRef = useRef<HTMLDivElement | null>(null);
    const engineRef = useRef<InkSurfaceEngine | null>(null);
    const onStrokesChangeRef = useRef(props.onStrokesChange);
    const onTextFieldsChangeRef = useRef(props.onTextFieldsChange);
    const [contextMenu, setContextMenu] = useState<ContextMenuState | null>(
      null,
    );

    useEffect(() => {
      onStrokesChangeRef.current = props.onStrokesChange;
      onTextFieldsChangeRef.current = props.onTextFieldsChange;
    }, [props.onStrokesChange, props.onTextFieldsChange]);

    useEffect(() => {
      const container = containerRef.current;
      if (!container) {
        return;
      }

      const engine = new InkSurfaceEngine({
        mode: props.mode,
        brush: {
          family: props.brushFamily,
          size: props.brushSize,
          color: props.brushColor,
        },
        strokes: props.initialStrokes,
        textFields: props.initialTextFields,
        textFieldStyle: props.textFieldStyle,
        clipboard: props.clipboard ?? createBrowserClipboard(),
        debug: props.debug ?? false,
        onStrokesChange: (serialized) => {
          onStrokesChangeRef.current?.(serialized);
        },
        onTextFieldsChange: (serialized) => {
          onTextFieldsChangeRef.current?.(serialized);
        },
      });
      const view = new SurfaceView({ container, engine });
      const unsubscribe = engine.subscribe(() => {
        setContextMenu(engine.contextMenu);
      });
      engineRef.current = engine;

      return () => {
        unsubscribe();
        view.destroy();
        engine.destroy();
        engineRef.current = null;
        setContextMenu(null);
      };
    }, []);

    useEffect(() => {
      engineRef.current?.setMode(props.mode);
    }, [props.mode]);

    useEffect(() => {
      const engine = engineRef.current;
      if (!engine) {
        return;
      }
      engine.setBrush({
        family: props.brushFamily,
        size: props.brushSize,
        color: props.brushColor,
      });
    }, [props.brushFamily, props.brushSize, props.brushColor]);

    useImperativeHandle(outerRef, () => {
      return {
        element: containerRef.current,
        clear: () => {
          engineRef.current?.clear();
        },
        loadStrokes: (data: string) => {
          engineRef.current?.loadStrokes(data);
        },
        loadTextFields: (data: string, options?: LoadTextFieldsOptions) => {
          engineRef.current?.loadTextFields(data, options);
        },
        getSerializedStrokes: () =>
          engineRef.current?.getSerializedStrokes() ?? "[]",
        getSerializedTextFields: () =>
          engineRef.current?.getSerializedTextFields() ?? "[]",
        undo: () => engineRef.current?.undo() ?? false,
        redo: () => engineRef.current?.redo() ?? false,
      };
    }, []);

    const handleAction = (action: ContextMenuAction) => {
      const engine = engineRef.current;
      if (!engine) {
        return;
      }
      engine.performContextMenuAction(action).catch((error: unknown) => {
        console.warn(`[inklayer] Context menu ${action} failed:`, error);
      });
    };

    const rootStyle = props.style
      ? { ...props.style, position: props.style.position ?? "relative" }
      : ({ position: "relative" } satisfies React.CSSProperties);

    const rootClassName = props.className
      ? `inklayer-root ${props.className}`
      : "inklayer-root";

    return (
      <div ref={containerRef} className={rootClassName} style={rootStyle}>
        {contextMenu ? (
          <TextFieldContextMenu menu={contextMenu} onAction={handleAction} />
        ) : null}
      </div>
    );
  },
);

InkSurface.displayName = "InkSurface";
