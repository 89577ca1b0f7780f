import { useEffect, useMemo, useRef, useState } from "react";
import { Eraser, Hand, Highlighter, PenLine, Type } from "lucide-react";
import { InkSurface } from "inklayer";
import type { BrushFamily, EditorMode, InkSurfaceRef } from "inklayer";

const STROKES_KEY = "inklayer-demo:strokes";
const TEXT_FIELDS_KEY = "inklayer-demo:text-fields";
const SAVE_DELAY_MS = 500;

const COLORS = ["#1f2937", "#dc2626", "#2563eb", "#16a34a"];

function readStored(key: string): string {
  try {
    return window.localStorage.getItem(key) ?? "";
  } catch {
    return "";
  }
}

function useDebouncedSave(key: string) {
  const timerRef = useRef<number | null>(null);

  useEffect(() => {
    return () => {
      if (timerRef.current !== null) {
        window.clearTimeout(timerRef.current);
      }
    };
  }, []);

  return (serialized: string) => {
    if (timerRef.current !== null) {
      window.clearTimeout(timerRef.current);
    }
    timerRef.current = window.setTimeout(() => {
      timerRef.current = null;
      try {
        window.localStorage.setItem(key, serialized);
      } catch (error) {
        console.warn(`[inklayer-demo] Could not save ${key}:`, error);
      }
    }, SAVE_DELAY_MS);
  };
}

export default function App() {
  const surfaceRef = useRef<InkSurfaceRef | null>(null);
  const [mode, setMode] = useState<EditorMode>("draw");
  const [brushFamily, setBrushFamily] = useState<BrushFamily>("pen");
  const [brushColor, setBrushColor] = useState(COLORS[0]);
  const [strokesJson, setStrokesJson] = useState("[]");
  const [textFieldsJson, setTextFieldsJson] = useState("[]");
  const saveStrokes = useDebouncedSave(STROKES_KEY);
  const saveTextFields = useDebouncedSave(TEXT_FIELDS_KEY);

  const initial = useMemo(
    () => ({
      strokes: readStored(STROKES_KEY),
      textFields: readStored(TEXT_FIELDS_KEY),
    }),
    [],
  );

  return (
    <div className="app">
      <header className="header">
        <div className="headerLeft">
          <h1>Inklayer Demo</h1>
        </div>
      </header>

      <main className="main">
        <section className="editorCard">
          <div className="toolbar">
            <div className="toolbarGroup">
              <button
                className={`toolbarButton ${mode === "draw" && brushFamily === "pen" ? "active" : ""}`}
                onClick={() => {
                  setMode("draw");
                  setBrushFamily("pen");
                }}
                title="Pen"
              >
                <PenLine size={16} />
              </button>
              <button
                className={`toolbarButton ${mode === "draw" && brushFamily === "highlighter" ? "active" : ""}`}
                onClick={() => {
                  setMode("draw");
                  setBrushFamily("highlighter");
                }}
                title="Highlighter"
              >
                <Highlighter size={16} />
              </button>
              <button
                className={`toolbarButton ${mode === "text" ? "active" : ""}`}
                onClick={() => setMode("text")}
                title="Text"
              >
                <Type size={16} />
              </button>
              <button
                className={`toolbarButton ${mode === null ? "active" : ""}`}
                onClick={() => setMode(null)}
                title="View only"
              >
                <Hand size={16} />
              </button>
            </div>
            <div className="toolbarDivider" />
            <div className="toolbarGroup">
              {COLORS.map((color) => (
                <button
                  key={color}
                  className={`toolbarButton ${brushColor === color ? "active" : ""}`}
                  onClick={() => setBrushColor(color)}
                  title={color}
                  style={{ color }}
                >
                  ●
                </button>
              ))}
            </div>
            <div className="toolbarDivider" />
            <div className="toolbarGroup">
              <button
                className="toolbarButton"
                onClick={() => surfaceRef.current?.clear()}
                title="Clear"
              >
                <Eraser size={16} />
              </button>
            </div>
          </div>
          <InkSurface
            ref={surfaceRef}
            mode={mode}
            brushFamily={brushFamily}
            brushColor={brushColor}
            brushSize={brushFamily === "highlighter" ? 18 : 4}
            initialStrokes={initial.strokes}
            initialTextFields={initial.textFields}
            onStrokesChange={(serialized) => {
              setStrokesJson(serialized);
              saveStrokes(serialized);
            }}
            onTextFieldsChange={(serialized) => {
              setTextFieldsJson(serialized);
              saveTextFields(serialized);
            }}
            style={{ height: 560 }}
          />
        </section>

        <aside className="sidebar">
          <section className="panel">
            <h2>Text fields</h2>
            <pre className="panelPre">{textFieldsJson}</pre>
          </section>
          <section className="panel">
            <h2>Strokes</h2>
            <pre className="panelPre">{`${strokesJson.length} bytes`}</pre>
          </section>
        </aside>
      </main>
    </div>
  );
}
