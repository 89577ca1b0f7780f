export type GestureConfig = {
  longPressTimeoutMs: number;
  doubleTapTimeoutMs: number;
  /** Movement past this distance turns a pending tap into nothing. */
  touchSlop: number;
};

export type HandleConfig = {
  radius: number;
  stemHeight: number;
  touchTolerance: number;
  cursorWidth: number;
};

export type TextFieldStyle = {
  fontSize: number;
  fontFamily: string;
  lineHeight: number;
  color: string;
  cursorColor: string;
  selectionColor: string;
  handleColor: string;
  maxWidth: number;
  minWidth: number;
  minHeight: number;
};

export const DEFAULT_GESTURE_CONFIG: GestureConfig = {
  longPressTimeoutMs: 500,
  doubleTapTimeoutMs: 300,
  touchSlop: 8,
};

export const DEFAULT_HANDLE_CONFIG: HandleConfig = {
  radius: 12,
  stemHeight: 8,
  touchTolerance: 24,
  cursorWidth: 2,
};

const DEFAULT_FONT_SIZE = 16;

export const DEFAULT_TEXT_FIELD_STYLE: TextFieldStyle = {
  fontSize: DEFAULT_FONT_SIZE,
  fontFamily: "sans-serif",
  lineHeight: DEFAULT_FONT_SIZE * 1.25,
  color: "#000000",
  cursorColor: "#000000",
  selectionColor: "rgba(33, 150, 243, 0.3)",
  handleColor: "#2196f3",
  maxWidth: 500,
  minWidth: 100,
  minHeight: 24,
};

export const CURSOR_BLINK_INTERVAL_MS = 530;
export const CONTEXT_MENU_OFFSET = 98;

export function resolveTextFieldStyle(
  style: Partial<TextFieldStyle> = {},
): TextFieldStyle {
  const fontSize = style.fontSize ?? DEFAULT_TEXT_FIELD_STYLE.fontSize;
  return {
    ...DEFAULT_TEXT_FIELD_STYLE,
    lineHeight: fontSize * 1.25,
    ...style,
  };
}

export function toCssFont(style: TextFieldStyle): string {
  return `${style.fontSize}px ${style.fontFamily}`;
}
