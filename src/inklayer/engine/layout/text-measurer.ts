import type { TextFieldStyle } from "../../core/config";
import { toCssFont } from "../../core/config";

export type TextMeasurer = {
  measureText: (text: string, style: TextFieldStyle) => number;
};

type MeasuringContext = {
  font: string;
  measureText: (text: string) => { width: number };
};

/**
 * Measures with a 2D canvas context. Widths are cached per font since layout
 * re-measures every prefix of a row while wrapping.
 */
export function createCanvasTextMeasurer(
  context: MeasuringContext,
): TextMeasurer {
  const cache = new Map<string, number>();
  return {
    measureText(text, style) {
      const font = toCssFont(style);
      const key = `${font}\u0000${text}`;
      const cached = cache.get(key);
      if (cached !== undefined) {
        return cached;
      }
      if (context.font !== font) {
        context.font = font;
      }
      const width = context.measureText(text).width;
      if (cache.size > 5000) {
        cache.clear();
      }
      cache.set(key, width);
      return width;
    },
  };
}

/** Every code unit is `charWidth` wide. Used headless and in tests. */
export function createFixedWidthMeasurer(charWidth = 10): TextMeasurer {
  return {
    measureText(text) {
      return text.length * charWidth;
    },
  };
}
