export type Rgba = {
  r: number;
  g: number;
  b: number;
  /** 0..1 */
  a: number;
};

export const BLACK: Rgba = { r: 0, g: 0, b: 0, a: 1 };

const HEX_PATTERN = /^#([0-9a-f]{3}|[0-9a-f]{4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const RGB_PATTERN =
  /^rgba?\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*(?:,\s*(\d*\.?\d+)\s*)?\)$/i;

function expandShortHex(hex: string): string {
  return hex
    .split("")
    .map((char) => char + char)
    .join("");
}

/**
 * Parses `#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`, `rgb()` and `rgba()`.
 * Anything else resolves to opaque black.
 */
export function parseColor(input: string | null | undefined): Rgba {
  if (!input) {
    return BLACK;
  }
  const value = input.trim();

  const hexMatch = HEX_PATTERN.exec(value);
  if (hexMatch) {
    let hex = hexMatch[1];
    if (hex.length <= 4) {
      hex = expandShortHex(hex);
    }
    const channel = (index: number) =>
      Number.parseInt(hex.slice(index * 2, index * 2 + 2), 16);
    return {
      r: channel(0),
      g: channel(1),
      b: channel(2),
      a: hex.length === 8 ? channel(3) / 255 : 1,
    };
  }

  const rgbMatch = RGB_PATTERN.exec(value);
  if (rgbMatch) {
    const [r, g, b] = [rgbMatch[1], rgbMatch[2], rgbMatch[3]].map(Number);
    const a = rgbMatch[4] === undefined ? 1 : Number(rgbMatch[4]);
    if (r > 255 || g > 255 || b > 255 || a > 1) {
      return BLACK;
    }
    return { r, g, b, a };
  }

  return BLACK;
}

export function withAlpha(color: Rgba, alpha: number): Rgba {
  return { ...color, a: Math.max(0, Math.min(1, color.a * alpha)) };
}

export function toCssColor(color: Rgba): string {
  const alpha = Math.round(color.a * 1000) / 1000;
  return `rgba(${color.r}, ${color.g}, ${color.b}, ${alpha})`;
}
