/**
 * Drawing Colors
 *
 * Normalises host colors to the "#RRGGBB" triplet used in exports.
 */

export const DEFAULT_LINE_COLOR = "#FF0000";

/**
 * Convert hex color (#RGB or #RRGGBB) to RGB components
 */
export function hexToRgb(hex: string): { r: number; g: number; b: number } | null {
  const short = /^#?([a-f\d])([a-f\d])([a-f\d])$/i.exec(hex);
  if (short) {
    return {
      r: parseInt(short[1] + short[1], 16),
      g: parseInt(short[2] + short[2], 16),
      b: parseInt(short[3] + short[3], 16),
    };
  }

  const result = /^#?([a-f\d]{2})([a-f\d]{2})([a-f\d]{2})$/i.exec(hex);
  return result
    ? {
        r: parseInt(result[1], 16),
        g: parseInt(result[2], 16),
        b: parseInt(result[3], 16),
      }
    : null;
}

/**
 * Convert RGB to upper-case hex color
 */
export function rgbToHex(r: number, g: number, b: number): string {
  return "#" + [r, g, b].map((x) => x.toString(16).padStart(2, "0")).join("").toUpperCase();
}

/**
 * Parse "rgb(r, g, b)" / "rgba(r, g, b, a)"
 */
function cssRgbToRgb(color: string): { r: number; g: number; b: number } | null {
  const match = /^rgba?\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*(?:,\s*[\d.]+\s*)?\)$/i.exec(color);
  if (!match) return null;

  const [r, g, b] = [match[1], match[2], match[3]].map(Number);
  if (r > 255 || g > 255 || b > 255) return null;
  return { r, g, b };
}

/**
 * Host color → "#RRGGBB". Unparseable colors become DEFAULT_LINE_COLOR.
 */
export function toHexTriplet(color: string): string {
  const trimmed = color.trim();
  const rgb = hexToRgb(trimmed) ?? cssRgbToRgb(trimmed);
  if (!rgb) return DEFAULT_LINE_COLOR;
  return rgbToHex(rgb.r, rgb.g, rgb.b);
}
