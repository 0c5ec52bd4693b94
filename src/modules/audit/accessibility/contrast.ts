/**
 * WCAG contrast math
 */

const RGB_PATTERN = /rgb\((\d+),\s*(\d+),\s*(\d+)\)/;

/** WCAG AA minimum for normal text */
export const MIN_CONTRAST_RATIO = 4.5;

/**
 * Channels of a computed `rgb(r, g, b)` color; null for anything else (rgba included)
 */
export function parseRgb(color: string): [number, number, number] | null {
  const match = RGB_PATTERN.exec(color);
  if (!match) {
    return null;
  }
  return [parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10)];
}

export function relativeLuminance(color: string): number {
  const rgb = parseRgb(color);
  if (!rgb) {
    return 0;
  }

  const [r, g, b] = rgb.map((channel) => {
    const c = channel / 255;
    return c <= 0.03928 ? c / 12.92 : Math.pow((c + 0.055) / 1.055, 2.4);
  });

  return 0.2126 * r + 0.7152 * g + 0.0722 * b;
}

export function contrastRatio(foreground: string, background: string): number {
  const a = relativeLuminance(foreground);
  const b = relativeLuminance(background);
  return (Math.max(a, b) + 0.05) / (Math.min(a, b) + 0.05);
}
