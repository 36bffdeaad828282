import { NAMED_COLORS } from '../constants/named-colors';

/**
 * Swap "black" for "white"; every other value passes through untouched.
 * Black and white render inverted in the styling layer headers were first written against.
 */
export function resolveHeadingColor(color: string): string {
  return color === 'black' ? 'white' : color;
}

/**
 * Convert "#RGB", "#RRGGBB", "#AARRGGBB" or a basic colour name to exceljs ARGB.
 * Returns null for anything else.
 */
export function colorToArgb(color: string): string | null {
  const trimmed = color.trim();
  const hex = trimmed.match(/^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6}|[0-9a-fA-F]{8})$/);
  if (hex?.[1]) {
    const digits = hex[1].toUpperCase();
    if (digits.length === 3) {
      return `FF${digits.split('').map((d) => d + d).join('')}`;
    }
    return digits.length === 6 ? `FF${digits}` : digits;
  }

  const name = trimmed.toLowerCase();
  if (!Object.hasOwn(NAMED_COLORS, name)) return null;
  const rgb = NAMED_COLORS[name];
  return rgb ? `FF${rgb}` : null;
}

/** "AARRGGBB" to a canvas `rgba()` fill style */
export function argbToCss(argb: string): string {
  const channel = (offset: number): number => parseInt(argb.slice(offset, offset + 2), 16);
  const alpha = Math.round((channel(0) / 255) * 1000) / 1000;
  return `rgba(${channel(2)}, ${channel(4)}, ${channel(6)}, ${alpha})`;
}

export function isPlotBackground(background: string): boolean {
  return background === 'transparent' || colorToArgb(background) !== null;
}
