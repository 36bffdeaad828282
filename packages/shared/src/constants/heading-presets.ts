import type { HeadingLevel, HeadingPreset } from '../types/heading-types';

/** Font presets per heading level; underline is never applied */
export const HEADING_PRESETS: Readonly<Record<HeadingLevel, HeadingPreset>> = {
  1: { size: 22, bold: true, italic: false, underline: false },
  2: { size: 18, bold: true, italic: false, underline: false },
  3: { size: 16, bold: true, italic: true, underline: false },
  4: { size: 16, bold: false, italic: true, underline: false },
  5: { size: 14, bold: false, italic: true, underline: false },
  6: { size: 12, bold: false, italic: true, underline: false },
};
