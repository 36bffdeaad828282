/** Heading levels, analogous to HTML h1..h6 */
export const HEADING_LEVELS = [1, 2, 3, 4, 5, 6] as const;
export type HeadingLevel = (typeof HEADING_LEVELS)[number];

/** Font attributes bundled under one heading level */
export interface HeadingPreset {
  size: number;
  bold: boolean;
  italic: boolean;
  underline: false;
}

/** Preset with the colour it was resolved against */
export interface HeadingStyle extends HeadingPreset {
  level: HeadingLevel;
  /** Colour after the black/white substitution */
  color: string;
  argb: string;
}
