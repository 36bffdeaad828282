/** Sheet dimension limits (Excel-compatible) */
export const SHEET_LIMITS = {
  MAX_ROWS: 1_048_576,
  MAX_COLS: 16_384,
} as const;

/** Header defaults */
export const HEADER_DEFAULTS = {
  VALUE: 'Header',
  LEVEL: 1,
  COLOR: '#FFFFFF',
  START_COL: 2,
} as const;

/** Plot image defaults */
export const PLOT_DEFAULTS = {
  WIDTH: 480,
  HEIGHT: 480,
  BACKGROUND: 'white',
  FILE_NAME: 'plot.png',
  /** Prefix of the per-call temp directory */
  TEMP_DIR_PREFIX: 'xlsxboost-',
  /** Canvas side limit in pixels */
  MAX_DIMENSION: 10_000,
} as const;
