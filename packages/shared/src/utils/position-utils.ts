import { HEADER_DEFAULTS } from '../constants/limits';
import type { InsertionPosition, RowCountSource } from '../types/position-types';

/**
 * Resolve where new content goes. A missing row appends below the rows that
 * hold values; a missing column falls back to `defaultCol`.
 */
export function resolveInsertionPosition(
  sheet: RowCountSource,
  startRow?: number,
  startCol?: number,
  defaultCol: number = HEADER_DEFAULTS.START_COL,
): InsertionPosition {
  return {
    row: startRow ?? sheet.actualRowCount + 1,
    col: startCol ?? defaultCol,
  };
}
