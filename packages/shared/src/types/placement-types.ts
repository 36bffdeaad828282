import type { HeadingStyle } from './heading-types';
import type { InsertionPosition } from './position-types';

/** Where a header landed and how it was styled */
export interface HeaderPlacement extends InsertionPosition {
  /** A1 address, e.g. "B6" */
  address: string;
  style: HeadingStyle;
}

/** Where a plot image landed */
export interface PlotPlacement extends InsertionPosition {
  address: string;
  /** Workbook media id returned by exceljs */
  imageId: number;
  width: number;
  height: number;
  /** Whether the temporary PNG was deleted */
  tempFileRemoved: boolean;
}
