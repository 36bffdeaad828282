/** 1-based row/column where new content is inserted */
export interface InsertionPosition {
  row: number;
  col: number;
}

/** Anything that can report how many of its rows hold values (an exceljs Worksheet does) */
export interface RowCountSource {
  readonly actualRowCount: number;
}
