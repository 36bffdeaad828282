import type ExcelJS from 'exceljs';
import { XlsxBoostError } from '../errors/xlsx-boost.error';

/** Throw INVALID_ARGUMENT unless `worksheet` is one of `workbook`'s sheets */
export function assertWorksheetOf(workbook: ExcelJS.Workbook, worksheet: ExcelJS.Worksheet): void {
  if (workbook.getWorksheet(worksheet.id) !== worksheet) {
    throw new XlsxBoostError(
      'INVALID_ARGUMENT',
      `Worksheet "${worksheet.name}" does not belong to this workbook`,
    );
  }
}
