import { Inject, Injectable, Logger } from '@nestjs/common';
import type ExcelJS from 'exceljs';
import {
  HEADING_PRESETS,
  buildCellAddress,
  colorToArgb,
  headerOptionsSchema,
  resolveHeadingColor,
  resolveInsertionPosition,
  type HeaderOptions,
  type HeaderPlacement,
  type HeadingLevel,
  type HeadingStyle,
} from '@xlsxboost/shared';
import { XLSX_BOOST_CONFIG } from '../../config/tokens';
import type { XlsxBoostConfig } from '../../config/xlsx-boost.config';
import { XlsxBoostError, parseOptions } from '../../common/errors/xlsx-boost.error';
import { assertWorksheetOf } from '../../common/utils/worksheet-utils';

@Injectable()
export class HeaderService {
  private readonly logger = new Logger(HeaderService.name);

  constructor(@Inject(XLSX_BOOST_CONFIG) private readonly config: XlsxBoostConfig) {}

  /**
   * Write a heading into a single cell. Without `startRow` it goes one row below
   * the rows that hold values; without `startCol` into the configured default column.
   */
  addHeader(
    workbook: ExcelJS.Workbook,
    worksheet: ExcelJS.Worksheet,
    options: HeaderOptions = {},
  ): HeaderPlacement {
    assertWorksheetOf(workbook, worksheet);
    const { value, level, color, startRow, startCol } = parseOptions(
      headerOptionsSchema,
      options,
      'Invalid header options',
    );

    const style = this.resolveStyle(level, color);
    const { row, col } = resolveInsertionPosition(
      worksheet,
      startRow,
      startCol,
      this.config.defaultStartCol,
    );

    const cell = worksheet.getCell(row, col);
    cell.value = value;
    cell.font = {
      size: style.size,
      bold: style.bold,
      italic: style.italic,
      underline: style.underline,
      color: { argb: style.argb },
    };

    const address = buildCellAddress(row, col);
    this.logger.debug(`H${level} "${value}" written to ${worksheet.name}!${address}`);
    return { row, col, address, style };
  }

  /** Preset for `level`, coloured with `color` after the black/white swap */
  resolveStyle(level: HeadingLevel, color: string): HeadingStyle {
    const resolved = resolveHeadingColor(color);
    const argb = colorToArgb(resolved);
    if (!argb) {
      throw new XlsxBoostError('INVALID_ARGUMENT', `Unknown colour "${color}"`, [
        { path: 'color', message: 'Expected #RGB, #RRGGBB, #AARRGGBB or a basic colour name' },
      ]);
    }
    return { ...HEADING_PRESETS[level], level, color: resolved, argb };
  }
}
