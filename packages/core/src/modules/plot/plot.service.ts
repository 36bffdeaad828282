import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Canvas, SKRSContext2D } from '@napi-rs/canvas';
import { readFile } from 'fs/promises';
import type ExcelJS from 'exceljs';
import {
  argbToCss,
  buildCellAddress,
  colorToArgb,
  plotOptionsSchema,
  resolveInsertionPosition,
  type ParsedPlotOptions,
  type PlotOptions,
  type PlotPlacement,
} from '@xlsxboost/shared';
import { XLSX_BOOST_CONFIG } from '../../config/tokens';
import type { XlsxBoostConfig } from '../../config/xlsx-boost.config';
import { XlsxBoostError, errorMessage, parseOptions } from '../../common/errors/xlsx-boost.error';
import { assertWorksheetOf } from '../../common/utils/worksheet-utils';
import { PlotImageTarget } from './plot-image-target';

/** Draws a plot onto the canvas it is handed */
export type PlotRenderer = (context: SKRSContext2D, canvas: Canvas) => void | Promise<void>;

@Injectable()
export class PlotService {
  private readonly logger = new Logger(PlotService.name);

  constructor(@Inject(XLSX_BOOST_CONFIG) private readonly config: XlsxBoostConfig) {}

  /**
   * Render `render` to a temporary PNG, embed it at the resolved position and delete the PNG.
   *
   * A failing renderer rejects with RENDERING_FAILED and leaves the worksheet untouched;
   * the temp file is removed on every path.
   */
  async addPlot(
    workbook: ExcelJS.Workbook,
    worksheet: ExcelJS.Worksheet,
    render: PlotRenderer,
    options: PlotOptions = {},
  ): Promise<PlotPlacement> {
    assertWorksheetOf(workbook, worksheet);
    const parsed = parseOptions(plotOptionsSchema, options, 'Invalid plot options');
    const target = await this.openTarget(parsed);

    try {
      await this.renderInto(target, render);
      const placement = await this.insert(workbook, worksheet, target, parsed);
      const tempFileRemoved = await target.dispose();
      this.logger.debug(
        `Plot ${placement.width}x${placement.height} embedded at ${worksheet.name}!${placement.address}`,
      );
      return { ...placement, tempFileRemoved };
    } catch (err: unknown) {
      await target.dispose();
      throw err;
    }
  }

  private async openTarget(options: ParsedPlotOptions): Promise<PlotImageTarget> {
    const fileName = options.fileName ?? this.config.plotFileName;
    const fill = this.resolveBackground(options.background);
    try {
      return await PlotImageTarget.open(
        this.config.tempDir,
        fileName,
        options.width,
        options.height,
        fill,
      );
    } catch (err: unknown) {
      throw new XlsxBoostError(
        'FILESYSTEM_ERROR',
        `Failed to create temporary plot image in ${this.config.tempDir}: ${errorMessage(err)}`,
        undefined,
        { cause: err },
      );
    }
  }

  /** Canvas fill style for `background`; null for "transparent" */
  resolveBackground(background: string): string | null {
    if (background === 'transparent') return null;
    const argb = colorToArgb(background);
    if (!argb) {
      throw new XlsxBoostError('INVALID_ARGUMENT', `Unknown colour "${background}"`, [
        { path: 'background', message: 'Expected "transparent", a hex colour or a basic colour name' },
      ]);
    }
    return argbToCss(argb);
  }

  private async renderInto(target: PlotImageTarget, render: PlotRenderer): Promise<void> {
    let failure: { error: unknown } | null = null;
    try {
      await render(target.context, target.canvas);
    } catch (err: unknown) {
      failure = { error: err };
    }

    try {
      await target.finalize(failure === null);
    } catch (err: unknown) {
      if (failure === null) {
        throw new XlsxBoostError(
          'FILESYSTEM_ERROR',
          `Failed to write plot image ${target.path}: ${errorMessage(err)}`,
          undefined,
          { cause: err },
        );
      }
      this.logger.warn(`Failed to close ${target.path} after a rendering error: ${errorMessage(err)}`);
    }

    if (failure !== null) {
      throw new XlsxBoostError(
        'RENDERING_FAILED',
        `Plot rendering failed: ${errorMessage(failure.error)}`,
        undefined,
        { cause: failure.error },
      );
    }
  }

  private async insert(
    workbook: ExcelJS.Workbook,
    worksheet: ExcelJS.Worksheet,
    target: PlotImageTarget,
    options: ParsedPlotOptions,
  ): Promise<Omit<PlotPlacement, 'tempFileRemoved'>> {
    const { row, col } = resolveInsertionPosition(
      worksheet,
      options.startRow,
      options.startCol,
      this.config.defaultStartCol,
    );

    let base64: string;
    try {
      base64 = await readFile(target.path, { encoding: 'base64' });
    } catch (err: unknown) {
      throw new XlsxBoostError(
        'FILESYSTEM_ERROR',
        `Failed to read rendered plot ${target.path}: ${errorMessage(err)}`,
        undefined,
        { cause: err },
      );
    }

    // exceljs keeps the bytes, so the workbook no longer needs the temp file at save time
    const imageId = workbook.addImage({ base64, extension: 'png' });
    worksheet.addImage(imageId, {
      tl: { col: col - 1, row: row - 1 },
      ext: { width: options.width, height: options.height },
    });

    return {
      row,
      col,
      address: buildCellAddress(row, col),
      imageId,
      width: options.width,
      height: options.height,
    };
  }
}
