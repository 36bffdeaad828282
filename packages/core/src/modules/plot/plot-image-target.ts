import { Logger } from '@nestjs/common';
import { createCanvas, type Canvas, type SKRSContext2D } from '@napi-rs/canvas';
import { mkdtemp, open, rm, type FileHandle } from 'fs/promises';
import { join } from 'path';
import { PLOT_DEFAULTS } from '@xlsxboost/shared';
import { errorMessage } from '../../common/errors/xlsx-boost.error';

/**
 * A canvas bound to a PNG file in its own temp directory. The file handle is held
 * from `open` until `finalize`; `dispose` removes file and directory.
 */
export class PlotImageTarget {
  private readonly logger = new Logger(PlotImageTarget.name);
  private handle: FileHandle | null;

  private constructor(
    readonly directory: string,
    readonly path: string,
    handle: FileHandle,
    readonly canvas: Canvas,
    readonly context: SKRSContext2D,
  ) {
    this.handle = handle;
  }

  /** `fill` is a canvas fill style, or null to leave the canvas transparent */
  static async open(
    parentDir: string,
    fileName: string,
    width: number,
    height: number,
    fill: string | null,
  ): Promise<PlotImageTarget> {
    const canvas = createCanvas(width, height);
    const context = canvas.getContext('2d');
    if (fill !== null) {
      context.fillStyle = fill;
      context.fillRect(0, 0, width, height);
    }

    const directory = await mkdtemp(join(parentDir, PLOT_DEFAULTS.TEMP_DIR_PREFIX));
    const path = join(directory, fileName);

    let handle: FileHandle;
    try {
      handle = await open(path, 'wx');
    } catch (err: unknown) {
      await rm(directory, { recursive: true, force: true });
      throw err;
    }
    return new PlotImageTarget(directory, path, handle, canvas, context);
  }

  get isOpen(): boolean {
    return this.handle !== null;
  }

  /** Encode and write the PNG when `commit` is set; close the handle either way */
  async finalize(commit: boolean): Promise<void> {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    try {
      if (commit) {
        const png = await this.canvas.encode('png');
        await handle.writeFile(png);
      }
    } finally {
      await handle.close();
    }
  }

  /** Close if still open, then delete the image and its directory. Resolves to whether the image was deleted. */
  async dispose(): Promise<boolean> {
    await this.finalize(false);

    let removed = true;
    try {
      await rm(this.path);
    } catch (err: unknown) {
      removed = false;
      this.logger.warn(`Could not delete ${this.path}: ${errorMessage(err)}`);
    }
    try {
      await rm(this.directory, { recursive: true, force: true });
    } catch (err: unknown) {
      this.logger.warn(`Could not delete ${this.directory}: ${errorMessage(err)}`);
    }
    return removed;
  }
}
