import { Inject, Injectable, Logger } from '@nestjs/common';
import { once } from 'events';
import { stat } from 'fs/promises';
import { resolve } from 'path';
import type ExcelJS from 'exceljs';
import { buildOpenCommand } from '@xlsxboost/shared';
import { PROCESS_LAUNCHER, XLSX_BOOST_CONFIG } from '../../config/tokens';
import type { XlsxBoostConfig } from '../../config/xlsx-boost.config';
import { XlsxBoostError, errorMessage } from '../../common/errors/xlsx-boost.error';
import { EnvironmentService } from '../environment/environment.service';
import type { ProcessLauncher } from './process-launcher';

@Injectable()
export class FileOpenerService {
  private readonly logger = new Logger(FileOpenerService.name);

  constructor(
    @Inject(XLSX_BOOST_CONFIG) private readonly config: XlsxBoostConfig,
    @Inject(EnvironmentService) private readonly environment: EnvironmentService,
    @Inject(PROCESS_LAUNCHER) private readonly launch: ProcessLauncher,
  ) {}

  /**
   * Open a file with the OS default application.
   * @param fileName path relative to `cwd` (absolute paths are used as-is)
   * @returns the absolute path that was opened
   */
  async openFile(fileName: string, cwd: string = process.cwd()): Promise<string> {
    if (!fileName.trim()) {
      throw new XlsxBoostError('INVALID_ARGUMENT', 'File name must not be empty');
    }
    const absolutePath = resolve(cwd, fileName);

    const runtime = this.environment.initialize();
    const open = buildOpenCommand(runtime.osFamily, absolutePath, this.config.openCommand);
    if (!open) {
      throw new XlsxBoostError(
        'UNSUPPORTED_PLATFORM',
        `No default-application opener for platform "${this.config.platform}"`,
      );
    }

    await this.assertFile(absolutePath);

    const child = this.launch(open.command, open.args, {
      cwd,
      env: runtime.env,
      detached: true,
      stdio: 'ignore',
      windowsVerbatimArguments: open.verbatimArguments,
    });
    try {
      await once(child, 'spawn');
    } catch (err: unknown) {
      throw new XlsxBoostError(
        'OPEN_FAILED',
        `Failed to launch ${open.command}: ${errorMessage(err)}`,
        undefined,
        { cause: err },
      );
    }
    child.unref();

    this.logger.log(`Opened ${absolutePath} with ${open.command}`);
    return absolutePath;
  }

  /** Write the workbook to `fileName` (relative to `cwd`) and open it */
  async saveAndOpen(
    workbook: ExcelJS.Workbook,
    fileName: string,
    cwd: string = process.cwd(),
  ): Promise<string> {
    const absolutePath = resolve(cwd, fileName);
    try {
      await workbook.xlsx.writeFile(absolutePath);
    } catch (err: unknown) {
      throw new XlsxBoostError(
        'FILESYSTEM_ERROR',
        `Failed to save workbook to ${absolutePath}: ${errorMessage(err)}`,
        undefined,
        { cause: err },
      );
    }
    this.logger.log(`Workbook saved to ${absolutePath}`);
    return this.openFile(absolutePath, cwd);
  }

  private async assertFile(absolutePath: string): Promise<void> {
    let isFile: boolean;
    try {
      isFile = (await stat(absolutePath)).isFile();
    } catch (err: unknown) {
      throw new XlsxBoostError(
        'FILESYSTEM_ERROR',
        `Cannot open ${absolutePath}: ${errorMessage(err)}`,
        undefined,
        { cause: err },
      );
    }
    if (!isFile) {
      throw new XlsxBoostError('FILESYSTEM_ERROR', `Cannot open ${absolutePath}: not a file`);
    }
  }
}
