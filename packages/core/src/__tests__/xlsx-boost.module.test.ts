import { describe, it, expect, vi, afterEach } from 'vitest';
import { Test, type TestingModule } from '@nestjs/testing';
import { EventEmitter } from 'events';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import ExcelJS from 'exceljs';
import { XlsxBoostModule } from '../xlsx-boost.module';
import { createXlsxBoost } from '../xlsx-boost';
import { XLSX_BOOST_CONFIG } from '../config/tokens';
import type { XlsxBoostConfig } from '../config/xlsx-boost.config';
import { EnvironmentService } from '../modules/environment/environment.service';
import { FileOpenerService } from '../modules/file-opener/file-opener.service';
import { HeaderService } from '../modules/header/header.service';
import { PlotService } from '../modules/plot/plot.service';
import type { ProcessLauncher } from '../modules/file-opener/process-launcher';

describe('XlsxBoostModule', () => {
  let moduleRef: TestingModule | null = null;

  afterEach(async () => {
    await moduleRef?.close();
    moduleRef = null;
  });

  it('provides the resolved config and every service', async () => {
    moduleRef = await Test.createTestingModule({
      imports: [XlsxBoostModule.forRoot({ env: {}, platform: 'linux', defaultStartCol: 3 })],
    }).compile();

    const config = moduleRef.get<XlsxBoostConfig>(XLSX_BOOST_CONFIG);
    expect(config.defaultStartCol).toBe(3);
    expect(config.platform).toBe('linux');
    expect(moduleRef.get(EnvironmentService)).toBeInstanceOf(EnvironmentService);
    expect(moduleRef.get(FileOpenerService)).toBeInstanceOf(FileOpenerService);
    expect(moduleRef.get(PlotService)).toBeInstanceOf(PlotService);
  });

  it('wires the config into the header service', async () => {
    moduleRef = await Test.createTestingModule({
      imports: [XlsxBoostModule.forRoot({ env: {}, defaultStartCol: 3 })],
    }).compile();

    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Report');
    const placement = moduleRef.get(HeaderService).addHeader(workbook, sheet, { value: 'Title' });

    expect(placement.address).toBe('C1');
  });

  it('hands the injected launcher to the file opener', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'xlsxboost-module-'));
    try {
      await writeFile(join(dir, 'report.xlsx'), 'placeholder');
      const launcher = vi.fn<ProcessLauncher>(() => {
        const child = Object.assign(new EventEmitter(), { unref: vi.fn() });
        setImmediate(() => child.emit('spawn'));
        return child;
      });
      moduleRef = await Test.createTestingModule({
        imports: [XlsxBoostModule.forRoot({ env: {}, platform: 'darwin', launcher })],
      }).compile();

      await moduleRef.get(FileOpenerService).openFile('report.xlsx', dir);

      expect(launcher).toHaveBeenCalledWith('open', [join(dir, 'report.xlsx')], expect.anything());
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('createXlsxBoost', () => {
  it('builds the services from one config', () => {
    const boost = createXlsxBoost({ env: { XLSXBOOST_DEFAULT_START_COL: '4' }, platform: 'win32' });

    expect(boost.config.defaultStartCol).toBe(4);
    expect(boost.environment.initialize({}, {}).osFamily).toBe('windows');

    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Report');
    expect(boost.headers.addHeader(workbook, sheet).address).toBe('D1');
  });
});
