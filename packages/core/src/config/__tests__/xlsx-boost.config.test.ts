import { describe, it, expect } from 'vitest';
import { tmpdir } from 'os';
import { loadConfig } from '../xlsx-boost.config';
import { XlsxBoostError } from '../../common/errors/xlsx-boost.error';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({ env: {}, platform: 'linux' })).toEqual({
      tempDir: tmpdir(),
      plotFileName: 'plot.png',
      defaultStartCol: 2,
      resetJavaHome: false,
      openCommand: undefined,
      platform: 'linux',
    });
  });

  it('reads XLSXBOOST_* variables', () => {
    const config = loadConfig({
      env: {
        XLSXBOOST_TEMP_DIR: '/var/tmp/plots',
        XLSXBOOST_PLOT_FILENAME: 'chart.png',
        XLSXBOOST_DEFAULT_START_COL: '4',
        XLSXBOOST_RESET_JAVA_HOME: 'true',
      },
    });
    expect(config.tempDir).toBe('/var/tmp/plots');
    expect(config.plotFileName).toBe('chart.png');
    expect(config.defaultStartCol).toBe(4);
    expect(config.resetJavaHome).toBe(true);
  });

  it('lets explicit options win over the environment', () => {
    const config = loadConfig({
      env: { XLSXBOOST_DEFAULT_START_COL: '4', XLSXBOOST_OPEN_COMMAND: 'xdg-open' },
      defaultStartCol: 3,
      openCommand: 'libreoffice --calc',
    });
    expect(config.defaultStartCol).toBe(3);
    expect(config.openCommand).toBe('libreoffice --calc');
  });

  it('defaults the platform to the current process', () => {
    expect(loadConfig({ env: {} }).platform).toBe(process.platform);
  });

  it('returns a frozen config', () => {
    expect(Object.isFrozen(loadConfig({ env: {} }))).toBe(true);
  });

  it('rejects invalid explicit options', () => {
    expect(() => loadConfig({ env: {}, defaultStartCol: 0 })).toThrow(XlsxBoostError);
    expect(() => loadConfig({ env: {}, plotFileName: 'plot.svg' })).toThrow(
      'Invalid xlsxboost configuration: plotFileName: Expected a bare *.png file name',
    );
  });
});
