import { tmpdir } from 'os';
import { z } from 'zod';
import { PLOT_FILE_NAME_PATTERN, startColSchema } from '@xlsxboost/shared';
import { validateEnv } from './env.config';
import { parseOptions } from '../common/errors/xlsx-boost.error';

/** Explicit settings; each one wins over its XLSXBOOST_* environment variable */
export interface XlsxBoostOptions {
  /** Parent directory for temporary plot images (default: os.tmpdir()) */
  tempDir?: string;
  plotFileName?: string;
  /** Column used when a header or plot is placed without startCol */
  defaultStartCol?: number;
  resetJavaHome?: boolean;
  /** Program that replaces the platform opener, e.g. "libreoffice --calc" */
  openCommand?: string;
  /** Node.js platform id (default: process.platform) */
  platform?: string;
  /** Environment to read XLSXBOOST_* variables from (default: process.env) */
  env?: Record<string, string | undefined>;
}

const configSchema = z.object({
  tempDir: z.string().min(1),
  plotFileName: z.string().regex(PLOT_FILE_NAME_PATTERN, 'Expected a bare *.png file name'),
  defaultStartCol: startColSchema,
  resetJavaHome: z.boolean(),
  openCommand: z.string().min(1).optional(),
  platform: z.string().min(1),
});

export type XlsxBoostConfig = Readonly<z.output<typeof configSchema>>;

export function loadConfig(options: XlsxBoostOptions = {}): XlsxBoostConfig {
  const env = validateEnv(options.env ?? process.env);

  const config = parseOptions(
    configSchema,
    {
      tempDir: options.tempDir ?? env.XLSXBOOST_TEMP_DIR ?? tmpdir(),
      plotFileName: options.plotFileName ?? env.XLSXBOOST_PLOT_FILENAME,
      defaultStartCol: options.defaultStartCol ?? env.XLSXBOOST_DEFAULT_START_COL,
      resetJavaHome: options.resetJavaHome ?? env.XLSXBOOST_RESET_JAVA_HOME,
      openCommand: options.openCommand ?? env.XLSXBOOST_OPEN_COMMAND,
      platform: options.platform ?? process.platform,
    },
    'Invalid xlsxboost configuration',
  );
  return Object.freeze(config);
}
