import { z } from 'zod';
import {
  HEADER_DEFAULTS,
  PLOT_DEFAULTS,
  PLOT_FILE_NAME_PATTERN,
  SHEET_LIMITS,
} from '@xlsxboost/shared';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  XLSXBOOST_TEMP_DIR: z.string().min(1).optional(),
  XLSXBOOST_PLOT_FILENAME: z
    .string()
    .regex(PLOT_FILE_NAME_PATTERN, 'Expected a bare *.png file name')
    .default(PLOT_DEFAULTS.FILE_NAME),
  XLSXBOOST_DEFAULT_START_COL: z.coerce
    .number()
    .int()
    .min(1)
    .max(SHEET_LIMITS.MAX_COLS)
    .default(HEADER_DEFAULTS.START_COL),
  XLSXBOOST_RESET_JAVA_HOME: booleanFlag.default('false'),
  XLSXBOOST_OPEN_COMMAND: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}
