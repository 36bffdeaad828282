import { z } from 'zod';
import { PLOT_DEFAULTS } from '../constants/limits';
import { isPlotBackground } from '../utils/color-utils';
import { startRowSchema, startColSchema } from './position-schema';

/** Bare PNG file name, no directory parts */
export const PLOT_FILE_NAME_PATTERN = /^[\w.-]+\.png$/;

const dimensionSchema = z.number().int().min(1).max(PLOT_DEFAULTS.MAX_DIMENSION);

export const plotOptionsSchema = z.object({
  startRow: startRowSchema.optional(),
  startCol: startColSchema.optional(),
  width: dimensionSchema.default(PLOT_DEFAULTS.WIDTH),
  height: dimensionSchema.default(PLOT_DEFAULTS.HEIGHT),
  /** Canvas fill before rendering; "transparent" leaves it empty */
  background: z
    .string()
    .refine(isPlotBackground, 'Expected "transparent", a hex colour or a basic colour name')
    .default(PLOT_DEFAULTS.BACKGROUND),
  fileName: z.string().regex(PLOT_FILE_NAME_PATTERN, 'Expected a bare *.png file name').optional(),
}).strict();

export type PlotOptions = z.input<typeof plotOptionsSchema>;
export type ParsedPlotOptions = z.output<typeof plotOptionsSchema>;
