import { z } from 'zod';
import { HEADER_DEFAULTS } from '../constants/limits';
import { isHeadingLevel } from '../utils/heading-utils';
import { startRowSchema, startColSchema } from './position-schema';

export const headingLevelSchema = z
  .number()
  .int()
  .refine(isHeadingLevel, { message: 'Heading level must be an integer from 1 to 6' });

export const headerOptionsSchema = z.object({
  value: z.union([z.string(), z.number()]).default(HEADER_DEFAULTS.VALUE),
  level: headingLevelSchema.default(HEADER_DEFAULTS.LEVEL),
  color: z.string().min(1).default(HEADER_DEFAULTS.COLOR),
  startRow: startRowSchema.optional(),
  startCol: startColSchema.optional(),
}).strict();

export type HeaderOptions = z.input<typeof headerOptionsSchema>;
export type ParsedHeaderOptions = z.output<typeof headerOptionsSchema>;
