import { z } from 'zod';
import { SHEET_LIMITS } from '../constants/limits';

export const startRowSchema = z.number().int().min(1).max(SHEET_LIMITS.MAX_ROWS);
export const startColSchema = z.number().int().min(1).max(SHEET_LIMITS.MAX_COLS);
