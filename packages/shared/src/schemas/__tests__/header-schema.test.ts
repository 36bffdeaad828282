import { describe, it, expect } from 'vitest';
import { headerOptionsSchema, headingLevelSchema } from '../header-schema';

describe('headingLevelSchema', () => {
  it('accepts levels 1 through 6', () => {
    for (const level of [1, 2, 3, 4, 5, 6]) {
      expect(headingLevelSchema.safeParse(level).success).toBe(true);
    }
  });

  it('rejects levels outside 1-6', () => {
    expect(headingLevelSchema.safeParse(0).success).toBe(false);
    expect(headingLevelSchema.safeParse(7).success).toBe(false);
    expect(headingLevelSchema.safeParse(-1).success).toBe(false);
  });

  it('rejects fractional levels', () => {
    expect(headingLevelSchema.safeParse(2.5).success).toBe(false);
  });
});

describe('headerOptionsSchema', () => {
  it('fills in defaults', () => {
    const result = headerOptionsSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).toEqual({ value: 'Header', level: 1, color: '#FFFFFF' });
    }
  });

  it('accepts explicit position', () => {
    const result = headerOptionsSchema.safeParse({ value: 'Q1', level: 3, startRow: 10, startCol: 4 });
    expect(result.success).toBe(true);
  });

  it('accepts numeric values', () => {
    expect(headerOptionsSchema.safeParse({ value: 2024 }).success).toBe(true);
  });

  it('rejects zero-based rows', () => {
    const result = headerOptionsSchema.safeParse({ startRow: 0 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['startRow']);
    }
  });

  it('rejects columns past the sheet limit', () => {
    expect(headerOptionsSchema.safeParse({ startCol: 16_385 }).success).toBe(false);
  });

  it('rejects an empty colour', () => {
    expect(headerOptionsSchema.safeParse({ color: '' }).success).toBe(false);
  });

  it('rejects unknown keys', () => {
    expect(headerOptionsSchema.safeParse({ underline: true }).success).toBe(false);
  });

  it('reports the level path for a bad level', () => {
    const result = headerOptionsSchema.safeParse({ level: 9 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['level']);
      expect(result.error.issues[0]?.message).toBe('Heading level must be an integer from 1 to 6');
    }
  });
});
