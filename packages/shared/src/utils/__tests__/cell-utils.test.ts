import { describe, it, expect } from 'vitest';
import { colIndexToLetter, buildCellAddress } from '../cell-utils';

describe('colIndexToLetter', () => {
  it('converts single-letter columns', () => {
    expect(colIndexToLetter(0)).toBe('A');
    expect(colIndexToLetter(25)).toBe('Z');
  });

  it('converts double-letter columns', () => {
    expect(colIndexToLetter(26)).toBe('AA');
    expect(colIndexToLetter(701)).toBe('ZZ');
  });
});

describe('buildCellAddress', () => {
  it('builds A1 addresses from 1-based positions', () => {
    expect(buildCellAddress(1, 1)).toBe('A1');
    expect(buildCellAddress(6, 2)).toBe('B6');
    expect(buildCellAddress(10, 27)).toBe('AA10');
  });
});
