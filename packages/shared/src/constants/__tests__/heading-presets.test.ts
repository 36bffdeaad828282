import { describe, it, expect } from 'vitest';
import { HEADING_LEVELS } from '../../types/heading-types';
import { HEADING_PRESETS } from '../heading-presets';

describe('HEADING_PRESETS', () => {
  it('maps each level to its size', () => {
    expect(HEADING_LEVELS.map((l) => HEADING_PRESETS[l].size)).toEqual([22, 18, 16, 16, 14, 12]);
  });

  it('bolds levels 1-3 only', () => {
    expect(HEADING_PRESETS[1].bold).toBe(true);
    expect(HEADING_PRESETS[2].bold).toBe(true);
    expect(HEADING_PRESETS[3].bold).toBe(true);
    expect(HEADING_PRESETS[4].bold).toBe(false);
    expect(HEADING_PRESETS[5].bold).toBe(false);
    expect(HEADING_PRESETS[6].bold).toBe(false);
  });

  it('italicises levels 3-6 only', () => {
    expect(HEADING_PRESETS[1].italic).toBe(false);
    expect(HEADING_PRESETS[2].italic).toBe(false);
    expect(HEADING_PRESETS[3].italic).toBe(true);
    expect(HEADING_PRESETS[6].italic).toBe(true);
  });

  it('never underlines', () => {
    for (const preset of Object.values(HEADING_PRESETS)) {
      expect(preset.underline).toBe(false);
    }
  });
});
