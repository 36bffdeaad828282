import { HEADING_LEVELS, type HeadingLevel } from '../types/heading-types';

export function isHeadingLevel(value: number): value is HeadingLevel {
  return HEADING_LEVELS.some((level) => level === value);
}
