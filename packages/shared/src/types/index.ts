export { HEADING_LEVELS } from './heading-types';
export type { HeadingLevel, HeadingPreset, HeadingStyle } from './heading-types';
export type { InsertionPosition, RowCountSource } from './position-types';
export type { HeaderPlacement, PlotPlacement } from './placement-types';
export { OS_FAMILIES } from './platform-types';
export type { OsFamily, RuntimeEnvironment, OpenCommand } from './platform-types';
export { ERROR_CODES } from './error-types';
export type { ErrorCode, ErrorDetail } from './error-types';
