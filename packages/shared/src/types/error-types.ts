export const ERROR_CODES = [
  'UNSUPPORTED_PLATFORM',
  'INVALID_ARGUMENT',
  'INVALID_HEADING_LEVEL',
  'RENDERING_FAILED',
  'FILESYSTEM_ERROR',
  'OPEN_FAILED',
] as const;
export type ErrorCode = (typeof ERROR_CODES)[number];

/** One validation problem, keyed by the option path */
export interface ErrorDetail {
  path: string;
  message: string;
}
