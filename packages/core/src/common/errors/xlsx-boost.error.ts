import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import type { ErrorCode, ErrorDetail } from '@xlsxboost/shared';

export class XlsxBoostError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly details?: ErrorDetail[],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'XlsxBoostError';
  }
}

export function toErrorDetails(error: ZodError): ErrorDetail[] {
  return error.issues.map((i) => ({
    path: i.path.join('.'),
    message: i.message,
  }));
}

/**
 * Validate `value` against `schema`. Failures throw INVALID_HEADING_LEVEL when the
 * level is at fault, INVALID_ARGUMENT otherwise.
 */
export function parseOptions<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  context: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details = toErrorDetails(result.error);
    const code: ErrorCode = details.some((d) => d.path === 'level')
      ? 'INVALID_HEADING_LEVEL'
      : 'INVALID_ARGUMENT';
    const summary = details.map((d) => `${d.path || '(root)'}: ${d.message}`).join('; ');
    throw new XlsxBoostError(code, `${context}: ${summary}`, details);
  }
  return result.data;
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
