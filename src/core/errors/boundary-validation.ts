/**
 * Boundary Validation Helpers
 *
 * Validate at every I/O boundary (disk → memory).
 */

import { Result, ok, err } from 'neverthrow';
import type { z } from 'zod';
import type { ConfigIssue, ConfigInvalidError, ReportInvalidError } from './app-error.js';
import { Err } from './factories.js';

export function toConfigIssues(error: z.ZodError): readonly ConfigIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.length ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Validate configuration data (file/env → memory boundary).
 */
export function validateConfigLoad<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  source: string
): Result<T, ConfigInvalidError> {
  const result = schema.safeParse(data);
  if (!result.success) {
    return err(Err.configInvalid(source, toConfigIssues(result.error)));
  }
  return ok(result.data);
}

/**
 * Validate JSON report data (disk → memory boundary).
 */
export function validateJSONLoad<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  source: string
): Result<T, ReportInvalidError> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const details = result.error.errors
      .map(e => `${e.path.join('.')}: ${e.message}`)
      .join('\n');
    return err(Err.reportInvalid(source, details));
  }
  return ok(result.data);
}

/**
 * JSON.parse as a Result.
 */
export const parseJson = (text: string, source: string): Result<unknown, ReportInvalidError> =>
  Result.fromThrowable(
    (): unknown => JSON.parse(text),
    (e) => Err.reportInvalid(source, e instanceof Error ? e.message : String(e))
  )();
