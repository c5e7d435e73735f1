/**
 * Error Formatting for CLI output and logs
 */

import type { AppError } from './app-error.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface FormattedError {
  readonly error: string;
  readonly message: string;
  readonly details: Record<string, unknown>;
  readonly actionable: string;
}

export function formatError(error: AppError): FormattedError {
  switch (error._tag) {
    case 'ConfigInvalid':
      return {
        error: error._tag,
        message: error.message,
        details: { source: error.source, issues: error.issues },
        actionable: `Fix the listed settings in ${error.source}`,
      };

    case 'RecordInvalid':
      return {
        error: error._tag,
        message: error.message,
        details: { field: error.field, value: error.value },
        actionable: `Fix ${error.field}: ${error.issues}`,
      };

    case 'ReportInvalid':
      return {
        error: error._tag,
        message: error.message,
        details: { source: error.source },
        actionable: `Regenerate the report; ${error.source} is not a statistics export`,
      };

    case 'FileAccessFailed':
      return {
        error: error._tag,
        message: error.message,
        details: { path: error.path, operation: error.operation, code: error.code },
        actionable: error.code === 'EACCES' || error.code === 'EPERM'
          ? `Check permissions on ${error.path}`
          : `Check that ${error.path} exists and is readable`,
      };

    case 'ExportFailed':
      return {
        error: error._tag,
        message: error.message,
        details: { path: error.path, format: error.format },
        actionable: `Check that the directory of ${error.path} exists and is writable`,
      };

    default:
      return assertNever(error);
  }
}

/**
 * One-line-per-fact text form, used by the CLI and the container bootstrap.
 */
export function formatAppError(error: AppError): string {
  const formatted = formatError(error);
  return `${formatted.message}\n  → ${formatted.actionable}`;
}
