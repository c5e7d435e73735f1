/**
 * Error Factories - Consistent Error Construction
 *
 * Err namespace for all AppError constructors.
 */

import type {
  ConfigIssue,
  ConfigInvalidError,
  RecordInvalidData,
  ReportInvalidError,
  FileAccessFailedError,
  FileOperation,
  ExportFailedError,
  ReportFormat,
} from './app-error.js';

export const Err = {
  configInvalid: (source: string, issues: readonly ConfigIssue[]): ConfigInvalidError => ({
    _tag: 'ConfigInvalid',
    source,
    issues,
    message: `Configuration invalid (${source}):\n${issues.map(i => `  - ${i.path}: ${i.message}`).join('\n')}`,
  }),

  recordInvalid: (field: string, value: unknown, issues: string): RecordInvalidData => ({
    _tag: 'RecordInvalid',
    field,
    value: String(value),
    issues,
    message: `Invalid error record ${field} (${String(value)}): ${issues}`,
  }),

  reportInvalid: (source: string, details: string): ReportInvalidError => ({
    _tag: 'ReportInvalid',
    source,
    details,
    message: `Invalid statistics report from ${source}: ${details}`,
  }),

  fileAccessFailed: (
    path: string,
    operation: FileOperation,
    cause: unknown
  ): FileAccessFailedError => ({
    _tag: 'FileAccessFailed',
    path,
    operation,
    code: errorCode(cause),
    message: `Failed to ${operation} ${path}: ${describeCause(cause)}`,
  }),

  exportFailed: (path: string, format: ReportFormat, cause: unknown): ExportFailedError => ({
    _tag: 'ExportFailed',
    path,
    format,
    details: describeCause(cause),
    message: `Failed to export ${format} report to ${path}: ${describeCause(cause)}`,
  }),
};

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

function errorCode(cause: unknown): string | undefined {
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    return typeof cause.code === 'string' ? cause.code : undefined;
  }
  return undefined;
}
