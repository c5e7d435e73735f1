/**
 * Error Hierarchy - Discriminated Unions
 *
 * Errors are data, not exceptions. These cover the boundaries of the
 * pipeline (config, report files, exports); markup diagnostics themselves
 * are ErrorRecords, not AppErrors.
 */

export type AppError =
  | ConfigurationError
  | DataError
  | IoError;

// ============================================================================
// Configuration Errors
// ============================================================================

export type ConfigurationError = ConfigInvalidError;

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

export interface ConfigInvalidError {
  readonly _tag: 'ConfigInvalid';
  readonly source: string;
  readonly issues: readonly ConfigIssue[];
  readonly message: string;
}

// ============================================================================
// Data Errors (bad records, bad report files)
// ============================================================================

export type DataError =
  | RecordInvalidData
  | ReportInvalidError;

export interface RecordInvalidData {
  readonly _tag: 'RecordInvalid';
  readonly field: string;
  readonly value: string;
  readonly issues: string;
  readonly message: string;
}

export interface ReportInvalidError {
  readonly _tag: 'ReportInvalid';
  readonly source: string;
  readonly details: string;
  readonly message: string;
}

// ============================================================================
// I/O Errors
// ============================================================================

export type IoError =
  | FileAccessFailedError
  | ExportFailedError;

export type FileOperation = 'read' | 'write' | 'copy' | 'move' | 'stat' | 'list' | 'chmod' | 'mkdtemp' | 'remove';

export interface FileAccessFailedError {
  readonly _tag: 'FileAccessFailed';
  readonly path: string;
  readonly operation: FileOperation;
  readonly code?: string;
  readonly message: string;
}

export type ReportFormat = 'json' | 'html' | 'text';

export interface ExportFailedError {
  readonly _tag: 'ExportFailed';
  readonly path: string;
  readonly format: ReportFormat;
  readonly details: string;
  readonly message: string;
}
