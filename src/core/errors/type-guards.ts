/**
 * Error Type Guards
 */

import type {
  AppError,
  ConfigurationError,
  DataError,
  IoError,
} from './app-error.js';

export function isAppError(e: unknown): e is AppError {
  return typeof e === 'object' && e !== null && '_tag' in e && 'message' in e;
}

export function isConfigurationError(e: AppError): e is ConfigurationError {
  return e._tag === 'ConfigInvalid';
}

export function isDataError(e: AppError): e is DataError {
  return e._tag === 'RecordInvalid' || e._tag === 'ReportInvalid';
}

export function isIoError(e: AppError): e is IoError {
  return e._tag === 'FileAccessFailed' || e._tag === 'ExportFailed';
}
