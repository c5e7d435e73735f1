/**
 * Recovery Strategy contract and the working context strategies read.
 *
 * @module recovery/types
 */

import type { ErrorRecord } from '../domain/error-record.js';
import type { RecoveryContextUpdate, RecoveryOutcome } from '../domain/recovery-outcome.js';

/**
 * Mutable working context for one handled record. The manager merges each
 * successful strategy's `contextUpdate` into it.
 */
export interface RecoveryContext {
  filePath?: string;
  originalFilePath?: string;
  lineNumber?: number;
  fileSize?: number;
  tempFileRecovery?: boolean;
  fileRecovery?: boolean;
  similarFiles?: readonly string[];
  suggestChunkedProcessing?: boolean;
}

export interface RecoveryStrategy {
  readonly name: string;
  /** Lower runs first. */
  readonly priority: number;
  /** Pure predicate over the record and the context keys present. */
  canHandle(record: ErrorRecord, context: Readonly<RecoveryContext>): boolean;
  /** Never throws; I/O failures come back as `failure` outcomes. */
  attempt(record: ErrorRecord, context: Readonly<RecoveryContext>): RecoveryOutcome;
}

export function targetFile(record: ErrorRecord, context: Readonly<RecoveryContext>): string | undefined {
  return context.filePath ?? record.filePath;
}

export function mentions(record: ErrorRecord, pattern: RegExp): boolean {
  return pattern.test(`${record.errorType} ${record.message}`.toLowerCase());
}

export function applyContextUpdate(context: RecoveryContext, update: RecoveryContextUpdate): void {
  Object.assign(context, update);
}
