/**
 * Recover Command
 *
 * Runs the recovery chain against one file for a described error.
 * Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import { ErrorRecord } from '../../domain/error-record.js';
import { ERROR_CATEGORIES, isErrorCategory, type ErrorCategory } from '../../domain/taxonomy.js';
import type { RecoveryManager } from '../../recovery/recovery-manager.js';
import type { RecoveryContext } from '../../recovery/types.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface RecoverCommandDeps {
  readonly recovery: RecoveryManager;
  readonly resolvePath: (p: string) => string;
}

export interface RecoverCommandOptions {
  readonly type: string;
  readonly category?: string;
  readonly line?: string;
  readonly message?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function executeRecoverCommand(
  filePath: string,
  options: RecoverCommandOptions,
  deps: RecoverCommandDeps
): CliResult {
  let category: ErrorCategory | undefined;
  if (options.category !== undefined) {
    if (!isErrorCategory(options.category)) {
      return misuse(`Unknown category: ${options.category}`, [`Use one of: ${ERROR_CATEGORIES.join(', ')}`]);
    }
    category = options.category;
  }

  const line = options.line === undefined ? 1 : Number(options.line);
  if (!Number.isInteger(line) || line < 1) {
    return misuse(`--line must be a positive integer, got ${options.line ?? ''}`);
  }

  const resolved = deps.resolvePath(filePath);
  const record = new ErrorRecord({
    line,
    column: 0,
    errorType: options.type,
    severity: 'error',
    message: options.message ?? options.type,
    filePath: resolved,
    category,
  });

  const context: RecoveryContext = { filePath: resolved, lineNumber: line };
  const outcome = deps.recovery.attemptRecovery(record, context);

  if (outcome.kind === 'failure') {
    return failure(`Recovery failed for ${resolved}`, { details: [outcome.reason] });
  }

  const details = [outcome.message];
  if (context.filePath !== undefined && context.filePath !== resolved) {
    details.push(`Continue with: ${context.filePath}`);
  }
  if (context.suggestChunkedProcessing === true) {
    details.push('Process the input in chunks');
  }
  return success({ message: `Recovered ${resolved}`, details });
}
