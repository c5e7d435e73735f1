/**
 * Classify Command
 *
 * Runs one message (and optional context) through classification,
 * suggestions and highlighting. Pure function with dependency injection.
 */

import type { CliResult } from '../types/cli-result.js';
import { success, misuse } from '../types/cli-result.js';
import type { CorrectionEngine } from '../../analysis/correction-engine.js';
import { ErrorRecord } from '../../domain/error-record.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ClassifyCommandDeps {
  readonly engine: CorrectionEngine;
}

export interface ClassifyCommandOptions {
  readonly context?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export function executeClassifyCommand(
  messageParts: readonly string[],
  options: ClassifyCommandOptions,
  deps: ClassifyCommandDeps
): CliResult {
  const message = messageParts.join(' ').trim();
  if (message.length === 0) {
    return misuse('A message to classify is required', ['graceful-markup classify "marker mismatch error"']);
  }

  const record = new ErrorRecord({
    line: 1,
    column: 0,
    errorType: 'cli',
    severity: 'error',
    message,
    context: options.context,
  });
  const patternId = deps.engine.enhanceErrorWithSuggestions(record);

  const details = [`Category: ${record.category}`];
  const span = record.highlight;
  if (span !== null && span.end > span.start) {
    details.push(`Highlight: "${record.context.slice(span.start, span.end)}" [${span.start}, ${span.end})`);
  }

  return success({
    message: `Pattern: ${patternId}`,
    details,
    suggestions: record.suggestions,
  });
}
