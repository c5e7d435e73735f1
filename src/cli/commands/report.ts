/**
 * Report Command
 *
 * Feeds recorded diagnostics through a session and prints or exports the
 * statistics report. Pure function with dependency injection.
 */

import type { ResultAsync, Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, failure, misuse } from '../types/cli-result.js';
import type { ExportFailedError, FileAccessFailedError, ReportFormat } from '../../core/errors/app-error.js';
import { formatAppError } from '../../core/errors/formatter.js';
import { parseErrorRecords } from '../../domain/record-input.js';
import { REPORT_FORMATS, isReportFormat, renderReport } from '../../reporting/export.js';
import type { ErrorStatistics } from '../../reporting/statistics.js';
import type { ErrorHandlingSession } from '../../session/error-handling-session.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface ReportCommandDeps {
  readonly readFile: (p: string) => Result<string, FileAccessFailedError>;
  readonly createSession: () => ErrorHandlingSession;
  readonly exportReport: (stats: ErrorStatistics, p: string, format: ReportFormat) => ResultAsync<void, ExportFailedError>;
  readonly writeStdout: (text: string) => void;
}

export interface ReportCommandOptions {
  readonly format?: string;
  readonly out?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// COMMAND EXECUTION
// ═══════════════════════════════════════════════════════════════════════════

export async function executeReportCommand(
  filePath: string,
  options: ReportCommandOptions,
  deps: ReportCommandDeps
): Promise<CliResult> {
  const format = options.format ?? 'text';
  if (!isReportFormat(format)) {
    return misuse(`Unknown format: ${format}`, [`Use one of: ${REPORT_FORMATS.join(', ')}`]);
  }

  const records = deps.readFile(filePath).andThen((text) => parseErrorRecords(text, filePath));
  if (records.isErr()) {
    return failure(`Could not load diagnostics from ${filePath}`, { details: [formatAppError(records.error)] });
  }

  const session = deps.createSession();
  const stopped: string[] = [];
  for (const record of records.value) {
    const decision = session.handle(record);
    if (decision.action === 'abort' && stopped.length === 0) {
      stopped.push(`Processing would stop at line ${record.line}: ${decision.reason}`);
    }
  }
  const stats = session.statistics();
  session.close();

  if (options.out === undefined) {
    deps.writeStdout(renderReport(stats, format));
    return stopped.length === 0
      ? success()
      : failure('The error policy stopped processing', { exitCode: { kind: 'aborted' }, details: stopped });
  }

  const exported = await deps.exportReport(stats, options.out, format);
  if (exported.isErr()) {
    return failure(exported.error.message);
  }
  return success({
    message: `Wrote ${format} report for ${stats.totalErrors} errors to ${options.out}`,
    warnings: stopped,
  });
}
