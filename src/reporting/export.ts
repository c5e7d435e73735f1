import * as fs from 'fs/promises';
import { ResultAsync } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { ExportFailedError, ReportFormat } from '../core/errors/app-error.js';
import { assertNever } from '../runtime/assert-never.js';
import { renderHtmlReport, renderTextSummary, toStructuredSummary } from './renderers.js';
import type { ErrorStatistics } from './statistics.js';

export const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'html', 'text'];

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

export function renderReport(stats: ErrorStatistics, format: ReportFormat, generatedAt: Date = new Date()): string {
  switch (format) {
    case 'json':
      return `${JSON.stringify(toStructuredSummary(stats, generatedAt), null, 2)}\n`;
    case 'html':
      return `${renderHtmlReport(stats)}\n`;
    case 'text':
      return `${renderTextSummary(stats)}\n`;
    default:
      return assertNever(format);
  }
}

/**
 * Write the report for `stats` to `filePath` (UTF-8, replacing the file).
 */
export function exportReport(
  stats: ErrorStatistics,
  filePath: string,
  format: ReportFormat,
  generatedAt: Date = new Date()
): ResultAsync<void, ExportFailedError> {
  return ResultAsync.fromPromise(
    fs.writeFile(filePath, renderReport(stats, format, generatedAt), 'utf8'),
    (e) => Err.exportFailed(filePath, format, e)
  );
}
