/**
 * Schema for exported JSON statistics reports (disk → memory boundary).
 */

import { z } from 'zod';
import type { Result } from 'neverthrow';
import { parseJson, validateJSONLoad } from '../core/errors/boundary-validation.js';
import type { ReportInvalidError } from '../core/errors/app-error.js';
import { ERROR_CATEGORIES, SEVERITIES } from '../domain/taxonomy.js';
import { REPORT_VERSION, type StatisticsReport } from './renderers.js';
import type { ErrorStatistics } from './statistics.js';

const count = z.number().int().nonnegative();

export const ErrorStatisticsSchema: z.ZodType<ErrorStatistics, z.ZodTypeDef, unknown> = z.object({
  totalErrors: count,
  bySeverity: z.record(z.enum(SEVERITIES), count),
  byPattern: z.record(z.string(), count),
  byCategory: z.record(z.enum(ERROR_CATEGORIES), count),
  lineRanges: z.object({
    '1-10': count,
    '11-50': count,
    '51-100': count,
    '100+': count,
  }),
  topPatterns: z.array(z.object({
    patternId: z.string(),
    count,
    percentage: z.number().min(0).max(100),
    exampleMessage: z.string(),
  })).max(5),
  totalSuggestions: count,
  recoveredCount: count,
  recoveryRate: z.number().min(0).max(1),
});

export const StatisticsReportSchema: z.ZodType<StatisticsReport, z.ZodTypeDef, unknown> = z.object({
  version: z.literal(REPORT_VERSION),
  generatedAt: z.string().datetime(),
  statistics: ErrorStatisticsSchema,
});

/**
 * Parse an exported JSON report back into statistics.
 */
export function parseStatisticsReport(json: string, source = 'report'): Result<ErrorStatistics, ReportInvalidError> {
  return parseJson(json, source)
    .andThen((data) => validateJSONLoad(StatisticsReportSchema, data, source))
    .map((report) => report.statistics);
}
