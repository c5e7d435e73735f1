/**
 * Recorded diagnostics as JSON (a parser's dump, a CLI input file).
 */

import { z } from 'zod';
import { Result, ok, err } from 'neverthrow';
import { parseJson, validateJSONLoad } from '../core/errors/boundary-validation.js';
import { Err } from '../core/errors/factories.js';
import type { ReportInvalidError } from '../core/errors/app-error.js';
import { RecordInvalidError } from '../core/errors/record-invalid-error.js';
import { ErrorRecord, type ErrorRecordInit } from './error-record.js';
import { ERROR_CATEGORIES, SEVERITIES } from './taxonomy.js';

export const ErrorRecordInputSchema = z.object({
  line: z.number().int().positive(),
  column: z.number().int().nonnegative().default(0),
  errorType: z.string().min(1),
  severity: z.enum(SEVERITIES),
  message: z.string(),
  context: z.string().optional(),
  filePath: z.string().optional(),
  category: z.enum(ERROR_CATEGORIES).optional(),
});

export const ErrorRecordInputListSchema = z.array(ErrorRecordInputSchema);

function toRecord(init: ErrorRecordInit, index: number, source: string): Result<ErrorRecord, ReportInvalidError> {
  return Result.fromThrowable(
    () => new ErrorRecord(init),
    (e) => Err.reportInvalid(source, `[${index}] ${e instanceof RecordInvalidError ? e.data.message : String(e)}`)
  )();
}

/**
 * Parse a JSON array of recorded diagnostics into ErrorRecords.
 */
export function parseErrorRecords(json: string, source: string): Result<ErrorRecord[], ReportInvalidError> {
  return parseJson(json, source)
    .andThen((data) => validateJSONLoad(ErrorRecordInputListSchema, data, source))
    .andThen((inputs) => {
      const records: ErrorRecord[] = [];
      for (const [index, input] of inputs.entries()) {
        const record = toRecord(input, index, source);
        if (record.isErr()) return err(record.error);
        records.push(record.value);
      }
      return ok(records);
    });
}
