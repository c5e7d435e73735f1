import { describe, it, expect } from 'vitest';
import { parseErrorRecords } from '../../../src/domain/record-input.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('parseErrorRecords', () => {
  it('builds records with defaults filled in', () => {
    const records = expectOk(
      parseErrorRecords(
        JSON.stringify([{ line: 3, errorType: 'decode_error', severity: 'warning', message: 'cannot decode' }]),
        'records.json'
      ),
      'parsing one record'
    );

    expect(records).toHaveLength(1);
    expect(records[0]?.toJSON()).toMatchObject({ line: 3, column: 0, category: 'encoding', context: '', filePath: null });
  });

  it('rejects entries that break the schema', () => {
    const error = expectErr(
      parseErrorRecords(JSON.stringify([{ line: 1, errorType: 'x', severity: 'fatal', message: 'm' }]), 'records.json'),
      'bad severity'
    );
    expect(error._tag).toBe('ReportInvalid');
    expect(error.details.startsWith('0.severity:')).toBe(true);
  });

  it('rejects input that is not JSON', () => {
    expect(parseErrorRecords('not json', 'records.json').isErr()).toBe(true);
  });

  it('accepts an empty list', () => {
    expect(expectOk(parseErrorRecords('[]', 'records.json'), 'empty list')).toEqual([]);
  });
});
