import { RecoveryOutcome } from '../../../src/domain/recovery-outcome.js';
import type { ErrorRecord } from '../../../src/domain/error-record.js';
import { makeRecord } from '../../helpers/records.js';

/**
 * Four records: two marker mismatches (one recovered), a colour warning and
 * an unclassified info far down the file.
 */
export function sampleRecords(): ErrorRecord[] {
  const first = makeRecord({ line: 5, message: 'marker mismatch error' });
  first.assignPattern('marker_mismatch');
  first.addSuggestion('Close the block');
  first.addSuggestion('Check nesting');
  first.recordRecovery(RecoveryOutcome.success('fixed'));

  const colour = makeRecord({ line: 30, severity: 'warning', message: 'bad colour value', category: 'validation' });
  colour.assignPattern('invalid_color');

  const second = makeRecord({ line: 5, message: 'marker mismatch again' });
  second.assignPattern('marker_mismatch');

  const odd = makeRecord({ line: 150, severity: 'info', errorType: 'other', message: 'odd <tag>' });

  return [first, colour, second, odd];
}
