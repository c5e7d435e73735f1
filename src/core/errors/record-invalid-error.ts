import type { RecordInvalidData } from './app-error.js';
import { Err } from './factories.js';

/**
 * Thrown only by ErrorRecord construction: a parser handing over a record
 * with an impossible position is a programming error, not a markup diagnostic.
 */
export class RecordInvalidError extends Error {
  public readonly data: RecordInvalidData;

  constructor(field: string, value: unknown, issues: string) {
    const data = Err.recordInvalid(field, value, issues);
    super(data.message);
    this.name = 'RecordInvalidError';
    this.data = data;
  }
}
