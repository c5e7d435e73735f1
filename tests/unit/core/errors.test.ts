import { describe, it, expect } from 'vitest';
import { Err, describeCause } from '../../../src/core/errors/factories.js';
import { formatAppError, formatError } from '../../../src/core/errors/formatter.js';
import {
  isAppError,
  isConfigurationError,
  isDataError,
  isIoError,
} from '../../../src/core/errors/type-guards.js';
import { RecordInvalidError } from '../../../src/core/errors/record-invalid-error.js';

function fsError(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('Err factories', () => {
  it('lists config issues in the message', () => {
    const error = Err.configInvalid('errors.json', [{ path: 'displayLimit', message: 'Expected number' }]);
    expect(error.message).toBe('Configuration invalid (errors.json):\n  - displayLimit: Expected number');
  });

  it('captures the errno code of a file failure', () => {
    const error = Err.fileAccessFailed('/docs/a.txt', 'read', fsError('permission denied', 'EACCES'));
    expect(error).toEqual({
      _tag: 'FileAccessFailed',
      path: '/docs/a.txt',
      operation: 'read',
      code: 'EACCES',
      message: 'Failed to read /docs/a.txt: permission denied',
    });
  });

  it('leaves the code undefined for non-errno causes', () => {
    expect(Err.fileAccessFailed('/a', 'write', 'nope').code).toBeUndefined();
  });

  it('describes causes of any shape', () => {
    expect(describeCause(new Error('boom'))).toBe('boom');
    expect(describeCause(42)).toBe('42');
  });
});

describe('formatAppError', () => {
  it('appends the actionable hint', () => {
    const error = Err.configInvalid('errors.json', [{ path: 'a', message: 'bad' }]);
    expect(formatAppError(error)).toBe(
      'Configuration invalid (errors.json):\n  - a: bad\n  → Fix the listed settings in errors.json'
    );
  });

  it('points permission failures at permissions', () => {
    const denied = Err.fileAccessFailed('/x', 'read', fsError('denied', 'EACCES'));
    const missing = Err.fileAccessFailed('/x', 'read', fsError('missing', 'ENOENT'));
    expect(formatError(denied).actionable).toBe('Check permissions on /x');
    expect(formatError(missing).actionable).toBe('Check that /x exists and is readable');
  });

  it('carries the export format in the details', () => {
    const error = Err.exportFailed('/out/report.html', 'html', new Error('disk full'));
    expect(formatError(error)).toEqual({
      error: 'ExportFailed',
      message: 'Failed to export html report to /out/report.html: disk full',
      details: { path: '/out/report.html', format: 'html' },
      actionable: 'Check that the directory of /out/report.html exists and is writable',
    });
  });
});

describe('type guards', () => {
  it('recognises app errors', () => {
    expect(isAppError(Err.reportInvalid('r', 'd'))).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
    expect(isAppError(null)).toBe(false);
  });

  it('groups errors by kind', () => {
    expect(isConfigurationError(Err.configInvalid('s', []))).toBe(true);
    expect(isDataError(Err.recordInvalid('line', 0, 'must be a positive integer'))).toBe(true);
    expect(isDataError(Err.reportInvalid('r', 'd'))).toBe(true);
    expect(isIoError(Err.exportFailed('/p', 'json', 'x'))).toBe(true);
    expect(isIoError(Err.configInvalid('s', []))).toBe(false);
  });
});

describe('RecordInvalidError', () => {
  it('is an Error carrying the RecordInvalid data', () => {
    const error = new RecordInvalidError('column', -2, 'must be a non-negative integer');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RecordInvalidError');
    expect(error.message).toBe('Invalid error record column (-2): must be a non-negative integer');
    expect(formatError(error.data).actionable).toBe('Fix column: must be a non-negative integer');
  });
});
