import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import {
  ENV_DISPLAY_LIMIT,
  ENV_LEVEL,
  ENV_SHOW_SUGGESTIONS,
  errorConfigFrom,
  levelFor,
  loadErrorConfig,
  maxOccurrencesFor,
} from '../../../src/config/error-config.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';
import { makeTempDir } from '../../helpers/temp-dir.js';

describe('loadErrorConfig', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });

  afterEach(() => cleanup());

  function writeConfig(content: unknown): string {
    const file = path.join(dir, 'errors.json');
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  it('fills every default', () => {
    const config = expectOk(loadErrorConfig({ env: {} }), 'loading defaults');
    expect(config).toEqual({
      defaultLevel: 'normal',
      categories: {},
      showSuggestions: true,
      showStatistics: true,
      displayLimit: 10,
      contextLines: 2,
      historyCapacity: 100,
      recovery: { enabled: true, similarityThreshold: 0.6, largeFileThresholdBytes: 10 * 1024 * 1024 },
    });
  });

  it('reads a JSON file', () => {
    const file = writeConfig({ defaultLevel: 'strict', categories: { encoding: { level: 'lenient' } } });
    const config = expectOk(loadErrorConfig({ env: {}, file }), 'loading file');
    expect(config.defaultLevel).toBe('strict');
    expect(levelFor(config, 'encoding')).toBe('lenient');
    expect(levelFor(config, 'syntax')).toBe('strict');
  });

  it('lets the environment override the file', () => {
    const file = writeConfig({ defaultLevel: 'strict', displayLimit: 3, showSuggestions: true });
    const config = expectOk(
      loadErrorConfig({
        env: { [ENV_LEVEL]: 'lenient', [ENV_SHOW_SUGGESTIONS]: '0', [ENV_DISPLAY_LIMIT]: '25' },
        file,
      }),
      'loading with env'
    );
    expect(config.defaultLevel).toBe('lenient');
    expect(config.showSuggestions).toBe(false);
    expect(config.displayLimit).toBe(25);
  });

  it('ignores unrelated environment variables', () => {
    expect(loadErrorConfig({ env: { HOME: '/home/test', [ENV_SHOW_SUGGESTIONS]: 'true' } }).isOk()).toBe(true);
  });

  it('rejects an unknown level in the environment', () => {
    const error = expectErr(loadErrorConfig({ env: { [ENV_LEVEL]: 'loud' } }), 'bad level');
    expect(error._tag).toBe('ConfigInvalid');
    expect(error.source).toBe('environment');
    expect(error.issues[0]?.path).toBe(ENV_LEVEL);
  });

  it('rejects a non-positive display limit', () => {
    const error = expectErr(loadErrorConfig({ env: { [ENV_DISPLAY_LIMIT]: '0' } }), 'zero limit');
    expect(error.issues).toEqual([{ path: ENV_DISPLAY_LIMIT, message: 'Display limit must be a positive integer' }]);
  });

  it('rejects unknown keys in the file', () => {
    const file = writeConfig({ defaultLevel: 'normal', colour: 'blue' });
    const error = expectErr(loadErrorConfig({ env: {}, file }), 'unknown key');
    expect(error.source).toBe(file);
    expect(error.issues[0]?.path).toBe('(root)');
  });

  it('rejects an out-of-range similarity threshold', () => {
    const file = writeConfig({ recovery: { similarityThreshold: 1.5 } });
    const error = expectErr(loadErrorConfig({ env: {}, file }), 'threshold');
    expect(error.issues[0]?.path).toBe('recovery.similarityThreshold');
  });

  it('reports unreadable and unparsable files', () => {
    const missing = expectErr(loadErrorConfig({ env: {}, file: path.join(dir, 'nope.json') }), 'missing file');
    expect(missing.issues[0]?.path).toBe('(file)');

    const broken = expectErr(loadErrorConfig({ env: {}, file: writeConfig('{ not json') }), 'broken file');
    expect(broken.issues[0]?.path).toBe('(json)');
  });
});

describe('errorConfigFrom', () => {
  it('throws on invalid input', () => {
    expect(() => errorConfigFrom({ displayLimit: 0 })).toThrow();
  });
});

describe('maxOccurrencesFor', () => {
  it('is unlimited unless configured', () => {
    const config = errorConfigFrom({ categories: { syntax: { maxOccurrences: 4 } } });
    expect(maxOccurrencesFor(config, 'syntax')).toBe(4);
    expect(maxOccurrencesFor(config, 'encoding')).toBe(Number.POSITIVE_INFINITY);
  });
});
