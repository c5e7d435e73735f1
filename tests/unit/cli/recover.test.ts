import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { executeRecoverCommand } from '../../../src/cli/commands/recover.js';
import { RecoveryManager } from '../../../src/recovery/recovery-manager.js';
import { createDefaultStrategies } from '../../../src/recovery/default-strategies.js';
import { NodeRecoveryFileSystem } from '../../../src/recovery/adapters/node-recovery-fs.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { makeTempDir } from '../../helpers/temp-dir.js';

describe('executeRecoverCommand', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });

  afterEach(() => cleanup());

  function deps() {
    const logger = new FakeLogger().asLogger();
    return {
      recovery: new RecoveryManager({
        logger,
        strategies: createDefaultStrategies({ fs: new NodeRecoveryFileSystem(), logger }),
      }),
      resolvePath: (p: string) => p,
    };
  }

  it('rejects an unknown category', () => {
    const result = executeRecoverCommand('doc.txt', { type: 'x', category: 'bogus' }, deps());
    expect(result.kind === 'failure' && result.output.message).toBe('Unknown category: bogus');
  });

  it('rejects a bad line number', () => {
    const result = executeRecoverCommand('doc.txt', { type: 'x', line: 'x' }, deps());
    expect(result.kind === 'failure' && result.exitCode.kind).toBe('misuse');
    expect(result.kind === 'failure' && result.output.message).toBe('--line must be a positive integer, got x');
  });

  it('corrects a syntax error in place', () => {
    const file = path.join(dir, 'doc.txt');
    fs.writeFileSync(file, '#bold# text');

    expect(executeRecoverCommand(file, { type: 'syntax_error' }, deps())).toEqual({
      kind: 'success',
      output: {
        message: `Recovered ${file}`,
        details: ['Corrected line 1 of doc.txt (backup: doc.txt.backup)'],
      },
    });
    expect(fs.readFileSync(file, 'utf8')).toBe('# bold # text');
  });

  it('names the file to continue with after a redirect', () => {
    fs.writeFileSync(path.join(dir, 'README.md'), 'readme');
    const missing = path.join(dir, 'READM.md');

    const result = executeRecoverCommand(missing, { type: 'file_not_found', message: 'File not found' }, deps());

    expect(result.kind === 'success' && result.output?.details).toEqual([
      'Using README.md in place of missing READM.md (similarity 0.83)',
      `Continue with: ${path.join(dir, 'README.md')}`,
    ]);
  });

  it('fails with every strategy reason', () => {
    const file = path.join(dir, 'doc.txt');
    fs.writeFileSync(file, 'a well-formed line');

    expect(executeRecoverCommand(file, { type: 'syntax_error' }, deps())).toEqual({
      kind: 'failure',
      exitCode: { kind: 'general_error' },
      output: {
        message: `Recovery failed for ${file}`,
        details: ['All recovery strategies failed (syntax: No automatic correction applies to line 1)'],
        suggestions: undefined,
      },
    });
  });
});
