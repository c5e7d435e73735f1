import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { err } from 'neverthrow';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { PermissionRecoveryStrategy, TEMP_DIR_PREFIX } from '../../../src/recovery/strategies/permission-recovery.js';
import { NodeRecoveryFileSystem } from '../../../src/recovery/adapters/node-recovery-fs.js';
import type { FsResult } from '../../../src/recovery/ports/recovery-fs.port.js';
import { Err } from '../../../src/core/errors/factories.js';
import { FakeLogger } from '../../helpers/FakeLogger.js';
import { makeRecord } from '../../helpers/records.js';
import { makeTempDir } from '../../helpers/temp-dir.js';

class CopyRefusingFs extends NodeRecoveryFileSystem {
  override copy(fromPath: string): FsResult<void> {
    return err(Err.fileAccessFailed(fromPath, 'copy', new Error('EACCES: permission denied')));
  }
}

class TempDirTrackingFs extends CopyRefusingFs {
  readonly made: string[] = [];

  override makeTempDir(prefix: string): FsResult<string> {
    const made = super.makeTempDir(prefix);
    if (made.isOk()) this.made.push(made.value);
    return made;
  }
}

class ChmodRefusingFs extends NodeRecoveryFileSystem {
  override chmod(filePath: string): FsResult<void> {
    return err(Err.fileAccessFailed(filePath, 'chmod', new Error('EPERM: operation not permitted')));
  }
}

describe('PermissionRecoveryStrategy', () => {
  let dir: string;
  let cleanup: () => void;
  const copies: string[] = [];

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir());
  });

  afterEach(() => {
    cleanup();
    for (const copy of copies.splice(0)) fs.rmSync(path.dirname(copy), { recursive: true, force: true });
  });

  const deniedRecord = (filePath?: string) =>
    makeRecord({ errorType: 'io', message: 'EACCES: permission denied', filePath });

  function expectCopy(outcome: ReturnType<PermissionRecoveryStrategy['attempt']>, file: string): string {
    if (outcome.kind !== 'success') throw new Error(`expected success, got: ${outcome.reason}`);
    const copyPath = outcome.contextUpdate?.filePath;
    if (copyPath === undefined) throw new Error('no redirected file path');
    copies.push(copyPath);
    expect(outcome.contextUpdate).toEqual({ filePath: copyPath, originalFilePath: file, tempFileRecovery: true });
    expect(outcome.message).toBe(`Working from a temporary copy of doc.txt: ${copyPath}`);
    expect(path.dirname(path.dirname(copyPath))).toBe(os.tmpdir());
    expect(path.basename(path.dirname(copyPath)).startsWith(TEMP_DIR_PREFIX)).toBe(true);
    return copyPath;
  }

  it('needs a permission error and a file', () => {
    const strategy = new PermissionRecoveryStrategy({ fs: new NodeRecoveryFileSystem(), logger: new FakeLogger().asLogger() });
    expect(strategy.canHandle(deniedRecord('/tmp/doc.txt'), {})).toBe(true);
    expect(strategy.canHandle(deniedRecord(), {})).toBe(false);
    expect(strategy.canHandle(makeRecord({ filePath: '/tmp/doc.txt' }), {})).toBe(false);
  });

  it('copies the file into a fresh temp directory', () => {
    const file = path.join(dir, 'doc.txt');
    fs.writeFileSync(file, '# bold # text');
    const strategy = new PermissionRecoveryStrategy({ fs: new NodeRecoveryFileSystem(), logger: new FakeLogger().asLogger() });

    const copyPath = expectCopy(strategy.attempt(deniedRecord(file), {}), file);
    expect(fs.readFileSync(copyPath, 'utf8')).toBe('# bold # text');
  });

  it('falls back to read and write when the copy is refused', () => {
    const file = path.join(dir, 'doc.txt');
    fs.writeFileSync(file, 'content');
    const strategy = new PermissionRecoveryStrategy({ fs: new CopyRefusingFs(), logger: new FakeLogger().asLogger() });

    const copyPath = expectCopy(strategy.attempt(deniedRecord(file), {}), file);
    expect(fs.readFileSync(copyPath, 'utf8')).toBe('content');
  });

  it('still succeeds when permissions cannot be relaxed', () => {
    const file = path.join(dir, 'doc.txt');
    fs.writeFileSync(file, 'content');
    const logger = new FakeLogger();
    const strategy = new PermissionRecoveryStrategy({ fs: new ChmodRefusingFs(), logger: logger.asLogger() });

    expectCopy(strategy.attempt(deniedRecord(file), {}), file);
    expect(logger.hasEntry('warn', 'Could not relax permissions')).toBe(true);
  });

  it('fails when the file can be neither copied nor read', () => {
    const strategy = new PermissionRecoveryStrategy({ fs: new CopyRefusingFs(), logger: new FakeLogger().asLogger() });
    const missing = path.join(dir, 'missing.txt');
    const outcome = strategy.attempt(deniedRecord(missing), {});

    expect(outcome.kind).toBe('failure');
    expect(outcome.kind === 'failure' && outcome.reason.startsWith('Could not copy (')).toBe(true);
  });

  it('removes its temp directory when the attempt fails', () => {
    const tracking = new TempDirTrackingFs();
    const strategy = new PermissionRecoveryStrategy({ fs: tracking, logger: new FakeLogger().asLogger() });

    const outcome = strategy.attempt(deniedRecord(path.join(dir, 'missing.txt')), {});

    expect(outcome.kind).toBe('failure');
    expect(tracking.made).toHaveLength(1);
    expect(fs.existsSync(tracking.made[0] ?? '')).toBe(false);
  });
});
