/**
 * Permission recovery: work from a readable copy in a fresh temp directory.
 */

import * as path from 'path';
import type { Logger } from '../../core/logging/index.js';
import type { ErrorRecord } from '../../domain/error-record.js';
import { RecoveryOutcome } from '../../domain/recovery-outcome.js';
import type { RecoveryFileSystemPort } from '../ports/recovery-fs.port.js';
import { mentions, targetFile, type RecoveryContext, type RecoveryStrategy } from '../types.js';

export const TEMP_DIR_PREFIX = 'graceful-markup-';
const RELAXED_MODE = 0o644;

export interface PermissionRecoveryDeps {
  readonly fs: RecoveryFileSystemPort;
  readonly logger: Logger;
}

export class PermissionRecoveryStrategy implements RecoveryStrategy {
  readonly name = 'permission';
  readonly priority = 3;

  constructor(private readonly deps: PermissionRecoveryDeps) {}

  canHandle(record: ErrorRecord, context: Readonly<RecoveryContext>): boolean {
    const relevant = record.category === 'permission'
      || mentions(record, /permission|access denied|eacces|eperm/);
    return relevant && targetFile(record, context) !== undefined;
  }

  attempt(record: ErrorRecord, context: Readonly<RecoveryContext>): RecoveryOutcome {
    const file = targetFile(record, context);
    if (file === undefined) return RecoveryOutcome.failure('No file to copy');

    const tempDir = this.deps.fs.makeTempDir(TEMP_DIR_PREFIX);
    if (tempDir.isErr()) return RecoveryOutcome.failure(tempDir.error.message);

    const copyPath = path.join(tempDir.value, path.basename(file));
    const copied = this.deps.fs.copy(file, copyPath);

    if (copied.isErr()) {
      const rewritten = this.deps.fs.readText(file)
        .andThen((content) => this.deps.fs.writeText(copyPath, content));
      if (rewritten.isErr()) {
        this.discardTempDir(tempDir.value);
        return RecoveryOutcome.failure(
          `Could not copy (${copied.error.message}) or read (${rewritten.error.message}) ${file}`
        );
      }
    }

    const relaxed = this.deps.fs.chmod(copyPath, RELAXED_MODE);
    if (relaxed.isErr()) {
      this.deps.logger.warn({ err: relaxed.error, copyPath }, 'Could not relax permissions on temp copy');
    }

    this.deps.logger.info({ file, copyPath }, 'Redirected processing to temp copy');
    return RecoveryOutcome.success(`Working from a temporary copy of ${path.basename(file)}: ${copyPath}`, {
      contextUpdate: { filePath: copyPath, originalFilePath: file, tempFileRecovery: true },
    });
  }

  private discardTempDir(dir: string): void {
    const removed = this.deps.fs.remove(dir);
    if (removed.isErr()) {
      this.deps.logger.warn({ err: removed.error, dir }, 'Could not remove temp directory');
    }
  }
}
