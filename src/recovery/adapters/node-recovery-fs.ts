import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Result } from 'neverthrow';
import { Err } from '../../core/errors/factories.js';
import type { FileOperation } from '../../core/errors/app-error.js';
import type { FsResult, RecoveryFileSystemPort } from '../ports/recovery-fs.port.js';

function attempt<T>(operation: FileOperation, filePath: string, fn: () => T): FsResult<T> {
  return Result.fromThrowable(fn, (e) => Err.fileAccessFailed(filePath, operation, e))();
}

export class NodeRecoveryFileSystem implements RecoveryFileSystemPort {
  readBytes(filePath: string): FsResult<Uint8Array> {
    return attempt('read', filePath, () => new Uint8Array(fs.readFileSync(filePath)));
  }

  readText(filePath: string): FsResult<string> {
    return attempt('read', filePath, () => fs.readFileSync(filePath, 'utf8'));
  }

  writeText(filePath: string, content: string): FsResult<void> {
    return attempt('write', filePath, () => fs.writeFileSync(filePath, content, 'utf8'));
  }

  copy(fromPath: string, toPath: string): FsResult<void> {
    return attempt('copy', fromPath, () => fs.copyFileSync(fromPath, toPath));
  }

  move(fromPath: string, toPath: string): FsResult<void> {
    return attempt('move', fromPath, () => fs.renameSync(fromPath, toPath));
  }

  chmod(filePath: string, mode: number): FsResult<void> {
    return attempt('chmod', filePath, () => fs.chmodSync(filePath, mode));
  }

  exists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  stat(filePath: string): FsResult<{ readonly sizeBytes: number }> {
    return attempt('stat', filePath, () => ({ sizeBytes: fs.statSync(filePath).size }));
  }

  listFiles(dirPath: string): FsResult<readonly string[]> {
    return attempt('list', dirPath, () =>
      fs.readdirSync(dirPath, { withFileTypes: true })
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name)
        .sort()
    );
  }

  makeTempDir(prefix: string): FsResult<string> {
    const base = path.join(os.tmpdir(), prefix);
    return attempt('mkdtemp', base, () => fs.mkdtempSync(base));
  }

  remove(targetPath: string): FsResult<void> {
    return attempt('remove', targetPath, () => fs.rmSync(targetPath, { recursive: true, force: true }));
  }
}
