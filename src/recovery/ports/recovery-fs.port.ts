import type { Result } from 'neverthrow';
import type { FileAccessFailedError } from '../../core/errors/app-error.js';

export type FsResult<T> = Result<T, FileAccessFailedError>;

/**
 * Port: the blocking file operations recovery strategies perform.
 *
 * Synchronous on purpose: the pipeline is call/return and a strategy runs to
 * completion before the parser continues.
 */
export interface RecoveryFileSystemPort {
  readBytes(filePath: string): FsResult<Uint8Array>;
  readText(filePath: string): FsResult<string>;
  writeText(filePath: string, content: string): FsResult<void>;
  copy(fromPath: string, toPath: string): FsResult<void>;
  /** Replaces `toPath` when it exists. */
  move(fromPath: string, toPath: string): FsResult<void>;
  chmod(filePath: string, mode: number): FsResult<void>;
  exists(filePath: string): boolean;
  stat(filePath: string): FsResult<{ readonly sizeBytes: number }>;
  /** Names (not paths) of regular files directly inside `dirPath`. */
  listFiles(dirPath: string): FsResult<readonly string[]>;
  makeTempDir(prefix: string): FsResult<string>;
  /** Deletes a file or a directory tree; a missing path is not an error. */
  remove(targetPath: string): FsResult<void>;
}
