/**
 * Encoding recovery: find a legacy Japanese encoding the bytes decode under
 * and rewrite the file as UTF-8, keeping the original as `<file>.backup`.
 */

import * as path from 'path';
import { Result } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { ErrorRecord } from '../../domain/error-record.js';
import { RecoveryOutcome } from '../../domain/recovery-outcome.js';
import type { RecoveryFileSystemPort } from '../ports/recovery-fs.port.js';
import { mentions, targetFile, type RecoveryContext, type RecoveryStrategy } from '../types.js';

export interface EncodingCandidate {
  readonly name: string;
  /** WHATWG label understood by TextDecoder. */
  readonly label: string;
}

export const ENCODING_CANDIDATES: readonly EncodingCandidate[] = [
  { name: 'utf-8', label: 'utf-8' },
  { name: 'shift_jis', label: 'shift_jis' },
  { name: 'cp932', label: 'windows-31j' },
  { name: 'euc-jp', label: 'euc-jp' },
  { name: 'iso-2022-jp', label: 'iso-2022-jp' },
];

export interface DecodedText {
  readonly encoding: string;
  readonly text: string;
}

/**
 * First candidate that decodes the bytes without a replacement character.
 * An unsupported label counts as a failed decode.
 */
export function decodeWithCandidates(
  bytes: Uint8Array,
  candidates: readonly EncodingCandidate[] = ENCODING_CANDIDATES
): DecodedText | null {
  for (const candidate of candidates) {
    const decoded = Result.fromThrowable(
      () => new TextDecoder(candidate.label, { fatal: true }).decode(bytes),
      () => candidate.name
    )();
    if (decoded.isOk()) return { encoding: candidate.name, text: decoded.value };
  }
  return null;
}

export interface EncodingRecoveryDeps {
  readonly fs: RecoveryFileSystemPort;
  readonly logger: Logger;
  readonly candidates?: readonly EncodingCandidate[];
}

export class EncodingRecoveryStrategy implements RecoveryStrategy {
  readonly name = 'encoding';
  readonly priority = 2;

  private readonly candidates: readonly EncodingCandidate[];

  constructor(private readonly deps: EncodingRecoveryDeps) {
    this.candidates = deps.candidates ?? ENCODING_CANDIDATES;
  }

  canHandle(record: ErrorRecord, context: Readonly<RecoveryContext>): boolean {
    const relevant = record.category === 'encoding' || mentions(record, /encoding|decode/);
    return relevant && targetFile(record, context) !== undefined;
  }

  attempt(record: ErrorRecord, context: Readonly<RecoveryContext>): RecoveryOutcome {
    const file = targetFile(record, context);
    if (file === undefined) return RecoveryOutcome.failure('No file to re-encode');

    const bytes = this.deps.fs.readBytes(file);
    if (bytes.isErr()) return RecoveryOutcome.failure(bytes.error.message);

    const decoded = decodeWithCandidates(bytes.value, this.candidates);
    if (decoded === null) {
      const tried = this.candidates.map((c) => c.name).join(', ');
      return RecoveryOutcome.failure(`Could not decode ${path.basename(file)} with any of: ${tried}`);
    }

    const tempPath = `${file}.utf8.tmp`;
    const backupPath = `${file}.backup`;
    const rewritten = this.deps.fs.writeText(tempPath, decoded.text)
      .andThen(() => this.deps.fs.copy(file, backupPath))
      .andThen(() => this.deps.fs.move(tempPath, file));

    if (rewritten.isErr()) {
      this.deps.logger.warn({ err: rewritten.error, file }, 'UTF-8 rewrite failed');
      const discarded = this.deps.fs.remove(tempPath);
      if (discarded.isErr()) {
        this.deps.logger.warn({ err: discarded.error, tempPath }, 'Could not remove temp file');
      }
      return RecoveryOutcome.failure(`Decoded as ${decoded.encoding} but could not rewrite: ${rewritten.error.message}`);
    }

    this.deps.logger.info({ file, encoding: decoded.encoding }, 'Converted file to UTF-8');
    return RecoveryOutcome.success(
      `Converted ${path.basename(file)} from ${decoded.encoding} to UTF-8 (backup: ${path.basename(backupPath)})`,
      { recoveredData: decoded.text }
    );
  }
}
