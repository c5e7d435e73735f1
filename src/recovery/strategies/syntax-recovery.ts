/**
 * Syntax recovery: rewrite the offending line in place after a one-time
 * `<file>.backup`.
 */

import * as path from 'path';
import type { Logger } from '../../core/logging/index.js';
import type { ErrorRecord } from '../../domain/error-record.js';
import { RecoveryOutcome } from '../../domain/recovery-outcome.js';
import type { RecoveryFileSystemPort } from '../ports/recovery-fs.port.js';
import { mentions, targetFile, type RecoveryContext, type RecoveryStrategy } from '../types.js';

/** Known malformed spellings, checked in order; the first contained one is replaced. */
export const SYNTAX_SUBSTITUTIONS: ReadonlyArray<readonly [string, string]> = [
  ['#bold#', '# bold #'],
  ['#italic#', '# italic #'],
  ['# heading #', '# heading1 #'],
  ['# bold ##', '# bold #'],
];

/**
 * Apply the first matching table entry, else the generic pass (full-width
 * `＃` to `#`, three or more `#` to `##`). Null when nothing changes.
 */
export function correctLine(line: string): string | null {
  const entry = SYNTAX_SUBSTITUTIONS.find(([from]) => line.includes(from));
  if (entry !== undefined) {
    return line.split(entry[0]).join(entry[1]);
  }

  const generic = line.replace(/＃/g, '#').replace(/#{3,}/g, '##');
  return generic === line ? null : generic;
}

export interface SyntaxRecoveryDeps {
  readonly fs: RecoveryFileSystemPort;
  readonly logger: Logger;
}

export class SyntaxRecoveryStrategy implements RecoveryStrategy {
  readonly name = 'syntax';
  readonly priority = 4;

  constructor(private readonly deps: SyntaxRecoveryDeps) {}

  canHandle(record: ErrorRecord, context: Readonly<RecoveryContext>): boolean {
    const relevant = record.category === 'syntax' || mentions(record, /syntax/);
    return relevant && targetFile(record, context) !== undefined;
  }

  attempt(record: ErrorRecord, context: Readonly<RecoveryContext>): RecoveryOutcome {
    const file = targetFile(record, context);
    if (file === undefined) return RecoveryOutcome.failure('No file to correct');
    const lineNumber = context.lineNumber ?? record.line;

    const text = this.deps.fs.readText(file);
    if (text.isErr()) return RecoveryOutcome.failure(text.error.message);

    const lines = text.value.split('\n');
    const original = lines[lineNumber - 1];
    if (original === undefined) {
      return RecoveryOutcome.failure(`Line ${lineNumber} is past the end of ${path.basename(file)}`);
    }

    const corrected = correctLine(original);
    if (corrected === null) {
      return RecoveryOutcome.failure(`No automatic correction applies to line ${lineNumber}`);
    }

    const backupPath = `${file}.backup`;
    if (!this.deps.fs.exists(backupPath)) {
      const backedUp = this.deps.fs.copy(file, backupPath);
      if (backedUp.isErr()) return RecoveryOutcome.failure(backedUp.error.message);
    }

    lines[lineNumber - 1] = corrected;
    const written = this.deps.fs.writeText(file, lines.join('\n'));
    if (written.isErr()) return RecoveryOutcome.failure(written.error.message);

    this.deps.logger.info({ file, lineNumber, original, corrected }, 'Applied syntax correction');
    return RecoveryOutcome.success(
      `Corrected line ${lineNumber} of ${path.basename(file)} (backup: ${path.basename(backupPath)})`,
      { recoveredData: corrected }
    );
  }
}
