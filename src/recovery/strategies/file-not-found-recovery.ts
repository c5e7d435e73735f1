/**
 * Missing-file recovery: redirect to the most similarly named sibling.
 */

import * as path from 'path';
import type { Logger } from '../../core/logging/index.js';
import type { ErrorRecord } from '../../domain/error-record.js';
import { RecoveryOutcome } from '../../domain/recovery-outcome.js';
import { DEFAULT_SIMILARITY_THRESHOLD, similarity, type Similarity } from '../../analysis/similarity.js';
import { computeSimilarity } from '../../analysis/string-similarity.js';
import type { RecoveryFileSystemPort } from '../ports/recovery-fs.port.js';
import { mentions, targetFile, type RecoveryContext, type RecoveryStrategy } from '../types.js';

/** Extension always considered besides the target's own. */
export const FALLBACK_EXTENSION = '.txt';
export const MAX_SIMILAR_FILES = 3;

export interface SimilarFile {
  readonly name: string;
  readonly score: Similarity;
}

/**
 * Siblings sharing the target's extension (or `.txt`), compared without
 * regard to case, whose lowercased stem scores above `threshold` against the
 * target's; best first, at most three.
 */
export function rankSimilarFiles(
  target: string,
  siblings: readonly string[],
  threshold: Similarity
): SimilarFile[] {
  const targetExt = path.extname(target);
  const ext = targetExt.toLowerCase();
  const stem = path.basename(target, targetExt).toLowerCase();

  const scored: SimilarFile[] = [];
  for (const name of siblings) {
    if (name === target) continue;
    const siblingExt = path.extname(name);
    const lowered = siblingExt.toLowerCase();
    if (lowered !== ext && lowered !== FALLBACK_EXTENSION) continue;
    const score = computeSimilarity(stem, path.basename(name, siblingExt).toLowerCase());
    if (score > threshold) scored.push({ name, score });
  }

  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, MAX_SIMILAR_FILES);
}

export interface FileNotFoundRecoveryDeps {
  readonly fs: RecoveryFileSystemPort;
  readonly logger: Logger;
  readonly similarityThreshold?: number;
}

export class FileNotFoundRecoveryStrategy implements RecoveryStrategy {
  readonly name = 'file_not_found';
  readonly priority = 3;

  private readonly threshold: Similarity;

  constructor(private readonly deps: FileNotFoundRecoveryDeps) {
    this.threshold = deps.similarityThreshold === undefined
      ? DEFAULT_SIMILARITY_THRESHOLD
      : similarity(deps.similarityThreshold);
  }

  canHandle(record: ErrorRecord, context: Readonly<RecoveryContext>): boolean {
    return record.category === 'file_system'
      && mentions(record, /not found|no such file|enoent/)
      && targetFile(record, context) !== undefined;
  }

  attempt(record: ErrorRecord, context: Readonly<RecoveryContext>): RecoveryOutcome {
    const file = targetFile(record, context);
    if (file === undefined) return RecoveryOutcome.failure('No file name to match');

    const dir = path.dirname(file);
    const target = path.basename(file);
    const siblings = this.deps.fs.listFiles(dir);
    if (siblings.isErr()) return RecoveryOutcome.failure(siblings.error.message);

    const ranked = rankSimilarFiles(target, siblings.value, this.threshold);
    const best = ranked[0];
    if (best === undefined) {
      return RecoveryOutcome.failure(`No file similar to ${target} in ${dir}`);
    }

    const bestPath = path.join(dir, best.name);
    this.deps.logger.info({ missing: file, using: bestPath, score: best.score }, 'Redirected to similar file');
    return RecoveryOutcome.success(
      `Using ${best.name} in place of missing ${target} (similarity ${best.score.toFixed(2)})`,
      {
        contextUpdate: {
          filePath: bestPath,
          originalFilePath: file,
          fileRecovery: true,
          similarFiles: ranked.map((f) => path.join(dir, f.name)),
        },
      }
    );
  }
}
