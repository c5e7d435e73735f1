/**
 * Memory-pressure recovery: release caches, nudge the collector, and flag
 * oversized inputs for chunked processing.
 */

import { Result } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import { describeCause } from '../../core/errors/factories.js';
import type { ErrorRecord } from '../../domain/error-record.js';
import { RecoveryOutcome } from '../../domain/recovery-outcome.js';
import type { RecoveryFileSystemPort } from '../ports/recovery-fs.port.js';
import { mentions, targetFile, type RecoveryContext, type RecoveryStrategy } from '../types.js';

/** Releases a cache and returns how many entries it dropped. */
export type MemoryReclaimer = () => number;

export const DEFAULT_LARGE_FILE_THRESHOLD_BYTES = 10 * 1024 * 1024;

export interface MemoryRecoveryDeps {
  readonly fs: RecoveryFileSystemPort;
  readonly logger: Logger;
  readonly reclaimers?: readonly MemoryReclaimer[];
  readonly largeFileThresholdBytes?: number;
  readonly heapUsed?: () => number;
  readonly collectGarbage?: () => void;
}

/** Calls the engine's collector when node runs with --expose-gc. */
export function exposedGarbageCollector(): void {
  const gc: unknown = Reflect.get(globalThis, 'gc');
  if (typeof gc === 'function') gc();
}

export class MemoryRecoveryStrategy implements RecoveryStrategy {
  readonly name = 'memory';
  readonly priority = 1;

  private readonly reclaimers: readonly MemoryReclaimer[];
  private readonly threshold: number;
  private readonly heapUsed: () => number;
  private readonly collectGarbage: () => void;

  constructor(private readonly deps: MemoryRecoveryDeps) {
    this.reclaimers = deps.reclaimers ?? [];
    this.threshold = deps.largeFileThresholdBytes ?? DEFAULT_LARGE_FILE_THRESHOLD_BYTES;
    this.heapUsed = deps.heapUsed ?? (() => process.memoryUsage().heapUsed);
    this.collectGarbage = deps.collectGarbage ?? exposedGarbageCollector;
  }

  canHandle(record: ErrorRecord): boolean {
    return record.category === 'system' || mentions(record, /memory/);
  }

  attempt(record: ErrorRecord, context: Readonly<RecoveryContext>): RecoveryOutcome {
    const reclaimed = Result.fromThrowable(
      () => {
        const before = this.heapUsed();
        const freed = this.reclaimers.reduce((sum, reclaim) => sum + reclaim(), 0);
        this.collectGarbage();
        return { freed, heapDelta: Math.max(0, before - this.heapUsed()) };
      },
      describeCause
    )();

    if (reclaimed.isErr()) {
      this.deps.logger.error({ reason: reclaimed.error }, 'Memory reclamation failed');
      return RecoveryOutcome.failure(`Memory reclamation failed: ${reclaimed.error}`);
    }

    const { freed, heapDelta } = reclaimed.value;
    let message = `Released ${freed} cached entries; heap shrank by ${heapDelta} bytes`;

    const size = this.fileSize(record, context);
    if (size !== undefined && size > this.threshold) {
      message += `; input is ${size} bytes, process it in chunks`;
      this.deps.logger.info({ size, threshold: this.threshold }, 'Recommending chunked processing');
      return RecoveryOutcome.success(message, { contextUpdate: { suggestChunkedProcessing: true } });
    }

    return RecoveryOutcome.success(message);
  }

  private fileSize(record: ErrorRecord, context: Readonly<RecoveryContext>): number | undefined {
    if (context.fileSize !== undefined) return context.fileSize;
    const file = targetFile(record, context);
    if (file === undefined) return undefined;
    const stat = this.deps.fs.stat(file);
    if (stat.isErr()) {
      this.deps.logger.debug({ err: stat.error }, 'Could not stat input for size check');
      return undefined;
    }
    return stat.value.sizeBytes;
  }
}
