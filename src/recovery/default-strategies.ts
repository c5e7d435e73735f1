import type { Logger } from '../core/logging/index.js';
import type { RecoveryFileSystemPort } from './ports/recovery-fs.port.js';
import type { RecoveryStrategy } from './types.js';
import { EncodingRecoveryStrategy } from './strategies/encoding-recovery.js';
import { FileNotFoundRecoveryStrategy } from './strategies/file-not-found-recovery.js';
import { MemoryRecoveryStrategy, type MemoryReclaimer } from './strategies/memory-recovery.js';
import { PermissionRecoveryStrategy } from './strategies/permission-recovery.js';
import { SyntaxRecoveryStrategy } from './strategies/syntax-recovery.js';

export interface DefaultStrategyOptions {
  readonly fs: RecoveryFileSystemPort;
  readonly logger: Logger;
  readonly similarityThreshold?: number;
  readonly largeFileThresholdBytes?: number;
  readonly reclaimers?: readonly MemoryReclaimer[];
}

/** Per-call additions to the configured defaults. */
export interface StrategyOverrides {
  readonly reclaimers?: readonly MemoryReclaimer[];
}

export type RecoveryStrategyFactory = (overrides?: StrategyOverrides) => RecoveryStrategy[];

/**
 * The five built-in strategies, in registration order (ties keep it).
 */
export function createDefaultStrategies(options: DefaultStrategyOptions): RecoveryStrategy[] {
  const { fs, logger } = options;
  return [
    new MemoryRecoveryStrategy({
      fs,
      logger: logger.child({ strategy: 'memory' }),
      reclaimers: options.reclaimers,
      largeFileThresholdBytes: options.largeFileThresholdBytes,
    }),
    new EncodingRecoveryStrategy({ fs, logger: logger.child({ strategy: 'encoding' }) }),
    new PermissionRecoveryStrategy({ fs, logger: logger.child({ strategy: 'permission' }) }),
    new FileNotFoundRecoveryStrategy({
      fs,
      logger: logger.child({ strategy: 'file_not_found' }),
      similarityThreshold: options.similarityThreshold,
    }),
    new SyntaxRecoveryStrategy({ fs, logger: logger.child({ strategy: 'syntax' }) }),
  ];
}
