/**
 * Result of one recovery attempt. Strategies return this; they never throw.
 *
 * @module domain/recovery-outcome
 */

/**
 * Redirection a strategy asks for. The manager merges it into the working
 * context so downstream processing reads the recovered file.
 */
export interface RecoveryContextUpdate {
  readonly filePath?: string;
  readonly originalFilePath?: string;
  readonly tempFileRecovery?: boolean;
  readonly fileRecovery?: boolean;
  readonly similarFiles?: readonly string[];
  readonly suggestChunkedProcessing?: boolean;
}

export interface RecoverySuccess {
  readonly kind: 'success';
  readonly message: string;
  readonly recoveredData?: string;
  readonly contextUpdate?: RecoveryContextUpdate;
}

export interface RecoveryFailure {
  readonly kind: 'failure';
  readonly reason: string;
}

export type RecoveryOutcome = RecoverySuccess | RecoveryFailure;

export const RecoveryOutcome = {
  success: (
    message: string,
    extras: { recoveredData?: string; contextUpdate?: RecoveryContextUpdate } = {}
  ): RecoverySuccess => ({ kind: 'success', message, ...extras }),

  failure: (reason: string): RecoveryFailure => ({ kind: 'failure', reason }),
};

export function isRecoverySuccess(outcome: RecoveryOutcome): outcome is RecoverySuccess {
  return outcome.kind === 'success';
}
