/**
 * Recovery Manager
 *
 * Chain of responsibility over strategies sorted by priority (stable for
 * ties). Stops at the first success; never retries a strategy.
 *
 * @module recovery/recovery-manager
 */

import { Result } from 'neverthrow';
import type { Logger } from '../core/logging/index.js';
import { describeCause } from '../core/errors/factories.js';
import { BoundedHistory } from '../domain/bounded-history.js';
import type { ErrorRecord } from '../domain/error-record.js';
import { RecoveryOutcome } from '../domain/recovery-outcome.js';
import { applyContextUpdate, type RecoveryContext, type RecoveryStrategy } from './types.js';

export const DEFAULT_RECOVERY_HISTORY_CAPACITY = 1000;
const RECENT_ENTRIES = 10;

export interface RecoveryHistoryEntry {
  readonly strategyName: string;
  readonly patternId: string | null;
  readonly outcome: RecoveryOutcome;
  readonly timestamp: string;
}

export interface StrategyStatistics {
  readonly attempts: number;
  readonly successes: number;
  readonly successRate: number;
}

export interface RecoveryStatistics {
  readonly totalAttempts: number;
  readonly successfulAttempts: number;
  readonly successRate: number;
  readonly byStrategy: Readonly<Record<string, StrategyStatistics>>;
  readonly recent: readonly RecoveryHistoryEntry[];
}

export interface RecoveryManagerDeps {
  readonly logger: Logger;
  readonly strategies?: readonly RecoveryStrategy[];
  readonly historyCapacity?: number;
  readonly clock?: () => Date;
}

interface Tally {
  attempts: number;
  successes: number;
}

function rate(successes: number, attempts: number): number {
  return attempts === 0 ? 0 : successes / attempts;
}

export class RecoveryManager {
  private ordered: RecoveryStrategy[] = [];
  private readonly history: BoundedHistory<RecoveryHistoryEntry>;
  private readonly tallies = new Map<string, Tally>();
  private readonly clock: () => Date;

  constructor(private readonly deps: RecoveryManagerDeps) {
    this.history = new BoundedHistory(deps.historyCapacity ?? DEFAULT_RECOVERY_HISTORY_CAPACITY);
    this.clock = deps.clock ?? (() => new Date());
    for (const strategy of deps.strategies ?? []) {
      this.registerStrategy(strategy);
    }
  }

  /** Inserts after every strategy of equal or lower priority value. */
  registerStrategy(strategy: RecoveryStrategy): void {
    this.ordered = [...this.ordered, strategy].sort((a, b) => a.priority - b.priority);
  }

  strategies(): readonly RecoveryStrategy[] {
    return this.ordered;
  }

  /**
   * Try every eligible strategy in priority order; the first success wins and
   * its context update is merged into `context`. The final outcome is written
   * onto the record.
   */
  attemptRecovery(record: ErrorRecord, context: RecoveryContext = {}): RecoveryOutcome {
    const failures: string[] = [];

    for (const strategy of this.ordered) {
      if (!this.isEligible(strategy, record, context)) continue;

      const outcome = this.runStrategy(strategy, record, context);
      this.remember(strategy.name, record.patternId, outcome);

      if (outcome.kind === 'success') {
        if (outcome.contextUpdate !== undefined) applyContextUpdate(context, outcome.contextUpdate);
        this.deps.logger.debug({ strategy: strategy.name, patternId: record.patternId }, 'Recovery succeeded');
        record.recordRecovery(outcome);
        return outcome;
      }
      failures.push(`${strategy.name}: ${outcome.reason}`);
    }

    const outcome = failures.length === 0
      ? RecoveryOutcome.failure('No recovery strategy can handle this error')
      : RecoveryOutcome.failure(`All recovery strategies failed (${failures.join('; ')})`);
    record.recordRecovery(outcome);
    return outcome;
  }

  recoveryStatistics(): RecoveryStatistics {
    let totalAttempts = 0;
    let successfulAttempts = 0;
    const byStrategy: Record<string, StrategyStatistics> = {};
    for (const [name, tally] of this.tallies) {
      totalAttempts += tally.attempts;
      successfulAttempts += tally.successes;
      byStrategy[name] = {
        attempts: tally.attempts,
        successes: tally.successes,
        successRate: rate(tally.successes, tally.attempts),
      };
    }
    return {
      totalAttempts,
      successfulAttempts,
      successRate: rate(successfulAttempts, totalAttempts),
      byStrategy,
      recent: this.history.recent(RECENT_ENTRIES),
    };
  }

  historyEntries(): readonly RecoveryHistoryEntry[] {
    return this.history.toArray();
  }

  clearHistory(): void {
    this.history.clear();
    this.tallies.clear();
  }

  private isEligible(strategy: RecoveryStrategy, record: ErrorRecord, context: RecoveryContext): boolean {
    const eligible = Result.fromThrowable(() => strategy.canHandle(record, context), describeCause)();
    if (eligible.isErr()) {
      this.deps.logger.warn({ strategy: strategy.name, reason: eligible.error }, 'canHandle threw; skipping strategy');
      return false;
    }
    return eligible.value;
  }

  private runStrategy(strategy: RecoveryStrategy, record: ErrorRecord, context: RecoveryContext): RecoveryOutcome {
    const attempted = Result.fromThrowable(() => strategy.attempt(record, context), describeCause)();
    if (attempted.isErr()) {
      this.deps.logger.error({ strategy: strategy.name, reason: attempted.error }, 'Recovery strategy threw');
      return RecoveryOutcome.failure(`${strategy.name} threw: ${attempted.error}`);
    }
    return attempted.value;
  }

  private remember(strategyName: string, patternId: string | null, outcome: RecoveryOutcome): void {
    this.history.push({ strategyName, patternId, outcome, timestamp: this.clock().toISOString() });
    const tally = this.tallies.get(strategyName) ?? { attempts: 0, successes: 0 };
    tally.attempts++;
    if (outcome.kind === 'success') tally.successes++;
    this.tallies.set(strategyName, tally);
  }
}
