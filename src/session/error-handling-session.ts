/**
 * Error Handling Session
 *
 * One per document. Composes classification, suggestions, recovery,
 * statistics and the continue/abort policy, and owns all of its state:
 * nothing here is shared between sessions.
 *
 * @module session/error-handling-session
 */

import type { Logger } from '../core/logging/index.js';
import type { CorrectionEngine } from '../analysis/correction-engine.js';
import { BoundedHistory } from '../domain/bounded-history.js';
import type { ErrorRecord, ErrorRecordJson } from '../domain/error-record.js';
import type { ErrorCategory, Severity } from '../domain/taxonomy.js';
import { levelFor, maxOccurrencesFor, type ValidatedErrorConfig } from '../config/error-config.js';
import type { RecoveryManager, RecoveryStatistics } from '../recovery/recovery-manager.js';
import type { RecoveryContext } from '../recovery/types.js';
import { StatisticsAccumulator, type ErrorStatistics } from '../reporting/statistics.js';
import { RECOVERED_NOTICE } from '../reporting/inline-marker.js';
import { decide, type HandlingDecision } from './continue-policy.js';

export interface ErrorHandlingSessionDeps {
  readonly config: ValidatedErrorConfig;
  readonly engine: CorrectionEngine;
  readonly recovery: RecoveryManager;
  readonly logger: Logger;
}

export interface SessionSummary {
  readonly totalErrors: number;
  readonly recoveredCount: number;
  readonly recoveryRate: number;
  readonly bySeverity: Partial<Record<Severity, number>>;
  /** Newest last, at most `displayLimit` entries. */
  readonly recent: readonly ErrorRecordJson[];
  readonly aborted: boolean;
  readonly abortReason: string | null;
}

const CLOSED: HandlingDecision = { action: 'abort', reason: 'session is closed', recovered: false };

export class ErrorHandlingSession {
  private readonly history: BoundedHistory<ErrorRecord>;
  private readonly occurrences = new Map<ErrorCategory, number>();
  private readonly stats = new StatisticsAccumulator();
  private abortReason: string | null = null;
  private closed = false;

  constructor(private readonly deps: ErrorHandlingSessionDeps) {
    this.history = new BoundedHistory(deps.config.historyCapacity);
  }

  handle(record: ErrorRecord, context: RecoveryContext = {}): HandlingDecision {
    if (this.closed) return CLOSED;
    const { config, engine, recovery, logger } = this.deps;

    const patternId = engine.enhanceErrorWithSuggestions(record);
    const occurrences = (this.occurrences.get(record.category) ?? 0) + 1;
    this.occurrences.set(record.category, occurrences);

    const level = levelFor(config, record.category);
    if (level !== 'ignore' && config.recovery.enabled) {
      recovery.attemptRecovery(record, context);
    }

    this.stats.add(record);
    this.history.push(record);

    const decision = decide({
      severity: record.severity,
      category: record.category,
      level,
      occurrences,
      maxOccurrences: maxOccurrencesFor(config, record.category),
      recovered: record.recovered,
    });

    if (decision.action === 'abort' && this.abortReason === null) {
      this.abortReason = decision.reason;
    }

    logger.debug(
      { line: record.line, patternId, category: record.category, action: decision.action, recovered: decision.recovered },
      'Handled markup error'
    );
    return decision;
  }

  /** False from the first abort on. */
  shouldContinue(): boolean {
    return !this.closed && this.abortReason === null;
  }

  statistics(): ErrorStatistics {
    return this.stats.snapshot();
  }

  recoveryStatistics(): RecoveryStatistics {
    return this.deps.recovery.recoveryStatistics();
  }

  records(): readonly ErrorRecord[] {
    return this.history.toArray();
  }

  summary(): SessionSummary {
    const stats = this.stats.snapshot();
    return {
      totalErrors: stats.totalErrors,
      recoveredCount: stats.recoveredCount,
      recoveryRate: stats.recoveryRate,
      bySeverity: stats.bySeverity,
      recent: this.history.recent(this.deps.config.displayLimit).map((r) => r.toJSON()),
      aborted: this.abortReason !== null,
      abortReason: this.abortReason,
    };
  }

  /**
   * Plain-text description for the user. Recovered records get a single
   * softened line.
   */
  describe(record: ErrorRecord): string {
    const head = `Line ${record.line}, column ${record.column} [${record.severity}] ${record.message}`;
    if (record.recovered) {
      return `${head} (${RECOVERED_NOTICE})`;
    }

    const lines = [head];
    if (this.deps.config.showSuggestions && record.suggestions.length > 0) {
      lines.push('Suggestions:', ...record.suggestions.map((s) => `  - ${s}`));
    }
    const context = highlightAsText(record, this.deps.config.contextLines);
    if (context.length > 0) {
      lines.push('Context:', ...context.map((l) => `  ${l}`));
    }
    return lines.join('\n');
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.history.clear();
    this.occurrences.clear();
    this.deps.recovery.clearHistory();
  }
}

/**
 * The context with the highlight span bracketed by `>>` and `<<`, cut to
 * `maxLines` lines.
 */
export function highlightAsText(record: ErrorRecord, maxLines: number): string[] {
  if (record.context.length === 0 || maxLines <= 0) return [];
  const span = record.highlight;
  const text = span === null || span.start === span.end
    ? record.context
    : `${record.context.slice(0, span.start)}>>${record.context.slice(span.start, span.end)}<<${record.context.slice(span.end)}`;
  return text.split('\n').slice(0, maxLines);
}
