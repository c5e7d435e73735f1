/**
 * Error statistics: a running accumulator the session feeds one record at a
 * time, and `generateStatistics` for a finished list.
 *
 * Top patterns rank by count; equal counts keep the order in which the
 * patterns were first seen.
 *
 * @module reporting/statistics
 */

import type { ErrorRecord } from '../domain/error-record.js';
import type { ErrorCategory, Severity } from '../domain/taxonomy.js';

export const LINE_BUCKETS = ['1-10', '11-50', '51-100', '100+'] as const;
export type LineBucket = typeof LINE_BUCKETS[number];

export const TOP_PATTERN_LIMIT = 5;
export const UNCLASSIFIED_PATTERN = 'unknown';

export interface TopPattern {
  readonly patternId: string;
  readonly count: number;
  /** Share of all records, one decimal place. */
  readonly percentage: number;
  readonly exampleMessage: string;
}

export interface ErrorStatistics {
  readonly totalErrors: number;
  readonly bySeverity: Partial<Record<Severity, number>>;
  readonly byPattern: Record<string, number>;
  readonly byCategory: Partial<Record<ErrorCategory, number>>;
  readonly lineRanges: Record<LineBucket, number>;
  readonly topPatterns: readonly TopPattern[];
  readonly totalSuggestions: number;
  readonly recoveredCount: number;
  /** recovered / total, 0 when empty. */
  readonly recoveryRate: number;
}

export function lineBucket(line: number): LineBucket {
  if (line <= 10) return '1-10';
  if (line <= 50) return '11-50';
  if (line <= 100) return '51-100';
  return '100+';
}

export function percentageOf(count: number, total: number): number {
  return total === 0 ? 0 : Math.round((count / total) * 1000) / 10;
}

function bump<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export class StatisticsAccumulator {
  private total = 0;
  private suggestions = 0;
  private recovered = 0;
  private readonly severity: Partial<Record<Severity, number>> = {};
  private readonly category: Partial<Record<ErrorCategory, number>> = {};
  private readonly lines: Record<LineBucket, number> = { '1-10': 0, '11-50': 0, '51-100': 0, '100+': 0 };
  // Map keeps first-seen order, which is the tie-break for top patterns.
  private readonly patterns = new Map<string, { count: number; example: string }>();

  add(record: ErrorRecord): void {
    this.total++;
    this.suggestions += record.suggestions.length;
    if (record.recovered) this.recovered++;
    bump(this.severity, record.severity);
    bump(this.category, record.category);
    this.lines[lineBucket(record.line)]++;

    const patternId = record.patternId ?? UNCLASSIFIED_PATTERN;
    const seen = this.patterns.get(patternId);
    if (seen === undefined) {
      this.patterns.set(patternId, { count: 1, example: record.message });
    } else {
      seen.count++;
    }
  }

  snapshot(): ErrorStatistics {
    const byPattern: Record<string, number> = {};
    const ranked: TopPattern[] = [];
    for (const [patternId, { count, example }] of this.patterns) {
      byPattern[patternId] = count;
      ranked.push({ patternId, count, percentage: percentageOf(count, this.total), exampleMessage: example });
    }
    // Stable sort: ties stay in first-seen order.
    ranked.sort((a, b) => b.count - a.count);

    return {
      totalErrors: this.total,
      bySeverity: { ...this.severity },
      byPattern,
      byCategory: { ...this.category },
      lineRanges: { ...this.lines },
      topPatterns: ranked.slice(0, TOP_PATTERN_LIMIT),
      totalSuggestions: this.suggestions,
      recoveredCount: this.recovered,
      recoveryRate: this.total === 0 ? 0 : this.recovered / this.total,
    };
  }
}

export function generateStatistics(records: Iterable<ErrorRecord>): ErrorStatistics {
  const acc = new StatisticsAccumulator();
  for (const record of records) acc.add(record);
  return acc.snapshot();
}
