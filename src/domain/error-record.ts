/**
 * Error Record
 *
 * One structured diagnostic per detected markup violation. The parser creates
 * it; the correction engine writes suggestions, pattern id and highlight span;
 * the recovery manager writes the recovery outcome. Nothing else mutates it.
 *
 * @module domain/error-record
 */

import { RecordInvalidError } from '../core/errors/record-invalid-error.js';
import { escapeHtml } from './html.js';
import type { RecoveryOutcome } from './recovery-outcome.js';
import { inferCategory, type ErrorCategory, type Severity } from './taxonomy.js';

export const MAX_SUGGESTIONS = 5;

export interface HighlightSpan {
  readonly start: number;
  readonly end: number;
}

export interface ErrorRecordInit {
  readonly line: number;
  readonly column: number;
  readonly errorType: string;
  readonly severity: Severity;
  readonly message: string;
  readonly context?: string;
  readonly filePath?: string;
  /** Inferred from `errorType` and `message` when omitted. */
  readonly category?: ErrorCategory;
}

export interface ErrorRecordJson {
  readonly line: number;
  readonly column: number;
  readonly errorType: string;
  readonly severity: Severity;
  readonly category: ErrorCategory;
  readonly message: string;
  readonly context: string;
  readonly filePath: string | null;
  readonly suggestions: readonly string[];
  readonly highlight: HighlightSpan | null;
  readonly patternId: string | null;
  readonly recovered: boolean;
  readonly recovery: RecoveryOutcome | null;
}

function clampInt(value: number, min: number, max: number): number {
  const n = Number.isFinite(value) ? Math.trunc(value) : min;
  return Math.min(max, Math.max(min, n));
}

export class ErrorRecord {
  readonly line: number;
  readonly column: number;
  readonly errorType: string;
  readonly severity: Severity;
  readonly message: string;
  readonly context: string;
  readonly filePath: string | undefined;
  readonly category: ErrorCategory;

  private readonly _suggestions: string[] = [];
  private _highlight: HighlightSpan | null = null;
  private _patternId: string | null = null;
  private _recovery: RecoveryOutcome | null = null;

  constructor(init: ErrorRecordInit) {
    if (!Number.isInteger(init.line) || init.line < 1) {
      throw new RecordInvalidError('line', init.line, 'must be a positive integer');
    }
    if (!Number.isInteger(init.column) || init.column < 0) {
      throw new RecordInvalidError('column', init.column, 'must be a non-negative integer');
    }
    this.line = init.line;
    this.column = init.column;
    this.errorType = init.errorType;
    this.severity = init.severity;
    this.message = init.message;
    this.context = init.context ?? '';
    this.filePath = init.filePath;
    this.category = init.category ?? inferCategory(init.errorType, init.message);
  }

  get suggestions(): readonly string[] {
    return this._suggestions;
  }

  get highlight(): HighlightSpan | null {
    return this._highlight;
  }

  get patternId(): string | null {
    return this._patternId;
  }

  get recovery(): RecoveryOutcome | null {
    return this._recovery;
  }

  get recovered(): boolean {
    return this._recovery?.kind === 'success';
  }

  /**
   * Append a suggestion. Blank text, duplicates and anything past the fifth
   * entry are dropped. Returns whether the suggestion was stored.
   */
  addSuggestion(text: string): boolean {
    const trimmed = text.trim();
    if (trimmed.length === 0) return false;
    if (this._suggestions.length >= MAX_SUGGESTIONS) return false;
    if (this._suggestions.includes(trimmed)) return false;
    this._suggestions.push(trimmed);
    return true;
  }

  /** Clamped into `0 <= start <= end <= context.length`. */
  setHighlightRange(start: number, end: number): HighlightSpan {
    const s = clampInt(start, 0, this.context.length);
    const e = clampInt(end, s, this.context.length);
    this._highlight = { start: s, end: e };
    return this._highlight;
  }

  /** First assignment wins; later calls return the existing id. */
  assignPattern(patternId: string): string {
    if (this._patternId === null) {
      this._patternId = patternId;
    }
    return this._patternId;
  }

  /** Set once; returns false when an outcome was already recorded. */
  recordRecovery(outcome: RecoveryOutcome): boolean {
    if (this._recovery !== null) return false;
    this._recovery = outcome;
    return true;
  }

  highlightedContext(): string {
    const span = this._highlight;
    if (span === null || span.start === span.end) {
      return escapeHtml(this.context);
    }
    const before = this.context.slice(0, span.start);
    const marked = this.context.slice(span.start, span.end);
    const after = this.context.slice(span.end);
    return `${escapeHtml(before)}<mark class='error-highlight'>${escapeHtml(marked)}</mark>${escapeHtml(after)}`;
  }

  suggestionsHtml(): string {
    if (this._suggestions.length === 0) return '';
    const items = this._suggestions.map((s) => `<li>${escapeHtml(s)}</li>`).join('');
    return `<ul class='correction-suggestions'>${items}</ul>`;
  }

  toJSON(): ErrorRecordJson {
    return {
      line: this.line,
      column: this.column,
      errorType: this.errorType,
      severity: this.severity,
      category: this.category,
      message: this.message,
      context: this.context,
      filePath: this.filePath ?? null,
      suggestions: [...this._suggestions],
      highlight: this._highlight,
      patternId: this._patternId,
      recovered: this.recovered,
      recovery: this._recovery,
    };
  }
}
