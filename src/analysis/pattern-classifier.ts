/**
 * Pattern Classifier
 *
 * Maps a record's message (and, failing that, its context shape) to a
 * pattern id. Classification is idempotent: a record that already carries a
 * pattern keeps it.
 *
 * @module analysis/pattern-classifier
 */

import type { ErrorRecord } from '../domain/error-record.js';
import {
  DEFAULT_RULES,
  GENERAL_SYNTAX,
  UNKNOWN_PATTERN,
  type CorrectionRule,
} from './correction-rules.js';
import { isDelimiter } from './keywords.js';

const EMPTY_ATTRIBUTE = /(?:^|\s)[A-Za-z_][\w-]*=(?=\s|$)/;

export class PatternClassifier {
  private readonly table: CorrectionRule[];

  constructor(rules: readonly CorrectionRule[] = DEFAULT_RULES) {
    this.table = [...rules];
  }

  rules(): readonly CorrectionRule[] {
    return this.table;
  }

  /**
   * Append a rule. Custom rules run after the built-ins.
   */
  addRule(pattern: RegExp | string, patternId: string, suggestions: readonly string[] = []): void {
    const regex = typeof pattern === 'string' ? new RegExp(pattern) : pattern;
    this.table.push({ pattern: regex, patternId, suggestions });
  }

  /** First rule whose pattern matches the lowercased message. */
  matchRule(message: string): CorrectionRule | null {
    const lowered = message.toLowerCase();
    return this.table.find((rule) => rule.pattern.test(lowered)) ?? null;
  }

  /** Pure: does not touch any record. */
  classifyMessage(message: string, context = ''): string {
    const rule = this.matchRule(message);
    if (rule !== null) return rule.patternId;

    const heuristic = classifyContextShape(context);
    if (heuristic !== null) return heuristic;

    return message.trim().length === 0 ? UNKNOWN_PATTERN : GENERAL_SYNTAX;
  }

  /** Assigns the pattern onto the record unless it already has one. */
  classify(record: ErrorRecord): string {
    if (record.patternId !== null) return record.patternId;
    return record.assignPattern(this.classifyMessage(record.message, record.context));
  }
}

function classifyContextShape(context: string): string | null {
  const trimmed = context.trim();
  if (trimmed.length === 0) return null;

  const first = trimmed.charAt(0);
  const last = trimmed.charAt(trimmed.length - 1);
  if (isDelimiter(first) && !isDelimiter(last)) return 'incomplete_marker';

  if (EMPTY_ATTRIBUTE.test(trimmed)) return 'malformed_attribute';

  return null;
}
