/**
 * Continue/abort policy. Rules are evaluated in order; the first that
 * applies decides.
 *
 * @module session/continue-policy
 */

import { assertNever } from '../runtime/assert-never.js';
import type { ErrorCategory, HandlingLevel, Severity } from '../domain/taxonomy.js';

export type DecisionAction = 'continue' | 'abort';

export interface HandlingDecision {
  readonly action: DecisionAction;
  readonly reason: string;
  readonly recovered: boolean;
}

export interface PolicyInput {
  readonly severity: Severity;
  readonly category: ErrorCategory;
  readonly level: HandlingLevel;
  /** Occurrences of the category so far, including this record. */
  readonly occurrences: number;
  readonly maxOccurrences: number;
  readonly recovered: boolean;
}

export function decide(input: PolicyInput): HandlingDecision {
  const { severity, category, level, recovered } = input;
  const go = (reason: string): HandlingDecision => ({ action: 'continue', reason, recovered });
  const stop = (reason: string): HandlingDecision => ({ action: 'abort', reason, recovered });

  if (severity === 'critical') {
    return stop('critical errors always abort');
  }
  if (input.occurrences > input.maxOccurrences) {
    return stop(`${category} errors exceeded the limit of ${input.maxOccurrences}`);
  }

  switch (level) {
    case 'ignore':
      return go(`${category} errors are ignored`);
    case 'lenient':
      return go(`lenient handling continues past ${severity}`);
    case 'normal':
      if (severity === 'info' || severity === 'warning') {
        return go(`normal handling continues past ${severity}`);
      }
      return recovered
        ? go('error was recovered automatically')
        : stop('unrecovered error under normal handling');
    case 'strict':
      if (severity === 'info') return go('strict handling continues past info');
      if (severity === 'warning' && recovered) return go('warning was recovered automatically');
      return stop(`strict handling stops on ${recovered ? 'recovered ' : ''}${severity}`);
    default:
      return assertNever(level);
  }
}
