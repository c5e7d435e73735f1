/**
 * Correction Engine
 *
 * Produces up to five deduplicated fix suggestions for a record by merging
 * the matched rule's fixed set with context heuristics, and writes pattern,
 * suggestions and highlight back onto the record.
 *
 * @module analysis/correction-engine
 */

import type { ErrorRecord } from '../domain/error-record.js';
import { MAX_SUGGESTIONS } from '../domain/error-record.js';
import { HEURISTIC_SUGGESTIONS } from './correction-rules.js';
import { estimateHighlight } from './highlight.js';
import {
  FULL_WIDTH_DELIMITER,
  FULL_WIDTH_SPACE,
  KEYWORD_ALIASES,
  KNOWN_KEYWORDS,
  MARKER_DELIMITER,
  isDelimiter,
} from './keywords.js';
import { PatternClassifier } from './pattern-classifier.js';
import { DEFAULT_SIMILARITY_THRESHOLD, similarity, type Similarity } from './similarity.js';
import { findAllMatches } from './string-similarity.js';

export interface CorrectionEngineOptions {
  readonly classifier?: PatternClassifier;
  readonly similarityThreshold?: number;
}

const REPEATED_DELIMITERS = /#{3,}/;
const FULL_WIDTH_SPACE_BY_MARKER = /[#＃]　|　[#＃]/;
const KEYWORD_IN_MESSAGE = /keyword[:\s]+['"]?([^'"\s]+)/i;

export class CorrectionEngine {
  readonly classifier: PatternClassifier;
  private readonly threshold: Similarity;

  constructor(options: CorrectionEngineOptions = {}) {
    this.classifier = options.classifier ?? new PatternClassifier();
    this.threshold = options.similarityThreshold === undefined
      ? DEFAULT_SIMILARITY_THRESHOLD
      : similarity(options.similarityThreshold);
  }

  /**
   * Does not mutate the record; an unclassified record is classified on the fly.
   */
  generateSuggestions(record: ErrorRecord): string[] {
    const patternId = record.patternId
      ?? this.classifier.classifyMessage(record.message, record.context);

    const merged = [
      ...this.ruleSuggestions(record.message, patternId),
      ...contextSuggestions(record.context),
      ...(patternId === 'unknown_keyword' ? this.keywordSuggestions(record) : []),
    ];

    return dedupe(merged).slice(0, MAX_SUGGESTIONS);
  }

  /**
   * Classify, suggest and highlight in one pass. Returns the pattern id.
   */
  enhanceErrorWithSuggestions(record: ErrorRecord): string {
    const patternId = this.classifier.classify(record);
    for (const suggestion of this.generateSuggestions(record)) {
      record.addSuggestion(suggestion);
    }
    const span = estimateHighlight(record.context, patternId);
    record.setHighlightRange(span.start, span.end);
    return patternId;
  }

  /** Fixed set of the rule the message matches; heuristic ids fall back to their own. */
  private ruleSuggestions(message: string, patternId: string): readonly string[] {
    const rule = this.classifier.matchRule(message);
    if (rule !== null) return rule.suggestions;
    return HEURISTIC_SUGGESTIONS[patternId] ?? [];
  }

  private keywordSuggestions(record: ErrorRecord): string[] {
    const typed = openingKeyword(record.context) ?? KEYWORD_IN_MESSAGE.exec(record.message)?.[1] ?? null;
    if (typed === null) return [];

    const out: string[] = [];
    const alias = KEYWORD_ALIASES[typed.toLowerCase()];
    if (alias !== undefined) out.push(didYouMean(alias));
    for (const { match } of findAllMatches(typed, KNOWN_KEYWORDS, this.threshold, 3)) {
      out.push(didYouMean(match));
    }
    return out;
  }
}

function didYouMean(keyword: string): string {
  return `Did you mean '${keyword}'?`;
}

function dedupe(items: readonly string[]): string[] {
  return [...new Set(items)];
}

/**
 * Text after the opening delimiter up to the first interior whitespace, or
 * null when the context does not open with a delimiter.
 */
export function openingKeyword(context: string): string | null {
  const trimmed = context.trim();
  if (trimmed.length === 0 || !isDelimiter(trimmed.charAt(0))) return null;
  const rest = trimmed.slice(1).replace(/^[\s　]+/, '');
  const keyword = rest.split(/[\s　]/)[0] ?? '';
  const cleaned = keyword.replace(/[#＃]+$/, '');
  return cleaned.length > 0 ? cleaned : null;
}

/**
 * True when the context mixes code points below 256 (other than the plain
 * space) with code points at or above 256.
 */
export function hasMixedWidth(context: string): boolean {
  let narrow = false;
  let wide = false;
  for (const ch of context) {
    const cp = ch.codePointAt(0) ?? 0;
    if (cp >= 256) wide = true;
    else if (cp !== 0x20) narrow = true;
    if (narrow && wide) return true;
  }
  return false;
}

export function contextSuggestions(context: string): string[] {
  const out: string[] = [];
  const trimmed = context.trim();
  if (trimmed.length === 0) return out;

  if (isDelimiter(trimmed.charAt(0)) && !isDelimiter(trimmed.charAt(trimmed.length - 1))) {
    const keyword = openingKeyword(trimmed);
    out.push(keyword === null
      ? `Close the marker with '${MARKER_DELIMITER}'`
      : `Close the marker: '${MARKER_DELIMITER} ${keyword} ${MARKER_DELIMITER}'`);
  }

  if (hasMixedWidth(context)) {
    out.push("Half-width and full-width characters are mixed; markers need the half-width '#' and spaces");
  }

  if (context.includes(FULL_WIDTH_DELIMITER) && context.includes(MARKER_DELIMITER)) {
    out.push(`Replace the full-width '${FULL_WIDTH_DELIMITER}' with '${MARKER_DELIMITER}'`);
  }

  if (context.includes(FULL_WIDTH_SPACE) && FULL_WIDTH_SPACE_BY_MARKER.test(context)) {
    out.push("Use a half-width space next to '#' instead of the full-width space");
  }

  if (REPEATED_DELIMITERS.test(context)) {
    out.push("Close blocks with exactly '##'");
  }

  return out;
}
