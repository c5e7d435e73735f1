/**
 * Highlight-span estimation.
 *
 * @module analysis/highlight
 */

import type { HighlightSpan } from '../domain/error-record.js';
import { ATTRIBUTE_PATTERN_IDS, MARKER_PATTERN_IDS } from './correction-rules.js';

const ATTRIBUTE_TOKEN = /[A-Za-z_][\w-]*\s*=\s*\S*/;
const DELIMITER = /[#＃]/;

/**
 * Span inside `context` worth emphasising for a given pattern. Offsets are
 * into the untrimmed context and always satisfy `0 <= start <= end <= length`.
 */
export function estimateHighlight(context: string, patternId: string | null): HighlightSpan {
  const leading = context.length - context.trimStart().length;
  const trimmedEnd = context.trimEnd().length;
  const whole: HighlightSpan = { start: leading, end: Math.max(leading, trimmedEnd) };

  if (patternId !== null && MARKER_PATTERN_IDS.has(patternId)) {
    const at = context.search(DELIMITER);
    if (at < 0) return whole;
    return { start: at, end: Math.max(at, trimmedEnd) };
  }

  if (patternId !== null && ATTRIBUTE_PATTERN_IDS.has(patternId)) {
    const match = ATTRIBUTE_TOKEN.exec(context);
    if (match === null) return whole;
    return { start: match.index, end: match.index + match[0].length };
  }

  return whole;
}
