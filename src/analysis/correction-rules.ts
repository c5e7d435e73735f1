/**
 * Ordered classification rules and the fixed suggestions each contributes.
 *
 * The classifier and the correction engine read the same table: the first
 * rule whose pattern matches the lowercased message wins.
 *
 * @module analysis/correction-rules
 */

export interface CorrectionRule {
  readonly pattern: RegExp;
  readonly patternId: string;
  readonly suggestions: readonly string[];
}

export const MARKER_PATTERN_IDS: ReadonlySet<string> = new Set([
  'marker_mismatch',
  'incomplete_marker',
  'invalid_nesting',
]);

export const ATTRIBUTE_PATTERN_IDS: ReadonlySet<string> = new Set([
  'invalid_color',
  'malformed_attribute',
]);

export const GENERAL_SYNTAX = 'general_syntax';
export const UNKNOWN_PATTERN = 'unknown';

export const DEFAULT_RULES: readonly CorrectionRule[] = [
  {
    pattern: /marker.*mismatch/,
    patternId: 'marker_mismatch',
    suggestions: [
      "Check that every '# keyword #' opening has a matching '##' close",
      'Close nested blocks in the reverse order they were opened',
    ],
  },
  {
    pattern: /incomplete.*marker|unclosed marker|unterminated/,
    patternId: 'incomplete_marker',
    suggestions: [
      "Close the marker with '#'",
      "End the block with '##' on its own line",
    ],
  },
  {
    pattern: /invalid.*nest|nesting/,
    patternId: 'invalid_nesting',
    suggestions: [
      'Close the inner block before closing the outer one',
      'Split the nested markers into separate blocks',
    ],
  },
  {
    pattern: /invalid.*syntax/,
    patternId: 'invalid_syntax',
    suggestions: [
      "Write markers as '# keyword #'",
      "Use the half-width '#' as the delimiter",
    ],
  },
  {
    pattern: /missing.*element/,
    patternId: 'missing_element',
    suggestions: [
      "Add the missing '##' that closes the block",
      'Put content between the opening marker and the close',
    ],
  },
  {
    pattern: /unknown.*keyword|invalid.*keyword/,
    patternId: 'unknown_keyword',
    suggestions: [
      'Check the spelling of the keyword',
      'Known keywords: bold, italic, heading1-heading5, box, highlight, details, spoiler, toc, image',
    ],
  },
  {
    pattern: /colou?r/,
    patternId: 'invalid_color',
    suggestions: [
      'Use a color name or a hex code such as color=#ff0000',
      'Write the attribute as key=value',
    ],
  },
  {
    pattern: /decode|encoding|codec/,
    patternId: 'encoding_error',
    suggestions: [
      'Save the file as UTF-8',
      'Shift_JIS and EUC-JP files can be converted with automatic recovery enabled',
    ],
  },
  {
    pattern: /permission|access denied|eacces/,
    patternId: 'permission_denied',
    suggestions: [
      'Check that the file is readable',
      'Close other programs that hold the file open',
    ],
  },
  {
    pattern: /not found|no such file|enoent/,
    patternId: 'file_not_found',
    suggestions: [
      'Check the file name and path',
      'Check the file extension',
    ],
  },
  {
    pattern: /out of memory|memory/,
    patternId: 'memory_pressure',
    suggestions: [
      'Split the document into smaller files',
      'Close other applications to free memory',
    ],
  },
];

/** Suggestions for ids only the context heuristics assign. */
export const HEURISTIC_SUGGESTIONS: Readonly<Record<string, readonly string[]>> = {
  malformed_attribute: ['Give the attribute a value: key=value'],
};
