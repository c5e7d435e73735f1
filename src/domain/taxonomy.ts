/**
 * Error taxonomy: categories and severities are independent axes.
 *
 * @module domain/taxonomy
 */

export const SEVERITIES = ['info', 'warning', 'error', 'critical'] as const;
export type Severity = typeof SEVERITIES[number];

export const ERROR_CATEGORIES = [
  'file_system',
  'encoding',
  'syntax',
  'validation',
  'permission',
  'system',
  'unknown',
] as const;
export type ErrorCategory = typeof ERROR_CATEGORIES[number];

export const HANDLING_LEVELS = ['strict', 'normal', 'lenient', 'ignore'] as const;
export type HandlingLevel = typeof HANDLING_LEVELS[number];

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value);
}

export function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === 'string' && (ERROR_CATEGORIES as readonly string[]).includes(value);
}

/** `info` < `warning` < `error` < `critical`. */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function compareSeverity(a: Severity, b: Severity): number {
  return severityRank(a) - severityRank(b);
}

// First match wins; `syntax` sits before `validation` so "invalid syntax" stays syntax.
const CATEGORY_KEYWORDS: ReadonlyArray<readonly [RegExp, ErrorCategory]> = [
  [/encoding|decode|codec|charset/, 'encoding'],
  [/permission|access denied|eacces|eperm/, 'permission'],
  [/not found|no such file|enoent|file_system|file system/, 'file_system'],
  [/memory|system/, 'system'],
  [/syntax|marker|nest|keyword|delimiter/, 'syntax'],
  [/validation|invalid|colou?r|attribute/, 'validation'],
];

/**
 * Infer a category from the error-type tag and message when the parser did
 * not supply one.
 */
export function inferCategory(errorType: string, message: string): ErrorCategory {
  const haystack = `${errorType} ${message}`.toLowerCase();
  for (const [pattern, category] of CATEGORY_KEYWORDS) {
    if (pattern.test(haystack)) return category;
  }
  return 'unknown';
}
