import type { ErrorRecord } from '../domain/error-record.js';
import { escapeHtml } from '../domain/html.js';

export const RECOVERED_NOTICE = 'continued after automatic fix';

export interface InlineMarkerOptions {
  readonly showSuggestions?: boolean;
}

/**
 * Annotation embedded into generated HTML at the point of the error. Every
 * piece of user text is escaped.
 */
export function renderInlineErrorMarker(record: ErrorRecord, options: InlineMarkerOptions = {}): string {
  const showSuggestions = options.showSuggestions ?? true;
  const classes = `markup-error severity-${record.severity}${record.recovered ? ' recovered' : ''}`;
  const text = record.recovered
    ? `${record.message} (${RECOVERED_NOTICE})`
    : record.message;

  const parts = [
    `<span class='${classes}' data-line='${record.line}' data-column='${record.column}' title='${escapeHtml(text)}'>`,
    `<span class='markup-error-message'>Line ${record.line}: ${escapeHtml(text)}</span>`,
  ];
  if (showSuggestions && !record.recovered) parts.push(record.suggestionsHtml());
  if (record.context.length > 0) {
    parts.push(`<code class='markup-error-context'>${record.highlightedContext()}</code>`);
  }
  parts.push('</span>');
  return parts.join('');
}
