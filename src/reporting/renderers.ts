/**
 * Pure renderers over a statistics snapshot.
 *
 * @module reporting/renderers
 */

import { escapeHtml } from '../domain/html.js';
import { SEVERITIES, type Severity } from '../domain/taxonomy.js';
import { percentageOf, type ErrorStatistics } from './statistics.js';

export const REPORT_VERSION = 1;

export interface StatisticsReport {
  readonly version: typeof REPORT_VERSION;
  readonly generatedAt: string;
  readonly statistics: ErrorStatistics;
}

export function toStructuredSummary(stats: ErrorStatistics, generatedAt: Date = new Date()): StatisticsReport {
  return { version: REPORT_VERSION, generatedAt: generatedAt.toISOString(), statistics: stats };
}

function presentSeverities(stats: ErrorStatistics): Array<readonly [Severity, number]> {
  const out: Array<readonly [Severity, number]> = [];
  for (const severity of SEVERITIES) {
    const count = stats.bySeverity[severity] ?? 0;
    if (count > 0) out.push([severity, count]);
  }
  return out;
}

function bar(cssClass: string, label: string, count: number, width: number, extra = ''): string {
  return `<div class='stat-bar ${cssClass}'>`
    + `<span class='stat-label'>${escapeHtml(label)}</span>`
    + `<span class='stat-bar-fill' style='width: ${width}%'></span>`
    + `<span class='stat-count'>${count}</span>`
    + extra
    + '</div>';
}

export function renderHtmlReport(stats: ErrorStatistics): string {
  if (stats.totalErrors === 0) {
    return "<div class='error-statistics-report no-errors'><p>No errors detected</p></div>";
  }

  const severityBars = presentSeverities(stats).map(([severity, count]) =>
    bar(`severity-${severity}`, severity, count, percentageOf(count, stats.totalErrors))
  );
  const patternBars = stats.topPatterns.map((p) =>
    bar('pattern', p.patternId, p.count, p.percentage, `<span class='stat-example'>${escapeHtml(p.exampleMessage)}</span>`)
  );

  return [
    "<div class='error-statistics-report'>",
    '<h3>Error statistics</h3>',
    `<p class='error-total'>Total: ${stats.totalErrors}, recovered: ${stats.recoveredCount}</p>`,
    "<section class='severity-breakdown'>",
    '<h4>By severity</h4>',
    ...severityBars,
    '</section>',
    "<section class='pattern-breakdown'>",
    '<h4>Top patterns</h4>',
    ...patternBars,
    '</section>',
    '</div>',
  ].join('\n');
}

export function renderTextSummary(stats: ErrorStatistics): string {
  if (stats.totalErrors === 0) return 'No errors detected';

  const severities = presentSeverities(stats).map(([s, n]) => `${s} ${n}`).join(', ');
  const lines = [
    `Errors: ${stats.totalErrors} (recovered: ${stats.recoveredCount}, ${percentageOf(stats.recoveredCount, stats.totalErrors)}%)`,
    `By severity: ${severities}`,
    'Top patterns:',
    ...stats.topPatterns.map((p, i) => `  ${i + 1}. ${p.patternId}: ${p.count} (${p.percentage}%)`),
    `Suggestions: ${stats.totalSuggestions}`,
  ];
  return lines.join('\n');
}
