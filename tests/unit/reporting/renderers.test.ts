import { describe, it, expect } from 'vitest';
import { renderHtmlReport, renderTextSummary, toStructuredSummary } from '../../../src/reporting/renderers.js';
import { generateStatistics } from '../../../src/reporting/statistics.js';
import { sampleRecords } from './fixtures.js';

describe('renderTextSummary', () => {
  it('says so when there are no errors', () => {
    expect(renderTextSummary(generateStatistics([]))).toBe('No errors detected');
  });

  it('summarises counts, severities and top patterns', () => {
    expect(renderTextSummary(generateStatistics(sampleRecords()))).toBe(
      [
        'Errors: 4 (recovered: 1, 25%)',
        'By severity: info 1, warning 1, error 2',
        'Top patterns:',
        '  1. marker_mismatch: 2 (50%)',
        '  2. invalid_color: 1 (25%)',
        '  3. unknown: 1 (25%)',
        'Suggestions: 2',
      ].join('\n')
    );
  });
});

describe('renderHtmlReport', () => {
  it('renders the empty report', () => {
    expect(renderHtmlReport(generateStatistics([]))).toBe(
      "<div class='error-statistics-report no-errors'><p>No errors detected</p></div>"
    );
  });

  it('renders severity and pattern bars', () => {
    const lines = renderHtmlReport(generateStatistics(sampleRecords())).split('\n');

    expect(lines[0]).toBe("<div class='error-statistics-report'>");
    expect(lines[2]).toBe("<p class='error-total'>Total: 4, recovered: 1</p>");
    expect(lines).toContain(
      "<div class='stat-bar severity-error'><span class='stat-label'>error</span>"
        + "<span class='stat-bar-fill' style='width: 50%'></span><span class='stat-count'>2</span></div>"
    );
    expect(lines).toContain(
      "<div class='stat-bar pattern'><span class='stat-label'>unknown</span>"
        + "<span class='stat-bar-fill' style='width: 25%'></span><span class='stat-count'>1</span>"
        + "<span class='stat-example'>odd &lt;tag&gt;</span></div>"
    );
    expect(lines[lines.length - 1]).toBe('</div>');
  });

  it('omits severities with no records', () => {
    const html = renderHtmlReport(generateStatistics(sampleRecords()));
    expect(html).not.toContain('severity-critical');
  });
});

describe('toStructuredSummary', () => {
  it('wraps the statistics with a version and timestamp', () => {
    const stats = generateStatistics([]);
    expect(toStructuredSummary(stats, new Date('2026-03-04T05:06:07.000Z'))).toEqual({
      version: 1,
      generatedAt: '2026-03-04T05:06:07.000Z',
      statistics: stats,
    });
  });
});
