import { describe, it, expect } from 'vitest';
import { PdfReportRenderer, formatGeneratedAt } from '../../../src/infrastructure/pdf/pdf-report-renderer.js';
import { expectOk } from '../../helpers/result-helpers.js';
import { sampleScores } from '../../helpers/scoring-fixtures.js';

describe('PdfReportRenderer', () => {
  it('should render a PDF document', async () => {
    const pdf = expectOk(
      await new PdfReportRenderer().render(
        [
          {
            filename: 'site.xlsx',
            summary: { total_sheets: 3, sheets_with_scope: 2, scope_counts: { Pavers: 1 }, files_analyzed: ['site.xlsx'] },
            scores: sampleScores({ overall_recommendation: 'A long recommendation. '.repeat(40) }),
          },
        ],
        new Date(Date.UTC(2026, 0, 15, 12, 0, 0))
      ),
      'render'
    );

    expect(Buffer.from(pdf.subarray(0, 5)).toString('latin1')).toBe('%PDF-');
    expect(pdf.byteLength).toBeGreaterThan(1000);
  });
});

describe('formatGeneratedAt', () => {
  it('should spell out the month and use a 12-hour clock', () => {
    const text = formatGeneratedAt(new Date(2026, 9, 19, 15, 4));

    // ICU may put a narrow no-break space before the day period.
    expect(text).toMatch(/^October 19, 2026 at 03:04\sPM$/);
  });
});
