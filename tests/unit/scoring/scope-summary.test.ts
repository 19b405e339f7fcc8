import { describe, it, expect } from 'vitest';
import {
  MAX_SHEET_DETAILS,
  combineScopeSummaries,
  isPresent,
  normalizeColumns,
  summarizeScope,
} from '../../../src/scoring/scope-summary.js';
import type { ScopeSummary, SheetRow } from '../../../src/scoring/scope-summary.js';

const RAW_ROWS: SheetRow[] = [
  {
    Page: 1,
    'Sheet Number': 'L1.01',
    Title: 'Site Plan',
    'Scope Summary': 'Boulder walls at north edge',
    Density: 'High',
    'Retaining walls': 'X',
    Pavers: null,
    Irrigation: null,
  },
  {
    Page: 2,
    'Sheet Number': 'L1.02',
    Title: 'Paving Plan',
    'Scope Summary': 'Entry paver band',
    Density: 'Low',
    'Retaining walls': null,
    Pavers: 'X',
    Irrigation: 'X',
  },
  {
    Page: 3,
    'Sheet Number': 'G0.01',
    Title: 'Cover Sheet',
    'Scope Summary': null,
    Density: null,
    'Retaining walls': null,
    Pavers: null,
    Irrigation: null,
  },
];

describe('normalizeColumns', () => {
  it('should rename the extractor headers and keep scope columns', () => {
    const [first] = normalizeColumns(RAW_ROWS);

    expect(first).toEqual({
      pdf_page: 1,
      sheet_number: 'L1.01',
      title: 'Site Plan',
      scope_summary: 'Boulder walls at north edge',
      density: 'High',
      'Retaining walls': 'X',
      Pavers: null,
      Irrigation: null,
    });
  });
});

describe('summarizeScope', () => {
  it('should count marked sheets per scope column', () => {
    const summary = summarizeScope(normalizeColumns(RAW_ROWS));

    expect(summary).toEqual({
      total_sheets: 3,
      sheets_with_scope: 2,
      scope_indicator_counts: { Irrigation: 1, Pavers: 1, 'Retaining walls': 1 },
      sheet_details: [
        {
          sheet: 'Sheet L1.01: Site Plan',
          summary: 'Boulder walls at north edge',
          density: 'High',
          marked_scope: ['Retaining walls'],
        },
        {
          sheet: 'Sheet L1.02: Paving Plan',
          summary: 'Entry paver band',
          density: 'Low',
          marked_scope: ['Irrigation', 'Pavers'],
        },
      ],
    });
  });

  it('should list scope columns in the canonical order', () => {
    const summary = summarizeScope([{ Pavers: 'X', Fencing: 'X', 'Concrete flatwork': 'X' }]);

    expect(Object.keys(summary.scope_indicator_counts)).toEqual(['Concrete flatwork', 'Fencing', 'Pavers']);
    expect(summary.sheet_details[0]?.marked_scope).toEqual(['Concrete flatwork', 'Fencing', 'Pavers']);
  });

  it('should label missing sheet numbers and titles N/A', () => {
    const summary = summarizeScope([{ sheet_number: null, title: '', Drainage: 'X' }]);

    expect(summary.sheet_details).toEqual([
      { sheet: 'Sheet N/A: N/A', summary: '', density: '', marked_scope: ['Drainage'] },
    ]);
  });

  it('should leave out columns that are present but never marked', () => {
    const summary = summarizeScope([{ title: 'Notes', Lighting: null, Fencing: Number.NaN }]);

    expect(summary.scope_indicator_counts).toEqual({});
    expect(summary.sheets_with_scope).toBe(0);
    expect(summary.sheet_details).toEqual([]);
  });

  it('should ignore columns that are not scope columns', () => {
    const summary = summarizeScope([{ title: 'Plan', 'Custom Column': 'X' }]);

    expect(summary.sheets_with_scope).toBe(0);
  });

  it('should cap the sheet details', () => {
    const rows = Array.from({ length: 60 }, (_, i) => ({ sheet_number: `L${i}`, title: 'Plan', Fencing: 'X' }));

    const summary = summarizeScope(rows);

    expect(summary.sheets_with_scope).toBe(60);
    expect(summary.scope_indicator_counts).toEqual({ Fencing: 60 });
    expect(summary.sheet_details).toHaveLength(MAX_SHEET_DETAILS);
    expect(summary.sheet_details[49]?.sheet).toBe('Sheet L49: Plan');
  });

  it('should summarize an empty sheet', () => {
    expect(summarizeScope([])).toEqual({
      total_sheets: 0,
      sheets_with_scope: 0,
      scope_indicator_counts: {},
      sheet_details: [],
    });
  });
});

describe('combineScopeSummaries', () => {
  const a: ScopeSummary = {
    total_sheets: 3,
    sheets_with_scope: 2,
    scope_indicator_counts: { Pavers: 1, 'Retaining walls': 2 },
    sheet_details: [{ sheet: 'Sheet A1: One', summary: '', density: '', marked_scope: ['Pavers'] }],
  };
  const b: ScopeSummary = {
    total_sheets: 4,
    sheets_with_scope: 1,
    scope_indicator_counts: { Irrigation: 1, Pavers: 3 },
    sheet_details: [{ sheet: 'Sheet B1: Two', summary: '', density: '', marked_scope: ['Irrigation'] }],
  };

  it('should add totals and counts across files', () => {
    const combined = combineScopeSummaries([a, b]);

    expect(combined.total_sheets).toBe(7);
    expect(combined.sheets_with_scope).toBe(3);
    expect(combined.scope_indicator_counts).toEqual({ Irrigation: 1, Pavers: 4, 'Retaining walls': 2 });
    expect(combined.sheet_details.map((d) => d.sheet)).toEqual(['Sheet A1: One', 'Sheet B1: Two']);
  });

  it('should cap the combined details', () => {
    const many: ScopeSummary = {
      ...a,
      sheet_details: Array.from({ length: 30 }, (_, i) => ({ sheet: `Sheet ${i}: x`, summary: '', density: '', marked_scope: [] })),
    };

    expect(combineScopeSummaries([many, many]).sheet_details).toHaveLength(MAX_SHEET_DETAILS);
  });
});

describe('isPresent', () => {
  it('should treat empty cells as absent', () => {
    expect([null, undefined, Number.NaN, ''].map(isPresent)).toEqual([false, false, false, false]);
    expect([0, 'X', false].map(isPresent)).toEqual([true, true, true]);
  });
});
