import { describe, it, expect } from 'vitest';
import { readScopeRows } from '../../../src/scoring/spreadsheet.js';
import { normalizeColumns, summarizeScope } from '../../../src/scoring/scope-summary.js';
import { expectOk } from '../../helpers/result-helpers.js';
import { SCOPE_SHEET_ROWS, workbookBytes } from '../../helpers/scoring-fixtures.js';

describe('readScopeRows', () => {
  it('should key rows by header and keep empty cells as null', () => {
    const rows = expectOk(readScopeRows('site.xlsx', workbookBytes(SCOPE_SHEET_ROWS)), 'read workbook');

    expect(rows).toHaveLength(3);
    expect(rows[2]).toEqual({
      Page: 3,
      'Sheet Number': 'G0.01',
      Title: 'Cover Sheet',
      'Scope Summary': null,
      Density: null,
      'Retaining walls': null,
      Pavers: null,
      Irrigation: null,
    });
  });

  it('should feed the scope summary', () => {
    const rows = expectOk(readScopeRows('site.xlsx', workbookBytes(SCOPE_SHEET_ROWS)), 'read workbook');

    const summary = summarizeScope(normalizeColumns(rows));

    expect(summary.total_sheets).toBe(3);
    expect(summary.sheets_with_scope).toBe(2);
    expect(summary.scope_indicator_counts).toEqual({ Irrigation: 1, Pavers: 1, 'Retaining walls': 1 });
  });

  it('should read a sheet without empty cells', () => {
    const bytes = workbookBytes([['Title', 'Pavers'], ['Plan', 'X']], 'First');

    const rows = expectOk(readScopeRows('one.xlsx', bytes), 'read workbook');

    expect(rows).toEqual([{ Title: 'Plan', Pavers: 'X' }]);
  });
});
