/**
 * Reshapes a scope-extractor spreadsheet into the fixed summary the scoring
 * prompt is built from.
 */

/** One spreadsheet row, keyed by (normalised) column header. */
export type SheetRow = Readonly<Record<string, unknown>>;

export const COLUMN_ALIASES: Readonly<Record<string, string>> = {
  Page: 'pdf_page',
  'Sheet Number': 'sheet_number',
  Title: 'title',
  Scale: 'scale',
  'Scope Summary': 'scope_summary',
  Density: 'density',
  'Est. Takeoff Time': 'estimated_takeoff_time',
};

export const SCOPE_COLUMNS = [
  'Aggregates / gravel',
  'Concrete flatwork',
  'Fencing',
  'Furnishings',
  'Irrigation',
  'Pavers',
  'Retaining walls',
  'Softscape (landscape planting)',
  'Synthetic turf',
  'Drainage',
  'Lighting',
  'BMP / Environmental / Bioswales',
] as const;

export type ScopeColumn = (typeof SCOPE_COLUMNS)[number];

export const MAX_SHEET_DETAILS = 50;

export interface SheetDetail {
  readonly sheet: string;
  readonly summary: unknown;
  readonly density: unknown;
  readonly marked_scope: readonly ScopeColumn[];
}

export interface ScopeSummary {
  readonly total_sheets: number;
  readonly sheets_with_scope: number;
  readonly scope_indicator_counts: Readonly<Partial<Record<ScopeColumn, number>>>;
  readonly sheet_details: readonly SheetDetail[];
}

/** Empty spreadsheet cells come through as null/undefined, NaN or ''. */
export function isPresent(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'number' && Number.isNaN(value)) return false;
  return value !== '';
}

export function normalizeColumns(rows: readonly SheetRow[]): SheetRow[] {
  return rows.map((row) =>
    Object.fromEntries(Object.entries(row).map(([column, value]) => [COLUMN_ALIASES[column] ?? column, value]))
  );
}

export function summarizeScope(rows: readonly SheetRow[]): ScopeSummary {
  const columns = columnsOf(rows);
  const present = SCOPE_COLUMNS.filter((column) => columns.includes(column));

  const counts: Partial<Record<ScopeColumn, number>> = {};
  for (const column of present) {
    const count = rows.filter((row) => isPresent(row[column])).length;
    if (count > 0) counts[column] = count;
  }

  const withScope = rows.filter((row) => present.some((column) => isPresent(row[column])));

  const details = withScope.map(
    (row): SheetDetail => ({
      sheet: `Sheet ${labelOf(row['sheet_number'])}: ${labelOf(row['title'])}`,
      summary: cellOrEmpty(row['scope_summary']),
      density: cellOrEmpty(row['density']),
      marked_scope: present.filter((column) => isPresent(row[column])),
    })
  );

  return {
    total_sheets: rows.length,
    sheets_with_scope: withScope.length,
    scope_indicator_counts: counts,
    sheet_details: details.slice(0, MAX_SHEET_DETAILS),
  };
}

export function combineScopeSummaries(summaries: readonly ScopeSummary[]): ScopeSummary {
  const counts: Partial<Record<ScopeColumn, number>> = {};
  for (const summary of summaries) {
    for (const column of SCOPE_COLUMNS) {
      const count = summary.scope_indicator_counts[column];
      if (count !== undefined) counts[column] = (counts[column] ?? 0) + count;
    }
  }

  return {
    total_sheets: summaries.reduce((sum, s) => sum + s.total_sheets, 0),
    sheets_with_scope: summaries.reduce((sum, s) => sum + s.sheets_with_scope, 0),
    scope_indicator_counts: counts,
    sheet_details: summaries.flatMap((s) => s.sheet_details).slice(0, MAX_SHEET_DETAILS),
  };
}

function columnsOf(rows: readonly SheetRow[]): string[] {
  return [...new Set(rows.flatMap((row) => Object.keys(row)))];
}

function labelOf(value: unknown): string {
  return isPresent(value) ? String(value) : 'N/A';
}

function cellOrEmpty(value: unknown): unknown {
  return isPresent(value) ? value : '';
}
