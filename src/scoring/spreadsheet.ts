import * as XLSX from 'xlsx';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';
import { SpreadsheetError } from './errors.js';
import type { SheetRow } from './scope-summary.js';

/**
 * Rows of the first worksheet, keyed by the header row. Empty cells are
 * kept as null so every row carries every column.
 */
export function readScopeRows(filename: string, bytes: Uint8Array): Result<SheetRow[], SpreadsheetError> {
  try {
    const workbook = XLSX.read(bytes, { type: 'array' });
    const firstName = workbook.SheetNames[0];
    const sheet = firstName === undefined ? undefined : workbook.Sheets[firstName];
    if (sheet === undefined) {
      return err(new SpreadsheetError(filename, 'workbook has no worksheets'));
    }
    return ok(XLSX.utils.sheet_to_json<SheetRow>(sheet, { defval: null }));
  } catch (e) {
    return err(new SpreadsheetError(filename, e instanceof Error ? e.message : String(e), e));
  }
}
