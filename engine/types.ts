// engine/types.ts
// Shared TypeScript types for the consistency report pipeline.

/**
 * Supported spreadsheet formats. `xls` is the legacy BIFF format and can
 * only be read; its report is always written as `xlsx`.
 */
export type SpreadsheetFormat = 'xlsx' | 'xlsm' | 'xls';

export const SPREADSHEET_FORMATS: readonly SpreadsheetFormat[] = ['xlsx', 'xlsm', 'xls'];

/**
 * One cell, tagged by scalar kind. Grouping never coerces across kinds:
 * the text "1" and the number 1 are different values.
 */
export type CellValue =
  | { kind: 'text'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'date'; value: Date }
  | { kind: 'empty' };

export interface SheetRecord {
  /** 1-based row number in the source worksheet (header is row 1). */
  rowNumber: number;
  /** Aligned with SheetTable.headers. */
  cells: CellValue[];
}

export interface SheetTable {
  sheetName: string;
  /** Header texts in column order; '' for an empty header cell. */
  headers: string[];
  records: SheetRecord[];
}

// -------------------------------
// Analysis
// -------------------------------

export interface AnalyzedRecord extends SheetRecord {
  name: CellValue;
  dataType: CellValue;
  flagged: boolean;
}

export interface KeyProfile {
  name: CellValue;
  dominant: CellValue;
  total: number;
  flagged: number;
}

export interface DeviationRow {
  name: CellValue;
  dataType: CellValue;
  count: number;
}

export interface AnalysisResult {
  /** Records that took part in the analysis, in original order. */
  records: AnalyzedRecord[];
  keyProfiles: KeyProfile[];
  summary: DeviationRow[];
  droppedCount: number;
  flaggedCount: number;
  inconsistentKeyCount: number;
}
