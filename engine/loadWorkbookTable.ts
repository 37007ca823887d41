// engine/loadWorkbookTable.ts
//
// Decode an uploaded workbook into a SheetTable.
// - xlsx / xlsm: exceljs (the loaded workbook is kept for in-place editing)
// - xls: SheetJS, the only reader here that understands BIFF8

import { Readable } from 'node:stream';
import ExcelJS from 'exceljs';
import * as XLSX from 'xlsx';

import { cellText, fromExcelValue, fromSheetJsValue, isMissing } from './cellValues';
import { DEFAULT_REPORT_CONFIG, type ReportColumnsConfig } from './config';
import { ReportError, ReportErrorKinds } from './reportErrors';
import type { CellValue, SheetRecord, SheetTable, SpreadsheetFormat } from './types';

export type LoadedWorkbook =
  | { format: 'xlsx' | 'xlsm'; table: SheetTable; workbook: ExcelJS.Workbook }
  | { format: 'xls'; table: SheetTable };

// ------------------------------------------------------------
// Sheet selection
// ------------------------------------------------------------

/**
 * Read the first sheet. When that fails, a single-sheet document is retried
 * by name; a multi-sheet document is reported as ambiguous instead of guessed.
 */
export function selectPrimarySheet(
  sheetNames: string[],
  readFirst: () => SheetTable,
  readByName: (name: string) => SheetTable
): SheetTable {
  try {
    return readFirst();
  } catch (err) {
    if (sheetNames.length === 1) {
      try {
        return readByName(sheetNames[0]);
      } catch (retryErr) {
        throw new ReportError(
          ReportErrorKinds.UNREADABLE_DOCUMENT,
          `Worksheet "${sheetNames[0]}" could not be read.`,
          { sheetNames },
          { cause: retryErr }
        );
      }
    }
    if (sheetNames.length > 1) {
      throw new ReportError(
        ReportErrorKinds.AMBIGUOUS_SHEET_SELECTION,
        `The workbook contains ${sheetNames.length} worksheets (${sheetNames.join(', ')}) ` +
          'and the first one could not be read. Upload a workbook with a single worksheet.',
        { sheetNames },
        { cause: err }
      );
    }
    throw new ReportError(
      ReportErrorKinds.UNREADABLE_DOCUMENT,
      'No worksheet found in the workbook.',
      { sheetNames },
      { cause: err }
    );
  }
}

function buildRecords(rows: Array<{ rowNumber: number; cells: CellValue[] }>): SheetRecord[] {
  // Completely empty rows are not records.
  return rows.filter((row) => !row.cells.every(isMissing));
}

// ------------------------------------------------------------
// exceljs (xlsx / xlsm)
// ------------------------------------------------------------

function readExcelJsSheet(worksheet: ExcelJS.Worksheet | undefined): SheetTable {
  if (!worksheet) {
    throw new Error('Worksheet not found.');
  }

  const headerRow = worksheet.getRow(1);
  const columnCount = Math.max(worksheet.columnCount, headerRow.cellCount);
  const headers: string[] = [];
  for (let col = 1; col <= columnCount; col++) {
    headers.push(cellText(fromExcelValue(headerRow.getCell(col).value)));
  }

  const rows: Array<{ rowNumber: number; cells: CellValue[] }> = [];
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    const row = worksheet.getRow(rowNumber);
    const cells = headers.map((_, index) => fromExcelValue(row.getCell(index + 1).value));
    rows.push({ rowNumber, cells });
  }

  return { sheetName: worksheet.name, headers, records: buildRecords(rows) };
}

async function loadWithExcelJs(
  bytes: Buffer,
  format: 'xlsx' | 'xlsm'
): Promise<LoadedWorkbook> {
  const workbook = new ExcelJS.Workbook();
  try {
    await workbook.xlsx.read(Readable.from(bytes));
  } catch (err) {
    throw new ReportError(
      ReportErrorKinds.UNREADABLE_DOCUMENT,
      `The file could not be read as .${format}. Check that it is a valid, uncorrupted workbook.`,
      { formatHint: format },
      { cause: err }
    );
  }

  const worksheets = workbook.worksheets;
  const table = selectPrimarySheet(
    worksheets.map((ws) => ws.name),
    () => readExcelJsSheet(worksheets[0]),
    (name) => readExcelJsSheet(workbook.getWorksheet(name))
  );

  return { format, table, workbook };
}

// ------------------------------------------------------------
// SheetJS (xls)
// ------------------------------------------------------------

function readSheetJsSheet(sheetName: string, sheet: XLSX.WorkSheet | undefined): SheetTable {
  if (!sheet) {
    throw new Error(`Worksheet "${sheetName}" not found.`);
  }

  const ref = sheet['!ref'];
  const firstRow = ref ? XLSX.utils.decode_range(ref).s.r : 0;
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: true,
    defval: null,
    raw: true
  });

  // The header is expected on sheet row 1; a sheet whose range starts lower
  // has an empty header row.
  const headerCells = firstRow === 0 ? matrix[0] ?? [] : [];
  const width = Math.max(headerCells.length, ...matrix.map((row) => row.length));
  const headers: string[] = [];
  for (let col = 0; col < width; col++) {
    headers.push(cellText(fromSheetJsValue(headerCells[col])));
  }

  const rows: Array<{ rowNumber: number; cells: CellValue[] }> = [];
  matrix.forEach((row, index) => {
    const rowNumber = firstRow + index + 1;
    if (rowNumber < 2) return;
    rows.push({ rowNumber, cells: headers.map((_, col) => fromSheetJsValue(row[col])) });
  });

  return { sheetName, headers, records: buildRecords(rows) };
}

function loadWithSheetJs(bytes: Buffer): LoadedWorkbook {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(bytes, { type: 'buffer', cellDates: true });
  } catch (err) {
    throw new ReportError(
      ReportErrorKinds.UNREADABLE_DOCUMENT,
      'The file could not be read as .xls. Check that it is a valid, uncorrupted workbook.',
      { formatHint: 'xls' },
      { cause: err }
    );
  }

  const sheetNames = workbook.SheetNames;
  const table = selectPrimarySheet(
    sheetNames,
    () => readSheetJsSheet(sheetNames[0] ?? '', workbook.Sheets[sheetNames[0] ?? '']),
    (name) => readSheetJsSheet(name, workbook.Sheets[name])
  );

  return { format: 'xls', table };
}

// ------------------------------------------------------------
// Entry point
// ------------------------------------------------------------

export function findMissingColumns(
  headers: string[],
  columns: ReportColumnsConfig = DEFAULT_REPORT_CONFIG.columns
): string[] {
  return [columns.key, columns.category].filter((name) => !headers.includes(name));
}

/**
 * Load the primary worksheet of a workbook and check the required columns.
 * Throws ReportError (UnreadableDocument, AmbiguousSheetSelection,
 * MissingRequiredColumns).
 */
export async function loadWorkbookTable(
  bytes: Buffer,
  format: SpreadsheetFormat,
  columns: ReportColumnsConfig = DEFAULT_REPORT_CONFIG.columns
): Promise<LoadedWorkbook> {
  const loaded = format === 'xls' ? loadWithSheetJs(bytes) : await loadWithExcelJs(bytes, format);

  const missing = findMissingColumns(loaded.table.headers, columns);
  if (missing.length > 0) {
    throw new ReportError(
      ReportErrorKinds.MISSING_REQUIRED_COLUMNS,
      `The uploaded workbook is missing required columns: ${missing.join(', ')}`,
      { missing }
    );
  }

  return loaded;
}
