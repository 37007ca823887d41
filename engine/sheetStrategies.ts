// engine/sheetStrategies.ts
//
// How the primary worksheet of the report is obtained.
// - InPlaceEditStrategy: xlsx / xlsm, edits the loaded exceljs workbook
// - RebuildStrategy: xls, exceljs cannot open BIFF so the sheet is rewritten
//   from the loaded table into a fresh .xlsx workbook

import ExcelJS from 'exceljs';

import { textCell, toExcelValue } from './cellValues';
import type { LoadedWorkbook } from './loadWorkbookTable';
import { preserveVbaProject } from './macroPreservation';
import type { SheetRecord, SheetTable } from './types';

export type ReportOutputFormat = 'xlsx' | 'xlsm';

export interface PrimarySheet {
  workbook: ExcelJS.Workbook;
  worksheet: ExcelJS.Worksheet;
  /** Worksheet row holding the record, or undefined if it was not written. */
  rowFor(record: SheetRecord): number | undefined;
}

export interface SheetStrategy {
  readonly kind: 'in-place' | 'rebuild';
  readonly outputFormat: ReportOutputFormat;
  preparePrimarySheet(): PrimarySheet;
  /** Post-process the serialized workbook before it is stored. */
  finalize(bytes: Buffer): Promise<Buffer>;
}

export class InPlaceEditStrategy implements SheetStrategy {
  readonly kind = 'in-place';

  constructor(
    private readonly workbook: ExcelJS.Workbook,
    private readonly sheetName: string,
    readonly outputFormat: ReportOutputFormat,
    private readonly sourceBytes: Buffer
  ) {}

  preparePrimarySheet(): PrimarySheet {
    const worksheet = this.workbook.getWorksheet(this.sheetName);
    if (!worksheet) {
      throw new Error(`Worksheet "${this.sheetName}" disappeared from the loaded workbook.`);
    }
    return {
      workbook: this.workbook,
      worksheet,
      rowFor: (record) => (record.rowNumber <= worksheet.rowCount ? record.rowNumber : undefined)
    };
  }

  async finalize(bytes: Buffer): Promise<Buffer> {
    if (this.outputFormat !== 'xlsm') return bytes;
    return preserveVbaProject(this.sourceBytes, bytes);
  }
}

export class RebuildStrategy implements SheetStrategy {
  readonly kind = 'rebuild';
  readonly outputFormat = 'xlsx';

  constructor(private readonly table: SheetTable) {}

  preparePrimarySheet(): PrimarySheet {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet(this.table.sheetName || 'Sheet1');

    const headerRow = worksheet.getRow(1);
    this.table.headers.forEach((header, index) => {
      headerRow.getCell(index + 1).value = header ? toExcelValue(textCell(header)) : null;
    });

    const written = new Map<number, number>();
    this.table.records.forEach((record, index) => {
      const rowNumber = index + 2;
      const row = worksheet.getRow(rowNumber);
      record.cells.forEach((cell, col) => {
        row.getCell(col + 1).value = toExcelValue(cell);
      });
      written.set(record.rowNumber, rowNumber);
    });

    return {
      workbook,
      worksheet,
      rowFor: (record) => written.get(record.rowNumber)
    };
  }

  async finalize(bytes: Buffer): Promise<Buffer> {
    return bytes;
  }
}

export function selectSheetStrategy(loaded: LoadedWorkbook, sourceBytes: Buffer): SheetStrategy {
  switch (loaded.format) {
    case 'xls':
      return new RebuildStrategy(loaded.table);
    case 'xlsx':
    case 'xlsm':
      return new InPlaceEditStrategy(loaded.workbook, loaded.table.sheetName, loaded.format, sourceBytes);
  }
}
