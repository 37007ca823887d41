import { afterEach, describe, expect, it, vi } from 'vitest';
import ExcelJS from 'exceljs';

import { analyzeConsistency } from '../engine/analyzeConsistency';
import { buildInternalLinkFormula, composeReport, quoteSheetName } from '../engine/composeReport';
import { loadWorkbookTable } from '../engine/loadWorkbookTable';
import { RebuildStrategy, selectSheetStrategy, type PrimarySheet } from '../engine/sheetStrategies';
import type { AnalysisResult } from '../engine/types';
import { SAMPLE_ROWS, buildXlsx, tableOf, text, writeRows } from './helpers/workbooks';

const HIGHLIGHT = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFFFFF00' } };

async function preparedSample(): Promise<{ primary: PrimarySheet; analysis: AnalysisResult }> {
  const bytes = await buildXlsx([{ name: 'Data', rows: SAMPLE_ROWS }]);
  const loaded = await loadWorkbookTable(bytes, 'xlsx');
  const primary = selectSheetStrategy(loaded, bytes).preparePrimarySheet();
  return { primary, analysis: analyzeConsistency(loaded.table) };
}

function sheetPrimary(workbook: ExcelJS.Workbook, worksheet: ExcelJS.Worksheet): PrimarySheet {
  return { workbook, worksheet, rowFor: (record) => record.rowNumber };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('link formulas', () => {
  it('quotes sheet names and doubles inner quotes', () => {
    expect(quoteSheetName('Data')).toBe("'Data'");
    expect(quoteSheetName("Bob's types")).toBe("'Bob''s types'");
  });

  it('escapes double quotes in the display text', () => {
    expect(buildInternalLinkFormula('Data', 'A', 2, 'say "hi"')).toBe(
      'HYPERLINK("#\'Data\'!A2","say ""hi""")'
    );
  });
});

describe('composeReport', () => {
  it('highlights every cell of flagged rows only', async () => {
    const { primary, analysis } = await preparedSample();

    const outcome = composeReport(primary, analysis);

    expect(outcome.highlightedRows).toBe(1);
    for (let col = 1; col <= 3; col++) {
      expect(primary.worksheet.getRow(4).getCell(col).fill).toEqual(HIGHLIGHT);
    }
    expect(primary.worksheet.getRow(2).getCell(1).fill).not.toEqual(HIGHLIGHT);
    expect(primary.worksheet.getRow(5).getCell(1).fill).not.toEqual(HIGHLIGHT);
  });

  it('appends a summary sheet with one row per (Name, Data Type) pair', async () => {
    const { primary, analysis } = await preparedSample();

    const outcome = composeReport(primary, analysis);
    const summary = primary.workbook.getWorksheet('Consistency Summary');

    expect(outcome.summaryRows).toBe(2);
    expect(primary.workbook.worksheets.map((ws) => ws.name)).toEqual(['Data', 'Consistency Summary']);
    expect(summary?.getRow(1).values).toEqual([undefined, 'Name', 'Data Type', 'Count']);
    expect(summary?.getRow(2).getCell(2).value).toBe('int');
    expect(summary?.getRow(2).getCell(3).value).toBe(2);
    expect(summary?.getRow(3).getCell(2).value).toBe('str');
    expect(summary?.getRow(3).getCell(3).value).toBe(1);
  });

  it('links summary names to their first row in the primary sheet', async () => {
    const { primary, analysis } = await preparedSample();

    const outcome = composeReport(primary, analysis);
    const summary = primary.workbook.getWorksheet('Consistency Summary');
    const first = summary?.getRow(2).getCell(1);
    const second = summary?.getRow(3).getCell(1);

    expect(outcome.linkedRows).toBe(2);
    expect(first?.formula).toBe('HYPERLINK("#\'Data\'!A2","x")');
    expect(first?.result).toBe('x');
    expect(first?.font).toEqual({ color: { argb: 'FF0000FF' }, underline: 'single' });
    expect(second?.formula).toBe('HYPERLINK("#\'Data\'!A2","x")');
  });

  it('keeps exactly one summary sheet when run twice', async () => {
    const { primary, analysis } = await preparedSample();

    composeReport(primary, analysis);
    composeReport(primary, analysis);

    expect(primary.workbook.worksheets.map((ws) => ws.name)).toEqual(['Data', 'Consistency Summary']);
  });

  it('replaces an existing summary sheet whose name differs only in case', () => {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet('Data');
    writeRows(worksheet, [['Name', 'Data Type'], ['x', 'int'], ['x', 'str']]);
    writeRows(workbook.addWorksheet('consistency summary'), [['stale']]);
    const analysis = analyzeConsistency(
      tableOf([
        ['x', 'int'],
        ['x', 'str']
      ])
    );

    const outcome = composeReport(sheetPrimary(workbook, worksheet), analysis);

    expect(outcome.summarySheetName).toBe('Consistency Summary');
    expect(workbook.worksheets.map((ws) => ws.name)).toEqual(['Data', 'Consistency Summary']);
    expect(workbook.getWorksheet('Consistency Summary')?.getRow(1).values).toEqual([
      undefined,
      'Name',
      'Data Type',
      'Count'
    ]);
  });

  it('picks a free summary name when the primary sheet holds the reserved one', () => {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet('Consistency Summary');
    writeRows(worksheet, [['Name', 'Data Type'], ['x', 'int'], ['x', 'str']]);
    const analysis = analyzeConsistency(
      tableOf(
        [
          ['x', 'int'],
          ['x', 'str']
        ],
        'Consistency Summary'
      )
    );

    const outcome = composeReport(sheetPrimary(workbook, worksheet), analysis);
    const cell = workbook.getWorksheet('Consistency Summary (2)')?.getRow(2).getCell(1);

    expect(outcome.summarySheetName).toBe('Consistency Summary (2)');
    expect(outcome.linkedRows).toBe(2);
    expect(workbook.worksheets.map((ws) => ws.name)).toEqual(['Consistency Summary', 'Consistency Summary (2)']);
    expect(worksheet.getRow(2).getCell(1).value).toBe('x');
    expect(cell?.formula).toBe('HYPERLINK("#\'Consistency Summary\'!A2","x")');
  });

  it('matches names trimmed and case-insensitively', () => {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet('Fields');
    writeRows(worksheet, [
      ['Id', 'Name', 'Data Type'],
      [1, 'other', 'int'],
      [2, '  Amount ', 'int']
    ]);
    const analysis = analyzeConsistency(
      tableOf([
        ['amount', 'int'],
        ['amount', 'str'],
        ['amount', 'int']
      ])
    );

    const outcome = composeReport(sheetPrimary(workbook, worksheet), analysis);
    const cell = workbook.getWorksheet('Consistency Summary')?.getRow(2).getCell(1);

    expect(outcome.linkedRows).toBe(2);
    expect(cell?.formula).toBe('HYPERLINK("#\'Fields\'!B3","amount")');
  });

  it('leaves names without a matching row as plain values', () => {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet('Data');
    writeRows(worksheet, [['Name', 'Data Type'], ['someone else', 'int']]);
    const analysis = analyzeConsistency(
      tableOf([
        ['x', 'int'],
        ['x', 'str']
      ])
    );

    const outcome = composeReport(sheetPrimary(workbook, worksheet), analysis);
    const cell = workbook.getWorksheet('Consistency Summary')?.getRow(2).getCell(1);

    expect(outcome.linkedRows).toBe(0);
    expect(cell?.value).toBe('x');
  });

  it('skips links with a warning when the primary sheet has no Name column', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet('Data');
    writeRows(worksheet, [['Key', 'Data Type'], ['x', 'int'], ['x', 'str']]);
    const analysis = analyzeConsistency(
      tableOf([
        ['x', 'int'],
        ['x', 'str']
      ])
    );

    const outcome = composeReport(sheetPrimary(workbook, worksheet), analysis);

    expect(outcome.linkedRows).toBe(0);
    expect(outcome.summaryRows).toBe(2);
    expect(workbook.getWorksheet('Consistency Summary')?.getRow(2).getCell(1).value).toBe('x');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(warn.mock.calls[0][0]))).toMatchObject({
      level: 'warn',
      event: 'summary_links_skipped',
      sheet: 'Data'
    });
  });
});

describe('RebuildStrategy', () => {
  it('writes the header and records on consecutive rows', () => {
    const table = {
      sheetName: 'Legacy',
      headers: ['Name', 'Data Type', 'Note'],
      records: [
        { rowNumber: 2, cells: [text('a'), text('int'), { kind: 'empty' as const }] },
        { rowNumber: 5, cells: [text('b'), text('str'), { kind: 'number' as const, value: 9 }] }
      ]
    };
    const strategy = new RebuildStrategy(table);

    const primary = strategy.preparePrimarySheet();

    expect(strategy.outputFormat).toBe('xlsx');
    expect(primary.worksheet.name).toBe('Legacy');
    expect(primary.worksheet.getRow(1).values).toEqual([undefined, 'Name', 'Data Type', 'Note']);
    expect(primary.worksheet.getRow(3).values).toEqual([undefined, 'b', 'str', 9]);
    expect(primary.rowFor(table.records[1])).toBe(3);
    expect(primary.rowFor({ rowNumber: 40, cells: [] })).toBeUndefined();
  });
});
