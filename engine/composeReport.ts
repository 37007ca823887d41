// engine/composeReport.ts
//
// Render an analysis onto the primary worksheet:
//  1) fill flagged rows
//  2) replace the summary sheet
//  3) link each summary Name to its first row in the primary sheet

import type ExcelJS from 'exceljs';

import { cellText, fromExcelValue, lookupText, toExcelValue } from './cellValues';
import { DEFAULT_REPORT_CONFIG, type ReportConfig } from './config';
import { logInfo, logWarn } from './logger';
import type { PrimarySheet } from './sheetStrategies';
import type { AnalysisResult, CellValue } from './types';

export interface ComposeOutcome {
  highlightedRows: number;
  summaryRows: number;
  linkedRows: number;
  summarySheetName: string;
}

/** Sheet reference for a formula, always quoted with inner quotes doubled. */
export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}

function escapeFormulaText(text: string): string {
  return text.replace(/"/g, '""');
}

export function buildInternalLinkFormula(
  sheetName: string,
  columnLetter: string,
  rowNumber: number,
  displayText: string
): string {
  const target = `#${quoteSheetName(sheetName)}!${columnLetter}${rowNumber}`;
  return `HYPERLINK("${escapeFormulaText(target)}","${escapeFormulaText(displayText)}")`;
}

function highlightRows(primary: PrimarySheet, analysis: AnalysisResult, argb: string): number {
  const { worksheet } = primary;
  const lastColumn = worksheet.columnCount;
  let highlighted = 0;

  for (const record of analysis.records) {
    if (!record.flagged) continue;
    const rowNumber = primary.rowFor(record);
    if (rowNumber === undefined) continue;

    const row = worksheet.getRow(rowNumber);
    for (let col = 1; col <= lastColumn; col++) {
      row.getCell(col).fill = { type: 'pattern', pattern: 'solid', fgColor: { argb } };
    }
    highlighted += 1;
  }
  return highlighted;
}

// Worksheet names are unique ignoring case.
function sameSheetName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function removeStaleSummarySheets(primary: PrimarySheet, summarySheetName: string): void {
  const stale = primary.workbook.worksheets.filter(
    (ws) => sameSheetName(ws.name, summarySheetName) && ws.id !== primary.worksheet.id
  );
  for (const ws of stale) {
    primary.workbook.removeWorksheet(ws.id);
    logInfo('summary_sheet_replaced', { sheet: summarySheetName });
  }
}

/** The reserved name, or "<name> (n)" when the primary sheet already holds it. */
function freeSheetName(workbook: ExcelJS.Workbook, name: string): string {
  const taken = (candidate: string) => workbook.worksheets.some((ws) => sameSheetName(ws.name, candidate));
  if (!taken(name)) return name;
  let suffix = 2;
  while (taken(`${name} (${suffix})`)) suffix += 1;
  return `${name} (${suffix})`;
}

function findHeaderColumn(worksheet: ExcelJS.Worksheet, header: string): number | undefined {
  const headerRow = worksheet.getRow(1);
  for (let col = 1; col <= worksheet.columnCount; col++) {
    if (cellText(fromExcelValue(headerRow.getCell(col).value)) === header) return col;
  }
  return undefined;
}

function findFirstRow(worksheet: ExcelJS.Worksheet, column: number, name: CellValue): number | undefined {
  const needle = lookupText(name);
  for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
    const value = fromExcelValue(worksheet.getRow(rowNumber).getCell(column).value);
    if (value.kind !== 'empty' && lookupText(value) === needle) return rowNumber;
  }
  return undefined;
}

function writeSummarySheet(
  primary: PrimarySheet,
  analysis: AnalysisResult,
  config: ReportConfig
): ExcelJS.Worksheet {
  const sheet = primary.workbook.addWorksheet(freeSheetName(primary.workbook, config.summarySheetName));
  sheet.addRow([...config.summaryHeaders]);
  sheet.getRow(1).font = { bold: true };

  for (const row of analysis.summary) {
    sheet.addRow([toExcelValue(row.name), toExcelValue(row.dataType), row.count]);
  }

  config.summaryHeaders.forEach((header, index) => {
    sheet.getColumn(index + 1).width = Math.max(header.length + 4, 16);
  });

  return sheet;
}

function linkSummaryNames(
  primary: PrimarySheet,
  summarySheet: ExcelJS.Worksheet,
  analysis: AnalysisResult,
  config: ReportConfig
): number {
  const { worksheet } = primary;
  const nameColumn = findHeaderColumn(worksheet, config.columns.key);
  if (nameColumn === undefined) {
    logWarn('summary_links_skipped', {
      sheet: worksheet.name,
      reason: `column "${config.columns.key}" not found in header row`
    });
    return 0;
  }

  const columnLetter = worksheet.getColumn(nameColumn).letter;
  let linked = 0;

  analysis.summary.forEach((row, index) => {
    if (row.name.kind === 'empty') return;
    const targetRow = findFirstRow(worksheet, nameColumn, row.name);
    if (targetRow === undefined) return;

    const cell = summarySheet.getRow(index + 2).getCell(1);
    cell.value = {
      formula: buildInternalLinkFormula(worksheet.name, columnLetter, targetRow, cellText(row.name)),
      result: row.name.value,
      date1904: false
    };
    cell.font = { color: { argb: config.style.linkArgb }, underline: 'single' };
    linked += 1;
  });

  return linked;
}

export function composeReport(
  primary: PrimarySheet,
  analysis: AnalysisResult,
  config: ReportConfig = DEFAULT_REPORT_CONFIG
): ComposeOutcome {
  const highlightedRows = highlightRows(primary, analysis, config.style.highlightArgb);

  removeStaleSummarySheets(primary, config.summarySheetName);
  const summarySheet = writeSummarySheet(primary, analysis, config);
  const linkedRows = linkSummaryNames(primary, summarySheet, analysis, config);

  return {
    highlightedRows,
    summaryRows: analysis.summary.length,
    linkedRows,
    summarySheetName: summarySheet.name
  };
}
