// engine/cellValues.ts
// Conversions between exceljs / SheetJS cells and the tagged CellValue.

import type ExcelJS from 'exceljs';
import type { CellValue } from './types';

export const EMPTY_CELL: CellValue = { kind: 'empty' };

export function textCell(value: string): CellValue {
  return { kind: 'text', value };
}

// ------------------------------------------------------------
// Readers
// ------------------------------------------------------------

function fromScalar(value: unknown): CellValue {
  if (value == null) return EMPTY_CELL;
  if (typeof value === 'string') return { kind: 'text', value };
  if (typeof value === 'number') {
    return Number.isNaN(value) ? EMPTY_CELL : { kind: 'number', value };
  }
  if (typeof value === 'boolean') return { kind: 'boolean', value };
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? EMPTY_CELL : { kind: 'date', value };
  }
  // { error: '#N/A' } and anything else unrecognised
  return EMPTY_CELL;
}

function runText(run: unknown): string {
  return typeof run === 'object' && run !== null && 'text' in run && typeof run.text === 'string'
    ? run.text
    : '';
}

/** Display text of a hyperlink cell; exceljs hands back rich text for formatted labels. */
export function hyperlinkText(text: unknown): string {
  if (text == null) return '';
  if (typeof text === 'string') return text;
  if (typeof text === 'object' && 'richText' in text && Array.isArray(text.richText)) {
    return text.richText.map((run: unknown) => runText(run)).join('');
  }
  return String(text);
}

/**
 * Convert an exceljs cell value.
 * - rich text → joined runs
 * - hyperlink → display text
 * - formula / shared formula → cached result (empty when never calculated)
 * - error cells → empty
 */
export function fromExcelValue(value: ExcelJS.CellValue): CellValue {
  if (value == null || typeof value !== 'object' || value instanceof Date) {
    return fromScalar(value);
  }
  if ('richText' in value) {
    return textCell(value.richText.map((run) => run.text).join(''));
  }
  if ('hyperlink' in value) {
    return textCell(hyperlinkText(value.text));
  }
  if ('error' in value) return EMPTY_CELL;
  if ('result' in value) return fromScalar(value.result);
  return EMPTY_CELL;
}

/** SheetJS (raw mode, cellDates) yields null, string, number, boolean or Date. */
export function fromSheetJsValue(value: unknown): CellValue {
  return fromScalar(value);
}

// ------------------------------------------------------------
// Writers / comparison helpers
// ------------------------------------------------------------

export function toExcelValue(cell: CellValue): ExcelJS.CellValue {
  switch (cell.kind) {
    case 'text':
    case 'number':
    case 'boolean':
    case 'date':
      return cell.value;
    case 'empty':
      return null;
  }
}

/**
 * Identity used for grouping. Kind-qualified so values of different
 * kinds never collapse into one group.
 */
export function cellKey(cell: CellValue): string {
  switch (cell.kind) {
    case 'text':
      return `t:${cell.value}`;
    case 'number':
      return `n:${cell.value}`;
    case 'boolean':
      return `b:${cell.value}`;
    case 'date':
      return `d:${cell.value.toISOString()}`;
    case 'empty':
      return 'e:';
  }
}

export function cellText(cell: CellValue): string {
  switch (cell.kind) {
    case 'text':
      return cell.value;
    case 'number':
      return String(cell.value);
    case 'boolean':
      return cell.value ? 'TRUE' : 'FALSE';
    case 'date':
      return cell.value.toISOString();
    case 'empty':
      return '';
  }
}

/** Empty cells and whitespace-only text count as missing. */
export function isMissing(cell: CellValue): boolean {
  if (cell.kind === 'empty') return true;
  return cell.kind === 'text' && cell.value.trim() === '';
}

/** Trimmed, case-insensitive text used to match a summary Name to a sheet row. */
export function lookupText(cell: CellValue): string {
  return cellText(cell).trim().toLowerCase();
}
