// engine/reportFilename.ts
// Format detection and output naming for generated reports.

import crypto from 'node:crypto';
import path from 'node:path';

import { DEFAULT_REPORT_CONFIG } from './config';
import type { ReportOutputFormat } from './sheetStrategies';
import { SPREADSHEET_FORMATS, type SpreadsheetFormat } from './types';

export const REPORT_CONTENT_TYPES: Record<ReportOutputFormat, string> = {
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  xlsm: 'application/vnd.ms-excel.sheet.macroEnabled.12'
};

export function isSpreadsheetFormat(hint: unknown): hint is SpreadsheetFormat {
  return typeof hint === 'string' && SPREADSHEET_FORMATS.some((format) => format === hint);
}

/** Format hint from a file extension, case-insensitive; null when unsupported. */
export function detectSpreadsheetFormat(filename: string): SpreadsheetFormat | null {
  const ext = path.extname(filename).toLowerCase().replace(/^\./, '');
  return isSpreadsheetFormat(ext) ? ext : null;
}

/** Legacy .xls has no writer, its report is always .xlsx. */
export function outputFormatFor(format: SpreadsheetFormat): ReportOutputFormat {
  return format === 'xls' ? 'xlsx' : format;
}

export function createUniquenessToken(): string {
  return crypto.randomUUID().replace(/-/g, '').slice(0, 8);
}

/**
 * result_<base>_<token>.<ext>
 * The base drops any directory part and the extension of the uploaded name.
 */
export function deriveOutputFilename(
  filename: string,
  format: SpreadsheetFormat,
  token: string = createUniquenessToken(),
  prefix: string = DEFAULT_REPORT_CONFIG.outputPrefix
): string {
  const basename = path.basename(filename.replace(/\\/g, '/'));
  const base = basename.slice(0, basename.length - path.extname(basename).length) || 'workbook';
  const suffix = token ? `_${token}` : '';
  return `${prefix}${base}${suffix}.${outputFormatFor(format)}`;
}
