// engine/analyzeAndReport.ts
//
// Load → analyze → compose → store, one synchronous sequence per request.
// The sink is only called once the report is fully serialized.

import type { Readable } from 'node:stream';
import { buffer as collectStream } from 'node:stream/consumers';

import { analyzeConsistency } from './analyzeConsistency';
import { composeReport } from './composeReport';
import { DEFAULT_REPORT_CONFIG, type ReportConfig } from './config';
import { loadWorkbookTable } from './loadWorkbookTable';
import { describeError, logError, logInfo, logWarn } from './logger';
import {
  ReportError,
  ReportErrorDescriptions,
  ReportErrorKinds,
  isReportError,
  toReportErrorPayload,
  type ReportErrorPayload
} from './reportErrors';
import {
  REPORT_CONTENT_TYPES,
  createUniquenessToken,
  deriveOutputFilename,
  isSpreadsheetFormat
} from './reportFilename';
import type { ReportSink } from './reportSink';
import { selectSheetStrategy } from './sheetStrategies';

export interface AnalyzeAndReportInput {
  input: Buffer | Readable;
  /** 'xlsx' | 'xlsm' | 'xls'; anything else is rejected before reading. */
  formatHint: string;
  filename: string;
  sink: ReportSink;
  config?: ReportConfig;
  /** Uniqueness token for the output name; random when omitted. */
  token?: string;
}

export interface AnalyzeAndReportSuccess {
  ok: true;
  output_filename: string;
  location: string;
  flagged_rows: number;
  inconsistent_names: number;
  summary_rows: number;
  linked_rows: number;
}

export interface AnalyzeAndReportFailure {
  ok: false;
  error: ReportErrorPayload;
}

export type AnalyzeAndReportResult = AnalyzeAndReportSuccess | AnalyzeAndReportFailure;

const INTERNAL_FAILURE_MESSAGE =
  'The workbook could not be processed because of an internal error. Please try again later.';

async function toBuffer(input: Buffer | Readable): Promise<Buffer> {
  return Buffer.isBuffer(input) ? input : collectStream(input);
}

async function runPipeline(args: AnalyzeAndReportInput): Promise<AnalyzeAndReportSuccess> {
  const { formatHint, filename, sink } = args;
  const config = args.config ?? DEFAULT_REPORT_CONFIG;

  if (!isSpreadsheetFormat(formatHint)) {
    throw new ReportError(
      ReportErrorKinds.UNSUPPORTED_FORMAT,
      `Unsupported file format "${formatHint}". Supported formats: .xlsx, .xls, .xlsm`,
      { formatHint }
    );
  }

  const sourceBytes = await toBuffer(args.input);
  const loaded = await loadWorkbookTable(sourceBytes, formatHint, config.columns);
  logInfo('workbook_loaded', {
    filename,
    format: formatHint,
    sheet: loaded.table.sheetName,
    records: loaded.table.records.length
  });

  const analysis = analyzeConsistency(loaded.table, config.columns);
  logInfo('analysis_completed', {
    filename,
    dropped_rows: analysis.droppedCount,
    flagged_rows: analysis.flaggedCount,
    inconsistent_names: analysis.inconsistentKeyCount
  });

  const strategy = selectSheetStrategy(loaded, sourceBytes);
  const primary = strategy.preparePrimarySheet();
  const outcome = composeReport(primary, analysis, config);

  const written = Buffer.from(await primary.workbook.xlsx.writeBuffer());
  const bytes = await strategy.finalize(written);

  const outputFilename = deriveOutputFilename(
    filename,
    formatHint,
    args.token ?? createUniquenessToken(),
    config.outputPrefix
  );
  const stored = await sink.save(outputFilename, bytes, REPORT_CONTENT_TYPES[strategy.outputFormat]);
  logInfo('report_saved', {
    filename,
    output_filename: stored.filename,
    strategy: strategy.kind,
    highlighted_rows: outcome.highlightedRows,
    linked_rows: outcome.linkedRows
  });

  return {
    ok: true,
    output_filename: stored.filename,
    location: stored.location,
    flagged_rows: analysis.flaggedCount,
    inconsistent_names: analysis.inconsistentKeyCount,
    summary_rows: outcome.summaryRows,
    linked_rows: outcome.linkedRows
  };
}

/**
 * Classified failures come back with their own message; anything else is
 * logged in full and reported as InternalFailure with a generic message.
 */
export async function analyzeAndReport(args: AnalyzeAndReportInput): Promise<AnalyzeAndReportResult> {
  try {
    return await runPipeline(args);
  } catch (err) {
    if (isReportError(err)) {
      logWarn('report_rejected', {
        filename: args.filename,
        kind: err.kind,
        description: ReportErrorDescriptions[err.kind],
        message: err.message,
        ...(err.cause !== undefined ? { cause: describeError(err.cause) } : {})
      });
      return { ok: false, error: toReportErrorPayload(err) };
    }

    logError('report_failed', { filename: args.filename, ...describeError(err) });
    return {
      ok: false,
      error: { kind: ReportErrorKinds.INTERNAL_FAILURE, message: INTERNAL_FAILURE_MESSAGE }
    };
  }
}
