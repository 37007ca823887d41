// api/analyzeWorkbook.ts
// POST /api/analyzeWorkbook
// Body: { filename: string, file_base64: string }
// Runs the consistency report pipeline and returns where the report can be downloaded.

import type { VercelRequest, VercelResponse } from '@vercel/node';

import { analyzeAndReport } from '../engine/analyzeAndReport';
import { loadServiceConfig, type ServiceConfig } from '../engine/config';
import { logInfo, logWarn } from '../engine/logger';
import { ReportErrorHttpStatus, ReportErrorKinds, type ReportErrorKind } from '../engine/reportErrors';
import { detectSpreadsheetFormat } from '../engine/reportFilename';
import {
  createBlobReportSink,
  createDirectoryReportSink,
  type ReportSink
} from '../engine/reportSink';

export type AnalyzeWorkbookResponseBody =
  | {
      success: true;
      message: string;
      download_filename: string;
      download_url: string;
      flagged_rows: number;
      inconsistent_names: number;
    }
  | {
      success: false;
      kind?: ReportErrorKind;
      message: string;
      missing?: string[];
    };

export interface AnalyzeWorkbookReply {
  status: number;
  body: AnalyzeWorkbookResponseBody;
}

export interface AnalyzeWorkbookDeps {
  config: ServiceConfig;
  sink: ReportSink;
}

function readStringField(body: unknown, field: string): string | null {
  if (!body || typeof body !== 'object' || !(field in body)) return null;
  const value: unknown = Reflect.get(body, field);
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

function decodeBase64(raw: string): Buffer {
  // Accept base64url and data: URLs from browser FileReader
  const payload = raw.replace(/^data:[^,]*,/, '').replace(/-/g, '+').replace(/_/g, '/');
  return Buffer.from(payload, 'base64');
}

function estimateDecodedBytes(raw: string): number {
  return Math.floor((raw.length * 3) / 4);
}

/**
 * Request handling without the HTTP objects, so the shell logic can be
 * exercised directly.
 */
export async function processAnalyzeRequest(
  rawBody: unknown,
  deps: AnalyzeWorkbookDeps
): Promise<AnalyzeWorkbookReply> {
  let body: unknown = rawBody;
  if (typeof rawBody === 'string') {
    try {
      body = JSON.parse(rawBody);
    } catch {
      return { status: 400, body: { success: false, message: 'Invalid JSON body.' } };
    }
  }

  const filename = readStringField(body, 'filename');
  const fileBase64 = readStringField(body, 'file_base64');
  if (!filename || !fileBase64) {
    return {
      status: 400,
      body: { success: false, message: 'filename and file_base64 are required and must be strings.' }
    };
  }

  const maxMb = Math.round((deps.config.maxUploadBytes / (1024 * 1024)) * 10) / 10;
  if (estimateDecodedBytes(fileBase64) > deps.config.maxUploadBytes) {
    logWarn('upload_too_large', { filename, max_bytes: deps.config.maxUploadBytes });
    return {
      status: 413,
      body: { success: false, message: `Uploaded file is too large. The limit is ${maxMb} MB.` }
    };
  }

  const format = detectSpreadsheetFormat(filename);
  if (!format) {
    logWarn('unsupported_extension', { filename });
    return {
      status: ReportErrorHttpStatus[ReportErrorKinds.UNSUPPORTED_FORMAT],
      body: {
        success: false,
        kind: ReportErrorKinds.UNSUPPORTED_FORMAT,
        message: 'Unsupported file format. Only .xlsx, .xls, .xlsm files are accepted.'
      }
    };
  }

  const bytes = decodeBase64(fileBase64);
  if (bytes.length > deps.config.maxUploadBytes) {
    logWarn('upload_too_large', { filename, size: bytes.length, max_bytes: deps.config.maxUploadBytes });
    return {
      status: 413,
      body: { success: false, message: `Uploaded file is too large. The limit is ${maxMb} MB.` }
    };
  }

  logInfo('upload_received', { filename, size: bytes.length, format });

  const result = await analyzeAndReport({ input: bytes, formatHint: format, filename, sink: deps.sink });
  if (!result.ok) {
    return {
      status: ReportErrorHttpStatus[result.error.kind],
      body: {
        success: false,
        kind: result.error.kind,
        message: result.error.message,
        ...(result.error.missing ? { missing: result.error.missing } : {})
      }
    };
  }

  return {
    status: 200,
    body: {
      success: true,
      message: 'Workbook processed.',
      download_filename: result.output_filename,
      download_url: result.location,
      flagged_rows: result.flagged_rows,
      inconsistent_names: result.inconsistent_names
    }
  };
}

export function createReportSink(config: ServiceConfig): ReportSink {
  return config.storage === 'directory'
    ? createDirectoryReportSink(config.outputDir)
    : createBlobReportSink(config.blobPrefix);
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST');
    return res.status(405).json({ success: false, message: 'Method not allowed. Use POST.' });
  }

  const config = loadServiceConfig();
  const reply = await processAnalyzeRequest(req.body, { config, sink: createReportSink(config) });
  return res.status(reply.status).json(reply.body);
}
