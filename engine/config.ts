// engine/config.ts
// Canonical config for the consistency report pipeline and its service shell.

export interface ReportColumnsConfig {
  key: string;        // 'Name'
  category: string;   // 'Data Type'
}

export interface ReportStyleConfig {
  highlightArgb: string;   // solid fill for flagged rows
  linkArgb: string;        // font colour for summary hyperlinks
}

export interface ReportConfig {
  columns: ReportColumnsConfig;
  summarySheetName: string;
  summaryHeaders: [string, string, string];
  outputPrefix: string;
  style: ReportStyleConfig;
}

export const DEFAULT_REPORT_CONFIG: ReportConfig = {
  columns: {
    key: 'Name',
    category: 'Data Type'
  },
  summarySheetName: 'Consistency Summary',
  summaryHeaders: ['Name', 'Data Type', 'Count'],
  outputPrefix: 'result_',
  style: {
    highlightArgb: 'FFFFFF00',
    linkArgb: 'FF0000FF'
  }
};

// -------------------------------
// Service shell (api/)
// -------------------------------

export type ReportStorageMode = 'blob' | 'directory';

export interface ServiceConfig {
  maxUploadBytes: number;
  storage: ReportStorageMode;
  blobPrefix: string;
  outputDir: string;
  retentionMs: number;
}

const MB = 1024 * 1024;
const MINUTE_MS = 60 * 1000;

export const DEFAULT_SERVICE_CONFIG: ServiceConfig = {
  maxUploadBytes: 10 * MB,
  storage: 'blob',
  blobPrefix: 'consistency-reports/',
  outputDir: 'report-output',
  retentionMs: 120 * MINUTE_MS
};

function positiveNumber(raw: string | undefined): number | null {
  if (raw == null || raw.trim() === '') return null;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? n : null;
}

function nonEmpty(raw: string | undefined): string | null {
  const s = (raw ?? '').trim();
  return s ? s : null;
}

/**
 * Read the shell settings from the environment. Missing or unparsable values
 * fall back to DEFAULT_SERVICE_CONFIG.
 */
export function loadServiceConfig(
  env: Record<string, string | undefined> = process.env
): ServiceConfig {
  const maxMb = positiveNumber(env.REPORT_MAX_UPLOAD_MB);
  const retentionMinutes = positiveNumber(env.REPORT_RETENTION_MINUTES);
  const storage = nonEmpty(env.REPORT_STORAGE)?.toLowerCase();

  return {
    maxUploadBytes: maxMb != null ? Math.floor(maxMb * MB) : DEFAULT_SERVICE_CONFIG.maxUploadBytes,
    storage: storage === 'directory' || storage === 'blob' ? storage : DEFAULT_SERVICE_CONFIG.storage,
    blobPrefix: nonEmpty(env.REPORT_BLOB_PREFIX) ?? DEFAULT_SERVICE_CONFIG.blobPrefix,
    outputDir: nonEmpty(env.REPORT_OUTPUT_DIR) ?? DEFAULT_SERVICE_CONFIG.outputDir,
    retentionMs:
      retentionMinutes != null
        ? Math.floor(retentionMinutes * MINUTE_MS)
        : DEFAULT_SERVICE_CONFIG.retentionMs
  };
}
