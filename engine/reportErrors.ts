// engine/reportErrors.ts
// Canonical error kinds for the consistency report pipeline.
//
//  UnsupportedFormat / AmbiguousSheetSelection / UnreadableDocument /
//  MissingRequiredColumns → user-facing, recoverable (400)
//  InternalFailure → anything unclassified (500), message never carries internals

export const ReportErrorKinds = {
  UNSUPPORTED_FORMAT: 'UnsupportedFormat',
  AMBIGUOUS_SHEET_SELECTION: 'AmbiguousSheetSelection',
  UNREADABLE_DOCUMENT: 'UnreadableDocument',
  MISSING_REQUIRED_COLUMNS: 'MissingRequiredColumns',
  INTERNAL_FAILURE: 'InternalFailure'
} as const;

export type ReportErrorKind = (typeof ReportErrorKinds)[keyof typeof ReportErrorKinds];

// Human-readable descriptions (for logs / UI fallbacks)
export const ReportErrorDescriptions: Record<ReportErrorKind, string> = {
  [ReportErrorKinds.UNSUPPORTED_FORMAT]: 'The file format is not supported.',
  [ReportErrorKinds.AMBIGUOUS_SHEET_SELECTION]:
    'The workbook has several worksheets and none could be selected.',
  [ReportErrorKinds.UNREADABLE_DOCUMENT]: 'The workbook could not be read.',
  [ReportErrorKinds.MISSING_REQUIRED_COLUMNS]: 'Required columns are missing from the header row.',
  [ReportErrorKinds.INTERNAL_FAILURE]: 'Internal processing failure.'
};

export const ReportErrorHttpStatus: Record<ReportErrorKind, number> = {
  [ReportErrorKinds.UNSUPPORTED_FORMAT]: 400,
  [ReportErrorKinds.AMBIGUOUS_SHEET_SELECTION]: 400,
  [ReportErrorKinds.UNREADABLE_DOCUMENT]: 400,
  [ReportErrorKinds.MISSING_REQUIRED_COLUMNS]: 400,
  [ReportErrorKinds.INTERNAL_FAILURE]: 500
};

export interface ReportErrorDetails {
  missing?: string[];
  sheetNames?: string[];
  formatHint?: string;
}

export class ReportError extends Error {
  readonly kind: ReportErrorKind;
  readonly details: ReportErrorDetails;

  constructor(
    kind: ReportErrorKind,
    message: string,
    details: ReportErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ReportError';
    this.kind = kind;
    this.details = details;
  }
}

export function isReportError(err: unknown): err is ReportError {
  return err instanceof ReportError;
}

/**
 * Shape handed to the service shell. Only the kind and the message,
 * never a stack or a cause.
 */
export interface ReportErrorPayload {
  kind: ReportErrorKind;
  message: string;
  missing?: string[];
}

export function toReportErrorPayload(err: ReportError): ReportErrorPayload {
  const payload: ReportErrorPayload = { kind: err.kind, message: err.message };
  if (err.details.missing) payload.missing = [...err.details.missing];
  return payload;
}
