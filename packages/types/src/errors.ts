export type PipelineErrorCode =
  | 'SOURCE_PARSE_FAILURE'
  | 'MISSING_REPORT_CONTAINER'
  | 'MALFORMED_STATUS_CODE'
  | 'INVALID_INTERIM_DOCUMENT';

/**
 * Base class for failures the pipeline isolates to a single unit of work
 * (one payment entry, one report file, one interim document).
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string) {
    super(message);
    this.name = 'PipelineError';
    this.code = code;
  }
}

/** The raw report bytes are not a well-formed tree. */
export class SourceParseError extends PipelineError {
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(message: string, position: { line?: number; column?: number } = {}) {
    super('SOURCE_PARSE_FAILURE', message);
    this.name = 'SourceParseError';
    this.line = position.line;
    this.column = position.column;
  }
}

/** A required container path is missing from the normalized report. */
export class ReportStructureError extends PipelineError {
  readonly path: string;

  constructor(path: string, message: string) {
    super('MISSING_REPORT_CONTAINER', message);
    this.name = 'ReportStructureError';
    this.path = path;
  }
}

/** A payment status is not of the form `<dpd>/<code>`. */
export class MalformedStatusCodeError extends PipelineError {
  readonly statusCode: string;

  constructor(statusCode: string, reason: string) {
    super('MALFORMED_STATUS_CODE', `Malformed status code "${statusCode}": ${reason}`);
    this.name = 'MalformedStatusCodeError';
    this.statusCode = statusCode;
  }
}

export class InterimDocumentError extends PipelineError {
  readonly details: ReadonlyArray<{ path: string; message: string }>;

  constructor(message: string, details: ReadonlyArray<{ path: string; message: string }> = []) {
    super('INVALID_INTERIM_DOCUMENT', message);
    this.name = 'InterimDocumentError';
    this.details = details;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
