// Error handling utilities for data-ingestion package

export type PipelineErrorCode = 'MALFORMED_DATE' | 'CSV_PARSE_FAILED' | 'INVALID_CONFIG' | 'PIPELINE_FAILED';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export interface DateFailure {
  index: number;
  value: string;
}

/**
 * Raised by the normalizer when any date text cannot be parsed. Carries every
 * failing row, not just the first.
 */
export class MalformedDateError extends PipelineError {
  readonly failures: DateFailure[];

  constructor(failures: DateFailure[]) {
    const preview = failures
      .slice(0, 5)
      .map((f) => `row ${f.index}: "${f.value}"`)
      .join(', ');
    const more = failures.length > 5 ? ` and ${failures.length - 5} more` : '';
    super('MALFORMED_DATE', `Unparseable date values: ${preview}${more}`);
    this.name = 'MalformedDateError';
    this.failures = failures;
  }
}

export interface SchemaIssue {
  row: number;
  field: string;
  message: string;
}

export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error occurred';
}
