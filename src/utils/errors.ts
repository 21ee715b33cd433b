/**
 * Error taxonomy for the service.
 *
 * Probe-level failures are absorbed by callers, job-level failures end up in
 * the job record, and only request-level failures reach the HTTP layer.
 */

export enum ErrorCategory {
  USER_INPUT = 'user_input',
  UPSTREAM_UNAVAILABLE = 'upstream_unavailable',
  EXTRACTION_FAILURE = 'extraction_failure',
  PIPELINE_FAILURE = 'pipeline_failure',
  CANCELLATION_REQUESTED = 'cancellation_requested',
}

export class AppError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = new.target.name;
    this.category = category;
  }
}

export class UserInputError extends AppError {
  constructor(message: string) {
    super(ErrorCategory.USER_INPUT, message);
  }
}

export class UpstreamUnavailableError extends AppError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(ErrorCategory.UPSTREAM_UNAVAILABLE, message);
    this.status = status;
  }
}

export class ExtractionFailureError extends AppError {
  constructor(message: string) {
    super(ErrorCategory.EXTRACTION_FAILURE, message);
  }
}

export class PipelineFailureError extends AppError {
  constructor(message: string) {
    super(ErrorCategory.PIPELINE_FAILURE, message);
  }
}

export class CancellationRequestedError extends AppError {
  constructor() {
    super(ErrorCategory.CANCELLATION_REQUESTED, 'Job cancelled');
  }
}

export function isCancellation(error: unknown): boolean {
  return error instanceof CancellationRequestedError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const MAX_MESSAGE_LENGTH = 300;

/**
 * Reduce an engine or library message to something safe to show a user:
 * the first ERROR line (or first non-empty line), without credentials,
 * API keys or absolute filesystem paths.
 */
export function sanitizeErrorMessage(raw: string): string {
  const lines = raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const errorLine = lines.find((line) => line.startsWith('ERROR:'));
  let message = errorLine ?? lines[0] ?? 'Unknown error';

  message = message
    // user:password@ in proxy or download URLs
    .replace(/(\b[a-z][a-z0-9+.-]*:\/\/)[^\s/@]+@/gi, '$1')
    // key=..., token=..., signature=... query parameters
    .replace(/([?&](?:key|api_key|token|sig|signature)=)[^&\s]+/gi, '$1***')
    // absolute POSIX and Windows paths, keep only the final segment
    .replace(/(?<![\w:/.~-])(?:[A-Za-z]:\\|\/)(?:[^\s/\\:'"]+[/\\])+([^\s/\\:'"]+)/g, '$1');

  if (message.length > MAX_MESSAGE_LENGTH) {
    message = `${message.slice(0, MAX_MESSAGE_LENGTH - 3)}...`;
  }
  return message;
}
