/**
 * Error taxonomy for the extractor
 *
 * Everything the run reports to the user is an AppError; anything else that
 * escapes is treated as a bug by the CLI.
 *
 * @module utils/errors
 */

import { ZodError } from 'zod';

export enum ErrorCode {
  CONFIGURATION_ERROR = 'configuration_error',
  AUTHENTICATION_ERROR = 'authentication_error',
  EXTRACTION_ERROR = 'extraction_error',
  HTTP_ERROR = 'http_error',
  TIMEOUT = 'timeout',
  SINK_ERROR = 'sink_error'
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Non-2xx response from the API
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    public readonly body: string
  ) {
    super(`HTTP ${status} for ${redactUrl(url)}: ${body.slice(0, 200)}`);
    this.name = 'HttpError';
  }

  get isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }
}

/**
 * Drop credentials from a URL before it ends up in a log line or error message
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const key of ['accessToken', 'password']) {
      if (parsed.searchParams.has(key)) {
        parsed.searchParams.set(key, '***');
      }
    }
    return parsed.toString();
  } catch {
    return url;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Collapse a ZodError into one configuration error listing every failing path
 */
export function fromZodError(error: ZodError, source: string): AppError {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });

  return new AppError(
    ErrorCode.CONFIGURATION_ERROR,
    `Validation error in ${source}: ${issues.join(', ')}`,
    error.flatten()
  );
}
