/**
 * Error classes and helpers for the keyword extraction service.
 *
 * Every error raised on purpose extends KeywordExtractionError so that the
 * HTTP layer and the CLI can map it to a code and status without guessing.
 */

import type { Logger } from 'pino';

export class KeywordExtractionError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode: number, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when `maxKeywordSize` or `limit` is not a positive integer.
 * Raised before any segmentation work starts.
 */
export class InvalidConfigurationError extends KeywordExtractionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_CONFIGURATION', 400, context);
  }
}

/**
 * Thrown when request or command-line input is malformed
 */
export class ValidationError extends KeywordExtractionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Thrown when a stopword list cannot be read or parsed
 */
export class StopwordLoadError extends KeywordExtractionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'STOPWORD_LOAD_ERROR', 500, context);
  }
}

/**
 * Standard error response format for API endpoints
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    timestamp: string;
    requestId?: string;
    details?: Record<string, unknown>;
  };
}

export interface ErrorContext {
  operation?: string;
  requestId?: string;
  [key: string]: unknown;
}

export const ERROR_CODES = {
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  STOPWORD_LOAD_ERROR: 'STOPWORD_LOAD_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export function isKeywordExtractionError(error: unknown): error is KeywordExtractionError {
  return error instanceof KeywordExtractionError;
}

/**
 * Extract the loggable fields of an error
 */
export function extractErrorInfo(error: Error): {
  message: string;
  code?: string;
  statusCode?: number;
  context?: Record<string, unknown>;
} {
  if (isKeywordExtractionError(error)) {
    return {
      message: error.message,
      code: error.code,
      statusCode: error.statusCode,
      context: error.context,
    };
  }

  return {
    message: error.message,
  };
}

/**
 * Build the JSON error envelope. Unknown errors never leak their message.
 */
export function createErrorResponse(error: Error, requestId?: string): ErrorResponse {
  if (isKeywordExtractionError(error)) {
    return {
      error: {
        code: error.code,
        message: error.message,
        timestamp: new Date().toISOString(),
        requestId,
        details: error.context,
      },
    };
  }

  return {
    error: {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
      timestamp: new Date().toISOString(),
      requestId,
    },
  };
}

export function logError(
  logger: Pick<Logger, 'error'>,
  error: Error,
  context?: ErrorContext
): void {
  const errorInfo = extractErrorInfo(error);

  logger.error({
    error: errorInfo,
    context,
    timestamp: new Date().toISOString(),
  }, `Error occurred: ${error.message}`);
}
