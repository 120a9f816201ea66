import { ZodError } from 'zod';
import type { FastifyRequest } from 'fastify';
import { getRequestId } from './request-id.js';
import { InvalidRecordError, ProviderError } from '../decision/errors.js';

/**
 * Error codes for structured error responses
 */
export type ErrorCode =
  | 'BAD_INPUT'
  | 'NOT_FOUND'
  | 'RATE_LIMITED'
  | 'INVALID_RECORD'
  | 'PROVIDER_ERROR'
  | 'INTERNAL';

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: 'error.v1';
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: 'error.v1',
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    'BAD_INPUT',
    'Validation failed',
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

/**
 * Strip file paths, key/secret assignments and email addresses
 */
export function sanitizeErrorMessage(raw: string): string {
  return raw
    .replace(/\/[\w/.@-]+/g, '[path]')
    .replace(/[A-Z_]+_?KEY=\S+/gi, '[KEY_REDACTED]')
    .replace(/[A-Z_]+_?SECRET=\S+/gi, '[SECRET_REDACTED]')
    .replace(/[\w.-]+@[\w.-]+\.\w+/g, '[email]');
}

/**
 * Thrown by the rate limiter; carries the seconds until the window resets
 */
export class RateLimitedError extends Error {
  readonly statusCode = 429;

  constructor(public readonly retryAfterSeconds: number) {
    super('Too many requests');
    this.name = 'RateLimitedError';
  }
}

function httpStatusOf(error: Error): number | undefined {
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Convert any error to ErrorV1 (safe, never leaks stack/PII)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof InvalidRecordError) {
    return buildErrorV1(
      'INVALID_RECORD',
      'Stored user record is missing required fields',
      { missing_fields: [...error.missingFields] },
      requestId
    );
  }

  if (error instanceof ProviderError) {
    return buildErrorV1(
      'PROVIDER_ERROR',
      'Prediction provider failed',
      { provider: error.provider },
      requestId
    );
  }

  if (error instanceof RateLimitedError) {
    return buildErrorV1(
      'RATE_LIMITED',
      'Too many requests',
      { retry_after_seconds: error.retryAfterSeconds },
      requestId
    );
  }

  if (error instanceof Error) {
    const statusCode = httpStatusOf(error);

    if (statusCode === 429) {
      return buildErrorV1('RATE_LIMITED', 'Too many requests', undefined, requestId);
    }

    if (statusCode === 404) {
      return buildErrorV1('NOT_FOUND', sanitizeErrorMessage(error.message || 'Not found'), undefined, requestId);
    }

    // Fastify's own client errors (bad content type, malformed URL, ...)
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
      return buildErrorV1('BAD_INPUT', sanitizeErrorMessage(error.message || 'Bad request'), undefined, requestId);
    }

    const message = sanitizeErrorMessage(error.message || 'An unexpected error occurred');
    return buildErrorV1('INTERNAL', message, undefined, requestId);
  }

  if (typeof error === 'string') {
    return buildErrorV1('INTERNAL', sanitizeErrorMessage(error), undefined, requestId);
  }

  return buildErrorV1('INTERNAL', 'An unexpected error occurred', undefined, requestId);
}

export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'BAD_INPUT':
      return 400;
    case 'NOT_FOUND':
      return 404;
    case 'RATE_LIMITED':
      return 429;
    case 'PROVIDER_ERROR':
      return 502;
    case 'INVALID_RECORD':
    case 'INTERNAL':
    default:
      return 500;
  }
}
