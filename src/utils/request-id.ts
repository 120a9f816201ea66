import { randomUUID } from 'node:crypto';
import type { FastifyRequest } from 'fastify';

declare module 'fastify' {
  interface FastifyRequest {
    requestId?: string;
  }
}

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = 'X-Request-Id';
export const REQUEST_ID_HEADER_LOWER = 'x-request-id';

const MAX_REQUEST_ID_LENGTH = 128;

export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Extract request ID from incoming headers or generate a new one
 */
export function getOrGenerateRequestId(request: FastifyRequest): string {
  const incomingId = request.headers[REQUEST_ID_HEADER_LOWER];

  if (
    typeof incomingId === 'string' &&
    incomingId.trim().length > 0 &&
    incomingId.trim().length <= MAX_REQUEST_ID_LENGTH
  ) {
    return incomingId.trim();
  }

  return generateRequestId();
}

export function attachRequestId(request: FastifyRequest): void {
  request.requestId = getOrGenerateRequestId(request);
}

/**
 * Get request ID from Fastify request (assumes it was attached)
 */
export function getRequestId(request?: FastifyRequest): string {
  if (!request) {
    return 'unknown';
  }

  return request.requestId ?? request.id;
}
