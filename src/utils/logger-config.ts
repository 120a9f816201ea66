/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger redaction paths.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * SECURITY: sensitive headers and user attributes must be listed here so they
 * never reach log output.
 */

/**
 * Paths to redact from all log output.
 * Uses Pino's path syntax with wildcards.
 */
export const REDACT_PATHS = [
  // Auth secrets (at any depth)
  "*.password",
  "*.secret",
  "*.token",
  "*.apiKey",
  "*.api_key",
  "*.authorization",

  // Common header names
  "*.headers.authorization",
  "*.headers.x-api-key",
  "*.headers.cookie",
  "req.headers.authorization",
  "req.headers.cookie",

  // User attributes from the dataset
  "*.age",
  "*.gender",
  "*.email",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string) {
  return {
    level,
    redact: createRedactConfig(),
  };
}
