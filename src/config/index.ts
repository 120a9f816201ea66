/**
 * Centralized Configuration Module
 *
 * Provides type-safe, validated access to all environment variables.
 * Replaces scattered `process.env` usage throughout the codebase.
 *
 * Parsed lazily on first access so tests can stub env vars before use.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    if (lower === "true" || lower === "1") return true;
    return Boolean(val);
  });

/**
 * Comma-separated list, empty entries dropped
 */
const commaList = z
  .string()
  .transform((val) =>
    val
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

export const DEFAULT_ALLOWED_ORIGINS = ["http://localhost:3000", "http://localhost:5173"];

/**
 * Configuration Schema
 */
const ConfigSchema = z
  .object({
    server: z.object({
      port: z.coerce.number().int().positive().default(5000),
      host: z.string().default("0.0.0.0"),
      nodeEnv: Environment.default("development"),
      logLevel: LogLevel.default("info"),
    }),

    data: z.object({
      usersCsvPath: z.string().min(1).default("data/mock_user_data.csv"),
    }),

    rateLimits: z.object({
      defaultRpm: z.coerce.number().int().positive().default(120),
    }),

    cors: z.object({
      allowedOrigins: commaList.default(DEFAULT_ALLOWED_ORIGINS.join(",")),
    }),

    observability: z.object({
      infoSampleRate: z.coerce.number().min(0).max(1).default(0.1),
      logStack: booleanString.default(false),
    }),

    datadog: z.object({
      agentHost: z.string().optional(),
      agentPort: z.coerce.number().int().positive().default(8125),
      service: z.string().default("personalization-recommendation-service"),
      env: z.string().optional(),
    }),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.server.nodeEnv === "production" && cfg.cors.allowedOrigins.includes("*")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["cors", "allowedOrigins"],
        message: "ALLOWED_ORIGINS cannot contain '*' in production",
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Treat empty strings as unset so schema defaults apply
 */
function envValue(name: string): string | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  return raw;
}

/**
 * Parse and validate configuration from environment variables
 */
function parseConfig(): Config {
  const rawConfig = {
    server: {
      port: envValue("PORT"),
      host: envValue("HOST"),
      nodeEnv: envValue("NODE_ENV"),
      logLevel: envValue("LOG_LEVEL"),
    },
    data: {
      usersCsvPath: envValue("USERS_CSV_PATH"),
    },
    rateLimits: {
      defaultRpm: envValue("GLOBAL_RATE_LIMIT_RPM"),
    },
    cors: {
      allowedOrigins: envValue("ALLOWED_ORIGINS"),
    },
    observability: {
      infoSampleRate: envValue("INFO_SAMPLE_RATE"),
      logStack: envValue("LOG_STACK"),
    },
    datadog: {
      agentHost: envValue("DD_AGENT_HOST"),
      agentPort: envValue("DD_AGENT_PORT"),
      service: envValue("DD_SERVICE"),
      env: envValue("DD_ENV"),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration. Please check environment variables. (${issues})`);
  }
  return result.data;
}

let _cachedConfig: Config | null = null;

/**
 * Get configuration, parsing it on first access and caching thereafter
 */
export function getConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}
