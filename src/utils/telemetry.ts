import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { createLoggerConfig } from "./logger-config.js";
import { getConfig } from "../config/index.js";

/**
 * Pino logger with secret/PII redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * so the Fastify and standalone loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TelemetrySink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests
 * Only used when NODE_ENV=test or VITEST is set
 */
let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  const isTestEnv = env.NODE_ENV === "test" || Boolean(env.VITEST);
  if (!isTestEnv) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  RecommendationRequested: "recommendation.requested",
  RecommendationSucceeded: "recommendation.succeeded",
  RecommendationFailed: "recommendation.failed",
  UserNotFound: "recommendation.user_not_found",

  DatasetLoaded: "dataset.loaded",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 *
 * Created on first emit; null when no agent host is configured.
 */
let datadogClient: StatsD | null | undefined;

function getDatadogClient(): StatsD | null {
  if (datadogClient === undefined) {
    const { datadog, server } = getConfig();
    datadogClient = datadog.agentHost ? createDatadogClient(datadog.agentHost, datadog.agentPort, {
      service: datadog.service,
      env: datadog.env ?? server.nodeEnv,
    }) : null;
  }
  return datadogClient;
}

function createDatadogClient(host: string, port: number, globalTags: Record<string, string>): StatsD {
  const client = new StatsD({
    host,
    port,
    prefix: "personalization.",
    globalTags,
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: host, dd_port: port }, "Datadog StatsD client initialized");
  return client;
}

function sanitizeTelemetryValue(
  value: unknown,
): TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape> | undefined {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  // functions, symbols, bigints
  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function sendMetrics(client: StatsD, event: string, eventData: TelemetryShape): void {
  switch (event) {
    case TelemetryEvents.RecommendationSucceeded: {
      const action = typeof eventData.action === "string" ? eventData.action : "unknown";
      client.increment("recommendation.count", 1, {
        action,
        fallback: String(eventData.fallback === true),
      });
      if (typeof eventData.engagement_score === "number") {
        client.histogram("recommendation.engagement_score", eventData.engagement_score, { action });
      }
      if (typeof eventData.latency_ms === "number") {
        client.histogram("recommendation.latency_ms", eventData.latency_ms);
      }
      break;
    }
    case TelemetryEvents.RecommendationFailed: {
      const code = typeof eventData.error_code === "string" ? eventData.error_code : "unknown";
      client.increment("recommendation.failed", 1, { error_code: code });
      break;
    }
    case TelemetryEvents.UserNotFound:
      client.increment("recommendation.user_not_found");
      break;
    case TelemetryEvents.DatasetLoaded:
      if (typeof eventData.users === "number") {
        client.gauge("dataset.users", eventData.users);
      }
      break;
    default:
      break;
  }
}

/**
 * Emit a structured telemetry event
 *
 * Always logs through pino; forwards to the test sink and StatsD when present.
 */
export function emit(event: TelemetryEventName, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  log.info({ event, ...eventData });

  const client = getDatadogClient();
  if (client) {
    try {
      sendMetrics(client, event, eventData);
    } catch (error) {
      log.warn({ error, event }, "Failed to send StatsD metrics");
    }
  }
}
