/**
 * /v1/status - Service Diagnostics
 *
 * Runtime counters beyond the /healthz liveness check:
 * request totals, error split, and the recommendation action mix.
 *
 * **Security:** No authentication required (counters only, no user data)
 */

import type { FastifyInstance } from "fastify";
import { ACTIONS, type Action } from "../decision/types.js";
import { SERVICE_VERSION } from "../version.js";

/**
 * In-memory counters for one server instance (reset on restart)
 */
export class ServiceStats {
  readonly startedAt = Date.now();
  private totalRequests = 0;
  private client4xxErrors = 0;
  private server5xxErrors = 0;
  private fallbacks = 0;
  private readonly actions: Record<Action, number> = {
    offer_discount: 0,
    recommend_product: 0,
    send_message: 0,
  };

  incrementRequestCount(): void {
    this.totalRequests++;
  }

  /**
   * Only 5xx count toward the error rate
   */
  incrementErrorCount(statusCode: number): void {
    if (statusCode >= 500) {
      this.server5xxErrors++;
    } else if (statusCode >= 400) {
      this.client4xxErrors++;
    }
  }

  recordRecommendation(action: Action, fallback: boolean): void {
    this.actions[action]++;
    if (fallback) {
      this.fallbacks++;
    }
  }

  snapshot(now: number = Date.now()): StatusResponse {
    const total = ACTIONS.reduce((sum, action) => sum + this.actions[action], 0);

    return {
      service: "personalization",
      version: SERVICE_VERSION,
      uptime_seconds: Math.floor((now - this.startedAt) / 1000),
      timestamp: new Date(now).toISOString(),
      requests: {
        total: this.totalRequests,
        client_errors_4xx: this.client4xxErrors,
        server_errors_5xx: this.server5xxErrors,
        error_rate_5xx: this.totalRequests > 0 ? this.server5xxErrors / this.totalRequests : 0,
      },
      recommendations: {
        total,
        fallbacks: this.fallbacks,
        by_action: { ...this.actions },
      },
    };
  }
}

export interface StatusResponse {
  service: string;
  version: string;
  uptime_seconds: number;
  timestamp: string;
  requests: {
    total: number;
    client_errors_4xx: number;
    server_errors_5xx: number;
    error_rate_5xx: number;
  };
  recommendations: {
    total: number;
    fallbacks: number;
    by_action: Record<Action, number>;
  };
}

/**
 * GET /v1/status - Service diagnostics endpoint
 */
export async function statusRoutes(app: FastifyInstance, stats: ServiceStats): Promise<void> {
  app.get("/v1/status", async (): Promise<StatusResponse> => stats.snapshot());
}
