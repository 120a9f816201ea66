import type { FastifyInstance } from "fastify";
import type { DecisionEngine } from "../decision/engine.js";
import { ENGAGEMENT_THRESHOLD } from "../decision/policy.js";
import type { Recommendation } from "../decision/types.js";
import type { UserStore } from "../data/user-store.js";
import { RecommendParams } from "../schemas/recommendation.js";
import { getRequestId } from "../utils/request-id.js";
import { toErrorV1 } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import type { ServiceStats } from "./v1.status.js";

export interface RecommendRouteDeps {
  engine: DecisionEngine;
  users: UserStore;
  stats: ServiceStats;
}

/**
 * Kept as-is for existing clients; every other error uses error.v1
 */
export const USER_NOT_FOUND_BODY = { error: "User not found" } as const;

/**
 * GET /recommend/:user_id
 *
 * Looks the user up in the loaded dataset and runs the decision engine.
 * Engine failures propagate to the central error handler.
 */
export default async function recommendRoute(app: FastifyInstance, deps: RecommendRouteDeps) {
  const { engine, users, stats } = deps;

  app.get("/recommend/:user_id", async (req, reply): Promise<Recommendation | typeof USER_NOT_FOUND_BODY> => {
    const start = Date.now();
    const requestId = getRequestId(req);

    // ZodError → 400 BAD_INPUT via the error handler
    const { user_id: userId } = RecommendParams.parse(req.params);

    emit(TelemetryEvents.RecommendationRequested, { request_id: requestId, user_id: userId });

    const record = users.get(userId);
    if (!record) {
      emit(TelemetryEvents.UserNotFound, { request_id: requestId, user_id: userId });
      reply.code(404);
      return USER_NOT_FOUND_BODY;
    }

    let recommendation: Recommendation;
    try {
      recommendation = engine.recommend(record);
    } catch (error) {
      emit(TelemetryEvents.RecommendationFailed, {
        request_id: requestId,
        user_id: userId,
        error_code: toErrorV1(error).code,
        latency_ms: Date.now() - start,
      });
      throw error;
    }

    // Same rounded score the engine decided on
    const fallback = recommendation.engagement_score <= ENGAGEMENT_THRESHOLD;
    stats.recordRecommendation(recommendation.action, fallback);
    emit(TelemetryEvents.RecommendationSucceeded, {
      request_id: requestId,
      user_id: userId,
      action: recommendation.action,
      engagement_score: recommendation.engagement_score,
      fallback,
      provider: engine.providerName,
      latency_ms: Date.now() - start,
    });

    return recommendation;
  });
}
