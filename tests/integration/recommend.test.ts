import { describe, it, expect, beforeAll, afterAll, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { build } from "../../src/server.js";
import { UserStore } from "../../src/data/user-store.js";
import type { PredictionProvider } from "../../src/decision/provider.js";
import type { Prediction } from "../../src/decision/types.js";
import { setTestSink, TelemetryEvents, type TelemetryShape } from "../../src/utils/telemetry.js";
import { RecommendationSchema } from "../../src/schemas/recommendation.js";
import { StubPredictionProvider } from "../helpers/stub-provider.js";

const CSV = [
  "user_id,age,gender,last_active,interactions,purchases",
  "1,25,M,2025-08-10,15,2",
  "2,34,F,2025-08-12,42,7",
  "11,27,F,2025-08-02,9,",
].join("\n");

async function buildWith(provider: PredictionProvider): Promise<FastifyInstance> {
  const app = await build({ users: UserStore.fromCsv(CSV), provider });
  await app.ready();
  return app;
}

describe("GET /recommend/:user_id", () => {
  describe("with a confident provider", () => {
    let app: FastifyInstance;
    let provider: StubPredictionProvider;

    beforeAll(async () => {
      provider = new StubPredictionProvider({ engagement_score: 0.82, suggested_action: "recommend_product" });
      app = await buildWith(provider);
    });

    afterAll(async () => {
      await app.close();
    });

    afterEach(() => {
      setTestSink(null);
    });

    it("returns the provider's suggestion", async () => {
      const res = await app.inject({ method: "GET", url: "/recommend/1" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ user_id: 1, action: "recommend_product", engagement_score: 0.82 });
      expect(RecommendationSchema.safeParse(res.json()).success).toBe(true);
    });

    it("passes the stored record to the provider", async () => {
      provider.calls.length = 0;
      await app.inject({ method: "GET", url: "/recommend/2" });

      expect(provider.calls).toEqual([
        { user_id: 2, age: 34, gender: "F", last_active: "2025-08-12", interactions: 42, purchases: 7 },
      ]);
    });

    it("returns 404 with the legacy body for an unknown user", async () => {
      const res = await app.inject({ method: "GET", url: "/recommend/99" });

      expect(res.statusCode).toBe(404);
      expect(res.json()).toEqual({ error: "User not found" });
    });

    it("returns 500 INVALID_RECORD for a stored row missing a field", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/recommend/11",
        headers: { "X-Request-Id": "req-invalid-11" },
      });

      expect(res.statusCode).toBe(500);
      expect(res.json()).toEqual({
        schema: "error.v1",
        code: "INVALID_RECORD",
        message: "Stored user record is missing required fields",
        details: { missing_fields: ["purchases"] },
        request_id: "req-invalid-11",
      });
    });

    it.each(["abc", "0", "-1", "1.5"])("returns 400 BAD_INPUT for user_id %j", async (userId) => {
      const res = await app.inject({ method: "GET", url: `/recommend/${userId}` });

      expect(res.statusCode).toBe(400);
      const body = res.json();
      expect(body.schema).toBe("error.v1");
      expect(body.code).toBe("BAD_INPUT");
    });

    it("echoes the incoming request id", async () => {
      const res = await app.inject({
        method: "GET",
        url: "/recommend/1",
        headers: { "X-Request-Id": "req-echo-1" },
      });

      expect(res.headers["x-request-id"]).toBe("req-echo-1");
    });

    it("generates a request id when none is sent", async () => {
      const res = await app.inject({ method: "GET", url: "/recommend/1" });

      expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    });

    it("emits requested and succeeded telemetry", async () => {
      const events: Array<{ event: string; data: TelemetryShape }> = [];
      setTestSink((event, data) => events.push({ event, data }));

      await app.inject({ method: "GET", url: "/recommend/1", headers: { "X-Request-Id": "req-telemetry" } });

      expect(events.map((e) => e.event)).toEqual([
        TelemetryEvents.RecommendationRequested,
        TelemetryEvents.RecommendationSucceeded,
      ]);
      expect(events[1]?.data).toMatchObject({
        request_id: "req-telemetry",
        user_id: 1,
        action: "recommend_product",
        engagement_score: 0.82,
        fallback: false,
        provider: "stub",
      });
    });

    it("emits user_not_found telemetry for an unknown user", async () => {
      const events: string[] = [];
      setTestSink((event) => events.push(event));

      await app.inject({ method: "GET", url: "/recommend/99" });

      expect(events).toEqual([TelemetryEvents.RecommendationRequested, TelemetryEvents.UserNotFound]);
    });
  });

  describe("with a low-confidence provider", () => {
    let app: FastifyInstance;

    beforeAll(async () => {
      app = await buildWith(new StubPredictionProvider({ engagement_score: 0.45, suggested_action: "offer_discount" }));
    });

    afterAll(async () => {
      await app.close();
    });

    it("falls back to send_message", async () => {
      const res = await app.inject({ method: "GET", url: "/recommend/1" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ user_id: 1, action: "send_message", engagement_score: 0.45 });
    });
  });

  describe("with a score just above the threshold before rounding", () => {
    let app: FastifyInstance;

    beforeAll(async () => {
      app = await buildWith(new StubPredictionProvider({ engagement_score: 0.703, suggested_action: "offer_discount" }));
    });

    afterAll(async () => {
      await app.close();
      setTestSink(null);
    });

    it("falls back and counts the fallback consistently", async () => {
      const events: Array<{ event: string; data: TelemetryShape }> = [];
      setTestSink((event, data) => events.push({ event, data }));

      const res = await app.inject({ method: "GET", url: "/recommend/1" });
      expect(res.json()).toEqual({ user_id: 1, action: "send_message", engagement_score: 0.7 });
      expect(events[1]?.data).toMatchObject({ action: "send_message", engagement_score: 0.7, fallback: true });

      const status = await app.inject({ method: "GET", url: "/v1/status" });
      expect(status.json().recommendations).toEqual({
        total: 1,
        fallbacks: 1,
        by_action: { offer_discount: 0, recommend_product: 0, send_message: 1 },
      });
    });
  });

  describe("with a failing provider", () => {
    class FailingProvider implements PredictionProvider {
      readonly name = "remote-model";
      predict(): Prediction {
        throw new Error("connect ECONNREFUSED");
      }
    }

    let app: FastifyInstance;

    beforeAll(async () => {
      app = await buildWith(new FailingProvider());
    });

    afterAll(async () => {
      await app.close();
      setTestSink(null);
    });

    it("returns 502 PROVIDER_ERROR and emits a failure event", async () => {
      const events: Array<{ event: string; data: TelemetryShape }> = [];
      setTestSink((event, data) => events.push({ event, data }));

      const res = await app.inject({
        method: "GET",
        url: "/recommend/1",
        headers: { "X-Request-Id": "req-provider-down" },
      });

      expect(res.statusCode).toBe(502);
      expect(res.json()).toEqual({
        schema: "error.v1",
        code: "PROVIDER_ERROR",
        message: "Prediction provider failed",
        details: { provider: "remote-model" },
        request_id: "req-provider-down",
      });
      expect(events.map((e) => e.event)).toEqual([
        TelemetryEvents.RecommendationRequested,
        TelemetryEvents.RecommendationFailed,
      ]);
      expect(events[1]?.data).toMatchObject({ user_id: 1, error_code: "PROVIDER_ERROR" });
    });
  });
});
